/**
 * The operations behind each CLI subcommand.
 */
import {
  type ChooserOutcome,
  type FinderRunner,
  ParcelChooser,
} from "./chooser";
import {
  errorMessage,
  FinderError,
  ParcelLaunchError,
  SelectionLaunchError,
} from "./errors";
import { type LaunchReport, launchParcel } from "./external/launcher";
import type { PlatformOpener } from "./external/opener";
import log from "./logger";
import { formatEntryLines, formatParcel, type ParcelStore } from "./parcels/store";

export const NOTHING_SELECTED_MESSAGE = "No parcel selected.";
export const NO_PARCELS_MESSAGE =
  "No parcels available. Please add parcels to the configuration file.";

export interface OutputStream {
  write(chunk: string): unknown;
}

export interface CommandContext {
  store: ParcelStore;
  configPath: string;
  allowShell: boolean;
  opener: PlatformOpener;
  stdout: OutputStream;
  stderr: OutputStream;
  finderCommand?: string;
  runFinder?: FinderRunner;
}

/**
 * Open every entry of a parcel.
 *
 * Failed entries are logged and skipped. Only a parcel whose entries all
 * failed is an error; an empty parcel opens nothing and succeeds.
 */
export async function openParcel(
  context: CommandContext,
  name: string,
): Promise<LaunchReport> {
  const entries = context.store.get(name);
  if (entries.length === 0) {
    log.warn(`[Open] Parcel \`${name}\` has no entries`);
  }

  const report = await launchParcel(name, entries, {
    opener: context.opener,
    allowShell: context.allowShell,
  });

  if (report.attempted > 0 && report.failures.length === report.attempted) {
    throw new ParcelLaunchError(name, report.failures.length);
  }
  if (report.failures.length > 0) {
    log.warn(
      `[Open] Opened ${report.attempted - report.failures.length} of ${report.attempted} entries of \`${name}\``,
    );
  }
  return report;
}

/**
 * Let the user pick parcels in the fuzzy finder, then open each pick in the
 * order the finder returned them.
 *
 * Every pick is attempted; picks that failed are reported together afterwards.
 */
export async function chooseParcels(
  context: CommandContext,
  options: { multi: boolean },
): Promise<ChooserOutcome> {
  const chooser = new ParcelChooser({
    configPath: context.configPath,
    multi: options.multi,
    finderCommand: context.finderCommand,
    runFinder: context.runFinder,
  });

  const outcome = await chooser.choose(context.store.names());
  switch (outcome.status) {
    case "selected": {
      const failed: string[] = [];
      for (const name of outcome.names) {
        try {
          await openParcel(context, name);
        } catch (error) {
          log.error(`[Choose] ${errorMessage(error)}`);
          failed.push(name);
        }
      }
      if (failed.length > 0) {
        throw new SelectionLaunchError(failed, outcome.names.length);
      }
      break;
    }
    case "none_selected":
    case "cancelled":
      context.stderr.write(`${NOTHING_SELECTED_MESSAGE}\n`);
      break;
    case "no_candidates":
      context.stderr.write(`${NO_PARCELS_MESSAGE}\n`);
      break;
    case "failed":
      throw new FinderError(outcome.message, outcome.exitCode, outcome.signal);
  }
  return outcome;
}

export interface ListOptions {
  name?: string;
  /** Print the whole config as JSON */
  json?: boolean;
  /** Print parcel names only, one per line */
  names?: boolean;
}

export function listParcels(
  context: Pick<CommandContext, "store" | "stdout">,
  options: ListOptions = {},
): void {
  const { store, stdout } = context;

  if (options.json) {
    stdout.write(`${store.serialize()}\n`);
    return;
  }
  if (options.names) {
    stdout.write(store.names().map((name) => `${name}\n`).join(""));
    return;
  }
  if (options.name !== undefined) {
    stdout.write(formatEntryLines(store.get(options.name)));
    return;
  }
  stdout.write(store.list().map(formatParcel).join(""));
}
