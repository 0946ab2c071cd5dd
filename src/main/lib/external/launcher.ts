import type { Entry } from "../../../shared/types";
import { errorMessage } from "../errors";
import log from "../logger";
import { formatEntry } from "../parcels/entry";
import type { PlatformOpener } from "./opener";

export interface LaunchOptions {
  opener: PlatformOpener;
  /** Shell entries are refused unless enabled in the config */
  allowShell: boolean;
}

export type LaunchResult =
  | { entry: Entry; ok: true }
  | { entry: Entry; ok: false; error: string };

export type LaunchFailure = Extract<LaunchResult, { ok: false }>;

export interface LaunchReport {
  parcel: string;
  attempted: number;
  failures: LaunchFailure[];
}

function openEntry(entry: Entry, options: LaunchOptions): Promise<void> {
  const { opener } = options;
  switch (entry.kind) {
    case "app":
      return opener.openApp(entry.name);
    case "file":
      return opener.openPath(entry.path);
    case "url":
      return opener.openUrl(entry.url);
    case "shell":
      if (!options.allowShell) {
        return Promise.reject(
          new Error("shell entries are disabled (set `allow_shell: true` to enable them)"),
        );
      }
      return opener.runShell(entry.command);
  }
}

/** Make one attempt at opening an entry */
export async function launchEntry(
  entry: Entry,
  options: LaunchOptions,
): Promise<LaunchResult> {
  try {
    await openEntry(entry, options);
    log.info(`[Launcher] Opened ${entry.kind} ${formatEntry(entry)}`);
    return { entry, ok: true };
  } catch (error) {
    const message = errorMessage(error);
    log.warn(`[Launcher] Failed to open ${entry.kind} ${formatEntry(entry)}: ${message}`);
    return { entry, ok: false, error: message };
  }
}

/**
 * Open every entry of a parcel in order.
 * A failing entry never stops the ones after it.
 */
export async function launchParcel(
  parcel: string,
  entries: readonly Entry[],
  options: LaunchOptions,
): Promise<LaunchReport> {
  const failures: LaunchFailure[] = [];
  for (const entry of entries) {
    const result = await launchEntry(entry, options);
    if (!result.ok) {
      failures.push(result);
    }
  }
  return { parcel, attempted: entries.length, failures };
}
