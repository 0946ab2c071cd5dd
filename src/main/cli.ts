import { Argument, Command } from "commander";
import type { FinderRunner } from "./lib/chooser";
import {
  type CommandContext,
  chooseParcels,
  listParcels,
  openParcel,
  type OutputStream,
} from "./lib/commands";
import {
  COMPLETION_SHELLS,
  describeSubcommand,
  generateCompletions,
  isCompletionShell,
} from "./lib/completions";
import type { Settings } from "./lib/config";
import { createSystemOpener, type PlatformOpener } from "./lib/external/opener";
import { loadParcelConfig } from "./lib/parcels/config-file";

export const PROGRAM_NAME = "parcels";

export interface CliDependencies {
  settings: Pick<Settings, "configPath" | "finderCommand">;
  version: string;
  stdout: OutputStream;
  stderr: OutputStream;
  opener?: PlatformOpener;
  runFinder?: FinderRunner;
  /** Directory `~` expands to in entries; the user's home when omitted */
  homeDir?: string;
}

type GlobalOptions = {
  config: string;
};

/** Build the command line program; config is only read by commands that need it */
export function createProgram(deps: CliDependencies): Command {
  const program = new Command(PROGRAM_NAME);

  async function loadContext(): Promise<CommandContext> {
    const { config: configPath } = program.opts<GlobalOptions>();
    const config = await loadParcelConfig(configPath, deps.homeDir);
    return {
      store: config.store,
      allowShell: config.allowShell,
      configPath,
      opener: deps.opener ?? createSystemOpener(),
      stdout: deps.stdout,
      stderr: deps.stderr,
      finderCommand: deps.settings.finderCommand,
      runFinder: deps.runFinder,
    };
  }

  program
    .description("A tool to open groups of applications, files, folders and URLs")
    .version(deps.version)
    .option(
      "-c, --config <path>",
      "Override the default config path",
      deps.settings.configPath,
    )
    .configureOutput({
      writeOut: (text) => deps.stdout.write(text),
      writeErr: (text) => deps.stderr.write(text),
    })
    .showHelpAfterError();

  program
    .command("open")
    .description(describeSubcommand("open"))
    .argument("<name>", "Name of the parcel to open")
    .action(async (name: string) => {
      await openParcel(await loadContext(), name);
    });

  program
    .command("choose")
    .description(describeSubcommand("choose"))
    .option("--multi", "Allow multiple selections", false)
    .action(async (options: { multi: boolean }) => {
      await chooseParcels(await loadContext(), { multi: options.multi });
    });

  program
    .command("list")
    .description(describeSubcommand("list"))
    .argument("[name]", "Name of the parcel to list items for")
    .option("--json", "Output in JSON format, useful for scripting", false)
    .option("--names", "Print parcel names only, one per line", false)
    .action(
      async (
        name: string | undefined,
        options: { json: boolean; names: boolean },
      ) => {
        listParcels(await loadContext(), { name, ...options });
      },
    );

  program
    .command("completions")
    .description(describeSubcommand("completions"))
    .addArgument(
      new Argument("<shell>", "The shell to generate the completions for").choices(
        COMPLETION_SHELLS,
      ),
    )
    .action((shell: string) => {
      if (!isCompletionShell(shell)) {
        throw new Error(`Unsupported shell: ${shell}`);
      }
      deps.stdout.write(generateCompletions(shell, PROGRAM_NAME));
    });

  return program;
}
