import { shellQuote } from "../../../shared/utils";

/**
 * Command line that re-runs this program.
 * Includes the Node flags (loaders and the like) the program was started with.
 */
export function resolveSelfCommand(): string[] {
  const script = process.argv[1];
  return script
    ? [process.execPath, ...process.execArgv, script]
    : [process.execPath, ...process.execArgv];
}

/**
 * fzf `--preview` command listing the highlighted parcel.
 *
 * fzf substitutes `{}` with the quoted candidate; it reaches the inner
 * command as `$1`, so names containing shell syntax stay inert. `--` ends
 * option parsing so names starting with `-` are not read as flags.
 */
export function buildPreviewCommand(
  selfCommand: readonly string[],
  configPath: string,
): string {
  const listCommand = [...selfCommand, "--config", configPath, "list"]
    .map(shellQuote)
    .join(" ");
  return `sh -c ${shellQuote(`${listCommand} -- "$1"`)} sh {}`;
}
