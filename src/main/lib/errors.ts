/**
 * Error types surfaced to the command line, and helpers for Node errors.
 */

/**
 * Error raised by fs and child_process calls.
 * `code` is a string such as "ENOENT" or "EACCES".
 */
export interface ErrnoException extends Error {
  code?: string;
  errno?: number;
  syscall?: string;
  path?: string;
}

export function isErrnoException(error: unknown): error is ErrnoException {
  return (
    error instanceof Error &&
    ("code" in error || "errno" in error || "syscall" in error)
  );
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** Human readable list of parcel names, or a hint when there are none */
export function describeAvailableParcels(available: readonly string[]): string {
  if (available.length === 0) {
    return "No parcels are defined. Add some to the configuration file.";
  }
  return `Available parcels: ${available.join(", ")}`;
}

export class ParcelNotFoundError extends Error {
  readonly parcel: string;
  readonly available: readonly string[];

  constructor(parcel: string, available: readonly string[]) {
    super(
      `Parcel \`${parcel}\` not found. ${describeAvailableParcels(available)}`,
    );
    this.name = "ParcelNotFoundError";
    this.parcel = parcel;
    this.available = available;
  }
}

export class ConfigLoadError extends Error {
  readonly configPath: string;

  constructor(configPath: string, reason: string) {
    super(`Failed to load config \`${configPath}\`: ${reason}`);
    this.name = "ConfigLoadError";
    this.configPath = configPath;
  }
}

/** Every entry of a non-empty parcel failed to launch */
export class ParcelLaunchError extends Error {
  readonly parcel: string;
  readonly failures: number;

  constructor(parcel: string, failures: number) {
    super(
      `Failed to open parcel \`${parcel}\`: all ${failures} ${failures === 1 ? "entry" : "entries"} failed to launch`,
    );
    this.name = "ParcelLaunchError";
    this.parcel = parcel;
    this.failures = failures;
  }
}

/** At least one parcel picked in the finder failed to open; the rest were still opened */
export class SelectionLaunchError extends Error {
  readonly failed: readonly string[];
  readonly selected: number;

  constructor(failed: readonly string[], selected: number) {
    super(
      `Failed to open ${failed.length} of ${selected} selected ${selected === 1 ? "parcel" : "parcels"}: ${failed.map((name) => `\`${name}\``).join(", ")}`,
    );
    this.name = "SelectionLaunchError";
    this.failed = failed;
    this.selected = selected;
  }
}

/** The fuzzy finder exited with a status that is neither success, no-match nor cancel */
export class FinderError extends Error {
  readonly exitCode: number | null;
  readonly signal: NodeJS.Signals | null;

  constructor(
    message: string,
    exitCode: number | null,
    signal: NodeJS.Signals | null,
  ) {
    super(message);
    this.name = "FinderError";
    this.exitCode = exitCode;
    this.signal = signal;
  }
}
