/**
 * One launch target of a parcel.
 *
 * Produced by `classifyEntry` from the raw string written in the config file;
 * `formatEntry` turns it back into the form a user would type.
 */
export type Entry =
  /** Application identifier, opened with the platform's app-launch semantics */
  | { kind: "app"; name: string }
  /** Normalized filesystem path (file or directory), `~` already expanded */
  | { kind: "file"; path: string }
  /** Absolute URI with a scheme, kept exactly as written */
  | { kind: "url"; url: string }
  /** Raw shell command text. Runs arbitrary code; only produced when enabled */
  | { kind: "shell"; command: string };

/** A named, ordered group of entries */
export interface Parcel {
  name: string;
  entries: Entry[];
}
