import os from "node:os";
import type { Entry } from "../../../shared/types";
import { expandHome, normalizePath } from "../../../shared/utils";

/** Marks a shell command entry: `sh: make serve` */
export const SHELL_PREFIX = "sh:";
/** Explicit file entry: `fs:notes/today.md` */
export const FILE_PREFIX = "fs:";

// RFC 3986 scheme followed by its colon
const SCHEME_PATTERN = /^[A-Za-z][A-Za-z0-9+.-]*:/;

export interface ClassifyOptions {
  /** Recognise `sh:` entries. Off by default since they run arbitrary code */
  allowShell?: boolean;
  /** Directory `~` expands to */
  homeDir?: string;
}

type EntryRule = (raw: string, options: Required<ClassifyOptions>) => Entry | null;

function toFileEntry(rawPath: string, homeDir: string): Entry {
  return { kind: "file", path: normalizePath(expandHome(rawPath, homeDir)) };
}

const shellRule: EntryRule = (raw, { allowShell }) => {
  if (!allowShell || !raw.startsWith(SHELL_PREFIX)) return null;
  return { kind: "shell", command: raw.slice(SHELL_PREFIX.length).trimStart() };
};

const fileRule: EntryRule = (raw, { homeDir }) => {
  if (raw.startsWith(FILE_PREFIX)) {
    const rest = raw.slice(FILE_PREFIX.length);
    return rest ? toFileEntry(rest, homeDir) : null;
  }
  if (raw.startsWith("~") || raw.startsWith("/")) {
    return toFileEntry(raw, homeDir);
  }
  return null;
};

// Requires an explicit scheme: `https://example.com` is a URL, `example.com` is not
const urlRule: EntryRule = (raw) => {
  if (!SCHEME_PATTERN.test(raw) || !URL.canParse(raw)) return null;
  return { kind: "url", url: raw };
};

/** Tried in order, first match wins; anything left over is an app name */
const ENTRY_RULES: readonly EntryRule[] = [shellRule, fileRule, urlRule];

/**
 * Classify a raw config string into exactly one entry kind.
 *
 * Never fails: strings matching no rule are application names, used verbatim.
 */
export function classifyEntry(raw: string, options: ClassifyOptions = {}): Entry {
  const resolved: Required<ClassifyOptions> = {
    allowShell: options.allowShell ?? false,
    homeDir: options.homeDir ?? os.homedir(),
  };

  for (const rule of ENTRY_RULES) {
    const entry = rule(raw, resolved);
    if (entry) return entry;
  }
  return { kind: "app", name: raw };
}

/** Render an entry the way a user would write it */
export function formatEntry(entry: Entry): string {
  switch (entry.kind) {
    case "app":
      return entry.name;
    case "file":
      return entry.path;
    case "url":
      return entry.url;
    case "shell":
      return entry.command;
  }
}
