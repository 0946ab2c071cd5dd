/**
 * Process-wide settings derived from the environment
 */
import { existsSync } from "node:fs";
import os from "node:os";
import path from "node:path";

const CONFIG_DIR = path.join(".config", "parcels");
const CONFIG_BASENAME = "parcels";
const DEFAULT_FINDER = "fzf";
const DEFAULT_LOG_LEVEL = "warn";

const LOG_LEVELS = [
  "error",
  "warn",
  "info",
  "verbose",
  "debug",
  "silly",
] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface Settings {
  /** Path of the YAML file parcels are loaded from */
  configPath: string;
  /** Fuzzy finder executable used by `choose` */
  finderCommand: string;
  /** Console log level; `false` silences the console transport */
  logLevel: LogLevel | false;
  /** When set, log lines are also appended to this file */
  logFile: string | null;
}

/**
 * Default config file: `~/.config/parcels/parcels.yml` when it exists,
 * otherwise the `.yaml` spelling.
 */
export function getDefaultConfigPath(homeDir: string = os.homedir()): string {
  const base = path.join(homeDir, CONFIG_DIR, CONFIG_BASENAME);
  const yml = `${base}.yml`;
  return existsSync(yml) ? yml : `${base}.yaml`;
}

function parseLogLevel(value: string | undefined): LogLevel | false {
  if (!value) return DEFAULT_LOG_LEVEL;
  const lower = value.toLowerCase();
  if (lower === "off" || lower === "false") return false;
  const level = LOG_LEVELS.find((candidate) => candidate === lower);
  return level ?? DEFAULT_LOG_LEVEL;
}

export function getSettings(env: NodeJS.ProcessEnv = process.env): Settings {
  return {
    configPath: env.PARCELS_CONFIG || getDefaultConfigPath(),
    finderCommand: env.PARCELS_FINDER || DEFAULT_FINDER,
    logLevel: parseLogLevel(env.PARCELS_LOG_LEVEL),
    logFile: env.PARCELS_LOG_FILE || null,
  };
}
