import { readFile } from "node:fs/promises";
import { parse } from "yaml";
import { z } from "zod";
import { ConfigLoadError, errorMessage, isErrnoException } from "../errors";
import log from "../logger";
import { ParcelStore } from "./store";

const parcelEntriesSchema = z
  .array(z.string().min(1, "entries cannot be empty strings"))
  .nullable()
  .transform((entries) => entries ?? []);

// YAML is read with `mapAsMap` so parcel order survives even for numeric names
const parcelConfigSchema = z.preprocess(
  (value) => (value instanceof Map ? Object.fromEntries(value) : (value ?? {})),
  z.object({
    allow_shell: z.boolean().default(false),
    parcels: z
      .map(z.coerce.string(), parcelEntriesSchema)
      .nullish()
      .transform((parcels) => parcels ?? new Map<string, string[]>()),
  }),
);

export interface ParcelConfig {
  /** Whether `sh:` entries are recognised and run */
  allowShell: boolean;
  store: ParcelStore;
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) =>
      issue.path.length > 0
        ? `${issue.path.join(".")}: ${issue.message}`
        : issue.message,
    )
    .join("; ");
}

/**
 * Parse config file contents.
 *
 * @param source - Path or label used in error messages
 */
export function parseParcelConfig(
  text: string,
  source: string,
  homeDir?: string,
): ParcelConfig {
  let document: unknown;
  try {
    document = parse(text, { mapAsMap: true });
  } catch (error) {
    throw new ConfigLoadError(source, errorMessage(error));
  }

  const result = parcelConfigSchema.safeParse(document);
  if (!result.success) {
    throw new ConfigLoadError(source, formatIssues(result.error));
  }

  const allowShell = result.data.allow_shell;
  return {
    allowShell,
    store: ParcelStore.fromRaw(result.data.parcels, { allowShell, homeDir }),
  };
}

export async function loadParcelConfig(
  configPath: string,
  homeDir?: string,
): Promise<ParcelConfig> {
  let text: string;
  try {
    text = await readFile(configPath, "utf8");
  } catch (error) {
    const reason =
      isErrnoException(error) && error.code === "ENOENT"
        ? "file does not exist"
        : errorMessage(error);
    throw new ConfigLoadError(configPath, reason);
  }

  const config = parseParcelConfig(text, configPath, homeDir);
  log.debug(
    `[Config] Loaded ${config.store.size} parcels from ${configPath}${config.allowShell ? " (shell entries enabled)" : ""}`,
  );
  return config;
}
