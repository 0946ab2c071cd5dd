#!/usr/bin/env node
import { readFileSync } from "node:fs";
import path from "node:path";
import { z } from "zod";
import { createProgram } from "./cli";
import { getSettings } from "./lib/config";
import { errorMessage } from "./lib/errors";
import log, { configureLogging } from "./lib/logger";

const packageJsonSchema = z.object({ version: z.string() });

function readVersion(): string {
  // Same relative location from src/main and dist/main
  const packageJsonPath = path.join(__dirname, "..", "..", "package.json");
  const packageJson: unknown = JSON.parse(readFileSync(packageJsonPath, "utf8"));
  return packageJsonSchema.parse(packageJson).version;
}

async function main(argv: string[]): Promise<void> {
  const settings = getSettings();
  configureLogging(settings);

  const program = createProgram({
    settings,
    version: readVersion(),
    stdout: process.stdout,
    stderr: process.stderr,
  });
  await program.parseAsync(argv);
}

main(process.argv).catch((error: unknown) => {
  log.debug("[App] Command failed:", error);
  process.stderr.write(`Error: ${errorMessage(error)}\n`);
  process.exitCode = 1;
});
