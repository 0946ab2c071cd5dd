import log from "electron-log/node";
import type { Settings } from "./config";

// stdout carries listings; the console transport reports warnings and errors
log.transports.console.level = "warn";
log.transports.console.format = "{text}";
log.transports.file.level = false;

/** Apply the log settings resolved from the environment */
export function configureLogging(
  settings: Pick<Settings, "logLevel" | "logFile">,
): void {
  log.transports.console.level = settings.logLevel;

  const { logFile } = settings;
  if (logFile) {
    log.transports.file.resolvePathFn = () => logFile;
    log.transports.file.level = "info";
  } else {
    log.transports.file.level = false;
  }
}

export default log;
