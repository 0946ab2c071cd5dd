import { spawn } from "node:child_process";
import { errorMessage } from "../errors";
import { getDefaultShell, getShellCommandArgs } from "../platform";

export type OpenPlatform = "darwin" | "win32" | "linux";

/** How to start one launch process */
export interface LaunchSpec {
  command: string;
  args: string[];
  /**
   * Wait for the process to exit and treat a non-zero status as failure.
   * Otherwise the process is detached and counts as launched once spawned.
   */
  waitForExit: boolean;
}

/** The operating system's "open this" primitives */
export interface PlatformOpener {
  openApp(name: string): Promise<void>;
  openPath(filePath: string): Promise<void>;
  openUrl(url: string): Promise<void>;
  /** Runs arbitrary code through the user's shell */
  runShell(command: string): Promise<void>;
}

function currentPlatform(): OpenPlatform {
  const { platform } = process;
  return platform === "darwin" || platform === "win32" ? platform : "linux";
}

export function getAppLaunchSpec(
  name: string,
  platform: OpenPlatform = currentPlatform(),
): LaunchSpec {
  switch (platform) {
    case "darwin":
      return { command: "open", args: ["-a", name], waitForExit: true };
    case "win32":
      return {
        command: "cmd.exe",
        args: ["/c", "start", "", name],
        waitForExit: true,
      };
    case "linux":
      // No app registry to consult: the name is the executable
      return { command: name, args: [], waitForExit: false };
  }
}

/** Launch spec for a path or URL, opened with the default handler */
export function getTargetLaunchSpec(
  target: string,
  platform: OpenPlatform = currentPlatform(),
): LaunchSpec {
  switch (platform) {
    case "darwin":
      return { command: "open", args: [target], waitForExit: true };
    case "win32":
      // explorer.exe exits with 1 even when it succeeds
      return { command: "explorer.exe", args: [target], waitForExit: false };
    case "linux":
      return { command: "xdg-open", args: [target], waitForExit: true };
  }
}

export function getShellLaunchSpec(
  command: string,
  platform: OpenPlatform = currentPlatform(),
  shell: string = getDefaultShell(platform),
): LaunchSpec {
  return {
    command: shell,
    args: getShellCommandArgs(shell, command, platform),
    waitForExit: false,
  };
}

/** Start a launch process and settle once it has launched or failed */
export function runLaunchSpec(spec: LaunchSpec): Promise<void> {
  return new Promise((resolve, reject) => {
    const child = spawn(spec.command, spec.args, {
      detached: !spec.waitForExit,
      stdio: "ignore",
    });

    child.once("error", (error) => {
      reject(new Error(`Failed to start \`${spec.command}\`: ${errorMessage(error)}`));
    });

    if (spec.waitForExit) {
      child.once("close", (code, signal) => {
        if (code === 0) {
          resolve();
          return;
        }
        const status = code !== null ? `exit code ${code}` : `signal ${signal}`;
        reject(new Error(`\`${spec.command}\` failed with ${status}`));
      });
    } else {
      child.once("spawn", () => {
        child.unref();
        resolve();
      });
    }
  });
}

/** Opener backed by the platform's own open commands */
export function createSystemOpener(
  platform: OpenPlatform = currentPlatform(),
): PlatformOpener {
  return {
    openApp: (name) => runLaunchSpec(getAppLaunchSpec(name, platform)),
    openPath: (filePath) => runLaunchSpec(getTargetLaunchSpec(filePath, platform)),
    openUrl: (url) => runLaunchSpec(getTargetLaunchSpec(url, platform)),
    runShell: (command) => runLaunchSpec(getShellLaunchSpec(command, platform)),
  };
}
