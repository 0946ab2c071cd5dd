/**
 * Returns the default shell for the given platform.
 * Windows: COMSPEC or cmd.exe
 * macOS: SHELL or /bin/zsh
 * Linux: SHELL or /bin/sh
 */
export function getDefaultShell(
  platform: NodeJS.Platform = process.platform,
  env: NodeJS.ProcessEnv = process.env,
): string {
  if (platform === "win32") {
    return env.COMSPEC || "cmd.exe";
  }
  if (env.SHELL) {
    return env.SHELL;
  }
  return platform === "darwin" ? "/bin/zsh" : "/bin/sh";
}

/**
 * Returns shell arguments to execute a command string.
 * Windows cmd.exe: ["/c", command]
 * Windows PowerShell: ["-NoProfile", "-Command", command]
 * Unix: ["-lc", command]
 */
export function getShellCommandArgs(
  shell: string,
  command: string,
  platform: NodeJS.Platform = process.platform,
): string[] {
  if (platform === "win32") {
    const shellLower = shell.toLowerCase();
    if (shellLower.includes("powershell") || shellLower.includes("pwsh")) {
      return ["-NoProfile", "-Command", command];
    }
    return ["/c", command];
  }
  return ["-lc", command];
}
