import { spawn } from "node:child_process";
import log from "../logger";

/**
 * fzf exit codes:
 * - 0: Normal exit (selection printed, possibly nothing)
 * - 1: No match
 * - 2: Error
 * - 130: Interrupted with CTRL-C or ESC
 */
export const FINDER_EXIT_CODES = {
  SUCCESS: 0,
  NO_MATCH: 1,
  ERROR: 2,
  INTERRUPTED: 130,
} as const;

export type FinderPhase = "streaming" | "awaiting_result";

export interface FinderInvocation {
  command: string;
  args: string[];
  /** Written to the finder's stdin, one per line */
  candidates: readonly string[];
  onPhase?: (phase: FinderPhase) => void;
}

export interface FinderResult {
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  stdout: string;
}

/** Runs the finder to completion; rejects only when it cannot be started */
export type FinderRunner = (invocation: FinderInvocation) => Promise<FinderResult>;

/**
 * Spawn the finder, write every candidate to its stdin, close stdin, then
 * wait for it to exit while collecting stdout.
 * stderr is inherited: fzf draws its interface there.
 */
export const runFinderProcess: FinderRunner = (invocation) =>
  new Promise<FinderResult>((resolve, reject) => {
    const { command, args, candidates, onPhase } = invocation;
    const child = spawn(command, args, { stdio: ["pipe", "pipe", "inherit"] });
    const chunks: Buffer[] = [];

    child.once("error", reject);
    child.stdout.on("data", (chunk: Buffer) => {
      chunks.push(chunk);
    });
    child.once("close", (exitCode, signal) => {
      resolve({
        exitCode,
        signal,
        stdout: Buffer.concat(chunks).toString("utf8"),
      });
    });

    // The finder may quit before reading everything we send
    child.stdin.on("error", (error) => {
      log.debug(`[Chooser] ${command} stopped reading candidates: ${error.message}`);
    });

    onPhase?.("streaming");
    child.stdin.end(candidates.map((candidate) => `${candidate}\n`).join(""), "utf8");
    onPhase?.("awaiting_result");
  });
