import path from "node:path";
import { errorMessage } from "../errors";
import log from "../logger";
import {
  FINDER_EXIT_CODES,
  type FinderInvocation,
  type FinderResult,
  type FinderRunner,
  runFinderProcess,
} from "./finder";
import { buildPreviewCommand, resolveSelfCommand } from "./preview";

export type ChooserState =
  | "idle"
  | "spawning"
  | "streaming"
  | "awaiting_result"
  | "selected"
  | "cancelled"
  | "no_match"
  | "failed";

export type ChooserOutcome =
  | { status: "selected"; names: string[] }
  | { status: "none_selected" }
  | { status: "cancelled" }
  | {
      status: "failed";
      exitCode: number | null;
      signal: NodeJS.Signals | null;
      message: string;
    }
  /** Nothing to choose from; the finder was never started */
  | { status: "no_candidates" };

export const DEFAULT_FINDER_COMMAND = "fzf";

export const FINDER_LAYOUT_ARGS = [
  "--preview-window=right:60%:wrap",
  "--layout=reverse",
  "--bind=tab:down,shift-tab:up",
  "--cycle",
  "--no-sort",
  "--ansi",
  "--tmux=center,70%,40%",
] as const;

export const FINDER_MULTI_ARGS = [
  "--multi",
  "--bind=ctrl-a:select-all",
  "--bind=space:toggle+down",
] as const;

export interface ChooserOptions {
  /** Config file the preview command lists parcels from */
  configPath: string;
  /** Let the user pick several parcels */
  multi?: boolean;
  finderCommand?: string;
  /** Defaults to the running program, see `resolveSelfCommand` */
  selfCommand?: readonly string[];
  runFinder?: FinderRunner;
}

/** Selected names, one per output line; single-select keeps the first */
export function parseSelection(stdout: string, multi: boolean): string[] {
  const names = stdout
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter(Boolean);
  return multi ? names : names.slice(0, 1);
}

function describeStatus(result: FinderResult): string {
  if (result.exitCode !== null) return `exit code ${result.exitCode}`;
  return `signal ${result.signal ?? "unknown"}`;
}

/** Map the finder's exit status and output to an outcome */
export function interpretFinderResult(
  result: FinderResult,
  options: { multi: boolean; command: string },
): ChooserOutcome {
  switch (result.exitCode) {
    case FINDER_EXIT_CODES.SUCCESS: {
      const names = parseSelection(result.stdout, options.multi);
      return names.length > 0
        ? { status: "selected", names }
        : { status: "none_selected" };
    }
    case FINDER_EXIT_CODES.INTERRUPTED:
      return { status: "cancelled" };
    case FINDER_EXIT_CODES.NO_MATCH:
      return { status: "none_selected" };
    default:
      return {
        status: "failed",
        exitCode: result.exitCode,
        signal: result.signal,
        message: `${options.command} failed with ${describeStatus(result)}`,
      };
  }
}

function terminalState(outcome: ChooserOutcome): ChooserState {
  switch (outcome.status) {
    case "selected":
      return "selected";
    case "cancelled":
      return "cancelled";
    case "none_selected":
      return "no_match";
    case "failed":
      return "failed";
    case "no_candidates":
      return "idle";
  }
}

/**
 * Interactive parcel picker backed by an external fuzzy finder.
 * Each instance runs the finder at most once.
 */
export class ParcelChooser {
  private currentState: ChooserState = "idle";
  private readonly configPath: string;
  private readonly multi: boolean;
  private readonly finderCommand: string;
  private readonly selfCommand: readonly string[];
  private readonly runFinder: FinderRunner;

  constructor(options: ChooserOptions) {
    this.configPath = path.resolve(options.configPath);
    this.multi = options.multi ?? false;
    this.finderCommand = options.finderCommand ?? DEFAULT_FINDER_COMMAND;
    this.selfCommand = options.selfCommand ?? resolveSelfCommand();
    this.runFinder = options.runFinder ?? runFinderProcess;
  }

  get state(): ChooserState {
    return this.currentState;
  }

  buildArgs(): string[] {
    return [
      ...FINDER_LAYOUT_ARGS,
      ...(this.multi ? FINDER_MULTI_ARGS : []),
      "--preview",
      buildPreviewCommand(this.selfCommand, this.configPath),
    ];
  }

  async choose(candidates: readonly string[]): Promise<ChooserOutcome> {
    if (this.currentState !== "idle") {
      throw new Error(`Chooser already used (state: ${this.currentState})`);
    }
    if (candidates.length === 0) {
      log.info("[Chooser] No candidates, not starting the finder");
      return { status: "no_candidates" };
    }

    this.transition("spawning");
    const invocation: FinderInvocation = {
      command: this.finderCommand,
      args: this.buildArgs(),
      candidates,
      onPhase: (phase) => this.transition(phase),
    };

    let result: FinderResult;
    try {
      result = await this.runFinder(invocation);
    } catch (error) {
      this.transition("failed");
      return {
        status: "failed",
        exitCode: null,
        signal: null,
        message: `Failed to run ${this.finderCommand}: ${errorMessage(error)}`,
      };
    }

    const outcome = interpretFinderResult(result, {
      multi: this.multi,
      command: this.finderCommand,
    });
    this.transition(terminalState(outcome));
    return outcome;
  }

  private transition(next: ChooserState): void {
    log.debug(`[Chooser] ${this.currentState} -> ${next}`);
    this.currentState = next;
  }
}
