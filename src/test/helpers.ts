import type {
  FinderInvocation,
  FinderResult,
  FinderRunner,
} from "../main/lib/chooser";
import type { CommandContext, OutputStream } from "../main/lib/commands";
import type { PlatformOpener } from "../main/lib/external/opener";
import { ParcelStore } from "../main/lib/parcels/store";

/** Records every open call as `kind:target`; calls listed in `failing` reject */
export class FakeOpener implements PlatformOpener {
  readonly calls: string[] = [];

  constructor(private readonly failing: ReadonlySet<string> = new Set()) {}

  openApp(name: string): Promise<void> {
    return this.record(`app:${name}`);
  }

  openPath(filePath: string): Promise<void> {
    return this.record(`file:${filePath}`);
  }

  openUrl(url: string): Promise<void> {
    return this.record(`url:${url}`);
  }

  runShell(command: string): Promise<void> {
    return this.record(`shell:${command}`);
  }

  private record(call: string): Promise<void> {
    this.calls.push(call);
    if (this.failing.has(call)) {
      return Promise.reject(new Error(`cannot open ${call}`));
    }
    return Promise.resolve();
  }
}

export class CapturedStream implements OutputStream {
  text = "";

  write(chunk: string): boolean {
    this.text += chunk;
    return true;
  }
}

/** Finder stand-in that returns a canned result without spawning anything */
export function fakeFinder(result: FinderResult): {
  run: FinderRunner;
  invocations: FinderInvocation[];
} {
  const invocations: FinderInvocation[] = [];
  const run: FinderRunner = async (invocation) => {
    invocations.push(invocation);
    invocation.onPhase?.("streaming");
    invocation.onPhase?.("awaiting_result");
    return result;
  };
  return { run, invocations };
}

export function finderExit(exitCode: number, stdout = ""): FinderResult {
  return { exitCode, signal: null, stdout };
}

export interface TestContext extends CommandContext {
  opener: FakeOpener;
  stdout: CapturedStream;
  stderr: CapturedStream;
}

export function createTestContext(
  parcels: [string, string[]][],
  options: { failing?: string[]; allowShell?: boolean; runFinder?: FinderRunner } = {},
): TestContext {
  const allowShell = options.allowShell ?? false;
  return {
    store: ParcelStore.fromRaw(parcels, { allowShell, homeDir: "/home/alice" }),
    configPath: "/home/alice/.config/parcels/parcels.yml",
    allowShell,
    opener: new FakeOpener(new Set(options.failing)),
    stdout: new CapturedStream(),
    stderr: new CapturedStream(),
    runFinder: options.runFinder,
  };
}
