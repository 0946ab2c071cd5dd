import assert from "node:assert/strict";
import type { Entry } from "../shared/types";
import { launchEntry, launchParcel } from "../main/lib/external/launcher";
import { FakeOpener } from "./helpers";

const ENTRIES: Entry[] = [
  { kind: "app", name: "Slack" },
  { kind: "app", name: "Missing" },
  { kind: "url", url: "https://example.com" },
];

suite("Launcher", () => {
  test("should route each kind to its open primitive", async () => {
    const opener = new FakeOpener();
    const entries: Entry[] = [
      { kind: "app", name: "Slack" },
      { kind: "file", path: "/home/alice/notes" },
      { kind: "url", url: "https://example.com" },
      { kind: "shell", command: "make serve" },
    ];
    for (const entry of entries) {
      await launchEntry(entry, { opener, allowShell: true });
    }
    assert.deepEqual(opener.calls, [
      "app:Slack",
      "file:/home/alice/notes",
      "url:https://example.com",
      "shell:make serve",
    ]);
  });

  test("should keep going after a failed entry", async () => {
    const opener = new FakeOpener(new Set(["app:Missing"]));
    const report = await launchParcel("work", ENTRIES, { opener, allowShell: false });

    assert.deepEqual(opener.calls, ["app:Slack", "app:Missing", "url:https://example.com"]);
    assert.equal(report.attempted, 3);
    assert.deepEqual(report.failures, [
      {
        entry: { kind: "app", name: "Missing" },
        ok: false,
        error: "cannot open app:Missing",
      },
    ]);
  });

  test("should report every failure when nothing opens", async () => {
    const opener = new FakeOpener(
      new Set(["app:Slack", "app:Missing", "url:https://example.com"]),
    );
    const report = await launchParcel("work", ENTRIES, { opener, allowShell: false });
    assert.equal(report.failures.length, 3);
    assert.equal(opener.calls.length, 3);
  });

  // Shell entries run arbitrary code; they must never reach the shell unless enabled
  test("should refuse shell entries when they are disabled", async () => {
    const opener = new FakeOpener();
    const result = await launchEntry(
      { kind: "shell", command: "rm -rf ~/scratch" },
      { opener, allowShell: false },
    );
    assert.deepEqual(result, {
      entry: { kind: "shell", command: "rm -rf ~/scratch" },
      ok: false,
      error: "shell entries are disabled (set `allow_shell: true` to enable them)",
    });
    assert.deepEqual(opener.calls, []);
  });
});
