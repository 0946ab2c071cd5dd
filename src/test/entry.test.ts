import assert from "node:assert/strict";
import { classifyEntry, formatEntry } from "../main/lib/parcels/entry";

const HOME = "/home/alice";

suite("Entry classification", () => {
  suite("App entries", () => {
    test("should keep plain names verbatim", () => {
      for (const raw of ["Slack", "Visual Studio Code", "firefox", "1Password 7"]) {
        assert.deepEqual(classifyEntry(raw, { homeDir: HOME }), {
          kind: "app",
          name: raw,
        });
      }
    });

    test("should treat a bare domain as an app, not a URL", () => {
      assert.deepEqual(classifyEntry("example.com", { homeDir: HOME }), {
        kind: "app",
        name: "example.com",
      });
    });

    test("should fall back to an app for the empty string", () => {
      assert.deepEqual(classifyEntry(""), { kind: "app", name: "" });
    });
  });

  suite("File entries", () => {
    test("should expand ~ to the home directory at parse time", () => {
      assert.deepEqual(classifyEntry("~/notes", { homeDir: HOME }), {
        kind: "file",
        path: "/home/alice/notes",
      });
      assert.deepEqual(classifyEntry("~", { homeDir: HOME }), {
        kind: "file",
        path: "/home/alice",
      });
    });

    test("should normalize absolute paths", () => {
      assert.deepEqual(classifyEntry("/Applications/Utilities/", { homeDir: HOME }), {
        kind: "file",
        path: "/Applications/Utilities",
      });
      assert.deepEqual(classifyEntry("/tmp//reports/../inbox", { homeDir: HOME }), {
        kind: "file",
        path: "/tmp/inbox",
      });
    });

    test("should accept the explicit fs: prefix", () => {
      assert.deepEqual(classifyEntry("fs:~/docs/todo.md", { homeDir: HOME }), {
        kind: "file",
        path: "/home/alice/docs/todo.md",
      });
      assert.deepEqual(classifyEntry("fs:notes/today.md", { homeDir: HOME }), {
        kind: "file",
        path: "notes/today.md",
      });
    });

    test("should leave ~user paths unexpanded", () => {
      assert.deepEqual(classifyEntry("~bob/shared", { homeDir: HOME }), {
        kind: "file",
        path: "~bob/shared",
      });
    });
  });

  suite("URL entries", () => {
    test("should require a scheme", () => {
      assert.deepEqual(classifyEntry("https://example.com", { homeDir: HOME }), {
        kind: "url",
        url: "https://example.com",
      });
      assert.deepEqual(classifyEntry("obsidian://open?vault=notes", { homeDir: HOME }), {
        kind: "url",
        url: "obsidian://open?vault=notes",
      });
      assert.deepEqual(classifyEntry("mailto:alice@example.com", { homeDir: HOME }), {
        kind: "url",
        url: "mailto:alice@example.com",
      });
    });

    test("should read host:port as a scheme-qualified URI", () => {
      assert.deepEqual(classifyEntry("localhost:3000"), {
        kind: "url",
        url: "localhost:3000",
      });
    });
  });

  suite("Shell entries", () => {
    test("should strip the sh: marker when shell entries are enabled", () => {
      assert.deepEqual(classifyEntry("sh:  make serve", { allowShell: true }), {
        kind: "shell",
        command: "make serve",
      });
    });

    test("should take precedence over path detection", () => {
      assert.deepEqual(classifyEntry("sh:/usr/local/bin/backup", { allowShell: true }), {
        kind: "shell",
        command: "/usr/local/bin/backup",
      });
    });

    test("should fall through to later rules when disabled", () => {
      assert.deepEqual(classifyEntry("sh:open-notes", { allowShell: false }), {
        kind: "url",
        url: "sh:open-notes",
      });
      assert.deepEqual(classifyEntry("sh:open-notes"), {
        kind: "url",
        url: "sh:open-notes",
      });
    });
  });

  suite("Display form", () => {
    test("should round-trip apps and URLs exactly", () => {
      for (const raw of ["Slack", "example.com", "https://example.com", "https://example.com/a?b=c#d"]) {
        assert.equal(formatEntry(classifyEntry(raw, { homeDir: HOME })), raw);
      }
    });

    test("should render files as their normalized path", () => {
      assert.equal(formatEntry(classifyEntry("~/notes/", { homeDir: HOME })), "/home/alice/notes");
    });

    test("should render shell entries without the marker", () => {
      assert.equal(
        formatEntry(classifyEntry("sh:tmux new -s work", { allowShell: true })),
        "tmux new -s work",
      );
    });
  });
});
