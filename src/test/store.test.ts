import assert from "node:assert/strict";
import { ParcelNotFoundError } from "../main/lib/errors";
import { formatParcel, ParcelStore } from "../main/lib/parcels/store";

function createStore(): ParcelStore {
  return ParcelStore.fromRaw(
    [
      ["work", ["Slack", "~/notes", "https://example.com"]],
      ["home", ["Spotify"]],
      ["2024", ["Calendar"]],
    ],
    { homeDir: "/home/alice" },
  );
}

suite("ParcelStore", () => {
  test("should list names in definition order", () => {
    assert.deepEqual(createStore().names(), ["work", "home", "2024"]);
  });

  test("should look up the entries of a parcel", () => {
    const result = createStore().lookup("work");
    assert.deepEqual(result, {
      status: "found",
      name: "work",
      entries: [
        { kind: "app", name: "Slack" },
        { kind: "file", path: "/home/alice/notes" },
        { kind: "url", url: "https://example.com" },
      ],
    });
  });

  test("should report every available name when a parcel is missing", () => {
    assert.deepEqual(createStore().lookup("gaming"), {
      status: "not_found",
      name: "gaming",
      available: ["work", "home", "2024"],
    });
  });

  test("should not resolve inherited object keys", () => {
    assert.equal(createStore().lookup("constructor").status, "not_found");
  });

  test("get should throw with the available names", () => {
    assert.throws(
      () => createStore().get("gaming"),
      (error: unknown) =>
        error instanceof ParcelNotFoundError &&
        error.message ===
          "Parcel `gaming` not found. Available parcels: work, home, 2024",
    );
  });

  test("get should hint at the config file when nothing is defined", () => {
    assert.throws(() => new ParcelStore().get("work"), {
      name: "ParcelNotFoundError",
      message:
        "Parcel `work` not found. No parcels are defined. Add some to the configuration file.",
    });
  });

  test("should not be affected by later changes to the source entries", () => {
    const entries = [{ kind: "app" as const, name: "Slack" }];
    const store = new ParcelStore([["work", entries]]);
    entries.push({ kind: "app", name: "Zoom" });
    assert.equal(store.get("work").length, 1);
  });

  test("should serialize entries in display form and definition order", () => {
    assert.equal(
      createStore().serialize(),
      '{"parcels":{"work":["Slack","/home/alice/notes","https://example.com"],"home":["Spotify"],"2024":["Calendar"]}}',
    );
  });

  test("should serialize a parcel named __proto__ like any other", () => {
    const store = ParcelStore.fromRaw([
      ["__proto__", ["Slack"]],
      ["home", ["Spotify"]],
    ]);
    assert.equal(
      store.serialize(),
      '{"parcels":{"__proto__":["Slack"],"home":["Spotify"]}}',
    );
  });

  test("should format a parcel as a heading and entry lines", () => {
    const [work] = createStore().list();
    assert.equal(
      formatParcel(work),
      "work:\n- Slack\n- /home/alice/notes\n- https://example.com\n",
    );
  });
});
