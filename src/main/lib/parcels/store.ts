import type { Entry, Parcel } from "../../../shared/types";
import { ParcelNotFoundError } from "../errors";
import { type ClassifyOptions, classifyEntry, formatEntry } from "./entry";

export type ParcelLookupResult =
  | { status: "found"; name: string; entries: readonly Entry[] }
  | { status: "not_found"; name: string; available: string[] };

/**
 * Read-only mapping from parcel name to its entries.
 * Names keep the order they were defined in.
 */
export class ParcelStore {
  private readonly parcels: ReadonlyMap<string, readonly Entry[]>;

  constructor(parcels: Iterable<readonly [string, readonly Entry[]]> = []) {
    const map = new Map<string, readonly Entry[]>();
    for (const [name, entries] of parcels) {
      map.set(name, Object.freeze([...entries]));
    }
    this.parcels = map;
  }

  /** Build a store from raw entry strings, classifying each one */
  static fromRaw(
    parcels: Iterable<readonly [string, readonly string[]]>,
    options: ClassifyOptions = {},
  ): ParcelStore {
    const classified: [string, Entry[]][] = [];
    for (const [name, rawEntries] of parcels) {
      classified.push([name, rawEntries.map((raw) => classifyEntry(raw, options))]);
    }
    return new ParcelStore(classified);
  }

  get size(): number {
    return this.parcels.size;
  }

  names(): string[] {
    return [...this.parcels.keys()];
  }

  lookup(name: string): ParcelLookupResult {
    const entries = this.parcels.get(name);
    if (!entries) {
      return { status: "not_found", name, available: this.names() };
    }
    return { status: "found", name, entries };
  }

  /** Entries of a parcel, or a `ParcelNotFoundError` listing every known name */
  get(name: string): readonly Entry[] {
    const result = this.lookup(name);
    if (result.status === "not_found") {
      throw new ParcelNotFoundError(result.name, result.available);
    }
    return result.entries;
  }

  list(): Parcel[] {
    return [...this.parcels].map(([name, entries]) => ({
      name,
      entries: [...entries],
    }));
  }

  /**
   * `{"parcels":{name:[entries]}}` with names in definition order.
   * Written member by member: a plain object would move integer-like names
   * to the front and drop `__proto__`.
   */
  serialize(): string {
    const members = [...this.parcels].map(
      ([name, entries]) =>
        `${JSON.stringify(name)}:${JSON.stringify(entries.map(formatEntry))}`,
    );
    return `{"parcels":{${members.join(",")}}}`;
  }
}

/** `- entry` lines for one parcel's entries */
export function formatEntryLines(entries: readonly Entry[]): string {
  return entries.map((entry) => `- ${formatEntry(entry)}\n`).join("");
}

/** Parcel heading followed by its entry lines */
export function formatParcel(parcel: Parcel): string {
  return `${parcel.name}:\n${formatEntryLines(parcel.entries)}`;
}
