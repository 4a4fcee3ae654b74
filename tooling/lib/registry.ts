/**
 * Named predicate presets persisted to a JSON file
 */

import { writeFileSync, readFileSync, existsSync, mkdirSync } from "fs";
import { dirname } from "path";
import { Predicate } from "../../src";
import { parsePredicate, serializePredicate } from "./serialization";
import { PresetEntry } from "./types";
import { isPlainObject, stableStringify } from "./utils";

/**
 * Presets available without a presets file
 */
export const BUILTIN_PRESETS: readonly PresetEntry[] = [
  {
    name: "desktop",
    description: "The desktop background window",
    predicate: {
      kind: "group",
      combinator: "any",
      reverse: false,
      whitelist: [
        { kind: "leaf", discipline: "full", reverse: false, criteria: { className: "WorkerW" } },
        { kind: "leaf", discipline: "full", reverse: false, criteria: { className: "Progman" } },
      ],
      blacklist: [],
    },
  },
];

export class PresetRegistry {
  private entries: Record<string, PresetEntry> = {};
  private dirty = false;

  constructor(private registryPath: string) {
    this.load();
  }

  private load(): void {
    this.entries = {};
    if (!existsSync(this.registryPath)) {
      return;
    }
    let parsed: unknown;
    try {
      parsed = JSON.parse(readFileSync(this.registryPath, "utf8"));
    } catch {
      return;
    }
    if (!Array.isArray(parsed)) {
      return;
    }
    for (const item of parsed) {
      const entry = toPresetEntry(item);
      if (entry) {
        this.entries[entry.name] = entry;
      }
    }
  }

  /**
   * Add or replace a preset. The predicate is parsed first, so an invalid preset throws.
   */
  register(entry: PresetEntry): void {
    const normalized: PresetEntry = {
      name: entry.name,
      description: entry.description,
      predicate: serializePredicate(parsePredicate(entry.predicate)),
    };

    const existing = this.entries[entry.name];
    if (existing && stableStringify(existing) === stableStringify(normalized)) {
      return;
    }
    this.entries[entry.name] = normalized;
    this.dirty = true;
  }

  registerPredicate(name: string, description: string, predicate: Predicate): void {
    this.register({ name, description, predicate: serializePredicate(predicate) });
  }

  get(name: string): PresetEntry | undefined {
    return this.entries[name];
  }

  /**
   * Build the named predicate, falling back to the built-in presets
   */
  resolve(name: string): Predicate | undefined {
    const entry = this.entries[name] ?? BUILTIN_PRESETS.find((preset) => preset.name === name);
    return entry ? parsePredicate(entry.predicate) : undefined;
  }

  all(): PresetEntry[] {
    return Object.values(this.entries);
  }

  isDirty(): boolean {
    return this.dirty;
  }

  persist(): void {
    if (!this.dirty) {
      return;
    }

    mkdirSync(dirname(this.registryPath), { recursive: true });
    const entries = this.all().sort((a, b) => a.name.localeCompare(b.name));
    writeFileSync(this.registryPath, JSON.stringify(entries, null, 2), "utf8");

    this.dirty = false;
  }

  clear(): void {
    this.entries = {};
    this.dirty = true;
  }

  size(): number {
    return Object.keys(this.entries).length;
  }
}

/**
 * Entries that are malformed are skipped when loading
 */
function toPresetEntry(item: unknown): PresetEntry | undefined {
  if (!isPlainObject(item) || typeof item.name !== "string" || item.name === "") {
    return undefined;
  }
  try {
    return {
      name: item.name,
      description: typeof item.description === "string" ? item.description : "",
      predicate: serializePredicate(parsePredicate(item.predicate)),
    };
  } catch {
    return undefined;
  }
}
