import type { StateStorage } from "zustand/middleware";

/** In-process stand-in for localStorage, keyed like the real thing. */
export class MemoryStorage implements StateStorage {
  readonly items = new Map<string, string>();

  getItem = (name: string): string | null => this.items.get(name) ?? null;

  setItem = (name: string, value: string): void => {
    this.items.set(name, value);
  };

  removeItem = (name: string): void => {
    this.items.delete(name);
  };

  /** Stores `state` the way the persist middleware writes it. */
  seed(name: string, state: unknown): void {
    this.items.set(name, JSON.stringify({ state, version: 0 }));
  }

  /** The persisted state under `name`, parsed. */
  read(name: string): unknown {
    const raw = this.items.get(name);
    if (raw === undefined) return undefined;
    const parsed: unknown = JSON.parse(raw);
    return typeof parsed === "object" && parsed !== null && "state" in parsed ? parsed.state : undefined;
  }
}
