/**
 * ReleaseRelay — In-memory Dedup Store
 *
 * Used by tests and `--memory-store` dry runs. Nothing survives the process.
 */

import type { DedupStore, SeenEntry } from '../types';

export class InMemoryDedupStore implements DedupStore {
  private readonly entries = new Map<string, SeenEntry>();

  constructor(seed: Iterable<SeenEntry> = []) {
    for (const entry of seed) {
      this.entries.set(entry.id, { ...entry });
    }
  }

  async has(id: string): Promise<boolean> {
    return this.entries.has(id);
  }

  async markSeen(entry: SeenEntry): Promise<void> {
    // First write wins
    if (!this.entries.has(entry.id)) {
      this.entries.set(entry.id, { ...entry });
    }
  }

  get(id: string): SeenEntry | undefined {
    return this.entries.get(id);
  }

  ids(): string[] {
    return [...this.entries.keys()].sort();
  }

  get size(): number {
    return this.entries.size;
  }
}
