/**
 * Respack Runtime Host — In-memory Pack Source
 *
 * Serves pack registrations supplied in-process. Used by tests, and by
 * embedders that construct packs themselves instead of installing them.
 */

import type { PackSource, RawPackRegistration } from '@respack/kernel';

/**
 * One in-process registration. Supply either the factory itself or a
 * `load` function that produces it (and may reject).
 */
export interface MemoryPackEntry {
  readonly dist_name?: string | undefined;
  readonly pack_name: string;
  readonly factory?: unknown;
  readonly load?: (() => Promise<unknown>) | undefined;
}

export class MemoryPackSource implements PackSource {
  private readonly entries: MemoryPackEntry[];

  constructor(entries: ReadonlyArray<MemoryPackEntry> = []) {
    this.entries = [...entries];
  }

  add(entry: MemoryPackEntry): this {
    this.entries.push(entry);
    return this;
  }

  enumerate(): Promise<ReadonlyArray<RawPackRegistration>> {
    return Promise.resolve(
      this.entries.map((entry) => ({
        dist_name: entry.dist_name,
        pack_name: entry.pack_name,
        load: entry.load ?? (() => Promise.resolve(entry.factory)),
      })),
    );
  }
}

/**
 * Concatenates the registrations of several sources, in source order.
 * A failing source fails the whole enumeration.
 */
export class CompositePackSource implements PackSource {
  constructor(private readonly sources: ReadonlyArray<PackSource>) {}

  async enumerate(): Promise<ReadonlyArray<RawPackRegistration>> {
    const lists = await Promise.all(this.sources.map((source) => source.enumerate()));
    return lists.flat();
  }
}
