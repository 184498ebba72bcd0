import type { ModuleHandle } from "./types.ts";

import { DuplicateInnerAssetError } from "./errors.ts";

/**
 * Named references to inner assets.
 *
 * A module uses these as per-module aliases that point a request straight at
 * an already created module. Names are usually UPPER_CASE to make it obvious
 * that a request targets an inner asset rather than a file.
 *
 * Iteration order is insertion order.
 */
export class InnerAssets implements Iterable<[string, ModuleHandle]> {
  private static readonly EMPTY = new InnerAssets(new Map());

  private constructor(private readonly assets: ReadonlyMap<string, ModuleHandle>) {
    Object.freeze(this);
  }

  /** Shared instance without entries */
  static empty(): InnerAssets {
    return InnerAssets.EMPTY;
  }

  /**
   * @example
   * ```ts
   * InnerAssets.from(Object.entries({ ACTION_MANIFEST: manifestModule }));
   * ```
   */
  static from(entries: Iterable<readonly [string, ModuleHandle]>): InnerAssets {
    const assets = new Map<string, ModuleHandle>();
    for (const [key, module] of entries) {
      if (assets.has(key)) throw new DuplicateInnerAssetError(key);
      assets.set(key, module);
    }

    return assets.size === 0 ? InnerAssets.EMPTY : new InnerAssets(assets);
  }

  get size(): number {
    return this.assets.size;
  }

  get(key: string): ModuleHandle | undefined {
    return this.assets.get(key);
  }

  has(key: string): boolean {
    return this.assets.has(key);
  }

  keys(): string[] {
    return [...this.assets.keys()];
  }

  entries(): [string, ModuleHandle][] {
    return [...this.assets.entries()];
  }

  [Symbol.iterator](): Iterator<[string, ModuleHandle]> {
    return this.assets.entries();
  }

  /**
   * Returns a copy with `key` pointing at `module`. An existing key keeps its
   * position.
   */
  with(key: string, module: ModuleHandle): InnerAssets {
    const assets = new Map(this.assets);
    assets.set(key, module);
    return new InnerAssets(assets);
  }

  equals(other: InnerAssets): boolean {
    return this.compare(other) === 0;
  }

  /** Entry by entry: key first, then module ident; shorter wins a tie */
  compare(other: InnerAssets): number {
    if (this === other) return 0;

    const a = this.entries();
    const b = other.entries();
    const length = Math.min(a.length, b.length);
    for (let i = 0; i < length; i++) {
      const [keyA, moduleA] = a[i];
      const [keyB, moduleB] = b[i];
      if (keyA !== keyB) return keyA < keyB ? -1 : 1;
      if (moduleA.ident !== moduleB.ident) return moduleA.ident < moduleB.ident ? -1 : 1;
    }

    return Math.sign(a.length - b.length);
  }

  key(): string {
    return JSON.stringify(this.entries().map(([key, module]) => [key, module.ident]));
  }
}
