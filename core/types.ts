import type { FileSystemPath } from "@modref/utils/path";

export type { FileSystemPath };

/**
 * Opaque handle to a module owned by the module graph.
 *
 * `ident` is the module's stable identity (usually its path plus the layer
 * and query it was created under); two handles with the same `ident` refer to
 * the same module.
 */
export interface ModuleHandle {
  readonly ident: string;
}

/**
 * Opaque handle to a part of a module (a single export, the evaluation of
 * its side effects, its locals, ...) targeted by a split import.
 */
export interface ModulePartHandle {
  readonly key: string;
}

/** Import map the resolver consults before the module lookup */
export interface ImportMapHandle {
  readonly ident: string;
}

/** Map applied to results after resolution */
export interface ResolvedMapHandle {
  readonly ident: string;
}

/** Resolve plugin registered with the resolution engine */
export interface ResolvePluginHandle {
  readonly ident: string;
}
