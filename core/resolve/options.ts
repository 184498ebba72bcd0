import type { ConditionValue, ResolutionConditions } from "@modref/utils/resolve-conditions";
import type { FileSystemPath, ImportMapHandle, ResolvedMapHandle, ResolvePluginHandle } from "../types.ts";

/**
 * Where the resolver looks for bare module requests.
 */
export type ResolveModules =
  /** Look for directories named `names` in `root` and each of its ancestors */
  | { readonly type: "Nested"; readonly root: FileSystemPath; readonly names: readonly string[] }
  /** Look for the module directly in `dir` */
  | { readonly type: "Path"; readonly dir: FileSystemPath; readonly excludedExtensions: readonly string[] };

/**
 * How a request into a package (`pkg` or `pkg/sub/path`) is resolved.
 */
export type ResolveIntoPackage =
  /**
   * The manifest's `"exports"` field, evaluated against `conditions`.
   * Conditions the set does not name take `unspecifiedConditions`.
   * @see https://nodejs.org/api/packages.html#package-entry-points
   */
  | {
    readonly type: "ExportsField";
    readonly conditions: ResolutionConditions;
    readonly unspecifiedConditions: ConditionValue;
  }
  /** A legacy entry field such as `"main"` or `"module"` */
  | { readonly type: "MainField"; readonly field: string };

/**
 * How a request from inside a package is resolved before the module lookup.
 */
export type ResolveInPackage =
  /** An alias field such as `"browser"` */
  | { readonly type: "AliasField"; readonly field: string }
  /**
   * The manifest's `"imports"` field (`#internal` requests).
   * @see https://nodejs.org/api/packages.html#subpath-imports
   */
  | {
    readonly type: "ImportsField";
    readonly conditions: ResolutionConditions;
    readonly unspecifiedConditions: ConditionValue;
  };

/**
 * Configuration handed to the resolution engine.
 */
export interface ResolveOptions {
  /** Requests must name the file extension (strict ESM) */
  readonly fullySpecified: boolean;

  /** Try `./request` before a module lookup for bare requests */
  readonly preferRelative: boolean;

  /** Let `./file.js` resolve to `./file.ts` */
  readonly enableTypescriptWithOutputExtension: boolean;

  /** Extensions probed, in order, when a request has none */
  readonly extensions: readonly string[];

  readonly modules: readonly ResolveModules[];
  readonly intoPackage: readonly ResolveIntoPackage[];
  readonly inPackage: readonly ResolveInPackage[];

  /** Base names tried when a request points at a directory */
  readonly defaultFiles: readonly string[];

  readonly importMap?: ImportMapHandle;
  readonly fallbackImportMap?: ImportMapHandle;
  readonly resolvedMap?: ResolvedMapHandle;
  readonly plugins: readonly ResolvePluginHandle[];

  /** Report unresolvable requests as warnings rather than errors */
  readonly looseErrors: boolean;
}

/**
 * Values the engine assumes for every field a policy leaves unset
 */
export const DEFAULT_RESOLVE_OPTIONS: ResolveOptions = Object.freeze({
  fullySpecified: false,
  preferRelative: false,
  enableTypescriptWithOutputExtension: false,
  extensions: Object.freeze([]),
  modules: Object.freeze([]),
  intoPackage: Object.freeze([]),
  inPackage: Object.freeze([]),
  defaultFiles: Object.freeze([]),
  plugins: Object.freeze([]),
  looseErrors: false,
});

function freezeAll<T extends object>(items: readonly T[]): readonly T[] {
  for (const item of items) Object.freeze(item);
  return Object.freeze([...items]);
}

/**
 * Fills every field `options` leaves out from {@link DEFAULT_RESOLVE_OPTIONS}
 * and freezes the result.
 */
export function createResolveOptions(options: Partial<ResolveOptions> = {}): ResolveOptions {
  const merged: ResolveOptions = { ...DEFAULT_RESOLVE_OPTIONS, ...options };

  return Object.freeze({
    ...merged,
    extensions: Object.freeze([...merged.extensions]),
    modules: freezeAll(merged.modules),
    intoPackage: freezeAll(merged.intoPackage),
    inPackage: freezeAll(merged.inPackage),
    defaultFiles: Object.freeze([...merged.defaultFiles]),
    plugins: Object.freeze([...merged.plugins]),
  });
}
