/**
 * Reference types: why a module reference exists.
 *
 * Every import, require, `@import` or `url()` a module makes is classified
 * into a {@link ReferenceType} before it is resolved. The classification
 * travels with the request, and module rules later match on it with
 * {@link includes}.
 *
 * Each top-level kind except `Runtime`, `Internal`, `Custom` and `Undefined`
 * carries a subtype. A kind's `Undefined` subtype is its wildcard: as a rule
 * condition it accepts every subtype of the kind.
 *
 * @module
 *
 * @example
 * ```ts
 * const rule = ReferenceType.EcmaScriptModules();
 * const site = ReferenceType.EcmaScriptModules({ type: "DynamicImport" });
 *
 * includes(rule, site); // true
 * includes(site, rule); // false
 * ```
 */

import type { ModulePartHandle } from "./types.ts";
import type { ImportContext } from "./import-context.ts";

import { InnerAssets } from "./inner-assets.ts";
import { assertCustomTag, unsupportedCustomType, type CustomTypeRegistry } from "./custom-types.ts";

// =============================================================================
// Sub Types
// =============================================================================

interface Tag<T extends string> {
  readonly type: T;
}

/** Placeholder for plugin-defined subtypes */
export interface CustomSubType {
  readonly type: "Custom";
  readonly tag: number;
}

/** Wildcard subtype of every kind */
export interface UndefinedSubType {
  readonly type: "Undefined";
}

export type CommonJsReferenceSubType = CustomSubType | UndefinedSubType;

export type EcmaScriptModulesReferenceSubType =
  | { readonly type: "ImportPart"; readonly part: ModulePartHandle }
  | Tag<"Import">
  | Tag<"DynamicImport">
  | CustomSubType
  | UndefinedSubType;

export type CssReferenceSubType =
  | { readonly type: "AtImport"; readonly context: ImportContext | null }
  | Tag<"Compose">
  /**
   * Reference from any asset to a CSS-parseable asset. Marks the boundary
   * between non-CSS and CSS assets, so client references can be injected
   * between global/module CSS and the underlying CSS.
   */
  | Tag<"Internal">
  | CustomSubType
  | UndefinedSubType;

export type UrlReferenceSubType =
  | Tag<"EcmaScriptNewUrl">
  | Tag<"CssUrl">
  | CustomSubType
  | UndefinedSubType;

export type TypeScriptReferenceSubType = CustomSubType | UndefinedSubType;

export type EntryReferenceSubType =
  | Tag<"Web">
  | Tag<"Page">
  | Tag<"PagesApi">
  | Tag<"AppPage">
  | Tag<"AppRoute">
  | Tag<"AppClientComponent">
  | Tag<"Middleware">
  | Tag<"Instrumentation">
  | Tag<"Runtime">
  | CustomSubType
  | UndefinedSubType;

export type ReferenceSubType =
  | CommonJsReferenceSubType
  | EcmaScriptModulesReferenceSubType
  | CssReferenceSubType
  | UrlReferenceSubType
  | TypeScriptReferenceSubType
  | EntryReferenceSubType;

// =============================================================================
// Reference Types
// =============================================================================

export interface CommonJsReference {
  readonly kind: "CommonJs";
  readonly subType: CommonJsReferenceSubType;
}

export interface EcmaScriptModulesReference {
  readonly kind: "EcmaScriptModules";
  readonly subType: EcmaScriptModulesReferenceSubType;
}

export interface CssReference {
  readonly kind: "Css";
  readonly subType: CssReferenceSubType;
}

export interface UrlReference {
  readonly kind: "Url";
  readonly subType: UrlReferenceSubType;
}

export interface TypeScriptReference {
  readonly kind: "TypeScript";
  readonly subType: TypeScriptReferenceSubType;
}

export interface EntryReference {
  readonly kind: "Entry";
  readonly subType: EntryReferenceSubType;
}

export interface RuntimeReference {
  readonly kind: "Runtime";
}

/** Reference resolved against a module's {@link InnerAssets} */
export interface InternalReference {
  readonly kind: "Internal";
  readonly assets: InnerAssets;
}

export interface CustomReference {
  readonly kind: "Custom";
  readonly tag: number;
}

export interface UndefinedReference {
  readonly kind: "Undefined";
}

export type ReferenceType =
  | CommonJsReference
  | EcmaScriptModulesReference
  | CssReference
  | UrlReference
  | TypeScriptReference
  | EntryReference
  | RuntimeReference
  | InternalReference
  | CustomReference
  | UndefinedReference;

export type ReferenceKind = ReferenceType["kind"];

type SubTypedReference = Extract<ReferenceType, { subType: unknown }>;

/** Declaration order; {@link compare} orders kinds by it */
export const REFERENCE_KINDS = [
  "CommonJs",
  "EcmaScriptModules",
  "Css",
  "Url",
  "TypeScript",
  "Entry",
  "Runtime",
  "Internal",
  "Custom",
  "Undefined",
] as const satisfies readonly ReferenceKind[];

/** Subtypes per kind, in declaration order */
export const SUB_TYPES: Readonly<Record<SubTypedReference["kind"], readonly string[]>> = Object.freeze({
  CommonJs: ["Custom", "Undefined"],
  EcmaScriptModules: ["ImportPart", "Import", "DynamicImport", "Custom", "Undefined"],
  Css: ["AtImport", "Compose", "Internal", "Custom", "Undefined"],
  Url: ["EcmaScriptNewUrl", "CssUrl", "Custom", "Undefined"],
  TypeScript: ["Custom", "Undefined"],
  Entry: [
    "Web",
    "Page",
    "PagesApi",
    "AppPage",
    "AppRoute",
    "AppClientComponent",
    "Middleware",
    "Instrumentation",
    "Runtime",
    "Custom",
    "Undefined",
  ],
});

// =============================================================================
// Construction
// =============================================================================

const UNDEFINED: UndefinedSubType = Object.freeze({ type: "Undefined" });
const RUNTIME_REFERENCE: RuntimeReference = Object.freeze({ kind: "Runtime" });
const UNDEFINED_REFERENCE: UndefinedReference = Object.freeze({ kind: "Undefined" });

function seal(subType: ReferenceSubType): void {
  if (subType.type === "Custom") assertCustomTag(subType.tag);
  Object.freeze(subType);
}

/**
 * Frozen reference type values. Subtypes default to the kind's `Undefined`
 * wildcard.
 *
 * @example
 * ```ts
 * ReferenceType.Css({ type: "AtImport", context: ImportContext.empty().add("base") });
 * ReferenceType.Entry({ type: "AppRoute" });
 * ReferenceType.Internal(InnerAssets.from([["ACTIONS", actionsModule]]));
 * ```
 */
export const ReferenceType = Object.freeze({
  CommonJs(subType: CommonJsReferenceSubType = UNDEFINED): CommonJsReference {
    seal(subType);
    return Object.freeze({ kind: "CommonJs", subType });
  },
  EcmaScriptModules(subType: EcmaScriptModulesReferenceSubType = UNDEFINED): EcmaScriptModulesReference {
    seal(subType);
    return Object.freeze({ kind: "EcmaScriptModules", subType });
  },
  Css(subType: CssReferenceSubType = UNDEFINED): CssReference {
    seal(subType);
    return Object.freeze({ kind: "Css", subType });
  },
  Url(subType: UrlReferenceSubType = UNDEFINED): UrlReference {
    seal(subType);
    return Object.freeze({ kind: "Url", subType });
  },
  TypeScript(subType: TypeScriptReferenceSubType = UNDEFINED): TypeScriptReference {
    seal(subType);
    return Object.freeze({ kind: "TypeScript", subType });
  },
  Entry(subType: EntryReferenceSubType = UNDEFINED): EntryReference {
    seal(subType);
    return Object.freeze({ kind: "Entry", subType });
  },
  Runtime(): RuntimeReference {
    return RUNTIME_REFERENCE;
  },
  Internal(assets: InnerAssets = InnerAssets.empty()): InternalReference {
    return Object.freeze({ kind: "Internal", assets });
  },
  Custom(tag: number): CustomReference {
    return Object.freeze({ kind: "Custom", tag: assertCustomTag(tag) });
  },
  Undefined(): UndefinedReference {
    return UNDEFINED_REFERENCE;
  },
});

// =============================================================================
// Ordering & Equality
// =============================================================================

function compareStrings(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

function compareContexts(a: ImportContext | null, b: ImportContext | null): number {
  if (a === null || b === null) {
    if (a === b) return 0;
    return a === null ? -1 : 1;
  }
  return a.compare(b);
}

function compareSubTypes(order: readonly string[], a: ReferenceSubType, b: ReferenceSubType): number {
  const byType = order.indexOf(a.type) - order.indexOf(b.type);
  if (byType !== 0) return Math.sign(byType);

  if (a.type === "Custom" && b.type === "Custom") return Math.sign(a.tag - b.tag);
  if (a.type === "ImportPart" && b.type === "ImportPart") return compareStrings(a.part.key, b.part.key);
  if (a.type === "AtImport" && b.type === "AtImport") return compareContexts(a.context, b.context);
  return 0;
}

/**
 * Total order: kind (declaration order), then subtype (declaration order),
 * then payload. `AtImport(null)` sorts before any `AtImport(context)`.
 */
export function compare(a: ReferenceType, b: ReferenceType): number {
  if (a === b) return 0;

  const byKind = REFERENCE_KINDS.indexOf(a.kind) - REFERENCE_KINDS.indexOf(b.kind);
  if (byKind !== 0) return Math.sign(byKind);

  if (a.kind === "Internal" && b.kind === "Internal") return a.assets.compare(b.assets);
  if (a.kind === "Custom" && b.kind === "Custom") return Math.sign(a.tag - b.tag);
  if ("subType" in a && "subType" in b) return compareSubTypes(SUB_TYPES[a.kind], a.subType, b.subType);
  return 0;
}

/** Structural equality, payloads included */
export function equals(a: ReferenceType, b: ReferenceType): boolean {
  return compare(a, b) === 0;
}

function subTypeKey(subType: ReferenceSubType): string {
  switch (subType.type) {
    case "Custom":
      return `Custom(${subType.tag})`;
    case "ImportPart":
      return `ImportPart(${JSON.stringify(subType.part.key)})`;
    case "AtImport":
      return `AtImport(${subType.context ? subType.context.key() : "none"})`;
    default:
      return subType.type;
  }
}

/**
 * Stable string form for use as a cache or map key. Two values have the same
 * key exactly when they are {@link equals}.
 */
export function referenceTypeKey(value: ReferenceType): string {
  switch (value.kind) {
    case "Runtime":
    case "Undefined":
      return value.kind;
    case "Internal":
      return `Internal(${value.assets.key()})`;
    case "Custom":
      return `Custom(${value.tag})`;
    default:
      return `${value.kind}/${subTypeKey(value.subType)}`;
  }
}

// =============================================================================
// Matching
// =============================================================================

const isWildcard = (subType: ReferenceSubType): boolean => subType.type === "Undefined";

/**
 * Does `self`, used as a rule condition, accept a reference classified as
 * `other`?
 *
 * - equal values always match
 * - otherwise only values of the same kind match, and only when `self`
 *   carries the kind's `Undefined` wildcard subtype
 * - `Css(AtImport(_))` matches every `Css(AtImport(_))`, whatever the
 *   contexts they carry
 * - `Internal(_)` matches every `Internal(_)`; `Runtime` only `Runtime`
 * - top-level `Undefined` matches everything
 *
 * @throws {UnsupportedCustomTypeError} when `self` is a top-level `Custom`
 * not equal to `other`
 */
export function includes(self: ReferenceType, other: ReferenceType, registry?: CustomTypeRegistry): boolean {
  if (equals(self, other)) return true;

  // One arm per kind; `other` of another kind never matches except under `Undefined`
  switch (self.kind) {
    case "CommonJs":
      return other.kind === "CommonJs" && isWildcard(self.subType);
    case "EcmaScriptModules":
      return other.kind === "EcmaScriptModules" && isWildcard(self.subType);
    case "Css":
      // AtImport contexts are ignored when matching
      if (self.subType.type === "AtImport")
        return other.kind === "Css" && other.subType.type === "AtImport";
      return other.kind === "Css" && isWildcard(self.subType);
    case "Url":
      return other.kind === "Url" && isWildcard(self.subType);
    case "TypeScript":
      return other.kind === "TypeScript" && isWildcard(self.subType);
    case "Entry":
      return other.kind === "Entry" && isWildcard(self.subType);
    case "Runtime":
      return other.kind === "Runtime";
    case "Internal":
      return other.kind === "Internal";
    case "Custom":
      throw unsupportedCustomType(self.tag, "includes", registry);
    case "Undefined":
      return true;
  }
}

/**
 * Whether the reference is internal. Module rules with an internal-only
 * condition apply to these.
 */
export function isInternal(value: ReferenceType): boolean {
  return value.kind === "Internal"
    || value.kind === "Runtime"
    || (value.kind === "Css" && value.subType.type === "Internal");
}

/**
 * Short label for the kind. Subtypes are not rendered, except that split
 * ESM imports (`ImportPart`) get their own label.
 *
 * @throws {UnsupportedCustomTypeError} for a top-level `Custom`
 */
export function display(value: ReferenceType, registry?: CustomTypeRegistry): string {
  switch (value.kind) {
    case "CommonJs":
      return "commonjs";
    case "EcmaScriptModules":
      return value.subType.type === "ImportPart" ? "EcmaScript Modules (part)" : "EcmaScript Modules";
    case "Css":
      return "css";
    case "Url":
      return "url";
    case "TypeScript":
      return "typescript";
    case "Entry":
      return "entry";
    case "Runtime":
      return "runtime";
    case "Internal":
      return "internal";
    case "Custom":
      throw unsupportedCustomType(value.tag, "display", registry);
    case "Undefined":
      return "undefined";
  }
}
