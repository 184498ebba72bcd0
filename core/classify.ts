import type { ImportKind } from "@modref/utils/resolve-conditions";
import type { ImportContext } from "./import-context.ts";

import { ReferenceType } from "./reference-type.ts";

export interface ClassifyOptions {
  /**
   * Conditions accumulated along the `@import` chain that led to an
   * `import-rule`. Omitted for a top-level stylesheet.
   */
  importContext?: ImportContext | null;
}

/**
 * Classify an esbuild import kind.
 *
 * | kind                               | reference type                    |
 * | ---------------------------------- | --------------------------------- |
 * | `entry-point`                      | `Entry(Undefined)`                |
 * | `import-statement`                 | `EcmaScriptModules(Import)`       |
 * | `dynamic-import`                   | `EcmaScriptModules(DynamicImport)`|
 * | `require-call` / `require-resolve` | `CommonJs(Undefined)`             |
 * | `import-rule`                      | `Css(AtImport(importContext))`    |
 * | `composes-from`                    | `Css(Compose)`                    |
 * | `url-token`                        | `Url(CssUrl)`                     |
 *
 * @example
 * ```ts
 * build.onResolve({ filter: /.*\/ }, (args) => {
 *   const referenceType = referenceTypeFromImportKind(args.kind);
 *   // ...
 * });
 * ```
 */
export function referenceTypeFromImportKind(kind: ImportKind, opts: ClassifyOptions = {}): ReferenceType {
  switch (kind) {
    case "entry-point":
      return ReferenceType.Entry();
    case "import-statement":
      return ReferenceType.EcmaScriptModules({ type: "Import" });
    case "dynamic-import":
      return ReferenceType.EcmaScriptModules({ type: "DynamicImport" });
    case "require-call":
    case "require-resolve":
      return ReferenceType.CommonJs();
    case "import-rule":
      return ReferenceType.Css({ type: "AtImport", context: opts.importContext ?? null });
    case "composes-from":
      return ReferenceType.Css({ type: "Compose" });
    case "url-token":
      return ReferenceType.Url({ type: "CssUrl" });
  }
}
