/**
 * Node.js-compatible resolution policies.
 *
 * Both policies mirror Node's own resolver: `"exports"` before `"main"`,
 * `"imports"` for `#internal` requests, `node_modules` lookup from the root
 * upwards. They differ in the module-system condition and in whether a
 * request may leave out its extension.
 *
 * @see https://nodejs.org/api/modules.html#all-together
 * @see https://nodejs.org/api/esm.html#resolution-algorithm
 */

import type { FileSystemPath } from "../types.ts";
import type { ResolveOptions } from "./options.ts";

import { createConditions, isRequireKind, NODE_CONDITIONS, type ImportKind } from "@modref/utils/resolve-conditions";
import { formatFileSystemPath } from "@modref/utils/path";
import { getLogger } from "@modref/utils/logger";

import { createResolveOptions } from "./options.ts";

const logger = getLogger(["resolve", "node"]);

/** Extensions Node probes for an extension-less `require()` */
export const NODE_EXTENSIONS = [".js", ".json", ".node"] as const;

export const NODE_MODULES = "node_modules";

export const NODE_DEFAULT_FILES = ["index"] as const;

function nodeResolveOptions(
  root: FileSystemPath,
  moduleCondition: typeof NODE_CONDITIONS.require | typeof NODE_CONDITIONS.import,
  fullySpecified: boolean
): ResolveOptions {
  const conditions = createConditions([
    [NODE_CONDITIONS.node, "set"],
    [moduleCondition, "set"],
  ]);

  return createResolveOptions({
    fullySpecified,
    extensions: [...NODE_EXTENSIONS],
    modules: [{ type: "Nested", root, names: [NODE_MODULES] }],
    intoPackage: [
      { type: "ExportsField", conditions, unspecifiedConditions: "unset" },
      { type: "MainField", field: "main" },
    ],
    inPackage: [
      { type: "ImportsField", conditions, unspecifiedConditions: "unset" },
    ],
    defaultFiles: [...NODE_DEFAULT_FILES],
  });
}

/**
 * Policy for `require()`: conditions `node` + `require`, extension-less
 * requests allowed.
 */
export function nodeCjsResolveOptions(root: FileSystemPath): ResolveOptions {
  logger.debug("Building CommonJS resolve options for {root}", { root: formatFileSystemPath(root) });
  return nodeResolveOptions(root, NODE_CONDITIONS.require, false);
}

/**
 * Policy for `import`: conditions `node` + `import`, every request must
 * carry its extension.
 */
export function nodeEsmResolveOptions(root: FileSystemPath): ResolveOptions {
  logger.debug("Building ESM resolve options for {root}", { root: formatFileSystemPath(root) });
  return nodeResolveOptions(root, NODE_CONDITIONS.import, true);
}

/**
 * Picks the CommonJS policy for `require()` / `require.resolve()` and the ESM
 * policy for every other import kind.
 */
export function nodeResolveOptionsFor(kind: ImportKind, root: FileSystemPath): ResolveOptions {
  return isRequireKind(kind) ? nodeCjsResolveOptions(root) : nodeEsmResolveOptions(root);
}
