export * from "./env.ts";
export * from "./logger.ts";
export * from "./resolve-conditions.ts";

export * as path from "./path.ts";
export type { FileSystemPath } from "./path.ts";
