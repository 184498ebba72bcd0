export * from "./types.ts";
export * from "./errors.ts";

export * from "./inner-assets.ts";
export * from "./import-context.ts";
export * from "./custom-types.ts";
export * from "./reference-type.ts";
export * from "./classify.ts";

export * from "./resolve/options.ts";
export * from "./resolve/node.ts";

export * from "./configs/config.ts";
