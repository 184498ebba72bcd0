/**
 * Errors raised by the classification layer.
 *
 * None of these are runtime conditions to recover from: each one points at a
 * caller handing the layer a value it does not support.
 */

export type ErrorCode =
  | "UNSUPPORTED_CUSTOM_TYPE"
  | "INVALID_CUSTOM_TAG"
  | "DUPLICATE_CUSTOM_TYPE"
  | "DUPLICATE_INNER_ASSET"
  | "VALIDATION_FAILED";

export class ModrefError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

/**
 * Raised when matching or rendering meets a `Custom(tag)` reference type.
 * Custom types are an extension point with no behavior defined yet.
 */
export class UnsupportedCustomTypeError extends ModrefError {
  readonly tag: number;
  readonly operation: string;

  constructor(tag: number, operation: string, name?: string) {
    const label = name ? `"${name}" (tag ${tag})` : `tag ${tag}`;
    super("UNSUPPORTED_CUSTOM_TYPE", `Custom reference type ${label} is not supported by ${operation}()`);
    this.tag = tag;
    this.operation = operation;
  }
}

export class InvalidCustomTagError extends ModrefError {
  readonly tag: unknown;

  constructor(tag: unknown) {
    super("INVALID_CUSTOM_TAG", `Custom type tag must be an integer between 0 and 255, got ${String(tag)}`);
    this.tag = tag;
  }
}

export class DuplicateCustomTypeError extends ModrefError {
  constructor(tag: number, existing: string) {
    super("DUPLICATE_CUSTOM_TYPE", `Custom type tag ${tag} is already registered as "${existing}"`);
  }
}

export class DuplicateInnerAssetError extends ModrefError {
  readonly key: string;

  constructor(key: string) {
    super("DUPLICATE_INNER_ASSET", `Inner asset "${key}" is defined more than once`);
    this.key = key;
  }
}

export interface ValidationIssue {
  readonly path: readonly PropertyKey[];
  readonly message: string;
}

export class ValidationError extends ModrefError {
  readonly issues: readonly ValidationIssue[];

  constructor(subject: string, issues: readonly ValidationIssue[]) {
    const details = issues
      .map((issue) => issue.path.length ? `${issue.path.map(String).join(".")}: ${issue.message}` : issue.message)
      .join("; ");
    super("VALIDATION_FAILED", `Invalid ${subject}: ${details}`);
    this.issues = issues;
  }
}
