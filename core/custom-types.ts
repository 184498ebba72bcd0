import { DuplicateCustomTypeError, InvalidCustomTagError, UnsupportedCustomTypeError } from "./errors.ts";

import { getLogger } from "@modref/utils/logger";

const logger = getLogger(["reference-type", "custom"]);

/**
 * Validates a `Custom(tag)` payload: an integer in `0..=255`.
 */
export function assertCustomTag(tag: number): number {
  if (!Number.isInteger(tag) || tag < 0 || tag > 255) throw new InvalidCustomTagError(tag);
  return tag;
}

/**
 * Names for `Custom(tag)` reference types.
 *
 * Plugins will define how a custom type matches and renders. Until then a
 * registry only names tags: matching or rendering a custom type still raises
 * {@link UnsupportedCustomTypeError}, with the registered name in the message.
 */
export class CustomTypeRegistry {
  private readonly names = new Map<number, string>();

  register(tag: number, name: string): this {
    assertCustomTag(tag);

    const existing = this.names.get(tag);
    if (existing !== undefined) throw new DuplicateCustomTypeError(tag, existing);

    this.names.set(tag, name);
    return this;
  }

  has(tag: number): boolean {
    return this.names.has(tag);
  }

  nameOf(tag: number): string | undefined {
    return this.names.get(tag);
  }

  /** Error for an operation that met `Custom(tag)` */
  unsupported(tag: number, operation: string): UnsupportedCustomTypeError {
    return unsupportedCustomType(tag, operation, this);
  }
}

export function unsupportedCustomType(
  tag: number,
  operation: string,
  registry?: CustomTypeRegistry,
): UnsupportedCustomTypeError {
  const name = registry?.nameOf(tag);
  logger.error("{operation}() reached custom reference type {tag}", { operation, tag, name });
  return new UnsupportedCustomTypeError(tag, operation, name);
}
