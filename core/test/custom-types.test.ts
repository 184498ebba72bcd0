import { describe, expect, it } from "vitest";

import { assertCustomTag, CustomTypeRegistry } from "../custom-types.ts";
import { display, ReferenceType } from "../reference-type.ts";
import { DuplicateCustomTypeError, InvalidCustomTagError, UnsupportedCustomTypeError } from "../errors.ts";

describe("CustomTypeRegistry", () => {
  it("names registered tags", () => {
    const registry = new CustomTypeRegistry().register(12, "graphql-document");

    expect(registry.has(12)).toBe(true);
    expect(registry.nameOf(12)).toBe("graphql-document");
    expect(registry.nameOf(13)).toBeUndefined();
  });

  it("rejects a second registration for a tag", () => {
    const registry = new CustomTypeRegistry().register(1, "first");
    expect(() => registry.register(1, "second")).toThrow(DuplicateCustomTypeError);
    expect(registry.nameOf(1)).toBe("first");
  });

  it("rejects invalid tags", () => {
    expect(() => new CustomTypeRegistry().register(512, "too-big")).toThrow(InvalidCustomTagError);
  });

  it("still refuses to render custom types", () => {
    const registry = new CustomTypeRegistry().register(4, "svg-sprite");

    let caught: unknown;
    try {
      display(ReferenceType.Custom(4), registry);
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(UnsupportedCustomTypeError);
    if (caught instanceof UnsupportedCustomTypeError) {
      expect(caught.code).toBe("UNSUPPORTED_CUSTOM_TYPE");
      expect(caught.tag).toBe(4);
      expect(caught.operation).toBe("display");
      expect(caught.message).toBe('Custom reference type "svg-sprite" (tag 4) is not supported by display()');
    }
  });

  it("builds the unsupported error on request", () => {
    const error = new CustomTypeRegistry().unsupported(9, "includes");
    expect(error.message).toBe("Custom reference type tag 9 is not supported by includes()");
    expect(error.name).toBe("UnsupportedCustomTypeError");
  });
});

describe("assertCustomTag", () => {
  it("passes valid tags through", () => {
    expect(assertCustomTag(0)).toBe(0);
    expect(assertCustomTag(255)).toBe(255);
  });

  it("rejects NaN", () => {
    expect(() => assertCustomTag(Number.NaN)).toThrow("Custom type tag must be an integer between 0 and 255, got NaN");
  });
});
