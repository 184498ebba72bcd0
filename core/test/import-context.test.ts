import { describe, expect, it } from "vitest";

import { ImportContext, parseImportAttributes } from "../import-context.ts";
import { ValidationError } from "../errors.ts";

const contents = (ctx: ImportContext) => ({
  layers: [...ctx.layers],
  supports: [...ctx.supports],
  media: [...ctx.media],
});

describe("ImportContext", () => {
  it("appends a layer to an empty context", () => {
    const ctx = new ImportContext([], [], []).add("a", undefined, undefined);
    expect(contents(ctx)).toEqual({ layers: ["a"], supports: [], media: [] });
  });

  it("ignores a value the family already holds", () => {
    const ctx = ImportContext.empty().add("a").add("a");
    expect(ctx.layers).toEqual(["a"]);
  });

  it("keeps arrival order", () => {
    const ctx = ImportContext.empty().add("a").add("b");
    expect(ctx.layers).toEqual(["a", "b"]);
  });

  it("grows each family independently", () => {
    const ctx = ImportContext.empty()
      .add("base", "display: grid", "screen")
      .add("base", "display: flex", undefined)
      .add(undefined, undefined, "print");

    expect(contents(ctx)).toEqual({
      layers: ["base"],
      supports: ["display: grid", "display: flex"],
      media: ["screen", "print"],
    });
  });

  it("treats the same value in another family as new", () => {
    const ctx = ImportContext.empty().add("x", "x", "x");
    expect(contents(ctx)).toEqual({ layers: ["x"], supports: ["x"], media: ["x"] });
  });

  it("returns equal content when nothing is added", () => {
    const ctx = ImportContext.empty().add("a", "b", "c");
    const same = ctx.add(undefined, undefined, undefined);

    expect(same).not.toBe(ctx);
    expect(same.equals(ctx)).toBe(true);
    expect(same.layers).toBe(ctx.layers);
  });

  it("leaves the receiver untouched", () => {
    const parent = ImportContext.empty().add("base");
    const left = parent.add("left");
    const right = parent.add("right");

    expect(parent.layers).toEqual(["base"]);
    expect(left.layers).toEqual(["base", "left"]);
    expect(right.layers).toEqual(["base", "right"]);
    expect(left.supports).toBe(parent.supports);
  });

  it("takes constructor lists as given, duplicates included", () => {
    const ctx = new ImportContext(["a", "a"], [], ["print"]);
    expect(ctx.layers).toEqual(["a", "a"]);
    expect(ctx.add("a").layers).toEqual(["a", "a"]);
  });

  it("copies constructor lists", () => {
    const layers = ["a"];
    const ctx = new ImportContext(layers, [], []);
    layers.push("b");

    expect(ctx.layers).toEqual(["a"]);
    expect(Object.isFrozen(ctx.layers)).toBe(true);
    expect(Object.isFrozen(ctx)).toBe(true);
  });

  it("compares by order, not just by membership", () => {
    const ab = ImportContext.empty().add("a").add("b");
    const ba = ImportContext.empty().add("b").add("a");

    expect(ab.equals(ba)).toBe(false);
    expect(ab.compare(ba)).toBe(-1);
    expect(ba.compare(ab)).toBe(1);
    expect(ab.key()).not.toBe(ba.key());
    expect(ab.equals(new ImportContext(["a", "b"], [], []))).toBe(true);
  });

  it("compares layers before supports before media", () => {
    const a = new ImportContext(["a"], ["z"], []);
    const b = new ImportContext(["b"], ["a"], []);
    expect(a.compare(b)).toBe(-1);

    const shorter = new ImportContext(["a"], [], []);
    const longer = new ImportContext(["a", "b"], [], []);
    expect(shorter.compare(longer)).toBe(-1);
  });

  it("folds attributes", () => {
    const ctx = ImportContext.empty()
      .addAttributes({ layer: "reset" })
      .addAttributes({ supports: "selector(:has(a))", media: "screen" });

    expect(contents(ctx)).toEqual({ layers: ["reset"], supports: ["selector(:has(a))"], media: ["screen"] });
    expect(ctx.isEmpty()).toBe(false);
    expect(ImportContext.empty().isEmpty()).toBe(true);
  });

  it("shares the empty context", () => {
    expect(ImportContext.empty()).toBe(ImportContext.empty());
  });
});

describe("parseImportAttributes", () => {
  it("keeps present members and drops null ones", () => {
    expect(parseImportAttributes({ layer: "base", supports: null, media: "print" })).toEqual({
      layer: "base",
      media: "print",
    });
  });

  it("accepts an empty record", () => {
    expect(parseImportAttributes({})).toEqual({});
  });

  it("rejects non-string members", () => {
    expect(() => parseImportAttributes({ layer: 1 })).toThrow(ValidationError);
    expect(() => parseImportAttributes("layer(base)")).toThrow(ValidationError);
  });
});
