import { z } from "zod";

import { ValidationError } from "./errors.ts";

/**
 * The individual set of conditions present on a single `@import`, e.g.
 * `@import "a.css" layer(base) supports(display: grid) screen;`
 */
export interface ImportAttributes {
  readonly layer?: string;
  readonly supports?: string;
  readonly media?: string;
}

const ImportAttributeSchema = z
  .string()
  .nullish()
  .transform((val) => val ?? undefined);

export const ImportAttributesSchema = z.object({
  layer: ImportAttributeSchema,
  supports: ImportAttributeSchema,
  media: ImportAttributeSchema,
});

/**
 * Validates raw attributes coming from a CSS parser. `null` members count as
 * absent.
 */
export function parseImportAttributes(raw: unknown): ImportAttributes {
  const result = ImportAttributesSchema.safeParse(raw);
  if (!result.success) {
    throw new ValidationError(
      "import attributes",
      result.error.issues.map((issue) => ({ path: issue.path, message: issue.message }))
    );
  }

  const { layer, supports, media } = result.data;
  const attributes: { layer?: string; supports?: string; media?: string } = {};
  if (layer !== undefined) attributes.layer = layer;
  if (supports !== undefined) attributes.supports = supports;
  if (media !== undefined) attributes.media = media;

  return Object.freeze(attributes);
}

function freezeList(list: readonly string[]): readonly string[] {
  return Object.isFrozen(list) ? list : Object.freeze([...list]);
}

/** Appends `value` unless it is absent or already present; unchanged lists are returned as-is */
function appendUnique(list: readonly string[], value: string | undefined): readonly string[] {
  if (value === undefined || list.includes(value)) return list;
  return Object.freeze([...list, value]);
}

function compareLists(a: readonly string[], b: readonly string[]): number {
  const length = Math.min(a.length, b.length);
  for (let i = 0; i < length; i++) {
    if (a[i] !== b[i]) return a[i] < b[i] ? -1 : 1;
  }
  return Math.sign(a.length - b.length);
}

/**
 * The accumulated list of conditions applied to a module through its chain
 * of nested `@import`s.
 *
 * Every list keeps arrival order, outermost `@import` first. The order is
 * observable: two contexts holding the same conditions in a different order
 * are different contexts.
 *
 * @example
 * ```ts
 * const ctx = ImportContext.empty()
 *   .add("base", undefined, "screen")
 *   .add("components", undefined, "screen");
 *
 * ctx.layers; // ["base", "components"]
 * ctx.media;  // ["screen"]
 * ```
 */
export class ImportContext {
  private static readonly EMPTY = new ImportContext([], [], []);

  readonly layers: readonly string[];
  readonly supports: readonly string[];
  readonly media: readonly string[];

  /**
   * Takes the three lists as given, duplicates included. Use {@link add} to
   * grow a context.
   */
  constructor(layers: readonly string[], supports: readonly string[], media: readonly string[]) {
    this.layers = freezeList(layers);
    this.supports = freezeList(supports);
    this.media = freezeList(media);
    Object.freeze(this);
  }

  static empty(): ImportContext {
    return ImportContext.EMPTY;
  }

  /**
   * Returns a new context with each present value appended to its list,
   * unless that list already holds it. The receiver is left untouched, so
   * sibling `@import`s can each grow the same parent context.
   */
  add(layer?: string, supports?: string, media?: string): ImportContext {
    return new ImportContext(
      appendUnique(this.layers, layer),
      appendUnique(this.supports, supports),
      appendUnique(this.media, media),
    );
  }

  addAttributes(attributes: ImportAttributes): ImportContext {
    return this.add(attributes.layer, attributes.supports, attributes.media);
  }

  isEmpty(): boolean {
    return this.layers.length === 0 && this.supports.length === 0 && this.media.length === 0;
  }

  equals(other: ImportContext): boolean {
    return this.compare(other) === 0;
  }

  /** Layers first, then supports, then media; each list element by element */
  compare(other: ImportContext): number {
    if (this === other) return 0;
    return compareLists(this.layers, other.layers)
      || compareLists(this.supports, other.supports)
      || compareLists(this.media, other.media);
  }

  key(): string {
    return JSON.stringify([this.layers, this.supports, this.media]);
  }
}
