/**
 * Name representations for the query AST.
 *
 * Every name in a tree (operation, field, alias, fragment, argument, variable,
 * type) is stored as a `T extends Text`. Trees built with the default factory
 * hold plain strings; trees built with {@link sourceText} hold views into the
 * query source and never copy it.
 */

/**
 * Minimal capability required of a name representation.
 * Plain strings satisfy it.
 */
export interface Text {
  toString(): string;
}

/**
 * Builds the stored representation of the name spanning `[pos, end)` in `source`
 */
export type TextFactory<T extends Text> = (source: string, pos: number, end: number) => T;

/**
 * Read-only view of a span of the query source
 */
export class SourceText implements Text {
  constructor(
    readonly source: string,
    readonly pos: number,
    readonly end: number
  ) { }

  get length(): number {
    return this.end - this.pos;
  }

  /**
   * Compares character by character without materializing either side
   */
  equals(other: Text): boolean {
    if (other instanceof SourceText) {
      if (other.length !== this.length) return false;
      if (other.source === this.source && other.pos === this.pos) return true;

      for (let i = 0; i < this.length; i++) {
        if (this.source.charCodeAt(this.pos + i) !== other.source.charCodeAt(other.pos + i)) {
          return false;
        }
      }
      return true;
    }

    const text = other.toString();
    return text.length === this.length && this.source.startsWith(text, this.pos);
  }

  toString(): string {
    return this.source.slice(this.pos, this.end);
  }
}

/**
 * Default factory: names are copied out as strings
 */
export const sliceText: TextFactory<string> = (source, pos, end) => source.slice(pos, end);

/**
 * Names are kept as {@link SourceText} views
 */
export const sourceText: TextFactory<SourceText> = (source, pos, end) => new SourceText(source, pos, end);

/**
 * Equality across representations: a string and a SourceText holding the same
 * characters are equal.
 */
export function textEquals(a: Text, b: Text): boolean {
  if (a instanceof SourceText) return a.equals(b);
  if (b instanceof SourceText) return b.equals(a);
  return a.toString() === b.toString();
}
