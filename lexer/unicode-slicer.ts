/**
 * UnicodeSlicer - code point indexed view over a string.
 * Lexer offsets count code points, so a surrogate pair is one character;
 * the slicer maps those indices back to UTF-16 offsets for substring().
 */

export interface UnicodeSlicer {
  /** Number of code points. */
  readonly length: number;

  /** Character at a code point index, or '' past the end. */
  charAt(index: number): string;

  /** Code point at an index, or -1 past the end. */
  codeAt(index: number): number;

  /** Substring between two code point indices (end exclusive), clamped. */
  slice(begin: number, end: number): string;

  /** Substring from a code point index to the end. */
  from(begin: number): string;
}

export function createUnicodeSlicer(source: string): UnicodeSlicer {
  // offsets[i] is the UTF-16 offset of code point i; offsets[length] === source.length
  const offsets: number[] = [];
  let pos = 0;
  while (pos < source.length) {
    offsets.push(pos);
    const code = source.codePointAt(pos) ?? 0;
    pos += code > 0xFFFF ? 2 : 1;
  }
  offsets.push(source.length);

  const length = offsets.length - 1;

  function offsetOf(index: number): number {
    if (index <= 0) return 0;
    if (index >= length) return source.length;
    return offsets[index];
  }

  function charAt(index: number): string {
    if (index < 0 || index >= length) return '';
    return source.substring(offsets[index], offsets[index + 1]);
  }

  function codeAt(index: number): number {
    if (index < 0 || index >= length) return -1;
    return source.codePointAt(offsets[index]) ?? -1;
  }

  function slice(begin: number, end: number): string {
    if (end <= begin) return '';
    return source.substring(offsetOf(begin), offsetOf(end));
  }

  function from(begin: number): string {
    return source.substring(offsetOf(begin));
  }

  return {
    length,
    charAt,
    codeAt,
    slice,
    from,
  };
}
