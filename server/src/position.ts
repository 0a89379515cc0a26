/**
 * Line/column <-> offset translation.
 *
 * Columns are UTF-16 code units (the LSP default position encoding), and
 * offsets are JavaScript string indices, so both directions count in the
 * same unit. Byte offsets reported by solc are converted to string indices
 * in solc-bridge.ts before they reach this module.
 */
import type { LineColumn, LineColumnRange } from "./types";

/**
 * Returns the string index of `(line, column)` in `text`, or `undefined`
 * when the line does not exist or the column lies past the end of the line.
 * The end of a line (the position of its `\n`) is a valid column.
 */
export function toOffset(text: string, line: number, column: number): number | undefined {
  if (line < 0 || column < 0) return undefined;

  let offset = 0;
  for (let i = 0; i < line; i++) {
    const nl = text.indexOf("\n", offset);
    if (nl < 0) return undefined;
    offset = nl + 1;
  }

  let endOfLine = text.indexOf("\n", offset);
  if (endOfLine < 0) endOfLine = text.length;
  if (offset + column > endOfLine) return undefined;

  return offset + column;
}

export function toLineColumn(text: string, offset: number): LineColumn {
  const lim = Math.max(0, Math.min(offset, text.length));
  let line = 0;
  let lineStart = 0;

  for (let i = text.indexOf("\n"); i >= 0 && i < lim; i = text.indexOf("\n", i + 1)) {
    line++;
    lineStart = i + 1;
  }

  return { line, column: lim - lineStart };
}

/** Half-open offset interval of `range`, or `undefined` if either end is out of range. */
export function offsetsOf(text: string, range: LineColumnRange): [number, number] | undefined {
  const start = toOffset(text, range.start.line, range.start.column);
  const end = toOffset(text, range.end.line, range.end.column);
  if (start === undefined || end === undefined) return undefined;
  if (end < start) return undefined;
  return [start, end];
}

export function lineLength(text: string, line: number): number {
  const start = toOffset(text, line, 0);
  if (start === undefined) return 0;
  const nl = text.indexOf("\n", start);
  return (nl < 0 ? text.length : nl) - start;
}

// ---- UTF-8 -> UTF-16 ----

/**
 * Returns a function mapping UTF-8 byte offsets in `text` to string
 * indices. A byte inside a multi-byte sequence maps to the index of the
 * character it belongs to.
 */
export function byteToUtf16Mapper(text: string): (byteOff: number) => number {
  const byteLength = Buffer.byteLength(text, "utf8");
  if (byteLength === text.length) {
    return (byteOff) => Math.max(0, Math.min(byteOff, text.length));
  }

  const table = new Uint32Array(byteLength + 1);
  let bytes = 0;

  for (let i = 0; i < text.length; ) {
    const c = text.charCodeAt(i);
    let width = 3;
    let units = 1;

    if (c <= 0x7f) width = 1;
    else if (c <= 0x7ff) width = 2;
    else if (c >= 0xd800 && c <= 0xdbff && i + 1 < text.length) {
      const next = text.charCodeAt(i + 1);
      if (next >= 0xdc00 && next <= 0xdfff) {
        width = 4;
        units = 2;
      }
    }

    table.fill(i, bytes, bytes + width);
    bytes += width;
    i += units;
  }
  table[byteLength] = text.length;

  return (byteOff) => {
    if (byteOff <= 0) return 0;
    if (byteOff >= byteLength) return text.length;
    return table[byteOff];
  };
}
