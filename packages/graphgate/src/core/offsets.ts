/**
 * Byte-level span location inside an already-valid JSON payload.
 * Used to point decode failures at the bytes that caused them.
 */

const QUOTE = 0x22;
const BACKSLASH = 0x5c;
const COMMA = 0x2c;
const COLON = 0x3a;
const OPEN_BRACE = 0x7b;
const CLOSE_BRACE = 0x7d;
const OPEN_BRACKET = 0x5b;
const CLOSE_BRACKET = 0x5d;

export interface ByteSpan {
  start: number;
  end: number;
}

const isWhitespace = (c: number) => c === 0x20 || c === 0x09 || c === 0x0a || c === 0x0d;

const isDelimiter = (c: number) => isWhitespace(c) || c === COMMA || c === CLOSE_BRACE || c === CLOSE_BRACKET;

const skipWhitespace = (bytes: Buffer, i: number): number => {
  while (i < bytes.length && isWhitespace(bytes[i])) i++;
  return i;
};

const skipString = (bytes: Buffer, i: number): number => {
  i++;
  while (i < bytes.length) {
    const c = bytes[i];
    if (c === BACKSLASH) {
      i += 2;
    } else if (c === QUOTE) {
      return i + 1;
    } else {
      i++;
    }
  }
  return i;
};

/**
 * Returns the offset just past the value starting at `i`
 */
const skipValue = (bytes: Buffer, i: number): number => {
  const c = bytes[i];

  if (c === QUOTE) {
    return skipString(bytes, i);
  }

  if (c === OPEN_BRACE || c === OPEN_BRACKET) {
    let depth = 0;
    while (i < bytes.length) {
      const d = bytes[i];
      if (d === QUOTE) {
        i = skipString(bytes, i);
        continue;
      }
      if (d === OPEN_BRACE || d === OPEN_BRACKET) {
        depth++;
      } else if (d === CLOSE_BRACE || d === CLOSE_BRACKET) {
        depth--;
        if (depth === 0) return i + 1;
      }
      i++;
    }
    return i;
  }

  while (i < bytes.length && !isDelimiter(bytes[i])) i++;
  return i;
};

/**
 * Advance past an optional comma separating members
 */
const nextMember = (bytes: Buffer, i: number): number => {
  i = skipWhitespace(bytes, i);
  return bytes[i] === COMMA ? skipWhitespace(bytes, i + 1) : i;
};

const findMember = (bytes: Buffer, start: number, key: string): ByteSpan | null => {
  let i = skipWhitespace(bytes, start + 1);

  while (i < bytes.length && bytes[i] !== CLOSE_BRACE) {
    const keyEnd = skipString(bytes, i);
    const name: unknown = JSON.parse(bytes.toString("utf8", i, keyEnd));

    i = skipWhitespace(bytes, keyEnd);
    if (bytes[i] === COLON) i++;

    const valueStart = skipWhitespace(bytes, i);
    const valueEnd = skipValue(bytes, valueStart);

    if (name === key) {
      return { start: valueStart, end: valueEnd };
    }

    i = nextMember(bytes, valueEnd);
  }

  return null;
};

const findElement = (bytes: Buffer, start: number, index: number): ByteSpan | null => {
  let i = skipWhitespace(bytes, start + 1);

  for (let n = 0; i < bytes.length && bytes[i] !== CLOSE_BRACKET; n++) {
    const valueEnd = skipValue(bytes, i);

    if (n === index) {
      return { start: i, end: valueEnd };
    }

    i = nextMember(bytes, valueEnd);
  }

  return null;
};

/**
 * Locate the deepest value along `path` in a JSON payload.
 * Walks as far as the payload allows.
 */
export const locateSpan = (bytes: Buffer, path: ReadonlyArray<string | number>): ByteSpan => {
  const start = skipWhitespace(bytes, 0);
  let span: ByteSpan = { start, end: skipValue(bytes, start) };

  for (const segment of path) {
    const open = bytes[span.start];
    let child: ByteSpan | null = null;

    if (open === OPEN_BRACE) {
      child = findMember(bytes, span.start, String(segment));
    } else if (open === OPEN_BRACKET && typeof segment === "number") {
      child = findElement(bytes, span.start, segment);
    }

    if (!child) break;

    span = child;
  }

  return span;
};
