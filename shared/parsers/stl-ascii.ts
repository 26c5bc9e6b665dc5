/**
 * ASCII STL parser
 *
 * A finite-state machine over a lazily produced token stream. Keywords are
 * case-insensitive and whitespace, including line breaks, only separates
 * tokens. `solid` and `endsolid` take the rest of their line as a name.
 */

import type { Vec3 } from '../types/mesh';
import { createVec3, createTriangle, FORMATS } from '../types/mesh';
import type { Result } from '../utils/result';
import { Ok, Err } from '../utils/result';
import type { ParseOptions } from '../config/options';
import type { ParseError } from './errors';
import { malformedAtLine } from './errors';
import type { MeshParser, SniffResult, TriangleStream } from './parser';

type Token = {
  readonly text: string;
  readonly line: number;
};

type FacetDraft = {
  readonly line: number;
  readonly normal: Vec3;
  readonly vertices: readonly Vec3[];
};

type AsciiState =
  | { readonly kind: 'ExpectSolidHeader' }
  | { readonly kind: 'ExpectFacetOrEndSolid' }
  | { readonly kind: 'ExpectOuterLoop'; readonly facet: FacetDraft }
  | { readonly kind: 'ExpectVertex'; readonly facet: FacetDraft }
  | { readonly kind: 'ExpectEndLoop'; readonly facet: FacetDraft }
  | { readonly kind: 'ExpectEndFacet'; readonly facet: FacetDraft }
  | { readonly kind: 'ExpectSolidOrEnd' };

const isWhitespace = (code: number): boolean =>
  code === 32 || (code >= 9 && code <= 13);

/**
 * Yield whitespace-separated tokens with their 1-based line number.
 * `\n`, `\r\n` and a lone `\r` each end a line.
 */
function* tokenize(text: string): Generator<Token, void, void> {
  let line = 1;
  let i = 0;

  while (i < text.length) {
    const code = text.charCodeAt(i);
    if (code === 10) {
      line++;
      i++;
    } else if (code === 13) {
      line++;
      i += text.charCodeAt(i + 1) === 10 ? 2 : 1;
    } else if (isWhitespace(code)) {
      i++;
    } else {
      const start = i;
      while (i < text.length && !isWhitespace(text.charCodeAt(i))) {
        i++;
      }
      yield { text: text.slice(start, i), line };
    }
  }
}

/**
 * One-token lookahead over the token stream, remembering the line of the
 * last token handed out.
 */
const createTokenCursor = (text: string) => {
  const tokens = tokenize(text);
  let pending: Token | undefined;
  let lastLine = 1;

  const pull = (): Token | undefined => {
    const step = tokens.next();
    return step.done ? undefined : step.value;
  };

  return {
    next: (): Token | undefined => {
      const token = pending ?? pull();
      pending = undefined;
      if (token) lastLine = token.line;
      return token;
    },
    peek: (): Token | undefined => {
      pending ??= pull();
      return pending;
    },
    lastLine: (): number => lastLine,
  };
};

type TokenCursor = ReturnType<typeof createTokenCursor>;

const DECIMAL = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;
const NON_FINITE = /^([+-]?)(inf|infinity|nan)$/i;

/**
 * Decimal or exponent notation. `inf` and `nan` spellings are accepted as
 * numbers here so validation can report them as geometry, not syntax.
 */
export const parseNumberToken = (text: string): number | undefined => {
  if (DECIMAL.test(text)) {
    return Number(text);
  }
  const special = NON_FINITE.exec(text);
  if (special) {
    if (special[2].toLowerCase() === 'nan') return NaN;
    return special[1] === '-' ? -Infinity : Infinity;
  }
  return undefined;
};

const describeExpectation = (state: AsciiState): string => {
  switch (state.kind) {
    case 'ExpectSolidHeader':
      return "'solid'";
    case 'ExpectFacetOrEndSolid':
      return "'facet' or 'endsolid'";
    case 'ExpectOuterLoop':
      return "'outer loop'";
    case 'ExpectVertex':
      return `'vertex' ${state.facet.vertices.length + 1} of 3`;
    case 'ExpectEndLoop':
      return "'endloop'";
    case 'ExpectEndFacet':
      return "'endfacet'";
    case 'ExpectSolidOrEnd':
      return "'solid' or end of input";
  }
};

const endOfInput = (cursor: TokenCursor, expected: string): ParseError =>
  malformedAtLine(cursor.lastLine(), `Unexpected end of input, expected ${expected}`);

const unexpectedToken = (token: Token, expected: string): ParseError =>
  malformedAtLine(token.line, `Expected ${expected} but found '${token.text}'`);

const expectKeyword = (cursor: TokenCursor, keyword: string): Result<Token, ParseError> => {
  const token = cursor.next();
  if (token === undefined) return Err(endOfInput(cursor, `'${keyword}'`));
  if (token.text.toLowerCase() !== keyword) return Err(unexpectedToken(token, `'${keyword}'`));
  return Ok(token);
};

const readVec3 = (cursor: TokenCursor, what: string): Result<Vec3, ParseError> => {
  const values: number[] = [];
  while (values.length < 3) {
    const token = cursor.next();
    if (token === undefined) {
      return Err(endOfInput(cursor, `${what} component ${values.length + 1} of 3`));
    }
    const value = parseNumberToken(token.text);
    if (value === undefined) {
      return Err(malformedAtLine(token.line, `Invalid number '${token.text}' in ${what}`));
    }
    values.push(value);
  }
  return Ok(createVec3(values[0], values[1], values[2]));
};

/**
 * Consume the remaining tokens of `line` and join them with single spaces
 */
const readRestOfLine = (cursor: TokenCursor, line: number): string => {
  const words: string[] = [];
  for (let token = cursor.peek(); token !== undefined && token.line === line; token = cursor.peek()) {
    cursor.next();
    words.push(token.text);
  }
  return words.join(' ');
};

function* parseAscii(bytes: Uint8Array, _options: ParseOptions): TriangleStream {
  const cursor = createTokenCursor(new TextDecoder('utf-8').decode(bytes));
  let state: AsciiState = { kind: 'ExpectSolidHeader' };
  let label: string | undefined;

  for (;;) {
    const token = cursor.next();
    if (token === undefined) {
      return state.kind === 'ExpectSolidOrEnd'
        ? Ok({ label: label ?? '' })
        : Err(endOfInput(cursor, describeExpectation(state)));
    }

    const keyword = token.text.toLowerCase();

    switch (state.kind) {
      case 'ExpectSolidHeader':
      case 'ExpectSolidOrEnd': {
        if (keyword !== 'solid') {
          return Err(unexpectedToken(token, describeExpectation(state)));
        }
        const name = readRestOfLine(cursor, token.line);
        label ??= name;
        state = { kind: 'ExpectFacetOrEndSolid' };
        break;
      }

      case 'ExpectFacetOrEndSolid': {
        if (keyword === 'endsolid') {
          readRestOfLine(cursor, token.line);
          state = { kind: 'ExpectSolidOrEnd' };
          break;
        }
        if (keyword !== 'facet') {
          return Err(unexpectedToken(token, describeExpectation(state)));
        }
        const normalKeyword = expectKeyword(cursor, 'normal');
        if (!normalKeyword.ok) return normalKeyword;
        const normal = readVec3(cursor, 'facet normal');
        if (!normal.ok) return normal;
        state = {
          kind: 'ExpectOuterLoop',
          facet: { line: token.line, normal: normal.value, vertices: [] },
        };
        break;
      }

      case 'ExpectOuterLoop': {
        if (keyword !== 'outer') {
          return Err(unexpectedToken(token, describeExpectation(state)));
        }
        const loopKeyword = expectKeyword(cursor, 'loop');
        if (!loopKeyword.ok) return loopKeyword;
        state = { kind: 'ExpectVertex', facet: state.facet };
        break;
      }

      case 'ExpectVertex': {
        if (keyword !== 'vertex') {
          return Err(unexpectedToken(token, describeExpectation(state)));
        }
        const vertex = readVec3(cursor, 'vertex');
        if (!vertex.ok) return vertex;
        const facet: FacetDraft = {
          ...state.facet,
          vertices: [...state.facet.vertices, vertex.value],
        };
        state = facet.vertices.length === 3
          ? { kind: 'ExpectEndLoop', facet }
          : { kind: 'ExpectVertex', facet };
        break;
      }

      case 'ExpectEndLoop': {
        if (keyword !== 'endloop') {
          return Err(unexpectedToken(token, describeExpectation(state)));
        }
        state = { kind: 'ExpectEndFacet', facet: state.facet };
        break;
      }

      case 'ExpectEndFacet': {
        if (keyword !== 'endfacet') {
          return Err(unexpectedToken(token, describeExpectation(state)));
        }
        const { line, normal, vertices } = state.facet;
        yield {
          triangle: createTriangle(normal, vertices[0], vertices[1], vertices[2]),
          location: { kind: 'line', line },
        };
        state = { kind: 'ExpectFacetOrEndSolid' };
        break;
      }
    }
  }
}

const SOLID = [0x73, 0x6f, 0x6c, 0x69, 0x64]; // "solid"
const SNIFF_WINDOW = 1024;

const isPlainText = (bytes: Uint8Array, start: number): boolean => {
  const end = Math.min(bytes.length, start + SNIFF_WINDOW);
  for (let i = start; i < end; i++) {
    if (bytes[i] === 0 || bytes[i] >= 0x80) {
      return false;
    }
  }
  return true;
};

/**
 * ASCII files open with `solid`, after optional whitespace or a UTF-8 BOM.
 * A NUL or non-ASCII byte in the first 1024 bytes marks a binary file whose
 * header happens to start with `solid`.
 */
const sniffAscii = (bytes: Uint8Array): SniffResult => {
  const start = bytes[0] === 0xef && bytes[1] === 0xbb && bytes[2] === 0xbf ? 3 : 0;
  if (!isPlainText(bytes, start)) {
    return 'none';
  }
  let i = start;
  while (i < bytes.length && isWhitespace(bytes[i])) {
    i++;
  }
  for (const letter of SOLID) {
    // ASCII letters lower-case with bit 0x20
    if (i >= bytes.length || (bytes[i] | 0x20) !== letter) {
      return 'none';
    }
    i++;
  }
  return i === bytes.length || isWhitespace(bytes[i]) ? 'certain' : 'none';
};

export const asciiStlParser: MeshParser = {
  format: FORMATS.stlAscii,
  name: 'ASCII STL',
  extensions: ['stl', 'stla'],
  sniff: sniffAscii,
  parse: parseAscii,
};
