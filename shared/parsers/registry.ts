/**
 * Format tag to parser table, built once at startup and shared read-only
 */

import type { FormatTag } from '../types/mesh';
import type { Result } from '../utils/result';
import { Ok, Err } from '../utils/result';
import type { ParseError } from './errors';
import { unsupportedFormat } from './errors';
import type { MeshParser } from './parser';
import { asciiStlParser } from './stl-ascii';
import { binaryStlParser } from './stl-binary';

export interface ParserRegistry {
  /** Parsers in registration order, which is also detection order */
  readonly parsers: readonly MeshParser[];
  readonly formats: readonly FormatTag[];
  readonly extensions: readonly string[];
  readonly resolve: (format: FormatTag) => Result<MeshParser, ParseError>;
}

export const createParserRegistry = (parsers: readonly MeshParser[]): ParserRegistry => {
  const table = new Map<FormatTag, MeshParser>();
  for (const parser of parsers) {
    if (table.has(parser.format)) {
      throw new Error(`Duplicate parser registration for format '${parser.format}'`);
    }
    table.set(parser.format, parser);
  }

  const extensions = [...new Set(parsers.flatMap((parser) => parser.extensions))];

  return Object.freeze({
    parsers: Object.freeze([...parsers]),
    formats: Object.freeze([...table.keys()]),
    extensions: Object.freeze(extensions),
    resolve: (format: FormatTag): Result<MeshParser, ParseError> => {
      const parser = table.get(format);
      return parser
        ? Ok(parser)
        : Err(unsupportedFormat(`No parser registered for format '${format}'`));
    },
  });
};

// Binary first: binary headers frequently start with the text "solid"
export const defaultRegistry: ParserRegistry = createParserRegistry([
  binaryStlParser,
  asciiStlParser,
]);
