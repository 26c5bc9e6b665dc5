/**
 * Shared capability every mesh format implements
 */

import type { FormatTag, MeshWarning, SourcedTriangle } from '../types/mesh';
import type { Result } from '../utils/result';
import type { ParseOptions } from '../config/options';
import type { ParseError } from './errors';

/**
 * What a parser reports once its last triangle has been yielded
 */
export type StreamTrailer = {
  /** Informational name carried by the file (solid name, header text) */
  readonly label: string;
  /** Number of triangles the parser committed to produce, when the format declares one */
  readonly declaredCount?: number;
  /** Mesh-level warnings raised by the parser itself */
  readonly warnings?: readonly MeshWarning[];
};

/**
 * Lazy, single-pass sequence of triangles. A failure ends the stream through
 * the generator's return value; nothing is thrown.
 */
export type TriangleStream = Generator<SourcedTriangle, Result<StreamTrailer, ParseError>, void>;

export type SniffResult = 'certain' | 'possible' | 'none';

export interface MeshParser {
  readonly format: FormatTag;
  readonly name: string;
  /** Lower-case file extensions without the dot */
  readonly extensions: readonly string[];
  readonly sniff: (bytes: Uint8Array) => SniffResult;
  readonly parse: (bytes: Uint8Array, options: ParseOptions) => TriangleStream;
}
