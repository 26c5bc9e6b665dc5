/**
 * Mesh parsing entry points
 * Returns Result<Mesh, ParseError> for monadic error handling
 */

import { readFile, stat } from 'fs/promises';
import type { FormatTag, Mesh } from '../types/mesh';
import type { Result } from '../utils/result';
import { Ok, Err, andThen } from '../utils/result';
import type { ParseOptions } from '../config/options';
import { defaultParseOptions } from '../config/options';
import { createTriangleValidator } from '../validators/validators';
import { createMeshBuilder } from '../model/meshBuilder';
import type { ParseError } from './errors';
import { resourceLimitExceeded } from './errors';
import type { MeshParser } from './parser';
import type { ParserRegistry } from './registry';
import { defaultRegistry } from './registry';
import { baseName, detectFormat } from './detect';

export type MeshSource = {
  readonly path: string;
  readonly bytes: Uint8Array;
};

export type ParseContext = {
  readonly registry?: ParserRegistry;
  readonly options?: ParseOptions;
};

export type FileParseResult = {
  readonly path: string;
  readonly result: Result<Mesh, ParseError>;
};

const selectFormat = (
  registry: ParserRegistry,
  source: MeshSource,
  options: ParseOptions
): Result<FormatTag, ParseError> =>
  options.format !== undefined ? Ok(options.format) : detectFormat(registry, source.path, source.bytes);

/**
 * Drive one parser's triangle stream through validation into a mesh
 */
const buildMesh = (
  parser: MeshParser,
  source: MeshSource,
  options: ParseOptions
): Result<Mesh, ParseError> => {
  const validator = createTriangleValidator(options);
  const builder = createMeshBuilder({
    name: baseName(source.path),
    format: parser.format,
    byteLength: source.bytes.byteLength,
    maxTriangles: options.maxTriangles,
  });

  const stream = parser.parse(source.bytes, options);
  let step = stream.next();
  while (!step.done) {
    const included = builder.include(validator.inspect(step.value));
    if (!included.ok) {
      return included;
    }
    step = stream.next();
  }

  const trailer = step.value;
  if (!trailer.ok) {
    return trailer;
  }

  const confirmed = validator.confirmCount(trailer.value.declaredCount);
  if (!confirmed.ok) {
    return confirmed;
  }

  builder.addWarnings(trailer.value.warnings ?? []);
  return Ok(builder.finish(trailer.value.label));
};

/**
 * Parse in-memory bytes into a frozen Mesh.
 * Synchronous and free of shared mutable state; only the registry is shared.
 */
export const parseMesh = (
  source: MeshSource,
  context: ParseContext = {}
): Result<Mesh, ParseError> => {
  const registry = context.registry ?? defaultRegistry;
  const options = context.options ?? defaultParseOptions;

  if (source.bytes.byteLength > options.maxFileSize) {
    return Err(resourceLimitExceeded('maxFileSize', options.maxFileSize, source.bytes.byteLength));
  }

  return andThen(
    andThen(selectFormat(registry, source, options), (format) => registry.resolve(format)),
    (parser) => buildMesh(parser, source, options)
  );
};

/**
 * Read a file and parse it; read failures become IoError. Files above
 * `maxFileSize` are refused before any content is read.
 */
export const parseMeshFile = async (
  path: string,
  context: ParseContext = {}
): Promise<Result<Mesh, ParseError>> => {
  const { maxFileSize } = context.options ?? defaultParseOptions;
  let bytes: Uint8Array;
  try {
    const { size } = await stat(path);
    if (size > maxFileSize) {
      return Err(resourceLimitExceeded('maxFileSize', maxFileSize, size));
    }
    bytes = await readFile(path);
  } catch (error) {
    return Err({
      kind: 'IoError',
      path,
      detail: error instanceof Error ? error.message : String(error),
    });
  }
  return parseMesh({ path, bytes }, context);
};

/**
 * Parse several files concurrently; results keep the input order
 */
export const parseMeshFiles = async (
  paths: readonly string[],
  context: ParseContext = {}
): Promise<readonly FileParseResult[]> =>
  Promise.all(
    paths.map(async (path) => ({ path, result: await parseMeshFile(path, context) }))
  );

export { detectFormat, fileExtension, baseName } from './detect';
export { createParserRegistry, defaultRegistry } from './registry';
export type { ParserRegistry } from './registry';
export type { MeshParser, SniffResult, StreamTrailer, TriangleStream } from './parser';
export type { ParseError, ParseErrorKind } from './errors';
export { describeParseError } from './errors';
export { asciiStlParser } from './stl-ascii';
export { binaryStlParser } from './stl-binary';
