/**
 * Format detection from file name and content
 */

import type { FormatTag } from '../types/mesh';
import type { Result } from '../utils/result';
import { Ok, Err } from '../utils/result';
import type { ParseError } from './errors';
import { unsupportedFormat } from './errors';
import type { MeshParser } from './parser';
import type { ParserRegistry } from './registry';

/**
 * Lower-case extension without the dot, or '' when the base name has none
 */
export const fileExtension = (path: string): string => {
  const base = baseName(path);
  const dot = base.lastIndexOf('.');
  return dot <= 0 ? '' : base.slice(dot + 1).toLowerCase();
};

export const baseName = (path: string): string => {
  const parts = path.split(/[\\/]/);
  return parts[parts.length - 1] ?? path;
};

const firstSniffed = (
  parsers: readonly MeshParser[],
  bytes: Uint8Array,
  wanted: 'certain' | 'possible'
): MeshParser | undefined => parsers.find((parser) => parser.sniff(bytes) === wanted);

/**
 * An extension claimed by exactly one parser decides on its own; otherwise
 * the content is sniffed in registry order.
 */
export const detectFormat = (
  registry: ParserRegistry,
  path: string,
  bytes?: Uint8Array
): Result<FormatTag, ParseError> => {
  const extension = fileExtension(path);
  const claimants = extension === ''
    ? []
    : registry.parsers.filter((parser) => parser.extensions.includes(extension));

  if (claimants.length === 1) {
    return Ok(claimants[0].format);
  }

  if (bytes === undefined) {
    return Err(
      unsupportedFormat(
        claimants.length > 1
          ? `Extension '.${extension}' is ambiguous without file content`
          : 'Unrecognized file extension',
        path
      )
    );
  }

  const certain = firstSniffed(registry.parsers, bytes, 'certain');
  if (certain) {
    return Ok(certain.format);
  }

  const possible = firstSniffed(claimants, bytes, 'possible');
  if (possible) {
    return Ok(possible.format);
  }

  return Err(unsupportedFormat('Content does not match any registered format', path));
};
