/**
 * Terminal parse failures
 * Every variant carries a human-readable `detail`; the `kind` tag is what callers branch on.
 */

import type { SourceLocation } from '../types/mesh';

export type ResourceLimit = 'maxTriangles' | 'maxFileSize';

export type ParseError =
  | { readonly kind: 'IoError'; readonly path: string; readonly detail: string }
  | { readonly kind: 'UnsupportedFormat'; readonly path?: string; readonly detail: string }
  | { readonly kind: 'MalformedStructure'; readonly location: SourceLocation; readonly detail: string }
  | { readonly kind: 'UnexpectedEof'; readonly offset: number; readonly detail: string }
  | {
      readonly kind: 'TriangleCountMismatch';
      readonly declared: number;
      readonly actual: number;
      readonly availableBytes: number;
      readonly offset: number;
      readonly detail: string;
    }
  | {
      readonly kind: 'ResourceLimitExceeded';
      readonly limit: ResourceLimit;
      readonly max: number;
      readonly actual: number;
      readonly detail: string;
    }
  | {
      readonly kind: 'InternalInconsistency';
      readonly declared: number;
      readonly produced: number;
      readonly detail: string;
    };

export type ParseErrorKind = ParseError['kind'];

export const malformedAtLine = (line: number, detail: string): ParseError => ({
  kind: 'MalformedStructure',
  location: { kind: 'line', line },
  detail,
});

export const malformedAt = (location: SourceLocation, detail: string): ParseError => ({
  kind: 'MalformedStructure',
  location,
  detail,
});

export const unsupportedFormat = (detail: string, path?: string): ParseError => ({
  kind: 'UnsupportedFormat',
  path,
  detail,
});

export const resourceLimitExceeded = (
  limit: ResourceLimit,
  max: number,
  actual: number
): ParseError => ({
  kind: 'ResourceLimitExceeded',
  limit,
  max,
  actual,
  detail: `${limit} of ${max} exceeded (${actual})`,
});

export const describeLocation = (location: SourceLocation): string =>
  location.kind === 'line' ? `line ${location.line}` : `byte offset ${location.offset}`;

/**
 * One-line rendering for logs and API responses
 */
export const describeParseError = (error: ParseError): string => {
  switch (error.kind) {
    case 'IoError':
      return `IoError: ${error.path}: ${error.detail}`;
    case 'UnsupportedFormat':
      return error.path === undefined
        ? `UnsupportedFormat: ${error.detail}`
        : `UnsupportedFormat: ${error.path}: ${error.detail}`;
    case 'MalformedStructure':
      return `MalformedStructure at ${describeLocation(error.location)}: ${error.detail}`;
    case 'UnexpectedEof':
      return `UnexpectedEof at byte offset ${error.offset}: ${error.detail}`;
    case 'TriangleCountMismatch':
      return `TriangleCountMismatch at byte offset ${error.offset}: declared ${error.declared}, found ${error.actual}`;
    case 'ResourceLimitExceeded':
      return `ResourceLimitExceeded: ${error.detail}`;
    case 'InternalInconsistency':
      return `InternalInconsistency: ${error.detail}`;
  }
};
