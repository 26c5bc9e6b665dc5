/**
 * Translate parse results into API response bodies
 */

import type { Mesh, MeshSummary, MeshWarning, Triangle } from '../../shared/types/mesh';
import { summarizeMesh } from '../../shared/model/meshBuilder';
import type { ParseError } from '../../shared/parsers/errors';
import { describeParseError } from '../../shared/parsers/errors';

export type MeshResponseBody = {
  readonly success: true;
  readonly data: {
    readonly summary: MeshSummary;
    readonly warnings: readonly MeshWarning[];
    readonly triangles: readonly Triangle[];
  };
};

export type ErrorResponseBody = {
  readonly success: false;
  readonly error: {
    readonly kind: ParseError['kind'];
    readonly message: string;
    readonly line?: number;
    readonly offset?: number;
  };
};

export const statusForParseError = (error: ParseError): number => {
  switch (error.kind) {
    case 'UnsupportedFormat':
      return 415;
    case 'ResourceLimitExceeded':
      return 413;
    case 'IoError':
    case 'InternalInconsistency':
      return 500;
    case 'MalformedStructure':
    case 'UnexpectedEof':
    case 'TriangleCountMismatch':
      return 400;
  }
};

const locationFields = (error: ParseError): { line?: number; offset?: number } => {
  switch (error.kind) {
    case 'MalformedStructure':
      return error.location.kind === 'line'
        ? { line: error.location.line }
        : { offset: error.location.offset };
    case 'UnexpectedEof':
    case 'TriangleCountMismatch':
      return { offset: error.offset };
    default:
      return {};
  }
};

export const errorBody = (error: ParseError): ErrorResponseBody => ({
  success: false,
  error: {
    kind: error.kind,
    message: describeParseError(error),
    ...locationFields(error),
  },
});

export const meshBody = (mesh: Mesh): MeshResponseBody => ({
  success: true,
  data: {
    summary: summarizeMesh(mesh),
    warnings: mesh.warnings,
    triangles: mesh.triangles,
  },
});
