import { describe, it, expect } from 'vitest';
import { errorBody, meshBody, statusForParseError } from '../backend/src/responses';
import type { ParseError } from '../shared/parsers/errors';
import { malformedAt, malformedAtLine, resourceLimitExceeded, unsupportedFormat } from '../shared/parsers/errors';
import { parseMesh } from '../shared/parsers';
import { asciiStl, encode, unitFacet } from './helpers/stl';

const countMismatch: ParseError = {
  kind: 'TriangleCountMismatch',
  declared: 5,
  actual: 3,
  availableBytes: 150,
  offset: 234,
  detail: 'Header declares 5 triangles but 150 bytes hold 3 complete records',
};

describe('HTTP status mapping', () => {
  it('maps each error kind to a status', () => {
    expect(statusForParseError(unsupportedFormat('Unrecognized file extension', 'a.obj'))).toBe(415);
    expect(statusForParseError(resourceLimitExceeded('maxFileSize', 10, 84))).toBe(413);
    expect(statusForParseError(malformedAtLine(2, 'bad'))).toBe(400);
    expect(statusForParseError(countMismatch)).toBe(400);
    expect(statusForParseError({ kind: 'UnexpectedEof', offset: 0, detail: 'short' })).toBe(400);
    expect(statusForParseError({ kind: 'IoError', path: 'a.stl', detail: 'EACCES' })).toBe(500);
    expect(
      statusForParseError({ kind: 'InternalInconsistency', declared: 2, produced: 1, detail: 'desync' })
    ).toBe(500);
  });
});

describe('Response bodies', () => {
  it('carries the line of a text error', () => {
    expect(errorBody(malformedAtLine(8, "Expected 'endloop' but found 'vertex'"))).toEqual({
      success: false,
      error: {
        kind: 'MalformedStructure',
        message: "MalformedStructure at line 8: Expected 'endloop' but found 'vertex'",
        line: 8,
      },
    });
  });

  it('carries the byte offset of a binary error', () => {
    expect(errorBody(malformedAt({ kind: 'offset', offset: 134 }, 'bad record'))).toEqual({
      success: false,
      error: { kind: 'MalformedStructure', message: 'MalformedStructure at byte offset 134: bad record', offset: 134 },
    });
    expect(errorBody(countMismatch)).toEqual({
      success: false,
      error: {
        kind: 'TriangleCountMismatch',
        message: 'TriangleCountMismatch at byte offset 234: declared 5, found 3',
        offset: 234,
      },
    });
  });

  it('omits location fields for errors without one', () => {
    expect(errorBody(unsupportedFormat('Unrecognized file extension', 'model.obj'))).toEqual({
      success: false,
      error: { kind: 'UnsupportedFormat', message: 'UnsupportedFormat: model.obj: Unrecognized file extension' },
    });
  });

  it('wraps a parsed mesh with its summary', () => {
    const result = parseMesh({ path: 'cube.stl', bytes: encode(asciiStl('cube', [unitFacet])) });
    expect(result.ok).toBe(true);
    if (!result.ok) return;

    const body = meshBody(result.value);
    expect(body.success).toBe(true);
    expect(body.data.triangles).toBe(result.value.triangles);
    expect(body.data.warnings).toEqual([]);
    expect(body.data.summary).toMatchObject({
      name: 'cube.stl',
      label: 'cube',
      format: 'stl-ascii',
      triangleCount: 1,
      vertexCount: 3,
      maxDimension: 1,
      hasWarnings: false,
    });
  });
});
