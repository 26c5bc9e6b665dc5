/**
 * Binary STL decoder
 *
 * Layout: 80-byte header, uint32 LE triangle count, then one 50-byte record
 * per triangle (normal and three vertices as float32 LE, 2-byte attribute).
 */

import type { MeshWarning, Vec3 } from '../types/mesh';
import { createVec3, createTriangle, FORMATS, MESH_LEVEL_INDEX } from '../types/mesh';
import type { Result } from '../utils/result';
import { Ok, Err } from '../utils/result';
import type { ParseOptions } from '../config/options';
import type { ParseError } from './errors';
import { resourceLimitExceeded } from './errors';
import type { MeshParser, SniffResult, StreamTrailer, TriangleStream } from './parser';

export const HEADER_BYTES = 80;
export const PREAMBLE_BYTES = HEADER_BYTES + 4;
export const RECORD_BYTES = 50;

type RecordPlan = {
  readonly records: number;
  readonly warnings: readonly MeshWarning[];
};

const viewOf = (bytes: Uint8Array): DataView =>
  new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);

const readVec3 = (view: DataView, offset: number): Vec3 =>
  createVec3(
    view.getFloat32(offset, true),
    view.getFloat32(offset + 4, true),
    view.getFloat32(offset + 8, true)
  );

/**
 * Header text up to the first NUL, trimmed
 */
export const decodeHeaderLabel = (bytes: Uint8Array): string => {
  const header = bytes.subarray(0, Math.min(HEADER_BYTES, bytes.byteLength));
  const end = header.indexOf(0);
  return new TextDecoder('latin1').decode(end === -1 ? header : header.subarray(0, end)).trim();
};

const planRecords = (
  view: DataView,
  options: ParseOptions
): Result<RecordPlan, ParseError> => {
  const declared = view.getUint32(HEADER_BYTES, true);
  const availableBytes = view.byteLength - PREAMBLE_BYTES;

  if (availableBytes === declared * RECORD_BYTES) {
    return Ok({ records: declared, warnings: [] });
  }

  const complete = Math.floor(availableBytes / RECORD_BYTES);
  if (options.countMismatch === 'strict') {
    return Err({
      kind: 'TriangleCountMismatch',
      declared,
      actual: complete,
      availableBytes,
      offset: PREAMBLE_BYTES + complete * RECORD_BYTES,
      detail: `Header declares ${declared} triangles but ${availableBytes} bytes hold ${complete} complete records`,
    });
  }

  const records = Math.min(declared, complete);
  return Ok({
    records,
    warnings: [
      {
        index: MESH_LEVEL_INDEX,
        kind: 'TriangleCountMismatch',
        detail: `Header declares ${declared} triangles; decoded ${records} from ${availableBytes} bytes`,
      },
    ],
  });
};

function* decodeBinary(bytes: Uint8Array, options: ParseOptions): TriangleStream {
  if (bytes.byteLength < PREAMBLE_BYTES) {
    return Err({
      kind: 'UnexpectedEof',
      offset: 0,
      detail: `Binary STL needs at least ${PREAMBLE_BYTES} bytes, got ${bytes.byteLength}`,
    });
  }

  const view = viewOf(bytes);
  const plan = planRecords(view, options);
  if (!plan.ok) {
    return plan;
  }

  const { records, warnings } = plan.value;
  if (records > options.maxTriangles) {
    return Err(resourceLimitExceeded('maxTriangles', options.maxTriangles, records));
  }

  let offset = PREAMBLE_BYTES;
  for (let remaining = records; remaining > 0; remaining--) {
    yield {
      triangle: createTriangle(
        readVec3(view, offset),
        readVec3(view, offset + 12),
        readVec3(view, offset + 24),
        readVec3(view, offset + 36)
      ),
      location: { kind: 'offset', offset },
    };
    offset += RECORD_BYTES;
  }

  const trailer: StreamTrailer = {
    label: decodeHeaderLabel(bytes),
    declaredCount: records,
    warnings,
  };
  return Ok(trailer);
}

/**
 * Binary STL carries no magic number, so any file is at least a candidate
 */
const sniffBinary = (bytes: Uint8Array): SniffResult => {
  if (bytes.byteLength < PREAMBLE_BYTES) {
    return 'possible';
  }
  const declared = viewOf(bytes).getUint32(HEADER_BYTES, true);
  return bytes.byteLength === PREAMBLE_BYTES + declared * RECORD_BYTES ? 'certain' : 'possible';
};

export const binaryStlParser: MeshParser = {
  format: FORMATS.stlBinary,
  name: 'Binary STL',
  extensions: ['stl', 'stlb'],
  sniff: sniffBinary,
  parse: decodeBinary,
};
