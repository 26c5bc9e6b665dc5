/**
 * Mesh to STL encoders (binary and ASCII)
 */

import type { Mesh, Triangle, Vec3 } from '../types/mesh';
import type { Result } from '../utils/result';
import { Ok, Err } from '../utils/result';
import { isFiniteVec3 } from '../utils/vec3';
import { HEADER_BYTES, PREAMBLE_BYTES, RECORD_BYTES } from '../parsers/stl-binary';

export type ConvertError = {
  readonly message: string;
  readonly code?: string;
};

const MAX_BINARY_TRIANGLES = 0xffffffff;

const checkTriangles = (mesh: Mesh): Result<readonly Triangle[], ConvertError> => {
  for (let i = 0; i < mesh.triangles.length; i++) {
    const { normal, vertices } = mesh.triangles[i];
    if (!isFiniteVec3(normal) || !vertices.every(isFiniteVec3)) {
      return Err({
        message: `Triangle ${i} has non-finite components`,
        code: 'NON_FINITE',
      });
    }
  }
  return Ok(mesh.triangles);
};

const writeVec3 = (view: DataView, offset: number, v: Vec3): void => {
  view.setFloat32(offset, v.x, true);
  view.setFloat32(offset + 4, v.y, true);
  view.setFloat32(offset + 8, v.z, true);
};

/**
 * Encode as binary STL. The header holds `header` (or the mesh label) as
 * Latin-1, cut to 80 bytes and padded with NUL.
 */
export const convertMeshToBinarySTL = (
  mesh: Mesh,
  header: string = mesh.label
): Result<Uint8Array, ConvertError> => {
  const checked = checkTriangles(mesh);
  if (!checked.ok) return checked;

  const triangles = checked.value;
  if (triangles.length > MAX_BINARY_TRIANGLES) {
    return Err({
      message: `Binary STL holds at most ${MAX_BINARY_TRIANGLES} triangles`,
      code: 'TOO_MANY_TRIANGLES',
    });
  }

  const bytes = new Uint8Array(PREAMBLE_BYTES + triangles.length * RECORD_BYTES);
  const view = new DataView(bytes.buffer);

  for (let i = 0; i < Math.min(header.length, HEADER_BYTES); i++) {
    const code = header.charCodeAt(i);
    bytes[i] = code <= 0xff ? code : 0x3f; // '?'
  }
  view.setUint32(HEADER_BYTES, triangles.length, true);

  let offset = PREAMBLE_BYTES;
  for (const { normal, vertices } of triangles) {
    writeVec3(view, offset, normal);
    writeVec3(view, offset + 12, vertices[0]);
    writeVec3(view, offset + 24, vertices[1]);
    writeVec3(view, offset + 36, vertices[2]);
    view.setUint16(offset + 48, 0, true);
    offset += RECORD_BYTES;
  }

  return Ok(bytes);
};

const formatVec3 = (v: Vec3): string => `${v.x} ${v.y} ${v.z}`;

/**
 * Encode as ASCII STL; numbers use their shortest round-trip form
 */
export const convertMeshToAsciiSTL = (mesh: Mesh): Result<string, ConvertError> => {
  const checked = checkTriangles(mesh);
  if (!checked.ok) return checked;

  const name = mesh.label.replace(/\s+/g, ' ').trim();
  const facets = checked.value.map(({ normal, vertices }) =>
    [
      `  facet normal ${formatVec3(normal)}`,
      '    outer loop',
      ...vertices.map((v) => `      vertex ${formatVec3(v)}`),
      '    endloop',
      '  endfacet',
    ].join('\n')
  );

  return Ok([`solid ${name}`, ...facets, `endsolid ${name}`].join('\n') + '\n');
};
