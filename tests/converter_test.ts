import { describe, it, expect } from 'vitest';
import { parseMesh } from '../shared/parsers';
import { convertMeshToAsciiSTL, convertMeshToBinarySTL, convertToSTL } from '../shared/converters';
import type { Mesh } from '../shared/types/mesh';
import { createTriangle, createVec3 } from '../shared/types/mesh';
import type { FacetSpec } from './helpers/stl';
import { asciiStl, binaryStl, encode, unitFacet } from './helpers/stl';

const facets: FacetSpec[] = [
  unitFacet,
  { normal: [1, 0, 0], vertices: [[3, 0, 0], [3, 1, 0], [3, 0, 1]] },
  { normal: [0, -1, 0], vertices: [[-0.5, -2, 0.125], [1.5, -2, 0.125], [-0.5, -2, 4]] },
];

const parseOrThrow = (path: string, bytes: Uint8Array): Mesh => {
  const result = parseMesh({ path, bytes });
  if (!result.ok) {
    throw new Error(`Parse failed: ${result.error.kind}`);
  }
  return result.value;
};

describe('STL converters', () => {
  it('round-trips a binary file through the binary encoder', () => {
    const original = parseOrThrow('parts.stl', binaryStl(facets, { header: 'parts' }));
    const encoded = convertMeshToBinarySTL(original);
    expect(encoded.ok).toBe(true);
    if (!encoded.ok) return;

    const reparsed = parseOrThrow('parts.stl', encoded.value);
    expect(reparsed.triangleCount).toBe(original.triangleCount);
    expect(reparsed.bounds).toEqual(original.bounds);
    reparsed.triangles.forEach((triangle, i) => {
      const source = original.triangles[i];
      expect(triangle.normal.x).toBeCloseTo(source.normal.x, 6);
      expect(triangle.normal.y).toBeCloseTo(source.normal.y, 6);
      expect(triangle.normal.z).toBeCloseTo(source.normal.z, 6);
      triangle.vertices.forEach((vertex, j) => {
        expect(vertex.x).toBeCloseTo(source.vertices[j].x, 6);
        expect(vertex.y).toBeCloseTo(source.vertices[j].y, 6);
        expect(vertex.z).toBeCloseTo(source.vertices[j].z, 6);
      });
    });
    expect(reparsed.label).toBe('parts');
  });

  it('round-trips an ASCII file through the ASCII encoder', () => {
    const original = parseOrThrow('parts.stl', encode(asciiStl('parts', facets)));
    const encoded = convertMeshToAsciiSTL(original);
    expect(encoded.ok).toBe(true);
    if (!encoded.ok) return;

    const reparsed = parseOrThrow('parts.stl', encode(encoded.value));
    expect(reparsed.triangles).toEqual(original.triangles);
    expect(reparsed.bounds).toEqual(original.bounds);
    expect(reparsed.label).toBe('parts');
  });

  it('lays out the binary preamble and records', () => {
    const mesh = parseOrThrow('cube.stl', encode(asciiStl('cube', [unitFacet])));
    const encoded = convertMeshToBinarySTL(mesh);
    expect(encoded.ok).toBe(true);
    if (!encoded.ok) return;

    const bytes = encoded.value;
    const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
    expect(bytes.byteLength).toBe(134);
    expect(new TextDecoder().decode(bytes.subarray(0, 4))).toBe('cube');
    expect(bytes[4]).toBe(0);
    expect(view.getUint32(80, true)).toBe(1);
    expect(view.getFloat32(84 + 8, true)).toBe(1);
    expect(view.getFloat32(84 + 24, true)).toBe(1);
    expect(view.getUint16(84 + 48, true)).toBe(0);
  });

  it('writes the ASCII grammar', () => {
    const mesh = parseOrThrow('cube.stl', encode(asciiStl('cube', [unitFacet])));

    expect(convertMeshToAsciiSTL(mesh)).toEqual({
      ok: true,
      value: [
        'solid cube',
        '  facet normal 0 0 1',
        '    outer loop',
        '      vertex 0 0 0',
        '      vertex 1 0 0',
        '      vertex 0 1 0',
        '    endloop',
        '  endfacet',
        'endsolid cube',
        '',
      ].join('\n'),
    });
  });

  it('selects the encoder by variant', () => {
    const mesh = parseOrThrow('cube.stl', encode(asciiStl('cube', [unitFacet])));
    const ascii = convertToSTL(mesh, 'ascii');
    const binary = convertToSTL(mesh, 'binary');

    expect(ascii.ok && typeof ascii.value).toBe('string');
    expect(binary.ok && binary.value instanceof Uint8Array).toBe(true);
  });

  it('refuses meshes with non-finite values', () => {
    const mesh: Mesh = {
      name: 'bad.stl',
      label: 'bad',
      format: 'stl-ascii',
      triangles: [
        createTriangle(createVec3(0, 0, 1), createVec3(0, 0, 0), createVec3(NaN, 0, 0), createVec3(0, 1, 0)),
      ],
      triangleCount: 1,
      bounds: undefined,
      warnings: [],
      byteLength: 0,
    };

    const expected = {
      ok: false,
      error: { message: 'Triangle 0 has non-finite components', code: 'NON_FINITE' },
    };
    expect(convertMeshToBinarySTL(mesh)).toEqual(expected);
    expect(convertMeshToAsciiSTL(mesh)).toEqual(expected);
  });
});
