import { describe, it, expect } from 'vitest';
import {
  boundsCenter,
  boundsSize,
  createMeshBuilder,
  maxDimension,
  summarizeMesh,
} from '../shared/model/meshBuilder';
import type { Triangle } from '../shared/types/mesh';
import { createTriangle, createVec3 } from '../shared/types/mesh';
import { malformedAtLine } from '../shared/parsers/errors';

const config = { name: 'part.stl', format: 'stl-ascii', byteLength: 321, maxTriangles: 10 };

const first: Triangle = createTriangle(
  createVec3(0, 0, 1),
  createVec3(0, 0, 0),
  createVec3(2, 0, 0),
  createVec3(0, 4, 0)
);
const second: Triangle = createTriangle(
  createVec3(0, 0, 1),
  createVec3(-1, 1, 1),
  createVec3(0, 0, 1),
  createVec3(1, 1, 1)
);

describe('createMeshBuilder', () => {
  it('finishes an empty mesh without bounds', () => {
    const mesh = createMeshBuilder(config).finish('nothing');

    expect(mesh).toEqual({
      name: 'part.stl',
      label: 'nothing',
      format: 'stl-ascii',
      triangles: [],
      triangleCount: 0,
      bounds: undefined,
      warnings: [],
      byteLength: 321,
    });
  });

  it('widens bounds and counts as triangles arrive', () => {
    const builder = createMeshBuilder(config);
    expect(builder.include({ status: 'accepted', triangle: first })).toEqual({ ok: true, value: 1 });
    expect(builder.include({ status: 'accepted', triangle: second })).toEqual({ ok: true, value: 2 });

    const mesh = builder.finish('two');
    expect(mesh.triangles).toEqual([first, second]);
    expect(mesh.triangleCount).toBe(2);
    expect(mesh.bounds).toEqual({ min: { x: -1, y: 0, z: 0 }, max: { x: 2, y: 4, z: 1 } });
  });

  it('stores warnings of accepted triangles and mesh-level ones', () => {
    const builder = createMeshBuilder(config);
    const warning = { index: 0, kind: 'DegenerateGeometry' as const, detail: 'flat' };
    builder.include({ status: 'accepted-with-warnings', triangle: first, warnings: [warning] });
    builder.addWarnings([{ index: -1, kind: 'TriangleCountMismatch', detail: 'short' }]);

    expect(builder.finish('w').warnings).toEqual([
      warning,
      { index: -1, kind: 'TriangleCountMismatch', detail: 'short' },
    ]);
  });

  it('returns the error of a rejected triangle and leaves the mesh unchanged', () => {
    const builder = createMeshBuilder(config);
    const error = malformedAtLine(3, 'bad');

    expect(builder.include({ status: 'rejected', error })).toEqual({ ok: false, error });
    expect(builder.count()).toBe(0);
  });

  it('stops at the triangle ceiling', () => {
    const builder = createMeshBuilder({ ...config, maxTriangles: 1 });
    builder.include({ status: 'accepted', triangle: first });

    expect(builder.include({ status: 'accepted', triangle: second })).toEqual({
      ok: false,
      error: {
        kind: 'ResourceLimitExceeded',
        limit: 'maxTriangles',
        max: 1,
        actual: 2,
        detail: 'maxTriangles of 1 exceeded (2)',
      },
    });
    expect(builder.count()).toBe(1);
  });

  it('freezes the finished mesh and its lists', () => {
    const builder = createMeshBuilder(config);
    builder.include({ status: 'accepted', triangle: first });
    const mesh = builder.finish('frozen');

    expect(Object.isFrozen(mesh)).toBe(true);
    expect(Object.isFrozen(mesh.triangles)).toBe(true);
    expect(Object.isFrozen(mesh.warnings)).toBe(true);
    expect(() => builder.include({ status: 'accepted', triangle: second })).toThrow(
      'Mesh builder already finished'
    );
  });
});

describe('mesh metadata', () => {
  it('summarizes counts and extents', () => {
    const builder = createMeshBuilder(config);
    builder.include({ status: 'accepted', triangle: first });
    builder.include({
      status: 'accepted-with-warnings',
      triangle: second,
      warnings: [{ index: 1, kind: 'NormalRecomputed', detail: 'flipped' }],
    });

    expect(summarizeMesh(builder.finish('summary'))).toEqual({
      name: 'part.stl',
      label: 'summary',
      format: 'stl-ascii',
      triangleCount: 2,
      vertexCount: 6,
      bounds: { min: { x: -1, y: 0, z: 0 }, max: { x: 2, y: 4, z: 1 } },
      size: { x: 3, y: 4, z: 1 },
      center: { x: 0.5, y: 2, z: 0.5 },
      maxDimension: 4,
      warningCount: 1,
      hasWarnings: true,
      byteLength: 321,
    });
  });

  it('reports zero extents for an empty mesh', () => {
    expect(boundsSize(undefined)).toEqual({ x: 0, y: 0, z: 0 });
    expect(boundsCenter(undefined)).toEqual({ x: 0, y: 0, z: 0 });
    expect(maxDimension(undefined)).toBe(0);
  });
});
