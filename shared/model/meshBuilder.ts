/**
 * Streaming mesh accumulation
 * Each accepted triangle is folded in with O(1) work: append, widen bounds, count.
 */

import type {
  BoundingBox,
  FormatTag,
  Mesh,
  MeshSummary,
  MeshWarning,
  Triangle,
  Vec3,
} from '../types/mesh';
import { createVec3, ZERO_VEC3 } from '../types/mesh';
import type { Result } from '../utils/result';
import { Ok, Err } from '../utils/result';
import { scale, add, subtract } from '../utils/vec3';
import type { ParseError } from '../parsers/errors';
import { resourceLimitExceeded } from '../parsers/errors';
import type { TriangleOutcome } from '../validators/validators';

export type MeshBuilderConfig = {
  readonly name: string;
  readonly format: FormatTag;
  readonly byteLength: number;
  readonly maxTriangles: number;
};

export type MeshBuilder = {
  readonly include: (outcome: TriangleOutcome) => Result<number, ParseError>;
  readonly addWarnings: (warnings: readonly MeshWarning[]) => void;
  readonly count: () => number;
  readonly finish: (label: string) => Mesh;
};

export const createMeshBuilder = (config: MeshBuilderConfig): MeshBuilder => {
  const triangles: Triangle[] = [];
  const warnings: MeshWarning[] = [];
  let minX = Infinity;
  let minY = Infinity;
  let minZ = Infinity;
  let maxX = -Infinity;
  let maxY = -Infinity;
  let maxZ = -Infinity;
  let finished = false;

  const append = (triangle: Triangle): Result<number, ParseError> => {
    if (triangles.length >= config.maxTriangles) {
      return Err(resourceLimitExceeded('maxTriangles', config.maxTriangles, triangles.length + 1));
    }

    for (const { x, y, z } of triangle.vertices) {
      if (x < minX) minX = x;
      if (y < minY) minY = y;
      if (z < minZ) minZ = z;
      if (x > maxX) maxX = x;
      if (y > maxY) maxY = y;
      if (z > maxZ) maxZ = z;
    }

    triangles.push(triangle);
    return Ok(triangles.length);
  };

  return {
    include: (outcome) => {
      if (finished) {
        throw new Error('Mesh builder already finished');
      }
      switch (outcome.status) {
        case 'rejected':
          return Err(outcome.error);
        case 'accepted':
          return append(outcome.triangle);
        case 'accepted-with-warnings': {
          const appended = append(outcome.triangle);
          if (appended.ok) {
            warnings.push(...outcome.warnings);
          }
          return appended;
        }
      }
    },

    addWarnings: (extra) => {
      warnings.push(...extra);
    },

    count: () => triangles.length,

    finish: (label) => {
      finished = true;
      const bounds: BoundingBox | undefined =
        triangles.length === 0
          ? undefined
          : {
              min: createVec3(minX, minY, minZ),
              max: createVec3(maxX, maxY, maxZ),
            };

      return Object.freeze({
        name: config.name,
        label,
        format: config.format,
        triangles: Object.freeze(triangles),
        triangleCount: triangles.length,
        bounds,
        warnings: Object.freeze(warnings),
        byteLength: config.byteLength,
      });
    },
  };
};

export const boundsSize = (bounds: BoundingBox | undefined): Vec3 =>
  bounds ? subtract(bounds.max, bounds.min) : ZERO_VEC3;

export const boundsCenter = (bounds: BoundingBox | undefined): Vec3 =>
  bounds ? scale(add(bounds.min, bounds.max), 0.5) : ZERO_VEC3;

export const maxDimension = (bounds: BoundingBox | undefined): number => {
  const size = boundsSize(bounds);
  return Math.max(size.x, size.y, size.z);
};

/**
 * Metadata-only view for callers that never touch the triangles
 */
export const summarizeMesh = (mesh: Mesh): MeshSummary => ({
  name: mesh.name,
  label: mesh.label,
  format: mesh.format,
  triangleCount: mesh.triangleCount,
  vertexCount: mesh.triangleCount * 3,
  bounds: mesh.bounds,
  size: boundsSize(mesh.bounds),
  center: boundsCenter(mesh.bounds),
  maxDimension: maxDimension(mesh.bounds),
  warningCount: mesh.warnings.length,
  hasWarnings: mesh.warnings.length > 0,
  byteLength: mesh.byteLength,
});
