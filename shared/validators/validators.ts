/**
 * Finite-value and geometry validators
 * Per-triangle checks run inline with parsing and return a tagged outcome
 * instead of throwing, so the mesh builder decides what to keep.
 */

import type {
  MeshWarning,
  SourcedTriangle,
  SourceLocation,
  Triangle,
  Vec3,
} from '../types/mesh';
import type { Result } from '../utils/result';
import { Ok, Err } from '../utils/result';
import { cross, dot, isFiniteVec3, length, normalize, reduceToUnitMax, subtract } from '../utils/vec3';
import type { ParseError } from '../parsers/errors';
import { malformedAt } from '../parsers/errors';

export type ValidationError = {
  readonly message: string;
  readonly code: string;
  readonly path?: string;
};

export type Validator<T> = (value: T) => Result<T, ValidationError>;

/**
 * Validate that a number is finite and not NaN
 */
export const validateNumber = (value: number): Result<number, ValidationError> => {
  if (!Number.isFinite(value)) {
    return Err({
      message: `Invalid number: ${value}`,
      code: 'INVALID_NUMBER',
    });
  }
  return Ok(value);
};

/**
 * Validate that a vector has finite components
 */
export const validateVec3 = (vec: Vec3): Result<Vec3, ValidationError> => {
  for (const axis of ['x', 'y', 'z'] as const) {
    const result = validateNumber(vec[axis]);
    if (!result.ok) {
      return Err({ ...result.error, path: axis });
    }
  }
  return Ok(vec);
};

/**
 * Validate that the normal and all three vertices are finite
 */
export const validateTriangleComponents: Validator<Triangle> = (triangle) => {
  const normalResult = validateVec3(triangle.normal);
  if (!normalResult.ok) {
    return Err({ ...normalResult.error, path: `normal.${normalResult.error.path}` });
  }

  for (let i = 0; i < triangle.vertices.length; i++) {
    const vertexResult = validateVec3(triangle.vertices[i]);
    if (!vertexResult.ok) {
      return Err({ ...vertexResult.error, path: `vertices[${i}].${vertexResult.error.path}` });
    }
  }

  return Ok(triangle);
};

export type GeometryThresholds = {
  readonly degenerateAreaEpsilon: number;
  readonly normalEpsilon: number;
};

export type TriangleOutcome =
  | { readonly status: 'accepted'; readonly triangle: Triangle }
  | {
      readonly status: 'accepted-with-warnings';
      readonly triangle: Triangle;
      readonly warnings: readonly MeshWarning[];
    }
  | { readonly status: 'rejected'; readonly error: ParseError };

/**
 * Twice the triangle area, as the cross product of its two edges
 */
export const edgeCross = (triangle: Triangle): Vec3 => {
  const [a, b, c] = triangle.vertices;
  return cross(subtract(b, a), subtract(c, a));
};

export const triangleArea = (triangle: Triangle): number => length(edgeCross(triangle)) / 2;

/**
 * Unit normal from the vertex winding. Edges are rescaled before the cross
 * product so large coordinates do not overflow; the result is NaN when an
 * edge itself overflows and zero when the edges underflow to parallel.
 */
export const geometricNormal = (triangle: Triangle): Vec3 => {
  const [a, b, c] = triangle.vertices;
  return normalize(cross(reduceToUnitMax(subtract(b, a)), reduceToUnitMax(subtract(c, a))));
};

/**
 * Inspect one triangle: reject non-finite input, flag degenerate area and
 * replace missing or inverted normals with the geometric one.
 */
export const validateTriangle = (
  triangle: Triangle,
  index: number,
  location: SourceLocation,
  thresholds: GeometryThresholds
): TriangleOutcome => {
  const components = validateTriangleComponents(triangle);
  if (!components.ok) {
    return {
      status: 'rejected',
      error: malformedAt(
        location,
        `Triangle ${index}: non-finite ${components.error.path ?? 'component'} (${components.error.message})`
      ),
    };
  }

  const warnings: MeshWarning[] = [];
  const area = triangleArea(triangle);
  const geometric = geometricNormal(triangle);
  let accepted = triangle;

  if (area < thresholds.degenerateAreaEpsilon) {
    warnings.push({
      index,
      kind: 'DegenerateGeometry',
      detail: `Triangle area ${area} is below ${thresholds.degenerateAreaEpsilon}`,
    });
  } else if (!isFiniteVec3(geometric) || length(geometric) === 0) {
    warnings.push({
      index,
      kind: 'DegenerateGeometry',
      detail: 'Triangle normal cannot be derived from its vertices',
    });
  } else {
    const supplied = triangle.normal;
    const magnitude = length(supplied);
    if (magnitude < thresholds.normalEpsilon || dot(supplied, geometric) < 0) {
      accepted = { normal: geometric, vertices: triangle.vertices };
      warnings.push({
        index,
        kind: 'NormalRecomputed',
        detail:
          magnitude < thresholds.normalEpsilon
            ? `Supplied normal has magnitude ${magnitude}`
            : 'Supplied normal points against the vertex winding',
      });
    }
  }

  return warnings.length === 0
    ? { status: 'accepted', triangle: accepted }
    : { status: 'accepted-with-warnings', triangle: accepted, warnings };
};

export type TriangleValidator = {
  readonly inspect: (sourced: SourcedTriangle) => TriangleOutcome;
  readonly produced: () => number;
  /**
   * Confirm the number of inspected triangles against the count the parser
   * committed to, when it declared one.
   */
  readonly confirmCount: (declaredCount: number | undefined) => Result<number, ParseError>;
};

export const createTriangleValidator = (thresholds: GeometryThresholds): TriangleValidator => {
  let count = 0;

  return {
    inspect: (sourced) => {
      const outcome = validateTriangle(sourced.triangle, count, sourced.location, thresholds);
      count += 1;
      return outcome;
    },
    produced: () => count,
    confirmCount: (declaredCount) => {
      if (declaredCount !== undefined && declaredCount !== count) {
        return Err({
          kind: 'InternalInconsistency',
          declared: declaredCount,
          produced: count,
          detail: `Parser declared ${declaredCount} triangles but produced ${count}`,
        });
      }
      return Ok(count);
    },
  };
};
