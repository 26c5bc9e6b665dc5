/**
 * Immutable triangle-mesh data types
 * All types are readonly to ensure immutability
 */

export interface Vec3 {
  readonly x: number;
  readonly y: number;
  readonly z: number;
}

export type TriangleVertices = readonly [Vec3, Vec3, Vec3];

export interface Triangle {
  readonly normal: Vec3;
  readonly vertices: TriangleVertices;
}

export interface BoundingBox {
  readonly min: Vec3;
  readonly max: Vec3;
}

/**
 * Registered format identifier, e.g. `stl-ascii`.
 * Kept open so new parsers can register without touching this type.
 */
export type FormatTag = string;

export const FORMATS = {
  stlAscii: 'stl-ascii',
  stlBinary: 'stl-binary',
} as const;

/**
 * Where a triangle (or a failure) came from in the source
 */
export type SourceLocation =
  | { readonly kind: 'line'; readonly line: number }
  | { readonly kind: 'offset'; readonly offset: number };

export interface SourcedTriangle {
  readonly triangle: Triangle;
  readonly location: SourceLocation;
}

export type WarningKind = 'DegenerateGeometry' | 'NormalRecomputed' | 'TriangleCountMismatch';

/** Index of warnings that concern the whole file rather than one triangle */
export const MESH_LEVEL_INDEX = -1;

export interface MeshWarning {
  /** Triangle index, or MESH_LEVEL_INDEX */
  readonly index: number;
  readonly kind: WarningKind;
  readonly detail: string;
}

export interface Mesh {
  /** File base name the mesh was read from */
  readonly name: string;
  /** ASCII solid name or binary header text */
  readonly label: string;
  readonly format: FormatTag;
  readonly triangles: readonly Triangle[];
  readonly triangleCount: number;
  /** Undefined while the mesh has no triangles */
  readonly bounds: BoundingBox | undefined;
  readonly warnings: readonly MeshWarning[];
  readonly byteLength: number;
}

export interface MeshSummary {
  readonly name: string;
  readonly label: string;
  readonly format: FormatTag;
  readonly triangleCount: number;
  readonly vertexCount: number;
  readonly bounds: BoundingBox | undefined;
  readonly size: Vec3;
  readonly center: Vec3;
  readonly maxDimension: number;
  readonly warningCount: number;
  readonly hasWarnings: boolean;
  readonly byteLength: number;
}

/**
 * Pure functions for creating immutable structures
 */
export const createVec3 = (x: number, y: number, z: number): Vec3 => ({
  x,
  y,
  z,
});

export const createTriangle = (normal: Vec3, a: Vec3, b: Vec3, c: Vec3): Triangle => ({
  normal,
  vertices: [a, b, c],
});

export const ZERO_VEC3: Vec3 = createVec3(0, 0, 0);
