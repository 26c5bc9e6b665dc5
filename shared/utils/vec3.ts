/**
 * Vector arithmetic on immutable Vec3 values
 */

import type { Vec3 } from '../types/mesh';
import { createVec3 } from '../types/mesh';

export const add = (a: Vec3, b: Vec3): Vec3 => createVec3(a.x + b.x, a.y + b.y, a.z + b.z);

export const subtract = (a: Vec3, b: Vec3): Vec3 => createVec3(a.x - b.x, a.y - b.y, a.z - b.z);

export const scale = (v: Vec3, factor: number): Vec3 =>
  createVec3(v.x * factor, v.y * factor, v.z * factor);

export const dot = (a: Vec3, b: Vec3): number => a.x * b.x + a.y * b.y + a.z * b.z;

export const cross = (a: Vec3, b: Vec3): Vec3 =>
  createVec3(a.y * b.z - a.z * b.y, a.z * b.x - a.x * b.z, a.x * b.y - a.y * b.x);

export const length = (v: Vec3): number => Math.sqrt(dot(v, v));

/**
 * Unit vector in the direction of v; the zero vector stays zero
 */
export const normalize = (v: Vec3): Vec3 => {
  const len = length(v);
  return len === 0 ? v : scale(v, 1 / len);
};

/**
 * v divided by its largest absolute component, so products of the result
 * cannot overflow; the zero vector stays zero
 */
export const reduceToUnitMax = (v: Vec3): Vec3 => {
  const largest = Math.max(Math.abs(v.x), Math.abs(v.y), Math.abs(v.z));
  return largest === 0 ? v : createVec3(v.x / largest, v.y / largest, v.z / largest);
};

export const isFiniteVec3 = (v: Vec3): boolean =>
  Number.isFinite(v.x) && Number.isFinite(v.y) && Number.isFinite(v.z);
