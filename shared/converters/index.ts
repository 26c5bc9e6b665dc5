/**
 * Format converters
 * All converters are pure functions that transform a Mesh to an on-disk format
 */

import type { Mesh } from '../types/mesh';
import type { Result } from '../utils/result';
import type { ConvertError } from './stl';
import { convertMeshToAsciiSTL, convertMeshToBinarySTL } from './stl';

export type { ConvertError } from './stl';
export { convertMeshToAsciiSTL, convertMeshToBinarySTL } from './stl';

export type StlVariant = 'ascii' | 'binary';

/**
 * Convert a Mesh to the requested STL variant
 */
export const convertToSTL = (
  mesh: Mesh,
  variant: StlVariant
): Result<string | Uint8Array, ConvertError> =>
  variant === 'ascii' ? convertMeshToAsciiSTL(mesh) : convertMeshToBinarySTL(mesh);
