import type { Matrix, Transform } from '../types';
import { IDENTITY, multiply } from './coords';

export function noTransform(): Transform {
  return { matrix: null, absolute: false, global: null };
}

export function localTransform(matrix: Matrix): Transform {
  return { matrix, absolute: false, global: null };
}

/** Placed by `matrix` alone, ignoring every ancestor transform. */
export function absoluteTransform(matrix: Matrix = IDENTITY): Transform {
  return { matrix, absolute: true, global: null };
}

/** Same declaration with an empty cache. */
export function cloneTransform(t: Transform): Transform {
  return { matrix: t.matrix, absolute: t.absolute, global: null };
}

/** A transform with no matrix that is not absolute is the identity element. */
export function isTransformSet(t: Transform): boolean {
  return t.matrix !== null || t.absolute;
}

export function localMatrix(t: Transform): Matrix {
  return t.matrix ?? IDENTITY;
}

/**
 * Global matrix for a node under `parentGlobal`, cached on the transform for the composition pass.
 */
export function composeGlobal(t: Transform, parentGlobal: Matrix): Matrix {
  let global: Matrix;
  if (t.absolute) {
    global = localMatrix(t);
  } else if (t.matrix === null) {
    global = parentGlobal;
  } else {
    global = multiply(parentGlobal, t.matrix);
  }
  t.global = global;
  return global;
}

/** Cached global matrix, or the local one when no layout pass has run yet. */
export function resolvedMatrix(t: Transform): Matrix | null {
  if (t.global) return t.global;
  return isTransformSet(t) ? localMatrix(t) : null;
}
