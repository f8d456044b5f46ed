import type { BoundingBox, Clip, Dimension, Matrix, Transform } from '../types';
import { cloneDimension, resetDimension, resolvePercent } from './dimension';
import { cloneTransform, composeGlobal, noTransform, resolvedMatrix } from './transform';

export function noClip(): Clip {
  return { kind: 'none' };
}

export function scissor(
  x: Dimension,
  y: Dimension,
  width: Dimension,
  height: Dimension,
  transform: Transform = noTransform(),
): Clip {
  return {
    kind: 'scissor',
    x: cloneDimension(x),
    y: cloneDimension(y),
    width: cloneDimension(width),
    height: cloneDimension(height),
    transform: cloneTransform(transform),
  };
}

export function cloneClip(clip: Clip): Clip {
  return clip.kind === 'none' ? noClip() : scissor(clip.x, clip.y, clip.width, clip.height, clip.transform);
}

export function clipOr(own: Clip, fallback: Clip): Clip {
  return own.kind === 'none' ? fallback : own;
}

/**
 * Percent fields resolve against the bound of the parent the clip is declared under.
 * The scissor's own transform is composed under the same parent matrix.
 */
export function resolveClip(clip: Clip, parent: BoundingBox, parentGlobal: Matrix): void {
  if (clip.kind !== 'scissor') return;
  resetDimension(clip.x);
  resetDimension(clip.y);
  resetDimension(clip.width);
  resetDimension(clip.height);
  const w = parent.maxX - parent.minX;
  const h = parent.maxY - parent.minY;
  resolvePercent(clip.x, w);
  resolvePercent(clip.y, h);
  resolvePercent(clip.width, w);
  resolvePercent(clip.height, h);
  composeGlobal(clip.transform, parentGlobal);
}

/** Scissor rectangle in resolved coordinates, as handed to a renderer. */
export type ClipRect = {
  x: number;
  y: number;
  width: number;
  height: number;
  transform: Matrix | null;
};

export function clipRect(clip: Clip): ClipRect | null {
  if (clip.kind === 'none') return null;
  return {
    x: clip.x.value,
    y: clip.y.value,
    width: clip.width.value,
    height: clip.height.value,
    transform: resolvedMatrix(clip.transform),
  };
}
