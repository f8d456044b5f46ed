import type { BoundingBox, Dimension, Padding } from '../types';

export function abs(value: number): Dimension {
  return { kind: 'absolute', value };
}

export function pct(percent: number): Dimension {
  return { kind: 'percent', percent, value: 0, resolved: false };
}

export function auto(): Dimension {
  return { kind: 'auto', value: 0, resolved: false };
}

/** Copy with its own per-pass state, so layout never writes into a caller's value. */
export function cloneDimension(d: Dimension): Dimension {
  return { ...d };
}

/** Current scalar. Pending percent/auto values read as 0 before their first resolution. */
export function val(d: Dimension): number {
  return d.value;
}

/**
 * Resolve a pending percent against `base`.
 * Returns true only on the call that resolved it, so callers can add an origin offset exactly once.
 */
export function resolvePercent(d: Dimension, base: number): boolean {
  if (d.kind !== 'percent' || d.resolved) return false;
  d.value = (d.percent / 100) * base;
  d.resolved = true;
  return true;
}

/** Resolve a pending auto value. No-op for every other state. */
export function resolveAuto(d: Dimension, value: number): void {
  if (d.kind !== 'auto' || d.resolved) return;
  d.value = value;
  d.resolved = true;
}

/**
 * Mark percent/auto as pending again so the next pass recomputes them.
 * Auto lengths read as 0 until the children have been measured.
 */
export function resetDimension(d: Dimension): void {
  if (d.kind === 'absolute') return;
  d.resolved = false;
  if (d.kind === 'auto') d.value = 0;
}

export function isPending(d: Dimension): boolean {
  return d.kind !== 'absolute' && !d.resolved;
}

// --- Padding ---

export function padding(left: Dimension, right: Dimension, top: Dimension, bottom: Dimension): Padding {
  return { left, right, top, bottom };
}

export function paddingAll(value: number): Padding {
  return padding(abs(value), abs(value), abs(value), abs(value));
}

export function noPadding(): Padding {
  return paddingAll(0);
}

export function clonePadding(p: Padding): Padding {
  return padding(cloneDimension(p.left), cloneDimension(p.right), cloneDimension(p.top), cloneDimension(p.bottom));
}

export function resetPadding(p: Padding): void {
  resetDimension(p.left);
  resetDimension(p.right);
  resetDimension(p.top);
  resetDimension(p.bottom);
}

/** Left/right resolve against the parent width, top/bottom against its height. */
export function resolvePaddingPercent(p: Padding, parent: BoundingBox): void {
  const w = parent.maxX - parent.minX;
  const h = parent.maxY - parent.minY;
  resolvePercent(p.left, w);
  resolvePercent(p.right, w);
  resolvePercent(p.top, h);
  resolvePercent(p.bottom, h);
}

export function horizontalPadding(p: Padding): number {
  return p.left.value + p.right.value;
}

export function verticalPadding(p: Padding): number {
  return p.top.value + p.bottom.value;
}
