import type { BoundingBox, Matrix, Point } from '../types';
import { transformPoint } from './coords';

export function bbox(minX = 0, minY = 0, maxX = 0, maxY = 0): BoundingBox {
  return { minX, minY, maxX, maxY };
}

export function emptyBounds(): BoundingBox {
  return bbox();
}

export function boundsWidth(b: BoundingBox): number {
  return b.maxX - b.minX;
}

export function boundsHeight(b: BoundingBox): number {
  return b.maxY - b.minY;
}

/** Componentwise min/max. The union of nothing is the empty box at the origin. */
export function unionBounds(boxes: readonly BoundingBox[]): BoundingBox {
  const [first, ...rest] = boxes;
  if (!first) return emptyBounds();
  const out = { ...first };
  for (const b of rest) {
    if (b.minX < out.minX) out.minX = b.minX;
    if (b.minY < out.minY) out.minY = b.minY;
    if (b.maxX > out.maxX) out.maxX = b.maxX;
    if (b.maxY > out.maxY) out.maxY = b.maxY;
  }
  return out;
}

export function boundsOfPoints(points: readonly Point[]): BoundingBox {
  const [first, ...rest] = points;
  if (!first) return emptyBounds();
  const out = bbox(first.x, first.y, first.x, first.y);
  for (const p of rest) {
    out.minX = Math.min(out.minX, p.x);
    out.minY = Math.min(out.minY, p.y);
    out.maxX = Math.max(out.maxX, p.x);
    out.maxY = Math.max(out.maxY, p.y);
  }
  return out;
}

/** All four corners mapped, in the order (min,min), (min,max), (max,min), (max,max). */
export function boundsCorners(m: Matrix, b: BoundingBox): [Point, Point, Point, Point] {
  return [
    transformPoint(m, { x: b.minX, y: b.minY }),
    transformPoint(m, { x: b.minX, y: b.maxY }),
    transformPoint(m, { x: b.maxX, y: b.minY }),
    transformPoint(m, { x: b.maxX, y: b.maxY }),
  ];
}

/** Axis-aligned box around the mapped corners; rotation can swap which corner is the minimum. */
export function transformBounds(m: Matrix, b: BoundingBox): BoundingBox {
  return boundsOfPoints(boundsCorners(m, b));
}
