import type { Color, Fill, Gradient, LineCap, LineJoin, Paint, Stroke } from '../types';

export const TRANSPARENT: Color = { r: 0, g: 0, b: 0, a: 0 };

export function rgba(r: number, g: number, b: number, a = 1): Color {
  return { r, g, b, a };
}

/**
 * Parse `#rgb`, `#rrggbb` or `#rrggbbaa`. Returns null for anything else.
 */
export function hexColor(hex: string): Color | null {
  const m = /^#([0-9a-f]{3}|[0-9a-f]{6}|[0-9a-f]{8})$/i.exec(hex.trim());
  const digits = m?.[1];
  if (!digits) return null;
  const full =
    digits.length === 3
      ? digits
          .split('')
          .map((c) => c + c)
          .join('')
      : digits;
  const channel = (i: number) => parseInt(full.slice(i, i + 2), 16) / 255;
  return rgba(channel(0), channel(2), channel(4), full.length === 8 ? channel(6) : 1);
}

export function colorPaint(color: Color): Paint {
  return { kind: 'color', color };
}

export function gradientPaint(gradient: Gradient): Paint {
  return { kind: 'gradient', gradient };
}

export function fill(paint: Paint | Color): Fill {
  return { paint: 'kind' in paint ? paint : colorPaint(paint) };
}

export type StrokeOptions = {
  width?: number;
  lineCap?: LineCap;
  lineJoin?: LineJoin;
  miterLimit?: number;
};

export function stroke(paint: Paint | Color, options: StrokeOptions = {}): Stroke {
  return {
    paint: 'kind' in paint ? paint : colorPaint(paint),
    width: options.width ?? 1,
    lineCap: options.lineCap ?? 'butt',
    lineJoin: options.lineJoin ?? 'miter',
    miterLimit: options.miterLimit ?? 10,
  };
}

/** Solid color of a paint; gradients have none. */
export function paintColor(paint: Paint): Color | null {
  return paint.kind === 'color' ? paint.color : null;
}

export function withAlpha(color: Color, factor: number): Color {
  return { ...color, a: color.a * factor };
}
