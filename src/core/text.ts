import type { GlyphPosition, Point, TextMetrics } from '../types';
import { FontNotFoundError } from './errors';

export type ShapeTextRequest = {
  fontName: string;
  fontSize: number;
  content: string;
  position: Point;
};

export type ShapedText = {
  metrics: TextMetrics;
  /** One entry per character, in the coordinate space of `position`. */
  glyphs: GlyphPosition[];
};

/**
 * Text metrics and glyph placement, supplied by whatever renders the text.
 * Must throw FontNotFoundError when `fontName` is not registered.
 */
export type TextShaper = {
  shape: (request: ShapeTextRequest) => ShapedText;
};

/**
 * Font description in em units: every value is multiplied by the font size.
 */
export type FontFace = {
  ascender: number;
  descender: number;
  lineHeight: number;
  /** Advance for characters missing from `advances`. */
  defaultAdvance: number;
  advances?: Record<string, number>;
};

/**
 * In-process shaper over registered font faces. Glyphs are laid out left to right
 * from the position with no kerning; each glyph spans its full advance.
 */
export class FontRegistry implements TextShaper {
  private readonly faces = new Map<string, FontFace>();

  registerFont(name: string, face: FontFace): void {
    this.faces.set(name, face);
  }

  hasFont(name: string): boolean {
    return this.faces.has(name);
  }

  fontNames(): string[] {
    return [...this.faces.keys()];
  }

  shape({ fontName, fontSize, content, position }: ShapeTextRequest): ShapedText {
    const face = this.faces.get(fontName);
    if (!face) throw new FontNotFoundError(fontName);

    const glyphs: GlyphPosition[] = [];
    let x = position.x;
    for (const ch of content) {
      const advance = (face.advances?.[ch] ?? face.defaultAdvance) * fontSize;
      glyphs.push({ x, minX: x, maxX: x + advance });
      x += advance;
    }
    return {
      metrics: {
        ascender: face.ascender * fontSize,
        descender: face.descender * fontSize,
        lineHeight: face.lineHeight * fontSize,
      },
      glyphs,
    };
  }
}

/** Monospaced face with half-em advances; handy default when exact metrics do not matter. */
export const MONOSPACE_FACE: FontFace = {
  ascender: 0.8,
  descender: -0.2,
  lineHeight: 1.2,
  defaultAdvance: 0.5,
};
