export type NodeId = string;

export type Point = { x: number; y: number };

/**
 * A length that is either fixed, relative to the parent bound, or derived from the children.
 * The declared kind never changes; `value` caches the scalar resolved in the current layout pass.
 */
export type Dimension =
  | { kind: 'absolute'; value: number }
  | { kind: 'percent'; percent: number; value: number; resolved: boolean }
  | { kind: 'auto'; value: number; resolved: boolean };

/** 2D affine matrix `[a, b, c, d, e, f]`: x' = a*x + c*y + e, y' = b*x + d*y + f. */
export type Matrix = readonly [number, number, number, number, number, number];

export type Transform = {
  /** Local matrix; null means "no own transform". */
  matrix: Matrix | null;
  /** Ignore ancestor transforms when composing. */
  absolute: boolean;
  /** Global matrix cached by the last layout pass. */
  global: Matrix | null;
};

export type BoundingBox = {
  minX: number;
  minY: number;
  maxX: number;
  maxY: number;
};

export type Padding = {
  left: Dimension;
  right: Dimension;
  top: Dimension;
  bottom: Dimension;
};

export type Clip =
  | { kind: 'none' }
  | {
      kind: 'scissor';
      x: Dimension;
      y: Dimension;
      width: Dimension;
      height: Dimension;
      transform: Transform;
    };

/** Color channels are floats in 0..1. */
export type Color = { r: number; g: number; b: number; a: number };

export type Gradient =
  | { type: 'linear'; start: Point; end: Point; startColor: Color; endColor: Color }
  | {
      type: 'box';
      position: Point;
      size: { width: number; height: number };
      radius: number;
      feather: number;
      startColor: Color;
      endColor: Color;
    }
  | {
      type: 'radial';
      center: Point;
      innerRadius: number;
      outerRadius: number;
      startColor: Color;
      endColor: Color;
    };

export type Paint = { kind: 'color'; color: Color } | { kind: 'gradient'; gradient: Gradient };

export type LineCap = 'butt' | 'round' | 'square';
export type LineJoin = 'miter' | 'round' | 'bevel';

export type Stroke = {
  paint: Paint;
  width: number;
  lineCap: LineCap;
  lineJoin: LineJoin;
  miterLimit: number;
};

export type Fill = { paint: Paint };

export type PathCommand =
  | { type: 'move'; x: number; y: number }
  | { type: 'moveRel'; x: number; y: number }
  | { type: 'line'; x: number; y: number }
  | { type: 'lineRel'; x: number; y: number }
  | { type: 'lineAlongX'; x: number }
  | { type: 'lineAlongXRel'; x: number }
  | { type: 'lineAlongY'; y: number }
  | { type: 'lineAlongYRel'; y: number }
  | { type: 'close' }
  | { type: 'bezCtrl'; x: number; y: number }
  | { type: 'bezCtrlRel'; x: number; y: number }
  | { type: 'quadBezTo'; x: number; y: number }
  | { type: 'quadBezToRel'; x: number; y: number }
  | { type: 'cubBezTo'; x: number; y: number }
  | { type: 'cubBezToRel'; x: number; y: number };

export type AlignHorizontal = 'left' | 'center' | 'right';
export type AlignVertical = 'top' | 'middle' | 'baseline' | 'bottom';
export type TextAlign = readonly [AlignHorizontal, AlignVertical];

export type TextMetrics = { ascender: number; descender: number; lineHeight: number };

/** Horizontal extent of one shaped glyph, in the coordinate space of the text position. */
export type GlyphPosition = { x: number; minX: number; maxX: number };

export type RectNode = {
  kind: 'rect';
  id?: NodeId;
  x: Dimension;
  y: Dimension;
  width: Dimension;
  height: Dimension;
  padding: Padding;
  fill: Fill | null;
  stroke: Stroke | null;
  clip: Clip;
  transform: Transform;
  /** 0 is opaque, 1 is invisible. */
  transparency: number;
  children: ShapeNode[];
};

export type CircleNode = {
  kind: 'circle';
  id?: NodeId;
  cx: Dimension;
  cy: Dimension;
  r: Dimension;
  padding: Padding;
  fill: Fill | null;
  stroke: Stroke | null;
  clip: Clip;
  transform: Transform;
  transparency: number;
  children: ShapeNode[];
};

export type PathNode = {
  kind: 'path';
  id?: NodeId;
  commands: PathCommand[];
  fill: Fill | null;
  stroke: Stroke | null;
  clip: Clip;
  transform: Transform;
  transparency: number;
  children: ShapeNode[];
};

/** Carries no geometry: its set fields become defaults for the descendants. */
export type GroupNode = {
  kind: 'group';
  id?: NodeId;
  transparency: number | null;
  fill: Fill | null;
  stroke: Stroke | null;
  clip: Clip;
  transform: Transform;
  children: ShapeNode[];
};

export type TextNode = {
  kind: 'text';
  id?: NodeId;
  x: Dimension;
  y: Dimension;
  fontName: string;
  fontSize: Dimension;
  align: TextAlign;
  content: string;
  fill: Fill | null;
  clip: Clip;
  transform: Transform;
  transparency: number;
  /** Filled in by layout. */
  metrics: TextMetrics | null;
  /** Filled in by layout, one entry per character of `content`. */
  glyphPositions: GlyphPosition[];
  children: ShapeNode[];
};

/** Bare text run. Reserved: both passes leave it alone. */
export type WordNode = {
  kind: 'word';
  id?: NodeId;
  content: string;
  children: ShapeNode[];
};

export type ShapeNode = RectNode | CircleNode | PathNode | GroupNode | TextNode | WordNode;

export type ShapeKind = ShapeNode['kind'];

export type Viewport = { width: number; height: number; devicePixelRatio: number };
