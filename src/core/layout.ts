// Layout pass: resolves percent/auto geometry top-down, aggregates child bounds bottom-up,
// and caches global transforms. Mutates the tree in place.

import type {
  BoundingBox,
  CircleNode,
  Dimension,
  Matrix,
  RectNode,
  ShapeNode,
  TextNode,
} from '../types';
import { bbox, boundsCorners, boundsHeight, boundsOfPoints, boundsWidth, unionBounds } from './bounds';
import { resolveClip } from './clip';
import { DEFAULT_CONFIG, type EngineConfig } from './config';
import { IDENTITY, translateAdd } from './coords';
import {
  horizontalPadding,
  resetDimension,
  resetPadding,
  resolveAuto,
  resolvePaddingPercent,
  resolvePercent,
  verticalPadding,
} from './dimension';
import { ErrorCollector, FontNotFoundError, type SceneError } from './errors';
import { getLogger } from './logger';
import { unknownKind } from './shapes';
import type { ShapedText, TextShaper } from './text';
import { composeGlobal, localMatrix } from './transform';

const logger = getLogger('LayoutResolver');

export type LayoutOptions = {
  shaper: TextShaper;
  config?: Pick<EngineConfig, 'failFast' | 'slowPassMs'>;
};

export type LayoutResult = {
  /** Bound of the root node. */
  bound: BoundingBox;
  errors: SceneError[];
};

type LayoutContext = {
  shaper: TextShaper;
  errors: ErrorCollector;
};

/**
 * Resolve the whole tree against `viewport` (the root's parent bound).
 * Safe to call again after the viewport or tree changes: every pass recomputes from the declared values.
 */
export function layoutTree(root: ShapeNode, viewport: BoundingBox, options: LayoutOptions): LayoutResult {
  const config = options.config ?? DEFAULT_CONFIG;
  const ctx: LayoutContext = { shaper: options.shaper, errors: new ErrorCollector(config.failFast) };

  const started = performance.now();
  const bound = layoutNode(root, viewport, IDENTITY, ctx);
  const elapsed = performance.now() - started;

  if (elapsed > config.slowPassMs) {
    logger.warn(`Slow layout pass: ${elapsed.toFixed(2)}ms`, { root: root.id ?? root.kind });
  } else {
    logger.debug('Layout pass done', { elapsedMs: elapsed, bound });
  }
  if (ctx.errors.errors.length > 0) {
    logger.warn(`Layout pass finished with ${ctx.errors.errors.length} error(s)`, {
      codes: ctx.errors.errors.map((e) => e.code),
    });
  }
  return { bound, errors: ctx.errors.errors };
}

/** Enter (resolve), recurse, combine on return. Returns the node's final bound. */
function layoutNode(node: ShapeNode, parentBound: BoundingBox, parentGlobal: Matrix, ctx: LayoutContext): BoundingBox {
  let bound = parentBound;
  let childGlobal = parentGlobal;

  switch (node.kind) {
    case 'rect': {
      const global = resolveRect(node, parentBound, parentGlobal);
      childGlobal = translateAdd(global, node.padding.left.value, node.padding.top.value);
      bound = rectBound(node);
      break;
    }
    case 'circle': {
      const global = resolveCircle(node, parentBound, parentGlobal);
      childGlobal = translateAdd(global, node.padding.left.value, node.padding.top.value);
      bound = circleBound(node);
      break;
    }
    case 'text':
      childGlobal = resolveText(node, parentBound, parentGlobal);
      bound = shapeText(node, ctx);
      break;
    case 'path':
    case 'group':
      resolveClip(node.clip, parentBound, parentGlobal);
      childGlobal = composeGlobal(node.transform, parentGlobal);
      break;
    case 'word':
      break;
    default:
      return unknownKind(node);
  }

  const inner = unionBounds(node.children.map((child) => layoutNode(child, bound, childGlobal, ctx)));

  switch (node.kind) {
    case 'rect':
      autoSizeRect(node, inner);
      return rectBound(node);
    case 'circle':
      autoSizeCircle(node, inner);
      return circleBound(node);
    case 'text': {
      const m = localMatrix(node.transform);
      return boundsOfPoints([...boundsCorners(m, bound), ...boundsCorners(m, inner)]);
    }
    case 'group':
      return inner;
    case 'path':
    case 'word':
      return bound;
    default:
      return unknownKind(node);
  }
}

/** Resolve x/y, adding the parent origin only on the call that turned a percent into a length. */
function resolvePosition(x: Dimension, y: Dimension, parentBound: BoundingBox): void {
  if (resolvePercent(x, boundsWidth(parentBound))) x.value += parentBound.minX;
  if (resolvePercent(y, boundsHeight(parentBound))) y.value += parentBound.minY;
}

function resolveRect(rect: RectNode, parentBound: BoundingBox, parentGlobal: Matrix): Matrix {
  for (const d of [rect.x, rect.y, rect.width, rect.height]) resetDimension(d);
  resetPadding(rect.padding);

  resolvePosition(rect.x, rect.y, parentBound);
  resolvePercent(rect.width, boundsWidth(parentBound));
  resolvePercent(rect.height, boundsHeight(parentBound));
  resolvePaddingPercent(rect.padding, parentBound);
  resolveClip(rect.clip, parentBound, parentGlobal);
  return composeGlobal(rect.transform, parentGlobal);
}

function resolveCircle(circle: CircleNode, parentBound: BoundingBox, parentGlobal: Matrix): Matrix {
  for (const d of [circle.cx, circle.cy, circle.r]) resetDimension(d);
  resetPadding(circle.padding);

  resolvePosition(circle.cx, circle.cy, parentBound);
  resolvePercent(circle.r, Math.min(boundsWidth(parentBound), boundsHeight(parentBound)));
  resolvePaddingPercent(circle.padding, parentBound);
  resolveClip(circle.clip, parentBound, parentGlobal);
  return composeGlobal(circle.transform, parentGlobal);
}

function resolveText(text: TextNode, parentBound: BoundingBox, parentGlobal: Matrix): Matrix {
  for (const d of [text.x, text.y, text.fontSize]) resetDimension(d);

  resolvePosition(text.x, text.y, parentBound);
  resolvePercent(text.fontSize, boundsHeight(parentBound));
  resolveClip(text.clip, parentBound, parentGlobal);
  return composeGlobal(text.transform, parentGlobal);
}

/**
 * Ask the shaper for metrics and glyph extents and derive the text's own bound.
 * A missing font is reported and leaves the text with no metrics and a collapsed bound.
 */
function shapeText(text: TextNode, ctx: LayoutContext): BoundingBox {
  const x = text.x.value;
  const y = text.y.value;
  let shaped: ShapedText;
  try {
    shaped = ctx.shaper.shape({
      fontName: text.fontName,
      fontSize: text.fontSize.value,
      content: text.content,
      position: { x, y },
    });
  } catch (error) {
    if (!(error instanceof FontNotFoundError)) throw error;
    text.metrics = null;
    text.glyphPositions = [];
    ctx.errors.report(error, text.id);
    return bbox(x, y, x, y);
  }

  text.metrics = shaped.metrics;
  text.glyphPositions = shaped.glyphs;
  const last = shaped.glyphs[shaped.glyphs.length - 1];
  return bbox(x, y, last ? last.maxX : x, y + shaped.metrics.lineHeight);
}

function rectBound(rect: RectNode): BoundingBox {
  const x = rect.x.value;
  const y = rect.y.value;
  return bbox(x, y, x + rect.width.value, y + rect.height.value);
}

function circleBound(circle: CircleNode): BoundingBox {
  const { value: cx } = circle.cx;
  const { value: cy } = circle.cy;
  const { value: r } = circle.r;
  return bbox(cx - r, cy - r, cx + r, cy + r);
}

/** Auto fields wrap the children's bound grown outward by the padding. */
function autoSizeRect(rect: RectNode, inner: BoundingBox): void {
  const p = rect.padding;
  resolveAuto(rect.x, inner.minX - p.left.value);
  resolveAuto(rect.y, inner.minY - p.top.value);
  resolveAuto(rect.width, inner.maxX + p.right.value - rect.x.value);
  resolveAuto(rect.height, inner.maxY + p.bottom.value - rect.y.value);
}

function autoSizeCircle(circle: CircleNode, inner: BoundingBox): void {
  const p = circle.padding;
  const w = boundsWidth(inner);
  const h = boundsHeight(inner);
  resolveAuto(circle.cx, inner.minX + w / 2 + p.left.value);
  resolveAuto(circle.cy, inner.minY + h / 2 + p.top.value);
  resolveAuto(circle.r, Math.max(w + horizontalPadding(p), h + verticalPadding(p)) / 2);
}
