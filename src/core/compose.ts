// Composition pass: walks a laid-out tree in document order and emits draw commands.
// Reads the tree only; all geometry must already be resolved by layoutTree.

import type {
  CircleNode,
  Color,
  Fill,
  GlyphPosition,
  Matrix,
  NodeId,
  PathNode,
  RectNode,
  ShapeNode,
  Stroke,
  TextAlign,
  TextMetrics,
  TextNode,
} from '../types';
import { enterGroup, effectiveAlpha, rootDefaults, type StyleDefaults } from './cascade';
import { clipOr, clipRect, type ClipRect } from './clip';
import { DEFAULT_CONFIG, type EngineConfig } from './config';
import { ErrorCollector, UnsupportedPathCommandError, type SceneError } from './errors';
import { getLogger } from './logger';
import { TRANSPARENT, paintColor, withAlpha } from './paint';
import { interpretPath, type PathSegment } from './path';
import { unknownKind } from './shapes';
import { resolvedMatrix } from './transform';

const logger = getLogger('CompositionEmitter');

export type PathGeometry =
  | { type: 'rect'; x: number; y: number; width: number; height: number }
  | { type: 'circle'; cx: number; cy: number; r: number }
  | { type: 'segments'; segments: PathSegment[] };

/** Fill first, then stroke; either may be absent. */
export type PathDrawCommand = {
  kind: 'path';
  nodeId?: NodeId;
  geometry: PathGeometry;
  fill: Fill | null;
  stroke: Stroke | null;
  alpha: number;
  clip: ClipRect | null;
  transform: Matrix | null;
};

export type TextDrawCommand = {
  kind: 'text';
  nodeId?: NodeId;
  x: number;
  y: number;
  content: string;
  fontName: string;
  fontSize: number;
  /** Fill color with the node and inherited transparency folded into its alpha. */
  color: Color;
  align: TextAlign;
  clip: ClipRect | null;
  transform: Matrix | null;
  metrics: TextMetrics;
  glyphs: readonly GlyphPosition[];
};

export type DrawCommand = PathDrawCommand | TextDrawCommand;

export type ComposeOptions = {
  config?: Pick<EngineConfig, 'cascade' | 'failFast' | 'slowPassMs'>;
};

export type ComposeResult = {
  commands: DrawCommand[];
  errors: SceneError[];
};

type ComposeContext = {
  config: Pick<EngineConfig, 'cascade' | 'failFast' | 'slowPassMs'>;
  commands: DrawCommand[];
  errors: ErrorCollector;
};

export function composeTree(root: ShapeNode, options: ComposeOptions = {}): ComposeResult {
  const config = options.config ?? DEFAULT_CONFIG;
  const ctx: ComposeContext = { config, commands: [], errors: new ErrorCollector(config.failFast) };

  const started = performance.now();
  composeNode(root, rootDefaults(), ctx);
  const elapsed = performance.now() - started;

  if (elapsed > config.slowPassMs) {
    logger.warn(`Slow composition pass: ${elapsed.toFixed(2)}ms`, { commands: ctx.commands.length });
  } else {
    logger.debug('Composition pass done', { elapsedMs: elapsed, commands: ctx.commands.length });
  }
  if (ctx.errors.errors.length > 0) {
    logger.warn(`Composition pass finished with ${ctx.errors.errors.length} error(s)`, {
      codes: ctx.errors.errors.map((e) => e.code),
    });
  }
  return { commands: ctx.commands, errors: ctx.errors.errors };
}

function composeNode(node: ShapeNode, defaults: StyleDefaults, ctx: ComposeContext): void {
  let inner = defaults;

  switch (node.kind) {
    case 'rect': {
      const { x, y, width, height } = node;
      emitPath(node, { type: 'rect', x: x.value, y: y.value, width: width.value, height: height.value }, defaults, ctx);
      break;
    }
    case 'circle':
      emitPath(node, { type: 'circle', cx: node.cx.value, cy: node.cy.value, r: node.r.value }, defaults, ctx);
      break;
    case 'path': {
      let segments: PathSegment[];
      try {
        segments = interpretPath(node.commands);
      } catch (error) {
        if (!(error instanceof UnsupportedPathCommandError)) throw error;
        ctx.errors.report(error, node.id);
        break;
      }
      emitPath(node, { type: 'segments', segments }, defaults, ctx);
      break;
    }
    case 'text':
      emitText(node, defaults, ctx);
      break;
    case 'group':
      inner = enterGroup(defaults, node, ctx.config.cascade);
      break;
    case 'word':
      logger.trace('Skipping reserved word node', { id: node.id });
      break;
    default:
      unknownKind(node);
  }

  for (const child of node.children) {
    composeNode(child, inner, ctx);
  }
}

/** One command per geometric node, even when neither fill nor stroke resolves. */
function emitPath(
  node: RectNode | CircleNode | PathNode,
  geometry: PathGeometry,
  defaults: StyleDefaults,
  ctx: ComposeContext,
): void {
  ctx.commands.push({
    kind: 'path',
    nodeId: node.id,
    geometry,
    fill: node.fill ?? defaults.fill,
    stroke: node.stroke ?? defaults.stroke,
    alpha: effectiveAlpha(node.transparency, defaults),
    clip: clipRect(clipOr(node.clip, defaults.clip)),
    transform: resolvedMatrix(node.transform),
  });
}

/** Text takes a solid color only; a gradient fill falls back to transparent black. */
function emitText(text: TextNode, defaults: StyleDefaults, ctx: ComposeContext): void {
  if (!text.metrics) {
    logger.debug('Skipping text without metrics', { id: text.id, font: text.fontName });
    return;
  }
  const fill = text.fill ?? defaults.fill;
  const base = (fill && paintColor(fill.paint)) ?? TRANSPARENT;

  ctx.commands.push({
    kind: 'text',
    nodeId: text.id,
    x: text.x.value,
    y: text.y.value,
    content: text.content,
    fontName: text.fontName,
    fontSize: text.fontSize.value,
    color: withAlpha(base, effectiveAlpha(text.transparency, defaults)),
    align: text.align,
    clip: clipRect(clipOr(text.clip, defaults.clip)),
    transform: resolvedMatrix(text.transform),
    metrics: text.metrics,
    glyphs: text.glyphPositions,
  });
}
