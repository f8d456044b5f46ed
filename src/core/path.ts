import type { PathCommand, Point } from '../types';
import { UnsupportedPathCommandError } from './errors';

/** Absolute path segment, ready for a renderer to tessellate. */
export type PathSegment =
  | { op: 'moveTo'; x: number; y: number }
  | { op: 'lineTo'; x: number; y: number }
  | { op: 'quadTo'; cx: number; cy: number; x: number; y: number }
  | { op: 'cubicTo'; c1x: number; c1y: number; c2x: number; c2y: number; x: number; y: number }
  | { op: 'close' };

export type PathCursorState = {
  cursor: Point;
  /** The two most recently declared bezier control points, oldest first. */
  controls: [Point, Point];
};

export function initialPathState(): PathCursorState {
  return { cursor: { x: 0, y: 0 }, controls: [{ x: 0, y: 0 }, { x: 0, y: 0 }] };
}

/**
 * Apply one command to `state`, returning the segment it draws (null for control points).
 * Throws UnsupportedPathCommandError for a command type outside PathCommand.
 */
export function stepPath(state: PathCursorState, cmd: PathCommand): PathSegment | null {
  const c = state.cursor;
  switch (cmd.type) {
    case 'move':
      state.cursor = { x: cmd.x, y: cmd.y };
      return { op: 'moveTo', ...state.cursor };
    case 'moveRel':
      state.cursor = { x: c.x + cmd.x, y: c.y + cmd.y };
      return { op: 'moveTo', ...state.cursor };
    case 'line':
      state.cursor = { x: cmd.x, y: cmd.y };
      return { op: 'lineTo', ...state.cursor };
    case 'lineRel':
      state.cursor = { x: c.x + cmd.x, y: c.y + cmd.y };
      return { op: 'lineTo', ...state.cursor };
    case 'lineAlongX':
      state.cursor = { x: cmd.x, y: c.y };
      return { op: 'lineTo', ...state.cursor };
    case 'lineAlongXRel':
      state.cursor = { x: c.x + cmd.x, y: c.y };
      return { op: 'lineTo', ...state.cursor };
    case 'lineAlongY':
      state.cursor = { x: c.x, y: cmd.y };
      return { op: 'lineTo', ...state.cursor };
    case 'lineAlongYRel':
      state.cursor = { x: c.x, y: c.y + cmd.y };
      return { op: 'lineTo', ...state.cursor };
    case 'close':
      return { op: 'close' };
    case 'bezCtrl':
      state.controls = [state.controls[1], { x: cmd.x, y: cmd.y }];
      return null;
    case 'bezCtrlRel':
      state.controls = [state.controls[1], { x: c.x + cmd.x, y: c.y + cmd.y }];
      return null;
    case 'quadBezTo':
    case 'quadBezToRel': {
      state.cursor = cmd.type === 'quadBezTo' ? { x: cmd.x, y: cmd.y } : { x: c.x + cmd.x, y: c.y + cmd.y };
      const ctrl = state.controls[1];
      return { op: 'quadTo', cx: ctrl.x, cy: ctrl.y, ...state.cursor };
    }
    case 'cubBezTo':
    case 'cubBezToRel': {
      state.cursor = cmd.type === 'cubBezTo' ? { x: cmd.x, y: cmd.y } : { x: c.x + cmd.x, y: c.y + cmd.y };
      const [c1, c2] = state.controls;
      return { op: 'cubicTo', c1x: c1.x, c1y: c1.y, c2x: c2.x, c2y: c2.y, ...state.cursor };
    }
    default:
      return unsupported(cmd);
  }
}

// Commands parsed from data can carry any type at runtime.
function unsupported(cmd: never): never {
  const raw: unknown = cmd;
  const type = typeof raw === 'object' && raw !== null && 'type' in raw ? String(raw.type) : String(raw);
  throw new UnsupportedPathCommandError(type);
}

/**
 * Decode a whole command list into absolute segments.
 * All-or-nothing: an unsupported command throws before any segment is returned.
 */
export function interpretPath(commands: readonly PathCommand[]): PathSegment[] {
  const state = initialPathState();
  const segments: PathSegment[] = [];
  for (const cmd of commands) {
    const seg = stepPath(state, cmd);
    if (seg) segments.push(seg);
  }
  return segments;
}
