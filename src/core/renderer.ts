import type { Fill, Matrix, Stroke, Viewport } from '../types';
import type { ClipRect } from './clip';
import type { DrawCommand, PathGeometry, TextDrawCommand } from './compose';

export type PathPaintOptions = {
  alpha: number;
  clip: ClipRect | null;
  transform: Matrix | null;
};

/**
 * Backend that turns draw commands into pixels. Implementations own tessellation,
 * paint, scissoring and text rasterization.
 */
export type Renderer = {
  beginFrame?: (viewport: Viewport) => void;
  fillPath: (geometry: PathGeometry, fill: Fill, options: PathPaintOptions) => void;
  strokePath: (geometry: PathGeometry, stroke: Stroke, options: PathPaintOptions) => void;
  drawText: (command: TextDrawCommand) => void;
  endFrame?: () => void;
};

/** Feed a command stream to a renderer in order; each path is filled before it is stroked. */
export function replayCommands(commands: readonly DrawCommand[], renderer: Renderer): void {
  for (const cmd of commands) {
    if (cmd.kind === 'text') {
      renderer.drawText(cmd);
      continue;
    }
    const options: PathPaintOptions = { alpha: cmd.alpha, clip: cmd.clip, transform: cmd.transform };
    if (cmd.fill) renderer.fillPath(cmd.geometry, cmd.fill, options);
    if (cmd.stroke) renderer.strokePath(cmd.geometry, cmd.stroke, options);
  }
}

/** Replays a whole frame, bracketed by the renderer's optional frame hooks. */
export function renderFrame(commands: readonly DrawCommand[], renderer: Renderer, viewport: Viewport): void {
  renderer.beginFrame?.(viewport);
  try {
    replayCommands(commands, renderer);
  } finally {
    renderer.endFrame?.();
  }
}
