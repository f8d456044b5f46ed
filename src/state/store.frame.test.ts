import { describe, expect, it, vi } from 'vitest';
import { createSceneStore } from './store';
import { abs, pct } from '../core/dimension';
import { FontNotFoundError } from '../core/errors';
import { fill, rgba } from '../core/paint';
import { groupNode, rectNode, textNode } from '../core/shapes';
import { FontRegistry, MONOSPACE_FACE } from '../core/text';
import type { Renderer } from '../core/renderer';

function makeStore() {
  const fonts = new FontRegistry();
  fonts.registerFont('mono', MONOSPACE_FACE);
  return createSceneStore({
    shaper: fonts,
    env: {},
    config: { cascade: 'scoped', failFast: false },
    viewport: { width: 200, height: 100 },
  });
}

describe('scene store frames', () => {
  it('renders an empty frame before a tree is set', () => {
    const store = makeStore();
    const result = store.getState().renderFrame();
    expect(result.commands).toEqual([]);
    expect(store.getState().frame).toBe(1);
    expect(store.getState().layoutPasses).toBe(0);
  });

  it('lays out once and composes every frame', () => {
    const store = makeStore();
    store.getState().setTree(rectNode({ id: 'r', width: pct(50), height: abs(10) }));

    store.getState().renderFrame();
    const second = store.getState().renderFrame();

    const s = store.getState();
    expect(s.frame).toBe(2);
    expect(s.layoutPasses).toBe(1);
    expect(s.needsLayout).toBe(false);
    expect(second.commands).toHaveLength(1);
    expect(second.bound).toEqual({ minX: 0, minY: 0, maxX: 100, maxY: 10 });
  });

  it('re-lays out only when the dimensions change', () => {
    const store = makeStore();
    const rect = rectNode({ width: pct(50), height: abs(10) });
    store.getState().setTree(rect);
    store.getState().renderFrame();

    store.getState().setDimensions(200, 100);
    expect(store.getState().needsLayout).toBe(false);

    store.getState().setDimensions(400, 100);
    expect(store.getState().viewport).toEqual({ width: 400, height: 100, devicePixelRatio: 1 });
    store.getState().renderFrame();

    expect(store.getState().layoutPasses).toBe(2);
    expect(rect.width.value).toBe(200);
  });

  it('re-lays out after invalidate', () => {
    const store = makeStore();
    const rect = rectNode({ width: abs(10), height: abs(10) });
    store.getState().setTree(rect);
    store.getState().renderFrame();

    rect.width = abs(30);
    store.getState().invalidate();
    const result = store.getState().renderFrame();

    expect(store.getState().layoutPasses).toBe(2);
    expect(result.bound).toEqual({ minX: 0, minY: 0, maxX: 30, maxY: 10 });
  });

  it('keeps layout errors on frames that skip layout', () => {
    const store = makeStore();
    store.getState().setTree(groupNode({ children: [textNode({ id: 'label', fontName: 'missing', content: 'x' })] }));

    expect(store.getState().renderFrame().errors).toHaveLength(1);
    const again = store.getState().renderFrame();
    expect(again.errors).toHaveLength(1);
    expect(again.errors[0]).toBeInstanceOf(FontNotFoundError);
    expect(store.getState().errors).toBe(again.errors);
  });

  it('clears results when a new tree is set', () => {
    const store = makeStore();
    store.getState().setTree(textNode({ fontName: 'missing' }));
    store.getState().renderFrame();

    store.getState().setTree(rectNode());
    expect(store.getState().errors).toEqual([]);
    expect(store.getState().needsLayout).toBe(true);
    expect(store.getState().renderFrame().errors).toEqual([]);
  });

  it('replays the composed frame into a renderer', () => {
    const store = makeStore();
    const red = fill(rgba(1, 0, 0));
    store.getState().setTree(rectNode({ width: abs(5), height: abs(5), fill: red }));

    const renderer: Renderer = {
      beginFrame: vi.fn(),
      fillPath: vi.fn(),
      strokePath: vi.fn(),
      drawText: vi.fn(),
      endFrame: vi.fn(),
    };
    store.getState().renderFrame(renderer);

    expect(renderer.beginFrame).toHaveBeenCalledWith({ width: 200, height: 100, devicePixelRatio: 1 });
    expect(renderer.fillPath).toHaveBeenCalledTimes(1);
    expect(renderer.strokePath).not.toHaveBeenCalled();
    expect(renderer.endFrame).toHaveBeenCalledTimes(1);
  });
});
