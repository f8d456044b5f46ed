import { describe, it, expect, beforeEach } from 'vitest';
import type { RectNode, ShapeNode } from '../types';
import { bbox } from './bounds';
import { scissor } from './clip';
import { DEFAULT_CONFIG } from './config';
import { scaling, translation } from './coords';
import { abs, auto, padding, paddingAll, pct } from './dimension';
import { FontNotFoundError } from './errors';
import { layoutTree } from './layout';
import { circleNode, groupNode, pathNode, rectNode, textNode, wordNode } from './shapes';
import { composeTree } from './compose';
import { FontRegistry, MONOSPACE_FACE } from './text';
import { absoluteTransform, localTransform } from './transform';

const viewport = bbox(0, 0, 200, 100);
let fonts: FontRegistry;

function layout(root: ShapeNode, bound = viewport) {
  return layoutTree(root, bound, { shaper: fonts });
}

function box(x: number, y: number, width: number, height: number, id?: string): RectNode {
  return rectNode({ id, x: abs(x), y: abs(y), width: abs(width), height: abs(height) });
}

beforeEach(() => {
  fonts = new FontRegistry();
  fonts.registerFont('mono', MONOSPACE_FACE);
});

describe('layout: percent geometry', () => {
  it('resolves rect percentages against the parent bound', () => {
    const rect = rectNode({ x: pct(10), y: pct(20), width: pct(50), height: pct(50) });
    const { bound, errors } = layout(rect);

    expect(errors).toEqual([]);
    expect([rect.x.value, rect.y.value, rect.width.value, rect.height.value]).toEqual([20, 20, 100, 50]);
    expect(bound).toEqual(bbox(20, 20, 120, 70));
  });

  it('offsets percent positions by the parent origin', () => {
    const child = rectNode({ x: pct(50), y: pct(50), width: pct(10), height: pct(10) });
    const parent = box(10, 10, 100, 100);
    parent.children.push(child);
    layout(parent);

    expect([child.x.value, child.y.value, child.width.value, child.height.value]).toEqual([60, 60, 10, 10]);
  });

  it('recomputes from the declared percent on every pass without double-counting the origin', () => {
    const rect = rectNode({ x: pct(10), width: pct(50), height: abs(10) });
    const parent = box(5, 0, 200, 100);
    parent.children.push(rect);

    layout(parent);
    expect(rect.x.value).toBe(25);
    layout(parent);
    expect(rect.x.value).toBe(25);

    parent.width = abs(400);
    layout(parent);
    expect(rect.x.value).toBe(45);
    expect(rect.width.value).toBe(200);
  });

  it('resolves circle radius against the smaller parent side', () => {
    const circle = circleNode({ cx: pct(50), cy: pct(50), r: pct(50) });
    const { bound } = layout(circle);
    expect([circle.cx.value, circle.cy.value, circle.r.value]).toEqual([100, 50, 50]);
    expect(bound).toEqual(bbox(50, 0, 150, 100));
  });

  it('resolves scissor clips against the parent bound', () => {
    const rect = box(0, 0, 10, 10);
    rect.clip = scissor(pct(10), pct(10), pct(50), pct(50));
    layout(rect);

    expect(rect.clip).toMatchObject({
      x: { value: 20 },
      y: { value: 10 },
      width: { value: 100 },
      height: { value: 50 },
    });
  });

  it('yields zero geometry inside a zero-size parent', () => {
    const rect = rectNode({ x: pct(50), y: pct(50), width: pct(100), height: pct(100) });
    const { bound, errors } = layout(rect, bbox(0, 0, 0, 0));
    expect(errors).toEqual([]);
    expect(bound).toEqual(bbox(0, 0, 0, 0));
  });
});

describe('layout: auto sizing', () => {
  it('wraps an auto rect around its children', () => {
    const rect = rectNode({
      x: auto(),
      y: auto(),
      width: auto(),
      height: auto(),
      children: [box(10, 10, 40, 40), box(50, 50, 40, 40)],
    });
    const { bound } = layout(rect);

    expect([rect.x.value, rect.y.value, rect.width.value, rect.height.value]).toEqual([10, 10, 80, 80]);
    expect(bound).toEqual(bbox(10, 10, 90, 90));
  });

  it('grows an auto rect outward by its padding and shifts children into the content box', () => {
    const child = box(10, 10, 80, 80);
    const rect = rectNode({
      x: auto(),
      y: auto(),
      width: auto(),
      height: auto(),
      padding: paddingAll(5),
      children: [child],
    });
    layout(rect);

    expect([rect.x.value, rect.y.value, rect.width.value, rect.height.value]).toEqual([5, 5, 90, 90]);
    expect(child.transform.global).toEqual([1, 0, 0, 1, 5, 5]);
  });

  it('uses top padding for y and left padding for x', () => {
    const child = box(10, 10, 80, 80);
    const rect = rectNode({
      x: auto(),
      y: auto(),
      width: auto(),
      height: auto(),
      padding: padding(abs(2), abs(4), abs(7), abs(9)),
      children: [child],
    });
    layout(rect);

    expect([rect.x.value, rect.y.value, rect.width.value, rect.height.value]).toEqual([8, 3, 86, 96]);
    expect(child.transform.global).toEqual([1, 0, 0, 1, 2, 7]);
  });

  it('keeps absolute fields while resolving the auto ones', () => {
    const rect = rectNode({ x: abs(0), y: abs(0), width: auto(), height: abs(30), children: [box(20, 0, 30, 10)] });
    layout(rect);
    expect(rect.width.value).toBe(50);
    expect(rect.height.value).toBe(30);
  });

  it('sizes an auto circle from the larger side of its children', () => {
    const circle = circleNode({ cx: auto(), cy: auto(), r: auto(), children: [box(0, 0, 40, 20)] });
    const { bound } = layout(circle);

    expect([circle.cx.value, circle.cy.value, circle.r.value]).toEqual([20, 10, 20]);
    expect(bound).toEqual(bbox(0, -10, 40, 30));
  });

  it('adds circle padding to the radius and the center', () => {
    const circle = circleNode({
      cx: auto(),
      cy: auto(),
      r: auto(),
      padding: paddingAll(10),
      children: [box(0, 0, 40, 20)],
    });
    layout(circle);
    expect([circle.cx.value, circle.cy.value, circle.r.value]).toEqual([30, 20, 30]);
  });

  it('gives the same result on a second pass', () => {
    const rect = rectNode({ x: auto(), y: auto(), width: auto(), height: auto(), children: [box(10, 10, 40, 40)] });
    const first = layout(rect).bound;
    const second = layout(rect).bound;
    expect(second).toEqual(first);
    expect(second).toEqual(bbox(10, 10, 50, 50));
  });
});

describe('layout: containers and leaves', () => {
  it('a group returns the union of its children', () => {
    const group = groupNode({
      children: [box(10, 10, 20, 20), circleNode({ cx: abs(100), cy: abs(50), r: abs(10) })],
    });
    expect(layout(group).bound).toEqual(bbox(10, 10, 110, 60));
  });

  it('an empty group returns the empty box', () => {
    expect(layout(groupNode()).bound).toEqual(bbox(0, 0, 0, 0));
  });

  it('a path and a word take the parent bound', () => {
    expect(layout(pathNode()).bound).toEqual(viewport);
    expect(layout(wordNode('reserved')).bound).toEqual(viewport);
  });

  it('children of a group are laid out against the group parent bound', () => {
    const child = rectNode({ x: pct(50), y: abs(0), width: pct(50), height: abs(10) });
    const parent = box(100, 0, 100, 100);
    parent.children.push(groupNode({ children: [child] }));
    layout(parent);
    expect(child.x.value).toBe(150);
    expect(child.width.value).toBe(50);
  });
});

describe('layout: text', () => {
  it('stores metrics and glyph extents from the shaper', () => {
    const text = textNode({ x: abs(10), y: abs(20), fontName: 'mono', fontSize: abs(10), content: 'abcd' });
    layout(text);

    expect(text.metrics?.ascender).toBeCloseTo(8);
    expect(text.metrics?.descender).toBeCloseTo(-2);
    expect(text.metrics?.lineHeight).toBeCloseTo(12);
    expect(text.glyphPositions).toHaveLength(4);
    expect(text.glyphPositions[3]).toEqual({ x: 25, minX: 25, maxX: 30 });
  });

  it('unions the own bound with the (empty) children bound', () => {
    const text = textNode({ x: abs(10), y: abs(20), fontName: 'mono', fontSize: abs(10), content: 'abcd' });
    expect(layout(text).bound).toEqual(bbox(0, 0, 30, 32));
  });

  it('maps the text bound through its local transform', () => {
    const text = textNode({
      x: abs(10),
      y: abs(20),
      fontName: 'mono',
      fontSize: abs(10),
      content: 'abcd',
      transform: localTransform(scaling(2)),
    });
    expect(layout(text).bound).toEqual(bbox(0, 0, 60, 64));
  });

  it('resolves a percent font size against the parent height', () => {
    const text = textNode({ fontName: 'mono', fontSize: pct(10), content: 'a' });
    layout(text);
    expect(text.fontSize.value).toBe(10);
    expect(text.glyphPositions).toEqual([{ x: 0, minX: 0, maxX: 5 }]);
  });

  it('reports a missing font and keeps laying out the rest of the tree', () => {
    const text = textNode({ id: 'caption', x: abs(10), y: abs(20), fontName: 'missing', content: 'hi' });
    const after = rectNode({ x: pct(50), width: abs(1), height: abs(1) });
    const { errors } = layout(groupNode({ children: [text, after] }));

    expect(errors).toHaveLength(1);
    expect(errors[0]).toBeInstanceOf(FontNotFoundError);
    expect(errors[0]).toMatchObject({ code: 'FONT_NOT_FOUND', fontName: 'missing', nodeId: 'caption' });
    expect(text.metrics).toBeNull();
    expect(text.glyphPositions).toEqual([]);
    expect(after.x.value).toBe(100);
  });

  it('throws a missing font when failFast is on', () => {
    const text = textNode({ fontName: 'missing', content: 'hi' });
    expect(() =>
      layoutTree(text, viewport, { shaper: fonts, config: { ...DEFAULT_CONFIG, failFast: true } }),
    ).toThrow(FontNotFoundError);
  });
});

describe('layout: transforms', () => {
  it('caches composed global matrices down the tree', () => {
    const scaled = rectNode({ transform: localTransform(scaling(2)) });
    const pinned = rectNode({ transform: absoluteTransform(translation(1, 1)) });
    const plain = rectNode();
    const group = groupNode({ transform: localTransform(translation(10, 0)), children: [scaled, pinned, plain] });
    layout(group);

    expect(group.transform.global).toEqual([1, 0, 0, 1, 10, 0]);
    expect(scaled.transform.global).toEqual([2, 0, 0, 2, 10, 0]);
    expect(pinned.transform.global).toEqual([1, 0, 0, 1, 1, 1]);
    expect(plain.transform.global).toEqual([1, 0, 0, 1, 10, 0]);
  });

  it('translates children of a padded rect by the left/top padding', () => {
    const child = rectNode();
    const rect = rectNode({
      width: abs(100),
      height: abs(100),
      padding: paddingAll(8),
      transform: localTransform(translation(2, 3)),
      children: [child],
    });
    layout(rect);

    expect(rect.transform.global).toEqual([1, 0, 0, 1, 2, 3]);
    expect(child.transform.global).toEqual([1, 0, 0, 1, 10, 11]);
  });
});

describe('layout: shared declarations', () => {
  it('resolves one percent reused across fields against each axis', () => {
    const half = pct(50);
    const rect = rectNode({ width: half, height: half });
    layout(rect);

    expect(rect.width.value).toBe(100);
    expect(rect.height.value).toBe(50);
    expect(half).toEqual(pct(50));
  });

  it('resolves one percent reused by siblings against each parent', () => {
    const quarter = pct(25);
    const a = rectNode({ width: quarter });
    const b = rectNode({ width: quarter });
    const root = groupNode({ children: [box(0, 0, 40, 10), box(0, 0, 80, 10)] });
    root.children[0]?.children.push(a);
    root.children[1]?.children.push(b);
    layout(root);

    expect(a.width.value).toBe(10);
    expect(b.width.value).toBe(20);
  });

  it('composes one local transform reused by siblings under each parent', () => {
    const shift = localTransform(translation(1, 0));
    const root = groupNode({
      children: [
        groupNode({ transform: localTransform(translation(0, 10)), children: [rectNode({ id: 'a', transform: shift })] }),
        groupNode({ transform: localTransform(translation(0, 20)), children: [rectNode({ id: 'b', transform: shift })] }),
      ],
    });
    layout(root);

    expect(composeTree(root).commands.map((c) => [c.nodeId, c.transform])).toEqual([
      ['a', [1, 0, 0, 1, 1, 10]],
      ['b', [1, 0, 0, 1, 1, 20]],
    ]);
    expect(shift.global).toBeNull();
  });

  it('resolves one clip declaration per node', () => {
    const clip = scissor(pct(50), abs(0), pct(50), abs(5));
    const a = rectNode({ clip });
    const b = rectNode({ clip });
    const root = groupNode({ children: [box(0, 0, 40, 10), box(0, 0, 80, 10)] });
    root.children[0]?.children.push(a);
    root.children[1]?.children.push(b);
    layout(root);

    expect(a.clip).toMatchObject({ x: { value: 20 }, width: { value: 20 } });
    expect(b.clip).toMatchObject({ x: { value: 40 }, width: { value: 40 } });
  });
});
