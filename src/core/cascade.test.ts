import { describe, it, expect } from 'vitest';
import { enterGroup, effectiveAlpha, rootDefaults } from './cascade';
import { scissor } from './clip';
import { abs } from './dimension';
import { fill, rgba } from './paint';
import { groupNode } from './shapes';

describe('style cascade', () => {
  it('scoped entry leaves the inherited defaults untouched', () => {
    const inherited = rootDefaults();
    const inner = enterGroup(inherited, groupNode({ transparency: 0.3 }), 'scoped');

    expect(inner).not.toBe(inherited);
    expect(inner.transparency).toBe(0.3);
    expect(inherited.transparency).toBe(0);
  });

  it('legacy entry writes into the shared defaults', () => {
    const shared = rootDefaults();
    const red = fill(rgba(1, 0, 0));
    const inner = enterGroup(shared, groupNode({ fill: red }), 'legacy');

    expect(inner).toBe(shared);
    expect(shared.fill).toBe(red);
  });

  it('keeps inherited values for fields the group leaves unset', () => {
    const red = fill(rgba(1, 0, 0));
    const clip = scissor(abs(0), abs(0), abs(5), abs(5));
    const group = groupNode({ fill: red, clip, transparency: 0.5 });
    const outer = enterGroup(rootDefaults(), group, 'scoped');
    const inner = enterGroup(outer, groupNode(), 'scoped');

    expect(inner).toEqual(outer);
    expect(inner.clip).toBe(group.clip);
  });

  it('combines own and inherited transparency', () => {
    expect(effectiveAlpha(0, rootDefaults())).toBe(1);
    expect(effectiveAlpha(0.5, { ...rootDefaults(), transparency: 0.5 })).toBe(0.25);
    expect(effectiveAlpha(1, rootDefaults())).toBe(0);
  });
});
