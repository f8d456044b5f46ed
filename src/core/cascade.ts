import type { Clip, Fill, GroupNode, Stroke } from '../types';
import type { CascadeMode } from './config';
import { noClip } from './clip';

/** Style values a group hands down to descendants that do not set their own. */
export type StyleDefaults = {
  transparency: number;
  fill: Fill | null;
  stroke: Stroke | null;
  clip: Clip;
};

export function rootDefaults(): StyleDefaults {
  return { transparency: 0, fill: null, stroke: null, clip: noClip() };
}

/**
 * Defaults in effect inside `group`'s subtree. Set fields overwrite the inherited ones
 * (transparency is replaced, not multiplied).
 *
 * `scoped` returns a fresh value and leaves `inherited` untouched.
 * `legacy` writes into `inherited` and returns it, so the change outlives the subtree.
 */
export function enterGroup(inherited: StyleDefaults, group: GroupNode, mode: CascadeMode): StyleDefaults {
  const target = mode === 'scoped' ? { ...inherited } : inherited;
  if (group.transparency !== null) target.transparency = group.transparency;
  if (group.fill !== null) target.fill = group.fill;
  if (group.stroke !== null) target.stroke = group.stroke;
  if (group.clip.kind !== 'none') target.clip = group.clip;
  return target;
}

/** `(1 - own) * (1 - inherited)`: only the nearest override combines with the node's own value. */
export function effectiveAlpha(ownTransparency: number, defaults: StyleDefaults): number {
  return (1 - ownTransparency) * (1 - defaults.transparency);
}
