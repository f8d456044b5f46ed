import type {
  CircleNode,
  GroupNode,
  NodeId,
  PathNode,
  RectNode,
  ShapeNode,
  TextNode,
  WordNode,
} from '../types';
import { cloneClip, noClip } from './clip';
import { abs, cloneDimension, clonePadding, noPadding } from './dimension';
import { cloneTransform, noTransform } from './transform';

// Node factories fill every field a caller leaves out with its neutral value.
// Declared geometry is copied: layout caches per-pass state on it, so a value shared
// between fields or nodes must not share that state.

type Init<T extends ShapeNode, Computed extends keyof T = never> = Partial<Omit<T, 'kind' | Computed>>;

export function rectNode(init: Init<RectNode> = {}): RectNode {
  const node: RectNode = {
    x: abs(0),
    y: abs(0),
    width: abs(0),
    height: abs(0),
    padding: noPadding(),
    fill: null,
    stroke: null,
    clip: noClip(),
    transform: noTransform(),
    transparency: 0,
    children: [],
    ...init,
    kind: 'rect',
  };
  return {
    ...node,
    x: cloneDimension(node.x),
    y: cloneDimension(node.y),
    width: cloneDimension(node.width),
    height: cloneDimension(node.height),
    padding: clonePadding(node.padding),
    clip: cloneClip(node.clip),
    transform: cloneTransform(node.transform),
  };
}

export function circleNode(init: Init<CircleNode> = {}): CircleNode {
  const node: CircleNode = {
    cx: abs(0),
    cy: abs(0),
    r: abs(0),
    padding: noPadding(),
    fill: null,
    stroke: null,
    clip: noClip(),
    transform: noTransform(),
    transparency: 0,
    children: [],
    ...init,
    kind: 'circle',
  };
  return {
    ...node,
    cx: cloneDimension(node.cx),
    cy: cloneDimension(node.cy),
    r: cloneDimension(node.r),
    padding: clonePadding(node.padding),
    clip: cloneClip(node.clip),
    transform: cloneTransform(node.transform),
  };
}

export function pathNode(init: Init<PathNode> = {}): PathNode {
  const node: PathNode = {
    commands: [],
    fill: null,
    stroke: null,
    clip: noClip(),
    transform: noTransform(),
    transparency: 0,
    children: [],
    ...init,
    kind: 'path',
  };
  return { ...node, clip: cloneClip(node.clip), transform: cloneTransform(node.transform) };
}

export function groupNode(init: Init<GroupNode> = {}): GroupNode {
  const node: GroupNode = {
    transparency: null,
    fill: null,
    stroke: null,
    clip: noClip(),
    transform: noTransform(),
    children: [],
    ...init,
    kind: 'group',
  };
  return { ...node, clip: cloneClip(node.clip), transform: cloneTransform(node.transform) };
}

export function textNode(init: Init<TextNode, 'metrics' | 'glyphPositions'> = {}): TextNode {
  const node: TextNode = {
    x: abs(0),
    y: abs(0),
    fontName: '',
    fontSize: abs(16),
    align: ['left', 'baseline'],
    content: '',
    fill: null,
    clip: noClip(),
    transform: noTransform(),
    transparency: 0,
    children: [],
    ...init,
    kind: 'text',
    metrics: null,
    glyphPositions: [],
  };
  return {
    ...node,
    x: cloneDimension(node.x),
    y: cloneDimension(node.y),
    fontSize: cloneDimension(node.fontSize),
    clip: cloneClip(node.clip),
    transform: cloneTransform(node.transform),
  };
}

export function wordNode(content: string, id?: NodeId): WordNode {
  return { kind: 'word', id, content, children: [] };
}

// --- Traversal ---

export function childrenOf(node: ShapeNode): readonly ShapeNode[] {
  return node.children;
}

/** Pre-order, document order. */
export function* walkTree(root: ShapeNode): Generator<ShapeNode> {
  yield root;
  for (const child of childrenOf(root)) {
    yield* walkTree(child);
  }
}

export function findNodeById(root: ShapeNode, id: NodeId): ShapeNode | undefined {
  for (const node of walkTree(root)) {
    if (node.id === id) return node;
  }
  return undefined;
}

export function countNodes(root: ShapeNode): number {
  let n = 0;
  for (const _node of walkTree(root)) n += 1;
  return n;
}

export function groupHasOverrides(group: GroupNode): boolean {
  return (
    group.transparency !== null ||
    group.fill !== null ||
    group.stroke !== null ||
    group.clip.kind !== 'none' ||
    group.transform.matrix !== null ||
    group.transform.absolute
  );
}

/** Exhaustiveness guard for switches over `kind`; reached only by nodes built outside the type system. */
export function unknownKind(node: never): never {
  const raw: unknown = node;
  const kind = typeof raw === 'object' && raw !== null && 'kind' in raw ? String(raw.kind) : String(raw);
  throw new Error(`Unknown shape kind '${kind}'`);
}
