import { createStore, type StoreApi } from 'zustand/vanilla';
import type { BoundingBox, ShapeNode, Viewport } from '../types';
import { bbox } from '../core/bounds';
import { composeTree, type DrawCommand } from '../core/compose';
import { loadConfig, type EngineConfig, type EnvSource } from '../core/config';
import type { SceneError } from '../core/errors';
import { layoutTree } from '../core/layout';
import { configureLogging, getLogger } from '../core/logger';
import { renderFrame as replayFrame, type Renderer } from '../core/renderer';
import type { TextShaper } from '../core/text';

const logger = getLogger('SceneStore');

export type FrameResult = {
  commands: DrawCommand[];
  errors: SceneError[];
  /** Root bound from the last layout pass. */
  bound: BoundingBox;
};

export type SceneState = {
  readonly config: EngineConfig;
  readonly viewport: Viewport;
  /** Tree currently owned by the pipeline; layout mutates it in place. */
  readonly root: ShapeNode | null;
  /** True when the tree or viewport changed since the last layout pass. */
  readonly needsLayout: boolean;
  /** Commands from the last composed frame. */
  readonly commands: DrawCommand[];
  /** Layout errors from the last layout pass plus composition errors from the last frame. */
  readonly errors: SceneError[];
  readonly bound: BoundingBox;
  /** Number of frames rendered so far. */
  readonly frame: number;
  /** Number of layout passes run so far. */
  readonly layoutPasses: number;
};

export type SceneActions = {
  setDimensions: (width: number, height: number, devicePixelRatio?: number) => void;
  /** Hand a freshly built tree to the pipeline, replacing the previous one. */
  setTree: (root: ShapeNode | null) => void;
  /** Force a layout pass on the next frame (e.g. after mutating the current tree). */
  invalidate: () => void;
  /** Lay out when dirty, compose, and replay into `renderer` when given. */
  renderFrame: (renderer?: Renderer) => FrameResult;
  updateConfig: (patch: Partial<EngineConfig>) => void;
};

export type SceneStore = SceneState & SceneActions;

export type SceneStoreOptions = {
  shaper: TextShaper;
  config?: Partial<EngineConfig>;
  viewport?: Partial<Viewport>;
  /** Environment read by loadConfig; defaults to process.env. */
  env?: EnvSource;
};

const initialViewport: Viewport = { width: 0, height: 0, devicePixelRatio: 1 };

function viewportBound(viewport: Viewport): BoundingBox {
  return bbox(0, 0, viewport.width, viewport.height);
}

export function createSceneStore(options: SceneStoreOptions): StoreApi<SceneStore> {
  const env = options.env ?? process.env;
  const config = loadConfig(env, options.config);
  // The log level is process-wide: only a store that asks for one changes it.
  if (options.config?.logLevel !== undefined || env.SCENE_LOG_LEVEL !== undefined) {
    configureLogging({ level: config.logLevel });
  }

  let layoutErrors: SceneError[] = [];

  return createStore<SceneStore>()((set, get) => ({
    config,
    viewport: { ...initialViewport, ...options.viewport },
    root: null,
    needsLayout: true,
    commands: [],
    errors: [],
    bound: bbox(),
    frame: 0,
    layoutPasses: 0,

    setDimensions: (width, height, devicePixelRatio = get().viewport.devicePixelRatio) => {
      const { viewport } = get();
      if (viewport.width === width && viewport.height === height && viewport.devicePixelRatio === devicePixelRatio) {
        return;
      }
      set({ viewport: { width, height, devicePixelRatio }, needsLayout: true });
    },

    setTree: (root) => {
      layoutErrors = [];
      set({ root, needsLayout: true, commands: [], errors: [], bound: bbox() });
    },

    invalidate: () => set({ needsLayout: true }),

    updateConfig: (patch) =>
      set((s) => {
        const next = { ...s.config, ...patch };
        if (patch.logLevel) configureLogging({ level: patch.logLevel });
        // Only failFast changes what a layout pass produces; cascade and logging act on composition.
        return { config: next, needsLayout: s.needsLayout || next.failFast !== s.config.failFast };
      }),

    renderFrame: (renderer) => {
      const s = get();
      if (!s.root) {
        logger.debug('Frame requested without a tree');
        if (renderer) replayFrame([], renderer, s.viewport);
        set({ commands: [], errors: [], frame: s.frame + 1 });
        return { commands: [], errors: [], bound: s.bound };
      }

      let bound = s.bound;
      let layoutPasses = s.layoutPasses;
      if (s.needsLayout) {
        const layout = layoutTree(s.root, viewportBound(s.viewport), { shaper: options.shaper, config: s.config });
        bound = layout.bound;
        layoutErrors = layout.errors;
        layoutPasses += 1;
      }

      const composed = composeTree(s.root, { config: s.config });
      const errors = [...layoutErrors, ...composed.errors];
      if (renderer) replayFrame(composed.commands, renderer, s.viewport);

      set({
        needsLayout: false,
        commands: composed.commands,
        errors,
        bound,
        frame: s.frame + 1,
        layoutPasses,
      });
      return { commands: composed.commands, errors, bound };
    },
  }));
}
