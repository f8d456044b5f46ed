import type { NodeId } from '../types';

export type SceneErrorCode = 'FONT_NOT_FOUND' | 'UNSUPPORTED_PATH_COMMAND';

/** Base class for every error a layout or composition pass can report. */
export class SceneError extends Error {
  readonly code: SceneErrorCode;
  /** Id of the node being processed, when it has one. */
  nodeId?: NodeId;

  constructor(code: SceneErrorCode, message: string, nodeId?: NodeId) {
    super(message);
    this.name = 'SceneError';
    this.code = code;
    this.nodeId = nodeId;
  }
}

export class FontNotFoundError extends SceneError {
  readonly fontName: string;

  constructor(fontName: string, nodeId?: NodeId) {
    super('FONT_NOT_FOUND', `Font '${fontName}' not found`, nodeId);
    this.name = 'FontNotFoundError';
    this.fontName = fontName;
  }
}

export class UnsupportedPathCommandError extends SceneError {
  readonly commandType: string;

  constructor(commandType: string, nodeId?: NodeId) {
    super('UNSUPPORTED_PATH_COMMAND', `Unsupported path command '${commandType}'`, nodeId);
    this.name = 'UnsupportedPathCommandError';
    this.commandType = commandType;
  }
}

export function isSceneError(error: unknown): error is SceneError {
  return error instanceof SceneError;
}

/**
 * Collects errors for one pass. With `failFast` the first error is thrown instead.
 */
export class ErrorCollector {
  readonly errors: SceneError[] = [];

  constructor(private readonly failFast: boolean) {}

  report(error: SceneError, nodeId?: NodeId): void {
    if (nodeId !== undefined && error.nodeId === undefined) error.nodeId = nodeId;
    if (this.failFast) throw error;
    this.errors.push(error);
  }
}
