import type { FrameTask } from '../../../domain/meme-template/index.js';
import {
  AppError,
  IOError,
  MemeAnimatorError,
  type IOOperation,
} from '../../../shared/errors/index.js';

export interface CompositeFrameMessage {
  readonly type: 'compositeFrame';
  readonly task: FrameTask;
}

export interface ShutdownMessage {
  readonly type: 'shutdown';
}

export type WorkerRequest = CompositeFrameMessage | ShutdownMessage;

export interface FrameCompositedMessage {
  readonly type: 'frameComposited';
  readonly index: number;
  readonly bitmap: Uint8ClampedArray;
}

export interface FrameFailedMessage {
  readonly type: 'frameFailed';
  readonly index: number;
  readonly message: string;
  readonly code?: string;
  readonly metadata?: Record<string, unknown>;
  readonly exposeMessage?: boolean;
}

export type WorkerResponse = FrameCompositedMessage | FrameFailedMessage;

export interface CompositorWorkerData {
  readonly textCacheEntries?: number;
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null;

export function isWorkerResponse(value: unknown): value is WorkerResponse {
  if (!isRecord(value) || typeof value.index !== 'number') {
    return false;
  }

  if (value.type === 'frameComposited') {
    return value.bitmap instanceof Uint8ClampedArray;
  }

  return (
    value.type === 'frameFailed' &&
    typeof value.message === 'string' &&
    (value.code === undefined || typeof value.code === 'string') &&
    (value.metadata === undefined || isRecord(value.metadata))
  );
}

export function isWorkerRequest(value: unknown): value is WorkerRequest {
  if (!isRecord(value)) {
    return false;
  }

  if (value.type === 'shutdown') {
    return true;
  }

  return value.type === 'compositeFrame' && isRecord(value.task);
}

const IO_OPERATIONS: readonly IOOperation[] = ['read', 'write', 'missing'];

export function toFrameFailedMessage(index: number, error: unknown): FrameFailedMessage {
  if (error instanceof MemeAnimatorError) {
    return {
      type: 'frameFailed',
      index,
      message: error.message,
      code: error.code,
      metadata: error.metadata,
      exposeMessage: error.exposeMessage,
    };
  }

  return { type: 'frameFailed', index, message: error instanceof Error ? error.message : String(error) };
}

export function fromFrameFailedMessage(message: FrameFailedMessage): MemeAnimatorError {
  const { code, metadata } = message;
  if (code === undefined) {
    return AppError.fromError(new Error(message.message), 'meme-renderer.frame-failed');
  }

  const operation = IO_OPERATIONS.find((candidate) => code === `io.${candidate}`);
  const filePath = metadata?.path;
  if (operation && typeof filePath === 'string') {
    return new IOError(operation, filePath);
  }

  return AppError.restore({
    code,
    message: message.message,
    metadata,
    exposeMessage: message.exposeMessage,
  });
}
