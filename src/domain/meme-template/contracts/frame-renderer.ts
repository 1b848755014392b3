import type { ResolvedProperties } from '../value-objects/keyframe.js';
import type { TextAlign } from '../value-objects/text-style.js';

/**
 * Everything needed to draw one overlay on one frame. Plain data so it can
 * cross a worker boundary.
 */
export interface OverlayDrawCommand extends ResolvedProperties {
  readonly text: string;
  /** Family name, or an absolute path to a font file. */
  readonly font: string;
  readonly color: string;
  readonly align: TextAlign;
  readonly strokeWidth: number;
  readonly strokeColor: string;
  readonly backgroundColor?: string;
}

export interface FrameTask {
  readonly index: number;
  readonly width: number;
  readonly height: number;
  readonly bitmap: Uint8ClampedArray;
  /** Drawn in order, later overlays on top. */
  readonly overlays: readonly OverlayDrawCommand[];
}

export interface RenderedFrame {
  readonly index: number;
  readonly bitmap: Uint8ClampedArray;
}

export interface FrameRenderer {
  /** Frames that may be in flight at once. */
  readonly concurrency: number;
  renderFrame(task: FrameTask, signal?: AbortSignal): Promise<RenderedFrame>;
  destroy(): Promise<void>;
}
