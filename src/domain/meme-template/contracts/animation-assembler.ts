import type { Template } from '../entities/template.js';
import type { BaseAnimation } from '../value-objects/base-animation.js';

export interface RenderMetrics {
  readonly renderTimeMs: number;
  readonly encodeTimeMs: number;
  readonly averageFrameProcessingMs: number;
}

export interface RenderedAnimation {
  readonly gif: Buffer;
  readonly width: number;
  readonly height: number;
  readonly delaysMs: readonly number[];
  /** First composited frame as raw RGBA, kept for poster output. */
  readonly posterFrame: Uint8ClampedArray;
  readonly metrics: RenderMetrics;
}

export interface RenderOptions {
  /** Directory that relative font file paths resolve against. */
  readonly assetsDir?: string;
  readonly signal?: AbortSignal;
}

export interface AnimationAssembler {
  render(
    template: Template,
    animation: BaseAnimation,
    texts: readonly string[],
    options?: RenderOptions,
  ): Promise<RenderedAnimation>;
}
