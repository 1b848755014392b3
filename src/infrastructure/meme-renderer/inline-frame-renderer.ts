import type { FrameRenderer, FrameTask, RenderedFrame } from '../../domain/meme-template/index.js';
import { RenderAbortedError } from '../../shared/errors/index.js';
import { FrameCompositor } from './frame-compositor.js';

/**
 * Composites on the calling thread, one frame at a time.
 */
export class InlineFrameRenderer implements FrameRenderer {
  public readonly concurrency = 1;

  public constructor(private readonly compositor: FrameCompositor = new FrameCompositor()) {}

  public async renderFrame(task: FrameTask, signal?: AbortSignal): Promise<RenderedFrame> {
    if (signal?.aborted) {
      throw new RenderAbortedError(signal.reason);
    }

    return { index: task.index, bitmap: this.compositor.composite(task) };
  }

  public async destroy(): Promise<void> {
    // nothing to release
  }
}
