import type { FrameRenderer } from '../../domain/meme-template/index.js';
import { FrameCompositor } from './frame-compositor.js';
import { InlineFrameRenderer } from './inline-frame-renderer.js';
import { WorkerFrameRenderer } from './worker-frame-renderer.js';

export { GifAnimationAssembler } from './animation-assembler.js';
export type { GifAnimationAssemblerOptions } from './animation-assembler.js';
export { FrameCompositor } from './frame-compositor.js';
export type { FrameCompositorOptions } from './frame-compositor.js';
export { FrameReorderBuffer } from './frame-reorder-buffer.js';
export { InlineFrameRenderer } from './inline-frame-renderer.js';
export { bindTexts, buildOverlayCommands } from './overlay-commands.js';
export { WorkerFrameRenderer } from './worker-frame-renderer.js';

/**
 * Pools of one gain nothing over compositing on the calling thread.
 */
export function createFrameRenderer(poolSize: number, textCacheEntries?: number): FrameRenderer {
  if (poolSize <= 1) {
    return new InlineFrameRenderer(new FrameCompositor({ textCacheEntries }));
  }

  return new WorkerFrameRenderer({ size: poolSize, textCacheEntries });
}
