import { performance } from 'node:perf_hooks';

import type {
  AnimationAssembler,
  AnimationFrame,
  BaseAnimation,
  FrameRenderer,
  InterpolationDefaults,
  RenderedAnimation,
  RenderedFrame,
  RenderOptions,
  Template,
} from '../../domain/meme-template/index.js';
import { AppError, RenderAbortedError } from '../../shared/errors/index.js';
import { createChildLogger } from '../../shared/logger/pino.js';
import { GifWriter, type GifEncodingOptions } from '../../shared/media/gifToolkit.js';
import { FrameReorderBuffer } from './frame-reorder-buffer.js';
import { bindTexts, buildOverlayCommands } from './overlay-commands.js';

export interface GifAnimationAssemblerOptions {
  readonly defaults: InterpolationDefaults;
  readonly encoding?: Partial<GifEncodingOptions>;
}

export class GifAnimationAssembler implements AnimationAssembler {
  private readonly logger = createChildLogger({ module: 'GifAnimationAssembler' });

  public constructor(
    private readonly renderer: FrameRenderer,
    private readonly options: GifAnimationAssemblerOptions,
  ) {}

  public async render(
    template: Template,
    animation: BaseAnimation,
    texts: readonly string[],
    options: RenderOptions = {},
  ): Promise<RenderedAnimation> {
    template.bindTo(animation);
    const boundTexts = bindTexts(template, texts);
    const assetsDir = options.assetsDir ?? process.cwd();

    // first failure or caller cancellation stops every lane
    const controller = new AbortController();
    const forwardAbort = () => controller.abort(options.signal?.reason);
    if (options.signal?.aborted) {
      throw new RenderAbortedError(options.signal.reason);
    }
    options.signal?.addEventListener('abort', forwardAbort, { once: true });

    const writer = new GifWriter(animation.width, animation.height, this.options.encoding);
    const reorder = new FrameReorderBuffer<RenderedFrame>(animation.frames.length);
    const frames = animation.frames;
    let cursor = 0;
    const output: { posterFrame?: Uint8ClampedArray } = {};
    let encodeTimeMs = 0;

    const nextFrame = (): AnimationFrame | undefined => {
      if (controller.signal.aborted) {
        return undefined;
      }
      const frame = frames[cursor];
      cursor += 1;
      return frame;
    };

    const emit = (rendered: RenderedFrame) => {
      const source = frames[rendered.index];
      if (!source) {
        throw new RangeError(`Rendered frame ${rendered.index} has no source frame`);
      }

      const started = performance.now();
      writer.addFrame(rendered.bitmap, source.delayMs);
      encodeTimeMs += performance.now() - started;
      output.posterFrame ??= rendered.bitmap;
    };

    const runLane = async (): Promise<void> => {
      for (let frame = nextFrame(); frame; frame = nextFrame()) {
        const rendered = await this.renderer.renderFrame(
          {
            index: frame.index,
            width: animation.width,
            height: animation.height,
            bitmap: frame.bitmap,
            overlays: buildOverlayCommands(
              template,
              frame.index,
              boundTexts,
              this.options.defaults,
              assetsDir,
            ),
          },
          controller.signal,
        );

        for (const ready of reorder.push(rendered.index, rendered)) {
          emit(ready);
        }
      }
    };

    const laneCount = Math.max(1, Math.min(this.renderer.concurrency, frames.length));
    const renderStarted = performance.now();

    try {
      await Promise.all(
        Array.from({ length: laneCount }, () =>
          runLane().catch((error: unknown) => {
            controller.abort(error);
            throw error;
          }),
        ),
      );
    } finally {
      options.signal?.removeEventListener('abort', forwardAbort);
    }

    if (options.signal?.aborted) {
      throw new RenderAbortedError(options.signal.reason);
    }

    const { posterFrame } = output;
    if (!reorder.complete || !posterFrame) {
      throw AppError.unsupported(
        'meme-renderer.incomplete',
        `Only ${reorder.emitted} of ${frames.length} frames were rendered`,
        { source: animation.source },
      );
    }

    const finishStarted = performance.now();
    const gif = await writer.finish();
    encodeTimeMs += performance.now() - finishStarted;
    const renderTimeMs = performance.now() - renderStarted - encodeTimeMs;

    this.logger.debug(
      { source: animation.source, frames: frames.length, lanes: laneCount, bytes: gif.byteLength },
      'Animation assembled',
    );

    return {
      gif,
      width: animation.width,
      height: animation.height,
      delaysMs: frames.map((frame) => frame.delayMs),
      posterFrame,
      metrics: {
        renderTimeMs,
        encodeTimeMs,
        averageFrameProcessingMs: renderTimeMs / frames.length,
      },
    };
  }
}
