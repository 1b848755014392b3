import { performance } from 'node:perf_hooks';

import {
  createBaseAnimation,
  type AnimationAssembler,
  type TemplateSerializer,
} from '../../../domain/meme-template/index.js';
import { defaultOutputPath, resolveTemplatePair } from '../../../infrastructure/template-store/index.js';
import { AppError, ValidationError } from '../../../shared/errors/index.js';
import { createChildLogger } from '../../../shared/logger/pino.js';
import { analyzeGif, readGif } from '../../../shared/media/gifToolkit.js';
import { writeMediaFile } from '../../../shared/media/mediaFiles.js';
import { encodePng } from '../../../shared/media/pngToolkit.js';
import type { GenerateMemeCommand } from '../commands/generate-meme.command.js';
import {
  generateMemeCommandSchema,
  type GenerateMemePayload,
  type ValidatedGenerateMemePayload,
} from '../dto/generate-meme.dto.js';

export interface GenerateMemeMetrics {
  readonly decodeTimeMs: number;
  readonly renderTimeMs: number;
  readonly encodeTimeMs: number;
  readonly totalTimeMs: number;
  readonly outputSizeBytes: number;
  readonly averageFrameProcessingMs: number;
}

export interface GenerateMemeOutcome {
  readonly outputPath: string;
  readonly posterPath?: string;
  readonly frameCount: number;
  readonly width: number;
  readonly height: number;
  readonly delaysMs: readonly number[];
  readonly metrics: GenerateMemeMetrics;
}

export interface GenerateMemeHandlerOptions {
  readonly outputSuffix: string;
}

export class GenerateMemeHandler {
  private readonly logger = createChildLogger({ module: 'GenerateMemeHandler' });

  public constructor(
    private readonly serializer: TemplateSerializer,
    private readonly assembler: AnimationAssembler,
    private readonly options: GenerateMemeHandlerOptions,
  ) {}

  public async execute(command: GenerateMemeCommand, signal?: AbortSignal): Promise<GenerateMemeOutcome> {
    const payload = this.validate(command.payload);
    const startedAt = performance.now();

    this.logger.info({ gifPath: payload.gifPath, texts: payload.texts.length }, 'Starting meme render');

    try {
      const pair = await resolveTemplatePair(payload.gifPath);

      const decodeStarted = performance.now();
      const gif = await readGif(pair.gifPath);
      const animation = createBaseAnimation({ source: pair.gifPath, ...gif });
      const decodeTimeMs = performance.now() - decodeStarted;

      const template = await this.serializer.load(pair.templatePath);
      const analysis = analyzeGif(gif);
      this.logger.debug(
        {
          gifPath: pair.gifPath,
          frameCount: analysis.frameCount,
          durationMs: analysis.durationMs,
          timing: analysis.timing,
        },
        'Base animation decoded',
      );

      const rendered = await this.assembler.render(template, animation, payload.texts, {
        assetsDir: pair.directory,
        signal,
      });

      const outputPath = await writeMediaFile(
        payload.outputPath ?? defaultOutputPath(pair.gifPath, this.options.outputSuffix),
        rendered.gif,
      );

      const posterPath = payload.posterPath
        ? await writeMediaFile(
            payload.posterPath,
            encodePng(rendered.posterFrame, rendered.width, rendered.height),
          )
        : undefined;

      const outcome: GenerateMemeOutcome = {
        outputPath,
        ...(posterPath === undefined ? {} : { posterPath }),
        frameCount: rendered.delaysMs.length,
        width: rendered.width,
        height: rendered.height,
        delaysMs: rendered.delaysMs,
        metrics: {
          decodeTimeMs,
          renderTimeMs: rendered.metrics.renderTimeMs,
          encodeTimeMs: rendered.metrics.encodeTimeMs,
          totalTimeMs: performance.now() - startedAt,
          outputSizeBytes: rendered.gif.byteLength,
          averageFrameProcessingMs: rendered.metrics.averageFrameProcessingMs,
        },
      };

      this.logger.info(
        {
          outputPath,
          frameCount: outcome.frameCount,
          durationMs: outcome.metrics.totalTimeMs,
          outputSizeBytes: outcome.metrics.outputSizeBytes,
        },
        'Meme render completed',
      );

      return outcome;
    } catch (error) {
      this.logger.error({ gifPath: payload.gifPath, error }, 'Meme render failed');
      throw AppError.fromUnknown(error, 'meme-generator.failure');
    }
  }

  private validate(payload: GenerateMemePayload): ValidatedGenerateMemePayload {
    const parsed = generateMemeCommandSchema.safeParse(payload);

    if (!parsed.success) {
      const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
      this.logger.warn({ issues }, 'Invalid meme payload received');
      throw new ValidationError(issues, { source: 'command' });
    }

    return parsed.data;
  }
}
