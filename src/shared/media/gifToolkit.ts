import { promises as fs } from 'node:fs';

import GIFEncoder from 'gif-encoder-2';
import { decompressFrames, parseGIF, type ParsedFrame } from 'gifuct-js';

import { IOError } from '../errors/index.js';
import { calculateFrameTimingStats, totalDurationMs, type FrameTimingStats } from './frameTiming.js';

// browsers clamp 0 and 10ms delays up to this value
const DEFAULT_DELAY_MS = 100;

export interface GifFrame {
  readonly data: Uint8ClampedArray;
  readonly delayMs: number;
}

export interface DecodedGif {
  readonly width: number;
  readonly height: number;
  readonly frames: readonly GifFrame[];
}

export interface GifAnalysis {
  width: number;
  height: number;
  frameCount: number;
  durationMs: number;
  delaysMs: number[];
  timing: FrameTimingStats;
}

export interface GifEncodingOptions {
  /** 0 loops forever, -1 plays once. */
  readonly repeat: number;
  /** 1 is best, 30 is fastest. */
  readonly quality: number;
}

const DEFAULT_ENCODING: GifEncodingOptions = {
  repeat: 0,
  quality: 10,
};

export async function readGif(filePath: string): Promise<DecodedGif> {
  let buffer: Buffer;
  try {
    buffer = await fs.readFile(filePath);
  } catch (error) {
    throw new IOError(isMissingFile(error) ? 'missing' : 'read', filePath, error);
  }

  return decodeGif(buffer, filePath);
}

export function decodeGif(buffer: Buffer, source = '<buffer>'): DecodedGif {
  let parsed: ReturnType<typeof parseGIF>;
  let frames: ParsedFrame[];
  try {
    parsed = parseGIF(toArrayBuffer(buffer));
    frames = decompressFrames(parsed, true);
  } catch (error) {
    throw new IOError('read', source, error);
  }

  const { width, height } = parsed.lsd;
  if (frames.length === 0 || width <= 0 || height <= 0) {
    throw new IOError('read', source, new Error(`GIF has no frames (${width}x${height})`));
  }

  return {
    width,
    height,
    frames: expandToFullFrames(frames, width, height),
  };
}

export function analyzeGif(gif: DecodedGif): GifAnalysis {
  const delaysMs = gif.frames.map((frame) => frame.delayMs);

  return {
    width: gif.width,
    height: gif.height,
    frameCount: gif.frames.length,
    durationMs: totalDurationMs(delaysMs),
    delaysMs,
    timing: calculateFrameTimingStats(delaysMs),
  };
}

/**
 * Incremental GIF writer. Frames must be appended in display order; the
 * encoder is strictly sequential.
 */
export class GifWriter {
  private readonly encoder: GIFEncoder;

  private frameCount = 0;

  public constructor(
    public readonly width: number,
    public readonly height: number,
    options: Partial<GifEncodingOptions> = {},
  ) {
    const merged = { ...DEFAULT_ENCODING, ...options } satisfies GifEncodingOptions;
    this.encoder = new GIFEncoder(width, height, 'neuquant');
    this.encoder.start();
    this.encoder.setRepeat(merged.repeat);
    this.encoder.setQuality(merged.quality);
  }

  public get framesWritten(): number {
    return this.frameCount;
  }

  public addFrame(data: Uint8ClampedArray, delayMs: number): void {
    if (data.length !== this.width * this.height * 4) {
      throw new RangeError(
        `Frame ${this.frameCount} has ${data.length} bytes, expected ${this.width * this.height * 4}`,
      );
    }

    this.encoder.setDelay(delayMs);
    this.encoder.addFrame(data);
    this.frameCount += 1;
  }

  public async finish(): Promise<Buffer> {
    this.encoder.finish();
    return Buffer.from(this.encoder.out.getData());
  }
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

function toArrayBuffer(buffer: Buffer): ArrayBuffer {
  const arrayBuffer = new ArrayBuffer(buffer.byteLength);
  new Uint8Array(arrayBuffer).set(buffer);
  return arrayBuffer;
}

function getDelayMs(delay: number | undefined): number {
  if (delay === undefined || delay <= 0) {
    return DEFAULT_DELAY_MS;
  }

  return delay;
}

function expandToFullFrames(frames: ParsedFrame[], width: number, height: number): GifFrame[] {
  const fullSize = width * height * 4;
  let previous = new Uint8ClampedArray(fullSize);

  return frames.map((frame) => {
    const beforeDrawing = new Uint8ClampedArray(previous);
    const working = new Uint8ClampedArray(previous);
    const { dims, patch } = frame;

    if (patch) {
      compositePatch(working, patch, dims, width, height);
    }

    const result = new Uint8ClampedArray(working);

    switch (frame.disposalType) {
      case 2: {
        const cleared = new Uint8ClampedArray(working);
        clearPatch(cleared, dims, width, height);
        previous = cleared;
        break;
      }
      case 3: {
        previous = beforeDrawing;
        break;
      }
      default: {
        previous = working;
        break;
      }
    }

    return {
      data: result,
      delayMs: getDelayMs(frame.delay),
    } satisfies GifFrame;
  });
}

function compositePatch(
  destination: Uint8ClampedArray,
  patch: Uint8ClampedArray,
  dims: ParsedFrame['dims'],
  width: number,
  height: number,
): void {
  const { top, left, width: patchWidth, height: patchHeight } = dims;

  for (let y = 0; y < patchHeight; y += 1) {
    const destY = top + y;
    if (destY >= height) {
      break;
    }

    for (let x = 0; x < patchWidth; x += 1) {
      const destX = left + x;
      if (destX >= width) {
        break;
      }

      const patchIndex = (y * patchWidth + x) * 4;
      const alpha = patch[patchIndex + 3] ?? 0;
      if (alpha === 0) {
        continue;
      }

      const destIndex = (destY * width + destX) * 4;
      destination[destIndex] = patch[patchIndex] ?? 0;
      destination[destIndex + 1] = patch[patchIndex + 1] ?? 0;
      destination[destIndex + 2] = patch[patchIndex + 2] ?? 0;
      destination[destIndex + 3] = alpha;
    }
  }
}

function clearPatch(
  destination: Uint8ClampedArray,
  dims: ParsedFrame['dims'],
  width: number,
  height: number,
): void {
  const { top, left, width: patchWidth, height: patchHeight } = dims;

  for (let y = 0; y < patchHeight && top + y < height; y += 1) {
    for (let x = 0; x < patchWidth && left + x < width; x += 1) {
      const destIndex = ((top + y) * width + left + x) * 4;
      destination.fill(0, destIndex, destIndex + 4);
    }
  }
}
