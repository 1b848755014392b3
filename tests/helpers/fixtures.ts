import { promises as fs } from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import {
  createBaseAnimation,
  TextTemplate,
  type BaseAnimation,
  type InterpolationDefaults,
  type Keyframe,
  type TextStyle,
} from '../../src/domain/meme-template/index.js';
import { GifWriter } from '../../src/shared/media/gifToolkit.js';

export type Rgba = readonly [number, number, number, number];

export const DEFAULTS: InterpolationDefaults = { x: 20, y: 20, fontSize: 50 };

export function buildTextTemplate(
  id: string,
  keyframes: readonly Keyframe[] = [],
  style: Partial<TextStyle> = {},
): TextTemplate {
  return TextTemplate.create({
    id,
    style: {
      font: 'sans-serif',
      color: '#ffffff',
      align: 'center',
      placeholder: `${id} placeholder`,
      strokeWidth: 0,
      strokeColor: '#000000',
      ...style,
    },
    keyframes,
  });
}

export function solidBitmap(width: number, height: number, color: Rgba): Uint8ClampedArray {
  const bitmap = new Uint8ClampedArray(width * height * 4);
  for (let offset = 0; offset < bitmap.length; offset += 4) {
    bitmap.set(color, offset);
  }
  return bitmap;
}

export function pixelAt(bitmap: Uint8ClampedArray, width: number, x: number, y: number): number[] {
  const offset = (y * width + x) * 4;
  return Array.from(bitmap.subarray(offset, offset + 4));
}

export interface FixtureFrame {
  readonly color: Rgba;
  readonly delayMs: number;
}

export function buildAnimation(
  frames: readonly FixtureFrame[],
  width = 8,
  height = 8,
  source = 'fixture.gif',
): BaseAnimation {
  return createBaseAnimation({
    source,
    width,
    height,
    frames: frames.map((frame) => ({
      data: solidBitmap(width, height, frame.color),
      delayMs: frame.delayMs,
    })),
  });
}

export async function encodeGifFixture(
  frames: readonly FixtureFrame[],
  width = 8,
  height = 8,
): Promise<Buffer> {
  const writer = new GifWriter(width, height);
  for (const frame of frames) {
    writer.addFrame(solidBitmap(width, height, frame.color), frame.delayMs);
  }
  return writer.finish();
}

export async function createTempDir(prefix = 'meme-animator-'): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

export const RED: Rgba = [255, 0, 0, 255];
export const GREEN: Rgba = [0, 255, 0, 255];
export const BLUE: Rgba = [0, 0, 255, 255];
