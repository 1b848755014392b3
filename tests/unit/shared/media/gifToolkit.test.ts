import os from 'node:os';
import path from 'node:path';

import { afterEach, describe, expect, test, vi } from 'vitest';

import { IOError } from '../../../../src/shared/errors/index.js';
import { calculateFrameTimingStats, totalDurationMs } from '../../../../src/shared/media/frameTiming.js';
import { analyzeGif, decodeGif, GifWriter, readGif } from '../../../../src/shared/media/gifToolkit.js';
import { decodePng, encodePng } from '../../../../src/shared/media/pngToolkit.js';
import { BLUE, encodeGifFixture, GREEN, RED, solidBitmap } from '../../../helpers/fixtures.js';

afterEach(() => {
  vi.resetModules();
  vi.clearAllMocks();
  vi.doUnmock('gifuct-js');
});

describe('frame timing utilities', () => {
  test('calculateFrameTimingStats returns deterministic stats', () => {
    const delays = [33, 33, 34, 33];
    const stats = calculateFrameTimingStats(delays);
    expect(stats.averageDelayMs).toBeCloseTo(33.25, 2);
    expect(stats.minDelayMs).toBe(33);
    expect(stats.maxDelayMs).toBe(34);
    expect(stats.stdDeviationMs).toBeCloseTo(0.43, 2);
    expect(stats.fps).toBeCloseTo(30.08, 2);
  });

  test('calculateFrameTimingStats is all zeros for no frames', () => {
    expect(calculateFrameTimingStats([])).toEqual({
      averageDelayMs: 0,
      minDelayMs: 0,
      maxDelayMs: 0,
      stdDeviationMs: 0,
      fps: 0,
    });
  });

  test('totalDurationMs sums the delays', () => {
    expect(totalDurationMs([100, 200, 300])).toBe(600);
  });
});

describe('gif decoding', () => {
  test('decodes frames and per-frame delays written by GifWriter', async () => {
    const buffer = await encodeGifFixture(
      [
        { color: RED, delayMs: 40 },
        { color: GREEN, delayMs: 120 },
      ],
      6,
      4,
    );

    const decoded = decodeGif(buffer, 'fixture.gif');
    const analysis = analyzeGif(decoded);

    expect(decoded.width).toBe(6);
    expect(decoded.height).toBe(4);
    expect(decoded.frames.every((frame) => frame.data.length === 6 * 4 * 4)).toBe(true);
    expect(analysis.frameCount).toBe(2);
    expect(analysis.delaysMs).toEqual([40, 120]);
    expect(analysis.durationMs).toBe(160);
  });

  test('reports data that is not a GIF as an unreadable file', () => {
    expect(() => decodeGif(Buffer.from('definitely not a gif'), 'bogus.gif')).toThrow(IOError);
    expect(() => decodeGif(Buffer.from('definitely not a gif'), 'bogus.gif')).toThrow('Unable to read bogus.gif');
  });

  test('readGif reports a missing file', async () => {
    const missing = path.join(os.tmpdir(), `missing-${Date.now()}.gif`);

    await expect(readGif(missing)).rejects.toMatchObject({ code: 'io.missing', path: missing });
  });

  test('expands partial frames and honours disposal methods', async () => {
    const pixel = (color: readonly number[]) => new Uint8ClampedArray(color);
    const frames = [
      {
        delay: 50,
        disposalType: 1,
        dims: { width: 2, height: 1, top: 0, left: 0 },
        patch: new Uint8ClampedArray([...RED, ...RED]),
      },
      { delay: 0, disposalType: 2, dims: { width: 1, height: 1, top: 0, left: 1 }, patch: pixel(GREEN) },
      { delay: 70, disposalType: 3, dims: { width: 1, height: 1, top: 0, left: 0 }, patch: pixel(BLUE) },
      {
        delay: 80,
        disposalType: 0,
        dims: { width: 1, height: 1, top: 0, left: 1 },
        patch: pixel([9, 9, 9, 0]),
      },
    ];

    vi.resetModules();
    vi.doMock('gifuct-js', () => ({
      parseGIF: () => ({ lsd: { width: 2, height: 1 } }),
      decompressFrames: () => frames,
    }));

    const { decodeGif: decodeMocked } = await import('../../../../src/shared/media/gifToolkit.js');
    const decoded = decodeMocked(Buffer.alloc(10, 0));

    expect(decoded.frames.map((frame) => Array.from(frame.data))).toEqual([
      [...RED, ...RED],
      [...RED, ...GREEN],
      [...BLUE, 0, 0, 0, 0],
      [...RED, 0, 0, 0, 0],
    ]);
    expect(decoded.frames.map((frame) => frame.delayMs)).toEqual([50, 100, 70, 80]);
  });

  test('rejects a GIF without frames', async () => {
    vi.resetModules();
    vi.doMock('gifuct-js', () => ({
      parseGIF: () => ({ lsd: { width: 2, height: 2 } }),
      decompressFrames: () => [],
    }));

    const { decodeGif: decodeMocked } = await import('../../../../src/shared/media/gifToolkit.js');

    expect(() => decodeMocked(Buffer.alloc(10, 0), 'empty.gif')).toThrow('Unable to read empty.gif');
    let caught: unknown;
    try {
      decodeMocked(Buffer.alloc(10, 0), 'empty.gif');
    } catch (error) {
      caught = error;
    }
    expect(caught).toMatchObject({ code: 'io.read', path: 'empty.gif' });
  });
});

describe('GifWriter', () => {
  test('counts written frames', async () => {
    const writer = new GifWriter(2, 2, { repeat: -1 });
    writer.addFrame(solidBitmap(2, 2, RED), 100);
    writer.addFrame(solidBitmap(2, 2, BLUE), 100);

    expect(writer.framesWritten).toBe(2);
    const gif = await writer.finish();
    expect(gif.subarray(0, 6).toString('ascii')).toBe('GIF89a');
  });

  test('rejects frames of the wrong size', () => {
    const writer = new GifWriter(8, 8);

    expect(() => writer.addFrame(new Uint8ClampedArray(4), 100)).toThrow('Frame 0 has 4 bytes, expected 256');
  });
});

describe('png toolkit', () => {
  test('encodes RGBA pixels losslessly', () => {
    const bitmap = new Uint8ClampedArray([...RED, ...GREEN, ...BLUE, 1, 2, 3, 4]);

    const decoded = decodePng(encodePng(bitmap, 2, 2));

    expect(decoded.width).toBe(2);
    expect(decoded.height).toBe(2);
    expect(Array.from(decoded.data)).toEqual(Array.from(bitmap));
  });
});
