import { existsSync } from 'node:fs';
import path from 'node:path';

import { createCanvas, GlobalFonts, ImageData, type SKRSContext2D } from '@napi-rs/canvas';

import {
  isFontFile,
  type FrameTask,
  type OverlayDrawCommand,
  type TextAlign,
} from '../../domain/meme-template/index.js';
import { IOError } from '../../shared/errors/index.js';
import { MemoryCache } from './cache/memory-cache.js';

const BOX_MARGIN = 10;

const GENERIC_FAMILIES = new Set(['serif', 'sans-serif', 'monospace', 'cursive', 'fantasy', 'system-ui']);

export interface FrameCompositorOptions {
  readonly textCacheEntries?: number;
}

/**
 * Draws overlay text onto a copy of a base frame. The task bitmap is never
 * written to, so one decoded frame can back any number of renders.
 */
export class FrameCompositor {
  private readonly textWidths: MemoryCache<number>;

  private readonly fontFamilies = new Map<string, string>();

  public constructor(options: FrameCompositorOptions = {}) {
    this.textWidths = new MemoryCache<number>({ maxEntries: options.textCacheEntries ?? 256 });
  }

  public composite(task: FrameTask): Uint8ClampedArray {
    const { width, height } = task;
    const canvas = createCanvas(width, height);
    const ctx = canvas.getContext('2d');
    ctx.putImageData(new ImageData(new Uint8ClampedArray(task.bitmap), width, height), 0, 0);

    for (const overlay of task.overlays) {
      this.drawOverlay(ctx, overlay);
    }

    return new Uint8ClampedArray(ctx.getImageData(0, 0, width, height).data);
  }

  private drawOverlay(ctx: SKRSContext2D, overlay: OverlayDrawCommand): void {
    const family = this.resolveFamily(overlay.font);
    const font = `${overlay.fontSize}px ${quoteFamily(family)}`;

    ctx.font = font;
    ctx.textAlign = overlay.align;
    ctx.textBaseline = 'middle';

    if (overlay.backgroundColor !== undefined) {
      const textWidth = this.textWidths.getOrCompute(`${font}|${overlay.text}`, () =>
        ctx.measureText(overlay.text).width,
      );
      const left = boxLeft(overlay.align, overlay.x, textWidth);
      ctx.fillStyle = overlay.backgroundColor;
      ctx.fillRect(
        left - BOX_MARGIN,
        overlay.y - overlay.fontSize / 2 - BOX_MARGIN,
        textWidth + BOX_MARGIN * 2,
        overlay.fontSize + BOX_MARGIN * 2,
      );
    }

    if (overlay.text.length === 0) {
      return;
    }

    if (overlay.strokeWidth > 0) {
      // canvas strokes straddle the glyph edge
      ctx.lineWidth = overlay.strokeWidth * 2;
      ctx.lineJoin = 'round';
      ctx.strokeStyle = overlay.strokeColor;
      ctx.strokeText(overlay.text, overlay.x, overlay.y);
    }

    ctx.fillStyle = overlay.color;
    ctx.fillText(overlay.text, overlay.x, overlay.y);
  }

  private resolveFamily(font: string): string {
    if (!isFontFile(font)) {
      return font;
    }

    const known = this.fontFamilies.get(font);
    if (known) {
      return known;
    }

    if (!existsSync(font)) {
      throw new IOError('missing', font);
    }

    const family = `meme-${path.basename(font, path.extname(font))}`;
    if (!GlobalFonts.registerFromPath(font, family)) {
      throw new IOError('read', font);
    }

    this.fontFamilies.set(font, family);
    return family;
  }
}

function quoteFamily(family: string): string {
  return GENERIC_FAMILIES.has(family) ? family : `"${family.replaceAll('"', '')}"`;
}

function boxLeft(align: TextAlign, x: number, textWidth: number): number {
  switch (align) {
    case 'left':
      return x;
    case 'center':
      return x - textWidth / 2;
    case 'right':
      return x - textWidth;
    default: {
      const exhaustive: never = align;
      throw new Error(`Unsupported alignment ${String(exhaustive)}`);
    }
  }
}
