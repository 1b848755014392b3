import path from 'node:path';

import {
  isFontFile,
  resolveFrame,
  type InterpolationDefaults,
  type OverlayDrawCommand,
  type Template,
} from '../../domain/meme-template/index.js';
import { TextCountError } from '../../shared/errors/index.js';

/**
 * Positional binding of caller strings to overlays. Missing strings fall
 * back to each overlay's placeholder; surplus strings are an error.
 */
export function bindTexts(template: Template, texts: readonly string[]): string[] {
  const { textTemplates } = template;
  if (texts.length > textTemplates.length) {
    throw new TextCountError(texts.length, textTemplates.length);
  }

  return textTemplates.map((textTemplate, index) => texts[index] ?? textTemplate.style.placeholder);
}

export function buildOverlayCommands(
  template: Template,
  frameIndex: number,
  boundTexts: readonly string[],
  defaults: InterpolationDefaults,
  assetsDir: string,
): OverlayDrawCommand[] {
  return resolveFrame(template, frameIndex, defaults).map(({ textTemplate, properties }, index) => {
    const { style } = textTemplate;

    return {
      ...properties,
      text: boundTexts[index] ?? style.placeholder,
      font: isFontFile(style.font) ? path.resolve(assetsDir, style.font) : style.font,
      color: style.color,
      align: style.align,
      strokeWidth: style.strokeWidth,
      strokeColor: style.strokeColor,
      ...(style.backgroundColor === undefined ? {} : { backgroundColor: style.backgroundColor }),
    } satisfies OverlayDrawCommand;
  });
}
