export type TextAlign = 'left' | 'center' | 'right';

export const TEXT_ALIGNMENTS: readonly TextAlign[] = ['left', 'center', 'right'];

export const DEFAULT_STROKE_WIDTH = 2;

export const DEFAULT_STROKE_COLOR = '#000000';

/**
 * Styling shared by every frame of an overlay.
 */
export interface TextStyle {
  /** Font family name, or a path to a font file relative to the template. */
  readonly font: string;
  readonly color: string;
  readonly align: TextAlign;
  readonly placeholder: string;
  readonly strokeWidth: number;
  readonly strokeColor: string;
  readonly backgroundColor?: string;
}

const FONT_FILE_PATTERN = /\.(ttf|otf|woff2?)$/i;

export function isFontFile(font: string): boolean {
  return FONT_FILE_PATTERN.test(font);
}
