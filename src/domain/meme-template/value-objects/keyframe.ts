export type AnimatableField = 'x' | 'y' | 'fontSize';

export const ANIMATABLE_FIELDS: readonly AnimatableField[] = ['x', 'y', 'fontSize'];

/**
 * Partial set of animatable values pinned at one frame. An absent field is
 * unset and takes its value from the neighbouring keyframes that do set it.
 */
export interface KeyframeEntry {
  readonly x?: number;
  readonly y?: number;
  readonly fontSize?: number;
}

export interface Keyframe extends KeyframeEntry {
  readonly frameIndex: number;
}

export interface ResolvedProperties {
  readonly x: number;
  readonly y: number;
  readonly fontSize: number;
}

/** Values used for a field that no keyframe sets. */
export type InterpolationDefaults = ResolvedProperties;

export function hasAnyField(entry: KeyframeEntry): boolean {
  return ANIMATABLE_FIELDS.some((field) => entry[field] !== undefined);
}

export function mergeKeyframeEntry(base: KeyframeEntry, update: KeyframeEntry): KeyframeEntry {
  return {
    x: update.x ?? base.x,
    y: update.y ?? base.y,
    fontSize: update.fontSize ?? base.fontSize,
  };
}

export function pickDefinedFields(entry: KeyframeEntry): KeyframeEntry {
  const picked: { x?: number; y?: number; fontSize?: number } = {};
  for (const field of ANIMATABLE_FIELDS) {
    const value = entry[field];
    if (value !== undefined) {
      picked[field] = value;
    }
  }
  return picked;
}
