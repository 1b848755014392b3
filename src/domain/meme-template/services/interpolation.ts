import type { Template } from '../entities/template.js';
import type { TextTemplate } from '../entities/text-template.js';
import type {
  AnimatableField,
  InterpolationDefaults,
  Keyframe,
  ResolvedProperties,
} from '../value-objects/keyframe.js';

export interface ResolvedOverlay {
  readonly textTemplate: TextTemplate;
  readonly properties: ResolvedProperties;
}

interface FieldPoint {
  readonly frameIndex: number;
  readonly value: number;
}

/**
 * Piecewise-linear value of one field. Holds the first and last set values
 * outside the keyframed range and returns stored values exactly on their
 * own frame.
 */
export function resolveField(
  keyframes: readonly Keyframe[],
  field: AnimatableField,
  frameIndex: number,
  fallback: number,
): number {
  const points: FieldPoint[] = [];
  for (const keyframe of keyframes) {
    const value = keyframe[field];
    if (value !== undefined) {
      points.push({ frameIndex: keyframe.frameIndex, value });
    }
  }

  const first = points[0];
  const last = points[points.length - 1];
  if (!first || !last) {
    return fallback;
  }

  if (frameIndex <= first.frameIndex) {
    return first.value;
  }

  if (frameIndex >= last.frameIndex) {
    return last.value;
  }

  // first point at or after frameIndex; exists because frameIndex < last
  let low = 0;
  let high = points.length - 1;
  while (low < high) {
    const middle = (low + high) >> 1;
    const point = points[middle];
    if (point && point.frameIndex < frameIndex) {
      low = middle + 1;
    } else {
      high = middle;
    }
  }

  const upper = points[low];
  const lower = points[low - 1];
  if (!upper || !lower) {
    return fallback;
  }

  if (upper.frameIndex === frameIndex) {
    return upper.value;
  }

  return (
    lower.value +
    ((upper.value - lower.value) * (frameIndex - lower.frameIndex)) /
      (upper.frameIndex - lower.frameIndex)
  );
}

export function resolve(
  textTemplate: TextTemplate,
  frameIndex: number,
  defaults: InterpolationDefaults,
): ResolvedProperties {
  const { keyframes } = textTemplate;

  return {
    x: resolveField(keyframes, 'x', frameIndex, defaults.x),
    y: resolveField(keyframes, 'y', frameIndex, defaults.y),
    fontSize: resolveField(keyframes, 'fontSize', frameIndex, defaults.fontSize),
  };
}

export function resolveFrame(
  template: Template,
  frameIndex: number,
  defaults: InterpolationDefaults,
): ResolvedOverlay[] {
  return template.textTemplates.map((textTemplate) => ({
    textTemplate,
    properties: resolve(textTemplate, frameIndex, defaults),
  }));
}
