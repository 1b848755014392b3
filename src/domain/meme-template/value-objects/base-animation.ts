import { ValidationError } from '../../../shared/errors/index.js';

export interface AnimationFrame {
  readonly index: number;
  readonly bitmap: Uint8ClampedArray;
  readonly delayMs: number;
}

/**
 * Identity of the animation a template was designed against.
 */
export interface AnimationIdentity {
  readonly frameCount: number;
  readonly width?: number;
  readonly height?: number;
}

export interface BaseAnimation {
  readonly source: string;
  readonly width: number;
  readonly height: number;
  readonly frames: readonly AnimationFrame[];
}

export interface BaseAnimationProps {
  readonly source: string;
  readonly width: number;
  readonly height: number;
  readonly frames: readonly { readonly data: Uint8ClampedArray; readonly delayMs: number }[];
}

export function createBaseAnimation(props: BaseAnimationProps): BaseAnimation {
  const issues: string[] = [];
  const expectedBytes = props.width * props.height * 4;

  if (!Number.isInteger(props.width) || props.width <= 0 || !Number.isInteger(props.height) || props.height <= 0) {
    issues.push(`Animation dimensions ${props.width}x${props.height} must be positive integers`);
  }

  if (props.frames.length === 0) {
    issues.push('Animation must contain at least one frame');
  }

  props.frames.forEach((frame, index) => {
    if (frame.data.length !== expectedBytes) {
      issues.push(`Frame ${index} has ${frame.data.length} bytes, expected ${expectedBytes}`);
    }
    if (!(frame.delayMs > 0)) {
      issues.push(`Frame ${index} has a non-positive delay`);
    }
  });

  if (issues.length > 0) {
    throw new ValidationError(issues, { source: props.source });
  }

  return Object.freeze({
    source: props.source,
    width: props.width,
    height: props.height,
    frames: Object.freeze(
      props.frames.map((frame, index) =>
        Object.freeze({ index, bitmap: frame.data, delayMs: frame.delayMs }),
      ),
    ),
  });
}
