import { ValidationError } from '../../../shared/errors/index.js';
import { resolve } from '../services/interpolation.js';
import {
  hasAnyField,
  mergeKeyframeEntry,
  pickDefinedFields,
  type InterpolationDefaults,
  type Keyframe,
  type KeyframeEntry,
} from '../value-objects/keyframe.js';
import { TEXT_ALIGNMENTS, type TextStyle } from '../value-objects/text-style.js';

export interface TextTemplateProps {
  readonly id: string;
  readonly style: TextStyle;
  readonly keyframes: readonly Keyframe[];
}

/**
 * One text overlay: static style plus a keyframe timeline. Instances are
 * immutable; the `with*` methods return validated copies.
 */
export class TextTemplate {
  public readonly id: string;

  public readonly style: TextStyle;

  /** Ordered by frame index, at most one keyframe per index. */
  public readonly keyframes: readonly Keyframe[];

  private constructor(props: TextTemplateProps) {
    this.id = props.id;
    this.style = Object.freeze({ ...props.style });
    this.keyframes = Object.freeze(
      [...props.keyframes]
        .sort((a, b) => a.frameIndex - b.frameIndex)
        .map((keyframe) =>
          Object.freeze({ frameIndex: keyframe.frameIndex, ...pickDefinedFields(keyframe) }),
        ),
    );
  }

  public static create(props: TextTemplateProps): TextTemplate {
    const issues = TextTemplate.validate(props);
    if (issues.length > 0) {
      throw new ValidationError(issues, { textTemplateId: props.id });
    }

    return new TextTemplate(props);
  }

  public static validate(props: TextTemplateProps): string[] {
    const issues: string[] = [];
    const label = `Text template "${props.id}"`;

    if (props.id.trim().length === 0) {
      issues.push('Text template id must not be empty');
    }

    if (!TEXT_ALIGNMENTS.includes(props.style.align)) {
      issues.push(`${label} has unsupported alignment "${props.style.align}"`);
    }

    if (!Number.isFinite(props.style.strokeWidth) || props.style.strokeWidth < 0) {
      issues.push(`${label} stroke width must be a non-negative number`);
    }

    const seen = new Set<number>();
    for (const keyframe of props.keyframes) {
      const { frameIndex } = keyframe;

      if (!Number.isInteger(frameIndex) || frameIndex < 0) {
        issues.push(`${label} has invalid keyframe index ${frameIndex}`);
        continue;
      }

      if (seen.has(frameIndex)) {
        issues.push(`${label} has more than one keyframe at frame ${frameIndex}`);
      }
      seen.add(frameIndex);

      for (const [field, value] of [
        ['x', keyframe.x],
        ['y', keyframe.y],
        ['fontSize', keyframe.fontSize],
      ] as const) {
        if (value !== undefined && !Number.isFinite(value)) {
          issues.push(`${label} keyframe ${frameIndex} has a non-finite ${field}`);
        }
      }

      if (keyframe.fontSize !== undefined && keyframe.fontSize <= 0) {
        issues.push(`${label} keyframe ${frameIndex} has a non-positive font size`);
      }
    }

    return issues;
  }

  public keyframeAt(frameIndex: number): Keyframe | undefined {
    return this.keyframes.find((keyframe) => keyframe.frameIndex === frameIndex);
  }

  /**
   * Sets fields at a frame, merging into an existing keyframe there. Fields
   * left unset in `entry` keep their previous value.
   */
  public withKeyframe(frameIndex: number, entry: KeyframeEntry): TextTemplate {
    if (!hasAnyField(entry)) {
      return this;
    }

    const existing = this.keyframeAt(frameIndex);
    const merged = existing ? mergeKeyframeEntry(existing, entry) : entry;
    const keyframes = this.keyframes.filter((keyframe) => keyframe.frameIndex !== frameIndex);

    return TextTemplate.create({
      id: this.id,
      style: this.style,
      keyframes: [...keyframes, { frameIndex, ...pickDefinedFields(merged) }],
    });
  }

  public withoutKeyframe(frameIndex: number): TextTemplate {
    if (!this.keyframeAt(frameIndex)) {
      return this;
    }

    return new TextTemplate({
      id: this.id,
      style: this.style,
      keyframes: this.keyframes.filter((keyframe) => keyframe.frameIndex !== frameIndex),
    });
  }

  /** Pins every field to its currently interpolated value at `frameIndex`. */
  public captureKeyframe(frameIndex: number, defaults: InterpolationDefaults): TextTemplate {
    return this.withKeyframe(frameIndex, resolve(this, frameIndex, defaults));
  }

  public withStyle(style: Partial<TextStyle>): TextTemplate {
    return TextTemplate.create({
      id: this.id,
      style: { ...this.style, ...style },
      keyframes: this.keyframes,
    });
  }
}
