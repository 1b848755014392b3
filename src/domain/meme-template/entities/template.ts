import { ValidationError } from '../../../shared/errors/index.js';
import type { AnimationIdentity, BaseAnimation } from '../value-objects/base-animation.js';
import type { TextTemplate } from './text-template.js';

export interface TemplateProps {
  readonly frameCount: number;
  readonly width?: number;
  readonly height?: number;
  readonly textTemplates: readonly TextTemplate[];
}

export class Template {
  public readonly identity: AnimationIdentity;

  /** Declaration order; the i-th caller string binds to the i-th overlay. */
  public readonly textTemplates: readonly TextTemplate[];

  private constructor(props: TemplateProps) {
    this.identity = Object.freeze({
      frameCount: props.frameCount,
      ...(props.width === undefined ? {} : { width: props.width }),
      ...(props.height === undefined ? {} : { height: props.height }),
    });
    this.textTemplates = Object.freeze([...props.textTemplates]);
  }

  public static create(props: TemplateProps): Template {
    const issues: string[] = [];
    const { frameCount } = props;

    if (!Number.isInteger(frameCount) || frameCount < 1) {
      issues.push(`Frame count must be a positive integer, received ${frameCount}`);
    }

    for (const [name, value] of [
      ['width', props.width],
      ['height', props.height],
    ] as const) {
      if (value !== undefined && (!Number.isInteger(value) || value <= 0)) {
        issues.push(`Template ${name} must be a positive integer, received ${value}`);
      }
    }

    const ids = new Set<string>();
    for (const textTemplate of props.textTemplates) {
      if (ids.has(textTemplate.id)) {
        issues.push(`Duplicate text template id "${textTemplate.id}"`);
      }
      ids.add(textTemplate.id);

      for (const keyframe of textTemplate.keyframes) {
        if (keyframe.frameIndex >= frameCount) {
          issues.push(
            `Text template "${textTemplate.id}" has keyframe ${keyframe.frameIndex} outside [0, ${frameCount - 1}]`,
          );
        }
      }
    }

    if (issues.length > 0) {
      throw new ValidationError(issues);
    }

    return new Template(props);
  }

  public get frameCount(): number {
    return this.identity.frameCount;
  }

  public getTextTemplate(id: string): TextTemplate | undefined {
    return this.textTemplates.find((textTemplate) => textTemplate.id === id);
  }

  /**
   * Checks that this template was designed for `animation`.
   */
  public bindTo(animation: BaseAnimation): this {
    const issues: string[] = [];
    const { frameCount, width, height } = this.identity;

    if (animation.frames.length !== frameCount) {
      issues.push(
        `Template expects ${frameCount} frames but ${animation.source} has ${animation.frames.length}`,
      );
    }

    if (width !== undefined && width !== animation.width) {
      issues.push(`Template expects width ${width} but ${animation.source} is ${animation.width} wide`);
    }

    if (height !== undefined && height !== animation.height) {
      issues.push(`Template expects height ${height} but ${animation.source} is ${animation.height} high`);
    }

    if (issues.length > 0) {
      throw new ValidationError(issues, { source: animation.source });
    }

    return this;
  }

  public withTextTemplate(textTemplate: TextTemplate): Template {
    const exists = this.textTemplates.some((entry) => entry.id === textTemplate.id);
    const textTemplates = exists
      ? this.textTemplates.map((entry) => (entry.id === textTemplate.id ? textTemplate : entry))
      : [...this.textTemplates, textTemplate];

    return Template.create({ ...this.identity, textTemplates });
  }

  public withoutTextTemplate(id: string): Template {
    return Template.create({
      ...this.identity,
      textTemplates: this.textTemplates.filter((entry) => entry.id !== id),
    });
  }
}
