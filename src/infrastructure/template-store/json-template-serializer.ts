import { promises as fs } from 'node:fs';
import path from 'node:path';

import { visit } from 'jsonc-parser';

import {
  DEFAULT_STROKE_COLOR,
  DEFAULT_STROKE_WIDTH,
  Template,
  TextTemplate,
  type Keyframe,
  type TemplateSerializer,
} from '../../domain/meme-template/index.js';
import { IOError, TemplateFormatError, ValidationError } from '../../shared/errors/index.js';
import { createChildLogger } from '../../shared/logger/pino.js';
import {
  templateFileSchema,
  type KeyframeEntryJson,
  type TemplateFileJson,
  type TextTemplateJson,
} from './template-schema.js';

/**
 * Reads and writes the `<name>.json` half of a template pair.
 */
export class JsonTemplateSerializer implements TemplateSerializer {
  private readonly logger = createChildLogger({ module: 'JsonTemplateSerializer' });

  public async load(filePath: string): Promise<Template> {
    let raw: string;
    try {
      raw = await fs.readFile(filePath, 'utf8');
    } catch (error) {
      const missing = error instanceof Error && 'code' in error && error.code === 'ENOENT';
      throw new IOError(missing ? 'missing' : 'read', filePath, error);
    }

    const template = this.parse(raw, filePath);
    this.logger.debug(
      { path: filePath, overlays: template.textTemplates.length, frameCount: template.frameCount },
      'Template loaded',
    );
    return template;
  }

  public async save(template: Template, filePath: string): Promise<void> {
    const resolved = path.resolve(filePath);
    try {
      await fs.mkdir(path.dirname(resolved), { recursive: true });
      await fs.writeFile(resolved, this.stringify(template), 'utf8');
    } catch (error) {
      throw new IOError('write', resolved, error);
    }
  }

  /**
   * `JSON.parse` keeps only the last of two equal keys, so repeats are found
   * on the raw text first.
   */
  public parse(text: string, source = '<inline>'): Template {
    let json: unknown;
    try {
      json = JSON.parse(text);
    } catch (error) {
      throw new TemplateFormatError(`Template ${source} is not valid JSON`, { path: source }, error);
    }

    const repeated = findRepeatedKeys(text);
    if (repeated.length > 0) {
      throw new ValidationError(
        repeated.map((issue) => `Template ${source} ${issue}`),
        { path: source },
      );
    }

    return this.fromJson(json, source);
  }

  /**
   * Structural problems raise `TemplateFormatError`; model invariants are
   * left to `Template.create` and raise `ValidationError`.
   */
  public fromJson(json: unknown, source = '<inline>'): Template {
    const parsed = templateFileSchema.safeParse(json);
    if (!parsed.success) {
      const issues = parsed.error.issues.map(
        (issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`,
      );
      throw new TemplateFormatError(`Template ${source} is malformed: ${issues.join('; ')}`, {
        path: source,
        issues,
      });
    }

    const { data } = parsed;
    return Template.create({
      frameCount: data.frame_count,
      width: data.width,
      height: data.height,
      textTemplates: data.text_templates.map((entry) => toTextTemplate(entry)),
    });
  }

  public toJson(template: Template): TemplateFileJson {
    const { frameCount, width, height } = template.identity;

    return {
      frame_count: frameCount,
      ...(width === undefined ? {} : { width }),
      ...(height === undefined ? {} : { height }),
      text_templates: template.textTemplates.map((textTemplate) => fromTextTemplate(textTemplate)),
    };
  }

  public stringify(template: Template): string {
    return `${JSON.stringify(this.toJson(template), null, 2)}\n`;
  }
}

function findRepeatedKeys(text: string): string[] {
  const scopes: Set<string>[] = [];
  const repeats: string[] = [];

  visit(text, {
    onObjectBegin: () => {
      scopes.push(new Set());
    },
    onObjectEnd: () => {
      scopes.pop();
    },
    onObjectProperty: (property, _offset, _length, _line, _column, pathSupplier) => {
      const scope = scopes[scopes.length - 1];
      if (!scope) {
        return;
      }
      if (scope.has(property)) {
        repeats.push(`repeats key "${property}" in ${pathSupplier().join('.') || '<root>'}`);
      }
      scope.add(property);
    },
  });

  return repeats;
}

function toTextTemplate(entry: TextTemplateJson): TextTemplate {
  const keyframes: Keyframe[] = Object.entries(entry.keyframes).map(([key, value]) => ({
    frameIndex: Number.parseInt(key, 10),
    x: value.x ?? undefined,
    y: value.y ?? undefined,
    fontSize: value.font_size ?? undefined,
  }));

  return TextTemplate.create({
    id: entry.id,
    style: {
      font: entry.font,
      color: entry.color,
      align: entry.align,
      placeholder: entry.placeholder,
      strokeWidth: entry.stroke_width ?? DEFAULT_STROKE_WIDTH,
      strokeColor: entry.stroke_color ?? DEFAULT_STROKE_COLOR,
      ...(entry.background_color == null ? {} : { backgroundColor: entry.background_color }),
    },
    keyframes,
  });
}

function fromTextTemplate(textTemplate: TextTemplate): TextTemplateJson {
  const { style } = textTemplate;
  const keyframes: Record<string, KeyframeEntryJson> = {};

  for (const keyframe of textTemplate.keyframes) {
    keyframes[String(keyframe.frameIndex)] = {
      ...(keyframe.x === undefined ? {} : { x: keyframe.x }),
      ...(keyframe.y === undefined ? {} : { y: keyframe.y }),
      ...(keyframe.fontSize === undefined ? {} : { font_size: keyframe.fontSize }),
    };
  }

  return {
    id: textTemplate.id,
    font: style.font,
    color: style.color,
    align: style.align,
    placeholder: style.placeholder,
    stroke_width: style.strokeWidth,
    stroke_color: style.strokeColor,
    ...(style.backgroundColor === undefined ? {} : { background_color: style.backgroundColor }),
    keyframes,
  };
}
