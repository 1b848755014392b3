import { promises as fs } from 'node:fs';
import path from 'node:path';

import { IOError } from '../../shared/errors/index.js';

export interface TemplatePair {
  readonly gifPath: string;
  readonly templatePath: string;
  readonly directory: string;
  readonly baseName: string;
}

/** `<dir>/<name>.gif` pairs with `<dir>/<name>.json`. */
export function pairedTemplatePath(gifPath: string): string {
  const { dir, name } = path.parse(path.resolve(gifPath));
  return path.join(dir, `${name}.json`);
}

export async function resolveTemplatePair(gifPath: string): Promise<TemplatePair> {
  const resolvedGif = path.resolve(gifPath);
  const templatePath = pairedTemplatePath(resolvedGif);

  for (const candidate of [resolvedGif, templatePath]) {
    try {
      await fs.access(candidate);
    } catch (error) {
      throw new IOError('missing', candidate, error);
    }
  }

  const { dir, name } = path.parse(resolvedGif);
  return { gifPath: resolvedGif, templatePath, directory: dir, baseName: name };
}

export function defaultOutputPath(gifPath: string, suffix: string): string {
  const { dir, name } = path.parse(path.resolve(gifPath));
  return path.join(dir, `${name}${suffix}.gif`);
}
