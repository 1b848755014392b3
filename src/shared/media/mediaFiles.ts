import { promises as fs } from 'node:fs';
import path from 'node:path';

import { IOError } from '../errors/index.js';

export async function writeMediaFile(outputPath: string, buffer: Buffer): Promise<string> {
  const resolved = path.resolve(outputPath);
  try {
    await fs.mkdir(path.dirname(resolved), { recursive: true });
    await fs.writeFile(resolved, buffer);
  } catch (error) {
    throw new IOError('write', resolved, error);
  }
  return resolved;
}
