import { describe, expect, test } from 'vitest';

import { loadConfig } from '../../../src/config/env.js';
import { ValidationError } from '../../../src/shared/errors/index.js';

describe('loadConfig', () => {
  test('falls back to the documented defaults', () => {
    const config = loadConfig({});

    expect(config.logLevel).toBe('info');
    expect(config.defaults).toEqual({ x: 20, y: 20, fontSize: 50 });
    expect(config.gif).toEqual({ quality: 10, repeat: 0 });
    expect(config.outputSuffix).toBe('_meme');
    expect(config.textCacheEntries).toBe(256);
    expect(config.workerPoolSize).toBeGreaterThanOrEqual(1);
  });

  test('reads overrides from the environment', () => {
    const config = loadConfig({
      LOG_LEVEL: 'debug',
      MEME_DEFAULT_FONT_SIZE: '32',
      MEME_DEFAULT_X: '5',
      MEME_DEFAULT_Y: '7.5',
      MEME_WORKER_POOL_SIZE: '4',
      MEME_GIF_QUALITY: '1',
      MEME_GIF_REPEAT: '-1',
      MEME_OUTPUT_SUFFIX: '-captioned',
      MEME_TEXT_CACHE_ENTRIES: '16',
    });

    expect(config).toEqual({
      logLevel: 'debug',
      defaults: { x: 5, y: 7.5, fontSize: 32 },
      workerPoolSize: 4,
      gif: { quality: 1, repeat: -1 },
      outputSuffix: '-captioned',
      textCacheEntries: 16,
    });
  });

  test.each([
    ['LOG_LEVEL', 'loud'],
    ['MEME_DEFAULT_FONT_SIZE', '-3'],
    ['MEME_GIF_QUALITY', '31'],
    ['MEME_GIF_REPEAT', '-2'],
    ['MEME_WORKER_POOL_SIZE', '1.5'],
    ['MEME_OUTPUT_SUFFIX', ''],
  ])('rejects %s=%j', (name, value) => {
    let caught: unknown;
    try {
      loadConfig({ [name]: value });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ValidationError);
    expect(caught).toMatchObject({ metadata: { source: 'environment' } });
    expect(caught instanceof ValidationError ? caught.issues[0] : '').toMatch(new RegExp(`^${name}: `));
  });
});
