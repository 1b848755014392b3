import { promises as fs } from 'node:fs';
import path from 'node:path';

import { afterAll, afterEach, beforeAll, describe, expect, test, vi } from 'vitest';

import type { GenerateMemeOutcome } from '../../../src/application/meme-generator/index.js';
import {
  EXIT_FAILURE,
  EXIT_SUCCESS,
  EXIT_USAGE,
  parseCliArguments,
  runCli,
  USAGE,
  type MemeGenerator,
  type MemeGeneratorFactory,
} from '../../../src/cli/generate-meme.js';
import { Template } from '../../../src/domain/meme-template/index.js';
import { JsonTemplateSerializer } from '../../../src/infrastructure/template-store/index.js';
import { AppError, TextCountError } from '../../../src/shared/errors/index.js';
import { buildTextTemplate, createTempDir, encodeGifFixture, GREEN, RED } from '../../helpers/fixtures.js';

const outcome: GenerateMemeOutcome = {
  outputPath: '/memes/cat_meme.gif',
  frameCount: 2,
  width: 8,
  height: 8,
  delaysMs: [100, 100],
  metrics: {
    decodeTimeMs: 1,
    renderTimeMs: 1,
    encodeTimeMs: 1,
    totalTimeMs: 3,
    outputSizeBytes: 42,
    averageFrameProcessingMs: 0.5,
  },
};

const captureIo = () => {
  const stdout: string[] = [];
  const stderr: string[] = [];
  return {
    stdout,
    stderr,
    io: {
      stdout: (line: string) => stdout.push(line),
      stderr: (line: string) => stderr.push(line),
    },
  };
};

const fakeGenerator = (generate: MemeGenerator['generate']) => {
  const generator: MemeGenerator = {
    generate: vi.fn(generate),
    dispose: vi.fn(async () => undefined),
  };
  const factory = vi.fn((_options: Parameters<MemeGeneratorFactory>[0]): MemeGenerator => generator);
  return { generator, factory };
};

describe('parseCliArguments', () => {
  test('collects repeated texts in order', () => {
    expect(parseCliArguments(['cat.gif', '-t', 'top', '--text', 'bottom', '-o', 'out.gif'])).toEqual({
      help: false,
      payload: { gifPath: 'cat.gif', texts: ['top', 'bottom'], outputPath: 'out.gif' },
    });
  });

  test('accepts inline values and option values that look like flags', () => {
    expect(
      parseCliArguments(['--text=hello', '-t', '-1', '--poster=first.png', '--workers=3', 'cat.gif']),
    ).toEqual({
      help: false,
      payload: { gifPath: 'cat.gif', texts: ['hello', '-1'], posterPath: 'first.png' },
      workers: 3,
    });
  });

  test('treats everything after -- as positional', () => {
    expect(parseCliArguments(['--', '-odd.gif'])).toEqual({
      help: false,
      payload: { gifPath: '-odd.gif', texts: [] },
    });
  });

  test('recognises help anywhere', () => {
    expect(parseCliArguments(['cat.gif', '--help'])).toEqual({ help: true });
    expect(parseCliArguments(['-h'])).toEqual({ help: true });
  });

  test.each([
    [['cat.gif', '-t'], 'Option -t requires a value'],
    [['cat.gif', '--output'], 'Option --output requires a value'],
    [['cat.gif', '--bogus'], 'Unknown option: --bogus'],
    [[], 'Missing <gif_path>'],
    [['cat.gif', 'dog.gif'], 'Unexpected argument: dog.gif'],
    [['cat.gif', '--workers', '0'], '--workers expects a positive integer, received "0"'],
  ])('rejects %j', (argv, message) => {
    expect(() => parseCliArguments(argv)).toThrow(message);
  });
});

describe('runCli', () => {
  test('prints usage and exits 2 on a usage error', async () => {
    const { io, stdout, stderr } = captureIo();
    const { factory } = fakeGenerator(async () => outcome);

    await expect(runCli(['--bogus'], io, undefined, factory)).resolves.toBe(EXIT_USAGE);

    expect(stderr).toEqual(['error: Unknown option: --bogus', USAGE]);
    expect(stdout).toEqual([]);
    expect(factory).not.toHaveBeenCalled();
  });

  test('prints usage to stdout for --help', async () => {
    const { io, stdout, stderr } = captureIo();
    const { factory } = fakeGenerator(async () => outcome);

    await expect(runCli(['--help'], io, undefined, factory)).resolves.toBe(EXIT_SUCCESS);

    expect(stdout).toEqual([USAGE]);
    expect(stderr).toEqual([]);
    expect(factory).not.toHaveBeenCalled();
  });

  test('prints the written paths and disposes the generator', async () => {
    const { io, stdout } = captureIo();
    const { generator, factory } = fakeGenerator(async () => ({ ...outcome, posterPath: '/memes/poster.png' }));

    await expect(
      runCli(['cat.gif', '-t', 'hi', '--poster', 'poster.png', '--workers', '2'], io, undefined, factory),
    ).resolves.toBe(EXIT_SUCCESS);

    expect(stdout).toEqual(['/memes/cat_meme.gif', '/memes/poster.png']);
    expect(factory).toHaveBeenCalledWith({ workers: 2 });
    expect(generator.generate).toHaveBeenCalledWith(
      { gifPath: 'cat.gif', texts: ['hi'], posterPath: 'poster.png' },
      undefined,
    );
    expect(generator.dispose).toHaveBeenCalledTimes(1);
  });

  test('exits 1 with the error message for domain failures', async () => {
    const { io, stderr } = captureIo();
    const { generator, factory } = fakeGenerator(async () => {
      throw new TextCountError(3, 2);
    });

    await expect(runCli(['cat.gif', '-t', 'a', '-t', 'b', '-t', 'c'], io, undefined, factory)).resolves.toBe(
      EXIT_FAILURE,
    );

    expect(stderr).toEqual(['error: Received 3 text strings but the template only has 2 text overlays']);
    expect(generator.dispose).toHaveBeenCalledTimes(1);
  });

  test('prefixes internal failures with their code', async () => {
    const { io, stderr } = captureIo();
    const { factory } = fakeGenerator(async () => {
      throw AppError.fromError(new Error('boom'), 'meme-generator.failure');
    });

    await expect(runCli(['cat.gif'], io, undefined, factory)).resolves.toBe(EXIT_FAILURE);

    expect(stderr).toEqual(['error: meme-generator.failure: boom']);
  });

  test('forwards the abort signal', async () => {
    const { io } = captureIo();
    const controller = new AbortController();
    const { generator, factory } = fakeGenerator(async () => outcome);

    await runCli(['cat.gif'], io, controller.signal, factory);

    expect(generator.generate).toHaveBeenCalledWith({ gifPath: 'cat.gif', texts: [] }, controller.signal);
  });
});

describe('runCli end to end', () => {
  let workDir: string;

  beforeAll(async () => {
    workDir = await createTempDir('meme-cli-');
    await fs.writeFile(
      path.join(workDir, 'wave.gif'),
      await encodeGifFixture([
        { color: RED, delayMs: 60 },
        { color: GREEN, delayMs: 90 },
      ]),
    );
    await new JsonTemplateSerializer().save(
      Template.create({ frameCount: 2, textTemplates: [buildTextTemplate('top')] }),
      path.join(workDir, 'wave.json'),
    );
  });

  afterAll(async () => {
    await fs.rm(workDir, { recursive: true, force: true });
  });

  test('writes <name>_meme.gif next to the template', async () => {
    const { io, stdout, stderr } = captureIo();

    await expect(runCli([path.join(workDir, 'wave.gif'), '-t', 'hi'], io)).resolves.toBe(EXIT_SUCCESS);

    const expected = path.join(workDir, 'wave_meme.gif');
    expect(stderr).toEqual([]);
    expect(stdout).toEqual([expected]);
    expect((await fs.stat(expected)).isFile()).toBe(true);
  });

  test('exits 1 when the template is missing', async () => {
    const { io, stderr } = captureIo();
    const gifPath = path.join(workDir, 'orphan.gif');
    await fs.writeFile(gifPath, 'GIF89a');

    await expect(runCli([gifPath], io)).resolves.toBe(EXIT_FAILURE);

    expect(stderr).toEqual([`error: File not found: ${path.join(workDir, 'orphan.json')}`]);
  });
});

describe('runCli with an invalid environment', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
    vi.resetModules();
  });

  test('reports the bad variable and exits 1 instead of failing on import', async () => {
    vi.stubEnv('MEME_GIF_QUALITY', '99');
    vi.resetModules();
    const cli = await import('../../../src/cli/generate-meme.js');
    const { io, stdout, stderr } = captureIo();

    await expect(cli.runCli(['cat.gif', '-t', 'hi'], io)).resolves.toBe(cli.EXIT_FAILURE);

    expect(stdout).toEqual([]);
    expect(stderr).toEqual(['error: MEME_GIF_QUALITY: Number must be less than or equal to 30']);
  });
});
