import {
  GenerateMemeCommand,
  GenerateMemeHandler,
  type GenerateMemeOutcome,
  type GenerateMemePayload,
} from '../application/meme-generator/index.js';
import { getConfig } from '../config/env.js';
import { createFrameRenderer, GifAnimationAssembler } from '../infrastructure/meme-renderer/index.js';
import { JsonTemplateSerializer } from '../infrastructure/template-store/index.js';
import { MemeAnimatorError } from '../shared/errors/index.js';

export const USAGE = `Usage: generate_meme <gif_path> [-t TEXT]... [-o OUTPUT] [--poster PNG] [--workers N]

Renders the template paired with <gif_path> (same directory, same name, .json).

Options:
  -t, --text TEXT     text for the next overlay, in template order (repeatable)
  -o, --output PATH   output GIF (default: <gif_dir>/<name>_meme.gif, suffix from MEME_OUTPUT_SUFFIX)
      --poster PATH   also write the first rendered frame as PNG
      --workers N     compositor worker threads (1 renders on the main thread)
  -h, --help          show this help`;

export const EXIT_SUCCESS = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

export type CliArguments =
  | { readonly help: true }
  | {
      readonly help: false;
      readonly payload: GenerateMemePayload;
      readonly workers?: number;
    };

export class CliUsageError extends MemeAnimatorError {
  public constructor(message: string) {
    super({ code: 'cli.usage', message, exposeMessage: true });
  }
}

export function parseCliArguments(argv: readonly string[]): CliArguments {
  const texts: string[] = [];
  const positionals: string[] = [];
  let outputPath: string | undefined;
  let posterPath: string | undefined;
  let workers: number | undefined;
  let optionsEnded = false;

  for (let i = 0; i < argv.length; i += 1) {
    const token = argv[i] ?? '';

    if (optionsEnded || !token.startsWith('-') || token === '-') {
      positionals.push(token);
      continue;
    }

    if (token === '--') {
      optionsEnded = true;
      continue;
    }

    const equalsAt = token.startsWith('--') ? token.indexOf('=') : -1;
    const flag = equalsAt >= 0 ? token.slice(0, equalsAt) : token;
    const inlineValue = equalsAt >= 0 ? token.slice(equalsAt + 1) : undefined;

    const takeValue = (): string => {
      if (inlineValue !== undefined) {
        return inlineValue;
      }
      const next = argv[i + 1];
      if (next === undefined) {
        throw new CliUsageError(`Option ${flag} requires a value`);
      }
      i += 1;
      return next;
    };

    switch (flag) {
      case '-h':
      case '--help':
        return { help: true };
      case '-t':
      case '--text':
        texts.push(takeValue());
        break;
      case '-o':
      case '--output':
        outputPath = takeValue();
        break;
      case '--poster':
        posterPath = takeValue();
        break;
      case '--workers': {
        const raw = takeValue();
        const parsed = Number(raw);
        if (!Number.isInteger(parsed) || parsed < 1) {
          throw new CliUsageError(`--workers expects a positive integer, received "${raw}"`);
        }
        workers = parsed;
        break;
      }
      default:
        throw new CliUsageError(`Unknown option: ${flag}`);
    }
  }

  const [gifPath, ...extra] = positionals;
  if (gifPath === undefined || gifPath.length === 0) {
    throw new CliUsageError('Missing <gif_path>');
  }
  if (extra.length > 0) {
    throw new CliUsageError(`Unexpected argument: ${extra[0] ?? ''}`);
  }

  return {
    help: false,
    payload: {
      gifPath,
      texts,
      ...(outputPath === undefined ? {} : { outputPath }),
      ...(posterPath === undefined ? {} : { posterPath }),
    },
    ...(workers === undefined ? {} : { workers }),
  };
}

export interface CliIo {
  readonly stdout: (line: string) => void;
  readonly stderr: (line: string) => void;
}

export interface MemeGenerator {
  generate(payload: GenerateMemePayload, signal?: AbortSignal): Promise<GenerateMemeOutcome>;
  dispose(): Promise<void>;
}

export type MemeGeneratorFactory = (options: { workers?: number }) => MemeGenerator;

export const createMemeGenerator: MemeGeneratorFactory = ({ workers }) => {
  const config = getConfig();
  const renderer = createFrameRenderer(workers ?? config.workerPoolSize, config.textCacheEntries);
  const assembler = new GifAnimationAssembler(renderer, {
    defaults: config.defaults,
    encoding: config.gif,
  });
  const handler = new GenerateMemeHandler(new JsonTemplateSerializer(), assembler, {
    outputSuffix: config.outputSuffix,
  });

  return {
    generate: (payload, signal) => handler.execute(new GenerateMemeCommand(payload), signal),
    dispose: () => renderer.destroy(),
  };
};

export async function runCli(
  argv: readonly string[],
  io: CliIo,
  signal?: AbortSignal,
  factory: MemeGeneratorFactory = createMemeGenerator,
): Promise<number> {
  let parsed: CliArguments;
  try {
    parsed = parseCliArguments(argv);
  } catch (error) {
    if (error instanceof CliUsageError) {
      io.stderr(`error: ${error.message}`);
      io.stderr(USAGE);
      return EXIT_USAGE;
    }
    throw error;
  }

  if (parsed.help) {
    io.stdout(USAGE);
    return EXIT_SUCCESS;
  }

  let generator: MemeGenerator | undefined;
  try {
    generator = factory(parsed.workers === undefined ? {} : { workers: parsed.workers });
    const outcome = await generator.generate(parsed.payload, signal);
    io.stdout(outcome.outputPath);
    if (outcome.posterPath) {
      io.stdout(outcome.posterPath);
    }
    return EXIT_SUCCESS;
  } catch (error) {
    io.stderr(`error: ${describeError(error)}`);
    return EXIT_FAILURE;
  } finally {
    await generator?.dispose();
  }
}

function describeError(error: unknown): string {
  if (error instanceof MemeAnimatorError) {
    return error.exposeMessage ? error.message : `${error.code}: ${error.message}`;
  }

  return error instanceof Error ? error.message : String(error);
}
