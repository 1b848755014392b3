export { GenerateMemeCommand } from './commands/generate-meme.command.js';
export { generateMemeCommandSchema } from './dto/generate-meme.dto.js';
export type { GenerateMemePayload, ValidatedGenerateMemePayload } from './dto/generate-meme.dto.js';
export { GenerateMemeHandler } from './handlers/generate-meme.handler.js';
export type {
  GenerateMemeHandlerOptions,
  GenerateMemeMetrics,
  GenerateMemeOutcome,
} from './handlers/generate-meme.handler.js';
