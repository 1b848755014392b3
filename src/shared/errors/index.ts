export { MemeAnimatorError } from './base.error.js';
export type { MemeAnimatorErrorOptions } from './base.error.js';
export { AppError } from './app-error.js';
export {
  IOError,
  RenderAbortedError,
  TemplateFormatError,
  TextCountError,
  ValidationError,
} from './meme-errors.js';
export type { IOOperation } from './meme-errors.js';
