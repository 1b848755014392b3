import { MemeAnimatorError } from './base.error.js';

export class TemplateFormatError extends MemeAnimatorError {
  public constructor(message: string, metadata: Record<string, unknown> = {}, cause?: unknown) {
    super({ code: 'template.format', message, metadata, cause, exposeMessage: true });
  }
}

export class ValidationError extends MemeAnimatorError {
  public readonly issues: readonly string[];

  public constructor(issues: readonly string[], metadata: Record<string, unknown> = {}) {
    super({
      code: 'template.validation',
      message: issues.length === 1 ? (issues[0] ?? 'Validation failed') : `Validation failed: ${issues.join('; ')}`,
      metadata: { ...metadata, issues },
      exposeMessage: true,
    });
    this.issues = issues;
  }
}

export class TextCountError extends MemeAnimatorError {
  public constructor(supplied: number, available: number) {
    super({
      code: 'render.text-count',
      message: `Received ${supplied} text strings but the template only has ${available} text overlays`,
      metadata: { supplied, available },
      exposeMessage: true,
    });
  }
}

export type IOOperation = 'read' | 'write' | 'missing';

export class IOError extends MemeAnimatorError {
  public readonly path: string;

  public constructor(operation: IOOperation, path: string, cause?: unknown) {
    super({
      code: `io.${operation}`,
      message: IOError.describe(operation, path),
      metadata: { path },
      cause,
      exposeMessage: true,
    });
    this.path = path;
  }

  private static describe(operation: IOOperation, path: string): string {
    switch (operation) {
      case 'missing':
        return `File not found: ${path}`;
      case 'read':
        return `Unable to read ${path}`;
      case 'write':
        return `Unable to write ${path}`;
      default: {
        const exhaustive: never = operation;
        return `I/O failure (${String(exhaustive)}) on ${path}`;
      }
    }
  }
}

export class RenderAbortedError extends MemeAnimatorError {
  public constructor(reason?: unknown) {
    super({
      code: 'render.aborted',
      message: 'Render was cancelled before it completed',
      cause: reason,
      exposeMessage: true,
    });
  }
}
