export interface MemeAnimatorErrorOptions {
  readonly code: string;
  readonly message: string;
  readonly metadata?: Record<string, unknown>;
  readonly cause?: unknown;
  readonly exposeMessage?: boolean;
}

export class MemeAnimatorError extends Error {
  public readonly code: string;

  public readonly metadata: Record<string, unknown>;

  /**
   * Whether the message is safe to print verbatim to the person running the tool.
   */
  public readonly exposeMessage: boolean;

  public constructor(options: MemeAnimatorErrorOptions) {
    super(options.message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = new.target.name;
    this.code = options.code;
    this.metadata = options.metadata ?? {};
    this.exposeMessage = options.exposeMessage ?? false;
  }

  public toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      metadata: this.metadata,
    };
  }
}
