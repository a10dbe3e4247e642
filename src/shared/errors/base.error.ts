export interface ReelErrorOptions {
  readonly code: string;
  readonly message: string;
  readonly metadata?: Record<string, unknown>;
  readonly cause?: unknown;
  readonly exposeMessage?: boolean;
}

export class ReelError extends Error {
  public readonly code: string;

  public readonly metadata?: Record<string, unknown>;

  public readonly exposeMessage: boolean;

  public constructor(options: ReelErrorOptions) {
    super(options.message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = new.target.name;
    this.code = options.code;
    this.metadata = options.metadata;
    this.exposeMessage = options.exposeMessage ?? false;
  }

  public toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.exposeMessage ? this.message : 'An internal error occurred.',
      metadata: this.metadata,
    };
  }
}
