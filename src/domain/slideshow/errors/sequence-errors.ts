import { ReelError } from '@/shared/errors/base.error.js';

export interface ConfigViolation {
  readonly field: string;
  readonly reason: string;
}

export class InvalidConfigError extends ReelError {
  public readonly violations: readonly ConfigViolation[];

  public constructor(violations: readonly ConfigViolation[]) {
    super({
      code: 'sequence.invalid-config',
      message: `Invalid generator configuration: ${violations
        .map((violation) => `${violation.field} ${violation.reason}`)
        .join('; ')}`,
      metadata: { violations },
      exposeMessage: true,
    });
    this.violations = violations;
  }
}

export class EmptyPoolError extends ReelError {
  public constructor(metadata?: Record<string, unknown>) {
    super({
      code: 'sequence.empty-pool',
      message: 'The image pool does not contain any image',
      metadata,
      exposeMessage: true,
    });
  }
}

export class RenderCancelledError extends ReelError {
  public constructor(metadata?: Record<string, unknown>) {
    super({
      code: 'slideshow.cancelled',
      message: 'Render was cancelled',
      metadata,
      exposeMessage: true,
    });
  }
}
