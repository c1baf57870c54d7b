export interface FadeframeErrorOptions {
  readonly code: string;
  readonly message: string;
  readonly cause?: unknown;
  readonly metadata?: Record<string, unknown>;
  readonly exposeMessage?: boolean;
}

export class FadeframeError extends Error {
  public readonly code: string;

  public readonly metadata: Record<string, unknown>;

  public readonly exposeMessage: boolean;

  public constructor(options: FadeframeErrorOptions) {
    super(options.message);
    this.name = 'FadeframeError';
    this.code = options.code;
    this.metadata = options.metadata ?? {};
    this.exposeMessage = options.exposeMessage ?? false;

    if (options.cause) {
      this.cause = options.cause;
    }

    Error.captureStackTrace?.(this, new.target);
  }
}
