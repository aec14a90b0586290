// source/errors.ts
// Error classes raised by the request pipeline and the configuration loader.

/**
 * A filesystem operation failed after the request path was resolved. The
 * transport answers these with a bare 500 and logs the `cause`.
 */
export class IOFailure extends Error {
  readonly code: string | undefined;

  constructor(message: string, cause: unknown) {
    super(message, { cause });
    this.name = 'IOFailure';
    this.code = errorCode(cause);
  }
}

/** The root directory or the configuration file cannot be used. */
export class ConfigurationError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'ConfigurationError';
  }
}

export const errorCode = (err: unknown): string | undefined => {
  if (err instanceof Error && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
};
