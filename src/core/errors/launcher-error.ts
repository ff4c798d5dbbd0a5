// SPDX-License-Identifier: Apache-2.0

export class LauncherError extends Error {
  public readonly statusCode?: number | string;

  /**
   * Create a custom error object
   *
   * error metadata will include the `cause`
   *
   * @param message error message
   * @param cause source error (if any)
   * @param meta additional metadata (if any)
   */
  public constructor(
    message: string,
    cause?: unknown,
    public readonly meta: Record<string, unknown> = {},
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);

    if (cause instanceof Error) {
      this.cause = cause;
      if ('code' in cause && (typeof cause.code === 'string' || typeof cause.code === 'number')) {
        this.statusCode = cause.code;
      }
      this.stack += `\nCaused by: ${cause.stack}`;
    } else if (cause !== undefined && cause !== null) {
      this.cause = cause;
    }
  }
}
