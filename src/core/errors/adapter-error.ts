// SPDX-License-Identifier: Apache-2.0

export class AdapterError extends Error {
  public readonly statusCode?: number;

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
    public readonly meta: object = {},
  ) {
    super(message, cause === undefined ? undefined : {cause});
    this.name = this.constructor.name;
    // eslint-disable-next-line unicorn/no-useless-error-capture-stack-trace
    Error.captureStackTrace(this, this.constructor);

    this.statusCode = AdapterError.statusCodeOf(cause);
    if (cause instanceof Error) {
      this.stack += `\nCaused by: ${cause.stack}`;
    }
  }

  private static statusCodeOf(cause: unknown): number | undefined {
    if (typeof cause !== 'object' || cause === null) {
      return undefined;
    }

    if ('statusCode' in cause && typeof cause.statusCode === 'number') {
      return cause.statusCode;
    }

    if ('code' in cause && typeof cause.code === 'number') {
      return cause.code;
    }

    return undefined;
  }
}
