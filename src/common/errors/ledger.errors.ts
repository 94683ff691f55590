/**
 * The API answered with a non-success status.
 */
export class ApiRequestError extends Error {
  readonly name = 'ApiRequestError';

  constructor(
    readonly method: string,
    readonly url: string,
    readonly status: number,
    readonly statusText: string,
    readonly body: string,
  ) {
    super(`Request failed (${status} ${statusText}) for ${method} ${url}`);
  }
}

/**
 * The API answered successfully but the body could not be mapped.
 */
export class ApiResponseError extends Error {
  readonly name = 'ApiResponseError';
}

/**
 * A caller passed an argument the client refuses to send.
 */
export class InvalidArgumentError extends Error {
  readonly name = 'InvalidArgumentError';
}
