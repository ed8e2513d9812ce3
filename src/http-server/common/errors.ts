/**
 * @file HTTP error helpers
 */

/** Statuses the error handler answers with; all carry a JSON body. */
export const HTTP_ERROR_STATUSES = [400, 404, 409, 422, 500, 503] as const;
export type HttpErrorStatus = (typeof HTTP_ERROR_STATUSES)[number];

export type HttpError = Error & { status: HttpErrorStatus };

/** Build an Error carrying the HTTP status the error handler should answer with. */
export function httpError(status: HttpErrorStatus, message: string): HttpError {
  return Object.assign(new Error(message), { status });
}

function isHttpErrorStatus(x: unknown): x is HttpErrorStatus {
  return HTTP_ERROR_STATUSES.some((s) => s === x);
}

/** Narrow unknown errors to ones carrying a known HTTP error status. */
export function isHttpError(e: unknown): e is HttpError {
  return e instanceof Error && "status" in e && isHttpErrorStatus(e.status);
}
