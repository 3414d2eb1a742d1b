/**
 * Result
 * ======
 * Typed outcome for operations whose failures are expected (bad credentials,
 * expired tokens, invalid input). Only the HTTP boundary turns a failure into
 * an error response.
 */

export type Result<T, E = Error> = Success<T> | Failure<E>;

export interface Success<T> {
  ok: true;
  value: T;
}

export interface Failure<E> {
  ok: false;
  error: E;
}

export const ok = <T>(value: T): Success<T> => ({ ok: true, value });
export const err = <E>(error: E): Failure<E> => ({ ok: false, error });

