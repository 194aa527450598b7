// src/shared/result.ts

/**
 * Result type used between the storage port and the HTTP boundary.
 * Storage failures are values, not exceptions, so routes decide how to render them.
 */
export type Result<T, E> = Ok<T> | Err<E>;
export type Ok<T> = Readonly<{ ok: true; value: T }>;
export type Err<E> = Readonly<{ ok: false; error: E }>;

export const Ok = <T>(value: T): Ok<T> => Object.freeze({ ok: true, value });
export const Err = <E>(error: E): Err<E> => Object.freeze({ ok: false, error });
