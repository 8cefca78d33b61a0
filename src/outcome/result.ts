// src/outcome/result.ts
// Minimal Ok/Err result ADT used by the reader's fallible entry points

export interface Ok<A> {
  readonly tag: "Ok";
  readonly value: A;
}

export interface Err<E> {
  readonly tag: "Err";
  readonly error: E;
}

export type Result<A, E> = Ok<A> | Err<E>;

export function ok<A>(value: A): Ok<A> {
  return { tag: "Ok", value };
}

export function err<E>(error: E): Err<E> {
  return { tag: "Err", error };
}

export function isOk<A, E>(r: Result<A, E>): r is Ok<A> {
  return r.tag === "Ok";
}

export function isErr<A, E>(r: Result<A, E>): r is Err<E> {
  return r.tag === "Err";
}

export function mapResult<A, B, E>(r: Result<A, E>, fn: (a: A) => B): Result<B, E> {
  return isOk(r) ? ok(fn(r.value)) : r;
}

/**
 * Extract the value or throw. An `Error` payload is rethrown as is so callers
 * can still inspect it; anything else is wrapped.
 */
export function unwrap<A, E>(r: Result<A, E>): A {
  if (isOk(r)) {
    return r.value;
  }
  if (r.error instanceof Error) {
    throw r.error;
  }
  throw new Error(`Called unwrap on an Err: ${String(r.error)}`);
}

export function unwrapOr<A, E>(r: Result<A, E>, defaultValue: A): A {
  return isOk(r) ? r.value : defaultValue;
}
