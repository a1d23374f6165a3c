import { isRegistryError, type RegistryErrorCode } from "./errors.js";

export interface ResultError {
  readonly code: RegistryErrorCode;
  readonly message: string;
}

export interface ResultOk<T> {
  readonly ok: true;
  readonly value: T;
}

export interface ResultFailure {
  readonly ok: false;
  readonly error: ResultError;
}

export type Result<T> = ResultOk<T> | ResultFailure;

export const ok = <T>(value: T): ResultOk<T> => ({ ok: true, value });

export const failure = (code: RegistryErrorCode, message: string): ResultFailure => ({
  ok: false,
  error: { code, message },
});

export const isOk = <T>(result: Result<T>): result is ResultOk<T> => result.ok;

/**
 * Runs `fn` and turns a registry error into a failure value. Anything that
 * is not a registry error is a programming mistake and keeps propagating.
 */
export const attempt = <T>(fn: () => T): Result<T> => {
  try {
    return ok(fn());
  } catch (err) {
    if (isRegistryError(err)) {
      return failure(err.code, err.message);
    }
    throw err;
  }
};

export const mapValue = <A, B>(result: Result<A>, mapper: (value: A) => B): Result<B> => {
  if (!result.ok) return result;
  return ok(mapper(result.value));
};

export const formatFailure = (result: Result<unknown>): string => {
  if (result.ok) return "ok";
  return `${result.error.code}: ${result.error.message}`;
};
