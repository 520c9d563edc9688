import {isPromise} from './is-promise.js';

/**
 * Apply `resultHandler` to a value or a promise of it,
 * routing failures to `errorHandler`
 */
export function maybeAsyncResult<T, R = T>(
  getResult: (() => T | Promise<T>) | T | Promise<T>,
  resultHandler: (result: T) => R | Promise<R>,
  errorHandler: (err: Error) => R = (err: Error) => {
    throw err;
  }
): R | Promise<R> {
  try {
    const result = isFunction(getResult) ? getResult() : getResult;
    return isPromise(result)
      ? result.then((result: T) => resultHandler(result)).catch(errorHandler)
      : resultHandler(result);
  } catch (err) {
    return errorHandler(toError(err));
  }
}

function isFunction<T>(
  arg: (() => T | Promise<T>) | T | Promise<T>
): arg is () => T | Promise<T> {
  return typeof arg === 'function';
}

function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
