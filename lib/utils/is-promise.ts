export function isPromise<T>(
  maybePromise: T | Promise<T>
): maybePromise is Promise<T> {
  return (
    maybePromise instanceof Promise ||
    (typeof maybePromise === 'object' &&
      maybePromise !== null &&
      'then' in maybePromise &&
      typeof maybePromise.then === 'function')
  );
}
