/** a promise together with the functions settling it */
export interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
  reject: (reason: Error) => void;
}

/**
 * creates a promise that is settled from the outside
 * @returns the promise and its settling functions
 */
export function createDeferred<T>(): Deferred<T> {
  const settlers: Partial<Omit<Deferred<T>, 'promise'>> = {};

  const promise = new Promise<T>((resolve, reject) => {
    settlers.resolve = resolve;
    settlers.reject = reject;
  });

  const { resolve, reject } = settlers;

  // the executor runs synchronously, so both settlers exist at this point
  if (!resolve || !reject) {
    throw new Error('promise executor did not run synchronously');
  }

  return { promise, resolve, reject };
}
