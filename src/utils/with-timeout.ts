/**
 * Settles like `promise`, or rejects with `onTimeout()` once `timeoutMs`
 * elapses first. The timer is cleared as soon as the promise settles.
 */
export function withTimeout<T>(
  promise: PromiseLike<T>,
  timeoutMs: number,
  onTimeout: () => Error,
): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => reject(onTimeout()), timeoutMs);
    promise.then(
      (value) => {
        clearTimeout(timer);
        resolve(value);
      },
      (error: unknown) => {
        clearTimeout(timer);
        reject(error);
      },
    );
  });
}
