export interface Flushable {
  flush(): void;
}

/**
 * Runs `work` with `handle` and flushes the handle once the work is over,
 * whether it returns, throws or settles a promise. This is how a worker
 * gives back its buffered count when it finishes.
 */
export function runScoped<H extends Flushable, R>(handle: H, work: (handle: H) => Promise<R>): Promise<R>;
export function runScoped<H extends Flushable, R>(handle: H, work: (handle: H) => R): R;
export function runScoped<H extends Flushable, R>(handle: H, work: (handle: H) => R | Promise<R>): R | Promise<R> {
  let result: R | Promise<R>;
  try {
    result = work(handle);
  } catch (error) {
    handle.flush();
    throw error;
  }

  if (result instanceof Promise) {
    return result.finally(() => handle.flush());
  }

  handle.flush();
  return result;
}
