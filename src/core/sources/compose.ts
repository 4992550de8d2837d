/**
 * Middleware composition.
 *
 * Provides compose() to chain middleware functions into a single executable
 * pipeline. Execution flows through the array from first to last, and
 * returns bubble back up from last to first.
 */

export type Next = () => Promise<void>;

/** Middleware receives a shared context and a continuation. */
export type Middleware<C> = (context: C, next: Next) => Promise<void>;

/**
 * Composes an array of middleware functions into a single middleware.
 *
 * @param middlewares Array of middleware functions to chain
 * @returns A single composed middleware
 */
export function compose<C>(middlewares: readonly Middleware<C>[]): Middleware<C> {
  if (middlewares.length === 0) {
    return async (_context: C, next: Next) => next();
  }

  return async (context: C, next: Next): Promise<void> => {
    let index = -1;

    async function dispatch(i: number): Promise<void> {
      if (i <= index) {
        throw new Error('next() called multiple times in middleware');
      }
      index = i;

      const fn = middlewares[i];
      if (!fn) {
        // End of the chain: hand over to the caller's continuation.
        return next();
      }

      return fn(context, () => dispatch(i + 1));
    }

    return dispatch(0);
  };
}
