/**
 * Lazily initialized, process-wide resources
 *
 * The first get() starts initialization; every concurrent or later caller
 * receives the same promise, so init runs at most once. A failed init is
 * forgotten so the next get() surfaces a fresh attempt instead of a stale error.
 */

import { logger } from "./logger";
import { toError } from "./errors";

export interface SharedResource<T> {
  get(): Promise<T>;
}

export function createSharedResource<T>(
  name: string,
  init: () => T | Promise<T>
): SharedResource<T> {
  let pending: Promise<T> | null = null;

  return {
    get(): Promise<T> {
      if (!pending) {
        logger.debug(`Initializing shared resource: ${name}`);
        pending = Promise.resolve()
          .then(init)
          .catch((error: unknown) => {
            pending = null;
            throw toError(error);
          });
      }
      return pending;
    },
  };
}
