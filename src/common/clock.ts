import { Injectable } from '@nestjs/common';

export const CLOCK = Symbol('CLOCK');

/**
 * Time source for cache expiry and retry backoff.
 * Swapped for a fake in tests so waits resolve immediately.
 */
export interface Clock {
  now(): number;
  sleep(ms: number, signal?: AbortSignal): Promise<void>;
}

export class SleepAbortedError extends Error {
  constructor() {
    super('Sleep aborted');
    this.name = 'SleepAbortedError';
  }
}

@Injectable()
export class SystemClock implements Clock {
  now(): number {
    return Date.now();
  }

  sleep(ms: number, signal?: AbortSignal): Promise<void> {
    return new Promise((resolve, reject) => {
      if (signal?.aborted) {
        reject(new SleepAbortedError());
        return;
      }
      const onAbort = () => {
        clearTimeout(timer);
        reject(new SleepAbortedError());
      };
      const timer = setTimeout(() => {
        signal?.removeEventListener('abort', onAbort);
        resolve();
      }, ms);
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }
}
