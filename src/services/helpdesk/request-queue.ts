/**
 * Request Queue for the helpdesk API.
 *
 * The API accepts at most 3 simultaneous requests per client.
 * This queue runs up to `maxConcurrent` tasks at once in FIFO order;
 * the rest wait for a free slot.
 */

import { logger } from '../../lib/logger.js';
import { RequestCancelledError } from './errors.js';
import { throwIfAborted } from './abort.js';

interface QueuedRequest {
  run: () => void;
  signal?: AbortSignal;
  onAbort?: () => void;
}

/**
 * Request queue that bounds the number of concurrently running tasks.
 */
export class RequestQueue {
  private readonly maxConcurrent: number;
  private queue: QueuedRequest[] = [];
  private active = 0;

  /**
   * @param maxConcurrent - Maximum tasks running at the same time
   */
  constructor(maxConcurrent: number) {
    if (!Number.isInteger(maxConcurrent) || maxConcurrent < 1) {
      throw new RangeError('maxConcurrent must be a positive integer');
    }
    this.maxConcurrent = maxConcurrent;
  }

  /**
   * Adds a task to the queue and returns its result.
   *
   * A task still waiting for a slot is removed when `signal` aborts and the
   * returned promise rejects with RequestCancelledError. A running task is
   * responsible for observing the signal itself.
   *
   * @param fn - Async function to execute
   * @param signal - Optional cancellation signal
   */
  async enqueue<T>(fn: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    throwIfAborted(signal);

    return new Promise<T>((resolve, reject) => {
      const entry: QueuedRequest = {
        signal,
        run: () => {
          this.active++;
          let result: Promise<T>;
          try {
            result = fn();
          } catch (error) {
            result = Promise.reject(error);
          }
          void result
            .then(resolve, reject)
            .finally(() => {
              this.active--;
              this.processNext();
            });
        },
      };

      if (signal) {
        entry.onAbort = () => {
          const index = this.queue.indexOf(entry);
          if (index !== -1) {
            this.queue.splice(index, 1);
            logger.debug('Queued request cancelled', { queueDepth: this.queue.length });
            reject(new RequestCancelledError('Request was cancelled', signal.reason));
          }
        };
        signal.addEventListener('abort', entry.onAbort, { once: true });
      }

      this.queue.push(entry);
      logger.debug('Request enqueued', {
        queueDepth: this.queue.length,
        active: this.active,
      });
      this.processNext();
    });
  }

  /**
   * Starts queued tasks while slots are free.
   */
  private processNext(): void {
    while (this.active < this.maxConcurrent) {
      const next = this.queue.shift();
      if (!next) {
        return;
      }
      if (next.signal && next.onAbort) {
        next.signal.removeEventListener('abort', next.onAbort);
      }
      next.run();
    }
  }

  /**
   * Returns number of tasks waiting for a slot.
   */
  getQueueDepth(): number {
    return this.queue.length;
  }

  /**
   * Returns number of tasks currently running.
   */
  getActiveCount(): number {
    return this.active;
  }

  /**
   * Returns whether any task is currently running.
   */
  isProcessing(): boolean {
    return this.active > 0;
  }
}

/**
 * Creates a new request queue.
 *
 * @param maxConcurrent - Slots (defaults to the API's limit of 3)
 */
export function createRequestQueue(maxConcurrent = 3): RequestQueue {
  return new RequestQueue(maxConcurrent);
}
