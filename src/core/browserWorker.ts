/**
 * browserWorker.ts — The single execution slot for browser operations.
 *
 * Navigation, cookie reads and challenge-token generation all share one page,
 * and running two of them at once corrupts the widget state.  Every such
 * operation is queued here:
 *
 *   • Bottleneck with `maxConcurrent: 1` gives FIFO order.
 *   • Waiting for the slot is bounded: a caller that does not get the slot
 *     within `waitTimeoutMs` is rejected with LockTimeoutError, and its job
 *     is skipped when the queue reaches it.
 *   • An operation timeout rejects the caller but keeps the slot until the
 *     operation itself settles, so operations never overlap.
 */

import Bottleneck from 'bottleneck';
import { LockTimeoutError, errorMessage } from './errors';
import { Logger } from './logger';

const logger = new Logger('BrowserWorker');

export interface BrowserWorkerOptions {
  waitTimeoutMs: number;
}

export interface RunOptions {
  /** Caller-facing time limit for the operation itself. */
  timeoutMs?: number;
  /** Error to reject with when `timeoutMs` elapses. */
  onTimeout?: () => Error;
}

export class BrowserWorker {
  private readonly limiter: Bottleneck;
  private readonly waitTimeoutMs: number;
  private stopped = false;

  constructor(options: BrowserWorkerOptions) {
    this.waitTimeoutMs = options.waitTimeoutMs;
    this.limiter = new Bottleneck({ maxConcurrent: 1 });
  }

  /**
   * Queue `op` for the slot and resolve with its result.
   *
   * @param label - Operation name used in logs and LockTimeoutError.
   */
  run<T>(label: string, op: () => Promise<T>, options: RunOptions = {}): Promise<T> {
    if (this.stopped) {
      return Promise.reject(new Error(`Browser worker stopped; "${label}" rejected`));
    }

    return new Promise<T>((resolve, reject) => {
      let abandoned = false;

      const waitTimer = setTimeout(() => {
        abandoned = true;
        logger.warn(`"${label}" gave up waiting for the browser slot after ${this.waitTimeoutMs}ms`);
        reject(new LockTimeoutError(label, this.waitTimeoutMs));
      }, this.waitTimeoutMs);

      const job = async (): Promise<void> => {
        clearTimeout(waitTimer);
        if (abandoned) return;

        logger.debug(`→ ${label}`);
        const pending = op();

        if (options.timeoutMs === undefined) {
          try {
            resolve(await pending);
          } catch (err) {
            reject(err);
          }
          return;
        }

        const limit = options.timeoutMs;
        let timedOut = false;
        const opTimer = setTimeout(() => {
          timedOut = true;
          logger.warn(`"${label}" exceeded ${limit}ms; slot held until it settles`);
          reject(options.onTimeout ? options.onTimeout() : new Error(`"${label}" timed out after ${limit}ms`));
        }, limit);

        try {
          resolve(await pending);
        } catch (err) {
          if (timedOut) {
            logger.warn(`"${label}" failed after its caller timed out: ${errorMessage(err)}`);
          }
          reject(err);
        } finally {
          clearTimeout(opTimer);
          logger.debug(`← ${label}`);
        }
      };

      this.limiter.schedule(job).catch((err: unknown) => {
        clearTimeout(waitTimer);
        reject(err instanceof Error ? err : new Error(errorMessage(err)));
      });
    });
  }

  /** Drop queued operations and refuse new ones; the running one finishes. */
  async stop(): Promise<void> {
    if (this.stopped) return;
    this.stopped = true;
    await this.limiter.stop({ dropWaitingJobs: true });
  }
}
