import { JobErrorDetail } from '../../core/entities/JobErrorDetail.js';
import { JOB_DONE_STATE, parseStatusResponse, toJobErrorDetail } from '../../core/entities/JobStatus.js';
import { WaitAbortedError } from '../../core/errors.js';
import { IStatusProvider } from '../../core/interfaces/IStatusProvider.js';
import { DebugLogger, noopLogger } from '../../utils/logger.js';
import { Mutex } from '../../utils/mutex.js';

export const DEFAULT_POLL_INTERVAL_MS = 5000;

export interface JobHandleOptions {
  debugLog?: DebugLogger;
  /** Poll interval used by `wait` when the caller gives none */
  defaultPollIntervalMs?: number;
}

export interface WaitOptions {
  /** Polling budget; null or undefined waits until the job completes */
  timeoutMs?: number | null;
  pollIntervalMs?: number;
  /** Interrupts the sleep between polls. Does not cancel the remote job. */
  signal?: AbortSignal;
}

/**
 * Client-side view of a remote job.
 *
 * Every accessor refreshes the cached state from the status provider until
 * the job reaches its terminal state. After that the cached state is final
 * and the provider is not called again.
 */
export class JobHandle {
  private complete = false;
  private fatal: JobErrorDetail | null = null;
  private partialErrors: readonly JobErrorDetail[] | null = null;
  private readonly refreshLock = new Mutex();
  private readonly debugLog: DebugLogger;
  private readonly defaultPollIntervalMs: number;

  constructor(
    private readonly statusProvider: IStatusProvider,
    private readonly jobId: string,
    options: JobHandleOptions = {}
  ) {
    this.debugLog = options.debugLog ?? noopLogger;
    this.defaultPollIntervalMs = options.defaultPollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
  }

  get id(): string {
    return this.jobId;
  }

  /**
   * True once the job has finished, whatever its outcome
   */
  async isComplete(): Promise<boolean> {
    await this.refresh();
    return this.complete;
  }

  /**
   * True if the job finished with a fatal error.
   * False while running, and for jobs that succeeded with partial errors.
   */
  async failed(): Promise<boolean> {
    await this.refresh();
    return this.complete && this.fatal !== null;
  }

  /**
   * The error that failed the job, or null if it is running or succeeded
   */
  async fatalError(): Promise<JobErrorDetail | null> {
    await this.refresh();
    return this.fatal;
  }

  /**
   * Errors reported for the job, in the order the service listed them.
   * Null while running, or when the finished job reported none.
   */
  async errors(): Promise<readonly JobErrorDetail[] | null> {
    await this.refresh();
    return this.partialErrors;
  }

  /**
   * Poll until the job completes or the timeout budget runs out.
   *
   * The budget is decremented by the poll interval on every sleep rather
   * than by measured time, so the actual wait is approximate.
   *
   * @returns true if the job reached its terminal state, false on timeout
   */
  async wait(options: WaitOptions = {}): Promise<boolean> {
    const pollIntervalMs = options.pollIntervalMs ?? this.defaultPollIntervalMs;
    if (!(pollIntervalMs > 0)) {
      throw new RangeError(`pollIntervalMs must be positive, got ${pollIntervalMs}`);
    }

    let remainingMs = options.timeoutMs ?? null;
    if (remainingMs !== null && Number.isNaN(remainingMs)) {
      throw new RangeError('timeoutMs must be a number or null, got NaN');
    }

    while (!(await this.isComplete())) {
      if (remainingMs !== null) {
        if (remainingMs <= 0) {
          this.debugLog(`${this} wait timed out`);
          return false;
        }
        remainingMs -= pollIntervalMs;
      }
      this.debugLog(`${this} still running, next poll in ${pollIntervalMs}ms`);
      await this.sleep(pollIntervalMs, options.signal);
    }
    return true;
  }

  toString(): string {
    return `Job ${this.jobId}`;
  }

  private async refresh(): Promise<void> {
    await this.refreshLock.runExclusive(async () => {
      if (this.complete) return;

      const payload = await this.statusProvider.getStatus(this.jobId);
      const { status } = parseStatusResponse(this.jobId, payload);

      if (!status || status.state !== JOB_DONE_STATE) return;

      this.complete = true;
      if (status.errorResult) {
        this.fatal = toJobErrorDetail(status.errorResult);
      }
      if (status.errors && status.errors.length > 0) {
        this.partialErrors = Object.freeze(status.errors.map(toJobErrorDetail));
      }
      this.debugLog(
        `${this} completed (fatal error: ${this.fatal !== null}, errors: ${this.partialErrors?.length ?? 0})`
      );
    });
  }

  private sleep(ms: number, signal?: AbortSignal): Promise<void> {
    return new Promise((resolve, reject) => {
      if (signal?.aborted) {
        reject(new WaitAbortedError(this.jobId));
        return;
      }
      const onAbort = () => {
        clearTimeout(timer);
        reject(new WaitAbortedError(this.jobId));
      };
      const timer = setTimeout(() => {
        signal?.removeEventListener('abort', onAbort);
        resolve();
      }, ms);
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }
}
