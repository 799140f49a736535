import { Config } from '../../config.js';
import { IStatusProvider } from '../../core/interfaces/IStatusProvider.js';
import { QueryApiClient } from '../../infrastructure/http/QueryApiClient.js';
import { createDebugLogger, DebugLogger } from '../../utils/logger.js';
import { JobHandle, WaitOptions } from './JobHandle.js';

/**
 * Service for tracking jobs of one query service project
 */
export class JobService {
  constructor(
    private statusProvider: IStatusProvider,
    private defaults: Config['jobs'],
    private debugLog: DebugLogger
  ) {}

  /**
   * Build a service talking to the configured query API
   */
  static fromConfig(config: Config): JobService {
    const client = new QueryApiClient(
      config.api.url,
      config.api.projectId,
      config.api.accessToken
    );
    return new JobService(client, config.jobs, createDebugLogger(config.debug));
  }

  /**
   * Get a handle on an existing job. Does not contact the service.
   */
  getJob(jobId: string): JobHandle {
    return new JobHandle(this.statusProvider, jobId, {
      debugLog: this.debugLog,
      defaultPollIntervalMs: this.defaults.pollIntervalMs,
    });
  }

  /**
   * Wait for a job, falling back to the configured timeout.
   * Resolves with the handle, or null if the wait timed out.
   */
  async waitForJob(jobId: string, options: WaitOptions = {}): Promise<JobHandle | null> {
    const job = this.getJob(jobId);
    const completed = await job.wait({
      ...options,
      timeoutMs: options.timeoutMs !== undefined ? options.timeoutMs : this.defaults.waitTimeoutMs,
    });
    return completed ? job : null;
  }
}
