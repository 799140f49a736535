import type { ZodIssue } from 'zod';

/**
 * Raised when the status of a job cannot be fetched from the query service
 */
export class StatusRequestError extends Error {
  constructor(
    message: string,
    public readonly jobId: string,
    public readonly statusCode?: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'StatusRequestError';
  }
}

/**
 * Raised when a status payload does not have the expected shape
 */
export class InvalidStatusResponseError extends Error {
  constructor(
    public readonly jobId: string,
    public readonly issues: ZodIssue[]
  ) {
    super(
      `Invalid status response for job ${jobId}: ` +
        issues.map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`).join('; ')
    );
    this.name = 'InvalidStatusResponseError';
  }
}

export class WaitAbortedError extends Error {
  constructor(jobId: string) {
    super(`Wait for job ${jobId} was aborted`);
    this.name = 'WaitAbortedError';
  }
}
