/**
 * Interface for fetching the status of a remote job
 */
export interface IStatusProvider {
  /**
   * Fetch the raw status resource of a job.
   * Rejects when the service cannot be reached or answers with an error.
   */
  getStatus(jobId: string): Promise<unknown>;
}
