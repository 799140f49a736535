/**
 * A single error reported by the query service for a job.
 * Fields missing from the payload are null.
 */
export interface JobErrorDetail {
  readonly location: string | null;
  readonly message: string | null;
  readonly reason: string | null;
}
