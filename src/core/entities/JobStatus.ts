import { z } from 'zod';
import { InvalidStatusResponseError } from '../errors.js';
import { JobErrorDetail } from './JobErrorDetail.js';

/** State reported once a job has finished, successfully or not */
export const JOB_DONE_STATE = 'DONE';

const ErrorPayloadSchema = z.object({
  location: z.string().nullish(),
  message: z.string().nullish(),
  reason: z.string().nullish(),
});

const StatusSchema = z.object({
  state: z.string().nullish(),
  errorResult: ErrorPayloadSchema.nullish(),
  errors: z.array(ErrorPayloadSchema).nullish(),
});

// Everything besides `status` is ignored
const StatusResponseSchema = z.object({
  status: StatusSchema.nullish(),
});

export type ErrorPayload = z.infer<typeof ErrorPayloadSchema>;
export type StatusResponse = z.infer<typeof StatusResponseSchema>;

/**
 * Validate a raw payload returned by a status provider
 * @throws InvalidStatusResponseError if the payload has the wrong shape
 */
export function parseStatusResponse(jobId: string, payload: unknown): StatusResponse {
  const result = StatusResponseSchema.safeParse(payload);
  if (!result.success) {
    throw new InvalidStatusResponseError(jobId, result.error.issues);
  }
  return result.data;
}

export function toJobErrorDetail(payload: ErrorPayload): JobErrorDetail {
  return Object.freeze({
    location: payload.location ?? null,
    message: payload.message ?? null,
    reason: payload.reason ?? null,
  });
}
