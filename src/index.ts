/**
 * Query job client - public API
 */

export { getConfig } from './config.js';
export type { Config } from './config.js';
export { JobHandle, DEFAULT_POLL_INTERVAL_MS } from './application/services/JobHandle.js';
export type { JobHandleOptions, WaitOptions } from './application/services/JobHandle.js';
export { JobService } from './application/services/JobService.js';
export { QueryApiClient } from './infrastructure/http/QueryApiClient.js';
export type { FetchLike, FetchResponseLike } from './infrastructure/http/QueryApiClient.js';
export type { IStatusProvider } from './core/interfaces/IStatusProvider.js';
export type { JobErrorDetail } from './core/entities/JobErrorDetail.js';
export { JOB_DONE_STATE, parseStatusResponse } from './core/entities/JobStatus.js';
export type { StatusResponse, ErrorPayload } from './core/entities/JobStatus.js';
export { StatusRequestError, InvalidStatusResponseError, WaitAbortedError } from './core/errors.js';
export { createDebugLogger } from './utils/logger.js';
export type { DebugLogger } from './utils/logger.js';
