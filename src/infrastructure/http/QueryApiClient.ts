import fetch from 'node-fetch';
import { StatusRequestError } from '../../core/errors.js';
import { IStatusProvider } from '../../core/interfaces/IStatusProvider.js';

export interface FetchResponseLike {
  ok: boolean;
  status: number;
  statusText: string;
  json(): Promise<unknown>;
}

export type FetchLike = (
  url: string,
  init: { method: string; headers: Record<string, string> }
) => Promise<FetchResponseLike>;

/**
 * Query service API client.
 * Reads job resources; a failed request is reported once and never retried.
 */
export class QueryApiClient implements IStatusProvider {
  private apiUrl: string;

  constructor(
    apiUrl: string,
    private projectId: string,
    private accessToken?: string,
    private fetchImpl: FetchLike = fetch
  ) {
    this.apiUrl = apiUrl.replace(/\/+$/, '');
  }

  async getStatus(jobId: string): Promise<unknown> {
    const url =
      `${this.apiUrl}/projects/${encodeURIComponent(this.projectId)}` +
      `/jobs/${encodeURIComponent(jobId)}`;

    const headers: Record<string, string> = {
      Accept: 'application/json',
    };
    if (this.accessToken) {
      headers.Authorization = `Bearer ${this.accessToken}`;
    }

    let res: FetchResponseLike;
    try {
      res = await this.fetchImpl(url, { method: 'GET', headers });
    } catch (error) {
      throw new StatusRequestError(
        `Failed to fetch status for job ${jobId}: ${error instanceof Error ? error.message : String(error)}`,
        jobId,
        undefined,
        { cause: error }
      );
    }

    if (!res.ok) {
      throw new StatusRequestError(
        `Failed to fetch status for job ${jobId}: HTTP ${res.status} ${res.statusText}`,
        jobId,
        res.status
      );
    }

    try {
      return await res.json();
    } catch (error) {
      throw new StatusRequestError(
        `Failed to read status for job ${jobId}: ${error instanceof Error ? error.message : String(error)}`,
        jobId,
        res.status,
        { cause: error }
      );
    }
  }
}
