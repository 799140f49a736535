/**
 * Tests for the query API client
 */

import { QueryApiClient, FetchLike } from '../src/infrastructure/http/QueryApiClient.js';
import { StatusRequestError } from '../src/core/errors.js';

function createFetch(response: { ok: boolean; status: number; statusText: string; body?: unknown }) {
  return jest.fn<ReturnType<FetchLike>, Parameters<FetchLike>>().mockResolvedValue({
    ok: response.ok,
    status: response.status,
    statusText: response.statusText,
    json: async () => response.body,
  });
}

describe('QueryApiClient', () => {
  it('should request the job resource and return the payload', async () => {
    const body = { status: { state: 'DONE' } };
    const fetchImpl = createFetch({ ok: true, status: 200, statusText: 'OK', body });
    const client = new QueryApiClient('https://query.example.test/v2/', 'test-project', 'test-token', fetchImpl);

    const payload = await client.getStatus('job-1');

    expect(payload).toEqual(body);
    expect(fetchImpl).toHaveBeenCalledWith('https://query.example.test/v2/projects/test-project/jobs/job-1', {
      method: 'GET',
      headers: {
        Accept: 'application/json',
        Authorization: 'Bearer test-token',
      },
    });
  });

  it('should encode ids and omit the token when none is set', async () => {
    const fetchImpl = createFetch({ ok: true, status: 200, statusText: 'OK', body: {} });
    const client = new QueryApiClient('http://localhost:8080/v2', 'my project', undefined, fetchImpl);

    await client.getStatus('job/1');

    expect(fetchImpl).toHaveBeenCalledWith('http://localhost:8080/v2/projects/my%20project/jobs/job%2F1', {
      method: 'GET',
      headers: { Accept: 'application/json' },
    });
  });

  it('should reject with the HTTP status on error responses', async () => {
    const fetchImpl = createFetch({ ok: false, status: 404, statusText: 'Not Found' });
    const client = new QueryApiClient('http://localhost:8080/v2', 'test-project', undefined, fetchImpl);

    const request = client.getStatus('job-1');

    await expect(request).rejects.toThrow(StatusRequestError);
    await expect(request).rejects.toMatchObject({
      message: 'Failed to fetch status for job job-1: HTTP 404 Not Found',
      jobId: 'job-1',
      statusCode: 404,
    });
  });

  it('should wrap network failures without retrying', async () => {
    const cause = new Error('connect ECONNREFUSED 127.0.0.1:8080');
    const fetchImpl = jest.fn<ReturnType<FetchLike>, Parameters<FetchLike>>().mockRejectedValue(cause);
    const client = new QueryApiClient('http://localhost:8080/v2', 'test-project', undefined, fetchImpl);

    const request = client.getStatus('job-1');

    await expect(request).rejects.toMatchObject({
      name: 'StatusRequestError',
      message: 'Failed to fetch status for job job-1: connect ECONNREFUSED 127.0.0.1:8080',
      statusCode: undefined,
      cause,
    });
    expect(fetchImpl).toHaveBeenCalledTimes(1);
  });

  it('should wrap failures while reading the body', async () => {
    const cause = new Error('socket hang up');
    const fetchImpl = jest.fn<ReturnType<FetchLike>, Parameters<FetchLike>>().mockResolvedValue({
      ok: true,
      status: 200,
      statusText: 'OK',
      json: () => Promise.reject(cause),
    });
    const client = new QueryApiClient('http://localhost:8080/v2', 'test-project', undefined, fetchImpl);

    const request = client.getStatus('job-1');

    await expect(request).rejects.toThrow(StatusRequestError);
    await expect(request).rejects.toMatchObject({
      message: 'Failed to read status for job job-1: socket hang up',
      jobId: 'job-1',
      statusCode: 200,
      cause,
    });
  });
});
