import nock from 'nock';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { RedditApiError, RequestCancelledError } from '../errors/reddit-api-error.js';
import { InMemoryMetricsSink } from '../metrics/in-memory-metrics-sink.js';
import { silentLogger } from '../test/silent-logger.js';
import { createRequest } from './request.js';
import { Transport, normalizeHeaders, transportOptionsFromConnLimit } from './transport.js';

const baseUrl = 'https://oauth.reddit.com';

describe('Transport', () => {
  let metrics: InMemoryMetricsSink;
  let transport: Transport;

  beforeEach(() => {
    metrics = new InMemoryMetricsSink();
    transport = new Transport({ metrics, logger: silentLogger });
  });

  afterEach(() => {
    transport.destroy();
    nock.cleanAll();
  });

  it('should return status, headers and raw body', async () => {
    nock(baseUrl)
      .get('/api/v1/me')
      .reply(200, '{"name":"spez"}', { 'X-Ratelimit-Remaining': '599.0' });

    const response = await transport.send(createRequest({ url: `${baseUrl}/api/v1/me` }));

    expect(response.status).toBe(200);
    expect(response.headers['x-ratelimit-remaining']).toBe('599.0');
    expect(response.body.toString()).toBe('{"name":"spez"}');
  });

  it('should resolve non-200 responses instead of rejecting', async () => {
    nock(baseUrl).get('/message/inbox').reply(503, 'upstream overloaded');

    const response = await transport.send(createRequest({ url: `${baseUrl}/message/inbox` }));

    expect(response.status).toBe(503);
    expect(response.body.toString()).toBe('upstream overloaded');
  });

  it('should send query, auth and user agent headers', async () => {
    nock(baseUrl, {
      reqheaders: {
        authorization: 'bearer test-access-token',
        'user-agent': 'reddit-relay/0.1',
      },
    })
      .get('/api/info')
      .query({ id: 't3_abc' })
      .reply(200, '{}');

    const response = await transport.send(
      createRequest({
        url: `${baseUrl}/api/info`,
        query: { id: 't3_abc' },
        token: 'test-access-token',
      }),
    );

    expect(response.status).toBe(200);
  });

  it('should send form bodies url-encoded', async () => {
    nock('https://www.reddit.com', {
      reqheaders: { 'content-type': 'application/x-www-form-urlencoded' },
    })
      .post('/api/v1/access_token', 'grant_type=refresh_token&refresh_token=test-refresh-token')
      .reply(200, '{}');

    const response = await transport.send(
      createRequest({
        method: 'POST',
        url: 'https://www.reddit.com/api/v1/access_token',
        form: { grant_type: 'refresh_token', refresh_token: 'test-refresh-token' },
      }),
    );

    expect(response.status).toBe(200);
  });

  it('should record call count and latency with the request tags', async () => {
    nock(baseUrl).get('/api/v1/me').reply(200, '{}');

    await transport.send(createRequest({ url: `${baseUrl}/api/v1/me`, tags: ['url:/api/v1/me'] }));

    expect(metrics.counters.find((sample) => sample.name === 'reddit.api.calls')).toEqual({
      name: 'reddit.api.calls',
      value: 1,
      tags: ['url:/api/v1/me'],
      sampleRate: 0.1,
    });
    const latency = metrics.histograms.find((sample) => sample.name === 'reddit.api.latency');
    expect(latency?.tags).toEqual(['url:/api/v1/me']);
    expect(latency?.value).toBeGreaterThanOrEqual(0);
  });

  it('should reject network failures with a generic error', async () => {
    nock(baseUrl).get('/api/v1/me').replyWithError('Complete failure');

    const failure = transport.send(createRequest({ url: `${baseUrl}/api/v1/me` }));

    await expect(failure).rejects.toBeInstanceOf(RedditApiError);
    await expect(failure).rejects.toMatchObject({ kind: 'generic' });
    expect(metrics.count('reddit.api.calls')).toBe(1);
  });

  it('should reject unsupported protocols', async () => {
    await expect(
      transport.send(createRequest({ url: 'ftp://example.com/file' })),
    ).rejects.toThrow('Unsupported protocol ftp:');
  });

  it('should reject with a cancellation when the signal is aborted', async () => {
    nock(baseUrl).get('/api/v1/me').delay(500).reply(200, '{}');
    const controller = new AbortController();
    controller.abort();

    await expect(
      transport.send(createRequest({ url: `${baseUrl}/api/v1/me`, signal: controller.signal })),
    ).rejects.toBeInstanceOf(RequestCancelledError);
  });
});

describe('transportOptionsFromConnLimit', () => {
  it('should derive per-host and idle pool sizes', () => {
    expect(transportOptionsFromConnLimit(10_000)).toEqual({
      maxConnsPerHost: 100,
      maxIdleConns: 25,
      maxIdleConnsPerHost: 25,
    });
  });

  it('should never size a pool below one connection', () => {
    expect(transportOptionsFromConnLimit(50)).toEqual({
      maxConnsPerHost: 1,
      maxIdleConns: 1,
      maxIdleConnsPerHost: 1,
    });
  });
});

describe('normalizeHeaders', () => {
  it('should lower-case names and join repeated values', () => {
    expect(
      normalizeHeaders({ 'set-cookie': ['a=1', 'b=2'], 'content-type': 'application/json' }),
    ).toEqual({ 'set-cookie': 'a=1, b=2', 'content-type': 'application/json' });
  });
});
