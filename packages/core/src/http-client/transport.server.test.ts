import http from 'http';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { TimeoutError } from '../errors/reddit-api-error.js';
import { InMemoryMetricsSink } from '../metrics/in-memory-metrics-sink.js';
import { silentLogger } from '../test/silent-logger.js';
import { createRequest } from './request.js';
import { Transport, type TransportOptions } from './transport.js';

const pause = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));

describe('Transport against a local server', () => {
  let server: http.Server;
  let baseUrl: string;
  let metrics: InMemoryMetricsSink;
  let transport: Transport | undefined;

  function createTransport(options: Partial<TransportOptions> = {}): Transport {
    transport = new Transport({ options, metrics, logger: silentLogger });
    return transport;
  }

  beforeEach(async () => {
    metrics = new InMemoryMetricsSink();
    server = http.createServer((req, res) => {
      if (req.url === '/slow') {
        setTimeout(() => res.end('{}'), 500);
        return;
      }
      res.setHeader('Content-Type', 'application/json');
      res.end('{"ok":true}');
    });
    await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
    const address = server.address();
    if (address === null || typeof address === 'string') {
      throw new Error('server is not listening on a TCP port');
    }
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterEach(async () => {
    transport?.destroy();
    transport = undefined;
    server.closeAllConnections();
    await new Promise<void>((resolve) => server.close(() => resolve()));
  });

  it('should time out when response headers are late', async () => {
    const slow = createTransport({ responseHeaderTimeoutMs: 50 });

    const failure = slow.send(createRequest({ url: `${baseUrl}/slow` }));

    await expect(failure).rejects.toBeInstanceOf(TimeoutError);
    await expect(failure).rejects.toThrow(
      `Timed out after 50ms awaiting response headers from 127.0.0.1`,
    );
  });

  it('should reuse a pooled connection for sequential requests', async () => {
    const pooled = createTransport();

    const first = await pooled.send(createRequest({ url: `${baseUrl}/one` }));
    await pause(20);
    const second = await pooled.send(createRequest({ url: `${baseUrl}/two` }));

    expect(first.body.toString()).toBe('{"ok":true}');
    expect(second.status).toBe(200);
    expect(metrics.count('reddit.api.connections.created')).toBe(1);
    expect(metrics.count('reddit.api.connections.reused')).toBe(1);
    expect(
      metrics.histograms.filter((sample) => sample.name === 'reddit.api.connections.idle_time'),
    ).toHaveLength(1);
  });

  it('should not report idle time for a connection handed straight to a queued request', async () => {
    const single = createTransport({ maxConnsPerHost: 1 });
    const request = () => single.send(createRequest({ url: `${baseUrl}/ok` }));

    await Promise.all([request(), request()]);

    expect(metrics.count('reddit.api.connections.created')).toBe(1);
    expect(metrics.count('reddit.api.connections.reused')).toBe(1);
    expect(
      metrics.histograms.filter((sample) => sample.name === 'reddit.api.connections.idle_time'),
    ).toHaveLength(0);
  });

  it('should close idle connections beyond the total idle limit', async () => {
    const pooled = createTransport({ maxIdleConns: 1, maxIdleConnsPerHost: 2 });
    const request = () => pooled.send(createRequest({ url: `${baseUrl}/ok` }));

    await Promise.all([request(), request()]);
    await pause(20);
    await Promise.all([request(), request()]);

    expect(metrics.count('reddit.api.connections.created')).toBe(3);
    expect(metrics.count('reddit.api.connections.reused')).toBe(1);
  });
});
