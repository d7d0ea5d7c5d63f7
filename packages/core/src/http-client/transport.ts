import http, { type IncomingHttpHeaders } from 'http';
import https from 'https';
import type { Socket } from 'net';
import type { Logger } from 'pino';
import {
  RedditApiError,
  RequestCancelledError,
  TimeoutError,
} from '../errors/reddit-api-error.js';
import type { MetricsSink } from '../metrics/metrics-sink.js';
import { encodeForm, requestUrl, type RequestDescriptor } from './request.js';

/**
 * Pool limits and timeouts. Fixed at construction and shared by every
 * request sent through the transport.
 */
export interface TransportOptions {
  /** Maximum concurrent connections to one host */
  maxConnsPerHost: number;
  /** Maximum idle connections across all hosts */
  maxIdleConns: number;
  maxIdleConnsPerHost: number;
  /** An idle connection is closed after this long */
  idleConnTimeoutMs: number;
  /** Time allowed between sending a request and receiving its headers */
  responseHeaderTimeoutMs: number;
  userAgent: string;
}

export const DEFAULT_TRANSPORT_OPTIONS: TransportOptions = {
  maxConnsPerHost: 100,
  maxIdleConns: 25,
  maxIdleConnsPerHost: 25,
  idleConnTimeoutMs: 60_000,
  responseHeaderTimeoutMs: 5_000,
  userAgent: 'reddit-relay/0.1',
};

export interface TransportResponse {
  status: number;
  /** Lower-cased names, repeated headers joined with `, ` */
  headers: Record<string, string>;
  body: Buffer;
}

/**
 * Pool sizes for a deployment-wide connection budget: a hundredth of it per
 * host, a quarter of that kept idle.
 */
export function transportOptionsFromConnLimit(
  connLimit: number,
): Pick<TransportOptions, 'maxConnsPerHost' | 'maxIdleConns' | 'maxIdleConnsPerHost'> {
  const idle = Math.max(1, Math.floor(connLimit / 4 / 100));
  return {
    maxConnsPerHost: Math.max(1, Math.floor(connLimit / 100)),
    maxIdleConns: idle,
    maxIdleConnsPerHost: idle,
  };
}

export function normalizeHeaders(headers: IncomingHttpHeaders): Record<string, string> {
  const normalized: Record<string, string> = {};
  for (const [name, value] of Object.entries(headers)) {
    if (value === undefined) continue;
    normalized[name.toLowerCase()] = Array.isArray(value) ? value.join(', ') : value;
  }
  return normalized;
}

export interface TransportInit {
  options?: Partial<TransportOptions>;
  metrics: MetricsSink;
  logger: Logger;
}

/**
 * Keep-alive HTTP sender. Reports call counts, latency and connection reuse
 * to the metrics sink.
 */
export class Transport {
  readonly options: TransportOptions;
  private readonly metrics: MetricsSink;
  private readonly logger: Logger;
  private readonly httpAgent: http.Agent;
  private readonly httpsAgent: https.Agent;
  private readonly seenSockets = new WeakSet<Socket>();
  /** Only sockets parked in an agent's free list have an entry. */
  private readonly idleSince = new WeakMap<Socket, number>();

  constructor({ options = {}, metrics, logger }: TransportInit) {
    this.options = { ...DEFAULT_TRANSPORT_OPTIONS, ...options };
    this.metrics = metrics;
    this.logger = logger;

    const agentOptions: http.AgentOptions = {
      keepAlive: true,
      maxSockets: this.options.maxConnsPerHost,
      maxFreeSockets: this.options.maxIdleConnsPerHost,
      timeout: this.options.idleConnTimeoutMs,
      scheduling: 'lifo',
    };
    this.httpAgent = new http.Agent(agentOptions);
    this.httpsAgent = new https.Agent(agentOptions);

    this.watchPool(this.httpAgent);
    this.watchPool(this.httpsAgent);
  }

  async send(descriptor: RequestDescriptor): Promise<TransportResponse> {
    const url = requestUrl(descriptor);
    const body = encodeForm(descriptor);

    const headers: Record<string, string> = {
      'User-Agent': this.options.userAgent,
      ...descriptor.headers,
    };
    if (body !== undefined) {
      headers['Content-Type'] = 'application/x-www-form-urlencoded';
      headers['Content-Length'] = String(Buffer.byteLength(body));
    }

    const start = Date.now();
    try {
      return await this.dispatch(url, descriptor, headers, body);
    } finally {
      this.metrics.increment('reddit.api.calls', descriptor.tags, 0.1);
      this.metrics.histogram('reddit.api.latency', Date.now() - start, descriptor.tags, 0.1);
    }
  }

  /** Close every pooled connection. */
  destroy(): void {
    this.httpAgent.destroy();
    this.httpsAgent.destroy();
  }

  private dispatch(
    url: URL,
    descriptor: RequestDescriptor,
    headers: Record<string, string>,
    body: string | undefined,
  ): Promise<TransportResponse> {
    if (url.protocol !== 'http:' && url.protocol !== 'https:') {
      return Promise.reject(
        new RedditApiError(`Unsupported protocol ${url.protocol}`),
      );
    }
    if (descriptor.signal?.aborted) {
      return Promise.reject(new RequestCancelledError(descriptor.signal.reason));
    }
    const secure = url.protocol === 'https:';
    const requestOptions: http.RequestOptions = {
      method: descriptor.method,
      headers,
      agent: secure ? this.httpsAgent : this.httpAgent,
      signal: descriptor.signal,
    };

    return new Promise<TransportResponse>((resolve, reject) => {
      const req = secure
        ? https.request(url, requestOptions)
        : http.request(url, requestOptions);

      const headerTimer = setTimeout(() => {
        req.destroy(
          new TimeoutError(
            `Timed out after ${this.options.responseHeaderTimeoutMs}ms awaiting response headers from ${url.host}`,
          ),
        );
      }, this.options.responseHeaderTimeoutMs);

      req.on('socket', (socket: Socket) => {
        this.observeSocket(socket);
      });

      req.on('response', (res) => {
        clearTimeout(headerTimer);
        const chunks: Array<Buffer> = [];
        res.on('data', (chunk: Buffer) => {
          chunks.push(chunk);
        });
        res.on('end', () => {
          resolve({
            status: res.statusCode ?? 0,
            headers: normalizeHeaders(res.headers),
            body: Buffer.concat(chunks),
          });
        });
        res.on('error', (error) => {
          reject(this.wrapError(url, error));
        });
      });

      req.on('error', (error) => {
        clearTimeout(headerTimer);
        reject(this.wrapError(url, error));
      });

      if (body !== undefined) {
        req.write(body);
      }
      req.end();
    });
  }

  private observeSocket(socket: Socket): void {
    if (!this.seenSockets.has(socket)) {
      this.seenSockets.add(socket);
      this.metrics.increment('reddit.api.connections.created', [], 0.1);
      return;
    }

    this.metrics.increment('reddit.api.connections.reused', [], 0.1);
    const idleSince = this.idleSince.get(socket);
    this.idleSince.delete(socket);
    if (idleSince !== undefined) {
      this.metrics.histogram(
        'reddit.api.connections.idle_time',
        Date.now() - idleSince,
        [],
        0.1,
      );
    }
  }

  private watchPool(agent: http.Agent): void {
    // The agent's own listener has already pooled the socket by the time
    // this one runs.
    agent.on('free', (socket: Socket) => {
      if (!isPooled(agent, socket)) {
        // Handed straight to a queued request or closed by the agent
        this.idleSince.delete(socket);
        return;
      }
      this.idleSince.set(socket, Date.now());
      if (this.idleCount() > this.options.maxIdleConns) {
        this.logger.debug('idle connection limit reached, closing socket');
        socket.destroy();
      }
    });
  }

  private idleCount(): number {
    let count = 0;
    for (const agent of [this.httpAgent, this.httpsAgent]) {
      for (const sockets of Object.values(agent.freeSockets)) {
        count += sockets?.length ?? 0;
      }
    }
    return count;
  }

  private wrapError(url: URL, error: Error): RedditApiError {
    if (error instanceof RedditApiError) {
      return error;
    }
    if (error.name === 'AbortError') {
      return new RequestCancelledError(error);
    }
    return new RedditApiError(`Request to ${url.host} failed: ${error.message}`, {
      cause: error,
    });
  }
}

function isPooled(agent: http.Agent, socket: Socket): boolean {
  return Object.values(agent.freeSockets).some((sockets) => sockets?.includes(socket) ?? false);
}
