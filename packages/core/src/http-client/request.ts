import type { StatusClassification } from '../errors/classify.js';

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

/**
 * Everything needed to send one logical request, including how to retry it
 * and how to read its failures.
 */
export interface RequestDescriptor {
  method: HttpMethod;
  url: string;
  query: ReadonlyArray<readonly [string, string]>;
  /** Sent as `application/x-www-form-urlencoded` when not empty */
  form: ReadonlyArray<readonly [string, string]>;
  headers: Readonly<Record<string, string>>;
  /** Metric tags */
  tags: ReadonlyArray<string>;
  retry: boolean;
  /**
   * Byte length of the endpoint's fixed "empty listing" body. `0` disables
   * the check.
   */
  emptyResponseBytes: number;
  classification: StatusClassification;
  signal?: AbortSignal;
}

export interface RequestOptions {
  method?: HttpMethod;
  url?: string;
  query?: Record<string, string | number | undefined>;
  form?: Record<string, string | undefined>;
  headers?: Record<string, string>;
  tags?: ReadonlyArray<string>;
  /** Bearer access token */
  token?: string;
  basicAuth?: { username: string; password: string };
  retry?: boolean;
  emptyResponseBytes?: number;
  classification?: StatusClassification;
  signal?: AbortSignal;
}

function toPairs(
  record: Record<string, string | number | undefined> | undefined,
): Array<[string, string]> {
  if (!record) return [];
  const pairs: Array<[string, string]> = [];
  for (const [key, value] of Object.entries(record)) {
    if (value !== undefined) {
      pairs.push([key, String(value)]);
    }
  }
  return pairs;
}

function mergePairs(
  base: ReadonlyArray<readonly [string, string]>,
  overrides: Array<[string, string]>,
): Array<readonly [string, string]> {
  const overridden = new Set(overrides.map(([key]) => key));
  return [...base.filter(([key]) => !overridden.has(key)), ...overrides];
}

/**
 * Build a descriptor from a list of option layers. Later layers win, so an
 * endpoint can put its defaults first and the caller's overrides last.
 */
export function createRequest(...layers: Array<RequestOptions>): RequestDescriptor {
  let descriptor: RequestDescriptor = {
    method: 'GET',
    url: '',
    query: [],
    form: [],
    headers: {},
    tags: [],
    retry: true,
    emptyResponseBytes: 0,
    classification: {},
  };

  for (const layer of layers) {
    const headers: Record<string, string> = { ...descriptor.headers };
    if (layer.token !== undefined) {
      headers['Authorization'] = `bearer ${layer.token}`;
    }
    if (layer.basicAuth) {
      const credentials = Buffer.from(
        `${layer.basicAuth.username}:${layer.basicAuth.password}`,
      ).toString('base64');
      headers['Authorization'] = `Basic ${credentials}`;
    }
    Object.assign(headers, layer.headers);

    descriptor = {
      method: layer.method ?? descriptor.method,
      url: layer.url ?? descriptor.url,
      query: mergePairs(descriptor.query, toPairs(layer.query)),
      form: mergePairs(descriptor.form, toPairs(layer.form)),
      headers,
      tags: layer.tags ? [...descriptor.tags, ...layer.tags] : descriptor.tags,
      retry: layer.retry ?? descriptor.retry,
      emptyResponseBytes: layer.emptyResponseBytes ?? descriptor.emptyResponseBytes,
      classification: layer.classification ?? descriptor.classification,
      signal: layer.signal ?? descriptor.signal,
    };
  }

  return descriptor;
}

/** Full URL including the query string. */
export function requestUrl(descriptor: RequestDescriptor): URL {
  const url = new URL(descriptor.url);
  for (const [key, value] of descriptor.query) {
    url.searchParams.append(key, value);
  }
  return url;
}

export function encodeForm(descriptor: RequestDescriptor): string | undefined {
  if (descriptor.form.length === 0) return undefined;
  return new URLSearchParams(
    descriptor.form.map(([key, value]): [string, string] => [key, value]),
  ).toString();
}
