import { describe, it, expect } from 'vitest';
import { REFRESH_TOKEN_CLASSIFICATION } from '../errors/classify.js';
import { createRequest, encodeForm, requestUrl } from './request.js';

describe('createRequest', () => {
  it('should apply defaults', () => {
    const request = createRequest({ url: 'https://oauth.reddit.com/api/v1/me' });

    expect(request).toEqual({
      method: 'GET',
      url: 'https://oauth.reddit.com/api/v1/me',
      query: [],
      form: [],
      headers: {},
      tags: [],
      retry: true,
      emptyResponseBytes: 0,
      classification: {},
      signal: undefined,
    });
  });

  it('should let later layers override earlier ones', () => {
    const request = createRequest(
      { url: 'https://oauth.reddit.com/message/inbox', query: { limit: 25 }, tags: ['url:/inbox'] },
      { query: { limit: 100, after: 't4_abc' }, retry: false, tags: ['account:premium'] },
    );

    expect(request.query).toEqual([
      ['limit', '100'],
      ['after', 't4_abc'],
    ]);
    expect(request.retry).toBe(false);
    expect(request.tags).toEqual(['url:/inbox', 'account:premium']);
  });

  it('should skip undefined query values', () => {
    const request = createRequest({ url: 'https://oauth.reddit.com/r/pics/top', query: { t: undefined } });
    expect(request.query).toEqual([]);
  });

  it('should set a bearer token', () => {
    const request = createRequest({ token: 'test-access-token' });
    expect(request.headers['Authorization']).toBe('bearer test-access-token');
  });

  it('should set basic auth', () => {
    const request = createRequest({
      basicAuth: { username: 'test-id', password: 'test-secret' },
      classification: REFRESH_TOKEN_CLASSIFICATION,
    });

    expect(request.headers['Authorization']).toBe(
      `Basic ${Buffer.from('test-id:test-secret').toString('base64')}`,
    );
    expect(request.classification).toBe(REFRESH_TOKEN_CLASSIFICATION);
  });
});

describe('requestUrl', () => {
  it('should append query parameters', () => {
    const request = createRequest({
      url: 'https://oauth.reddit.com/api/info',
      query: { id: 't3_abc' },
    });
    expect(requestUrl(request).toString()).toBe('https://oauth.reddit.com/api/info?id=t3_abc');
  });
});

describe('encodeForm', () => {
  it('should url-encode form fields in order', () => {
    const request = createRequest({
      form: { grant_type: 'refresh_token', refresh_token: 'a b&c' },
    });
    expect(encodeForm(request)).toBe('grant_type=refresh_token&refresh_token=a+b%26c');
  });

  it('should return undefined without form fields', () => {
    expect(encodeForm(createRequest({}))).toBeUndefined();
  });
});
