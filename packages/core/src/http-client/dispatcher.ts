import { ParseError } from '../errors/reddit-api-error.js';

/**
 * Pure mapping from a parsed JSON document to a typed response. Must not
 * perform I/O.
 */
export type Extractor<T> = (document: unknown) => T;

/**
 * Turn a raw response body into a typed result.
 *
 * A body whose length is exactly `expectedEmptyLength` is the endpoint's
 * fixed "nothing here" payload and yields `empty` without being parsed,
 * whatever its bytes are.
 */
export function dispatch<T>(
  raw: Buffer,
  extract: Extractor<T>,
  empty: T,
  expectedEmptyLength: number,
): T;
export function dispatch<T>(raw: Buffer, extract: Extractor<T>): T;
export function dispatch<T>(
  raw: Buffer,
  extract: Extractor<T>,
  empty?: T,
  expectedEmptyLength = 0,
): T {
  if (
    expectedEmptyLength > 0 &&
    raw.length === expectedEmptyLength &&
    empty !== undefined
  ) {
    return empty;
  }

  let document: unknown;
  try {
    document = JSON.parse(raw.toString('utf8'));
  } catch (error) {
    throw new ParseError(error);
  }

  return extract(document);
}
