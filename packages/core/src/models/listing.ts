import { z } from 'zod';
import { text } from './fields.js';
import { ThingSchema, type Thing } from './thing.js';

export interface ListingResponse {
  readonly count: number;
  readonly before: string;
  readonly after: string;
  readonly children: ReadonlyArray<Thing>;
}

const ListingSchema = z.object({
  data: z
    .object({
      before: text,
      after: text,
      children: z.array(ThingSchema).catch([]),
    })
    .catch({ before: '', after: '', children: [] }),
});

/**
 * What the inbox endpoints mean by their fixed-size empty body. Shared by
 * every empty response, so it is frozen all the way down.
 */
export const EMPTY_LISTING: ListingResponse = Object.freeze({
  count: 0,
  before: '',
  after: '',
  children: Object.freeze([]),
});

export function extractListing(document: unknown): ListingResponse {
  const parsed = ListingSchema.safeParse(document);
  if (!parsed.success) {
    return { count: 0, before: '', after: '', children: [] };
  }

  const { before, after, children } = parsed.data.data;
  return { count: children.length, before, after, children };
}
