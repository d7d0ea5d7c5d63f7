import { z } from 'zod';
import { count, flag, text } from './fields.js';

const ThingDataSchema = z
  .object({
    id: text,
    name: text,
    author: text,
    subject: text,
    body: text,
    title: text,
    url: text,
    permalink: text,
    subreddit: text,
    parent_id: text,
    link_title: text,
    context: text,
    dest: text,
    created_utc: count,
    score: count,
    num_comments: count,
    over_18: flag,
    new: flag,
  })
  .catch({
    id: '',
    name: '',
    author: '',
    subject: '',
    body: '',
    title: '',
    url: '',
    permalink: '',
    subreddit: '',
    parent_id: '',
    link_title: '',
    context: '',
    dest: '',
    created_utc: 0,
    score: 0,
    num_comments: 0,
    over_18: false,
    new: false,
  });

/**
 * A post, comment or private message as it appears in a listing.
 */
export const ThingSchema = z
  .object({
    kind: text,
    data: ThingDataSchema,
  })
  .transform(({ kind, data }) => ({
    kind,
    id: data.id,
    name: data.name,
    author: data.author,
    subject: data.subject,
    body: data.body,
    title: data.title,
    url: data.url,
    permalink: data.permalink,
    subreddit: data.subreddit,
    parentId: data.parent_id,
    linkTitle: data.link_title,
    context: data.context,
    destination: data.dest,
    createdAt: data.created_utc,
    score: data.score,
    numComments: data.num_comments,
    over18: data.over_18,
    isNew: data.new,
  }));

export type Thing = z.output<typeof ThingSchema>;
