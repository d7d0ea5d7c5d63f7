import { z } from 'zod';
import { count, flag, text } from './fields.js';

const MeSchema = z.object({ id: text, name: text }).catch({ id: '', name: '' });

export type MeResponse = z.output<typeof MeSchema>;

export function extractMe(document: unknown): MeResponse {
  return MeSchema.parse(document);
}

const UserSchema = z
  .object({
    data: z
      .object({
        id: text,
        name: text,
        created_utc: count,
        link_karma: count,
        comment_karma: count,
        is_suspended: flag,
      })
      .catch({
        id: '',
        name: '',
        created_utc: 0,
        link_karma: 0,
        comment_karma: 0,
        is_suspended: false,
      }),
  })
  .transform(({ data }) => ({
    id: data.id,
    name: data.name,
    createdAt: data.created_utc,
    linkKarma: data.link_karma,
    commentKarma: data.comment_karma,
    isSuspended: data.is_suspended,
  }));

export type UserResponse = z.output<typeof UserSchema>;

const EMPTY_USER: UserResponse = {
  id: '',
  name: '',
  createdAt: 0,
  linkKarma: 0,
  commentKarma: 0,
  isSuspended: false,
};

export function extractUser(document: unknown): UserResponse {
  const parsed = UserSchema.safeParse(document);
  return parsed.success ? parsed.data : EMPTY_USER;
}

const SubredditSchema = z
  .object({
    data: z
      .object({
        id: text,
        name: text,
        display_name: text,
        title: text,
        public_description: text,
        subreddit_type: text,
        subscribers: count,
        over18: flag,
      })
      .catch({
        id: '',
        name: '',
        display_name: '',
        title: '',
        public_description: '',
        subreddit_type: '',
        subscribers: 0,
        over18: false,
      }),
  })
  .transform(({ data }) => ({
    id: data.id,
    name: data.display_name,
    fullname: data.name,
    title: data.title,
    description: data.public_description,
    type: data.subreddit_type,
    subscribers: data.subscribers,
    over18: data.over18,
  }));

export type SubredditResponse = z.output<typeof SubredditSchema>;

const EMPTY_SUBREDDIT: SubredditResponse = {
  id: '',
  name: '',
  fullname: '',
  title: '',
  description: '',
  type: '',
  subscribers: 0,
  over18: false,
};

export function extractSubreddit(document: unknown): SubredditResponse {
  const parsed = SubredditSchema.safeParse(document);
  return parsed.success ? parsed.data : EMPTY_SUBREDDIT;
}
