/**
 * Raw format a strategy promises. `listing` is the JSON tree with
 * `data.children`; `feed` is RSS/Atom XML.
 */
export type PayloadFormat = 'listing' | 'feed';

export type Reliability = 'high' | 'medium' | 'low';

/**
 * Unvalidated response from one fetch attempt.
 */
export interface RawResponse {
  forum: string;
  strategy: string;
  format: PayloadFormat;
  body: string;
  contentType: string | null;
  retrievedAt: string;
}

/**
 * Normalized post, shared by every payload format.
 */
export interface ForumPost {
  rank: number;
  id: string;
  title: string;
  author: string;
  score?: number;
  numComments?: number;
  upvoteRatio?: number;
  createdUtc?: number;
  permalink: string;
  url: string;
  content: string;
  isSelf: boolean;
}

/**
 * A RawResponse that passed validation.
 */
export interface AcceptedPayload extends RawResponse {
  posts: ForumPost[];
}

/**
 * One way of retrieving a forum's listing. Implementations throw FetchError.
 */
export interface TransportStrategy {
  readonly name: string;
  readonly priority: number;
  readonly reliability: Reliability;
  readonly format: PayloadFormat;
  /** Per-attempt timeout for strategies that issue many requests per fetch. */
  readonly attemptTimeoutMs?: number;
  fetch(forum: string, signal: AbortSignal): Promise<RawResponse>;
}
