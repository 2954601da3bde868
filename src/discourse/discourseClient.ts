import { z } from 'zod';
import { ApiError, SyncError, errorMessage } from '../errors';
import { HttpClient, HttpResponse } from '../http/httpClient';
import { ForumTopic } from '../sync/types';
import { SyncSettings } from '../types';
import { DEFAULT_RETRY_POLICY, RetryPolicy, sleep, withRetry } from '../utils/backoff';
import { buildMarker, extractUid, stripMarker, uidTag } from './marker';

// ── Response shapes (only the fields we read) ──

const searchResponseSchema = z.object({
  topics: z.array(z.object({ id: z.number() })).nullish(),
  posts: z.array(z.object({ topic_id: z.number() })).nullish(),
});

// Newer Discourse versions return tag objects instead of plain names
const tagSchema = z.union([z.string(), z.object({ name: z.string() }).transform(tag => tag.name)]);

const topicResponseSchema = z.object({
  id: z.number(),
  title: z.string(),
  category_id: z.number(),
  tags: z.array(tagSchema).nullish(),
  post_stream: z.object({
    posts: z.array(z.object({
      id: z.number(),
      post_number: z.number().optional(),
      raw: z.string().nullish(),
    })),
  }),
});

const createPostResponseSchema = z.object({
  id: z.number(),
  topic_id: z.number(),
});

// Shared by /tag/<name>.json and /c/<id>.json
const topicListResponseSchema = z.object({
  topic_list: z.object({
    topics: z.array(z.object({ id: z.number() })),
    more_topics_url: z.string().nullish(),
  }),
});

type TopicResponse = z.output<typeof topicResponseSchema>;

export type DiscourseSettings = Pick<SyncSettings, 'forumBaseUrl' | 'apiKey' | 'apiUsername' | 'enableUidTag' | 'maxAttempts'>;

export interface DiscourseClientOptions {
  retryPolicy?: Partial<RetryPolicy>;
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
}

/**
 * Thin client over the Discourse REST API: find, create and update event topics.
 *
 * Every call goes to the network; nothing is cached between calls.
 * 429 and 5xx responses (and network failures) are retried with exponential
 * backoff up to settings.maxAttempts; other 4xx responses fail immediately.
 */
export class DiscourseClient {
  private settings: DiscourseSettings;
  private httpClient: HttpClient;
  private retryPolicy: RetryPolicy;
  private sleep: (ms: number) => Promise<void>;
  private random: () => number;

  constructor(settings: DiscourseSettings, httpClient: HttpClient, options: DiscourseClientOptions = {}) {
    this.settings = settings;
    this.httpClient = httpClient;
    this.retryPolicy = {
      ...DEFAULT_RETRY_POLICY,
      maxAttempts: settings.maxAttempts,
      ...options.retryPolicy,
    };
    this.sleep = options.sleep ?? sleep;
    this.random = options.random ?? Math.random;
  }

  /**
   * Find the topic whose first post carries the marker for `uid`.
   *
   * Candidates come from full-text search on the marker token and, when UID tags
   * are enabled, from the topic list of the UID tag. Search may return loosely
   * related topics, so each candidate is read and its marker compared exactly.
   */
  async findTopicByUid(uid: string): Promise<ForumTopic | null> {
    const checked = new Set<number>();

    const searchHits = await this.searchByMarker(buildMarker(uid));
    const fromSearch = await this.firstMatching(searchHits, uid, checked);
    if (fromSearch) return fromSearch;

    if (this.settings.enableUidTag) {
      const tagHits = await this.topicsWithTag(uidTag(uid));
      const fromTag = await this.firstMatching(tagHits, uid, checked);
      if (fromTag) return fromTag;
    }

    return null;
  }

  /**
   * Read every topic of a category and index it by the UID in its marker.
   * Topics without a marker are left out; the first topic seen for a UID wins.
   */
  async indexCategory(category: number): Promise<Map<string, ForumTopic>> {
    const index = new Map<string, ForumTopic>();

    for (let page = 0; ; page++) {
      const path = `/c/${category}.json?page=${page}`;
      const response = await this.send('GET', path);
      const list = this.decode(response, topicListResponseSchema, 'GET', path).topic_list;

      for (const { id } of list.topics) {
        const topic = await this.readIfExists(id);
        if (topic?.bodyMarkerUid && !index.has(topic.bodyMarkerUid)) {
          index.set(topic.bodyMarkerUid, topic);
        }
      }

      if (!list.more_topics_url || list.topics.length === 0) break;
    }

    console.log(`[Discourse] Indexed ${index.size} event topics in category ${category}`);
    return index;
  }

  /**
   * Read a topic with the raw text of its first post.
   */
  async readTopic(topicId: number): Promise<ForumTopic> {
    const path = `/t/${topicId}.json?include_raw=true`;
    const response = await this.send('GET', path);
    const topic = this.decode(response, topicResponseSchema, 'GET', path);
    return DiscourseClient.toForumTopic(topic, 'GET', path);
  }

  /**
   * Create a topic. Category and title are only ever set here.
   */
  async createTopic(category: number, title: string, body: string, tags: string[]): Promise<ForumTopic> {
    const form = new URLSearchParams();
    form.set('title', title);
    form.set('raw', body);
    form.set('category', String(category));
    DiscourseClient.appendTags(form, tags);

    // A create that timed out or hit a 5xx may have gone through; only a 429 is safe to resend
    const response = await this.send('POST', '/posts.json', form, DiscourseClient.isRateLimited);
    const created = this.decode(response, createPostResponseSchema, 'POST', '/posts.json');

    return {
      id: created.topic_id,
      firstPostId: created.id,
      category,
      title,
      bodyMarkerUid: extractUid(body),
      tags: [...tags],
      bodyContent: stripMarker(body),
    };
  }

  /**
   * Replace the raw content of the topic's first post.
   * Pass firstPostId when known to save a lookup.
   */
  async updateTopicBody(topicId: number, body: string, firstPostId?: number): Promise<void> {
    const postId = firstPostId ?? (await this.readTopic(topicId)).firstPostId;

    const form = new URLSearchParams();
    form.set('post[raw]', body);
    await this.send('PUT', `/posts/${postId}.json`, form);
  }

  /**
   * Replace the topic's tag set. Callers pass a superset of the current tags.
   */
  async updateTopicTags(topicId: number, tags: string[]): Promise<void> {
    const form = new URLSearchParams();
    DiscourseClient.appendTags(form, tags);
    await this.send('PUT', `/t/${topicId}.json`, form);
  }

  /**
   * Parse a Retry-After header (delta-seconds or HTTP-date) into milliseconds (static for testing)
   */
  static parseRetryAfter(header: string | undefined, now: number = Date.now()): number | null {
    if (!header) return null;
    const value = header.trim();

    if (/^\d+$/.test(value)) {
      return Number(value) * 1000;
    }

    const date = Date.parse(value);
    if (Number.isNaN(date)) return null;
    return Math.max(0, date - now);
  }

  /**
   * Convert a topic response into a ForumTopic (static for testing)
   */
  static toForumTopic(topic: TopicResponse, method: string, path: string): ForumTopic {
    const firstPost = topic.post_stream.posts.find(post => post.post_number === undefined || post.post_number === 1);
    if (!firstPost) {
      throw new ApiError(method, path, 200, `Topic ${topic.id} has no first post`);
    }

    const raw = firstPost.raw ?? '';
    return {
      id: topic.id,
      firstPostId: firstPost.id,
      category: topic.category_id,
      title: topic.title,
      bodyMarkerUid: extractUid(raw),
      tags: topic.tags ?? [],
      bodyContent: stripMarker(raw),
    };
  }

  private static isRateLimited(error: unknown): boolean {
    return error instanceof ApiError && error.status === 429;
  }

  // Our own errors carry a verdict; anything else is a network-level failure
  private static isTransient(error: unknown): boolean {
    return error instanceof ApiError ? error.isTransient : !(error instanceof SyncError);
  }

  // Discourse expects one indexed field per tag
  private static appendTags(form: URLSearchParams, tags: string[]): void {
    if (tags.length === 0) {
      form.set('tags[]', '');
      return;
    }
    tags.forEach((tag, i) => form.set(`tags[${i}]`, tag));
  }

  private async searchByMarker(marker: string): Promise<number[]> {
    const query = new URLSearchParams({ q: `"${marker}"` });
    const path = `/search.json?${query.toString()}`;
    const response = await this.send('GET', path);
    const result = this.decode(response, searchResponseSchema, 'GET', path);

    const ids = [
      ...(result.topics ?? []).map(topic => topic.id),
      ...(result.posts ?? []).map(post => post.topic_id),
    ];
    return [...new Set(ids)];
  }

  private async topicsWithTag(tag: string): Promise<number[]> {
    const path = `/tag/${encodeURIComponent(tag)}.json`;
    let response: HttpResponse;
    try {
      response = await this.send('GET', path);
    } catch (error: unknown) {
      // Unknown tag: nothing was ever tagged with it
      if (error instanceof ApiError && error.status === 404) return [];
      throw error;
    }
    const result = this.decode(response, topicListResponseSchema, 'GET', path);
    return result.topic_list.topics.map(topic => topic.id);
  }

  private async firstMatching(topicIds: number[], uid: string, checked: Set<number>): Promise<ForumTopic | null> {
    for (const topicId of topicIds) {
      if (checked.has(topicId)) continue;
      checked.add(topicId);

      const topic = await this.readIfExists(topicId);
      if (!topic) {
        console.warn(`[Discourse] Candidate topic ${topicId} for UID=${uid} no longer exists`);
        continue;
      }

      if (topic.bodyMarkerUid === uid) {
        return topic;
      }
    }
    return null;
  }

  // Search and topic lists can lag behind deletions
  private async readIfExists(topicId: number): Promise<ForumTopic | null> {
    try {
      return await this.readTopic(topicId);
    } catch (error: unknown) {
      if (error instanceof ApiError && error.status === 404) return null;
      throw error;
    }
  }

  /**
   * Send one API request, retrying the failures `retryable` accepts (transient ones by default).
   * @throws ApiError for a non-2xx status once retries are exhausted or not allowed
   */
  private async send(
    method: string,
    path: string,
    form?: URLSearchParams,
    retryable: (error: unknown) => boolean = DiscourseClient.isTransient,
  ): Promise<HttpResponse> {
    const headers: Record<string, string> = {
      'Api-Key': this.settings.apiKey,
      'Api-Username': this.settings.apiUsername,
      'Accept': 'application/json',
    };
    if (form) {
      headers['Content-Type'] = 'application/x-www-form-urlencoded';
    }

    return withRetry(async () => {
      const response = await this.httpClient.request({
        url: `${this.settings.forumBaseUrl}${path}`,
        method,
        headers,
        body: form?.toString(),
      });

      if (response.status < 200 || response.status >= 300) {
        throw new ApiError(
          method,
          path,
          response.status,
          response.text.substring(0, 500),
          DiscourseClient.parseRetryAfter(response.headers['retry-after']),
        );
      }
      return response;
    }, {
      policy: this.retryPolicy,
      shouldRetry: retryable,
      delayHint: (error) => (error instanceof ApiError ? error.retryAfterMs : null),
      onRetry: (error, attempt, delayMs) => {
        console.warn(`[Discourse] ${method} ${path} attempt ${attempt + 1}/${this.retryPolicy.maxAttempts} failed (${errorMessage(error)}), retrying in ${delayMs}ms`);
      },
      sleep: this.sleep,
      random: this.random,
    });
  }

  private decode<S extends z.ZodTypeAny>(response: HttpResponse, schema: S, method: string, path: string): z.output<S> {
    let data: unknown;
    try {
      data = JSON.parse(response.text);
    } catch {
      throw new ApiError(method, path, response.status, `Invalid JSON: ${response.text.substring(0, 200)}`);
    }

    const parsed = schema.safeParse(data);
    if (!parsed.success) {
      const issues = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`).join('; ');
      throw new ApiError(method, path, response.status, `Unexpected response: ${issues}`);
    }
    return parsed.data;
  }
}
