import { readFile } from 'node:fs/promises';
import { basename } from 'node:path';
import { z } from 'zod';

import { createMessage, metadataString, type Message } from '../../core/message.js';
import { basePlatformConfigSchema, cadenceFrom, type PlatformBackend } from '../../core/platform-backend.js';
import { platformRegistry } from '../../core/platform-registry.js';
import { createLogger } from '../../middleware/logger.js';

const logger = createLogger({ component: 'platform', platform: 'twitter' });

export const X_TWEET_MAX_LENGTH = 280;
const X_MAX_MEDIA = 4;
const X_MENTIONS_MIN = 5;
const X_MENTIONS_MAX = 100;

export const twitterConfigSchema = basePlatformConfigSchema.extend({
  bearer_token: z.string().min(1),
  /** Numeric account id. Looked up through /2/users/me when omitted. */
  user_id: z.string().optional(),
  api_base: z.string().url().default('https://api.x.com'),
});

export type TwitterConfig = z.infer<typeof twitterConfigSchema>;

/**
 * Truncate text to fit within X's character limit.
 * Uses code-point-safe slicing (Array.from) to avoid splitting surrogate pairs.
 * Prefers word boundaries to avoid cutting mid-word.
 */
export function truncateForX(text: string): string {
  const codePoints = Array.from(text);
  if (codePoints.length <= X_TWEET_MAX_LENGTH) return text;
  logger.warn({ length: codePoints.length, max: X_TWEET_MAX_LENGTH }, 'tweet exceeded char limit, truncating');
  const cut = codePoints.slice(0, X_TWEET_MAX_LENGTH - 1).join(''); // leave room for ellipsis
  const lastSpace = cut.lastIndexOf(' ');
  const breakpoint = lastSpace > X_TWEET_MAX_LENGTH * 0.6 ? lastSpace : cut.length;
  return `${cut.slice(0, breakpoint)}…`;
}

/**
 * X API v2 response shapes.
 */
type XUser = { id: string; name?: string; username?: string };

type XTweet = {
  id: string;
  text: string;
  author_id?: string;
  created_at?: string;
  conversation_id?: string;
};

type XTweetListResponse = { data?: XTweet[]; includes?: { users?: XUser[] } };
type XTweetResponse = { data?: { id: string; text: string } };
type XMediaResponse = { data?: { id: string } };

type XApiResult<T> =
  | { ok: true; status: number; data: T }
  | { ok: false; status: number; error: string };

function safeJsonParse(input: string): unknown {
  try {
    return JSON.parse(input);
  } catch {
    return null;
  }
}

const REACTIONS: Record<string, 'likes' | 'retweets'> = {
  like: 'likes',
  '❤️': 'likes',
  retweet: 'retweets',
  repost: 'retweets',
  '🔁': 'retweets',
};

export interface TwitterPlatformDeps {
  fetchImpl?: typeof fetch;
  readFileImpl?: (path: string) => Promise<Uint8Array>;
}

/**
 * X/Twitter backend over the v2 REST API with an OAuth2 user bearer token.
 *
 * Tweets cannot be edited through the API, so editMessage() always
 * reports failure.
 */
export class TwitterPlatform implements PlatformBackend {
  readonly name = 'twitter';
  readonly pollIntervalMs: number;
  readonly errorDelayMs: number;

  private readonly config: TwitterConfig;
  private readonly baseUrl: string;
  private readonly fetchImpl: typeof fetch;
  private readonly readFileImpl: (path: string) => Promise<Uint8Array>;
  private userId: string | null = null;
  private connected = false;

  constructor(config: unknown, deps: TwitterPlatformDeps = {}) {
    this.config = twitterConfigSchema.parse(config);
    const cadence = cadenceFrom(this.config);
    this.pollIntervalMs = cadence.pollIntervalMs;
    this.errorDelayMs = cadence.errorDelayMs;
    this.baseUrl = this.config.api_base.replace(/\/+$/, '');
    this.fetchImpl = deps.fetchImpl ?? fetch;
    this.readFileImpl = deps.readFileImpl ?? ((path) => readFile(path));
  }

  async connect(): Promise<boolean> {
    try {
      const me = await this.request<{ data?: XUser }>('/2/users/me', { method: 'GET' });
      if (!me.ok || !me.data.data) {
        logger.error({ status: me.status, error: me.ok ? 'empty response' : me.error }, 'X credential check failed');
        return false;
      }
      this.userId = this.config.user_id ?? me.data.data.id;
      this.connected = true;
      logger.info({ userId: this.userId, username: me.data.data.username }, 'Connected to X');
      return true;
    } catch (err) {
      logger.error({ err: err instanceof Error ? err.message : String(err) }, 'Failed to connect to X');
      return false;
    }
  }

  async disconnect(): Promise<boolean> {
    // Stateless HTTP client: nothing to tear down beyond the flag.
    this.connected = false;
    return true;
  }

  async sendMessage(message: Message): Promise<boolean> {
    if (!this.connected) return false;
    if (message.attachments.length > X_MAX_MEDIA) {
      logger.error({ count: message.attachments.length, max: X_MAX_MEDIA }, 'Too many attachments for one tweet');
      return false;
    }
    try {
      // Media first: a failed upload must not leave a text-only tweet behind.
      const mediaIds: string[] = [];
      for (const attachment of message.attachments) {
        const id = await this.uploadMedia(attachment);
        if (!id) return false;
        mediaIds.push(id);
      }

      const replyTo = metadataString(message, 'in_reply_to_tweet_id');
      const result = await this.request<XTweetResponse>('/2/tweets', {
        method: 'POST',
        body: JSON.stringify({
          text: truncateForX(message.content),
          ...(mediaIds.length > 0 ? { media: { media_ids: mediaIds } } : {}),
          ...(replyTo ? { reply: { in_reply_to_tweet_id: replyTo } } : {}),
        }),
      });
      if (!result.ok) {
        logger.error({ status: result.status, error: result.error, rateLimited: result.status === 429 }, 'Failed to post tweet');
        return false;
      }
      logger.debug({ tweetId: result.data.data?.id }, 'Tweet posted');
      return true;
    } catch (err) {
      logger.error({ err: err instanceof Error ? err.message : String(err) }, 'Failed to send tweet');
      return false;
    }
  }

  async deleteMessage(messageId: string): Promise<boolean> {
    if (!this.connected) return false;
    try {
      const result = await this.request<{ data?: { deleted?: boolean } }>(
        `/2/tweets/${encodeURIComponent(messageId)}`,
        { method: 'DELETE' },
      );
      if (!result.ok) {
        logger.error({ tweetId: messageId, status: result.status, error: result.error }, 'Failed to delete tweet');
        return false;
      }
      return result.data.data?.deleted === true;
    } catch (err) {
      logger.error({ err: err instanceof Error ? err.message : String(err) }, 'Failed to delete tweet');
      return false;
    }
  }

  async editMessage(messageId: string, _newContent: string): Promise<boolean> {
    logger.warn({ tweetId: messageId }, 'X API does not support editing tweets');
    return false;
  }

  async reactToMessage(messageId: string, reaction: string): Promise<boolean> {
    if (!this.connected || !this.userId) return false;
    const endpoint = REACTIONS[reaction.toLowerCase()];
    if (!endpoint) {
      logger.warn({ reaction }, 'Unsupported reaction on X (use like or retweet)');
      return false;
    }
    try {
      const result = await this.request<unknown>(`/2/users/${encodeURIComponent(this.userId)}/${endpoint}`, {
        method: 'POST',
        body: JSON.stringify({ tweet_id: messageId }),
      });
      if (!result.ok) {
        logger.error({ tweetId: messageId, reaction, status: result.status, error: result.error }, 'Failed to react to tweet');
      }
      return result.ok;
    } catch (err) {
      logger.error({ err: err instanceof Error ? err.message : String(err) }, 'Failed to react to tweet');
      return false;
    }
  }

  /** Recent mentions of the account, newest first. */
  async getMessages(limit: number): Promise<Message[]> {
    if (!this.connected || !this.userId) return [];
    const maxResults = Math.min(X_MENTIONS_MAX, Math.max(X_MENTIONS_MIN, limit));
    const query = new URLSearchParams({
      max_results: String(maxResults),
      'tweet.fields': 'created_at,author_id,conversation_id',
      expansions: 'author_id',
      'user.fields': 'username',
    });
    try {
      const result = await this.request<XTweetListResponse>(
        `/2/users/${encodeURIComponent(this.userId)}/mentions?${query.toString()}`,
        { method: 'GET' },
      );
      if (!result.ok) {
        if (result.status === 429) {
          logger.warn('X mentions rate limited; skipping this poll');
        } else {
          logger.error({ status: result.status, error: result.error }, 'Failed to get mentions');
        }
        return [];
      }

      const users = new Map((result.data.includes?.users ?? []).map((u) => [u.id, u]));
      return (result.data.data ?? []).slice(0, limit).map((tweet) => createMessage({
        content: tweet.text,
        platform: 'twitter',
        timestamp: tweet.created_at ? new Date(tweet.created_at) : new Date(),
        metadata: {
          tweet_id: tweet.id,
          message_id: tweet.id,
          conversation_id: tweet.conversation_id,
          author_id: tweet.author_id,
          sender: tweet.author_id ? users.get(tweet.author_id)?.username ?? tweet.author_id : undefined,
        },
      }));
    } catch (err) {
      logger.error({ err: err instanceof Error ? err.message : String(err) }, 'Failed to get mentions');
      return [];
    }
  }

  // ── Internals ───────────────────────────────────────────────────────

  private async request<T>(path: string, init: RequestInit): Promise<XApiResult<T>> {
    const headers = new Headers(init.headers ?? {});
    headers.set('Authorization', `Bearer ${this.config.bearer_token}`);
    if (typeof init.body === 'string' && !headers.has('Content-Type')) {
      headers.set('Content-Type', 'application/json');
    }

    const response = await this.fetchImpl(`${this.baseUrl}${path}`, { ...init, headers });
    const status = response.status;
    const raw = await response.text();
    const payload = raw ? safeJsonParse(raw) : null;

    if (!response.ok) {
      const error =
        (payload && typeof payload === 'object' && 'errors' in payload
          ? JSON.stringify((payload as { errors?: unknown[] }).errors?.slice(0, 2) ?? 'unknown')
          : raw) || response.statusText;
      return { ok: false, status, error };
    }

    return { ok: true, status, data: payload as T };
  }

  private async uploadMedia(path: string): Promise<string | null> {
    const bytes = await this.readFileImpl(path);
    const form = new FormData();
    form.set('media', new Blob([new Uint8Array(bytes)]), basename(path));
    form.set('media_category', 'tweet_image');

    const result = await this.request<XMediaResponse>('/2/media/upload', { method: 'POST', body: form });
    const id = result.ok ? result.data.data?.id : undefined;
    if (!id) {
      logger.error({ path, status: result.status, error: result.ok ? 'missing media id' : result.error }, 'Media upload failed');
      return null;
    }
    return id;
  }
}

platformRegistry.register('twitter', TwitterPlatform);
