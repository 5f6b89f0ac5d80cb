import { describe, expect, it, vi } from 'vitest';

import { createMessage } from '../src/core/message.js';
import { truncateForX, TwitterPlatform } from '../src/platforms/twitter/adapter.js';
import { stubFetch, type StubRoute } from './helpers/stub-fetch.js';

const config = { bearer_token: 'test-token' };

const meRoute: StubRoute = {
  method: 'GET',
  match: /\/2\/users\/me$/,
  reply: { body: { data: { id: '42', username: 'herald' } } },
};

const tweetRoute: StubRoute = {
  method: 'POST',
  match: /\/2\/tweets$/,
  reply: { status: 201, body: { data: { id: '1001', text: 'ok' } } },
};

async function connected(routes: StubRoute[], overrides: Record<string, unknown> = {}) {
  const stub = stubFetch([meRoute, ...routes]);
  const readFileImpl = vi.fn(async (_path: string) => new Uint8Array([7, 7]));
  const platform = new TwitterPlatform({ ...config, ...overrides }, { fetchImpl: stub.fetchImpl, readFileImpl });
  expect(await platform.connect()).toBe(true);
  stub.calls.length = 0;
  return { platform, calls: stub.calls };
}

describe('truncateForX', () => {
  it('leaves short text alone', () => {
    expect(truncateForX('short post')).toBe('short post');
  });

  it('cuts at a word boundary and appends an ellipsis', () => {
    expect(truncateForX('abcd '.repeat(60))).toBe(`${'abcd '.repeat(54)}abcd…`);
  });

  it('never splits a surrogate pair', () => {
    const out = truncateForX('\u{1F600}'.repeat(300));
    expect(Array.from(out)).toHaveLength(280);
    expect(out.endsWith('\u{1F600}…')).toBe(true);
  });
});

describe('TwitterPlatform', () => {
  it('checks credentials on connect with the bearer token', async () => {
    const stub = stubFetch([meRoute]);
    const platform = new TwitterPlatform(config, { fetchImpl: stub.fetchImpl });

    expect(await platform.connect()).toBe(true);
    expect(stub.calls[0]?.url).toBe('https://api.x.com/2/users/me');
    expect(stub.calls[0]?.headers.get('Authorization')).toBe('Bearer test-token');
  });

  it('reports rejected credentials as a failed connect', async () => {
    const stub = stubFetch([{ ...meRoute, reply: { status: 401, body: { title: 'Unauthorized' } } }]);
    const platform = new TwitterPlatform(config, { fetchImpl: stub.fetchImpl });
    expect(await platform.connect()).toBe(false);
  });

  describe('sendMessage', () => {
    it('posts the content as a tweet', async () => {
      const { platform, calls } = await connected([tweetRoute]);

      expect(await platform.sendMessage(createMessage({ content: 'hello', platform: 'multi' }))).toBe(true);
      expect(calls).toHaveLength(1);
      expect(calls[0]?.url).toBe('https://api.x.com/2/tweets');
      expect(calls[0]?.body).toEqual({ text: 'hello' });
      expect(calls[0]?.headers.get('Content-Type')).toBe('application/json');
    });

    it('threads a reply from metadata', async () => {
      const { platform, calls } = await connected([tweetRoute]);

      await platform.sendMessage(createMessage({ content: 'reply', platform: 'multi', metadata: { in_reply_to_tweet_id: '99' } }));

      expect(calls[0]?.body).toEqual({ text: 'reply', reply: { in_reply_to_tweet_id: '99' } });
    });

    it('uploads media before posting', async () => {
      const { platform, calls } = await connected([
        { method: 'POST', match: /\/2\/media\/upload$/, reply: { body: { data: { id: 'm1' } } } },
        tweetRoute,
      ]);

      const ok = await platform.sendMessage(createMessage({
        content: 'pics',
        platform: 'multi',
        attachments: ['/srv/a.png', '/srv/b.png'],
      }));

      expect(ok).toBe(true);
      expect(calls.map((c) => c.url)).toEqual([
        'https://api.x.com/2/media/upload',
        'https://api.x.com/2/media/upload',
        'https://api.x.com/2/tweets',
      ]);
      expect(calls[2]?.body).toEqual({ text: 'pics', media: { media_ids: ['m1', 'm1'] } });
    });

    it('does not tweet when an upload fails', async () => {
      const { platform, calls } = await connected([
        { method: 'POST', match: /\/2\/media\/upload$/, reply: { status: 400, body: { errors: [{ message: 'bad media' }] } } },
        tweetRoute,
      ]);

      const ok = await platform.sendMessage(createMessage({ content: 'pics', platform: 'multi', attachments: ['/srv/a.png'] }));

      expect(ok).toBe(false);
      expect(calls.filter((c) => c.url.endsWith('/2/tweets'))).toHaveLength(0);
    });

    it('refuses more than four attachments', async () => {
      const { platform, calls } = await connected([tweetRoute]);

      const ok = await platform.sendMessage(createMessage({
        content: 'too many',
        platform: 'multi',
        attachments: ['1.png', '2.png', '3.png', '4.png', '5.png'],
      }));

      expect(ok).toBe(false);
      expect(calls).toHaveLength(0);
    });

    it('reports a rate-limited post as a failure', async () => {
      const { platform } = await connected([{ ...tweetRoute, reply: { status: 429, body: { title: 'Too Many Requests' } } }]);
      expect(await platform.sendMessage(createMessage({ content: 'hello', platform: 'multi' }))).toBe(false);
    });

    it('refuses to send before connect', async () => {
      const stub = stubFetch([tweetRoute]);
      const platform = new TwitterPlatform(config, { fetchImpl: stub.fetchImpl });
      expect(await platform.sendMessage(createMessage({ content: 'hello', platform: 'multi' }))).toBe(false);
      expect(stub.calls).toHaveLength(0);
    });
  });

  it('deletes a tweet only when the API confirms it', async () => {
    const confirmed = await connected([{ method: 'DELETE', match: /\/2\/tweets\/123$/, reply: { body: { data: { deleted: true } } } }]);
    expect(await confirmed.platform.deleteMessage('123')).toBe(true);
    expect(confirmed.calls[0]?.method).toBe('DELETE');

    const unconfirmed = await connected([{ method: 'DELETE', match: /\/2\/tweets\/123$/, reply: { body: { data: { deleted: false } } } }]);
    expect(await unconfirmed.platform.deleteMessage('123')).toBe(false);
  });

  it('cannot edit tweets', async () => {
    const { platform, calls } = await connected([]);
    expect(await platform.editMessage('123', 'new text')).toBe(false);
    expect(calls).toHaveLength(0);
  });

  describe('reactToMessage', () => {
    it('maps like and retweet to the user endpoints', async () => {
      const { platform, calls } = await connected([
        { method: 'POST', match: /\/2\/users\/42\/likes$/, reply: { body: { data: { liked: true } } } },
        { method: 'POST', match: /\/2\/users\/42\/retweets$/, reply: { body: { data: { retweeted: true } } } },
      ]);

      expect(await platform.reactToMessage('123', 'Like')).toBe(true);
      expect(await platform.reactToMessage('123', 'repost')).toBe(true);
      expect(calls.map((c) => [c.url, c.body])).toEqual([
        ['https://api.x.com/2/users/42/likes', { tweet_id: '123' }],
        ['https://api.x.com/2/users/42/retweets', { tweet_id: '123' }],
      ]);
    });

    it('uses the configured user id when present', async () => {
      const { platform, calls } = await connected([
        { method: 'POST', match: /\/2\/users\/7\/likes$/, reply: { body: { data: { liked: true } } } },
      ], { user_id: '7' });

      expect(await platform.reactToMessage('123', 'like')).toBe(true);
      expect(calls[0]?.url).toBe('https://api.x.com/2/users/7/likes');
    });

    it('rejects reactions X has no equivalent for', async () => {
      const { platform, calls } = await connected([]);
      expect(await platform.reactToMessage('123', 'laugh')).toBe(false);
      expect(calls).toHaveLength(0);
    });
  });

  describe('getMessages', () => {
    const mentions = {
      data: [
        { id: '4', text: 'fourth', author_id: 'u1', created_at: '2026-03-01T12:04:00.000Z', conversation_id: '4' },
        { id: '3', text: 'third', author_id: 'u2', created_at: '2026-03-01T12:03:00.000Z', conversation_id: '1' },
        { id: '2', text: 'second', author_id: 'u1', created_at: '2026-03-01T12:02:00.000Z', conversation_id: '2' },
        { id: '1', text: 'first', author_id: 'u1', created_at: '2026-03-01T12:01:00.000Z', conversation_id: '1' },
      ],
      includes: { users: [{ id: 'u1', username: 'ada' }] },
    };

    it('requests at least the API minimum and trims to the limit', async () => {
      const { platform, calls } = await connected([{ method: 'GET', match: /\/mentions\?/, reply: { body: mentions } }]);

      const messages = await platform.getMessages(3);

      expect(new URL(calls[0]?.url ?? '').searchParams.get('max_results')).toBe('5');
      expect(messages.map((m) => m.content)).toEqual(['fourth', 'third', 'second']);
      expect(messages[0]?.metadata).toEqual({
        tweet_id: '4',
        message_id: '4',
        conversation_id: '4',
        author_id: 'u1',
        sender: 'ada',
      });
      expect(messages[1]?.metadata.sender).toBe('u2');
      expect(messages[0]?.timestamp.toISOString()).toBe('2026-03-01T12:04:00.000Z');
    });

    it('skips a rate-limited poll', async () => {
      const { platform } = await connected([{ method: 'GET', match: /\/mentions\?/, reply: { status: 429, body: {} } }]);
      expect(await platform.getMessages(10)).toEqual([]);
    });
  });
});
