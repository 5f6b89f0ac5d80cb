import puppeteer, { type Browser, type LaunchOptions, type Page } from 'puppeteer-core';
import { z } from 'zod';

import { createMessage, type Message } from '../../core/message.js';
import { basePlatformConfigSchema, cadenceFrom, type PlatformBackend } from '../../core/platform-backend.js';
import { platformRegistry } from '../../core/platform-registry.js';
import { createLogger } from '../../middleware/logger.js';
import { SELECTORS } from './selectors.js';

const logger = createLogger({ component: 'platform', platform: 'twitter_browser' });

export const twitterBrowserConfigSchema = basePlatformConfigSchema.extend({
  username: z.string().min(1),
  password: z.string().min(1),
  /** Chrome/Chromium binary; puppeteer-core never downloads one. */
  executable_path: z.string().min(1),
  headless: z.boolean().default(true),
  user_data_dir: z.string().optional(),
  base_url: z.string().url().default('https://x.com'),
  navigation_timeout_ms: z.number().int().positive().default(30_000),
});

export type TwitterBrowserConfig = z.infer<typeof twitterBrowserConfigSchema>;

/** Raw tweet data scraped from the timeline. */
interface ScrapedTweet {
  id: string | null;
  text: string;
  datetime: string | null;
  author: string | null;
}

export interface TwitterBrowserDeps {
  launch?: (options: LaunchOptions) => Promise<Browser>;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * X/Twitter backend driven through a headless browser.
 *
 * For accounts without API access. Every action navigates the single page
 * owned by this backend, so operations on it are serialised through a
 * promise chain rather than interleaving on the same tab.
 */
export class TwitterBrowserPlatform implements PlatformBackend {
  readonly name = 'twitter_browser';
  readonly pollIntervalMs: number;
  readonly errorDelayMs: number;

  private readonly config: TwitterBrowserConfig;
  private readonly launch: (options: LaunchOptions) => Promise<Browser>;
  private browser: Browser | null = null;
  private page: Page | null = null;
  private queue: Promise<unknown> = Promise.resolve();

  constructor(config: unknown, deps: TwitterBrowserDeps = {}) {
    this.config = twitterBrowserConfigSchema.parse(config);
    const cadence = cadenceFrom(this.config);
    this.pollIntervalMs = cadence.pollIntervalMs;
    this.errorDelayMs = cadence.errorDelayMs;
    this.launch = deps.launch ?? ((options) => puppeteer.launch(options));
  }

  isConnected(): boolean {
    return this.page !== null;
  }

  async connect(): Promise<boolean> {
    if (this.page) return true;
    try {
      this.browser = await this.launch({
        executablePath: this.config.executable_path,
        headless: this.config.headless,
        ...(this.config.user_data_dir ? { userDataDir: this.config.user_data_dir } : {}),
        args: ['--disable-blink-features=AutomationControlled'],
      });
      const page = await this.browser.newPage();
      page.setDefaultTimeout(this.config.navigation_timeout_ms);

      await page.goto(`${this.config.base_url}/i/flow/login`, { waitUntil: 'networkidle2' });
      const username = await page.waitForSelector(SELECTORS.login.usernameInput);
      if (!username) throw new Error('username field not found');
      await username.type(this.config.username);
      await page.keyboard.press('Enter');

      const password = await page.waitForSelector(SELECTORS.login.passwordInput);
      if (!password) throw new Error('password field not found');
      await password.type(this.config.password);
      await page.keyboard.press('Enter');

      await page.waitForSelector(SELECTORS.login.appLoaded);
      this.page = page;
      logger.info('Connected to X via browser');
      return true;
    } catch (err) {
      logger.error({ err: errorMessage(err) }, 'Failed to connect to X via browser');
      await this.closeBrowser().catch((closeErr: unknown) => {
        logger.warn({ err: errorMessage(closeErr) }, 'Could not close browser after failed login');
      });
      return false;
    }
  }

  async disconnect(): Promise<boolean> {
    try {
      await this.closeBrowser();
      return true;
    } catch (err) {
      logger.error({ err: errorMessage(err) }, 'Error closing browser');
      return false;
    }
  }

  sendMessage(message: Message): Promise<boolean> {
    return this.withPage('send', async (page) => {
      await page.goto(`${this.config.base_url}/compose/post`, { waitUntil: 'networkidle2' });
      const textarea = await page.waitForSelector(SELECTORS.compose.textarea);
      if (!textarea) return false;

      // Attach before typing: if an upload fails nothing has been posted.
      if (message.attachments.length > 0) {
        const input = await page.$(SELECTORS.compose.fileInput);
        if (!input) {
          logger.error('File input not found in composer');
          return false;
        }
        await input.uploadFile(...message.attachments);
        await page.waitForSelector(SELECTORS.compose.attachments);
      }

      await textarea.click();
      await page.keyboard.type(message.content);
      await page.click(SELECTORS.compose.submitButton);
      await page.waitForSelector(SELECTORS.compose.textarea, { hidden: true });
      return true;
    });
  }

  async getMessages(limit: number): Promise<Message[]> {
    const scraped = await this.enqueue(async () => {
      const page = this.page;
      if (!page) return [];
      try {
        await page.goto(`${this.config.base_url}/home`, { waitUntil: 'networkidle2' });
        await page.waitForSelector(SELECTORS.timeline.tweet);
        return await page.$$eval(
          SELECTORS.timeline.tweet,
          (articles, sel, max): ScrapedTweet[] => articles.slice(0, max).map((article) => {
            const href = article.querySelector(sel.statusLink)?.getAttribute('href') ?? '';
            const id = /\/status\/(\d+)/.exec(href)?.[1] ?? null;
            return {
              id,
              text: article.querySelector(sel.tweetText)?.textContent ?? '',
              datetime: article.querySelector('time')?.getAttribute('datetime') ?? null,
              author: article.querySelector(sel.userName)?.textContent ?? null,
            };
          }),
          SELECTORS.timeline,
          limit,
        );
      } catch (err) {
        logger.error({ err: errorMessage(err) }, 'Failed to get tweets');
        return [];
      }
    });

    return scraped.slice(0, limit).map((tweet) => createMessage({
      content: tweet.text,
      platform: 'twitter_browser',
      timestamp: tweet.datetime ? new Date(tweet.datetime) : new Date(),
      metadata: {
        tweet_id: tweet.id,
        message_id: tweet.id,
        sender: tweet.author,
      },
    }));
  }

  reactToMessage(messageId: string, reaction: string): Promise<boolean> {
    const kind = reaction.toLowerCase();
    if (kind !== 'like' && kind !== 'retweet') {
      logger.warn({ reaction }, 'Unsupported reaction on X (use like or retweet)');
      return Promise.resolve(false);
    }
    return this.withPage('react', async (page) => {
      await this.openStatus(page, messageId);
      if (kind === 'like') {
        await page.click(SELECTORS.actions.like);
      } else {
        await page.click(SELECTORS.actions.retweet);
        await (await page.waitForSelector(SELECTORS.actions.retweetConfirm))?.click();
      }
      return true;
    });
  }

  deleteMessage(messageId: string): Promise<boolean> {
    return this.withPage('delete', async (page) => {
      await this.openStatus(page, messageId);
      await page.click(SELECTORS.actions.caret);
      const item = await page.waitForSelector(SELECTORS.actions.deleteMenuItem);
      if (!item) return false;
      await item.click();
      const confirm = await page.waitForSelector(SELECTORS.actions.confirmDelete);
      if (!confirm) return false;
      await confirm.click();
      return true;
    });
  }

  editMessage(messageId: string, newContent: string): Promise<boolean> {
    return this.withPage('edit', async (page) => {
      await this.openStatus(page, messageId);
      await page.click(SELECTORS.actions.caret);
      const item = await page.waitForSelector(SELECTORS.actions.editMenuItem);
      if (!item) return false;
      await item.click();

      const textarea = await page.waitForSelector(SELECTORS.compose.textarea);
      if (!textarea) return false;
      await textarea.click({ count: 3 });
      await page.keyboard.press('Backspace');
      await page.keyboard.type(newContent);
      await page.click(SELECTORS.compose.submitButton);
      await page.waitForSelector(SELECTORS.compose.textarea, { hidden: true });
      return true;
    });
  }

  // ── Internals ───────────────────────────────────────────────────────

  /** Chain `task` behind any in-flight page operation. */
  private enqueue<T>(task: () => Promise<T>): Promise<T> {
    const run = this.queue.then(task, task);
    this.queue = run.catch(() => undefined);
    return run;
  }

  /** Run a page action, folding "not connected" and thrown errors into false. */
  private withPage(action: string, fn: (page: Page) => Promise<boolean>): Promise<boolean> {
    return this.enqueue(async () => {
      const page = this.page;
      if (!page) {
        logger.warn({ action }, 'Browser action called before connect');
        return false;
      }
      try {
        return await fn(page);
      } catch (err) {
        logger.error({ action, err: errorMessage(err) }, 'Browser action failed');
        return false;
      }
    });
  }

  private async openStatus(page: Page, tweetId: string): Promise<void> {
    await page.goto(`${this.config.base_url}/i/web/status/${encodeURIComponent(tweetId)}`, {
      waitUntil: 'networkidle2',
    });
    await page.waitForSelector(SELECTORS.timeline.tweet);
  }

  private async closeBrowser(): Promise<void> {
    const browser = this.browser;
    this.browser = null;
    this.page = null;
    if (browser) await browser.close();
  }
}

platformRegistry.register('twitter_browser', TwitterBrowserPlatform);
