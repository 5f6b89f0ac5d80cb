import { createLogger } from '../middleware/logger.js';
import type { RateLimiter } from '../middleware/rate-limit.js';
import { checkMessageLength, sanitizeInput } from '../middleware/sanitize.js';
import { BROADCAST_PLATFORM, createMessage, type Message } from './message.js';
import { attempt, type PlatformOutcome } from './fan-out.js';
import type { PlatformBackend } from './platform-backend.js';
import {
  MissingTemplateParameterError,
  TemplateNotFoundError,
  TemplateSyntaxError,
  type TemplateParams,
  type TemplateStore,
} from './templates.js';

const logger = createLogger({ component: 'broadcast' });

export interface BroadcasterDeps {
  templates: TemplateStore;
  /** Live backends, keyed by platform name. Read-only here. */
  platforms: ReadonlyMap<string, PlatformBackend>;
  rateLimiter: RateLimiter;
  sanitize?: (text: string) => string;
}

export interface BroadcastOptions {
  /** Extra routing metadata merged into the message (e.g. a Matrix room_id). */
  metadata?: Record<string, unknown>;
  attachments?: string[];
}

/**
 * Formats a template once and sends it to a set of platforms.
 *
 * Every requested target gets exactly one entry in the result. A target that
 * is not active, is refused by the rate limiter, or fails to send is `false`;
 * none of those stop the remaining targets.
 */
export class Broadcaster {
  private readonly sanitize: (text: string) => string;

  constructor(private readonly deps: BroadcasterDeps) {
    this.sanitize = deps.sanitize ?? sanitizeInput;
  }

  async broadcast(
    templateName: string,
    targetPlatforms?: readonly string[],
    params: TemplateParams = {},
    options: BroadcastOptions = {},
  ): Promise<PlatformOutcome> {
    const message = this.buildMessage(templateName, params, options);
    if (!message) return {};

    // An absent or empty target list means every active platform.
    const targets = targetPlatforms && targetPlatforms.length > 0
      ? [...new Set(targetPlatforms)]
      : [...this.deps.platforms.keys()];

    const entries = await Promise.all(
      targets.map(async (name) => [name, await this.sendTo(name, message)] as const),
    );

    const results: PlatformOutcome = Object.fromEntries(entries);
    const sent = entries.filter(([, ok]) => ok).length;
    logger.info({ template: templateName, sent, total: entries.length }, 'Broadcast complete');
    return results;
  }

  /** Resolve, format and sanitize. Returns null (already logged) on template errors. */
  private buildMessage(templateName: string, params: TemplateParams, options: BroadcastOptions): Message | null {
    try {
      const { template, content } = this.deps.templates.render(templateName, params);
      const text = this.sanitize(content);
      const tooLong = checkMessageLength(text);
      if (tooLong) {
        // Still sent: each backend applies its own limit.
        logger.warn({ template: templateName, reason: tooLong }, 'Oversized broadcast');
      }
      return createMessage({
        content: text,
        platform: BROADCAST_PLATFORM,
        metadata: {
          ...options.metadata,
          template: template.name,
          tags: [...template.tags],
          category: template.category,
        },
        attachments: options.attachments,
      });
    } catch (err) {
      if (err instanceof TemplateNotFoundError) {
        logger.error({ template: templateName }, 'Template not found');
        return null;
      }
      if (err instanceof TemplateSyntaxError) {
        logger.error({ template: templateName, fragment: err.fragment }, 'Malformed template placeholder');
        return null;
      }
      if (err instanceof MissingTemplateParameterError) {
        logger.error({ template: templateName, parameter: err.parameter }, 'Missing template parameter');
        return null;
      }
      throw err;
    }
  }

  private async sendTo(name: string, message: Message): Promise<boolean> {
    const backend = this.deps.platforms.get(name);
    if (!backend) {
      logger.warn({ platform: name }, 'Platform not initialized');
      return false;
    }

    if (!this.deps.rateLimiter.canProceed()) {
      logger.warn({ platform: name }, 'Rate limit reached — send skipped');
      return false;
    }

    const ok = await attempt(name, 'Send', () => backend.sendMessage(message));
    if (ok) logger.info({ platform: name }, 'Message sent');
    return ok;
  }
}
