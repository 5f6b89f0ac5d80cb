import { createLogger } from '../middleware/logger.js';
import { RateLimiter } from '../middleware/rate-limit.js';
import { sanitizeInput } from '../middleware/sanitize.js';
import { Broadcaster, type BroadcastOptions } from './broadcaster.js';
import { fanOut, type PlatformOutcome } from './fan-out.js';
import { MonitorOrchestrator, type MessageCallback, type MonitorOptions } from './monitor.js';
import type { PlatformBackend } from './platform-backend.js';
import { platformRegistry, type PlatformRegistry } from './platform-registry.js';
import type { Template, TemplateParams, TemplateStore } from './templates.js';

const logger = createLogger({ component: 'comms' });

export interface CommsOptions {
  /** Platform name → raw config block, as read from the config file. */
  platforms: Record<string, Record<string, unknown>>;
  templates: TemplateStore;
  rateLimiter?: RateLimiter;
  registry?: PlatformRegistry;
  /** Messages fetched per poll while monitoring. */
  monitorBatchSize?: number;
}

/**
 * Owns the active platforms and every cross-platform operation.
 *
 * The active map is only written by initializePlatforms() and shutdown();
 * broadcast, fan-out and monitoring read it concurrently in between.
 */
export class Comms {
  private readonly active = new Map<string, PlatformBackend>();
  private readonly registry: PlatformRegistry;
  private readonly templates: TemplateStore;
  private readonly broadcaster: Broadcaster;
  private readonly monitor: MonitorOrchestrator;

  constructor(private readonly options: CommsOptions) {
    this.registry = options.registry ?? platformRegistry;
    this.templates = options.templates;
    this.broadcaster = new Broadcaster({
      templates: this.templates,
      platforms: this.active,
      rateLimiter: options.rateLimiter ?? new RateLimiter(),
    });
    this.monitor = new MonitorOrchestrator(this.active, options.monitorBatchSize);
  }

  loadTemplates(): Promise<Map<string, Template>> {
    return this.templates.load();
  }

  /**
   * Construct and connect every enabled platform in the config. Platforms
   * that are unknown, misconfigured or fail to connect are logged and left
   * out; the rest come up regardless.
   */
  async initializePlatforms(): Promise<string[]> {
    for (const [name, platformConfig] of Object.entries(this.options.platforms)) {
      if (platformConfig.enabled === false) {
        logger.debug({ platform: name }, 'Platform disabled — skipping');
        continue;
      }
      if (this.active.has(name)) continue;

      const PlatformClass = this.registry.get(name);
      if (!PlatformClass) {
        logger.warn({ platform: name }, 'Unknown platform');
        continue;
      }

      try {
        const backend = new PlatformClass(platformConfig);
        if (await backend.connect()) {
          this.active.set(name, backend);
          logger.info({ platform: name }, 'Initialized platform');
        } else {
          logger.warn({ platform: name }, 'Platform failed to connect');
        }
      } catch (err) {
        logger.error({ platform: name, err: err instanceof Error ? err.message : String(err) }, 'Failed to initialize platform');
      }
    }
    return this.getActivePlatforms();
  }

  broadcast(
    templateName: string,
    targetPlatforms?: readonly string[],
    params: TemplateParams = {},
    options: BroadcastOptions = {},
  ): Promise<PlatformOutcome> {
    return this.broadcaster.broadcast(templateName, targetPlatforms, params, options);
  }

  reactAll(messageId: string, reaction: string): Promise<PlatformOutcome> {
    return fanOut(this.active, 'React', (backend) => backend.reactToMessage(messageId, reaction));
  }

  deleteAll(messageId: string): Promise<PlatformOutcome> {
    return fanOut(this.active, 'Delete', (backend) => backend.deleteMessage(messageId));
  }

  editAll(messageId: string, newContent: string): Promise<PlatformOutcome> {
    const content = sanitizeInput(newContent);
    return fanOut(this.active, 'Edit', (backend) => backend.editMessage(messageId, content));
  }

  monitorAll(callback: MessageCallback, options: MonitorOptions = {}): Promise<void> {
    return this.monitor.monitorAll(callback, options);
  }

  stopMonitoring(): void {
    this.monitor.stop();
  }

  /**
   * Stop monitoring and disconnect every active platform. One failed
   * disconnect does not prevent the others.
   */
  async shutdown(): Promise<PlatformOutcome> {
    this.monitor.stop();
    const results = await fanOut(this.active, 'Disconnect', (backend) => backend.disconnect());
    for (const [name, ok] of Object.entries(results)) {
      if (ok) logger.info({ platform: name }, 'Disconnected');
    }
    this.active.clear();
    return results;
  }

  /** Every registered platform kind. */
  listAvailablePlatforms(): string[] {
    return this.registry.list();
  }

  /** Platforms connected in this process. */
  getActivePlatforms(): string[] {
    return [...this.active.keys()];
  }
}
