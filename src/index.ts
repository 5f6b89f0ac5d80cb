import { Comms } from './core/comms.js';
import type { Message } from './core/message.js';
import { TemplateStore } from './core/templates.js';
import { logger } from './middleware/logger.js';
import { RateLimiter } from './middleware/rate-limit.js';
import { platformRegistry } from './platforms/index.js';
import { loadHeraldConfig } from './utils/comms-config.js';
import { config, resolveProjectPath } from './utils/config.js';
import { CredentialStore, loadOrCreateKey } from './utils/credentials.js';

/**
 * Decrypted credentials become interpolation variables for the config file;
 * real environment variables take precedence.
 */
async function buildConfigEnv(): Promise<NodeJS.ProcessEnv> {
  const key = await loadOrCreateKey(resolveProjectPath(config.HERALD_KEY_PATH));
  const store = new CredentialStore(resolveProjectPath(config.HERALD_CREDENTIALS), key);
  const stored = await store.load();

  const fromStore: NodeJS.ProcessEnv = {};
  for (const [name, value] of Object.entries(stored)) {
    if (typeof value === 'string') fromStore[name] = value;
  }
  return { ...fromStore, ...process.env };
}

function logIncoming(message: Message): void {
  logger.info(
    {
      platform: message.platform,
      sender: message.metadata.sender,
      messageId: message.metadata.message_id,
      at: message.timestamp.toISOString(),
    },
    `📥 ${message.content.slice(0, 200)}`,
  );
}

let comms: Comms | null = null;

async function main(): Promise<void> {
  logger.info('📣 Herald starting...');

  const heraldConfig = await loadHeraldConfig(resolveProjectPath(config.HERALD_CONFIG), await buildConfigEnv());
  const templatePath = config.HERALD_TEMPLATES ?? heraldConfig.general.template_path;

  logger.info({
    configuredPlatforms: Object.keys(heraldConfig.platforms),
    availablePlatforms: platformRegistry.list(),
    rateLimit: heraldConfig.general.rate_limit,
    monitoring: heraldConfig.monitoring.enabled,
    logLevel: config.LOG_LEVEL,
  }, 'Configuration loaded');

  comms = new Comms({
    platforms: heraldConfig.platforms,
    templates: new TemplateStore(resolveProjectPath(templatePath)),
    rateLimiter: new RateLimiter({
      enabled: heraldConfig.general.rate_limit,
      maxRequests: heraldConfig.general.rate_limit_max_requests,
      windowMs: heraldConfig.general.rate_limit_window_minutes * 60 * 1000,
    }),
    monitorBatchSize: heraldConfig.monitoring.max_messages,
  });

  await comms.loadTemplates();
  const active = await comms.initializePlatforms();
  if (active.length === 0) {
    logger.warn('No platforms connected — nothing to broadcast or monitor');
    return;
  }
  logger.info({ active }, 'Platforms online');

  if (config.STARTUP_TEMPLATE) {
    const results = await comms.broadcast(config.STARTUP_TEMPLATE);
    logger.info({ template: config.STARTUP_TEMPLATE, results }, 'Startup broadcast finished');
  }

  if (heraldConfig.monitoring.enabled) {
    await comms.monitorAll(logIncoming);
  }
}

// Graceful shutdown
async function shutdown(signal: 'SIGINT' | 'SIGTERM'): Promise<void> {
  logger.info({ signal }, 'Received shutdown signal — shutting down');
  try {
    const results = await comms?.shutdown();
    logger.info({ results }, 'Platforms disconnected');
  } catch (err) {
    logger.error({ err, signal }, 'Failed to shut down cleanly');
  }
  process.exit(0);
}

main().catch((err) => {
  logger.fatal({ err }, 'Fatal error — Herald shutting down');
  process.exit(1);
});

process.on('unhandledRejection', (reason) => {
  logger.fatal({ err: reason }, 'Unhandled promise rejection — Herald shutting down');
  process.exit(1);
});

process.on('uncaughtException', (err) => {
  logger.fatal({ err }, 'Uncaught exception — Herald shutting down');
  process.exit(1);
});

process.on('SIGINT', () => {
  void shutdown('SIGINT');
});

process.on('SIGTERM', () => {
  void shutdown('SIGTERM');
});
