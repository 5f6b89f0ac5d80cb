import { afterEach, describe, expect, it, vi } from 'vitest';

vi.mock('../src/utils/config.js', () => ({
  config: {
    HERALD_CONFIG: 'config/herald.json',
    HERALD_KEY_PATH: '.herald_key',
    HERALD_CREDENTIALS: 'credentials.enc',
    LOG_LEVEL: 'error',
  },
  resolveProjectPath: (path: string) => path,
}));

vi.mock('../src/utils/credentials.js', () => ({
  loadOrCreateKey: vi.fn(async () => Buffer.alloc(32)),
  CredentialStore: class {
    async load() {
      return {};
    }
  },
}));

vi.mock('../src/utils/comms-config.js', () => ({
  loadHeraldConfig: vi.fn(async () => ({
    general: {
      rate_limit: true,
      rate_limit_max_requests: 300,
      rate_limit_window_minutes: 180,
      template_path: 'templates/message_templates.json',
    },
    monitoring: { enabled: false, max_messages: 10 },
    platforms: {},
  })),
}));

vi.mock('../src/core/comms.js', () => ({
  Comms: class {
    async loadTemplates() {
      return new Map();
    }
    async initializePlatforms() {
      return [];
    }
  },
}));

const EVENTS = ['uncaughtException', 'unhandledRejection', 'SIGINT', 'SIGTERM'] as const;

describe('entry point', () => {
  const before = new Map(EVENTS.map((event) => [event, process.listeners(event).length]));

  afterEach(() => {
    for (const event of EVENTS) {
      for (const listener of process.listeners(event).slice(before.get(event) ?? 0)) {
        process.removeListener(event, listener);
      }
    }
    vi.restoreAllMocks();
  });

  it('installs a fatal handler for uncaught exceptions', async () => {
    const exit = vi.spyOn(process, 'exit').mockImplementation(() => undefined as never);

    await import('../src/index.js');

    const added = process.listeners('uncaughtException').slice(before.get('uncaughtException') ?? 0);
    expect(added).toHaveLength(1);
    added[0]?.(new Error('boom'), 'uncaughtException');
    expect(exit).toHaveBeenCalledWith(1);
  });
});
