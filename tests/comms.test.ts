import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { Comms } from '../src/core/comms.js';
import { PlatformRegistry } from '../src/core/platform-registry.js';
import { TemplateStore } from '../src/core/templates.js';
import { FakePlatform, fakePlatformClass, type FakeBehaviour } from './helpers/fake-platform.js';

describe('Comms', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'herald-comms-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  function build(
    kinds: Record<string, FakeBehaviour>,
    platforms: Record<string, Record<string, unknown>>,
  ) {
    const registry = new PlatformRegistry();
    const fakes = Object.fromEntries(
      Object.entries(kinds).map(([name, behaviour]) => {
        const fake = fakePlatformClass(name, behaviour);
        registry.register(name, fake.ctor);
        return [name, fake] as const;
      }),
    );
    const comms = new Comms({
      platforms,
      templates: new TemplateStore(join(dir, 'templates.json')),
      registry,
    });
    return { comms, fakes };
  }

  describe('initializePlatforms', () => {
    it('activates enabled, known platforms that connect', async () => {
      const { comms } = build(
        { matrix: {}, twitter: {} },
        { matrix: { enabled: true }, twitter: {} },
      );

      expect(await comms.initializePlatforms()).toEqual(['matrix', 'twitter']);
      expect(comms.getActivePlatforms()).toEqual(['matrix', 'twitter']);
    });

    it('skips disabled, unknown, failing and throwing platforms', async () => {
      const registry = new PlatformRegistry();
      registry.register('matrix', fakePlatformClass('matrix').ctor);
      registry.register('offline', fakePlatformClass('offline', { connect: false }).ctor);
      registry.register('broken', class extends FakePlatform {
        constructor(_config: unknown) {
          super('broken');
          throw new Error('bad config');
        }
      });
      const comms = new Comms({
        platforms: {
          matrix: {},
          twitter: { enabled: false },
          mastodon: {},
          offline: {},
          broken: {},
        },
        templates: new TemplateStore(join(dir, 'templates.json')),
        registry,
      });

      expect(await comms.initializePlatforms()).toEqual(['matrix']);
    });

    it('does not construct a platform twice across calls', async () => {
      const { comms, fakes } = build({ matrix: {} }, { matrix: {} });

      await comms.initializePlatforms();
      await comms.initializePlatforms();

      expect(fakes.matrix?.instances).toHaveLength(1);
    });

    it('lists every registered kind, active or not', () => {
      const { comms } = build({ matrix: {}, twitter: {} }, {});
      expect(comms.listAvailablePlatforms()).toEqual(['matrix', 'twitter']);
      expect(comms.getActivePlatforms()).toEqual([]);
    });
  });

  it('broadcasts the bootstrapped greeting and reports each platform', async () => {
    const { comms, fakes } = build(
      { matrix: {}, twitter_browser: { send: new Error('session expired') } },
      { matrix: {}, twitter_browser: {} },
    );
    await comms.loadTemplates();
    await comms.initializePlatforms();

    const results = await comms.broadcast('emergence');

    expect(results).toEqual({ matrix: true, twitter_browser: false });
    const sent = fakes.matrix?.instances[0]?.sendMessage.mock.calls[0]?.[0];
    expect(sent?.content.startsWith('Herald is online.')).toBe(true);
    expect(sent?.metadata.tags).toEqual(['emergence', 'introduction']);
  });

  it('reactAll, deleteAll and editAll report one entry per active platform', async () => {
    const { comms, fakes } = build(
      { matrix: { react: false, edit: new Error('boom') }, twitter: { edit: false } },
      { matrix: {}, twitter: {} },
    );
    await comms.initializePlatforms();

    expect(await comms.reactAll('msg-1', 'like')).toEqual({ matrix: false, twitter: true });
    expect(await comms.deleteAll('msg-1')).toEqual({ matrix: true, twitter: true });
    expect(await comms.editAll('msg-1', 'fixed\u0000 text')).toEqual({ matrix: false, twitter: false });

    expect(fakes.twitter?.instances[0]?.reactToMessage).toHaveBeenCalledWith('msg-1', 'like');
    expect(fakes.twitter?.instances[0]?.deleteMessage).toHaveBeenCalledWith('msg-1');
    expect(fakes.twitter?.instances[0]?.editMessage).toHaveBeenCalledWith('msg-1', 'fixed text');
  });

  it('fan-out over no active platforms returns an empty result', async () => {
    const { comms } = build({}, {});
    expect(await comms.reactAll('msg-1', 'like')).toEqual({});
  });

  it('shutdown disconnects every platform even when one throws', async () => {
    const { comms, fakes } = build(
      { matrix: { disconnect: new Error('already gone') }, twitter: {} },
      { matrix: {}, twitter: {} },
    );
    await comms.initializePlatforms();

    const results = await comms.shutdown();

    expect(results).toEqual({ matrix: false, twitter: true });
    expect(fakes.twitter?.instances[0]?.disconnect).toHaveBeenCalledTimes(1);
    expect(comms.getActivePlatforms()).toEqual([]);
  });
});
