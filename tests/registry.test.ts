import { describe, expect, it } from 'vitest';

import { PlatformRegistry } from '../src/core/platform-registry.js';
import { fakePlatformClass } from './helpers/fake-platform.js';

describe('PlatformRegistry', () => {
  it('registers and resolves constructors by name', () => {
    const registry = new PlatformRegistry();
    const { ctor } = fakePlatformClass('matrix');
    registry.register('matrix', ctor);

    expect(registry.get('matrix')).toBe(ctor);
    expect(registry.get('irc')).toBeUndefined();
  });

  it('lists names in registration order', () => {
    const registry = new PlatformRegistry();
    registry.register('twitter', fakePlatformClass('twitter').ctor);
    registry.register('matrix', fakePlatformClass('matrix').ctor);
    expect(registry.list()).toEqual(['twitter', 'matrix']);
  });

  it('replaces an existing registration', () => {
    const registry = new PlatformRegistry();
    const first = fakePlatformClass('matrix').ctor;
    const second = fakePlatformClass('matrix').ctor;
    registry.register('matrix', first);
    registry.register('matrix', second);
    expect(registry.get('matrix')).toBe(second);
    expect(registry.list()).toEqual(['matrix']);
  });
});

describe('built-in platforms', async () => {
  const { platformRegistry } = await import('../src/platforms/index.js');

  it('registers every shipped backend on import', () => {
    expect(platformRegistry.list()).toEqual(expect.arrayContaining(['matrix', 'twitter', 'twitter_browser']));
  });
});
