import { createLogger } from '../middleware/logger.js';
import type { PlatformConstructor } from './platform-backend.js';

const logger = createLogger({ component: 'registry' });

/**
 * Name → backend constructor table.
 *
 * Holds types, not live connections: backends register themselves once when
 * their module loads, and the orchestrator constructs instances from the
 * config file by name.
 */
export class PlatformRegistry {
  private readonly platforms = new Map<string, PlatformConstructor>();

  /** Associate `name` with a backend constructor. The last registration wins. */
  register(name: string, ctor: PlatformConstructor): void {
    if (this.platforms.has(name)) {
      logger.debug({ platform: name }, 'Replacing existing platform registration');
    }
    this.platforms.set(name, ctor);
  }

  /** Constructor for `name`, or undefined for an unknown platform. */
  get(name: string): PlatformConstructor | undefined {
    return this.platforms.get(name);
  }

  /** Every registered platform kind, active or not. */
  list(): string[] {
    return [...this.platforms.keys()];
  }
}

/** Process-wide registry that built-in backends register into. */
export const platformRegistry = new PlatformRegistry();
