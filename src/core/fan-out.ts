import { createLogger } from '../middleware/logger.js';
import type { PlatformBackend } from './platform-backend.js';

const logger = createLogger({ component: 'fan-out' });

/** Per-platform boolean result. Always has one key per requested platform. */
export type PlatformOutcome = Record<string, boolean>;

/**
 * Run one backend action and fold any rejection into `false`. This is the
 * isolation boundary: nothing a backend throws gets past it.
 */
export async function attempt(
  name: string,
  label: string,
  action: () => Promise<boolean>,
): Promise<boolean> {
  try {
    const ok = await action();
    if (!ok) logger.warn({ platform: name }, `${label} failed`);
    return ok;
  } catch (err) {
    logger.error({ platform: name, err: err instanceof Error ? err.message : String(err) }, `${label} failed`);
    return false;
  }
}

/**
 * Apply one logical action to every backend concurrently and collect the
 * outcome per platform.
 */
export async function fanOut(
  platforms: ReadonlyMap<string, PlatformBackend>,
  label: string,
  action: (backend: PlatformBackend) => Promise<boolean>,
): Promise<PlatformOutcome> {
  const entries = await Promise.all(
    [...platforms].map(async ([name, backend]) => [name, await attempt(name, label, () => action(backend))] as const),
  );
  return Object.fromEntries(entries);
}
