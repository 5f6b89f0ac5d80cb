import { createLogger } from '../middleware/logger.js';
import type { Message } from './message.js';
import type { PlatformBackend } from './platform-backend.js';

const logger = createLogger({ component: 'monitor' });

const DEFAULT_BATCH_SIZE = 10;

/** Receives every observed message. Its return value is ignored. */
export type MessageCallback = (message: Message) => void | Promise<void>;

export interface MonitorOptions {
  /** Messages requested per poll. */
  batchSize?: number;
  /** Aborting this stops every loop started by the call. */
  signal?: AbortSignal;
}

/**
 * Resolve after `ms`, or early when `signal` aborts.
 * Resolves true if the full delay elapsed.
 */
function sleep(ms: number, signal: AbortSignal): Promise<boolean> {
  return new Promise((resolve) => {
    if (signal.aborted) {
      resolve(false);
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      resolve(false);
    };
    const timer = setTimeout(() => {
      signal.removeEventListener('abort', onAbort);
      resolve(true);
    }, ms);
    signal.addEventListener('abort', onAbort, { once: true });
  });
}

const ABORTED = Symbol('aborted');

/**
 * Settle with `work`, or with ABORTED as soon as `signal` aborts. A late
 * rejection of abandoned work is absorbed here.
 */
function unlessAborted<T>(work: Promise<T>, signal: AbortSignal): Promise<T | typeof ABORTED> {
  if (signal.aborted) return Promise.resolve(ABORTED);
  return new Promise((resolve, reject) => {
    const onAbort = (): void => resolve(ABORTED);
    signal.addEventListener('abort', onAbort, { once: true });
    work.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (err: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(err);
      },
    );
  });
}

/**
 * One polling loop per active backend.
 *
 * Loops are independent: each sleeps on its own timer, so a slow or failing
 * platform never delays another. Every loop is tracked by an AbortController
 * so stop() can cancel all of them, including a fetch or callback that is
 * still in flight.
 */
export class MonitorOrchestrator {
  private readonly handles = new Set<AbortController>();

  constructor(
    private readonly platforms: ReadonlyMap<string, PlatformBackend>,
    private readonly defaultBatchSize: number = DEFAULT_BATCH_SIZE,
  ) {}

  /** Number of loops currently running. */
  get activeLoops(): number {
    return this.handles.size;
  }

  /** Runs until stop() is called or `options.signal` aborts. */
  async monitorAll(callback: MessageCallback, options: MonitorOptions = {}): Promise<void> {
    const batchSize = options.batchSize ?? this.defaultBatchSize;
    const external = options.signal;

    const loops = [...this.platforms].map(([name, backend]) => {
      const handle = new AbortController();
      this.handles.add(handle);

      const forward = (): void => handle.abort();
      if (external?.aborted) handle.abort();
      else external?.addEventListener('abort', forward, { once: true });

      logger.info({ platform: name, pollIntervalMs: backend.pollIntervalMs }, 'Monitoring started');

      return this.pollLoop(name, backend, callback, batchSize, handle.signal).finally(() => {
        this.handles.delete(handle);
        external?.removeEventListener('abort', forward);
        logger.info({ platform: name }, 'Monitoring stopped');
      });
    });

    await Promise.all(loops);
  }

  /** Cancel every outstanding loop. */
  stop(): void {
    for (const handle of this.handles) handle.abort();
  }

  private async pollLoop(
    name: string,
    backend: PlatformBackend,
    callback: MessageCallback,
    batchSize: number,
    signal: AbortSignal,
  ): Promise<void> {
    while (!signal.aborted) {
      let delay = backend.pollIntervalMs;
      try {
        const messages = await unlessAborted(backend.getMessages(batchSize), signal);
        if (messages === ABORTED) return;
        for (const message of messages) {
          const handled = await unlessAborted(Promise.resolve(callback(message)), signal);
          if (handled === ABORTED) return;
        }
      } catch (err) {
        logger.error(
          { platform: name, err: err instanceof Error ? err.message : String(err), retryInMs: backend.errorDelayMs },
          'Error monitoring messages',
        );
        delay = backend.errorDelayMs;
      }

      if (!(await sleep(delay, signal))) return;
    }
  }
}
