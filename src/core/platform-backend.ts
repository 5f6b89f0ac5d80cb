import { z } from 'zod';

import type { Message } from './message.js';

/**
 * Fields every platform block in the config file may carry. Backend config
 * schemas extend this one.
 */
export const basePlatformConfigSchema = z.object({
  enabled: z.boolean().default(true),
  /** Seconds between polls while monitoring. */
  poll_interval: z.number().positive().default(60),
  /** Seconds to wait after a failed poll. */
  error_delay: z.number().positive().default(300),
});

export type BasePlatformConfig = z.infer<typeof basePlatformConfigSchema>;

/**
 * Capability contract for a platform backend.
 *
 * Every operation resolves to a result instead of rejecting: `false` for a
 * failed action, an empty array for a failed fetch. Failure detail goes to
 * the backend's logger. Callers still guard against rejections since a
 * backend bug must not take down sibling platforms.
 */
export interface PlatformBackend {
  /** Registry name this backend was created under. */
  readonly name: string;
  readonly pollIntervalMs: number;
  readonly errorDelayMs: number;

  connect(): Promise<boolean>;

  /** Safe to call more than once. */
  disconnect(): Promise<boolean>;

  /** One delivery attempt. Never reports a partially posted message as sent. */
  sendMessage(message: Message): Promise<boolean>;

  deleteMessage(messageId: string): Promise<boolean>;

  editMessage(messageId: string, newContent: string): Promise<boolean>;

  reactToMessage(messageId: string, reaction: string): Promise<boolean>;

  /** At most `limit` messages, newest first where the platform allows it. */
  getMessages(limit: number): Promise<Message[]>;
}

/**
 * Constructor registered for a platform kind. Receives the raw config block
 * and throws if it does not validate.
 */
export type PlatformConstructor = new (config: unknown) => PlatformBackend;

/** Parse a config block and derive the monitor cadence in milliseconds. */
export function cadenceFrom(config: BasePlatformConfig): { pollIntervalMs: number; errorDelayMs: number } {
  return {
    pollIntervalMs: config.poll_interval * 1000,
    errorDelayMs: config.error_delay * 1000,
  };
}
