/** Origin tag for messages built by the broadcaster before fan-out. */
export const BROADCAST_PLATFORM = 'multi';

/**
 * Platform-agnostic message.
 *
 * Backends map their native payloads into this shape on fetch and read it
 * on send. `metadata` carries routing fields (room ids, event ids, senders)
 * that only the owning backend interprets.
 */
export interface Message {
  content: string;
  timestamp: Date;
  platform: string;
  metadata: Record<string, unknown>;
  /** File paths or URIs, in send order. */
  attachments: string[];
}

export function createMessage(params: {
  content: string;
  platform: string;
  timestamp?: Date;
  metadata?: Record<string, unknown>;
  attachments?: string[];
}): Message {
  return {
    content: params.content,
    timestamp: params.timestamp ?? new Date(),
    platform: params.platform,
    metadata: { ...(params.metadata ?? {}) },
    attachments: [...(params.attachments ?? [])],
  };
}

/** Read a string routing field from message metadata. */
export function metadataString(message: Message, key: string): string | undefined {
  const value = message.metadata[key];
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}
