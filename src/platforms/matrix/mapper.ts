import { createMessage, type Message } from '../../core/message.js';
import type { MatrixRoomEvent } from './types.js';

/** Matrix message ids are `roomId/eventId`. */
export function toMessageId(roomId: string, eventId: string): string {
  return `${roomId}/${eventId}`;
}

/**
 * Split a `roomId/eventId` id. Room ids never contain a slash, so the first
 * one is the separator; event ids may contain more.
 */
export function parseMessageId(messageId: string): { roomId: string; eventId: string } | null {
  const slash = messageId.indexOf('/');
  if (slash <= 0 || slash === messageId.length - 1) return null;
  return { roomId: messageId.slice(0, slash), eventId: messageId.slice(slash + 1) };
}

/** Map a room event to a Message. Non-text events map to null. */
export function mapRoomEvent(roomId: string, event: MatrixRoomEvent): Message | null {
  if (event.type !== 'm.room.message') return null;
  const { body, msgtype } = event.content;
  if (typeof body !== 'string') return null;
  if (msgtype !== 'm.text' && msgtype !== 'm.notice' && msgtype !== 'm.emote') return null;

  return createMessage({
    content: body,
    platform: 'matrix',
    timestamp: new Date(event.origin_server_ts),
    metadata: {
      room_id: roomId,
      event_id: event.event_id,
      message_id: toMessageId(roomId, event.event_id),
      sender: event.sender,
      msgtype,
    },
  });
}

const MEDIA_TYPES: Record<string, { mimetype: string; msgtype: string }> = {
  '.jpg': { mimetype: 'image/jpeg', msgtype: 'm.image' },
  '.jpeg': { mimetype: 'image/jpeg', msgtype: 'm.image' },
  '.png': { mimetype: 'image/png', msgtype: 'm.image' },
  '.gif': { mimetype: 'image/gif', msgtype: 'm.image' },
  '.webp': { mimetype: 'image/webp', msgtype: 'm.image' },
  '.mp4': { mimetype: 'video/mp4', msgtype: 'm.video' },
  '.webm': { mimetype: 'video/webm', msgtype: 'm.video' },
  '.ogg': { mimetype: 'audio/ogg', msgtype: 'm.audio' },
  '.mp3': { mimetype: 'audio/mpeg', msgtype: 'm.audio' },
};

/** Guess mimetype and Matrix msgtype from a file name. */
export function mediaTypeFor(fileName: string): { mimetype: string; msgtype: string } {
  const dot = fileName.lastIndexOf('.');
  const ext = dot >= 0 ? fileName.slice(dot).toLowerCase() : '';
  return MEDIA_TYPES[ext] ?? { mimetype: 'application/octet-stream', msgtype: 'm.file' };
}
