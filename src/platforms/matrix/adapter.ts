import { randomUUID } from 'node:crypto';
import { readFile } from 'node:fs/promises';
import { basename } from 'node:path';

import { metadataString, type Message } from '../../core/message.js';
import { cadenceFrom, type PlatformBackend } from '../../core/platform-backend.js';
import { platformRegistry } from '../../core/platform-registry.js';
import { createLogger } from '../../middleware/logger.js';
import { mapRoomEvent, mediaTypeFor, parseMessageId } from './mapper.js';
import {
  matrixConfigSchema,
  type MatrixConfig,
  type MatrixErrorBody,
  type MatrixEventIdResponse,
  type MatrixJoinedRoomsResponse,
  type MatrixLoginResponse,
  type MatrixMessagesResponse,
  type MatrixRoomAliasResponse,
  type MatrixUploadResponse,
} from './types.js';

const logger = createLogger({ component: 'platform', platform: 'matrix' });

const CLIENT_API = '/_matrix/client/v3';
const MEDIA_API = '/_matrix/media/v3';

type MatrixResult<T> =
  | { ok: true; status: number; data: T }
  | { ok: false; status: number; error: string };

function safeJsonParse(input: string): unknown {
  try {
    return JSON.parse(input);
  } catch {
    return null;
  }
}

function describeError(payload: unknown, fallback: string): string {
  if (payload && typeof payload === 'object') {
    const body = payload as MatrixErrorBody;
    if (body.errcode || body.error) return `${body.errcode ?? 'M_UNKNOWN'}: ${body.error ?? ''}`.trim();
  }
  return fallback;
}

export interface MatrixPlatformDeps {
  fetchImpl?: typeof fetch;
  readFileImpl?: (path: string) => Promise<Uint8Array>;
}

/**
 * Matrix backend over the client-server API.
 *
 * Logs in with a password on connect() and logs out on disconnect(). Sends
 * go to `metadata.room_id`, falling back to `default_room` (an alias is
 * resolved once through the room directory).
 */
export class MatrixPlatform implements PlatformBackend {
  readonly name = 'matrix';
  readonly pollIntervalMs: number;
  readonly errorDelayMs: number;

  private readonly config: MatrixConfig;
  private readonly baseUrl: string;
  private readonly fetchImpl: typeof fetch;
  private readonly readFileImpl: (path: string) => Promise<Uint8Array>;

  private accessToken: string | null = null;
  private rooms: string[] = [];
  private defaultRoomId: string | null = null;

  constructor(config: unknown, deps: MatrixPlatformDeps = {}) {
    this.config = matrixConfigSchema.parse(config);
    const cadence = cadenceFrom(this.config);
    this.pollIntervalMs = cadence.pollIntervalMs;
    this.errorDelayMs = cadence.errorDelayMs;
    this.baseUrl = this.config.homeserver_url.replace(/\/+$/, '');
    this.fetchImpl = deps.fetchImpl ?? fetch;
    this.readFileImpl = deps.readFileImpl ?? ((path) => readFile(path));
  }

  isConnected(): boolean {
    return this.accessToken !== null;
  }

  async connect(): Promise<boolean> {
    try {
      const login = await this.request<MatrixLoginResponse>('POST', `${CLIENT_API}/login`, {
        type: 'm.login.password',
        identifier: { type: 'm.id.user', user: this.config.user_id },
        password: this.config.password,
        initial_device_display_name: this.config.device_name,
      });
      if (!login.ok) {
        logger.error({ status: login.status, error: login.error }, 'Failed to login');
        return false;
      }
      this.accessToken = login.data.access_token;

      this.rooms = this.config.rooms ?? await this.fetchJoinedRooms();
      logger.info({ userId: login.data.user_id, rooms: this.rooms.length }, 'Connected to Matrix');
      return true;
    } catch (err) {
      logger.error({ err: err instanceof Error ? err.message : String(err) }, 'Failed to connect to Matrix');
      this.accessToken = null;
      return false;
    }
  }

  async disconnect(): Promise<boolean> {
    if (!this.accessToken) return true;
    try {
      const result = await this.request<Record<string, never>>('POST', `${CLIENT_API}/logout`, {});
      if (!result.ok) logger.warn({ status: result.status, error: result.error }, 'Logout rejected');
      return true;
    } catch (err) {
      logger.error({ err: err instanceof Error ? err.message : String(err) }, 'Error disconnecting from Matrix');
      return false;
    } finally {
      this.accessToken = null;
    }
  }

  async sendMessage(message: Message): Promise<boolean> {
    if (!this.accessToken) {
      logger.warn('sendMessage called before connect');
      return false;
    }
    try {
      const roomId = await this.resolveTargetRoom(message);
      if (!roomId) {
        logger.error('room_id required in message metadata (no default_room configured)');
        return false;
      }

      // Upload everything first so a failed upload posts nothing.
      const media: Array<Record<string, unknown>> = [];
      for (const attachment of message.attachments) {
        const content = await this.uploadAttachment(attachment);
        if (!content) return false;
        media.push(content);
      }

      const sent: string[] = [];
      for (const content of [{ msgtype: 'm.text', body: message.content }, ...media]) {
        const eventId = await this.sendEvent(roomId, 'm.room.message', content);
        if (!eventId) {
          await this.rollback(roomId, sent);
          return false;
        }
        sent.push(eventId);
      }
      return true;
    } catch (err) {
      logger.error({ err: err instanceof Error ? err.message : String(err) }, 'Failed to send Matrix message');
      return false;
    }
  }

  async getMessages(limit: number): Promise<Message[]> {
    if (!this.accessToken) return [];
    const messages: Message[] = [];
    try {
      for (const roomId of this.rooms) {
        const query = new URLSearchParams({ dir: 'b', limit: String(limit) });
        const result = await this.request<MatrixMessagesResponse>(
          'GET',
          `${CLIENT_API}/rooms/${encodeURIComponent(roomId)}/messages?${query.toString()}`,
        );
        if (!result.ok) {
          logger.warn({ roomId, status: result.status, error: result.error }, 'Could not read room messages');
          continue;
        }
        for (const event of result.data.chunk) {
          const mapped = mapRoomEvent(roomId, event);
          if (mapped) messages.push(mapped);
        }
      }
    } catch (err) {
      logger.error({ err: err instanceof Error ? err.message : String(err) }, 'Failed to get Matrix messages');
      return [];
    }

    messages.sort((a, b) => b.timestamp.getTime() - a.timestamp.getTime());
    return messages.slice(0, limit);
  }

  async reactToMessage(messageId: string, reaction: string): Promise<boolean> {
    const target = this.parseTarget(messageId, 'react');
    if (!target) return false;
    try {
      const eventId = await this.sendEvent(target.roomId, 'm.reaction', {
        'm.relates_to': { rel_type: 'm.annotation', event_id: target.eventId, key: reaction },
      });
      return eventId !== null;
    } catch (err) {
      logger.error({ err: err instanceof Error ? err.message : String(err) }, 'Failed to react to Matrix message');
      return false;
    }
  }

  async deleteMessage(messageId: string): Promise<boolean> {
    const target = this.parseTarget(messageId, 'delete');
    if (!target) return false;
    try {
      return await this.redact(target.roomId, target.eventId);
    } catch (err) {
      logger.error({ err: err instanceof Error ? err.message : String(err) }, 'Failed to delete Matrix message');
      return false;
    }
  }

  async editMessage(messageId: string, newContent: string): Promise<boolean> {
    const target = this.parseTarget(messageId, 'edit');
    if (!target) return false;
    try {
      const eventId = await this.sendEvent(target.roomId, 'm.room.message', {
        msgtype: 'm.text',
        body: `* ${newContent}`,
        'm.new_content': { msgtype: 'm.text', body: newContent },
        'm.relates_to': { rel_type: 'm.replace', event_id: target.eventId },
      });
      return eventId !== null;
    } catch (err) {
      logger.error({ err: err instanceof Error ? err.message : String(err) }, 'Failed to edit Matrix message');
      return false;
    }
  }

  // ── Internals ───────────────────────────────────────────────────────

  private async request<T>(method: string, path: string, body?: unknown): Promise<MatrixResult<T>> {
    const headers = new Headers();
    if (this.accessToken) headers.set('Authorization', `Bearer ${this.accessToken}`);
    if (body !== undefined) headers.set('Content-Type', 'application/json');

    const response = await this.fetchImpl(`${this.baseUrl}${path}`, {
      method,
      headers,
      ...(body !== undefined ? { body: JSON.stringify(body) } : {}),
    });
    const raw = await response.text();
    const payload = raw ? safeJsonParse(raw) : null;

    if (!response.ok) {
      return { ok: false, status: response.status, error: describeError(payload, raw || response.statusText) };
    }
    return { ok: true, status: response.status, data: payload as T };
  }

  private async fetchJoinedRooms(): Promise<string[]> {
    const result = await this.request<MatrixJoinedRoomsResponse>('GET', `${CLIENT_API}/joined_rooms`);
    if (!result.ok) {
      logger.warn({ status: result.status, error: result.error }, 'Could not list joined rooms');
      return [];
    }
    return result.data.joined_rooms;
  }

  private async resolveTargetRoom(message: Message): Promise<string | null> {
    const explicit = metadataString(message, 'room_id');
    if (explicit) return explicit;
    if (this.defaultRoomId) return this.defaultRoomId;

    const configured = this.config.default_room;
    if (!configured) return null;
    if (!configured.startsWith('#')) {
      this.defaultRoomId = configured;
      return configured;
    }

    const result = await this.request<MatrixRoomAliasResponse>(
      'GET',
      `${CLIENT_API}/directory/room/${encodeURIComponent(configured)}`,
    );
    if (!result.ok) {
      logger.error({ alias: configured, status: result.status, error: result.error }, 'Could not resolve room alias');
      return null;
    }
    this.defaultRoomId = result.data.room_id;
    return this.defaultRoomId;
  }

  private async uploadAttachment(path: string): Promise<Record<string, unknown> | null> {
    const fileName = basename(path);
    const { mimetype, msgtype } = mediaTypeFor(fileName);
    const bytes = await this.readFileImpl(path);

    const headers = new Headers({ 'Content-Type': mimetype });
    if (this.accessToken) headers.set('Authorization', `Bearer ${this.accessToken}`);
    const response = await this.fetchImpl(
      `${this.baseUrl}${MEDIA_API}/upload?filename=${encodeURIComponent(fileName)}`,
      { method: 'POST', headers, body: new Blob([new Uint8Array(bytes)], { type: mimetype }) },
    );
    const raw = await response.text();
    const payload = raw ? safeJsonParse(raw) : null;
    if (!response.ok || !payload || typeof payload !== 'object' || !('content_uri' in payload)) {
      logger.error({ path, status: response.status, error: describeError(payload, raw) }, 'Attachment upload failed');
      return null;
    }

    const { content_uri: url } = payload as MatrixUploadResponse;
    return { msgtype, body: fileName, url, info: { mimetype, size: bytes.byteLength } };
  }

  private async sendEvent(roomId: string, eventType: string, content: Record<string, unknown>): Promise<string | null> {
    const result = await this.request<MatrixEventIdResponse>(
      'PUT',
      `${CLIENT_API}/rooms/${encodeURIComponent(roomId)}/send/${encodeURIComponent(eventType)}/${randomUUID()}`,
      content,
    );
    if (!result.ok) {
      logger.error({ roomId, eventType, status: result.status, error: result.error }, 'Room send rejected');
      return null;
    }
    return result.data.event_id;
  }

  private async redact(roomId: string, eventId: string): Promise<boolean> {
    const result = await this.request<MatrixEventIdResponse>(
      'PUT',
      `${CLIENT_API}/rooms/${encodeURIComponent(roomId)}/redact/${encodeURIComponent(eventId)}/${randomUUID()}`,
      { reason: 'Deleted by sender' },
    );
    if (!result.ok) {
      logger.error({ roomId, eventId, status: result.status, error: result.error }, 'Redaction rejected');
    }
    return result.ok;
  }

  /** Undo the events of a multi-part send that failed midway. */
  private async rollback(roomId: string, eventIds: string[]): Promise<void> {
    for (const eventId of eventIds) {
      const ok = await this.redact(roomId, eventId).catch(() => false);
      if (!ok) logger.warn({ roomId, eventId }, 'Could not roll back partial send');
    }
  }

  private parseTarget(messageId: string, action: string): { roomId: string; eventId: string } | null {
    if (!this.accessToken) {
      logger.warn({ action }, 'Matrix action called before connect');
      return null;
    }
    const target = parseMessageId(messageId);
    if (!target) logger.error({ messageId, action }, 'Matrix message id must be roomId/eventId');
    return target;
  }
}

platformRegistry.register('matrix', MatrixPlatform);
