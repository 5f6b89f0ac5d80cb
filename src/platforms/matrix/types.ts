import { z } from 'zod';

import { basePlatformConfigSchema } from '../../core/platform-backend.js';

export const matrixConfigSchema = basePlatformConfigSchema.extend({
  homeserver_url: z.string().url(),
  user_id: z.string().regex(/^@[^:]+:.+$/, 'user_id must look like @name:server'),
  password: z.string().min(1),
  /** Room id (!abc:server) or alias (#name:server) used when a message names no room. */
  default_room: z.string().optional(),
  /** Rooms to poll. Defaults to every joined room. */
  rooms: z.array(z.string()).optional(),
  device_name: z.string().default('herald'),
});

export type MatrixConfig = z.infer<typeof matrixConfigSchema>;

// ── Client-server API response shapes ───────────────────────────────

export interface MatrixLoginResponse {
  access_token: string;
  user_id: string;
  device_id?: string;
}

export interface MatrixJoinedRoomsResponse {
  joined_rooms: string[];
}

export interface MatrixRoomAliasResponse {
  room_id: string;
}

export interface MatrixEventIdResponse {
  event_id: string;
}

export interface MatrixUploadResponse {
  content_uri: string;
}

export interface MatrixRoomEvent {
  type: string;
  event_id: string;
  sender: string;
  origin_server_ts: number;
  content: Record<string, unknown>;
}

export interface MatrixMessagesResponse {
  chunk: MatrixRoomEvent[];
  start?: string;
  end?: string;
}

export interface MatrixErrorBody {
  errcode?: string;
  error?: string;
}
