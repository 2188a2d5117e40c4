import { AgentDispatchClient, RoomServiceClient } from 'livekit-server-sdk';
import type { Config } from '../config/index.js';

/**
 * Room operations used here; RoomServiceClient satisfies it.
 */
export interface RoomAdmin {
  createRoom(options: { name: string }): Promise<unknown>;
  listRooms(): Promise<Array<{ name: string }>>;
  deleteRoom(roomName: string): Promise<void>;
}

/**
 * Dispatch operations used here; AgentDispatchClient satisfies it.
 */
export interface DispatchAdmin {
  createDispatch(roomName: string, agentName: string): Promise<{ id: string }>;
  listDispatch(roomName: string): Promise<Array<{ id: string; room: string }>>;
  deleteDispatch(dispatchId: string, roomName: string): Promise<void>;
}

export interface LivekitClients {
  rooms: RoomAdmin;
  dispatches: DispatchAdmin;
}

export function getLivekitUrl(config: Config): string {
  return config.livekit.url;
}

/**
 * The server API speaks HTTP(S) on the same host as the wss:// signal URL.
 */
export function toHttpUrl(url: string): string {
  return url.replace(/^ws(s?):\/\//, 'http$1://');
}

export function createLivekitClients(config: Config): LivekitClients {
  const host = toHttpUrl(config.livekit.url);
  const { apiKey, apiSecret } = config.livekit;

  return {
    rooms: new RoomServiceClient(host, apiKey, apiSecret),
    dispatches: new AgentDispatchClient(host, apiKey, apiSecret),
  };
}
