/**
 * Room and agent-dispatch administration
 *
 * Used by the CLI scripts to put the agent into a room before a user joins,
 * and to tear everything down afterwards.
 */

import type { Config } from '../config/index.js';
import { createLivekitClients, type LivekitClients } from './livekit.client.js';
import { getErrorMessage } from '../utils/errors.js';
import logger from '../utils/logger.js';

export interface CleanupResult {
  roomsDeleted: number;
  dispatchesDeleted: number;
  dispatchFailures: number;
}

/**
 * Make sure the room exists and dispatch the configured agent into it.
 * Returns the room name.
 */
export async function dispatchAgentToRoom(
  config: Config,
  roomName: string = config.agent.defaultRoom,
  clients: LivekitClients = createLivekitClients(config)
): Promise<string> {
  try {
    await clients.rooms.createRoom({ name: roomName });
    logger.info('Room created', { room: roomName });
  } catch (error) {
    logger.info('Using existing room', { room: roomName, reason: getErrorMessage(error) });
  }

  const dispatch = await clients.dispatches.createDispatch(roomName, config.agent.name);
  logger.info('Agent dispatched to room', {
    room: roomName,
    agent: config.agent.name,
    dispatchId: dispatch.id,
  });

  return roomName;
}

/**
 * Delete every room and the agent dispatches attached to it.
 * A dispatch that cannot be listed or deleted is logged and skipped; room
 * deletion failures propagate.
 */
export async function cleanupAll(
  config: Config,
  clients: LivekitClients = createLivekitClients(config)
): Promise<CleanupResult> {
  const result: CleanupResult = { roomsDeleted: 0, dispatchesDeleted: 0, dispatchFailures: 0 };

  const rooms = await clients.rooms.listRooms();
  if (rooms.length === 0) {
    logger.info('No rooms found');
    return result;
  }

  logger.info('Found rooms', { count: rooms.length });

  for (const room of rooms) {
    try {
      const dispatches = await clients.dispatches.listDispatch(room.name);
      for (const dispatch of dispatches) {
        await clients.dispatches.deleteDispatch(dispatch.id, room.name);
        result.dispatchesDeleted++;
        logger.info('Deleted dispatch', { dispatchId: dispatch.id, room: room.name });
      }
    } catch (error) {
      result.dispatchFailures++;
      logger.warn('Could not list/delete dispatches', { room: room.name, error: getErrorMessage(error) });
    }

    await clients.rooms.deleteRoom(room.name);
    result.roomsDeleted++;
    logger.info('Deleted room', { room: room.name });
  }

  return result;
}
