import { AccessToken } from 'livekit-server-sdk';
import type { Config } from '../config/index.js';

export const TOKEN_TTL = '1h';

/**
 * Signed room-join token for one participant: join, publish and subscribe
 * in the given room, valid for one hour.
 */
export async function generateToken(
  config: Config,
  roomName: string,
  participantName: string
): Promise<string> {
  const token = new AccessToken(config.livekit.apiKey, config.livekit.apiSecret, {
    identity: participantName,
    name: participantName,
    ttl: TOKEN_TTL,
  });

  token.addGrant({
    roomJoin: true,
    room: roomName,
    canPublish: true,
    canSubscribe: true,
  });

  return token.toJwt();
}
