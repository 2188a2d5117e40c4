export { generateToken, TOKEN_TTL } from './token.service.js';
export { dispatchAgentToRoom, cleanupAll } from './room.service.js';
export type { CleanupResult } from './room.service.js';
export { createLivekitClients, getLivekitUrl, toHttpUrl } from './livekit.client.js';
export type { LivekitClients, RoomAdmin, DispatchAdmin } from './livekit.client.js';
