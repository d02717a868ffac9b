export { createWebSocketServer, decodeClientMessage } from './server.js';
export {
  BroadcastCenter,
  generateConnectionId,
  type ConnectionId,
  type EventSocket,
} from './broadcast-center.js';
