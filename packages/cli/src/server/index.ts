export { startRelayServer, type RelayServer, type RelayServerOptions } from './server.js';
export {
  parseClientMessage,
  parsePublishFrame,
  type ClientMessage,
  type ServerMessage,
  type PublishFrame,
} from './protocol.js';
