/**
 * @chessduel/engine-client - UCI client for external chess engines
 *
 * This package provides:
 * - A line transport over a spawned engine process
 * - A UCI client (handshake, position, fixed-time search, shutdown)
 */

export const VERSION = '0.1.0';

export {
  UciEngineClient,
  DEFAULT_ENGINE_CONFIG,
  type EngineClientConfig,
} from './uci-client.js';

export {
  spawnEngineTransport,
  type EngineTransport,
  type TransportFactory,
  type LineListener,
  type ExitListener,
} from './transport.js';

export {
  EngineClientError,
  EngineStartError,
  EngineTimeoutError,
  EngineProtocolError,
  EngineClosedError,
} from './errors.js';
