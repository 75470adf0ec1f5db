/**
 * @module effect-socket-rpc/shared
 *
 * Logging shared by the server and the adapters.
 */

export {
  // Types
  type LogCategory,
  type SocketLoggerConfig,
  type SocketLogEvent,
  type SocketLoggerService,
  // Service Tag
  SocketLogger,
  // Configuration
  defaultConfig as defaultLoggerConfig,
  // Layers
  makeSocketLoggerLayer,
  SocketLoggerLive,
  SocketLoggerDev,
  SocketLoggerSilent,
  // Utilities
  redactSensitiveData,
  categoryFromEvent,
  levelFromEvent,
  formatEvent,
  // Convenience functions
  logSocketEvent,
} from "./logging.js"
