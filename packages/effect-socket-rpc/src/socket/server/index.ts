/**
 * @module effect-socket-rpc/socket/server
 *
 * Server-side services for socket RPC connections.
 *
 * @example
 * ```ts
 * import {
 *   ClientRegistry, HeartbeatMonitor,
 *   MethodTable, defineSocketHandler, acceptConnection,
 * } from 'effect-socket-rpc/socket/server'
 * import { SocketLoggerLive } from 'effect-socket-rpc/shared'
 *
 * const ServerLive = Layer.mergeAll(
 *   ClientRegistry.layer({ maxConnections: 5000 }),
 *   HeartbeatMonitor.Live,
 *   SocketLoggerLive,
 * )
 * ```
 */

// ─────────────────────────────────────────────────────────────────────────────
// Codec
// ─────────────────────────────────────────────────────────────────────────────

export type { TextEncoding } from "./TextEncoding.js"
export { Utf8, fromBufferEncoding, encodingByName } from "./TextEncoding.js"

export type { MessageFormatter } from "./MessageFormatter.js"
export { JsonFormatter, makeMessageFormatter } from "./MessageFormatter.js"

export type { MessageCodec, MessageCodecOptions } from "./MessageCodec.js"
export { makeMessageCodec, defaultMessageCodec } from "./MessageCodec.js"

// ─────────────────────────────────────────────────────────────────────────────
// Framing
// ─────────────────────────────────────────────────────────────────────────────

export type { FrameReassembler } from "./FrameReassembler.js"
export { makeFrameReassembler } from "./FrameReassembler.js"

// ─────────────────────────────────────────────────────────────────────────────
// Options
// ─────────────────────────────────────────────────────────────────────────────

export type { SocketOptions, SocketOptionsInput } from "./SocketOptions.js"
export {
  defaultSocketOptions,
  resolveSocketOptions,
  idleTolerance,
  socketOptionsConfig,
} from "./SocketOptions.js"

// ─────────────────────────────────────────────────────────────────────────────
// HeartbeatMonitor
// ─────────────────────────────────────────────────────────────────────────────

export type { HeartbeatMonitorShape, HeartbeatSettings } from "./HeartbeatMonitor.js"
export { HeartbeatMonitor, makeHeartbeatMonitorLayer } from "./HeartbeatMonitor.js"

// ─────────────────────────────────────────────────────────────────────────────
// Methods
// ─────────────────────────────────────────────────────────────────────────────

export type { Arity, MethodContext, MethodDefinition, RegisteredMethod } from "./MethodTable.js"
export { MethodTable } from "./MethodTable.js"

export type { DispatchContext, MethodDispatcher, MethodDispatcherOptions } from "./MethodDispatcher.js"
export { makeMethodDispatcher } from "./MethodDispatcher.js"

// ─────────────────────────────────────────────────────────────────────────────
// ClientRegistry
// ─────────────────────────────────────────────────────────────────────────────

export type {
  BroadcastResult,
  ClientEvent,
  ClientProxy,
  ClientRegistryConfig,
} from "./ClientRegistry.js"
export {
  ClientRegistry,
  ClientRegistryLive,
  defaultClientRegistryConfig,
} from "./ClientRegistry.js"

// ─────────────────────────────────────────────────────────────────────────────
// Handler
// ─────────────────────────────────────────────────────────────────────────────

export type {
  CurrentConnectionShape,
  Hook,
  SocketHandlerHooks,
} from "./SocketHandler.js"
export { CurrentConnection, defineSocketHandler } from "./SocketHandler.js"
export type { SocketHandler } from "./SocketHandler.js"

export type { AcceptConnectionOptions, ConnectionServices } from "./ConnectionHandler.js"
export { acceptConnection, TRY_AGAIN_LATER } from "./ConnectionHandler.js"
