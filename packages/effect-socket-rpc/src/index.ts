/**
 * @module effect-socket-rpc
 *
 * Per-connection RPC over a frame socket, on Effect.
 *
 * @example
 * ```ts
 * import { MethodTable, defineSocketHandler, CurrentConnection, ClientRegistry } from 'effect-socket-rpc'
 * import * as Schema from 'effect/Schema'
 *
 * const methods = MethodTable.empty
 *   .method('Echo', { parameters: Schema.Tuple(Schema.String), returns: Schema.String }, (text) =>
 *     Effect.succeed(text))
 *   .method('Join', { parameters: Schema.Tuple(Schema.String) }, (room) =>
 *     Effect.gen(function* () {
 *       const { connectionId } = yield* CurrentConnection
 *       const registry = yield* ClientRegistry
 *       yield* registry.addToGroup(connectionId, room)
 *     }))
 *
 * export const ChatHandler = defineSocketHandler({
 *   methods,
 *   onConnected: () => Effect.logInfo('hello'),
 * })
 * ```
 */

// ─────────────────────────────────────────────────────────────────────────────
// Wire protocol, transport and errors
// ─────────────────────────────────────────────────────────────────────────────

export * from "./socket/errors.js"
export * from "./socket/protocol.js"
export * from "./socket/transport.js"
export * from "./socket/types.js"

// ─────────────────────────────────────────────────────────────────────────────
// Server
// ─────────────────────────────────────────────────────────────────────────────

export * from "./socket/server/index.js"

// ─────────────────────────────────────────────────────────────────────────────
// Logging
// ─────────────────────────────────────────────────────────────────────────────

export * from "./shared/index.js"
