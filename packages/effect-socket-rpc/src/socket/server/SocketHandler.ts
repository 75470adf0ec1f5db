/**
 * @module effect-socket-rpc/socket/server/SocketHandler
 *
 * What an application supplies to serve connections: a method table and the
 * lifecycle hooks, plus the {@link CurrentConnection} service both run under.
 */

import * as Context from "effect/Context"
import type * as Effect from "effect/Effect"

import type { InvocationError, SocketProtocolError } from "../errors.js"
import type { ConnectionContext, ConnectionId, LifecycleState } from "../types.js"
import type { ClientProxy } from "./ClientRegistry.js"
import type { MethodContext } from "./MethodTable.js"
import { MethodTable } from "./MethodTable.js"
import type { SocketOptions } from "./SocketOptions.js"

// ─────────────────────────────────────────────────────────────────────────────
// Current Connection
// ─────────────────────────────────────────────────────────────────────────────

/**
 * The connection a method or hook is running for.
 *
 * @since 0.1.0
 * @category Models
 */
export interface CurrentConnectionShape {
  readonly connectionId: ConnectionId
  readonly client: ClientProxy
  readonly context: ConnectionContext
  readonly options: SocketOptions
  readonly state: Effect.Effect<LifecycleState>
}

/**
 * Context tag for the connection being served.
 *
 * @example
 * ```ts
 * const whoAmI = Effect.map(CurrentConnection, (conn) => conn.connectionId)
 * ```
 *
 * @since 0.1.0
 * @category Tags
 */
export class CurrentConnection extends Context.Tag("@effect-socket-rpc/CurrentConnection")<
  CurrentConnection,
  CurrentConnectionShape
>() {}

// ─────────────────────────────────────────────────────────────────────────────
// Hooks
// ─────────────────────────────────────────────────────────────────────────────

/**
 * A hook body. Failures are logged and never reach the receive loop.
 */
export type Hook<Args extends ReadonlyArray<unknown>> = (
  ...args: Args
) => Effect.Effect<void, unknown, MethodContext>

/**
 * Lifecycle notifications. All optional.
 *
 * @since 0.1.0
 * @category Models
 */
export interface SocketHandlerHooks {
  /** The connection was accepted and registered */
  readonly onConnected?: Hook<[]>
  /** The connection is gone. Fires exactly once per accepted connection */
  readonly onDisconnected?: Hook<[]>
  /** A complete text message arrived, before it is resolved */
  readonly onTextReceived?: Hook<[content: string]>
  /** A complete binary message arrived. Binary messages are not dispatched */
  readonly onBinaryReceived?: Hook<[bytes: Uint8Array]>
  /** A text message could not be resolved into an envelope and was dropped */
  readonly onResolveError?: Hook<[content: string, error: SocketProtocolError]>
  /** A call failed, inbound or outbound */
  readonly onInvokeError?: Hook<[error: InvocationError]>
}

/**
 * A complete handler definition.
 *
 * @since 0.1.0
 * @category Models
 */
export interface SocketHandler extends SocketHandlerHooks {
  readonly methods: MethodTable
}

/**
 * Define a socket handler.
 *
 * @example
 * ```ts
 * const ChatHandler = defineSocketHandler({
 *   methods: MethodTable.empty
 *     .method("Join", { parameters: Schema.Tuple(Schema.String) }, (room) =>
 *       Effect.gen(function* () {
 *         const conn = yield* CurrentConnection
 *         const registry = yield* ClientRegistry
 *         yield* registry.addToGroup(conn.connectionId, room)
 *       })),
 *   onDisconnected: () => Effect.logInfo("bye"),
 * })
 * ```
 *
 * @since 0.1.0
 * @category Constructors
 */
export const defineSocketHandler = (
  definition: Partial<SocketHandler>,
): SocketHandler => ({
  ...definition,
  methods: definition.methods ?? MethodTable.empty,
})
