/**
 * @module effect-socket-rpc/socket/server/ConnectionHandler
 *
 * Runs one accepted connection from registration to teardown.
 *
 * The receive loop reads frames until the peer closes or the transport fails.
 * Nothing that happens while processing a message ends the loop: decode,
 * dispatch and reply failures are reported to the hooks and the next frame is
 * read. Teardown runs exactly once on every exit path.
 */

import * as Clock from "effect/Clock"
import * as Context from "effect/Context"
import * as DateTime from "effect/DateTime"
import * as Effect from "effect/Effect"
import * as Either from "effect/Either"
import * as Option from "effect/Option"
import * as Ref from "effect/Ref"

import { InvocationError } from "../errors.js"
import type { SocketProtocolError, SocketSendError, SocketTransportError } from "../errors.js"
import { isResponse, makeRequest } from "../protocol.js"
import type { CloseFrame, MessageType, SocketTransport } from "../transport.js"
import type { ConnectionContext, LifecycleState } from "../types.js"
import { LifecycleStateCtor, generateConnectionId } from "../types.js"
import { SocketLogger } from "../../shared/logging.js"
import type { ClientProxy } from "./ClientRegistry.js"
import { ClientRegistry } from "./ClientRegistry.js"
import { makeFrameReassembler } from "./FrameReassembler.js"
import { HeartbeatMonitor } from "./HeartbeatMonitor.js"
import { makeMessageCodec } from "./MessageCodec.js"
import { makeMethodDispatcher } from "./MethodDispatcher.js"
import type { MethodContext } from "./MethodTable.js"
import type { SocketHandler } from "./SocketHandler.js"
import { CurrentConnection } from "./SocketHandler.js"
import type { SocketOptions } from "./SocketOptions.js"
import { defaultSocketOptions } from "./SocketOptions.js"

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Services a connection runs with.
 */
export type ConnectionServices = ClientRegistry | HeartbeatMonitor | SocketLogger

/**
 * @since 0.1.0
 * @category Models
 */
export interface AcceptConnectionOptions {
  /** Owned by the connection from here on */
  readonly transport: SocketTransport
  readonly handler: SocketHandler
  /** Default: {@link defaultSocketOptions} */
  readonly options?: SocketOptions | undefined
  readonly context?: ConnectionContext | undefined
}

/**
 * Close status sent when the registry is full.
 */
export const TRY_AGAIN_LATER = 1013

const NORMAL_CLOSURE = 1000

// ─────────────────────────────────────────────────────────────────────────────
// Accept
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Serve one connection until it ends. Never fails.
 *
 * @example
 * ```ts
 * wss.on("connection", (ws) => {
 *   runtime.runFork(
 *     Effect.flatMap(fromWebSocket(ws, 4096), (transport) =>
 *       acceptConnection({ transport, handler: ChatHandler })),
 *   )
 * })
 * ```
 *
 * @since 0.1.0
 * @category Constructors
 */
export const acceptConnection = (
  accept: AcceptConnectionOptions,
): Effect.Effect<void, never, ConnectionServices> =>
  Effect.gen(function* () {
    const registry = yield* ClientRegistry
    const heartbeat = yield* HeartbeatMonitor
    const logger = yield* SocketLogger

    const { transport, handler } = accept
    const options = accept.options ?? defaultSocketOptions
    const context = accept.context ?? {}
    const codec = makeMessageCodec(options)
    const reassembler = yield* makeFrameReassembler

    const connectionId = yield* generateConnectionId
    const connectedAt = yield* DateTime.now
    const startMillis = yield* Clock.currentTimeMillis

    const state = yield* Ref.make<LifecycleState>(LifecycleStateCtor.Open)
    const tornDown = yield* Ref.make(false)
    const closeReason = yield* Ref.make("interrupted")
    const writeLock = yield* Effect.makeSemaphore(1)

    // ───────────────────────────────────────────────────────────────────────
    // Writes and hooks
    // ───────────────────────────────────────────────────────────────────────

    const write = (type: MessageType, payload: Uint8Array) =>
      writeLock.withPermits(1)(transport.send(type, payload))

    const withConnection = <A, E>(effect: Effect.Effect<A, E, MethodContext | SocketLogger>) =>
      Effect.provide(effect, hookContext)

    const runHook = (
      name: string,
      hook: () => Effect.Effect<void, unknown, MethodContext> | undefined,
    ): Effect.Effect<void> =>
      withConnection(Effect.suspend(() => hook() ?? Effect.void)).pipe(
        Effect.catchAllCause((cause) =>
          Effect.logWarning(`Hook ${name} failed`, { connectionId, cause }),
        ),
      )

    const reportInvokeError = (error: InvocationError) =>
      logger
        .log({ _tag: "InvokeError", connectionId, description: error.description, error: error.cause })
        .pipe(Effect.zipRight(runHook("onInvokeError", () => handler.onInvokeError?.(error))))

    const close = (reason = "") =>
      Effect.gen(function* () {
        yield* Ref.update(state, (current) =>
          current._tag === "Open" ? LifecycleStateCtor.Closing(reason) : current,
        )
        yield* transport.close(NORMAL_CLOSURE, reason)
      })

    const invoke = (method: string, args: ReadonlyArray<unknown>) =>
      Effect.gen(function* () {
        const payload = yield* codec.encode(makeRequest(method, args))
        yield* write("text", payload)
        yield* logger.log({ _tag: "Push", connectionId, method, arguments: args })
      }).pipe(
        Effect.catchAll((error: SocketProtocolError | SocketSendError) => {
          const invocationError = new InvocationError({
            connectionId,
            description: `Failed to send ${method}: ${error.message}`,
            cause: error,
          })
          return reportInvokeError(invocationError).pipe(Effect.zipRight(Effect.fail(invocationError)))
        }),
      )

    const client: ClientProxy = {
      connectionId,
      connectedAt,
      context,
      invoke,
      send: (method, ...args) =>
        invoke(method, args).pipe(Effect.catchTag("InvocationError", () => Effect.void)),
      close,
    }

    const hookContext: Context.Context<MethodContext | SocketLogger> = Context.make(CurrentConnection, {
      connectionId,
      client,
      context,
      options,
      state: Ref.get(state),
    }).pipe(Context.add(ClientRegistry, registry), Context.add(SocketLogger, logger))

    const dispatcher = makeMethodDispatcher({
      methods: handler.methods,
      onInvokeError: reportInvokeError,
    })

    // ───────────────────────────────────────────────────────────────────────
    // Teardown
    // ───────────────────────────────────────────────────────────────────────

    const teardown = (reason: string) =>
      Effect.gen(function* () {
        const alreadyTornDown = yield* Ref.getAndSet(tornDown, true)
        if (alreadyTornDown) return

        yield* Ref.set(state, LifecycleStateCtor.Closed(reason))
        yield* heartbeat.stop(connectionId)
        yield* registry.unregister(connectionId, reason)
        yield* runHook("onDisconnected", () => handler.onDisconnected?.())
        yield* transport.dispose

        const durationMs = (yield* Clock.currentTimeMillis) - startMillis
        yield* logger.log({ _tag: "Disconnect", connectionId, reason, durationMs })
      })

    const onHeartbeatTimeout = (idleMillis: number) =>
      Effect.gen(function* () {
        yield* logger.log({ _tag: "HeartbeatTimeout", connectionId, idleMillis })
        if (yield* transport.isOpen) {
          yield* Ref.set(state, LifecycleStateCtor.Closing("heartbeat timeout"))
          yield* transport.close(NORMAL_CLOSURE, "")
        } else {
          // teardown stops the monitor, which would interrupt this fiber midway
          yield* Effect.forkDaemon(teardown("heartbeat timeout"))
        }
      })

    // ───────────────────────────────────────────────────────────────────────
    // Message processing
    // ───────────────────────────────────────────────────────────────────────

    const reportResolveError = (content: string, error: SocketProtocolError) =>
      logger
        .log({
          _tag: "ResolveError",
          connectionId,
          content,
          description: error.description ?? error.message,
        })
        .pipe(Effect.zipRight(runHook("onResolveError", () => handler.onResolveError?.(content, error))))

    const processText = (payload: Uint8Array) =>
      Effect.gen(function* () {
        const decoded = yield* Effect.either(codec.decodeText(payload))
        if (Either.isLeft(decoded)) {
          return yield* reportResolveError("", decoded.left)
        }

        const content = decoded.right
        yield* runHook("onTextReceived", () => handler.onTextReceived?.(content))

        const resolved = yield* Effect.either(codec.resolve(content))
        if (Either.isLeft(resolved)) {
          return yield* reportResolveError(content, resolved.left)
        }

        const envelope = resolved.right
        if (isResponse(envelope)) {
          yield* Effect.logDebug("Ignoring reply from client", { connectionId, method: envelope.method })
          return
        }

        const reply = yield* withConnection(dispatcher.dispatch(envelope))
        if (Option.isNone(reply)) return

        yield* codec.encode(reply.value).pipe(
          Effect.flatMap((bytes) => write("text", bytes)),
          Effect.catchAll((error) =>
            reportInvokeError(
              new InvocationError({
                connectionId,
                description: `Failed to reply to ${envelope.method}: ${error.message}`,
                cause: error,
              }),
            ),
          ),
        )
      })

    const processMessage = (type: MessageType, payload: Uint8Array) =>
      (type === "binary"
        ? runHook("onBinaryReceived", () => handler.onBinaryReceived?.(payload))
        : processText(payload)
      ).pipe(
        Effect.catchAllCause((cause) =>
          Effect.logError("Message processing failed", { connectionId, cause }),
        ),
      )

    const receiveLoop: Effect.Effect<CloseFrame, SocketTransportError> = Effect.gen(function* () {
      while (true) {
        const frame = yield* transport.receive
        if (frame.type === "close") {
          return frame
        }
        yield* reassembler.append(frame.payload, frame.endOfMessage)
        if (!frame.endOfMessage) continue

        const payload = yield* reassembler.extract
        yield* heartbeat.touch(connectionId)
        yield* processMessage(frame.type, payload)
      }
    })

    // ───────────────────────────────────────────────────────────────────────
    // Lifecycle
    // ───────────────────────────────────────────────────────────────────────

    const admitted = yield* registry.register(client).pipe(
      Effect.as(true),
      Effect.catchTag("ConnectionLimitExceededError", (error) =>
        Effect.gen(function* () {
          yield* Effect.logWarning(error.message, { connectionId })
          yield* transport.close(TRY_AGAIN_LATER, "Connection limit exceeded")
          yield* transport.dispose
          return false
        }),
      ),
    )
    if (!admitted) return

    yield* Effect.gen(function* () {
      yield* logger.log(
        context.remoteAddress !== undefined
          ? { _tag: "Connect", connectionId, remoteAddress: context.remoteAddress }
          : { _tag: "Connect", connectionId },
      )
      yield* heartbeat.start(
        connectionId,
        { interval: options.heartbeatInterval, tryTimes: options.heartbeatTryTimes },
        onHeartbeatTimeout,
      )
      yield* runHook("onConnected", () => handler.onConnected?.())

      const exit = yield* Effect.either(receiveLoop)

      if (Either.isLeft(exit)) {
        yield* Effect.logDebug("Receive loop ended", { connectionId, error: exit.left.message })
        yield* Ref.set(closeReason, exit.left.message)
        return
      }

      const closeFrame = exit.right
      if (Option.isSome(closeFrame.status)) {
        yield* transport.close(closeFrame.status.value, closeFrame.description)
      }
      yield* Ref.set(
        closeReason,
        Option.match(closeFrame.status, {
          onNone: () => "closed by peer",
          onSome: (status) => `closed by peer (${status})`,
        }),
      )
    }).pipe(Effect.ensuring(Effect.flatMap(Ref.get(closeReason), teardown)))
  })
