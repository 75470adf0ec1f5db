/**
 * @module effect-socket-rpc/node/ws
 *
 * Node.js adapter over the `ws` package.
 *
 * @example
 * ```ts
 * import { createSocketServer } from "effect-socket-rpc/node"
 * import { WebSocketServer } from "ws"
 * import { ChatHandler } from "./chat"
 *
 * const server = createSocketServer({
 *   handler: ChatHandler,
 *   options: { heartbeatInterval: "10 seconds" },
 * })
 *
 * const wss = new WebSocketServer({ port: 3001 })
 *
 * wss.on("connection", (ws, request) => {
 *   Effect.runFork(server.handleConnection(ws, request))
 * })
 *
 * // Cleanup on shutdown
 * process.on("SIGINT", async () => {
 *   await server.dispose()
 *   wss.close()
 * })
 * ```
 */

import type { IncomingMessage } from "node:http"

import * as Effect from "effect/Effect"
import * as Either from "effect/Either"
import type * as Fiber from "effect/Fiber"
import * as Layer from "effect/Layer"
import * as ManagedRuntime from "effect/ManagedRuntime"
import * as Queue from "effect/Queue"
import * as Ref from "effect/Ref"
import type WebSocket from "ws"

import { SocketSendError, SocketTransportError } from "../socket/errors.js"
import type { ConnectionNotFoundError, InvocationError } from "../socket/errors.js"
import type { DataFrame, Frame, MessageType, SocketTransport } from "../socket/transport.js"
import { Frame as FrameCtor } from "../socket/transport.js"
import type { ConnectionContext, ConnectionId } from "../socket/types.js"
import type { BroadcastResult } from "../socket/server/ClientRegistry.js"
import { ClientRegistry } from "../socket/server/ClientRegistry.js"
import { acceptConnection } from "../socket/server/ConnectionHandler.js"
import { HeartbeatMonitor } from "../socket/server/HeartbeatMonitor.js"
import type { SocketHandler } from "../socket/server/SocketHandler.js"
import type { SocketOptionsInput } from "../socket/server/SocketOptions.js"
import { resolveSocketOptions } from "../socket/server/SocketOptions.js"
import type { SocketLogger } from "../shared/logging.js"
import { SocketLoggerLive } from "../shared/logging.js"
import { makeServerRuntimeState } from "./runtime-state.js"

// ─────────────────────────────────────────────────────────────────────────────
// WebSocket Types
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Minimal WebSocket interface compatible with the `ws` package.
 */
export interface WebSocketLike {
  readonly readyState: number
  readonly OPEN: number
  readonly CLOSED: number
  send(data: Uint8Array, options: { readonly binary: boolean }, callback: (err?: Error) => void): void
  close(code?: number, reason?: string): void
  terminate(): void
  pause(): void
  resume(): void
  on(event: "message", listener: (data: WebSocket.RawData, isBinary: boolean) => void): unknown
  on(event: "close", listener: (code: number, reason: Buffer) => void): unknown
  on(event: "error", listener: (error: Error) => void): unknown
  off(event: "message", listener: (data: WebSocket.RawData, isBinary: boolean) => void): unknown
  off(event: "close", listener: (code: number, reason: Buffer) => void): unknown
  off(event: "error", listener: (error: Error) => void): unknown
}

/**
 * Inbound flow control, counted in frames waiting for the receive loop.
 * The socket is paused at `highWaterMark` and resumed once the backlog
 * drains to `lowWaterMark`.
 */
export interface FlowControl {
  readonly highWaterMark: number
  readonly lowWaterMark: number
}

export const defaultFlowControl: FlowControl = {
  highWaterMark: 256,
  lowWaterMark: 64,
}

/**
 * Close status `ws` reports when the peer's close frame had no status.
 */
const NO_STATUS_RECEIVED = 1005

const toBytes = (data: WebSocket.RawData): Uint8Array => {
  if (Array.isArray(data)) {
    return Buffer.concat(data)
  }
  if (data instanceof ArrayBuffer) {
    return new Uint8Array(data)
  }
  return data
}

/**
 * Split one `ws` message into frames of at most `receiveBufferSize` bytes.
 * Only the last frame is marked end-of-message.
 */
export const splitIntoFrames = (
  type: MessageType,
  bytes: Uint8Array,
  receiveBufferSize: number,
): ReadonlyArray<DataFrame> => {
  if (bytes.byteLength <= receiveBufferSize) {
    return [{ type, payload: bytes, endOfMessage: true }]
  }
  const frames: Array<DataFrame> = []
  for (let offset = 0; offset < bytes.byteLength; offset += receiveBufferSize) {
    const end = Math.min(offset + receiveBufferSize, bytes.byteLength)
    frames.push({ type, payload: bytes.subarray(offset, end), endOfMessage: end === bytes.byteLength })
  }
  return frames
}

// ─────────────────────────────────────────────────────────────────────────────
// Transport
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Wrap a `ws` socket in a {@link SocketTransport}. Listeners are attached
 * immediately, so messages that arrive before the receive loop starts are
 * queued rather than lost. A backlog past `flow.highWaterMark` pauses the
 * socket until the receive loop catches up.
 */
export const fromWebSocket = (
  ws: WebSocketLike,
  receiveBufferSize: number,
  flow: FlowControl = defaultFlowControl,
): Effect.Effect<SocketTransport> =>
  Effect.gen(function* () {
    const inbound = yield* Queue.unbounded<Either.Either<Frame, SocketTransportError>>()
    const disposed = yield* Ref.make(false)

    // Touched only from ws callbacks and the receive loop's taps
    let backlog = 0
    let paused = false

    const enqueue = (item: Either.Either<Frame, SocketTransportError>) => {
      Queue.unsafeOffer(inbound, item)
      backlog++
      if (!paused && backlog >= flow.highWaterMark) {
        paused = true
        ws.pause()
      }
    }

    const dequeued = Effect.sync(() => {
      backlog--
      if (paused && backlog <= flow.lowWaterMark) {
        paused = false
        ws.resume()
      }
    })

    const handleMessage = (data: WebSocket.RawData, isBinary: boolean) => {
      for (const frame of splitIntoFrames(isBinary ? "binary" : "text", toBytes(data), receiveBufferSize)) {
        enqueue(Either.right(frame))
      }
    }

    const handleClose = (code: number, reason: Buffer) => {
      enqueue(Either.right(FrameCtor.close(code === NO_STATUS_RECEIVED ? undefined : code, reason.toString("utf8"))))
    }

    const handleError = (error: Error) => {
      enqueue(Either.left(new SocketTransportError({ reason: "ReadFailed", description: error.message, cause: error })))
    }

    ws.on("message", handleMessage)
    ws.on("close", handleClose)
    ws.on("error", handleError)

    const transport: SocketTransport = {
      receive: Queue.take(inbound).pipe(
        Effect.tap(() => dequeued),
        Effect.flatMap(
          Either.match({
            onLeft: (error) => Effect.fail(error),
            onRight: (frame) => Effect.succeed(frame),
          }),
        ),
      ),

      send: (type, payload) =>
        Effect.async<void, SocketSendError>((resume) => {
          if (ws.readyState !== ws.OPEN) {
            resume(Effect.fail(new SocketSendError({ reason: "NotOpen" })))
            return
          }
          ws.send(payload, { binary: type === "binary" }, (err) => {
            resume(
              err
                ? Effect.fail(new SocketSendError({ reason: "SendFailed", description: err.message, cause: err }))
                : Effect.void,
            )
          })
        }),

      close: (status, description) =>
        Effect.try(() => {
          if (ws.readyState === ws.OPEN) {
            ws.close(status, description)
          }
        }).pipe(
          Effect.catchAll((error) =>
            Effect.logDebug("WebSocket close failed", { status, error: error.message }),
          ),
        ),

      isOpen: Effect.sync(() => ws.readyState === ws.OPEN),

      dispose: Effect.gen(function* () {
        const wasDisposed = yield* Ref.getAndSet(disposed, true)
        if (wasDisposed) return

        ws.off("message", handleMessage)
        ws.off("close", handleClose)
        ws.off("error", handleError)
        if (ws.readyState !== ws.CLOSED) {
          ws.terminate()
        }
        yield* Effect.sync(() => enqueue(Either.left(new SocketTransportError({ reason: "Disposed" }))))
      }),
    }

    return transport
  })

// ─────────────────────────────────────────────────────────────────────────────
// Server
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Options for creating a socket server.
 */
export interface CreateSocketServerOptions {
  readonly handler: SocketHandler

  /**
   * Per-connection options. Validated once, when the server is created.
   */
  readonly options?: SocketOptionsInput

  /**
   * 0 means unlimited.
   * @default 10000
   */
  readonly maxConnections?: number

  /**
   * @default defaultFlowControl
   */
  readonly flowControl?: FlowControl

  /**
   * @default SocketLoggerLive
   */
  readonly logger?: Layer.Layer<SocketLogger>

  /**
   * Replace the heartbeat monitor, e.g. with `HeartbeatMonitor.Disabled`.
   * @default HeartbeatMonitor.Live
   */
  readonly heartbeat?: Layer.Layer<HeartbeatMonitor>
}

/**
 * Socket server for Node.js.
 */
export interface SocketServer {
  /**
   * Serve a `ws` connection. Returns once the connection's fiber is forked.
   */
  readonly handleConnection: (ws: WebSocketLike, request?: IncomingMessage) => Effect.Effect<void>

  /**
   * Call a method on one client.
   */
  readonly sendToClient: (
    connectionId: ConnectionId,
    method: string,
    ...args: ReadonlyArray<unknown>
  ) => Effect.Effect<void, ConnectionNotFoundError | InvocationError>

  /**
   * Call a method on every member of a group.
   */
  readonly sendToGroup: (
    group: string,
    method: string,
    ...args: ReadonlyArray<unknown>
  ) => Effect.Effect<BroadcastResult>

  /**
   * Call a method on every connected client.
   */
  readonly broadcast: (method: string, ...args: ReadonlyArray<unknown>) => Effect.Effect<BroadcastResult>

  readonly connectionCount: Effect.Effect<number>

  /**
   * Close every connection and release the server's runtime.
   */
  readonly dispose: () => Promise<void>
}

const contextFromRequest = (request: IncomingMessage | undefined): ConnectionContext =>
  request === undefined
    ? {}
    : {
        remoteAddress: request.socket.remoteAddress,
        url: request.url,
        headers: request.headers,
      }

/**
 * Create a socket server.
 *
 * @throws SocketConfigError when `options` fail validation
 */
export function createSocketServer(options: CreateSocketServerOptions): SocketServer {
  const { handler, maxConnections } = options

  const resolved = Effect.runSync(Effect.either(resolveSocketOptions(options.options)))
  if (Either.isLeft(resolved)) {
    throw resolved.left
  }
  const socketOptions = resolved.right

  const managedRuntime = ManagedRuntime.make(
    Layer.mergeAll(
      maxConnections !== undefined ? ClientRegistry.layer({ maxConnections }) : ClientRegistry.Live,
      options.heartbeat ?? HeartbeatMonitor.Live,
      options.logger ?? SocketLoggerLive,
    ),
  )

  const runtimeState = Effect.runSync(makeServerRuntimeState)

  const attachTrackedFiber = <A, E>(fiber: Fiber.RuntimeFiber<A, E>) => {
    Effect.runSync(runtimeState.trackFiber(fiber))
    fiber.addObserver(() => {
      Effect.runSync(runtimeState.untrackFiber(fiber))
    })
  }

  const runInServer = <A, E>(effect: Effect.Effect<A, E, ClientRegistry>): Effect.Effect<A, E> =>
    Effect.flatten(Effect.promise(() => managedRuntime.runPromiseExit(effect)))

  const handleConnection = (ws: WebSocketLike, request?: IncomingMessage): Effect.Effect<void> =>
    Effect.sync(() => {
      const admission = Effect.runSync(runtimeState.connectionAdmission)
      if (admission._tag !== "Accept") {
        ws.close(1001, "Server shutting down")
        return
      }

      const transport = Effect.runSync(fromWebSocket(ws, socketOptions.receiveBufferSize, options.flowControl))
      const fiber = managedRuntime.runFork(
        acceptConnection({
          transport,
          handler,
          options: socketOptions,
          context: contextFromRequest(request),
        }),
      )
      attachTrackedFiber(fiber)
    })

  return {
    handleConnection,

    sendToClient: (connectionId, method, ...args) =>
      runInServer(Effect.flatMap(ClientRegistry, (registry) => registry.sendTo(connectionId, method, args))),

    sendToGroup: (group, method, ...args) =>
      runInServer(Effect.flatMap(ClientRegistry, (registry) => registry.sendToGroup(group, method, args))),

    broadcast: (method, ...args) =>
      runInServer(Effect.flatMap(ClientRegistry, (registry) => registry.broadcast(method, args))),

    connectionCount: runInServer(Effect.flatMap(ClientRegistry, (registry) => registry.count)),

    dispose: () =>
      Effect.runPromise(
        Effect.gen(function* () {
          yield* runtimeState.markDisposing
          yield* runInServer(Effect.flatMap(ClientRegistry, (registry) => registry.cleanupAll))
          yield* runtimeState.interruptTrackedFibers
          yield* Effect.tryPromise(() => managedRuntime.dispose()).pipe(
            Effect.catchAllCause((cause) => Effect.logWarning("Socket server runtime disposal failed", cause)),
          )
          yield* runtimeState.markDisposed
        }),
      ),
  }
}
