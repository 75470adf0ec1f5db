/**
 * @module effect-socket-rpc/socket/transport
 *
 * Frame-level view of a bidirectional socket.
 *
 * The connection handler only ever talks to a {@link SocketTransport}; the
 * Node adapter wraps a `ws` socket in one, and {@link makeMemoryTransport}
 * provides an in-process pair for tests and embedding.
 */

import * as Effect from "effect/Effect"
import * as Either from "effect/Either"
import * as Option from "effect/Option"
import * as Queue from "effect/Queue"
import * as Ref from "effect/Ref"

import { SocketSendError, SocketTransportError } from "./errors.js"

// ─────────────────────────────────────────────────────────────────────────────
// Frames
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Kind of a data-carrying frame.
 */
export type MessageType = "text" | "binary"

/**
 * One transport-level chunk of a message.
 */
export interface DataFrame {
  readonly type: MessageType
  readonly payload: Uint8Array
  /** Set on the last frame of a logical message */
  readonly endOfMessage: boolean
}

/**
 * Peer-initiated close.
 */
export interface CloseFrame {
  readonly type: "close"
  readonly status: Option.Option<number>
  readonly description: string
}

export type Frame = DataFrame | CloseFrame

/**
 * Frame constructors.
 */
export const Frame = {
  text: (payload: Uint8Array, endOfMessage = true): DataFrame => ({ type: "text", payload, endOfMessage }),
  binary: (payload: Uint8Array, endOfMessage = true): DataFrame => ({ type: "binary", payload, endOfMessage }),
  close: (status?: number, description = ""): CloseFrame => ({
    type: "close",
    status: Option.fromNullable(status),
    description,
  }),
} as const

// ─────────────────────────────────────────────────────────────────────────────
// Transport
// ─────────────────────────────────────────────────────────────────────────────

/**
 * The socket as seen by one connection. Owned exclusively by that connection.
 */
export interface SocketTransport {
  /**
   * Wait for the next frame.
   * Fails once the socket errors or is disposed.
   */
  readonly receive: Effect.Effect<Frame, SocketTransportError>

  /**
   * Write one complete frame.
   */
  readonly send: (type: MessageType, payload: Uint8Array) => Effect.Effect<void, SocketSendError>

  /**
   * Start (or answer) the close handshake.
   */
  readonly close: (status: number, description: string) => Effect.Effect<void>

  /**
   * Whether the socket still reports itself open.
   */
  readonly isOpen: Effect.Effect<boolean>

  /**
   * Release the socket. A pending or later `receive` fails with `Disposed`.
   * Safe to call more than once.
   */
  readonly dispose: Effect.Effect<void>
}

// ─────────────────────────────────────────────────────────────────────────────
// In-memory Transport
// ─────────────────────────────────────────────────────────────────────────────

/**
 * A frame written by the server side of a memory transport.
 */
export type SentFrame =
  | { readonly type: MessageType; readonly payload: Uint8Array }
  | { readonly type: "close"; readonly status: number; readonly description: string }

/**
 * Memory transport plus the peer-side controls.
 */
export interface MemoryTransport {
  readonly transport: SocketTransport
  /** Deliver a frame as if the peer had sent it */
  readonly deliver: (frame: Frame) => Effect.Effect<void>
  /** Make the next `receive` fail as if the socket broke */
  readonly fail: (description: string) => Effect.Effect<void>
  /** Frames the server side wrote, in order */
  readonly sent: Queue.Dequeue<SentFrame>
  /** Make subsequent `send` calls fail */
  readonly breakWrites: Effect.Effect<void>
  readonly disposed: Effect.Effect<boolean>
}

type Inbound = Either.Either<Frame, SocketTransportError>

/**
 * Create an in-process transport.
 *
 * @example
 * ```ts
 * const memory = yield* makeMemoryTransport
 * yield* memory.deliver(Frame.text(new TextEncoder().encode('{"method":"ping"}')))
 * const reply = yield* Queue.take(memory.sent)
 * ```
 */
export const makeMemoryTransport: Effect.Effect<MemoryTransport> = Effect.gen(function* () {
  const inbound = yield* Queue.unbounded<Inbound>()
  const sent = yield* Queue.unbounded<SentFrame>()
  const open = yield* Ref.make(true)
  const writesBroken = yield* Ref.make(false)
  const disposedRef = yield* Ref.make(false)

  const transport: SocketTransport = {
    receive: Queue.take(inbound).pipe(Effect.flatMap(Either.match({
      onLeft: (error) => Effect.fail(error),
      onRight: (frame) => Effect.succeed(frame),
    }))),

    send: (type, payload) =>
      Effect.gen(function* () {
        if (yield* Ref.get(writesBroken)) {
          return yield* new SocketSendError({ reason: "SendFailed", description: "write failed" })
        }
        if (!(yield* Ref.get(open))) {
          return yield* new SocketSendError({ reason: "NotOpen" })
        }
        yield* Queue.offer(sent, { type, payload })
      }),

    close: (status, description) =>
      Effect.gen(function* () {
        const wasOpen = yield* Ref.getAndSet(open, false)
        if (wasOpen) {
          yield* Queue.offer(sent, { type: "close", status, description })
        }
      }),

    isOpen: Ref.get(open),

    dispose: Effect.gen(function* () {
      const wasDisposed = yield* Ref.getAndSet(disposedRef, true)
      if (wasDisposed) return
      yield* Ref.set(open, false)
      yield* Queue.offer(inbound, Either.left(new SocketTransportError({ reason: "Disposed" })))
    }),
  }

  return {
    transport,
    deliver: (frame) => Queue.offer(inbound, Either.right(frame)).pipe(Effect.asVoid),
    fail: (description) =>
      Queue.offer(
        inbound,
        Either.left(new SocketTransportError({ reason: "ReadFailed", description })),
      ).pipe(Effect.asVoid),
    sent,
    breakWrites: Ref.set(writesBroken, true),
    disposed: Ref.get(disposedRef),
  }
})
