/**
 * @module effect-socket-rpc/tests/test-utils/mock-websocket
 *
 * Server-side `ws` socket mock. Implements the slice of the `ws` API the Node
 * adapter uses, plus helpers that simulate what the peer does.
 */

import { EventEmitter } from "node:events"

export interface SentMessage {
  readonly data: Uint8Array
  readonly binary: boolean
}

export interface CloseCall {
  readonly code: number | undefined
  readonly reason: string | undefined
}

/**
 * Mock of a `ws` server-side socket.
 */
export class MockNodeWebSocket extends EventEmitter {
  static readonly CONNECTING = 0 as const
  static readonly OPEN = 1 as const
  static readonly CLOSING = 2 as const
  static readonly CLOSED = 3 as const

  readonly CONNECTING = 0 as const
  readonly OPEN = 1 as const
  readonly CLOSING = 2 as const
  readonly CLOSED = 3 as const

  readyState: number = MockNodeWebSocket.OPEN

  // Track calls for test assertions
  readonly sent: Array<SentMessage> = []
  readonly closeCalls: Array<CloseCall> = []
  terminated = false

  /** Error the next `send` completes with */
  failNextSend: Error | undefined = undefined

  send(data: Uint8Array, options: { readonly binary: boolean }, callback: (err?: Error) => void): void {
    const error = this.failNextSend
    this.failNextSend = undefined
    if (error === undefined) {
      this.sent.push({ data: new Uint8Array(data), binary: options.binary })
    }
    // ws reports completion asynchronously
    queueMicrotask(() => callback(error))
  }

  close(code?: number, reason?: string): void {
    this.closeCalls.push({ code, reason })
    if (this.readyState === MockNodeWebSocket.OPEN) {
      this.readyState = MockNodeWebSocket.CLOSING
    }
  }

  terminate(): void {
    this.terminated = true
    this.readyState = MockNodeWebSocket.CLOSED
  }

  /** Whether inbound delivery is paused */
  isPaused = false

  pause(): void {
    this.isPaused = true
  }

  resume(): void {
    this.isPaused = false
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Peer simulation
  // ───────────────────────────────────────────────────────────────────────────

  receiveText(text: string): void {
    this.emit("message", Buffer.from(text, "utf8"), false)
  }

  receiveBinary(bytes: Uint8Array): void {
    this.emit("message", Buffer.from(bytes), true)
  }

  receiveClose(code: number, reason = ""): void {
    this.readyState = MockNodeWebSocket.CLOSED
    this.emit("close", code, Buffer.from(reason, "utf8"))
  }

  receiveError(error: Error): void {
    this.emit("error", error)
  }

  /** Sent text frames, decoded */
  get sentText(): Array<string> {
    return this.sent.filter((message) => !message.binary).map((message) => Buffer.from(message.data).toString("utf8"))
  }
}
