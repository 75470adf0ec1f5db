/**
 * @module effect-socket-rpc/socket/server/FrameReassembler
 *
 * Accumulates frame payloads until the transport marks end-of-message.
 * Performs no content-based framing.
 */

import * as Chunk from "effect/Chunk"
import * as Effect from "effect/Effect"
import * as Ref from "effect/Ref"

export interface FrameReassembler {
  /**
   * Append one frame's payload. `endOfMessage` comes from the frame itself.
   */
  readonly append: (chunk: Uint8Array, endOfMessage: boolean) => Effect.Effect<void>

  /**
   * True once the last appended frame was marked end-of-message.
   */
  readonly isComplete: Effect.Effect<boolean>

  /**
   * Return the accumulated bytes and reset to empty.
   */
  readonly extract: Effect.Effect<Uint8Array>

  /**
   * Bytes currently buffered.
   */
  readonly size: Effect.Effect<number>
}

interface PendingBuffer {
  readonly chunks: Chunk.Chunk<Uint8Array>
  readonly length: number
  readonly complete: boolean
}

const empty: PendingBuffer = { chunks: Chunk.empty(), length: 0, complete: false }

const concat = (buffer: PendingBuffer): Uint8Array => {
  const out = new Uint8Array(buffer.length)
  let offset = 0
  for (const chunk of buffer.chunks) {
    out.set(chunk, offset)
    offset += chunk.byteLength
  }
  return out
}

/**
 * Create a reassembler for one connection.
 */
export const makeFrameReassembler: Effect.Effect<FrameReassembler> = Effect.gen(function* () {
  const pending = yield* Ref.make<PendingBuffer>(empty)

  return {
    append: (chunk, endOfMessage) =>
      Ref.update(pending, (buffer) => ({
        // frames arrive in buffer-sized reads; copy so the caller may reuse its buffer
        chunks: Chunk.append(buffer.chunks, chunk.slice()),
        length: buffer.length + chunk.byteLength,
        complete: endOfMessage,
      })),

    isComplete: Ref.get(pending).pipe(Effect.map((buffer) => buffer.complete)),

    extract: Ref.getAndSet(pending, empty).pipe(Effect.map(concat)),

    size: Ref.get(pending).pipe(Effect.map((buffer) => buffer.length)),
  }
})
