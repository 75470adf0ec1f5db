/**
 * @module effect-socket-rpc/socket/server/MessageCodec
 *
 * Encodes/decodes envelopes to and from frame bytes using the connection's
 * text encoding and message formatter.
 */

import * as Effect from "effect/Effect"

import type { InvocationEnvelope } from "../protocol.js"
import { SocketProtocolError } from "../errors.js"
import type { MessageFormatter } from "./MessageFormatter.js"
import { JsonFormatter } from "./MessageFormatter.js"
import type { TextEncoding } from "./TextEncoding.js"
import { Utf8 } from "./TextEncoding.js"

// ─────────────────────────────────────────────────────────────────────────────
// Interface
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Codec bound to one encoding and one formatter.
 */
export interface MessageCodec {
  /**
   * Decode frame bytes into text.
   */
  readonly decodeText: (bytes: Uint8Array) => Effect.Effect<string, SocketProtocolError>

  /**
   * Resolve text into an envelope.
   */
  readonly resolve: (content: string) => Effect.Effect<InvocationEnvelope, SocketProtocolError>

  /**
   * Decode frame bytes straight into an envelope.
   */
  readonly decode: (bytes: Uint8Array) => Effect.Effect<InvocationEnvelope, SocketProtocolError>

  /**
   * Encode an envelope into frame bytes.
   */
  readonly encode: (envelope: InvocationEnvelope) => Effect.Effect<Uint8Array, SocketProtocolError>
}

export interface MessageCodecOptions {
  readonly encoding: TextEncoding
  readonly formatter: MessageFormatter
}

// ─────────────────────────────────────────────────────────────────────────────
// Implementation
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Create a codec.
 *
 * @example
 * ```ts
 * const codec = makeMessageCodec({ encoding: Utf8, formatter: JsonFormatter })
 * const bytes = yield* codec.encode(makeResponse("Echo", "hi"))
 * ```
 */
export const makeMessageCodec = (options: MessageCodecOptions): MessageCodec => {
  const { encoding, formatter } = options

  const decodeText = (bytes: Uint8Array) =>
    Effect.try({
      try: () => encoding.decode(bytes),
      catch: (cause) =>
        new SocketProtocolError({
          reason: "DecodeText",
          description: `Payload is not valid ${encoding.name}`,
          cause,
        }),
    })

  return {
    decodeText,

    resolve: formatter.resolve,

    decode: (bytes) => decodeText(bytes).pipe(Effect.flatMap(formatter.resolve)),

    encode: (envelope) =>
      formatter.format(envelope).pipe(
        Effect.flatMap((text) =>
          Effect.try({
            try: () => encoding.encode(text),
            catch: (cause) =>
              new SocketProtocolError({
                reason: "EncodeError",
                description: `Failed to encode message as ${encoding.name}`,
                cause,
              }),
          }),
        ),
      ),
  }
}

/**
 * UTF-8 + JSON codec.
 */
export const defaultMessageCodec: MessageCodec = makeMessageCodec({
  encoding: Utf8,
  formatter: JsonFormatter,
})
