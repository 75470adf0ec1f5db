/**
 * @module effect-socket-rpc/socket/server/MessageFormatter
 *
 * Pluggable structured-data formats for envelopes.
 * Default implementation is JSON.
 */

import * as Effect from "effect/Effect"
import * as ParseResult from "effect/ParseResult"
import * as Schema from "effect/Schema"

import { InvocationEnvelope } from "../protocol.js"
import { SocketProtocolError } from "../errors.js"

// ─────────────────────────────────────────────────────────────────────────────
// Interface
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Turns envelopes into text and back.
 */
export interface MessageFormatter {
  readonly name: string

  /**
   * Serialize an envelope.
   */
  readonly format: (envelope: InvocationEnvelope) => Effect.Effect<string, SocketProtocolError>

  /**
   * Parse text into an envelope.
   */
  readonly resolve: (content: string) => Effect.Effect<InvocationEnvelope, SocketProtocolError>
}

// ─────────────────────────────────────────────────────────────────────────────
// JSON
// ─────────────────────────────────────────────────────────────────────────────

const EnvelopeFromJson = Schema.parseJson(InvocationEnvelope)

const decodeEnvelope = Schema.decodeUnknown(EnvelopeFromJson)
const encodeEnvelope = Schema.encode(EnvelopeFromJson)

/**
 * JSON formatter.
 *
 * @example
 * ```ts
 * // {"method":"Echo","isReturn":0,"arguments":["hi"]}
 * yield* JsonFormatter.format(makeRequest("Echo", ["hi"]))
 * ```
 *
 * @since 0.1.0
 * @category Formatters
 */
export const JsonFormatter: MessageFormatter = {
  name: "json",

  format: (envelope) =>
    encodeEnvelope(envelope).pipe(
      Effect.mapError(
        (cause) =>
          new SocketProtocolError({
            reason: "EncodeError",
            description: ParseResult.TreeFormatter.formatErrorSync(cause),
            cause,
          }),
      ),
    ),

  resolve: (content) =>
    decodeEnvelope(content.trim()).pipe(
      Effect.mapError(
        (cause) =>
          new SocketProtocolError({
            reason: "InvalidMessage",
            description: `Failed to resolve message: ${content.slice(0, 100)}`,
            cause,
          }),
      ),
    ),
}

// ─────────────────────────────────────────────────────────────────────────────
// Custom Formatter Helper
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Build a formatter from plain functions. Throws become protocol errors.
 *
 * @example
 * ```ts
 * const Pipe = makeMessageFormatter({
 *   name: "pipe",
 *   format: (e) => `${e.method}|${e.isReturn}|${JSON.stringify(e.arguments)}`,
 *   resolve: (text) => {
 *     const [method, isReturn, args] = text.split("|")
 *     return { method, isReturn: Number(isReturn), arguments: JSON.parse(args) }
 *   },
 * })
 * ```
 */
export const makeMessageFormatter = (impl: {
  readonly name: string
  readonly format: (envelope: InvocationEnvelope) => string
  readonly resolve: (content: string) => unknown
}): MessageFormatter => ({
  name: impl.name,

  format: (envelope) =>
    Effect.try({
      try: () => impl.format(envelope),
      catch: (cause) =>
        new SocketProtocolError({
          reason: "EncodeError",
          description: `Failed to format message ${envelope.method}`,
          cause,
        }),
    }),

  resolve: (content) =>
    Effect.try({
      try: () => impl.resolve(content),
      catch: (cause) =>
        new SocketProtocolError({
          reason: "ParseError",
          description: `Failed to parse message: ${content.slice(0, 100)}`,
          cause,
        }),
    }).pipe(
      Effect.flatMap((raw) =>
        Schema.decodeUnknown(InvocationEnvelope)(raw).pipe(
          Effect.mapError(
            (cause) =>
              new SocketProtocolError({
                reason: "InvalidMessage",
                description: "Message does not match expected schema",
                cause,
              }),
          ),
        ),
      ),
    ),
})
