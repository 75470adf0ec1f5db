/**
 * @module effect-socket-rpc/socket/protocol
 *
 * Envelope schema exchanged between peers.
 *
 * Wire shape (format-agnostic):
 * ```
 * { method: string, isReturn: 0 | 1, arguments: [value...] }
 * ```
 */

import * as Schema from "effect/Schema"

// ─────────────────────────────────────────────────────────────────────────────
// Direction
// ─────────────────────────────────────────────────────────────────────────────

/**
 * `0` for a request, `1` for a response.
 */
export const Direction = Schema.Literal(0, 1)
export type Direction = typeof Direction.Type

// ─────────────────────────────────────────────────────────────────────────────
// Envelope
// ─────────────────────────────────────────────────────────────────────────────

/**
 * The unit exchanged over the wire.
 *
 * @remarks
 * A request carries the positional call arguments. A response carries a
 * single-element list holding the return value, and its `method` equals the
 * request's `method`. When decoding, a missing `isReturn` is a request and
 * missing `arguments` are an empty list.
 *
 * @since 0.1.0
 * @category Models
 */
export class InvocationEnvelope extends Schema.Class<InvocationEnvelope>("InvocationEnvelope")({
  method: Schema.String,
  isReturn: Schema.optionalWith(Direction, { default: () => 0 }),
  arguments: Schema.optionalWith(Schema.Array(Schema.Unknown), { default: () => [] }),
}) {}

// ─────────────────────────────────────────────────────────────────────────────
// Constructors
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Build a request envelope (`isReturn = 0`).
 */
export const makeRequest = (
  method: string,
  args: ReadonlyArray<unknown>,
): InvocationEnvelope => new InvocationEnvelope({ method, isReturn: 0, arguments: args })

/**
 * Build a response envelope (`isReturn = 1`) holding a single return value.
 */
export const makeResponse = (method: string, value: unknown): InvocationEnvelope =>
  new InvocationEnvelope({ method, isReturn: 1, arguments: [value] })

// ─────────────────────────────────────────────────────────────────────────────
// Guards
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Check if an envelope is a response.
 * @since 0.1.0
 * @category guards
 */
export const isResponse = (envelope: InvocationEnvelope): boolean => envelope.isReturn === 1

/**
 * Check if an envelope is a request.
 * @since 0.1.0
 * @category guards
 */
export const isRequest = (envelope: InvocationEnvelope): boolean => envelope.isReturn === 0
