/**
 * @module effect-socket-rpc/socket/errors
 *
 * Error types raised by the socket RPC engine.
 */

import * as Schema from "effect/Schema"
import * as Predicate from "effect/Predicate"

// ─────────────────────────────────────────────────────────────────────────────
// Type Identification
// ─────────────────────────────────────────────────────────────────────────────

export const SocketErrorTypeId: unique symbol = Symbol.for("@effect-socket-rpc/SocketError")
export type SocketErrorTypeId = typeof SocketErrorTypeId

export const isSocketError = (u: unknown): u is SocketError =>
  Predicate.hasProperty(u, SocketErrorTypeId)

// ─────────────────────────────────────────────────────────────────────────────
// Transport Errors
// ─────────────────────────────────────────────────────────────────────────────

/**
 * The underlying socket failed or was disposed while reading.
 * Fatal to the connection it occurs on.
 *
 * @since 0.1.0
 * @category errors
 */
export class SocketTransportError extends Schema.TaggedError<SocketTransportError>()(
  "SocketTransportError",
  {
    reason: Schema.Literal("ReadFailed", "Disposed"),
    description: Schema.optional(Schema.String),
    cause: Schema.optional(Schema.Defect),
  },
) {
  readonly [SocketErrorTypeId]: SocketErrorTypeId = SocketErrorTypeId

  override get message(): string {
    const desc = this.description ? `: ${this.description}` : ""
    return `Socket transport error: ${this.reason}${desc}`
  }
}

/**
 * Error writing a frame to the socket.
 *
 * @since 0.1.0
 * @category errors
 */
export class SocketSendError extends Schema.TaggedError<SocketSendError>()(
  "SocketSendError",
  {
    reason: Schema.Literal("NotOpen", "SendFailed"),
    description: Schema.optional(Schema.String),
    cause: Schema.optional(Schema.Defect),
  },
) {
  readonly [SocketErrorTypeId]: SocketErrorTypeId = SocketErrorTypeId

  override get message(): string {
    const desc = this.description ? `: ${this.description}` : ""
    return `Socket send error: ${this.reason}${desc}`
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Protocol Errors
// ─────────────────────────────────────────────────────────────────────────────

/**
 * A payload could not be turned into an envelope, or the other way round.
 *
 * @since 0.1.0
 * @category errors
 */
export class SocketProtocolError extends Schema.TaggedError<SocketProtocolError>()(
  "SocketProtocolError",
  {
    reason: Schema.Literal("DecodeText", "ParseError", "InvalidMessage", "EncodeError"),
    description: Schema.optional(Schema.String),
    cause: Schema.optional(Schema.Defect),
  },
) {
  readonly [SocketErrorTypeId]: SocketErrorTypeId = SocketErrorTypeId

  override get message(): string {
    const desc = this.description ? `: ${this.description}` : ""
    return `Socket protocol error: ${this.reason}${desc}`
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Dispatch Errors
// ─────────────────────────────────────────────────────────────────────────────

/**
 * No method with the requested name is registered.
 *
 * @since 0.1.0
 * @category errors
 */
export class MethodNotFoundError extends Schema.TaggedError<MethodNotFoundError>()(
  "MethodNotFoundError",
  {
    method: Schema.String,
  },
) {
  readonly [SocketErrorTypeId]: SocketErrorTypeId = SocketErrorTypeId

  override get message(): string {
    return `Method not found: ${this.method}`
  }
}

/**
 * The number of supplied arguments differs from the method's parameter count.
 *
 * @since 0.1.0
 * @category errors
 */
export class ArgumentMismatchError extends Schema.TaggedError<ArgumentMismatchError>()(
  "ArgumentMismatchError",
  {
    method: Schema.String,
    expected: Schema.Number,
    received: Schema.Number,
  },
) {
  readonly [SocketErrorTypeId]: SocketErrorTypeId = SocketErrorTypeId

  override get message(): string {
    return `Arguments of ${this.method} do not match: expected ${this.expected}, received ${this.received}`
  }
}

/**
 * An argument could not be converted to the parameter's declared type.
 *
 * @since 0.1.0
 * @category errors
 */
export class ArgumentConversionError extends Schema.TaggedError<ArgumentConversionError>()(
  "ArgumentConversionError",
  {
    method: Schema.String,
    description: Schema.String,
    cause: Schema.optional(Schema.Defect),
  },
) {
  readonly [SocketErrorTypeId]: SocketErrorTypeId = SocketErrorTypeId

  override get message(): string {
    return `Arguments of ${this.method} could not be converted: ${this.description}`
  }
}

/**
 * The method handler failed or died.
 *
 * @since 0.1.0
 * @category errors
 */
export class MethodExecutionError extends Schema.TaggedError<MethodExecutionError>()(
  "MethodExecutionError",
  {
    method: Schema.String,
    description: Schema.optional(Schema.String),
    cause: Schema.optional(Schema.Defect),
  },
) {
  readonly [SocketErrorTypeId]: SocketErrorTypeId = SocketErrorTypeId

  override get message(): string {
    const desc = this.description ? `: ${this.description}` : ""
    return `Method ${this.method} failed${desc}`
  }
}

/**
 * Union of the errors a dispatch can end with.
 *
 * @since 0.1.0
 * @category errors
 */
export type DispatchError =
  | MethodNotFoundError
  | ArgumentMismatchError
  | ArgumentConversionError
  | MethodExecutionError

/**
 * Error handed to the invoke-error hook.
 * Carries the connection it happened on and the underlying cause.
 *
 * @since 0.1.0
 * @category errors
 */
export class InvocationError extends Schema.TaggedError<InvocationError>()(
  "InvocationError",
  {
    connectionId: Schema.String,
    description: Schema.String,
    cause: Schema.optional(Schema.Defect),
  },
) {
  readonly [SocketErrorTypeId]: SocketErrorTypeId = SocketErrorTypeId

  override get message(): string {
    return `[${this.connectionId}] ${this.description}`
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Registry Errors
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Connection not found in registry.
 *
 * @since 0.1.0
 * @category errors
 */
export class ConnectionNotFoundError extends Schema.TaggedError<ConnectionNotFoundError>()(
  "ConnectionNotFoundError",
  {
    connectionId: Schema.String,
  },
) {
  readonly [SocketErrorTypeId]: SocketErrorTypeId = SocketErrorTypeId

  override get message(): string {
    return `Connection not found: ${this.connectionId}`
  }
}

/**
 * Connection limit exceeded - server has reached maximum connections.
 *
 * @since 0.1.0
 * @category errors
 */
export class ConnectionLimitExceededError extends Schema.TaggedError<ConnectionLimitExceededError>()(
  "ConnectionLimitExceededError",
  {
    currentCount: Schema.Number,
    maxConnections: Schema.Number,
    connectionId: Schema.optional(Schema.String),
  },
) {
  readonly [SocketErrorTypeId]: SocketErrorTypeId = SocketErrorTypeId

  override get message(): string {
    const conn = this.connectionId ? ` (connection: ${this.connectionId})` : ""
    return `Connection limit exceeded: ${this.currentCount}/${this.maxConnections}${conn}`
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Configuration Errors
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Socket options failed validation.
 *
 * @since 0.1.0
 * @category errors
 */
export class SocketConfigError extends Schema.TaggedError<SocketConfigError>()(
  "SocketConfigError",
  {
    description: Schema.String,
    cause: Schema.optional(Schema.Defect),
  },
) {
  readonly [SocketErrorTypeId]: SocketErrorTypeId = SocketErrorTypeId

  override get message(): string {
    return `Invalid socket options: ${this.description}`
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Union Type
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Union of all socket error types.
 *
 * @since 0.1.0
 * @category errors
 */
export type SocketError =
  | SocketTransportError
  | SocketSendError
  | SocketProtocolError
  | MethodNotFoundError
  | ArgumentMismatchError
  | ArgumentConversionError
  | MethodExecutionError
  | InvocationError
  | ConnectionNotFoundError
  | ConnectionLimitExceededError
  | SocketConfigError
