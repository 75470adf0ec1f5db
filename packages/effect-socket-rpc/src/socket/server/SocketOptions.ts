/**
 * @module effect-socket-rpc/socket/server/SocketOptions
 *
 * Per-connection configuration snapshot.
 *
 * Options are supplied at accept time and never change for the lifetime of a
 * connection.
 */

import * as Config from "effect/Config"
import * as ConfigError from "effect/ConfigError"
import * as Duration from "effect/Duration"
import * as Effect from "effect/Effect"
import * as Either from "effect/Either"
import * as ParseResult from "effect/ParseResult"
import * as Schema from "effect/Schema"

import { SocketConfigError } from "../errors.js"
import type { MessageFormatter } from "./MessageFormatter.js"
import { JsonFormatter } from "./MessageFormatter.js"
import type { TextEncoding } from "./TextEncoding.js"
import { Utf8, encodingByName } from "./TextEncoding.js"

// ─────────────────────────────────────────────────────────────────────────────
// Options
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Connection options.
 */
export interface SocketOptions {
  /** Largest frame payload read at once, in bytes. Default: 4096 */
  readonly receiveBufferSize: number
  /** Text encoding between frame bytes and formatter text. Default: UTF-8 */
  readonly encoding: TextEncoding
  /** Structured-data format of envelopes. Default: JSON */
  readonly formatter: MessageFormatter
  /** Period of the idle check. Default: 30 seconds */
  readonly heartbeatInterval: Duration.Duration
  /** Missed intervals tolerated before a forced close. Default: 3 */
  readonly heartbeatTryTimes: number
}

/**
 * Default options.
 */
export const defaultSocketOptions: SocketOptions = {
  receiveBufferSize: 4096,
  encoding: Utf8,
  formatter: JsonFormatter,
  heartbeatInterval: Duration.seconds(30),
  heartbeatTryTimes: 3,
}

/**
 * Options as accepted from callers. Durations may be given in any form
 * `Duration.decode` understands, e.g. `"10 seconds"` or a millisecond count.
 */
export interface SocketOptionsInput {
  readonly receiveBufferSize?: number
  readonly encoding?: TextEncoding
  readonly formatter?: MessageFormatter
  readonly heartbeatInterval?: Duration.DurationInput
  readonly heartbeatTryTimes?: number
}

// ─────────────────────────────────────────────────────────────────────────────
// Validation
// ─────────────────────────────────────────────────────────────────────────────

const NumericOptions = Schema.Struct({
  receiveBufferSize: Schema.Int.pipe(Schema.positive()),
  heartbeatTryTimes: Schema.Int.pipe(Schema.positive()),
  heartbeatIntervalMillis: Schema.Number.pipe(Schema.positive()),
})

const validateNumericOptions = Schema.decodeUnknown(NumericOptions)

/**
 * Merge caller options over the defaults and validate them.
 *
 * @example
 * ```ts
 * const options = yield* resolveSocketOptions({ heartbeatInterval: "10 seconds" })
 * ```
 */
export const resolveSocketOptions = (
  input: SocketOptionsInput = {},
): Effect.Effect<SocketOptions, SocketConfigError> =>
  Effect.gen(function* () {
    const heartbeatInterval = yield* Effect.try({
      try: () => Duration.decode(input.heartbeatInterval ?? defaultSocketOptions.heartbeatInterval),
      catch: (cause) =>
        new SocketConfigError({ description: "heartbeatInterval is not a duration", cause }),
    })

    const numeric = yield* validateNumericOptions({
      receiveBufferSize: input.receiveBufferSize ?? defaultSocketOptions.receiveBufferSize,
      heartbeatTryTimes: input.heartbeatTryTimes ?? defaultSocketOptions.heartbeatTryTimes,
      heartbeatIntervalMillis: Duration.toMillis(heartbeatInterval),
    }).pipe(
      Effect.mapError(
        (cause) =>
          new SocketConfigError({
            description: ParseResult.TreeFormatter.formatErrorSync(cause),
            cause,
          }),
      ),
    )

    return {
      receiveBufferSize: numeric.receiveBufferSize,
      encoding: input.encoding ?? defaultSocketOptions.encoding,
      formatter: input.formatter ?? defaultSocketOptions.formatter,
      heartbeatInterval,
      heartbeatTryTimes: numeric.heartbeatTryTimes,
    }
  })

/**
 * Time without inbound messages after which a connection is closed.
 */
export const idleTolerance = (options: Pick<SocketOptions, "heartbeatInterval" | "heartbeatTryTimes">) =>
  Duration.times(options.heartbeatInterval, options.heartbeatTryTimes)

// ─────────────────────────────────────────────────────────────────────────────
// Environment
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Options read through Effect `Config`.
 *
 * | Key | Example |
 * |---|---|
 * | `SOCKET_RECEIVE_BUFFER_SIZE` | `8192` |
 * | `SOCKET_ENCODING` | `utf8`, `latin1` |
 * | `SOCKET_HEARTBEAT_INTERVAL` | `10 seconds` |
 * | `SOCKET_HEARTBEAT_TRY_TIMES` | `5` |
 *
 * The formatter is always JSON; pass a different one in code.
 */
export const socketOptionsConfig: Config.Config<SocketOptions> = Config.all({
  receiveBufferSize: Config.integer("SOCKET_RECEIVE_BUFFER_SIZE").pipe(
    Config.withDefault(defaultSocketOptions.receiveBufferSize),
    Config.validate({ message: "must be a positive integer", validation: (n) => n > 0 }),
  ),
  encoding: Config.string("SOCKET_ENCODING").pipe(
    Config.withDefault(defaultSocketOptions.encoding.name),
    Config.mapOrFail((name) => {
      const encoding = encodingByName(name)
      return encoding !== undefined
        ? Either.right(encoding)
        : Either.left(ConfigError.InvalidData([], `unknown encoding "${name}"`))
    }),
  ),
  heartbeatInterval: Config.duration("SOCKET_HEARTBEAT_INTERVAL").pipe(
    Config.withDefault(defaultSocketOptions.heartbeatInterval),
  ),
  heartbeatTryTimes: Config.integer("SOCKET_HEARTBEAT_TRY_TIMES").pipe(
    Config.withDefault(defaultSocketOptions.heartbeatTryTimes),
    Config.validate({ message: "must be a positive integer", validation: (n) => n > 0 }),
  ),
}).pipe(
  Config.map((values) => ({ ...values, formatter: defaultSocketOptions.formatter })),
)
