/**
 * @module effect-socket-rpc/shared/logging
 *
 * Structured lifecycle logging for socket connections.
 *
 * Every event goes through `Effect.log*` with annotations, so the hosting
 * application decides where logs end up by choosing its Effect `Logger`:
 *
 * ```typescript
 * import { Effect, Logger } from "effect"
 * import { SocketLoggerLive } from "effect-socket-rpc/shared"
 *
 * const program = myEffect.pipe(
 *   Effect.provide(SocketLoggerLive),
 *   Effect.provide(Logger.pretty)
 * )
 * ```
 *
 * ## Configuration
 *
 * ```typescript
 * const CustomLoggerLive = makeSocketLoggerLayer({
 *   level: LogLevel.Debug,
 *   includeArguments: true,
 *   redactFields: ["password", "token"],
 *   disabledCategories: ["heartbeat"],
 * })
 * ```
 *
 * @since 0.1.0
 */

import * as Context from "effect/Context"
import * as Effect from "effect/Effect"
import * as Layer from "effect/Layer"
import * as LogLevel from "effect/LogLevel"

// ─────────────────────────────────────────────────────────────────────────────
// Configuration Types
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Log categories that can be individually enabled/disabled.
 *
 * @since 0.1.0
 */
export type LogCategory = "connection" | "dispatch" | "heartbeat" | "push" | "protocol"

/**
 * @since 0.1.0
 */
export interface SocketLoggerConfig {
  /**
   * Minimum log level. Logs below this level are filtered.
   * @default LogLevel.Info
   */
  readonly level: LogLevel.LogLevel

  /**
   * Whether to include call arguments and message content in logs.
   * @default true outside production
   */
  readonly includeArguments: boolean

  /**
   * Object keys whose values are replaced with "[REDACTED]".
   * Matched case-insensitively as substrings.
   */
  readonly redactFields: ReadonlyArray<string>

  /**
   * @default 3
   */
  readonly maxDepth: number

  /**
   * Maximum string length before truncation.
   * @default 200
   */
  readonly maxStringLength: number

  /**
   * Categories to enable. Empty means all enabled.
   */
  readonly enabledCategories: ReadonlyArray<LogCategory>

  /**
   * Categories to disable. Takes precedence over enabledCategories.
   */
  readonly disabledCategories: ReadonlyArray<LogCategory>
}

/**
 * @since 0.1.0
 */
export const defaultConfig: SocketLoggerConfig = {
  level: LogLevel.Info,
  includeArguments: process.env["NODE_ENV"] !== "production",
  redactFields: ["password", "token", "secret", "apiKey", "authorization", "cookie", "sessionId"],
  maxDepth: 3,
  maxStringLength: 200,
  enabledCategories: [],
  disabledCategories: [],
}

// ─────────────────────────────────────────────────────────────────────────────
// Events
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Event types for structured logging.
 *
 * @since 0.1.0
 */
export type SocketLogEvent =
  | ConnectEvent
  | DisconnectEvent
  | HeartbeatTimeoutEvent
  | ResolveErrorEvent
  | InvokeErrorEvent
  | InvokeEvent
  | PushEvent

export interface ConnectEvent {
  readonly _tag: "Connect"
  readonly connectionId: string
  readonly remoteAddress?: string
}

export interface DisconnectEvent {
  readonly _tag: "Disconnect"
  readonly connectionId: string
  readonly reason: string
  readonly durationMs: number
}

export interface HeartbeatTimeoutEvent {
  readonly _tag: "HeartbeatTimeout"
  readonly connectionId: string
  readonly idleMillis: number
}

export interface ResolveErrorEvent {
  readonly _tag: "ResolveError"
  readonly connectionId: string
  readonly content: string
  readonly description: string
}

export interface InvokeErrorEvent {
  readonly _tag: "InvokeError"
  readonly connectionId: string
  readonly description: string
  readonly error: unknown
}

export interface InvokeEvent {
  readonly _tag: "Invoke"
  readonly connectionId: string
  readonly method: string
  readonly arguments: ReadonlyArray<unknown>
  readonly durationMs: number
  readonly success: boolean
}

export interface PushEvent {
  readonly _tag: "Push"
  readonly connectionId: string
  readonly method: string
  readonly arguments: ReadonlyArray<unknown>
}

// ─────────────────────────────────────────────────────────────────────────────
// Service Definition
// ─────────────────────────────────────────────────────────────────────────────

/**
 * @since 0.1.0
 */
export interface SocketLoggerService {
  /**
   * Log a structured event.
   */
  readonly log: (event: SocketLogEvent) => Effect.Effect<void>

  readonly getConfig: () => Effect.Effect<SocketLoggerConfig>
}

/**
 * Context.Tag for the SocketLogger service.
 *
 * @since 0.1.0
 */
export class SocketLogger extends Context.Tag("@effect-socket-rpc/SocketLogger")<
  SocketLogger,
  SocketLoggerService
>() {}

// ─────────────────────────────────────────────────────────────────────────────
// Data Sanitization
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Redact sensitive fields and truncate long values.
 *
 * @since 0.1.0
 */
export const redactSensitiveData = (
  data: unknown,
  redactFields: ReadonlyArray<string>,
  maxDepth: number,
  maxStringLength: number,
  currentDepth = 0,
): unknown => {
  if (currentDepth >= maxDepth) {
    return "[MAX_DEPTH]"
  }

  if (data === null || data === undefined) {
    return data
  }

  if (typeof data === "string") {
    if (data.length > maxStringLength) {
      return data.slice(0, maxStringLength) + `... [truncated ${data.length - maxStringLength} chars]`
    }
    return data
  }

  if (typeof data === "number" || typeof data === "boolean") {
    return data
  }

  if (typeof data === "bigint") {
    return data.toString() + "n"
  }

  if (data instanceof Uint8Array) {
    return `[${data.byteLength} bytes]`
  }

  if (data instanceof Error) {
    return { name: data.name, message: redactSensitiveData(data.message, redactFields, maxDepth, maxStringLength, currentDepth + 1) }
  }

  const recurse = (value: unknown) =>
    redactSensitiveData(value, redactFields, maxDepth, maxStringLength, currentDepth + 1)

  if (Array.isArray(data)) {
    if (data.length > 100) {
      return [...data.slice(0, 10).map(recurse), `... [${data.length - 10} more items]`]
    }
    return data.map(recurse)
  }

  if (typeof data === "object") {
    const result: Record<string, unknown> = {}
    for (const [key, value] of Object.entries(data)) {
      const lowerKey = key.toLowerCase()
      result[key] = redactFields.some((field) => lowerKey.includes(field.toLowerCase()))
        ? "[REDACTED]"
        : recurse(value)
    }
    return result
  }

  if (typeof data === "symbol") {
    return data.toString()
  }

  if (typeof data === "function") {
    return `[Function: ${data.name || "anonymous"}]`
  }

  return `[${typeof data}]`
}

// ─────────────────────────────────────────────────────────────────────────────
// Event Formatting
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Category an event is filtered under.
 *
 * @since 0.1.0
 */
export const categoryFromEvent = (event: SocketLogEvent): LogCategory => {
  switch (event._tag) {
    case "Connect":
    case "Disconnect":
      return "connection"
    case "HeartbeatTimeout":
      return "heartbeat"
    case "ResolveError":
      return "protocol"
    case "InvokeError":
    case "Invoke":
      return "dispatch"
    case "Push":
      return "push"
  }
}

/**
 * @since 0.1.0
 */
export const levelFromEvent = (event: SocketLogEvent): LogLevel.LogLevel => {
  switch (event._tag) {
    case "InvokeError":
      return LogLevel.Error
    case "HeartbeatTimeout":
    case "ResolveError":
      return LogLevel.Warning
    case "Invoke":
    case "Push":
      return LogLevel.Debug
    case "Connect":
    case "Disconnect":
      return LogLevel.Info
  }
}

/**
 * One-line message for an event.
 *
 * @since 0.1.0
 */
export const formatEvent = (event: SocketLogEvent): string => {
  switch (event._tag) {
    case "Connect":
      return `🔌 Socket connected [${event.connectionId}]`
    case "Disconnect":
      return `🔌 Socket disconnected [${event.connectionId}] (${event.reason}, ${event.durationMs}ms)`
    case "HeartbeatTimeout":
      return `💓 Heartbeat timeout [${event.connectionId}] idle ${event.idleMillis}ms`
    case "ResolveError":
      return `⚠️ Unresolvable message [${event.connectionId}]: ${event.description}`
    case "InvokeError":
      return `❌ Invoke error [${event.connectionId}]: ${event.description}`
    case "Invoke":
      return event.success
        ? `📥 ${event.method} [${event.connectionId}] (${event.durationMs}ms)`
        : `📥 ${event.method} [${event.connectionId}] failed (${event.durationMs}ms)`
    case "Push":
      return `📤 ${event.method} → [${event.connectionId}]`
  }
}

const eventToAnnotations = (event: SocketLogEvent, config: SocketLoggerConfig): Record<string, unknown> => {
  const redact = (data: unknown) =>
    redactSensitiveData(data, config.redactFields, config.maxDepth, config.maxStringLength)

  const base = {
    category: categoryFromEvent(event),
    eventType: event._tag,
    connectionId: event.connectionId,
  }

  switch (event._tag) {
    case "Connect":
      return {
        ...base,
        ...(event.remoteAddress ? { remoteAddress: event.remoteAddress } : {}),
      }

    case "Disconnect":
      return { ...base, reason: event.reason, durationMs: event.durationMs }

    case "HeartbeatTimeout":
      return { ...base, idleMillis: event.idleMillis }

    case "ResolveError":
      return {
        ...base,
        ...(config.includeArguments ? { content: redact(event.content) } : {}),
        description: event.description,
      }

    case "InvokeError":
      return { ...base, description: event.description, error: redact(event.error) }

    case "Invoke":
      return {
        ...base,
        method: event.method,
        ...(config.includeArguments ? { arguments: redact(event.arguments) } : {}),
        durationMs: event.durationMs,
        success: event.success,
      }

    case "Push":
      return {
        ...base,
        method: event.method,
        ...(config.includeArguments ? { arguments: redact(event.arguments) } : {}),
      }
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Service Implementation
// ─────────────────────────────────────────────────────────────────────────────

const makeSocketLoggerService = (config: SocketLoggerConfig): SocketLoggerService => {
  const isCategoryEnabled = (category: LogCategory): boolean => {
    if (config.disabledCategories.includes(category)) {
      return false
    }
    if (config.enabledCategories.length === 0) {
      return true
    }
    return config.enabledCategories.includes(category)
  }

  const logEvent = (event: SocketLogEvent): Effect.Effect<void> => {
    if (!isCategoryEnabled(categoryFromEvent(event))) {
      return Effect.void
    }

    const eventLevel = levelFromEvent(event)
    if (LogLevel.lessThan(eventLevel, config.level)) {
      return Effect.void
    }

    return Effect.logWithLevel(eventLevel, formatEvent(event)).pipe(
      Effect.annotateLogs(eventToAnnotations(event, config)),
    )
  }

  return {
    log: logEvent,
    getConfig: () => Effect.succeed(config),
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Layers
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Create a SocketLogger layer with custom configuration.
 *
 * @since 0.1.0
 */
export const makeSocketLoggerLayer = (
  config: Partial<SocketLoggerConfig> = {},
): Layer.Layer<SocketLogger> =>
  Layer.succeed(SocketLogger, makeSocketLoggerService({ ...defaultConfig, ...config }))

/**
 * @since 0.1.0
 */
export const SocketLoggerLive: Layer.Layer<SocketLogger> = makeSocketLoggerLayer()

/**
 * Verbose output, including per-call events.
 *
 * @since 0.1.0
 */
export const SocketLoggerDev: Layer.Layer<SocketLogger> = makeSocketLoggerLayer({
  level: LogLevel.Debug,
  includeArguments: true,
})

/**
 * Logs nothing. Useful for testing.
 *
 * @since 0.1.0
 */
export const SocketLoggerSilent: Layer.Layer<SocketLogger> = makeSocketLoggerLayer({
  level: LogLevel.None,
})

// ─────────────────────────────────────────────────────────────────────────────
// Convenience Functions
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Log a raw event using the SocketLogger service.
 *
 * @since 0.1.0
 */
export const logSocketEvent = (event: SocketLogEvent): Effect.Effect<void, never, SocketLogger> =>
  Effect.flatMap(SocketLogger, (logger) => logger.log(event))
