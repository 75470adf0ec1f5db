/**
 * @module effect-socket-rpc/socket/server/HeartbeatMonitor
 *
 * Idle detection for socket connections.
 *
 * Any complete inbound message counts as liveness; no ping frames are sent.
 * A connection that stays silent for `interval × tryTimes` is reported to the
 * caller-supplied timeout action, which decides how to close it.
 */

import * as Clock from "effect/Clock"
import * as Context from "effect/Context"
import * as Duration from "effect/Duration"
import * as Effect from "effect/Effect"
import * as Fiber from "effect/Fiber"
import * as HashMap from "effect/HashMap"
import * as Layer from "effect/Layer"
import * as Option from "effect/Option"
import * as Ref from "effect/Ref"
import * as Schedule from "effect/Schedule"

import type { ConnectionId } from "../types.js"

// ─────────────────────────────────────────────────────────────────────────────
// Settings
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Per-connection heartbeat settings, taken from the connection's options.
 */
export interface HeartbeatSettings {
  /** Period of the idle check */
  readonly interval: Duration.Duration
  /** Missed intervals tolerated before the timeout action runs */
  readonly tryTimes: number
}

// ─────────────────────────────────────────────────────────────────────────────
// Interface
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Service interface for heartbeat monitoring.
 */
export interface HeartbeatMonitorShape {
  /**
   * Start monitoring a connection. Returns once the check fiber is forked.
   *
   * The check keeps ticking after a timeout until {@link stop} is called, so
   * a connection whose close handshake stalls is reported again.
   */
  readonly start: (
    connectionId: ConnectionId,
    settings: HeartbeatSettings,
    onTimeout: (idleMillis: number) => Effect.Effect<void>,
  ) => Effect.Effect<void>

  /**
   * Record inbound activity for a connection.
   */
  readonly touch: (connectionId: ConnectionId) => Effect.Effect<void>

  /**
   * Last recorded activity (epoch millis), if the connection is monitored.
   */
  readonly lastActivity: (connectionId: ConnectionId) => Effect.Effect<Option.Option<number>>

  /**
   * Stop monitoring a connection. No-op if it is not monitored.
   */
  readonly stop: (connectionId: ConnectionId) => Effect.Effect<void>

  /**
   * Stop every monitor. Called when shutting down the server.
   */
  readonly cleanupAll: Effect.Effect<void>

  /**
   * Number of connections currently monitored.
   */
  readonly activeCount: Effect.Effect<number>
}

// ─────────────────────────────────────────────────────────────────────────────
// Tag
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Context tag for the HeartbeatMonitor service.
 */
export class HeartbeatMonitor extends Context.Tag("@effect-socket-rpc/HeartbeatMonitor")<
  HeartbeatMonitor,
  HeartbeatMonitorShape
>() {
  /**
   * Default layer.
   */
  static readonly Live: Layer.Layer<HeartbeatMonitor> = Layer.effect(
    HeartbeatMonitor,
    Effect.suspend(() => makeHeartbeatMonitor),
  )

  /**
   * Layer that never times anything out (for testing).
   */
  static readonly Disabled: Layer.Layer<HeartbeatMonitor> = Layer.succeed(HeartbeatMonitor, {
    start: () => Effect.void,
    touch: () => Effect.void,
    lastActivity: () => Effect.succeed(Option.none()),
    stop: () => Effect.void,
    cleanupAll: Effect.void,
    activeCount: Effect.succeed(0),
  })
}

// ─────────────────────────────────────────────────────────────────────────────
// Implementation
// ─────────────────────────────────────────────────────────────────────────────

interface ConnectionHeartbeatState {
  readonly lastActivity: Ref.Ref<number>
  readonly fiber: Fiber.RuntimeFiber<void>
}

const makeHeartbeatMonitor = Effect.gen(function* () {
  const connections = yield* Ref.make(HashMap.empty<ConnectionId, ConnectionHeartbeatState>())

  const stop = (connectionId: ConnectionId) =>
    Effect.gen(function* () {
      const state = yield* Ref.modify(connections, (map) => [
        HashMap.get(map, connectionId),
        HashMap.remove(map, connectionId),
      ])
      if (Option.isSome(state)) {
        yield* Fiber.interrupt(state.value.fiber)
      }
    })

  const service: HeartbeatMonitorShape = {
    start: (connectionId, settings, onTimeout) =>
      Effect.gen(function* () {
        // a second start for the same id replaces the first
        yield* stop(connectionId)

        const now = yield* Clock.currentTimeMillis
        const lastActivity = yield* Ref.make(now)
        const tolerance = Duration.toMillis(Duration.times(settings.interval, settings.tryTimes))

        const check = Effect.gen(function* () {
          yield* Effect.sleep(settings.interval)
          const current = yield* Clock.currentTimeMillis
          const idle = current - (yield* Ref.get(lastActivity))
          if (idle >= tolerance) {
            yield* onTimeout(idle)
          }
        })

        const fiber = yield* Effect.forkDaemon(
          Effect.repeat(check, Schedule.forever).pipe(Effect.asVoid),
        )

        yield* Ref.update(connections, HashMap.set(connectionId, { lastActivity, fiber }))
      }),

    touch: (connectionId) =>
      Effect.gen(function* () {
        const state = HashMap.get(yield* Ref.get(connections), connectionId)
        if (Option.isSome(state)) {
          yield* Ref.set(state.value.lastActivity, yield* Clock.currentTimeMillis)
        }
      }),

    lastActivity: (connectionId) =>
      Effect.gen(function* () {
        const state = HashMap.get(yield* Ref.get(connections), connectionId)
        if (Option.isNone(state)) {
          return Option.none()
        }
        return Option.some(yield* Ref.get(state.value.lastActivity))
      }),

    stop,

    cleanupAll: Effect.gen(function* () {
      const map = yield* Ref.getAndSet(connections, HashMap.empty())
      yield* Effect.forEach(
        HashMap.values(map),
        (state) => Fiber.interrupt(state.fiber),
        { concurrency: "unbounded", discard: true },
      )
    }),

    activeCount: Ref.get(connections).pipe(Effect.map(HashMap.size)),
  }

  return service
})

/**
 * Create a Layer with a fresh monitor.
 */
export const makeHeartbeatMonitorLayer = (): Layer.Layer<HeartbeatMonitor> =>
  Layer.effect(HeartbeatMonitor, makeHeartbeatMonitor)
