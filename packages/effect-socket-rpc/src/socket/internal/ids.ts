/**
 * @module effect-socket-rpc/socket/internal/ids
 * @internal
 */

import * as Effect from "effect/Effect"
import * as Random from "effect/Random"
import * as Clock from "effect/Clock"
import type { ConnectionId } from "../types.js"

let sequence = 0

/**
 * Generate a unique connection ID from the current time, a process-wide
 * counter and a random suffix. The counter keeps IDs distinct while
 * `TestClock` holds the time still; it makes this effect impure.
 * @internal
 */
export const generateConnectionId: Effect.Effect<ConnectionId> = Effect.gen(function* () {
  const timestamp = yield* Clock.currentTimeMillis
  const random = yield* Random.nextInt
  sequence = (sequence + 1) % Number.MAX_SAFE_INTEGER
  return `conn_${timestamp}_${sequence.toString(36)}${Math.abs(random).toString(36).slice(0, 6)}` as ConnectionId
})
