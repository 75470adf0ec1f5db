/**
 * @module effect-socket-rpc/socket/server/MethodDispatcher
 *
 * Resolves an inbound request against a {@link MethodTable}, runs it and
 * builds the reply.
 *
 * Replies follow the declared return schema only: a method with a return
 * schema always answers (with its default value if the call failed), a method
 * without one never does. Unknown methods never answer.
 */

import * as Clock from "effect/Clock"
import * as Effect from "effect/Effect"
import * as Either from "effect/Either"
import * as Option from "effect/Option"

import type { DispatchError } from "../errors.js"
import { InvocationError, MethodNotFoundError } from "../errors.js"
import type { InvocationEnvelope } from "../protocol.js"
import { makeResponse } from "../protocol.js"
import { SocketLogger } from "../../shared/logging.js"
import type { MethodContext, MethodTable } from "./MethodTable.js"
import { CurrentConnection } from "./SocketHandler.js"

/**
 * Services a dispatch runs with.
 */
export type DispatchContext = MethodContext | SocketLogger

/**
 * @since 0.1.0
 * @category Models
 */
export interface MethodDispatcher {
  /**
   * Dispatch one request. Never fails; every error is reported through the
   * dispatcher's error callback.
   */
  readonly dispatch: (
    envelope: InvocationEnvelope,
  ) => Effect.Effect<Option.Option<InvocationEnvelope>, never, DispatchContext>
}

export interface MethodDispatcherOptions {
  readonly methods: MethodTable
  /** Called once per failed dispatch */
  readonly onInvokeError: (error: InvocationError) => Effect.Effect<void, never, DispatchContext>
}

/**
 * Create a dispatcher over a method table.
 *
 * @example
 * ```ts
 * const dispatcher = makeMethodDispatcher({ methods, onInvokeError: () => Effect.void })
 * const reply = yield* dispatcher.dispatch(makeRequest("Echo", ["hi"]))
 * ```
 */
export const makeMethodDispatcher = (options: MethodDispatcherOptions): MethodDispatcher => ({
  dispatch: (envelope) =>
    Effect.gen(function* () {
      const connection = yield* CurrentConnection
      const logger = yield* SocketLogger
      const resolved = options.methods.lookup(envelope.method)

      const call: Effect.Effect<Option.Option<unknown>, DispatchError, MethodContext> = Option.match(resolved, {
        onNone: () => Effect.fail(new MethodNotFoundError({ method: envelope.method })),
        onSome: (method) => method.invoke(envelope.arguments),
      })

      const startTime = yield* Clock.currentTimeMillis
      const outcome = yield* Effect.either(call)
      const durationMs = (yield* Clock.currentTimeMillis) - startTime

      if (Option.isSome(resolved)) {
        yield* logger.log({
          _tag: "Invoke",
          connectionId: connection.connectionId,
          method: resolved.value.name,
          arguments: envelope.arguments,
          durationMs,
          success: Either.isRight(outcome),
        })
      }

      if (Either.isRight(outcome)) {
        return Option.map(outcome.right, (value) => makeResponse(envelope.method, value))
      }

      yield* options.onInvokeError(
        new InvocationError({
          connectionId: connection.connectionId,
          description: outcome.left.message,
          cause: outcome.left,
        }),
      )

      // the return schema is known before invocation, so a failed call still answers
      if (Option.isSome(resolved) && resolved.value.hasReturn) {
        const fallback = yield* resolved.value.defaultReply
        return Option.some(makeResponse(envelope.method, fallback))
      }
      return Option.none()
    }),
})
