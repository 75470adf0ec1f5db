/**
 * @module effect-socket-rpc/node/runtime-state
 * @internal
 *
 * Lifecycle and fiber bookkeeping for a socket server.
 */

import * as Effect from "effect/Effect"
import * as Fiber from "effect/Fiber"
import * as Ref from "effect/Ref"

export type ServerLifecycle =
  | { readonly _tag: "Ready" }
  | { readonly _tag: "Disposing" }
  | { readonly _tag: "Disposed" }

export type ConnectionAdmission =
  | { readonly _tag: "Accept" }
  | { readonly _tag: "ShuttingDown" }

export interface ServerRuntimeState {
  readonly lifecycle: Effect.Effect<ServerLifecycle>
  readonly connectionAdmission: Effect.Effect<ConnectionAdmission>
  readonly canRunNewWork: Effect.Effect<boolean>
  readonly markDisposing: Effect.Effect<void>
  readonly markDisposed: Effect.Effect<void>
  readonly trackFiber: (fiber: Fiber.RuntimeFiber<unknown, unknown>) => Effect.Effect<void>
  readonly untrackFiber: (fiber: Fiber.RuntimeFiber<unknown, unknown>) => Effect.Effect<void>
  readonly interruptTrackedFibers: Effect.Effect<void>
}

const readyLifecycle: ServerLifecycle = { _tag: "Ready" }
const disposingLifecycle: ServerLifecycle = { _tag: "Disposing" }
const disposedLifecycle: ServerLifecycle = { _tag: "Disposed" }

export const makeServerRuntimeState: Effect.Effect<ServerRuntimeState> = Effect.gen(function* () {
  const lifecycleRef = yield* Ref.make<ServerLifecycle>(readyLifecycle)
  const activeFibersRef = yield* Ref.make<ReadonlyArray<Fiber.RuntimeFiber<unknown, unknown>>>([])

  const canRunNewWork = Ref.get(lifecycleRef).pipe(Effect.map((lifecycle) => lifecycle._tag === "Ready"))

  return {
    lifecycle: Ref.get(lifecycleRef),
    connectionAdmission: canRunNewWork.pipe(
      Effect.map((ready): ConnectionAdmission => (ready ? { _tag: "Accept" } : { _tag: "ShuttingDown" })),
    ),
    canRunNewWork,
    markDisposing: Ref.set(lifecycleRef, disposingLifecycle),
    markDisposed: Ref.set(lifecycleRef, disposedLifecycle),
    trackFiber: (fiber) =>
      Ref.update(activeFibersRef, (fibers) => (fibers.includes(fiber) ? fibers : [...fibers, fiber])),
    untrackFiber: (fiber) => Ref.update(activeFibersRef, (fibers) => fibers.filter((f) => f !== fiber)),
    interruptTrackedFibers: Effect.gen(function* () {
      const fibers = yield* Ref.getAndSet(activeFibersRef, [])
      yield* Effect.forEach(
        fibers,
        (fiber) => Fiber.interrupt(fiber).pipe(Effect.ignore),
        { discard: true, concurrency: "unbounded" },
      )
    }),
  }
})
