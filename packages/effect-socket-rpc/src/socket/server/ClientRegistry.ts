/**
 * @module effect-socket-rpc/socket/server/ClientRegistry
 *
 * Service for tracking live socket connections by id and by group, and for
 * routing server-initiated calls to them.
 *
 * @since 0.1.0
 */

import * as Context from "effect/Context"
import type * as DateTime from "effect/DateTime"
import * as Effect from "effect/Effect"
import * as Either from "effect/Either"
import * as HashMap from "effect/HashMap"
import * as HashSet from "effect/HashSet"
import * as Layer from "effect/Layer"
import * as Option from "effect/Option"
import * as PubSub from "effect/PubSub"
import * as Ref from "effect/Ref"
import * as Stream from "effect/Stream"

import type { ConnectionContext, ConnectionId } from "../types.js"
import type { InvocationError } from "../errors.js"
import { ConnectionLimitExceededError, ConnectionNotFoundError } from "../errors.js"

// ─────────────────────────────────────────────────────────────────────────────
// Broadcast Result
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Result of a broadcast operation.
 *
 * @since 0.1.0
 * @category Models
 */
export interface BroadcastResult {
  /** Number of connections the call was written to */
  readonly sent: number
  /** Number of connections the write failed on */
  readonly failed: number
  readonly failedConnectionIds: ReadonlyArray<ConnectionId>
}

// ─────────────────────────────────────────────────────────────────────────────
// Client Proxy
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Server-side handle on one connected client.
 *
 * @since 0.1.0
 * @category Models
 */
export interface ClientProxy {
  readonly connectionId: ConnectionId
  readonly connectedAt: DateTime.Utc
  readonly context: ConnectionContext
  /**
   * Call a method on the client. A failed write is reported to the
   * invoke-error hook and then surfaces as an {@link InvocationError}.
   */
  readonly invoke: (method: string, args: ReadonlyArray<unknown>) => Effect.Effect<void, InvocationError>
  /**
   * Call a method on the client. A failed write is reported to the
   * invoke-error hook and goes no further.
   */
  readonly send: (method: string, ...args: ReadonlyArray<unknown>) => Effect.Effect<void>
  /**
   * Start a graceful close (status 1000).
   */
  readonly close: (reason?: string) => Effect.Effect<void>
}

// ─────────────────────────────────────────────────────────────────────────────
// Events
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Registry lifecycle events.
 *
 * @since 0.1.0
 * @category Models
 */
export type ClientEvent =
  | { readonly _tag: "Connected"; readonly client: ClientProxy }
  | { readonly _tag: "Disconnected"; readonly connectionId: ConnectionId; readonly reason?: string }

// ─────────────────────────────────────────────────────────────────────────────
// Service
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Configuration for ClientRegistry.
 *
 * @since 0.1.0
 * @category Models
 */
export interface ClientRegistryConfig {
  /**
   * Maximum number of concurrent connections allowed.
   * 0 means unlimited. Default: 10000
   */
  readonly maxConnections?: number
}

/**
 * @since 0.1.0
 * @category Config
 */
export const defaultClientRegistryConfig: Required<ClientRegistryConfig> = {
  maxConnections: 10000,
}

/**
 * Live connections and their group memberships.
 *
 * Replaces a process-wide manager: one registry per serving process, provided
 * as a layer and shared by every connection that process accepts.
 *
 * @example
 * ```ts
 * const program = Effect.gen(function* () {
 *   const registry = yield* ClientRegistry
 *   yield* registry.sendToGroup("lobby", "Announce", ["server restarting"])
 * }).pipe(Effect.provide(ClientRegistry.layer({ maxConnections: 5000 })))
 * ```
 *
 * @since 0.1.0
 * @category Tags
 */
export class ClientRegistry extends Context.Tag("@effect-socket-rpc/ClientRegistry")<
  ClientRegistry,
  ClientRegistry.Service
>() {
  /**
   * Default layer (maxConnections: 10000).
   *
   * @since 0.1.0
   * @category Layers
   */
  static Live: Layer.Layer<ClientRegistry>

  /**
   * Create a layer with custom configuration.
   *
   * @since 0.1.0
   * @category Layers
   */
  static layer: (config?: ClientRegistryConfig) => Layer.Layer<ClientRegistry>
}

/**
 * @since 0.1.0
 */
export declare namespace ClientRegistry {
  /**
   * @since 0.1.0
   * @category Models
   */
  export interface Service {
    /**
     * Register a new connection.
     * Fails with ConnectionLimitExceededError if the limit is reached.
     */
    readonly register: (client: ClientProxy) => Effect.Effect<void, ConnectionLimitExceededError>

    /**
     * Remove a connection and all of its group memberships.
     */
    readonly unregister: (connectionId: ConnectionId, reason?: string) => Effect.Effect<void>

    readonly get: (connectionId: ConnectionId) => Effect.Effect<ClientProxy, ConnectionNotFoundError>

    readonly getAll: Effect.Effect<ReadonlyArray<ClientProxy>>

    readonly count: Effect.Effect<number>

    /**
     * Returns 0 if unlimited.
     */
    readonly maxConnections: number

    /**
     * Stream of registry events.
     */
    readonly events: Stream.Stream<ClientEvent>

    /**
     * Add a connection to a group. Groups are created on first use.
     */
    readonly addToGroup: (
      connectionId: ConnectionId,
      group: string,
    ) => Effect.Effect<void, ConnectionNotFoundError>

    /**
     * Remove a connection from a group. Empty groups are dropped.
     */
    readonly removeFromGroup: (connectionId: ConnectionId, group: string) => Effect.Effect<void>

    readonly groupMembers: (group: string) => Effect.Effect<ReadonlyArray<ClientProxy>>

    readonly groupsOf: (connectionId: ConnectionId) => Effect.Effect<ReadonlyArray<string>>

    /**
     * Call a method on one client.
     */
    readonly sendTo: (
      connectionId: ConnectionId,
      method: string,
      args: ReadonlyArray<unknown>,
    ) => Effect.Effect<void, ConnectionNotFoundError | InvocationError>

    /**
     * Call a method on every member of a group.
     */
    readonly sendToGroup: (
      group: string,
      method: string,
      args: ReadonlyArray<unknown>,
    ) => Effect.Effect<BroadcastResult>

    /**
     * Call a method on every connection, optionally filtered.
     */
    readonly broadcast: (
      method: string,
      args: ReadonlyArray<unknown>,
      filter?: (client: ClientProxy) => boolean,
    ) => Effect.Effect<BroadcastResult>

    /**
     * Close every connection and clear the registry.
     * Called when shutting down the server.
     */
    readonly cleanupAll: Effect.Effect<void>
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Implementation
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Sliding buffer size for registry events; the oldest are dropped first.
 */
const MAX_EVENT_QUEUE_SIZE = 1000

interface RegistryState {
  readonly clients: HashMap.HashMap<ConnectionId, ClientProxy>
  readonly groups: HashMap.HashMap<string, HashSet.HashSet<ConnectionId>>
}

const emptyState: RegistryState = { clients: HashMap.empty(), groups: HashMap.empty() }

const dropFromGroups = (
  groups: RegistryState["groups"],
  connectionId: ConnectionId,
): RegistryState["groups"] =>
  HashMap.reduce(groups, groups, (acc, members, group) => {
    if (!HashSet.has(members, connectionId)) return acc
    const remaining = HashSet.remove(members, connectionId)
    return HashSet.size(remaining) === 0 ? HashMap.remove(acc, group) : HashMap.set(acc, group, remaining)
  })

const fanOut = (clients: ReadonlyArray<ClientProxy>, method: string, args: ReadonlyArray<unknown>) =>
  Effect.gen(function* () {
    const results = yield* Effect.forEach(
      clients,
      (client) =>
        client.invoke(method, args).pipe(
          Effect.as({ success: true as const, connectionId: client.connectionId }),
          Effect.catchAllCause((cause) =>
            Effect.gen(function* () {
              yield* Effect.logWarning("Push to client failed", {
                connectionId: client.connectionId,
                method,
                cause,
              })
              return { success: false as const, connectionId: client.connectionId }
            }),
          ),
        ),
      { concurrency: "unbounded" },
    )

    const failedConnectionIds = results.filter((r) => !r.success).map((r) => r.connectionId)
    return {
      sent: results.length - failedConnectionIds.length,
      failed: failedConnectionIds.length,
      failedConnectionIds,
    } satisfies BroadcastResult
  })

const makeClientRegistry = (config: ClientRegistryConfig = {}) =>
  Effect.gen(function* () {
    const { maxConnections } = { ...defaultClientRegistryConfig, ...config }

    const state = yield* Ref.make(emptyState)
    const eventsPubSub = yield* PubSub.sliding<ClientEvent>(MAX_EVENT_QUEUE_SIZE)

    const get = (connectionId: ConnectionId) =>
      Effect.gen(function* () {
        const client = HashMap.get((yield* Ref.get(state)).clients, connectionId)
        if (Option.isNone(client)) {
          return yield* new ConnectionNotFoundError({ connectionId })
        }
        return client.value
      })

    const groupMembers = (group: string) =>
      Effect.gen(function* () {
        const { clients, groups } = yield* Ref.get(state)
        const members = Option.getOrElse(HashMap.get(groups, group), () => HashSet.empty<ConnectionId>())
        return Array.from(members).flatMap((id) => Option.toArray(HashMap.get(clients, id)))
      })

    const service: ClientRegistry.Service = {
      register: Effect.fn("ClientRegistry.register")(function* (client: ClientProxy) {
        yield* Effect.annotateCurrentSpan("connectionId", client.connectionId)

        // check and insert in one step so concurrent accepts cannot overshoot
        const admitted = yield* Ref.modify(state, (current): [Either.Either<void, number>, RegistryState] => {
          const currentCount = HashMap.size(current.clients)
          if (maxConnections > 0 && currentCount >= maxConnections) {
            return [Either.left(currentCount), current]
          }
          return [
            Either.right(undefined),
            { ...current, clients: HashMap.set(current.clients, client.connectionId, client) },
          ]
        })

        if (Either.isLeft(admitted)) {
          return yield* new ConnectionLimitExceededError({
            currentCount: admitted.left,
            maxConnections,
            connectionId: client.connectionId,
          })
        }

        yield* PubSub.publish(eventsPubSub, { _tag: "Connected", client })
      }),

      unregister: Effect.fn("ClientRegistry.unregister")(function* (
        connectionId: ConnectionId,
        reason?: string,
      ) {
        yield* Effect.annotateCurrentSpan("connectionId", connectionId)
        const existed = yield* Ref.modify(state, (current): [boolean, RegistryState] => {
          if (!HashMap.has(current.clients, connectionId)) {
            return [false, current]
          }
          return [
            true,
            {
              clients: HashMap.remove(current.clients, connectionId),
              groups: dropFromGroups(current.groups, connectionId),
            },
          ]
        })

        if (existed) {
          const event: ClientEvent =
            reason !== undefined
              ? { _tag: "Disconnected", connectionId, reason }
              : { _tag: "Disconnected", connectionId }
          yield* PubSub.publish(eventsPubSub, event)
        }
      }),

      get,

      getAll: Ref.get(state).pipe(Effect.map((current) => Array.from(HashMap.values(current.clients)))),

      count: Ref.get(state).pipe(Effect.map((current) => HashMap.size(current.clients))),

      maxConnections,

      events: Stream.fromPubSub(eventsPubSub),

      addToGroup: (connectionId, group) =>
        Effect.gen(function* () {
          const added = yield* Ref.modify(state, (current): [boolean, RegistryState] => {
            if (!HashMap.has(current.clients, connectionId)) {
              return [false, current]
            }
            const members = Option.getOrElse(HashMap.get(current.groups, group), () =>
              HashSet.empty<ConnectionId>(),
            )
            return [
              true,
              { ...current, groups: HashMap.set(current.groups, group, HashSet.add(members, connectionId)) },
            ]
          })
          if (!added) {
            return yield* new ConnectionNotFoundError({ connectionId })
          }
        }),

      removeFromGroup: (connectionId, group) =>
        Ref.update(state, (current) => {
          const members = HashMap.get(current.groups, group)
          if (Option.isNone(members)) return current
          const remaining = HashSet.remove(members.value, connectionId)
          return {
            ...current,
            groups:
              HashSet.size(remaining) === 0
                ? HashMap.remove(current.groups, group)
                : HashMap.set(current.groups, group, remaining),
          }
        }),

      groupMembers,

      groupsOf: (connectionId) =>
        Ref.get(state).pipe(
          Effect.map((current) =>
            Array.from(HashMap.filter(current.groups, (members) => HashSet.has(members, connectionId)))
              .map(([group]) => group)
              .sort(),
          ),
        ),

      sendTo: (connectionId, method, args) =>
        get(connectionId).pipe(Effect.flatMap((client) => client.invoke(method, args))),

      sendToGroup: Effect.fn("ClientRegistry.sendToGroup")(function* (
        group: string,
        method: string,
        args: ReadonlyArray<unknown>,
      ) {
        yield* Effect.annotateCurrentSpan("group", group)
        return yield* fanOut(yield* groupMembers(group), method, args)
      }),

      broadcast: Effect.fn("ClientRegistry.broadcast")(function* (
        method: string,
        args: ReadonlyArray<unknown>,
        filter?: (client: ClientProxy) => boolean,
      ) {
        yield* Effect.annotateCurrentSpan("method", method)
        const all = Array.from(HashMap.values((yield* Ref.get(state)).clients))
        return yield* fanOut(filter ? all.filter(filter) : all, method, args)
      }),

      cleanupAll: Effect.gen(function* () {
        const current = yield* Ref.get(state)

        yield* Effect.forEach(
          HashMap.values(current.clients),
          (client) =>
            client.close("Server shutdown").pipe(
              Effect.catchAllCause((cause) =>
                Effect.logWarning("Failed to close connection during cleanup", {
                  connectionId: client.connectionId,
                  cause,
                }),
              ),
            ),
          { concurrency: "unbounded", discard: true },
        )

        yield* Ref.set(state, emptyState)
      }),
    }

    return service
  })

// ─────────────────────────────────────────────────────────────────────────────
// Layer
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Create a layer with custom configuration.
 *
 * @example
 * ```ts
 * // Unlimited connections
 * const unlimited = ClientRegistry.layer({ maxConnections: 0 })
 * ```
 *
 * @since 0.1.0
 * @category Layers
 */
export const layer = (config?: ClientRegistryConfig): Layer.Layer<ClientRegistry> =>
  Layer.effect(ClientRegistry, makeClientRegistry(config))

/**
 * @since 0.1.0
 * @category Layers
 */
export const ClientRegistryLive: Layer.Layer<ClientRegistry> = layer()

ClientRegistry.Live = ClientRegistryLive
ClientRegistry.layer = layer
