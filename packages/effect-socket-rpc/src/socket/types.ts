/**
 * @module effect-socket-rpc/socket/types
 *
 * Branded IDs and lifecycle types for socket connections.
 */

// ─────────────────────────────────────────────────────────────────────────────
// Branded IDs
// ─────────────────────────────────────────────────────────────────────────────

declare const ConnectionIdBrand: unique symbol

/**
 * Branded string identifier for an accepted socket connection.
 */
export const ConnectionId = (value: string): ConnectionId => value as ConnectionId

/**
 * Type for ConnectionId branded string.
 */
export type ConnectionId = string & { readonly [ConnectionIdBrand]: true }

// ─────────────────────────────────────────────────────────────────────────────
// Lifecycle State
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Lifecycle of a single connection.
 *
 * - `Open`: accepted and receiving
 * - `Closing`: close handshake in flight, or heartbeat timeout detected
 * - `Closed`: transport disposed, registry entry removed, disconnect hook fired
 */
export type LifecycleState =
  | { readonly _tag: "Open" }
  | { readonly _tag: "Closing"; readonly reason: string }
  | { readonly _tag: "Closed"; readonly reason: string }

/**
 * Lifecycle state constructors.
 */
export const LifecycleStateCtor = {
  Open: { _tag: "Open" } as const,
  Closing: (reason: string): LifecycleState => ({ _tag: "Closing", reason }),
  Closed: (reason: string): LifecycleState => ({ _tag: "Closed", reason }),
} as const

// ─────────────────────────────────────────────────────────────────────────────
// Accept Context
// ─────────────────────────────────────────────────────────────────────────────

/**
 * What the hosting server knows about the peer at accept time.
 */
export interface ConnectionContext {
  readonly remoteAddress?: string | undefined
  readonly url?: string | undefined
  readonly headers?: Readonly<Record<string, string | ReadonlyArray<string> | undefined>> | undefined
}

// ─────────────────────────────────────────────────────────────────────────────
// ID Generators (re-exported from internal)
// ─────────────────────────────────────────────────────────────────────────────

import * as internal from "./internal/ids.js"

/**
 * Generate a unique connection ID.
 * Reads the Clock and Random services. A process-wide counter also keeps
 * IDs distinct while the clock stands still.
 *
 * @since 0.1.0
 * @category generators
 */
export const generateConnectionId = internal.generateConnectionId
