/**
 * @module effect-socket-rpc/socket
 *
 * Wire protocol, transport and error types shared by the server pieces.
 */

export * from "./errors.js"
export * from "./protocol.js"
export * from "./transport.js"
export * from "./types.js"
export * as Server from "./server/index.js"
