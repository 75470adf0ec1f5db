/**
 * @module effect-socket-rpc/node
 *
 * Node.js adapter for effect-socket-rpc, built on the `ws` package.
 *
 * @example
 * ```ts
 * import { createSocketServer } from "effect-socket-rpc/node"
 * import { WebSocketServer } from "ws"
 *
 * const server = createSocketServer({ handler: ChatHandler, maxConnections: 5000 })
 * const wss = new WebSocketServer({ port: 3001 })
 *
 * wss.on("connection", (ws, request) => {
 *   Effect.runFork(server.handleConnection(ws, request))
 * })
 * ```
 */

export {
  type WebSocketLike,
  type CreateSocketServerOptions,
  type SocketServer,
  type FlowControl,
  defaultFlowControl,
  createSocketServer,
  fromWebSocket,
  splitIntoFrames,
} from "./ws.js"
