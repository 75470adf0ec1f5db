/**
 * Group chat over socket RPC.
 *
 * Clients send `{"method":"Join","arguments":["lobby"]}` and
 * `{"method":"Say","arguments":["lobby","hello"]}`; members of the group
 * receive `Message` calls.
 */

import * as Effect from "effect/Effect"
import * as Schema from "effect/Schema"
import { WebSocketServer } from "ws"

import { ClientRegistry, CurrentConnection, MethodTable, defineSocketHandler } from "../packages/effect-socket-rpc/src/index.js"
import { createSocketServer } from "../packages/effect-socket-rpc/src/node/index.js"

const methods = MethodTable.empty
  .method("Join", { parameters: Schema.Tuple(Schema.String), returns: Schema.Boolean }, (group) =>
    Effect.gen(function* () {
      const connection = yield* CurrentConnection
      const registry = yield* ClientRegistry
      yield* registry.addToGroup(connection.connectionId, group)
      return true
    }))
  .method("Say", { parameters: Schema.Tuple(Schema.String, Schema.String) }, (group, text) =>
    Effect.gen(function* () {
      const connection = yield* CurrentConnection
      const registry = yield* ClientRegistry
      yield* registry.sendToGroup(group, "Message", [connection.connectionId, text])
    }))

const ChatHandler = defineSocketHandler({
  methods,
  onConnected: () =>
    Effect.flatMap(CurrentConnection, (connection) => connection.client.send("Welcome", connection.connectionId)),
})

const server = createSocketServer({
  handler: ChatHandler,
  options: { heartbeatInterval: "10 seconds" },
})

const port = Number(process.env["PORT"] ?? 3001)
const wss = new WebSocketServer({ port })

wss.on("connection", (ws, request) => {
  Effect.runFork(server.handleConnection(ws, request))
})

Effect.runFork(Effect.logInfo(`Chat server listening on ${port}`))

process.on("SIGINT", () => {
  Effect.runFork(
    Effect.promise(() => server.dispose()).pipe(Effect.andThen(() => wss.close())),
  )
})
