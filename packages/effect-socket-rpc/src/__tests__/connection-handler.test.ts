import * as Effect from "effect/Effect"
import * as Fiber from "effect/Fiber"
import * as Layer from "effect/Layer"
import * as Schema from "effect/Schema"
import * as TestClock from "effect/TestClock"
import * as TestContext from "effect/TestContext"
import { describe, expect, it } from "vitest"

import { Frame, makeMemoryTransport } from "../socket/transport.js"
import type { ConnectionId, LifecycleState } from "../socket/types.js"
import { ClientRegistry, ClientRegistryLive } from "../socket/server/ClientRegistry.js"
import { acceptConnection } from "../socket/server/ConnectionHandler.js"
import { HeartbeatMonitor } from "../socket/server/HeartbeatMonitor.js"
import { MethodTable } from "../socket/server/MethodTable.js"
import type { SocketHandler } from "../socket/server/SocketHandler.js"
import { CurrentConnection, defineSocketHandler } from "../socket/server/SocketHandler.js"
import { resolveSocketOptions } from "../socket/server/SocketOptions.js"
import { SocketLoggerSilent } from "../shared/logging.js"
import { TestServices, drainSent, nextSent, textFrame } from "./test-utils/index.js"

// ─────────────────────────────────────────────────────────────────────────────
// Fixtures
// ─────────────────────────────────────────────────────────────────────────────

interface Recorded {
  readonly connectionIds: Array<ConnectionId>
  readonly disconnected: Array<LifecycleState>
  readonly texts: Array<string>
  readonly binaries: Array<ReadonlyArray<number>>
  readonly resolveErrors: Array<{ readonly content: string; readonly reason: string }>
  readonly invokeErrors: Array<string>
  readonly notes: Array<string>
}

const makeFixture = () => {
  const recorded: Recorded = {
    connectionIds: [],
    disconnected: [],
    texts: [],
    binaries: [],
    resolveErrors: [],
    invokeErrors: [],
    notes: [],
  }

  const methods = MethodTable.empty
    .method("Echo", { parameters: Schema.Tuple(Schema.String), returns: Schema.String }, (text) =>
      Effect.succeed(text))
    .method("Note", { parameters: Schema.Tuple(Schema.String) }, (text) =>
      Effect.sync(() => {
        recorded.notes.push(text)
      }))
    .method("Join", { parameters: Schema.Tuple(Schema.String) }, (group) =>
      Effect.gen(function* () {
        const connection = yield* CurrentConnection
        const registry = yield* ClientRegistry
        yield* registry.addToGroup(connection.connectionId, group)
      }))

  const handler: SocketHandler = defineSocketHandler({
    methods,
    onConnected: () =>
      Effect.map(CurrentConnection, (connection) => {
        recorded.connectionIds.push(connection.connectionId)
      }),
    onDisconnected: () =>
      Effect.gen(function* () {
        const connection = yield* CurrentConnection
        recorded.disconnected.push(yield* connection.state)
      }),
    onTextReceived: (content) =>
      Effect.sync(() => {
        recorded.texts.push(content)
      }),
    onBinaryReceived: (bytes) =>
      Effect.sync(() => {
        recorded.binaries.push(Array.from(bytes))
      }),
    onResolveError: (content, error) =>
      Effect.sync(() => {
        recorded.resolveErrors.push({ content, reason: error.reason })
      }),
    onInvokeError: (error) =>
      Effect.sync(() => {
        recorded.invokeErrors.push(error.description)
      }),
  })

  return { recorded, handler }
}

const echo = (text: string) => textFrame(`{"method":"Echo","arguments":["${text}"]}`)
const echoReply = (text: string) => `text {"method":"Echo","isReturn":1,"arguments":["${text}"]}`

// ─────────────────────────────────────────────────────────────────────────────
// Tests
// ─────────────────────────────────────────────────────────────────────────────

describe("acceptConnection", () => {
  it("replies, echoes the peer's close and tears down", async () => {
    const { recorded, handler } = makeFixture()

    const program = Effect.gen(function* () {
      const registry = yield* ClientRegistry
      const memory = yield* makeMemoryTransport
      const fiber = yield* Effect.fork(acceptConnection({ transport: memory.transport, handler }))

      yield* memory.deliver(textFrame('{"method":"echo","isReturn":0,"arguments":["hi"]}'))
      expect(yield* nextSent(memory.sent)).toBe('text {"method":"echo","isReturn":1,"arguments":["hi"]}')
      expect(yield* registry.count).toBe(1)

      yield* memory.deliver(Frame.close(1000, "bye"))
      yield* Fiber.join(fiber)

      expect(yield* drainSent(memory.sent)).toEqual(["close 1000 bye"])
      expect(yield* memory.disposed).toBe(true)
      expect(yield* registry.count).toBe(0)
      expect(recorded.connectionIds).toHaveLength(1)
      expect(recorded.disconnected).toEqual([{ _tag: "Closed", reason: "closed by peer (1000)" }])
    })

    await Effect.runPromise(program.pipe(Effect.provide(TestServices)))
  })

  it("does not echo a close without a status", async () => {
    const { recorded, handler } = makeFixture()

    const program = Effect.gen(function* () {
      const memory = yield* makeMemoryTransport
      const fiber = yield* Effect.fork(acceptConnection({ transport: memory.transport, handler }))

      yield* memory.deliver(Frame.close())
      yield* Fiber.join(fiber)

      expect(yield* drainSent(memory.sent)).toEqual([])
      expect(recorded.disconnected).toEqual([{ _tag: "Closed", reason: "closed by peer" }])
    })

    await Effect.runPromise(program.pipe(Effect.provide(TestServices)))
  })

  it("reassembles fragmented messages", async () => {
    const { handler } = makeFixture()

    const program = Effect.gen(function* () {
      const memory = yield* makeMemoryTransport
      const fiber = yield* Effect.fork(acceptConnection({ transport: memory.transport, handler }))

      yield* memory.deliver(textFrame('{"method":"Ec', false))
      yield* memory.deliver(textFrame('ho","arguments":', false))
      yield* memory.deliver(textFrame('["split"]}', true))
      expect(yield* nextSent(memory.sent)).toBe(echoReply("split"))

      yield* memory.deliver(Frame.close(1000))
      yield* Fiber.join(fiber)
    })

    await Effect.runPromise(program.pipe(Effect.provide(TestServices)))
  })

  it("sends nothing for void methods", async () => {
    const { recorded, handler } = makeFixture()

    const program = Effect.gen(function* () {
      const memory = yield* makeMemoryTransport
      const fiber = yield* Effect.fork(acceptConnection({ transport: memory.transport, handler }))

      yield* memory.deliver(textFrame('{"method":"Note","arguments":["first"]}'))
      yield* memory.deliver(echo("after"))

      // the first frame written is the echo reply
      expect(yield* nextSent(memory.sent)).toBe(echoReply("after"))
      expect(recorded.notes).toEqual(["first"])

      yield* Fiber.interrupt(fiber)
    })

    await Effect.runPromise(program.pipe(Effect.provide(TestServices)))
  })

  it("reports bad messages and keeps reading", async () => {
    const { recorded, handler } = makeFixture()

    const program = Effect.gen(function* () {
      const memory = yield* makeMemoryTransport
      const fiber = yield* Effect.fork(acceptConnection({ transport: memory.transport, handler }))

      yield* memory.deliver(textFrame("not json"))
      yield* memory.deliver(Frame.text(Uint8Array.of(0xff)))
      yield* memory.deliver(Frame.binary(Uint8Array.of(1, 2, 3)))
      yield* memory.deliver(textFrame('{"method":"Echo","isReturn":1,"arguments":["late"]}'))
      yield* memory.deliver(textFrame('{"method":"Missing"}'))
      yield* memory.deliver(echo("sync"))

      expect(yield* nextSent(memory.sent)).toBe(echoReply("sync"))
      expect(recorded.texts).toEqual([
        "not json",
        '{"method":"Echo","isReturn":1,"arguments":["late"]}',
        '{"method":"Missing"}',
        '{"method":"Echo","arguments":["sync"]}',
      ])
      expect(recorded.resolveErrors).toEqual([
        { content: "not json", reason: "InvalidMessage" },
        { content: "", reason: "DecodeText" },
      ])
      expect(recorded.binaries).toEqual([[1, 2, 3]])
      expect(recorded.invokeErrors).toEqual(["Method not found: Missing"])

      yield* Fiber.interrupt(fiber)
      expect(yield* drainSent(memory.sent)).toEqual([])
    })

    await Effect.runPromise(program.pipe(Effect.provide(TestServices)))
  })

  it("replies with null when a returning method fails", async () => {
    const { recorded, handler } = makeFixture()

    const program = Effect.gen(function* () {
      const memory = yield* makeMemoryTransport
      const fiber = yield* Effect.fork(acceptConnection({ transport: memory.transport, handler }))

      yield* memory.deliver(textFrame('{"method":"Echo","arguments":[1,2]}'))
      expect(yield* nextSent(memory.sent)).toBe('text {"method":"Echo","isReturn":1,"arguments":[null]}')
      expect(recorded.invokeErrors).toEqual(["Arguments of Echo do not match: expected 1, received 2"])

      yield* Fiber.interrupt(fiber)
    })

    await Effect.runPromise(program.pipe(Effect.provide(TestServices)))
  })

  it("keeps serving when hooks fail", async () => {
    const { handler } = makeFixture()
    const faulty = defineSocketHandler({
      methods: handler.methods,
      onConnected: () => Effect.fail("not ready"),
      onTextReceived: () => Effect.die(new Error("hook crashed")),
    })

    const program = Effect.gen(function* () {
      const memory = yield* makeMemoryTransport
      const fiber = yield* Effect.fork(acceptConnection({ transport: memory.transport, handler: faulty }))

      yield* memory.deliver(echo("still here"))
      expect(yield* nextSent(memory.sent)).toBe(echoReply("still here"))

      yield* Fiber.interrupt(fiber)
    })

    await Effect.runPromise(program.pipe(Effect.provide(TestServices)))
  })

  it("tears down once when the transport fails", async () => {
    const { recorded, handler } = makeFixture()

    const program = Effect.gen(function* () {
      const memory = yield* makeMemoryTransport
      const fiber = yield* Effect.fork(acceptConnection({ transport: memory.transport, handler }))

      yield* memory.fail("network down")
      yield* Fiber.join(fiber)
      // disposing again is a no-op
      yield* memory.transport.dispose

      expect(yield* drainSent(memory.sent)).toEqual([])
      expect(recorded.disconnected).toEqual([
        { _tag: "Closed", reason: "Socket transport error: ReadFailed: network down" },
      ])
    })

    await Effect.runPromise(program.pipe(Effect.provide(TestServices)))
  })

  it("tears down once when interrupted", async () => {
    const { recorded, handler } = makeFixture()

    const program = Effect.gen(function* () {
      const registry = yield* ClientRegistry
      const memory = yield* makeMemoryTransport
      const fiber = yield* Effect.fork(acceptConnection({ transport: memory.transport, handler }))

      yield* memory.deliver(echo("x"))
      yield* nextSent(memory.sent)
      yield* Fiber.interrupt(fiber)

      expect(recorded.disconnected).toEqual([{ _tag: "Closed", reason: "interrupted" }])
      expect(yield* memory.disposed).toBe(true)
      expect(yield* registry.count).toBe(0)
    })

    await Effect.runPromise(program.pipe(Effect.provide(TestServices)))
  })

  it("rejects connections over the limit with 1013", async () => {
    const { recorded, handler } = makeFixture()

    const program = Effect.gen(function* () {
      const first = yield* makeMemoryTransport
      const fiber = yield* Effect.fork(acceptConnection({ transport: first.transport, handler }))
      yield* first.deliver(echo("registered"))
      yield* nextSent(first.sent)

      const second = yield* makeMemoryTransport
      yield* acceptConnection({ transport: second.transport, handler })

      expect(yield* drainSent(second.sent)).toEqual(["close 1013 Connection limit exceeded"])
      expect(yield* second.disposed).toBe(true)
      expect(recorded.connectionIds).toHaveLength(1)
      expect(recorded.disconnected).toEqual([])

      yield* Fiber.interrupt(fiber)
    })

    const LimitedServices = Layer.mergeAll(
      ClientRegistry.layer({ maxConnections: 1 }),
      HeartbeatMonitor.Disabled,
      SocketLoggerSilent,
    )
    await Effect.runPromise(program.pipe(Effect.provide(LimitedServices)))
  })

  describe("pushes", () => {
    it("routes group sends through the connection", async () => {
      const { recorded, handler } = makeFixture()

      const program = Effect.gen(function* () {
        const registry = yield* ClientRegistry
        const memory = yield* makeMemoryTransport
        const fiber = yield* Effect.fork(acceptConnection({ transport: memory.transport, handler }))

        yield* memory.deliver(textFrame('{"method":"Join","arguments":["lobby"]}'))
        yield* memory.deliver(echo("joined"))
        yield* nextSent(memory.sent)

        const [connectionId] = recorded.connectionIds
        if (connectionId === undefined) throw new Error("onConnected did not run")
        expect(yield* registry.groupsOf(connectionId)).toEqual(["lobby"])

        const result = yield* registry.sendToGroup("lobby", "Message", ["hello", 2])
        expect(result).toEqual({ sent: 1, failed: 0, failedConnectionIds: [] })
        expect(yield* nextSent(memory.sent)).toBe('text {"method":"Message","isReturn":0,"arguments":["hello",2]}')

        yield* memory.deliver(Frame.close(1001, "going away"))
        yield* Fiber.join(fiber)

        expect(yield* registry.groupMembers("lobby")).toEqual([])
      })

      await Effect.runPromise(program.pipe(Effect.provide(TestServices)))
    })

    it("reports failed pushes to the invoke-error hook", async () => {
      const { recorded, handler } = makeFixture()

      const program = Effect.gen(function* () {
        const registry = yield* ClientRegistry
        const memory = yield* makeMemoryTransport
        const fiber = yield* Effect.fork(acceptConnection({ transport: memory.transport, handler }))

        yield* memory.deliver(echo("ready"))
        yield* nextSent(memory.sent)
        const [connectionId] = recorded.connectionIds
        if (connectionId === undefined) throw new Error("onConnected did not run")

        yield* memory.breakWrites

        const result = yield* registry.broadcast("Message", ["x"])
        expect(result).toEqual({ sent: 0, failed: 1, failedConnectionIds: [connectionId] })
        expect(recorded.invokeErrors).toEqual([
          "Failed to send Message: Socket send error: SendFailed: write failed",
        ])

        // send never fails; the hook still hears about it
        const client = yield* registry.get(connectionId)
        yield* client.send("Message", "y")
        expect(recorded.invokeErrors).toHaveLength(2)

        yield* Fiber.interrupt(fiber)
      })

      await Effect.runPromise(program.pipe(Effect.provide(TestServices)))
    })

    it("closes through the client handle", async () => {
      const { recorded, handler } = makeFixture()

      const program = Effect.gen(function* () {
        const registry = yield* ClientRegistry
        const memory = yield* makeMemoryTransport
        const fiber = yield* Effect.fork(acceptConnection({ transport: memory.transport, handler }))

        yield* memory.deliver(echo("ready"))
        yield* nextSent(memory.sent)
        const [connectionId] = recorded.connectionIds
        if (connectionId === undefined) throw new Error("onConnected did not run")

        const client = yield* registry.get(connectionId)
        yield* client.close("maintenance")
        expect(yield* nextSent(memory.sent)).toBe("close 1000 maintenance")

        // the peer answers the handshake
        yield* memory.deliver(Frame.close(1000, "maintenance"))
        yield* Fiber.join(fiber)

        expect(yield* drainSent(memory.sent)).toEqual([])
        expect(recorded.disconnected).toEqual([{ _tag: "Closed", reason: "closed by peer (1000)" }])
      })

      await Effect.runPromise(program.pipe(Effect.provide(TestServices)))
    })
  })

  describe("heartbeat", () => {
    const HeartbeatServices = Layer.mergeAll(ClientRegistryLive, HeartbeatMonitor.Live, SocketLoggerSilent)

    it("closes an idle connection and waits for the peer", async () => {
      const { recorded, handler } = makeFixture()

      const program = Effect.gen(function* () {
        const options = yield* resolveSocketOptions({ heartbeatInterval: "1 second", heartbeatTryTimes: 2 })
        const memory = yield* makeMemoryTransport
        const fiber = yield* Effect.fork(acceptConnection({ transport: memory.transport, handler, options }))

        yield* memory.deliver(echo("alive"))
        yield* nextSent(memory.sent)

        yield* TestClock.adjust("1 second")
        expect(yield* drainSent(memory.sent)).toEqual([])

        yield* TestClock.adjust("1 second")
        expect(yield* nextSent(memory.sent)).toBe("close 1000 ")

        yield* memory.deliver(Frame.close(1000))
        yield* Fiber.join(fiber)

        expect(yield* drainSent(memory.sent)).toEqual([])
        expect(recorded.disconnected).toEqual([{ _tag: "Closed", reason: "closed by peer (1000)" }])

        const monitor = yield* HeartbeatMonitor
        expect(yield* monitor.activeCount).toBe(0)
      })

      await Effect.runPromise(
        program.pipe(Effect.provide(HeartbeatServices), Effect.provide(TestContext.TestContext)),
      )
    })

    it("tears down when the peer never answers the close", async () => {
      const { recorded, handler } = makeFixture()

      const program = Effect.gen(function* () {
        const options = yield* resolveSocketOptions({ heartbeatInterval: "1 second", heartbeatTryTimes: 2 })
        const memory = yield* makeMemoryTransport
        const fiber = yield* Effect.fork(acceptConnection({ transport: memory.transport, handler, options }))

        yield* memory.deliver(echo("alive"))
        yield* nextSent(memory.sent)

        yield* TestClock.adjust("2 seconds")
        expect(yield* nextSent(memory.sent)).toBe("close 1000 ")

        yield* TestClock.adjust("1 second")
        yield* Fiber.join(fiber)

        expect(recorded.disconnected).toEqual([{ _tag: "Closed", reason: "heartbeat timeout" }])
        expect(yield* memory.disposed).toBe(true)
      })

      await Effect.runPromise(
        program.pipe(Effect.provide(HeartbeatServices), Effect.provide(TestContext.TestContext)),
      )
    })

    it("counts every message as activity", async () => {
      const { recorded, handler } = makeFixture()

      const program = Effect.gen(function* () {
        const options = yield* resolveSocketOptions({ heartbeatInterval: "1 second", heartbeatTryTimes: 2 })
        const memory = yield* makeMemoryTransport
        const fiber = yield* Effect.fork(acceptConnection({ transport: memory.transport, handler, options }))

        yield* memory.deliver(echo("t0"))
        yield* nextSent(memory.sent)

        yield* TestClock.adjust("1500 millis")
        yield* memory.deliver(textFrame('{"method":"Note","arguments":["ping"]}'))
        yield* memory.deliver(echo("t1.5"))
        yield* nextSent(memory.sent)

        yield* TestClock.adjust("1500 millis")
        expect(yield* drainSent(memory.sent)).toEqual([])
        expect(recorded.notes).toEqual(["ping"])

        yield* Fiber.interrupt(fiber)
      })

      await Effect.runPromise(
        program.pipe(Effect.provide(HeartbeatServices), Effect.provide(TestContext.TestContext)),
      )
    })
  })
})
