import * as Effect from "effect/Effect"
import * as Either from "effect/Either"
import { describe, expect, it } from "vitest"

import { isSocketError } from "../socket/errors.js"
import { InvocationEnvelope, isRequest, isResponse, makeRequest, makeResponse } from "../socket/protocol.js"
import { defaultMessageCodec, makeMessageCodec } from "../socket/server/MessageCodec.js"
import { JsonFormatter, makeMessageFormatter } from "../socket/server/MessageFormatter.js"
import { Utf8, encodingByName, fromBufferEncoding } from "../socket/server/TextEncoding.js"
import { bytesOf } from "./test-utils/index.js"

const decoder = new TextDecoder()

describe("JsonFormatter", () => {
  it("formats a request with fields in wire order", async () => {
    const text = await Effect.runPromise(JsonFormatter.format(makeRequest("Echo", ["hi", 2])))
    expect(text).toBe('{"method":"Echo","isReturn":0,"arguments":["hi",2]}')
  })

  it("formats a response holding a single value", async () => {
    const text = await Effect.runPromise(JsonFormatter.format(makeResponse("Add", 5)))
    expect(text).toBe('{"method":"Add","isReturn":1,"arguments":[5]}')
  })

  it("defaults a missing direction and missing arguments", async () => {
    const envelope = await Effect.runPromise(JsonFormatter.resolve('{"method":"Ping"}'))
    expect(envelope).toBeInstanceOf(InvocationEnvelope)
    expect(envelope.method).toBe("Ping")
    expect(envelope.isReturn).toBe(0)
    expect(envelope.arguments).toEqual([])
    expect(isRequest(envelope)).toBe(true)
    expect(isResponse(envelope)).toBe(false)
  })

  it("ignores surrounding whitespace", async () => {
    const envelope = await Effect.runPromise(JsonFormatter.resolve('  {"method":"Ping","isReturn":1}\n'))
    expect(envelope.method).toBe("Ping")
    expect(isResponse(envelope)).toBe(true)
  })

  it("rejects text that is not JSON", async () => {
    const result = await Effect.runPromise(Effect.either(JsonFormatter.resolve("not json")))
    expect(Either.isLeft(result)).toBe(true)
    if (Either.isLeft(result)) {
      expect(result.left._tag).toBe("SocketProtocolError")
      expect(result.left.reason).toBe("InvalidMessage")
      expect(result.left.description).toBe("Failed to resolve message: not json")
    }
  })

  it("rejects an envelope without a method", async () => {
    const result = await Effect.runPromise(Effect.either(JsonFormatter.resolve('{"arguments":[1]}')))
    expect(Either.isLeft(result)).toBe(true)
  })

  it("rejects an unknown direction", async () => {
    const result = await Effect.runPromise(Effect.either(JsonFormatter.resolve('{"method":"Ping","isReturn":2}')))
    expect(Either.isLeft(result)).toBe(true)
  })

  it("truncates long content in the error description", async () => {
    const content = "x".repeat(150)
    const result = await Effect.runPromise(Effect.either(JsonFormatter.resolve(content)))
    if (Either.isRight(result)) throw new Error("expected a failure")
    expect(result.left.description).toBe(`Failed to resolve message: ${"x".repeat(100)}`)
  })
})

describe("makeMessageFormatter", () => {
  const PipeFormatter = makeMessageFormatter({
    name: "pipe",
    format: (envelope) => `${envelope.method}|${envelope.isReturn}|${JSON.stringify(envelope.arguments)}`,
    resolve: (text) => {
      const [method, isReturn, args] = text.split("|")
      if (args === undefined) {
        throw new Error("expected three fields")
      }
      const parsed: unknown = JSON.parse(args)
      return { method, isReturn: Number(isReturn), arguments: parsed }
    },
  })

  it("formats through the supplied function", async () => {
    const text = await Effect.runPromise(PipeFormatter.format(makeRequest("Echo", ["a"])))
    expect(text).toBe('Echo|0|["a"]')
  })

  it("validates what the supplied parser returns", async () => {
    const envelope = await Effect.runPromise(PipeFormatter.resolve("Ping|1|[true]"))
    expect(envelope.method).toBe("Ping")
    expect(envelope.isReturn).toBe(1)
    expect(envelope.arguments).toEqual([true])
  })

  it("turns a throwing parser into a parse error", async () => {
    const result = await Effect.runPromise(Effect.either(PipeFormatter.resolve("garbage")))
    if (Either.isRight(result)) throw new Error("expected a failure")
    expect(result.left.reason).toBe("ParseError")
    expect(result.left.description).toBe("Failed to parse message: garbage")
  })

  it("rejects parsed values that are not envelopes", async () => {
    const result = await Effect.runPromise(Effect.either(PipeFormatter.resolve("Ping|7|[]")))
    if (Either.isRight(result)) throw new Error("expected a failure")
    expect(result.left.reason).toBe("InvalidMessage")
    expect(result.left.description).toBe("Message does not match expected schema")
  })
})

describe("TextEncoding", () => {
  it("resolves encodings by name", () => {
    expect(encodingByName("UTF-8")).toBe(Utf8)
    expect(encodingByName(" utf8 ")).toBe(Utf8)
    expect(encodingByName("latin1")?.name).toBe("latin1")
    expect(encodingByName("klingon")).toBeUndefined()
  })

  it("round-trips latin1 text through single bytes", () => {
    const latin1 = fromBufferEncoding("latin1")
    expect(Array.from(latin1.encode("é"))).toEqual([0xe9])
    expect(latin1.decode(Uint8Array.of(0xe9))).toBe("é")
  })
})

describe("MessageCodec", () => {
  it("decodes frame bytes into an envelope", async () => {
    const envelope = await Effect.runPromise(
      defaultMessageCodec.decode(bytesOf('{"method":"Echo","isReturn":0,"arguments":["hi"]}')),
    )
    expect(envelope.method).toBe("Echo")
    expect(envelope.arguments).toEqual(["hi"])
  })

  it("encodes an envelope into frame bytes", async () => {
    const bytes = await Effect.runPromise(defaultMessageCodec.encode(makeResponse("Echo", "hi")))
    expect(decoder.decode(bytes)).toBe('{"method":"Echo","isReturn":1,"arguments":["hi"]}')
  })

  it("rejects bytes that are not valid UTF-8", async () => {
    const result = await Effect.runPromise(Effect.either(defaultMessageCodec.decodeText(Uint8Array.of(0xff))))
    if (Either.isRight(result)) throw new Error("expected a failure")
    expect(result.left.reason).toBe("DecodeText")
    expect(result.left.description).toBe("Payload is not valid utf8")
    expect(isSocketError(result.left)).toBe(true)
    expect(isSocketError(new Error("Payload is not valid utf8"))).toBe(false)
  })

  it("decodes what it encodes, direction included", async () => {
    const request = makeRequest("Move", [{ x: 1, y: 2 }, "north", null])
    const response = makeResponse("Move", true)

    const program = Effect.gen(function* () {
      const decodedRequest = yield* defaultMessageCodec.decode(yield* defaultMessageCodec.encode(request))
      const decodedResponse = yield* defaultMessageCodec.decode(yield* defaultMessageCodec.encode(response))
      return [decodedRequest, decodedResponse] as const
    })
    const [decodedRequest, decodedResponse] = await Effect.runPromise(program)

    expect(decodedRequest).toEqual(request)
    expect(isRequest(decodedRequest)).toBe(true)
    expect(decodedResponse).toEqual(response)
    expect(isResponse(decodedResponse)).toBe(true)
  })

  it("uses the configured encoding in both directions", async () => {
    const codec = makeMessageCodec({ encoding: fromBufferEncoding("latin1"), formatter: JsonFormatter })
    const bytes = await Effect.runPromise(codec.encode(makeRequest("Say", ["é"])))
    expect(bytes.byteLength).toBe('{"method":"Say","isReturn":0,"arguments":["é"]}'.length)
    expect(Array.from(bytes)).toContain(0xe9)

    const envelope = await Effect.runPromise(codec.decode(bytes))
    expect(envelope.method).toBe("Say")
    expect(envelope.arguments).toEqual(["é"])
  })
})
