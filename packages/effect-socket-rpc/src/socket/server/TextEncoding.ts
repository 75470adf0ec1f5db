/**
 * @module effect-socket-rpc/socket/server/TextEncoding
 *
 * Pluggable text encodings used between frame bytes and formatter text.
 */

// ─────────────────────────────────────────────────────────────────────────────
// Interface
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Converts between text and bytes.
 * Implementations may throw; the codec turns throws into protocol errors.
 */
export interface TextEncoding {
  readonly name: string
  readonly encode: (text: string) => Uint8Array
  readonly decode: (bytes: Uint8Array) => string
}

// ─────────────────────────────────────────────────────────────────────────────
// Implementations
// ─────────────────────────────────────────────────────────────────────────────

const textEncoder = new TextEncoder()
const textDecoder = new TextDecoder("utf-8", { fatal: true })

/**
 * UTF-8. Invalid byte sequences are rejected rather than replaced.
 *
 * @since 0.1.0
 * @category Encodings
 */
export const Utf8: TextEncoding = {
  name: "utf8",
  encode: (text) => textEncoder.encode(text),
  decode: (bytes) => textDecoder.decode(bytes),
}

/**
 * Any encoding Node's `Buffer` understands.
 *
 * @example
 * ```ts
 * const options = { encoding: fromBufferEncoding("latin1") }
 * ```
 *
 * @since 0.1.0
 * @category Encodings
 */
export const fromBufferEncoding = (encoding: BufferEncoding): TextEncoding => ({
  name: encoding,
  encode: (text) => new Uint8Array(Buffer.from(text, encoding)),
  decode: (bytes) => Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString(encoding),
})

const bufferEncodings: ReadonlyArray<BufferEncoding> = [
  "ascii",
  "latin1",
  "binary",
  "ucs2",
  "ucs-2",
  "utf16le",
  "utf-16le",
  "base64",
  "base64url",
  "hex",
]

/**
 * Resolve an encoding by name, e.g. from configuration.
 * Returns `undefined` for unknown names.
 */
export const encodingByName = (name: string): TextEncoding | undefined => {
  const normalized = name.trim().toLowerCase()
  if (normalized === "utf8" || normalized === "utf-8") {
    return Utf8
  }
  const match = bufferEncodings.find((candidate) => candidate === normalized)
  return match !== undefined ? fromBufferEncoding(match) : undefined
}
