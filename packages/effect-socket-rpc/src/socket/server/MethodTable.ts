/**
 * @module effect-socket-rpc/socket/server/MethodTable
 *
 * Explicit registration table for the methods a socket handler exposes.
 *
 * Each entry pairs a handler function with a tuple schema describing its
 * positional parameters and, optionally, a schema for its return value. The
 * schemas do the argument coercion (numeric widening, string-to-literal,
 * struct-to-class) and the return-value encoding.
 *
 * @example
 * ```ts
 * import * as Effect from "effect/Effect"
 * import * as Schema from "effect/Schema"
 *
 * const methods = MethodTable.empty
 *   .method("Echo", { parameters: Schema.Tuple(Schema.String), returns: Schema.String },
 *     (text) => Effect.succeed(text))
 *   .method("Notify", { parameters: Schema.Tuple(Schema.String) },
 *     (text) => Effect.log(text))
 * ```
 */

import * as Cause from "effect/Cause"
import * as Effect from "effect/Effect"
import * as HashMap from "effect/HashMap"
import * as Option from "effect/Option"
import * as ParseResult from "effect/ParseResult"
import * as Schema from "effect/Schema"
import * as SchemaAST from "effect/SchemaAST"

import {
  ArgumentConversionError,
  ArgumentMismatchError,
  MethodExecutionError,
} from "../errors.js"
import type { ClientRegistry } from "./ClientRegistry.js"
import type { CurrentConnection } from "./SocketHandler.js"

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Services available to method handlers and hooks.
 */
export type MethodContext = CurrentConnection | ClientRegistry

/**
 * How a method is declared.
 *
 * @since 0.1.0
 * @category Models
 */
export interface MethodDefinition<A extends ReadonlyArray<unknown>, I, R, RI> {
  /** Tuple schema of the positional parameters */
  readonly parameters: Schema.Schema<A, I, never>
  /** Return schema. Leave out for methods that send no reply */
  readonly returns?: Schema.Schema<R, RI, never>
  /** Reply value sent when the call fails. Default: `null` */
  readonly defaultValue?: R
}

/**
 * Number of positional arguments a method accepts.
 * `max` is `Infinity` for tuples with a rest element.
 */
export interface Arity {
  readonly min: number
  readonly max: number
}

/**
 * A method with its types erased, as the dispatcher sees it.
 */
export interface RegisteredMethod {
  /** Name as declared */
  readonly name: string
  /** Unknown when the parameter schema is not a plain tuple */
  readonly arity: Option.Option<Arity>
  /** Whether the method replies */
  readonly hasReturn: boolean
  /** Encoded reply used when the call fails */
  readonly defaultReply: Effect.Effect<unknown>
  /**
   * Decode the arguments, run the handler and encode its result.
   * Resolves to `Option.none()` for methods without a return schema.
   */
  readonly invoke: (
    args: ReadonlyArray<unknown>,
  ) => Effect.Effect<
    Option.Option<unknown>,
    ArgumentMismatchError | ArgumentConversionError | MethodExecutionError,
    MethodContext
  >
}

// ─────────────────────────────────────────────────────────────────────────────
// Arity
// ─────────────────────────────────────────────────────────────────────────────

const arityOf = (ast: SchemaAST.AST): Option.Option<Arity> => {
  switch (ast._tag) {
    case "TupleType": {
      const required = ast.elements.filter((element) => !element.isOptional).length
      return Option.some({
        min: required,
        max: ast.rest.length > 0 ? Infinity : ast.elements.length,
      })
    }
    case "Refinement":
      return arityOf(ast.from)
    case "Transformation":
      return arityOf(ast.from)
    default:
      return Option.none()
  }
}

const describeCause = (cause: Cause.Cause<unknown>): string => {
  const squashed = Cause.squash(cause)
  return squashed instanceof Error ? squashed.message : String(squashed)
}

// ─────────────────────────────────────────────────────────────────────────────
// Registration
// ─────────────────────────────────────────────────────────────────────────────

const register = <A extends ReadonlyArray<unknown>, I, R, RI>(
  name: string,
  definition: MethodDefinition<A, I, R, RI>,
  handler: (...args: NoInfer<A>) => Effect.Effect<R, unknown, MethodContext>,
): RegisteredMethod => {
  const arity = arityOf(definition.parameters.ast)
  const decodeArguments = Schema.decodeUnknown(definition.parameters)
  const returns = definition.returns
  const encodeResult = returns !== undefined ? Schema.encode(returns) : undefined

  const defaultReply: Effect.Effect<unknown> =
    encodeResult !== undefined && definition.defaultValue !== undefined
      ? encodeResult(definition.defaultValue).pipe(Effect.orElseSucceed(() => null))
      : Effect.succeed(null)

  const invoke = (args: ReadonlyArray<unknown>) =>
    Effect.gen(function* () {
      if (Option.isSome(arity) && (args.length < arity.value.min || args.length > arity.value.max)) {
        return yield* new ArgumentMismatchError({
          method: name,
          expected: Number.isFinite(arity.value.max) ? arity.value.max : arity.value.min,
          received: args.length,
        })
      }

      const decoded = yield* decodeArguments(args).pipe(
        Effect.mapError(
          (cause) =>
            new ArgumentConversionError({
              method: name,
              description: ParseResult.TreeFormatter.formatErrorSync(cause),
              cause,
            }),
        ),
      )

      const result = yield* Effect.suspend(() => handler(...decoded)).pipe(
        Effect.catchAllCause((cause) =>
          Effect.fail(
            new MethodExecutionError({
              method: name,
              description: describeCause(cause),
              cause: Cause.squash(cause),
            }),
          ),
        ),
      )

      if (encodeResult === undefined) {
        return Option.none()
      }

      const encoded = yield* encodeResult(result).pipe(
        Effect.mapError(
          (cause) =>
            new MethodExecutionError({
              method: name,
              description: `Return value could not be encoded: ${ParseResult.TreeFormatter.formatErrorSync(cause)}`,
              cause,
            }),
        ),
      )
      return Option.some<unknown>(encoded)
    })

  return { name, arity, hasReturn: returns !== undefined, defaultReply, invoke }
}

// ─────────────────────────────────────────────────────────────────────────────
// Table
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Immutable table of methods keyed by lowercase name.
 *
 * @since 0.1.0
 * @category Constructors
 */
export class MethodTable {
  /**
   * Table with no methods.
   */
  static readonly empty: MethodTable = new MethodTable(HashMap.empty())

  private constructor(readonly entries: HashMap.HashMap<string, RegisteredMethod>) {}

  /**
   * Add a method. Registering a name twice (in any casing) replaces the
   * earlier entry.
   */
  method<A extends ReadonlyArray<unknown>, I, R = void, RI = unknown>(
    name: string,
    definition: MethodDefinition<A, I, R, RI>,
    handler: (...args: NoInfer<A>) => Effect.Effect<R, unknown, MethodContext>,
  ): MethodTable {
    return new MethodTable(
      HashMap.set(this.entries, name.toLowerCase(), register(name, definition, handler)),
    )
  }

  /**
   * Combine two tables. Entries of `that` win on conflict.
   */
  merge(that: MethodTable): MethodTable {
    return new MethodTable(HashMap.union(this.entries, that.entries))
  }

  /**
   * Case-insensitive lookup.
   */
  lookup(name: string): Option.Option<RegisteredMethod> {
    return HashMap.get(this.entries, name.toLowerCase())
  }

  /**
   * Declared names of every method.
   */
  get names(): ReadonlyArray<string> {
    return Array.from(HashMap.values(this.entries), (entry) => entry.name)
  }

  get size(): number {
    return HashMap.size(this.entries)
  }
}
