import { type Node, type ParseError, parseTree, printParseErrorCode } from "jsonc-parser"
import { InvalidJSONError } from "./error"
import {
  jsonArray,
  jsonBool,
  jsonFloat,
  jsonInt,
  jsonNull,
  jsonString,
  type JSONArray,
  type JSONObject,
  type JSONScalar,
  type JSONValue,
} from "./json"

/**
 * An object member as written in the source: `start` is the opening quote of
 * the key, `keyEnd` is just past its closing quote.
 */
export interface SourceMember {
  readonly key: string
  readonly start: number
  readonly keyEnd: number
  readonly value: SourceNode
}

interface SourceSpan {
  /** Offset of the first character of the value */
  readonly start: number
  /** Offset just past the last character of the value */
  readonly end: number
}

/**
 * A parsed value together with the text span it came from.
 */
export type SourceNode =
  | (SourceSpan & { readonly kind: "scalar"; readonly value: JSONScalar })
  | (SourceSpan & {
      readonly kind: "array"
      readonly value: JSONArray
      readonly items: readonly SourceNode[]
    })
  | (SourceSpan & {
      readonly kind: "object"
      readonly value: JSONObject
      readonly members: readonly SourceMember[]
    })

export interface ParsedSource {
  readonly text: string
  readonly root: SourceNode
}

const BOM = "\uFEFF"

// keeps a byte order mark in the text so that output can reproduce it
const decoder = new TextDecoder("utf-8", { fatal: true, ignoreBOM: true })

const NUMBER_IS_FLOAT = /[.eE]/

/**
 * Decodes UTF-8 bytes; strings pass through.
 * Throws InvalidJSONError on malformed UTF-8.
 */
export function decodeUtf8(input: Uint8Array | string): string {
  if (typeof input === "string") return input
  try {
    return decoder.decode(input)
  } catch (error) {
    if (error instanceof TypeError) {
      throw new InvalidJSONError("content is not valid UTF-8")
    }
    throw error
  }
}

/**
 * Parses strict JSON text (no comments, no trailing commas, unique keys) and
 * keeps the span of every value. A leading byte order mark is skipped.
 *
 * Throws InvalidJSONError on malformed text, including nesting too deep to walk.
 */
export function parseSource(text: string): ParsedSource {
  const offset = text.startsWith(BOM) ? BOM.length : 0
  const body = offset === 0 ? text : text.slice(offset)

  try {
    const errors: ParseError[] = []
    const tree = parseTree(body, errors, {
      disallowComments: true,
      allowTrailingComma: false,
      allowEmptyContent: false,
    })

    if (errors.length > 0 || !tree) {
      const first = errors[0]
      throw new InvalidJSONError(
        first
          ? `${printParseErrorCode(first.error)} at offset ${first.offset + offset}`
          : "empty content"
      )
    }

    return { text, root: convertNode(body, tree, offset) }
  } catch (error) {
    // stack overflow on deeply nested input
    if (error instanceof RangeError) {
      throw new InvalidJSONError("nesting too deep")
    }
    throw error
  }
}

function convertNode(text: string, node: Node, base: number): SourceNode {
  const start = node.offset + base
  const end = node.offset + node.length + base
  const raw: unknown = node.value

  switch (node.type) {
    case "null":
      return { kind: "scalar", start, end, value: jsonNull }

    case "boolean":
      if (typeof raw !== "boolean") throw new InvalidJSONError(`bad boolean at offset ${start}`)
      return { kind: "scalar", start, end, value: jsonBool(raw) }

    case "string":
      if (typeof raw !== "string") throw new InvalidJSONError(`bad string at offset ${start}`)
      return { kind: "scalar", start, end, value: jsonString(raw) }

    case "number": {
      const literal = text.slice(node.offset, node.offset + node.length)
      const value = Number(literal)
      if (!Number.isFinite(value)) {
        throw new InvalidJSONError(`number out of range at offset ${start}: ${literal}`)
      }
      return {
        kind: "scalar",
        start,
        end,
        value: NUMBER_IS_FLOAT.test(literal) ? jsonFloat(value) : jsonInt(value),
      }
    }

    case "array": {
      const items = (node.children ?? []).map((child) => convertNode(text, child, base))
      return { kind: "array", start, end, value: jsonArray(items.map((i) => i.value)), items }
    }

    case "object": {
      const members: SourceMember[] = []
      const entries = new Map<string, JSONValue>()

      for (const property of node.children ?? []) {
        const [keyNode, valueNode] = property.children ?? []
        const key: unknown = keyNode?.value
        if (!keyNode || !valueNode || typeof key !== "string") {
          throw new InvalidJSONError(`incomplete property at offset ${property.offset + base}`)
        }
        if (entries.has(key)) {
          throw new InvalidJSONError(`duplicate key "${key}" at offset ${keyNode.offset + base}`)
        }

        const value = convertNode(text, valueNode, base)
        entries.set(key, value.value)
        members.push({
          key,
          start: keyNode.offset + base,
          keyEnd: keyNode.offset + keyNode.length + base,
          value,
        })
      }

      return { kind: "object", start, end, value: { kind: "object", entries }, members }
    }

    case "property":
      throw new InvalidJSONError(`unexpected property at offset ${start}`)
  }
}
