import equal from "fast-deep-equal/es6"

/**
 * A unique path to a value within a JSON document.
 * Object members are addressed by key, array items by their decimal index ("0", "1", ...).
 */
export type Path = readonly string[]

export type JSONNull = { readonly kind: "null" }
export type JSONBool = { readonly kind: "bool"; readonly value: boolean }

/**
 * A number written without fraction or exponent.
 */
export type JSONInt = { readonly kind: "int"; readonly value: number }

/**
 * A number written with a fraction or exponent.
 */
export type JSONFloat = { readonly kind: "float"; readonly value: number }
export type JSONString = { readonly kind: "string"; readonly value: string }
export type JSONArray = { readonly kind: "array"; readonly items: readonly JSONValue[] }

/**
 * A JSON object. Keys are unique and keep their insertion order
 * (a Map, unlike a plain record, does not hoist integer-like keys).
 */
export type JSONObject = {
  readonly kind: "object"
  readonly entries: ReadonlyMap<string, JSONValue>
}

export type JSONScalar = JSONNull | JSONBool | JSONInt | JSONFloat | JSONString
export type JSONContainer = JSONArray | JSONObject

/**
 * A JSON value.
 */
export type JSONValue = JSONScalar | JSONContainer

/**
 * JSON Schema names of the runtime types.
 */
export type JSONTypeName = "null" | "boolean" | "integer" | "number" | "string" | "array" | "object"

export const jsonNull: JSONNull = { kind: "null" }

export function jsonBool(value: boolean): JSONBool {
  return { kind: "bool", value }
}

export function jsonInt(value: number): JSONInt {
  return { kind: "int", value }
}

export function jsonFloat(value: number): JSONFloat {
  return { kind: "float", value }
}

export function jsonString(value: string): JSONString {
  return { kind: "string", value }
}

export function jsonArray(items: readonly JSONValue[]): JSONArray {
  return { kind: "array", items }
}

export function jsonObject(
  entries: Iterable<readonly [string, JSONValue]> | { readonly [key: string]: JSONValue }
): JSONObject {
  const map = new Map<string, JSONValue>()
  const pairs = isEntryIterable(entries) ? entries : Object.entries(entries)
  for (const [key, value] of pairs) {
    map.set(key, value)
  }
  return { kind: "object", entries: map }
}

function isEntryIterable(
  value: Iterable<readonly [string, JSONValue]> | { readonly [key: string]: JSONValue }
): value is Iterable<readonly [string, JSONValue]> {
  return Symbol.iterator in value
}

/**
 * Converts plain JS data into a JSONValue.
 * Returns undefined for anything JSON cannot hold (undefined, functions, symbols,
 * non-finite numbers, class instances).
 */
export function fromPlain(value: unknown): JSONValue | undefined {
  if (value === null) return jsonNull
  switch (typeof value) {
    case "boolean":
      return jsonBool(value)
    case "string":
      return jsonString(value)
    case "number":
      if (!Number.isFinite(value)) return undefined
      return Number.isInteger(value) ? jsonInt(value) : jsonFloat(value)
    case "bigint":
      return value >= BigInt(Number.MIN_SAFE_INTEGER) && value <= BigInt(Number.MAX_SAFE_INTEGER)
        ? jsonInt(Number(value))
        : undefined
    case "object":
      break
    default:
      return undefined
  }

  if (Array.isArray(value)) {
    const items: JSONValue[] = []
    for (const item of value) {
      const converted = fromPlain(item)
      if (converted === undefined) return undefined
      items.push(converted)
    }
    return jsonArray(items)
  }

  const proto: unknown = Object.getPrototypeOf(value)
  if (proto !== Object.prototype && proto !== null) return undefined

  const entries = new Map<string, JSONValue>()
  for (const [key, item] of Object.entries(value)) {
    const converted = fromPlain(item)
    if (converted === undefined) return undefined
    entries.set(key, converted)
  }
  return { kind: "object", entries }
}

/**
 * Converts a JSONValue into plain JS data.
 * Note: integer-like keys come out first when read back from a plain object.
 */
export function toPlain(value: JSONValue): unknown {
  switch (value.kind) {
    case "null":
      return null
    case "bool":
    case "int":
    case "float":
    case "string":
      return value.value
    case "array":
      return value.items.map(toPlain)
    case "object":
      // defines own properties, so a "__proto__" key stays a key
      return Object.fromEntries([...value.entries].map(([key, item]) => [key, toPlain(item)]))
  }
}

/**
 * Structural equality. Kinds must match (int 1 is not float 1); object key order is ignored.
 */
export function jsonEquals(a: JSONValue, b: JSONValue): boolean {
  return equal(a, b)
}

/**
 * Structural equality where int and float compare by numeric value.
 */
export function jsonNumericEquals(a: JSONValue, b: JSONValue): boolean {
  if (isNumber(a) && isNumber(b)) return a.value === b.value

  switch (a.kind) {
    case "null":
      return b.kind === "null"
    case "bool":
      return b.kind === "bool" && b.value === a.value
    case "string":
      return b.kind === "string" && b.value === a.value
    case "int":
    case "float":
      return false
    case "array":
      return (
        b.kind === "array" &&
        b.items.length === a.items.length &&
        a.items.every((item, i) => jsonNumericEquals(item, b.items[i]))
      )
    case "object": {
      if (b.kind !== "object" || b.entries.size !== a.entries.size) return false
      for (const [key, item] of a.entries) {
        const other = b.entries.get(key)
        if (other === undefined || !jsonNumericEquals(item, other)) return false
      }
      return true
    }
  }
}

export function isNumber(value: JSONValue): value is JSONInt | JSONFloat {
  return value.kind === "int" || value.kind === "float"
}

export function jsonTypeName(value: JSONValue): JSONTypeName {
  switch (value.kind) {
    case "null":
      return "null"
    case "bool":
      return "boolean"
    case "int":
      return "integer"
    case "float":
      return "number"
    case "string":
      return "string"
    case "array":
      return "array"
    case "object":
      return "object"
  }
}

const INDEX_SEGMENT = /^(0|[1-9]\d*)$/

/**
 * Parses a path segment as an array index.
 * Only canonical non-negative decimals qualify ("01" and "-1" do not).
 */
export function parseIndex(segment: string): number | undefined {
  if (!INDEX_SEGMENT.test(segment)) return undefined
  const index = Number(segment)
  return Number.isSafeInteger(index) ? index : undefined
}

/**
 * Reads the value at a path, or undefined when any segment does not resolve.
 */
export function getAt(tree: JSONValue, path: Path): JSONValue | undefined {
  let current: JSONValue = tree
  for (const segment of path) {
    if (current.kind === "object") {
      const next = current.entries.get(segment)
      if (next === undefined) return undefined
      current = next
    } else if (current.kind === "array") {
      const index = parseIndex(segment)
      if (index === undefined || index >= current.items.length) return undefined
      current = current.items[index]
    } else {
      return undefined
    }
  }
  return current
}

/**
 * Dotted key for a path, as stored in edited-path sets.
 */
export function pathKey(path: Path): string {
  return path.join(".")
}

/**
 * Dotted path for display; "(root)" for the empty path.
 */
export function formatPath(path: Path): string {
  return path.length === 0 ? "(root)" : path.join(".")
}
