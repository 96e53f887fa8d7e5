import { describe, expect, it } from "vitest"
import { SchemaParseError } from "../src/error"
import { jsonFloat, jsonInt, jsonString } from "../src/json"
import {
  allowsAdditionalProperties,
  extractPropertyInfo,
  isRequired,
  parseSchema,
  parseSchemaValue,
  propertyNames,
  requiredFields,
  schemaAt,
} from "../src/schema"
import { appSchemaText, value } from "./fixtures"

function schemaError(input: string): SchemaParseError | undefined {
  try {
    parseSchema(input)
  } catch (error) {
    if (error instanceof SchemaParseError) return error
    throw error
  }
  return undefined
}

describe("parseSchema", () => {
  const schema = parseSchema(appSchemaText)

  it("reads the top-level keywords", () => {
    expect(schema.$schema).toBe("http://json-schema.org/draft-07/schema#")
    expect(schema.title).toBe("App config")
    expect(schema.type).toStrictEqual(["object"])
    expect(schema.required).toStrictEqual(new Set(["name"]))
    expect(schema.additionalProperties).toStrictEqual({ kind: "boolean", allowed: false })
    expect(schema.deprecated).toBe(false)
    expect(schema.properties && [...schema.properties.keys()]).toStrictEqual([
      "name",
      "port",
      "mode",
      "legacy",
      "server",
      "tags",
    ])
  })

  it("reads property constraints", () => {
    const port = schema.properties?.get("port")
    expect(port?.type).toStrictEqual(["integer", "null"])
    expect(port?.minimum).toBe(1)
    expect(port?.maximum).toBe(65535)
    expect(port?.defaultValue).toStrictEqual(jsonInt(8080))
    expect(schema.properties?.get("mode")?.enumValues).toStrictEqual([
      jsonString("dev"),
      jsonString("prod"),
    ])
    expect(schema.properties?.get("legacy")?.deprecated).toBe(true)
    expect(schema.properties?.get("tags")?.items?.pattern).toBe("^[a-z]+$")
  })

  it("accepts short type names", () => {
    expect(parseSchema('{"type": ["int", "float", "bool"]}').type).toStrictEqual([
      "integer",
      "number",
      "boolean",
    ])
  })

  it("reads a schema for additional properties", () => {
    const parsed = parseSchema('{"additionalProperties": {"type": "string"}}')
    expect(parsed.additionalProperties?.kind).toBe("schema")
  })

  it("ignores keywords it does not use", () => {
    expect(parseSchema('{"$id": "x", "definitions": {}}').required.size).toBe(0)
  })

  it("accepts bytes", () => {
    expect(parseSchema(new TextEncoder().encode('{"title": "t"}')).title).toBe("t")
  })

  it("rejects malformed JSON", () => {
    expect(schemaError("{")?.reason).toMatch(/^invalid JSON in schema file/)
  })

  it("rejects a non-object root", () => {
    expect(schemaError("[]")?.reason).toBe("schema root must be an object, got array")
  })

  it("rejects keywords of the wrong shape", () => {
    expect(schemaError('{"required": "name"}')?.reason).toBe(
      "required: Expected array, received string"
    )
    expect(schemaError('{"type": "text"}')).toBeInstanceOf(SchemaParseError)
    expect(schemaError('{"minLength": -1}')).toBeInstanceOf(SchemaParseError)
  })

  it("names the nested schema that has the wrong shape", () => {
    expect(schemaError('{"properties": {"a": {"items": "x"}}}')?.reason).toBe(
      "properties.a.items: Expected object, received string"
    )
    expect(schemaError('{"properties": {"a": {"required": 1}}}')?.reason).toBe(
      "properties.a.required: Expected array, received number"
    )
  })

  it("keeps a property named __proto__", () => {
    const parsed = parseSchema('{"properties": {"__proto__": {"type": "string"}}}')
    expect(parsed.properties && [...parsed.properties.keys()]).toStrictEqual(["__proto__"])
    expect(parsed.properties?.get("__proto__")?.type).toStrictEqual(["string"])
  })

  it("keeps properties in file order, integer-like names included", () => {
    const parsed = parseSchema('{"properties": {"b": {}, "10": {}, "a": {}}}')
    expect(parsed.properties && [...parsed.properties.keys()]).toStrictEqual(["b", "10", "a"])
  })

  it("keeps float and integer kinds in enum and default", () => {
    const parsed = parseSchema('{"enum": [1.0, 2], "default": 1.0}')
    expect(parsed.enumValues).toStrictEqual([jsonFloat(1), jsonInt(2)])
    expect(parsed.defaultValue).toStrictEqual(jsonFloat(1))
  })

  it("builds from an already-parsed value", () => {
    expect(parseSchemaValue(value({ required: ["a", "b"] })).required).toStrictEqual(
      new Set(["a", "b"])
    )
  })
})

describe("property info", () => {
  const schema = parseSchema(appSchemaText)

  it("flattens nested properties by dotted path", () => {
    const info = extractPropertyInfo(schema)
    expect([...info.keys()]).toStrictEqual([
      "name",
      "port",
      "mode",
      "legacy",
      "server",
      "server.host",
      "tags",
    ])

    const port = info.get("port")
    expect(port?.typeString).toBe("integer | null")
    expect(port?.isRequired).toBe(false)
    expect(port?.defaultValue).toStrictEqual(jsonInt(8080))

    expect(info.get("name")?.isRequired).toBe(true)
    expect(info.get("name")?.minLength).toBe(1)
    expect(info.get("name")?.description).toBe("Display name")
    expect(info.get("legacy")?.isDeprecated).toBe(true)

    const host = info.get("server.host")
    expect(host?.path).toStrictEqual(["server", "host"])
    expect(host?.isRequired).toBe(true)
    expect(host?.format).toBe("uri")
  })

  it("prefixes a base path", () => {
    const server = schemaAt(schema, ["server"])
    if (!server) throw new Error("missing server schema")
    expect([...extractPropertyInfo(server, ["server"]).keys()]).toStrictEqual(["server.host"])
  })

  it("lets deeper entries win on a key collision", () => {
    const colliding = parseSchema(
      '{"properties": {"a.b": {"type": "string"}, "a": {"properties": {"b": {"type": "integer"}}}}}'
    )
    expect(extractPropertyInfo(colliding).get("a.b")?.typeString).toBe("integer")
  })

  it("has an empty type string for untyped properties", () => {
    expect(extractPropertyInfo(schema).get("mode")?.typeString).toBe("")
  })
})

describe("schema lookups", () => {
  const schema = parseSchema(appSchemaText)

  it("walks properties and array items", () => {
    expect(schemaAt(schema, ["server", "host"])?.format).toBe("uri")
    expect(schemaAt(schema, ["tags", "0"])?.pattern).toBe("^[a-z]+$")
    expect(schemaAt(schema, ["missing"])).toBeUndefined()
    expect(schemaAt(schema, [])).toBe(schema)
  })

  it("answers required and additional property questions", () => {
    expect(requiredFields(schema)).toStrictEqual(new Set(["name"]))
    expect(requiredFields(schema, ["server"])).toStrictEqual(new Set(["host"]))
    expect(requiredFields(schema, ["missing"]).size).toBe(0)
    expect(isRequired(schema, "host", ["server"])).toBe(true)
    expect(isRequired(schema, "port")).toBe(false)
    expect(allowsAdditionalProperties(schema)).toBe(false)
    expect(allowsAdditionalProperties(schema, ["server"])).toBe(true)
    expect(allowsAdditionalProperties(schema, ["missing"])).toBe(true)
  })

  it("lists property names in sorted order", () => {
    expect(propertyNames(schema)).toStrictEqual(["legacy", "mode", "name", "port", "server", "tags"])
  })
})
