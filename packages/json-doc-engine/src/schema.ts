import { z } from "zod"
import { InvalidJSONError, SchemaParseError } from "./error"
import {
  formatPath,
  type JSONObject,
  jsonTypeName,
  type JSONTypeName,
  type JSONValue,
  type Path,
  pathKey,
  toPlain,
} from "./json"
import { getLogger } from "./logging"
import { decodeUtf8, parseSource } from "./source"

export type SchemaTypeName = JSONTypeName

export type AdditionalProperties =
  | { readonly kind: "boolean"; readonly allowed: boolean }
  | { readonly kind: "schema"; readonly schema: Schema }

/**
 * The subset of JSON Schema used for validation and property hints.
 */
export interface Schema {
  readonly $schema?: string
  readonly title?: string
  readonly description?: string
  readonly type?: readonly SchemaTypeName[]
  readonly properties?: ReadonlyMap<string, Schema>
  readonly required: ReadonlySet<string>
  readonly items?: Schema
  readonly additionalProperties?: AdditionalProperties
  readonly pattern?: string
  readonly format?: string
  readonly enumValues?: readonly JSONValue[]
  readonly minimum?: number
  readonly maximum?: number
  /** Characters for strings, items for arrays */
  readonly minLength?: number
  readonly maxLength?: number
  readonly deprecated: boolean
  readonly defaultValue?: JSONValue
}

/**
 * Flattened description of one property, for editors and hints.
 */
export interface PropertyInfo {
  readonly path: Path
  readonly pathString: string
  readonly type: readonly SchemaTypeName[]
  readonly typeString: string
  readonly description?: string
  readonly format?: string
  readonly pattern?: string
  readonly enumValues?: readonly JSONValue[]
  readonly isRequired: boolean
  readonly isDeprecated: boolean
  readonly minimum?: number
  readonly maximum?: number
  readonly minLength?: number
  readonly maxLength?: number
  readonly defaultValue?: JSONValue
}

const TYPE_ALIASES = { int: "integer", float: "number", bool: "boolean" } as const

const TypeNameSchema = z
  .enum(["string", "integer", "number", "boolean", "null", "array", "object", "int", "float", "bool"])
  .transform((name): SchemaTypeName => {
    switch (name) {
      case "int":
      case "float":
      case "bool":
        return TYPE_ALIASES[name]
      default:
        return name
    }
  })

const count = z.number().int().nonnegative()

const subschema = z.record(z.unknown())

// checks one schema object; nested schemas are checked as they are built
// unknown keywords are stripped
const SchemaNodeSchema = z.object({
  $schema: z.string().optional(),
  title: z.string().optional(),
  description: z.string().optional(),
  type: z.union([TypeNameSchema, z.array(TypeNameSchema).nonempty()]).optional(),
  properties: z.record(subschema).optional(),
  required: z.array(z.string()).optional(),
  items: subschema.optional(),
  additionalProperties: z.union([z.boolean(), subschema]).optional(),
  pattern: z.string().optional(),
  format: z.string().optional(),
  enum: z.array(z.unknown()).optional(),
  minimum: z.number().optional(),
  maximum: z.number().optional(),
  minLength: count.optional(),
  maxLength: count.optional(),
  deprecated: z.boolean().optional(),
  default: z.unknown().optional(),
})

function buildChild(value: JSONValue, path: Path): Schema {
  if (value.kind !== "object") {
    throw new SchemaParseError(
      `${formatPath(path)}: Expected object, received ${jsonTypeName(value)}`
    )
  }
  return buildSchema(value, path)
}

/**
 * Child schemas, `enum` and `default` are read from the tree itself so that
 * key order, int/float kinds and keys such as "__proto__" survive.
 */
function buildSchema(node: JSONObject, path: Path): Schema {
  const parsed = SchemaNodeSchema.safeParse(toPlain(node))
  if (!parsed.success) {
    const issues = parsed.error.issues.map(
      (issue) => `${formatPath([...path, ...issue.path.map(String)])}: ${issue.message}`
    )
    throw new SchemaParseError(issues.join("; "))
  }
  const raw = parsed.data

  let properties: Map<string, Schema> | undefined
  const propertiesNode = node.entries.get("properties")
  if (propertiesNode?.kind === "object") {
    properties = new Map()
    for (const [key, child] of propertiesNode.entries) {
      properties.set(key, buildChild(child, [...path, "properties", key]))
    }
  }

  const itemsNode = node.entries.get("items")
  const additionalNode = node.entries.get("additionalProperties")
  let additionalProperties: AdditionalProperties | undefined
  if (additionalNode?.kind === "bool") {
    additionalProperties = { kind: "boolean", allowed: additionalNode.value }
  } else if (additionalNode) {
    additionalProperties = {
      kind: "schema",
      schema: buildChild(additionalNode, [...path, "additionalProperties"]),
    }
  }

  const enumNode = node.entries.get("enum")

  return {
    $schema: raw.$schema,
    title: raw.title,
    description: raw.description,
    type: raw.type === undefined ? undefined : typeof raw.type === "string" ? [raw.type] : raw.type,
    properties,
    required: new Set(raw.required),
    items: itemsNode ? buildChild(itemsNode, [...path, "items"]) : undefined,
    additionalProperties,
    pattern: raw.pattern,
    format: raw.format,
    enumValues: enumNode?.kind === "array" ? enumNode.items : undefined,
    minimum: raw.minimum,
    maximum: raw.maximum,
    minLength: raw.minLength,
    maxLength: raw.maxLength,
    deprecated: raw.deprecated ?? false,
    defaultValue: node.entries.get("default"),
  }
}

/**
 * Builds a schema from an already-parsed value.
 * Throws SchemaParseError when the value does not have the shape of a schema.
 */
export function parseSchemaValue(value: JSONValue): Schema {
  if (value.kind !== "object") {
    throw new SchemaParseError(`schema root must be an object, got ${value.kind}`)
  }
  return buildSchema(value, [])
}

/**
 * Parses a schema file.
 * Throws SchemaParseError for invalid JSON, a non-object root or an unsupported shape.
 */
export function parseSchema(input: Uint8Array | string): Schema {
  try {
    let root: JSONValue
    try {
      root = parseSource(decodeUtf8(input)).root.value
    } catch (error) {
      if (error instanceof InvalidJSONError) {
        throw new SchemaParseError(`invalid JSON in schema file (${error.reason})`)
      }
      throw error
    }
    return parseSchemaValue(root)
  } catch (error) {
    if (error instanceof SchemaParseError) {
      getLogger("schema").debug({ reason: error.reason }, "failed to parse schema")
    }
    throw error
  }
}

/**
 * Every property reachable through nested `properties`, keyed by dotted path.
 * Entries found deeper in the walk replace earlier ones with the same key.
 */
export function extractPropertyInfo(
  schema: Schema,
  basePath: Path = []
): Map<string, PropertyInfo> {
  const result = new Map<string, PropertyInfo>()
  collectProperties(schema, basePath, result)
  return result
}

function collectProperties(schema: Schema, basePath: Path, result: Map<string, PropertyInfo>) {
  if (!schema.properties) return
  for (const [key, property] of schema.properties) {
    const path = [...basePath, key]
    const type = property.type ?? []
    result.set(pathKey(path), {
      path,
      pathString: pathKey(path),
      type,
      typeString: type.join(" | "),
      description: property.description,
      format: property.format,
      pattern: property.pattern,
      enumValues: property.enumValues,
      isRequired: schema.required.has(key),
      isDeprecated: property.deprecated,
      minimum: property.minimum,
      maximum: property.maximum,
      minLength: property.minLength,
      maxLength: property.maxLength,
      defaultValue: property.defaultValue,
    })
    collectProperties(property, path, result)
  }
}

/**
 * Sub-schema describing the value at `path`, following `properties` and then `items`.
 */
export function schemaAt(schema: Schema, path: Path): Schema | undefined {
  let current: Schema | undefined = schema
  for (const segment of path) {
    if (current === undefined) return undefined
    current = current.properties?.get(segment) ?? current.items
  }
  return current
}

const noFields: ReadonlySet<string> = new Set()

export function requiredFields(schema: Schema, path: Path = []): ReadonlySet<string> {
  return schemaAt(schema, path)?.required ?? noFields
}

/**
 * False only when the object at `path` says `additionalProperties: false`.
 */
export function allowsAdditionalProperties(schema: Schema, path: Path = []): boolean {
  const additional = schemaAt(schema, path)?.additionalProperties
  return additional?.kind !== "boolean" || additional.allowed
}

export function isRequired(schema: Schema, field: string, path: Path = []): boolean {
  return requiredFields(schema, path).has(field)
}

export function propertyNames(schema: Schema): string[] {
  return schema.properties ? [...schema.properties.keys()].sort() : []
}
