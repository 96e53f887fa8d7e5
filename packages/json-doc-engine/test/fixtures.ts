import { fromPlain, type JSONObject, type JSONValue } from "../src/json"

export function value(plain: unknown): JSONValue {
  const converted = fromPlain(plain)
  if (converted === undefined) {
    throw new Error("not representable as JSON")
  }
  return converted
}

export function obj(plain: unknown): JSONObject {
  const converted = value(plain)
  if (converted.kind !== "object") {
    throw new Error(`expected an object, got ${converted.kind}`)
  }
  return converted
}

export const appSchemaText = `{
  "$schema": "http://json-schema.org/draft-07/schema#",
  "title": "App config",
  "type": "object",
  "required": ["name"],
  "additionalProperties": false,
  "properties": {
    "name": { "type": "string", "description": "Display name", "minLength": 1 },
    "port": { "type": ["integer", "null"], "minimum": 1, "maximum": 65535, "default": 8080 },
    "mode": { "enum": ["dev", "prod"] },
    "legacy": { "type": "boolean", "deprecated": true },
    "server": {
      "type": "object",
      "required": ["host"],
      "properties": { "host": { "type": "string", "format": "uri" } }
    },
    "tags": { "type": "array", "maxLength": 3, "items": { "type": "string", "pattern": "^[a-z]+$" } }
  }
}`
