import { describe, expect, it } from "vitest"
import { jsonFloat, jsonObject } from "../src/json"
import { parseSchema } from "../src/schema"
import { groupByPath, validate, validateText, validationErrors } from "../src/validator"
import { appSchemaText, value } from "./fixtures"

function messages(schemaText: string, plain: unknown): string[] {
  return validate(value(plain), parseSchema(schemaText)).errors.map((e) => e.message)
}

describe("validate", () => {
  it("reports a missing required field at the object's path", () => {
    const schema = parseSchema('{"required": ["translation", "notes"]}')
    const result = validate(value({ translation: "hi" }), schema)
    expect(result.errors).toStrictEqual([
      {
        path: [],
        code: "requiredFieldMissing",
        message: "Missing required field: notes",
        severity: "error",
      },
    ])
    expect(result.isValid).toBe(false)
  })

  it("reports every problem in a document, in walk order", () => {
    const result = validate(
      value({
        name: "",
        port: 0,
        mode: "test",
        legacy: true,
        server: { host: "not a url" },
        tags: ["ok", "Bad", "x", "y"],
        extra: 1,
      }),
      parseSchema(appSchemaText)
    )

    expect(result.errors.map((e) => [e.path.join("."), e.code, e.severity, e.message])).toStrictEqual(
      [
        ["name", "minLengthViolation", "error", "Length 0 is less than minimum 1"],
        ["port", "minimumViolation", "error", "Value 0 is less than minimum 1"],
        ["mode", "enumViolation", "error", "Value must be one of: dev, prod"],
        ["legacy", "deprecated", "warning", "This field is deprecated"],
        ["server.host", "invalidFormat", "warning", "Invalid uri format: not a url"],
        ["tags", "maxLengthViolation", "error", "Length 4 exceeds maximum 3"],
        ["tags.1", "patternMismatch", "error", "Value does not match pattern: ^[a-z]+$"],
        ["", "additionalPropertyNotAllowed", "warning", "Additional property not allowed: extra"],
      ]
    )
    expect(result.isValid).toBe(false)
    expect(result.errorCount).toBe(5)
    expect(result.warningCount).toBe(3)
    expect([...result.errorsByPath.keys()]).toStrictEqual([
      "name",
      "port",
      "mode",
      "legacy",
      "server.host",
      "tags",
      "tags.1",
      "(root)",
    ])
  })

  it("accepts a valid document", () => {
    const result = validate(
      value({ name: "app", port: null, mode: "prod", server: { host: "https://example.com" } }),
      parseSchema(appSchemaText)
    )
    expect(result.errors).toStrictEqual([])
    expect(result.isValid).toBe(true)
  })

  it("counts warnings as valid", () => {
    const result = validate(value({ name: "app", legacy: false }), parseSchema(appSchemaText))
    expect(result.isValid).toBe(true)
    expect(result.warningCount).toBe(1)
  })
})

describe("types", () => {
  it("lets integers satisfy number", () => {
    expect(messages('{"type": "number"}', 3)).toStrictEqual([])
  })

  it("does not let floats satisfy integer", () => {
    expect(messages('{"type": "integer"}', 1.5)).toStrictEqual([
      "Type mismatch: expected integer, got number",
    ])
  })

  it("lists every allowed type", () => {
    expect(messages('{"type": ["integer", "null"]}', "5")).toStrictEqual([
      "Type mismatch: expected integer | null, got string",
    ])
  })

  it("checks enum and type independently", () => {
    expect(messages('{"type": "string", "enum": ["a"]}', 1)).toStrictEqual([
      "Value must be one of: a",
      "Type mismatch: expected string, got integer",
    ])
  })

  it("compares enum members numerically", () => {
    const schema = parseSchema('{"enum": [1, 2]}')
    expect(validate(jsonFloat(1), schema).errors).toStrictEqual([])
    expect(validate(jsonFloat(1.5), schema).errors.map((e) => e.message)).toStrictEqual([
      "Value must be one of: 1, 2",
    ])
  })
})

describe("strings", () => {
  it("counts length in code points", () => {
    expect(messages('{"maxLength": 1}', "\u{1F600}\u{1F600}")).toStrictEqual([
      "Length 2 exceeds maximum 1",
    ])
    expect(messages('{"maxLength": 2}', "\u{1F600}\u{1F600}")).toStrictEqual([])
  })

  it("skips invalid patterns", () => {
    expect(messages('{"pattern": "("}', "anything")).toStrictEqual([])
  })

  it("checks formats as warnings", () => {
    const check = (format: string, text: string) =>
      validate(value(text), parseSchema(`{"format": "${format}"}`)).errors.map((e) => e.severity)

    expect(check("date", "2024-02-29")).toStrictEqual([])
    expect(check("date", "2023-02-29")).toStrictEqual(["warning"])
    expect(check("date-time", "2024-01-01T10:00:00Z")).toStrictEqual([])
    expect(check("date-time", "2024-01-01T10:00:00+02:00")).toStrictEqual([])
    expect(check("date-time", "2024-01-01 10:00")).toStrictEqual(["warning"])
    expect(check("time", "23:59:59")).toStrictEqual([])
    expect(check("time", "24:00:00")).toStrictEqual(["warning"])
    expect(check("email", "dev@example.com")).toStrictEqual([])
    expect(check("email", "nope")).toStrictEqual(["warning"])
    expect(check("url", "https://example.com/a?b=1")).toStrictEqual([])
    expect(check("color", "whatever")).toStrictEqual([])
  })
})

describe("numbers", () => {
  it("checks bounds", () => {
    expect(messages('{"minimum": 1, "maximum": 10}', 11)).toStrictEqual([
      "Value 11 exceeds maximum 10",
    ])
    expect(messages('{"minimum": 0.5}', 0.25)).toStrictEqual(["Value 0.25 is less than minimum 0.5"])
    expect(messages('{"minimum": 1, "maximum": 10}', 10)).toStrictEqual([])
  })
})

describe("objects and arrays", () => {
  it("validates extra keys against an additional properties schema", () => {
    const result = validate(
      value({ a: 1 }),
      parseSchema('{"additionalProperties": {"type": "string"}}')
    )
    expect(result.errors).toStrictEqual([
      {
        path: ["a"],
        code: "typeMismatch",
        message: "Type mismatch: expected string, got integer",
        severity: "error",
      },
    ])
  })

  it("allows extra keys by default", () => {
    expect(messages('{"properties": {"a": {"type": "string"}}}', { b: 1 })).toStrictEqual([])
  })

  it("checks array size and every item", () => {
    const result = validate(
      value([1, "two", 3]),
      parseSchema('{"minLength": 4, "items": {"type": "integer"}}')
    )
    expect(result.errors.map((e) => [e.path, e.message])).toStrictEqual([
      [[], "Length 3 is less than minimum 4"],
      [["1"], "Type mismatch: expected integer, got string"],
    ])
  })

  it("reaches nested values", () => {
    const schema = parseSchema(
      '{"properties": {"list": {"items": {"properties": {"id": {"type": "integer"}}}}}}'
    )
    const result = validate(jsonObject([["list", value([{ id: 1 }, { id: "x" }])]]), schema)
    expect(result.errors.map((e) => e.path)).toStrictEqual([["list", "1", "id"]])
  })
})

describe("groupByPath", () => {
  it("groups errors and keeps their order", () => {
    const first = validationErrors.requiredFieldMissing([], "a")
    const second = validationErrors.deprecated(["x"])
    const third = validationErrors.requiredFieldMissing([], "b")
    expect(groupByPath([first, second, third])).toStrictEqual(
      new Map([
        ["(root)", [first, third]],
        ["x", [second]],
      ])
    )
  })
})

describe("validateText", () => {
  it("validates bytes", () => {
    const result = validateText(
      new TextEncoder().encode('{"translation": "hi"}'),
      parseSchema('{"required": ["translation", "notes"]}')
    )
    expect(result.errorCount).toBe(1)
  })

  it("turns malformed input into a single error at the root", () => {
    const result = validateText("{oops", parseSchema("{}"))
    expect(result.errors).toHaveLength(1)
    expect(result.errors[0].code).toBe("other")
    expect(result.errors[0].path).toStrictEqual([])
    expect(result.errors[0].message).toMatch(/^Invalid JSON: /)
    expect(result.isValid).toBe(false)
  })
})
