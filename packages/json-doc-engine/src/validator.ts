import { z } from "zod"
import { InvalidJSONError } from "./error"
import {
  formatPath,
  isNumber,
  jsonNumericEquals,
  type JSONObject,
  jsonTypeName,
  type JSONValue,
  type Path,
} from "./json"
import { getLogger } from "./logging"
import type { Schema } from "./schema"
import { renderScalar, serializeCanonical } from "./serializer"
import { decodeUtf8, parseSource } from "./source"

export type Severity = "error" | "warning"

export type ErrorCode =
  | "typeMismatch"
  | "requiredFieldMissing"
  | "invalidFormat"
  | "patternMismatch"
  | "enumViolation"
  | "minimumViolation"
  | "maximumViolation"
  | "minLengthViolation"
  | "maxLengthViolation"
  | "additionalPropertyNotAllowed"
  | "deprecated"
  | "other"

export interface ValidationError {
  readonly path: Path
  readonly message: string
  readonly severity: Severity
  readonly code: ErrorCode
}

export interface ValidationResult {
  readonly errors: readonly ValidationError[]
  /** True when nothing has `error` severity; warnings do not count */
  readonly isValid: boolean
  readonly errorCount: number
  readonly warningCount: number
  /** Keyed by dotted path, "(root)" for the root */
  readonly errorsByPath: ReadonlyMap<string, readonly ValidationError[]>
}

function issue(path: Path, code: ErrorCode, message: string, severity: Severity = "error") {
  return { path, code, message, severity } satisfies ValidationError
}

export const validationErrors = {
  typeMismatch: (path: Path, expected: string, actual: string) =>
    issue(path, "typeMismatch", `Type mismatch: expected ${expected}, got ${actual}`),
  requiredFieldMissing: (path: Path, field: string) =>
    issue(path, "requiredFieldMissing", `Missing required field: ${field}`),
  invalidFormat: (path: Path, format: string, value: string) =>
    issue(path, "invalidFormat", `Invalid ${format} format: ${value}`, "warning"),
  patternMismatch: (path: Path, pattern: string) =>
    issue(path, "patternMismatch", `Value does not match pattern: ${pattern}`),
  enumViolation: (path: Path, allowed: readonly string[]) =>
    issue(path, "enumViolation", `Value must be one of: ${allowed.join(", ")}`),
  minimumViolation: (path: Path, minimum: number, actual: number) =>
    issue(path, "minimumViolation", `Value ${actual} is less than minimum ${minimum}`),
  maximumViolation: (path: Path, maximum: number, actual: number) =>
    issue(path, "maximumViolation", `Value ${actual} exceeds maximum ${maximum}`),
  minLengthViolation: (path: Path, minLength: number, actual: number) =>
    issue(path, "minLengthViolation", `Length ${actual} is less than minimum ${minLength}`),
  maxLengthViolation: (path: Path, maxLength: number, actual: number) =>
    issue(path, "maxLengthViolation", `Length ${actual} exceeds maximum ${maxLength}`),
  additionalPropertyNotAllowed: (path: Path, name: string) =>
    issue(
      path,
      "additionalPropertyNotAllowed",
      `Additional property not allowed: ${name}`,
      "warning"
    ),
  deprecated: (path: Path) => issue(path, "deprecated", "This field is deprecated", "warning"),
  other: (path: Path, message: string) => issue(path, "other", message),
}

// formats without a checker pass
const formatCheckers: Record<string, z.ZodType<string>> = {
  date: z.string().date(),
  "date-time": z.string().datetime({ offset: true }),
  time: z.string().time(),
  email: z.string().email(),
  uri: z.string().url(),
  url: z.string().url(),
}

const patternCache = new Map<string, RegExp | undefined>()

function compilePattern(pattern: string): RegExp | undefined {
  if (!patternCache.has(pattern)) {
    let compiled: RegExp | undefined
    try {
      compiled = new RegExp(pattern, "u")
    } catch (error) {
      if (!(error instanceof SyntaxError)) throw error
      getLogger("validator").debug({ pattern }, "skipping invalid pattern")
    }
    patternCache.set(pattern, compiled)
  }
  return patternCache.get(pattern)
}

function describeMember(value: JSONValue): string {
  switch (value.kind) {
    case "string":
      return value.value
    case "array":
    case "object":
      return serializeCanonical(value, { indent: "" }) ?? value.kind
    default:
      return renderScalar(value)
  }
}

function matchesType(value: JSONValue, types: readonly string[]): boolean {
  const name = jsonTypeName(value)
  return types.includes(name) || (name === "integer" && types.includes("number"))
}

function validateString(value: string, schema: Schema, path: Path, out: ValidationError[]) {
  if (schema.pattern !== undefined) {
    const regex = compilePattern(schema.pattern)
    if (regex && !regex.test(value)) {
      out.push(validationErrors.patternMismatch(path, schema.pattern))
    }
  }

  if (schema.format !== undefined) {
    const checker = formatCheckers[schema.format]
    if (checker && !checker.safeParse(value).success) {
      out.push(validationErrors.invalidFormat(path, schema.format, value))
    }
  }

  const length = [...value].length
  if (schema.minLength !== undefined && length < schema.minLength) {
    out.push(validationErrors.minLengthViolation(path, schema.minLength, length))
  }
  if (schema.maxLength !== undefined && length > schema.maxLength) {
    out.push(validationErrors.maxLengthViolation(path, schema.maxLength, length))
  }
}

function validateNumber(value: number, schema: Schema, path: Path, out: ValidationError[]) {
  if (schema.minimum !== undefined && value < schema.minimum) {
    out.push(validationErrors.minimumViolation(path, schema.minimum, value))
  }
  if (schema.maximum !== undefined && value > schema.maximum) {
    out.push(validationErrors.maximumViolation(path, schema.maximum, value))
  }
}

function validateObject(value: JSONObject, schema: Schema, path: Path, out: ValidationError[]) {
  for (const field of schema.required) {
    if (!value.entries.has(field)) {
      out.push(validationErrors.requiredFieldMissing(path, field))
    }
  }

  for (const [key, child] of value.entries) {
    const propertySchema = schema.properties?.get(key)
    if (propertySchema) {
      validateValue(child, propertySchema, [...path, key], out)
      continue
    }

    const additional = schema.additionalProperties
    if (additional?.kind === "boolean" && !additional.allowed) {
      out.push(validationErrors.additionalPropertyNotAllowed(path, key))
    } else if (additional?.kind === "schema") {
      validateValue(child, additional.schema, [...path, key], out)
    }
  }
}

function validateValue(value: JSONValue, schema: Schema, path: Path, out: ValidationError[]) {
  if (schema.deprecated) {
    out.push(validationErrors.deprecated(path))
  }

  if (schema.enumValues && !schema.enumValues.some((member) => jsonNumericEquals(member, value))) {
    out.push(validationErrors.enumViolation(path, schema.enumValues.map(describeMember)))
  }

  if (schema.type && !matchesType(value, schema.type)) {
    out.push(validationErrors.typeMismatch(path, schema.type.join(" | "), jsonTypeName(value)))
  }

  if (value.kind === "string") {
    validateString(value.value, schema, path, out)
  } else if (isNumber(value)) {
    validateNumber(value.value, schema, path, out)
  } else if (value.kind === "object") {
    validateObject(value, schema, path, out)
  } else if (value.kind === "array") {
    const count = value.items.length
    if (schema.minLength !== undefined && count < schema.minLength) {
      out.push(validationErrors.minLengthViolation(path, schema.minLength, count))
    }
    if (schema.maxLength !== undefined && count > schema.maxLength) {
      out.push(validationErrors.maxLengthViolation(path, schema.maxLength, count))
    }
    const items = schema.items
    if (items) {
      value.items.forEach((item, index) => {
        validateValue(item, items, [...path, String(index)], out)
      })
    }
  }
}

/**
 * Groups errors by dotted path, keeping their order within each group.
 */
export function groupByPath(
  errors: readonly ValidationError[]
): Map<string, ValidationError[]> {
  const groups = new Map<string, ValidationError[]>()
  for (const error of errors) {
    const key = formatPath(error.path)
    const group = groups.get(key)
    if (group) {
      group.push(error)
    } else {
      groups.set(key, [error])
    }
  }
  return groups
}

function toResult(errors: readonly ValidationError[]): ValidationResult {
  const errorCount = errors.filter((e) => e.severity === "error").length
  return {
    errors,
    isValid: errorCount === 0,
    errorCount,
    warningCount: errors.length - errorCount,
    errorsByPath: groupByPath(errors),
  }
}

/**
 * Checks a tree against a schema and reports every problem found.
 */
export function validate(tree: JSONValue, schema: Schema): ValidationResult {
  const errors: ValidationError[] = []
  validateValue(tree, schema, [], errors)
  const result = toResult(errors)
  getLogger("validator").debug(
    { errorCount: result.errorCount, warningCount: result.warningCount },
    "validation finished"
  )
  return result
}

/**
 * Like `validate`, for raw document bytes.
 * Malformed input gives a single `other` error at the root.
 */
export function validateText(input: Uint8Array | string, schema: Schema): ValidationResult {
  let tree: JSONValue
  try {
    tree = parseSource(decodeUtf8(input)).root.value
  } catch (error) {
    if (!(error instanceof InvalidJSONError)) throw error
    return toResult([validationErrors.other([], error.message)])
  }
  return validate(tree, schema)
}
