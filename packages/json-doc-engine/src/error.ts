export class JSONEngineError extends Error {
  constructor(msg: string) {
    super(msg)

    // Set the prototype explicitly for better instanceof support
    Object.setPrototypeOf(this, JSONEngineError.prototype)
  }
}

/**
 * Raised when bytes cannot be read as a JSON document with an object root.
 */
export class InvalidJSONError extends JSONEngineError {
  readonly reason: string

  constructor(reason: string) {
    super(`Invalid JSON: ${reason}`)
    this.reason = reason
    Object.setPrototypeOf(this, InvalidJSONError.prototype)
  }
}

/**
 * Raised when a schema file is not valid JSON or not a valid schema.
 */
export class SchemaParseError extends JSONEngineError {
  readonly reason: string

  constructor(reason: string) {
    super(`Invalid schema: ${reason}`)
    this.reason = reason
    Object.setPrototypeOf(this, SchemaParseError.prototype)
  }
}

/**
 * An edit operation could not be resolved against a tree.
 * Never escapes `applyEdit`; `tryApplyEdit` returns it as data.
 */
export class EditResolutionError extends JSONEngineError {
  constructor(msg: string) {
    super(msg)
    Object.setPrototypeOf(this, EditResolutionError.prototype)
  }
}

export class EngineConfigError extends JSONEngineError {
  readonly issues: readonly string[]

  constructor(issues: readonly string[]) {
    super(`Invalid engine configuration: ${issues.join("; ")}`)
    this.issues = issues
    Object.setPrototypeOf(this, EngineConfigError.prototype)
  }
}

export function failure(message: string): never {
  throw new EditResolutionError(message)
}
