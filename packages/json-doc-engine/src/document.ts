import { freeze } from "immer"
import { nanoid } from "nanoid"
import { type ChangeStatus, computeChanges } from "./diff"
import { InvalidJSONError } from "./error"
import { type JSONObject, type JSONValue, type Path, pathKey } from "./json"
import { getLogger } from "./logging"
import { type EditOp, editTargetPath, tryApplyEdit } from "./operations"
import { serialize, type SerializeOptions } from "./serializer"
import { decodeUtf8, parseSource } from "./source"

/**
 * Any document that can be shown and edited as a JSON tree.
 * Every update returns a new snapshot; implementations never mutate in place.
 */
export interface JSONEditable<Self> {
  /** File path or URL the document was loaded from */
  readonly location: string

  /** Current content; the root is always an object */
  readonly content: JSONObject

  /** Text as first loaded, for change detection and layout preservation */
  readonly originalText: string | undefined

  /** Whether serializing the content gives something other than the original text */
  readonly hasChanges: boolean

  /**
   * Sets the value at `path`.
   * Returns undefined when the path does not resolve; the current snapshot stays valid.
   */
  withUpdatedValue(value: JSONValue, path: Path): Self | undefined

  /** Replaces the whole content */
  withUpdatedContent(content: JSONObject): Self

  /** UTF-8 bytes of the serialized content, or undefined if it cannot be represented */
  serialize(): Uint8Array | undefined
}

export interface JSONDocumentInit {
  /** Defaults to a fresh random id */
  id?: string
  location: string
  content: JSONObject
  originalText?: string
  editedPaths?: Iterable<string>
}

const encoder = new TextEncoder()

/**
 * A JSON file with change tracking.
 *
 * Keeps the text it was loaded from, so that serialization can reproduce the
 * original layout outside edited regions and `hasChanges` can compare text.
 */
export class JSONDocument implements JSONEditable<JSONDocument> {
  readonly id: string
  readonly location: string
  readonly content: JSONObject
  readonly originalText: string | undefined

  /**
   * Dotted paths touched by successful edits since load.
   * Only a hint for the UI; `hasChanges` never looks at it.
   */
  readonly editedPaths: ReadonlySet<string>

  private readonly serializeOptions: SerializeOptions

  private constructor(init: JSONDocumentInit, serializeOptions: SerializeOptions) {
    this.id = init.id ?? nanoid()
    this.location = init.location
    this.content = freeze(init.content, true)
    this.originalText = init.originalText
    this.editedPaths = new Set(init.editedPaths)
    this.serializeOptions = serializeOptions
  }

  /**
   * Parses a document from bytes or text.
   * Throws InvalidJSONError when the input is malformed or its root is not an object.
   */
  static parse(
    input: Uint8Array | string,
    location: string,
    serializeOptions: SerializeOptions = {}
  ): JSONDocument {
    try {
      const text = decodeUtf8(input)
      const { root } = parseSource(text)
      if (root.kind !== "object") {
        throw new InvalidJSONError(`top-level value must be an object, got ${root.value.kind}`)
      }
      return new JSONDocument({ location, content: root.value, originalText: text }, serializeOptions)
    } catch (error) {
      if (error instanceof InvalidJSONError) {
        getLogger("document").debug({ location, reason: error.reason }, "failed to parse document")
      }
      throw error
    }
  }

  /**
   * Builds a document from an existing tree (no original text unless given).
   */
  static create(init: JSONDocumentInit, serializeOptions: SerializeOptions = {}): JSONDocument {
    return new JSONDocument(init, serializeOptions)
  }

  /** File name without extension */
  get name(): string {
    const fileName = this.fileName
    const dot = fileName.lastIndexOf(".")
    return dot > 0 ? fileName.slice(0, dot) : fileName
  }

  get fileName(): string {
    const segments = this.location.split(/[\\/]/)
    return segments[segments.length - 1]
  }

  get hasChanges(): boolean {
    if (this.originalText === undefined) return false
    return this.serializeText() !== this.originalText
  }

  private next(content: JSONObject, editedPaths: Iterable<string>): JSONDocument {
    return new JSONDocument(
      {
        id: this.id,
        location: this.location,
        content,
        originalText: this.originalText,
        editedPaths,
      },
      this.serializeOptions
    )
  }

  /**
   * Applies an edit operation.
   * Returns undefined when the operation does not resolve.
   */
  apply(op: EditOp): JSONDocument | undefined {
    const result = tryApplyEdit(this.content, op)
    if (!result.ok) {
      return undefined
    }
    return this.next(result.value, [...this.editedPaths, pathKey(editTargetPath(op))])
  }

  withUpdatedValue(value: JSONValue, path: Path): JSONDocument | undefined {
    return this.apply({ kind: "setValue", path, value })
  }

  /**
   * Replaces the content wholesale, e.g. after the file changed on disk.
   * Edited paths are cleared since the origin of the new tree is unknown.
   */
  withUpdatedContent(content: JSONObject): JSONDocument {
    return this.next(content, [])
  }

  serializeText(): string | undefined {
    return serialize(this.content, this.originalText, this.serializeOptions)
  }

  serialize(): Uint8Array | undefined {
    const text = this.serializeText()
    return text === undefined ? undefined : encoder.encode(text)
  }

  /**
   * Per-path change status of the content against the original text.
   * Empty when there is no original text or it does not parse.
   */
  changes(): Map<string, ChangeStatus> {
    if (this.originalText === undefined) return new Map()
    try {
      return computeChanges(this.content, parseSource(this.originalText).root.value)
    } catch (error) {
      if (error instanceof InvalidJSONError) return new Map()
      throw error
    }
  }
}
