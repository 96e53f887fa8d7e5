import { castDraft, type Draft, enableMapSet, produce } from "immer"
import { EditResolutionError, failure } from "./error"
import { type JSONObject, type JSONValue, parseIndex, type Path, pathKey } from "./json"
import { getLogger } from "./logging"

enableMapSet()

/**
 * Supported edit operations.
 * Each one is plain data and applies independently to any tree.
 */
export type EditOp =
  | { kind: "setValue"; path: Path; value: JSONValue }
  | { kind: "addField"; parentPath: Path; key: string; value: JSONValue }
  | { kind: "deleteField"; path: Path }
  | { kind: "deleteArrayElement"; path: Path }
  | { kind: "insertArrayElement"; path: Path; value: JSONValue; index?: number }
  | { kind: "moveArrayElement"; arrayPath: Path; from: number; to: number }

export type EditResult =
  | { ok: true; value: JSONObject }
  | { ok: false; error: EditResolutionError }

type DraftValue = Draft<JSONValue>
type DraftArray = Draft<Extract<JSONValue, { kind: "array" }>>
type DraftObject = Draft<JSONObject>

/**
 * Follows `path` from `root`. Never creates missing containers.
 * Throws if any segment is missing or has the wrong type.
 */
function resolvePath(root: DraftValue, path: Path): DraftValue {
  let current = root
  for (const segment of path) {
    current = childOf(current, segment)
  }
  return current
}

function childOf(container: DraftValue, segment: string): DraftValue {
  switch (container.kind) {
    case "object": {
      const next = container.entries.get(segment)
      if (next === undefined) {
        failure(`Property "${segment}" does not exist`)
      }
      return next
    }
    case "array": {
      const index = parseIndex(segment)
      if (index === undefined) {
        failure(`Expected array index at path segment "${segment}"`)
      }
      if (index >= container.items.length) {
        failure(`Index ${index} out of bounds`)
      }
      return container.items[index]
    }
    default:
      return failure(`Expected object or array at path segment "${segment}"`)
  }
}

function resolveArray(root: DraftValue, path: Path): DraftArray {
  const target = resolvePath(root, path)
  if (target.kind !== "array") {
    failure(`Expected array at ${pathKey(path) || "root"}`)
  }
  return target
}

function resolveObject(root: DraftValue, path: Path): DraftObject {
  const target = resolvePath(root, path)
  if (target.kind !== "object") {
    failure(`Expected object at ${pathKey(path) || "root"}`)
  }
  return target
}

function checkIndexArgument(name: string, value: number): void {
  if (!Number.isInteger(value)) {
    failure(`${name} must be an integer, got ${value}`)
  }
}

function splitLast(path: Path): [Path, string] {
  if (path.length === 0) {
    failure("Path must not be empty")
  }
  return [path.slice(0, -1), path[path.length - 1]]
}

function setValue(root: DraftValue, path: Path, value: JSONValue): void {
  const [parentPath, last] = splitLast(path)
  const parent = resolvePath(root, parentPath)

  switch (parent.kind) {
    case "object":
      // existing keys keep their position, new keys go last
      parent.entries.set(last, castDraft(value))
      break

    case "array": {
      const index = parseIndex(last)
      if (index === undefined || index >= parent.items.length) {
        failure(`Index ${last} out of bounds`)
      }
      parent.items[index] = castDraft(value)
      break
    }

    default:
      failure(`Expected object or array at path segment "${last}"`)
  }
}

function deleteField(root: DraftValue, path: Path): void {
  const [parentPath, key] = splitLast(path)
  const parent = resolveObject(root, parentPath)
  if (!parent.entries.delete(key)) {
    failure(`Property "${key}" does not exist`)
  }
}

function deleteArrayElement(root: DraftValue, path: Path): void {
  const [arrayPath, last] = splitLast(path)
  const index = parseIndex(last)
  if (index === undefined) {
    failure(`Expected array index, got "${last}"`)
  }
  const array = resolveArray(root, arrayPath)
  if (index >= array.items.length) {
    failure(`Index ${index} out of bounds`)
  }
  array.items.splice(index, 1)
}

function insertArrayElement(
  root: DraftValue,
  path: Path,
  value: JSONValue,
  index: number | undefined
): void {
  const array = resolveArray(root, path)
  if (index === undefined) {
    array.items.push(castDraft(value))
    return
  }
  checkIndexArgument("index", index)
  // inserting at length is an append
  if (index < 0 || index > array.items.length) {
    failure(`Index ${index} out of bounds`)
  }
  array.items.splice(index, 0, castDraft(value))
}

function moveArrayElement(root: DraftValue, arrayPath: Path, from: number, to: number): void {
  checkIndexArgument("from", from)
  checkIndexArgument("to", to)
  const array = resolveArray(root, arrayPath)
  const length = array.items.length
  if (from < 0 || from >= length) {
    failure(`Index ${from} out of bounds`)
  }
  if (to < 0 || to >= length) {
    failure(`Index ${to} out of bounds`)
  }
  // `to` counts positions in the array after the element was taken out
  const [element] = array.items.splice(from, 1)
  array.items.splice(to, 0, element)
}

function applyToDraft(draft: DraftValue, op: EditOp): void {
  switch (op.kind) {
    case "setValue":
      setValue(draft, op.path, op.value)
      break
    case "addField":
      setValue(draft, [...op.parentPath, op.key], op.value)
      break
    case "deleteField":
      deleteField(draft, op.path)
      break
    case "deleteArrayElement":
      deleteArrayElement(draft, op.path)
      break
    case "insertArrayElement":
      insertArrayElement(draft, op.path, op.value, op.index)
      break
    case "moveArrayElement":
      moveArrayElement(draft, op.arrayPath, op.from, op.to)
      break
  }
}

/**
 * Applies an operation using Immer: only the containers on the edited path are
 * copied, everything else is shared with `tree`. The input is never modified.
 *
 * @returns The new tree, or an EditResolutionError when the operation does not resolve.
 */
export function tryApplyEdit(tree: JSONObject, op: EditOp): EditResult {
  try {
    const value = produce(tree, (draft) => {
      applyToDraft(draft, op)
    })
    return { ok: true, value }
  } catch (error) {
    if (!(error instanceof EditResolutionError)) {
      throw error
    }
    getLogger("operations").debug(
      { op: describeEdit(op), reason: error.message },
      "edit operation did not resolve"
    )
    return { ok: false, error }
  }
}

/**
 * Applies an operation to a tree.
 *
 * @returns The new tree, or undefined when the path or index does not resolve.
 * A tree that comes back unchanged means the edit resolved and changed nothing.
 */
export function applyEdit(tree: JSONObject, op: EditOp): JSONObject | undefined {
  const result = tryApplyEdit(tree, op)
  return result.ok ? result.value : undefined
}

/**
 * Applies the same operation to each tree independently.
 * Results line up with the inputs; failures are undefined.
 */
export function applyEditToAll(
  trees: readonly JSONObject[],
  op: EditOp
): (JSONObject | undefined)[] {
  return trees.map((tree) => applyEdit(tree, op))
}

/**
 * The path an operation touches.
 */
export function editTargetPath(op: EditOp): Path {
  switch (op.kind) {
    case "setValue":
    case "deleteField":
    case "deleteArrayElement":
    case "insertArrayElement":
      return op.path
    case "addField":
      return [...op.parentPath, op.key]
    case "moveArrayElement":
      return op.arrayPath
  }
}

/**
 * Human-readable description of an operation.
 */
export function describeEdit(op: EditOp): string {
  switch (op.kind) {
    case "setValue":
      return `Set value at ${pathKey(op.path)}`
    case "addField":
      return `Add field at ${pathKey([...op.parentPath, op.key])}`
    case "deleteField":
      return `Delete field at ${pathKey(op.path)}`
    case "deleteArrayElement":
      return `Delete array element at ${pathKey(op.path)}`
    case "insertArrayElement":
      return op.index === undefined
        ? `Append array element to ${pathKey(op.path)}`
        : `Insert array element at ${pathKey(op.path)}[${op.index}]`
    case "moveArrayElement":
      return `Move array element at ${pathKey(op.arrayPath)} from [${op.from}] to [${op.to}]`
  }
}
