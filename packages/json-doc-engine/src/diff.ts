import { type JSONValue, jsonNumericEquals, type Path, pathKey } from "./json"

export type ChangeStatus = "added" | "modified" | "deleted"

/**
 * Change status of every leaf that differs between `current` and `original`,
 * keyed by dotted path. Unchanged paths are left out. Deleted containers mark
 * every path beneath them as deleted too.
 *
 * Array items are compared by position.
 */
export function computeChanges(
  current: JSONValue,
  original: JSONValue | undefined
): Map<string, ChangeStatus> {
  const changes = new Map<string, ChangeStatus>()
  if (original !== undefined) {
    collect(current, original, [], changes)
  }
  return changes
}

function collect(
  current: JSONValue,
  original: JSONValue | undefined,
  path: Path,
  changes: Map<string, ChangeStatus>
): void {
  if (current.kind === "object") {
    const originalObject = original?.kind === "object" ? original : undefined
    for (const [key, value] of current.entries) {
      collect(value, originalObject?.entries.get(key), [...path, key], changes)
    }
    if (originalObject) {
      for (const [key, value] of originalObject.entries) {
        if (!current.entries.has(key)) markDeleted(value, [...path, key], changes)
      }
    }
    return
  }

  if (current.kind === "array") {
    const originalArray = original?.kind === "array" ? original : undefined
    current.items.forEach((value, index) => {
      collect(value, originalArray?.items[index], [...path, String(index)], changes)
    })
    if (originalArray) {
      for (let index = current.items.length; index < originalArray.items.length; index++) {
        markDeleted(originalArray.items[index], [...path, String(index)], changes)
      }
    }
    return
  }

  if (path.length === 0) return

  if (original === undefined) {
    changes.set(pathKey(path), "added")
  } else if (!jsonNumericEquals(current, original)) {
    changes.set(pathKey(path), "modified")
  }
}

function markDeleted(value: JSONValue, path: Path, changes: Map<string, ChangeStatus>): void {
  changes.set(pathKey(path), "deleted")
  if (value.kind === "object") {
    for (const [key, child] of value.entries) {
      markDeleted(child, [...path, key], changes)
    }
  } else if (value.kind === "array") {
    value.items.forEach((child, index) => markDeleted(child, [...path, String(index)], changes))
  }
}
