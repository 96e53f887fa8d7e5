import { getEngineConfig } from "./config"
import { InvalidJSONError } from "./error"
import { type JSONArray, jsonEquals, type JSONObject, type JSONScalar, type JSONValue } from "./json"
import { getLogger } from "./logging"
import { parseSource, type SourceMember, type SourceNode } from "./source"

export interface SerializeOptions {
  /**
   * Indentation of canonical output, used when there is no original text.
   * An empty string gives compact output.
   * Default: JSON_DOC_ENGINE_INDENT, else two spaces
   */
  indent?: string

  /**
   * Largest `oldLength * newLength` for which array items are aligned by
   * longest common subsequence; larger arrays align by position.
   * Default: JSON_DOC_ENGINE_ARRAY_ALIGN_LIMIT, else 250000
   */
  arrayAlignLimit?: number
}

/**
 * Formatting conventions inferred from the original text.
 */
export interface TextStyle {
  /** One level of indentation */
  readonly unit: string
  /** Text between a key and its value, e.g. ": " or " : " */
  readonly colon: string
  /** Whether the document spans several lines */
  readonly multiline: boolean
  readonly newline: string
}

interface RenderContext {
  readonly text: string
  readonly style: TextStyle
  readonly arrayAlignLimit: number
}

/**
 * A child ready to be placed in its container, with the index of the source
 * entry it was rendered against (if any).
 */
interface RenderedEntry {
  readonly text: string
  readonly sourceIndex: number | undefined
}

interface Span {
  readonly start: number
  readonly end: number
}

/**
 * Serializes `tree`, keeping the bytes of `originalText` wherever the tree did
 * not change.
 *
 * - An unchanged tree gives back `originalText` exactly.
 * - Unchanged subtrees are copied verbatim; members keep their order, key text,
 *   spacing and separators.
 * - New keys go last in their object, styled like their siblings.
 * - Without original text (or when it does not parse) the canonical form is used.
 *
 * @returns The text, or undefined when the tree holds a number JSON cannot represent.
 */
export function serialize(
  tree: JSONValue,
  originalText?: string,
  options: SerializeOptions = {}
): string | undefined {
  if (!isRepresentable(tree)) {
    return undefined
  }
  if (originalText === undefined) {
    return serializeCanonical(tree, options)
  }

  let root: SourceNode
  try {
    root = parseSource(originalText).root
  } catch (error) {
    if (!(error instanceof InvalidJSONError)) throw error
    getLogger("serializer").debug(
      { reason: error.reason },
      "original text does not parse, writing canonical output"
    )
    return serializeCanonical(tree, options)
  }

  const ctx: RenderContext = {
    text: originalText,
    style: detectStyle(originalText, root),
    arrayAlignLimit: options.arrayAlignLimit ?? getEngineConfig().arrayAlignLimit,
  }

  const body = render(ctx, tree, root, !ctx.style.multiline)
  return originalText.slice(0, root.start) + body + originalText.slice(root.end)
}

/**
 * Deterministic output with keys sorted by code unit and fixed indentation.
 *
 * @returns The text, or undefined when the tree holds a number JSON cannot represent.
 */
export function serializeCanonical(
  tree: JSONValue,
  options: Pick<SerializeOptions, "indent"> = {}
): string | undefined {
  if (!isRepresentable(tree)) {
    return undefined
  }
  const unit = options.indent ?? getEngineConfig().indent
  const style: TextStyle = {
    unit,
    colon: unit === "" ? ":" : ": ",
    multiline: unit !== "",
    newline: "\n",
  }
  return renderFresh(tree, "", style, !style.multiline, true)
}

function isRepresentable(value: JSONValue): boolean {
  switch (value.kind) {
    case "int":
    case "float":
      return Number.isFinite(value.value)
    case "array":
      return value.items.every(isRepresentable)
    case "object":
      for (const item of value.entries.values()) {
        if (!isRepresentable(item)) return false
      }
      return true
    default:
      return true
  }
}

/**
 * @param compact Whether a value without source counterpart stays on one line,
 * as decided by the container it sits in.
 */
function render(
  ctx: RenderContext,
  value: JSONValue,
  source: SourceNode,
  compact: boolean
): string {
  if (jsonEquals(value, source.value)) {
    return ctx.text.slice(source.start, source.end)
  }
  if (value.kind === "object" && source.kind === "object") {
    return renderObject(ctx, value, source)
  }
  if (value.kind === "array" && source.kind === "array") {
    return renderArray(ctx, value, source)
  }
  const indent = lineIndentAt(ctx.text, source.start)
  return renderFresh(value, indent, ctx.style, compact, false)
}

function renderObject(
  ctx: RenderContext,
  value: JSONObject,
  source: Extract<SourceNode, { kind: "object" }>
): string {
  const slots = source.members.map(memberSpan)
  const layout = childLayout(ctx, source, slots)
  const entries: RenderedEntry[] = []

  source.members.forEach((member, index) => {
    const child = value.entries.get(member.key)
    if (child === undefined) return
    entries.push({
      text: ctx.text.slice(member.start, member.value.start) +
        render(ctx, child, member.value, layout.compact),
      sourceIndex: index,
    })
  })

  const lastMember = source.members[source.members.length - 1]
  const colon = lastMember
    ? ctx.text.slice(lastMember.keyEnd, lastMember.value.start)
    : ctx.style.colon
  const known = new Set(source.members.map((m) => m.key))

  for (const [key, child] of value.entries) {
    if (known.has(key)) continue
    entries.push({
      text:
        JSON.stringify(key) + colon + renderFresh(child, layout.indent, ctx.style, layout.compact, false),
      sourceIndex: undefined,
    })
  }

  return assemble(ctx, source, slots, entries, layout, "{", "}")
}

function renderArray(
  ctx: RenderContext,
  value: JSONArray,
  source: Extract<SourceNode, { kind: "array" }>
): string {
  const layout = childLayout(ctx, source, source.items)
  const alignment = alignItems(
    source.items.map((item) => item.value),
    value.items,
    ctx.arrayAlignLimit
  )

  const entries = value.items.map((item, index): RenderedEntry => {
    const sourceIndex = alignment[index]
    const text =
      sourceIndex === undefined
        ? renderFresh(item, layout.indent, ctx.style, layout.compact, false)
        : render(ctx, item, source.items[sourceIndex], layout.compact)
    return { text, sourceIndex }
  })

  return assemble(ctx, source, source.items, entries, layout, "[", "]")
}

function memberSpan(member: SourceMember): Span {
  return { start: member.start, end: member.value.end }
}

interface ChildLayout {
  /** Line indentation of children */
  readonly indent: string
  /** Children sit on the container's line */
  readonly compact: boolean
  /** Separator placed before a child that has no separator of its own in the source */
  readonly separator: string
}

function childLayout(ctx: RenderContext, container: Span, slots: readonly Span[]): ChildLayout {
  const { style } = ctx
  if (slots.length === 0) {
    const compact = !style.multiline
    const indent = lineIndentAt(ctx.text, container.start) + style.unit
    return { indent, compact, separator: compact ? "," : "," + style.newline + indent }
  }

  const separator =
    slots.length > 1
      ? ctx.text.slice(slots[slots.length - 2].end, slots[slots.length - 1].start)
      : "," + ctx.text.slice(container.start + 1, slots[0].start)
  const lineBreak = separator.lastIndexOf("\n")
  if (lineBreak < 0) {
    return { indent: lineIndentAt(ctx.text, slots[0].start), compact: true, separator }
  }
  return { indent: separator.slice(lineBreak + 1), compact: false, separator }
}

/**
 * Puts a container back together, reusing the source separators of every
 * child that was rendered against a source entry.
 */
function assemble(
  ctx: RenderContext,
  container: Span,
  slots: readonly Span[],
  entries: readonly RenderedEntry[],
  layout: ChildLayout,
  open: string,
  close: string
): string {
  if (entries.length === 0) {
    return open + close
  }

  const { text, style } = ctx

  if (slots.length === 0) {
    if (layout.compact) {
      return open + entries.map((e) => e.text).join(",") + close
    }
    const outer = lineIndentAt(text, container.start)
    return (
      open +
      style.newline +
      layout.indent +
      entries.map((e) => e.text).join(layout.separator) +
      style.newline +
      outer +
      close
    )
  }

  const leading = text.slice(container.start + 1, slots[0].start)
  const closing = text.slice(slots[slots.length - 1].end, container.end - 1)

  let result = open + leading + entries[0].text
  for (let i = 1; i < entries.length; i++) {
    const { sourceIndex } = entries[i]
    const separator =
      sourceIndex !== undefined && sourceIndex >= 1
        ? text.slice(slots[sourceIndex - 1].end, slots[sourceIndex].start)
        : layout.separator
    result += separator + entries[i].text
  }
  return result + closing + close
}

interface AlignmentGap {
  readonly oldItems: number[]
  readonly newItems: number[]
}

/**
 * Pairs new array items with source items.
 * Equal items are matched by longest common subsequence. Unmatched new items
 * then take an unmatched equal source item anywhere in the array (a moved
 * item), and within each gap between matches the remaining new items take the
 * remaining source items in order.
 *
 * @returns For each new item, the index of its source item (or undefined).
 */
export function alignItems(
  oldItems: readonly JSONValue[],
  newItems: readonly JSONValue[],
  limit: number
): (number | undefined)[] {
  const n = oldItems.length
  const m = newItems.length

  if (n * m > limit) {
    return newItems.map((_, j) => (j < n ? j : undefined))
  }

  const width = m + 1
  // lcs[i * width + j] = LCS length of oldItems[i..] and newItems[j..]
  const lcs = new Uint32Array((n + 1) * width)
  const same = (i: number, j: number) => jsonEquals(oldItems[i], newItems[j])

  for (let i = n - 1; i >= 0; i--) {
    for (let j = m - 1; j >= 0; j--) {
      lcs[i * width + j] = same(i, j)
        ? lcs[(i + 1) * width + j + 1] + 1
        : Math.max(lcs[(i + 1) * width + j], lcs[i * width + j + 1])
    }
  }

  const result: (number | undefined)[] = new Array<number | undefined>(m).fill(undefined)
  let gap: AlignmentGap = { oldItems: [], newItems: [] }
  const gaps: AlignmentGap[] = [gap]

  let i = 0
  let j = 0
  while (i < n && j < m) {
    if (same(i, j) && lcs[i * width + j] === lcs[(i + 1) * width + j + 1] + 1) {
      result[j] = i
      i++
      j++
      gap = { oldItems: [], newItems: [] }
      gaps.push(gap)
    } else if (lcs[(i + 1) * width + j] >= lcs[i * width + j + 1]) {
      gap.oldItems.push(i++)
    } else {
      gap.newItems.push(j++)
    }
  }
  while (i < n) gap.oldItems.push(i++)
  while (j < m) gap.newItems.push(j++)

  const taken = new Set<number>()
  const leftoverOld = gaps.flatMap((g) => g.oldItems)
  for (const g of gaps) {
    for (const newIndex of g.newItems) {
      const match = leftoverOld.find((oldIndex) => !taken.has(oldIndex) && same(oldIndex, newIndex))
      if (match !== undefined) {
        result[newIndex] = match
        taken.add(match)
      }
    }
  }

  for (const g of gaps) {
    const olds = g.oldItems.filter((oldIndex) => !taken.has(oldIndex))
    const news = g.newItems.filter((newIndex) => result[newIndex] === undefined)
    const paired = Math.min(olds.length, news.length)
    for (let k = 0; k < paired; k++) {
      result[news[k]] = olds[k]
    }
  }

  return result
}

/**
 * Renders a value that has no source counterpart.
 *
 * @param indent Indentation of the line the value starts on.
 */
function renderFresh(
  value: JSONValue,
  indent: string,
  style: TextStyle,
  compact: boolean,
  sortKeys: boolean
): string {
  switch (value.kind) {
    case "array": {
      if (value.items.length === 0) return "[]"
      const inner = indent + style.unit
      const items = value.items.map((item) => renderFresh(item, inner, style, compact, sortKeys))
      return wrap("[", "]", items, indent, inner, style, compact)
    }
    case "object": {
      if (value.entries.size === 0) return "{}"
      const inner = indent + style.unit
      const pairs = [...value.entries]
      if (sortKeys) pairs.sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      const members = pairs.map(
        ([key, child]) =>
          JSON.stringify(key) + style.colon + renderFresh(child, inner, style, compact, sortKeys)
      )
      return wrap("{", "}", members, indent, inner, style, compact)
    }
    default:
      return renderScalar(value)
  }
}

function wrap(
  open: string,
  close: string,
  parts: readonly string[],
  indent: string,
  inner: string,
  style: TextStyle,
  compact: boolean
): string {
  if (compact) {
    return open + parts.join(",") + close
  }
  return (
    open +
    style.newline +
    inner +
    parts.join("," + style.newline + inner) +
    style.newline +
    indent +
    close
  )
}

/**
 * Scalar text that parses back to the same kind and value.
 */
export function renderScalar(value: JSONScalar): string {
  switch (value.kind) {
    case "null":
      return "null"
    case "bool":
      return value.value ? "true" : "false"
    case "string":
      return JSON.stringify(value.value)
    case "int":
      // String() switches to exponent notation past 1e21, which reads back as a float
      return Number.isInteger(value.value) && !Number.isSafeInteger(value.value)
        ? BigInt(value.value).toString()
        : String(value.value)
    case "float": {
      const text = String(value.value)
      return /[.eE]/.test(text) ? text : `${text}.0`
    }
  }
}

/**
 * Infers indentation unit, colon spacing, line breaks and newline sequence.
 */
export function detectStyle(text: string, root: SourceNode): TextStyle {
  const multiline = text.slice(root.start, root.end).includes("\n")
  const firstMember = findFirstMember(root)
  return {
    unit: detectIndentation(text),
    colon: firstMember
      ? text.slice(firstMember.keyEnd, firstMember.value.start)
      : multiline
        ? ": "
        : ":",
    multiline,
    newline: text.includes("\r\n") ? "\r\n" : "\n",
  }
}

function findFirstMember(node: SourceNode): SourceMember | undefined {
  switch (node.kind) {
    case "object":
      return node.members[0]
    case "array":
      for (const item of node.items) {
        const found = findFirstMember(item)
        if (found) return found
      }
      return undefined
    case "scalar":
      return undefined
  }
}

/**
 * The unit of indentation: a tab if any line is tab-indented, otherwise the
 * shortest run of leading spaces. Two spaces when nothing is indented.
 */
export function detectIndentation(text: string): string {
  let smallest = Infinity
  for (const line of text.split("\n")) {
    const match = /^[ \t]+/.exec(line)
    if (!match || match[0].length === line.replace(/\r$/, "").length) continue
    if (match[0].startsWith("\t")) return "\t"
    smallest = Math.min(smallest, match[0].length)
  }
  return Number.isFinite(smallest) ? " ".repeat(smallest) : "  "
}

function lineIndentAt(text: string, offset: number): string {
  const lineStart = text.lastIndexOf("\n", offset - 1) + 1
  const match = /^[ \t]*/.exec(text.slice(lineStart, offset))
  return match ? match[0] : ""
}
