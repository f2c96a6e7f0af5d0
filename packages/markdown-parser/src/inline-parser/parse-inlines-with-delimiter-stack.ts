import type { InlineNode, TextNode } from "@/ast"
import type { Span } from "@/events"
import { isUnicodePunctuation, isUnicodeWhitespace } from "@/parser-helpers"

export type DelimiterChar = "*" | "_" | "~"

export interface Delimiter {
  char: DelimiterChar
  /** Text node holding the run; matched delimiters are sliced off its value. */
  node: TextNode
  count: number
  origCount: number
  canOpen: boolean
  canClose: boolean
  previous: Delimiter | null
  next: Delimiter | null
}

/**
 * The node list of the leaf being scanned plus the delimiter stack, kept as a
 * doubly linked list whose `top` is the most recent run.
 */
export interface DelimiterStack {
  nodes: InlineNode[]
  top: Delimiter | null
}

export function isLeftFlankingDelimiterRun(before: string, after: string): boolean {
  if (isUnicodeWhitespace(after)) return false
  return !isUnicodePunctuation(after) || isUnicodeWhitespace(before) || isUnicodePunctuation(before)
}

export function isRightFlankingDelimiterRun(before: string, after: string): boolean {
  if (isUnicodeWhitespace(before)) return false
  return !isUnicodePunctuation(before) || isUnicodeWhitespace(after) || isUnicodePunctuation(after)
}

/** `before`/`after` are the characters around the run, "" at the edges of the text. */
export function delimiterRunFlags(
  char: DelimiterChar,
  before: string,
  after: string
): { canOpen: boolean; canClose: boolean } {
  const left = isLeftFlankingDelimiterRun(before, after)
  const right = isRightFlankingDelimiterRun(before, after)
  if (char === "_") {
    return {
      canOpen: left && (!right || isUnicodePunctuation(before)),
      canClose: right && (!left || isUnicodePunctuation(after)),
    }
  }
  return { canOpen: left, canClose: right }
}

export function pushDelimiter(
  stack: DelimiterStack,
  char: DelimiterChar,
  node: TextNode,
  canOpen: boolean,
  canClose: boolean
) {
  const delimiter: Delimiter = {
    char,
    node,
    count: node.value.length,
    origCount: node.value.length,
    canOpen,
    canClose,
    previous: stack.top,
    next: null,
  }
  if (stack.top) stack.top.next = delimiter
  stack.top = delimiter
}

export function removeDelimiter(stack: DelimiterStack, delimiter: Delimiter) {
  if (delimiter.previous) delimiter.previous.next = delimiter.next
  if (delimiter.next) {
    delimiter.next.previous = delimiter.previous
  } else {
    stack.top = delimiter.previous
  }
}

function removeDelimitersBetween(bottom: Delimiter, top: Delimiter) {
  if (bottom.next !== top) {
    bottom.next = top
    top.previous = bottom
  }
}

function matchesOpener(opener: Delimiter, closer: Delimiter): boolean {
  if (opener.char !== closer.char || !opener.canOpen) return false
  if (closer.char === "~") return opener.count === closer.count
  // Rule of three: a run that can both open and close only pairs with another
  // when the sum of their lengths is not a multiple of 3, unless both are.
  const oddMatch =
    (closer.canOpen || opener.canClose) &&
    closer.origCount % 3 !== 0 &&
    (opener.origCount + closer.origCount) % 3 === 0
  return !oddMatch
}

function openersBottomKey(closer: Delimiter): string {
  if (closer.char === "~") return `~${closer.count}`
  return `${closer.char}${closer.canOpen ? 1 : 0}${closer.origCount % 3}`
}

function spanFor(char: DelimiterChar, used: number, underline: boolean): Span {
  if (char === "~") return { type: "strikethrough" }
  if (char === "_" && underline) return { type: "underline" }
  return used === 1 ? { type: "emphasis" } : { type: "strong" }
}

interface NodeCell {
  node: InlineNode
  previous: NodeCell | null
  next: NodeCell | null
}

/**
 * Linked view of the tail of a node list, so that wrapping and dropping nodes
 * does not shift the rest of the array on every match.
 */
class NodeChain {
  private head: NodeCell | null = null
  private readonly cells = new Map<InlineNode, NodeCell>()

  constructor(nodes: InlineNode[]) {
    let last: NodeCell | null = null
    for (const node of nodes) {
      const cell: NodeCell = { node, previous: last, next: null }
      if (last) last.next = cell
      else this.head = cell
      this.cells.set(node, cell)
      last = cell
    }
  }

  /** Moves everything strictly between `opener` and `closer` into a span node. */
  wrapBetween(opener: TextNode, closer: TextNode, span: Span) {
    const first = this.cells.get(opener)
    const last = this.cells.get(closer)
    if (!first || !last) return
    const children: InlineNode[] = []
    for (let cell = first.next; cell !== null && cell !== last; cell = cell.next) {
      children.push(cell.node)
      this.cells.delete(cell.node)
    }
    const wrapped: NodeCell = { node: { type: "span", span, children }, previous: first, next: last }
    first.next = wrapped
    last.previous = wrapped
  }

  drop(node: TextNode) {
    const cell = this.cells.get(node)
    if (!cell) return
    if (cell.previous) cell.previous.next = cell.next
    else this.head = cell.next
    if (cell.next) cell.next.previous = cell.previous
    this.cells.delete(node)
  }

  appendTo(nodes: InlineNode[]) {
    for (let cell = this.head; cell !== null; cell = cell.next) nodes.push(cell.node)
  }
}

/**
 * Pairs closers with openers above `stackBottom`, wrapping the nodes between
 * each pair into a span, then clears those delimiters off the stack.
 */
export function processEmphasis(stack: DelimiterStack, stackBottom: Delimiter | null, underline: boolean) {
  const openersBottom = new Map<string, Delimiter | null>()

  let closer = stack.top
  while (closer !== null && closer.previous !== stackBottom) {
    closer = closer.previous
  }
  if (closer === null) return

  // Only nodes from the lowest delimiter on can change.
  const start = Math.max(stack.nodes.lastIndexOf(closer.node), 0)
  const chain = new NodeChain(stack.nodes.slice(start))

  while (closer !== null) {
    if (!closer.canClose) {
      closer = closer.next
      continue
    }

    const key = openersBottomKey(closer)
    const bottom = openersBottom.has(key) ? openersBottom.get(key) ?? null : stackBottom
    let opener = closer.previous
    let found = false
    while (opener !== null && opener !== stackBottom && opener !== bottom) {
      if (matchesOpener(opener, closer)) {
        found = true
        break
      }
      opener = opener.previous
    }

    if (found && opener !== null) {
      const used =
        closer.char === "~" ? closer.count : closer.count >= 2 && opener.count >= 2 ? 2 : 1
      opener.count -= used
      closer.count -= used
      opener.node.value = opener.node.value.slice(0, opener.node.value.length - used)
      closer.node.value = closer.node.value.slice(0, closer.node.value.length - used)

      chain.wrapBetween(opener.node, closer.node, spanFor(closer.char, used, underline))
      removeDelimitersBetween(opener, closer)

      if (opener.count === 0) {
        chain.drop(opener.node)
        removeDelimiter(stack, opener)
      }
      if (closer.count === 0) {
        chain.drop(closer.node)
        const next = closer.next
        removeDelimiter(stack, closer)
        closer = next
      }
    } else {
      const unmatched = closer
      closer = closer.next
      openersBottom.set(key, unmatched.previous)
      if (!unmatched.canOpen) removeDelimiter(stack, unmatched)
    }
  }

  while (stack.top !== null && stack.top !== stackBottom) {
    removeDelimiter(stack, stack.top)
  }
  stack.nodes.length = start
  chain.appendTo(stack.nodes)
}
