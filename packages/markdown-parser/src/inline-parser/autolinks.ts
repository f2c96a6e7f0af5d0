import type { InlineNode, SpanNode } from "@/ast"
import { buildAttribute, emptyAttribute } from "@/attribute"

export interface PermissiveAutolinkFlags {
  url: boolean
  email: boolean
  www: boolean
}

interface AutolinkMatch {
  start: number
  end: number
  href: string
}

const URL_SCHEME_RE = /(?:https?|ftp):\/\//gi
const WWW_RE = /www\./g
const EMAIL_RE = /[A-Za-z0-9._+-]+@[A-Za-z0-9_-]+(?:\.[A-Za-z0-9_-]+)+/g
const DOMAIN_CHAR_RE = /[A-Za-z0-9_.-]/
const TRAILING_PUNCTUATION = "?!.,:*_~"

/**
 * Joins neighbouring text nodes and drops empty ones at every depth. Nested
 * spans are queued rather than recursed into, so nesting depth is unbounded.
 */
export function mergeAdjacentText(nodes: InlineNode[]): InlineNode[] {
  const pending: SpanNode[] = []
  const merged = mergeLevel(nodes, pending)
  for (let span = pending.pop(); span !== undefined; span = pending.pop()) {
    span.children = mergeLevel(span.children, pending)
  }
  return merged
}

function mergeLevel(nodes: InlineNode[], pending: SpanNode[]): InlineNode[] {
  const merged: InlineNode[] = []
  for (const node of nodes) {
    if (node.type === "text") {
      if (node.value === "") continue
      const last = merged[merged.length - 1]
      if (last !== undefined && last.type === "text") {
        last.value += node.value
        continue
      }
    } else if (node.type === "span") {
      pending.push(node)
    }
    merged.push(node)
  }
  return merged
}

/**
 * Turns bare URLs, `www.` addresses and e-mail addresses found in plain text
 * into autolink spans. Text already inside a link, image or wiki link is left
 * alone.
 */
export function applyPermissiveAutolinks(nodes: InlineNode[], flags: PermissiveAutolinkFlags): InlineNode[] {
  const pending: SpanNode[] = []
  const result = linkifyLevel(nodes, flags, pending)
  for (let span = pending.pop(); span !== undefined; span = pending.pop()) {
    span.children = linkifyLevel(span.children, flags, pending)
  }
  return result
}

function linkifyLevel(nodes: InlineNode[], flags: PermissiveAutolinkFlags, pending: SpanNode[]): InlineNode[] {
  const result: InlineNode[] = []
  for (const node of nodes) {
    if (node.type === "span") {
      const kind = node.span.type
      if (kind !== "link" && kind !== "image" && kind !== "wiki_link") pending.push(node)
      result.push(node)
      continue
    }
    if (node.type !== "text") {
      result.push(node)
      continue
    }

    const matches = findAutolinks(node.value, flags)
    let pos = 0
    for (const match of matches) {
      if (match.start > pos) result.push({ type: "text", value: node.value.slice(pos, match.start) })
      result.push({
        type: "span",
        span: {
          type: "link",
          href: buildAttribute(match.href, { resolveEscapes: false, entities: false }),
          title: emptyAttribute(),
          isAutolink: true,
        },
        children: [{ type: "text", value: node.value.slice(match.start, match.end) }],
      })
      pos = match.end
    }
    if (pos < node.value.length) result.push({ type: "text", value: node.value.slice(pos) })
  }
  return result
}

export function findAutolinks(text: string, flags: PermissiveAutolinkFlags): AutolinkMatch[] {
  const candidates: AutolinkMatch[] = []

  if (flags.url) {
    for (const m of text.matchAll(URL_SCHEME_RE)) {
      const start = m.index ?? 0
      if (!atBoundary(text, start)) continue
      const match = scanWebLink(text, start, start + m[0].length)
      if (match) candidates.push({ ...match, href: text.slice(match.start, match.end) })
    }
  }

  if (flags.www) {
    for (const m of text.matchAll(WWW_RE)) {
      const start = m.index ?? 0
      if (!atBoundary(text, start)) continue
      const match = scanWebLink(text, start, start)
      if (match) candidates.push({ ...match, href: `http://${text.slice(match.start, match.end)}` })
    }
  }

  if (flags.email) {
    for (const m of text.matchAll(EMAIL_RE)) {
      const start = m.index ?? 0
      const address = m[0]
      const last = address[address.length - 1]
      if (last === "-" || last === "_") continue
      candidates.push({ start, end: start + address.length, href: `mailto:${address}` })
    }
  }

  candidates.sort((a, b) => a.start - b.start)
  const accepted: AutolinkMatch[] = []
  let lastEnd = 0
  for (const candidate of candidates) {
    if (candidate.start < lastEnd) continue
    accepted.push(candidate)
    lastEnd = candidate.end
  }
  return accepted
}

function atBoundary(text: string, start: number): boolean {
  if (start === 0) return true
  const before = text[start - 1]
  return /\s/.test(before) || before === "*" || before === "_" || before === "~" || before === "("
}

/** `hostStart` is where the domain begins: after `scheme://`, or at `www.`. */
function scanWebLink(text: string, start: number, hostStart: number): { start: number; end: number } | null {
  let end = hostStart
  while (end < text.length && !/\s/.test(text[end]) && text[end] !== "<") end++
  end = trimTrailingPunctuation(text, start, end)

  let hostEnd = hostStart
  while (hostEnd < end && DOMAIN_CHAR_RE.test(text[hostEnd])) hostEnd++
  if (!isValidDomain(text.slice(hostStart, hostEnd))) return null
  return { start, end }
}

function isValidDomain(host: string): boolean {
  const segments = host.replace(/\.$/, "").split(".")
  if (segments.length < 2 || segments.some(segment => segment === "")) return false
  return !segments.slice(-2).some(segment => segment.includes("_"))
}

function trimTrailingPunctuation(text: string, start: number, end: number): number {
  let e = end
  while (e > start) {
    const c = text[e - 1]
    if (TRAILING_PUNCTUATION.includes(c)) {
      e--
      continue
    }
    if (c === ")") {
      const link = text.slice(start, e)
      if (count(link, ")") > count(link, "(")) {
        e--
        continue
      }
      break
    }
    if (c === ";") {
      const entity = /&[A-Za-z0-9]+;$/.exec(text.slice(start, e))
      if (entity) {
        e -= entity[0].length
        continue
      }
    }
    break
  }
  return e
}

function count(text: string, ch: string): number {
  let n = 0
  for (const c of text) if (c === ch) n++
  return n
}
