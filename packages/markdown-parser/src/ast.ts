import type { Alignment, HeadingBlock, Span } from "./events"
import type { ContentLine } from "./line-cursor"
import type { ListMarker } from "./parser-helpers"

/*
 * Transient structures. Block records live only between the block pass and the
 * event walk; inline nodes only for the scan of one leaf. Neither is exposed to
 * callers.
 */

export type BlockKind =
  | "document"
  | "blockquote"
  | "list"
  | "list_item"
  | "paragraph"
  | "heading"
  | "thematic_break"
  | "code_block"
  | "html_block"
  | "table"

export interface TaskMark {
  mark: "x" | "X" | " "
  offset: number
}

export interface Fence {
  char: "`" | "~"
  length: number
  /** Indentation of the opening fence, removed from content lines. */
  offset: number
}

export interface BlockRecord {
  kind: BlockKind
  parent: BlockRecord | null
  children: BlockRecord[]
  open: boolean
  depth: number
  /** 1-based source line numbers. */
  startLine: number
  endLine: number
  /** Last line that added non-blank content; blank lines inside code do not count. */
  lastContentLine: number
  lines: ContentLine[]
  listData: ListMarker | null
  markerOffset: number
  padding: number
  tight: boolean
  task: TaskMark | null
  level: HeadingBlock["level"]
  fence: Fence | null
  info: string
  htmlKind: number
  aligns: Alignment[]
}

type NodeBase<T extends string> = { type: T }

export type TextNode = NodeBase<"text"> & { value: string }
export type EntityNode = NodeBase<"entity"> & { raw: string }
export type NullCharNode = NodeBase<"null_char">
export type SoftBreakNode = NodeBase<"soft_break">
export type HardBreakNode = NodeBase<"hard_break">
export type CodeNode = NodeBase<"code"> & { value: string }
export type RawHtmlNode = NodeBase<"raw_html"> & { value: string }
export type MathNode = NodeBase<"math"> & { display: boolean; value: string }
export type SpanNode = NodeBase<"span"> & { span: Span; children: InlineNode[] }

export type InlineNode =
  | TextNode
  | EntityNode
  | NullCharNode
  | SoftBreakNode
  | HardBreakNode
  | CodeNode
  | RawHtmlNode
  | MathNode
  | SpanNode
