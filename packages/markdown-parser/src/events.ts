export type SubstrType = "normal" | "entity" | "null_char"

/**
 * A string value that travels outside the main text channel (link titles,
 * hrefs, code fence info). `substrOffsets` has one more entry than
 * `substrTypes`: it starts at 0 and ends at `text.length`.
 */
export interface Attribute {
  text: string
  substrTypes: SubstrType[]
  substrOffsets: number[]
}

export type Alignment = "default" | "left" | "center" | "right"

type BlockBase<T extends string> = { type: T }
type SpanBase<T extends string> = { type: T }

export type DocumentBlock = BlockBase<"document">
export type BlockquoteBlock = BlockBase<"blockquote">
export type UnorderedListBlock = BlockBase<"unordered_list"> & {
  isTight: boolean
  mark: "-" | "+" | "*"
}
export type OrderedListBlock = BlockBase<"ordered_list"> & {
  start: number
  isTight: boolean
  markDelimiter: "." | ")"
}
export type ListItemBlock = BlockBase<"list_item"> & {
  isTask: boolean
  taskMark: "x" | "X" | " " | null
  /** Offset of the character between the task brackets, -1 when not a task. */
  taskMarkOffset: number
}
export type ThematicBreakBlock = BlockBase<"thematic_break">
export type HeadingBlock = BlockBase<"heading"> & { level: 1 | 2 | 3 | 4 | 5 | 6 }
export type CodeBlock = BlockBase<"code_block"> & {
  info: Attribute
  lang: Attribute
  fenceChar: "`" | "~" | null
}
export type HtmlBlock = BlockBase<"html_block">
export type ParagraphBlock = BlockBase<"paragraph">
export type TableBlock = BlockBase<"table"> & {
  columnCount: number
  headRowCount: number
  bodyRowCount: number
}
export type TableHeadBlock = BlockBase<"table_head">
export type TableBodyBlock = BlockBase<"table_body">
export type TableRowBlock = BlockBase<"table_row">
export type TableHeaderBlock = BlockBase<"table_header"> & { align: Alignment }
export type TableDataBlock = BlockBase<"table_data"> & { align: Alignment }

export type Block =
  | DocumentBlock
  | BlockquoteBlock
  | UnorderedListBlock
  | OrderedListBlock
  | ListItemBlock
  | ThematicBreakBlock
  | HeadingBlock
  | CodeBlock
  | HtmlBlock
  | ParagraphBlock
  | TableBlock
  | TableHeadBlock
  | TableBodyBlock
  | TableRowBlock
  | TableHeaderBlock
  | TableDataBlock

export type BlockType = Block["type"]

export type EmphasisSpan = SpanBase<"emphasis">
export type StrongSpan = SpanBase<"strong">
export type LinkSpan = SpanBase<"link"> & {
  href: Attribute
  title: Attribute
  isAutolink: boolean
}
export type ImageSpan = SpanBase<"image"> & { src: Attribute; title: Attribute }
export type CodeSpan = SpanBase<"code_span">
export type StrikethroughSpan = SpanBase<"strikethrough">
export type LatexMathSpan = SpanBase<"latex_math">
export type LatexMathDisplaySpan = SpanBase<"latex_math_display">
export type WikiLinkSpan = SpanBase<"wiki_link"> & { target: Attribute }
export type UnderlineSpan = SpanBase<"underline">

export type Span =
  | EmphasisSpan
  | StrongSpan
  | LinkSpan
  | ImageSpan
  | CodeSpan
  | StrikethroughSpan
  | LatexMathSpan
  | LatexMathDisplaySpan
  | WikiLinkSpan
  | UnderlineSpan

export type SpanType = Span["type"]

export type TextType =
  | "normal"
  | "null_char"
  | "hard_break"
  | "soft_break"
  | "entity"
  | "code"
  | "html"
  | "latex_math"

/** Any non-zero number returned from a callback aborts the parse. */
export type CallbackResult = number | void

export interface ParserCallbacks {
  enterBlock(block: Block): CallbackResult
  leaveBlock(block: Block): CallbackResult
  enterSpan(span: Span): CallbackResult
  leaveSpan(span: Span): CallbackResult
  text(type: TextType, text: string): CallbackResult
  debugLog?(message: string): void
}
