import type { BlockKind, BlockRecord, TaskMark } from "./ast";
import type { Dialect } from "./config";
import { ParserError } from "./errors";
import { CODE_INDENT, contentLineText, LineCursor, splitLines, type ContentLine } from "./line-cursor";
import {
  htmlBlockEnds,
  htmlBlockStartKind,
  isSpaceOrTab,
  parseListMarker,
  parseRefDefinition,
  type ListMarker,
  type RefDefinition,
} from "./parser-helpers";
import { parseDelimiterRow, splitTableRow } from "./table";

export interface BlockPhaseResult {
  document: BlockRecord;
  refDefinitions: Map<string, RefDefinition>;
}

interface BlockParserState {
  source: string;
  dialect: Dialect;
  cursor: LineCursor;
  document: BlockRecord;
  /** Innermost open block. */
  tip: BlockRecord;
  /** Tip as it was before the current line. */
  oldTip: BlockRecord;
  lastMatchedContainer: BlockRecord;
  allClosed: boolean;
  lineNumber: number;
  refDefinitions: Map<string, RefDefinition>;
  log: ((message: string) => void) | undefined;
}

type ContinueResult = "matched" | "failed" | "consumed";
type StartResult = "none" | "container" | "leaf" | "consumed";
type BlockStart = (state: BlockParserState, container: BlockRecord) => StartResult;

const ATX_HEADING_RE = /^#{1,6}(?:[ \t]+|$)/;
const PERMISSIVE_ATX_HEADING_RE = /^#{1,6}(?!#)/;
const CODE_FENCE_RE = /^`{3,}(?!.*`)|^~{3,}/;
const CLOSING_CODE_FENCE_RE = /^(?:`{3,}|~{3,})(?=[ \t]*$)/;
const SETEXT_HEADING_RE = /^(?:=+|-+)[ \t]*$/;
const THEMATIC_BREAK_RE = /^(?:(?:\*[ \t]*){3,}|(?:_[ \t]*){3,}|(?:-[ \t]*){3,})$/;
const BLANK_RE = /^[ \t]*$/;
const HEADING_LEVELS = [1, 2, 3, 4, 5, 6] as const;
const CONTAINER_KINDS: ReadonlySet<BlockKind> = new Set<BlockKind>(["blockquote", "list", "list_item"]);

/**
 * First pass: reads the source line by line and builds the block records the
 * event walk later turns into enter/leave events. Reference definitions are
 * collected here, so the inline pass sees all of them no matter where in the
 * document they appear.
 */
export function blockPhase(source: string, dialect: Dialect, log?: (message: string) => void): BlockPhaseResult {
  const document = createRecord("document", null, 0);
  const state: BlockParserState = {
    source,
    dialect,
    cursor: new LineCursor(source),
    document,
    tip: document,
    oldTip: document,
    lastMatchedContainer: document,
    allClosed: true,
    lineNumber: 0,
    refDefinitions: new Map(),
    log,
  };

  const lines = splitLines(source);
  for (let i = 0; i < lines.length; i++) {
    state.lineNumber = i + 1;
    state.cursor.reset(lines[i]);
    incorporateLine(state);
  }

  while (state.tip !== document) {
    finalize(state, state.tip, lines.length);
  }
  finalize(state, document, lines.length);
  return { document, refDefinitions: state.refDefinitions };
}

function createRecord(kind: BlockKind, parent: BlockRecord | null, line: number): BlockRecord {
  return {
    kind,
    parent,
    children: [],
    open: true,
    depth: parent ? parent.depth + 1 : 0,
    startLine: line,
    endLine: line,
    lastContentLine: line,
    lines: [],
    listData: null,
    markerOffset: 0,
    padding: 0,
    tight: true,
    task: null,
    level: 1,
    fence: null,
    info: "",
    htmlKind: 0,
    aligns: [],
  };
}

function incorporateLine(state: BlockParserState) {
  const { cursor } = state;
  state.oldTip = state.tip;

  let container = state.document;
  for (;;) {
    const last = container.children[container.children.length - 1];
    if (last === undefined || !last.open) break;
    container = last;
    cursor.findNextNonspace();
    const result = continueBlock(state, container);
    if (result === "consumed") return;
    if (result === "failed") {
      container = container.parent ?? state.document;
      break;
    }
  }

  state.allClosed = container === state.oldTip;
  state.lastMatchedContainer = container;

  let matchedLeaf = container.kind !== "paragraph" && container.kind !== "table" && acceptsLines(container.kind);
  while (!matchedLeaf) {
    cursor.findNextNonspace();
    let result: StartResult = "none";
    for (const start of BLOCK_STARTS) {
      result = start(state, container);
      if (result !== "none") break;
    }
    if (result === "consumed") return;
    if (result === "none") {
      cursor.advanceNextNonspace();
      break;
    }
    container = state.tip;
    if (result === "leaf") matchedLeaf = true;
  }

  // A line that matched no container of an open paragraph's ancestors but
  // would otherwise be paragraph text continues that paragraph lazily.
  if (!state.allClosed && !cursor.blank && state.tip.kind === "paragraph") {
    if (state.log) state.log(`block: lazy continuation at line ${state.lineNumber}`);
    addLine(state, state.tip);
    return;
  }

  closeUnmatchedBlocks(state);

  if (acceptsLines(container.kind)) {
    const line = addLine(state, container);
    if (
      container.kind === "html_block" &&
      htmlBlockEnds(container.htmlKind, state.source.slice(line.beg, line.end))
    ) {
      finalize(state, container, state.lineNumber);
    }
  } else if (cursor.offset < cursor.end && !cursor.blank) {
    const paragraph = addChild(state, "paragraph");
    cursor.advanceNextNonspace();
    addLine(state, paragraph);
  }
}

function acceptsLines(kind: BlockKind): boolean {
  return kind === "paragraph" || kind === "code_block" || kind === "html_block" || kind === "table";
}

function canContain(parent: BlockKind, child: BlockKind): boolean {
  switch (parent) {
    case "document":
    case "blockquote":
    case "list_item":
      return child !== "list_item";
    case "list":
      return child === "list_item";
    default:
      return false;
  }
}

function continueBlock(state: BlockParserState, container: BlockRecord): ContinueResult {
  const { cursor } = state;
  switch (container.kind) {
    case "document":
    case "list":
      return "matched";
    case "blockquote":
      if (!cursor.indented && cursor.peek(cursor.nextNonspace) === ">") {
        cursor.advanceNextNonspace();
        cursor.advanceOffset(1, false);
        if (isSpaceOrTab(cursor.peek())) cursor.advanceOffset(1, true);
        return "matched";
      }
      return "failed";
    case "list_item":
      if (cursor.blank) {
        // An item that is still empty cannot span a blank line.
        if (container.children.length === 0) return "failed";
        cursor.advanceNextNonspace();
        return "matched";
      }
      if (cursor.indent >= container.markerOffset + container.padding) {
        cursor.advanceOffset(container.markerOffset + container.padding, true);
        return "matched";
      }
      return "failed";
    case "paragraph":
    case "table":
      return cursor.blank ? "failed" : "matched";
    case "heading":
    case "thematic_break":
      return "failed";
    case "html_block":
      return cursor.blank && (container.htmlKind === 6 || container.htmlKind === 7) ? "failed" : "matched";
    case "code_block":
      return continueCodeBlock(state, container);
  }
}

function continueCodeBlock(state: BlockParserState, container: BlockRecord): ContinueResult {
  const { cursor } = state;
  const fence = container.fence;
  if (fence) {
    const closing =
      cursor.indent <= 3 && cursor.peek(cursor.nextNonspace) === fence.char
        ? CLOSING_CODE_FENCE_RE.exec(cursor.restFromNonspace())
        : null;
    if (closing && closing[0].length >= fence.length) {
      container.lastContentLine = state.lineNumber;
      finalize(state, container, state.lineNumber);
      return "consumed";
    }
    let skip = fence.offset;
    while (skip > 0 && isSpaceOrTab(cursor.peek())) {
      cursor.advanceOffset(1, true);
      skip--;
    }
    return "matched";
  }
  if (cursor.indent >= CODE_INDENT) {
    cursor.advanceOffset(CODE_INDENT, true);
    return "matched";
  }
  if (cursor.blank) {
    cursor.advanceNextNonspace();
    return "matched";
  }
  return "failed";
}

const startBlockquote: BlockStart = state => {
  const { cursor } = state;
  if (cursor.indented || cursor.peek(cursor.nextNonspace) !== ">") return "none";
  cursor.advanceNextNonspace();
  cursor.advanceOffset(1, false);
  if (isSpaceOrTab(cursor.peek())) cursor.advanceOffset(1, true);
  closeUnmatchedBlocks(state);
  addChild(state, "blockquote");
  return "container";
};

const startAtxHeading: BlockStart = state => {
  const { cursor } = state;
  if (cursor.indented) return "none";
  const re = state.dialect.permissiveAtxHeaders ? PERMISSIVE_ATX_HEADING_RE : ATX_HEADING_RE;
  const match = re.exec(cursor.restFromNonspace());
  if (!match) return "none";
  const hashes = match[0].replace(/[ \t]+$/, "").length;

  cursor.advanceNextNonspace();
  cursor.advanceOffset(hashes, false);
  closeUnmatchedBlocks(state);
  const heading = addChild(state, "heading");
  heading.level = HEADING_LEVELS[hashes - 1];
  heading.lines.push(atxHeadingContent(state.source, cursor.offset, cursor.end));
  cursor.advanceOffset(cursor.end - cursor.offset, false);
  return "leaf";
};

/** Heading text without surrounding blanks and without the optional closing `#` run. */
function atxHeadingContent(source: string, beg: number, end: number): ContentLine {
  let start = beg;
  while (start < end && isSpaceOrTab(source[start])) start++;
  let text = source.slice(start, end);
  if (/^#+[ \t]*$/.test(text)) {
    text = "";
  } else {
    text = text.replace(/[ \t]+#+[ \t]*$/, "").replace(/[ \t]+$/, "");
  }
  return { beg: start, end: start + text.length, indent: 0 };
}

const startFencedCode: BlockStart = state => {
  const { cursor } = state;
  if (cursor.indented) return "none";
  const match = CODE_FENCE_RE.exec(cursor.restFromNonspace());
  if (!match) return "none";

  const fenceLength = match[0].length;
  closeUnmatchedBlocks(state);
  const code = addChild(state, "code_block");
  code.fence = { char: match[0][0] === "~" ? "~" : "`", length: fenceLength, offset: cursor.indent };
  cursor.advanceNextNonspace();
  cursor.advanceOffset(fenceLength, false);
  code.info = cursor.restFromOffset().replace(/^[ \t]+|[ \t]+$/g, "");
  cursor.advanceOffset(cursor.end - cursor.offset, false);
  return "consumed";
};

const startHtmlBlock: BlockStart = (state, container) => {
  const { cursor } = state;
  if (state.dialect.noHtmlBlocks || cursor.indented || cursor.peek(cursor.nextNonspace) !== "<") return "none";
  const lazyParagraph = !state.allClosed && !cursor.blank && state.tip.kind === "paragraph";
  const kind = htmlBlockStartKind(cursor.restFromNonspace(), container.kind === "paragraph" || lazyParagraph);
  if (kind === 0) return "none";
  closeUnmatchedBlocks(state);
  const html = addChild(state, "html_block");
  html.htmlKind = kind;
  return "leaf";
};

/**
 * A delimiter row directly under a one-line paragraph turns that line into a
 * table header.
 */
const startTable: BlockStart = (state, container) => {
  const { cursor } = state;
  if (!state.dialect.tables || cursor.indented || container.kind !== "paragraph") return "none";
  const row = cursor.restFromNonspace();
  const aligns = parseDelimiterRow(row);
  if (!aligns) return "none";

  resolveRefDefinitions(state, container);
  if (container.lines.length !== 1) return "none";
  const header = container.lines[0];
  const headerText = contentLineText(state.source, header);
  if (splitTableRow(headerText).length !== aligns.length) return "none";
  if (!row.includes("|") && !headerText.includes("|")) return "none";

  closeUnmatchedBlocks(state);
  container.open = false;
  detach(container);
  state.tip = container.parent ?? state.document;

  const table = addChild(state, "table");
  table.startLine = state.lineNumber - 1;
  table.lastContentLine = state.lineNumber;
  table.lines.push(header);
  table.aligns = aligns;
  cursor.advanceOffset(cursor.end - cursor.offset, false);
  return "consumed";
};

const startSetextHeading: BlockStart = (state, container) => {
  const { cursor } = state;
  if (cursor.indented || container.kind !== "paragraph") return "none";
  const match = SETEXT_HEADING_RE.exec(cursor.restFromNonspace());
  if (!match) return "none";

  closeUnmatchedBlocks(state);
  resolveRefDefinitions(state, container);
  if (container.lines.length === 0) return "none";
  container.kind = "heading";
  container.level = match[0][0] === "=" ? 1 : 2;
  container.lastContentLine = state.lineNumber;
  cursor.advanceOffset(cursor.end - cursor.offset, false);
  return "leaf";
};

const startThematicBreak: BlockStart = state => {
  const { cursor } = state;
  if (cursor.indented || !THEMATIC_BREAK_RE.test(cursor.restFromNonspace())) return "none";
  closeUnmatchedBlocks(state);
  addChild(state, "thematic_break");
  cursor.advanceOffset(cursor.end - cursor.offset, false);
  return "leaf";
};

const startListItem: BlockStart = (state, container) => {
  const { cursor } = state;
  if (cursor.indented) return "none";
  const rest = cursor.restFromNonspace();
  const marker = parseListMarker(rest, 0);
  if (!marker) return "none";
  if (container.kind === "paragraph") {
    // Only "1." may interrupt a paragraph, and never with an empty item.
    if (marker.ordered && marker.start !== 1) return "none";
    if (BLANK_RE.test(rest.slice(marker.width))) return "none";
  }

  const markerOffset = cursor.indent;
  cursor.advanceNextNonspace();
  cursor.advanceOffset(marker.width, true);
  const spacesStartColumn = cursor.column;
  const spacesStartOffset = cursor.offset;
  do {
    cursor.advanceOffset(1, true);
  } while (cursor.column - spacesStartColumn < 5 && isSpaceOrTab(cursor.peek()));

  const blankItem = cursor.peek() === "";
  const spacesAfterMarker = cursor.column - spacesStartColumn;
  let padding: number;
  if (spacesAfterMarker >= 5 || spacesAfterMarker < 1 || blankItem) {
    // Content indented by five or more columns is indented code inside the item.
    padding = marker.width + 1;
    cursor.column = spacesStartColumn;
    cursor.offset = spacesStartOffset;
    cursor.partiallyConsumedTab = false;
    if (isSpaceOrTab(cursor.peek())) cursor.advanceOffset(1, true);
  } else {
    padding = marker.width + spacesAfterMarker;
  }

  const task = state.dialect.taskLists && !blankItem ? scanTaskMark(state) : null;

  closeUnmatchedBlocks(state);
  if (state.tip.kind !== "list" || !listsMatch(state.tip.listData, marker)) {
    const list = addChild(state, "list");
    list.listData = marker;
  }
  const item = addChild(state, "list_item");
  item.listData = marker;
  item.markerOffset = markerOffset;
  item.padding = padding;
  item.task = task;
  return "container";
};

/** `[ ]`, `[x]` or `[X]` followed by a blank or the end of the line. Consumes it. */
function scanTaskMark(state: BlockParserState): TaskMark | null {
  const { cursor } = state;
  if (cursor.partiallyConsumedTab) return null;
  const at = cursor.offset;
  const mark = cursor.peek(at + 1);
  if (cursor.peek(at) !== "[" || cursor.peek(at + 2) !== "]") return null;
  if (mark !== " " && mark !== "x" && mark !== "X") return null;
  const after = cursor.peek(at + 3);
  if (after !== "" && !isSpaceOrTab(after)) return null;
  cursor.advanceOffset(3, false);
  return { mark, offset: at + 1 };
}

function listsMatch(a: ListMarker | null, b: ListMarker): boolean {
  return a !== null && a.ordered === b.ordered && a.bulletChar === b.bulletChar && a.delimiter === b.delimiter;
}

const startIndentedCode: BlockStart = state => {
  const { cursor } = state;
  if (!cursor.indented || state.dialect.noIndentedCodeBlocks) return "none";
  if (state.tip.kind === "paragraph" || cursor.blank) return "none";
  cursor.advanceOffset(CODE_INDENT, true);
  closeUnmatchedBlocks(state);
  addChild(state, "code_block");
  return "leaf";
};

const BLOCK_STARTS: readonly BlockStart[] = [
  startBlockquote,
  startAtxHeading,
  startFencedCode,
  startHtmlBlock,
  startTable,
  startSetextHeading,
  startThematicBreak,
  startListItem,
  startIndentedCode,
];

function closeUnmatchedBlocks(state: BlockParserState) {
  if (state.allClosed) return;
  while (state.oldTip !== state.lastMatchedContainer) {
    const parent = state.oldTip.parent ?? state.document;
    finalize(state, state.oldTip, state.lineNumber - 1);
    state.oldTip = parent;
  }
  state.allClosed = true;
}

function addChild(state: BlockParserState, kind: BlockKind): BlockRecord {
  while (!canContain(state.tip.kind, kind)) {
    finalize(state, state.tip, state.lineNumber - 1);
  }
  const parent = state.tip;
  const record = createRecord(kind, parent, state.lineNumber);
  if (CONTAINER_KINDS.has(kind) && record.depth > state.dialect.maxNestingDepth) {
    throw new ParserError(
      "NESTING_TOO_DEEP",
      `Block containers nest deeper than ${state.dialect.maxNestingDepth} levels at line ${state.lineNumber}`,
    );
  }
  parent.children.push(record);
  state.tip = record;
  if (state.log) state.log(`block: open ${kind} at line ${state.lineNumber}`);
  return record;
}

function addLine(state: BlockParserState, record: BlockRecord): ContentLine {
  const line = state.cursor.takeRest();
  record.lines.push(line);
  if (!BLANK_RE.test(state.source.slice(line.beg, line.end))) {
    record.lastContentLine = state.lineNumber;
  }
  return line;
}

function detach(record: BlockRecord) {
  const siblings = record.parent?.children;
  if (!siblings) return;
  const index = siblings.indexOf(record);
  if (index >= 0) siblings.splice(index, 1);
}

function finalize(state: BlockParserState, record: BlockRecord, lineNumber: number) {
  record.open = false;
  switch (record.kind) {
    case "paragraph":
      resolveRefDefinitions(state, record);
      record.endLine = record.lastContentLine;
      if (record.lines.length === 0) detach(record);
      break;
    case "code_block":
      if (!record.fence) {
        while (record.lines.length > 0 && BLANK_RE.test(contentLineText(state.source, record.lines[record.lines.length - 1]))) {
          record.lines.pop();
        }
      }
      record.endLine = record.lastContentLine;
      break;
    case "html_block":
    case "table":
      record.endLine = record.lastContentLine;
      break;
    case "list_item":
      record.endLine = lastChildEnd(record);
      break;
    case "list":
      record.endLine = lastChildEnd(record);
      record.tight = isTight(record);
      break;
    default:
      record.endLine = lineNumber;
  }
  if (state.log) state.log(`block: close ${record.kind} (lines ${record.startLine}-${record.endLine})`);
  state.tip = record.parent ?? state.document;
}

function lastChildEnd(record: BlockRecord): number {
  const last = record.children[record.children.length - 1];
  return last === undefined ? record.startLine : last.endLine;
}

function endsWithBlankLine(block: BlockRecord, next: BlockRecord): boolean {
  return block.endLine !== next.startLine - 1;
}

/** A list is loose when a blank line separates two items or two blocks inside one item. */
function isTight(list: BlockRecord): boolean {
  const items = list.children;
  for (let i = 0; i < items.length; i++) {
    const item = items[i];
    if (i + 1 < items.length && endsWithBlankLine(item, items[i + 1])) return false;
    const blocks = item.children;
    for (let j = 0; j + 1 < blocks.length; j++) {
      if (endsWithBlankLine(blocks[j], blocks[j + 1])) return false;
    }
  }
  return true;
}

/**
 * Strips link reference definitions off the front of a paragraph and records
 * them. The first definition of a label wins.
 */
function resolveRefDefinitions(state: BlockParserState, paragraph: BlockRecord) {
  if (paragraph.lines.length === 0) return;
  const text = paragraph.lines.map(line => contentLineText(state.source, line)).join("\n");
  let pos = 0;
  let consumedLines = 0;
  while (text[pos] === "[") {
    const parsed = parseRefDefinition(text.slice(pos));
    if (!parsed) break;
    const { definition, length } = parsed;
    if (!state.refDefinitions.has(definition.label)) {
      state.refDefinitions.set(definition.label, definition);
      if (state.log) state.log(`block: reference definition [${definition.label}] -> ${definition.destination}`);
    }
    const consumed = text.slice(pos, pos + length);
    const newlines = consumed.split("\n").length - 1;
    consumedLines += consumed.endsWith("\n") ? newlines : newlines + 1;
    pos += length;
  }
  if (consumedLines > 0) {
    paragraph.lines = paragraph.lines.slice(consumedLines);
  }
}
