import type { BlockRecord } from "./ast";
import type { Alignment, Block, CallbackResult, ParserCallbacks } from "./events";
import { buildAttribute } from "./attribute";
import { ParserError } from "./errors";
import {
  emitInlines,
  emitTextWithNulls,
  parseInlineString,
  type InlineContext,
  type InlineEventOutput,
} from "./inline-parser";
import { contentLineText, type ContentLine } from "./line-cursor";
import { splitTableRow } from "./table";

export interface EventOutput extends InlineEventOutput {
  enterBlock(block: Block): void;
  leaveBlock(block: Block): void;
}

export interface WalkContext extends InlineContext {
  source: string;
  out: EventOutput;
}

/**
 * Wraps the caller's callbacks so that a non-zero return value unwinds the
 * whole walk at once.
 */
export function guardCallbacks(callbacks: ParserCallbacks): EventOutput {
  const check = (result: CallbackResult, name: string) => {
    if (typeof result === "number" && result !== 0) {
      throw new ParserError("CALLBACK_ABORTED", `${name} callback returned ${result}`);
    }
  };
  return {
    enterBlock: block => check(callbacks.enterBlock(block), "enterBlock"),
    leaveBlock: block => check(callbacks.leaveBlock(block), "leaveBlock"),
    enterSpan: span => check(callbacks.enterSpan(span), "enterSpan"),
    leaveSpan: span => check(callbacks.leaveSpan(span), "leaveSpan"),
    text: (type, text) => check(callbacks.text(type, text), "text"),
  };
}

/** Second pass: reports the finished block records, running the inline pass on each leaf. */
export function walkBlockTree(record: BlockRecord, context: WalkContext) {
  const { out } = context;
  switch (record.kind) {
    case "document":
      withBlock(context, { type: "document" }, () => walkChildren(record, context));
      break;
    case "blockquote":
      withBlock(context, { type: "blockquote" }, () => walkChildren(record, context));
      break;
    case "list": {
      const marker = record.listData;
      const block: Block =
        marker && marker.ordered
          ? { type: "ordered_list", start: marker.start, isTight: record.tight, markDelimiter: marker.delimiter }
          : { type: "unordered_list", isTight: record.tight, mark: marker ? marker.bulletChar : "-" };
      withBlock(context, block, () => walkChildren(record, context));
      break;
    }
    case "list_item": {
      const task = record.task;
      const block: Block = {
        type: "list_item",
        isTask: task !== null,
        taskMark: task ? task.mark : null,
        taskMarkOffset: task ? task.offset : -1,
      };
      withBlock(context, block, () => walkChildren(record, context));
      break;
    }
    case "thematic_break":
      withBlock(context, { type: "thematic_break" }, () => undefined);
      break;
    case "heading":
      withBlock(context, { type: "heading", level: record.level }, () => walkInlines(record.lines, context));
      break;
    case "paragraph":
      withBlock(context, { type: "paragraph" }, () => walkInlines(record.lines, context));
      break;
    case "code_block": {
      const lang = record.info.split(/[ \t]+/)[0];
      const block: Block = {
        type: "code_block",
        info: buildAttribute(record.info),
        lang: buildAttribute(lang),
        fenceChar: record.fence ? record.fence.char : null,
      };
      withBlock(context, block, () => {
        for (const line of record.lines) {
          emitTextWithNulls(out, "code", `${contentLineText(context.source, line)}\n`);
        }
      });
      break;
    }
    case "html_block":
      withBlock(context, { type: "html_block" }, () => {
        for (const line of record.lines) {
          emitTextWithNulls(out, "html", `${contentLineText(context.source, line)}\n`);
        }
      });
      break;
    case "table":
      walkTable(record, context);
      break;
  }
}

function withBlock(context: WalkContext, block: Block, body: () => void) {
  context.out.enterBlock(block);
  body();
  context.out.leaveBlock(block);
}

function walkChildren(record: BlockRecord, context: WalkContext) {
  for (const child of record.children) {
    walkBlockTree(child, context);
  }
}

function walkInlines(lines: ContentLine[], context: WalkContext) {
  const text = lines
    .map(line => contentLineText(context.source, line))
    .join("\n")
    .replace(/^[ \t]+|[ \t]+$/g, "");
  emitInlines(parseInlineString(text, context), context.out, context.dialect);
}

function walkTable(record: BlockRecord, context: WalkContext) {
  const [header, ...rows] = record.lines;
  const aligns = record.aligns;
  const table: Block = {
    type: "table",
    columnCount: aligns.length,
    headRowCount: 1,
    bodyRowCount: rows.length,
  };

  withBlock(context, table, () => {
    withBlock(context, { type: "table_head" }, () => walkRow(header, "table_header", aligns, context));
    if (rows.length > 0) {
      withBlock(context, { type: "table_body" }, () => {
        for (const row of rows) walkRow(row, "table_data", aligns, context);
      });
    }
  });
}

/** Short rows are padded with empty cells; cells past the column count are dropped. */
function walkRow(
  line: ContentLine,
  cellType: "table_header" | "table_data",
  aligns: Alignment[],
  context: WalkContext,
) {
  const cells = splitTableRow(contentLineText(context.source, line));
  withBlock(context, { type: "table_row" }, () => {
    aligns.forEach((align, column) => {
      const cell = cells[column] ?? "";
      withBlock(context, { type: cellType, align }, () => {
        emitInlines(parseInlineString(cell, context), context.out, context.dialect);
      });
    });
  });
}
