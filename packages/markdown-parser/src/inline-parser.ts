import type { InlineNode, TextNode } from "./ast";
import type { Dialect } from "./config";
import type { Span, TextType } from "./events";
import { buildAttribute, emptyAttribute } from "./attribute";
import { matchEntity } from "./entity";
import { applyPermissiveAutolinks, mergeAdjacentText } from "./inline-parser/autolinks";
import {
  delimiterRunFlags,
  processEmphasis,
  pushDelimiter,
  type Delimiter,
  type DelimiterChar,
  type DelimiterStack,
} from "./inline-parser/parse-inlines-with-delimiter-stack";
import {
  CLOSE_TAG,
  OPEN_TAG,
  charAt,
  charBefore,
  isAsciiPunctuation,
  normalizeRefLabel,
  scanLinkDestination,
  scanLinkLabel,
  scanLinkTitle,
  skipSpaceAndNewline,
  type RefDefinition,
} from "./parser-helpers";

export interface InlineContext {
  dialect: Dialect;
  refDefinitions: Map<string, RefDefinition>;
  log?: (message: string) => void;
}

/** The part of the event callbacks the inline pass writes to. */
export interface InlineEventOutput {
  enterSpan(span: Span): void;
  leaveSpan(span: Span): void;
  text(type: TextType, text: string): void;
}

interface Bracket {
  node: TextNode;
  /** Offset of the `[` in the subject. */
  index: number;
  image: boolean;
  active: boolean;
  /** Another bracket was opened after this one, so it cannot be a shortcut label. */
  bracketAfter: boolean;
  previousDelimiter: Delimiter | null;
  previous: Bracket | null;
}

interface InlineState extends DelimiterStack {
  subject: string;
  pos: number;
  brackets: Bracket | null;
  context: InlineContext;
}

interface LinkTarget {
  destination: string;
  title: string | null;
}

const SPECIAL_CHAR_RE = /[\n\\`*_~$[\]!<&\0]/g;
const AUTOLINK_URI_RE = /<([A-Za-z][A-Za-z0-9.+-]{1,31}:[^<>\x00-\x20]*)>/y;
const AUTOLINK_EMAIL_RE =
  /<([a-zA-Z0-9.!#$%&'*+/=?^_`{|}~-]+@[a-zA-Z0-9](?:[a-zA-Z0-9-]{0,61}[a-zA-Z0-9])?(?:\.[a-zA-Z0-9](?:[a-zA-Z0-9-]{0,61}[a-zA-Z0-9])?)*)>/y;
const RAW_HTML_RE = new RegExp(
  `(?:${OPEN_TAG}|${CLOSE_TAG}|<!-->|<!--->|<!--[\\s\\S]*?-->|[<][?][\\s\\S]*?[?][>]|<![A-Za-z]+[^>]*>|<!\\[CDATA\\[[\\s\\S]*?\\]\\]>)`,
  "iy",
);
const MAX_WIKI_TARGET_LENGTH = 100;

/**
 * Scans the inline content of one leaf block into nodes. Emphasis is resolved
 * with the delimiter stack once the whole subject is read; links are resolved
 * as their closing bracket is reached.
 */
export function parseInlineString(subject: string, context: InlineContext, nested = false): InlineNode[] {
  const state: InlineState = {
    subject,
    pos: 0,
    nodes: [],
    top: null,
    brackets: null,
    context,
  };
  while (state.pos < subject.length) {
    parseInline(state);
  }
  processEmphasis(state, null, context.dialect.underline);

  let nodes = mergeAdjacentText(state.nodes);
  const { dialect } = context;
  if (!nested && (dialect.permissiveUrlAutolinks || dialect.permissiveEmailAutolinks || dialect.permissiveWwwAutolinks)) {
    nodes = applyPermissiveAutolinks(nodes, {
      url: dialect.permissiveUrlAutolinks,
      email: dialect.permissiveEmailAutolinks,
      www: dialect.permissiveWwwAutolinks,
    });
  }
  if (context.log) context.log(`inline: ${subject.length} chars -> ${nodes.length} top-level nodes`);
  return nodes;
}

function parseInline(state: InlineState) {
  const { subject, context } = state;
  const { dialect } = context;
  const c = subject[state.pos];
  switch (c) {
    case "\n":
      parseNewline(state);
      return;
    case "\\":
      parseBackslash(state);
      return;
    case "`":
      parseBackticks(state);
      return;
    case "*":
    case "_":
      handleDelimiters(state, c);
      return;
    case "~":
      if (dialect.strikethrough) {
        handleDelimiters(state, c);
        return;
      }
      break;
    case "$":
      if (dialect.latexMathSpans) {
        parseMath(state);
        return;
      }
      break;
    case "[":
      if (dialect.wikiLinks && subject[state.pos + 1] === "[" && parseWikiLink(state)) return;
      pushBracket(state, "[", state.pos, false);
      state.pos += 1;
      return;
    case "!":
      if (subject[state.pos + 1] === "[") {
        pushBracket(state, "![", state.pos + 1, true);
        state.pos += 2;
        return;
      }
      break;
    case "]":
      parseCloseBracket(state);
      return;
    case "<":
      if (parseAutolink(state)) return;
      if (!dialect.noHtmlSpans && parseRawHtml(state)) return;
      break;
    case "&":
      parseEntity(state);
      return;
    case "\0":
      state.nodes.push({ type: "null_char" });
      state.pos += 1;
      return;
  }

  SPECIAL_CHAR_RE.lastIndex = state.pos + 1;
  const next = SPECIAL_CHAR_RE.exec(subject);
  const end = next ? next.index : subject.length;
  pushText(state, subject.slice(state.pos, end));
  state.pos = end;
}

function pushText(state: InlineState, value: string): TextNode {
  const node: TextNode = { type: "text", value };
  state.nodes.push(node);
  return node;
}

function parseNewline(state: InlineState) {
  state.pos += 1;
  const last = state.nodes[state.nodes.length - 1];
  if (last !== undefined && last.type === "text" && last.value.endsWith(" ")) {
    const hard = last.value.endsWith("  ");
    last.value = last.value.replace(/ +$/, "");
    state.nodes.push({ type: hard ? "hard_break" : "soft_break" });
  } else {
    state.nodes.push({ type: "soft_break" });
  }
  skipLeadingSpaces(state);
}

function skipLeadingSpaces(state: InlineState) {
  while (state.subject[state.pos] === " ") state.pos += 1;
}

function parseBackslash(state: InlineState) {
  const next = state.subject[state.pos + 1];
  if (next === "\n") {
    state.pos += 2;
    state.nodes.push({ type: "hard_break" });
    skipLeadingSpaces(state);
  } else if (next !== undefined && isAsciiPunctuation(next)) {
    pushText(state, next);
    state.pos += 2;
  } else {
    pushText(state, "\\");
    state.pos += 1;
  }
}

function runEnd(subject: string, pos: number, ch: string): number {
  let end = pos;
  while (subject[end] === ch) end++;
  return end;
}

function parseBackticks(state: InlineState) {
  const { subject } = state;
  const start = state.pos;
  const afterOpen = runEnd(subject, start, "`");
  const ticks = afterOpen - start;

  let search = afterOpen;
  for (;;) {
    const open = subject.indexOf("`", search);
    if (open < 0) break;
    const close = runEnd(subject, open, "`");
    if (close - open === ticks) {
      let content = subject.slice(afterOpen, open).replace(/\n/g, " ");
      if (/[^ ]/.test(content) && content.startsWith(" ") && content.endsWith(" ")) {
        content = content.slice(1, -1);
      }
      state.nodes.push({ type: "code", value: content });
      state.pos = close;
      return;
    }
    search = close;
  }

  pushText(state, subject.slice(start, afterOpen));
  state.pos = afterOpen;
}

function handleDelimiters(state: InlineState, char: DelimiterChar) {
  const { subject } = state;
  const start = state.pos;
  const end = runEnd(subject, start, char);
  const node = pushText(state, subject.slice(start, end));
  state.pos = end;

  // Runs of three or more tildes are plain text.
  if (char === "~" && end - start > 2) return;
  const { canOpen, canClose } = delimiterRunFlags(char, charBefore(subject, start), charAt(subject, end));
  if (canOpen || canClose) {
    pushDelimiter(state, char, node, canOpen, canClose);
  }
}

/**
 * `$...$` and `$$...$$`. The content is taken verbatim; the opener must not be
 * followed by whitespace and the closer, a run of the same length, must not
 * be preceded by it.
 */
function parseMath(state: InlineState) {
  const { subject } = state;
  const start = state.pos;
  const afterOpen = runEnd(subject, start, "$");
  const run = afterOpen - start;
  state.pos = afterOpen;

  if (run <= 2 && afterOpen < subject.length && !/\s/.test(subject[afterOpen])) {
    let search = afterOpen;
    for (;;) {
      const open = subject.indexOf("$", search);
      if (open < 0) break;
      const close = runEnd(subject, open, "$");
      const before = subject[open - 1];
      if (close - open === run && !/\s/.test(before) && before !== "\\") {
        state.nodes.push({
          type: "math",
          display: run === 2,
          value: subject.slice(afterOpen, open).replace(/\n/g, " "),
        });
        state.pos = close;
        return;
      }
      search = close;
    }
  }

  pushText(state, subject.slice(start, afterOpen));
}

/** `[[target]]` or `[[target|label]]`. Returns false to fall back to plain brackets. */
function parseWikiLink(state: InlineState): boolean {
  const { subject } = state;
  const innerStart = state.pos + 2;
  const close = subject.indexOf("]]", innerStart);
  if (close < 0) return false;

  const inner = subject.slice(innerStart, close);
  const pipe = inner.indexOf("|");
  const target = pipe >= 0 ? inner.slice(0, pipe) : inner;
  const label = pipe >= 0 ? inner.slice(pipe + 1) : null;
  if (target === "" || target.length > MAX_WIKI_TARGET_LENGTH || /[[\]\n]/.test(target)) return false;
  if (label !== null && /[[\]]/.test(label)) return false;

  const children: InlineNode[] =
    label !== null ? parseInlineString(label, state.context, true) : [{ type: "text", value: target }];
  state.nodes.push({
    type: "span",
    span: { type: "wiki_link", target: buildAttribute(target) },
    children,
  });
  state.pos = close + 2;
  return true;
}

function pushBracket(state: InlineState, text: string, index: number, image: boolean) {
  const node = pushText(state, text);
  if (state.brackets) state.brackets.bracketAfter = true;
  state.brackets = {
    node,
    index,
    image,
    active: true,
    bracketAfter: false,
    previousDelimiter: state.top,
    previous: state.brackets,
  };
}

function removeBracket(state: InlineState) {
  if (state.brackets) state.brackets = state.brackets.previous;
}

function parseCloseBracket(state: InlineState) {
  const { subject, context } = state;
  state.pos += 1;
  const afterBracket = state.pos;

  const opener = state.brackets;
  if (!opener) {
    pushText(state, "]");
    return;
  }
  if (!opener.active) {
    pushText(state, "]");
    removeBracket(state);
    return;
  }

  let target: LinkTarget | null = null;
  if (subject[state.pos] === "(") {
    const inline = scanInlineLinkTail(subject, state.pos + 1);
    if (inline) {
      target = inline;
      state.pos = inline.end;
    }
  }

  if (!target) {
    const labelEnd = subject.startsWith("[]", state.pos) ? state.pos + 2 : scanLinkLabel(subject, state.pos);
    let label: string | null = null;
    if (labelEnd > state.pos + 2) {
      label = subject.slice(state.pos + 1, labelEnd - 1);
    } else if (!opener.bracketAfter) {
      // Collapsed `[foo][]` and shortcut `[foo]` both use the link text as label.
      label = subject.slice(opener.index + 1, afterBracket - 1);
    }
    if (label !== null) {
      const definition = context.refDefinitions.get(normalizeRefLabel(label));
      if (definition) {
        target = definition;
        if (labelEnd > 0) state.pos = labelEnd;
      }
    }
  }

  if (!target) {
    removeBracket(state);
    state.pos = afterBracket;
    pushText(state, "]");
    return;
  }

  const title = target.title !== null ? buildAttribute(target.title) : emptyAttribute();
  const span: Span = opener.image
    ? { type: "image", src: buildAttribute(target.destination), title }
    : { type: "link", href: buildAttribute(target.destination), title, isAutolink: false };

  processEmphasis(state, opener.previousDelimiter, context.dialect.underline);
  const openerIndex = state.nodes.lastIndexOf(opener.node);
  const children = state.nodes.splice(openerIndex + 1);
  state.nodes.splice(openerIndex, 1);
  state.nodes.push({ type: "span", span, children });
  removeBracket(state);

  // Links may not contain other links.
  if (!opener.image) {
    for (let bracket = state.brackets; bracket !== null; bracket = bracket.previous) {
      if (!bracket.image) bracket.active = false;
    }
  }
}

/** The `(destination "title")` part of an inline link, starting after `(`. */
function scanInlineLinkTail(subject: string, pos: number): (LinkTarget & { end: number }) | null {
  const destination = scanLinkDestination(subject, skipSpaceAndNewline(subject, pos));
  if (!destination) return null;

  const beforeTitle = destination.end;
  let p = skipSpaceAndNewline(subject, beforeTitle);
  let title: string | null = null;
  if (p !== beforeTitle) {
    const scanned = scanLinkTitle(subject, p);
    if (scanned) {
      title = scanned.raw;
      p = skipSpaceAndNewline(subject, scanned.end);
    }
  }
  if (subject[p] !== ")") return null;
  return { destination: destination.raw, title, end: p + 1 };
}

function parseAutolink(state: InlineState): boolean {
  AUTOLINK_EMAIL_RE.lastIndex = state.pos;
  const email = AUTOLINK_EMAIL_RE.exec(state.subject);
  AUTOLINK_URI_RE.lastIndex = state.pos;
  const uri = email ? null : AUTOLINK_URI_RE.exec(state.subject);
  const match = email ?? uri;
  if (!match) return false;

  const address = match[1];
  state.nodes.push({
    type: "span",
    span: {
      type: "link",
      href: buildAttribute(email ? `mailto:${address}` : address, { resolveEscapes: false, entities: false }),
      title: emptyAttribute(),
      isAutolink: true,
    },
    children: [{ type: "text", value: address }],
  });
  state.pos += match[0].length;
  return true;
}

function parseRawHtml(state: InlineState): boolean {
  RAW_HTML_RE.lastIndex = state.pos;
  const match = RAW_HTML_RE.exec(state.subject);
  if (!match) return false;
  state.nodes.push({ type: "raw_html", value: match[0] });
  state.pos += match[0].length;
  return true;
}

function parseEntity(state: InlineState) {
  const length = matchEntity(state.subject, state.pos);
  if (length > 0) {
    state.nodes.push({ type: "entity", raw: state.subject.slice(state.pos, state.pos + length) });
    state.pos += length;
  } else {
    pushText(state, "&");
    state.pos += 1;
  }
}

/** Emits `value` as `type` text, reporting each NUL character on its own. */
export function emitTextWithNulls(out: Pick<InlineEventOutput, "text">, type: TextType, value: string) {
  let start = 0;
  for (let i = 0; i < value.length; i++) {
    if (value[i] !== "\0") continue;
    if (i > start) out.text(type, value.slice(start, i));
    out.text("null_char", "\0");
    start = i + 1;
  }
  if (start < value.length) out.text(type, value.slice(start));
}

interface EmitFrame {
  nodes: InlineNode[];
  index: number;
  span: Span | null;
}

/**
 * Walks the node tree depth first and reports it. The walk keeps its own stack
 * so deeply nested spans cannot exhaust the call stack.
 */
export function emitInlines(nodes: InlineNode[], out: InlineEventOutput, dialect: Dialect) {
  const stack: EmitFrame[] = [{ nodes, index: 0, span: null }];
  while (stack.length > 0) {
    const frame = stack[stack.length - 1];
    if (frame.index >= frame.nodes.length) {
      stack.pop();
      if (frame.span) out.leaveSpan(frame.span);
      continue;
    }

    const node = frame.nodes[frame.index++];
    switch (node.type) {
      case "span":
        out.enterSpan(node.span);
        stack.push({ nodes: node.children, index: 0, span: node.span });
        break;
      case "text":
        if (node.value !== "") {
          out.text("normal", dialect.collapseWhitespace ? node.value.replace(/[ \t\v\f]+/g, " ") : node.value);
        }
        break;
      case "entity":
        out.text("entity", node.raw);
        break;
      case "null_char":
        out.text("null_char", "\0");
        break;
      case "soft_break":
        out.text(dialect.hardSoftBreaks ? "hard_break" : "soft_break", "\n");
        break;
      case "hard_break":
        out.text("hard_break", "\n");
        break;
      case "code": {
        const span: Span = { type: "code_span" };
        out.enterSpan(span);
        emitTextWithNulls(out, "code", node.value);
        out.leaveSpan(span);
        break;
      }
      case "raw_html":
        out.text("html", node.value);
        break;
      case "math": {
        const span: Span = { type: node.display ? "latex_math_display" : "latex_math" };
        out.enterSpan(span);
        emitTextWithNulls(out, "latex_math", node.value);
        out.leaveSpan(span);
        break;
      }
    }
  }
}
