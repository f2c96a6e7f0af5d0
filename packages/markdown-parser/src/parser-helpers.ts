const ASCII_PUNCTUATION = "!\"#$%&'()*+,-./:;<=>?@[\\]^_`{|}~";
const UNICODE_WHITESPACE_RE = /^[\t\n\f\r\p{Zs}]$/u;
const UNICODE_PUNCTUATION_RE = /^[\p{P}\p{S}]$/u;

export function isAsciiPunctuation(ch: string): boolean {
  return ch.length === 1 && ASCII_PUNCTUATION.includes(ch);
}

/** Empty string stands for the start or end of the text and counts as whitespace. */
export function isUnicodeWhitespace(ch: string): boolean {
  return ch === "" || UNICODE_WHITESPACE_RE.test(ch);
}

export function isUnicodePunctuation(ch: string): boolean {
  return ch !== "" && (isAsciiPunctuation(ch) || UNICODE_PUNCTUATION_RE.test(ch));
}

export function isSpaceOrTab(ch: string | undefined): boolean {
  return ch === " " || ch === "\t";
}

/** The whole code point ending right before `pos`. */
export function charBefore(text: string, pos: number): string {
  if (pos <= 0) return "";
  const low = text.charCodeAt(pos - 1);
  if (low >= 0xdc00 && low <= 0xdfff && pos >= 2) {
    const high = text.charCodeAt(pos - 2);
    if (high >= 0xd800 && high <= 0xdbff) return text.slice(pos - 2, pos);
  }
  return text[pos - 1];
}

/** The whole code point starting at `pos`. */
export function charAt(text: string, pos: number): string {
  if (pos >= text.length) return "";
  const cp = text.codePointAt(pos) ?? 0;
  return String.fromCodePoint(cp);
}

/**
 * Case-folds and collapses whitespace so `[Foo  Bar]` and `[foo bar]` name the
 * same definition. Upper-casing after lower-casing folds `ẞ` to `SS`.
 */
export function normalizeRefLabel(str: string) {
  return str.trim().replace(/[ \t\r\n]+/g, " ").toLowerCase().toUpperCase();
}

export interface LinkDestination {
  raw: string;
  end: number;
}

export interface LinkTitle {
  raw: string;
  end: number;
}

const MAX_LABEL_LENGTH = 999;
const MAX_DESTINATION_PARENS = 32;

/**
 * Scans `[label]` starting at the opening bracket. Returns the index right after
 * the closing bracket, or -1.
 */
export function scanLinkLabel(text: string, pos: number): number {
  if (text[pos] !== "[") return -1;
  let i = pos + 1;
  let hasContent = false;
  while (i < text.length && i - pos - 1 <= MAX_LABEL_LENGTH) {
    const ch = text[i];
    if (ch === "\\" && i + 1 < text.length && isAsciiPunctuation(text[i + 1])) {
      hasContent = true;
      i += 2;
      continue;
    }
    if (ch === "[") return -1;
    if (ch === "]") {
      return hasContent && i - pos - 1 <= MAX_LABEL_LENGTH ? i + 1 : -1;
    }
    if (!isUnicodeWhitespace(ch)) hasContent = true;
    i++;
  }
  return -1;
}

export function scanLinkDestination(text: string, pos: number): LinkDestination | null {
  if (text[pos] === "<") {
    let i = pos + 1;
    while (i < text.length) {
      const ch = text[i];
      if (ch === "\\" && i + 1 < text.length && isAsciiPunctuation(text[i + 1])) {
        i += 2;
        continue;
      }
      if (ch === "\n" || ch === "<") return null;
      if (ch === ">") return { raw: text.slice(pos + 1, i), end: i + 1 };
      i++;
    }
    return null;
  }

  let i = pos;
  let openParens = 0;
  while (i < text.length) {
    const ch = text[i];
    if (ch === "\\" && i + 1 < text.length && isAsciiPunctuation(text[i + 1])) {
      i += 2;
      continue;
    }
    if (ch === "(") {
      openParens++;
      if (openParens > MAX_DESTINATION_PARENS) return null;
    } else if (ch === ")") {
      if (openParens === 0) break;
      openParens--;
    } else if (ch.charCodeAt(0) <= 0x20 || ch === "\x7f") {
      break;
    }
    i++;
  }
  if (i === pos && text[i] !== ")") return null;
  if (openParens !== 0) return null;
  return { raw: text.slice(pos, i), end: i };
}

export function scanLinkTitle(text: string, pos: number): LinkTitle | null {
  const open = text[pos];
  const close = open === "(" ? ")" : open;
  if (open !== '"' && open !== "'" && open !== "(") return null;
  let i = pos + 1;
  while (i < text.length) {
    const ch = text[i];
    if (ch === "\\" && i + 1 < text.length && isAsciiPunctuation(text[i + 1])) {
      i += 2;
      continue;
    }
    if (ch === close) return { raw: text.slice(pos + 1, i), end: i + 1 };
    if (open === "(" && ch === "(") return null;
    i++;
  }
  return null;
}

/** Skips spaces and tabs with at most one line ending among them. */
export function skipSpaceAndNewline(text: string, pos: number): number {
  let i = pos;
  while (isSpaceOrTab(text[i])) i++;
  if (text[i] === "\n") {
    i++;
    while (isSpaceOrTab(text[i])) i++;
  }
  return i;
}

export interface RefDefinition {
  label: string;
  destination: string;
  title: string | null;
}

/**
 * Parses one link reference definition at the start of `text` (paragraph
 * content with lines joined by "\n"). Returns the definition and the number of
 * characters it covers, including its trailing line ending.
 */
export function parseRefDefinition(text: string): { definition: RefDefinition; length: number } | null {
  const labelEnd = scanLinkLabel(text, 0);
  if (labelEnd < 0 || text[labelEnd] !== ":") return null;
  const label = normalizeRefLabel(text.slice(1, labelEnd - 1));
  if (label === "") return null;

  const destStart = skipSpaceAndNewline(text, labelEnd + 1);
  const destination = scanLinkDestination(text, destStart);
  if (!destination) return null;
  if (destination.end === destStart && text[destStart] !== "<") return null;

  const beforeTitle = destination.end;
  const titleStart = skipSpaceAndNewline(text, beforeTitle);
  let title: LinkTitle | null = null;
  if (titleStart !== beforeTitle) {
    title = scanLinkTitle(text, titleStart);
  }

  if (title) {
    const end = lineEndAfterSpaces(text, title.end);
    if (end >= 0) {
      return { definition: { label, destination: destination.raw, title: title.raw }, length: end };
    }
  }
  const end = lineEndAfterSpaces(text, beforeTitle);
  if (end < 0) return null;
  return { definition: { label, destination: destination.raw, title: null }, length: end };
}

function lineEndAfterSpaces(text: string, pos: number): number {
  let i = pos;
  while (isSpaceOrTab(text[i])) i++;
  if (i === text.length) return i;
  if (text[i] === "\n") return i + 1;
  return -1;
}

export interface ListMarker {
  ordered: boolean;
  start: number;
  bulletChar: "-" | "+" | "*";
  delimiter: "." | ")";
  /** Width of the marker itself ("-" is 1, "10." is 3). */
  width: number;
}

/** Recognizes a list marker at `pos` followed by a space, a tab or the end of the line. */
export function parseListMarker(line: string, pos: number): ListMarker | null {
  const ch = line[pos];
  if (ch === "-" || ch === "+" || ch === "*") {
    const next = line[pos + 1];
    if (next !== undefined && !isSpaceOrTab(next)) return null;
    return { ordered: false, start: 1, bulletChar: ch, delimiter: ".", width: 1 };
  }
  const m = /^(\d{1,9})([.)])(?=[ \t]|$)/.exec(line.slice(pos, pos + 11));
  if (!m) return null;
  return {
    ordered: true,
    start: parseInt(m[1], 10),
    bulletChar: "-",
    delimiter: m[2] === ")" ? ")" : ".",
    width: m[0].length,
  };
}

const HTML_BLOCK_OPEN: RegExp[] = [
  /^<(?:script|pre|textarea|style)(?:\s|>|$)/i,
  /^<!--/,
  /^<[?]/,
  /^<![A-Za-z]/,
  /^<!\[CDATA\[/,
  /^<[/]?(?:address|article|aside|base|basefont|blockquote|body|caption|center|col|colgroup|dd|details|dialog|dir|div|dl|dt|fieldset|figcaption|figure|footer|form|frame|frameset|h[123456]|head|header|hr|html|iframe|legend|li|link|main|menu|menuitem|nav|noframes|ol|optgroup|option|p|param|search|section|summary|table|tbody|td|tfoot|th|thead|title|tr|track|ul)(?:\s|[/]?[>]|$)/i,
];

const HTML_BLOCK_CLOSE: RegExp[] = [
  /<\/(?:script|pre|textarea|style)>/i,
  /-->/,
  /\?>/,
  />/,
  /\]\]>/,
];

const TAG_NAME = "[A-Za-z][A-Za-z0-9-]*";
const ATTRIBUTE_NAME = "[a-zA-Z_:][a-zA-Z0-9:._-]*";
const ATTRIBUTE_VALUE = "(?:[^\"'=<>`\\x00-\\x20]+|'[^']*'|\"[^\"]*\")";
const ATTRIBUTE = `(?:\\s+${ATTRIBUTE_NAME}(?:\\s*=\\s*${ATTRIBUTE_VALUE})?)`;
export const OPEN_TAG = `<${TAG_NAME}${ATTRIBUTE}*\\s*/?>`;
export const CLOSE_TAG = `</${TAG_NAME}\\s*[>]`;

const HTML_BLOCK_COMPLETE_TAG = new RegExp(`^(?:${OPEN_TAG}|${CLOSE_TAG})[ \\t]*$`, "i");

/**
 * Returns the HTML block kind (1-7) that `line` opens, or 0. Kind 7 (a lone
 * complete tag) cannot interrupt a paragraph.
 */
export function htmlBlockStartKind(line: string, interruptsParagraph: boolean): number {
  if (line[0] !== "<") return 0;
  for (let kind = 1; kind <= HTML_BLOCK_OPEN.length; kind++) {
    if (HTML_BLOCK_OPEN[kind - 1].test(line)) return kind;
  }
  if (!interruptsParagraph && HTML_BLOCK_COMPLETE_TAG.test(line)) return 7;
  return 0;
}

/** Kinds 6 and 7 end at a blank line instead of a closing pattern. */
export function htmlBlockEnds(kind: number, line: string): boolean {
  if (kind < 1 || kind > 5) return false;
  return HTML_BLOCK_CLOSE[kind - 1].test(line);
}
