export interface SourceLine {
  /** Offset of the first character of the line. */
  beg: number;
  /** Offset right before the line ending (or the end of input). */
  end: number;
}

/**
 * A slice of a source line that belongs to a leaf block. `indent` counts
 * spaces to put in front of the slice: the columns left over from a tab that
 * block markers consumed only in part.
 */
export interface ContentLine {
  beg: number;
  end: number;
  indent: number;
}

export const CODE_INDENT = 4;

/** Splits on "\n", "\r\n" and "\r". A final line ending does not open an extra line. */
export function splitLines(source: string): SourceLine[] {
  const lines: SourceLine[] = [];
  let beg = 0;
  let i = 0;
  while (i < source.length) {
    const c = source.charCodeAt(i);
    if (c === 0x0a || c === 0x0d) {
      lines.push({ beg, end: i });
      i += c === 0x0d && source.charCodeAt(i + 1) === 0x0a ? 2 : 1;
      beg = i;
      continue;
    }
    i++;
  }
  if (beg < source.length) {
    lines.push({ beg, end: source.length });
  }
  return lines;
}

export function contentLineText(source: string, line: ContentLine): string {
  const text = source.slice(line.beg, line.end);
  return line.indent > 0 ? " ".repeat(line.indent) + text : text;
}

/**
 * Walks one source line at a time, tracking both the character offset and the
 * visual column so that tabs count up to the next multiple of four.
 */
export class LineCursor {
  readonly source: string;
  beg = 0;
  end = 0;
  offset = 0;
  column = 0;
  partiallyConsumedTab = false;
  nextNonspace = 0;
  nextNonspaceColumn = 0;
  indent = 0;
  indented = false;
  blank = false;

  constructor(source: string) {
    this.source = source;
  }

  reset(line: SourceLine) {
    this.beg = line.beg;
    this.end = line.end;
    this.offset = line.beg;
    this.column = 0;
    this.partiallyConsumedTab = false;
    this.findNextNonspace();
  }

  /** Character at `pos`, or "" past the end of the line. */
  peek(pos: number = this.offset): string {
    return pos < this.end ? this.source[pos] : "";
  }

  /** The rest of the line from the first non-space character. */
  restFromNonspace(): string {
    return this.source.slice(this.nextNonspace, this.end);
  }

  restFromOffset(): string {
    return this.source.slice(this.offset, this.end);
  }

  findNextNonspace() {
    let i = this.offset;
    let cols = this.column;
    let c = "";
    while (i < this.end) {
      c = this.source[i];
      if (c === " ") {
        i++;
        cols++;
      } else if (c === "\t") {
        i++;
        cols += 4 - (cols % 4);
      } else {
        break;
      }
    }
    this.blank = i >= this.end;
    this.nextNonspace = i;
    this.nextNonspaceColumn = cols;
    this.indent = this.nextNonspaceColumn - this.column;
    this.indented = this.indent >= CODE_INDENT;
  }

  advanceNextNonspace() {
    this.offset = this.nextNonspace;
    this.column = this.nextNonspaceColumn;
    this.partiallyConsumedTab = false;
  }

  /**
   * Moves forward by `count` characters, or by `count` columns when `columns`
   * is set, in which case a tab may be left partially consumed.
   */
  advanceOffset(count: number, columns = false) {
    let remaining = count;
    while (remaining > 0 && this.offset < this.end) {
      const c = this.source[this.offset];
      if (c === "\t") {
        const charsToTab = 4 - (this.column % 4);
        if (columns) {
          this.partiallyConsumedTab = charsToTab > remaining;
          const charsToAdvance = charsToTab > remaining ? remaining : charsToTab;
          this.column += charsToAdvance;
          this.offset += this.partiallyConsumedTab ? 0 : 1;
          remaining -= charsToAdvance;
        } else {
          this.partiallyConsumedTab = false;
          this.column += charsToTab;
          this.offset += 1;
          remaining -= 1;
        }
      } else {
        this.partiallyConsumedTab = false;
        this.offset += 1;
        this.column += 1;
        remaining -= 1;
      }
    }
  }

  /** Takes the rest of the line as block content, expanding a half-eaten tab. */
  takeRest(): ContentLine {
    if (this.partiallyConsumedTab) {
      const charsToTab = 4 - (this.column % 4);
      this.offset += 1;
      this.column += charsToTab;
      this.partiallyConsumedTab = false;
      return { beg: this.offset, end: this.end, indent: charsToTab };
    }
    return { beg: this.offset, end: this.end, indent: 0 };
  }
}
