import type { Alignment } from "./events";

const DELIMITER_CELL_RE = /^:?-+:?$/;

/**
 * Splits a table row on unescaped pipes. Leading and trailing pipes are
 * optional; `\|` stays in the cell as a literal pipe.
 */
export function splitTableRow(line: string): string[] {
  let text = line.replace(/^[ \t]+|[ \t]+$/g, "");
  if (text.startsWith("|")) text = text.slice(1);
  if (text.endsWith("|") && !isEscapedAt(text, text.length - 1)) text = text.slice(0, -1);

  const cells: string[] = [];
  let cellStart = 0;
  let i = 0;
  while (i < text.length) {
    if (text[i] === "\\") {
      i += 2;
      continue;
    }
    if (text[i] === "|") {
      cells.push(cleanCell(text.slice(cellStart, i)));
      cellStart = i + 1;
    }
    i++;
  }
  cells.push(cleanCell(text.slice(cellStart)));
  return cells;
}

function cleanCell(raw: string): string {
  return raw.replace(/^[ \t]+|[ \t]+$/g, "").replace(/\\\|/g, "|");
}

function isEscapedAt(text: string, pos: number): boolean {
  let backslashes = 0;
  for (let i = pos - 1; i >= 0 && text[i] === "\\"; i--) backslashes++;
  return backslashes % 2 === 1;
}

/** Column alignments for a delimiter row such as `| :-- | :-: | --: |`, or null. */
export function parseDelimiterRow(line: string): Alignment[] | null {
  if (!/^[ \t|:-]+$/.test(line) || !line.includes("-")) return null;
  const cells = splitTableRow(line);
  const aligns: Alignment[] = [];
  for (const cell of cells) {
    if (!DELIMITER_CELL_RE.test(cell)) return null;
    const left = cell.startsWith(":");
    const right = cell.endsWith(":");
    aligns.push(left && right ? "center" : right ? "right" : left ? "left" : "default");
  }
  return aligns;
}
