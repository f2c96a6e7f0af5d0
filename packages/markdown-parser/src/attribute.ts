import type { Attribute, SubstrType } from "./events";
import { matchEntity } from "./entity";
import { isAsciiPunctuation } from "./parser-helpers";

export interface AttributeOptions {
  /** Drop the backslash of `\` + ASCII punctuation. */
  resolveEscapes?: boolean;
  /** Recognize `&...;` entity references as separate substrings. */
  entities?: boolean;
}

/**
 * Splits a raw attribute value into typed substrings. Escapes are resolved
 * while building, so offsets refer to the resulting `text`, not to `raw`.
 */
export function buildAttribute(
  raw: string,
  { resolveEscapes = true, entities = true }: AttributeOptions = {},
): Attribute {
  let text = "";
  const substrTypes: SubstrType[] = [];
  const substrOffsets: number[] = [];

  const push = (type: SubstrType, value: string) => {
    if (value.length === 0) return;
    const last = substrTypes.length - 1;
    if (type === "normal" && last >= 0 && substrTypes[last] === "normal") {
      text += value;
      return;
    }
    substrTypes.push(type);
    substrOffsets.push(text.length);
    text += value;
  };

  let runStart = 0;
  let i = 0;
  while (i < raw.length) {
    const ch = raw[i];
    if (ch === "\\" && resolveEscapes && i + 1 < raw.length && isAsciiPunctuation(raw[i + 1])) {
      push("normal", raw.slice(runStart, i));
      push("normal", raw[i + 1]);
      i += 2;
      runStart = i;
      continue;
    }
    if (ch === "&" && entities) {
      const length = matchEntity(raw, i);
      if (length > 0) {
        push("normal", raw.slice(runStart, i));
        push("entity", raw.slice(i, i + length));
        i += length;
        runStart = i;
        continue;
      }
    }
    if (ch === "\0") {
      push("normal", raw.slice(runStart, i));
      push("null_char", ch);
      i++;
      runStart = i;
      continue;
    }
    i++;
  }
  push("normal", raw.slice(runStart));

  substrOffsets.push(text.length);
  return { text, substrTypes, substrOffsets };
}

export function emptyAttribute(): Attribute {
  return { text: "", substrTypes: [], substrOffsets: [0] };
}
