import { decodeHTMLStrict } from "entities";

const NAMED_ENTITY_RE = /^&[A-Za-z][A-Za-z0-9]{1,47};/;
const DECIMAL_ENTITY_RE = /^&#[0-9]{1,7};/;
const HEX_ENTITY_RE = /^&#[xX][0-9A-Fa-f]{1,6};/;

const REPLACEMENT_CHARACTER = "\uFFFD";

// Hits are memoized; the underlying table is the HTML5 named character
// reference list shipped with `entities`.
const namedCache = new Map<string, number[]>();

/**
 * Returns the code points a named entity (without `&` and `;`) decodes to,
 * or null for names outside the HTML5 table.
 */
export function lookupEntity(name: string): number[] | null {
  const cached = namedCache.get(name);
  if (cached !== undefined) return cached;

  let codePoints: number[] | null = null;
  if (/^[A-Za-z][A-Za-z0-9]{1,47}$/.test(name)) {
    const raw = `&${name};`;
    const decoded = decodeHTMLStrict(raw);
    if (decoded !== raw && decoded.length > 0 && decoded.length <= 4) {
      codePoints = Array.from(decoded, ch => ch.codePointAt(0) ?? 0);
    }
  }
  if (codePoints) namedCache.set(name, codePoints);
  return codePoints;
}

export function isNumericEntity(raw: string): boolean {
  return DECIMAL_ENTITY_RE.test(raw) || HEX_ENTITY_RE.test(raw);
}

/**
 * Length of the entity reference starting at `pos`, or 0 if the text there is
 * not one. Named references must exist in the table.
 */
export function matchEntity(text: string, pos: number): number {
  if (text.charCodeAt(pos) !== 0x26 /* & */) return 0;
  const rest = text.slice(pos, pos + 50);
  const numeric = DECIMAL_ENTITY_RE.exec(rest) ?? HEX_ENTITY_RE.exec(rest);
  if (numeric) return numeric[0].length;
  const named = NAMED_ENTITY_RE.exec(rest);
  if (named && lookupEntity(named[0].slice(1, -1)) !== null) return named[0].length;
  return 0;
}

/** Decodes `&...;`. Invalid code points become U+FFFD; unknown names stay as written. */
export function decodeEntity(raw: string): string {
  if (raw.startsWith("&#")) {
    const hex = raw[2] === "x" || raw[2] === "X";
    const value = parseInt(raw.slice(hex ? 3 : 2, -1), hex ? 16 : 10);
    return codePointToString(value);
  }
  const codePoints = lookupEntity(raw.slice(1, -1));
  return codePoints ? String.fromCodePoint(...codePoints) : raw;
}

export function codePointToString(value: number): string {
  if (!Number.isFinite(value) || value <= 0 || value > 0x10ffff) return REPLACEMENT_CHARACTER;
  if (value >= 0xd800 && value <= 0xdfff) return REPLACEMENT_CHARACTER;
  return String.fromCodePoint(value);
}
