import { ConfigError } from "./errors";

export interface DialectFlags {
  collapseWhitespace?: boolean;
  permissiveAtxHeaders?: boolean;
  permissiveUrlAutolinks?: boolean;
  permissiveEmailAutolinks?: boolean;
  permissiveWwwAutolinks?: boolean;
  /** Shorthand for the URL, e-mail and www autolink flags together. */
  permissiveAutolinks?: boolean;
  noIndentedCodeBlocks?: boolean;
  noHtmlBlocks?: boolean;
  noHtmlSpans?: boolean;
  /** Shorthand for `noHtmlBlocks` plus `noHtmlSpans`. */
  noHtml?: boolean;
  tables?: boolean;
  strikethrough?: boolean;
  taskLists?: boolean;
  latexMathSpans?: boolean;
  wikiLinks?: boolean;
  underline?: boolean;
  hardSoftBreaks?: boolean;
  /** Container nesting allowed before the parse fails with a ParserError. */
  maxNestingDepth?: number;
}

export interface Dialect {
  collapseWhitespace: boolean;
  permissiveAtxHeaders: boolean;
  permissiveUrlAutolinks: boolean;
  permissiveEmailAutolinks: boolean;
  permissiveWwwAutolinks: boolean;
  noIndentedCodeBlocks: boolean;
  noHtmlBlocks: boolean;
  noHtmlSpans: boolean;
  tables: boolean;
  strikethrough: boolean;
  taskLists: boolean;
  latexMathSpans: boolean;
  wikiLinks: boolean;
  underline: boolean;
  hardSoftBreaks: boolean;
  maxNestingDepth: number;
}

export interface RendererFlags {
  debug?: boolean;
  verbatimEntities?: boolean;
  skipUtf8Bom?: boolean;
  xhtml?: boolean;
}

export const DEFAULT_MAX_NESTING_DEPTH = 1000;

export const DIALECT_COMMONMARK: Readonly<DialectFlags> = Object.freeze({});

export const DIALECT_GITHUB: Readonly<DialectFlags> = Object.freeze({
  permissiveAutolinks: true,
  tables: true,
  strikethrough: true,
  taskLists: true,
});

const KNOWN_FLAGS: ReadonlySet<string> = new Set<keyof DialectFlags>([
  "collapseWhitespace",
  "permissiveAtxHeaders",
  "permissiveUrlAutolinks",
  "permissiveEmailAutolinks",
  "permissiveWwwAutolinks",
  "permissiveAutolinks",
  "noIndentedCodeBlocks",
  "noHtmlBlocks",
  "noHtmlSpans",
  "noHtml",
  "tables",
  "strikethrough",
  "taskLists",
  "latexMathSpans",
  "wikiLinks",
  "underline",
  "hardSoftBreaks",
  "maxNestingDepth",
]);

export function resolveDialect(flags: DialectFlags = DIALECT_COMMONMARK): Dialect {
  const unknown = Object.keys(flags).filter(key => !KNOWN_FLAGS.has(key));
  if (unknown.length > 0) {
    throw new ConfigError(unknown);
  }

  const autolinks = !!flags.permissiveAutolinks;
  const noHtml = !!flags.noHtml;
  const depth = flags.maxNestingDepth;

  return {
    collapseWhitespace: !!flags.collapseWhitespace,
    permissiveAtxHeaders: !!flags.permissiveAtxHeaders,
    permissiveUrlAutolinks: autolinks || !!flags.permissiveUrlAutolinks,
    permissiveEmailAutolinks: autolinks || !!flags.permissiveEmailAutolinks,
    permissiveWwwAutolinks: autolinks || !!flags.permissiveWwwAutolinks,
    noIndentedCodeBlocks: !!flags.noIndentedCodeBlocks,
    noHtmlBlocks: noHtml || !!flags.noHtmlBlocks,
    noHtmlSpans: noHtml || !!flags.noHtmlSpans,
    tables: !!flags.tables,
    strikethrough: !!flags.strikethrough,
    taskLists: !!flags.taskLists,
    latexMathSpans: !!flags.latexMathSpans,
    wikiLinks: !!flags.wikiLinks,
    underline: !!flags.underline,
    hardSoftBreaks: !!flags.hardSoftBreaks,
    maxNestingDepth:
      depth !== undefined && Number.isInteger(depth) && depth > 0 ? depth : DEFAULT_MAX_NESTING_DEPTH,
  };
}
