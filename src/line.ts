/**
 * Line reader
 *
 * Splits raw text into indentation-normalized records. Tabs and spaces each
 * count as one unit of indentation; nothing is expanded.
 */

export interface Line {
  /** Count of leading whitespace characters */
  indent: number;
  /** Text after the indentation, trailing whitespace removed */
  content: string;
  /** 1-based physical line number */
  lineNo: number;
}

export function readLine(raw: string, lineNo: number = 1): Line {
  let indent = 0;
  while (indent < raw.length && (raw[indent] === ' ' || raw[indent] === '\t')) {
    indent++;
  }
  return { indent, content: raw.slice(indent).trimEnd(), lineNo };
}

export function readLines(text: string): Line[] {
  return text.split(/\r?\n/).map((raw, i) => readLine(raw, i + 1));
}

export function isBlank(line: Line): boolean {
  return line.content === '';
}

export function isCommentOnly(line: Line): boolean {
  return line.content.startsWith('#');
}

type Quote = '"' | "'";

/**
 * Tracks whether a scan position lies inside a quoted span.
 *
 * A quote opens a span only where a scalar can begin: at the start of the
 * text or after whitespace, `[`, `{`, `,` or `:`. Inside double quotes a
 * backslash-escaped quote does not close the span.
 */
export class QuoteTracker {
  private quote: Quote | null = null;

  get inQuote(): boolean {
    return this.quote !== null;
  }

  /**
   * Feed the character at `i`. Returns true when it is ordinary unquoted
   * text, false when it is a quote delimiter or inside a quoted span.
   */
  feed(text: string, i: number): boolean {
    const c = text[i];
    if (this.quote !== null) {
      if (c === this.quote && !(c === '"' && text[i - 1] === '\\')) {
        this.quote = null;
      }
      return false;
    }
    if ((c === '"' || c === "'") && opensQuote(text, i)) {
      this.quote = c;
      return false;
    }
    return true;
  }
}

function opensQuote(text: string, i: number): boolean {
  if (i === 0) return true;
  const prev = text[i - 1];
  return /\s/.test(prev) || prev === '[' || prev === '{' || prev === ',' || prev === ':';
}

/**
 * Remove a trailing comment. A `#` starts a comment only when it follows
 * whitespace inside `content` and lies outside any quoted span, so a
 * leading `#` is kept as text.
 */
export function stripComment(content: string): string {
  const quotes = new QuoteTracker();
  for (let i = 0; i < content.length; i++) {
    if (!quotes.feed(content, i)) continue;
    if (content[i] === '#' && i > 0 && /\s/.test(content[i - 1])) {
      return content.slice(0, i).trimEnd();
    }
  }
  return content;
}

/**
 * Whether a quoted token opened at position 0 is closed again before the end.
 */
export function isUnclosedQuote(text: string): boolean {
  const t = text.trim();
  if (t[0] !== '"' && t[0] !== "'") return false;
  const quotes = new QuoteTracker();
  for (let i = 0; i < t.length; i++) {
    quotes.feed(t, i);
  }
  return quotes.inQuote;
}
