/**
 * Bracket-tracking scanner
 * Splits raw XML-ish text into tag spans and text spans without parsing it.
 */

export type SpanKind = "text" | "tag" | "comment" | "cdata";

export interface Span {
  kind: SpanKind;
  value: string;
  // Offset of the first character in the scanned text
  start: number;
}

// Characters that may follow '<' when it opens markup
const MARKUP_START = /[A-Za-z_:/?!]/;

/**
 * True when the '<' at `index` opens a tag rather than being a stray character
 */
export function opensMarkup(text: string, index: number): boolean {
  return MARKUP_START.test(text.charAt(index + 1));
}

/**
 * Find the '>' that closes the tag opened at `start`
 *
 * Quoted attribute values may contain '>'. A quote that is still open when the
 * next '<' shows up is treated as broken, and the first '>' wins instead.
 */
function findTagEnd(text: string, start: number): number {
  let quote: string | null = null;

  for (let i = start + 1; i < text.length; i++) {
    const char = text[i];
    if (quote) {
      if (char === quote) quote = null;
      else if (char === "<") break;
    } else if (char === '"' || char === "'") {
      quote = char;
    } else if (char === ">") {
      return i;
    } else if (char === "<") {
      break;
    }
  }

  return text.indexOf(">", start + 1);
}

/**
 * Split text into spans
 *
 * Comments and CDATA sections are single spans. An unterminated one runs to
 * the end of the text so its content is never read as markup.
 */
export function splitSpans(text: string): Span[] {
  const spans: Span[] = [];
  let textStart = 0;
  let i = 0;

  const pushText = (end: number): void => {
    if (end > textStart) {
      spans.push({ kind: "text", value: text.slice(textStart, end), start: textStart });
    }
  };

  const pushBlock = (kind: SpanKind, terminator: string, from: number): void => {
    pushText(i);
    const close = text.indexOf(terminator, from);
    const end = close === -1 ? text.length : close + terminator.length;
    spans.push({ kind, value: text.slice(i, end), start: i });
    i = textStart = end;
  };

  while (i < text.length) {
    if (text[i] !== "<") {
      i++;
      continue;
    }

    if (text.startsWith("<!--", i)) {
      pushBlock("comment", "-->", i + 4);
      continue;
    }

    if (text.startsWith("<![CDATA[", i)) {
      pushBlock("cdata", "]]>", i + 9);
      continue;
    }

    if (!opensMarkup(text, i)) {
      i++;
      continue;
    }

    const close = findTagEnd(text, i);
    pushText(i);
    const end = close === -1 ? text.length : close + 1;
    spans.push({ kind: "tag", value: text.slice(i, end), start: i });
    i = textStart = end;
  }

  pushText(text.length);
  return spans;
}

/**
 * 1-based line and column of an offset
 */
export function positionAt(
  text: string,
  offset: number,
): { line: number; column: number } {
  let line = 1;
  let lineStart = 0;
  for (let i = 0; i < offset && i < text.length; i++) {
    if (text[i] === "\n") {
      line++;
      lineStart = i + 1;
    }
  }
  return { line, column: offset - lineStart + 1 };
}
