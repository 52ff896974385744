import { Parser } from "htmlparser2";

interface Span {
  /**
   * Offset of the first character of the span in the source markup.
   */
  start: number;
  /**
   * Offset just past the span.
   */
  end: number;
}

export type MarkupToken =
  | (Span & { type: "anchor"; name: string; text: string })
  | (Span & { type: "image" })
  | (Span & { type: "italic"; text: string })
  | (Span & { type: "lineBreak" })
  | (Span & { type: "text"; text: string })
  | (Span & { type: "boundary"; tag: string });

const ITALIC_TAGS = new Set(["i", "em"]);
const HEADING_TAGS = new Set(["h1", "h2", "h3", "h4", "h5", "h6"]);
const SKIPPED_TAGS = new Set(["script", "style"]);

interface Capture {
  type: "anchor" | "italic";
  tag: string;
  name: string;
  text: string;
  start: number;
}

function isBoundaryTag(name: string, attributes: Record<string, string>): boolean {
  if (name === "p" || name === "hr" || HEADING_TAGS.has(name)) {
    return true;
  }

  return name === "font" && "size" in attributes;
}

/**
 * Splits raw markup into a flat sequence of tagged spans without building a
 * document tree, so unbalanced or invalid markup still yields every span.
 */
export function tokenizeMarkup(html: string): MarkupToken[] {
  const tokens: MarkupToken[] = [];
  let capture: Capture | undefined;
  let skipDepth = 0;
  let inText = false;

  const flush = (end: number) => {
    if (!capture) {
      return;
    }

    const { start, text } = capture;
    if (capture.type === "anchor") {
      tokens.push({ type: "anchor", name: capture.name, text, start, end });
    } else {
      tokens.push({ type: "italic", text, start, end });
    }
    capture = undefined;
  };

  // Close tags only report where they begin; the span runs through the next ">".
  const closingTagEnd = () => {
    const gt = html.indexOf(">", parser.startIndex);
    return gt === -1 ? html.length : gt + 1;
  };

  const parser = new Parser(
    {
      onopentag(name, attributes) {
        inText = false;
        const start = parser.startIndex;
        const end = parser.endIndex + 1;

        if (SKIPPED_TAGS.has(name)) {
          skipDepth += 1;
          return;
        }

        if (name === "a" && "name" in attributes) {
          flush(start);
          capture = { type: "anchor", tag: name, name: attributes.name, text: "", start };
          return;
        }

        if (isBoundaryTag(name, attributes)) {
          flush(start);
          tokens.push({ type: "boundary", tag: name, start, end });
          return;
        }

        if (name === "br") {
          if (capture) {
            capture.text += " ";
          } else {
            tokens.push({ type: "lineBreak", start, end });
          }
          return;
        }

        // Images inside a capture remain visible through the raw markup offsets.
        if (name === "img" && !capture) {
          tokens.push({ type: "image", start, end });
          return;
        }

        if (ITALIC_TAGS.has(name) && !capture) {
          capture = { type: "italic", tag: name, name: "", text: "", start };
        }
      },
      ontext(text) {
        if (skipDepth > 0) {
          return;
        }

        if (capture) {
          capture.text += text;
          return;
        }

        const start = parser.startIndex;
        const end = parser.endIndex + 1;
        const last = tokens[tokens.length - 1];
        if (inText && last && last.type === "text") {
          last.text += text;
          last.end = end;
          return;
        }

        inText = true;
        tokens.push({ type: "text", text, start, end });
      },
      onclosetag(name, isImplied) {
        inText = false;
        if (SKIPPED_TAGS.has(name)) {
          skipDepth = Math.max(0, skipDepth - 1);
          return;
        }

        if (capture && capture.tag === name) {
          flush(closingTagEnd());
          return;
        }

        if (name === "p" && !isImplied) {
          flush(parser.startIndex);
          tokens.push({ type: "boundary", tag: name, start: parser.startIndex, end: closingTagEnd() });
        }
      },
    },
    { decodeEntities: true },
  );

  parser.write(html);
  parser.end();
  flush(html.length);

  return tokens;
}
