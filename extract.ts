import { load } from "cheerio";
import { hasChildren, isTag, isText, type AnyNode } from "domhandler";
import { assembleEntry } from "./assemble";
import { createChildLogger, type Logger } from "./logger";
import { flagWindow } from "./nationality";
import type { FortEntry } from "./schema";
import { tokenizeMarkup, type MarkupToken } from "./tokenize";

/**
 * An entry whose fields were already separated by the page markup.
 */
export interface StructuredFragment {
  kind: "structured";
  name: string;
  datesRaw: string;
  locationText: string;
  descriptionText: string;
  descriptionHtml: string;
  /**
   * Markup between the name anchor and the date block, where flag images sit.
   */
  flagMarkup: string;
  entryRaw: string;
}

/**
 * An entry available only as one run of text, to be split by the segmenter.
 */
export interface UnsegmentedFragment {
  kind: "unsegmented";
  text: string;
  /**
   * Lines that followed the heading line. When present, `text` holds only
   * the heading line.
   */
  body?: string;
  html?: string;
  flagMarkup: string;
}

export type EntryFragment = StructuredFragment | UnsegmentedFragment;

export interface ExtractOptions {
  logger?: Logger;
}

interface RuleMatch {
  fragment: EntryFragment;
  /**
   * Index of the first token after the entry.
   */
  next: number;
}

type EntryRule = (tokens: MarkupToken[], index: number, html: string) => RuleMatch | undefined;

interface DescriptionRun {
  text: string;
  next: number;
  endOffset: number;
}

const DATED_TEXT = /^[^()]+\([^)]*\d{4}[^)]*\)/;
const DATE_LOCATION = /^\(([^)]+)\)\s*,?\s*(.*)$/;
// Groups: name, the dates through the end of their line, the following lines.
const FALLBACK_ENTRY_PATTERN =
  /^([A-Z][^(\n]+?)\s*(\(\d{4}[^)]*\)[^\n]*)(?:\n|$)([\s\S]*?)(?=^[A-Z][^(\n]+?\s*\(\d{4}|(?![\s\S]))/gm;

const BLOCK_TAGS = new Set([
  "address",
  "blockquote",
  "br",
  "center",
  "dd",
  "div",
  "dl",
  "dt",
  "h1",
  "h2",
  "h3",
  "h4",
  "h5",
  "h6",
  "hr",
  "li",
  "ol",
  "p",
  "pre",
  "table",
  "td",
  "th",
  "tr",
  "ul",
]);
const SKIPPED_TAGS = new Set(["script", "style", "noscript"]);

const defaultLogger = createChildLogger({ module: "extract" });

function normalizeWhitespace(value: string): string {
  return value.replace(/\s+/g, " ").trim();
}

function endsEntry(token: MarkupToken): boolean {
  return token.type === "boundary" || token.type === "anchor";
}

function isPreamble(token: MarkupToken): boolean {
  if (token.type === "image" || token.type === "lineBreak") {
    return true;
  }

  return token.type === "text" && !token.text.trim();
}

function tokenText(token: MarkupToken): string {
  switch (token.type) {
    case "text":
    case "italic":
      return token.text;
    case "lineBreak":
      return " ";
    default:
      return "";
  }
}

function collectDescription(tokens: MarkupToken[], from: number, html: string): DescriptionRun {
  let text = "";
  let index = from;
  while (index < tokens.length && !endsEntry(tokens[index])) {
    text += tokenText(tokens[index]);
    index += 1;
  }

  return {
    text: normalizeWhitespace(text),
    next: index,
    endOffset: index < tokens.length ? tokens[index].start : html.length,
  };
}

export function splitDateLocation(italicText: string): { datesRaw: string; locationText: string } {
  const normalized = normalizeWhitespace(italicText);
  const match = normalized.match(DATE_LOCATION);
  if (!match) {
    return { datesRaw: "", locationText: normalized };
  }

  return { datesRaw: `(${match[1].trim()})`, locationText: match[2].trim() };
}

const matchAnchoredEntry: EntryRule = (tokens, index, html) => {
  const anchor = tokens[index];
  if (anchor.type !== "anchor") {
    return undefined;
  }

  const name = normalizeWhitespace(anchor.text);
  if (!name) {
    return undefined;
  }

  let cursor = index + 1;
  while (cursor < tokens.length && isPreamble(tokens[cursor])) {
    cursor += 1;
  }

  const italic = tokens[cursor];
  if (!italic || italic.type !== "italic") {
    return undefined;
  }

  const description = collectDescription(tokens, cursor + 1, html);
  const { datesRaw, locationText } = splitDateLocation(italic.text);
  const heading = normalizeWhitespace(`${name} ${italic.text}`);

  return {
    fragment: {
      kind: "structured",
      name,
      datesRaw,
      locationText,
      descriptionText: description.text,
      descriptionHtml: html.slice(italic.end, description.endOffset),
      flagMarkup: html.slice(anchor.start, italic.start),
      entryRaw: description.text ? `${heading} - ${description.text}` : heading,
    },
    next: description.next,
  };
};

const matchUnsegmentedAnchor: EntryRule = (tokens, index, html) => {
  const anchor = tokens[index];
  if (anchor.type !== "anchor") {
    return undefined;
  }

  const description = collectDescription(tokens, index + 1, html);
  const text = normalizeWhitespace(`${anchor.text} ${description.text}`);
  if (!DATED_TEXT.test(text)) {
    return undefined;
  }

  return {
    fragment: {
      kind: "unsegmented",
      text,
      html: html.slice(anchor.end, description.endOffset),
      flagMarkup: html.slice(anchor.start, description.endOffset),
    },
    next: description.next,
  };
};

// Tried in order at each token; the first rule that accepts the position wins.
const ENTRY_RULES: readonly EntryRule[] = [matchAnchoredEntry, matchUnsegmentedAnchor];

/**
 * Primary strategy: named-anchor entries found in a single pass over the
 * token stream of the raw markup.
 */
export function extractMarkupFragments(html: string): EntryFragment[] {
  const tokens = tokenizeMarkup(html);
  const fragments: EntryFragment[] = [];

  let index = 0;
  while (index < tokens.length) {
    let matched: RuleMatch | undefined;
    for (const rule of ENTRY_RULES) {
      matched = rule(tokens, index, html);
      if (matched) {
        break;
      }
    }

    if (matched) {
      fragments.push(matched.fragment);
      index = matched.next;
    } else {
      index += 1;
    }
  }

  return fragments;
}

function flattenNode(node: AnyNode, parts: string[]) {
  if (isText(node)) {
    parts.push(node.data.replace(/\s+/g, " "));
    return;
  }

  const isBlock = isTag(node) && BLOCK_TAGS.has(node.name);
  if (isTag(node) && SKIPPED_TAGS.has(node.name)) {
    return;
  }

  if (isBlock) {
    parts.push("\n");
  }
  if (hasChildren(node)) {
    for (const child of node.children) {
      flattenNode(child, parts);
    }
  }
  if (isBlock) {
    parts.push("\n");
  }
}

/**
 * Renders the page body as text with one line per block-level element.
 */
export function flattenPage(html: string): string {
  const $ = load(html);
  const body = $("body").get(0);
  if (!body) {
    return "";
  }

  const parts: string[] = [];
  flattenNode(body, parts);

  return parts
    .join("")
    .split("\n")
    .map((line) => line.trim())
    .join("\n");
}

/**
 * Fallback strategy: entries recognized in the flattened page text as a line
 * starting with a capitalized name followed by a parenthesized year.
 */
export function extractTextFragments(html: string): EntryFragment[] {
  const text = flattenPage(html);
  const fragments: EntryFragment[] = [];

  for (const match of text.matchAll(FALLBACK_ENTRY_PATTERN)) {
    const name = match[1].trim();
    fragments.push({
      kind: "unsegmented",
      text: normalizeWhitespace(`${name} ${match[2]}`),
      body: normalizeWhitespace(match[3]),
      flagMarkup: flagWindow(html, name),
    });
  }

  return fragments;
}

export function extractFragments(html: string, sourceUrl: string, options: ExtractOptions = {}): EntryFragment[] {
  const log = options.logger ?? defaultLogger;

  const fragments = extractMarkupFragments(html);
  if (fragments.length) {
    log.debug({ sourceUrl, strategy: "markup", entries: fragments.length }, "extracted entries");
    return fragments;
  }

  log.debug({ sourceUrl }, "no anchored entries found, trying plain-text fallback");
  const fallback = extractTextFragments(html);
  if (fallback.length) {
    log.debug({ sourceUrl, strategy: "text", entries: fallback.length }, "extracted entries");
  } else {
    log.info({ sourceUrl }, "page yielded no entries");
  }

  return fallback;
}

/**
 * Extracts every fortification entry on a page, in page order.
 */
export function parsePage(html: string, sourceUrl: string, options: ExtractOptions = {}): FortEntry[] {
  return extractFragments(html, sourceUrl, options).map((fragment) => assembleEntry(fragment, options));
}
