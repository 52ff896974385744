import { load } from "cheerio";

const LEADING_STOPWORD = /^(?:the|a|an|this|that)\b/i;
const UI_PHRASES = ["the ", "click", "here", "see "] as const;

// Phrase-anchored patterns come first; the bare emphasis pattern only adds
// names the anchored ones did not already find.
const EMPHASIS_PATTERNS: readonly RegExp[] = [
  /(?:first |originally |also |formerly |later |previously )?(?:known|called|named|designated) as \*\*([^*]+)\*\*/gi,
  /(?:renamed|changed to) \*\*([^*]+)\*\*/gi,
  /\*\*([^*]+)\*\*/g,
];

function pushUnique(target: string[], value: string | undefined) {
  if (!value) {
    return;
  }

  if (!target.includes(value)) {
    target.push(value);
  }
}

function collapseWhitespace(value: string): string {
  return value.replace(/\s+/g, " ").trim();
}

/**
 * Extracts alternate names marked with `**emphasis**` in plain description text.
 */
export function extractAltNames(description: string): string[] {
  const names: string[] = [];
  if (!description) {
    return names;
  }

  for (const pattern of EMPHASIS_PATTERNS) {
    for (const match of description.matchAll(pattern)) {
      const name = collapseWhitespace(match[1]);
      if (name && !LEADING_STOPWORD.test(name)) {
        pushUnique(names, name);
      }
    }
  }

  return names;
}

function looksLikeName(candidate: string): boolean {
  if (candidate.length <= 3 || !/^[A-Z]/.test(candidate)) {
    return false;
  }

  const lowered = candidate.toLowerCase();
  return !UI_PHRASES.some((phrase) => lowered.includes(phrase));
}

/**
 * Extracts alternate names from `<b>` and `<strong>` spans in description markup.
 */
export function extractAltNamesFromHtml(html: string): string[] {
  const names: string[] = [];
  if (!html.trim()) {
    return names;
  }

  const $ = load(html, null, false);
  $("b, strong").each((_, element) => {
    const candidate = collapseWhitespace($(element).text());
    if (looksLikeName(candidate)) {
      pushUnique(names, candidate);
    }
  });

  return names;
}
