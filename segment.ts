export type EntryLayout = "full" | "location" | "description" | "raw";

export interface SegmentedEntry {
  layout: EntryLayout;
  name: string;
  /**
   * Date expression re-wrapped in parentheses, or empty for raw entries.
   */
  datesRaw: string;
  locationText: string;
  descriptionText: string;
  /**
   * The untouched input text.
   */
  entryRaw: string;
}

interface LayoutRule {
  layout: Exclude<EntryLayout, "raw">;
  pattern: RegExp;
  split: (match: RegExpMatchArray) => { locationText: string; descriptionText: string };
}

export const NAME_LIMIT = 100;
export const UNNAMED_ENTRY = "Unnamed entry";

function normalizeWhitespace(value: string): string {
  return value.replace(/\s+/g, " ").trim();
}

function splitFirstSentence(rest: string): { locationText: string; descriptionText: string } {
  const match = rest.match(/^(.*?[.!?])\s+(.*)$/);
  if (!match) {
    return { locationText: rest.trim(), descriptionText: "" };
  }

  return { locationText: match[1].trim(), descriptionText: match[2].trim() };
}

const FULL_RULE: LayoutRule = {
  layout: "full",
  pattern: /^(.+?)\s*\(([^)]+)\)\s*,\s*(.+?)\s+[-–]\s+(.*)$/,
  split: (match) => ({ locationText: match[3].trim(), descriptionText: match[4].trim() }),
};

const LOCATION_LAYOUT = /^(.+?)\s*\(([^)]+)\)\s*,\s*(.+)$/;

const DESCRIPTION_RULE: LayoutRule = {
  layout: "description",
  pattern: /^(.+?)\s*\(([^)]+)\)\s*(.*)$/,
  split: (match) => ({ locationText: "", descriptionText: match[3].replace(/^,\s*/, "").trim() }),
};

// First match wins; an entry no rule accepts is kept whole as a raw entry.
const LAYOUT_RULES: readonly LayoutRule[] = [
  FULL_RULE,
  {
    layout: "location",
    pattern: LOCATION_LAYOUT,
    split: (match) => splitFirstSentence(match[3]),
  },
  DESCRIPTION_RULE,
];

// A heading line ends the location, so the remainder is not split at a sentence.
const HEADING_RULES: readonly LayoutRule[] = [
  FULL_RULE,
  {
    layout: "location",
    pattern: LOCATION_LAYOUT,
    split: (match) => ({ locationText: match[3].trim(), descriptionText: "" }),
  },
  DESCRIPTION_RULE,
];

function truncatedName(text: string): string {
  return normalizeWhitespace(text).slice(0, NAME_LIMIT).trim() || UNNAMED_ENTRY;
}

/**
 * Removes bracketed annotations and `*` emphasis markers from a fort name.
 */
export function cleanName(raw: string): string {
  return normalizeWhitespace(raw.replace(/\[[^\]]*\]/g, " ").replace(/\*+/g, ""));
}

export function rawEntry(text: string): SegmentedEntry {
  return {
    layout: "raw",
    name: truncatedName(text),
    datesRaw: "",
    locationText: "",
    descriptionText: text,
    entryRaw: text || UNNAMED_ENTRY,
  };
}

/**
 * Splits one entry string of the form `Name (dates), Location - Description`
 * and its looser variants into fields.
 */
export function segmentEntry(text: string): SegmentedEntry {
  const normalized = normalizeWhitespace(text);

  for (const rule of LAYOUT_RULES) {
    const match = normalized.match(rule.pattern);
    if (!match) {
      continue;
    }

    const { locationText, descriptionText } = rule.split(match);
    return {
      layout: rule.layout,
      name: cleanName(match[1]) || truncatedName(text),
      datesRaw: `(${match[2].trim()})`,
      locationText,
      descriptionText,
      entryRaw: text,
    };
  }

  return rawEntry(text);
}

function joinText(...parts: string[]): string {
  return normalizeWhitespace(parts.join(" "));
}

/**
 * Splits an entry whose description continues on the lines after its
 * heading. The rest of the heading line after a comma is all location; the
 * body is appended to whatever description the heading carries.
 */
export function segmentHeading(heading: string, body: string): SegmentedEntry {
  const entryRaw = joinText(heading, body);
  const normalized = normalizeWhitespace(heading);

  for (const rule of HEADING_RULES) {
    const match = normalized.match(rule.pattern);
    if (!match) {
      continue;
    }

    const { locationText, descriptionText } = rule.split(match);
    return {
      layout: rule.layout,
      name: cleanName(match[1]) || truncatedName(entryRaw),
      datesRaw: `(${match[2].trim()})`,
      locationText,
      descriptionText: joinText(descriptionText, body),
      entryRaw,
    };
  }

  return rawEntry(entryRaw);
}
