import type { Period } from "./schema";

export interface DateRangeResult {
  periods: Period[];
  earliestYear: number | null;
  latestYear: number | null;
}

interface PeriodDraft {
  startYear: number | null;
  endYear: number | null;
  periodNotes: string | null;
  /**
   * Every numeric year the segment mentions, used for earliest/latest.
   */
  years: number[];
}

interface SegmentRule {
  pattern: RegExp;
  toPeriod: (match: RegExpMatchArray) => PeriodDraft;
}

export function centuryBounds(century: number): { start: number; end: number } {
  return {
    start: (century - 1) * 100,
    end: century * 100 - 1,
  };
}

// Order matters: the first rule whose pattern matches the start of a segment wins.
const SEGMENT_RULES: readonly SegmentRule[] = [
  {
    pattern: /^(\d{4})\s*[-–]\s*(\d{4})/,
    toPeriod: (match) => {
      const start = Number(match[1]);
      const end = Number(match[2]);
      return { startYear: start, endYear: end, periodNotes: null, years: [start, end] };
    },
  },
  {
    pattern: /^(\d{4})\s*[-–]\s*unknown/i,
    toPeriod: (match) => {
      const start = Number(match[1]);
      return { startYear: start, endYear: null, periodNotes: "End year unknown", years: [start] };
    },
  },
  {
    pattern: /^(\d{4})\/(\d{4})/,
    toPeriod: (match) => {
      const first = Number(match[1]);
      const second = Number(match[2]);
      return {
        startYear: null,
        endYear: second,
        periodNotes: `Ambiguous: ${first}/${second}`,
        years: [first, second],
      };
    },
  },
  {
    pattern: /^(\d{4})/,
    toPeriod: (match) => {
      const year = Number(match[1]);
      return { startYear: year, endYear: null, periodNotes: null, years: [year] };
    },
  },
  {
    pattern: /^c(?:irca|a)?\.?\s*(\d{4})/i,
    toPeriod: (match) => {
      const year = Number(match[1]);
      return { startYear: year, endYear: null, periodNotes: "Approximate date", years: [year] };
    },
  },
  {
    pattern: /^(\d{1,2})(st|nd|rd|th)\s+century/i,
    toPeriod: (match) => {
      const century = Number(match[1]);
      const { start, end } = centuryBounds(century);
      return {
        startYear: start,
        endYear: end,
        periodNotes: `${century}${match[2].toLowerCase()} century`,
        years: [start, end],
      };
    },
  },
];

function classifySegment(segment: string): PeriodDraft {
  for (const rule of SEGMENT_RULES) {
    const match = segment.match(rule.pattern);
    if (match) {
      return rule.toPeriod(match);
    }
  }

  // Unrecognized segments still occupy a slot so sibling order is preserved.
  return { startYear: null, endYear: null, periodNotes: `Unparsed: ${segment}`, years: [] };
}

/**
 * Parses a free-text date expression such as `"(1775, 1811 - 1814)"` into
 * ordered periods. Each comma-separated segment yields exactly one period.
 */
export function parseDateRanges(raw: string): DateRangeResult {
  const cleaned = (raw ?? "").replace(/^[()\s]+|[()\s]+$/g, "");
  if (!cleaned) {
    return { periods: [], earliestYear: null, latestYear: null };
  }

  const periods: Period[] = [];
  const years: number[] = [];

  const segments = cleaned
    .split(",")
    .map((segment) => segment.trim())
    .filter(Boolean);

  for (const segment of segments) {
    const draft = classifySegment(segment);
    periods.push({
      startYear: draft.startYear,
      endYear: draft.endYear,
      periodNotes: draft.periodNotes,
      periodOrder: periods.length,
    });
    years.push(...draft.years);
  }

  return {
    periods,
    earliestYear: years.length ? Math.min(...years) : null,
    latestYear: years.length ? Math.max(...years) : null,
  };
}
