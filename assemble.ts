import { extractAltNames, extractAltNamesFromHtml } from "./aliases";
import { classifyFortType } from "./classify";
import { parseDateRanges } from "./dates";
import type { EntryFragment } from "./extract";
import { createChildLogger, type Logger } from "./logger";
import { extractNationalities } from "./nationality";
import {
  FortEntrySchema,
  FortRowSchema,
  PeriodRowSchema,
  type FortEntry,
  type GeocodeRequest,
  type PageContext,
  type StorageRecord,
} from "./schema";
import { cleanName, rawEntry, segmentEntry, segmentHeading, type SegmentedEntry } from "./segment";

export const LIST_DELIMITER = "|";

export interface AssembleOptions {
  logger?: Logger;
}

interface EntryFields {
  name: string;
  datesRaw: string;
  locationText: string;
  descriptionText: string;
  entryRaw: string;
  altNames: string[];
}

const defaultLogger = createChildLogger({ module: "assemble" });

function fieldsFromSegments(segmented: SegmentedEntry, altNames: string[]): EntryFields {
  return {
    name: segmented.name,
    datesRaw: segmented.datesRaw,
    locationText: segmented.locationText,
    descriptionText: segmented.descriptionText,
    entryRaw: segmented.entryRaw,
    altNames,
  };
}

function fieldsFromFragment(fragment: EntryFragment): EntryFields {
  if (fragment.kind === "structured") {
    return {
      name: cleanName(fragment.name) || fragment.name,
      datesRaw: fragment.datesRaw,
      locationText: fragment.locationText,
      descriptionText: fragment.descriptionText,
      entryRaw: fragment.entryRaw,
      altNames: extractAltNamesFromHtml(fragment.descriptionHtml),
    };
  }

  const segmented =
    fragment.body !== undefined ? segmentHeading(fragment.text, fragment.body) : segmentEntry(fragment.text);
  const altNames =
    fragment.html !== undefined
      ? extractAltNamesFromHtml(fragment.html)
      : extractAltNames(segmented.descriptionText);

  return fieldsFromSegments(segmented, altNames);
}

function buildEntry(fields: EntryFields, nationalities: string[]) {
  const { periods, earliestYear, latestYear } = parseDateRanges(fields.datesRaw);

  return {
    namePrimary: fields.name,
    datesRaw: fields.datesRaw,
    locationText: fields.locationText,
    descriptionRaw: fields.descriptionText,
    entryRaw: fields.entryRaw,
    altNames: fields.altNames,
    nationalities,
    fortType: classifyFortType(fields.name, fields.descriptionText),
    periods,
    earliestYear,
    latestYear,
  };
}

/**
 * Builds the immutable record for one entry fragment. Invalid drafts degrade
 * to a raw-text record instead of throwing.
 */
export function assembleEntry(fragment: EntryFragment, options: AssembleOptions = {}): FortEntry {
  const log = options.logger ?? defaultLogger;
  const nationalities = extractNationalities(fragment.flagMarkup);

  const draft = buildEntry(fieldsFromFragment(fragment), nationalities);
  const result = FortEntrySchema.safeParse(draft);
  if (result.success) {
    return result.data;
  }

  const sourceText =
    fragment.kind === "structured" ? fragment.entryRaw : [fragment.text, fragment.body ?? ""].join(" ").trim();
  log.warn(
    { issues: result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`) },
    "entry failed validation, keeping raw text",
  );

  return FortEntrySchema.parse(buildEntry(fieldsFromSegments(rawEntry(sourceText), []), nationalities));
}

function joinOrNull(values: readonly string[]): string | null {
  return values.length ? values.join(LIST_DELIMITER) : null;
}

function orNull(value: string): string | null {
  return value ? value : null;
}

/**
 * Flattens an entry into the storage row shape; periods stay a separate,
 * ordered collection of child rows.
 */
export function toStorageRecord(entry: FortEntry, context: PageContext): StorageRecord {
  const row = FortRowSchema.parse({
    name_primary: entry.namePrimary,
    alt_names: joinOrNull(entry.altNames),
    state_territory: context.stateCode.toUpperCase(),
    state_full_name: context.stateName,
    location_text: orNull(entry.locationText),
    fort_type: entry.fortType,
    nationality: joinOrNull(entry.nationalities),
    dates_raw: orNull(entry.datesRaw),
    earliest_year: entry.earliestYear,
    latest_year: entry.latestYear,
    source_url: context.sourceUrl,
    source_section: context.section,
    description_raw: orNull(entry.descriptionRaw),
    entry_raw: orNull(entry.entryRaw),
  });

  const periods = entry.periods.map((period) =>
    PeriodRowSchema.parse({
      start_year: period.startYear,
      end_year: period.endYear,
      period_notes: period.periodNotes,
      period_order: period.periodOrder,
    }),
  );

  return { row, periods };
}

export function toGeocodeRequest(entry: FortEntry, context: PageContext): GeocodeRequest {
  return {
    location_text: orNull(entry.locationText),
    state_full_name: context.stateName,
  };
}
