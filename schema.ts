import { z } from "zod";

const yearSchema = z.number().int().nullable();

/**
 * One contiguous span of a fortification's activity.
 */
export const PeriodSchema = z
  .object({
    /**
     * First year of the span, or `null` when the source does not state one.
     */
    startYear: yearSchema,
    /**
     * Last year of the span. `null` means unknown or not stated, never "still active".
     */
    endYear: yearSchema,
    /**
     * Free text for approximate, ambiguous or unparsed segments.
     */
    periodNotes: z.string().nullable(),
    /**
     * Zero-based position of the segment in the source date string.
     */
    periodOrder: z.number().int().nonnegative(),
  })
  .readonly();

export type Period = z.infer<typeof PeriodSchema>;

export const FORT_TYPES = [
  "battery",
  "redoubt",
  "blockhouse",
  "stockade",
  "camp",
  "cantonment",
  "barracks",
  "arsenal",
  "trading post",
  "garrison",
  "powder house",
  "fort",
] as const;

export type FortType = (typeof FORT_TYPES)[number];

/**
 * Normalized structure of a single fortification entry taken from a page.
 */
export const FortEntrySchema = z
  .object({
    /**
     * Primary name of the fortification. Never empty.
     */
    namePrimary: z.string().min(1),
    /**
     * Date expression exactly as it appeared, wrapped in parentheses.
     */
    datesRaw: z.string(),
    /**
     * Location text exactly as it appeared, uncertainty markers included.
     */
    locationText: z.string(),
    /**
     * Description with markup removed.
     */
    descriptionRaw: z.string(),
    /**
     * Original entry text kept for audit.
     */
    entryRaw: z.string().min(1),
    /**
     * Alternate names mentioned in the description.
     */
    altNames: z.array(z.string()).readonly(),
    /**
     * Nations whose flags accompany the entry.
     */
    nationalities: z.array(z.string()).readonly(),
    fortType: z.enum(FORT_TYPES),
    periods: z.array(PeriodSchema).readonly(),
    earliestYear: yearSchema,
    latestYear: yearSchema,
  })
  .readonly();

export type FortEntry = z.infer<typeof FortEntrySchema>;

/**
 * Page-level metadata supplied by the page discovery step.
 */
export const PageContextSchema = z
  .object({
    sourceUrl: z.string().url(),
    /**
     * Two-letter state or territory code, upper-cased.
     */
    stateCode: z.string().regex(/^[A-Z]{2}$/, "State code must be two letters"),
    stateName: z.string().min(1),
    /**
     * Site section the page belongs to, e.g. "East" or "West".
     */
    section: z.string().min(1),
  })
  .readonly();

export type PageContext = z.infer<typeof PageContextSchema>;

/**
 * Flat row shape handed to the storage layer.
 */
export const FortRowSchema = z
  .object({
    name_primary: z.string().min(1),
    /**
     * Pipe-separated alternate names.
     */
    alt_names: z.string().nullable(),
    state_territory: z.string(),
    state_full_name: z.string(),
    location_text: z.string().nullable(),
    fort_type: z.enum(FORT_TYPES),
    /**
     * Pipe-separated nation labels.
     */
    nationality: z.string().nullable(),
    dates_raw: z.string().nullable(),
    earliest_year: yearSchema,
    latest_year: yearSchema,
    source_url: z.string(),
    source_section: z.string(),
    description_raw: z.string().nullable(),
    entry_raw: z.string().nullable(),
  })
  .strict();

export type FortRow = z.infer<typeof FortRowSchema>;

export const PeriodRowSchema = z
  .object({
    start_year: yearSchema,
    end_year: yearSchema,
    period_notes: z.string().nullable(),
    period_order: z.number().int().nonnegative(),
  })
  .strict();

export type PeriodRow = z.infer<typeof PeriodRowSchema>;

export interface StorageRecord {
  row: FortRow;
  /**
   * Child rows, stored against the parent row in source order.
   */
  periods: PeriodRow[];
}

/**
 * Input consumed by the geocoding step.
 */
export interface GeocodeRequest {
  location_text: string | null;
  state_full_name: string;
}
