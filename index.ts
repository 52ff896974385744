export { extractAltNames, extractAltNamesFromHtml } from "./aliases";
export { assembleEntry, toGeocodeRequest, toStorageRecord, LIST_DELIMITER } from "./assemble";
export { classifyFortType, DEFAULT_FORT_TYPE } from "./classify";
export { loadConfig, loadConfigWithFallbacks, type AppConfig } from "./config";
export { centuryBounds, parseDateRanges, type DateRangeResult } from "./dates";
export {
  extractFragments,
  extractMarkupFragments,
  extractTextFragments,
  parsePage,
  type EntryFragment,
  type ExtractOptions,
  type StructuredFragment,
  type UnsegmentedFragment,
} from "./extract";
export { createChildLogger, createLogger, type Logger } from "./logger";
export { extractNationalities, flagWindow, lookupFlag } from "./nationality";
export { createPageContext, processPage, type PageContextInput } from "./page";
export {
  FortEntrySchema,
  FortRowSchema,
  PageContextSchema,
  PeriodRowSchema,
  PeriodSchema,
  type FortEntry,
  type FortRow,
  type FortType,
  type GeocodeRequest,
  type PageContext,
  type Period,
  type PeriodRow,
  type StorageRecord,
} from "./schema";
export { cleanName, segmentEntry, segmentHeading, type SegmentedEntry } from "./segment";
export { lookupStateName } from "./states";
export { tokenizeMarkup, type MarkupToken } from "./tokenize";
