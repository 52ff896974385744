import { toStorageRecord } from "./assemble";
import { parsePage, type ExtractOptions } from "./extract";
import { PageContextSchema, type PageContext, type StorageRecord } from "./schema";
import { lookupStateName, normalizeStateCode } from "./states";

export type PageContextInput = {
  sourceUrl: string;
  stateCode: string;
  section: string;
  /**
   * Defaults to the curated name for `stateCode`.
   */
  stateName?: string;
};

/**
 * Validates page metadata. Throws a `ZodError` when the URL is malformed, the
 * code is not two letters, or no state name is given or known.
 */
export function createPageContext(input: PageContextInput): PageContext {
  const stateCode = normalizeStateCode(input.stateCode);

  return PageContextSchema.parse({
    sourceUrl: input.sourceUrl,
    stateCode,
    stateName: input.stateName?.trim() || lookupStateName(stateCode) || "",
    section: input.section,
  });
}

/**
 * Runs extraction for one page and adapts every entry to the storage shape,
 * preserving page order.
 */
export function processPage(html: string, context: PageContext, options: ExtractOptions = {}): StorageRecord[] {
  return parsePage(html, context.sourceUrl, options).map((entry) => toStorageRecord(entry, context));
}
