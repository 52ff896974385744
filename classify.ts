import type { FortType } from "./schema";

type TypeRule = {
  label: FortType;
  matches: (text: string) => boolean;
};

const containsAny =
  (...keywords: string[]) =>
  (text: string): boolean =>
    keywords.some((keyword) => text.includes(keyword));

// First match wins. Specific types precede the generic "camp " and "fort "
// catch-alls; the trailing space excludes "campaign".
const TYPE_RULES: readonly TypeRule[] = [
  { label: "battery", matches: containsAny("battery", "batteries") },
  { label: "redoubt", matches: containsAny("redoubt") },
  { label: "blockhouse", matches: containsAny("blockhouse", "block house", "block-house") },
  { label: "stockade", matches: containsAny("stockade", "palisade") },
  { label: "camp", matches: containsAny("camp ") },
  { label: "cantonment", matches: containsAny("cantonment") },
  { label: "barracks", matches: containsAny("barracks") },
  { label: "arsenal", matches: containsAny("arsenal") },
  { label: "trading post", matches: containsAny("trading post", "fur trading", "trading house") },
  { label: "garrison", matches: containsAny("garrison house", "garrison") },
  { label: "powder house", matches: containsAny("powder house", "magazine") },
  { label: "fort", matches: containsAny("fort ") },
];

export const DEFAULT_FORT_TYPE: FortType = "fort";

export function classifyFortType(name: string, description: string): FortType {
  const text = `${name} ${description}`.toLowerCase();

  for (const rule of TYPE_RULES) {
    if (rule.matches(text)) {
      return rule.label;
    }
  }

  return DEFAULT_FORT_TYPE;
}
