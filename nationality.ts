import FLAGS, { type FlagToken } from "./flags";

const FLAG_IMAGE_PATTERN = /([a-z]+flag\d*)\.(?:gif|png|jpe?g)/gi;

export const FLAG_WINDOW_RADIUS = 100;

function isFlagToken(token: string): token is FlagToken {
  return Object.hasOwn(FLAGS, token);
}

export function lookupFlag(token: string): string | undefined {
  const normalized = token.toLowerCase();
  return isFlagToken(normalized) ? FLAGS[normalized] : undefined;
}

/**
 * Maps flag image references (`britishflag.gif`, `usaflag1.gif`) in a markup
 * fragment to nation labels, in order of first appearance. Tokens outside the
 * curated vocabulary are ignored.
 */
export function extractNationalities(htmlFragment: string): string[] {
  const nationalities: string[] = [];
  if (!htmlFragment) {
    return nationalities;
  }

  for (const match of htmlFragment.matchAll(FLAG_IMAGE_PATTERN)) {
    const nationality = lookupFlag(match[1]);
    if (nationality && !nationalities.includes(nationality)) {
      nationalities.push(nationality);
    }
  }

  return nationalities;
}

/**
 * Returns the markup surrounding the first occurrence of `needle`, or an empty
 * string when it does not occur.
 */
export function flagWindow(html: string, needle: string, radius = FLAG_WINDOW_RADIUS): string {
  if (!needle) {
    return "";
  }

  const index = html.indexOf(needle);
  if (index === -1) {
    return "";
  }

  return html.slice(Math.max(0, index - radius), index + radius);
}
