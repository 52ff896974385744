import STATE_NAMES from "./data/states.json";

const STATES: ReadonlyMap<string, string> = new Map(Object.entries(STATE_NAMES));

export function normalizeStateCode(code: string): string {
  return code.trim().toUpperCase();
}

export function lookupStateName(code: string): string | undefined {
  return STATES.get(normalizeStateCode(code));
}

