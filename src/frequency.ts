import { FrequencyOptions } from "./types";
import { removeWhitespace } from "./utils/text";

const HOURS_PER_DAY = 24;

/** Localized "times per day" prefixes; "gunde" covers keyboards without ü. */
const TIMES_PER_DAY_PREFIXES = ["günde", "gunde"] as const;

const ONCE_DAILY_TOKENS = new Set(["od", "q24h"]);

const HOURLY_INTERVAL = /^q(\d+)h$/;

function normalizeFrequency(text: string): string {
  return removeWhitespace(text.normalize("NFC").toLowerCase());
}

/**
 * Converts a frequency code into doses per day.
 *
 * Recognized, in order: "günde <n>" (n doses a day), "od" / "q24h" (once a
 * day), "q<n>h" (every n hours, 24 / n) and finally the caller's `freqMap`.
 * Returns `undefined` when the code is not recognized.
 */
export function parseFrequency(
  text: string,
  options?: FrequencyOptions
): number | undefined {
  const normalized = normalizeFrequency(text);
  if (!normalized) {
    return undefined;
  }

  for (const prefix of TIMES_PER_DAY_PREFIXES) {
    if (normalized.startsWith(prefix)) {
      const digits = normalized.slice(prefix.length).match(/\d+/);
      if (!digits) {
        return undefined;
      }
      const count = Number.parseInt(digits[0], 10);
      return count > 0 ? count : undefined;
    }
  }

  if (ONCE_DAILY_TOKENS.has(normalized)) {
    return 1;
  }

  const interval = normalized.match(HOURLY_INTERVAL);
  if (interval) {
    const hours = Number.parseInt(interval[1], 10);
    return hours > 0 ? HOURS_PER_DAY / hours : undefined;
  }

  return lookupCustomFrequency(normalized, options?.freqMap);
}

function lookupCustomFrequency(
  normalized: string,
  freqMap: Record<string, number> | undefined
): number | undefined {
  if (!freqMap) {
    return undefined;
  }
  for (const key in freqMap) {
    if (!Object.prototype.hasOwnProperty.call(freqMap, key)) {
      continue;
    }
    if (normalizeFrequency(key) !== normalized) {
      continue;
    }
    const value = freqMap[key];
    if (Number.isFinite(value) && value > 0) {
      return value;
    }
  }
  return undefined;
}
