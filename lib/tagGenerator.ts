import { randomInt } from "crypto";

export const TAG_ALPHABET = "0123456789ABCDEFGHIJKLMNOPQRSTUVWXYZ";
export const TAG_LENGTH = 4;

const TAG_PATTERN = /^[0-9A-Z]{4}$/;

/**
 * Random 4-character report tag. There is no collision check against stored
 * reports, so a tag is only probably unique (36^4 combinations).
 */
export function generateReportTag(
  pick: (upperBound: number) => number = randomInt
): string {
  let tag = "";
  for (let i = 0; i < TAG_LENGTH; i++) {
    tag += TAG_ALPHABET.charAt(pick(TAG_ALPHABET.length));
  }
  return tag;
}

// Tags are displayed and searched upper-case
export function normalizeTag(raw: string): string {
  return raw.trim().toUpperCase();
}

export function isReportTag(value: string): boolean {
  return TAG_PATTERN.test(value);
}
