/**
 * Text Value Extractors
 *
 * Parse the numeric value out of a text run for each numeric label.
 * Every extractor trims its input and returns null when the text does not
 * have the expected shape.
 */

const PAGE_NUMBER_PLAIN = /^0*(\d{1,3})$/;
const PAGE_NUMBER_PREFIXED = /^(?:page|p\.?)\s*0*(\d{1,3})$/i;
const STEP_NUMBER = /^([1-9]\d{0,3})$/;
const PART_COUNT = /^(\d{1,3})\s*[x×]$/i;
const BAG_NUMBER = /^([1-9]\d?)$/;
const ELEMENT_ID = /^[1-9]\d{3,7}$/;
const PIECE_LENGTH = /^([1-9]\d?)$/;

function firstGroupAsInt(pattern: RegExp, text: string): number | null {
  const match = pattern.exec(text.trim());
  if (!match) return null;
  return Number.parseInt(match[1], 10);
}

/** "6", "006", "Page 6", "p. 6" */
export function extractPageNumberValue(text: string): number | null {
  return firstGroupAsInt(PAGE_NUMBER_PLAIN, text) ?? firstGroupAsInt(PAGE_NUMBER_PREFIXED, text);
}

/** 1-9999 without leading zeros */
export function extractStepNumberValue(text: string): number | null {
  return firstGroupAsInt(STEP_NUMBER, text);
}

/** "2x", "2 x", "12×" */
export function extractPartCountValue(text: string): number | null {
  return firstGroupAsInt(PART_COUNT, text);
}

/** 1-99 */
export function extractBagNumberValue(text: string): number | null {
  return firstGroupAsInt(BAG_NUMBER, text);
}

/** 1-99 */
export function extractPieceLengthValue(text: string): number | null {
  return firstGroupAsInt(PIECE_LENGTH, text);
}

/** 4-8 digit catalog element id, kept as a string */
export function extractElementId(text: string): string | null {
  const trimmed = text.trim();
  return ELEMENT_ID.test(trimmed) ? trimmed : null;
}
