/**
 * Number to Persian words conversion
 *
 * Splits a number into thousands, hundreds, tens and units segments, looks
 * each one up in the word table and joins the non-empty segments with "و".
 */

import {
  ABS_COUNTING_LIMIT,
  CONJUNCTION,
  NEGATIVE_PREFIX,
  OUT_OF_RANGE_MESSAGE,
  PERSIAN_WORDS,
  THOUSAND_WORD,
  ZERO_WORD,
} from './words';

/**
 * Look up an atomic word, falling back to the decimal digits on a table gap
 */
function atomicWord(value: number): string {
  return PERSIAN_WORDS.get(value) ?? String(value);
}

/**
 * Render 1-999 as hundreds, tens and units segments
 */
function belowThousandSegments(value: number): string[] {
  const segments: string[] = [];
  let rest = value;

  if (rest >= 100) {
    segments.push(atomicWord(Math.floor(rest / 100) * 100));
    rest %= 100;
  }

  // 1-19 are all atomic, so only 20 and above split into tens and units
  if (rest >= 20) {
    segments.push(atomicWord(Math.floor(rest / 10) * 10));
    rest %= 10;
  }

  if (rest > 0) {
    segments.push(atomicWord(rest));
  }

  return segments;
}

/**
 * Convert an integer to its Persian word form
 *
 * Supports -999,999 to +999,999. Anything else (including non-integers)
 * yields {@link OUT_OF_RANGE_MESSAGE} instead of throwing.
 *
 * @example
 * convertToPersianWord(21);   // 'بیست و یک'
 * convertToPersianWord(1234); // 'هزار و دویست و سی و چهار'
 */
export function convertToPersianWord(value: number): string {
  if (!isNumberSupported(value)) {
    return OUT_OF_RANGE_MESSAGE;
  }

  if (value === 0) {
    return ZERO_WORD;
  }

  const atomic = PERSIAN_WORDS.get(value);
  if (atomic !== undefined) {
    return atomic;
  }

  if (value < 0) {
    return `${NEGATIVE_PREFIX} ${convertToPersianWord(-value)}`;
  }

  const segments: string[] = [];
  const thousands = Math.floor(value / 1000);

  if (thousands > 0) {
    // "one thousand" is spoken as plain "thousand"
    segments.push(thousands === 1 ? THOUSAND_WORD : `${convertToPersianWord(thousands)} ${THOUSAND_WORD}`);
  }

  segments.push(...belowThousandSegments(value % 1000));

  return segments.join(CONJUNCTION);
}

/**
 * The inclusive range accepted by {@link convertToPersianWord}
 */
export function getSupportedRange(): readonly [min: number, max: number] {
  return [-ABS_COUNTING_LIMIT, ABS_COUNTING_LIMIT];
}

export function isNumberSupported(value: number): boolean {
  const [min, max] = getSupportedRange();
  return Number.isInteger(value) && value >= min && value <= max;
}
