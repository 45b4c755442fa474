/**
 * Numeral entity - public API
 */
export { convertToPersianWord, getSupportedRange, isNumberSupported } from './converter';

export {
  ABS_COUNTING_LIMIT,
  CONJUNCTION,
  NEGATIVE_PREFIX,
  OUT_OF_RANGE_MESSAGE,
  PERSIAN_WORDS,
  THOUSAND_WORD,
  ZERO_WORD,
} from './words';
