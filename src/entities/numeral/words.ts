/**
 * Persian numeral word table
 *
 * Only the atomic forms live here: units, teens, tens, hundreds and the
 * word for one thousand. Everything else is composed from these.
 */

/** Largest absolute value the converter supports */
export const ABS_COUNTING_LIMIT = 999_999;

export const ZERO_WORD = 'صفر';

export const NEGATIVE_PREFIX = 'منفی';

export const THOUSAND_WORD = 'هزار';

/** Joins two non-empty segments ("and") */
export const CONJUNCTION = ' و ';

/** Returned (never thrown) for input outside the supported range */
export const OUT_OF_RANGE_MESSAGE = 'خطا: عدد خارج از محدوده پشتیبانی شده (-999,999 تا +999,999)';

export const PERSIAN_WORDS: ReadonlyMap<number, string> = new Map([
  [1, 'یک'],
  [2, 'دو'],
  [3, 'سه'],
  [4, 'چهار'],
  [5, 'پنج'],
  [6, 'شش'],
  [7, 'هفت'],
  [8, 'هشت'],
  [9, 'نه'],
  [10, 'ده'],
  [11, 'یازده'],
  [12, 'دوازده'],
  [13, 'سیزده'],
  [14, 'چهارده'],
  [15, 'پانزده'],
  [16, 'شانزده'],
  [17, 'هفده'],
  [18, 'هجده'],
  [19, 'نوزده'],
  [20, 'بیست'],
  [30, 'سی'],
  [40, 'چهل'],
  [50, 'پنجاه'],
  [60, 'شصت'],
  [70, 'هفتاد'],
  [80, 'هشتاد'],
  [90, 'نود'],
  [100, 'صد'],
  [200, 'دویست'],
  [300, 'سیصد'],
  [400, 'چهارصد'],
  [500, 'پانصد'],
  [600, 'ششصد'],
  [700, 'هفتصد'],
  [800, 'هشتصد'],
  [900, 'نهصد'],
  [1000, THOUSAND_WORD],
]);
