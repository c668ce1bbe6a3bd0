/**
 * Value Normalization
 *
 * Pure functions converting raw OCR/LLM text fragments (dates, amounts,
 * numbers, identifiers) into canonical strings. Every function is total:
 * failures return null, nothing throws.
 */

// ============================================================================
// Dates
// ============================================================================

const MONTH_NAMES = [
  'january',
  'february',
  'march',
  'april',
  'may',
  'june',
  'july',
  'august',
  'september',
  'october',
  'november',
  'december',
] as const;

const MONTH_ABBREVIATIONS = MONTH_NAMES.map((name) => name.slice(0, 3));

type DateParts = { year: number; month: number; day: number };

interface DatePattern {
  /** Human-readable form, used in docs and tests */
  format: string;
  regex: RegExp;
  toParts: (match: RegExpExecArray) => DateParts | null;
}

function numericParts(year: string, month: string, day: string): DateParts {
  return { year: Number(year), month: Number(month), day: Number(day) };
}

function monthFromName(name: string, names: readonly string[]): number | null {
  const index = names.indexOf(name.toLowerCase());
  return index === -1 ? null : index + 1;
}

/** Tried in order; the first pattern producing a real calendar date wins. */
export const DATE_PATTERNS: readonly DatePattern[] = [
  {
    format: 'YYYY-MM-DD',
    regex: /^(\d{4})-(\d{1,2})-(\d{1,2})$/,
    toParts: (m) => numericParts(m[1], m[2], m[3]),
  },
  {
    format: 'DD-MM-YYYY',
    regex: /^(\d{1,2})-(\d{1,2})-(\d{4})$/,
    toParts: (m) => numericParts(m[3], m[2], m[1]),
  },
  {
    format: 'DD/MM/YYYY',
    regex: /^(\d{1,2})\/(\d{1,2})\/(\d{4})$/,
    toParts: (m) => numericParts(m[3], m[2], m[1]),
  },
  {
    format: 'DD.MM.YYYY',
    regex: /^(\d{1,2})\.(\d{1,2})\.(\d{4})$/,
    toParts: (m) => numericParts(m[3], m[2], m[1]),
  },
  {
    format: 'YYYY/MM/DD',
    regex: /^(\d{4})\/(\d{1,2})\/(\d{1,2})$/,
    toParts: (m) => numericParts(m[1], m[2], m[3]),
  },
  {
    format: 'YYYY.MM.DD',
    regex: /^(\d{4})\.(\d{1,2})\.(\d{1,2})$/,
    toParts: (m) => numericParts(m[1], m[2], m[3]),
  },
  {
    format: 'DD Mon YYYY',
    regex: /^(\d{1,2})\s+([A-Za-z]{3})\s+(\d{4})$/,
    toParts: (m) => {
      const month = monthFromName(m[2], MONTH_ABBREVIATIONS);
      return month === null ? null : { year: Number(m[3]), month, day: Number(m[1]) };
    },
  },
  {
    format: 'DD Month YYYY',
    regex: /^(\d{1,2})\s+([A-Za-z]+)\s+(\d{4})$/,
    toParts: (m) => {
      const month = monthFromName(m[2], MONTH_NAMES);
      return month === null ? null : { year: Number(m[3]), month, day: Number(m[1]) };
    },
  },
  {
    format: 'Month DD, YYYY',
    regex: /^([A-Za-z]+)\s+(\d{1,2}),\s*(\d{4})$/,
    toParts: (m) => {
      const month = monthFromName(m[1], MONTH_NAMES);
      return month === null ? null : { year: Number(m[3]), month, day: Number(m[2]) };
    },
  },
];

function daysInMonth(year: number, month: number): number {
  return new Date(Date.UTC(year, month, 0)).getUTCDate();
}

function isCalendarDate({ year, month, day }: DateParts): boolean {
  return year >= 1 && month >= 1 && month <= 12 && day >= 1 && day <= daysInMonth(year, month);
}

function pad(value: number, width: number): string {
  return String(value).padStart(width, '0');
}

/**
 * Render date parts with the YYYY, MM and DD tokens of `outputFormat`.
 */
function formatDateParts({ year, month, day }: DateParts, outputFormat: string): string {
  return outputFormat.replace(/YYYY|MM|DD/g, (token) => {
    switch (token) {
      case 'YYYY':
        return pad(year, 4);
      case 'MM':
        return pad(month, 2);
      default:
        return pad(day, 2);
    }
  });
}

function parseDateParts(value: unknown): DateParts | null {
  if (value === null || value === undefined) {
    return null;
  }

  if (value instanceof Date) {
    if (Number.isNaN(value.getTime())) {
      return null;
    }
    return { year: value.getFullYear(), month: value.getMonth() + 1, day: value.getDate() };
  }

  const clean = String(value).trim();
  if (!clean) {
    return null;
  }

  for (const pattern of DATE_PATTERNS) {
    const match = pattern.regex.exec(clean);
    if (!match) {
      continue;
    }
    const parts = pattern.toParts(match);
    if (parts && isCalendarDate(parts)) {
      return parts;
    }
  }

  return null;
}

/**
 * Normalize a date to `outputFormat` (default ISO `YYYY-MM-DD`).
 *
 * Accepts Date objects (read in local time) or strings in any of
 * {@link DATE_PATTERNS}.
 */
export function normalizeDate(value: unknown, outputFormat = 'YYYY-MM-DD'): string | null {
  const parts = parseDateParts(value);
  return parts ? formatDateParts(parts, outputFormat) : null;
}

/**
 * Add calendar days to an issue date. Null when the issue date is not a date.
 */
export function calculateDueDate(
  issueDate: unknown,
  days: number,
  outputFormat = 'YYYY-MM-DD'
): string | null {
  const parts = parseDateParts(issueDate);
  if (!parts || !Number.isFinite(days)) {
    return null;
  }

  const due = new Date(Date.UTC(parts.year, parts.month - 1, parts.day + Math.trunc(days)));
  return formatDateParts(
    { year: due.getUTCFullYear(), month: due.getUTCMonth() + 1, day: due.getUTCDate() },
    outputFormat
  );
}

// ============================================================================
// Amounts & numbers
// ============================================================================

export const CURRENCY_SYMBOLS = ['€', '$', '£', 'EUR', 'USD', 'GBP'] as const;

export const UNIT_SUFFIXES = [
  'kwh',
  'kw',
  'w',
  'm3',
  'm2',
  'm',
  'kg',
  'g',
  'l',
  'ml',
  'kva',
  '%',
] as const;

const DECIMAL_PATTERN = /^(-?)(\d*)\.?(\d*)$/;

/**
 * Round a plain decimal string (`-?digits[.digits]`) half-to-even.
 */
function formatDecimal(plain: string, decimalPlaces: number): string | null {
  const match = DECIMAL_PATTERN.exec(plain);
  if (!match) {
    return null;
  }

  const [, sign, intDigits, fracDigits] = match;
  if (!intDigits && !fracDigits) {
    return null;
  }

  const places = Math.max(0, Math.trunc(decimalPlaces));
  const kept = fracDigits.slice(0, places).padEnd(places, '0');
  const dropped = fracDigits.slice(places);

  let scaled = BigInt((intDigits || '0') + kept);

  if (dropped.length > 0) {
    const first = dropped[0];
    const tail = dropped.slice(1);
    const roundUp =
      first > '5' ||
      (first === '5' && /[1-9]/.test(tail)) ||
      (first === '5' && scaled % 2n === 1n);
    if (roundUp) {
      scaled += 1n;
    }
  }

  const digits = scaled.toString().padStart(places + 1, '0');
  const whole = digits.slice(0, digits.length - places);
  const fraction = digits.slice(digits.length - places);
  const body = places > 0 ? `${whole}.${fraction}` : whole;

  return sign && scaled !== 0n ? `-${body}` : body;
}

/**
 * Plain (non-exponential) decimal form of a finite number.
 */
function plainNumber(value: number): string {
  const text = String(value);
  if (!/e/i.test(text)) {
    return text;
  }
  return value.toLocaleString('en-US', { useGrouping: false, maximumFractionDigits: 20 });
}

/**
 * Resolve `,` and `.` into a single decimal point.
 *
 * - Both present: the rightmost is the decimal separator, the other is grouping.
 * - Commas only, repeated: grouping.
 * - Periods only, repeated: not an amount (`15.01.2025` is a date).
 * - One kind, once, followed by exactly three digits: grouping (`12.345` is 12345).
 * - One kind, once, otherwise: decimal separator (`123,45` is 123.45).
 */
function resolveSeparators(clean: string): string | null {
  const lastComma = clean.lastIndexOf(',');
  const lastPeriod = clean.lastIndexOf('.');

  if (lastComma !== -1 && lastPeriod !== -1) {
    return lastComma > lastPeriod
      ? clean.replace(/\./g, '').replace(',', '.')
      : clean.replace(/,/g, '');
  }

  const separator = lastComma !== -1 ? ',' : lastPeriod !== -1 ? '.' : null;
  if (separator === null) {
    return clean;
  }

  const pieces = clean.split(separator);
  if (pieces.length > 2 && separator === '.') {
    return null;
  }
  if (pieces.length > 2 || pieces[1].length === 3) {
    return pieces.join('');
  }
  return pieces.join('.');
}

/**
 * Normalize a monetary amount to a fixed-point string such as `"1234.56"`.
 *
 * Handles European (`1.234,56 €`) and US (`$1,234.56`) conventions.
 */
export function normalizeAmount(value: unknown, decimalPlaces = 2): string | null {
  if (value === null || value === undefined) {
    return null;
  }

  if (typeof value === 'number') {
    return Number.isFinite(value) ? formatDecimal(plainNumber(value), decimalPlaces) : null;
  }

  if (typeof value === 'bigint') {
    return formatDecimal(value.toString(), decimalPlaces);
  }

  let clean = String(value).trim();
  if (!clean) {
    return null;
  }

  for (const symbol of CURRENCY_SYMBOLS) {
    clean = clean.split(symbol).join('');
  }
  clean = clean.trim().replace(/[^\d,.-]/g, '');

  if (!clean) {
    return null;
  }

  const plain = resolveSeparators(clean);
  return plain === null ? null : formatDecimal(plain, decimalPlaces);
}

function stripTrailingZeros(decimal: string): string {
  if (!decimal.includes('.')) {
    return decimal;
  }
  return decimal.replace(/0+$/, '').replace(/\.$/, '');
}

/**
 * Normalize a measurement such as `"123,45 kWh"` or `"6.9 kVA"` to a plain number string.
 */
export function normalizeNumber(value: unknown): string | null {
  if (value === null || value === undefined) {
    return null;
  }

  if (typeof value === 'number') {
    const result = normalizeAmount(value, 10);
    return result === null ? null : stripTrailingZeros(result);
  }

  let clean = String(value).toLowerCase().trim();
  for (const unit of UNIT_SUFFIXES) {
    clean = clean.replaceAll(unit, '').trim();
  }

  const result = normalizeAmount(clean, 10);
  return result === null ? null : stripTrailingZeros(result);
}

// ============================================================================
// Text & identifiers
// ============================================================================

function collapseWhitespace(value: string): string {
  return value.replace(/\s+/g, ' ').trim();
}

/**
 * Collapse whitespace and optionally truncate, ellipsis included in `maxLength`.
 * A `maxLength` of 0 or null means no limit.
 */
export function normalizeText(value: unknown, maxLength: number | null = null): string | null {
  if (value === null || value === undefined) {
    return null;
  }

  const clean = collapseWhitespace(String(value));
  if (!clean) {
    return null;
  }

  if (maxLength && clean.length > maxLength) {
    return clean.slice(0, Math.max(0, maxLength - 3)) + '...';
  }

  return clean;
}

/**
 * Portuguese tax number: 9 digits, optionally prefixed with the 351 country code.
 */
export function normalizeNif(value: unknown): string | null {
  if (value === null || value === undefined) {
    return null;
  }

  const digits = String(value).replace(/\D/g, '');
  if (digits.length === 9) {
    return digits;
  }
  if (digits.length === 11 && digits.startsWith('351')) {
    return digits.slice(3);
  }
  return null;
}

/**
 * Multibanco payment reference: 9 digits, or 15 for the long form.
 */
export function normalizeMbReference(value: unknown): string | null {
  if (value === null || value === undefined) {
    return null;
  }

  const digits = String(value).replace(/\D/g, '');
  return digits.length === 9 || digits.length === 15 ? digits : null;
}

// ============================================================================
// Comparison
// ============================================================================

/**
 * Null, undefined, or a blank string. `0` and `false` are values.
 */
export function isEmptyValue(value: unknown): boolean {
  if (value === null || value === undefined) {
    return true;
  }
  return typeof value === 'string' && value.trim() === '';
}

/**
 * Whether two field values are equivalent.
 *
 * With `normalize`, values that both parse as amounts are compared as amounts,
 * then values that both parse as dates as dates. Otherwise the comparison is
 * case-insensitive with whitespace collapsed.
 */
export function valuesMatch(a: unknown, b: unknown, normalize = true): boolean {
  const aEmpty = isEmptyValue(a);
  const bEmpty = isEmptyValue(b);

  if (aEmpty && bEmpty) {
    return true;
  }
  if (aEmpty || bEmpty) {
    return false;
  }

  if (normalize) {
    const amountA = normalizeAmount(a);
    const amountB = normalizeAmount(b);
    if (amountA !== null && amountB !== null) {
      return amountA === amountB;
    }

    const dateA = normalizeDate(a);
    const dateB = normalizeDate(b);
    if (dateA !== null && dateB !== null) {
      return dateA === dateB;
    }
  }

  return collapseWhitespace(String(a).toLowerCase()) === collapseWhitespace(String(b).toLowerCase());
}
