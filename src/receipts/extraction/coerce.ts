/**
 * Permissive conversions for OCR values. Every function returns `undefined`
 * for input it cannot interpret instead of throwing.
 */

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

export function toText(value: unknown): string | undefined {
  if (typeof value === 'string') {
    const trimmed = value.trim();
    return trimmed.length > 0 ? trimmed : undefined;
  }
  if (typeof value === 'number' && Number.isFinite(value)) {
    return String(value);
  }
  if (typeof value === 'boolean') {
    return String(value);
  }
  return undefined;
}

const PLAIN_NUMBER = /^[+-]?(\d+(\.\d*)?|\.\d+)$/;

export function toNumber(value: unknown): number | undefined {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : undefined;
  }

  // Currency values arrive as {"amount": 12.5, "currency_code": "USD"}
  if (isRecord(value) && 'amount' in value) {
    return toNumber(value.amount);
  }

  if (typeof value !== 'string') {
    return undefined;
  }

  let text = value.trim().replace(/[^\d.,+-]/g, '');
  if (text.includes(',') && text.includes('.')) {
    text = text.replace(/,/g, '');
  } else if (/^[+-]?\d+,\d{1,2}$/.test(text)) {
    text = text.replace(',', '.');
  } else {
    text = text.replace(/,/g, '');
  }

  if (!PLAIN_NUMBER.test(text)) {
    return undefined;
  }
  const parsed = Number(text);
  return Number.isFinite(parsed) ? parsed : undefined;
}

/** Whole positive quantity; fractional values are truncated. */
export function toQuantity(value: unknown, fallback = 1): number {
  const parsed = toNumber(value);
  if (parsed === undefined) {
    return fallback;
  }
  const whole = Math.trunc(parsed);
  return whole >= 1 ? whole : fallback;
}

/**
 * Numeric dates are read day-first whatever the separator or year width:
 * DD/MM/YY, DD/MM/YYYY, DD-MM-YYYY and DD.MM.YYYY, with an optional
 * HH:MM[:SS]. Two-digit years fall in 2000-2099.
 */
const DAY_FIRST_DATE = /^(\d{1,2})([/.-])(\d{1,2})\2(\d{4}|\d{2})(?:\s+(\d{1,2}):(\d{2})(?::(\d{2}))?)?$/;

const part = (text: string | undefined): number => (text ? parseInt(text, 10) : 0);

/** Date.UTC rolls 31/02 over into March; such dates are rejected instead. */
function utcDate(year: number, month: number, day: number, hours = 0, minutes = 0, seconds = 0): Date | undefined {
  if (hours > 23 || minutes > 59 || seconds > 59) {
    return undefined;
  }
  const date = new Date(Date.UTC(year, month - 1, day, hours, minutes, seconds));
  if (date.getUTCFullYear() !== year || date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) {
    return undefined;
  }
  return date;
}

const ISO_DATE_ONLY = /^(\d{4})-(\d{2})-(\d{2})$/;

/** Dates without a zone are read as UTC. */
export function toDate(value: unknown): Date | undefined {
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? undefined : value;
  }
  const text = toText(value);
  if (!text) {
    return undefined;
  }

  const isoDate = text.match(ISO_DATE_ONLY);
  if (isoDate) {
    return utcDate(part(isoDate[1]), part(isoDate[2]), part(isoDate[3]));
  }

  const dayFirst = text.match(DAY_FIRST_DATE);
  if (dayFirst) {
    const year = dayFirst[4].length === 2 ? 2000 + part(dayFirst[4]) : part(dayFirst[4]);
    return utcDate(
      year,
      part(dayFirst[3]),
      part(dayFirst[1]),
      part(dayFirst[5]),
      part(dayFirst[6]),
      part(dayFirst[7]),
    );
  }

  if (/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}(:\d{2}(\.\d+)?)?$/.test(text)) {
    return validDate(new Date(`${text}Z`));
  }

  return validDate(new Date(text));
}

function validDate(date: Date): Date | undefined {
  return Number.isNaN(date.getTime()) ? undefined : date;
}
