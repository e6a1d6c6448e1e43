import type { FieldType, FieldValue } from './types.js';

export interface CastError {
  type: FieldType;
  term: string;
  reason: string;
}

export type CastResult =
  | { ok: true; value: FieldValue }
  | { ok: false; error: CastError };

const INTEGER_PATTERN = /^[+-]?\d+$/;
const FLOAT_PATTERN = /^[+-]?\d+(\.\d+)?([eE][+-]?\d+)?$/;
const DECIMAL_PATTERN = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;
const DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;
const TIMESTAMP_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2})[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.(\d{1,6}))?)?(Z|[+-]\d{2}:\d{2})?$/;
const UUID_PATTERN = /^[0-9a-fA-F]{8}-[0-9a-fA-F]{4}-[0-9a-fA-F]{4}-[0-9a-fA-F]{4}-[0-9a-fA-F]{12}$/;

function accept(value: FieldValue): CastResult {
  return { ok: true, value };
}

function reject(type: FieldType, term: string, reason: string): CastResult {
  return { ok: false, error: { type, term, reason } };
}

const DAYS_IN_MONTH = [31, 28, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31];

function isLeapYear(year: number): boolean {
  return year % 4 === 0 && (year % 100 !== 0 || year % 400 === 0);
}

function isCalendarDate(year: number, month: number, day: number): boolean {
  const days = DAYS_IN_MONTH[month - 1];
  if (days === undefined || day < 1) return false;
  return day <= (month === 2 && isLeapYear(year) ? 29 : days);
}

/** Epoch milliseconds of a UTC time; unlike Date.UTC, years 0-99 stay as given. */
function utcMillis(
  year: number,
  month: number,
  day: number,
  hour: number,
  minute: number,
  second: number,
  millis: number,
): number {
  const date = new Date(0);
  date.setUTCFullYear(year, month - 1, day);
  date.setUTCHours(hour, minute, second, millis);
  return date.getTime();
}

function castTimestamp(term: string): CastResult {
  const m = TIMESTAMP_PATTERN.exec(term);
  if (m === null) return reject('timestamp', term, 'not an ISO 8601 timestamp');
  const [, y, mo, d, h, mi, s = '00', frac = '', offset = 'Z'] = m;
  const year = Number(y);
  const month = Number(mo);
  const day = Number(d);
  const hour = Number(h);
  const minute = Number(mi);
  const second = Number(s);
  if (!isCalendarDate(year, month, day)) {
    return reject('timestamp', term, 'not a calendar date');
  }
  if (hour > 23 || minute > 59 || second > 59) {
    return reject('timestamp', term, 'time of day out of range');
  }
  const millis = Number(frac.padEnd(3, '0').slice(0, 3));
  let offsetMinutes = 0;
  if (offset !== 'Z') {
    const sign = offset.startsWith('-') ? -1 : 1;
    const [oh, om] = offset.slice(1).split(':').map(Number);
    if (oh === undefined || om === undefined || oh > 23 || om > 59) {
      return reject('timestamp', term, 'offset out of range');
    }
    offsetMinutes = sign * (oh * 60 + om);
  }
  const epoch = utcMillis(year, month, day, hour, minute, second, millis) - offsetMinutes * 60_000;
  return accept(new Date(epoch));
}

/**
 * Casts a search term to a field type.
 * Never throws: a term that is not a valid value of the type yields
 * `{ ok: false }` with the reason.
 */
export function castTerm(type: FieldType, term: string): CastResult {
  switch (type) {
    case 'text':
      return accept(term);

    case 'integer': {
      if (!INTEGER_PATTERN.test(term)) return reject(type, term, 'not an integer');
      const n = Number(term);
      if (!Number.isSafeInteger(n)) return reject(type, term, 'integer out of range');
      return accept(n);
    }

    case 'float':
      if (!FLOAT_PATTERN.test(term)) return reject(type, term, 'not a number');
      return accept(Number(term));

    case 'decimal':
      // Kept as text so numeric columns compare without float rounding
      if (!DECIMAL_PATTERN.test(term)) return reject(type, term, 'not a decimal');
      return accept(term);

    case 'boolean':
      if (term === 'true' || term === '1') return accept(true);
      if (term === 'false' || term === '0') return accept(false);
      return reject(type, term, 'not a boolean');

    case 'date': {
      const m = DATE_PATTERN.exec(term);
      if (m === null) return reject(type, term, 'not an ISO 8601 date');
      if (!isCalendarDate(Number(m[1]), Number(m[2]), Number(m[3]))) {
        return reject(type, term, 'not a calendar date');
      }
      return accept(term);
    }

    case 'timestamp':
      return castTimestamp(term);

    case 'uuid':
      if (!UUID_PATTERN.test(term)) return reject(type, term, 'not a UUID');
      return accept(term.toLowerCase());

    case 'json':
      return reject(type, term, 'text does not cast to json');
  }
}
