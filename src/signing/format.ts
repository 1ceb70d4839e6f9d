/**
 * x-amz-date and credential-scope date stamps
 */

import { ClockError } from '../errors/index.js';

const AMZ_DATE_FIELDS = /^(\d{4})(\d{2})(\d{2})T(\d{2})(\d{2})(\d{2})Z$/;

/**
 * YYYYMMDD
 */
export function formatDateStamp(date: Date): string {
  return formatAmzDate(date).slice(0, 8);
}

/**
 * YYYYMMDDTHHmmssZ, the basic ISO 8601 form used by x-amz-date
 */
export function formatAmzDate(date: Date): string {
  if (Number.isNaN(date.getTime())) {
    throw ClockError.invalidFormat(String(date), 'a valid Date');
  }
  return date.toISOString().replace(/\.\d{3}Z$/, 'Z').replace(/[-:]/g, '');
}

/**
 * Parse YYYYMMDDTHHmmssZ. Fields out of range (month 13, hour 24) are
 * rejected rather than rolled over.
 */
export function parseAmzDate(amzDate: string): Date {
  const match = AMZ_DATE_FIELDS.exec(amzDate);
  if (!match) {
    throw ClockError.invalidFormat(amzDate, 'YYYYMMDDTHHMMSSZ');
  }
  const [, year, month, day, hours, minutes, seconds] = match.map(Number);
  const date = new Date(0);
  date.setUTCFullYear(year ?? 0, (month ?? 1) - 1, day);
  date.setUTCHours(hours ?? 0, minutes, seconds);
  if (Number.isNaN(date.getTime()) || formatAmzDate(date) !== amzDate) {
    throw ClockError.invalidFormat(amzDate, 'a valid YYYYMMDDTHHMMSSZ timestamp');
  }
  return date;
}

/**
 * Throws ClockError unless the value is a real YYYYMMDDTHHmmssZ timestamp
 */
export function assertAmzDate(amzDate: string): void {
  parseAmzDate(amzDate);
}

/**
 * Throws ClockError unless the value is a real YYYYMMDD date
 */
export function assertDateStamp(dateStamp: string): void {
  if (!/^\d{8}$/.test(dateStamp)) {
    throw ClockError.invalidFormat(dateStamp, 'YYYYMMDD');
  }
  parseAmzDate(`${dateStamp}T000000Z`);
}
