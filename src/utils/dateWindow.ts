import { DateWindow } from '../types';
import { InvalidDateWindowError } from './ApiError';

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;

const toUtcDate = (iso: string): Date => {
  const match = ISO_DATE.exec(iso);
  if (!match) throw new InvalidDateWindowError(`Invalid date "${iso}", expected YYYY-MM-DD`);
  const [, y, m, d] = match;
  const date = new Date(Date.UTC(Number(y), Number(m) - 1, Number(d)));
  if (date.getUTCFullYear() !== Number(y) || date.getUTCMonth() !== Number(m) - 1 || date.getUTCDate() !== Number(d)) {
    throw new InvalidDateWindowError(`Invalid date "${iso}"`);
  }
  return date;
};

const toIso = (date: Date): string => date.toISOString().slice(0, 10);

export const parseIsoDate = (value: string): string => toIso(toUtcDate(value.trim()));

export const addDays = (iso: string, days: number): string => {
  const date = toUtcDate(iso);
  date.setUTCDate(date.getUTCDate() + days);
  return toIso(date);
};

const pad2 = (value: number): string => String(value).padStart(2, '0');

// Local calendar date of the server, not the UTC one.
export const todayIso = (now = new Date()): string =>
  `${now.getFullYear()}-${pad2(now.getMonth() + 1)}-${pad2(now.getDate())}`;

export const assertValidWindow = (window: DateWindow): DateWindow => {
  const start = parseIsoDate(window.start);
  const end = parseIsoDate(window.end);
  if (start > end) {
    throw new InvalidDateWindowError('Start date must be before or equal to end date');
  }
  return { start, end };
};

export const dayWindow = (date: string): DateWindow => {
  const day = parseIsoDate(date);
  return { start: day, end: day };
};

// The anchor day and the six days before it.
export const weekWindow = (anchor: string): DateWindow => {
  const end = parseIsoDate(anchor);
  return { start: addDays(end, -6), end };
};

export const monthWindow = (anchor: string): DateWindow => {
  const date = toUtcDate(parseIsoDate(anchor));
  const monthStart = new Date(Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), 1));
  const nextMonthStart =
    monthStart.getUTCMonth() === 11
      ? new Date(Date.UTC(monthStart.getUTCFullYear() + 1, 0, 1))
      : new Date(Date.UTC(monthStart.getUTCFullYear(), monthStart.getUTCMonth() + 1, 1));
  return { start: toIso(monthStart), end: addDays(toIso(nextMonthStart), -1) };
};
