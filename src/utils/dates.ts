import { IsoDate } from '../types/opportunity';
import { ValidationError } from './errors';

/**
 * Source of the current time; swapped for a fixed clock in tests
 */
export interface Clock {
  now(): Date;
}

export const systemClock: Clock = {
  now: () => new Date(),
};

export interface TimeOfDay {
  hours: number;
  minutes: number;
}

const DAY_MS = 24 * 60 * 60 * 1000;
const ISO_DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * Calendar date of `date` in the process's local time zone
 */
export function toIsoDate(date: Date): IsoDate {
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
}

function isoDateToUtcMs(value: IsoDate): number {
  const match = ISO_DATE_PATTERN.exec(value);
  if (!match) {
    throw new ValidationError(`Invalid calendar date "${value}"`);
  }
  return Date.UTC(Number(match[1]), Number(match[2]) - 1, Number(match[3]));
}

export function addDays(value: IsoDate, days: number): IsoDate {
  const shifted = new Date(isoDateToUtcMs(value) + days * DAY_MS);
  return `${shifted.getUTCFullYear()}-${pad(shifted.getUTCMonth() + 1)}-${pad(shifted.getUTCDate())}`;
}

/** Whole calendar days from `from` to `to`; negative when `to` is earlier */
export function daysBetween(from: IsoDate, to: IsoDate): number {
  return Math.round((isoDateToUtcMs(to) - isoDateToUtcMs(from)) / DAY_MS);
}

export function parseTimeOfDay(value: string): TimeOfDay {
  const match = /^(\d{1,2}):(\d{2})$/.exec(value.trim());
  if (!match) {
    throw new ValidationError(`Invalid time of day "${value}", expected HH:MM`);
  }
  const hours = Number(match[1]);
  const minutes = Number(match[2]);
  if (hours > 23 || minutes > 59) {
    throw new ValidationError(`Invalid time of day "${value}", expected HH:MM`);
  }
  return { hours, minutes };
}

export function formatTimeOfDay(time: TimeOfDay): string {
  return `${pad(time.hours)}:${pad(time.minutes)}`;
}

export function isAtOrAfter(date: Date, time: TimeOfDay): boolean {
  const minutes = date.getHours() * 60 + date.getMinutes();
  return minutes >= time.hours * 60 + time.minutes;
}
