/**
 * Time utilities for consistent date handling
 */

import { format, fromUnixTime, formatISO } from 'date-fns';

export function formatDate(date: Date): string {
  return format(date, 'yyyy-MM-dd');
}

export function unixSecondsToDate(seconds: number): string {
  return formatDate(fromUnixTime(seconds));
}

export function nowIso(now: Date = new Date()): string {
  return formatISO(now);
}

export function hoursToSeconds(hours: number): number {
  return hours * 60 * 60;
}

export function daysToSeconds(days: number): number {
  return days * 24 * 60 * 60;
}
