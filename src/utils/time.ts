/**
 * Date and time helpers shared by the entity extractor, the availability
 * resolver and the dialogue flows.
 *
 * Calendar dates travel as `yyyy-MM-dd` strings and clock times as `HH:mm`
 * strings; both are interpreted in the process time zone.
 */

import * as chrono from 'chrono-node';
import { endOfDay, format, isValid, parse, parseISO, startOfDay } from 'date-fns';

export const DATE_FORMAT = 'yyyy-MM-dd';
export const TIME_FORMAT = 'HH:mm';

const ISO_DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;
const CLOCK_TIME_PATTERN = /^([01]\d|2[0-3]):[0-5]\d$/;

// "14:30", "9:15am", "3pm", "3 PM"
const EXPLICIT_TIME_PATTERN = /\b(?:\d{1,2}:\d{2}(?:\s*[ap]\.?m\.?)?|\d{1,2}\s*[ap]\.?m\.?)(?![a-z])/gi;

export interface ParsedDateTime {
  date: string;
  time?: string;
}

export class TimeParser {
  static isIsoDate(value: unknown): value is string {
    return typeof value === 'string' && ISO_DATE_PATTERN.test(value) && isValid(parseISO(value));
  }

  static isClockTime(value: unknown): value is string {
    return typeof value === 'string' && CLOCK_TIME_PATTERN.test(value);
  }

  /**
   * Strict `yyyy-MM-dd` parse; null when the text is anything else.
   */
  static parseStrictDate(value: string, referenceDate: Date = new Date()): string | null {
    const parsed = parse(value.trim(), DATE_FORMAT, referenceDate);
    return isValid(parsed) ? format(parsed, DATE_FORMAT) : null;
  }

  /**
   * Strict `HH:mm` parse; null when the text is anything else.
   */
  static parseStrictTime(value: string, referenceDate: Date = new Date()): string | null {
    const parsed = parse(value.trim(), TIME_FORMAT, referenceDate);
    return isValid(parsed) ? format(parsed, TIME_FORMAT) : null;
  }

  /**
   * Natural-language parse of a whole message, preferring future dates.
   * The time is only reported when the parser is certain of the hour
   * ("tomorrow" alone yields a date and no time).
   */
  static parseNatural(text: string, referenceDate: Date): ParsedDateTime | null {
    const results = chrono.parse(text, referenceDate, { forwardDate: true });
    if (results.length === 0) {
      return null;
    }
    const start = results[0].start;
    const date = start.date();
    if (!isValid(date)) {
      return null;
    }
    return {
      date: format(date, DATE_FORMAT),
      time: start.isCertain('hour') ? format(date, TIME_FORMAT) : undefined
    };
  }

  /**
   * Strict format first, then a lenient natural-language parse.
   */
  static normalizeDate(value: string, referenceDate: Date): string | null {
    const strict = this.parseStrictDate(value, referenceDate);
    if (strict) return strict;
    return this.parseNatural(value, referenceDate)?.date ?? null;
  }

  /**
   * Strict format first, then a lenient natural-language parse of the time alone.
   */
  static normalizeTime(value: string, referenceDate: Date): string | null {
    const strict = this.parseStrictTime(value, referenceDate);
    if (strict) return strict;
    const parsed = chrono.parseDate(value, referenceDate);
    return parsed && isValid(parsed) ? format(parsed, TIME_FORMAT) : null;
  }

  /**
   * Clock-time substrings written explicitly in the text, in order of appearance.
   */
  static findExplicitTimes(text: string): string[] {
    return Array.from(text.matchAll(EXPLICIT_TIME_PATTERN), (match) => match[0].trim());
  }

  /**
   * Local instant for a calendar date and clock time.
   */
  static combine(date: string, time: string): Date {
    return parse(`${date} ${time}`, `${DATE_FORMAT} ${TIME_FORMAT}`, new Date());
  }

  static toDate(date: string): Date {
    return parse(date, DATE_FORMAT, new Date());
  }

  static today(now: Date): string {
    return format(now, DATE_FORMAT);
  }

  static dayBounds(date: string): { start: Date; end: Date } {
    const day = this.toDate(date);
    return { start: startOfDay(day), end: endOfDay(day) };
  }

  /**
   * Event boundaries arrive as ISO date-times or, for all-day events, bare dates.
   * parseISO reads a bare date as local midnight.
   */
  static parseEventBoundary(value: string): Date {
    return parseISO(value);
  }
}

/**
 * "Monday, May 4, 2026"
 */
export function formatDate(value: string | Date): string {
  const date = typeof value === 'string' ? TimeParser.toDate(value) : value;
  return format(date, 'EEEE, MMMM d, yyyy');
}

/**
 * "3:00 PM"
 */
export function formatTime(value: string | Date): string {
  const date = typeof value === 'string' ? parse(value, TIME_FORMAT, new Date()) : value;
  return format(date, 'h:mm a');
}
