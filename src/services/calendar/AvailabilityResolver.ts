import { addMinutes, isValid } from 'date-fns';
import { CalendarEvent, ICalendarGateway } from '../../core/interfaces/ICalendarGateway';
import { TimeSlot } from '../../types/conversation';
import { withTimeout } from '../../utils/helpers';
import { Logger, logger as defaultLogger } from '../../utils/logger';
import { formatTime, TimeParser } from '../../utils/time';

export const WORKDAY_START = '09:00';
export const WORKDAY_END = '17:00';
export const ALTERNATIVES_WINDOW_START = '08:00';
export const ALTERNATIVES_WINDOW_END = '18:00';
export const MAX_ALTERNATIVES = 5;

const CONFLICT_QUERY_LIMIT = 10;
const FREE_SLOT_QUERY_LIMIT = 100;

/**
 * Contiguous equal-length slots from windowStart; a trailing remainder
 * shorter than one slot is left out.
 */
export function buildSlotGrid(windowStart: Date, windowEnd: Date, minutes: number): TimeSlot[] {
  if (!(minutes > 0)) {
    throw new Error(`Slot length must be positive, got ${minutes}`);
  }

  const slots: TimeSlot[] = [];
  let cursor = windowStart;
  while (addMinutes(cursor, minutes) <= windowEnd) {
    const end = addMinutes(cursor, minutes);
    slots.push({ start: cursor, end });
    cursor = end;
  }
  return slots;
}

/**
 * Half-open interval overlap: [a.start, a.end) against [b.start, b.end).
 */
export function overlaps(a: TimeSlot, b: TimeSlot): boolean {
  return a.start < b.end && a.end > b.start;
}

export function formatSlots(slots: readonly TimeSlot[]): string[] {
  return slots.map((slot) => `${formatTime(slot.start)} - ${formatTime(slot.end)}`);
}

function toInterval(event: CalendarEvent): TimeSlot | null {
  const start = TimeParser.parseEventBoundary(event.start);
  const end = TimeParser.parseEventBoundary(event.end);
  if (!isValid(start) || !isValid(end) || end <= start) return null;
  return { start, end };
}

export interface AvailabilityResolverOptions {
  timeoutMs?: number;
  clock?: () => Date;
}

/**
 * Free/busy arithmetic over the calendar gateway. Gateway failures
 * propagate; callers decide between failing open and failing closed.
 */
export class AvailabilityResolver {
  private readonly timeoutMs: number;
  private readonly clock: () => Date;

  constructor(
    private readonly calendar: ICalendarGateway,
    options: AvailabilityResolverOptions = {},
    private readonly logger: Logger = defaultLogger
  ) {
    this.timeoutMs = options.timeoutMs ?? 10000;
    this.clock = options.clock ?? (() => new Date());
  }

  async getFreeSlots(
    date: string,
    workdayStart: string = WORKDAY_START,
    workdayEnd: string = WORKDAY_END,
    slotLengthMinutes = 30
  ): Promise<TimeSlot[]> {
    const windowStart = TimeParser.combine(date, workdayStart);
    const windowEnd = TimeParser.combine(date, workdayEnd);
    const grid = buildSlotGrid(windowStart, windowEnd, slotLengthMinutes);
    if (grid.length === 0) return [];

    const events = await withTimeout(
      this.calendar.listEvents(windowStart, windowEnd, FREE_SLOT_QUERY_LIMIT),
      this.timeoutMs,
      'calendar.listEvents'
    );
    const busy = events.map(toInterval).filter((interval): interval is TimeSlot => interval !== null);

    const free = grid.filter((slot) => !busy.some((interval) => overlaps(slot, interval)));
    this.logger.debug(`🗓️ ${free.length}/${grid.length} free ${slotLengthMinutes}-minute slots on ${date}`);
    return free;
  }

  /**
   * Existing events overlapping the proposed interval.
   */
  async findConflicts(start: Date, end: Date): Promise<CalendarEvent[]> {
    const events = await withTimeout(
      this.calendar.listEvents(start, end, CONFLICT_QUERY_LIMIT),
      this.timeoutMs,
      'calendar.listEvents'
    );
    const proposed = { start, end };
    return events.filter((event) => {
      const interval = toInterval(event);
      return interval !== null && overlaps(proposed, interval);
    });
  }

  /**
   * Up to five upcoming free slots of the requested length in the wider 08:00-18:00 window.
   */
  async findAlternatives(date: string, minutes: number): Promise<TimeSlot[]> {
    const now = this.clock();
    const free = await this.getFreeSlots(date, ALTERNATIVES_WINDOW_START, ALTERNATIVES_WINDOW_END, minutes);
    return free.filter((slot) => slot.start > now).slice(0, MAX_ALTERNATIVES);
  }
}
