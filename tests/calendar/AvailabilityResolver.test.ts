import { describe, expect, it } from 'vitest';
import {
  AvailabilityResolver,
  buildSlotGrid,
  formatSlots,
  overlaps
} from '../../src/services/calendar/AvailabilityResolver';
import { silentLogger } from '../../src/utils/logger';
import { FakeCalendar, fixedClock } from '../helpers/fakes';

const at = (day: number, hour: number, minute = 0): Date => new Date(2026, 4, day, hour, minute);

describe('buildSlotGrid', () => {
  it('produces contiguous slots and leaves out a short remainder', () => {
    const slots = buildSlotGrid(at(4, 9), at(4, 10, 45), 30);

    expect(formatSlots(slots)).toEqual(['9:00 AM - 9:30 AM', '9:30 AM - 10:00 AM', '10:00 AM - 10:30 AM']);
    slots.slice(1).forEach((slot, index) => expect(slot.start).toEqual(slots[index].end));
  });

  it('is empty when the window is shorter than one slot', () => {
    expect(buildSlotGrid(at(4, 9), at(4, 9, 20), 30)).toEqual([]);
  });

  it('rejects non-positive slot lengths', () => {
    expect(() => buildSlotGrid(at(4, 9), at(4, 17), 0)).toThrow('Slot length must be positive');
  });
});

describe('overlaps', () => {
  const morning = { start: at(4, 9), end: at(4, 10) };

  it('is symmetric', () => {
    const late = { start: at(4, 9, 30), end: at(4, 11) };
    expect(overlaps(morning, late)).toBe(true);
    expect(overlaps(late, morning)).toBe(true);
  });

  it('treats touching intervals as free', () => {
    const next = { start: at(4, 10), end: at(4, 11) };
    expect(overlaps(morning, next)).toBe(false);
    expect(overlaps(next, morning)).toBe(false);
  });
});

describe('AvailabilityResolver', () => {
  function setup(now: Date = at(4, 7)): { calendar: FakeCalendar; resolver: AvailabilityResolver } {
    const calendar = new FakeCalendar();
    const resolver = new AvailabilityResolver(calendar, { clock: fixedClock(now) }, silentLogger);
    return { calendar, resolver };
  }

  describe('getFreeSlots', () => {
    it('returns the whole workday when the calendar is empty', async () => {
      const { resolver } = setup();

      const slots = await resolver.getFreeSlots('2026-05-04');

      expect(slots).toHaveLength(16);
      expect(slots[0]).toEqual({ start: at(4, 9), end: at(4, 9, 30) });
      expect(slots[15]).toEqual({ start: at(4, 16, 30), end: at(4, 17) });
    });

    it('removes every slot a busy interval touches', async () => {
      const { calendar, resolver } = setup();
      calendar.addEvent('Review', at(4, 10, 15), at(4, 10, 45));

      const slots = await resolver.getFreeSlots('2026-05-04', '09:00', '12:00');

      expect(formatSlots(slots)).toEqual([
        '9:00 AM - 9:30 AM',
        '9:30 AM - 10:00 AM',
        '11:00 AM - 11:30 AM',
        '11:30 AM - 12:00 PM'
      ]);
    });

    it('never returns a slot overlapping an event', async () => {
      const { calendar, resolver } = setup();
      calendar.addEvent('Lunch', at(4, 12), at(4, 13));
      calendar.addEvent('Sync', at(4, 15, 30), at(4, 16));

      const slots = await resolver.getFreeSlots('2026-05-04', '09:00', '17:00', 45);
      const busy = [
        { start: at(4, 12), end: at(4, 13) },
        { start: at(4, 15, 30), end: at(4, 16) }
      ];

      expect(slots.length).toBeGreaterThan(0);
      for (const slot of slots) {
        expect(busy.some((interval) => overlaps(slot, interval))).toBe(false);
      }
    });

    it('propagates calendar failures', async () => {
      const { calendar, resolver } = setup();
      calendar.failReads = true;

      await expect(resolver.getFreeSlots('2026-05-04')).rejects.toThrow('calendar unavailable');
    });
  });

  describe('findConflicts', () => {
    it('reports events overlapping the proposed interval', async () => {
      const { calendar, resolver } = setup();
      calendar.addEvent('Standup', at(5, 15), at(5, 15, 30));

      const conflicts = await resolver.findConflicts(at(5, 15), at(5, 15, 30));

      expect(conflicts.map((event) => event.summary)).toEqual(['Standup']);
    });

    it('ignores events that only touch the interval', async () => {
      const { calendar, resolver } = setup();
      calendar.addEvent('Standup', at(5, 15), at(5, 15, 30));

      expect(await resolver.findConflicts(at(5, 15, 30), at(5, 16))).toEqual([]);
    });
  });

  describe('findAlternatives', () => {
    it('offers at most five slots that start after now', async () => {
      const { calendar, resolver } = setup(at(4, 10));
      calendar.addEvent('Breakfast', at(4, 8), at(4, 9));

      const slots = await resolver.findAlternatives('2026-05-04', 30);

      expect(formatSlots(slots)).toEqual([
        '10:30 AM - 11:00 AM',
        '11:00 AM - 11:30 AM',
        '11:30 AM - 12:00 PM',
        '12:00 PM - 12:30 PM',
        '12:30 PM - 1:00 PM'
      ]);
    });

    it('searches the 08:00-18:00 window with the meeting length', async () => {
      const { calendar, resolver } = setup();
      calendar.addEvent('Workshop', at(5, 8), at(5, 12));

      const slots = await resolver.findAlternatives('2026-05-05', 60);

      expect(formatSlots(slots)).toEqual([
        '12:00 PM - 1:00 PM',
        '1:00 PM - 2:00 PM',
        '2:00 PM - 3:00 PM',
        '3:00 PM - 4:00 PM',
        '4:00 PM - 5:00 PM'
      ]);
    });

    it('is empty when the day is fully booked', async () => {
      const { calendar, resolver } = setup();
      calendar.addEvent('Offsite', at(5, 8), at(5, 18));

      expect(await resolver.findAlternatives('2026-05-05', 30)).toEqual([]);
    });
  });
});
