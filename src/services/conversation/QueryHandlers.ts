import { ContactRef } from '../../core/interfaces/IContactDirectory';
import { EntityBag } from '../../core/nlp/types';
import { TimeParser } from '../../utils/time';
import { WORKDAY_END, WORKDAY_START } from '../calendar/AvailabilityResolver';
import { bounded, DialogueContext } from './DialogueContext';
import {
  calendarDayLabel,
  calendarEvents,
  contactDetails,
  contactList,
  freeSlots,
  Messages,
  nextEvent,
  noContacts
} from './messages';

const TODAY_PATTERN = /\btoday(?:'?s)?\b/i;
const DAY_EVENT_LIMIT = 50;
const FREE_SLOT_MINUTES = 30;

/**
 * Single-message intents: they answer straight away and keep no state.
 * Calendar and contact failures are reported without details.
 */
export class QueryHandlers {
  constructor(private readonly context: DialogueContext) {}

  async checkCalendar(message: string, entities: EntityBag): Promise<string> {
    const today = TimeParser.today(this.context.clock());
    const date = TODAY_PATTERN.test(message) ? today : TimeParser.isIsoDate(entities.date) ? entities.date : undefined;

    try {
      if (!date) {
        const event = await bounded(this.context, this.context.calendar.nextEvent(), 'calendar.nextEvent');
        return event ? nextEvent(event) : Messages.NO_UPCOMING_EVENTS;
      }

      const { start, end } = TimeParser.dayBounds(date);
      const events = await bounded(
        this.context,
        this.context.calendar.listEvents(start, end, DAY_EVENT_LIMIT),
        'calendar.listEvents'
      );
      return calendarEvents(calendarDayLabel(date, today), events);
    } catch (error) {
      this.context.logger.error('Calendar listing failed', error);
      return Messages.CALENDAR_UNAVAILABLE;
    }
  }

  async findContact(entities: EntityBag): Promise<string> {
    const [name] = entities.person ?? [];
    if (!name) return Messages.CONTACT_ASK_NAME;

    let contacts: ContactRef[] = [];
    try {
      contacts = await bounded(this.context, this.context.contacts.search(name), 'contacts.search');
    } catch (error) {
      this.context.logger.error(`Contact search for "${name}" failed`, error);
    }

    if (contacts.length === 0) return noContacts(name);
    if (contacts.length === 1) return contactDetails(contacts[0]);
    return contactList(name, contacts);
  }

  async checkFreeSlots(entities: EntityBag): Promise<string> {
    const date = TimeParser.isIsoDate(entities.date) ? entities.date : TimeParser.today(this.context.clock());
    try {
      const slots = await this.context.availability.getFreeSlots(date, WORKDAY_START, WORKDAY_END, FREE_SLOT_MINUTES);
      return freeSlots(date, FREE_SLOT_MINUTES, slots);
    } catch (error) {
      this.context.logger.error('Free slot lookup failed', error);
      return Messages.CALENDAR_UNAVAILABLE;
    }
  }
}
