import { addMinutes, format } from 'date-fns';
import { EntityBag } from '../../core/nlp/types';
import { MeetingConversation } from '../../types/conversation';
import { normalizeReply } from '../../utils/helpers';
import { TIME_FORMAT, TimeParser } from '../../utils/time';
import { bounded, CANCEL, DialogueContext, looksLikeAddress, resolveContactEmail } from './DialogueContext';
import {
  invalidAddress,
  meetingAlternatives,
  meetingAskDate,
  meetingAskTime,
  meetingBooked,
  meetingConfirm,
  meetingDatePassed,
  meetingInvalidAttendee,
  meetingNoFreeSlots,
  meetingNotUnderstood,
  meetingTimePassed,
  Messages
} from './messages';

const BOOK_REPLIES = new Set(['yes', 'y', 'sure', 'ok', 'book']);
const DECLINE_REPLIES = new Set(['no', 'n', 'nope', CANCEL]);
const ACCEPT_SUGGESTION_REPLIES = new Set(['yes', 'y', 'correct', 'confirm', 'right']);

/**
 * person -> confirm_email -> date -> time -> confirm
 *
 * Once person, date and time are known the proposed interval is checked
 * against the calendar before asking for confirmation.
 */
export class MeetingFlow {
  constructor(private readonly context: DialogueContext) {}

  async start(senderId: string, entities: EntityBag): Promise<string> {
    const today = TimeParser.today(this.context.clock());
    const date = TimeParser.isIsoDate(entities.date) && entities.date >= today ? entities.date : undefined;

    const state: MeetingConversation = {
      kind: 'meeting',
      step: 'person',
      date,
      time: TimeParser.isClockTime(entities.time) ? entities.time : undefined,
      duration: entities.duration ?? this.context.defaultMeetingMinutes,
      location: entities.location,
      description: entities.subject,
      alternativeSlots: []
    };

    const person = entities.email?.[0] ?? entities.person?.[0];
    if (person) {
      const reprompt = this.setPerson(state, person);
      if (reprompt !== null) {
        this.context.store.set(senderId, state);
        return reprompt;
      }
    }

    return this.advance(senderId, state);
  }

  async continue(senderId: string, state: MeetingConversation, text: string): Promise<string | null> {
    const reply = normalizeReply(text);
    const value = text.trim();

    switch (state.step) {
      case 'person': {
        if (reply === CANCEL) return this.cancel(senderId);
        const reprompt = this.setPerson(state, value);
        if (reprompt !== null) {
          this.context.store.set(senderId, state);
          return reprompt;
        }
        return this.advance(senderId, state);
      }
      case 'confirm_email':
        return this.continueConfirmEmail(senderId, state, reply, value);
      case 'date': {
        if (reply === CANCEL) return this.cancel(senderId);
        const { date } = await this.context.extractor.extract(value);
        if (!TimeParser.isIsoDate(date)) return this.reprompt(senderId, state, Messages.MEETING_BAD_DATE);
        if (date < TimeParser.today(this.context.clock())) return this.reprompt(senderId, state, meetingDatePassed(date));
        state.date = date;
        return this.advance(senderId, state);
      }
      case 'time': {
        if (reply === CANCEL) return this.cancel(senderId);
        const { time } = await this.context.extractor.extract(value);
        if (!TimeParser.isClockTime(time)) return this.reprompt(senderId, state, Messages.MEETING_BAD_TIME);
        state.time = time;
        return this.advance(senderId, state);
      }
      case 'confirm':
        return this.continueConfirm(senderId, state, reply);
      default:
        return null;
    }
  }

  private async continueConfirmEmail(
    senderId: string,
    state: MeetingConversation,
    reply: string,
    value: string
  ): Promise<string> {
    if (reply === CANCEL) return this.cancel(senderId);

    if (state.suggestedEmail && ACCEPT_SUGGESTION_REPLIES.has(reply)) {
      state.person = state.suggestedEmail;
      state.suggestedEmail = undefined;
      return this.advance(senderId, state);
    }

    if (value.includes('@')) {
      const validation = this.context.validator.validate(value);
      if (!validation.valid) {
        if (validation.suggestedCorrection) state.suggestedEmail = validation.suggestedCorrection;
        this.context.store.set(senderId, state);
        return invalidAddress(value, validation.errorMessage, validation.suggestedCorrection, true);
      }
      state.person = value;
      state.suggestedEmail = undefined;
      return this.advance(senderId, state);
    }

    return this.reprompt(senderId, state, Messages.MEETING_ASK_VALID_EMAIL);
  }

  private async continueConfirm(senderId: string, state: MeetingConversation, reply: string): Promise<string> {
    if (BOOK_REPLIES.has(reply)) {
      return this.book(senderId, state);
    }
    if (DECLINE_REPLIES.has(reply)) {
      return this.cancel(senderId);
    }
    if (/^\d+$/.test(reply)) {
      const slot = state.alternativeSlots[Number.parseInt(reply, 10) - 1];
      if (!slot) return this.reprompt(senderId, state, Messages.MEETING_INVALID_SELECTION);
      state.date = TimeParser.today(slot.start);
      state.time = format(slot.start, TIME_FORMAT);
      state.endTime = format(slot.end, TIME_FORMAT);
      return this.book(senderId, state);
    }
    return this.reprompt(senderId, state, meetingNotUnderstood(state.alternativeSlots.length > 0));
  }

  // Re-storing keeps the conversation alive for another idle period.
  private reprompt(senderId: string, state: MeetingConversation, message: string): string {
    this.context.store.set(senderId, state);
    return message;
  }

  /**
   * An address-shaped attendee is validated; names are kept as given and
   * resolved through contacts later. Returns a reprompt when the address is rejected.
   */
  private setPerson(state: MeetingConversation, person: string): string | null {
    if (!looksLikeAddress(person)) {
      state.person = person;
      return null;
    }

    const validation = this.context.validator.validate(person);
    if (validation.valid) {
      state.person = person;
      return null;
    }

    if (validation.suggestedCorrection) {
      state.suggestedEmail = validation.suggestedCorrection;
      state.step = 'confirm_email';
    } else {
      state.step = 'person';
    }
    return invalidAddress(person, validation.errorMessage, validation.suggestedCorrection);
  }

  private async advance(senderId: string, state: MeetingConversation): Promise<string> {
    if (!state.person) {
      state.step = 'person';
      this.context.store.set(senderId, state);
      return Messages.MEETING_ASK_PERSON;
    }
    if (!state.date) {
      state.step = 'date';
      this.context.store.set(senderId, state);
      return meetingAskDate(state.person);
    }
    if (!state.time) {
      state.step = 'time';
      this.context.store.set(senderId, state);
      return meetingAskTime(state.date);
    }
    return this.checkAvailability(senderId, state, state.person, state.date, state.time);
  }

  /**
   * Calendar failures fail open: an unreadable calendar counts as free.
   */
  private async checkAvailability(
    senderId: string,
    state: MeetingConversation,
    person: string,
    date: string,
    time: string
  ): Promise<string> {
    const start = TimeParser.combine(date, time);
    if (start < this.context.clock()) {
      state.time = undefined;
      state.step = 'time';
      this.context.store.set(senderId, state);
      return meetingTimePassed(date, time);
    }

    const end = addMinutes(start, state.duration);
    state.endTime = format(end, TIME_FORMAT);
    state.alternativeSlots = [];
    state.step = 'confirm';

    let conflicts = 0;
    try {
      conflicts = (await this.context.availability.findConflicts(start, end)).length;
    } catch (error) {
      this.context.logger.warn('⚠️ Conflict check failed, assuming the slot is free', error);
    }

    if (conflicts > 0) {
      try {
        state.alternativeSlots = await this.context.availability.findAlternatives(date, state.duration);
      } catch (error) {
        this.context.logger.warn('⚠️ Could not load alternative slots', error);
      }

      if (state.alternativeSlots.length === 0) {
        state.date = undefined;
        state.step = 'date';
        this.context.store.set(senderId, state);
        return meetingNoFreeSlots(state.duration, date);
      }

      this.context.store.set(senderId, state);
      return meetingAlternatives(time, date, state.duration, state.alternativeSlots);
    }

    this.context.store.set(senderId, state);
    const contact = person.includes('@') ? undefined : await resolveContactEmail(this.context, person);
    return meetingConfirm(state.duration, person, contact?.email, date, time);
  }

  /**
   * Terminal: the conversation ends whatever the calendar answers.
   */
  private async book(senderId: string, state: MeetingConversation): Promise<string> {
    this.context.store.delete(senderId);

    const { person, date, time } = state;
    if (!person || !date || !time) {
      this.context.logger.error('Meeting confirmed without person, date or time', state);
      return Messages.GENERIC_APOLOGY;
    }

    const start = TimeParser.combine(date, time);
    const end = addMinutes(start, state.duration);

    let displayName = person;
    const attendees: string[] = [];
    if (person.includes('@')) {
      attendees.push(person);
    } else {
      const contact = await resolveContactEmail(this.context, person);
      if (contact) {
        displayName = contact.name;
        attendees.push(contact.email);
      }
    }

    for (const attendee of attendees) {
      const validation = this.context.validator.validate(attendee);
      if (!validation.valid) {
        return meetingInvalidAttendee(attendee, validation.errorMessage, validation.suggestedCorrection);
      }
    }

    try {
      const result = await bounded(
        this.context,
        this.context.calendar.createEvent({
          summary: `Meeting with ${displayName}`,
          start,
          end,
          description: state.description,
          location: state.location,
          attendees,
          notify: true
        }),
        'calendar.createEvent'
      );
      if (result.success) {
        return meetingBooked(displayName, start, end, result.link);
      }
      this.context.logger.warn(`⚠️ Meeting with ${displayName} was not created: ${result.error ?? 'unknown error'}`);
    } catch (error) {
      this.context.logger.error(`Creating meeting with ${displayName} failed`, error);
    }
    return Messages.MEETING_BOOK_FAILED;
  }

  private cancel(senderId: string): string {
    this.context.store.delete(senderId);
    return Messages.MEETING_CANCELED;
  }
}
