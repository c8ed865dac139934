import { describe, expect, it } from 'vitest';
import { ContactRef } from '../../src/core/interfaces/IContactDirectory';
import { AvailabilityResolver } from '../../src/services/calendar/AvailabilityResolver';
import { ConversationStore } from '../../src/services/conversation/ConversationStore';
import { DialogueEngine, IntentSource } from '../../src/services/conversation/DialogueEngine';
import { Messages } from '../../src/services/conversation/messages';
import { EmailValidator } from '../../src/services/email/EmailValidator';
import { EntityExtractor } from '../../src/services/nlp/EntityExtractor';
import { IntentClassifier } from '../../src/services/nlp/IntentClassifier';
import { silentLogger } from '../../src/utils/logger';
import { FakeCalendar, FakeContacts, FakeEmailSender, FakeRecognizer, FakeTransport } from '../helpers/fakes';

const USER = '972500000001';
const DANA: ContactRef = { name: 'Dana Levi', email: 'dana@example.com' };
const CANCEL_HINT = "(or type 'cancel' to abort)";

// Monday, May 4 2026
const at = (day: number, hour: number, minute = 0): Date => new Date(2026, 4, day, hour, minute);

interface Harness {
  engine: DialogueEngine;
  calendar: FakeCalendar;
  contacts: FakeContacts;
  email: FakeEmailSender;
  transport: FakeTransport;
  store: ConversationStore;
  say(text: string): Promise<string | undefined>;
  advanceMinutes(minutes: number): void;
}

function setup(options: { contacts?: ContactRef[]; classifier?: IntentSource } = {}): Harness {
  let now = at(4, 10);
  const clock = (): Date => new Date(now.getTime());

  const calendar = new FakeCalendar();
  const contacts = new FakeContacts(options.contacts ?? [DANA]);
  const email = new FakeEmailSender();
  const transport = new FakeTransport();
  const store = new ConversationStore(30 * 60 * 1000, () => clock().getTime());

  const engine = new DialogueEngine({
    classifier: options.classifier ?? new IntentClassifier({}, silentLogger),
    extractor: new EntityExtractor({ recognizer: new FakeRecognizer(['Dana', 'Zed']), clock }, silentLogger),
    availability: new AvailabilityResolver(calendar, { clock }, silentLogger),
    calendar,
    contacts,
    email,
    validator: new EmailValidator(),
    store,
    clock,
    timeoutMs: 1000,
    defaultMeetingMinutes: 30,
    logger: silentLogger,
    transport
  });

  return {
    engine,
    calendar,
    contacts,
    email,
    transport,
    store,
    async say(text: string) {
      await engine.handle(USER, text);
      return transport.lastTo(USER);
    },
    advanceMinutes(minutes: number) {
      now = new Date(now.getTime() + minutes * 60 * 1000);
    }
  };
}

describe('DialogueEngine', () => {
  describe('meetings', () => {
    it('books a meeting proposed in a single message', async () => {
      const { say, calendar, store } = setup();

      expect(await say('Schedule a meeting with john@x.com tomorrow at 3pm')).toBe(
        "I'll schedule a 30-minute meeting with john@x.com on Tuesday, May 5, 2026 at 3:00 PM. Is that correct? (yes/no)"
      );
      expect(store.get(USER)?.step).toBe('confirm');

      expect(await say('yes')).toBe(
        '✅ Meeting scheduled successfully!\n\n' +
          'Meeting with john@x.com\n' +
          'Date: Tuesday, May 5, 2026\n' +
          'Time: 3:00 PM - 3:30 PM\n' +
          'Calendar link: https://calendar.test/evt-1'
      );
      expect(calendar.created).toEqual([
        {
          summary: 'Meeting with john@x.com',
          start: at(5, 15),
          end: at(5, 15, 30),
          description: undefined,
          location: undefined,
          attendees: ['john@x.com'],
          notify: true
        }
      ]);
      expect(store.get(USER)).toBeUndefined();
    });

    it('resolves a contact name and invites their address', async () => {
      const { say, calendar } = setup();

      expect(await say('Schedule a meeting with Dana tomorrow at 3pm')).toBe(
        "I'll schedule a 30-minute meeting with Dana (dana@example.com) on Tuesday, May 5, 2026 at 3:00 PM. Is that correct? (yes/no)"
      );
      await say('sure');

      expect(calendar.created[0].summary).toBe('Meeting with Dana Levi');
      expect(calendar.created[0].attendees).toEqual(['dana@example.com']);
    });

    it('collects missing details one question at a time', async () => {
      const { say } = setup();

      expect(await say('schedule a meeting')).toBe(Messages.MEETING_ASK_PERSON);
      expect(await say('john@x.com')).toBe(`What date would you like to meet with john@x.com? ${CANCEL_HINT}`);
      expect(await say('whenever')).toBe(Messages.MEETING_BAD_DATE);
      expect(await say('2026-05-01')).toBe(
        'The date Friday, May 1, 2026 has already passed. Please provide a future date.'
      );
      expect(await say('today')).toBe(`What time on Monday, May 4, 2026? ${CANCEL_HINT}`);
      expect(await say('blue')).toBe(Messages.MEETING_BAD_TIME);
      expect(await say('9am')).toBe(
        'The time 9:00 AM on Monday, May 4, 2026 has already passed. Please provide a future time.'
      );
      expect(await say('2pm')).toBe(
        "I'll schedule a 30-minute meeting with john@x.com on Monday, May 4, 2026 at 2:00 PM. Is that correct? (yes/no)"
      );
    });

    it('keeps the day when a duration comes before it', async () => {
      const { say, calendar } = setup();

      expect(await say('Schedule a meeting with john@x.com for 2 hours tomorrow at 3pm')).toBe(
        "I'll schedule a 120-minute meeting with john@x.com on Tuesday, May 5, 2026 at 3:00 PM. Is that correct? (yes/no)"
      );
      await say('yes');

      expect(calendar.created[0].start).toEqual(at(5, 15));
      expect(calendar.created[0].end).toEqual(at(5, 17));
    });

    it('moves one step per message when a value is repeated', async () => {
      const { say, store } = setup();
      await say('schedule a meeting with john@x.com');

      expect(await say('May 6')).toBe(`What time on Wednesday, May 6, 2026? ${CANCEL_HINT}`);
      expect(await say('May 6')).toBe(Messages.MEETING_BAD_TIME);
      expect(store.get(USER)).toMatchObject({ kind: 'meeting', step: 'time', date: '2026-05-06' });
    });

    it('keeps a conversation alive while it reprompts', async () => {
      const { say, store, advanceMinutes } = setup();
      await say('schedule a meeting with john@x.com');

      advanceMinutes(20);
      expect(await say('whenever')).toBe(Messages.MEETING_BAD_DATE);
      advanceMinutes(20);

      expect(await say('May 6')).toBe(`What time on Wednesday, May 6, 2026? ${CANCEL_HINT}`);
      expect(store.get(USER)?.step).toBe('time');
    });

    it('offers a corrected address and continues once it is accepted', async () => {
      const { say, store } = setup();

      expect(await say('schedule a meeting with john@gmial.com')).toBe(
        "The email 'john@gmial.com' appears to be invalid. \"john@gmial.com\" has a domain that looks like a typo." +
          "\n\nDid you mean 'john@gmail.com'? Reply 'yes' to use it, or send a different address."
      );
      expect(store.get(USER)?.step).toBe('confirm_email');

      expect(await say('maybe')).toBe(Messages.MEETING_ASK_VALID_EMAIL);
      expect(await say('yes')).toBe(`What date would you like to meet with john@gmail.com? ${CANCEL_HINT}`);
    });

    it('lists alternatives on a conflict and books the chosen one', async () => {
      const { say, calendar } = setup();
      calendar.addEvent('Standup', at(5, 15), at(5, 16));

      expect(await say('Schedule a meeting with john@x.com tomorrow at 3pm')).toBe(
        'You already have a meeting at 3:00 PM on Tuesday, May 5, 2026. Here are some free 30-minute slots:\n\n' +
          '1. 8:00 AM - 8:30 AM\n' +
          '2. 8:30 AM - 9:00 AM\n' +
          '3. 9:00 AM - 9:30 AM\n' +
          '4. 9:30 AM - 10:00 AM\n' +
          '5. 10:00 AM - 10:30 AM\n\n' +
          "Please choose a slot by number, or type 'cancel' to abort."
      );
      expect(await say('7')).toBe(Messages.MEETING_INVALID_SELECTION);

      const booked = await say('2');

      expect(booked).toContain('Time: 8:30 AM - 9:00 AM');
      expect(calendar.created[0].start).toEqual(at(5, 8, 30));
      expect(calendar.created[0].end).toEqual(at(5, 9));
    });

    it('asks for another date when the day is fully booked', async () => {
      const { say, calendar, store } = setup();
      calendar.addEvent('Offsite', at(5, 8), at(5, 18));

      expect(await say('Schedule a meeting with john@x.com tomorrow at 3pm')).toBe(
        "I'm sorry, you don't have any free 30-minute slots on Tuesday, May 5, 2026. Would you like to try another date?"
      );
      expect(store.get(USER)?.step).toBe('date');

      expect(await say('May 6')).toBe(
        "I'll schedule a 30-minute meeting with john@x.com on Wednesday, May 6, 2026 at 3:00 PM. Is that correct? (yes/no)"
      );
    });

    it('treats an unreadable calendar as free', async () => {
      const { say, calendar } = setup();
      calendar.failReads = true;

      expect(await say('Schedule a meeting with john@x.com tomorrow at 3pm')).toBe(
        "I'll schedule a 30-minute meeting with john@x.com on Tuesday, May 5, 2026 at 3:00 PM. Is that correct? (yes/no)"
      );
    });

    it('reprompts on an unclear confirmation', async () => {
      const { say, store } = setup();
      await say('Schedule a meeting with john@x.com tomorrow at 3pm');

      expect(await say('maybe')).toBe("I didn't understand your response. Please answer with 'yes' or 'no'.");
      expect(store.get(USER)?.step).toBe('confirm');
    });

    it('ends the conversation when the calendar refuses the event', async () => {
      const { say, calendar, store } = setup();
      calendar.createResult = { success: false, error: 'backend exploded' };
      await say('Schedule a meeting with john@x.com tomorrow at 3pm');

      expect(await say('yes')).toBe(Messages.MEETING_BOOK_FAILED);
      expect(store.get(USER)).toBeUndefined();
    });
  });

  describe('emails', () => {
    it('starts at the recipient step for a bare keyword', async () => {
      const { say, store } = setup();

      expect(await say('email')).toBe(Messages.EMAIL_ASK_RECIPIENT);
      expect(store.get(USER)).toMatchObject({ kind: 'email', step: 'recipient' });
    });

    it('walks through every field for a contact', async () => {
      const { say, email } = setup();

      expect(await say('Send an email to Dana')).toBe(
        `What's the subject of the email to dana@example.com? ${CANCEL_HINT}`
      );
      expect(await say('Lunch plans')).toBe(`What's the content of the email to dana@example.com? ${CANCEL_HINT}`);
      expect(await say('Are you free Thursday?')).toBe(
        "I'll send an email with:\nTo: dana@example.com\nSubject: Lunch plans\nBody: Are you free Thursday?\n\nSend it? (yes/no)"
      );
      expect(await say('yes')).toBe('✅ Email sent successfully to dana@example.com!');
      expect(email.sent).toEqual([{ to: 'dana@example.com', subject: 'Lunch plans', body: 'Are you free Thursday?' }]);
    });

    it('sends straight away when the first message has everything', async () => {
      const { say, email, store } = setup();

      expect(await say('Send an email to bob@example.com subject: Hello body: See you soon')).toBe(
        '✅ Email sent successfully to bob@example.com!'
      );
      expect(email.sent).toEqual([{ to: 'bob@example.com', subject: 'Hello', body: 'See you soon' }]);
      expect(store.get(USER)).toBeUndefined();
    });

    it('adopts a suggested correction for a mistyped address', async () => {
      const { say } = setup();

      expect(await say('Send an email to john@gmial.com')).toBe(
        "The email 'john@gmial.com' appears to be invalid. \"john@gmial.com\" has a domain that looks like a typo." +
          "\n\nDid you mean 'john@gmail.com'? Reply 'yes' to use it, or send a different address."
      );
      expect(await say('yes')).toBe(`What's the subject of the email to john@gmail.com? ${CANCEL_HINT}`);
    });

    it('asks for the recipient again when a name has no address', async () => {
      const { say, store, email } = setup();

      await say('Send an email to Zed');
      await say('Hi');
      await say('Hello');

      expect(await say('yes')).toBe(
        "I couldn't find an email for 'Zed'. Please provide a valid email address or contact name."
      );
      expect(store.get(USER)?.step).toBe('recipient');
      expect(email.sent).toEqual([]);
    });

    it('cancels on anything but a yes at the confirmation', async () => {
      const { say, email, store } = setup();
      await say('Send an email to Dana');
      await say('Lunch plans');
      await say('Are you free Thursday?');

      expect(await say('hmm')).toBe(Messages.EMAIL_CANCELED);
      expect(email.sent).toEqual([]);
      expect(store.get(USER)).toBeUndefined();
    });

    it('reports a failed send without its details', async () => {
      const { say, email, store } = setup();
      email.result = { success: false, error: 'quota exceeded' };

      expect(await say('Send an email to bob@example.com subject: Hello body: See you soon')).toBe(
        Messages.EMAIL_SEND_FAILED
      );
      expect(store.get(USER)).toBeUndefined();
    });
  });

  describe('cancellation', () => {
    const cases: Array<{ kind: string; step: string; setupMessages: string[]; canceled: string }> = [
      { kind: 'email', step: 'recipient', setupMessages: ['send an email'], canceled: Messages.EMAIL_CANCELED },
      { kind: 'email', step: 'subject', setupMessages: ['send an email to Dana'], canceled: Messages.EMAIL_CANCELED },
      { kind: 'email', step: 'body', setupMessages: ['send an email to Dana', 'Hi'], canceled: Messages.EMAIL_CANCELED },
      {
        kind: 'email',
        step: 'confirm',
        setupMessages: ['send an email to Dana', 'Hi', 'Hello'],
        canceled: Messages.EMAIL_CANCELED
      },
      { kind: 'meeting', step: 'person', setupMessages: ['schedule a meeting'], canceled: Messages.MEETING_CANCELED },
      {
        kind: 'meeting',
        step: 'confirm_email',
        setupMessages: ['schedule a meeting with john@gmial.com'],
        canceled: Messages.MEETING_CANCELED
      },
      {
        kind: 'meeting',
        step: 'date',
        setupMessages: ['schedule a meeting with john@x.com'],
        canceled: Messages.MEETING_CANCELED
      },
      {
        kind: 'meeting',
        step: 'time',
        setupMessages: ['schedule a meeting with john@x.com tomorrow'],
        canceled: Messages.MEETING_CANCELED
      },
      {
        kind: 'meeting',
        step: 'confirm',
        setupMessages: ['schedule a meeting with john@x.com tomorrow at 3pm'],
        canceled: Messages.MEETING_CANCELED
      }
    ];

    it.each(cases)('cancels a $kind conversation at the $step step', async ({ kind, step, setupMessages, canceled }) => {
      const { say, store, email, calendar } = setup();
      for (const message of setupMessages) {
        await say(message);
      }
      expect(store.get(USER)?.kind).toBe(kind);
      expect(store.get(USER)?.step).toBe(step);

      expect(await say('  Cancel ')).toBe(canceled);
      expect(store.get(USER)).toBeUndefined();
      expect(email.sent).toEqual([]);
      expect(calendar.created).toEqual([]);
    });
  });

  describe('queries', () => {
    it("lists today's events", async () => {
      const { say, calendar } = setup();
      calendar.addEvent('Design review', at(4, 14), at(4, 15));

      expect(await say("What's on my calendar today?")).toBe('📅 Events for today:\n\n🕒 2:00 PM - Design review');
    });

    it('lists only today when a later day is also named', async () => {
      const { say, calendar } = setup();
      calendar.addEvent('Design review', at(4, 14), at(4, 15));
      calendar.addEvent('Retro', at(8, 11), at(8, 12));

      expect(await say("What's on my calendar today and next friday?")).toBe(
        '📅 Events for today:\n\n🕒 2:00 PM - Design review'
      );
    });

    it('shows the next event when no day is given', async () => {
      const { say, calendar } = setup();
      calendar.addEvent('Design review', at(4, 14), at(4, 15));

      expect(await say('check my calendar')).toBe(
        'Your next event is:\n\n📅 Design review\n📆 Monday, May 4, 2026\n🕒 2:00 PM'
      );
    });

    it('apologises when the calendar cannot be read', async () => {
      const { say, calendar } = setup();
      calendar.failReads = true;

      expect(await say("What's on my calendar today?")).toBe(Messages.CALENDAR_UNAVAILABLE);
    });

    it('lists free slots for a day', async () => {
      const { say, calendar } = setup();
      calendar.addEvent('Workshop', at(5, 9), at(5, 16, 30));

      expect(await say('When am I free tomorrow?')).toBe(
        '📅 Free 30-minute slots for Tuesday, May 5, 2026:\n\n🕒 4:30 PM - 5:00 PM'
      );
    });

    it('shows a single contact in full', async () => {
      const { say } = setup();

      expect(await say('who is Dana')).toBe('📇 Contact information for Dana Levi:\n\n📧 Email: dana@example.com');
    });

    it('lists several matching contacts', async () => {
      const { say } = setup({ contacts: [DANA, { name: 'Dana Cohen', phone: '555-0100' }] });

      expect(await say('who is Dana')).toBe(
        "Found 2 contacts for 'Dana':\n\n1. Dana Levi (dana@example.com)\n2. Dana Cohen - 555-0100"
      );
    });

    it('says when no contact matches', async () => {
      const { say } = setup();

      expect(await say('who is Zed')).toBe("No contacts found for 'Zed'.");
    });

    it('explains its capabilities for anything else', async () => {
      const { say } = setup();

      expect(await say('hello there')).toBe(Messages.CAPABILITIES);
    });
  });

  describe('conversation handling', () => {
    it('gives an open conversation the next message, whatever it says', async () => {
      const { say, store } = setup();
      await say('send an email to Dana');

      expect(await say("what's on my calendar")).toBe(
        `What's the content of the email to dana@example.com? ${CANCEL_HINT}`
      );
      expect(store.get(USER)?.step).toBe('body');
    });

    it('forgets a conversation left idle too long', async () => {
      const { say, advanceMinutes } = setup();
      await say('send an email');

      advanceMinutes(31);

      expect(await say('hello there')).toBe(Messages.CAPABILITIES);
    });

    it('answers messages from one sender in arrival order', async () => {
      const { engine, transport } = setup();

      await Promise.all([engine.handle(USER, 'send an email'), engine.handle(USER, 'cancel')]);

      expect(transport.delivered.map((message) => message.text)).toEqual([
        Messages.EMAIL_ASK_RECIPIENT,
        Messages.EMAIL_CANCELED
      ]);
    });

    it('apologises and drops state when handling fails', async () => {
      const failing: IntentSource = {
        classify: async () => {
          throw new Error('classifier exploded');
        }
      };
      const { say, store } = setup({ classifier: failing });

      expect(await say('anything')).toBe(Messages.GENERIC_APOLOGY);
      expect(store.get(USER)).toBeUndefined();
    });

    it('survives a transport that fails to deliver', async () => {
      const { engine, transport } = setup();
      transport.deliver = async () => {
        throw new Error('network down');
      };

      await expect(engine.handle(USER, 'hello there')).resolves.toBeUndefined();
    });
  });
});
