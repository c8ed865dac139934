/**
 * In-process stand-ins for the external collaborators.
 */

import {
  CalendarEvent,
  CreateEventRequest,
  CreateEventResult,
  ICalendarGateway
} from '../../src/core/interfaces/ICalendarGateway';
import { ContactRef, IContactDirectory, LookupResult } from '../../src/core/interfaces/IContactDirectory';
import { IEmailSender, SendEmailResult } from '../../src/core/interfaces/IEmailService';
import { IMessageTransport } from '../../src/core/interfaces/IMessageTransport';
import { NamedEntity, NamedEntityRecognizer } from '../../src/services/nlp/NamedEntityRecognizer';

export class FakeCalendar implements ICalendarGateway {
  events: CalendarEvent[] = [];
  created: CreateEventRequest[] = [];
  failReads = false;
  createResult: CreateEventResult = { success: true, eventId: 'evt-1', link: 'https://calendar.test/evt-1' };

  addEvent(summary: string, start: Date, end: Date): void {
    this.events.push({
      id: `evt-${this.events.length + 1}`,
      summary,
      start: start.toISOString(),
      end: end.toISOString(),
      description: '',
      location: '',
      link: ''
    });
  }

  async createEvent(request: CreateEventRequest): Promise<CreateEventResult> {
    this.created.push(request);
    return this.createResult;
  }

  async listEvents(start: Date, end: Date, maxResults: number): Promise<CalendarEvent[]> {
    if (this.failReads) throw new Error('calendar unavailable');
    return this.events
      .filter((event) => new Date(event.start) < end && new Date(event.end) > start)
      .slice(0, maxResults);
  }

  async nextEvent(): Promise<CalendarEvent | null> {
    if (this.failReads) throw new Error('calendar unavailable');
    return this.events[0] ?? null;
  }
}

export class FakeContacts implements IContactDirectory {
  constructor(public contacts: ContactRef[] = []) {}

  async findByName(name: string): Promise<LookupResult<ContactRef>> {
    const match = this.contacts.find((contact) => contact.name.toLowerCase().includes(name.toLowerCase()) && contact.email);
    return match ? { status: 'found', value: match } : { status: 'not_found' };
  }

  async search(name: string): Promise<ContactRef[]> {
    return this.contacts.filter((contact) => contact.name.toLowerCase().includes(name.toLowerCase()));
  }
}

export class FakeEmailSender implements IEmailSender {
  sent: Array<{ to: string; subject: string; body: string }> = [];
  result: SendEmailResult = { success: true, messageId: 'msg-1' };

  async send(to: string, subject: string, body: string): Promise<SendEmailResult> {
    this.sent.push({ to, subject, body });
    return this.result;
  }
}

export class FakeTransport implements IMessageTransport {
  delivered: Array<{ recipientId: string; text: string }> = [];

  async deliver(recipientId: string, text: string): Promise<void> {
    this.delivered.push({ recipientId, text });
  }

  lastTo(recipientId: string): string | undefined {
    return this.delivered.filter((message) => message.recipientId === recipientId).at(-1)?.text;
  }
}

/**
 * Recognises only the names it is given, as whole words.
 */
export class FakeRecognizer implements NamedEntityRecognizer {
  constructor(
    private readonly people: string[] = [],
    private readonly places: string[] = []
  ) {}

  recognize(text: string): NamedEntity[] {
    const found = (values: string[], label: NamedEntity['label']): Array<NamedEntity & { index: number }> =>
      values
        .map((value) => ({ text: value, label, index: text.indexOf(value) }))
        .filter((entity) => entity.index >= 0);

    return [...found(this.people, 'person'), ...found(this.places, 'location')]
      .sort((a, b) => a.index - b.index)
      .map(({ text: value, label }) => ({ text: value, label }));
  }
}

export function fixedClock(date: Date): () => Date {
  return () => new Date(date.getTime());
}
