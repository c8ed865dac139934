import { calendar_v3 } from 'googleapis';
import { calendar as defaultCalendar } from '../../config/google';
import {
  CalendarEvent,
  CreateEventRequest,
  CreateEventResult,
  ICalendarGateway
} from '../../core/interfaces/ICalendarGateway';
import { errorMessage } from '../../utils/helpers';
import { Logger, logger as defaultLogger } from '../../utils/logger';

export interface CalendarServiceOptions {
  calendarId: string;
  timeZone: string;
}

/**
 * Google Calendar v3 gateway.
 */
export class CalendarService implements ICalendarGateway {
  constructor(
    private readonly options: CalendarServiceOptions,
    private readonly client: calendar_v3.Calendar = defaultCalendar,
    private readonly logger: Logger = defaultLogger
  ) {}

  async createEvent(request: CreateEventRequest): Promise<CreateEventResult> {
    try {
      this.logger.info(`📅 Creating calendar event: "${request.summary}"`);

      const attendees = request.attendees ?? [];
      if (attendees.length > 0) {
        this.logger.info(`📧 Adding ${attendees.length} attendees: ${attendees.join(', ')}`);
      }

      const response = await this.client.events.insert({
        calendarId: this.options.calendarId,
        sendUpdates: request.notify && attendees.length > 0 ? 'all' : 'none',
        requestBody: {
          summary: request.summary,
          description: request.description,
          location: request.location,
          start: { dateTime: request.start.toISOString(), timeZone: this.options.timeZone },
          end: { dateTime: request.end.toISOString(), timeZone: this.options.timeZone },
          attendees: attendees.map((email) => ({ email }))
        }
      });

      this.logger.info(`✅ Event created: "${request.summary}"`);
      return {
        success: true,
        eventId: response.data.id ?? undefined,
        link: response.data.htmlLink ?? undefined
      };
    } catch (error) {
      this.logger.error('Error creating calendar event:', error);
      return { success: false, error: errorMessage(error) };
    }
  }

  async listEvents(start: Date, end: Date, maxResults: number): Promise<CalendarEvent[]> {
    this.logger.info(`📅 Getting calendar events from ${start.toISOString()} to ${end.toISOString()}`);

    const response = await this.client.events.list({
      calendarId: this.options.calendarId,
      timeMin: start.toISOString(),
      timeMax: end.toISOString(),
      maxResults,
      singleEvents: true,
      orderBy: 'startTime'
    });

    const events = (response.data.items ?? []).map(toCalendarEvent).filter((event): event is CalendarEvent => event !== null);
    this.logger.info(`✅ Retrieved ${events.length} calendar events`);
    return events;
  }

  async nextEvent(): Promise<CalendarEvent | null> {
    const response = await this.client.events.list({
      calendarId: this.options.calendarId,
      timeMin: new Date().toISOString(),
      maxResults: 1,
      singleEvents: true,
      orderBy: 'startTime'
    });

    const [first] = response.data.items ?? [];
    return first ? toCalendarEvent(first) : null;
  }
}

/**
 * Events without a start or end (cancelled instances) are skipped.
 */
function toCalendarEvent(event: calendar_v3.Schema$Event): CalendarEvent | null {
  const start = event.start?.dateTime ?? event.start?.date;
  const end = event.end?.dateTime ?? event.end?.date;
  if (!start || !end) return null;

  return {
    id: event.id ?? '',
    summary: event.summary ?? 'Untitled event',
    start,
    end,
    description: event.description ?? '',
    location: event.location ?? '',
    link: event.htmlLink ?? ''
  };
}
