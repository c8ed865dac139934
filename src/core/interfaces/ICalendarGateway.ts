export interface CalendarEvent {
  id: string;
  summary: string;
  start: string; // ISO date-time, or yyyy-MM-dd for all-day events
  end: string;
  description: string;
  location: string;
  link: string;
}

export interface CreateEventRequest {
  summary: string;
  start: Date;
  end: Date;
  description?: string;
  location?: string;
  attendees?: string[];
  notify: boolean;
}

export interface CreateEventResult {
  success: boolean;
  eventId?: string;
  link?: string;
  error?: string;
}

/**
 * Calendar backend. Read methods reject on backend failure; callers
 * decide whether that fails open or closed.
 */
export interface ICalendarGateway {
  createEvent(request: CreateEventRequest): Promise<CreateEventResult>;
  listEvents(start: Date, end: Date, maxResults: number): Promise<CalendarEvent[]>;
  nextEvent(): Promise<CalendarEvent | null>;
}
