import { CalendarEvent } from '../../core/interfaces/ICalendarGateway';
import { ContactRef } from '../../core/interfaces/IContactDirectory';
import { TimeSlot } from '../../types/conversation';
import { formatDate, formatTime, TimeParser } from '../../utils/time';
import { formatSlots } from '../calendar/AvailabilityResolver';

/**
 * User-facing replies. Nothing in here ever carries error details.
 */

const CANCEL_HINT = "(or type 'cancel' to abort)";

export const Messages = {
  GENERIC_APOLOGY:
    "I'm sorry, I encountered an error while processing your request. Please try again or rephrase your request.",
  CAPABILITIES:
    "I'm not sure what you're asking for. I can help you with:\n" +
    '- Sending emails\n' +
    '- Scheduling meetings\n' +
    '- Checking your calendar\n' +
    '- Finding contacts\n' +
    '- Checking your availability\n\n' +
    'Please try phrasing your request differently.',
  TEXT_ONLY: 'Sorry, I can only read text messages for now.',
  CALENDAR_UNAVAILABLE: "I couldn't reach your calendar right now. Please try again later.",

  EMAIL_CANCELED: 'Email canceled.',
  EMAIL_ASK_RECIPIENT: `Who would you like to send an email to? (email address or contact name) ${CANCEL_HINT}`,
  EMAIL_SEND_FAILED: "Sorry, I couldn't send the email. Please try again later.",

  MEETING_CANCELED: 'Meeting scheduling canceled.',
  MEETING_ASK_PERSON: `Who would you like to schedule a meeting with? (name or email address) ${CANCEL_HINT}`,
  MEETING_ASK_DATE: `What date? ${CANCEL_HINT}`,
  MEETING_BAD_DATE:
    "I couldn't understand that date. Please provide a specific date like 'tomorrow', 'next Friday', or 'May 15th'.",
  MEETING_BAD_TIME: "I couldn't understand that time. Please provide a specific time like '3pm' or '15:30'.",
  MEETING_ASK_VALID_EMAIL: "Please provide a valid email address or type 'cancel' to abort.",
  MEETING_INVALID_SELECTION: "Invalid selection. Please choose a number from the list or type 'cancel' to abort.",
  MEETING_BOOK_FAILED: "Sorry, I couldn't schedule the meeting. Please try again later.",

  CONTACT_ASK_NAME: 'Who would you like to find contact information for?',
  NO_UPCOMING_EVENTS: "You don't have any upcoming events on your calendar."
} as const;

export function emailAskSubject(recipient: string): string {
  return `What's the subject of the email to ${recipient}? ${CANCEL_HINT}`;
}

export function emailAskBody(recipient: string): string {
  return `What's the content of the email to ${recipient}? ${CANCEL_HINT}`;
}

export function emailConfirm(recipient: string, subject: string, body: string): string {
  return `I'll send an email with:\nTo: ${recipient}\nSubject: ${subject}\nBody: ${body}\n\nSend it? (yes/no)`;
}

export function emailSent(recipient: string): string {
  return `✅ Email sent successfully to ${recipient}!`;
}

export function emailRecipientNotFound(recipient: string): string {
  return `I couldn't find an email for '${recipient}'. Please provide a valid email address or contact name.`;
}

export function invalidAddress(address: string, problem: string | undefined, suggestion: string | undefined, retry = false): string {
  const lead = `The email '${address}' ${retry ? 'still appears' : 'appears'} to be invalid.`;
  const detail = problem ? ` ${problem}` : '';
  const next = suggestion
    ? `\n\nDid you mean '${suggestion}'? Reply 'yes' to use it, or send a different address.`
    : '\n\nPlease provide a valid email address.';
  return `${lead}${detail}${next}`;
}

export function meetingAskDate(person: string): string {
  return `What date would you like to meet with ${person}? ${CANCEL_HINT}`;
}

export function meetingAskTime(date: string): string {
  return `What time on ${formatDate(date)}? ${CANCEL_HINT}`;
}

export function meetingDatePassed(date: string): string {
  return `The date ${formatDate(date)} has already passed. Please provide a future date.`;
}

export function meetingTimePassed(date: string, time: string): string {
  return `The time ${formatTime(time)} on ${formatDate(date)} has already passed. Please provide a future time.`;
}

export function meetingConfirm(duration: number, person: string, email: string | undefined, date: string, time: string): string {
  const contactInfo = email ? ` (${email})` : '';
  return (
    `I'll schedule a ${duration}-minute meeting with ${person}${contactInfo} ` +
    `on ${formatDate(date)} at ${formatTime(time)}. Is that correct? (yes/no)`
  );
}

export function meetingAlternatives(time: string, date: string, duration: number, slots: readonly TimeSlot[]): string {
  const numbered = formatSlots(slots).map((slot, index) => `${index + 1}. ${slot}`);
  return (
    `You already have a meeting at ${formatTime(time)} on ${formatDate(date)}. ` +
    `Here are some free ${duration}-minute slots:\n\n` +
    numbered.join('\n') +
    "\n\nPlease choose a slot by number, or type 'cancel' to abort."
  );
}

export function meetingNoFreeSlots(duration: number, date: string): string {
  return `I'm sorry, you don't have any free ${duration}-minute slots on ${formatDate(date)}. Would you like to try another date?`;
}

export function meetingNotUnderstood(hasAlternatives: boolean): string {
  return hasAlternatives
    ? "I didn't understand your response. Please answer with 'yes', 'no', or the number of an alternative slot."
    : "I didn't understand your response. Please answer with 'yes' or 'no'.";
}

export function meetingInvalidAttendee(address: string, problem: string | undefined, suggestion: string | undefined): string {
  const detail = problem ? ` ${problem}` : '';
  const hint = suggestion ? `\n\nDid you mean '${suggestion}'? Please try again with the correct email.` : '';
  return `Cannot schedule meeting: invalid email '${address}'.${detail}${hint}`;
}

export function meetingBooked(person: string, start: Date, end: Date, link: string | undefined): string {
  return (
    '✅ Meeting scheduled successfully!\n\n' +
    `Meeting with ${person}\n` +
    `Date: ${formatDate(start)}\n` +
    `Time: ${formatTime(start)} - ${formatTime(end)}\n` +
    `Calendar link: ${link ?? 'Not available'}`
  );
}

function eventTime(value: string): string {
  return TimeParser.isIsoDate(value) ? 'All day' : formatTime(TimeParser.parseEventBoundary(value));
}

export function calendarDayLabel(date: string, today: string): string {
  return date === today ? 'today' : formatDate(date);
}

export function calendarEvents(label: string, events: readonly CalendarEvent[]): string {
  if (events.length === 0) {
    return `You don't have any events scheduled for ${label}.`;
  }
  const lines = events.map((event) => `🕒 ${eventTime(event.start)} - ${event.summary}`);
  return `📅 Events for ${label}:\n\n${lines.join('\n')}`;
}

export function nextEvent(event: CalendarEvent): string {
  const start = TimeParser.parseEventBoundary(event.start);
  const lines = [
    'Your next event is:',
    '',
    `📅 ${event.summary}`,
    `📆 ${formatDate(start)}`,
    `🕒 ${eventTime(event.start)}`
  ];
  if (event.location) lines.push(`📍 ${event.location}`);
  if (event.description) lines.push(`📝 ${event.description}`);
  return lines.join('\n');
}

export function contactDetails(contact: ContactRef): string {
  const lines = [`📇 Contact information for ${contact.name}:`, ''];
  if (contact.email) lines.push(`📧 Email: ${contact.email}`);
  if (contact.phone) lines.push(`📱 Phone: ${contact.phone}`);
  if (contact.organization) lines.push(`🏢 Organization: ${contact.organization}`);
  if (contact.address) lines.push(`📍 Address: ${contact.address}`);
  return lines.join('\n');
}

export function contactList(query: string, contacts: readonly ContactRef[]): string {
  const lines = contacts.map((contact, index) => {
    const email = contact.email ? ` (${contact.email})` : '';
    const phone = contact.phone ? ` - ${contact.phone}` : '';
    return `${index + 1}. ${contact.name}${email}${phone}`;
  });
  return `Found ${contacts.length} contacts for '${query}':\n\n${lines.join('\n')}`;
}

export function noContacts(query: string): string {
  return `No contacts found for '${query}'.`;
}

export function freeSlots(date: string, minutes: number, slots: readonly TimeSlot[]): string {
  if (slots.length === 0) {
    return `You don't have any free ${minutes}-minute slots on ${formatDate(date)}.`;
  }
  const lines = formatSlots(slots).map((slot) => `🕒 ${slot}`);
  return `📅 Free ${minutes}-minute slots for ${formatDate(date)}:\n\n${lines.join('\n')}`;
}
