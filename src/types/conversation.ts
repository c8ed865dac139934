// src/types/conversation.ts

export interface TimeSlot {
  start: Date;
  end: Date; // always after start
}

export type EmailStep = 'recipient' | 'subject' | 'body' | 'confirm';

export type MeetingStep = 'person' | 'confirm_email' | 'date' | 'time' | 'confirm';

export interface EmailConversation {
  kind: 'email';
  step: EmailStep;
  recipient?: string;
  subject?: string;
  body?: string;
  suggestedRecipient?: string;
}

export interface MeetingConversation {
  kind: 'meeting';
  step: MeetingStep;
  person?: string;
  suggestedEmail?: string;
  date?: string; // yyyy-MM-dd
  time?: string; // HH:mm
  endTime?: string; // HH:mm
  duration: number; // minutes
  location?: string;
  description?: string;
  alternativeSlots: TimeSlot[];
}

/**
 * Open multi-step transaction for one sender.
 */
export type ConversationState = EmailConversation | MeetingConversation;
