/**
 * NLP types for intent classification and entity extraction
 */

export enum Intent {
  SEND_EMAIL = 'send_email',
  SCHEDULE_MEETING = 'schedule_meeting',
  CHECK_CALENDAR = 'check_calendar',
  FIND_CONTACT = 'find_contact',
  CHECK_FREE_SLOTS = 'check_free_slots',
  UNKNOWN = 'unknown'
}

export const ALL_INTENTS: readonly Intent[] = Object.values(Intent);

export function isIntent(value: unknown): value is Intent {
  return typeof value === 'string' && ALL_INTENTS.some((intent) => intent === value);
}

export interface IntentResult {
  intent: Intent;
  confidence: number; // 0-1
}

/**
 * Structured slot values found in a message.
 * A missing key means "not found"; extractors never emit empty arrays or strings.
 * `date` is `yyyy-MM-dd` and `time` is `HH:mm` once normalised; a value the
 * parsers could not read is kept as the provider's original text.
 */
export interface EntityBag {
  person?: string[];
  date?: string;
  time?: string;
  duration?: number; // minutes
  email?: string[];
  subject?: string;
  body?: string;
  location?: string;
}

/**
 * One stage of the intent cascade. Returns null to pass control to the next stage.
 */
export interface IntentStrategy {
  readonly name: string;
  tryClassify(message: string): Promise<IntentResult | null>;
}

/**
 * One stage of the entity cascade. Returns null to pass control to the next stage.
 */
export interface EntityStrategy {
  readonly name: string;
  tryExtract(message: string, intent?: Intent): Promise<EntityBag | null>;
}

/**
 * Drop empty values so that absence is the only way to say "not found".
 */
export function compactEntities(bag: EntityBag): EntityBag {
  const result: EntityBag = {};
  const person = bag.person?.map((name) => name.trim()).filter((name) => name.length > 0);
  if (person && person.length > 0) result.person = person;
  const email = bag.email?.map((address) => address.trim()).filter((address) => address.length > 0);
  if (email && email.length > 0) result.email = email;
  if (bag.date?.trim()) result.date = bag.date.trim();
  if (bag.time?.trim()) result.time = bag.time.trim();
  if (typeof bag.duration === 'number' && Number.isFinite(bag.duration) && bag.duration > 0) {
    result.duration = bag.duration;
  }
  if (bag.subject?.trim()) result.subject = bag.subject.trim();
  if (bag.body?.trim()) result.body = bag.body.trim();
  if (bag.location?.trim()) result.location = bag.location.trim();
  return result;
}
