import { Intent } from '../../core/nlp/types';

/**
 * Pattern tables for the keyword, rule-based and entity stages.
 * Order matters everywhere: the first match wins.
 */

export const QUICK_CALENDAR_PATTERNS: readonly RegExp[] = [
  /what'?s\s+on\s+(?:my\s+)?calendar/i,
  /what\s+is\s+on\s+(?:my\s+)?calendar/i,
  /show\s+(?:my\s+)?calendar/i,
  /check\s+(?:my\s+)?calendar/i
];

export const QUICK_KEYWORDS: ReadonlyArray<readonly [string, Intent]> = [
  ['email', Intent.SEND_EMAIL],
  ['meeting', Intent.SCHEDULE_MEETING],
  ['calendar', Intent.CHECK_CALENDAR],
  ['contact', Intent.FIND_CONTACT],
  ['free time', Intent.CHECK_FREE_SLOTS],
  ['availability', Intent.CHECK_FREE_SLOTS]
];

export const RULE_PATTERN_GROUPS: ReadonlyArray<{ intent: Intent; patterns: readonly RegExp[] }> = [
  {
    intent: Intent.CHECK_CALENDAR,
    patterns: [
      /what'?s\s+on\s+(?:my\s+)?calendar/,
      /what\s+is\s+on\s+(?:my\s+)?calendar/,
      /check\s+(?:my\s+)?calendar/,
      /show\s+(?:my\s+)?calendar/,
      /what\s+do\s+i\s+have\s+(?:on|for|scheduled)/,
      /calendar\s+for\s+today/,
      /today'?s\s+(?:events|calendar|schedule)/,
      /my\s+events/,
      /my\s+schedule/,
      /my\s+agenda/,
      /what\s+events/,
      /any\s+events/,
      /appointments\s+(?:today|tomorrow|this week)/,
      /meetings\s+(?:today|tomorrow|this week)/
    ]
  },
  {
    intent: Intent.SEND_EMAIL,
    patterns: [
      /send\s+(?:an\s+)?email/,
      /write\s+(?:an\s+)?email/,
      /email\s+to/,
      /compose\s+(?:an\s+)?email/,
      /send\s+(?:a\s+)?message\s+to/
    ]
  },
  {
    intent: Intent.SCHEDULE_MEETING,
    patterns: [
      /schedule\s+(?:a\s+)?meeting/,
      /set\s+up\s+(?:a\s+)?meeting/,
      /book\s+(?:a\s+)?meeting/,
      /arrange\s+(?:a\s+)?meeting/,
      /plan\s+(?:a\s+)?meeting/,
      /set\s+(?:an?\s+)?appointment/
    ]
  },
  {
    intent: Intent.FIND_CONTACT,
    patterns: [
      /find\s+contact/,
      /find\s+(?:the\s+)?email\s+(?:address\s+)?(?:for|of)/,
      /get\s+contact\s+(?:info|information)/,
      /look\s+up\s+contact/,
      /search\s+(?:for\s+)?contact/,
      /who\s+is/,
      /contact\s+information/,
      /contact\s+details/
    ]
  },
  {
    intent: Intent.CHECK_FREE_SLOTS,
    patterns: [
      /find\s+(?:a\s+)?free\s+(?:slot|time)/,
      /check\s+(?:my\s+)?availability/,
      /when\s+am\s+i\s+free/,
      /available\s+(?:slot|time)/,
      /open\s+(?:slot|time)/,
      /free\s+time/
    ]
  }
];

export const LOOSE_KEYWORDS: ReadonlyArray<readonly [string, Intent]> = [
  ['email', Intent.SEND_EMAIL],
  ['mail', Intent.SEND_EMAIL],
  ['message', Intent.SEND_EMAIL],
  ['meeting', Intent.SCHEDULE_MEETING],
  ['schedule', Intent.SCHEDULE_MEETING],
  ['appointment', Intent.SCHEDULE_MEETING],
  ['calendar', Intent.CHECK_CALENDAR],
  ['events', Intent.CHECK_CALENDAR],
  ['agenda', Intent.CHECK_CALENDAR],
  ['contact', Intent.FIND_CONTACT],
  ['find', Intent.FIND_CONTACT],
  ['who is', Intent.FIND_CONTACT],
  ['availability', Intent.CHECK_FREE_SLOTS],
  ['free time', Intent.CHECK_FREE_SLOTS],
  ['when am i free', Intent.CHECK_FREE_SLOTS]
];

export const ZERO_SHOT_LABELS: ReadonlyArray<readonly [string, Intent]> = [
  ['sending an email', Intent.SEND_EMAIL],
  ['scheduling a meeting', Intent.SCHEDULE_MEETING],
  ['checking calendar', Intent.CHECK_CALENDAR],
  ['finding contact information', Intent.FIND_CONTACT],
  ['checking availability', Intent.CHECK_FREE_SLOTS]
];

// Entity patterns

export const DURATION_PATTERN = /(\d+)\s*(hour|minute|min)s?\b/i;

// "for 2 hours", "30 min": removed before date parsing, chrono reads them as offsets from now
export const DURATION_PHRASE_PATTERN = /\b(?:for\s+)?\d+\s*(?:hour|minute|min)s?\b/gi;

export const EMAIL_ADDRESS_PATTERN = /[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}/g;

// A field value is either quoted, or runs until the next field keyword,
// a date/time marker, punctuation or the end of the message.
const QUOTED = `"([^"]+)"|'([^']+)'`;
const FIELD_KEYWORD = `(?:subject|title|body|content|message)\\s*(?:is|:)`;
// "subject:", "body is": replaced by a sentence break so NER does not join them to a name
export const FIELD_LABEL_PATTERN = new RegExp(`\\b${FIELD_KEYWORD}`, 'gi');
const PHRASE_STOP = `(?=\\s+${FIELD_KEYWORD}|\\s+(?:today|tomorrow|tonight|on|at|next|this|with)\\b|[.;!?]|$)`;
const PLACE_STOP = `(?=\\s+(?:today|tomorrow|tonight|on|at|in|next|this|with|for|about|from|to)\\b|[.,;!?]|$)`;

function phrasePattern(prefix: string): RegExp {
  return new RegExp(`${prefix}\\s*(?:${QUOTED}|(.+?)${PHRASE_STOP})`, 'i');
}

function placePattern(prefix: string): RegExp {
  return new RegExp(`${prefix}\\s*(?:the\\s+)?(?:${QUOTED}|([A-Za-z0-9][\\w ]*?)${PLACE_STOP})`, 'gi');
}

/**
 * Captured value of a phrase/place pattern: group 1 or 2 when quoted, 3 otherwise.
 */
export function capturedValue(match: RegExpMatchArray): string | undefined {
  const value = match[1] ?? match[2] ?? match[3];
  return value?.trim() || undefined;
}

export const EMAIL_SUBJECT_PATTERNS: readonly RegExp[] = [
  phrasePattern('\\bsubject\\s*(?:is|:)'),
  phrasePattern('\\babout\\s'),
  phrasePattern('\\bregarding\\s')
];

export const EMAIL_BODY_PATTERNS: readonly RegExp[] = [
  new RegExp(`\\b(?:body|content|message)\\s*(?:is|:)\\s*(?:${QUOTED}|(.+?)(?=\\s+(?:subject|title)\\s*(?:is|:)|$))`, 'i')
];

export const MEETING_LOCATION_PATTERNS: readonly RegExp[] = [
  placePattern('\\b(?:at|in)\\s'),
  placePattern('\\blocation\\s*(?:is|:)'),
  placePattern('\\bplace\\s*(?:is|:)')
];

export const MEETING_SUBJECT_PATTERNS: readonly RegExp[] = [
  phrasePattern('\\babout\\s'),
  phrasePattern('\\bregarding\\s'),
  phrasePattern('\\btitle\\s*(?:is|:)'),
  phrasePattern('\\bsubject\\s*(?:is|:)')
];

export const TIME_OF_DAY_WORDS: ReadonlySet<string> = new Set([
  'today',
  'tomorrow',
  'morning',
  'afternoon',
  'evening',
  'night'
]);

export const CONTACT_NAME_TRIGGERS: ReadonlySet<string> = new Set(['for', 'about', 'contact', 'information']);
