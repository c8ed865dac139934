import { ILanguageProvider } from '../../core/interfaces/ILanguageProvider';
import { compactEntities, EntityBag, EntityStrategy, Intent } from '../../core/nlp/types';
import { errorMessage, withTimeout } from '../../utils/helpers';
import { Logger, logger as defaultLogger } from '../../utils/logger';
import { TimeParser } from '../../utils/time';
import { CompromiseRecognizer, NamedEntityRecognizer } from './NamedEntityRecognizer';
import {
  capturedValue,
  CONTACT_NAME_TRIGGERS,
  DURATION_PATTERN,
  DURATION_PHRASE_PATTERN,
  EMAIL_ADDRESS_PATTERN,
  EMAIL_BODY_PATTERNS,
  EMAIL_SUBJECT_PATTERNS,
  FIELD_LABEL_PATTERN,
  MEETING_LOCATION_PATTERNS,
  MEETING_SUBJECT_PATTERNS,
  TIME_OF_DAY_WORDS
} from './patterns';

export type Clock = () => Date;

const systemClock: Clock = () => new Date();

function firstMatch(message: string, patterns: readonly RegExp[]): string | undefined {
  for (const pattern of patterns) {
    const match = message.match(pattern);
    if (match) {
      const value = capturedValue(match);
      if (value) return value;
    }
  }
  return undefined;
}

/**
 * Remote provider bag with free-text dates and times normalised.
 * Values neither parser can read are kept as the provider sent them.
 */
export class RemoteEntityStrategy implements EntityStrategy {
  readonly name = 'remote';

  constructor(
    private readonly provider: ILanguageProvider,
    private readonly clock: Clock = systemClock
  ) {}

  async tryExtract(message: string, intent?: Intent): Promise<EntityBag | null> {
    const bag = await this.provider.extractEntities(message, intent);
    if (!bag) return null;

    const now = this.clock();
    const normalized: EntityBag = { ...bag };
    if (bag.date) normalized.date = TimeParser.normalizeDate(bag.date, now) ?? bag.date;
    if (bag.time) normalized.time = TimeParser.normalizeTime(bag.time, now) ?? bag.time;
    return compactEntities(normalized);
  }
}

/**
 * Pattern and parser based extraction. Always answers, possibly with an empty bag.
 */
export class LocalEntityStrategy implements EntityStrategy {
  readonly name = 'local';

  constructor(
    private readonly recognizer: NamedEntityRecognizer = new CompromiseRecognizer(),
    private readonly clock: Clock = systemClock
  ) {}

  async tryExtract(message: string, intent?: Intent): Promise<EntityBag> {
    const bag: EntityBag = {
      ...this.extractNamedEntities(message),
      ...this.extractDateTime(message),
      ...this.extractEmails(message),
      ...this.extractIntentFields(message, intent)
    };

    if (intent === Intent.FIND_CONTACT && !bag.person?.length) {
      const name = this.findNameAfterTrigger(message);
      if (name) bag.person = [name];
    }

    return compactEntities(bag);
  }

  private extractNamedEntities(message: string): EntityBag {
    const entities = this.recognizer.recognize(message.replace(FIELD_LABEL_PATTERN, '.'));
    const person = entities.filter((entity) => entity.label === 'person').map((entity) => entity.text);
    const location =
      entities.find((entity) => entity.label === 'location')?.text ??
      entities.find((entity) => entity.label === 'organization')?.text;
    return { person, location };
  }

  private extractDateTime(message: string): EntityBag {
    const result: EntityBag = {};

    const duration = message.match(DURATION_PATTERN);
    if (duration) {
      const amount = Number.parseInt(duration[1], 10);
      result.duration = duration[2].toLowerCase() === 'hour' ? amount * 60 : amount;
    }

    const now = this.clock();
    const text = message.replace(DURATION_PHRASE_PATTERN, ' ');
    const parsed = TimeParser.parseNatural(text, now);
    if (parsed) {
      result.date = parsed.date;
      const [explicitTime] = TimeParser.findExplicitTimes(text);
      result.time = explicitTime ? (TimeParser.normalizeTime(explicitTime, now) ?? parsed.time) : parsed.time;
    }

    return result;
  }

  private extractEmails(message: string): EntityBag {
    return { email: Array.from(message.matchAll(EMAIL_ADDRESS_PATTERN), (match) => match[0]) };
  }

  private extractIntentFields(message: string, intent?: Intent): EntityBag {
    switch (intent) {
      case Intent.SEND_EMAIL:
        return {
          subject: firstMatch(message, EMAIL_SUBJECT_PATTERNS),
          body: firstMatch(message, EMAIL_BODY_PATTERNS)
        };
      case Intent.SCHEDULE_MEETING: {
        const fields: EntityBag = { subject: firstMatch(message, MEETING_SUBJECT_PATTERNS) };
        const location = this.findLocation(message);
        if (location) fields.location = location;
        return fields;
      }
      default:
        return {};
    }
  }

  private findLocation(message: string): string | undefined {
    for (const pattern of MEETING_LOCATION_PATTERNS) {
      for (const match of message.matchAll(pattern)) {
        const value = capturedValue(match);
        if (value && this.isPlace(value)) return value;
      }
    }
    return undefined;
  }

  private isPlace(value: string): boolean {
    const lower = value.toLowerCase();
    if (TIME_OF_DAY_WORDS.has(lower)) return false;
    if (/^\d+$/.test(lower)) return false;
    // "at 3pm", "at 14:30"
    const [time] = TimeParser.findExplicitTimes(value);
    return time !== value;
  }

  /**
   * "find contact information for Dana Levi" -> "Dana Levi"
   */
  private findNameAfterTrigger(message: string): string | undefined {
    const tokens = message.split(/\s+/).map((token) => token.replace(/[^\p{L}\p{N}'-]/gu, ''));

    for (let i = 0; i < tokens.length; i++) {
      if (!CONTACT_NAME_TRIGGERS.has(tokens[i].toLowerCase())) continue;

      const run: string[] = [];
      for (let j = i + 1; j < tokens.length && /^\p{Lu}/u.test(tokens[j]); j++) {
        run.push(tokens[j]);
      }
      if (run.length > 0) return run.join(' ');
    }
    return undefined;
  }
}

export interface EntityExtractorOptions {
  provider?: ILanguageProvider | null;
  recognizer?: NamedEntityRecognizer;
  clock?: Clock;
  timeoutMs?: number;
}

export class EntityExtractor {
  private readonly strategies: EntityStrategy[];
  private readonly timeoutMs: number;

  constructor(options: EntityExtractorOptions = {}, private readonly logger: Logger = defaultLogger) {
    this.timeoutMs = options.timeoutMs ?? 10000;
    this.strategies = [
      ...(options.provider ? [new RemoteEntityStrategy(options.provider, options.clock)] : []),
      new LocalEntityStrategy(options.recognizer, options.clock)
    ];
  }

  async extract(message: string, intent?: Intent): Promise<EntityBag> {
    for (const strategy of this.strategies) {
      try {
        const bag = await withTimeout(strategy.tryExtract(message, intent), this.timeoutMs, `entities:${strategy.name}`);
        if (bag) {
          this.logger.debug(`🧩 Entities via ${strategy.name}: ${Object.keys(bag).join(', ') || 'none'}`);
          return bag;
        }
      } catch (error) {
        this.logger.warn(`⚠️ Entity strategy ${strategy.name} failed: ${errorMessage(error)}`, error);
      }
    }
    return {};
  }
}
