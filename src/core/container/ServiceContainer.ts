import { pool } from '../../config/database';
import { env } from '../../config/environment';
import { DEFAULT_MODEL, EMBEDDING_MODEL, openai } from '../../config/openai';
import { OpenAIService } from '../../services/ai/OpenAIService';
import { AvailabilityResolver } from '../../services/calendar/AvailabilityResolver';
import { CalendarService } from '../../services/calendar/CalendarService';
import { UserRequestLock } from '../../services/concurrency/UserRequestLock';
import { ContactLookupService } from '../../services/contact/ContactLookupService';
import { GoogleContactsService } from '../../services/contact/GoogleContactsService';
import { ConversationStore } from '../../services/conversation/ConversationStore';
import { DialogueEngine } from '../../services/conversation/DialogueEngine';
import { ContactService } from '../../services/database/ContactService';
import { EmailValidator } from '../../services/email/EmailValidator';
import { GmailService } from '../../services/email/GmailService';
import { EntityExtractor } from '../../services/nlp/EntityExtractor';
import { IntentClassifier } from '../../services/nlp/IntentClassifier';
import { CompromiseRecognizer } from '../../services/nlp/NamedEntityRecognizer';
import { EmbeddingZeroShotScorer } from '../../services/nlp/ZeroShotScorer';
import { WhatsAppTransport } from '../../services/whatsapp';
import { Logger, logger } from '../../utils/logger';
import { IContactSource } from '../interfaces/IContactDirectory';

/**
 * Builds every service once from the environment. Optional collaborators
 * (OpenAI, the local contacts database) are left out when unconfigured.
 */
export class ServiceContainer {
  private static instance: ServiceContainer;

  readonly logger: Logger = logger;
  readonly classifier: IntentClassifier;
  readonly extractor: EntityExtractor;
  readonly calendar: CalendarService;
  readonly availability: AvailabilityResolver;
  readonly contacts: ContactLookupService;
  readonly transport: WhatsAppTransport;
  readonly engine: DialogueEngine;

  private constructor() {
    const timeoutMs = env.COLLABORATOR_TIMEOUT_MS;
    const clock = (): Date => new Date();

    const languageProvider = openai
      ? new OpenAIService(openai, { model: DEFAULT_MODEL, embeddingModel: EMBEDDING_MODEL }, this.logger)
      : null;
    if (!languageProvider) {
      this.logger.warn('⚠️ OPENAI_API_KEY not set, using local intent and entity strategies only');
    }

    this.classifier = new IntentClassifier(
      {
        provider: languageProvider,
        zeroShot: languageProvider ? new EmbeddingZeroShotScorer(languageProvider) : null,
        timeoutMs
      },
      this.logger
    );
    this.extractor = new EntityExtractor(
      { provider: languageProvider, recognizer: new CompromiseRecognizer(), clock, timeoutMs },
      this.logger
    );

    this.calendar = new CalendarService(
      { calendarId: env.GOOGLE_CALENDAR_ID, timeZone: env.DEFAULT_TIMEZONE },
      undefined,
      this.logger
    );
    this.availability = new AvailabilityResolver(this.calendar, { timeoutMs, clock }, this.logger);

    const sources: IContactSource[] = [new GoogleContactsService(undefined, this.logger)];
    if (pool) {
      sources.push(new ContactService(this.logger));
    } else {
      this.logger.warn('⚠️ DB_HOST not set, local contact lookups disabled');
    }
    this.contacts = new ContactLookupService(sources, timeoutMs, this.logger);

    this.transport = new WhatsAppTransport(
      {
        phoneNumberId: env.WHATSAPP_PHONE_NUMBER_ID ?? '',
        accessToken: env.WHATSAPP_API_TOKEN ?? '',
        timeoutMs
      },
      this.logger
    );

    this.engine = new DialogueEngine({
      classifier: this.classifier,
      extractor: this.extractor,
      availability: this.availability,
      calendar: this.calendar,
      contacts: this.contacts,
      email: new GmailService(undefined, this.logger),
      validator: new EmailValidator(),
      store: new ConversationStore(env.CONVERSATION_TTL_MINUTES * 60 * 1000),
      lock: new UserRequestLock(),
      transport: this.transport,
      clock,
      timeoutMs,
      defaultMeetingMinutes: env.DEFAULT_MEETING_MINUTES,
      logger: this.logger
    });

    this.logger.info('🚀 ServiceContainer initialized with all services');
  }

  static getInstance(): ServiceContainer {
    if (!ServiceContainer.instance) {
      ServiceContainer.instance = new ServiceContainer();
    }
    return ServiceContainer.instance;
  }
}
