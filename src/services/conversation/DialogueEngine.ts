import { IMessageTransport } from '../../core/interfaces/IMessageTransport';
import { Intent, IntentResult } from '../../core/nlp/types';
import { errorMessage, withTimeout } from '../../utils/helpers';
import { UserRequestLock } from '../concurrency/UserRequestLock';
import { DialogueContext } from './DialogueContext';
import { EmailFlow } from './EmailFlow';
import { MeetingFlow } from './MeetingFlow';
import { Messages } from './messages';
import { QueryHandlers } from './QueryHandlers';

export interface IntentSource {
  classify(message: string): Promise<IntentResult>;
}

export interface DialogueEngineDependencies extends DialogueContext {
  classifier: IntentSource;
  transport: IMessageTransport;
  lock?: UserRequestLock;
}

/**
 * Entry point for inbound text. Messages from one sender are handled one
 * at a time in arrival order; an open conversation always gets the message
 * before intent detection runs.
 */
export class DialogueEngine {
  private readonly emailFlow: EmailFlow;
  private readonly meetingFlow: MeetingFlow;
  private readonly queries: QueryHandlers;
  private readonly lock: UserRequestLock;

  constructor(private readonly deps: DialogueEngineDependencies) {
    this.emailFlow = new EmailFlow(deps);
    this.meetingFlow = new MeetingFlow(deps);
    this.queries = new QueryHandlers(deps);
    this.lock = deps.lock ?? new UserRequestLock();
  }

  /**
   * Processes one message and delivers the reply. Never rejects.
   */
  async handle(senderId: string, text: string, timestamp?: Date): Promise<void> {
    await this.lock.runExclusive(senderId, async () => {
      this.deps.logger.info(`📨 Message from ${senderId}${timestamp ? ` at ${timestamp.toISOString()}` : ''}`);
      const reply = await this.respond(senderId, text);
      try {
        await withTimeout(this.deps.transport.deliver(senderId, reply), this.deps.timeoutMs, 'transport.deliver');
      } catch (error) {
        this.deps.logger.error(`Reply to ${senderId} was not delivered`, error);
      }
    });
  }

  /**
   * Reply for one message. Callers must hold the sender's lock.
   */
  async respond(senderId: string, text: string): Promise<string> {
    try {
      const state = this.deps.store.get(senderId);
      if (state) {
        const reply =
          state.kind === 'email'
            ? await this.emailFlow.continue(senderId, state, text)
            : await this.meetingFlow.continue(senderId, state, text);
        if (reply !== null) return reply;
      }

      return await this.dispatch(senderId, text);
    } catch (error) {
      this.deps.logger.error(`Error handling message from ${senderId}: ${errorMessage(error)}`, error);
      this.deps.store.delete(senderId);
      return Messages.GENERIC_APOLOGY;
    }
  }

  private async dispatch(senderId: string, text: string): Promise<string> {
    const { intent, confidence } = await this.deps.classifier.classify(text);
    const entities = await this.deps.extractor.extract(text, intent);
    this.deps.logger.info(`🎯 ${senderId}: ${intent} (${confidence.toFixed(2)}), entities: ${Object.keys(entities).join(', ') || 'none'}`);

    switch (intent) {
      case Intent.SEND_EMAIL:
        return this.emailFlow.start(senderId, entities);
      case Intent.SCHEDULE_MEETING:
        return this.meetingFlow.start(senderId, entities);
      case Intent.CHECK_CALENDAR:
        return this.queries.checkCalendar(text, entities);
      case Intent.FIND_CONTACT:
        return this.queries.findContact(entities);
      case Intent.CHECK_FREE_SLOTS:
        return this.queries.checkFreeSlots(entities);
      default:
        return Messages.CAPABILITIES;
    }
  }
}
