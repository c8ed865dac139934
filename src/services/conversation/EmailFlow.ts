import { EntityBag } from '../../core/nlp/types';
import { EmailConversation } from '../../types/conversation';
import { normalizeReply } from '../../utils/helpers';
import { bounded, CANCEL, DialogueContext, resolveContactEmail } from './DialogueContext';
import {
  emailAskBody,
  emailAskSubject,
  emailConfirm,
  emailRecipientNotFound,
  emailSent,
  invalidAddress,
  Messages
} from './messages';

const SEND_REPLIES = new Set(['yes', 'y', 'sure', 'ok', 'send']);
const ACCEPT_SUGGESTION_REPLIES = new Set(['yes', 'y', 'sure', 'ok', 'correct', 'confirm', 'right']);

/**
 * recipient -> subject -> body -> confirm
 */
export class EmailFlow {
  constructor(private readonly context: DialogueContext) {}

  /**
   * Seed a conversation from the first message. With every field known the
   * email is sent straight away and no state is kept.
   */
  async start(senderId: string, entities: EntityBag): Promise<string> {
    const state: EmailConversation = {
      kind: 'email',
      step: 'recipient',
      subject: entities.subject,
      body: entities.body
    };

    let reply: string | null = null;
    const [address] = entities.email ?? [];
    const [person] = entities.person ?? [];
    if (address) {
      reply = this.setRecipient(state, address);
    } else if (person) {
      const contact = await resolveContactEmail(this.context, person);
      state.recipient = contact?.email ?? person;
    }

    if (reply === null && state.recipient?.includes('@') && state.subject && state.body) {
      return this.send(senderId, state.recipient, state.subject, state.body);
    }

    return this.advance(senderId, state, reply);
  }

  async continue(senderId: string, state: EmailConversation, text: string): Promise<string | null> {
    const reply = normalizeReply(text);
    const value = text.trim();

    switch (state.step) {
      case 'recipient': {
        if (reply === CANCEL) return this.cancel(senderId);
        if (state.suggestedRecipient && ACCEPT_SUGGESTION_REPLIES.has(reply)) {
          state.recipient = state.suggestedRecipient;
          state.suggestedRecipient = undefined;
          return this.advance(senderId, state);
        }
        return this.advance(senderId, state, this.setRecipient(state, value));
      }
      case 'subject':
        if (reply === CANCEL) return this.cancel(senderId);
        state.subject = value;
        return this.advance(senderId, state);
      case 'body':
        if (reply === CANCEL) return this.cancel(senderId);
        state.body = value;
        return this.advance(senderId, state);
      case 'confirm':
        if (!SEND_REPLIES.has(reply)) return this.cancel(senderId);
        return this.confirm(senderId, state);
      default:
        return null;
    }
  }

  /**
   * Stores the recipient, or returns the reprompt when it is an invalid address.
   */
  private setRecipient(state: EmailConversation, recipient: string): string | null {
    state.suggestedRecipient = undefined;
    if (!recipient.includes('@')) {
      state.recipient = recipient;
      return null;
    }

    const validation = this.context.validator.validate(recipient);
    if (validation.valid) {
      state.recipient = recipient;
      return null;
    }

    state.recipient = undefined;
    state.suggestedRecipient = validation.suggestedCorrection;
    return invalidAddress(recipient, validation.errorMessage, validation.suggestedCorrection);
  }

  /**
   * Move to the first missing field and prompt for it. A pending reprompt
   * keeps the flow on the recipient step.
   */
  private advance(senderId: string, state: EmailConversation, reprompt: string | null = null): string {
    if (reprompt !== null || !state.recipient) {
      state.step = 'recipient';
      this.context.store.set(senderId, state);
      return reprompt ?? Messages.EMAIL_ASK_RECIPIENT;
    }
    if (!state.subject) {
      state.step = 'subject';
      this.context.store.set(senderId, state);
      return emailAskSubject(state.recipient);
    }
    if (!state.body) {
      state.step = 'body';
      this.context.store.set(senderId, state);
      return emailAskBody(state.recipient);
    }
    state.step = 'confirm';
    this.context.store.set(senderId, state);
    return emailConfirm(state.recipient, state.subject, state.body);
  }

  private async confirm(senderId: string, state: EmailConversation): Promise<string> {
    const { recipient, subject, body } = state;
    if (!recipient || !subject || !body) {
      return this.advance(senderId, state);
    }

    let address = recipient;
    if (!recipient.includes('@')) {
      const contact = await resolveContactEmail(this.context, recipient);
      if (!contact) {
        state.recipient = undefined;
        state.step = 'recipient';
        this.context.store.set(senderId, state);
        return emailRecipientNotFound(recipient);
      }
      address = contact.email;
    }

    return this.send(senderId, address, subject, body);
  }

  /**
   * Terminal: the conversation ends whether or not the send succeeds.
   */
  private async send(senderId: string, to: string, subject: string, body: string): Promise<string> {
    this.context.store.delete(senderId);
    try {
      const result = await bounded(this.context, this.context.email.send(to, subject, body), 'email.send');
      if (result.success) return emailSent(to);
      this.context.logger.warn(`⚠️ Email to ${to} was not sent: ${result.error ?? 'unknown error'}`);
    } catch (error) {
      this.context.logger.error(`Email to ${to} failed`, error);
    }
    return Messages.EMAIL_SEND_FAILED;
  }

  private cancel(senderId: string): string {
    this.context.store.delete(senderId);
    return Messages.EMAIL_CANCELED;
  }
}
