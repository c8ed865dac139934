import { ICalendarGateway } from '../../core/interfaces/ICalendarGateway';
import { IContactDirectory } from '../../core/interfaces/IContactDirectory';
import { IEmailSender, IEmailValidator } from '../../core/interfaces/IEmailService';
import { withTimeout } from '../../utils/helpers';
import { Logger } from '../../utils/logger';
import { AvailabilityResolver } from '../calendar/AvailabilityResolver';
import { EntityExtractor } from '../nlp/EntityExtractor';
import { ConversationStore } from './ConversationStore';

/**
 * Collaborators shared by the dialogue flows.
 */
export interface DialogueContext {
  extractor: Pick<EntityExtractor, 'extract'>;
  availability: Pick<AvailabilityResolver, 'findConflicts' | 'findAlternatives' | 'getFreeSlots'>;
  calendar: ICalendarGateway;
  contacts: IContactDirectory;
  email: IEmailSender;
  validator: IEmailValidator;
  store: ConversationStore;
  clock: () => Date;
  timeoutMs: number;
  defaultMeetingMinutes: number;
  logger: Logger;
}

export function bounded<T>(context: DialogueContext, operation: Promise<T>, label: string): Promise<T> {
  return withTimeout(operation, context.timeoutMs, label);
}

export const CANCEL = 'cancel';

export function looksLikeAddress(text: string): boolean {
  return text.includes('@') || (!/\s/.test(text) && text.includes('.'));
}

/**
 * Contact email for a name, or undefined when no source has one
 * (lookup failures included).
 */
export async function resolveContactEmail(
  context: DialogueContext,
  name: string
): Promise<{ name: string; email: string } | undefined> {
  try {
    const result = await bounded(context, context.contacts.findByName(name), 'contacts.findByName');
    if (result.status === 'found' && result.value.email) {
      return { name: result.value.name, email: result.value.email };
    }
    if (result.status === 'error') {
      context.logger.warn(`⚠️ Contact lookup for "${name}" failed`, result.error);
    }
  } catch (error) {
    context.logger.warn(`⚠️ Contact lookup for "${name}" failed`, error);
  }
  return undefined;
}
