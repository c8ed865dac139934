import { gmail_v1 } from 'googleapis';
import { gmail as defaultGmail } from '../../config/google';
import { IEmailSender, SendEmailResult } from '../../core/interfaces/IEmailService';
import { errorMessage } from '../../utils/helpers';
import { Logger, logger as defaultLogger } from '../../utils/logger';

/**
 * Non-ASCII subjects go out as RFC 2047 encoded words.
 */
function encodeHeader(value: string): string {
  return /^[\x20-\x7e]*$/.test(value) ? value : `=?UTF-8?B?${Buffer.from(value, 'utf8').toString('base64')}?=`;
}

export function buildRawMessage(to: string, subject: string, body: string): string {
  const email = [
    `To: ${to}`,
    `Subject: ${encodeHeader(subject)}`,
    'MIME-Version: 1.0',
    'Content-Type: text/plain; charset=utf-8',
    '',
    body
  ].join('\r\n');

  return Buffer.from(email).toString('base64').replace(/\+/g, '-').replace(/\//g, '_').replace(/=+$/, '');
}

export class GmailService implements IEmailSender {
  constructor(
    private readonly client: gmail_v1.Gmail = defaultGmail,
    private readonly logger: Logger = defaultLogger
  ) {}

  async send(to: string, subject: string, body: string): Promise<SendEmailResult> {
    try {
      this.logger.info(`📧 Sending email to: ${to}`);

      const response = await this.client.users.messages.send({
        userId: 'me',
        requestBody: { raw: buildRawMessage(to, subject, body) }
      });

      this.logger.info(`✅ Email sent successfully: ${response.data.id}`);
      return { success: true, messageId: response.data.id ?? undefined };
    } catch (error) {
      this.logger.error('Error sending email:', error);
      return { success: false, error: errorMessage(error) };
    }
  }
}
