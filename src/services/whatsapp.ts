// src/services/whatsapp.ts
import axios, { AxiosInstance } from 'axios';
import { IMessageTransport } from '../core/interfaces/IMessageTransport';
import { Logger, logger as defaultLogger } from '../utils/logger';

const WHATSAPP_API_URL = 'https://graph.facebook.com/v22.0';

// WhatsApp rejects text bodies longer than this
const MAX_TEXT_LENGTH = 4096;

export interface WhatsAppTransportOptions {
  phoneNumberId: string;
  accessToken: string;
  timeoutMs: number;
}

/**
 * WhatsApp Cloud API transport. Failures are logged, never thrown to the caller.
 */
export class WhatsAppTransport implements IMessageTransport {
  private readonly http: AxiosInstance;

  constructor(
    private readonly options: WhatsAppTransportOptions,
    private readonly logger: Logger = defaultLogger,
    http?: AxiosInstance
  ) {
    this.http =
      http ??
      axios.create({
        baseURL: WHATSAPP_API_URL,
        timeout: options.timeoutMs,
        headers: {
          Authorization: `Bearer ${options.accessToken}`,
          'Content-Type': 'application/json'
        }
      });
  }

  async deliver(recipientId: string, text: string): Promise<void> {
    try {
      await this.http.post(`/${this.options.phoneNumberId}/messages`, {
        messaging_product: 'whatsapp',
        to: recipientId,
        text: { body: text.slice(0, MAX_TEXT_LENGTH) }
      });
      this.logger.info(`Message sent to ${recipientId}`);
    } catch (error) {
      this.logger.error('Error sending WhatsApp message:', error);
    }
  }

  async markMessageAsRead(messageId: string): Promise<void> {
    try {
      await this.http.post(`/${this.options.phoneNumberId}/messages`, {
        messaging_product: 'whatsapp',
        status: 'read',
        message_id: messageId
      });
    } catch (error) {
      this.logger.warn('Error marking message as read:', error);
    }
  }
}
