import express, { Request, Response, Router } from 'express';
import { IMessageTransport } from '../core/interfaces/IMessageTransport';
import { Messages } from '../services/conversation/messages';
import { InboundMessage, WhatsAppWebhookPayloadSchema } from '../types';
import { Logger, logger as defaultLogger } from '../utils/logger';

/**
 * Text and metadata of every message in a WhatsApp Cloud API webhook
 * payload, in payload order. Status updates and malformed payloads yield [].
 */
export function extractInboundMessages(body: unknown): InboundMessage[] {
  const parsed = WhatsAppWebhookPayloadSchema.safeParse(body);
  if (!parsed.success) return [];

  const inbound: InboundMessage[] = [];
  for (const entry of parsed.data.entry) {
    for (const change of entry.changes) {
      for (const message of change.value.messages ?? []) {
        const seconds = message.timestamp ? Number(message.timestamp) : Number.NaN;
        inbound.push({
          senderId: message.from,
          messageId: message.id,
          type: message.type,
          text: message.type === 'text' ? message.text?.body : undefined,
          timestamp: Number.isFinite(seconds) ? new Date(seconds * 1000) : undefined
        });
      }
    }
  }
  return inbound;
}

/**
 * GET handshake: echo the challenge when the verify token matches.
 */
export function verifyChallenge(query: Request['query'], verifyToken: string | undefined): string | null {
  const mode = query['hub.mode'];
  const token = query['hub.verify_token'];
  const challenge = query['hub.challenge'];
  if (!verifyToken || mode !== 'subscribe' || token !== verifyToken || typeof challenge !== 'string') {
    return null;
  }
  return challenge;
}

export interface WebhookDependencies {
  engine: { handle(senderId: string, text: string, timestamp?: Date): Promise<void> };
  transport: IMessageTransport & { markMessageAsRead?(messageId: string): Promise<void> };
  verifyToken?: string;
  logger?: Logger;
}

export function createWhatsAppWebhook(deps: WebhookDependencies): Router {
  const logger = deps.logger ?? defaultLogger;
  const router = express.Router();

  router.get('/whatsapp', (req: Request, res: Response) => {
    const challenge = verifyChallenge(req.query, deps.verifyToken);
    if (challenge === null) {
      logger.warn('Webhook verification failed');
      res.sendStatus(403);
      return;
    }
    logger.info('Webhook verified successfully');
    res.status(200).send(challenge);
  });

  router.post('/whatsapp', (req: Request, res: Response) => {
    // Acknowledge first; WhatsApp retries anything slow
    res.sendStatus(200);

    const messages = extractInboundMessages(req.body);
    for (const message of messages) {
      handleIncomingMessage(deps, message).catch((error: unknown) => {
        logger.error(`Error processing message ${message.messageId}:`, error);
      });
    }
  });

  return router;
}

/**
 * engine.handle is called before the first await so that messages queue
 * on the sender's lock in payload order.
 */
async function handleIncomingMessage(deps: WebhookDependencies, message: InboundMessage): Promise<void> {
  const reply =
    message.text === undefined
      ? deps.transport.deliver(message.senderId, Messages.TEXT_ONLY)
      : deps.engine.handle(message.senderId, message.text, message.timestamp);
  const read = deps.transport.markMessageAsRead?.(message.messageId) ?? Promise.resolve();
  await Promise.all([reply, read]);
}
