// src/types/index.ts
import { z } from 'zod';

export const WhatsAppMessageSchema = z.object({
  from: z.string(),
  id: z.string(),
  timestamp: z.string().optional(),
  type: z.string(),
  text: z.object({ body: z.string() }).optional()
});

export const WhatsAppWebhookPayloadSchema = z.object({
  object: z.string().optional(),
  entry: z
    .array(
      z.object({
        id: z.string().optional(),
        changes: z
          .array(
            z.object({
              field: z.string().optional(),
              value: z.object({
                messaging_product: z.string().optional(),
                messages: z.array(WhatsAppMessageSchema).optional()
              })
            })
          )
          .default([])
      })
    )
    .default([])
});

export type WhatsAppMessage = z.infer<typeof WhatsAppMessageSchema>;
export type WhatsAppWebhookPayload = z.infer<typeof WhatsAppWebhookPayloadSchema>;

/**
 * One inbound message reduced to what the dialogue engine needs.
 * `text` is absent for anything other than a text message.
 */
export interface InboundMessage {
  senderId: string;
  messageId: string;
  type: string;
  text?: string;
  timestamp?: Date;
}
