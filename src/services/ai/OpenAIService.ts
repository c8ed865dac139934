import OpenAI from 'openai';
import { z } from 'zod';
import { SystemPrompts } from '../../config/system-prompts';
import { ILanguageProvider } from '../../core/interfaces/ILanguageProvider';
import { compactEntities, EntityBag, Intent, IntentResult, isIntent } from '../../core/nlp/types';
import { Logger, logger as defaultLogger } from '../../utils/logger';
import { TimeParser } from '../../utils/time';
import { EmbeddingProvider } from '../nlp/ZeroShotScorer';

const IntentResponseSchema = z.object({
  intent: z.string(),
  confidence: z.coerce.number()
});

const stringOrList = z.union([z.array(z.string()), z.string()]).nullish();

const EntityResponseSchema = z.object({
  person: stringOrList,
  date: z.string().nullish(),
  time: z.string().nullish(),
  duration: z.coerce.number().nullish(),
  email: stringOrList,
  subject: z.string().nullish(),
  body: z.string().nullish(),
  location: z.string().nullish()
});

function toList(value: string | string[] | null | undefined): string[] | undefined {
  if (value === null || value === undefined) return undefined;
  return Array.isArray(value) ? value : [value];
}

export interface OpenAIServiceOptions {
  model: string;
  embeddingModel: string;
  clock?: () => Date;
}

/**
 * Remote language provider backed by OpenAI chat completions, plus the
 * embeddings used by the zero-shot scorer.
 */
export class OpenAIService implements ILanguageProvider, EmbeddingProvider {
  private readonly clock: () => Date;

  constructor(
    private readonly client: OpenAI,
    private readonly options: OpenAIServiceOptions,
    private readonly logger: Logger = defaultLogger
  ) {
    this.clock = options.clock ?? (() => new Date());
  }

  async classifyIntent(message: string): Promise<IntentResult | null> {
    const raw = await this.completeJson(SystemPrompts.getIntentClassifierPrompt(), message);
    if (raw === null) return null;

    const parsed = IntentResponseSchema.safeParse(raw);
    if (!parsed.success || !isIntent(parsed.data.intent)) {
      this.logger.warn('Intent classification returned an unexpected shape', raw);
      return null;
    }

    const confidence = Number.isFinite(parsed.data.confidence)
      ? Math.min(1, Math.max(0, parsed.data.confidence))
      : 0;
    this.logger.info(`🎯 Remote intent: ${parsed.data.intent} (${confidence.toFixed(2)})`);
    return { intent: parsed.data.intent, confidence };
  }

  async extractEntities(message: string, intent?: Intent): Promise<EntityBag | null> {
    const today = TimeParser.today(this.clock());
    const raw = await this.completeJson(SystemPrompts.getEntityExtractionPrompt(today, intent), message);
    if (raw === null) return null;

    const parsed = EntityResponseSchema.safeParse(raw);
    if (!parsed.success) {
      this.logger.warn('Entity extraction returned an unexpected shape', raw);
      return null;
    }

    const data = parsed.data;
    return compactEntities({
      person: toList(data.person),
      date: data.date ?? undefined,
      time: data.time ?? undefined,
      duration: data.duration ?? undefined,
      email: toList(data.email),
      subject: data.subject ?? undefined,
      body: data.body ?? undefined,
      location: data.location ?? undefined
    });
  }

  /**
   * Create embedding vectors for several texts in one request
   */
  async embed(texts: string[]): Promise<number[][]> {
    const response = await this.client.embeddings.create({
      model: this.options.embeddingModel,
      input: texts
    });

    if (response.data.length !== texts.length) {
      throw new Error(`Expected ${texts.length} embeddings, received ${response.data.length}`);
    }

    return [...response.data].sort((a, b) => a.index - b.index).map((item) => item.embedding);
  }

  private async completeJson(systemPrompt: string, message: string): Promise<unknown> {
    const completion = await this.client.chat.completions.create({
      model: this.options.model,
      temperature: 0,
      max_tokens: 300,
      response_format: { type: 'json_object' },
      messages: [
        { role: 'system', content: systemPrompt },
        { role: 'user', content: message }
      ]
    });

    const content = completion.choices[0]?.message?.content?.trim();
    if (!content) {
      this.logger.warn('Language provider returned empty content');
      return null;
    }

    try {
      const parsed: unknown = JSON.parse(content);
      return parsed;
    } catch (parseError) {
      this.logger.warn('Language provider returned invalid JSON', parseError);
      return null;
    }
  }
}
