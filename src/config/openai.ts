// src/config/openai.ts
import OpenAI from 'openai';
import { env } from './environment';

/**
 * Null when no API key is configured: the language provider and the
 * zero-shot stage are then skipped by the classifier cascade.
 */
export const openai: OpenAI | null = env.OPENAI_API_KEY
  ? new OpenAI({
      apiKey: env.OPENAI_API_KEY,
      timeout: env.COLLABORATOR_TIMEOUT_MS,
      maxRetries: 1
    })
  : null;

export const DEFAULT_MODEL = env.OPENAI_MODEL;
export const EMBEDDING_MODEL = env.OPENAI_EMBEDDING_MODEL;
