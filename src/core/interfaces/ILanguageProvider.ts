import { EntityBag, Intent, IntentResult } from '../nlp/types';

/**
 * Best-effort remote language service. Any method may resolve to null
 * (declined) or reject (unavailable); callers fall back to local strategies.
 */
export interface ILanguageProvider {
  classifyIntent(message: string): Promise<IntentResult | null>;
  extractEntities(message: string, intent?: Intent): Promise<EntityBag | null>;
}

/**
 * Scores a text against candidate labels without per-label training.
 * Returns one score in [0,1] per label, in label order.
 */
export interface IZeroShotScorer {
  score(text: string, labels: readonly string[]): Promise<number[]>;
}
