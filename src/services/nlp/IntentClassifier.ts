import { ILanguageProvider, IZeroShotScorer } from '../../core/interfaces/ILanguageProvider';
import { Intent, IntentResult, IntentStrategy } from '../../core/nlp/types';
import { errorMessage, withTimeout } from '../../utils/helpers';
import { Logger, logger as defaultLogger } from '../../utils/logger';
import {
  LOOSE_KEYWORDS,
  QUICK_CALENDAR_PATTERNS,
  QUICK_KEYWORDS,
  RULE_PATTERN_GROUPS,
  ZERO_SHOT_LABELS
} from './patterns';

export const ZERO_SHOT_CONFIDENCE_FLOOR = 0.65;

const clamp = (value: number): number => (Number.isFinite(value) ? Math.min(1, Math.max(0, value)) : 0);

/**
 * Remote provider: its answer is trusted as-is, no threshold applied.
 */
export class RemoteIntentStrategy implements IntentStrategy {
  readonly name = 'remote';

  constructor(private readonly provider: ILanguageProvider) {}

  async tryClassify(message: string): Promise<IntentResult | null> {
    const result = await this.provider.classifyIntent(message);
    if (!result) return null;
    return { intent: result.intent, confidence: clamp(result.confidence) };
  }
}

/**
 * Cheap literal matches for unambiguous messages.
 */
export class QuickKeywordStrategy implements IntentStrategy {
  readonly name = 'quick-keyword';

  async tryClassify(message: string): Promise<IntentResult | null> {
    if (QUICK_CALENDAR_PATTERNS.some((pattern) => pattern.test(message))) {
      return { intent: Intent.CHECK_CALENDAR, confidence: 0.95 };
    }

    const lower = message.toLowerCase();
    for (const [keyword, intent] of QUICK_KEYWORDS) {
      if (lower.includes(keyword)) {
        return { intent, confidence: 0.9 };
      }
    }
    return null;
  }
}

export class ZeroShotStrategy implements IntentStrategy {
  readonly name = 'zero-shot';

  constructor(
    private readonly scorer: IZeroShotScorer,
    private readonly floor: number = ZERO_SHOT_CONFIDENCE_FLOOR
  ) {}

  async tryClassify(message: string): Promise<IntentResult | null> {
    const labels = ZERO_SHOT_LABELS.map(([label]) => label);
    const scores = await this.scorer.score(message, labels);
    if (scores.length !== labels.length) {
      throw new Error(`Scorer returned ${scores.length} scores for ${labels.length} labels`);
    }

    let best = 0;
    for (let i = 1; i < scores.length; i++) {
      if (scores[i] > scores[best]) best = i;
    }

    const confidence = clamp(scores[best]);
    if (confidence < this.floor) return null;
    return { intent: ZERO_SHOT_LABELS[best][1], confidence };
  }
}

/**
 * Last stage: always answers.
 */
export class RuleBasedStrategy implements IntentStrategy {
  readonly name = 'rule-based';

  async tryClassify(message: string): Promise<IntentResult> {
    const lower = message.toLowerCase();

    for (const group of RULE_PATTERN_GROUPS) {
      if (group.patterns.some((pattern) => pattern.test(lower))) {
        return { intent: group.intent, confidence: 0.9 };
      }
    }

    for (const [keyword, intent] of LOOSE_KEYWORDS) {
      if (lower.includes(keyword)) {
        return { intent, confidence: 0.7 };
      }
    }

    return { intent: Intent.UNKNOWN, confidence: 0.3 };
  }
}

export interface IntentClassifierOptions {
  provider?: ILanguageProvider | null;
  zeroShot?: IZeroShotScorer | null;
  timeoutMs?: number;
}

/**
 * Resolves a message to an intent through an ordered list of strategies.
 * The first strategy returning a result wins; a strategy that throws or
 * times out is logged and skipped.
 */
export class IntentClassifier {
  private readonly strategies: IntentStrategy[];
  private readonly timeoutMs: number;

  constructor(options: IntentClassifierOptions = {}, private readonly logger: Logger = defaultLogger) {
    this.timeoutMs = options.timeoutMs ?? 10000;
    this.strategies = [
      ...(options.provider ? [new RemoteIntentStrategy(options.provider)] : []),
      new QuickKeywordStrategy(),
      ...(options.zeroShot ? [new ZeroShotStrategy(options.zeroShot)] : []),
      new RuleBasedStrategy()
    ];
  }

  async classify(message: string): Promise<IntentResult> {
    if (!message || !message.trim()) {
      return { intent: Intent.UNKNOWN, confidence: 0 };
    }

    for (const strategy of this.strategies) {
      try {
        const result = await withTimeout(strategy.tryClassify(message), this.timeoutMs, `intent:${strategy.name}`);
        if (result) {
          this.logger.debug(`🎯 Intent ${result.intent} (${result.confidence.toFixed(2)}) via ${strategy.name}`);
          return result;
        }
      } catch (error) {
        this.logger.warn(`⚠️ Intent strategy ${strategy.name} failed: ${errorMessage(error)}`, error);
      }
    }

    return { intent: Intent.UNKNOWN, confidence: 0 };
  }
}
