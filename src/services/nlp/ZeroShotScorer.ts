import { IZeroShotScorer } from '../../core/interfaces/ILanguageProvider';

export interface EmbeddingProvider {
  embed(texts: string[]): Promise<number[][]>;
}

// Sharpens cosine similarities (which sit close together) into a usable distribution
const SOFTMAX_TEMPERATURE = 0.05;

export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  if (a.length !== b.length || a.length === 0) {
    throw new Error(`Cannot compare vectors of length ${a.length} and ${b.length}`);
  }
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }
  if (normA === 0 || normB === 0) return 0;
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

export function softmax(values: readonly number[], temperature = 1): number[] {
  const scaled = values.map((value) => value / temperature);
  const max = Math.max(...scaled);
  const exps = scaled.map((value) => Math.exp(value - max));
  const sum = exps.reduce((total, value) => total + value, 0);
  return exps.map((value) => value / sum);
}

/**
 * Zero-shot scoring by embedding similarity: the message and one hypothesis
 * per label are embedded, and the cosine similarities are turned into a
 * distribution over labels. Hypothesis embeddings are cached.
 */
export class EmbeddingZeroShotScorer implements IZeroShotScorer {
  private readonly hypothesisCache = new Map<string, number[]>();

  constructor(
    private readonly embeddings: EmbeddingProvider,
    private readonly hypothesisTemplate: (label: string) => string = (label) => `This text is about ${label}.`
  ) {}

  async score(text: string, labels: readonly string[]): Promise<number[]> {
    if (labels.length === 0) return [];

    const hypotheses = labels.map(this.hypothesisTemplate);
    const missing = hypotheses.filter((hypothesis) => !this.hypothesisCache.has(hypothesis));

    const [messageVector, ...missingVectors] = await this.embeddings.embed([text, ...missing]);
    missing.forEach((hypothesis, index) => this.hypothesisCache.set(hypothesis, missingVectors[index]));

    const similarities = hypotheses.map((hypothesis) => {
      const vector = this.hypothesisCache.get(hypothesis);
      if (!vector) {
        throw new Error(`Missing embedding for hypothesis "${hypothesis}"`);
      }
      return cosineSimilarity(messageVector, vector);
    });

    return softmax(similarities, SOFTMAX_TEMPERATURE);
  }
}
