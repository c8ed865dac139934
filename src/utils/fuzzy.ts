import Fuse, { FuseOptionKey } from 'fuse.js';
import { FuzzyConfig, toFuseThreshold } from '../config/fuzzy';
import { logger } from './logger';

/**
 * Fuzzy matching utilities for contact names and email domains
 * Uses Fuse.js for fuzzy string matching
 */

export interface FuzzyMatch<T> {
  item: T;
  score: number; // 0-1, higher is better
  matches: string[];
}

export class FuzzyMatcher {
  /**
   * Find best matches for a query in a list of items
   * @param keys - Keys to search in (for objects)
   * @param threshold - Minimum score threshold (0-1)
   */
  static search<T>(
    query: string,
    items: readonly T[],
    keys: Array<FuseOptionKey<T>>,
    threshold: number = FuzzyConfig.CONTACT_SIMILARITY_THRESHOLD
  ): FuzzyMatch<T>[] {
    const fuse = new Fuse([...items], {
      keys,
      threshold: toFuseThreshold(threshold),
      includeScore: FuzzyConfig.FUSE_CONFIG.INCLUDE_SCORE,
      includeMatches: FuzzyConfig.FUSE_CONFIG.INCLUDE_MATCHES,
      ignoreLocation: FuzzyConfig.FUSE_CONFIG.IGNORE_LOCATION,
      minMatchCharLength: FuzzyConfig.MIN_MATCH_CHARACTER_LENGTH
    });

    const matches = fuse
      .search(query)
      .map((result) => ({
        item: result.item,
        score: 1 - (result.score ?? 0),
        matches: result.matches?.map((m) => m.key).filter((k): k is string => k !== undefined) ?? []
      }))
      .filter((match) => match.score >= threshold)
      .sort((a, b) => b.score - a.score);

    logger.debug(`🔍 [FuzzyMatcher] "${query}" matched ${matches.length}/${items.length} items`);
    return matches;
  }

  /**
   * Levenshtein distance between two strings
   */
  static levenshteinDistance(str1: string, str2: string): number {
    const matrix: number[][] = [];

    for (let i = 0; i <= str2.length; i++) {
      matrix[i] = [i];
    }

    for (let j = 0; j <= str1.length; j++) {
      matrix[0][j] = j;
    }

    for (let i = 1; i <= str2.length; i++) {
      for (let j = 1; j <= str1.length; j++) {
        if (str2.charAt(i - 1) === str1.charAt(j - 1)) {
          matrix[i][j] = matrix[i - 1][j - 1];
        } else {
          matrix[i][j] = Math.min(
            matrix[i - 1][j - 1] + 1, // substitution
            matrix[i][j - 1] + 1, // insertion
            matrix[i - 1][j] + 1 // deletion
          );
        }
      }
    }

    return matrix[str2.length][str1.length];
  }

  /**
   * Closest candidate within `maxDistance` edits; ties keep the earlier candidate.
   * An exact match returns null since there is nothing to correct.
   */
  static closestWithin(value: string, candidates: readonly string[], maxDistance: number): string | null {
    let best: { candidate: string; distance: number } | null = null;
    for (const candidate of candidates) {
      const distance = this.levenshteinDistance(value, candidate);
      if (distance === 0) return null;
      if (distance <= maxDistance && (!best || distance < best.distance)) {
        best = { candidate, distance };
      }
    }
    return best?.candidate ?? null;
  }
}
