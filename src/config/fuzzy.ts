/**
 * Fuzzy matching configuration for contact-name lookups and
 * email-domain typo detection.
 */

export const FuzzyConfig = {
  /**
   * Minimum similarity (0-1) for a local contact to count as a name match.
   */
  CONTACT_SIMILARITY_THRESHOLD: 0.6,

  /**
   * Shorter matches are ignored to avoid false positives
   */
  MIN_MATCH_CHARACTER_LENGTH: 2,

  /**
   * Maximum local contacts returned by a search
   */
  MAX_CONTACT_RESULTS: 10,

  /**
   * A domain within this many edits of a well-known mail domain is treated as a typo.
   * The allowance also never exceeds a quarter of the domain length, so short
   * domains such as "x.com" are left alone.
   */
  MAX_DOMAIN_EDIT_DISTANCE: 2,

  FUSE_CONFIG: {
    IGNORE_LOCATION: true,
    INCLUDE_SCORE: true,
    INCLUDE_MATCHES: true
  }
} as const;

/**
 * Fuse uses distance (lower is better), we use similarity (higher is better)
 */
export function toFuseThreshold(similarityThreshold: number): number {
  return 1 - similarityThreshold;
}

/**
 * Mail domains used as correction candidates for address typos.
 */
export const COMMON_EMAIL_DOMAINS = [
  'gmail.com',
  'googlemail.com',
  'yahoo.com',
  'hotmail.com',
  'outlook.com',
  'live.com',
  'msn.com',
  'icloud.com',
  'me.com',
  'aol.com',
  'protonmail.com',
  'proton.me',
  'mail.com',
  'gmx.com',
  'zoho.com',
  'yandex.com',
  'comcast.net'
] as const;
