import { z } from 'zod';
import { COMMON_EMAIL_DOMAINS, FuzzyConfig } from '../../config/fuzzy';
import { EmailValidation, IEmailValidator } from '../../core/interfaces/IEmailService';
import { FuzzyMatcher } from '../../utils/fuzzy';

const EmailSchema = z.string().email();

// Leading labels of the known domains ("gmail" -> "gmail.com")
const DOMAIN_BY_LABEL = new Map<string, string>();
for (const domain of COMMON_EMAIL_DOMAINS) {
  const label = domain.split('.')[0];
  if (!DOMAIN_BY_LABEL.has(label)) DOMAIN_BY_LABEL.set(label, domain);
}

function allowedDistance(value: string): number {
  return Math.min(FuzzyConfig.MAX_DOMAIN_EDIT_DISTANCE, Math.floor(value.length / 4));
}

/**
 * Syntax check plus typo detection for the domain part.
 * A suggestion is only offered when the corrected address is itself valid.
 */
export class EmailValidator implements IEmailValidator {
  validate(address: string): EmailValidation {
    const value = address.trim();
    const at = value.lastIndexOf('@');
    if (at <= 0 || at === value.length - 1 || value.indexOf('@') !== at) {
      return { valid: false, errorMessage: `"${value}" doesn't look like an email address.` };
    }

    const local = value.slice(0, at);
    const domain = value.slice(at + 1).toLowerCase();

    if (!domain.includes('.')) {
      return this.withSuggestion(value, `${local}@${this.completeDomain(domain)}`, 'is missing a domain ending such as ".com"');
    }

    if (!EmailSchema.safeParse(value).success) {
      return { valid: false, errorMessage: `"${value}" is not a valid email address.` };
    }

    const correctedDomain = FuzzyMatcher.closestWithin(domain, COMMON_EMAIL_DOMAINS, allowedDistance(domain));
    if (correctedDomain) {
      return this.withSuggestion(value, `${local}@${correctedDomain}`, 'has a domain that looks like a typo');
    }

    return { valid: true };
  }

  /**
   * "gmial" -> "gmail.com", anything else gets ".com" appended.
   */
  private completeDomain(domain: string): string {
    const label = FuzzyMatcher.closestWithin(domain, [...DOMAIN_BY_LABEL.keys()], allowedDistance(domain));
    const known = DOMAIN_BY_LABEL.get(label ?? domain);
    return known ?? `${domain}.com`;
  }

  private withSuggestion(value: string, suggestion: string, problem: string): EmailValidation {
    if (!EmailSchema.safeParse(suggestion).success) {
      return { valid: false, errorMessage: `"${value}" ${problem}.` };
    }
    return { valid: false, errorMessage: `"${value}" ${problem}.`, suggestedCorrection: suggestion };
  }
}
