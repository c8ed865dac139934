import { FuzzyConfig } from '../../config/fuzzy';
import { ContactRef, IContactSource, LookupResult } from '../../core/interfaces/IContactDirectory';
import { FuzzyMatcher } from '../../utils/fuzzy';
import { Logger, logger as defaultLogger } from '../../utils/logger';
import { BaseService, QueryRunner } from './BaseService';

// A type alias, so the row satisfies pg's index-signature constraint
export type ContactRow = {
  name: string;
  email: string | null;
  phone_number: string | null;
  organization: string | null;
  address: string | null;
};

const CANDIDATE_LIMIT = 200;

/**
 * Local contacts table, used when the address book has no answer.
 * Rows are prefiltered by name fragments and ranked with Fuse.js.
 */
export class ContactService extends BaseService implements IContactSource {
  readonly name = 'local';

  constructor(loggerInstance: Logger = defaultLogger, runQuery?: QueryRunner) {
    super(loggerInstance, runQuery);
  }

  async search(name: string): Promise<LookupResult<ContactRef[]>> {
    const searchName = this.sanitizeInput(name);
    if (searchName.length < FuzzyConfig.MIN_MATCH_CHARACTER_LENGTH) {
      return { status: 'not_found' };
    }

    try {
      const fragments = searchName
        .split(/\s+/)
        .filter((fragment) => fragment.length >= FuzzyConfig.MIN_MATCH_CHARACTER_LENGTH)
        .map((fragment) => `%${fragment}%`);

      const rows = await this.executeQuery<ContactRow>(
        `SELECT name, email, phone_number, organization, address
         FROM contacts
         WHERE name ILIKE ANY($1)
         ORDER BY name
         LIMIT ${CANDIDATE_LIMIT}`,
        [fragments]
      );

      const matches = FuzzyMatcher.search(searchName, rows.map(toContactRef), ['name'])
        .slice(0, FuzzyConfig.MAX_CONTACT_RESULTS)
        .map((match) => match.item);

      this.logger.info(`📋 Local contacts: ${matches.length} match(es) for "${searchName}"`);
      return matches.length > 0 ? { status: 'found', value: matches } : { status: 'not_found' };
    } catch (error) {
      this.logger.error('Error searching local contacts:', error);
      return { status: 'error', error };
    }
  }

  async findByName(name: string): Promise<LookupResult<ContactRef>> {
    const result = await this.search(name);
    if (result.status !== 'found') return result;
    const withEmail = result.value.find((contact) => contact.email);
    return withEmail ? { status: 'found', value: withEmail } : { status: 'not_found' };
  }
}

function toContactRef(row: ContactRow): ContactRef {
  return {
    name: row.name,
    email: row.email ?? undefined,
    phone: row.phone_number ?? undefined,
    organization: row.organization ?? undefined,
    address: row.address ?? undefined
  };
}
