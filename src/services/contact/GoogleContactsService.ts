import { people_v1 } from 'googleapis';
import { people as defaultPeople } from '../../config/google';
import { ContactRef, IContactSource, LookupResult } from '../../core/interfaces/IContactDirectory';
import { Logger, logger as defaultLogger } from '../../utils/logger';

const READ_MASK = 'names,emailAddresses,phoneNumbers,organizations,addresses';
const PAGE_SIZE = 10;

/**
 * Google address book (People API v1), the primary contact source.
 */
export class GoogleContactsService implements IContactSource {
  readonly name = 'google';

  constructor(
    private readonly client: people_v1.People = defaultPeople,
    private readonly logger: Logger = defaultLogger
  ) {}

  async search(name: string): Promise<LookupResult<ContactRef[]>> {
    try {
      this.logger.info(`🔍 Searching Google contacts for: "${name}"`);
      const response = await this.client.people.searchContacts({
        query: name,
        readMask: READ_MASK,
        pageSize: PAGE_SIZE
      });

      const contacts = (response.data.results ?? [])
        .map((result) => (result.person ? toContactRef(result.person) : null))
        .filter((contact): contact is ContactRef => contact !== null);

      return contacts.length > 0 ? { status: 'found', value: contacts } : { status: 'not_found' };
    } catch (error) {
      this.logger.error('Error searching Google contacts:', error);
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

function toContactRef(person: people_v1.Schema$Person): ContactRef | null {
  const name = person.names?.[0]?.displayName;
  if (!name) return null;

  const address = person.addresses?.[0];
  return {
    name,
    email: person.emailAddresses?.[0]?.value ?? undefined,
    phone: person.phoneNumbers?.[0]?.value ?? undefined,
    organization: person.organizations?.[0]?.name ?? undefined,
    address: address?.formattedValue ?? undefined
  };
}
