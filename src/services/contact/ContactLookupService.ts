import { ContactRef, IContactDirectory, IContactSource, LookupResult } from '../../core/interfaces/IContactDirectory';
import { withTimeout } from '../../utils/helpers';
import { Logger, logger as defaultLogger } from '../../utils/logger';

/**
 * Contact lookups across an ordered list of sources (address book first,
 * local database second). A failing source is recorded and the next one tried.
 */
export class ContactLookupService implements IContactDirectory {
  constructor(
    private readonly sources: readonly IContactSource[],
    private readonly timeoutMs: number = 10000,
    private readonly logger: Logger = defaultLogger
  ) {}

  /**
   * First contact with an email address wins.
   */
  async findByName(name: string): Promise<LookupResult<ContactRef>> {
    let lastError: LookupResult<ContactRef> | null = null;

    for (const source of this.sources) {
      const result = await this.attempt(source, `${source.name}.findByName`, () => source.findByName(name));
      if (result.status === 'found' && result.value.email) {
        this.logger.info(`👤 Resolved "${name}" via ${source.name}`);
        return result;
      }
      if (result.status === 'error') lastError = result;
    }

    return lastError ?? { status: 'not_found' };
  }

  /**
   * Results of the first source with any match; empty when none match or all fail.
   */
  async search(name: string): Promise<ContactRef[]> {
    for (const source of this.sources) {
      const result = await this.attempt(source, `${source.name}.search`, () => source.search(name));
      if (result.status === 'found' && result.value.length > 0) {
        return result.value;
      }
    }
    return [];
  }

  private async attempt<T>(
    source: IContactSource,
    label: string,
    lookup: () => Promise<LookupResult<T>>
  ): Promise<LookupResult<T>> {
    try {
      const result = await withTimeout(lookup(), this.timeoutMs, label);
      if (result.status === 'error') {
        this.logger.warn(`⚠️ Contact source ${source.name} failed`, result.error);
      }
      return result;
    } catch (error) {
      this.logger.warn(`⚠️ Contact source ${source.name} failed`, error);
      return { status: 'error', error };
    }
  }
}
