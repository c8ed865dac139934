export interface ContactRef {
  name: string;
  email?: string;
  phone?: string;
  organization?: string;
  address?: string;
}

export type LookupResult<T> =
  | { status: 'found'; value: T }
  | { status: 'not_found' }
  | { status: 'error'; error: unknown };

/**
 * A single source of contacts (remote address book, local database, ...).
 */
export interface IContactSource {
  readonly name: string;
  findByName(name: string): Promise<LookupResult<ContactRef>>;
  search(name: string): Promise<LookupResult<ContactRef[]>>;
}

/**
 * Contact lookups as seen by the dialogue engine, already combined
 * across sources.
 */
export interface IContactDirectory {
  findByName(name: string): Promise<LookupResult<ContactRef>>;
  search(name: string): Promise<ContactRef[]>;
}
