/** One entry from a contact store, reduced to the fields used for matching. */
export interface ContactRecord {
  givenName: string;
  familyName: string;
  organizationName: string;
  phones: string[];
  emails: string[];
}

export interface ContactIndexStats {
  /** Records enumerated, including those skipped for having no name. */
  contacts: number;
  phones: number;
  emails: number;
}

export interface ContactIndex {
  readonly size: number;
  readonly stats: Readonly<ContactIndexStats>;
  lookup(identifier: string): string | undefined;
  entries(): IterableIterator<[string, string]>;
}
