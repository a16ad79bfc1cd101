export type IdentifierKind = 'phone' | 'email';

export interface Identifier {
  kind: IdentifierKind;
  /** The filename part the identifier came from. */
  source: string;
  /** Phones expand to several variants; emails carry exactly one. */
  values: string[];
}

export interface IdentifierMatch {
  identifier: string;
  name?: string;
}

export interface Resolution {
  names: string[];
  matches: IdentifierMatch[];
}
