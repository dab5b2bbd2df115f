/**
 * Not-found policy shared by the selector and the finder: strict lookups fail
 * with an error value, lenient ones yield undefined (or an empty list).
 */
export interface LookupOptions {
  readonly throwIfNotFound?: boolean;
}

export interface StrictLookup extends LookupOptions {
  readonly throwIfNotFound: true;
}

export interface LenientLookup extends LookupOptions {
  readonly throwIfNotFound?: false;
}
