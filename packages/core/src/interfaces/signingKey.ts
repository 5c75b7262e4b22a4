/**
 * Public key imported from the provider's JWKS, bound to the algorithm it may verify.
 */
export interface SigningKey {
  /** Key identifier matched against the token header `kid` */
  kid: string;

  /** Algorithm pinned from provider metadata or key type, never from the token */
  alg: string;

  key: CryptoKey | Uint8Array;
}

/**
 * Immutable snapshot of the provider's signing keys.
 * A snapshot is replaced as a whole; it is never modified in place.
 */
export interface SigningKeySet {
  readonly keys: ReadonlyMap<string, SigningKey>;

  /** Epoch milliseconds when this snapshot was fetched */
  readonly fetchedAt: number;
}
