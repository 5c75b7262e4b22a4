const USER_AGENT = 'keygate (+https://www.npmjs.com/package/@keygate/core)';

/**
 * Wrapper around fetch() for identity provider requests.
 *
 * Adds a User-Agent and JSON Accept header unless the caller set them, and
 * aborts the request after `timeoutMs` so a hung provider cannot stall callers.
 *
 * @param url - Request URL
 * @param init - Fetch options
 * @param options.timeoutMs - Request deadline in milliseconds; replaces `init.signal`
 * @param options.fetch - Fetch implementation (defaults to global fetch)
 *
 * @example
 * ```typescript
 * const response = await providerFetch(jwksUrl, {}, { timeoutMs: 5000 });
 * ```
 */
// oxlint-disable-next-line require-await
export async function providerFetch(
  url: string | URL,
  init: RequestInit = {},
  options: { timeoutMs?: number; fetch?: typeof fetch } = {},
): Promise<Response> {
  const headers = new Headers(init.headers);
  if (!headers.has('User-Agent')) {
    headers.set('User-Agent', USER_AGENT);
  }
  if (!headers.has('Accept')) {
    headers.set('Accept', 'application/json');
  }

  const fetchImpl = options.fetch ?? fetch;
  return fetchImpl(url, {
    ...init,
    headers,
    signal:
      options.timeoutMs !== undefined ? AbortSignal.timeout(options.timeoutMs) : init.signal,
  });
}
