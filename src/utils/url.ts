/**
 * Parse an absolute URL, returning undefined for relative or malformed input.
 */
export function parseAbsoluteUrl(value: string): URL | undefined {
  try {
    return new URL(value);
  } catch {
    return undefined;
  }
}

/**
 * Whether a string is an absolute URL with an authority (`scheme://host/...`).
 *
 * `patient/*.read` and `user:read` are not; `https://fhir.example/patient$*.read`
 * and `api://client-id/access` are.
 */
export function isAbsoluteUrl(value: string): boolean {
  const url = parseAbsoluteUrl(value);
  return url !== undefined && url.host !== '';
}

/**
 * Drop trailing slashes.
 */
export function trimTrailingSlash(value: string): string {
  return value.replace(/\/+$/, '');
}

/**
 * Append query parameters to a URL.
 *
 * Values are encoded with `encodeURIComponent` (spaces become `%20`), pairs
 * whose value is undefined are skipped, and an existing query string on the
 * base URL is kept in front of the new parameters.
 */
export function appendQuery(
  base: string | URL,
  params: ReadonlyArray<readonly [string, string | undefined]>
): string {
  const url = new URL(base);
  const query = params
    .flatMap(([key, value]) =>
      value === undefined ? [] : [`${encodeURIComponent(key)}=${encodeURIComponent(value)}`]
    )
    .join('&');

  if (query) {
    url.search = url.search ? `${url.search.slice(1)}&${query}` : query;
  }
  return url.href;
}
