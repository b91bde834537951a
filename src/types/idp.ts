/**
 * Endpoints of the upstream identity provider.
 *
 * Resolved once at startup from the provider's
 * `.well-known/openid-configuration` document and frozen afterwards.
 */
export interface IdpMetadata {
  /** Authorization endpoint the browser is redirected to */
  readonly authorizeEndpoint: URL;
  /** Token endpoint the proxy posts code exchanges to */
  readonly tokenEndpoint: URL;
  /**
   * Whether the provider is a v2 style endpoint (authority path contains a
   * `v2.0` segment). v2 providers take audience-qualified scopes instead of a
   * `resource` parameter.
   */
  readonly isV2: boolean;
}

/**
 * Fetch function used for all outbound calls to the identity provider.
 * Defaults to the global `fetch`; tests pass an in-process stub.
 */
export type FetchFn = (input: string | URL, init?: RequestInit) => Promise<Response>;
