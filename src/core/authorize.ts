import type { IdpMetadata } from '../types/idp.js';
import type { AuthorizeParams, ProxyRedirect } from '../types/proxy.js';
import { decodeLaunchContext, encodeBase64UrlString, encodeCompoundState, EMPTY_LAUNCH } from './compound.js';
import { InvalidParameterError, MissingParameterError } from './errors.js';
import { qualifyScopes } from './scopes.js';
import { PROXY_ROUTES } from './config.js';
import { nonEmpty } from '../utils/guards.js';
import { appendQuery, parseAbsoluteUrl, trimTrailingSlash } from '../utils/url.js';

/**
 * Require a non-empty parameter.
 */
export function requireParam(value: string | null | undefined, name: string): string {
  const present = nonEmpty(value);
  if (present === undefined) {
    throw new MissingParameterError(name);
  }
  return present;
}

/**
 * Require a parameter holding an absolute URL.
 */
export function requireUrlParam(value: string | null | undefined, name: string): URL {
  const url = parseAbsoluteUrl(requireParam(value, name));
  if (!url) {
    throw new InvalidParameterError(name, 'must be an absolute URL');
  }
  return url;
}

/**
 * Build the callback URL registered with the identity provider for a client
 * redirect URI.
 *
 * The token exchange recomputes this URL and the identity provider compares
 * the two, so both legs must go through this function.
 */
export function buildCallbackUrl(proxyBaseUrl: string, redirectUri: URL): string {
  return `${trimTrailingSlash(proxyBaseUrl)}${PROXY_ROUTES.callback}/${encodeBase64UrlString(redirectUri.href)}`;
}

/**
 * Rewrite an inbound authorize request into a redirect to the identity
 * provider.
 *
 * The client's state and launch context travel in the outgoing `state` and
 * the identity provider calls back into the proxy instead of the client.
 */
export function buildAuthorizeRedirect(
  metadata: IdpMetadata,
  params: AuthorizeParams,
  proxyBaseUrl: string
): ProxyRedirect {
  const responseType = requireParam(params.response_type, 'response_type');
  const clientId = requireParam(params.client_id, 'client_id');
  const redirectUri = requireUrlParam(params.redirect_uri, 'redirect_uri');
  const aud = requireParam(params.aud, 'aud');

  const launch = nonEmpty(params.launch) ?? EMPTY_LAUNCH;
  const decodedLaunch = decodeLaunchContext(launch);
  if (!decodedLaunch.ok) {
    throw new InvalidParameterError('launch', decodedLaunch.reason);
  }

  const state = encodeCompoundState({ s: params.state ?? null, l: launch });

  const query: Array<[string, string | undefined]> = [
    ['response_type', responseType],
    ['redirect_uri', buildCallbackUrl(proxyBaseUrl, redirectUri)],
    ['client_id', clientId],
  ];

  if (metadata.isV2) {
    const scope = requireParam(params.scope, 'scope');
    query.push(['scope', qualifyScopes(aud, scope)]);
  } else {
    query.push(['resource', aud]);
  }

  query.push(
    ['code_challenge', nonEmpty(params.code_challenge)],
    ['code_challenge_method', nonEmpty(params.code_challenge_method)],
    ['state', state]
  );

  return { status: 302, location: appendQuery(metadata.authorizeEndpoint, query) };
}
