import type { FetchFn, IdpMetadata } from '../types/idp.js';
import { OpenIdConfigurationError } from './errors.js';
import { OPENID_CONFIGURATION_PATH, V2_AUTHORITY_SEGMENT } from './config.js';
import { createConsoleLogger, errorMeta, type Logger } from '../utils/logger.js';
import { isRecord } from '../utils/guards.js';
import { parseAbsoluteUrl, trimTrailingSlash } from '../utils/url.js';

/**
 * Options for {@link resolveIdpMetadata}.
 */
export interface ResolveIdpMetadataOptions {
  /**
   * Issuer authority of the identity provider, e.g.
   * `https://login.microsoftonline.com/{tenant}` or
   * `https://login.microsoftonline.com/{tenant}/v2.0`.
   */
  authority: string;

  /** Fetch implementation (default: global fetch) */
  fetch?: FetchFn;

  /** Logger (default: console logger at info level) */
  logger?: Logger;
}

/**
 * Whether the authority designates a v2 style endpoint.
 */
export function isV2Authority(authority: URL): boolean {
  return authority.pathname.split('/').includes(V2_AUTHORITY_SEGMENT);
}

/**
 * Resolve the identity provider endpoints from its discovery document.
 *
 * Call this once before the proxy accepts traffic and hand the result to
 * `createSmartProxy`. Every failure surfaces as a single
 * {@link OpenIdConfigurationError}; there is no proxy without a usable
 * identity provider.
 *
 * @example
 * ```typescript
 * const metadata = await resolveIdpMetadata({
 *   authority: 'https://login.microsoftonline.com/contoso.onmicrosoft.com',
 * });
 * const proxy = createSmartProxy({ metadata });
 * ```
 */
export async function resolveIdpMetadata(options: ResolveIdpMetadataOptions): Promise<IdpMetadata> {
  const logger = options.logger ?? createConsoleLogger('info', 'resolver');
  const fetchFn: FetchFn = options.fetch ?? fetch;
  const configurationUrl = `${trimTrailingSlash(options.authority)}${OPENID_CONFIGURATION_PATH}`;

  const authority = parseAbsoluteUrl(options.authority);
  if (!authority) {
    logger.warn('Identity provider authority is not an absolute URL', {
      authority: options.authority,
    });
    throw new OpenIdConfigurationError(configurationUrl, 'authority is not an absolute URL');
  }

  let response: Response;
  try {
    response = await fetchFn(configurationUrl, { headers: { accept: 'application/json' } });
  } catch (error) {
    logger.warn('Failed to read the OpenID configuration', {
      url: configurationUrl,
      ...errorMeta(error),
    });
    throw new OpenIdConfigurationError(configurationUrl, 'request failed', { cause: error });
  }

  if (!response.ok) {
    logger.warn('OpenID configuration request was not successful', {
      url: configurationUrl,
      status: response.status,
    });
    throw new OpenIdConfigurationError(configurationUrl, `unexpected status ${response.status}`);
  }

  let document: unknown;
  try {
    document = await response.json();
  } catch (error) {
    logger.warn('OpenID configuration is not valid JSON', {
      url: configurationUrl,
      ...errorMeta(error),
    });
    throw new OpenIdConfigurationError(configurationUrl, 'response is not valid JSON', {
      cause: error,
    });
  }

  if (!isRecord(document)) {
    logger.warn('OpenID configuration is not a JSON object', { url: configurationUrl });
    throw new OpenIdConfigurationError(configurationUrl, 'response is not a JSON object');
  }

  const authorizeEndpoint = readEndpoint(document, 'authorization_endpoint');
  const tokenEndpoint = readEndpoint(document, 'token_endpoint');
  if (!authorizeEndpoint || !tokenEndpoint) {
    const field = authorizeEndpoint ? 'token_endpoint' : 'authorization_endpoint';
    logger.warn('OpenID configuration is missing an endpoint', { url: configurationUrl, field });
    throw new OpenIdConfigurationError(configurationUrl, `missing or invalid ${field}`);
  }

  const metadata: IdpMetadata = Object.freeze({
    authorizeEndpoint,
    tokenEndpoint,
    isV2: isV2Authority(authority),
  });

  logger.info('Resolved identity provider endpoints', {
    authorizeEndpoint: authorizeEndpoint.href,
    tokenEndpoint: tokenEndpoint.href,
    isV2: metadata.isV2,
  });

  return metadata;
}

function readEndpoint(document: Record<string, unknown>, field: string): URL | undefined {
  const value = document[field];
  return typeof value === 'string' ? parseAbsoluteUrl(value) : undefined;
}
