import type { SmartProxy, SmartProxyConfig } from '../types/proxy.js';
import type { FetchFn } from '../types/idp.js';
import { buildAuthorizeRedirect } from './authorize.js';
import { buildCallbackRedirect } from './callback.js';
import { exchangeToken, type TokenExchangeOptions } from './token.js';
import { DEFAULT_LAUNCH_CONTEXT_FIELDS } from './config.js';
import { createConsoleLogger } from '../utils/logger.js';

/**
 * Create the launch-context proxy.
 *
 * The proxy holds no per-request state; the resolved metadata and the fetch
 * function are the only values shared between requests.
 *
 * @example
 * ```typescript
 * import { createSmartProxy, resolveIdpMetadata } from 'smart-launch-proxy';
 *
 * const metadata = await resolveIdpMetadata({ authority: process.env.SMART_PROXY_AUTHORITY! });
 * const proxy = createSmartProxy({ metadata, clientId: 'fhir-app' });
 *
 * const redirect = proxy.authorize(query, 'https://fhir.example.com/AadProxy');
 * ```
 */
export function createSmartProxy(config: SmartProxyConfig): SmartProxy {
  const logger = config.logger ?? createConsoleLogger('info', 'smart-proxy');
  const fetchFn: FetchFn = config.fetch ?? fetch;

  const tokenOptions: TokenExchangeOptions = {
    metadata: config.metadata,
    clientId: config.clientId,
    launchContextFields: config.launchContextFields ?? DEFAULT_LAUNCH_CONTEXT_FIELDS,
    fetch: fetchFn,
    logger,
  };

  return {
    metadata: config.metadata,
    authorize: (params, proxyBaseUrl) => buildAuthorizeRedirect(config.metadata, params, proxyBaseUrl),
    callback: (params) => buildCallbackRedirect(params, logger),
    token: (request, proxyBaseUrl) => exchangeToken(request, proxyBaseUrl, tokenOptions),
  };
}
