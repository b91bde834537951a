import { PROXY_ROUTES, SMART_CAPABILITIES } from './config.js';
import { trimTrailingSlash } from '../utils/url.js';

/**
 * SMART App Launch discovery document served by the proxy.
 */
export interface SmartConfiguration {
  authorization_endpoint: string;
  token_endpoint: string;
  grant_types_supported: string[];
  response_types_supported: string[];
  code_challenge_methods_supported: string[];
  token_endpoint_auth_methods_supported: string[];
  capabilities: string[];
}

/**
 * Build the `.well-known/smart-configuration` document pointing clients at the
 * proxy's own authorize and token endpoints.
 */
export function buildSmartConfiguration(proxyBaseUrl: string): SmartConfiguration {
  const base = trimTrailingSlash(proxyBaseUrl);
  return {
    authorization_endpoint: `${base}${PROXY_ROUTES.authorize}`,
    token_endpoint: `${base}${PROXY_ROUTES.token}`,
    grant_types_supported: ['authorization_code', 'client_credentials'],
    response_types_supported: ['code'],
    code_challenge_methods_supported: ['S256'],
    token_endpoint_auth_methods_supported: ['client_secret_post', 'client_secret_basic'],
    capabilities: [...SMART_CAPABILITIES],
  };
}
