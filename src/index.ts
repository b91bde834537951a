/**
 * smart-launch-proxy
 *
 * SMART on FHIR launch-context proxy for OpenID Connect identity providers
 * that know nothing about SMART launch parameters.
 *
 * The proxy sits on the three legs of the authorization code flow:
 * - `/authorize` packs the client state and launch context into the `state`
 *   sent to the identity provider and qualifies scopes for v2 providers
 * - `/callback/{encodedRedirect}` turns the provider's code into a compound
 *   code carrying the launch context and redirects to the client
 * - `/token` unpacks the compound code, exchanges the real code and returns
 *   the token response with the launch context and short-form scopes
 *
 * ## Package Exports
 *
 * - `smart-launch-proxy` - createSmartProxy, resolveIdpMetadata, codecs, errors
 * - `smart-launch-proxy/express` - createExpressAdapter, createProxyServer
 *
 * @example
 * ```typescript
 * import { resolveIdpMetadata } from 'smart-launch-proxy';
 * import { createProxyServer } from 'smart-launch-proxy/express';
 *
 * const metadata = await resolveIdpMetadata({
 *   authority: 'https://login.microsoftonline.com/contoso.onmicrosoft.com/v2.0',
 * });
 *
 * const server = createProxyServer({
 *   metadata,
 *   baseUrl: 'https://fhir.example.com',
 *   basePath: '/AadProxy',
 *   port: 4000,
 * });
 *
 * await server.start();
 * ```
 *
 * @packageDocumentation
 */

// Proxy
export { createSmartProxy } from './core/proxy.js';

// Endpoint resolution
export { resolveIdpMetadata, isV2Authority } from './core/resolver.js';
export type { ResolveIdpMetadataOptions } from './core/resolver.js';

// Individual legs (for custom HTTP integrations)
export { buildAuthorizeRedirect, buildCallbackUrl } from './core/authorize.js';
export { buildCallbackRedirect, decodeRedirectUri } from './core/callback.js';
export { exchangeToken, parseBasicClientId } from './core/token.js';
export type { TokenExchangeOptions } from './core/token.js';
export { buildSmartConfiguration } from './core/smart-configuration.js';
export type { SmartConfiguration } from './core/smart-configuration.js';

// Scope translation
export {
  qualifyScope,
  qualifyScopes,
  unqualifyScope,
  unqualifyScopes,
  isWellKnownScope,
} from './core/scopes.js';

// Compound state and code codecs
export {
  EMPTY_LAUNCH,
  encodeLaunchContext,
  decodeLaunchContext,
  encodeCompoundState,
  decodeCompoundState,
  createCompoundCode,
  encodeCompoundCode,
  decodeCompoundCode,
} from './core/compound.js';
export type { DecodeResult } from './core/compound.js';

// Errors
export {
  SmartProxyError,
  OpenIdConfigurationError,
  MissingParameterError,
  InvalidParameterError,
  StateDecodeError,
  CodeDecodeError,
  UpstreamError,
  ConfigurationError,
} from './core/errors.js';

// Environment configuration
export { loadProxyConfig } from './core/env.js';
export type { ProxyEnvConfig } from './core/env.js';

// All types
export type {
  JsonValue,
  LaunchContext,
  CompoundState,
  CompoundCode,
  IdpMetadata,
  FetchFn,
  SmartProxyConfig,
  SmartProxy,
  AuthorizeParams,
  CallbackParams,
  TokenRequest,
  ProxyRedirect,
  TokenProxyResponse,
} from './types/index.js';

// Logger utilities
export { createConsoleLogger, noopLogger } from './utils/logger.js';
export type { Logger, LogLevel } from './utils/logger.js';

// Configuration constants
export {
  DEFAULT_LAUNCH_CONTEXT_FIELDS,
  WELL_KNOWN_SCOPES,
  PROXY_ROUTES,
  AUTHORIZATION_CODE_GRANT,
  SMART_CAPABILITIES,
  DEFAULT_PORT,
} from './core/config.js';
