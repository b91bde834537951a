import type { Logger } from '../utils/logger.js';
import type { FetchFn, IdpMetadata } from './idp.js';

/**
 * Configuration for the launch-context proxy.
 */
export interface SmartProxyConfig {
  /** Resolved identity provider metadata (see `resolveIdpMetadata`) */
  metadata: IdpMetadata;

  /**
   * Client id written into every token response. When omitted, the client id
   * of the requesting application is echoed back.
   */
  clientId?: string;

  /**
   * Launch context keys copied into the token response.
   * Default: ['patient', 'encounter', 'practitioner', 'need_patient_banner', 'smart_style_url']
   */
  launchContextFields?: readonly string[];

  /** Fetch implementation for calls to the token endpoint */
  fetch?: FetchFn;

  /** Logger (default: console logger at info level) */
  logger?: Logger;
}

/**
 * Query parameters of an inbound authorize request.
 */
export interface AuthorizeParams {
  response_type?: string;
  client_id?: string;
  redirect_uri?: string;
  launch?: string;
  scope?: string;
  state?: string;
  aud?: string;
  code_challenge?: string;
  code_challenge_method?: string;
}

/**
 * Parameters of the identity provider's callback into the proxy.
 */
export interface CallbackParams {
  /** Base64url encoded client redirect URI (path segment) */
  encodedRedirect: string;
  code?: string;
  state?: string;
  session_state?: string;
  error?: string;
  error_description?: string;
}

/**
 * An inbound token request.
 */
export interface TokenRequest {
  /** Raw `application/x-www-form-urlencoded` body */
  body: string;
  /** Value of the Authorization header, if any */
  authorization?: string;
}

/**
 * A redirect the HTTP layer should issue.
 */
export interface ProxyRedirect {
  status: 301 | 302;
  location: string;
}

/**
 * A token endpoint response the HTTP layer should send as `application/json`.
 */
export interface TokenProxyResponse {
  status: number;
  body: string;
}

/**
 * The launch-context proxy. Every operation is stateless.
 *
 * `proxyBaseUrl` is the externally visible URL the proxy routes are mounted
 * at (origin plus mount path, no trailing slash). It is used to build the
 * callback URL registered with the identity provider.
 */
export interface SmartProxy {
  readonly metadata: IdpMetadata;

  /** Rewrite an authorize request into a redirect to the identity provider */
  authorize(params: AuthorizeParams, proxyBaseUrl: string): ProxyRedirect;

  /** Rewrite the identity provider callback into a redirect to the client */
  callback(params: CallbackParams): ProxyRedirect;

  /** Proxy a token request to the identity provider */
  token(request: TokenRequest, proxyBaseUrl: string): Promise<TokenProxyResponse>;
}
