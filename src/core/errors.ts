/**
 * Base class for errors raised by the proxy.
 *
 * Carries the OAuth error code and HTTP status the HTTP layer renders.
 */
export class SmartProxyError extends Error {
  readonly code: string;
  readonly status: number;

  constructor(message: string, code: string, status: number, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
    this.status = status;
  }
}

/**
 * The identity provider metadata could not be read. Fatal at startup.
 */
export class OpenIdConfigurationError extends SmartProxyError {
  readonly url: string;

  constructor(url: string, reason: string, options?: { cause?: unknown }) {
    super(`Unable to read OpenID configuration from "${url}": ${reason}`, 'server_error', 500, options);
    this.url = url;
  }
}

/**
 * A required query or form parameter is missing.
 */
export class MissingParameterError extends SmartProxyError {
  readonly parameter: string;

  constructor(parameter: string) {
    super(`Missing required parameter: ${parameter}`, 'invalid_request', 400);
    this.parameter = parameter;
  }
}

/**
 * A parameter is present but cannot be used (not a URL, not decodable).
 */
export class InvalidParameterError extends SmartProxyError {
  readonly parameter: string;

  constructor(parameter: string, reason: string) {
    super(`Invalid parameter ${parameter}: ${reason}`, 'invalid_request', 400);
    this.parameter = parameter;
  }
}

/**
 * The compound state returned by the identity provider is malformed.
 */
export class StateDecodeError extends SmartProxyError {
  constructor(reason: string, options?: { cause?: unknown }) {
    super(`Unable to decode state: ${reason}`, 'server_error', 500, options);
  }
}

/**
 * The compound authorization code presented at the token endpoint is malformed.
 */
export class CodeDecodeError extends SmartProxyError {
  constructor(reason: string, options?: { cause?: unknown }) {
    super(`Unable to decode authorization code: ${reason}`, 'server_error', 500, options);
  }
}

/**
 * The identity provider could not be reached or returned a body the proxy
 * cannot transform.
 */
export class UpstreamError extends SmartProxyError {
  constructor(reason: string, options?: { cause?: unknown }) {
    super(`Identity provider error: ${reason}`, 'server_error', 502, options);
  }
}

/**
 * Environment configuration is missing or invalid.
 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}
