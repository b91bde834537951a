import type { FetchFn, IdpMetadata } from '../types/idp.js';
import type { TokenProxyResponse, TokenRequest } from '../types/proxy.js';
import { decodeCompoundCode } from './compound.js';
import { CodeDecodeError, MissingParameterError, UpstreamError } from './errors.js';
import { buildCallbackUrl, requireParam, requireUrlParam } from './authorize.js';
import { unqualifyScopes } from './scopes.js';
import { AUTHORIZATION_CODE_GRANT } from './config.js';
import { errorMeta, type Logger } from '../utils/logger.js';
import { isRecord, nonEmpty } from '../utils/guards.js';

/**
 * Dependencies of {@link exchangeToken}.
 */
export interface TokenExchangeOptions {
  metadata: IdpMetadata;
  /** Client id written into token responses; falls back to the requesting client */
  clientId?: string;
  launchContextFields: readonly string[];
  fetch: FetchFn;
  logger: Logger;
}

interface UpstreamReply {
  status: number;
  ok: boolean;
  body: string;
}

/**
 * Extract the client id from HTTP Basic client credentials.
 * Per RFC 6749 section 2.3.1 the id is form-urlencoded before encoding.
 */
export function parseBasicClientId(authorization: string | undefined): string | undefined {
  const match = authorization?.match(/^Basic\s+([A-Za-z0-9+/=]+)\s*$/i);
  if (!match?.[1]) {
    return undefined;
  }
  const credentials = Buffer.from(match[1], 'base64').toString('utf8');
  const separator = credentials.indexOf(':');
  if (separator <= 0) {
    return undefined;
  }
  const encodedId = credentials.slice(0, separator);
  return new URLSearchParams(`id=${encodedId}`).get('id') ?? undefined;
}

async function postToTokenEndpoint(
  options: TokenExchangeOptions,
  body: string,
  authorization: string | undefined
): Promise<UpstreamReply> {
  const headers: Record<string, string> = {
    'content-type': 'application/x-www-form-urlencoded',
    accept: 'application/json',
  };
  if (authorization) {
    headers['authorization'] = authorization;
  }

  try {
    const response = await options.fetch(options.metadata.tokenEndpoint, {
      method: 'POST',
      headers,
      body,
    });
    return { status: response.status, ok: response.ok, body: await response.text() };
  } catch (error) {
    options.logger.error('Token endpoint request failed', {
      url: options.metadata.tokenEndpoint.href,
      ...errorMeta(error),
    });
    throw new UpstreamError('token endpoint request failed', { cause: error });
  }
}

/**
 * Proxy a token request to the identity provider.
 *
 * Grants other than `authorization_code` are forwarded byte-for-byte and the
 * reply is returned as is. For `authorization_code` the compound code is
 * unpacked, the real code is exchanged against the same callback URL the
 * authorize leg registered, and the successful token response is enriched
 * with the launch context and short-form scopes.
 */
export async function exchangeToken(
  request: TokenRequest,
  proxyBaseUrl: string,
  options: TokenExchangeOptions
): Promise<TokenProxyResponse> {
  const { logger } = options;
  const form = new URLSearchParams(request.body);

  const grantType = requireParam(form.get('grant_type'), 'grant_type');
  const clientId = nonEmpty(form.get('client_id')) ?? parseBasicClientId(request.authorization);
  if (clientId === undefined) {
    throw new MissingParameterError('client_id');
  }

  // TODO: decide whether `aud` should be translated to `resource` for pass-through grants
  if (grantType !== AUTHORIZATION_CODE_GRANT) {
    logger.debug('Passing token request through', { grantType });
    const reply = await postToTokenEndpoint(options, request.body, request.authorization);
    return { status: reply.status, body: reply.body };
  }

  const encodedCode = requireParam(form.get('code'), 'code');
  const redirectUri = requireUrlParam(form.get('redirect_uri'), 'redirect_uri');

  const compound = decodeCompoundCode(encodedCode);
  if (!compound.ok) {
    logger.error('Error decoding compound code', { reason: compound.reason });
    throw new CodeDecodeError(compound.reason, { cause: compound.cause });
  }

  const exchange = new URLSearchParams({
    grant_type: grantType,
    code: compound.value.code,
    redirect_uri: buildCallbackUrl(proxyBaseUrl, redirectUri),
    client_id: clientId,
  });
  const clientSecret = nonEmpty(form.get('client_secret'));
  if (clientSecret) {
    exchange.set('client_secret', clientSecret);
  }
  const codeVerifier = nonEmpty(form.get('code_verifier'));
  if (codeVerifier) {
    exchange.set('code_verifier', codeVerifier);
  }

  const reply = await postToTokenEndpoint(options, exchange.toString(), request.authorization);
  if (!reply.ok) {
    logger.warn('Token endpoint returned an error', { status: reply.status });
    return { status: reply.status, body: reply.body };
  }

  let tokenResponse: unknown;
  try {
    tokenResponse = JSON.parse(reply.body);
  } catch (error) {
    throw new UpstreamError('token response is not valid JSON', { cause: error });
  }
  if (!isRecord(tokenResponse)) {
    throw new UpstreamError('token response is not a JSON object');
  }

  for (const field of options.launchContextFields) {
    if (Object.hasOwn(compound.value, field) && !Object.hasOwn(tokenResponse, field)) {
      tokenResponse[field] = compound.value[field];
    }
  }

  tokenResponse['client_id'] = options.clientId ?? clientId;

  const scope = tokenResponse['scope'];
  if (typeof scope === 'string') {
    tokenResponse['scope'] = unqualifyScopes(scope);
  }

  return { status: reply.status, body: JSON.stringify(tokenResponse) };
}
