import type { CallbackParams, ProxyRedirect } from '../types/proxy.js';
import {
  createCompoundCode,
  decodeBase64UrlString,
  decodeCompoundState,
  decodeLaunchContext,
  encodeCompoundCode,
} from './compound.js';
import { InvalidParameterError, StateDecodeError } from './errors.js';
import { requireParam } from './authorize.js';
import type { Logger } from '../utils/logger.js';
import { nonEmpty } from '../utils/guards.js';
import { appendQuery, parseAbsoluteUrl } from '../utils/url.js';

/**
 * Decode the client redirect URI carried in the callback path.
 */
export function decodeRedirectUri(encodedRedirect: string): URL {
  const decoded = decodeBase64UrlString(encodedRedirect);
  const url = decoded.ok ? parseAbsoluteUrl(decoded.value) : undefined;
  if (!url) {
    throw new InvalidParameterError('encodedRedirect', 'not an encoded absolute URL');
  }
  return url;
}

/**
 * Rewrite the identity provider's callback into a redirect to the client.
 *
 * Errors go straight back to the client. Otherwise the IdP code is merged
 * into the launch context recovered from the compound state and handed to
 * the client as its authorization code, next to the client's own state.
 */
export function buildCallbackRedirect(params: CallbackParams, logger: Logger): ProxyRedirect {
  const redirectUri = decodeRedirectUri(params.encodedRedirect);

  const error = nonEmpty(params.error);
  if (error) {
    return {
      status: 302,
      location: appendQuery(redirectUri, [
        ['error', error],
        ['error_description', params.error_description],
      ]),
    };
  }

  const code = requireParam(params.code, 'code');
  const encodedState = requireParam(params.state, 'state');

  const state = decodeCompoundState(encodedState);
  if (!state.ok) {
    logger.error('Error parsing launch parameters', { part: 'state', reason: state.reason });
    throw new StateDecodeError(state.reason, { cause: state.cause });
  }

  const launch = decodeLaunchContext(state.value.l);
  if (!launch.ok) {
    logger.error('Error parsing launch parameters', { part: 'launch', reason: launch.reason });
    throw new StateDecodeError(`launch context ${launch.reason}`, { cause: launch.cause });
  }

  const compoundCode = encodeCompoundCode(createCompoundCode(launch.value, code));

  return {
    status: 301,
    location: appendQuery(redirectUri, [
      ['code', compoundCode],
      ['state', state.value.s ?? undefined],
      ['session_state', nonEmpty(params.session_state)],
    ]),
  };
}
