/**
 * Codecs for the values the proxy smuggles through the identity provider.
 *
 * Everything is base64url(JSON). Decoders return a {@link DecodeResult}
 * instead of throwing so that callers decide whether a failure is a client
 * error or a server error.
 */

import { base64url } from 'jose';
import type { CompoundCode, CompoundState, LaunchContext } from '../types/launch.js';
import { isJsonValue, isRecord } from '../utils/guards.js';

/**
 * Outcome of decoding an encoded value.
 */
export type DecodeResult<T> = { ok: true; value: T } | { ok: false; reason: string; cause?: unknown };

const BASE64URL_PATTERN = /^[A-Za-z0-9_-]+$/;

const utf8 = new TextDecoder('utf-8', { fatal: true });

/** base64url(`{}`): the launch context used when a client sends none */
export const EMPTY_LAUNCH = base64url.encode('{}');

function failure<T>(reason: string, cause?: unknown): DecodeResult<T> {
  return cause === undefined ? { ok: false, reason } : { ok: false, reason, cause };
}

/**
 * Encode a UTF-8 string as unpadded base64url.
 */
export function encodeBase64UrlString(value: string): string {
  return base64url.encode(value);
}

/**
 * Decode an unpadded base64url string into UTF-8 text.
 */
export function decodeBase64UrlString(encoded: string): DecodeResult<string> {
  if (!BASE64URL_PATTERN.test(encoded)) {
    return failure('not base64url');
  }
  try {
    return { ok: true, value: utf8.decode(base64url.decode(encoded)) };
  } catch (error) {
    return failure('not valid UTF-8', error);
  }
}

/**
 * Decode base64url(JSON) into a JSON object.
 */
function decodeJsonObject(encoded: string): DecodeResult<Record<string, unknown>> {
  const text = decodeBase64UrlString(encoded);
  if (!text.ok) {
    return text;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text.value);
  } catch (error) {
    return failure('not valid JSON', error);
  }

  if (!isRecord(parsed)) {
    return failure('not a JSON object');
  }
  return { ok: true, value: parsed };
}

function isLaunchContext(value: Record<string, unknown>): value is LaunchContext {
  return Object.values(value).every(isJsonValue);
}

export function encodeLaunchContext(launch: LaunchContext): string {
  return base64url.encode(JSON.stringify(launch));
}

/**
 * Decode the `launch` parameter.
 *
 * An absent or empty value is the empty context; anything else must be
 * base64url(JSON object).
 */
export function decodeLaunchContext(encoded: string | undefined): DecodeResult<LaunchContext> {
  if (!encoded) {
    return { ok: true, value: {} };
  }
  const decoded = decodeJsonObject(encoded);
  if (!decoded.ok) {
    return decoded;
  }
  return isLaunchContext(decoded.value)
    ? { ok: true, value: decoded.value }
    : failure('not a launch context');
}

export function encodeCompoundState(state: CompoundState): string {
  return base64url.encode(JSON.stringify({ s: state.s, l: state.l }));
}

/**
 * Decode the compound state returned by the identity provider.
 */
export function decodeCompoundState(encoded: string): DecodeResult<CompoundState> {
  const decoded = decodeJsonObject(encoded);
  if (!decoded.ok) {
    return decoded;
  }

  const { s, l } = decoded.value;
  if (typeof l !== 'string') {
    return failure('missing launch context');
  }
  if (s !== undefined && s !== null && typeof s !== 'string') {
    return failure('client state is not a string');
  }
  return { ok: true, value: { s: s ?? null, l } };
}

/**
 * Merge the identity provider's code into a launch context. The real code
 * replaces any `code` key the launch context carried.
 */
export function createCompoundCode(launch: LaunchContext, code: string): CompoundCode {
  return { ...launch, code };
}

export function encodeCompoundCode(compound: CompoundCode): string {
  return base64url.encode(JSON.stringify(compound));
}

/**
 * Decode a compound authorization code presented at the token endpoint.
 */
export function decodeCompoundCode(encoded: string): DecodeResult<CompoundCode> {
  const decoded = decodeJsonObject(encoded);
  if (!decoded.ok) {
    return decoded;
  }

  const launch = decoded.value;
  const code = launch['code'];
  if (typeof code !== 'string' || !isLaunchContext(launch)) {
    return failure('missing authorization code');
  }
  return { ok: true, value: { ...launch, code } };
}
