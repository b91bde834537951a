import { WELL_KNOWN_SCOPES } from './config.js';
import { isAbsoluteUrl } from '../utils/url.js';

/**
 * Split a space-delimited scope string, ignoring empty tokens.
 */
export function splitScopes(scope: string): string[] {
  return scope.split(' ').filter((token) => token !== '');
}

export function isWellKnownScope(scope: string): boolean {
  return WELL_KNOWN_SCOPES.includes(scope);
}

/**
 * Qualify a single scope with an audience.
 *
 * v2 identity providers only accept resource scopes of the form
 * `{audience}/{permission}` and reject `/` inside the permission, so
 * `patient/*.read` becomes `{aud}/patient$*.read`. Well-known OpenID
 * scopes are returned unchanged.
 */
export function qualifyScope(aud: string, scope: string): string {
  if (isWellKnownScope(scope)) {
    return scope;
  }
  return `${aud}/${scope.replaceAll('/', '$')}`;
}

/**
 * Reverse {@link qualifyScope}: keep what follows the last path separator of
 * an absolute URL scope, query and fragment included, and turn `$` back
 * into `/`.
 */
export function unqualifyScope(scope: string): string {
  return permissionOf(scope).replaceAll('$', '/');
}

function permissionOf(scope: string): string {
  if (!isAbsoluteUrl(scope)) {
    return scope;
  }
  const suffixStart = scope.search(/[?#]/);
  const path = suffixStart === -1 ? scope : scope.slice(0, suffixStart);
  return scope.slice(path.lastIndexOf('/') + 1);
}

export function qualifyScopes(aud: string, scope: string): string {
  return splitScopes(scope)
    .map((token) => qualifyScope(aud, token))
    .join(' ');
}

export function unqualifyScopes(scope: string): string {
  return splitScopes(scope).map(unqualifyScope).join(' ');
}
