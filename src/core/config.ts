/**
 * Launch context keys copied from the compound code into the token response.
 */
export const DEFAULT_LAUNCH_CONTEXT_FIELDS: readonly string[] = [
  'patient',
  'encounter',
  'practitioner',
  'need_patient_banner',
  'smart_style_url',
];

/**
 * OpenID Connect scopes that are never audience-qualified.
 */
export const WELL_KNOWN_SCOPES: readonly string[] = ['profile', 'openid', 'email', 'offline_access'];

/**
 * Path segment marking a v2 style authority.
 */
export const V2_AUTHORITY_SEGMENT = 'v2.0';

/**
 * Discovery document path, relative to the authority.
 */
export const OPENID_CONFIGURATION_PATH = '/.well-known/openid-configuration';

/**
 * Proxy routes, relative to the mount path.
 */
export const PROXY_ROUTES = {
  authorize: '/authorize',
  callback: '/callback',
  token: '/token',
  smartConfiguration: '/.well-known/smart-configuration',
} as const;

/**
 * Grant type that triggers compound code handling. Every other grant type is
 * passed through to the identity provider untouched.
 */
export const AUTHORIZATION_CODE_GRANT = 'authorization_code';

/**
 * Capabilities advertised in the SMART configuration document.
 */
export const SMART_CAPABILITIES: readonly string[] = [
  'launch-ehr',
  'client-public',
  'client-confidential-symmetric',
  'context-ehr-patient',
  'context-ehr-encounter',
  'context-passthrough-banner',
  'context-passthrough-style',
  'permission-patient',
  'permission-user',
  'permission-v1',
];

/** Default HTTP port for the standalone server */
export const DEFAULT_PORT = 4000;
