// Launch context types
export type { JsonValue, LaunchContext, CompoundState, CompoundCode } from './launch.js';

// Identity provider types
export type { IdpMetadata, FetchFn } from './idp.js';

// Proxy types
export type {
  SmartProxyConfig,
  SmartProxy,
  AuthorizeParams,
  CallbackParams,
  TokenRequest,
  ProxyRedirect,
  TokenProxyResponse,
} from './proxy.js';
