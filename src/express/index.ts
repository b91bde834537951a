/**
 * Express integration for the launch-context proxy.
 *
 * @packageDocumentation
 */

export { createExpressAdapter, queryParam } from './adapter.js';
export type { ExpressAdapterOptions, ExpressAdapterResult } from './adapter.js';
export { createProxyServer } from './server.js';
export type { ProxyServerOptions, ProxyServerResult } from './server.js';
export { createCorsMiddleware } from './cors.js';
export type { CorsOptions } from './cors.js';
