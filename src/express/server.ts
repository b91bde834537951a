/**
 * Standalone Express server for the launch-context proxy.
 *
 * @example
 * ```typescript
 * import { resolveIdpMetadata } from 'smart-launch-proxy';
 * import { createProxyServer } from 'smart-launch-proxy/express';
 *
 * const metadata = await resolveIdpMetadata({
 *   authority: 'https://login.microsoftonline.com/contoso.onmicrosoft.com',
 * });
 *
 * const server = createProxyServer({
 *   metadata,
 *   port: 4000,
 *   baseUrl: 'https://fhir.example.com',
 *   basePath: '/AadProxy',
 * });
 *
 * await server.start();
 * ```
 *
 * @packageDocumentation
 */

import express, { type Application, type Request, type Response } from 'express';
import type { Server } from 'node:http';
import type { FetchFn, IdpMetadata } from '../types/idp.js';
import type { SmartProxy } from '../types/proxy.js';
import { createSmartProxy } from '../core/proxy.js';
import { DEFAULT_PORT } from '../core/config.js';
import { createExpressAdapter } from './adapter.js';
import { createCorsMiddleware } from './cors.js';
import { createConsoleLogger, type Logger } from '../utils/logger.js';
import { trimTrailingSlash } from '../utils/url.js';

/**
 * Options for creating a standalone proxy server.
 */
export interface ProxyServerOptions {
  /** Resolved identity provider metadata */
  metadata: IdpMetadata;

  /** Client id written into token responses */
  clientId?: string;

  /**
   * Whether the proxy routes are reachable. When false only `/health`
   * answers and every proxy route returns 404.
   * Default: true
   */
  enabled?: boolean;

  /**
   * Port to listen on.
   * Default: 4000
   */
  port?: number;

  /**
   * Externally visible origin of this server.
   * If not provided, defaults to http://localhost:{port}
   */
  baseUrl?: string;

  /**
   * Path the proxy routes are mounted at (e.g. `/AadProxy`).
   * Default: '' (root)
   */
  basePath?: string;

  /** Origins allowed to call the proxy from a browser */
  corsOrigins?: string[];

  /** Launch context keys copied into token responses */
  launchContextFields?: readonly string[];

  /** Fetch implementation for calls to the identity provider */
  fetch?: FetchFn;

  /** Logger (default: console logger at info level) */
  logger?: Logger;

  /**
   * Callback when server starts listening.
   */
  onListen?: (port: number, baseUrl: string) => void;
}

/**
 * Result of creating a proxy server.
 */
export interface ProxyServerResult {
  /** The Express app instance */
  app: Application;

  /**
   * Start the server.
   * @returns Promise that resolves when server is listening
   */
  start: () => Promise<Server>;

  /** The externally visible origin of the server */
  baseUrl: string;

  /** The port the server will listen on */
  port: number;

  /** The proxy the routes delegate to */
  proxy: SmartProxy;
}

/**
 * Create a standalone proxy server.
 *
 * Metadata resolution happens before this call, so the server never accepts
 * traffic without a usable identity provider.
 */
export function createProxyServer(options: ProxyServerOptions): ProxyServerResult {
  const {
    metadata,
    clientId,
    enabled = true,
    port = DEFAULT_PORT,
    baseUrl: providedBaseUrl,
    basePath = '',
    corsOrigins,
    launchContextFields,
    fetch,
    logger = createConsoleLogger('info', 'smart-proxy'),
    onListen,
  } = options;

  const baseUrl = providedBaseUrl ?? `http://localhost:${port}`;

  const proxy = createSmartProxy({ metadata, clientId, launchContextFields, fetch, logger });
  const mountPath = trimTrailingSlash(basePath);
  const adapter = createExpressAdapter(proxy, { baseUrl, basePath: mountPath, logger });

  const app = express();
  app.set('trust proxy', 1);

  // Health check
  app.get('/health', (_req: Request, res: Response) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  app.use(createCorsMiddleware({ allowedOrigins: corsOrigins }));

  if (enabled) {
    app.use(mountPath || '/', adapter.routes);
  } else {
    logger.info('SMART proxy is disabled; proxy routes are not mounted');
  }

  // 404 handler
  app.use((_req: Request, res: Response) => {
    res.status(404).json({ error: 'Not Found' });
  });

  app.use(adapter.errorHandler);

  const start = (): Promise<Server> => {
    return new Promise((resolve) => {
      const server = app.listen(port, () => {
        if (onListen) {
          onListen(port, baseUrl);
        }
        resolve(server);
      });
    });
  };

  return { app, start, baseUrl, port, proxy };
}
