import express, {
  Router,
  type ErrorRequestHandler,
  type Request,
  type RequestHandler,
} from 'express';
import type { SmartProxy } from '../types/proxy.js';
import { SmartProxyError } from '../core/errors.js';
import { PROXY_ROUTES } from '../core/config.js';
import { buildSmartConfiguration } from '../core/smart-configuration.js';
import { createConsoleLogger, errorMeta, type Logger } from '../utils/logger.js';
import { trimTrailingSlash } from '../utils/url.js';

/**
 * Options for the Express adapter.
 */
export interface ExpressAdapterOptions {
  /**
   * Externally visible origin of the server (e.g. `https://fhir.example.com`).
   * The router's mount path is appended to it. If not provided, it is
   * inferred from the request protocol and host.
   */
  baseUrl?: string;

  /**
   * Path the router is mounted at, as configured. Routing ignores case, so
   * the request's own `baseUrl` may differ in casing between the authorize
   * and token legs; when set, this path is used instead.
   */
  basePath?: string;

  /** Logger for unexpected errors */
  logger?: Logger;
}

/**
 * Result of creating an Express adapter.
 */
export interface ExpressAdapterResult {
  /**
   * Router with the authorize, callback, token and SMART configuration
   * routes. Mount it at the path clients use to reach the proxy.
   */
  routes: Router;

  /**
   * Error handler rendering proxy errors as OAuth error JSON.
   * Register it after all routes.
   */
  errorHandler: ErrorRequestHandler;

  /** Compute the proxy base URL (origin plus mount path) for a request */
  getProxyBaseUrl: (req: Request) => string;
}

/**
 * Read a single string value from a parsed query. Repeated parameters use
 * the first occurrence.
 */
export function queryParam(query: Request['query'], name: string): string | undefined {
  const value = query[name];
  if (Array.isArray(value)) {
    const [first] = value;
    return typeof first === 'string' ? first : undefined;
  }
  return typeof value === 'string' ? value : undefined;
}

function hasClientErrorStatus(error: unknown): error is { status: number } {
  return (
    typeof error === 'object' &&
    error !== null &&
    'status' in error &&
    typeof error.status === 'number' &&
    error.status >= 400 &&
    error.status < 500
  );
}

/**
 * Create an Express adapter for the launch-context proxy.
 *
 * @example
 * ```typescript
 * import express from 'express';
 * import { createSmartProxy, resolveIdpMetadata } from 'smart-launch-proxy';
 * import { createExpressAdapter } from 'smart-launch-proxy/express';
 *
 * const proxy = createSmartProxy({ metadata: await resolveIdpMetadata({ authority }) });
 * const { routes, errorHandler } = createExpressAdapter(proxy, {
 *   baseUrl: 'https://fhir.example.com',
 * });
 *
 * const app = express();
 * app.use('/AadProxy', routes);
 * app.use(errorHandler);
 * ```
 */
export function createExpressAdapter(
  proxy: SmartProxy,
  options?: ExpressAdapterOptions
): ExpressAdapterResult {
  const logger = options?.logger ?? createConsoleLogger('info', 'express');

  const getProxyBaseUrl = (req: Request): string => {
    const origin = options?.baseUrl ?? `${req.protocol}://${req.get('host') ?? 'localhost'}`;
    return `${trimTrailingSlash(origin)}${options?.basePath ?? req.baseUrl}`;
  };

  const routes = Router();

  routes.get(PROXY_ROUTES.authorize, (req, res) => {
    const redirect = proxy.authorize(
      {
        response_type: queryParam(req.query, 'response_type'),
        client_id: queryParam(req.query, 'client_id'),
        redirect_uri: queryParam(req.query, 'redirect_uri'),
        launch: queryParam(req.query, 'launch'),
        scope: queryParam(req.query, 'scope'),
        state: queryParam(req.query, 'state'),
        aud: queryParam(req.query, 'aud'),
        code_challenge: queryParam(req.query, 'code_challenge'),
        code_challenge_method: queryParam(req.query, 'code_challenge_method'),
      },
      getProxyBaseUrl(req)
    );
    res.redirect(redirect.status, redirect.location);
  });

  routes.get(`${PROXY_ROUTES.callback}/:encodedRedirect`, (req, res) => {
    const redirect = proxy.callback({
      encodedRedirect: req.params['encodedRedirect'] ?? '',
      code: queryParam(req.query, 'code'),
      state: queryParam(req.query, 'state'),
      session_state: queryParam(req.query, 'session_state'),
      error: queryParam(req.query, 'error'),
      error_description: queryParam(req.query, 'error_description'),
    });
    res.redirect(redirect.status, redirect.location);
  });

  // Token requests are read as text so pass-through grants can be forwarded byte-for-byte
  const formBody: RequestHandler = express.text({ type: 'application/x-www-form-urlencoded' });

  routes.post(PROXY_ROUTES.token, formBody, async (req, res) => {
    const rawBody: unknown = req.body;
    const response = await proxy.token(
      {
        body: typeof rawBody === 'string' ? rawBody : '',
        authorization: req.get('authorization'),
      },
      getProxyBaseUrl(req)
    );
    res
      .status(response.status)
      .set('Cache-Control', 'no-store')
      .set('Pragma', 'no-cache')
      .type('application/json')
      .send(response.body);
  });

  routes.get(PROXY_ROUTES.smartConfiguration, (req, res) => {
    res.json(buildSmartConfiguration(getProxyBaseUrl(req)));
  });

  const errorHandler: ErrorRequestHandler = (err: unknown, _req, res, next) => {
    if (res.headersSent) {
      next(err);
      return;
    }

    if (err instanceof SmartProxyError) {
      if (err.status >= 500) {
        logger.error('Request failed', errorMeta(err));
      }
      res.status(err.status).json({ error: err.code, error_description: err.message });
      return;
    }

    if (hasClientErrorStatus(err)) {
      res.status(err.status).json({ error: 'invalid_request' });
      return;
    }

    logger.error('Unhandled error', errorMeta(err));
    res.status(500).json({ error: 'server_error', error_description: 'Internal server error' });
  };

  return { routes, errorHandler, getProxyBaseUrl };
}
