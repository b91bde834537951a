/**
 * CORS middleware for browser-based SMART apps.
 */

import type { RequestHandler } from 'express';

/**
 * Headers SMART clients send to the proxy.
 */
const DEFAULT_ALLOWED_HEADERS = ['Content-Type', 'Authorization'];

/**
 * CORS configuration options.
 */
export interface CorsOptions {
  /**
   * Origins allowed to call the proxy. `'*'` allows any origin.
   * Default: none (no CORS headers are added for cross-origin requests).
   */
  allowedOrigins?: string[];
}

/**
 * Create CORS middleware for the proxy.
 *
 * Public SMART clients running in the browser post to the token endpoint
 * cross-origin; authorize and callback are top-level navigations and do not
 * need CORS.
 */
export function createCorsMiddleware(options?: CorsOptions): RequestHandler {
  const allowedOrigins = options?.allowedOrigins ?? [];
  const allowAny = allowedOrigins.includes('*');
  const allowedHeaders = DEFAULT_ALLOWED_HEADERS.join(', ');

  return (req, res, next) => {
    const origin = req.headers.origin;
    const isAllowed = origin !== undefined && (allowAny || allowedOrigins.includes(origin));

    if (isAllowed) {
      res.setHeader('Access-Control-Allow-Origin', allowAny ? '*' : origin);
      res.setHeader('Access-Control-Allow-Headers', allowedHeaders);
      res.setHeader('Access-Control-Allow-Methods', 'GET, POST, OPTIONS');
      res.setHeader('Access-Control-Max-Age', '86400');
      if (!allowAny) {
        res.setHeader('Vary', 'Origin');
      }
    }

    // Handle preflight requests
    if (req.method === 'OPTIONS') {
      res.status(204).end();
      return;
    }

    next();
  };
}
