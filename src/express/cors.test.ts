import { describe, it, expect } from 'vitest';
import express from 'express';
import request from 'supertest';
import { createCorsMiddleware, type CorsOptions } from './cors.js';

const APP_ORIGIN = 'https://app.example.com';

function createApp(options?: CorsOptions) {
  const app = express();
  app.use(createCorsMiddleware(options));
  app.post('/token', (_req, res) => {
    res.json({ ok: true });
  });
  return app;
}

describe('cors', () => {
  describe('createCorsMiddleware', () => {
    it('should allow a configured origin', async () => {
      const response = await request(createApp({ allowedOrigins: [APP_ORIGIN] }))
        .post('/token')
        .set('Origin', APP_ORIGIN);

      expect(response.status).toBe(200);
      expect(response.headers['access-control-allow-origin']).toBe(APP_ORIGIN);
      expect(response.headers['access-control-allow-headers']).toBe('Content-Type, Authorization');
      expect(response.headers['access-control-allow-methods']).toBe('GET, POST, OPTIONS');
      expect(response.headers['access-control-max-age']).toBe('86400');
      expect(response.headers['vary']).toBe('Origin');
    });

    it('should not add headers for other origins', async () => {
      const response = await request(createApp({ allowedOrigins: [APP_ORIGIN] }))
        .post('/token')
        .set('Origin', 'https://evil.example.com');

      expect(response.status).toBe(200);
      expect(response.headers['access-control-allow-origin']).toBeUndefined();
    });

    it('should not add headers when no origins are configured', async () => {
      const response = await request(createApp()).post('/token').set('Origin', APP_ORIGIN);

      expect(response.headers['access-control-allow-origin']).toBeUndefined();
    });

    it('should allow any origin with a wildcard', async () => {
      const response = await request(createApp({ allowedOrigins: ['*'] }))
        .post('/token')
        .set('Origin', APP_ORIGIN);

      expect(response.headers['access-control-allow-origin']).toBe('*');
      expect(response.headers['vary']).toBeUndefined();
    });

    it('should answer preflight requests with 204', async () => {
      const response = await request(createApp({ allowedOrigins: [APP_ORIGIN] }))
        .options('/token')
        .set('Origin', APP_ORIGIN)
        .set('Access-Control-Request-Method', 'POST');

      expect(response.status).toBe(204);
      expect(response.headers['access-control-allow-origin']).toBe(APP_ORIGIN);
    });

    it('should end preflight requests without calling the route', async () => {
      const response = await request(createApp()).options('/token');

      expect(response.status).toBe(204);
      expect(response.text).toBe('');
    });
  });
});
