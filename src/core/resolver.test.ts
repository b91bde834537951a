import { describe, it, expect } from 'vitest';
import { isV2Authority, resolveIdpMetadata } from './resolver.js';
import { OpenIdConfigurationError } from './errors.js';
import { createMockFetch, createMockLogger, jsonResponse } from '../test/helpers/mock-fetch.js';
import {
  TEST_AUTHORITY,
  TEST_AUTHORITY_V2,
  TEST_AUTHORIZE_ENDPOINT,
  TEST_OPENID_CONFIGURATION_URL,
  TEST_TOKEN_ENDPOINT,
} from '../test/constants.js';

const openIdConfiguration = {
  issuer: 'https://sts.example.com/tenant-123/',
  authorization_endpoint: TEST_AUTHORIZE_ENDPOINT,
  token_endpoint: TEST_TOKEN_ENDPOINT,
  jwks_uri: 'https://login.example.com/tenant-123/discovery/keys',
};

describe('resolver', () => {
  describe('resolveIdpMetadata', () => {
    it('should read the endpoints from the discovery document', async () => {
      const { fetch, requests } = createMockFetch(() => jsonResponse(openIdConfiguration));

      const metadata = await resolveIdpMetadata({
        authority: TEST_AUTHORITY,
        fetch,
        logger: createMockLogger(),
      });

      expect(requests).toHaveLength(1);
      expect(requests[0]?.url).toBe(TEST_OPENID_CONFIGURATION_URL);
      expect(requests[0]?.method).toBe('GET');
      expect(metadata.authorizeEndpoint.href).toBe(TEST_AUTHORIZE_ENDPOINT);
      expect(metadata.tokenEndpoint.href).toBe(TEST_TOKEN_ENDPOINT);
      expect(metadata.isV2).toBe(false);
      expect(Object.isFrozen(metadata)).toBe(true);
    });

    it('should not double the slash for an authority ending in /', async () => {
      const { fetch, requests } = createMockFetch(() => jsonResponse(openIdConfiguration));

      await resolveIdpMetadata({ authority: `${TEST_AUTHORITY}/`, fetch, logger: createMockLogger() });

      expect(requests[0]?.url).toBe(TEST_OPENID_CONFIGURATION_URL);
    });

    it('should detect v2 authorities', async () => {
      const { fetch, requests } = createMockFetch(() => jsonResponse(openIdConfiguration));

      const metadata = await resolveIdpMetadata({
        authority: TEST_AUTHORITY_V2,
        fetch,
        logger: createMockLogger(),
      });

      expect(requests[0]?.url).toBe(
        'https://login.example.com/tenant-123/v2.0/.well-known/openid-configuration'
      );
      expect(metadata.isV2).toBe(true);
    });

    it('should log resolved endpoints', async () => {
      const { fetch } = createMockFetch(() => jsonResponse(openIdConfiguration));
      const logger = createMockLogger();

      await resolveIdpMetadata({ authority: TEST_AUTHORITY, fetch, logger });

      expect(logger.info).toHaveBeenCalledWith('Resolved identity provider endpoints', {
        authorizeEndpoint: TEST_AUTHORIZE_ENDPOINT,
        tokenEndpoint: TEST_TOKEN_ENDPOINT,
        isV2: false,
      });
    });

    it('should fail when the request fails', async () => {
      const { fetch } = createMockFetch(() => {
        throw new TypeError('fetch failed');
      });
      const logger = createMockLogger();

      const result = resolveIdpMetadata({ authority: TEST_AUTHORITY, fetch, logger });

      await expect(result).rejects.toBeInstanceOf(OpenIdConfigurationError);
      await expect(result).rejects.toThrow(
        `Unable to read OpenID configuration from "${TEST_OPENID_CONFIGURATION_URL}": request failed`
      );
      expect(logger.warn).toHaveBeenCalledWith('Failed to read the OpenID configuration', {
        url: TEST_OPENID_CONFIGURATION_URL,
        error: 'TypeError',
        message: 'fetch failed',
      });
    });

    it('should fail on a non-success status', async () => {
      const { fetch } = createMockFetch(() => jsonResponse({ error: 'not_found' }, 404));

      await expect(
        resolveIdpMetadata({ authority: TEST_AUTHORITY, fetch, logger: createMockLogger() })
      ).rejects.toThrow('unexpected status 404');
    });

    it('should fail on a body that is not JSON', async () => {
      const { fetch } = createMockFetch(() => new Response('<html></html>', { status: 200 }));

      await expect(
        resolveIdpMetadata({ authority: TEST_AUTHORITY, fetch, logger: createMockLogger() })
      ).rejects.toThrow('response is not valid JSON');
    });

    it('should fail on a JSON body that is not an object', async () => {
      const { fetch } = createMockFetch(() => jsonResponse([openIdConfiguration]));
      const logger = createMockLogger();

      await expect(
        resolveIdpMetadata({ authority: TEST_AUTHORITY, fetch, logger })
      ).rejects.toThrow('response is not a JSON object');
      expect(logger.warn).toHaveBeenCalledWith('OpenID configuration is not a JSON object', {
        url: TEST_OPENID_CONFIGURATION_URL,
      });
    });

    it('should fail when the token endpoint is missing', async () => {
      const { fetch } = createMockFetch(() =>
        jsonResponse({ authorization_endpoint: TEST_AUTHORIZE_ENDPOINT })
      );
      const logger = createMockLogger();

      await expect(
        resolveIdpMetadata({ authority: TEST_AUTHORITY, fetch, logger })
      ).rejects.toThrow('missing or invalid token_endpoint');
      expect(logger.warn).toHaveBeenCalledWith('OpenID configuration is missing an endpoint', {
        url: TEST_OPENID_CONFIGURATION_URL,
        field: 'token_endpoint',
      });
    });

    it('should fail when the authorization endpoint is not an absolute URL', async () => {
      const { fetch } = createMockFetch(() =>
        jsonResponse({ authorization_endpoint: '/oauth2/authorize', token_endpoint: TEST_TOKEN_ENDPOINT })
      );

      await expect(
        resolveIdpMetadata({ authority: TEST_AUTHORITY, fetch, logger: createMockLogger() })
      ).rejects.toThrow('missing or invalid authorization_endpoint');
    });

    it('should fail without a request when the authority is not a URL', async () => {
      const { fetch } = createMockFetch(() => jsonResponse(openIdConfiguration));
      const logger = createMockLogger();

      await expect(
        resolveIdpMetadata({ authority: 'login.example.com', fetch, logger })
      ).rejects.toThrow('authority is not an absolute URL');
      expect(fetch).not.toHaveBeenCalled();
      expect(logger.warn).toHaveBeenCalledWith('Identity provider authority is not an absolute URL', {
        authority: 'login.example.com',
      });
    });
  });

  describe('isV2Authority', () => {
    it('should match a v2.0 path segment', () => {
      expect(isV2Authority(new URL('https://login.example.com/tenant/v2.0'))).toBe(true);
      expect(isV2Authority(new URL('https://login.example.com/tenant/v2.0/'))).toBe(true);
    });

    it('should not match other paths', () => {
      expect(isV2Authority(new URL('https://login.example.com/tenant'))).toBe(false);
      expect(isV2Authority(new URL('https://login.example.com/tenant/v2.01'))).toBe(false);
    });
  });
});
