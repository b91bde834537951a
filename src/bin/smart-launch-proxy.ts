#!/usr/bin/env node
import dotenv from 'dotenv';
import { loadProxyConfig } from '../core/env.js';
import { resolveIdpMetadata } from '../core/resolver.js';
import { createProxyServer } from '../express/server.js';
import { createConsoleLogger } from '../utils/logger.js';

const HELP = `
smart-launch-proxy - SMART on FHIR launch-context proxy

Usage:
  smart-launch-proxy [options]

Options:
  -h, --help      Show this help message

Environment:
  SMART_PROXY_AUTHORITY      Identity provider authority (required)
  SMART_PROXY_CLIENT_ID      Client id written into token responses
  SMART_PROXY_ENABLED        Mount the proxy routes (default: true)
  SMART_PROXY_BASE_URL       Externally visible origin (default: http://localhost:$PORT)
  SMART_PROXY_BASE_PATH      Mount path of the proxy routes (default: /)
  SMART_PROXY_CORS_ORIGINS   Comma separated origins allowed to call the proxy
  SMART_PROXY_LAUNCH_FIELDS  Comma separated launch context keys to forward
  PORT                       Port to listen on (default: 4000)
  LOG_LEVEL                  debug, info, warn or error (default: info)
`;

async function main(): Promise<void> {
  const args = process.argv.slice(2);
  if (args.includes('--help') || args.includes('-h')) {
    console.log(HELP);
    return;
  }

  dotenv.config();

  const config = loadProxyConfig();
  const logger = createConsoleLogger(config.logLevel, 'smart-proxy');

  const metadata = await resolveIdpMetadata({ authority: config.authority, logger });

  const server = createProxyServer({
    metadata,
    clientId: config.clientId,
    enabled: config.enabled,
    port: config.port,
    baseUrl: config.baseUrl,
    basePath: config.basePath,
    corsOrigins: config.corsOrigins,
    launchContextFields: config.launchContextFields,
    logger,
    onListen: (port, baseUrl) => {
      logger.info('SMART launch proxy listening', {
        port,
        authorize: `${baseUrl}${config.basePath}/authorize`,
        token: `${baseUrl}${config.basePath}/token`,
      });
    },
  });

  await server.start();
}

main().catch((error: unknown) => {
  console.error('Failed to start SMART launch proxy:', error);
  process.exit(1);
});
