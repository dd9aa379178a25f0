import http from 'http';
import { createApp } from './app';
import { config } from './config';
import { createBlobStore } from './services/blob-stores';
import { initRegistry, ResourceRegistry } from './services/registry.service';
import { logger } from './utils/logger';

const registry = new ResourceRegistry();

const app = createApp({
  registry,
  apiKey: config.apiKey,
});
const server = http.createServer(app);

if (!config.apiKey) {
  logger.fatal('API_KEY environment variable is not set, every API request will be rejected');
}

// Requests arriving before this settles get a "not configured" response
initRegistry(registry, createBlobStore(), {
  coordinatesKey: config.coordinatesKey,
  templatesPrefix: config.templatesPrefix,
}).catch((error: unknown) => {
  registry.markUnconfigured();
  logger.fatal({ err: error }, 'Resource initialisation failed');
});

// Start server
server.listen(config.port, config.host, () => {
  logger.info({ port: config.port, host: config.host, version: config.version }, 'Contract stamper started');
});

export { app, server, registry };
