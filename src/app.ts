import express, { type Express } from 'express';
import cors from 'cors';
import { config } from './config';
import { requireApiKey } from './middleware/api-key';
import { errorHandler } from './middleware/error-handler';
import { requestId } from './middleware/request-id';
import { createDocumentsRouter } from './routes/documents.routes';
import { createTemplatesRouter } from './routes/templates.routes';
import type { ResourceRegistry } from './services/registry.service';

export interface AppOptions {
  readonly registry: ResourceRegistry;
  readonly apiKey: string;
  readonly contractsPrefix?: string;
  readonly bodyLimit?: string;
  readonly now?: () => Date;
}

export function createApp(options: AppOptions): Express {
  const { registry } = options;
  const app = express();

  // Middleware
  app.use(requestId);
  app.use(cors());
  app.use(express.json({ limit: options.bodyLimit ?? config.bodyLimit }));

  // Health check (unauthenticated)
  app.get('/api/health', (_req, res) => {
    const resources = registry.peek();
    res.json({
      success: true,
      service: 'contract-stamper',
      version: config.version,
      uptime: process.uptime(),
      timestamp: new Date().toISOString(),
      status: registry.status,
      specs: resources ? resources.catalog.names().length : 0,
      templates: resources ? resources.templates.names().length : 0,
    });
  });

  // API Routes
  app.use('/api', requireApiKey(options.apiKey));
  app.use('/api/documents', createDocumentsRouter({
    registry,
    contractsPrefix: options.contractsPrefix ?? config.contractsPrefix,
    now: options.now,
  }));
  app.use('/api/templates', createTemplatesRouter(registry));

  app.use(errorHandler);

  return app;
}
