import { Router, type NextFunction, type Request, type Response } from 'express';
import { buildArchive } from '../services/archive.service';
import { fetchAllDocuments, fetchLatestDocument, PDF_CONTENT_TYPE } from '../services/document-storage.service';
import { generateDocument } from '../services/document.service';
import type { ResourceRegistry } from '../services/registry.service';
import { customerIdSchema, generateRequestSchema } from '../validators/generate.validator';

export interface DocumentsRouterOptions {
  readonly registry: ResourceRegistry;
  readonly contractsPrefix: string;
  readonly now?: () => Date;
}

export function createDocumentsRouter(options: DocumentsRouterOptions): Router {
  const { registry, contractsPrefix } = options;
  const router = Router();

  /** POST /api/documents/merge - Stamp templates, merge, store and return the PDF */
  router.post('/merge', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const resources = registry.require();
      const parsed = generateRequestSchema.parse(req.body);

      const document = await generateDocument(
        { templateNames: parsed.template_names, context: parsed.context },
        { resources, contractsPrefix, log: req.log, now: options.now },
      );

      res.setHeader('Content-Type', PDF_CONTENT_TYPE);
      res.setHeader('Content-Disposition', 'attachment; filename="merged_document.pdf"');
      res.setHeader('X-Document-Key', document.key);
      res.send(Buffer.from(document.bytes));
    } catch (error) {
      next(error);
    }
  });

  /** GET /api/documents/:customerId/latest - Most recently stored PDF */
  router.get('/:customerId/latest', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { store } = registry.require();
      const customerId = customerIdSchema.parse(req.params.customerId);
      const document = await fetchLatestDocument(store, contractsPrefix, customerId);

      res.setHeader('Content-Type', PDF_CONTENT_TYPE);
      res.setHeader('Content-Disposition', `attachment; filename="${document.fileName}"`);
      res.send(document.bytes);
    } catch (error) {
      next(error);
    }
  });

  /** GET /api/documents/:customerId/archive - Every stored PDF as a zip */
  router.get('/:customerId/archive', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { store } = registry.require();
      const customerId = customerIdSchema.parse(req.params.customerId);
      const documents = await fetchAllDocuments(store, contractsPrefix, customerId);
      const archive = await buildArchive(documents);

      req.log.info({ customerId, count: documents.length }, 'Archive built');
      res.setHeader('Content-Type', 'application/zip');
      res.setHeader('Content-Disposition', `attachment; filename="contracts_${customerId}.zip"`);
      res.send(archive);
    } catch (error) {
      next(error);
    }
  });

  return router;
}
