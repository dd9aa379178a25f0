import { Router, type NextFunction, type Request, type Response } from 'express';
import { PDFDocument } from 'pdf-lib';
import type { ResourceRegistry } from '../services/registry.service';

export function createTemplatesRouter(registry: ResourceRegistry): Router {
  const router = Router();

  /** GET /api/templates - Templates that have both coordinates and a PDF */
  router.get('/', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      const { catalog, templates } = registry.require();
      const data: { name: string; pageCount: number }[] = [];

      for (const name of catalog.names()) {
        const template = templates.lookup(name);
        if (!template) continue;
        const pdf = await PDFDocument.load(template.bytes);
        data.push({ name, pageCount: pdf.getPageCount() });
      }

      res.json({ success: true, data });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
