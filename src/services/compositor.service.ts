import { PDFDocument, type PDFFont } from 'pdf-lib';
import type { PageInstructions } from '../models/field-instruction.model';
import type { TemplateDocument } from '../models/template-source.model';
import { logger } from '../utils/logger';
import { layoutOverlay, OVERLAY_FONT, overlayFont, renderOverlay, type OverlayFont } from './overlay.service';

export interface StampedDocument {
  readonly templateName: string;
  readonly pdf: PDFDocument;
  /** 0-indexed pages that received an overlay */
  readonly stampedPages: readonly number[];
}

/**
 * Stamp a fresh copy of the template: each page with instructions gets its
 * text drawn on top of the existing content. Page count and order are
 * those of the template.
 */
export async function compositeTemplate(
  template: TemplateDocument,
  instructions: PageInstructions,
): Promise<StampedDocument> {
  const pdf = await PDFDocument.load(template.bytes);
  const pages = pdf.getPages();
  const stampedPages: number[] = [];
  let font: { pdf: PDFFont; layout: OverlayFont } | undefined;

  for (const [index, pageInstructions] of [...instructions].sort(([a], [b]) => a - b)) {
    const page = pages[index];
    if (!page) {
      logger.warn(
        { template: template.name, page: index + 1, pageCount: pages.length },
        'Coordinates reference a page the template does not have, skipping',
      );
      continue;
    }

    if (!font) {
      const embedded = await pdf.embedFont(OVERLAY_FONT);
      font = { pdf: embedded, layout: overlayFont(embedded) };
    }

    const draws = layoutOverlay(pageInstructions, font.layout);
    if (draws.length === 0) continue;

    renderOverlay(page, draws, font.pdf);
    stampedPages.push(index);
  }

  return { templateName: template.name, pdf, stampedPages };
}
