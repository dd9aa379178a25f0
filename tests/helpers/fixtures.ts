import { PageSizes, PDFDocument } from 'pdf-lib';
import type { CoordinateSpec } from '../../src/models/coordinate-spec.model';
import type { TemplateDocument } from '../../src/models/template-source.model';

/** Blank template with a page label on each page */
export async function makeTemplatePdf(
  pageCount: number,
  size: [number, number] = PageSizes.Letter,
): Promise<Uint8Array> {
  const pdf = await PDFDocument.create();
  for (let i = 0; i < pageCount; i++) {
    const page = pdf.addPage(size);
    page.drawText(`Template page ${i + 1}`, { x: 40, y: 40, size: 8 });
  }
  return pdf.save();
}

export async function makeTemplate(
  name: string,
  pageCount: number,
  size?: [number, number],
): Promise<TemplateDocument> {
  return { name, bytes: await makeTemplatePdf(pageCount, size) };
}

export const invoiceSpec: CoordinateSpec = {
  static_fields: {
    customer_name: { page: 1, x: 100, y: 720, align: 'left' },
  },
  items_section: {
    page: 1,
    start_y: 600,
    line_height: 20,
    columns: { name_x: 50, qty_x: 300, price_x: 380, total_x: 460 },
  },
};

export const contractSpec: CoordinateSpec = {
  static_fields: {
    doc_date: { page: 1, x: 450, y: 750, align: 'left' },
    customer_name: { page: 1, x: 306, y: 700, align: 'center' },
    customer_full_address: { page: 2, x: 72, y: 650, align: 'left' },
  },
};

/** coordinates.json as it would sit in the bucket */
export const catalogJson = JSON.stringify({
  invoice: invoiceSpec,
  contract: contractSpec,
});
