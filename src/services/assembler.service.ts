import { PDFDocument } from 'pdf-lib';
import type { StampedDocument } from './compositor.service';

export interface OutputDocument {
  readonly bytes: Uint8Array;
  readonly pageCount: number;
}

/** Concatenate stamped documents, in the order given, into one PDF */
export async function assembleDocuments(stamped: readonly StampedDocument[]): Promise<OutputDocument> {
  const output = await PDFDocument.create();

  for (const part of stamped) {
    const copied = await output.copyPages(part.pdf, part.pdf.getPageIndices());
    for (const page of copied) {
      output.addPage(page);
    }
  }

  const bytes = await output.save();
  return { bytes, pageCount: output.getPageCount() };
}
