import { rgb, StandardFonts, type PDFFont, type PDFPage } from 'pdf-lib';
import type { FieldInstruction } from '../models/field-instruction.model';
import { formatScalar } from './binding-context.service';

export const OVERLAY_FONT = StandardFonts.Helvetica;
const OVERLAY_FONT_SIZE = 12;

const REPLACEMENT_CHAR = '?';

export interface TextDraw {
  readonly text: string;
  readonly x: number;
  readonly y: number;
}

/** What layout needs from a font */
export interface OverlayFont {
  /** Rendered width of already cleaned `text` in points */
  measure(text: string): number;
  /** Make `text` drawable in this font */
  clean(text: string): string;
}

/**
 * Collapse line breaks and tabs to spaces and swap any character the
 * font has no glyph for with '?'.
 */
export function sanitizeText(text: string, charset: ReadonlySet<number>): string {
  let cleaned = '';
  for (const char of text.replace(/[\r\n\t]+/g, ' ')) {
    const codePoint = char.codePointAt(0);
    cleaned += codePoint !== undefined && charset.has(codePoint) ? char : REPLACEMENT_CHAR;
  }
  return cleaned;
}

export function overlayFont(font: PDFFont): OverlayFont {
  const charset = new Set(font.getCharacterSet());
  return {
    measure: (text) => font.widthOfTextAtSize(text, OVERLAY_FONT_SIZE),
    clean: (text) => sanitizeText(text, charset),
  };
}

/**
 * Work out where every piece of text lands on the page.
 *
 * Rows run downwards from `start_y` with no page break; a long table
 * simply continues below the bottom edge.
 */
export function layoutOverlay(
  instructions: readonly FieldInstruction[],
  font: OverlayFont,
): TextDraw[] {
  const draws: TextDraw[] = [];
  let lastRowY: number | undefined;

  for (const instruction of instructions) {
    switch (instruction.kind) {
      case 'static_text': {
        const text = font.clean(instruction.text);
        const x = instruction.align === 'center'
          ? instruction.x - font.measure(text) / 2
          : instruction.x;
        draws.push({ text, x, y: instruction.y });
        break;
      }
      case 'items_list': {
        const { columns, line_height } = instruction;
        let y = instruction.start_y;
        for (const row of instruction.rows) {
          draws.push(
            { text: font.clean(formatScalar(row.name)), x: columns.name_x, y },
            { text: font.clean(formatScalar(row.qty)), x: columns.qty_x, y },
            { text: font.clean(formatScalar(row.price)), x: columns.price_x, y },
            { text: font.clean(formatScalar(row.total)), x: columns.total_x, y },
          );
          lastRowY = y;
          y -= line_height;
        }
        break;
      }
      case 'final_total': {
        const value = formatScalar(instruction.value);
        if (value === '' || lastRowY === undefined) break;
        draws.push({
          text: font.clean(`Total: ${value}`),
          x: instruction.x,
          y: lastRowY - 2 * instruction.line_height,
        });
        break;
      }
    }
  }

  return draws;
}

/**
 * Draw the laid-out text over whatever the page already shows. Nothing is
 * clipped to a fixed page box: coordinates are those of `page` itself.
 */
export function renderOverlay(page: PDFPage, draws: readonly TextDraw[], font: PDFFont): void {
  for (const draw of draws) {
    page.drawText(draw.text, {
      x: draw.x,
      y: draw.y,
      size: OVERLAY_FONT_SIZE,
      font,
      color: rgb(0, 0, 0),
    });
  }
}
