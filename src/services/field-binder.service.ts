import type { CoordinateCatalog } from '../models/coordinate-spec.model';
import type { FieldInstruction, PageInstructions } from '../models/field-instruction.model';
import { err, ok, type Result } from '../models/result.model';
import { SpecNotFoundError } from '../utils/errors';
import type { BindingContext } from './binding-context.service';

/**
 * Resolve a template's coordinate spec against the context and group the
 * resulting draw instructions by 0-indexed page.
 *
 * Fields the context does not carry are skipped. The items table (and its
 * total) is emitted only when the template declares one and there are rows.
 */
export function bindFields(
  catalog: CoordinateCatalog,
  templateName: string,
  context: BindingContext,
): Result<PageInstructions, SpecNotFoundError> {
  const spec = catalog.lookup(templateName);
  if (!spec) {
    return err(new SpecNotFoundError(templateName));
  }

  const pages = new Map<number, FieldInstruction[]>();
  const pageSlot = (page: number): FieldInstruction[] => {
    const index = page - 1;
    const existing = pages.get(index);
    if (existing) return existing;
    const created: FieldInstruction[] = [];
    pages.set(index, created);
    return created;
  };

  for (const [fieldName, field] of Object.entries(spec.static_fields)) {
    const text = context.text(fieldName);
    if (text === undefined) continue;
    pageSlot(field.page).push({
      kind: 'static_text',
      text,
      x: field.x,
      y: field.y,
      align: field.align,
    });
  }

  const section = spec.items_section;
  const rows = context.items();
  if (section && rows.length > 0) {
    pageSlot(section.page).push(
      {
        kind: 'items_list',
        rows,
        columns: section.columns,
        start_y: section.start_y,
        line_height: section.line_height,
      },
      {
        kind: 'final_total',
        value: context.total(),
        x: section.columns.name_x,
        line_height: section.line_height,
      },
    );
  }

  return ok(pages);
}
