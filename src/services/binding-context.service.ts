import type { BindingWarning, ContextScalar, ContextValue, ItemRow, RawContext } from '../models/context.model';

const DOC_DATE_FIELD = 'doc_date';
const DAY_MONTH_YEAR = /^(\d{1,2})-(\d{1,2})-(\d{4})$/;

/** Typed, read-only view over one request's context */
export class BindingContext {
  private readonly fields: ReadonlyMap<string, ContextScalar>;
  private readonly rows: readonly ItemRow[];

  constructor(raw: RawContext) {
    const fields = new Map<string, ContextScalar>();
    let rows: readonly ItemRow[] = [];
    for (const [name, value] of Object.entries(raw)) {
      if (Array.isArray(value)) {
        if (name === 'items') rows = value;
      } else {
        fields.set(name, value);
      }
    }
    this.fields = fields;
    this.rows = rows;
  }

  text(name: string): string | undefined {
    return this.fields.has(name) ? formatScalar(this.fields.get(name)) : undefined;
  }

  items(): readonly ItemRow[] {
    return this.rows;
  }

  total(): ContextScalar | undefined {
    return this.fields.get('total');
  }
}

export interface PreparedContext {
  readonly context: BindingContext;
  readonly warnings: readonly BindingWarning[];
}

/**
 * Build the binding context for a request: derives `customer_full_address`
 * and sanity-checks `doc_date`. The caller's object is left untouched.
 */
export function createBindingContext(raw: RawContext): PreparedContext {
  const derived: Record<string, ContextValue> = { ...raw };
  const warnings: BindingWarning[] = [];

  const address = raw.customer_address;
  const city = raw.customer_city;
  if (address !== undefined && city !== undefined && !Array.isArray(address) && !Array.isArray(city)) {
    derived.customer_full_address = `${formatScalar(address)}, ${formatScalar(city)}`;
  }

  const docDate = raw[DOC_DATE_FIELD];
  if (docDate !== undefined && !Array.isArray(docDate)) {
    const text = formatScalar(docDate);
    if (!isDayMonthYear(text)) {
      warnings.push({
        field: DOC_DATE_FIELD,
        value: text,
        message: `Could not validate ${DOC_DATE_FIELD} format: '${text}'. Using original value.`,
      });
    }
  }

  return { context: new BindingContext(derived), warnings };
}

/** D-M-YYYY or DD-MM-YYYY naming a real calendar day */
export function isDayMonthYear(text: string): boolean {
  const match = DAY_MONTH_YEAR.exec(text);
  if (!match) return false;

  const day = Number(match[1]);
  const month = Number(match[2]);
  const year = Number(match[3]);
  if (month < 1 || month > 12 || day < 1) return false;

  const daysInMonth = new Date(Date.UTC(year, month, 0)).getUTCDate();
  return day <= daysInMonth;
}

export function formatScalar(value: ContextScalar | undefined): string {
  if (value === undefined || value === null) return '';
  return String(value);
}
