export type TextAlign = 'left' | 'center';

export interface StaticFieldSpec {
  readonly page: number;    // 1-indexed
  readonly x: number;       // PDF points from left
  readonly y: number;       // PDF points from bottom
  readonly align: TextAlign;
}

export interface ItemColumns {
  readonly name_x: number;
  readonly qty_x: number;
  readonly price_x: number;
  readonly total_x: number;
}

export interface ItemsSectionSpec {
  readonly page: number;
  readonly start_y: number;
  readonly line_height: number;
  readonly columns: ItemColumns;
}

export interface CoordinateSpec {
  /** Declaration order is the draw order */
  readonly static_fields: Readonly<Record<string, StaticFieldSpec>>;
  readonly items_section?: ItemsSectionSpec;
}

/** Read-only template name -> coordinate spec lookup */
export interface CoordinateCatalog {
  lookup(templateName: string): CoordinateSpec | undefined;
  names(): readonly string[];
}
