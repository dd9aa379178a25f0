import type { ContextScalar, ItemRow } from './context.model';
import type { ItemColumns, TextAlign } from './coordinate-spec.model';

export interface StaticTextInstruction {
  readonly kind: 'static_text';
  readonly text: string;
  readonly x: number;
  readonly y: number;
  readonly align: TextAlign;
}

export interface ItemsListInstruction {
  readonly kind: 'items_list';
  readonly rows: readonly ItemRow[];
  readonly columns: ItemColumns;
  readonly start_y: number;
  readonly line_height: number;
}

/** Placed relative to the last row drawn by the preceding items list */
export interface FinalTotalInstruction {
  readonly kind: 'final_total';
  readonly value: ContextScalar | undefined;
  readonly x: number;
  readonly line_height: number;
}

export type FieldInstruction = StaticTextInstruction | ItemsListInstruction | FinalTotalInstruction;

/** 0-indexed page -> instructions in draw order */
export type PageInstructions = ReadonlyMap<number, readonly FieldInstruction[]>;
