export type ContextScalar = string | number | boolean | null;

export interface ItemRow {
  readonly name?: ContextScalar;
  readonly qty?: ContextScalar;
  readonly price?: ContextScalar;
  readonly total?: ContextScalar;
}

export type ContextValue = ContextScalar | ItemRow[];

/** Caller-supplied context as it arrives in the request body */
export type RawContext = Readonly<Record<string, ContextValue>>;

export interface BindingWarning {
  readonly field: string;
  readonly value: string;
  readonly message: string;
}
