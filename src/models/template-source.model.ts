/** Raw template PDF, shared by every request and never mutated */
export interface TemplateDocument {
  readonly name: string;
  readonly bytes: Uint8Array;
}

/** Read-only template name -> template PDF lookup */
export interface TemplateStore {
  lookup(templateName: string): TemplateDocument | undefined;
  names(): readonly string[];
}
