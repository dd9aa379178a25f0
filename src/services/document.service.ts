import type { RawContext } from '../models/context.model';
import { err, ok, type Result } from '../models/result.model';
import { AppError, SpecNotFoundError, StorageError, TemplateNotFoundError } from '../utils/errors';
import type { Logger } from '../utils/logger';
import { assembleDocuments } from './assembler.service';
import { createBindingContext, type BindingContext } from './binding-context.service';
import { compositeTemplate, type StampedDocument } from './compositor.service';
import { buildDocumentKey, PDF_CONTENT_TYPE, resolveCustomerId } from './document-storage.service';
import { bindFields } from './field-binder.service';
import type { Resources } from './registry.service';

export interface GenerateDocumentInput {
  readonly templateNames: readonly string[];
  readonly context: RawContext;
}

export interface GenerateDocumentDeps {
  readonly resources: Resources;
  readonly contractsPrefix: string;
  readonly log: Logger;
  readonly now?: () => Date;
}

export interface GeneratedDocument {
  readonly key: string;
  readonly customerId: string;
  readonly bytes: Uint8Array;
  readonly pageCount: number;
}

type ResolveError = SpecNotFoundError | TemplateNotFoundError;

/**
 * Stamp each template in turn. Stops at the first template that has no
 * coordinates or no PDF; nothing is produced in that case.
 */
export async function stampTemplates(
  resources: Pick<Resources, 'catalog' | 'templates'>,
  templateNames: readonly string[],
  context: BindingContext,
): Promise<Result<StampedDocument[], ResolveError>> {
  const stamped: StampedDocument[] = [];

  for (const templateName of templateNames) {
    const bound = bindFields(resources.catalog, templateName, context);
    if (!bound.ok) return bound;

    const template = resources.templates.lookup(templateName);
    if (!template) return err(new TemplateNotFoundError(templateName));

    stamped.push(await compositeTemplate(template, bound.value));
  }

  return ok(stamped);
}

/** Stamp, merge and file a document; the caller only gets it once it is stored */
export async function generateDocument(
  input: GenerateDocumentInput,
  deps: GenerateDocumentDeps,
): Promise<GeneratedDocument> {
  const { resources, log } = deps;
  const { context, warnings } = createBindingContext(input.context);
  for (const warning of warnings) {
    log.warn({ field: warning.field, value: warning.value }, warning.message);
  }

  const stamped = await stampTemplates(resources, input.templateNames, context);
  if (!stamped.ok) {
    throw stamped.error;
  }

  const output = await assembleDocuments(stamped.value);

  const customerId = resolveCustomerId(context);
  const key = buildDocumentKey(deps.contractsPrefix, customerId, (deps.now ?? (() => new Date()))());
  try {
    await resources.store.upload(key, output.bytes, PDF_CONTENT_TYPE);
  } catch (error) {
    throw error instanceof AppError ? error : new StorageError('upload', key, error);
  }

  log.info({ key, pages: output.pageCount, templates: input.templateNames }, 'Document stored');
  return { key, customerId, bytes: output.bytes, pageCount: output.pageCount };
}
