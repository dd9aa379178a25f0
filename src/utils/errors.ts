export type ErrorCode =
  | 'VALIDATION_FAILED'
  | 'UNAUTHORIZED'
  | 'TEMPLATE_NOT_FOUND'
  | 'SPEC_NOT_FOUND'
  | 'DOCUMENT_NOT_FOUND'
  | 'NOT_CONFIGURED'
  | 'STORAGE_FAILURE';

/** Errors that are safe to show to the caller as-is */
export class AppError extends Error {
  constructor(
    message: string,
    readonly status: number,
    readonly code: ErrorCode,
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class UnauthorizedError extends AppError {
  constructor() {
    super('Unauthorized', 401, 'UNAUTHORIZED');
  }
}

export class SpecNotFoundError extends AppError {
  constructor(readonly templateName: string) {
    super(`Coordinates for template '${templateName}' not found.`, 404, 'SPEC_NOT_FOUND');
  }
}

export class TemplateNotFoundError extends AppError {
  constructor(readonly templateName: string) {
    super(`Template PDF '${templateName}.pdf' not found.`, 404, 'TEMPLATE_NOT_FOUND');
  }
}

export class DocumentNotFoundError extends AppError {
  constructor(readonly customerId: string) {
    super(`No documents stored for customer '${customerId}'.`, 404, 'DOCUMENT_NOT_FOUND');
  }
}

export class NotConfiguredError extends AppError {
  constructor(message = 'Server is not configured correctly. Cannot connect to storage.') {
    super(message, 500, 'NOT_CONFIGURED');
  }
}

/** Upload/list/download failure; `cause` keeps the driver error for the logs */
export class StorageError extends AppError {
  constructor(readonly operation: string, readonly key: string, readonly cause: unknown) {
    super(`Storage ${operation} failed.`, 500, 'STORAGE_FAILURE');
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
