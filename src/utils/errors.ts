export type ErrorCode = 'INVALID_INPUT' | 'CONFIGURATION' | 'UPLOAD_TIMEOUT' | 'NOT_FOUND';

export class NotionRagError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Malformed identifier, unknown label or bad request body. Nothing has been attempted yet. */
export class InvalidInputError extends NotionRagError {
  constructor(message: string) {
    super('INVALID_INPUT', message);
  }
}

/** Missing credential or unreadable settings; fatal before any work starts. */
export class ConfigurationError extends NotionRagError {
  constructor(message: string) {
    super('CONFIGURATION', message);
  }
}

export class NotFoundError extends NotionRagError {
  constructor(message: string) {
    super('NOT_FOUND', message);
  }
}

export class UploadTimeoutError extends NotionRagError {
  readonly attempts: number;

  constructor(documentName: string, attempts: number) {
    super('UPLOAD_TIMEOUT', `Upload of ${documentName} did not complete after ${attempts} polls`);
    this.attempts = attempts;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}
