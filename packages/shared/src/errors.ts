/**
 * Error Types
 *
 * Each error carries a stable machine-readable code that the HTTP layer
 * copies into the error envelope.
 */

export type ErrorCode =
  | 'invalid_configuration'
  | 'not_found'
  | 'no_text'
  | 'invalid_request'
  | 'unsupported_method';

export class ContractIntelError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

/**
 * Raised eagerly by the Chunker when chunk size or overlap is unusable.
 */
export class InvalidConfigurationError extends ContractIntelError {
  constructor(message: string) {
    super('invalid_configuration', message);
  }
}

export class DocumentNotFoundError extends ContractIntelError {
  readonly documentId: string;

  constructor(documentId: string) {
    super('not_found', `Document with ID ${documentId} not found`);
    this.documentId = documentId;
  }
}

/**
 * The document exists but no text is stored for it, so extraction cannot run.
 */
export class NoTextAvailableError extends ContractIntelError {
  readonly documentId: string;

  constructor(documentId: string) {
    super('no_text', `No text content found for document ${documentId}`);
    this.documentId = documentId;
  }
}

/**
 * A request body, query string or upload that the API cannot accept.
 */
export class InvalidRequestError extends ContractIntelError {
  constructor(message: string) {
    super('invalid_request', message);
  }
}

export class UnsupportedExtractionMethodError extends ContractIntelError {
  constructor(method: string) {
    super('unsupported_method', `No extractor registered for extraction method: ${method}`);
  }
}

export function isContractIntelError(error: unknown): error is ContractIntelError {
  return error instanceof ContractIntelError;
}
