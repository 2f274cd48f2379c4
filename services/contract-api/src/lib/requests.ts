/**
 * Request Parsing
 *
 * Narrows untyped request bodies and query strings into the inputs the
 * service expects.
 */

import { InvalidRequestError, type ErrorCode } from '@contract-intel/shared';

export const DEFAULT_PAGE_LIMIT = 20;
export const MAX_PAGE_LIMIT = 100;
export const DEFAULT_MAX_RESULTS = 5;
export const MAX_SEARCH_RESULTS = 20;

export interface Pagination {
  limit: number;
  offset: number;
}

export interface SearchRequest {
  query: string;
  document_ids: string[] | null;
  max_results: number;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseNonNegativeInt(value: unknown, name: string, fallback: number): number {
  if (value === undefined || value === '') return fallback;
  if (typeof value !== 'string' || !/^\d+$/.test(value)) {
    throw new InvalidRequestError(`${name} must be a non-negative integer`);
  }
  return parseInt(value, 10);
}

export function parsePagination(query: Record<string, unknown>): Pagination {
  const limit = parseNonNegativeInt(query.limit, 'limit', DEFAULT_PAGE_LIMIT);
  const offset = parseNonNegativeInt(query.offset, 'offset', 0);
  if (limit < 1 || limit > MAX_PAGE_LIMIT) {
    throw new InvalidRequestError(`limit must be between 1 and ${MAX_PAGE_LIMIT}`);
  }
  return { limit, offset };
}

export function parseDocumentId(body: unknown): string {
  if (!isRecord(body) || typeof body.document_id !== 'string' || body.document_id.trim() === '') {
    throw new InvalidRequestError('document_id is required');
  }
  return body.document_id.trim();
}

export function parseSearchRequest(body: unknown): SearchRequest {
  if (!isRecord(body) || typeof body.query !== 'string' || body.query.trim() === '') {
    throw new InvalidRequestError('query is required');
  }

  let documentIds: string[] | null = null;
  if (body.document_ids !== undefined && body.document_ids !== null) {
    const ids: unknown = body.document_ids;
    if (!Array.isArray(ids) || !ids.every((id): id is string => typeof id === 'string')) {
      throw new InvalidRequestError('document_ids must be an array of strings');
    }
    documentIds = ids;
  }

  let maxResults = DEFAULT_MAX_RESULTS;
  if (body.max_results !== undefined) {
    const value = body.max_results;
    if (
      typeof value !== 'number' ||
      !Number.isInteger(value) ||
      value < 1 ||
      value > MAX_SEARCH_RESULTS
    ) {
      throw new InvalidRequestError(`max_results must be an integer between 1 and ${MAX_SEARCH_RESULTS}`);
    }
    maxResults = value;
  }

  return { query: body.query, document_ids: documentIds, max_results: maxResults };
}

const STATUS_BY_CODE: Record<ErrorCode, number> = {
  invalid_request: 400,
  no_text: 400,
  unsupported_method: 400,
  not_found: 404,
  invalid_configuration: 500,
};

export function httpStatusFor(code: ErrorCode): number {
  return STATUS_BY_CODE[code];
}
