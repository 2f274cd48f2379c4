/**
 * Extractor Registry
 *
 * Registry pattern for contract field extractors, keyed by extraction
 * method.
 */

import { UnsupportedExtractionMethodError } from '../errors';
import { logger } from '../logger';
import type { ExtractionMethod } from '../types';
import type { ContractFieldExtractor } from './types';

const extractorRegistry = new Map<ExtractionMethod, ContractFieldExtractor>();

/**
 * Register an extractor for its method.
 * Overwrites any existing extractor for that method.
 */
export function registerExtractor(extractor: ContractFieldExtractor): void {
  extractorRegistry.set(extractor.method, extractor);

  logger.debug('Registered extractor', {
    extraction_method: extractor.method,
    description: extractor.description,
  });
}

export function getExtractor(method: ExtractionMethod): ContractFieldExtractor | undefined {
  return extractorRegistry.get(method);
}

/**
 * Get the extractor for a method, throwing if not found.
 *
 * @throws UnsupportedExtractionMethodError if nothing is registered for that method
 */
export function getExtractorOrThrow(method: ExtractionMethod): ContractFieldExtractor {
  const extractor = extractorRegistry.get(method);
  if (!extractor) {
    throw new UnsupportedExtractionMethodError(method);
  }
  return extractor;
}

export function hasExtractor(method: ExtractionMethod): boolean {
  return extractorRegistry.has(method);
}

export function getRegisteredMethods(): ExtractionMethod[] {
  return Array.from(extractorRegistry.keys());
}

/**
 * Clear all registered extractors.
 * Useful for testing.
 */
export function clearRegistry(): void {
  extractorRegistry.clear();
}
