/**
 * JSON Schema Validation
 *
 * Schema validation using Ajv for the extraction response.
 */

import fs from 'fs';
import path from 'path';
import Ajv2020, { type ValidateFunction } from 'ajv/dist/2020';
import addFormats from 'ajv-formats';
import { logger } from './logger';

// Initialize Ajv with 2020-12 draft support
const ajv = new Ajv2020({
  strict: false, // Allow additional keywords from JSON Schema draft
  allErrors: true,
  verbose: true,
});
addFormats(ajv);

// Schema loading - lazy loaded on first use
let extractionResponseValidator: ValidateFunction | null = null;

function loadSchema(schemaName: string): object {
  const possiblePaths = [
    // Relative to shared package sources
    path.join(__dirname, '../../../docs/contracts', schemaName),
    // Relative to shared package dist
    path.join(__dirname, '../../../../docs/contracts', schemaName),
    // Relative to project root (for Docker containers)
    path.join(process.cwd(), 'docs/contracts', schemaName),
  ];

  for (const schemaPath of possiblePaths) {
    if (fs.existsSync(schemaPath)) {
      const parsed: unknown = JSON.parse(fs.readFileSync(schemaPath, 'utf-8'));
      if (parsed !== null && typeof parsed === 'object') {
        return parsed;
      }
      logger.warn('Schema file is not a JSON object', { schemaPath });
    }
  }

  // Permissive schema if the file is not shipped with the container
  logger.warn(`Schema file not found: ${schemaName}, using permissive validation`);
  return { type: 'object' };
}

function getExtractionResponseValidator(): ValidateFunction {
  if (!extractionResponseValidator) {
    extractionResponseValidator = ajv.compile(loadSchema('extraction_response.schema.json'));
  }
  return extractionResponseValidator;
}

export interface ValidationResult {
  valid: boolean;
  errors?: string[];
}

/**
 * Validate an extraction response against extraction_response.schema.json
 */
export function validateExtractResponse(data: unknown): ValidationResult {
  const validate = getExtractionResponseValidator();
  const valid = validate(data);

  if (!valid) {
    const errors = validate.errors?.map((e) => `${e.instancePath || '/'}: ${e.message}`);
    logger.warn('Extraction response validation failed', { errors });
    return { valid: false, errors };
  }

  return { valid: true };
}
