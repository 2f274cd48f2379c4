/**
 * Rule-Based Contract Extractor
 *
 * Applies the pattern-driven field rules to the full document text and
 * scores the record by coverage: populated fields / eleven.
 */

import {
  CONTRACT_FIELD_NAMES,
  type ContractFieldName,
  type ContractFieldValues,
  type ExtractedFields,
  type ExtractionMethod,
} from '../types';
import { DEFAULT_PATTERN_TABLES } from './patterns';
import { applyFieldRules, buildFieldRules } from './rules';
import type { ContractFieldExtractor, ContractPatternTables, FieldRuleTable } from './types';

/**
 * Algorithm version for tracking
 */
export const ALGORITHM_VERSION = '1.0.0';

export function isFieldPopulated(values: ContractFieldValues, field: ContractFieldName): boolean {
  const value = values[field];
  if (value === null) return false;
  if (Array.isArray(value) || typeof value === 'string') return value.length > 0;
  return true;
}

/**
 * Share of the eleven fields that were populated, in [0, 1].
 */
export function computeConfidence(values: ContractFieldValues): number {
  const populated = CONTRACT_FIELD_NAMES.filter((field) => isFieldPopulated(values, field)).length;
  return populated / CONTRACT_FIELD_NAMES.length;
}

export class RuleBasedExtractor implements ContractFieldExtractor {
  readonly method: ExtractionMethod = 'rule-based';
  readonly description = 'Pattern-based extraction of parties, dates, terms, clauses and signatories';

  private readonly tables: ContractPatternTables;
  private readonly rules: FieldRuleTable;

  constructor(tables: ContractPatternTables = DEFAULT_PATTERN_TABLES) {
    this.tables = tables;
    this.rules = buildFieldRules(tables);
  }

  extract(fullText: string): ExtractedFields {
    const values = applyFieldRules(this.rules, fullText, this.tables.parties.maxParties);

    return {
      ...values,
      extraction_method: this.method,
      confidence_score: computeConfidence(values),
    };
  }
}

export const ruleBasedExtractor = new RuleBasedExtractor();
