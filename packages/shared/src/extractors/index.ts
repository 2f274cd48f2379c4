/**
 * Contract Field Extractors
 *
 * The rule-based engine is registered on import.
 */

import { config } from '../config';
import { DEFAULT_PATTERN_TABLES, createPatternTables } from './patterns';
import { registerExtractor } from './registry';
import { RuleBasedExtractor } from './rule-based-extractor';

export type {
  Candidate,
  CandidateMatcher,
  ContractFieldExtractor,
  ContractPatternTables,
  DatePatterns,
  FieldMatcher,
  FieldRuleTable,
  GoverningLawPatterns,
  LiabilityCapPatterns,
  PartyPatterns,
  SectionPatterns,
  SignatoryPattern,
  SignatoryPatterns,
  TermPatterns,
} from './types';

export { DEFAULT_PATTERN_TABLES, createPatternTables, deepFreeze } from './patterns';

export {
  applyFieldRules,
  buildFieldRules,
  mergeCandidates,
  normalizeName,
  parseMoney,
  sentenceAround,
} from './rules';

export {
  ALGORITHM_VERSION,
  RuleBasedExtractor,
  computeConfidence,
  isFieldPopulated,
  ruleBasedExtractor,
} from './rule-based-extractor';

export {
  registerExtractor,
  getExtractor,
  getExtractorOrThrow,
  hasExtractor,
  getRegisteredMethods,
  clearRegistry,
} from './registry';

/**
 * Register the built-in extractors. Safe to call more than once.
 * The rule-based engine picks up SIGNATORY_WINDOW from configuration.
 */
export function registerAllExtractors(): void {
  const tables = createPatternTables({
    signatories: { ...DEFAULT_PATTERN_TABLES.signatories, windowLength: config.signatoryWindow },
  });
  registerExtractor(new RuleBasedExtractor(tables));
}

registerAllExtractors();
