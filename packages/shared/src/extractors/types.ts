/**
 * Contract Field Extractor Types
 *
 * Each field is recognised by an ordered list of small pure matchers.
 * Scalar fields keep the first matcher result; list fields (parties,
 * signatories) collect candidates from every matcher and merge them.
 */

import type {
  ContractFieldValues,
  CurrencyCode,
  ExtractedFields,
  ExtractionMethod,
  LiabilityCap,
  SectionFieldName,
  Signatory,
} from '../types';

/**
 * A matcher variant for a single-valued field
 */
export type FieldMatcher<T> = (text: string) => T | null;

/**
 * A value found at a position in the text. `start`/`end` delimit the
 * whole pattern match that produced it.
 */
export interface Candidate<T> {
  value: T;
  start: number;
  end: number;
}

/**
 * A matcher variant for a multi-valued field
 */
export type CandidateMatcher<T> = (text: string) => Candidate<T>[];

export interface FieldRuleTable {
  parties: readonly CandidateMatcher<string>[];
  effective_date: readonly FieldMatcher<string>[];
  term: readonly FieldMatcher<string>[];
  governing_law: readonly FieldMatcher<string>[];
  payment_terms: readonly FieldMatcher<string>[];
  termination: readonly FieldMatcher<string>[];
  auto_renewal: readonly FieldMatcher<string>[];
  confidentiality: readonly FieldMatcher<string>[];
  indemnity: readonly FieldMatcher<string>[];
  liability_cap: readonly FieldMatcher<LiabilityCap>[];
  signatories: readonly CandidateMatcher<Signatory>[];
}

// ============================================================================
// Pattern Tables
// ============================================================================

export interface PartyPatterns {
  /** Global patterns; every defined capture group is a party name */
  templates: readonly RegExp[];
  scanLength: number;
  maxParties: number;
  minNameLength: number;
}

export interface DatePatterns {
  /** Global pattern for keywords that precede a date */
  anchors: RegExp;
  /** Date formats, tried in order */
  formats: readonly RegExp[];
  scanLength: number;
  windowLength: number;
}

export interface TermPatterns {
  /** Capture group 1 is the duration phrase */
  patterns: readonly RegExp[];
  scanLength: number;
}

export interface GoverningLawPatterns {
  anchor: RegExp;
  /** Applied to the text right after the anchor; group 1 is the jurisdiction */
  jurisdiction: RegExp;
  /** Fallback over the whole text; group 1 is the jurisdiction */
  governedBy: RegExp;
  /** First words that mean the capture is a sentence, not a place */
  rejectedLeadWords: readonly string[];
  windowLength: number;
}

export interface SectionPatterns {
  anchors: Readonly<Record<SectionFieldName, readonly RegExp[]>>;
  maxLength: number;
}

export interface LiabilityCapPatterns {
  /** Global pattern for liability keywords */
  anchor: RegExp;
  /** Global pattern; group 1 is the currency token, group 2 the amount */
  amount: RegExp;
  currencies: Readonly<Record<string, CurrencyCode>>;
  windowAfter: number;
  windowBefore: number;
}

export interface SignatoryPattern {
  /** Global pattern; group 1 is the name, group 2 the title */
  pattern: RegExp;
  requireTitleKeyword: boolean;
}

export interface SignatoryPatterns {
  patterns: readonly SignatoryPattern[];
  titleKeywords: RegExp;
  windowLength: number;
}

export interface ContractPatternTables {
  parties: PartyPatterns;
  effectiveDate: DatePatterns;
  term: TermPatterns;
  governingLaw: GoverningLawPatterns;
  sections: SectionPatterns;
  liabilityCap: LiabilityCapPatterns;
  signatories: SignatoryPatterns;
}

// ============================================================================
// Extractors
// ============================================================================

/**
 * An extraction engine producing the contract record from full text
 */
export interface ContractFieldExtractor {
  readonly method: ExtractionMethod;
  readonly description: string;
  extract(fullText: string): ExtractedFields;
}

export type { ContractFieldValues };
