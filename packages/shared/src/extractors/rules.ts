/**
 * Contract Field Rules
 *
 * Builds the per-field matcher lists from a pattern table and applies them
 * to document text. Every matcher is a pure function of its input text;
 * a pattern that does not match yields null (or no candidates), never an
 * error.
 */

import { InvalidConfigurationError } from '../errors';
import type {
  ContractFieldValues,
  LiabilityCap,
  SectionFieldName,
  Signatory,
} from '../types';
import type {
  Candidate,
  CandidateMatcher,
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
} from './types';

const TRAILING_PUNCTUATION = /[\s,.;:]+$/;
const WRAPPING_QUOTES = /^["'“‘]+|["'”’]+$/g;
const SENTENCE_START = /[.!?]\s+|\n\s*\n/g;
const SENTENCE_END = /[.!?](?=\s|$)/;
/** Rest of the anchor word, then the heading's full stop */
const HEADING_REMAINDER = /^\w*\s*$/;

/** Case-insensitive, whitespace-normalised identity of a name */
export function normalizeName(name: string): string {
  return name.trim().toLowerCase().replace(/\s+/g, ' ');
}

function cleanName(raw: string): string {
  return raw
    .replace(/\s+/g, ' ')
    .trim()
    .replace(WRAPPING_QUOTES, '')
    .replace(TRAILING_PUNCTUATION, '')
    .trim();
}

function firstResult<T>(matchers: readonly FieldMatcher<T>[], text: string): T | null {
  for (const matcher of matchers) {
    const value = matcher(text);
    if (value !== null) return value;
  }
  return null;
}

/**
 * Merge candidates from ordered matchers. A candidate whose match overlaps
 * a match already accepted from an earlier matcher is dropped; survivors
 * are ordered by position and de-duplicated on `key`.
 */
export function mergeCandidates<T>(
  matchers: readonly CandidateMatcher<T>[],
  text: string,
  key: (value: T) => string
): T[] {
  const accepted: Candidate<T>[] = [];

  for (const matcher of matchers) {
    const claimed = [...accepted];
    for (const candidate of matcher(text)) {
      const overlaps = claimed.some((c) => candidate.start < c.end && c.start < candidate.end);
      if (!overlaps) accepted.push(candidate);
    }
  }

  accepted.sort((a, b) => a.start - b.start);

  const seen = new Set<string>();
  const values: T[] = [];
  for (const candidate of accepted) {
    const k = key(candidate.value);
    if (seen.has(k)) continue;
    seen.add(k);
    values.push(candidate.value);
  }
  return values;
}

// ============================================================================
// Parties
// ============================================================================

function partyTemplateMatcher(template: RegExp, patterns: PartyPatterns): CandidateMatcher<string> {
  return (text) => {
    const head = text.slice(0, patterns.scanLength);
    const candidates: Candidate<string>[] = [];

    for (const match of head.matchAll(template)) {
      const start = match.index ?? 0;
      const end = start + match[0].length;
      for (const group of match.slice(1)) {
        if (group === undefined) continue;
        const name = cleanName(group);
        if (name.length >= patterns.minNameLength) {
          candidates.push({ value: name, start, end });
        }
      }
    }

    return candidates;
  };
}

// ============================================================================
// Effective Date
// ============================================================================

function dateFormatMatcher(format: RegExp, patterns: DatePatterns): FieldMatcher<string> {
  return (text) => {
    const head = text.slice(0, patterns.scanLength);
    for (const anchor of head.matchAll(patterns.anchors)) {
      const from = (anchor.index ?? 0) + anchor[0].length;
      const match = format.exec(head.slice(from, from + patterns.windowLength));
      if (match) return match[0];
    }
    return null;
  };
}

// ============================================================================
// Term
// ============================================================================

function termMatcher(pattern: RegExp, scanLength: number): FieldMatcher<string> {
  return (text) => {
    const match = pattern.exec(text.slice(0, scanLength));
    return match && match[1] !== undefined ? match[1].trim() : null;
  };
}

// ============================================================================
// Governing Law
// ============================================================================

function cleanJurisdiction(raw: string, patterns: GoverningLawPatterns): string | null {
  const jurisdiction = raw.replace(/\s+Laws?$/i, '').trim();
  const leadWord = jurisdiction.split(/\s+/)[0];
  if (jurisdiction.length === 0 || patterns.rejectedLeadWords.includes(leadWord)) {
    return null;
  }
  return jurisdiction;
}

function governingLawAnchorMatcher(patterns: GoverningLawPatterns): FieldMatcher<string> {
  return (text) => {
    const anchor = patterns.anchor.exec(text);
    if (!anchor) return null;
    const from = anchor.index + anchor[0].length;
    const match = patterns.jurisdiction.exec(text.slice(from, from + patterns.windowLength));
    return match && match[1] !== undefined ? cleanJurisdiction(match[1], patterns) : null;
  };
}

function governedByMatcher(patterns: GoverningLawPatterns): FieldMatcher<string> {
  return (text) => {
    const match = patterns.governedBy.exec(text);
    return match && match[1] !== undefined ? cleanJurisdiction(match[1], patterns) : null;
  };
}

// ============================================================================
// Sections
// ============================================================================

function sentenceEndAfter(text: string, from: number, limit: number): number | null {
  const terminator = SENTENCE_END.exec(text.slice(from, limit));
  return terminator ? from + terminator.index + 1 : null;
}

/**
 * The sentence containing the anchor match, capped at maxLength characters.
 * When the anchor is a bare heading ("Termination."), the sentence after it
 * is included.
 */
export function sentenceAround(
  text: string,
  anchorStart: number,
  anchorEnd: number,
  maxLength: number
): string | null {
  const lookbackFrom = Math.max(0, anchorStart - maxLength);
  let start = lookbackFrom === 0 ? 0 : anchorStart;
  for (const boundary of text.slice(lookbackFrom, anchorStart).matchAll(SENTENCE_START)) {
    start = lookbackFrom + (boundary.index ?? 0) + boundary[0].length;
  }

  const limit = Math.max(start + maxLength, anchorEnd);
  let end = sentenceEndAfter(text, anchorEnd, limit);
  const isHeading =
    end !== null &&
    text.slice(start, anchorStart).trim() === '' &&
    HEADING_REMAINDER.test(text.slice(anchorEnd, end - 1));
  if (end !== null && isHeading) {
    end = sentenceEndAfter(text, end, limit);
  }

  let section: string;
  if (end !== null) {
    section = text.slice(start, end).trim();
  } else if (limit < text.length) {
    section = `${text.slice(start, limit).trim()}...`;
  } else {
    section = text.slice(start).trim();
  }

  return section.length > 0 ? section : null;
}

function sectionAnchorMatcher(anchor: RegExp, maxLength: number): FieldMatcher<string> {
  return (text) => {
    const match = anchor.exec(text);
    if (!match) return null;
    return sentenceAround(text, match.index, match.index + match[0].length, maxLength);
  };
}

function sectionMatchers(field: SectionFieldName, patterns: SectionPatterns): FieldMatcher<string>[] {
  return patterns.anchors[field].map((anchor) => sectionAnchorMatcher(anchor, patterns.maxLength));
}

// ============================================================================
// Liability Cap
// ============================================================================

/**
 * Parse "100,000.50" with a currency token into a cap. Returns null when
 * the token is unknown or the number does not parse.
 */
export function parseMoney(
  token: string,
  amountText: string,
  patterns: LiabilityCapPatterns
): LiabilityCap | null {
  const currency = patterns.currencies[token.toUpperCase()];
  const digits = amountText.replace(/,/g, '');
  const amount = Number(digits);
  if (currency === undefined || digits === '' || !Number.isFinite(amount)) return null;
  return { amount, currency };
}

function liabilityAfterAnchorMatcher(patterns: LiabilityCapPatterns): FieldMatcher<LiabilityCap> {
  return (text) => {
    for (const anchor of text.matchAll(patterns.anchor)) {
      const from = (anchor.index ?? 0) + anchor[0].length;
      const window = text.slice(from, from + patterns.windowAfter);
      for (const money of window.matchAll(patterns.amount)) {
        const cap = parseMoney(money[1] ?? '', money[2] ?? '', patterns);
        if (cap) return cap;
      }
    }
    return null;
  };
}

function liabilityBeforeAnchorMatcher(patterns: LiabilityCapPatterns): FieldMatcher<LiabilityCap> {
  return (text) => {
    for (const anchor of text.matchAll(patterns.anchor)) {
      const to = anchor.index ?? 0;
      const window = text.slice(Math.max(0, to - patterns.windowBefore), to);
      const amounts = [...window.matchAll(patterns.amount)].reverse();
      for (const money of amounts) {
        const cap = parseMoney(money[1] ?? '', money[2] ?? '', patterns);
        if (cap) return cap;
      }
    }
    return null;
  };
}

// ============================================================================
// Signatories
// ============================================================================

function signatoryMatcher(entry: SignatoryPattern, patterns: SignatoryPatterns): CandidateMatcher<Signatory> {
  return (text) => {
    const tail = text.slice(-patterns.windowLength);
    const candidates: Candidate<Signatory>[] = [];

    for (const match of tail.matchAll(entry.pattern)) {
      const name = cleanName(match[1] ?? '');
      const title = cleanName(match[2] ?? '');
      if (name.length === 0 || title.length === 0) continue;
      if (entry.requireTitleKeyword && !patterns.titleKeywords.test(title)) continue;

      const start = match.index ?? 0;
      candidates.push({ value: { name, title }, start, end: start + match[0].length });
    }

    return candidates;
  };
}

// ============================================================================
// Rule Table
// ============================================================================

/**
 * Copy of a pattern without the flags that make it stateful. Used with
 * exec() and test().
 */
export function singleMatchPattern(pattern: RegExp): RegExp {
  return new RegExp(pattern.source, pattern.flags.replace(/[gy]/g, ''));
}

/**
 * Copy of a pattern with the global flag. Used with matchAll().
 */
export function globalPattern(pattern: RegExp): RegExp {
  return new RegExp(pattern.source, pattern.flags.includes('g') ? pattern.flags : `${pattern.flags}g`);
}

function requirePositiveInteger(value: number, name: string): void {
  if (!Number.isInteger(value) || value <= 0) {
    throw new InvalidConfigurationError(`${name} must be a positive integer, got ${value}`);
  }
}

/**
 * Reject table settings that would make a matcher scan the wrong span.
 */
export function validatePatternTables(tables: ContractPatternTables): void {
  requirePositiveInteger(tables.parties.scanLength, 'parties.scanLength');
  requirePositiveInteger(tables.parties.maxParties, 'parties.maxParties');
  requirePositiveInteger(tables.effectiveDate.scanLength, 'effectiveDate.scanLength');
  requirePositiveInteger(tables.effectiveDate.windowLength, 'effectiveDate.windowLength');
  requirePositiveInteger(tables.term.scanLength, 'term.scanLength');
  requirePositiveInteger(tables.governingLaw.windowLength, 'governingLaw.windowLength');
  requirePositiveInteger(tables.sections.maxLength, 'sections.maxLength');
  requirePositiveInteger(tables.liabilityCap.windowAfter, 'liabilityCap.windowAfter');
  requirePositiveInteger(tables.liabilityCap.windowBefore, 'liabilityCap.windowBefore');
  requirePositiveInteger(tables.signatories.windowLength, 'signatories.windowLength');
  if (!Number.isInteger(tables.parties.minNameLength) || tables.parties.minNameLength < 0) {
    throw new InvalidConfigurationError(
      `parties.minNameLength must be a non-negative integer, got ${tables.parties.minNameLength}`
    );
  }
}

/**
 * Build the matchers for a table. Patterns are copied with the flags each
 * matcher needs, so the result does not depend on the flags a caller wrote.
 *
 * @throws InvalidConfigurationError on an unusable numeric setting
 */
export function buildFieldRules(tables: ContractPatternTables): FieldRuleTable {
  validatePatternTables(tables);

  const parties: PartyPatterns = {
    ...tables.parties,
    templates: tables.parties.templates.map(globalPattern),
  };
  const effectiveDate: DatePatterns = {
    ...tables.effectiveDate,
    anchors: globalPattern(tables.effectiveDate.anchors),
    formats: tables.effectiveDate.formats.map(singleMatchPattern),
  };
  const governingLaw: GoverningLawPatterns = {
    ...tables.governingLaw,
    anchor: singleMatchPattern(tables.governingLaw.anchor),
    jurisdiction: singleMatchPattern(tables.governingLaw.jurisdiction),
    governedBy: singleMatchPattern(tables.governingLaw.governedBy),
  };
  const sectionAnchors = tables.sections.anchors;
  const sections: SectionPatterns = {
    maxLength: tables.sections.maxLength,
    anchors: {
      payment_terms: sectionAnchors.payment_terms.map(singleMatchPattern),
      termination: sectionAnchors.termination.map(singleMatchPattern),
      auto_renewal: sectionAnchors.auto_renewal.map(singleMatchPattern),
      confidentiality: sectionAnchors.confidentiality.map(singleMatchPattern),
      indemnity: sectionAnchors.indemnity.map(singleMatchPattern),
    },
  };
  const liabilityCap: LiabilityCapPatterns = {
    ...tables.liabilityCap,
    anchor: globalPattern(tables.liabilityCap.anchor),
    amount: globalPattern(tables.liabilityCap.amount),
  };
  const signatories: SignatoryPatterns = {
    ...tables.signatories,
    patterns: tables.signatories.patterns.map((entry) => ({ ...entry, pattern: globalPattern(entry.pattern) })),
    titleKeywords: singleMatchPattern(tables.signatories.titleKeywords),
  };
  const termScan = tables.term.scanLength;

  return {
    parties: parties.templates.map((template) => partyTemplateMatcher(template, parties)),
    effective_date: effectiveDate.formats.map((format) => dateFormatMatcher(format, effectiveDate)),
    term: tables.term.patterns.map((pattern) => termMatcher(singleMatchPattern(pattern), termScan)),
    governing_law: [governingLawAnchorMatcher(governingLaw), governedByMatcher(governingLaw)],
    payment_terms: sectionMatchers('payment_terms', sections),
    termination: sectionMatchers('termination', sections),
    auto_renewal: sectionMatchers('auto_renewal', sections),
    confidentiality: sectionMatchers('confidentiality', sections),
    indemnity: sectionMatchers('indemnity', sections),
    liability_cap: [liabilityAfterAnchorMatcher(liabilityCap), liabilityBeforeAnchorMatcher(liabilityCap)],
    signatories: signatories.patterns.map((entry) => signatoryMatcher(entry, signatories)),
  };
}

/**
 * Run every field rule over the text.
 */
export function applyFieldRules(
  rules: FieldRuleTable,
  text: string,
  maxParties: number
): ContractFieldValues {
  return {
    parties: mergeCandidates(rules.parties, text, normalizeName).slice(0, maxParties),
    effective_date: firstResult(rules.effective_date, text),
    term: firstResult(rules.term, text),
    governing_law: firstResult(rules.governing_law, text),
    payment_terms: firstResult(rules.payment_terms, text),
    termination: firstResult(rules.termination, text),
    auto_renewal: firstResult(rules.auto_renewal, text),
    confidentiality: firstResult(rules.confidentiality, text),
    indemnity: firstResult(rules.indemnity, text),
    liability_cap: firstResult(rules.liability_cap, text),
    signatories: mergeCandidates(rules.signatories, text, (s) => normalizeName(s.name)),
  };
}
