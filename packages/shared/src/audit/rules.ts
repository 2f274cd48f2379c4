/**
 * Risk Audit Rules
 *
 * Pattern rules record their first match. Check rules inspect the text
 * (and the extracted fields, when given) and return at most one finding.
 */

import type { ExtractedFields, Severity } from '../types';

export interface CheckResult {
  evidence: string;
  char_start: number | null;
  char_end: number | null;
}

export type AuditCheck = (text: string, fields: ExtractedFields | null) => CheckResult | null;

interface BaseRule {
  id: string;
  name: string;
  severity: Severity;
}

export interface PatternRule extends BaseRule {
  kind: 'pattern';
  patterns: readonly RegExp[];
}

export interface CheckRule extends BaseRule {
  kind: 'check';
  check: AuditCheck;
}

export type AuditRule = PatternRule | CheckRule;

export const SEVERITY_WEIGHTS: Readonly<Record<Severity, number>> = {
  high: 30,
  medium: 15,
  low: 5,
};

export const MAX_RISK_SCORE = 100;

/** Characters of context kept on each side of a pattern match */
export const EVIDENCE_CONTEXT = 100;

/** Notice periods shorter than this many days are flagged */
export const MIN_NOTICE_DAYS = 30;

const AUTO_RENEWAL_PATTERN = /auto(?:matic)?(?:ally)?\s+renew/i;
const NOTICE_PERIOD_PATTERN = /(\d+)\s+days?\s+(?:notice|prior)/i;
const TERMINATION_NOTICE_PATTERN = /(?:terminate|cancel).*?(\d+)\s+days?\s+notice/gi;

function checkTermination(text: string, fields: ExtractedFields | null): CheckResult | null {
  if (!/terminat(?:ion|e)/i.test(text)) {
    return { evidence: 'No termination clause found in document', char_start: null, char_end: null };
  }
  if (fields && !fields.termination) {
    return { evidence: 'Termination clause not clearly defined', char_start: null, char_end: null };
  }
  return null;
}

function checkGoverningLaw(text: string, fields: ExtractedFields | null): CheckResult | null {
  if (!/governing\s+law/i.test(text)) {
    return { evidence: 'No governing law clause found', char_start: null, char_end: null };
  }
  if (fields && !fields.governing_law) {
    return { evidence: 'Governing law not clearly specified', char_start: null, char_end: null };
  }
  return null;
}

/**
 * Auto-renewal with no notice period nearby, or one under MIN_NOTICE_DAYS.
 */
function checkAutoRenewal(text: string): CheckResult | null {
  const renewal = AUTO_RENEWAL_PATTERN.exec(text);
  if (!renewal) return null;

  const start = renewal.index;
  const surrounding = text.slice(Math.max(0, start - 500), start + renewal[0].length + 500);
  const notice = NOTICE_PERIOD_PATTERN.exec(surrounding);

  if (notice && parseInt(notice[1], 10) >= MIN_NOTICE_DAYS) return null;

  const end = Math.min(text.length, start + 200);
  return { evidence: text.slice(start, end), char_start: start, char_end: end };
}

function checkTerminationNotice(text: string): CheckResult | null {
  for (const match of text.matchAll(TERMINATION_NOTICE_PATTERN)) {
    if (parseInt(match[1], 10) < MIN_NOTICE_DAYS) {
      const start = match.index ?? 0;
      const end = Math.min(text.length, start + match[0].length + EVIDENCE_CONTEXT);
      return { evidence: text.slice(start, end), char_start: start, char_end: end };
    }
  }
  return null;
}

export const DEFAULT_AUDIT_RULES: readonly AuditRule[] = [
  {
    kind: 'check',
    id: 'MISSING_TERMINATION',
    name: 'Missing Termination Clause',
    severity: 'high',
    check: checkTermination,
  },
  {
    kind: 'pattern',
    id: 'UNLIMITED_LIABILITY',
    name: 'Unlimited Liability',
    severity: 'high',
    patterns: [/unlimited\s+liability/i, /no\s+(?:limit|cap).*?liability/i],
  },
  {
    kind: 'check',
    id: 'AUTO_RENEWAL',
    name: 'Automatic Renewal Without Notice',
    severity: 'medium',
    check: checkAutoRenewal,
  },
  {
    kind: 'check',
    id: 'MISSING_GOVERNING_LAW',
    name: 'Missing Governing Law',
    severity: 'medium',
    check: checkGoverningLaw,
  },
  {
    kind: 'pattern',
    id: 'UNILATERAL_MODIFICATION',
    name: 'Unilateral Modification Rights',
    severity: 'high',
    patterns: [
      /(?:may|can|shall)\s+(?:modify|change|amend).*?(?:at any time|without notice)/i,
      /reserves?\s+the\s+right\s+to\s+(?:modify|change|amend)/i,
    ],
  },
  {
    kind: 'check',
    id: 'SHORT_NOTICE_TERMINATION',
    name: 'Short Notice Period',
    severity: 'medium',
    check: checkTerminationNotice,
  },
  {
    kind: 'pattern',
    id: 'BROAD_INDEMNITY',
    name: 'Broad Indemnity Clause',
    severity: 'high',
    patterns: [/indemnify.*?(?:from\s+(?:any|all)|harmless)/i, /hold\s+harmless/i],
  },
  {
    kind: 'pattern',
    id: 'NO_WARRANTY',
    name: 'No Warranty Disclaimer',
    severity: 'low',
    patterns: [/\bas\s+is\b/i, /without\s+warranty/i, /no\s+warranties/i],
  },
];
