/**
 * Risk Audit Engine
 *
 * Runs the audit rule table over contract text and scores the findings.
 */

import type { AuditFinding, AuditReport, ExtractedFields, Severity } from '../types';
import {
  DEFAULT_AUDIT_RULES,
  EVIDENCE_CONTEXT,
  MAX_RISK_SCORE,
  SEVERITY_WEIGHTS,
  type AuditRule,
  type PatternRule,
} from './rules';

function findPatternEvidence(rule: PatternRule, text: string): AuditFinding | null {
  for (const pattern of rule.patterns) {
    const match = pattern.exec(text);
    if (!match) continue;

    const start = Math.max(0, match.index - EVIDENCE_CONTEXT);
    const end = Math.min(text.length, match.index + match[0].length + EVIDENCE_CONTEXT);
    return {
      finding_type: rule.id,
      severity: rule.severity,
      description: rule.name,
      evidence: text.slice(start, end).trim(),
      char_start: match.index,
      char_end: match.index + match[0].length,
    };
  }
  return null;
}

function runRule(rule: AuditRule, text: string, fields: ExtractedFields | null): AuditFinding | null {
  if (rule.kind === 'pattern') {
    return findPatternEvidence(rule, text);
  }

  const result = rule.check(text, fields);
  if (!result) return null;
  return {
    finding_type: rule.id,
    severity: rule.severity,
    description: rule.name,
    ...result,
  };
}

/**
 * Sum of severity weights, capped at MAX_RISK_SCORE.
 */
export function calculateRiskScore(findings: readonly AuditFinding[]): number {
  const total = findings.reduce((sum, finding) => sum + SEVERITY_WEIGHTS[finding.severity], 0);
  return Math.min(total, MAX_RISK_SCORE);
}

export function summarizeFindings(findings: readonly AuditFinding[], riskScore: number): string {
  if (findings.length === 0) {
    return 'No significant risks identified.';
  }

  const count = (severity: Severity) => findings.filter((f) => f.severity === severity).length;

  return (
    `Found ${findings.length} issues: ${count('high')} high, ${count('medium')} medium, ` +
    `${count('low')} low severity. Risk score: ${riskScore}/100.`
  );
}

export function auditContract(
  text: string,
  fields: ExtractedFields | null = null,
  rules: readonly AuditRule[] = DEFAULT_AUDIT_RULES
): AuditReport {
  const findings: AuditFinding[] = [];

  for (const rule of rules) {
    const finding = runRule(rule, text, fields);
    if (finding) findings.push(finding);
  }

  const riskScore = calculateRiskScore(findings);

  return {
    findings,
    risk_score: riskScore,
    summary: summarizeFindings(findings, riskScore),
  };
}
