export { auditContract, calculateRiskScore, summarizeFindings } from './engine';
export {
  DEFAULT_AUDIT_RULES,
  SEVERITY_WEIGHTS,
  MAX_RISK_SCORE,
  MIN_NOTICE_DAYS,
  type AuditRule,
  type AuditCheck,
  type CheckResult,
  type CheckRule,
  type PatternRule,
} from './rules';
