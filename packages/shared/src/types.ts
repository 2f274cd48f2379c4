/**
 * Shared Types
 *
 * Records exchanged between the chunking/extraction core, the workers and
 * the API. Persisted and wire-facing records use snake_case keys.
 */

// ============================================================================
// Page Text & Chunks
// ============================================================================

/**
 * Text of one decoded PDF page
 */
export interface PageText {
  pageNumber: number;
  text: string;
}

/**
 * A contiguous slice of the concatenated document text.
 * char_start / char_end are offsets into that concatenated text.
 */
export interface Chunk {
  chunk_index: number;
  page_number: number;
  text: string;
  char_start: number;
  char_end: number;
}

// ============================================================================
// Extracted Fields
// ============================================================================

export type ExtractionMethod = 'rule-based' | 'llm';

export type CurrencyCode = 'USD' | 'EUR' | 'GBP';

export interface LiabilityCap {
  amount: number;
  currency: CurrencyCode;
}

export interface Signatory {
  name: string;
  title: string;
}

export interface ExtractedFields {
  parties: string[];
  effective_date: string | null;
  term: string | null;
  governing_law: string | null;
  payment_terms: string | null;
  termination: string | null;
  auto_renewal: string | null;
  confidentiality: string | null;
  indemnity: string | null;
  liability_cap: LiabilityCap | null;
  signatories: Signatory[];
  extraction_method: ExtractionMethod;
  confidence_score: number;
}

/**
 * The eleven scored fields of an ExtractedFields record
 */
export const CONTRACT_FIELD_NAMES = [
  'parties',
  'effective_date',
  'term',
  'governing_law',
  'payment_terms',
  'termination',
  'auto_renewal',
  'confidentiality',
  'indemnity',
  'liability_cap',
  'signatories',
] as const;

export type ContractFieldName = (typeof CONTRACT_FIELD_NAMES)[number];

export type ContractFieldValues = Pick<ExtractedFields, ContractFieldName>;

/**
 * Section-style fields: a bounded window of text around an anchor
 */
export type SectionFieldName =
  | 'payment_terms'
  | 'termination'
  | 'auto_renewal'
  | 'confidentiality'
  | 'indemnity';

// ============================================================================
// Audit
// ============================================================================

export type Severity = 'high' | 'medium' | 'low';

export interface AuditFinding {
  finding_type: string;
  severity: Severity;
  description: string;
  evidence: string;
  char_start: number | null;
  char_end: number | null;
}

export interface AuditReport {
  findings: AuditFinding[];
  risk_score: number;
  summary: string;
}

// ============================================================================
// Documents
// ============================================================================

export type DocumentStatus = 'pending' | 'ready' | 'failed';

export interface DocumentMetadata {
  document_id: string;
  filename: string;
  file_size: number;
  num_pages: number | null;
  status: DocumentStatus;
  created_at: string;
}

// ============================================================================
// API Contracts
// ============================================================================

export interface ExtractResponse extends ExtractedFields {
  document_id: string;
}

export interface AuditFindingResponse extends AuditFinding {
  page_number: number | null;
}

export interface AuditResponse {
  document_id: string;
  findings: AuditFindingResponse[];
  total_findings: number;
  risk_score: number;
  summary: string;
}

export interface Citation {
  document_id: string;
  page_number: number | null;
  char_start: number;
  char_end: number;
  text_excerpt: string;
}

export interface SearchResponse {
  query: string;
  results: Array<Citation & { relevance_score: number }>;
}

export interface IngestResponse {
  document_id: string;
  status: DocumentStatus;
  correlation_id: string;
}

/**
 * Multi-file upload result. Files that failed validation are listed in
 * `errors` and skipped.
 */
export interface BatchIngestResponse {
  document_ids: string[];
  total_documents: number;
  message: string;
  errors: string[];
  correlation_id: string;
}

export interface ErrorEnvelope {
  error: {
    code: string;
    message: string;
    correlation_id: string;
  };
}
