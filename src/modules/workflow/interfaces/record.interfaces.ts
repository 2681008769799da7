/**
 * Scalar value readable from a record field
 */
export type FieldValue = string | number | boolean | null;

export type AgingBucket = '0-30' | '31-60' | '61-90' | '90+' | 'Unknown';

export type PaymentStatus = 'Paid' | 'Unpaid' | 'Partially Paid';

export type SlaSeverity = 'None' | 'Low' | 'Medium' | 'High' | 'Critical';

/**
 * Invoice-like financial record.
 *
 * Well-known fields are typed; anything else a source system provides lives in
 * `extensions` and is still reachable by field name.
 */
export interface FinancialRecord {
  // Identifiers
  id?: string;
  invoice_number?: string;
  document_number?: string;

  // Counterparty
  vendor_name?: string;
  vendor_id?: string;
  customer_name?: string;
  customer_id?: string;

  // Dates (ISO YYYY-MM-DD)
  invoice_date?: string;
  document_date?: string;
  date?: string;
  due_date?: string;

  // Amounts
  currency?: string;
  inr_amount?: number;
  total_amount?: number;
  grand_total?: number;
  paid_amount?: number;
  received_amount?: number;
  tax_amount?: number;
  tax_total?: number;

  // Derived by calculation nodes
  outstanding?: number;
  outstanding_amount?: number;
  gross_amount?: number;
  status?: string;
  aging_days?: number;
  overdue_days?: number;
  aging_bucket?: AgingBucket;
  sla_deadline?: string;
  sla_breach?: boolean;
  breach_days?: number;
  sla_severity?: SlaSeverity;

  extensions?: Record<string, unknown>;
}

export interface RecordGroup {
  group_name: string;
  records: FinancialRecord[];
  count: number;
  total_amount: number;
  total_outstanding: number;
}

export interface DuplicateCandidate {
  group: [FinancialRecord, FinancialRecord];
  confidence: number;
  type: 'exact' | 'fuzzy';
  reason: string;
}

export interface DuplicateReport {
  exact: DuplicateCandidate[];
  fuzzy: DuplicateCandidate[];
}

export interface RecordSummary {
  count: number;
  total_amount: number;
  total_outstanding: number;
  average_amount: number;
  min_amount?: number;
  max_amount?: number;
  average_outstanding?: number;
  total_groups?: number;
}

export interface RecordTotals {
  total_amount: number;
  tax_amount: number;
  net_amount: number;
  paid_amount: number;
  outstanding: number;
}

/**
 * Canonical shape passed between calculation and aggregation nodes
 */
export interface RecordEnvelope {
  records: FinancialRecord[];
  groups?: RecordGroup[];
  summary?: RecordSummary;
  duplicates?: DuplicateReport;
  totals?: RecordTotals;
}
