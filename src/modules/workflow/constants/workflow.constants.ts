/**
 * Workflow constants for financial record processing
 * Centralized constants shared by nodes and executors
 */
export const WORKFLOW_CONSTANTS = {
  NODE_VERSION: '1.0.0',

  // Aging
  AGING_BUCKET_LIMITS: [
    { maxDays: 30, bucket: '0-30' },
    { maxDays: 60, bucket: '31-60' },
    { maxDays: 90, bucket: '61-90' },
  ],
  AGING_BUCKET_OVERFLOW: '90+',
  UNKNOWN_VALUE: 'Unknown',
  AGING_BUCKET_ORDER: ['0-30', '31-60', '61-90', '90+', 'Unknown'],

  // SLA
  DEFAULT_SLA_DAYS: 30,
  SLA_SEVERITY_LIMITS: [
    { maxDays: 7, severity: 'Low' },
    { maxDays: 14, severity: 'Medium' },
    { maxDays: 30, severity: 'High' },
  ],
  SLA_SEVERITY_OVERFLOW: 'Critical',

  // Duplicates
  DEFAULT_DUPLICATE_TOLERANCE: 0.01,
  EXACT_DUPLICATE_CONFIDENCE: 100,
  FUZZY_DUPLICATE_CONFIDENCE: 75,
  AMOUNT_MICRO_UNITS: 1_000_000,

  // Aggregation
  DEFAULT_GROUP_BY: 'aging_bucket',
  DEFAULT_SORT_ORDER: 'desc',
  AMOUNT_DECIMALS: 2,
} as const;

export const NODE_TYPES = {
  AGING_CALCULATOR: 'AgingCalculatorNode',
  OUTSTANDING_CALCULATOR: 'OutstandingCalculatorNode',
  SLA_CHECKER: 'SLACheckerNode',
  DUPLICATE_DETECTOR: 'DuplicateDetectorNode',
  TOTALS_CALCULATION: 'TotalsCalculationNode',
  GROUPING: 'GroupingNode',
  FILTER: 'FilterNode',
  SORT: 'SortNode',
  SUMMARY: 'SummaryNode',
  RECORD_MERGE: 'RecordMergeNode',
} as const;

export const FILTER_OPERATORS = ['=', '==', '!=', '>', '<', '>=', '<=', 'in'] as const;
export type FilterOperator = (typeof FILTER_OPERATORS)[number];

export const SORT_ORDERS = ['asc', 'desc'] as const;
export type SortOrder = (typeof SORT_ORDERS)[number];
