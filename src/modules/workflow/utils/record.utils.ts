import { toNumber } from '../../../common/utils/number.utils';
import { InvalidNodeInputError } from '../errors/workflow.errors';
import {
  AgingBucket,
  FieldValue,
  FinancialRecord,
  RecordEnvelope,
  RecordGroup,
  SlaSeverity,
} from '../interfaces/record.interfaces';

type KnownField = Exclude<keyof FinancialRecord, 'extensions'>;

const STRING_FIELDS = [
  'id',
  'invoice_number',
  'document_number',
  'vendor_name',
  'vendor_id',
  'customer_name',
  'customer_id',
  'invoice_date',
  'document_date',
  'date',
  'due_date',
  'currency',
  'status',
  'sla_deadline',
] as const satisfies readonly KnownField[];

const NUMBER_FIELDS = [
  'inr_amount',
  'total_amount',
  'grand_total',
  'paid_amount',
  'received_amount',
  'tax_amount',
  'tax_total',
  'outstanding',
  'outstanding_amount',
  'gross_amount',
  'aging_days',
  'overdue_days',
  'breach_days',
] as const satisfies readonly KnownField[];

type StringField = (typeof STRING_FIELDS)[number];
type NumberField = (typeof NUMBER_FIELDS)[number];

const STRING_FIELD_SET: ReadonlySet<string> = new Set(STRING_FIELDS);
const NUMBER_FIELD_SET: ReadonlySet<string> = new Set(NUMBER_FIELDS);
const KNOWN_FIELD_SET: ReadonlySet<string> = new Set<KnownField>([
  ...STRING_FIELDS,
  ...NUMBER_FIELDS,
  'sla_breach',
  'aging_bucket',
  'sla_severity',
]);

const AGING_BUCKETS: ReadonlySet<string> = new Set<AgingBucket>([
  '0-30',
  '31-60',
  '61-90',
  '90+',
  'Unknown',
]);
const SLA_SEVERITIES: ReadonlySet<string> = new Set<SlaSeverity>([
  'None',
  'Low',
  'Medium',
  'High',
  'Critical',
]);

function isStringField(key: string): key is StringField {
  return STRING_FIELD_SET.has(key);
}

function isNumberField(key: string): key is NumberField {
  return NUMBER_FIELD_SET.has(key);
}

function isKnownField(key: string): key is KnownField {
  return KNOWN_FIELD_SET.has(key);
}

function isAgingBucket(value: unknown): value is AgingBucket {
  return typeof value === 'string' && AGING_BUCKETS.has(value);
}

function isSlaSeverity(value: unknown): value is SlaSeverity {
  return typeof value === 'string' && SLA_SEVERITIES.has(value);
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isFieldValue(value: unknown): value is FieldValue {
  return (
    value === null ||
    typeof value === 'string' ||
    typeof value === 'number' ||
    typeof value === 'boolean'
  );
}

function toText(value: unknown): string | null {
  if (typeof value === 'string') {
    return value;
  }
  if (typeof value === 'number' && Number.isFinite(value)) {
    return String(value);
  }
  return null;
}

function assignKnownField(record: FinancialRecord, key: string, value: unknown): boolean {
  if (isStringField(key)) {
    const text = toText(value);
    if (text === null) return false;
    record[key] = text;
    return true;
  }

  if (isNumberField(key)) {
    const amount = toNumber(value);
    if (amount === null) return false;
    record[key] = amount;
    return true;
  }

  if (key === 'sla_breach' && typeof value === 'boolean') {
    record.sla_breach = value;
    return true;
  }
  if (key === 'aging_bucket' && isAgingBucket(value)) {
    record.aging_bucket = value;
    return true;
  }
  if (key === 'sla_severity' && isSlaSeverity(value)) {
    record.sla_severity = value;
    return true;
  }

  return false;
}

/**
 * Builds a typed record from a raw source object. Unknown keys, and known keys
 * whose value has the wrong type, are kept in `extensions`.
 */
export function normalizeRecord(raw: Record<string, unknown>): FinancialRecord {
  const record: FinancialRecord = {};
  const extensions: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(raw)) {
    if (value === undefined) continue;

    if (key === 'extensions' && isPlainObject(value)) {
      Object.assign(extensions, value);
      continue;
    }

    if (!assignKnownField(record, key, value)) {
      extensions[key] = value;
    }
  }

  if (Object.keys(extensions).length > 0) {
    record.extensions = extensions;
  }

  return record;
}

function normalizeRecords(items: unknown[], nodeType: string): FinancialRecord[] {
  return items.map((item, index) => {
    if (!isPlainObject(item)) {
      throw new InvalidNodeInputError(nodeType, `record at index ${index} is not an object`);
    }
    return normalizeRecord(item);
  });
}

function normalizeGroup(value: unknown, index: number, nodeType: string): RecordGroup {
  if (!isPlainObject(value) || !Array.isArray(value.records)) {
    throw new InvalidNodeInputError(nodeType, `group at index ${index} has no records list`);
  }

  const records = normalizeRecords(value.records, nodeType);
  return {
    group_name: toText(value.group_name) ?? 'Unknown',
    records,
    count: records.length,
    total_amount: toNumber(value.total_amount) ?? sumTotals(records),
    total_outstanding: toNumber(value.total_outstanding) ?? sumOutstanding(records),
  };
}

/**
 * Accepts a bare record list or an envelope and returns an envelope.
 * Only `records` and `groups` are carried over; other aggregates describe
 * upstream state and are recomputed by the nodes that need them.
 */
export function toEnvelope(input: unknown, nodeType: string): RecordEnvelope {
  if (input === null || input === undefined) {
    return { records: [] };
  }

  if (Array.isArray(input)) {
    return { records: normalizeRecords(input, nodeType) };
  }

  if (isPlainObject(input) && Array.isArray(input.records)) {
    const envelope: RecordEnvelope = { records: normalizeRecords(input.records, nodeType) };
    if (Array.isArray(input.groups)) {
      envelope.groups = input.groups.map((group, index) =>
        normalizeGroup(group, index, nodeType),
      );
    }
    return envelope;
  }

  if (isPlainObject(input)) {
    throw new InvalidNodeInputError(
      nodeType,
      `expected a record list or envelope, got an object with keys [${Object.keys(input).join(
        ', ',
      )}]; combine multiple predecessors with RecordMergeNode`,
    );
  }

  throw new InvalidNodeInputError(
    nodeType,
    `expected a record list or envelope, got ${typeof input}`,
  );
}

/**
 * Reads a field by name: well-known fields first, then extensions.
 * Non-scalar extension values read as missing.
 */
export function getFieldValue(record: FinancialRecord, field: string): FieldValue | undefined {
  if (isKnownField(field)) {
    const value = record[field];
    if (value !== undefined) {
      return value;
    }
  }

  const extension = record.extensions?.[field];
  return isFieldValue(extension) ? extension : undefined;
}

function firstNonZero(values: Array<number | undefined>): number {
  for (const value of values) {
    if (value !== undefined && value !== 0) {
      return value;
    }
  }
  return 0;
}

function firstText(values: Array<string | undefined>): string | undefined {
  return values.find((value) => value !== undefined && value.trim() !== '');
}

// Base total: INR-converted amount when present, else the document total
export function resolveTotalAmount(record: FinancialRecord): number {
  return firstNonZero([record.inr_amount, record.total_amount, record.grand_total]);
}

export function resolvePaidAmount(record: FinancialRecord): number {
  return firstNonZero([record.paid_amount, record.received_amount]);
}

export function resolveTaxAmount(record: FinancialRecord): number {
  return firstNonZero([record.tax_amount, record.tax_total]);
}

export function resolveOutstanding(record: FinancialRecord): number {
  return record.outstanding ?? record.outstanding_amount ?? 0;
}

export function resolveInvoiceDate(record: FinancialRecord): string | undefined {
  return firstText([record.invoice_date, record.document_date, record.date]);
}

export function resolveInvoiceNumber(record: FinancialRecord): string | undefined {
  return firstText([record.invoice_number, record.document_number]);
}

export function resolveCounterparty(record: FinancialRecord): string | undefined {
  return firstText([
    record.vendor_name,
    record.vendor_id,
    record.customer_name,
    record.customer_id,
  ]);
}

export function sumTotals(records: FinancialRecord[]): number {
  return records.reduce((total, record) => total + resolveTotalAmount(record), 0);
}

export function sumOutstanding(records: FinancialRecord[]): number {
  return records.reduce((total, record) => total + resolveOutstanding(record), 0);
}

function typeRank(value: FieldValue): number {
  if (typeof value === 'boolean') return 0;
  if (typeof value === 'number') return 1;
  return 2;
}

/**
 * Total order over field values for sorting. Missing values sort first,
 * then booleans, numbers and strings.
 */
export function compareFieldValues(
  left: FieldValue | undefined,
  right: FieldValue | undefined,
): number {
  if (left === undefined || left === null) {
    return right === undefined || right === null ? 0 : -1;
  }
  if (right === undefined || right === null) {
    return 1;
  }

  const rankDifference = typeRank(left) - typeRank(right);
  if (rankDifference !== 0) {
    return rankDifference;
  }

  if (typeof left === 'number' && typeof right === 'number') {
    return left - right;
  }

  const leftText = String(left);
  const rightText = String(right);
  if (leftText === rightText) return 0;
  return leftText < rightText ? -1 : 1;
}
