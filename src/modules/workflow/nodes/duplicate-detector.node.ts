import { IsNumber, IsOptional, Min } from 'class-validator';
import { NODE_TYPES, WORKFLOW_CONSTANTS } from '../constants/workflow.constants';
import { NodeMetadata, NodeOptions } from '../interfaces/node.interfaces';
import {
  DuplicateCandidate,
  DuplicateReport,
  FinancialRecord,
  RecordEnvelope,
} from '../interfaces/record.interfaces';
import {
  resolveCounterparty,
  resolveInvoiceDate,
  resolveInvoiceNumber,
  resolveTotalAmount,
} from '../utils/record.utils';
import { BaseNode } from './base.node';

export class DuplicateDetectorParameters {
  @IsOptional()
  @IsNumber({ allowNaN: false, allowInfinity: false })
  @Min(0)
  tolerance?: number;
}

// Amounts and tolerance compare as integer micro-units
function toMicroUnits(amount: number): number {
  return Math.round(amount * WORKFLOW_CONSTANTS.AMOUNT_MICRO_UNITS);
}

export class DuplicateDetectorNode extends BaseNode<DuplicateDetectorParameters> {
  static readonly metadata: NodeMetadata = {
    type: NODE_TYPES.DUPLICATE_DETECTOR,
    name: 'Duplicate Detector',
    category: 'calculation',
    description: 'Detects exact and fuzzy duplicate invoices',
    version: WORKFLOW_CONSTANTS.NODE_VERSION,
    inputSchema: {
      records: 'FinancialRecord[]',
      tolerance: 'absolute amount difference allowed for fuzzy matches',
    },
    outputSchema: {
      records: 'FinancialRecord[] (unchanged)',
      duplicates: '{ exact: DuplicateCandidate[], fuzzy: DuplicateCandidate[] }',
    },
  };

  constructor(options?: NodeOptions) {
    super(DuplicateDetectorParameters, options);
  }

  getMetadata(): NodeMetadata {
    return DuplicateDetectorNode.metadata;
  }

  protected process(
    envelope: RecordEnvelope,
    params: DuplicateDetectorParameters,
  ): RecordEnvelope {
    const tolerance = toMicroUnits(
      params.tolerance ?? WORKFLOW_CONSTANTS.DEFAULT_DUPLICATE_TOLERANCE,
    );
    const duplicates = this.detect(envelope.records, tolerance);

    this.logger.debug(
      `Detected ${duplicates.exact.length} exact and ${duplicates.fuzzy.length} fuzzy duplicates`,
    );

    return { records: [...envelope.records], duplicates };
  }

  private detect(records: FinancialRecord[], toleranceMicros: number): DuplicateReport {
    const exact: DuplicateCandidate[] = [];
    const fuzzy: DuplicateCandidate[] = [];

    // counterparty + invoice number -> first record seen
    const exactIndex = new Map<string, FinancialRecord>();
    // counterparty + date -> every record seen
    const fuzzyIndex = new Map<string, FinancialRecord[]>();

    for (const record of records) {
      const counterparty = resolveCounterparty(record);
      if (counterparty === undefined) continue;

      const invoiceNumber = resolveInvoiceNumber(record);
      if (invoiceNumber !== undefined) {
        const exactKey = JSON.stringify([counterparty, invoiceNumber]);
        const existing = exactIndex.get(exactKey);
        if (existing) {
          exact.push({
            group: [existing, record],
            confidence: WORKFLOW_CONSTANTS.EXACT_DUPLICATE_CONFIDENCE,
            type: 'exact',
            reason: 'Same counterparty and invoice number',
          });
        } else {
          exactIndex.set(exactKey, record);
        }
      }

      const invoiceDate = resolveInvoiceDate(record);
      if (invoiceDate === undefined) continue;

      const fuzzyKey = JSON.stringify([counterparty, invoiceDate]);
      const amount = toMicroUnits(resolveTotalAmount(record));
      const candidates = fuzzyIndex.get(fuzzyKey) ?? [];

      for (const existing of candidates) {
        const difference = Math.abs(amount - toMicroUnits(resolveTotalAmount(existing)));
        if (
          difference <= toleranceMicros &&
          (resolveInvoiceNumber(existing) ?? '') !== (invoiceNumber ?? '')
        ) {
          fuzzy.push({
            group: [existing, record],
            confidence: WORKFLOW_CONSTANTS.FUZZY_DUPLICATE_CONFIDENCE,
            type: 'fuzzy',
            reason: 'Same counterparty, amount and date but different invoice number',
          });
        }
      }

      candidates.push(record);
      fuzzyIndex.set(fuzzyKey, candidates);
    }

    return { exact, fuzzy };
  }
}
