import { IsOptional } from 'class-validator';
import { IsCalendarDate } from '../../../common/validators/is-calendar-date.validator';
import { parseEpochDay, resolveAsOfDay } from '../../../common/utils/date.utils';
import { NODE_TYPES, WORKFLOW_CONSTANTS } from '../constants/workflow.constants';
import { NodeMetadata, NodeOptions } from '../interfaces/node.interfaces';
import {
  AgingBucket,
  FinancialRecord,
  RecordEnvelope,
} from '../interfaces/record.interfaces';
import { resolveInvoiceDate } from '../utils/record.utils';
import { BaseNode } from './base.node';

export class AgingCalculatorParameters {
  @IsOptional()
  @IsCalendarDate()
  as_of_date?: string;
}

export function toAgingBucket(agingDays: number): AgingBucket {
  for (const { maxDays, bucket } of WORKFLOW_CONSTANTS.AGING_BUCKET_LIMITS) {
    if (agingDays <= maxDays) {
      return bucket;
    }
  }
  return WORKFLOW_CONSTANTS.AGING_BUCKET_OVERFLOW;
}

export class AgingCalculatorNode extends BaseNode<AgingCalculatorParameters> {
  static readonly metadata: NodeMetadata = {
    type: NODE_TYPES.AGING_CALCULATOR,
    name: 'Aging Calculator',
    category: 'calculation',
    description: 'Calculates aging days and assigns buckets (0-30, 31-60, 61-90, 90+)',
    version: WORKFLOW_CONSTANTS.NODE_VERSION,
    inputSchema: {
      records: 'FinancialRecord[]',
      as_of_date: 'ISO date, defaults to today (UTC)',
    },
    outputSchema: {
      records: 'FinancialRecord[] with aging_days, overdue_days and aging_bucket',
    },
  };

  constructor(options?: NodeOptions) {
    super(AgingCalculatorParameters, options);
  }

  getMetadata(): NodeMetadata {
    return AgingCalculatorNode.metadata;
  }

  protected process(
    envelope: RecordEnvelope,
    params: AgingCalculatorParameters,
  ): RecordEnvelope {
    const asOfDay = resolveAsOfDay(params.as_of_date);

    return {
      records: envelope.records.map((record) => this.ageRecord(record, asOfDay)),
    };
  }

  private ageRecord(record: FinancialRecord, asOfDay: number): FinancialRecord {
    const dueDay = parseEpochDay(record.due_date);
    const overdueDays = dueDay === null ? 0 : asOfDay - dueDay;

    const invoiceDate = resolveInvoiceDate(record);
    const invoiceDay = parseEpochDay(invoiceDate);
    if (invoiceDay === null) {
      this.logger.warn(
        `Record ${record.id ?? record.invoice_number ?? 'unknown'} has ${
          invoiceDate ? `an unparseable date "${invoiceDate}"` : 'no date'
        }, setting Unknown bucket`,
      );
      return {
        ...record,
        aging_days: 0,
        overdue_days: overdueDays,
        aging_bucket: 'Unknown',
      };
    }

    const agingDays = asOfDay - invoiceDay;
    return {
      ...record,
      aging_days: agingDays,
      overdue_days: overdueDays,
      aging_bucket: toAgingBucket(agingDays),
    };
  }
}
