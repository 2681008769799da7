import { IsNotEmpty, IsOptional, IsString } from 'class-validator';
import { roundHalfUp, sum, toNumber } from '../../../common/utils/number.utils';
import { NODE_TYPES, WORKFLOW_CONSTANTS } from '../constants/workflow.constants';
import { NodeMetadata, NodeOptions } from '../interfaces/node.interfaces';
import {
  FinancialRecord,
  RecordEnvelope,
  RecordGroup,
  RecordSummary,
} from '../interfaces/record.interfaces';
import { getFieldValue, resolveOutstanding, resolveTotalAmount } from '../utils/record.utils';
import { BaseNode } from './base.node';

export class SummaryParameters {
  @IsOptional()
  @IsString()
  @IsNotEmpty()
  amount_field?: string;
}

const round = (value: number): number => roundHalfUp(value, WORKFLOW_CONSTANTS.AMOUNT_DECIMALS);

export class SummaryNode extends BaseNode<SummaryParameters> {
  static readonly metadata: NodeMetadata = {
    type: NODE_TYPES.SUMMARY,
    name: 'Summary',
    category: 'aggregation',
    description:
      'Computes count, totals, average, min and max; aggregates group subtotals when grouped',
    version: WORKFLOW_CONSTANTS.NODE_VERSION,
    inputSchema: {
      records: 'FinancialRecord[]',
      groups: 'RecordGroup[] (optional, from GroupingNode)',
      amount_field: 'field to aggregate, defaults to the base total',
    },
    outputSchema: {
      summary: 'RecordSummary',
      groups: 'RecordGroup[] (passed through when present)',
    },
  };

  constructor(options?: NodeOptions) {
    super(SummaryParameters, options);
  }

  getMetadata(): NodeMetadata {
    return SummaryNode.metadata;
  }

  protected process(envelope: RecordEnvelope, params: SummaryParameters): RecordEnvelope {
    if (envelope.groups) {
      return {
        records: [...envelope.records],
        groups: envelope.groups,
        summary: this.summarizeGroups(envelope.groups),
      };
    }

    return {
      records: [...envelope.records],
      summary: this.summarizeRecords(envelope.records, params.amount_field),
    };
  }

  private summarizeGroups(groups: RecordGroup[]): RecordSummary {
    const count = sum(groups.map((group) => group.count));
    const totalAmount = sum(groups.map((group) => group.total_amount));

    return {
      count,
      total_amount: round(totalAmount),
      total_outstanding: round(sum(groups.map((group) => group.total_outstanding))),
      average_amount: count > 0 ? round(totalAmount / count) : 0,
      total_groups: groups.length,
    };
  }

  private summarizeRecords(records: FinancialRecord[], amountField?: string): RecordSummary {
    if (records.length === 0) {
      return { count: 0, total_amount: 0, total_outstanding: 0, average_amount: 0 };
    }

    const amounts = records.map((record) =>
      amountField === undefined
        ? resolveTotalAmount(record)
        : toNumber(getFieldValue(record, amountField)) ?? 0,
    );
    const outstanding = records.map(resolveOutstanding);
    const totalAmount = sum(amounts);
    const totalOutstanding = sum(outstanding);
    const minAmount = amounts.reduce((min, amount) => (amount < min ? amount : min), amounts[0]);
    const maxAmount = amounts.reduce((max, amount) => (amount > max ? amount : max), amounts[0]);

    return {
      count: records.length,
      total_amount: round(totalAmount),
      total_outstanding: round(totalOutstanding),
      average_amount: round(totalAmount / records.length),
      min_amount: round(minAmount),
      max_amount: round(maxAmount),
      average_outstanding: round(totalOutstanding / records.length),
    };
  }
}
