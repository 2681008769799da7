import { roundHalfUp } from '../../../common/utils/number.utils';
import { NODE_TYPES, WORKFLOW_CONSTANTS } from '../constants/workflow.constants';
import { NodeMetadata, NodeOptions } from '../interfaces/node.interfaces';
import { RecordEnvelope, RecordTotals } from '../interfaces/record.interfaces';
import {
  resolveOutstanding,
  resolveTaxAmount,
  resolveTotalAmount,
} from '../utils/record.utils';
import { BaseNode } from './base.node';

export class TotalsCalculationParameters {}

export class TotalsCalculationNode extends BaseNode<TotalsCalculationParameters> {
  static readonly metadata: NodeMetadata = {
    type: NODE_TYPES.TOTALS_CALCULATION,
    name: 'Totals Calculator',
    category: 'calculation',
    description: 'Calculates report totals: amount, tax, net, paid and outstanding',
    version: WORKFLOW_CONSTANTS.NODE_VERSION,
    inputSchema: {
      records: 'FinancialRecord[]',
    },
    outputSchema: {
      records: 'FinancialRecord[] (unchanged)',
      totals: 'RecordTotals',
    },
  };

  constructor(options?: NodeOptions) {
    super(TotalsCalculationParameters, options);
  }

  getMetadata(): NodeMetadata {
    return TotalsCalculationNode.metadata;
  }

  protected process(envelope: RecordEnvelope): RecordEnvelope {
    let total = 0;
    let tax = 0;
    let outstanding = 0;

    for (const record of envelope.records) {
      total += resolveTotalAmount(record);
      tax += resolveTaxAmount(record);
      outstanding += resolveOutstanding(record);
    }

    const decimals = WORKFLOW_CONSTANTS.AMOUNT_DECIMALS;
    const totals: RecordTotals = {
      total_amount: roundHalfUp(total, decimals),
      tax_amount: roundHalfUp(tax, decimals),
      net_amount: roundHalfUp(total - tax, decimals),
      paid_amount: roundHalfUp(total - outstanding, decimals),
      outstanding: roundHalfUp(outstanding, decimals),
    };

    return { records: [...envelope.records], totals };
  }
}
