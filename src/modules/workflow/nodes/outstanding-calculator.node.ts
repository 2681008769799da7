import { roundHalfUp } from '../../../common/utils/number.utils';
import { NODE_TYPES, WORKFLOW_CONSTANTS } from '../constants/workflow.constants';
import { NodeMetadata, NodeOptions } from '../interfaces/node.interfaces';
import {
  FinancialRecord,
  PaymentStatus,
  RecordEnvelope,
} from '../interfaces/record.interfaces';
import {
  resolvePaidAmount,
  resolveTaxAmount,
  resolveTotalAmount,
} from '../utils/record.utils';
import { BaseNode } from './base.node';

export class OutstandingCalculatorParameters {}

export function toPaymentStatus(total: number, paid: number): PaymentStatus {
  if (paid >= total) return 'Paid';
  if (paid <= 0) return 'Unpaid';
  return 'Partially Paid';
}

export class OutstandingCalculatorNode extends BaseNode<OutstandingCalculatorParameters> {
  static readonly metadata: NodeMetadata = {
    type: NODE_TYPES.OUTSTANDING_CALCULATOR,
    name: 'Outstanding Calculator',
    category: 'calculation',
    description: 'Calculates outstanding amount, gross amount and payment status',
    version: WORKFLOW_CONSTANTS.NODE_VERSION,
    inputSchema: {
      records: 'FinancialRecord[]',
    },
    outputSchema: {
      records: 'FinancialRecord[] with outstanding, outstanding_amount, gross_amount and status',
    },
  };

  constructor(options?: NodeOptions) {
    super(OutstandingCalculatorParameters, options);
  }

  getMetadata(): NodeMetadata {
    return OutstandingCalculatorNode.metadata;
  }

  protected process(envelope: RecordEnvelope): RecordEnvelope {
    const records = envelope.records.map((record) => this.calculate(record));
    this.logger.debug(`Calculated outstanding for ${records.length} records`);
    return { records };
  }

  private calculate(record: FinancialRecord): FinancialRecord {
    const total = resolveTotalAmount(record);
    const paid = resolvePaidAmount(record);
    const tax = resolveTaxAmount(record);
    const outstanding = roundHalfUp(total - paid, WORKFLOW_CONSTANTS.AMOUNT_DECIMALS);

    return {
      ...record,
      outstanding,
      outstanding_amount: outstanding,
      gross_amount: roundHalfUp(total - tax, WORKFLOW_CONSTANTS.AMOUNT_DECIMALS),
      status: toPaymentStatus(total, paid),
    };
  }
}
