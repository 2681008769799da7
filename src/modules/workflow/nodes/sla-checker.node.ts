import { IsInt, IsOptional, Min } from 'class-validator';
import { IsCalendarDate } from '../../../common/validators/is-calendar-date.validator';
import {
  formatEpochDay,
  parseEpochDay,
  resolveAsOfDay,
} from '../../../common/utils/date.utils';
import { NODE_TYPES, WORKFLOW_CONSTANTS } from '../constants/workflow.constants';
import { NodeMetadata, NodeOptions } from '../interfaces/node.interfaces';
import {
  FinancialRecord,
  RecordEnvelope,
  SlaSeverity,
} from '../interfaces/record.interfaces';
import { BaseNode } from './base.node';

export class SLACheckerParameters {
  @IsOptional()
  @IsInt()
  @Min(0)
  sla_days?: number;

  @IsOptional()
  @IsCalendarDate()
  as_of_date?: string;
}

export function toSlaSeverity(breachDays: number): SlaSeverity {
  for (const { maxDays, severity } of WORKFLOW_CONSTANTS.SLA_SEVERITY_LIMITS) {
    if (breachDays <= maxDays) {
      return severity;
    }
  }
  return WORKFLOW_CONSTANTS.SLA_SEVERITY_OVERFLOW;
}

export class SLACheckerNode extends BaseNode<SLACheckerParameters> {
  static readonly metadata: NodeMetadata = {
    type: NODE_TYPES.SLA_CHECKER,
    name: 'SLA Checker',
    category: 'calculation',
    description: 'Checks SLA breaches against due dates and grades their severity',
    version: WORKFLOW_CONSTANTS.NODE_VERSION,
    inputSchema: {
      records: 'FinancialRecord[]',
      sla_days: 'SLA threshold in days after the due date',
      as_of_date: 'ISO date, defaults to today (UTC)',
    },
    outputSchema: {
      records: 'FinancialRecord[] with sla_deadline, sla_breach, breach_days and sla_severity',
    },
  };

  constructor(options?: NodeOptions) {
    super(SLACheckerParameters, options);
  }

  getMetadata(): NodeMetadata {
    return SLACheckerNode.metadata;
  }

  protected process(envelope: RecordEnvelope, params: SLACheckerParameters): RecordEnvelope {
    const asOfDay = resolveAsOfDay(params.as_of_date);
    const slaDays = params.sla_days ?? WORKFLOW_CONSTANTS.DEFAULT_SLA_DAYS;

    const records = envelope.records.map((record) => this.check(record, asOfDay, slaDays));
    this.logger.debug(`Checked SLA (${slaDays} days) for ${records.length} records`);
    return { records };
  }

  private check(record: FinancialRecord, asOfDay: number, slaDays: number): FinancialRecord {
    const dueDay = parseEpochDay(record.due_date);
    if (dueDay === null) {
      return { ...record, sla_breach: false, breach_days: 0, sla_severity: 'None' };
    }

    const deadline = dueDay + slaDays;
    const breach = asOfDay > deadline;
    const breachDays = breach ? asOfDay - deadline : 0;

    return {
      ...record,
      sla_deadline: formatEpochDay(deadline),
      sla_breach: breach,
      breach_days: breachDays,
      sla_severity: breach ? toSlaSeverity(breachDays) : 'None',
    };
  }
}
