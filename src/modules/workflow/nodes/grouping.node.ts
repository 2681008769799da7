import { IsNotEmpty, IsOptional, IsString } from 'class-validator';
import { roundHalfUp } from '../../../common/utils/number.utils';
import { NODE_TYPES, WORKFLOW_CONSTANTS } from '../constants/workflow.constants';
import { NodeMetadata, NodeOptions } from '../interfaces/node.interfaces';
import {
  FinancialRecord,
  RecordEnvelope,
  RecordGroup,
} from '../interfaces/record.interfaces';
import { getFieldValue, sumOutstanding, sumTotals } from '../utils/record.utils';
import { BaseNode } from './base.node';

export class GroupingParameters {
  @IsOptional()
  @IsString()
  @IsNotEmpty()
  group_by?: string;
}

const BUCKET_RANK: ReadonlyMap<string, number> = new Map(
  WORKFLOW_CONSTANTS.AGING_BUCKET_ORDER.map((bucket, index): [string, number] => [bucket, index]),
);

function groupKey(record: FinancialRecord, field: string): string {
  const value = getFieldValue(record, field);
  if (value === undefined || value === null || value === '') {
    return WORKFLOW_CONSTANTS.UNKNOWN_VALUE;
  }
  return String(value);
}

export class GroupingNode extends BaseNode<GroupingParameters> {
  static readonly metadata: NodeMetadata = {
    type: NODE_TYPES.GROUPING,
    name: 'Group By',
    category: 'aggregation',
    description: 'Groups records by a field and subtotals amount and outstanding per group',
    version: WORKFLOW_CONSTANTS.NODE_VERSION,
    inputSchema: {
      records: 'FinancialRecord[]',
      group_by: 'field to group by, defaults to aging_bucket',
    },
    outputSchema: {
      records: 'FinancialRecord[] (unchanged)',
      groups: 'RecordGroup[]',
    },
  };

  constructor(options?: NodeOptions) {
    super(GroupingParameters, options);
  }

  getMetadata(): NodeMetadata {
    return GroupingNode.metadata;
  }

  protected process(envelope: RecordEnvelope, params: GroupingParameters): RecordEnvelope {
    const groupBy = params.group_by ?? WORKFLOW_CONSTANTS.DEFAULT_GROUP_BY;

    // Map keeps first-appearance order, records keep input order within a group
    const buckets = new Map<string, FinancialRecord[]>();
    for (const record of envelope.records) {
      const key = groupKey(record, groupBy);
      const members = buckets.get(key);
      if (members) {
        members.push(record);
      } else {
        buckets.set(key, [record]);
      }
    }

    const groups: RecordGroup[] = Array.from(buckets, ([groupName, records]) => ({
      group_name: groupName,
      records,
      count: records.length,
      total_amount: roundHalfUp(sumTotals(records), WORKFLOW_CONSTANTS.AMOUNT_DECIMALS),
      total_outstanding: roundHalfUp(
        sumOutstanding(records),
        WORKFLOW_CONSTANTS.AMOUNT_DECIMALS,
      ),
    }));

    groups.sort(
      groupBy === WORKFLOW_CONSTANTS.DEFAULT_GROUP_BY ? compareBuckets : compareGroupNames,
    );

    this.logger.debug(`Grouped ${envelope.records.length} records into ${groups.length} groups`);

    return { records: [...envelope.records], groups };
  }
}

function compareBuckets(left: RecordGroup, right: RecordGroup): number {
  const unranked = BUCKET_RANK.size;
  return (
    (BUCKET_RANK.get(left.group_name) ?? unranked) -
    (BUCKET_RANK.get(right.group_name) ?? unranked)
  );
}

function compareGroupNames(left: RecordGroup, right: RecordGroup): number {
  if (left.group_name === right.group_name) return 0;
  return left.group_name < right.group_name ? -1 : 1;
}
