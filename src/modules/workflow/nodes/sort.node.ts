import { Type } from 'class-transformer';
import {
  IsArray,
  IsIn,
  IsNotEmpty,
  IsOptional,
  IsString,
  ValidateNested,
} from 'class-validator';
import {
  NODE_TYPES,
  SORT_ORDERS,
  SortOrder,
  WORKFLOW_CONSTANTS,
} from '../constants/workflow.constants';
import { NodeMetadata, NodeOptions } from '../interfaces/node.interfaces';
import { FieldValue, FinancialRecord, RecordEnvelope } from '../interfaces/record.interfaces';
import { compareFieldValues, getFieldValue, resolveInvoiceDate } from '../utils/record.utils';
import { BaseNode } from './base.node';

export class SortKey {
  @IsString()
  @IsNotEmpty()
  field!: string;

  @IsOptional()
  @IsIn(SORT_ORDERS)
  order?: SortOrder;
}

export class SortParameters {
  @IsOptional()
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => SortKey)
  sort_by?: SortKey[];
}

interface ResolvedSortKey {
  read: (record: FinancialRecord) => FieldValue | undefined;
  order?: SortOrder;
}

// Without sort_by, records order by invoice date, falling back to document_date and date
const DEFAULT_SORT: ResolvedSortKey[] = [
  { read: resolveInvoiceDate, order: WORKFLOW_CONSTANTS.DEFAULT_SORT_ORDER },
];

function toResolvedKey({ field, order }: SortKey): ResolvedSortKey {
  return { read: (record) => getFieldValue(record, field), order };
}

export class SortNode extends BaseNode<SortParameters> {
  static readonly metadata: NodeMetadata = {
    type: NODE_TYPES.SORT,
    name: 'Sort',
    category: 'aggregation',
    description: 'Sorts records by one or more fields; the first key dominates',
    version: WORKFLOW_CONSTANTS.NODE_VERSION,
    inputSchema: {
      records: 'FinancialRecord[]',
      sort_by:
        "[{ field, order: 'asc' | 'desc' }], defaults to invoice date (or document_date, date) desc",
    },
    outputSchema: {
      records: 'FinancialRecord[] in sorted order',
    },
  };

  constructor(options?: NodeOptions) {
    super(SortParameters, options);
  }

  getMetadata(): NodeMetadata {
    return SortNode.metadata;
  }

  protected process(envelope: RecordEnvelope, params: SortParameters): RecordEnvelope {
    const keys = params.sort_by?.map(toResolvedKey) ?? DEFAULT_SORT;
    const records = [...envelope.records];

    // Stable passes from the last key to the first
    for (const { read, order } of [...keys].reverse()) {
      const direction = order === 'desc' ? -1 : 1;
      records.sort((left, right) => direction * compareFieldValues(read(left), read(right)));
    }

    return { records };
  }
}
