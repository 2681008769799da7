import { IsNotEmpty, IsOptional, IsString } from 'class-validator';
import { NODE_TYPES, WORKFLOW_CONSTANTS } from '../constants/workflow.constants';
import { NodeMetadata, NodeOptions } from '../interfaces/node.interfaces';
import { FinancialRecord, RecordEnvelope } from '../interfaces/record.interfaces';
import { getFieldValue, isPlainObject, toEnvelope } from '../utils/record.utils';
import { BaseNode } from './base.node';

export class RecordMergeParameters {
  @IsOptional()
  @IsString()
  @IsNotEmpty()
  dedupe_by?: string;
}

export class RecordMergeNode extends BaseNode<RecordMergeParameters> {
  static readonly metadata: NodeMetadata = {
    type: NODE_TYPES.RECORD_MERGE,
    name: 'Merge Records',
    category: 'aggregation',
    description: 'Concatenates the records of every predecessor, optionally de-duplicated by a field',
    version: WORKFLOW_CONSTANTS.NODE_VERSION,
    inputSchema: {
      input: '{ [predecessorId]: FinancialRecord[] | RecordEnvelope }, or a single record list',
      dedupe_by: 'field whose repeated values are dropped after the first occurrence',
    },
    outputSchema: {
      records: 'FinancialRecord[] in predecessor order',
    },
  };

  constructor(options?: NodeOptions) {
    super(RecordMergeParameters, options);
  }

  getMetadata(): NodeMetadata {
    return RecordMergeNode.metadata;
  }

  /**
   * Accepts the graph executor's predecessor map in addition to the usual
   * list or envelope. Map entries are concatenated in key order.
   */
  protected prepareInput(input: unknown): RecordEnvelope {
    if (isPlainObject(input) && !Array.isArray(input.records)) {
      return {
        records: Object.values(input).flatMap((value) => toEnvelope(value, this.type).records),
      };
    }
    return toEnvelope(input, this.type);
  }

  protected process(envelope: RecordEnvelope, params: RecordMergeParameters): RecordEnvelope {
    if (params.dedupe_by === undefined) {
      return { records: [...envelope.records] };
    }

    const field = params.dedupe_by;
    const seen = new Set<string>();
    const records: FinancialRecord[] = [];

    for (const record of envelope.records) {
      const value = getFieldValue(record, field);
      if (value === undefined || value === null) {
        records.push(record);
        continue;
      }

      const key = JSON.stringify(value);
      if (!seen.has(key)) {
        seen.add(key);
        records.push(record);
      }
    }

    this.logger.debug(
      `Merged ${envelope.records.length} records, ${
        envelope.records.length - records.length
      } dropped as repeated ${field}`,
    );
    return { records };
  }
}
