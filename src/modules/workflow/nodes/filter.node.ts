import { Type } from 'class-transformer';
import {
  IsArray,
  IsIn,
  IsNotEmpty,
  IsOptional,
  IsString,
  ValidateIf,
  ValidateNested,
} from 'class-validator';
import { toNumber } from '../../../common/utils/number.utils';
import {
  FILTER_OPERATORS,
  FilterOperator,
  NODE_TYPES,
  WORKFLOW_CONSTANTS,
} from '../constants/workflow.constants';
import { NodeMetadata, NodeOptions } from '../interfaces/node.interfaces';
import { FieldValue, FinancialRecord, RecordEnvelope } from '../interfaces/record.interfaces';
import { getFieldValue } from '../utils/record.utils';
import { BaseNode } from './base.node';

export class FilterCondition {
  @IsString()
  @IsNotEmpty()
  field!: string;

  @IsIn(FILTER_OPERATORS)
  operator!: FilterOperator;

  @ValidateIf((condition: FilterCondition) => condition.operator === 'in')
  @IsArray({ message: 'value must be an array for the "in" operator' })
  value?: unknown;
}

export class FilterParameters {
  @IsOptional()
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => FilterCondition)
  conditions?: FilterCondition[];
}

/**
 * Numbers and numeric strings compare numerically, other strings lexically.
 * Returns null when the two values cannot be ordered.
 */
export function compareFilterValues(actual: FieldValue, expected: unknown): number | null {
  const actualNumber = toNumber(actual);
  const expectedNumber = toNumber(expected);
  if (actualNumber !== null && expectedNumber !== null) {
    return actualNumber - expectedNumber;
  }

  if (typeof actual === 'string' && typeof expected === 'string') {
    if (actual === expected) return 0;
    return actual < expected ? -1 : 1;
  }

  return null;
}

function valuesEqual(actual: FieldValue, expected: unknown): boolean {
  const comparison = compareFilterValues(actual, expected);
  return comparison === null ? actual === expected : comparison === 0;
}

export function matchesCondition(record: FinancialRecord, condition: FilterCondition): boolean {
  const actual = getFieldValue(record, condition.field);

  // A missing field only satisfies '!='
  if (actual === undefined || actual === null) {
    return condition.operator === '!=';
  }
  if (condition.operator === '!=') {
    return !valuesEqual(actual, condition.value);
  }

  switch (condition.operator) {
    case '=':
    case '==':
      return valuesEqual(actual, condition.value);
    case 'in':
      return (
        Array.isArray(condition.value) &&
        condition.value.some((candidate: unknown) => valuesEqual(actual, candidate))
      );
    default: {
      const comparison = compareFilterValues(actual, condition.value);
      if (comparison === null) return false;
      if (condition.operator === '>') return comparison > 0;
      if (condition.operator === '<') return comparison < 0;
      if (condition.operator === '>=') return comparison >= 0;
      return comparison <= 0;
    }
  }
}

export class FilterNode extends BaseNode<FilterParameters> {
  static readonly metadata: NodeMetadata = {
    type: NODE_TYPES.FILTER,
    name: 'Filter',
    category: 'aggregation',
    description: 'Keeps records matching every condition (=, !=, >, <, >=, <=, in)',
    version: WORKFLOW_CONSTANTS.NODE_VERSION,
    inputSchema: {
      records: 'FinancialRecord[]',
      conditions: '[{ field, operator, value }], combined with AND',
    },
    outputSchema: {
      records: 'FinancialRecord[] matching all conditions',
    },
  };

  constructor(options?: NodeOptions) {
    super(FilterParameters, options);
  }

  getMetadata(): NodeMetadata {
    return FilterNode.metadata;
  }

  protected process(envelope: RecordEnvelope, params: FilterParameters): RecordEnvelope {
    const conditions = params.conditions ?? [];
    if (conditions.length === 0) {
      return { records: [...envelope.records] };
    }

    const records = envelope.records.filter((record) =>
      conditions.every((condition) => matchesCondition(record, condition)),
    );

    this.logger.debug(`Filter kept ${records.length} of ${envelope.records.length} records`);
    return { records };
  }
}
