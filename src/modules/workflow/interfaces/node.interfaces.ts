import { NodeParameters } from './workflow.interfaces';

export type NodeCategory = 'calculation' | 'aggregation' | 'data' | 'output';

/**
 * Descriptive node metadata, used for discovery only
 */
export interface NodeMetadata {
  type: string;
  name: string;
  category: NodeCategory;
  description: string;
  version: string;
  inputSchema: Record<string, string>;
  outputSchema: Record<string, string>;
}

export interface ValidationResult {
  isValid: boolean;
  errors: string[];
}

/**
 * A processing unit resolved from the registry by type id.
 * Implementations must not mutate their input.
 */
export interface INode {
  readonly type: string;
  run(input: unknown, parameters?: NodeParameters): Promise<unknown>;
  validate(parameters: NodeParameters): ValidationResult;
  getMetadata(): NodeMetadata;
}

export type NodeFactory = () => INode;

export interface NodeOptions {
  /** Parameter values applied underneath the ones a workflow supplies */
  defaults?: NodeParameters;
}
