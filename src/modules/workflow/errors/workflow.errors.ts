import { ExecutionTraceEntry } from '../interfaces/execution.interfaces';

export const WORKFLOW_ERROR_CODES = {
  NODE_NOT_FOUND: 'NODE_NOT_FOUND',
  DUPLICATE_NODE_TYPE: 'DUPLICATE_NODE_TYPE',
  STRUCTURAL_ERROR: 'STRUCTURAL_ERROR',
  CYCLIC_WORKFLOW: 'CYCLIC_WORKFLOW',
  INVALID_NODE_PARAMETERS: 'INVALID_NODE_PARAMETERS',
  INVALID_NODE_INPUT: 'INVALID_NODE_INPUT',
  NODE_EXECUTION_ERROR: 'NODE_EXECUTION_ERROR',
  TIMEOUT: 'TIMEOUT',
  INTERNAL_ERROR: 'INTERNAL_ERROR',
} as const;

export type WorkflowErrorCode = (typeof WORKFLOW_ERROR_CODES)[keyof typeof WORKFLOW_ERROR_CODES];

export class WorkflowError extends Error {
  constructor(
    message: string,
    public readonly code: WorkflowErrorCode,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class NodeNotFoundError extends WorkflowError {
  constructor(public readonly nodeType: string) {
    super(`Node type "${nodeType}" is not registered`, WORKFLOW_ERROR_CODES.NODE_NOT_FOUND);
  }
}

export class DuplicateNodeTypeError extends WorkflowError {
  constructor(public readonly nodeType: string) {
    super(
      `Node type "${nodeType}" is already registered`,
      WORKFLOW_ERROR_CODES.DUPLICATE_NODE_TYPE,
    );
  }
}

/**
 * The workflow definition is malformed: missing references, duplicate ids,
 * bad shape. Raised before any node runs.
 */
export class StructuralError extends WorkflowError {
  constructor(
    message: string,
    code: WorkflowErrorCode = WORKFLOW_ERROR_CODES.STRUCTURAL_ERROR,
  ) {
    super(message, code);
  }
}

export class CyclicWorkflowError extends StructuralError {
  constructor(public readonly nodeIds: string[]) {
    super(
      `Workflow graph contains a cycle involving nodes: ${nodeIds.join(', ')}`,
      WORKFLOW_ERROR_CODES.CYCLIC_WORKFLOW,
    );
  }
}

export class InvalidNodeParametersError extends WorkflowError {
  constructor(
    public readonly nodeType: string,
    public readonly errors: string[],
  ) {
    super(
      `Invalid parameters for ${nodeType}: ${errors.join('; ')}`,
      WORKFLOW_ERROR_CODES.INVALID_NODE_PARAMETERS,
    );
  }
}

export class InvalidNodeInputError extends WorkflowError {
  constructor(
    public readonly nodeType: string,
    reason: string,
  ) {
    super(`Invalid input for ${nodeType}: ${reason}`, WORKFLOW_ERROR_CODES.INVALID_NODE_INPUT);
  }
}

export class NodeExecutionError extends WorkflowError {
  constructor(
    public readonly nodeId: string,
    public readonly nodeType: string,
    cause: unknown,
    public readonly trace: ExecutionTraceEntry[],
    public readonly partialOutputs: Record<string, unknown>,
  ) {
    super(
      `Node "${nodeId}" (${nodeType}) failed: ${describeError(cause)}`,
      WORKFLOW_ERROR_CODES.NODE_EXECUTION_ERROR,
      { cause },
    );
  }
}

export class WorkflowTimeoutError extends WorkflowError {
  constructor(
    public readonly timeoutMs: number,
    public readonly trace: ExecutionTraceEntry[],
    public readonly partialOutputs: Record<string, unknown>,
    public readonly nodeId?: string,
  ) {
    super(
      `Workflow exceeded its ${timeoutMs}ms deadline${nodeId ? ` at node "${nodeId}"` : ''}`,
      WORKFLOW_ERROR_CODES.TIMEOUT,
    );
  }
}

/**
 * Raised by a deadline race; executors translate it into WorkflowTimeoutError
 * once they know the trace.
 */
export class DeadlineExceededError extends Error {
  constructor(public readonly timeoutMs: number) {
    super(`Deadline of ${timeoutMs}ms exceeded`);
    this.name = 'DeadlineExceededError';
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
