import { ExecutionMode } from '../../../config/workflow.config';
import { ParameterOverrides, WorkflowForm } from './workflow.interfaces';

export interface ExecutionTraceEntry {
  nodeId: string;
  type: string;
  durationMs: number;
  inputSize: number;
  outputSize: number;
}

export interface ExecutionOptions {
  overrides?: ParameterOverrides;
  /** Overall deadline in milliseconds, 0 disables it */
  timeoutMs?: number;
  executionId?: string;
}

export interface GraphExecutionOptions extends ExecutionOptions {
  terminalNodeId?: string;
  executionMode?: ExecutionMode;
  maxParallelism?: number;
}

export interface ExecutionPlan {
  order: string[];
  stages: string[][];
}

export interface PipelineExecutionOutcome {
  output: unknown;
  trace: ExecutionTraceEntry[];
  nodeOutputs: Record<string, unknown>;
}

export interface GraphExecutionOutcome {
  output: unknown;
  terminalNodeId: string;
  trace: ExecutionTraceEntry[];
  nodeOutputs: Record<string, unknown>;
  plan: ExecutionPlan;
}

export interface ExecutionErrorDetail {
  code: string;
  message: string;
  nodeId?: string;
}

export interface ExecutionResult {
  executionId: string;
  status: 'success' | 'error';
  form?: WorkflowForm;
  workflowName?: string;
  output: unknown;
  trace: ExecutionTraceEntry[];
  nodeOutputs?: Record<string, unknown>;
  terminalNodeId?: string;
  plan?: ExecutionPlan;
  errorDetail?: ExecutionErrorDetail;
}

export type WorkflowRunOptions = GraphExecutionOptions;
