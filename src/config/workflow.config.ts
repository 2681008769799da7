import { registerAs } from '@nestjs/config';

export type ExecutionMode = 'sequential' | 'parallel';

export interface WorkflowConfig {
  timeoutMs: number; // overall deadline per run, 0 disables it
  executionMode: ExecutionMode;
  maxParallelism: number;
  slaDefaultDays: number;
  duplicateTolerance: number;
}

export const WORKFLOW_CONFIG_KEY = 'workflow';

export const DEFAULT_WORKFLOW_CONFIG: WorkflowConfig = {
  timeoutMs: 0,
  executionMode: 'sequential',
  maxParallelism: 4,
  slaDefaultDays: 30,
  duplicateTolerance: 0.01,
};

function parseNonNegative(value: string | undefined, fallback: number): number {
  const parsed = Number(value);
  return value !== undefined && value.trim() !== '' && Number.isFinite(parsed) && parsed >= 0
    ? parsed
    : fallback;
}

export default registerAs(
  WORKFLOW_CONFIG_KEY,
  (): WorkflowConfig => ({
    timeoutMs: parseNonNegative(
      process.env.WORKFLOW_TIMEOUT_MS,
      DEFAULT_WORKFLOW_CONFIG.timeoutMs,
    ),
    executionMode:
      process.env.WORKFLOW_EXECUTION_MODE === 'parallel' ? 'parallel' : 'sequential',
    maxParallelism: Math.max(
      1,
      Math.floor(
        parseNonNegative(
          process.env.WORKFLOW_MAX_PARALLELISM,
          DEFAULT_WORKFLOW_CONFIG.maxParallelism,
        ),
      ),
    ),
    slaDefaultDays: Math.floor(
      parseNonNegative(process.env.SLA_DEFAULT_DAYS, DEFAULT_WORKFLOW_CONFIG.slaDefaultDays),
    ),
    duplicateTolerance: parseNonNegative(
      process.env.DUPLICATE_TOLERANCE,
      DEFAULT_WORKFLOW_CONFIG.duplicateTolerance,
    ),
  }),
);
