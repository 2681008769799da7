import { Injectable, Logger } from '@nestjs/common';
import { v4 as uuidv4 } from 'uuid';
import { EventTypes } from '../../event/constants/event-types';
import { EventBusService } from '../../event/services/event-bus.service';
import {
  NodeExecutionError,
  WORKFLOW_ERROR_CODES,
  WorkflowError,
  WorkflowTimeoutError,
  describeError,
} from '../errors/workflow.errors';
import {
  ExecutionErrorDetail,
  ExecutionResult,
  ExecutionTraceEntry,
  WorkflowRunOptions,
} from '../interfaces/execution.interfaces';
import { NodeCategory, NodeMetadata } from '../interfaces/node.interfaces';
import { WorkflowForm } from '../interfaces/workflow.interfaces';
import { isPlainObject } from '../utils/record.utils';
import { GraphExecutor } from './graph-executor.service';
import { NodeRegistryService } from './node-registry.service';
import { PipelineExecutor } from './pipeline-executor.service';
import { WorkflowDefinitionValidator } from './workflow-definition.validator';

/**
 * Entry point for running a serialized workflow. Detects the form,
 * dispatches to the matching executor and always answers with an
 * ExecutionResult.
 */
@Injectable()
export class WorkflowRunnerService {
  private readonly logger = new Logger(WorkflowRunnerService.name);

  constructor(
    private readonly definitionValidator: WorkflowDefinitionValidator,
    private readonly pipelineExecutor: PipelineExecutor,
    private readonly graphExecutor: GraphExecutor,
    private readonly nodeRegistry: NodeRegistryService,
    private readonly eventBus: EventBusService,
  ) {}

  async run(
    definition: unknown,
    input?: unknown,
    options: WorkflowRunOptions = {},
  ): Promise<ExecutionResult> {
    const executionId = options.executionId ?? uuidv4();
    const startTime = Date.now();
    const form = this.definitionValidator.detectForm(definition);
    const workflowName =
      isPlainObject(definition) && typeof definition.name === 'string'
        ? definition.name
        : undefined;

    this.logger.log(`Starting workflow execution: ${executionId}`);

    try {
      const parsed = this.definitionValidator.parse(definition);

      this.eventBus.publish({
        type: EventTypes.WORKFLOW_EXECUTION_STARTED,
        payload: { executionId, workflowName, form: parsed.form },
        timestamp: Date.now(),
      });

      const result: ExecutionResult =
        parsed.form === 'pipeline'
          ? {
              executionId,
              status: 'success',
              form: parsed.form,
              workflowName,
              ...(await this.pipelineExecutor.execute(parsed.definition, input, {
                ...options,
                executionId,
              })),
            }
          : {
              executionId,
              status: 'success',
              form: parsed.form,
              workflowName,
              ...(await this.graphExecutor.execute(parsed.definition, input, {
                ...options,
                executionId,
              })),
            };

      this.eventBus.publish({
        type: EventTypes.WORKFLOW_EXECUTION_COMPLETED,
        payload: {
          executionId,
          workflowName,
          form: parsed.form,
          nodesExecuted: result.trace.length,
          durationMs: Date.now() - startTime,
        },
        timestamp: Date.now(),
      });

      return result;
    } catch (error) {
      return this.toErrorResult(executionId, form, workflowName, error, startTime);
    }
  }

  /**
   * Registered node catalogue grouped by category
   */
  listNodes(): Partial<Record<NodeCategory, NodeMetadata[]>> {
    return this.nodeRegistry.getMetadataByCategory();
  }

  private toErrorResult(
    executionId: string,
    form: WorkflowForm | undefined,
    workflowName: string | undefined,
    error: unknown,
    startTime: number,
  ): ExecutionResult {
    const errorDetail = this.toErrorDetail(error);
    let trace: ExecutionTraceEntry[] = [];
    let nodeOutputs: Record<string, unknown> | undefined;

    if (error instanceof NodeExecutionError || error instanceof WorkflowTimeoutError) {
      trace = error.trace;
      nodeOutputs = error.partialOutputs;
    }

    if (error instanceof WorkflowError) {
      this.logger.warn(`Workflow execution failed: ${executionId} - ${error.message}`);
    } else {
      this.logger.error(
        `Workflow execution failed unexpectedly: ${executionId}`,
        error instanceof Error ? error.stack : undefined,
      );
    }

    this.eventBus.publish({
      type: EventTypes.WORKFLOW_EXECUTION_FAILED,
      payload: {
        executionId,
        workflowName,
        form,
        errorCode: errorDetail.code,
        error: errorDetail.message,
        nodeId: errorDetail.nodeId,
        durationMs: Date.now() - startTime,
      },
      timestamp: Date.now(),
    });

    return {
      executionId,
      status: 'error',
      form,
      workflowName,
      output: null,
      trace,
      nodeOutputs,
      errorDetail,
    };
  }

  private toErrorDetail(error: unknown): ExecutionErrorDetail {
    if (error instanceof NodeExecutionError || error instanceof WorkflowTimeoutError) {
      return { code: error.code, message: error.message, nodeId: error.nodeId };
    }
    if (error instanceof WorkflowError) {
      return { code: error.code, message: error.message };
    }
    return { code: WORKFLOW_ERROR_CODES.INTERNAL_ERROR, message: describeError(error) };
  }
}
