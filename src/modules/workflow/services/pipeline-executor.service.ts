import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  DEFAULT_WORKFLOW_CONFIG,
  WORKFLOW_CONFIG_KEY,
  WorkflowConfig,
} from '../../../config/workflow.config';
import {
  DeadlineExceededError,
  NodeExecutionError,
  NodeNotFoundError,
  StructuralError,
  WorkflowTimeoutError,
} from '../errors/workflow.errors';
import {
  ExecutionOptions,
  ExecutionTraceEntry,
  PipelineExecutionOutcome,
} from '../interfaces/execution.interfaces';
import {
  PipelineStepDefinition,
  PipelineWorkflowDefinition,
} from '../interfaces/workflow.interfaces';
import { Deadline, mergeParameters } from '../utils/execution.utils';
import { NodeInvokerService } from './node-invoker.service';
import { NodeRegistryService } from './node-registry.service';

/**
 * Linear executor: each step receives the previous step's output.
 */
@Injectable()
export class PipelineExecutor {
  private readonly logger = new Logger(PipelineExecutor.name);

  constructor(
    private readonly nodeRegistry: NodeRegistryService,
    private readonly nodeInvoker: NodeInvokerService,
    private readonly configService: ConfigService,
  ) {}

  /**
   * Checks every step before anything runs
   */
  validatePipeline(definition: PipelineWorkflowDefinition): void {
    if (definition.steps.length === 0) {
      throw new StructuralError('Pipeline must declare at least one step');
    }

    const seen = new Set<string>();
    for (const stepId of definition.steps) {
      if (seen.has(stepId)) {
        throw new StructuralError(`Step "${stepId}" appears more than once in the pipeline`);
      }
      seen.add(stepId);

      const step = this.findStep(definition, stepId);
      if (!this.nodeRegistry.has(step.type)) {
        throw new NodeNotFoundError(step.type);
      }
    }
  }

  async execute(
    definition: PipelineWorkflowDefinition,
    input: unknown,
    options: ExecutionOptions = {},
  ): Promise<PipelineExecutionOutcome> {
    this.validatePipeline(definition);

    const config =
      this.configService.get<WorkflowConfig>(WORKFLOW_CONFIG_KEY) ?? DEFAULT_WORKFLOW_CONFIG;
    const deadline = new Deadline(options.timeoutMs ?? config.timeoutMs);
    const trace: ExecutionTraceEntry[] = [];
    const nodeOutputs: Record<string, unknown> = {};
    let data = input;

    this.logger.log(
      `Starting pipeline${definition.name ? ` ${definition.name}` : ''}: ${
        definition.steps.length
      } steps`,
    );

    for (const stepId of definition.steps) {
      const step = this.findStep(definition, stepId);

      try {
        const { output, trace: entry } = await this.nodeInvoker.invoke({
          nodeId: stepId,
          nodeType: step.type,
          input: data,
          parameters: mergeParameters(step.parameters, options.overrides?.[stepId]),
          deadline,
          executionId: options.executionId,
        });
        trace.push(entry);
        nodeOutputs[stepId] = output;
        data = output;
      } catch (error) {
        if (error instanceof DeadlineExceededError) {
          throw new WorkflowTimeoutError(error.timeoutMs, [...trace], { ...nodeOutputs }, stepId);
        }
        throw new NodeExecutionError(stepId, step.type, error, [...trace], { ...nodeOutputs });
      }
    }

    this.logger.log(`Pipeline completed: ${trace.length} steps executed`);
    return { output: data, trace, nodeOutputs };
  }

  private findStep(
    definition: PipelineWorkflowDefinition,
    stepId: string,
  ): PipelineStepDefinition {
    const step = Object.prototype.hasOwnProperty.call(definition.node_defs, stepId)
      ? definition.node_defs[stepId]
      : undefined;
    if (!step) {
      throw new StructuralError(`Step "${stepId}" has no node definition`);
    }
    return step;
  }
}
