import { Injectable, Logger } from '@nestjs/common';
import { EventTypes } from '../../event/constants/event-types';
import { EventBusService } from '../../event/services/event-bus.service';
import { describeError } from '../errors/workflow.errors';
import { ExecutionTraceEntry } from '../interfaces/execution.interfaces';
import { NodeParameters } from '../interfaces/workflow.interfaces';
import { Deadline, sizeOf } from '../utils/execution.utils';
import { NodeRegistryService } from './node-registry.service';

export interface NodeInvocation {
  nodeId: string;
  nodeType: string;
  input: unknown;
  /** Defaults to sizeOf(input) */
  inputSize?: number;
  parameters: NodeParameters;
  deadline: Deadline;
  executionId?: string;
}

export interface NodeInvocationResult {
  output: unknown;
  trace: ExecutionTraceEntry;
}

/**
 * Runs one node under the run deadline and reports it. Shared by the
 * pipeline and graph executors; errors are rethrown untouched.
 */
@Injectable()
export class NodeInvokerService {
  private readonly logger = new Logger(NodeInvokerService.name);

  constructor(
    private readonly nodeRegistry: NodeRegistryService,
    private readonly eventBus: EventBusService,
  ) {}

  async invoke(invocation: NodeInvocation): Promise<NodeInvocationResult> {
    const { nodeId, nodeType, input, parameters, deadline, executionId } = invocation;

    deadline.assertNotExpired();

    const node = this.nodeRegistry.resolve(nodeType);
    const inputSize = invocation.inputSize ?? sizeOf(input);
    const startTime = Date.now();

    try {
      const output = await deadline.race(node.run(input, parameters));
      const trace: ExecutionTraceEntry = {
        nodeId,
        type: nodeType,
        durationMs: Date.now() - startTime,
        inputSize,
        outputSize: sizeOf(output),
      };

      this.logger.debug(
        `Node ${nodeId} (${nodeType}) completed in ${trace.durationMs}ms: ${inputSize} -> ${trace.outputSize}`,
      );
      this.eventBus.publish({
        type: EventTypes.WORKFLOW_NODE_COMPLETED,
        payload: {
          executionId,
          nodeId,
          nodeType,
          durationMs: trace.durationMs,
          inputSize,
          outputSize: trace.outputSize,
        },
        timestamp: Date.now(),
      });

      return { output, trace };
    } catch (error) {
      this.logger.error(`Node ${nodeId} (${nodeType}) failed: ${describeError(error)}`);
      this.eventBus.publish({
        type: EventTypes.WORKFLOW_NODE_FAILED,
        payload: { executionId, nodeId, nodeType, error: describeError(error) },
        timestamp: Date.now(),
      });
      throw error;
    }
  }
}
