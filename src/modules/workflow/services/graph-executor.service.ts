import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  DEFAULT_WORKFLOW_CONFIG,
  ExecutionMode,
  WORKFLOW_CONFIG_KEY,
  WorkflowConfig,
} from '../../../config/workflow.config';
import { ExecutionGraph, GraphVertex } from '../graph/execution-graph';
import { NodeOutputStore } from '../graph/node-output-store';
import {
  DeadlineExceededError,
  NodeExecutionError,
  NodeNotFoundError,
  StructuralError,
  WorkflowTimeoutError,
} from '../errors/workflow.errors';
import {
  ExecutionTraceEntry,
  GraphExecutionOptions,
  GraphExecutionOutcome,
} from '../interfaces/execution.interfaces';
import { GraphWorkflowDefinition, ParameterOverrides } from '../interfaces/workflow.interfaces';
import { Deadline, mergeParameters, sizeOf } from '../utils/execution.utils';
import { NodeInvokerService } from './node-invoker.service';
import { NodeRegistryService } from './node-registry.service';

interface GraphRun {
  graph: ExecutionGraph;
  initialInput: unknown;
  outputs: NodeOutputStore;
  /** Trace entries indexed by topological rank */
  traceByRank: Array<ExecutionTraceEntry | undefined>;
  overrides: ParameterOverrides;
  deadline: Deadline;
  executionId?: string;
}

interface RoutedInput {
  input: unknown;
  size: number;
}

/**
 * Executes a workflow graph in topological order.
 *
 * Sequential mode runs one node at a time. Parallel mode walks the stages and
 * launches nodes whose incoming edges are all parallel-eligible together, in
 * chunks of maxParallelism; output and trace are the same in both modes.
 */
@Injectable()
export class GraphExecutor {
  private readonly logger = new Logger(GraphExecutor.name);

  constructor(
    private readonly nodeRegistry: NodeRegistryService,
    private readonly nodeInvoker: NodeInvokerService,
    private readonly configService: ConfigService,
  ) {}

  /**
   * Structural and registry validation. Throws before any node runs.
   */
  buildGraph(definition: GraphWorkflowDefinition): ExecutionGraph {
    const graph = ExecutionGraph.build(definition.nodes, definition.edges);

    for (const vertex of graph.vertices) {
      if (!this.nodeRegistry.has(vertex.definition.type)) {
        throw new NodeNotFoundError(vertex.definition.type);
      }
    }

    return graph;
  }

  async execute(
    definition: GraphWorkflowDefinition,
    input: unknown,
    options: GraphExecutionOptions = {},
  ): Promise<GraphExecutionOutcome> {
    const graph = this.buildGraph(definition);
    const terminal = this.resolveTerminal(graph, options.terminalNodeId);

    const config =
      this.configService.get<WorkflowConfig>(WORKFLOW_CONFIG_KEY) ?? DEFAULT_WORKFLOW_CONFIG;
    const mode: ExecutionMode = options.executionMode ?? config.executionMode;
    const maxParallelism = Math.max(1, options.maxParallelism ?? config.maxParallelism);

    const run: GraphRun = {
      graph,
      initialInput: input,
      outputs: new NodeOutputStore(),
      traceByRank: new Array<ExecutionTraceEntry | undefined>(graph.size).fill(undefined),
      overrides: options.overrides ?? {},
      deadline: new Deadline(options.timeoutMs ?? config.timeoutMs),
      executionId: options.executionId,
    };

    this.logger.log(
      `Starting graph${definition.name ? ` ${definition.name}` : ''}: ${graph.size} nodes, ${
        graph.stages.length
      } stages, ${mode} mode`,
    );

    if (mode === 'parallel') {
      await this.executeStages(run, maxParallelism);
    } else {
      for (const vertex of graph.order) {
        await this.executeVertexOrFail(run, vertex);
      }
    }

    this.logger.log(`Graph completed: terminal node ${terminal.definition.id}`);

    return {
      output: run.outputs.get(terminal.definition.id),
      terminalNodeId: terminal.definition.id,
      trace: this.collectTrace(run),
      nodeOutputs: run.outputs.toRecord(),
      plan: graph.toPlan(),
    };
  }

  private resolveTerminal(graph: ExecutionGraph, terminalNodeId?: string): GraphVertex {
    if (terminalNodeId === undefined) {
      return graph.terminal;
    }
    const vertex = graph.find(terminalNodeId);
    if (!vertex) {
      throw new StructuralError(`Terminal node "${terminalNodeId}" is not declared`);
    }
    return vertex;
  }

  private async executeStages(run: GraphRun, maxParallelism: number): Promise<void> {
    for (const stage of run.graph.stages) {
      const concurrent = stage.filter((vertex) =>
        vertex.incomingHints.every((hint) => hint === 'parallel'),
      );
      const serial = stage.filter((vertex) => !concurrent.includes(vertex));

      for (let offset = 0; offset < concurrent.length; offset += maxParallelism) {
        const batch = concurrent.slice(offset, offset + maxParallelism);
        const settled = await Promise.allSettled(
          batch.map((vertex) => this.executeVertex(run, vertex)),
        );

        // Batch members are in rank order, so the first rejection is the lowest rank
        const failureIndex = settled.findIndex((result) => result.status === 'rejected');
        const failure = settled[failureIndex];
        if (failure && failure.status === 'rejected') {
          throw this.toExecutionError(run, batch[failureIndex], failure.reason);
        }
      }

      for (const vertex of serial) {
        await this.executeVertexOrFail(run, vertex);
      }
    }
  }

  private async executeVertexOrFail(run: GraphRun, vertex: GraphVertex): Promise<void> {
    try {
      await this.executeVertex(run, vertex);
    } catch (error) {
      throw this.toExecutionError(run, vertex, error);
    }
  }

  private async executeVertex(run: GraphRun, vertex: GraphVertex): Promise<void> {
    const { id, type, parameters } = vertex.definition;
    const routed = this.routeInput(run, vertex);

    const { output, trace } = await this.nodeInvoker.invoke({
      nodeId: id,
      nodeType: type,
      input: routed.input,
      inputSize: routed.size,
      parameters: mergeParameters(parameters, run.overrides[id]),
      deadline: run.deadline,
      executionId: run.executionId,
    });

    run.outputs.set(id, output);
    run.traceByRank[vertex.rank] = trace;
  }

  /**
   * No predecessors: the initial input. One: its output. Several: a map
   * keyed by predecessor id in edge declaration order.
   */
  private routeInput(run: GraphRun, vertex: GraphVertex): RoutedInput {
    const predecessors = run.graph.predecessorsOf(vertex);

    if (predecessors.length === 0) {
      return { input: run.initialInput, size: sizeOf(run.initialInput) };
    }

    if (predecessors.length === 1) {
      const output = run.outputs.get(predecessors[0].definition.id);
      return { input: output, size: sizeOf(output) };
    }

    const input = Object.fromEntries(
      predecessors.map((predecessor) => [
        predecessor.definition.id,
        run.outputs.get(predecessor.definition.id),
      ]),
    );
    return { input, size: predecessors.length };
  }

  private toExecutionError(run: GraphRun, vertex: GraphVertex, error: unknown): Error {
    const trace = this.collectTrace(run);
    const partialOutputs = run.outputs.toRecord();

    if (error instanceof DeadlineExceededError) {
      return new WorkflowTimeoutError(error.timeoutMs, trace, partialOutputs, vertex.definition.id);
    }
    return new NodeExecutionError(
      vertex.definition.id,
      vertex.definition.type,
      error,
      trace,
      partialOutputs,
    );
  }

  private collectTrace(run: GraphRun): ExecutionTraceEntry[] {
    return run.traceByRank.filter(
      (entry): entry is ExecutionTraceEntry => entry !== undefined,
    );
  }
}
