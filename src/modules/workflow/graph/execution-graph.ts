import { CyclicWorkflowError, StructuralError } from '../errors/workflow.errors';
import { ExecutionPlan } from '../interfaces/execution.interfaces';
import {
  EdgeDefinition,
  EdgeHint,
  NodeDefinition,
} from '../interfaces/workflow.interfaces';

export interface GraphVertex {
  /** Declaration index */
  index: number;
  /** Position in the topological order */
  rank: number;
  stage: number;
  definition: NodeDefinition;
  /** Predecessor indices in edge declaration order */
  predecessors: number[];
  incomingHints: EdgeHint[];
}

/**
 * Validated, topologically ordered workflow graph.
 *
 * Nodes live in an arena indexed by declaration order; adjacency and
 * in-degree are plain arrays over those indices.
 */
export class ExecutionGraph {
  private constructor(
    /** Vertices in declaration order */
    readonly vertices: readonly GraphVertex[],
    /** Vertices in topological order */
    readonly order: readonly GraphVertex[],
    readonly stages: readonly (readonly GraphVertex[])[],
  ) {}

  /**
   * Validates the structure and orders it. Nothing here looks at node
   * types; registry checks belong to the executor.
   */
  static build(nodes: NodeDefinition[], edges: EdgeDefinition[]): ExecutionGraph {
    if (nodes.length === 0) {
      throw new StructuralError('Workflow graph must declare at least one node');
    }

    const indexById = new Map<string, number>();
    nodes.forEach((node, index) => {
      if (indexById.has(node.id)) {
        throw new StructuralError(`Duplicate node id: "${node.id}"`);
      }
      indexById.set(node.id, index);
    });

    const successors: number[][] = nodes.map(() => []);
    const predecessors: number[][] = nodes.map(() => []);
    const incomingHints: EdgeHint[][] = nodes.map(() => []);
    const inDegree: number[] = nodes.map(() => 0);
    const seenEdges = new Set<string>();

    for (const edge of edges) {
      const source = indexById.get(edge.source);
      const target = indexById.get(edge.target);
      if (source === undefined) {
        throw new StructuralError(`Edge references undefined node: "${edge.source}"`);
      }
      if (target === undefined) {
        throw new StructuralError(`Edge references undefined node: "${edge.target}"`);
      }

      const edgeKey = `${source}->${target}`;
      if (seenEdges.has(edgeKey)) {
        throw new StructuralError(`Duplicate edge: "${edge.source}" -> "${edge.target}"`);
      }
      seenEdges.add(edgeKey);

      successors[source].push(target);
      predecessors[target].push(source);
      incomingHints[target].push(edge.hint ?? 'sequential');
      inDegree[target] += 1;
    }

    const orderIndices = kahnOrder(successors, inDegree);
    if (orderIndices.length < nodes.length) {
      const ordered = new Set(orderIndices);
      throw new CyclicWorkflowError(
        nodes.filter((_, index) => !ordered.has(index)).map((node) => node.id),
      );
    }

    const vertices: GraphVertex[] = nodes.map((definition, index) => ({
      index,
      rank: -1,
      stage: 0,
      definition,
      predecessors: predecessors[index],
      incomingHints: incomingHints[index],
    }));

    const order = orderIndices.map((index, rank) => {
      const vertex = vertices[index];
      vertex.rank = rank;
      // Predecessors are already placed, so their stages are final
      vertex.stage = vertex.predecessors.reduce(
        (stage, predecessor) => Math.max(stage, vertices[predecessor].stage + 1),
        0,
      );
      return vertex;
    });

    const stages: GraphVertex[][] = [];
    for (const vertex of order) {
      while (stages.length <= vertex.stage) {
        stages.push([]);
      }
      stages[vertex.stage].push(vertex);
    }

    return new ExecutionGraph(vertices, order, stages);
  }

  get size(): number {
    return this.vertices.length;
  }

  get terminal(): GraphVertex {
    return this.order[this.order.length - 1];
  }

  find(nodeId: string): GraphVertex | undefined {
    return this.vertices.find((vertex) => vertex.definition.id === nodeId);
  }

  predecessorsOf(vertex: GraphVertex): GraphVertex[] {
    return vertex.predecessors.map((index) => this.vertices[index]);
  }

  toPlan(): ExecutionPlan {
    return {
      order: this.order.map((vertex) => vertex.definition.id),
      stages: this.stages.map((stage) => stage.map((vertex) => vertex.definition.id)),
    };
  }
}

/**
 * Kahn's algorithm. The ready set is kept sorted by declaration index so
 * the order is deterministic. Returns fewer indices than nodes on a cycle.
 */
function kahnOrder(successors: number[][], initialInDegree: number[]): number[] {
  const inDegree = [...initialInDegree];
  const ready: number[] = [];
  inDegree.forEach((degree, index) => {
    if (degree === 0) ready.push(index);
  });

  const order: number[] = [];
  while (ready.length > 0) {
    const current = ready.shift();
    if (current === undefined) break;
    order.push(current);

    for (const successor of successors[current]) {
      inDegree[successor] -= 1;
      if (inDegree[successor] === 0) {
        insertSorted(ready, successor);
      }
    }
  }

  return order;
}

function insertSorted(queue: number[], value: number): void {
  let position = queue.length;
  while (position > 0 && queue[position - 1] > value) {
    position -= 1;
  }
  queue.splice(position, 0, value);
}
