export type NodeParameters = Record<string, unknown>;

/**
 * Per-node parameter overrides keyed by node or step id
 */
export type ParameterOverrides = Record<string, NodeParameters>;

export type WorkflowForm = 'pipeline' | 'graph';

export type EdgeHint = 'sequential' | 'parallel';

export interface NodePosition {
  x: number;
  y: number;
}

export interface NodeDefinition {
  id: string;
  type: string;
  parameters?: NodeParameters;
  name?: string;
  position?: NodePosition;
  metadata?: Record<string, unknown>;
}

export interface EdgeDefinition {
  source: string;
  target: string;
  hint?: EdgeHint;
}

export interface PipelineStepDefinition {
  type: string;
  parameters?: NodeParameters;
  name?: string;
}

export interface PipelineWorkflowDefinition {
  name?: string;
  steps: string[];
  node_defs: Record<string, PipelineStepDefinition>;
}

export interface GraphWorkflowDefinition {
  name?: string;
  nodes: NodeDefinition[];
  edges: EdgeDefinition[];
}

export type ParsedWorkflowDefinition =
  | { form: 'pipeline'; definition: PipelineWorkflowDefinition }
  | { form: 'graph'; definition: GraphWorkflowDefinition };
