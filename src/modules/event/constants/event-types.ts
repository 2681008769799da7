// src/modules/event/constants/event-types.ts
export enum EventTypes {
  // Workflow Execution Events
  WORKFLOW_EXECUTION_STARTED = 'workflow.execution.started',
  WORKFLOW_EXECUTION_COMPLETED = 'workflow.execution.completed',
  WORKFLOW_EXECUTION_FAILED = 'workflow.execution.failed',

  // Workflow Node Events
  WORKFLOW_NODE_COMPLETED = 'workflow.node.completed',
  WORKFLOW_NODE_FAILED = 'workflow.node.failed',
}
