import { EventTypes } from '../constants/event-types';
import type { WorkflowForm } from '../../workflow/interfaces/workflow.interfaces';

export interface WorkflowExecutionStartedEvent {
  type: EventTypes.WORKFLOW_EXECUTION_STARTED;
  payload: {
    executionId: string;
    workflowName?: string;
    form: WorkflowForm;
  };
  timestamp: number;
}

export interface WorkflowExecutionCompletedEvent {
  type: EventTypes.WORKFLOW_EXECUTION_COMPLETED;
  payload: {
    executionId: string;
    workflowName?: string;
    form: WorkflowForm;
    nodesExecuted: number;
    durationMs: number;
  };
  timestamp: number;
}

export interface WorkflowExecutionFailedEvent {
  type: EventTypes.WORKFLOW_EXECUTION_FAILED;
  payload: {
    executionId: string;
    workflowName?: string;
    form?: WorkflowForm;
    errorCode: string;
    error: string;
    nodeId?: string;
    durationMs: number;
  };
  timestamp: number;
}

export interface WorkflowNodeCompletedEvent {
  type: EventTypes.WORKFLOW_NODE_COMPLETED;
  payload: {
    executionId?: string;
    nodeId: string;
    nodeType: string;
    durationMs: number;
    inputSize: number;
    outputSize: number;
  };
  timestamp: number;
}

export interface WorkflowNodeFailedEvent {
  type: EventTypes.WORKFLOW_NODE_FAILED;
  payload: {
    executionId?: string;
    nodeId: string;
    nodeType: string;
    error: string;
  };
  timestamp: number;
}

export type WorkflowExecutionEvent =
  | WorkflowExecutionStartedEvent
  | WorkflowExecutionCompletedEvent
  | WorkflowExecutionFailedEvent;

export type WorkflowNodeEvent = WorkflowNodeCompletedEvent | WorkflowNodeFailedEvent;

export type Event = WorkflowExecutionEvent | WorkflowNodeEvent;

export type EventOfType<T extends EventTypes> = Extract<Event, { type: T }>;
