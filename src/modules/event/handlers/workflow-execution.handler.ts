import { Injectable, Logger } from '@nestjs/common';
import { EventBusService } from '../services/event-bus.service';
import { EventTypes } from '../constants/event-types';
import {
  WorkflowExecutionCompletedEvent,
  WorkflowExecutionFailedEvent,
  WorkflowExecutionStartedEvent,
} from '../interfaces/event.interface';

@Injectable()
export class WorkflowExecutionHandler {
  private readonly logger = new Logger(WorkflowExecutionHandler.name);

  constructor(private readonly eventBus: EventBusService) {
    this.setupEventListeners();
  }

  private setupEventListeners(): void {
    this.eventBus.subscribe(
      EventTypes.WORKFLOW_EXECUTION_STARTED,
      this.handleExecutionStarted.bind(this),
    );
    this.eventBus.subscribe(
      EventTypes.WORKFLOW_EXECUTION_COMPLETED,
      this.handleExecutionCompleted.bind(this),
    );
    this.eventBus.subscribe(
      EventTypes.WORKFLOW_EXECUTION_FAILED,
      this.handleExecutionFailed.bind(this),
    );
  }

  private handleExecutionStarted(event: WorkflowExecutionStartedEvent): void {
    this.logger.debug(
      `Execution ${event.payload.executionId} started (${event.payload.form}${
        event.payload.workflowName ? `: ${event.payload.workflowName}` : ''
      })`,
    );
  }

  private handleExecutionCompleted(event: WorkflowExecutionCompletedEvent): void {
    this.logger.log(
      `Execution ${event.payload.executionId} completed: ${event.payload.nodesExecuted} nodes in ${event.payload.durationMs}ms`,
    );
  }

  private handleExecutionFailed(event: WorkflowExecutionFailedEvent): void {
    this.logger.warn(
      `Execution ${event.payload.executionId} failed [${event.payload.errorCode}]${
        event.payload.nodeId ? ` at node ${event.payload.nodeId}` : ''
      }: ${event.payload.error}`,
    );
  }
}
