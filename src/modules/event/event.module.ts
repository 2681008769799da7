// src/modules/event/event.module.ts
import { Module } from '@nestjs/common';
import { EventEmitterModule } from '@nestjs/event-emitter';
import { EventBusService } from './services/event-bus.service';
import { WorkflowExecutionHandler } from './handlers/workflow-execution.handler';

@Module({
  imports: [EventEmitterModule.forRoot()],
  providers: [EventBusService, WorkflowExecutionHandler],
  exports: [EventBusService],
})
export class EventModule {}
