import { Module, OnModuleInit } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import workflowConfig from '../../config/workflow.config';
import { EventModule } from '../event/event.module';
import { GraphExecutor } from './services/graph-executor.service';
import { NodeInvokerService } from './services/node-invoker.service';
import { NodeLoaderService } from './services/node-loader.service';
import { NodeRegistryService } from './services/node-registry.service';
import { PipelineExecutor } from './services/pipeline-executor.service';
import { WorkflowDefinitionValidator } from './services/workflow-definition.validator';
import { WorkflowRunnerService } from './services/workflow-runner.service';

@Module({
  imports: [ConfigModule.forFeature(workflowConfig), EventModule],
  providers: [
    // Core services
    NodeRegistryService,
    NodeLoaderService,
    NodeInvokerService,
    WorkflowDefinitionValidator,

    // Executors
    PipelineExecutor,
    GraphExecutor,
    WorkflowRunnerService,
  ],
  exports: [NodeRegistryService, PipelineExecutor, GraphExecutor, WorkflowRunnerService],
})
export class WorkflowModule implements OnModuleInit {
  constructor(private readonly nodeLoader: NodeLoaderService) {}

  onModuleInit(): void {
    // Register all built-in nodes
    this.nodeLoader.loadAllNodes();
  }
}
