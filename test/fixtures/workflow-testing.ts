import { ConfigModule } from '@nestjs/config';
import { Test, TestingModule } from '@nestjs/testing';
import {
  DEFAULT_WORKFLOW_CONFIG,
  WORKFLOW_CONFIG_KEY,
  WorkflowConfig,
} from '../../src/config/workflow.config';
import { EventModule } from '../../src/modules/event/event.module';
import { INode } from '../../src/modules/workflow/interfaces/node.interfaces';
import { GraphExecutor } from '../../src/modules/workflow/services/graph-executor.service';
import { NodeInvokerService } from '../../src/modules/workflow/services/node-invoker.service';
import { NodeLoaderService } from '../../src/modules/workflow/services/node-loader.service';
import { NodeRegistryService } from '../../src/modules/workflow/services/node-registry.service';
import { PipelineExecutor } from '../../src/modules/workflow/services/pipeline-executor.service';
import { WorkflowDefinitionValidator } from '../../src/modules/workflow/services/workflow-definition.validator';
import { WorkflowRunnerService } from '../../src/modules/workflow/services/workflow-runner.service';

export const AS_OF_DATE = '2025-01-30';

export const INVOICES = [
  {
    id: 'inv-1',
    vendor_name: 'Acme Supplies',
    invoice_number: 'INV-1001',
    invoice_date: '2025-01-01',
    due_date: '2025-01-31',
    total_amount: 1000,
    paid_amount: 0,
  },
  {
    id: 'inv-2',
    vendor_name: 'Globex Trading',
    invoice_number: 'INV-1002',
    invoice_date: '2024-10-01',
    due_date: '2024-10-31',
    total_amount: 500,
    paid_amount: 500,
  },
  {
    id: 'inv-3',
    vendor_name: 'Acme Supplies',
    invoice_number: 'INV-1003',
    invoice_date: '2024-09-01',
    due_date: '2024-10-01',
    total_amount: 1000,
    paid_amount: 0,
  },
];

export const delay = <T>(ms: number, value: T): Promise<T> =>
  new Promise((resolve) => setTimeout(() => resolve(value), ms));

/**
 * Minimal node for wiring tests
 */
export function fakeNode(type: string, run: INode['run']): INode {
  return {
    type,
    run,
    validate: () => ({ isValid: true, errors: [] }),
    getMetadata: () => ({
      type,
      name: type,
      category: 'data',
      description: 'Test node',
      version: '1.0.0',
      inputSchema: {},
      outputSchema: {},
    }),
  };
}

/**
 * Workflow services with the built-in nodes registered, isolated from
 * environment variables
 */
export async function createWorkflowTestingModule(
  config: Partial<WorkflowConfig> = {},
): Promise<TestingModule> {
  const module = await Test.createTestingModule({
    imports: [
      ConfigModule.forRoot({
        ignoreEnvFile: true,
        load: [() => ({ [WORKFLOW_CONFIG_KEY]: { ...DEFAULT_WORKFLOW_CONFIG, ...config } })],
      }),
      EventModule,
    ],
    providers: [
      NodeRegistryService,
      NodeLoaderService,
      NodeInvokerService,
      WorkflowDefinitionValidator,
      PipelineExecutor,
      GraphExecutor,
      WorkflowRunnerService,
    ],
  }).compile();

  module.get(NodeLoaderService).loadAllNodes();
  return module;
}
