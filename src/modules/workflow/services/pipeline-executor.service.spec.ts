import { TestingModule } from '@nestjs/testing';
import {
  AS_OF_DATE,
  INVOICES,
  createWorkflowTestingModule,
  delay,
  fakeNode,
} from '../../../../test/fixtures/workflow-testing';
import {
  NodeExecutionError,
  NodeNotFoundError,
  StructuralError,
  WorkflowTimeoutError,
} from '../errors/workflow.errors';
import { PipelineWorkflowDefinition } from '../interfaces/workflow.interfaces';
import { NodeRegistryService } from './node-registry.service';
import { PipelineExecutor } from './pipeline-executor.service';

describe('PipelineExecutor', () => {
  let module: TestingModule;
  let executor: PipelineExecutor;
  let registry: NodeRegistryService;
  let fetchRun: jest.Mock<Promise<unknown>, []>;

  const agingReport: PipelineWorkflowDefinition = {
    name: 'aging report',
    steps: ['fetch', 'aging', 'group'],
    node_defs: {
      fetch: { type: 'FetchFixture' },
      aging: { type: 'AgingCalculatorNode', parameters: { as_of_date: AS_OF_DATE } },
      group: { type: 'GroupingNode', parameters: { group_by: 'aging_bucket' } },
    },
  };

  beforeEach(async () => {
    module = await createWorkflowTestingModule();
    executor = module.get(PipelineExecutor);
    registry = module.get(NodeRegistryService);

    fetchRun = jest.fn<Promise<unknown>, []>(async () => INVOICES);
    registry.register('FetchFixture', () => fakeNode('FetchFixture', fetchRun));
  });

  afterEach(async () => {
    await module.close();
  });

  it('should chain each step into the next', async () => {
    const outcome = await executor.execute(agingReport, undefined);

    expect(fetchRun).toHaveBeenCalledTimes(1);
    expect(outcome.trace.map(({ nodeId, type, inputSize, outputSize }) => ({
      nodeId,
      type,
      inputSize,
      outputSize,
    }))).toEqual([
      { nodeId: 'fetch', type: 'FetchFixture', inputSize: 0, outputSize: 3 },
      { nodeId: 'aging', type: 'AgingCalculatorNode', inputSize: 3, outputSize: 3 },
      { nodeId: 'group', type: 'GroupingNode', inputSize: 3, outputSize: 3 },
    ]);
    expect(Object.keys(outcome.nodeOutputs)).toEqual(['fetch', 'aging', 'group']);
    expect(outcome.output).toBe(outcome.nodeOutputs.group);
  });

  it('should group the aged records', async () => {
    const outcome = await executor.execute(agingReport, undefined);

    expect(outcome.output).toMatchObject({
      groups: [
        { group_name: '0-30', count: 1, total_amount: 1000 },
        { group_name: '90+', count: 2, total_amount: 1500 },
      ],
    });
  });

  it('should apply overrides on top of declared parameters', async () => {
    const outcome = await executor.execute(agingReport, undefined, {
      overrides: { aging: { as_of_date: '2025-03-01' } },
    });

    expect(outcome.output).toMatchObject({
      groups: [
        { group_name: '31-60', count: 1 },
        { group_name: '90+', count: 2 },
      ],
    });
  });

  it('should pass the run input to the first step', async () => {
    const outcome = await executor.execute(
      {
        steps: ['aging'],
        node_defs: { aging: { type: 'AgingCalculatorNode', parameters: { as_of_date: AS_OF_DATE } } },
      },
      [{ id: 'only', invoice_date: '2025-01-01' }],
    );

    expect(outcome.output).toEqual({
      records: [
        { id: 'only', invoice_date: '2025-01-01', aging_days: 29, overdue_days: 0, aging_bucket: '0-30' },
      ],
    });
  });

  describe('validation', () => {
    it('should reject a step without a node definition before running', async () => {
      await expect(
        executor.execute({ steps: ['fetch', 'ghost'], node_defs: agingReport.node_defs }, undefined),
      ).rejects.toThrow(new StructuralError('Step "ghost" has no node definition'));
      expect(fetchRun).not.toHaveBeenCalled();
    });

    it('should reject unknown node types before running', async () => {
      await expect(
        executor.execute(
          {
            steps: ['fetch', 'export'],
            node_defs: { fetch: { type: 'FetchFixture' }, export: { type: 'ExcelExportNode' } },
          },
          undefined,
        ),
      ).rejects.toThrow(NodeNotFoundError);
      expect(fetchRun).not.toHaveBeenCalled();
    });

    it('should reject repeated and missing steps', () => {
      expect(() => executor.validatePipeline({ steps: [], node_defs: {} })).toThrow(
        'Pipeline must declare at least one step',
      );
      expect(() =>
        executor.validatePipeline({ steps: ['fetch', 'fetch'], node_defs: agingReport.node_defs }),
      ).toThrow('Step "fetch" appears more than once in the pipeline');
    });

    it('should not treat inherited properties as node definitions', () => {
      expect(() =>
        executor.validatePipeline({ steps: ['toString'], node_defs: {} }),
      ).toThrow('Step "toString" has no node definition');
    });
  });

  describe('failures', () => {
    it('should report the failing step with the partial trace', async () => {
      registry.register('BrokenNode', () =>
        fakeNode('BrokenNode', async () => {
          throw new Error('ledger unavailable');
        }),
      );

      const failure = executor.execute(
        {
          steps: ['fetch', 'broken', 'group'],
          node_defs: {
            fetch: { type: 'FetchFixture' },
            broken: { type: 'BrokenNode' },
            group: { type: 'GroupingNode' },
          },
        },
        undefined,
      );

      await expect(failure).rejects.toThrow(NodeExecutionError);
      const error = await failure.catch((reason: unknown) => reason);
      expect(error).toBeInstanceOf(NodeExecutionError);
      if (error instanceof NodeExecutionError) {
        expect(error.message).toBe('Node "broken" (BrokenNode) failed: ledger unavailable');
        expect(error.nodeId).toBe('broken');
        expect(error.trace.map((entry) => entry.nodeId)).toEqual(['fetch']);
        expect(Object.keys(error.partialOutputs)).toEqual(['fetch']);
      }
    });

    it('should wrap parameter errors as node failures', async () => {
      await expect(
        executor.execute(agingReport, undefined, {
          overrides: { aging: { as_of_date: 'not-a-date' } },
        }),
      ).rejects.toThrow(
        'Node "aging" (AgingCalculatorNode) failed: Invalid parameters for AgingCalculatorNode',
      );
    });

    it('should stop at the deadline', async () => {
      registry.register('SlowNode', () =>
        fakeNode('SlowNode', (input: unknown) => delay(100, input)),
      );

      const failure = executor.execute(
        {
          steps: ['fetch', 'slow'],
          node_defs: { fetch: { type: 'FetchFixture' }, slow: { type: 'SlowNode' } },
        },
        undefined,
        { timeoutMs: 20 },
      );

      const error = await failure.catch((reason: unknown) => reason);
      expect(error).toBeInstanceOf(WorkflowTimeoutError);
      if (error instanceof WorkflowTimeoutError) {
        expect(error.code).toBe('TIMEOUT');
        expect(error.nodeId).toBe('slow');
        expect(error.trace.map((entry) => entry.nodeId)).toEqual(['fetch']);
      }
    });
  });
});
