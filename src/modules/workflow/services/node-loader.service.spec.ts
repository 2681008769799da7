import { TestingModule } from '@nestjs/testing';
import { createWorkflowTestingModule } from '../../../../test/fixtures/workflow-testing';
import { DuplicateNodeTypeError } from '../errors/workflow.errors';
import { ALL_NODE_CLASSES, SLACheckerNode } from '../nodes';
import { NodeLoaderService } from './node-loader.service';
import { NodeRegistryService } from './node-registry.service';

describe('NodeLoaderService', () => {
  let module: TestingModule;
  let registry: NodeRegistryService;

  beforeEach(async () => {
    module = await createWorkflowTestingModule({ slaDefaultDays: 10, duplicateTolerance: 0 });
    registry = module.get(NodeRegistryService);
  });

  afterEach(async () => {
    await module.close();
  });

  it('should register every built-in node', () => {
    expect(registry.getTypes()).toEqual(ALL_NODE_CLASSES.map((NodeType) => NodeType.metadata.type));
    expect(registry.getTypes()).toHaveLength(10);
  });

  it('should apply configured defaults to the SLA checker', async () => {
    const node = registry.resolve('SLACheckerNode');
    const result = await node.run([{ due_date: '2025-01-10' }], { as_of_date: '2025-01-30' });

    expect(result).toEqual({
      records: [
        {
          due_date: '2025-01-10',
          sla_deadline: '2025-01-20',
          sla_breach: true,
          breach_days: 10,
          sla_severity: 'Medium',
        },
      ],
    });
  });

  it('should let workflow parameters win over configured defaults', async () => {
    const node = registry.resolve('SLACheckerNode');
    const result = await node.run([{ due_date: '2025-01-10' }], {
      as_of_date: '2025-01-30',
      sla_days: 30,
    });

    expect(result).toEqual({
      records: [
        {
          due_date: '2025-01-10',
          sla_deadline: '2025-02-09',
          sla_breach: false,
          breach_days: 0,
          sla_severity: 'None',
        },
      ],
    });
  });

  it('should refuse to load the same node twice', () => {
    const loader = module.get(NodeLoaderService);

    expect(() => loader.loadAllNodes([SLACheckerNode])).toThrow(DuplicateNodeTypeError);
  });
});
