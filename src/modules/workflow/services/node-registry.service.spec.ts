import { Test, TestingModule } from '@nestjs/testing';
import { fakeNode } from '../../../../test/fixtures/workflow-testing';
import { DuplicateNodeTypeError, NodeNotFoundError } from '../errors/workflow.errors';
import { SortNode } from '../nodes';
import { NodeRegistryService } from './node-registry.service';

describe('NodeRegistryService', () => {
  let registry: NodeRegistryService;

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [NodeRegistryService],
    }).compile();

    registry = module.get<NodeRegistryService>(NodeRegistryService);
  });

  it('should resolve a fresh instance per call', () => {
    registry.register('SortNode', () => new SortNode());

    const first = registry.resolve('SortNode');
    const second = registry.resolve('SortNode');

    expect(first).toBeInstanceOf(SortNode);
    expect(first).not.toBe(second);
  });

  it('should reject a second registration of the same type', () => {
    registry.register('SortNode', () => new SortNode());

    expect(() => registry.register('SortNode', () => new SortNode())).toThrow(
      DuplicateNodeTypeError,
    );
  });

  it('should fail to resolve unknown types', () => {
    expect(() => registry.resolve('MissingNode')).toThrow(NodeNotFoundError);
    expect(() => registry.resolve('MissingNode')).toThrow(
      'Node type "MissingNode" is not registered',
    );
  });

  it('should list types and metadata', () => {
    registry.register('SortNode', () => new SortNode());
    registry.register('FetchFixture', () => fakeNode('FetchFixture', async () => []));

    expect(registry.has('SortNode')).toBe(true);
    expect(registry.has('FilterNode')).toBe(false);
    expect(registry.getTypes()).toEqual(['SortNode', 'FetchFixture']);
    expect(registry.getMetadata('SortNode')?.name).toBe('Sort');
    expect(registry.getMetadata('FilterNode')).toBeUndefined();
    expect(registry.getAllMetadata()).toHaveLength(2);
  });

  it('should group metadata by category', () => {
    registry.register('SortNode', () => new SortNode());
    registry.register('FetchFixture', () => fakeNode('FetchFixture', async () => []));

    const catalogue = registry.getMetadataByCategory();

    expect(catalogue.aggregation?.map((metadata) => metadata.type)).toEqual(['SortNode']);
    expect(catalogue.data?.map((metadata) => metadata.type)).toEqual(['FetchFixture']);
    expect(catalogue.calculation).toBeUndefined();
  });
});
