import { Test, TestingModule } from '@nestjs/testing';
import { StructuralError } from '../errors/workflow.errors';
import { WorkflowDefinitionValidator } from './workflow-definition.validator';

describe('WorkflowDefinitionValidator', () => {
  let validator: WorkflowDefinitionValidator;

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [WorkflowDefinitionValidator],
    }).compile();

    validator = module.get<WorkflowDefinitionValidator>(WorkflowDefinitionValidator);
  });

  describe('detectForm', () => {
    it('should tell pipelines from graphs', () => {
      expect(validator.detectForm({ steps: [] })).toBe('pipeline');
      expect(validator.detectForm({ nodes: [] })).toBe('graph');
      expect(validator.detectForm({})).toBeUndefined();
      expect(validator.detectForm([])).toBeUndefined();
      expect(validator.detectForm('workflow')).toBeUndefined();
    });
  });

  describe('parse pipeline', () => {
    it('should return a typed pipeline definition', () => {
      const parsed = validator.parse({
        name: 'aging',
        steps: ['aging', 'group'],
        node_defs: {
          aging: { type: 'AgingCalculatorNode', parameters: { as_of_date: '2025-01-30' } },
          group: { type: 'GroupingNode', name: 'By bucket' },
        },
      });

      expect(parsed).toEqual({
        form: 'pipeline',
        definition: {
          name: 'aging',
          steps: ['aging', 'group'],
          node_defs: {
            aging: { type: 'AgingCalculatorNode', parameters: { as_of_date: '2025-01-30' } },
            group: { type: 'GroupingNode', name: 'By bucket' },
          },
        },
      });
    });

    it('should reject malformed steps', () => {
      expect(() => validator.parse({ steps: 'aging', node_defs: {} })).toThrow(
        'Invalid pipeline definition: steps',
      );
      expect(() => validator.parse({ steps: [], node_defs: {} })).toThrow(
        'Invalid pipeline definition: steps',
      );
    });

    it('should reject malformed node definitions', () => {
      expect(() => validator.parse({ steps: ['aging'], node_defs: { aging: 'aging' } })).toThrow(
        'Invalid pipeline definition: node_defs.aging must be an object',
      );
      expect(() =>
        validator.parse({ steps: ['aging'], node_defs: { aging: { parameters: {} } } }),
      ).toThrow('Invalid pipeline definition: node_defs.aging: type');
    });
  });

  describe('parse graph', () => {
    it('should return a typed graph definition with default edges', () => {
      const parsed = validator.parse({
        nodes: [{ id: 'sort', type: 'SortNode', position: { x: 10, y: 20 } }],
      });

      expect(parsed).toEqual({
        form: 'graph',
        definition: {
          nodes: [{ id: 'sort', type: 'SortNode', position: { x: 10, y: 20 } }],
          edges: [],
        },
      });
    });

    it('should keep edge hints', () => {
      const parsed = validator.parse({
        nodes: [
          { id: 'a', type: 'SortNode' },
          { id: 'b', type: 'FilterNode' },
        ],
        edges: [{ source: 'a', target: 'b', hint: 'parallel' }],
      });

      expect(parsed.form === 'graph' && parsed.definition.edges).toEqual([
        { source: 'a', target: 'b', hint: 'parallel' },
      ]);
    });

    it('should reject malformed nodes and edges', () => {
      expect(() => validator.parse({ nodes: [] })).toThrow('Invalid graph definition: nodes');
      expect(() => validator.parse({ nodes: [{ type: 'SortNode' }] })).toThrow(
        'Invalid graph definition: nodes.0.id',
      );
      expect(() =>
        validator.parse({
          nodes: [{ id: 'a', type: 'SortNode' }],
          edges: [{ source: 'a', target: 'a', hint: 'eventually' }],
        }),
      ).toThrow('Invalid graph definition: edges.0.hint');
    });
  });

  it('should reject definitions of neither form', () => {
    expect(() => validator.parse({ name: 'empty' })).toThrow(StructuralError);
    expect(() => validator.parse({ name: 'empty' })).toThrow(
      'Workflow definition must declare either "steps" (pipeline) or "nodes" (graph)',
    );
    expect(() => validator.parse(null)).toThrow('Workflow definition must be an object');
  });
});
