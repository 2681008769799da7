import { Injectable } from '@nestjs/common';
import {
  describeValidationErrors,
  transformAndValidate,
} from '../../../common/utils/validation.utils';
import {
  GraphWorkflowDefinitionDto,
  PipelineStepDefinitionDto,
  PipelineWorkflowDefinitionDto,
} from '../dto/workflow-definition.dto';
import { StructuralError } from '../errors/workflow.errors';
import {
  GraphWorkflowDefinition,
  ParsedWorkflowDefinition,
  PipelineStepDefinition,
  PipelineWorkflowDefinition,
  WorkflowForm,
} from '../interfaces/workflow.interfaces';
import { isPlainObject } from '../utils/record.utils';

/**
 * Turns a serialized workflow into a typed pipeline or graph definition.
 * Only the shape is checked here; references, cycles and node types are
 * checked by the executors.
 */
@Injectable()
export class WorkflowDefinitionValidator {
  detectForm(definition: unknown): WorkflowForm | undefined {
    if (!isPlainObject(definition)) return undefined;
    if ('steps' in definition) return 'pipeline';
    if ('nodes' in definition) return 'graph';
    return undefined;
  }

  parse(definition: unknown): ParsedWorkflowDefinition {
    if (!isPlainObject(definition)) {
      throw new StructuralError('Workflow definition must be an object');
    }

    switch (this.detectForm(definition)) {
      case 'pipeline':
        return { form: 'pipeline', definition: this.parsePipeline(definition) };
      case 'graph':
        return { form: 'graph', definition: this.parseGraph(definition) };
      default:
        throw new StructuralError(
          'Workflow definition must declare either "steps" (pipeline) or "nodes" (graph)',
        );
    }
  }

  private parsePipeline(plain: Record<string, unknown>): PipelineWorkflowDefinition {
    const { value, errors } = transformAndValidate(PipelineWorkflowDefinitionDto, plain);
    if (errors.length > 0) {
      throw new StructuralError(`Invalid pipeline definition: ${describeValidationErrors(errors)}`);
    }

    const nodeDefs: Record<string, PipelineStepDefinition> = {};
    for (const [stepId, entry] of Object.entries(value.node_defs)) {
      nodeDefs[stepId] = this.parseStep(stepId, entry);
    }

    return { name: value.name, steps: [...value.steps], node_defs: nodeDefs };
  }

  private parseStep(stepId: string, entry: unknown): PipelineStepDefinition {
    if (!isPlainObject(entry)) {
      throw new StructuralError(`Invalid pipeline definition: node_defs.${stepId} must be an object`);
    }

    const { value, errors } = transformAndValidate(PipelineStepDefinitionDto, entry);
    if (errors.length > 0) {
      throw new StructuralError(
        `Invalid pipeline definition: node_defs.${stepId}: ${describeValidationErrors(errors)}`,
      );
    }

    return { type: value.type, parameters: value.parameters, name: value.name };
  }

  private parseGraph(plain: Record<string, unknown>): GraphWorkflowDefinition {
    const { value, errors } = transformAndValidate(GraphWorkflowDefinitionDto, plain);
    if (errors.length > 0) {
      throw new StructuralError(`Invalid graph definition: ${describeValidationErrors(errors)}`);
    }

    return {
      name: value.name,
      nodes: value.nodes.map((node) => ({
        id: node.id,
        type: node.type,
        parameters: node.parameters,
        name: node.name,
        position: node.position ? { x: node.position.x, y: node.position.y } : undefined,
        metadata: node.metadata,
      })),
      edges: (value.edges ?? []).map((edge) => ({
        source: edge.source,
        target: edge.target,
        hint: edge.hint,
      })),
    };
  }
}
