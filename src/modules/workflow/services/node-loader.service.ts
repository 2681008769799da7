import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  DEFAULT_WORKFLOW_CONFIG,
  WORKFLOW_CONFIG_KEY,
  WorkflowConfig,
} from '../../../config/workflow.config';
import { NODE_TYPES } from '../constants/workflow.constants';
import { NodeParameters } from '../interfaces/workflow.interfaces';
import { ALL_NODE_CLASSES, NodeClass } from '../nodes';
import { NodeRegistryService } from './node-registry.service';

/**
 * Registers the built-in nodes at start-up, applying configured defaults
 * underneath the parameters each workflow supplies
 */
@Injectable()
export class NodeLoaderService {
  private readonly logger = new Logger(NodeLoaderService.name);

  constructor(
    private readonly nodeRegistry: NodeRegistryService,
    private readonly configService: ConfigService,
  ) {}

  loadAllNodes(nodeClasses: readonly NodeClass[] = ALL_NODE_CLASSES): number {
    this.logger.log('Starting node loading...');

    for (const NodeType of nodeClasses) {
      const { type } = NodeType.metadata;
      const defaults = this.defaultParametersFor(type);
      // Duplicate registration propagates and aborts start-up
      this.nodeRegistry.register(type, () => new NodeType({ defaults }));
    }

    this.logger.log(`Node loading completed: ${nodeClasses.length} registered`);
    return nodeClasses.length;
  }

  private defaultParametersFor(type: string): NodeParameters {
    const config =
      this.configService.get<WorkflowConfig>(WORKFLOW_CONFIG_KEY) ?? DEFAULT_WORKFLOW_CONFIG;

    switch (type) {
      case NODE_TYPES.SLA_CHECKER:
        return { sla_days: config.slaDefaultDays };
      case NODE_TYPES.DUPLICATE_DETECTOR:
        return { tolerance: config.duplicateTolerance };
      default:
        return {};
    }
  }
}
