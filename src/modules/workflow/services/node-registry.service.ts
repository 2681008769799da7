import { Injectable, Logger } from '@nestjs/common';
import { DuplicateNodeTypeError, NodeNotFoundError } from '../errors/workflow.errors';
import {
  INode,
  NodeCategory,
  NodeFactory,
  NodeMetadata,
} from '../interfaces/node.interfaces';

interface RegisteredNode {
  factory: NodeFactory;
  metadata: NodeMetadata;
}

/**
 * Maps node type ids to factories. Scoped to its Nest container, so two
 * application contexts never share registrations.
 */
@Injectable()
export class NodeRegistryService {
  private readonly logger = new Logger(NodeRegistryService.name);
  private readonly nodes = new Map<string, RegisteredNode>();

  /**
   * Register a node factory under a type id
   */
  register(type: string, factory: NodeFactory): void {
    if (this.nodes.has(type)) {
      throw new DuplicateNodeTypeError(type);
    }

    const metadata = factory().getMetadata();
    this.nodes.set(type, { factory, metadata });

    this.logger.debug(`Registered node: ${type} - ${metadata.name}`);
  }

  /**
   * Create a fresh node instance for a type id
   */
  resolve(type: string): INode {
    const registered = this.nodes.get(type);
    if (!registered) {
      throw new NodeNotFoundError(type);
    }
    return registered.factory();
  }

  has(type: string): boolean {
    return this.nodes.has(type);
  }

  getTypes(): string[] {
    return Array.from(this.nodes.keys());
  }

  getMetadata(type: string): NodeMetadata | undefined {
    return this.nodes.get(type)?.metadata;
  }

  getAllMetadata(): NodeMetadata[] {
    return Array.from(this.nodes.values(), ({ metadata }) => metadata);
  }

  getMetadataByCategory(): Partial<Record<NodeCategory, NodeMetadata[]>> {
    const catalogue: Partial<Record<NodeCategory, NodeMetadata[]>> = {};
    for (const metadata of this.getAllMetadata()) {
      const entries = catalogue[metadata.category] ?? [];
      entries.push(metadata);
      catalogue[metadata.category] = entries;
    }
    return catalogue;
  }
}
