/**
 * Per-run output storage. Each node id is written exactly once.
 */
export class NodeOutputStore {
  private readonly outputs = new Map<string, unknown>();

  set(nodeId: string, output: unknown): void {
    if (this.outputs.has(nodeId)) {
      throw new Error(`Output for node "${nodeId}" has already been recorded`);
    }
    this.outputs.set(nodeId, output);
  }

  get(nodeId: string): unknown {
    if (!this.outputs.has(nodeId)) {
      throw new Error(`No output recorded for node "${nodeId}"`);
    }
    return this.outputs.get(nodeId);
  }

  has(nodeId: string): boolean {
    return this.outputs.has(nodeId);
  }

  get size(): number {
    return this.outputs.size;
  }

  toRecord(): Record<string, unknown> {
    return Object.fromEntries(this.outputs);
  }
}
