import type { RegisteredTool, ToolSpec } from './types.js';

/**
 * Static registry of the tools the model may call, keyed by name.
 */
export class ToolCatalog {
  private readonly tools = new Map<string, RegisteredTool>();

  constructor(tools: readonly RegisteredTool[] = []) {
    for (const tool of tools) {
      if (this.tools.has(tool.spec.name)) {
        throw new Error(`Duplicate tool name: ${tool.spec.name}`);
      }
      this.tools.set(tool.spec.name, tool);
    }
  }

  /**
   * Specs in registration order.
   */
  listTools(): ToolSpec[] {
    return [...this.tools.values()].map((tool) => tool.spec);
  }

  get(name: string): RegisteredTool | undefined {
    return this.tools.get(name);
  }

  get size(): number {
    return this.tools.size;
  }
}
