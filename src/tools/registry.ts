import type { ToolDescriptor, ToolHandler } from '../types/mcp.js';
import type { ToolResult } from '../types/tools.js';
import { NotFoundError } from '../utils/error-handler.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('ToolRegistry');

export interface ToolsInfo {
  total_tools: number;
  tools: string[];
  categories: Record<string, string[]>;
}

/**
 * Name → tool table. Lookup is exact and case-sensitive; listing follows
 * registration order (Map preserves insertion order).
 */
export class ToolRegistry {
  private tools: Map<string, ToolHandler> = new Map();

  constructor(tools: ToolHandler[] = []) {
    for (const tool of tools) {
      this.register(tool);
    }
  }

  register(tool: ToolHandler): void {
    if (this.tools.has(tool.name)) {
      throw new Error(`Tool already registered: ${tool.name}`);
    }

    this.tools.set(tool.name, tool);
    logger.debug({ tool: tool.name }, 'Tool registered');
  }

  get(name: string): ToolHandler | undefined {
    return this.tools.get(name);
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  get size(): number {
    return this.tools.size;
  }

  getNames(): string[] {
    return Array.from(this.tools.keys());
  }

  list(): ToolDescriptor[] {
    return Array.from(this.tools.values()).map(tool => ({
      name: tool.name,
      description: tool.description,
      inputSchema: tool.inputSchema
    }));
  }

  async execute(name: string, args: unknown): Promise<ToolResult> {
    const tool = this.tools.get(name);
    if (!tool) {
      throw new NotFoundError(`Tool not found: ${name}`);
    }

    return tool.execute(args);
  }

  getToolsInfo(): ToolsInfo {
    const categories: Record<string, string[]> = {};

    for (const name of this.tools.keys()) {
      const separator = name.indexOf('.');
      const category = separator === -1 ? name : name.slice(0, separator);
      const action = separator === -1 ? name : name.slice(separator + 1);

      const actions = categories[category] || [];
      actions.push(action);
      categories[category] = actions;
    }

    return {
      total_tools: this.tools.size,
      tools: this.getNames(),
      categories
    };
  }
}
