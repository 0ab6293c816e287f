/**
 * Tool Registry
 *
 * A ToolFacade over caller-registered tools. Each tool declares a zod
 * schema for its arguments; unknown tools, invalid arguments and tools
 * that throw all come back as failure results.
 *
 * ```ts
 * const registry = new ToolRegistry();
 * registry.register(defineTool({
 *   name: 'get_line_limit',
 *   description: 'Thermal limit of a line in MW',
 *   inputSchema: z.object({ line: z.string() }),
 *   run: async ({ line }) => toolSuccess(limits[line], 'MW'),
 * }));
 * ```
 *
 * @module facades
 */

import { z } from 'zod';
import { DuplicateToolError } from '../errors/FacadeErrors.js';
import { errorMessage } from '../errors/PlanEngineError.js';
import { toolFailure, type ToolFacade, type ToolResult } from './FacadeTypes.js';

export interface Tool {
  readonly name: string;
  readonly description: string;
  readonly inputSchema: z.ZodTypeAny;
  execute(args: Readonly<Record<string, unknown>>): Promise<ToolResult>;
}

export interface ToolDefinition<S extends z.ZodTypeAny> {
  name: string;
  description: string;
  inputSchema: S;
  run(args: z.output<S>): ToolResult | Promise<ToolResult>;
}

/**
 * Build a Tool whose `run` only ever sees arguments that passed its schema
 */
export function defineTool<S extends z.ZodTypeAny>(definition: ToolDefinition<S>): Tool {
  return {
    name: definition.name,
    description: definition.description,
    inputSchema: definition.inputSchema,
    async execute(args) {
      const parsed = definition.inputSchema.safeParse(args);
      if (!parsed.success) {
        const details = parsed.error.issues
          .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
          .join('; ');
        return toolFailure(`Invalid arguments for tool "${definition.name}": ${details}`);
      }
      return definition.run(parsed.data);
    },
  };
}

export interface ToolDescription {
  name: string;
  description: string;
}

export class ToolRegistry implements ToolFacade {
  private readonly tools = new Map<string, Tool>();

  /**
   * @throws DuplicateToolError if the name is taken
   */
  register(tool: Tool): this {
    if (this.tools.has(tool.name)) {
      throw new DuplicateToolError(tool.name);
    }
    this.tools.set(tool.name, tool);
    return this;
  }

  registerAll(tools: readonly Tool[]): this {
    for (const tool of tools) {
      this.register(tool);
    }
    return this;
  }

  unregister(name: string): boolean {
    return this.tools.delete(name);
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  get(name: string): Tool | undefined {
    return this.tools.get(name);
  }

  /**
   * Registered tool names, in registration order
   */
  list(): string[] {
    return [...this.tools.keys()];
  }

  describe(): ToolDescription[] {
    return [...this.tools.values()].map(({ name, description }) => ({ name, description }));
  }

  async invoke(toolName: string, args: Readonly<Record<string, unknown>>): Promise<ToolResult> {
    const tool = this.tools.get(toolName);
    if (!tool) {
      const available = this.list();
      return toolFailure(
        available.length > 0
          ? `Unknown tool "${toolName}". Available tools: ${available.join(', ')}`
          : `Unknown tool "${toolName}". No tools are registered`
      );
    }

    try {
      return await tool.execute(args);
    } catch (error) {
      return toolFailure(`Tool "${toolName}" threw: ${errorMessage(error)}`);
    }
  }
}
