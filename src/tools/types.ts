/**
 * Tool types.
 *
 * A tool is advertised to the model through its ToolSpec and executed through
 * a RegisteredTool, which owns argument validation (zod) and the call itself.
 */

import type { z } from 'zod';

/**
 * Parameter types a tool may declare.
 */
export type ToolParameterType = 'string' | 'integer' | 'number' | 'boolean';

export interface ToolParameter {
  type: ToolParameterType;
  description: string;
  required?: boolean;
  default?: string | number | boolean;
  /** Allowed values (string parameters) */
  enum?: readonly string[];
}

/**
 * What the model sees for one tool.
 */
export interface ToolSpec {
  /** Unique within the catalog */
  name: string;
  description: string;
  parameters: Readonly<Record<string, ToolParameter>>;
}

/**
 * Result handed back to the model for one invocation.
 */
export interface ToolResult {
  invocationId: string;
  name: string;
  /** Indented JSON */
  content: string;
  isError: boolean;
}

/**
 * Outcome of a tool run before serialization.
 */
export type ToolOutcome = { ok: true; data: unknown } | { ok: false; error: string };

/**
 * A tool in the dispatch table. `invoke` validates raw model input and runs
 * the tool; it resolves to an outcome and does not throw for bad input.
 */
export interface RegisteredTool {
  readonly spec: ToolSpec;
  invoke(rawArgs: unknown): Promise<ToolOutcome>;
}

/**
 * Definition of a tool with a typed argument schema.
 */
export interface ToolDefinition<TArgs> {
  spec: ToolSpec;
  args: z.ZodType<TArgs, z.ZodTypeDef, unknown>;
  run(args: TArgs): Promise<ToolOutcome>;
}

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

/**
 * Turn a typed definition into a dispatch-table entry.
 */
export function defineTool<TArgs>(definition: ToolDefinition<TArgs>): RegisteredTool {
  return {
    spec: definition.spec,
    async invoke(rawArgs: unknown): Promise<ToolOutcome> {
      const parsed = definition.args.safeParse(rawArgs ?? {});
      if (!parsed.success) {
        return {
          ok: false,
          error: `Invalid arguments for ${definition.spec.name}: ${describeIssues(parsed.error)}`,
        };
      }
      return definition.run(parsed.data);
    },
  };
}
