/**
 * Tool Executor
 *
 * Single dispatch entry point for model tool calls. Always resolves to a
 * ToolResult: unknown names, invalid arguments, CRM failures and thrown errors
 * all come back as error results for the model to react to.
 */

import { randomUUID } from 'node:crypto';
import type { Logger } from '../types/logger.js';
import type { ToolCatalog } from './catalog.js';
import type { ToolResult } from './types.js';
import { errorMessage } from '../utils/guards.js';

function serialize(value: unknown): string {
  return JSON.stringify(value, null, 2) ?? 'null';
}

export class ToolExecutor {
  private readonly logger: Logger;

  constructor(
    private readonly catalog: ToolCatalog,
    logger: Logger
  ) {
    this.logger = logger.child({ component: 'tool-executor' });
  }

  async execute(name: string, args: unknown, invocationId: string = randomUUID()): Promise<ToolResult> {
    const fail = (error: string): ToolResult => ({
      invocationId,
      name,
      content: serialize({ error }),
      isError: true,
    });

    const tool = this.catalog.get(name);
    if (!tool) {
      this.logger.warn({ tool: name, invocationId }, 'Unknown tool requested');
      return fail(`Unknown tool: ${name}`);
    }

    const startTime = Date.now();
    try {
      const outcome = await tool.invoke(args);
      const durationMs = Date.now() - startTime;

      if (!outcome.ok) {
        this.logger.warn({ tool: name, invocationId, durationMs, error: outcome.error }, 'Tool failed');
        return fail(outcome.error);
      }

      this.logger.info({ tool: name, invocationId, durationMs }, 'Tool executed');
      return { invocationId, name, content: serialize(outcome.data), isError: false };
    } catch (error) {
      const message = errorMessage(error);
      this.logger.error({ tool: name, invocationId, error: message }, 'Tool threw');
      return fail(message);
    }
  }
}
