export type {
  ToolSpec,
  ToolParameter,
  ToolParameterType,
  ToolResult,
  ToolOutcome,
  RegisteredTool,
  ToolDefinition,
} from './types.js';
export { defineTool } from './types.js';
export { ToolCatalog } from './catalog.js';
export { ToolExecutor } from './tool-executor.js';
export { createCrmTools, DEAL_STAGES, DEFAULT_DEAL_LIMIT, MAX_DEAL_LIMIT } from './crm-tools.js';
