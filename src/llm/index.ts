export type {
  LLMProvider,
  Message,
  ContentBlock,
  TextBlock,
  ToolUseBlock,
  StopReason,
  CompletionRequest,
  CompletionResponse,
} from './provider.js';
export { LLMError, BaseLLMProvider, textOf, toolUsesOf } from './provider.js';
export { toInputSchema, type ToolInputSchema } from './tool-schema.js';

// Providers (from plugins)
export {
  VercelAIProvider,
  type VercelAIProviderConfig,
} from '../plugins/providers/vercel-ai-provider.js';
