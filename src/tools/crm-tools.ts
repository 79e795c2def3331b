/**
 * CRM tools.
 *
 * Read-only pipeline lookups the model can call. Each entry owns its argument
 * schema and its execution.
 */

import { z } from 'zod';
import type { DealQuery, DealQueryPort } from '../crm/crm-client.js';
import { listStages, summarizePipeline } from '../crm/deal-record.js';
import { defineTool } from './types.js';
import type { RegisteredTool, ToolOutcome } from './types.js';

export const DEAL_STAGES = [
  'Lead',
  'Qualified',
  'Demo',
  'Contract Out',
  'Won',
  'Lost',
  'Revisit',
] as const;

export const DEFAULT_DEAL_LIMIT = 20;
export const MAX_DEAL_LIMIT = 100;
const SEARCH_LIMIT = 50;

/** Models sometimes send null for omitted optional arguments */
const optional = <T extends z.ZodTypeAny>(schema: T) =>
  schema.nullish().transform((value) => value ?? undefined);

const listDealsArgs = z.object({
  stage: optional(z.enum(DEAL_STAGES)),
  limit: optional(z.number().int()).transform((value) =>
    Math.min(Math.max(value ?? DEFAULT_DEAL_LIMIT, 1), MAX_DEAL_LIMIT)
  ),
});

const getDealArgs = z.object({
  deal_id: z.string({ required_error: 'deal_id is required' }).trim().min(1, 'deal_id is required'),
});

const searchDealsArgs = z.object({
  query: z.string({ required_error: 'query is required' }).trim().min(1, 'query is required'),
});

const noArgs = z.object({});

async function fetchDeals(crm: DealQueryPort, query: DealQuery): Promise<ToolOutcome> {
  const result = await crm.queryDeals(query);
  return result.ok ? { ok: true, data: result.data } : { ok: false, error: result.error.message };
}

/**
 * Build the CRM tool table over a deal query port.
 */
export function createCrmTools(crm: DealQueryPort): RegisteredTool[] {
  return [
    defineTool({
      spec: {
        name: 'list_deals',
        description:
          'List deals from the CRM sales pipeline. Can filter by stage. Returns deal names, values, stages, sources, and other key information.',
        parameters: {
          stage: {
            type: 'string',
            description: `Filter by pipeline stage. Valid stages: ${DEAL_STAGES.join(', ')}`,
            enum: DEAL_STAGES,
          },
          limit: {
            type: 'integer',
            description: `Maximum number of deals to return (default ${String(DEFAULT_DEAL_LIMIT)}, max ${String(MAX_DEAL_LIMIT)})`,
            default: DEFAULT_DEAL_LIMIT,
          },
        },
      },
      args: listDealsArgs,
      run: ({ stage, limit }) =>
        fetchDeals(crm, { limit, ...(stage !== undefined && { filter: { stage } }) }),
    }),

    defineTool({
      spec: {
        name: 'get_deal',
        description: 'Get detailed information about a specific deal by its ID.',
        parameters: {
          deal_id: {
            type: 'string',
            description: 'The unique ID of the deal to retrieve',
            required: true,
          },
        },
      },
      args: getDealArgs,
      run: ({ deal_id }) => fetchDeals(crm, { limit: 1, filter: { record_id: deal_id } }),
    }),

    defineTool({
      spec: {
        name: 'search_deals',
        description: 'Search for deals in the CRM by company/deal name.',
        parameters: {
          query: {
            type: 'string',
            description: 'The company or deal name to search for',
            required: true,
          },
        },
      },
      args: searchDealsArgs,
      run: ({ query }) =>
        fetchDeals(crm, { limit: SEARCH_LIMIT, filter: { name: { $contains: query } } }),
    }),

    defineTool({
      spec: {
        name: 'list_pipeline_stages',
        description: 'List all available pipeline stages/statuses to understand the sales process.',
        parameters: {},
      },
      args: noArgs,
      run: async () => {
        const result = await crm.queryDeals({ limit: MAX_DEAL_LIMIT });
        if (!result.ok) return { ok: false, error: result.error.message };
        return { ok: true, data: { stages: listStages(result.data.data) } };
      },
    }),

    defineTool({
      spec: {
        name: 'get_pipeline_summary',
        description:
          'Get a summary of the entire pipeline showing deal counts and total values by stage.',
        parameters: {},
      },
      args: noArgs,
      run: async () => {
        const result = await crm.queryDeals({ limit: MAX_DEAL_LIMIT });
        if (!result.ok) return { ok: false, error: result.error.message };
        return { ok: true, data: { pipeline_summary: summarizePipeline(result.data.data) } };
      },
    }),
  ];
}
