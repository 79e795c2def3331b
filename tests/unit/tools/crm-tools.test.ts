import { describe, it, expect } from 'vitest';
import { createCrmTools, DEAL_STAGES } from '../../../src/tools/crm-tools.js';
import type { RegisteredTool } from '../../../src/tools/types.js';
import { FakeDealPort, dealRecord, pipelineRecords } from '../../helpers/crm-fixture.js';

function toolNamed(tools: RegisteredTool[], name: string): RegisteredTool {
  const tool = tools.find((t) => t.spec.name === name);
  if (!tool) throw new Error(`missing tool ${name}`);
  return tool;
}

describe('CRM tools', () => {
  it('exposes the five read-only tools in order', () => {
    const tools = createCrmTools(new FakeDealPort([]));
    expect(tools.map((t) => t.spec.name)).toEqual([
      'list_deals',
      'get_deal',
      'search_deals',
      'list_pipeline_stages',
      'get_pipeline_summary',
    ]);
  });

  describe('list_deals', () => {
    it('defaults the limit to 20 with no filter', async () => {
      const records = [dealRecord({ id: 'rec-1', name: 'Acme', stage: 'Lead', value: 5000 })];
      const port = new FakeDealPort(records);
      const outcome = await toolNamed(createCrmTools(port), 'list_deals').invoke({});

      expect(port.queries).toEqual([{ limit: 20 }]);
      expect(outcome).toEqual({ ok: true, data: { data: records } });
    });

    it('filters by stage and clamps the limit to 100', async () => {
      const port = new FakeDealPort([]);
      await toolNamed(createCrmTools(port), 'list_deals').invoke({ stage: 'Won', limit: 500 });

      expect(port.queries).toEqual([{ limit: 100, filter: { stage: 'Won' } }]);
    });

    it('raises a limit below 1 to 1', async () => {
      const port = new FakeDealPort([]);
      await toolNamed(createCrmTools(port), 'list_deals').invoke({ limit: 0 });

      expect(port.queries).toEqual([{ limit: 1 }]);
    });

    it('treats null arguments as omitted', async () => {
      const port = new FakeDealPort([]);
      await toolNamed(createCrmTools(port), 'list_deals').invoke({ stage: null, limit: null });

      expect(port.queries).toEqual([{ limit: 20 }]);
    });

    it('accepts a missing argument object', async () => {
      const port = new FakeDealPort([]);
      await toolNamed(createCrmTools(port), 'list_deals').invoke(undefined);

      expect(port.queries).toEqual([{ limit: 20 }]);
    });

    it('rejects an unknown stage without querying', async () => {
      const port = new FakeDealPort([]);
      const outcome = await toolNamed(createCrmTools(port), 'list_deals').invoke({ stage: 'Closed' });

      expect(port.queries).toEqual([]);
      expect(outcome.ok).toBe(false);
      if (!outcome.ok) {
        expect(outcome.error).toMatch(/^Invalid arguments for list_deals: stage: /);
      }
    });

    it('advertises the stage enum', () => {
      const tool = toolNamed(createCrmTools(new FakeDealPort([])), 'list_deals');
      expect(tool.spec.parameters['stage']?.enum).toEqual(DEAL_STAGES);
    });
  });

  describe('get_deal', () => {
    it('queries one record by id', async () => {
      const port = new FakeDealPort([]);
      await toolNamed(createCrmTools(port), 'get_deal').invoke({ deal_id: 'rec-7' });

      expect(port.queries).toEqual([{ limit: 1, filter: { record_id: 'rec-7' } }]);
    });

    it('requires deal_id', async () => {
      const port = new FakeDealPort([]);
      const tool = toolNamed(createCrmTools(port), 'get_deal');

      expect(await tool.invoke({})).toEqual({
        ok: false,
        error: 'Invalid arguments for get_deal: deal_id: deal_id is required',
      });
      expect(await tool.invoke({ deal_id: '   ' })).toEqual({
        ok: false,
        error: 'Invalid arguments for get_deal: deal_id: deal_id is required',
      });
      expect(port.queries).toEqual([]);
    });
  });

  describe('search_deals', () => {
    it('searches names containing the query', async () => {
      const port = new FakeDealPort([]);
      await toolNamed(createCrmTools(port), 'search_deals').invoke({ query: 'Acme' });

      expect(port.queries).toEqual([{ limit: 50, filter: { name: { $contains: 'Acme' } } }]);
    });

    it('requires a query', async () => {
      const outcome = await toolNamed(createCrmTools(new FakeDealPort([])), 'search_deals').invoke({});
      expect(outcome).toEqual({
        ok: false,
        error: 'Invalid arguments for search_deals: query: query is required',
      });
    });
  });

  describe('list_pipeline_stages', () => {
    it('returns distinct stages in first-seen order, skipping stage-less deals', async () => {
      const port = new FakeDealPort(pipelineRecords());
      const outcome = await toolNamed(createCrmTools(port), 'list_pipeline_stages').invoke({});

      expect(port.queries).toEqual([{ limit: 100 }]);
      expect(outcome).toEqual({
        ok: true,
        data: { stages: ['Qualified', 'Demo', 'Contract Out', 'Won', 'Lost', 'Revisit', 'Lead'] },
      });
    });
  });

  describe('get_pipeline_summary', () => {
    it('groups the sample pipeline by stage', async () => {
      const port = new FakeDealPort(pipelineRecords());
      const outcome = await toolNamed(createCrmTools(port), 'get_pipeline_summary').invoke({});

      expect(outcome.ok).toBe(true);
      if (!outcome.ok) return;
      const data: unknown = outcome.data;
      expect(data).toMatchObject({
        pipeline_summary: {
          Unknown: { count: 10, total_value: 46000 },
        },
      });
    });

    it('counts every deal exactly once', async () => {
      const port = new FakeDealPort([
        dealRecord({ id: 'a', name: 'Acme', stage: 'Won', value: 1000 }),
        dealRecord({ id: 'b', name: 'Globex', stage: 'Won', value: 2500 }),
        dealRecord({ id: 'c', name: 'Initech', stage: 'Lead' }),
        dealRecord({ id: 'd', stage: '', value: 300 }),
      ]);
      const outcome = await toolNamed(createCrmTools(port), 'get_pipeline_summary').invoke({});

      expect(outcome).toEqual({
        ok: true,
        data: {
          pipeline_summary: {
            Won: {
              count: 2,
              total_value: 3500,
              deals: [
                { name: 'Acme', value: 1000 },
                { name: 'Globex', value: 2500 },
              ],
            },
            Lead: { count: 1, total_value: 0, deals: [{ name: 'Initech', value: 0 }] },
            Unknown: { count: 1, total_value: 300, deals: [{ name: 'Unknown', value: 300 }] },
          },
        },
      });
    });
  });

  it('passes CRM failures back as the error text', async () => {
    const port = new FakeDealPort({
      ok: false,
      error: { code: 'HTTP_ERROR', message: 'CRM returned status 503', status: 503, retryable: true },
    });
    const tools = createCrmTools(port);

    expect(await toolNamed(tools, 'list_deals').invoke({})).toEqual({
      ok: false,
      error: 'CRM returned status 503',
    });
    expect(await toolNamed(tools, 'get_pipeline_summary').invoke({})).toEqual({
      ok: false,
      error: 'CRM returned status 503',
    });
  });
});
