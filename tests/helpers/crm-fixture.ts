/**
 * Synthetic CRM data and stand-ins for the deal query port and fetch.
 */

import { vi } from 'vitest';
import type {
  CrmResult,
  DealQuery,
  DealQueryPort,
  DealQueryResponse,
  DealRecord,
} from '../../src/crm/crm-client.js';
import { DEAL_STAGES } from '../../src/tools/crm-tools.js';

export interface DealFields {
  id: string;
  name?: string | undefined;
  stage?: string | undefined;
  value?: number | undefined;
}

/**
 * A record in the CRM's wire shape: every attribute is a list of entries.
 */
export function dealRecord(fields: DealFields): DealRecord {
  const values: Record<string, unknown> = {};
  if (fields.name !== undefined) values['name'] = [{ value: fields.name }];
  if (fields.stage !== undefined) values['stage'] = [{ status: { title: fields.stage } }];
  if (fields.value !== undefined) values['value'] = [{ currency_value: fields.value, currency_code: 'USD' }];
  return { id: { record_id: fields.id }, values };
}

/**
 * 100 deals. Deal i has stage DEAL_STAGES[i % 7] except every 10th (no
 * stage), name "Deal i" except every 25th (no name), and value (i + 1) * 100
 * except when i % 20 === 19 (no value).
 */
export function pipelineRecords(): DealRecord[] {
  return Array.from({ length: 100 }, (_, i) =>
    dealRecord({
      id: `rec-${String(i)}`,
      name: i % 25 === 0 ? undefined : `Deal ${String(i)}`,
      stage: i % 10 === 0 ? undefined : DEAL_STAGES[i % DEAL_STAGES.length],
      value: i % 20 === 19 ? undefined : (i + 1) * 100,
    })
  );
}

/**
 * Deal query port that records queries and answers from a fixed list, or
 * with a fixed result.
 */
export class FakeDealPort implements DealQueryPort {
  readonly queries: DealQuery[] = [];

  constructor(private readonly answer: DealRecord[] | CrmResult<DealQueryResponse>) {}

  queryDeals(query: DealQuery): Promise<CrmResult<DealQueryResponse>> {
    this.queries.push(query);
    if (Array.isArray(this.answer)) {
      return Promise.resolve({ ok: true, data: { data: this.answer.slice(0, query.limit) } });
    }
    return Promise.resolve(this.answer);
  }
}

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

/**
 * A fetch stub answering every call with the given response.
 */
export function stubFetch(respond: (url: string) => Response | Promise<Response>) {
  return vi.fn<typeof globalThis.fetch>((input) => {
    const url = typeof input === 'string' ? input : input instanceof URL ? input.href : input.url;
    return Promise.resolve(respond(url));
  });
}
