/**
 * CRM Client
 *
 * Thin client for the CRM's records-query endpoint. Every call resolves to a
 * result envelope; HTTP, timeout and payload problems come back as errors.
 */

import { z } from 'zod';
import type { Logger } from '../types/logger.js';
import { errorMessage } from '../utils/guards.js';

// ═══════════════════════════════════════════════════════════════
// CONSTANTS
// ═══════════════════════════════════════════════════════════════

const DEFAULT_BASE_URL = 'https://api.attio.com/v2';
const DEFAULT_TIMEOUT_MS = 15_000;

// ═══════════════════════════════════════════════════════════════
// WIRE TYPES
// ═══════════════════════════════════════════════════════════════

/** One record; `values` is keyed by attribute slug, each value a list */
const dealRecordSchema = z
  .object({
    values: z.record(z.unknown()).optional(),
  })
  .passthrough();

const queryResponseSchema = z
  .object({
    data: z.array(dealRecordSchema),
  })
  .passthrough();

export type DealRecord = z.infer<typeof dealRecordSchema>;
export type DealQueryResponse = z.infer<typeof queryResponseSchema>;

/**
 * Filters the query endpoint accepts.
 */
export type DealFilter =
  | { stage: string }
  | { record_id: string }
  | { name: { $contains: string } };

export interface DealQuery {
  limit: number;
  filter?: DealFilter | undefined;
}

export type CrmError =
  | { code: 'NOT_CONFIGURED'; message: string; retryable: false }
  | { code: 'HTTP_ERROR'; message: string; status: number; retryable: boolean }
  | { code: 'TIMEOUT'; message: string; retryable: true }
  | { code: 'NETWORK_ERROR'; message: string; retryable: true }
  | { code: 'MALFORMED_RESPONSE'; message: string; retryable: false };

export type CrmResult<T> = { ok: true; data: T } | { ok: false; error: CrmError };

/**
 * Port used by the tools, so tests can stand in a fake.
 */
export interface DealQueryPort {
  queryDeals(query: DealQuery): Promise<CrmResult<DealQueryResponse>>;
}

export interface CrmClientConfig {
  apiKey: string | null;
  baseUrl?: string | undefined;
  /** Object slug, "deals" by default */
  dealObject?: string | undefined;
  timeoutMs?: number | undefined;
  /** Injected for tests */
  fetch?: typeof globalThis.fetch | undefined;
}

// ═══════════════════════════════════════════════════════════════
// CLIENT
// ═══════════════════════════════════════════════════════════════

export class CrmClient implements DealQueryPort {
  private readonly apiKey: string | null;
  private readonly endpoint: string;
  private readonly timeoutMs: number;
  private readonly fetchFn: typeof globalThis.fetch;
  private readonly logger: Logger;

  constructor(config: CrmClientConfig, logger: Logger) {
    this.apiKey = config.apiKey;
    const base = (config.baseUrl ?? DEFAULT_BASE_URL).replace(/\/+$/, '');
    this.endpoint = `${base}/objects/${config.dealObject ?? 'deals'}/records/query`;
    this.timeoutMs = config.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.fetchFn = config.fetch ?? globalThis.fetch;
    this.logger = logger.child({ component: 'crm' });
  }

  isAvailable(): boolean {
    return !!this.apiKey;
  }

  async queryDeals(query: DealQuery): Promise<CrmResult<DealQueryResponse>> {
    if (!this.apiKey) {
      return {
        ok: false,
        error: { code: 'NOT_CONFIGURED', message: 'CRM API key not configured', retryable: false },
      };
    }

    this.logger.debug({ query }, 'Querying deals');

    const controller = new AbortController();
    const timeoutId = setTimeout(() => {
      controller.abort();
    }, this.timeoutMs);

    try {
      const response = await this.fetchFn(this.endpoint, {
        method: 'POST',
        signal: controller.signal,
        headers: {
          Authorization: `Bearer ${this.apiKey}`,
          'Content-Type': 'application/json',
        },
        body: JSON.stringify(query),
      });

      if (!response.ok) {
        const body = await response.text().catch(() => '');
        this.logger.warn(
          { status: response.status, body: body.slice(0, 500) },
          'CRM returned an error status'
        );
        return {
          ok: false,
          error: {
            code: 'HTTP_ERROR',
            message: `CRM returned status ${String(response.status)}`,
            status: response.status,
            retryable: response.status === 429 || response.status >= 500,
          },
        };
      }

      let json: unknown;
      try {
        json = await response.json();
      } catch {
        return {
          ok: false,
          error: {
            code: 'MALFORMED_RESPONSE',
            message: 'CRM response was not valid JSON',
            retryable: false,
          },
        };
      }

      const parsed = queryResponseSchema.safeParse(json);
      if (!parsed.success) {
        return {
          ok: false,
          error: {
            code: 'MALFORMED_RESPONSE',
            message: 'CRM response did not contain a data list',
            retryable: false,
          },
        };
      }

      this.logger.debug({ count: parsed.data.data.length }, 'Deals fetched');
      return { ok: true, data: parsed.data };
    } catch (error) {
      if (error instanceof Error && error.name === 'AbortError') {
        this.logger.warn({ timeoutMs: this.timeoutMs }, 'CRM request timed out');
        return {
          ok: false,
          error: {
            code: 'TIMEOUT',
            message: `CRM request timed out after ${String(this.timeoutMs)}ms`,
            retryable: true,
          },
        };
      }

      const message = errorMessage(error);
      this.logger.error({ error: message }, 'CRM request failed');
      return {
        ok: false,
        error: {
          code: 'NETWORK_ERROR',
          message: `CRM request failed: ${message}`,
          retryable: true,
        },
      };
    } finally {
      clearTimeout(timeoutId);
    }
  }
}
