/**
 * Deal record accessors and pipeline aggregation.
 *
 * Attribute values are lists; the first entry is the current value.
 */

import type { DealRecord } from './crm-client.js';
import { isRecord, numberField, stringField } from '../utils/guards.js';
import type { JsonObject } from '../utils/guards.js';

/** Label for deals with no stage, and name for deals with no name */
export const UNKNOWN_LABEL = 'Unknown';

function firstValue(record: DealRecord, attribute: string): JsonObject | undefined {
  const list = record.values?.[attribute];
  if (!Array.isArray(list)) return undefined;
  const first: unknown = list[0];
  return isRecord(first) ? first : undefined;
}

/**
 * Stage title from the first status entry, if any.
 */
export function stageTitle(record: DealRecord): string | undefined {
  const status = firstValue(record, 'stage')?.['status'];
  if (!isRecord(status)) return undefined;
  const title = stringField(status, 'title');
  return title ? title : undefined;
}

/**
 * Primary monetary value, 0 when absent.
 */
export function dealValue(record: DealRecord): number {
  const entry = firstValue(record, 'value');
  return entry ? (numberField(entry, 'currency_value') ?? 0) : 0;
}

export function dealName(record: DealRecord): string {
  const entry = firstValue(record, 'name');
  return (entry && stringField(entry, 'value')) || UNKNOWN_LABEL;
}

/**
 * Distinct stage labels in first-seen order; stage-less deals are skipped.
 */
export function listStages(records: readonly DealRecord[]): string[] {
  const seen = new Set<string>();
  for (const record of records) {
    const title = stageTitle(record);
    if (title !== undefined) seen.add(title);
  }
  return [...seen];
}

export interface StageSummary {
  count: number;
  total_value: number;
  deals: { name: string; value: number }[];
}

/**
 * Per-stage count, total value and deal list. Stage-less deals are bucketed
 * under "Unknown".
 */
export function summarizePipeline(records: readonly DealRecord[]): Record<string, StageSummary> {
  // Stage labels come from the CRM, so they may collide with Object.prototype keys
  const buckets = new Map<string, StageSummary>();

  for (const record of records) {
    const stage = stageTitle(record) ?? UNKNOWN_LABEL;
    const value = dealValue(record);
    let bucket = buckets.get(stage);
    if (!bucket) {
      bucket = { count: 0, total_value: 0, deals: [] };
      buckets.set(stage, bucket);
    }
    bucket.count += 1;
    bucket.total_value += value;
    bucket.deals.push({ name: dealName(record), value });
  }

  return Object.fromEntries(buckets);
}
