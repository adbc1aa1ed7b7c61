import type { BatchSummary, OutputRecord } from '../types.js';

/**
 * Derived batch metrics. Reads the assembled rows only; the average uses
 * each row's unrounded payin.
 */
export function summarize(records: readonly OutputRecord[], companyName: string): BatchSummary {
  const total = records.length;
  const payinSum = records.reduce((sum, r) => sum + r.payinValue, 0);
  const avgPayin = total > 0 ? Math.round((payinSum / total) * 10) / 10 : 0;

  const segments = new Set(records.map((r) => r.matchedSegment ?? r.segment));

  const formulaSummary: Record<string, number> = {};
  for (const r of records) {
    formulaSummary[r.formulaUsed] = (formulaSummary[r.formulaUsed] ?? 0) + 1;
  }

  return {
    totalRecords: total,
    avgPayin,
    uniqueSegments: segments.size,
    formulaSummary,
    companyName,
  };
}

/**
 * Column headers used by spreadsheet and HTTP consumers.
 */
export const DISPLAY_COLUMNS = [
  'segment',
  'policy type',
  'location',
  'payin',
  'remark',
  'Calculated Payout',
  'Formula Used',
  'Rule Explanation',
] as const;

export type DisplayRow = Record<(typeof DISPLAY_COLUMNS)[number], string>;

export function toDisplayRow(record: OutputRecord): DisplayRow {
  return {
    segment: record.segment,
    'policy type': record.policyType,
    location: record.location,
    payin: record.payin,
    remark: record.remarks,
    'Calculated Payout': record.calculatedPayout,
    'Formula Used': record.formulaUsed,
    'Rule Explanation': record.ruleExplanation,
  };
}
