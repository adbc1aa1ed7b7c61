import {
  LOB,
  type BatchResult,
  type DecisionTable,
  type OutputRecord,
  type PolicyRecord,
  type RecordOutcome,
} from '../types.js';
import {
  DEFAULT_LOCATION,
  DEFAULT_POLICY_TYPE,
  ERROR_FORMULA,
  ERROR_PAYOUT,
  NO_RULE_FORMULA,
} from '../library/constants.js';
import { EmptyBatchError, errorMessage } from '../library/errors.js';
import { silentLogger, type Logger } from '../library/logger.js';
import { noopProgress, type ProgressTracker } from '../library/ui.js';
import { classifyLob } from '../classify/lob.js';
import { bracketFor, classifyPayin } from '../classify/payin.js';
import { resolveSegment } from '../classify/segments.js';
import { DEFAULT_DECISION_TABLE } from '../rules/default-table.js';
import { createEvaluator, type Evaluator } from '../rules/evaluator.js';
import { applyFormula, formatPercent, identity } from '../rules/formula.js';
import { isRawRecord, normalizeRecord } from './normalize.js';
import { summarize } from './summary.js';

export interface AssembleContext {
  companyName: string;
  evaluator: Evaluator;
  logger?: Logger;
}

export interface AssembleBatchOptions {
  companyName: string;
  table?: DecisionTable;
  logger?: Logger;
  progress?: ProgressTracker;
}

/**
 * Run one raw record through normalize -> classify -> evaluate -> payout.
 * Any throw is captured on the outcome; it never escapes.
 */
export function assembleRecord(
  raw: unknown,
  index: number,
  context: AssembleContext
): RecordOutcome {
  const logger = context.logger ?? silentLogger;

  try {
    return { ok: true, output: priceRecord(normalizeRecord(raw), context) };
  } catch (error) {
    const message = errorMessage(error);
    logger.error(`Error processing record #${index}: ${message}`);
    return {
      ok: false,
      output: errorOutput(raw, message),
      fault: { index, message },
    };
  }
}

/**
 * Classify, evaluate and price an already normalized record.
 */
export function priceRecord(record: PolicyRecord, context: AssembleContext): OutputRecord {
  const lob = classifyLob(record.segment, record.remarks);
  const matchedSegment = resolveRecordSegment(record, lob, context.evaluator.table);
  const match = context.evaluator.evaluate(record, lob, matchedSegment, context.companyName);
  const payout = applyFormula(match.rule?.payoutFormula ?? identity, record.payinValue);

  return {
    segment: record.segment,
    policyType: record.policyType,
    location: record.location,
    payin: formatPercent(record.payinValue),
    payinRaw: record.payinRaw,
    payinValue: record.payinValue,
    remarks: record.remarks,
    lob,
    payinCategory: record.payinCategory,
    matchedSegment,
    calculatedPayout: formatPercent(payout),
    formulaUsed: match.rule?.formulaText ?? NO_RULE_FORMULA,
    ruleExplanation: match.explanation,
  };
}

/**
 * Assemble every record of a batch against one table. An empty batch is a
 * batch-level fault; a bad record is not.
 */
export function assembleBatch(
  raws: readonly unknown[],
  options: AssembleBatchOptions
): BatchResult {
  if (raws.length === 0) {
    throw new EmptyBatchError();
  }

  const logger = options.logger ?? silentLogger;
  const progress = options.progress ?? noopProgress;
  const evaluator = createEvaluator(options.table ?? DEFAULT_DECISION_TABLE, { logger });
  const context: AssembleContext = { companyName: options.companyName, evaluator, logger };

  const outcomes: RecordOutcome[] = [];
  progress.start(raws.length);
  for (const [index, raw] of raws.entries()) {
    outcomes.push(assembleRecord(raw, index, context));
    progress.update(outcomes.length);
  }
  progress.stop();

  const records = outcomes.map((outcome) => outcome.output);
  return {
    outcomes,
    records,
    summary: summarize(records, options.companyName),
  };
}

/**
 * Price an assembled row again from its normalized fields. The payin is
 * taken unrounded, so the bracket cannot drift.
 */
export function reevaluate(output: OutputRecord, context: AssembleContext): RecordOutcome {
  const record: PolicyRecord = Object.freeze({
    segment: output.segment,
    policyType: output.policyType,
    location: output.location,
    payinRaw: output.payinRaw,
    payinValue: output.payinValue,
    payinCategory: bracketFor(output.payinValue),
    remarks: output.remarks,
  });
  return { ok: true, output: priceRecord(record, context) };
}

/**
 * Segment text first; the policy type only breaks the tie when the segment
 * alone names no known segment ("PVT CAR" + "TP").
 */
export function resolveRecordSegment(
  record: PolicyRecord,
  lob: LOB,
  table: DecisionTable
): string | undefined {
  return (
    resolveSegment(lob, record.segment, table) ??
    resolveSegment(lob, `${record.segment} ${record.policyType}`, table)
  );
}

function errorOutput(raw: unknown, message: string): OutputRecord {
  const fields = isRawRecord(raw) ? raw : {};
  const payinRaw = fields.payin ?? fields.Payin;
  const { value, bracket } = classifyPayin(payinRaw);
  return {
    segment: stringField(fields.segment) || 'Unknown',
    policyType: stringField(fields.policy_type ?? fields.policyType) || DEFAULT_POLICY_TYPE,
    location: stringField(fields.location) || DEFAULT_LOCATION,
    payin: formatPercent(value),
    payinRaw: stringField(payinRaw),
    payinValue: value,
    remarks: stringField(fields.remark ?? fields.remarks),
    lob: LOB.Unknown,
    payinCategory: bracket,
    calculatedPayout: ERROR_PAYOUT,
    formulaUsed: ERROR_FORMULA,
    ruleExplanation: `Error: ${message}`,
  };
}

function stringField(value: unknown): string {
  if (typeof value === 'string') return value.trim();
  if (typeof value === 'number') return String(value);
  return '';
}
