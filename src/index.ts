// Re-export types
export type {
  // Classification types
  PayinClassification,
  // Record types
  RawRecord,
  PolicyRecord,
  // Decision table types
  InsurerScope,
  Formula,
  RuleSpec,
  RuleEntry,
  DecisionTable,
  ConditionKind,
  MatchResult,
  // Output types
  OutputRecord,
  RecordFault,
  RecordOutcome,
  BatchSummary,
  BatchResult,
  // Extractor types
  ExtractionInput,
  ExtractorResult,
  Extractor,
  ProviderSpec,
  // Pipeline types
  LogLevel,
  PipelineConfig,
  PipelineResult,
} from './types.js';

// Re-export enums
export { LOB, PayinBracket, LLMProviders } from './types.js';

// Re-export classifiers
export { classifyPayin, bracketFor, bracketLabel, parseBracketLabel } from './classify/payin.js';
export { classifyLob, explainLob, LOB_MATCHERS } from './classify/lob.js';
export type { LobMatch, LobMatcher } from './classify/lob.js';
export { segmentMatches, resolveSegment, normalizeSegment } from './classify/segments.js';

// Re-export decision table
export { loadDecisionTable, loadDecisionTableFile, parseLob } from './rules/table.js';
export { DEFAULT_DECISION_TABLE, DEFAULT_RULE_SPECS } from './rules/default-table.js';
export { normalizeCompanyName, parseInsurerScope, scopeMatches, describeScope } from './rules/scope.js';
export { createEvaluator, checkCondition } from './rules/evaluator.js';
export type { Evaluator, EvaluatorOptions } from './rules/evaluator.js';
export {
  parseFormula,
  applyFormula,
  clampPayout,
  formatPercent,
  describeFormula,
  percentOf,
  subtractFlat,
  identity,
} from './rules/formula.js';

// Re-export pipeline
export { normalizeRecord } from './pipeline/normalize.js';
export { assembleRecord, assembleBatch, priceRecord, reevaluate } from './pipeline/assemble.js';
export type { AssembleContext, AssembleBatchOptions } from './pipeline/assemble.js';
export { summarize, toDisplayRow, DISPLAY_COLUMNS } from './pipeline/summary.js';
export type { DisplayRow } from './pipeline/summary.js';
export { vision, endpoint, fn, mock, parseExtractedRecords } from './pipeline/extractors.js';
export type { VisionConfig, EndpointConfig, FnConfig } from './pipeline/extractors.js';
export { runPipeline } from './pipeline/pipeline.js';

// Re-export library
export {
  PayoutError,
  EmptyBatchError,
  EmptyInputError,
  ExtractionError,
  DecisionTableError,
  isBatchFault,
  httpStatusFor,
} from './library/errors.js';
export type { BatchFaultCode } from './library/errors.js';
export { createLogger, silentLogger } from './library/logger.js';
export type { Logger } from './library/logger.js';
export { getConfig, configFromEnv, loadTableFromConfig } from './library/config.js';
export type { EngineConfig } from './library/config.js';

// Main payoutEngine namespace
import type {
  BatchResult,
  DecisionTable,
  Extractor,
  PipelineConfig,
  PipelineResult,
  RuleSpec,
} from './types.js';
import type { EndpointConfig, VisionConfig } from './pipeline/extractors.js';
import type { Logger } from './library/logger.js';
import { assembleBatch } from './pipeline/assemble.js';
import { runPipeline } from './pipeline/pipeline.js';
import { endpoint as createEndpoint, vision as createVision } from './pipeline/extractors.js';
import { loadDecisionTable, loadDecisionTableFile } from './rules/table.js';

/**
 * Main payoutEngine namespace for fluent API.
 *
 * @example
 * ```ts
 * import { payoutEngine } from 'payout-engine';
 *
 * const result = payoutEngine.process(
 *   [{ segment: 'TW TP', location: 'East', payin: '55%', remark: '' }],
 *   { companyName: 'Bajaj' }
 * );
 *
 * console.log(result.records[0].calculatedPayout); // "52.00%"
 * ```
 */
export const payoutEngine = {
  /**
   * Price a batch of already-extracted records.
   */
  process(
    records: readonly unknown[],
    options: { companyName: string; table?: DecisionTable; logger?: Logger }
  ): BatchResult {
    return assembleBatch(records, options);
  },

  /**
   * Extract records from a file, then price them.
   */
  run(config: PipelineConfig): Promise<PipelineResult> {
    return runPipeline(config);
  },

  /**
   * Build a decision table from rule specs, or from a JSON file path.
   */
  table(source: readonly RuleSpec[] | string): DecisionTable {
    return typeof source === 'string' ? loadDecisionTableFile(source) : loadDecisionTable(source);
  },

  /**
   * Create an extractor backed by a vision model.
   */
  vision(config: VisionConfig): Extractor {
    return createVision(config);
  },

  /**
   * Create an extractor that calls an HTTP endpoint.
   */
  endpoint(url: string, config?: EndpointConfig): Extractor {
    return createEndpoint(url, config);
  },
};

// Default export
export default payoutEngine;
