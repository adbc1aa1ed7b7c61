import * as crypto from 'crypto';
import * as path from 'path';
import type { ExtractorResult, PipelineConfig, PipelineResult } from '../types.js';
import { DEFAULT_LOG_ROOT } from '../library/constants.js';
import { DEFAULT_CONFIG, loadTableFromConfig } from '../library/config.js';
import {
  EmptyInputError,
  ExtractionError,
  errorMessage,
  isBatchFault,
} from '../library/errors.js';
import { createLogger } from '../library/logger.js';
import {
  createProgressTracker,
  formatCost,
  formatDuration,
  noopProgress,
  spinner,
  theme,
} from '../library/ui.js';
import { assembleBatch } from './assemble.js';
import { buildRunReport, writeRunLogs } from './pipeline-logging.js';

/**
 * Extract records from a file and price every one of them.
 *
 * @example
 * ```ts
 * const result = await runPipeline({
 *   companyName: 'Digit',
 *   input: { file, filename: 'grid.png', contentType: 'image/png' },
 *   extractor: vision({ provider: LLMProviders.openai_gpt4o, apiKey }),
 * });
 * console.log(result.summary.formulaSummary);
 * ```
 */
export async function runPipeline(config: PipelineConfig): Promise<PipelineResult> {
  const { companyName, input, extractor } = config;
  const showProgress = config.showProgress ?? true;
  const logger = createLogger({ level: config.logLevel ?? DEFAULT_CONFIG.logLevel });
  const table = config.table ?? loadTableFromConfig(DEFAULT_CONFIG);

  if (input.file.length === 0) {
    throw new EmptyInputError(input.filename);
  }

  const startTime = Date.now();
  logger.debug(`Processing ${input.filename} for ${companyName}`);

  // ─── EXTRACTION ─────────────────────────────────────────────────────────────
  if (showProgress) spinner.start(`Extracting records from ${input.filename}`);

  let extracted: ExtractorResult;
  try {
    extracted = await extractor(input);
  } catch (error) {
    if (showProgress) spinner.fail('Extraction failed');
    if (isBatchFault(error)) throw error;
    throw new ExtractionError(`Extraction failed: ${errorMessage(error)}`, error);
  }

  if (extracted.records.length === 0) {
    if (showProgress) spinner.fail('No records extracted');
    throw new ExtractionError(`No policy data found in ${input.filename}`);
  }
  if (showProgress) spinner.succeed(`Extracted ${extracted.records.length} records`);

  // ─── ASSEMBLY ───────────────────────────────────────────────────────────────
  const batch = assembleBatch(extracted.records, {
    companyName,
    table,
    logger,
    progress: showProgress ? createProgressTracker('records') : noopProgress,
  });

  const faults = batch.outcomes.filter((outcome) => !outcome.ok).length;
  const durationMs = Date.now() - startTime;
  logger.info(
    [
      `${batch.summary.totalRecords} records`,
      `avg payin ${batch.summary.avgPayin}%`,
      `${batch.summary.uniqueSegments} segments`,
      formatDuration(durationMs),
      formatCost(extracted.cost ?? 0),
    ].join(theme.separator)
  );
  if (faults > 0) {
    logger.warn(`${faults} of ${batch.summary.totalRecords} records failed`);
  }

  const result: PipelineResult = {
    ...batch,
    rawText: extracted.rawText,
    parsedRecords: extracted.records,
    extractionCost: extracted.cost ?? 0,
  };

  // ─── RUN LOGS ───────────────────────────────────────────────────────────────
  if (config.storeLogs) {
    const logPath =
      typeof config.storeLogs === 'string'
        ? config.storeLogs
        : `${DEFAULT_LOG_ROOT}/run_${Date.now()}_${crypto.randomUUID().slice(0, 8)}/rawData.json`;

    if (writeRunLogs(logPath, buildRunReport(result, input.filename, durationMs), logger)) {
      result.logFolder = path.dirname(logPath);
    }
  }

  return result;
}
