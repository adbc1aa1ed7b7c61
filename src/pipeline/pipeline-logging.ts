import * as fs from 'fs';
import * as path from 'path';
import type { BatchSummary, OutputRecord, PipelineResult, RecordFault } from '../types.js';
import { errorMessage } from '../library/errors.js';
import type { Logger } from '../library/logger.js';

/**
 * Structure for rawData.json output from runPipeline()
 */
export interface RunReport {
  metadata: {
    timestamp: string;
    companyName: string;
    filename: string;
    recordCount: number;
    faultCount: number;
    extractionCost: number;
    durationMs: number;
  };
  summary: BatchSummary;
  rawText?: string;
  records: OutputRecord[];
  faults: RecordFault[];
}

export function buildRunReport(
  result: PipelineResult,
  filename: string,
  durationMs: number
): RunReport {
  const faults = result.outcomes.flatMap((outcome) => (outcome.ok ? [] : [outcome.fault]));

  return {
    metadata: {
      timestamp: new Date().toISOString(),
      companyName: result.summary.companyName,
      filename,
      recordCount: result.records.length,
      faultCount: faults.length,
      extractionCost: result.extractionCost,
      durationMs,
    },
    summary: result.summary,
    rawText: result.rawText,
    records: result.records,
    faults,
  };
}

/**
 * Write a run report to rawData.json
 *
 * Synchronous write after the batch is done; a failure here is logged and
 * the run result is still returned.
 */
export function writeRunLogs(logPath: string, report: RunReport, logger: Logger): boolean {
  try {
    const dir = path.dirname(logPath);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
    fs.writeFileSync(logPath, JSON.stringify(report, null, 2), 'utf-8');
    return true;
  } catch (error) {
    logger.error(`Failed to write run logs to ${logPath}: ${errorMessage(error)}`);
    return false;
  }
}
