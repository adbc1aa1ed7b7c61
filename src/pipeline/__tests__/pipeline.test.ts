import { describe, it, expect, vi, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { runPipeline } from '../pipeline.js';
import { fn, mock } from '../extractors.js';
import { loadDecisionTable } from '../../rules/table.js';
import { EmptyInputError, ExtractionError, PayoutError } from '../../library/errors.js';
import type { RunReport } from '../pipeline-logging.js';
import type { ExtractionInput, PipelineConfig } from '../../types.js';

const input: ExtractionInput = {
  file: new Uint8Array([137, 80, 78, 71]),
  filename: 'grid.png',
  contentType: 'image/png',
};

const config = (overrides: Partial<PipelineConfig>): PipelineConfig => ({
  companyName: 'Bajaj Allianz',
  input,
  extractor: mock([]),
  logLevel: 'silent',
  showProgress: false,
  ...overrides,
});

describe('runPipeline', () => {
  const tmpDirs: string[] = [];

  afterEach(() => {
    for (const dir of tmpDirs.splice(0)) {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });

  it('extracts and prices every record', async () => {
    const result = await runPipeline(
      config({
        extractor: mock([
          { segment: 'TW TP', payin: '55%' },
          { segment: 'Staff Bus', payin: '40%' },
        ]),
      })
    );

    expect(result.records.map((record) => record.calculatedPayout)).toEqual(['52.00%', '35.20%']);
    expect(result.parsedRecords).toEqual([
      { segment: 'TW TP', payin: '55%' },
      { segment: 'Staff Bus', payin: '40%' },
    ]);
    expect(result.extractionCost).toBe(0);
    expect(result.summary.companyName).toBe('Bajaj Allianz');
    expect(result.logFolder).toBeUndefined();
  });

  it('uses the given table', async () => {
    const table = loadDecisionTable([{ lob: 'TAXI', segment: 'TAXI', formula: 'Payin' }]);
    const result = await runPipeline(
      config({ table, extractor: mock([{ segment: 'Taxi', payin: '30' }]) })
    );
    expect(result.records[0].formulaUsed).toBe('Payin');
    expect(result.records[0].calculatedPayout).toBe('30.00%');
  });

  it('rejects an empty file without calling the extractor', async () => {
    const extractor = vi.fn();
    await expect(
      runPipeline(config({ input: { ...input, file: new Uint8Array() }, extractor }))
    ).rejects.toThrow(EmptyInputError);
    expect(extractor).not.toHaveBeenCalled();
  });

  it('fails when nothing was extracted', async () => {
    await expect(runPipeline(config({ extractor: mock([]) }))).rejects.toThrow(
      'No policy data found in grid.png'
    );
  });

  it('wraps extractor failures', async () => {
    const extractor = fn({
      fn: () => Promise.reject(new Error('model timed out')),
    });

    const run = runPipeline(config({ extractor }));

    await expect(run).rejects.toThrow(ExtractionError);
    await expect(run).rejects.toThrow('Extraction failed: model timed out');
  });

  it('passes batch faults through unchanged', async () => {
    const fault = new ExtractionError('Unsupported file type: grid.png');
    const run = runPipeline(config({ extractor: () => Promise.reject(fault) }));

    await expect(run).rejects.toBe(fault);
  });

  it('keeps non-object items as faulted rows', async () => {
    const result = await runPipeline(
      config({ extractor: async () => ({ records: [{ segment: 'Staff Bus', payin: '40%' }, 'junk'] }) })
    );

    expect(result.outcomes.map((outcome) => outcome.ok)).toEqual([true, false]);
    expect(result.records[1].formulaUsed).toBe('Error in calculation');
  });

  it('prices unparseable payins as zero', async () => {
    const result = await runPipeline(
      config({
        extractor: async () => ({
          records: [{ segment: 'Taxi', payin: [1] }, { segment: 'Taxi', payin: 'N/A' }],
        }),
      })
    );

    expect(result.outcomes.every((outcome) => outcome.ok)).toBe(true);
    expect(result.records.map((record) => record.payin)).toEqual(['0.00%', '0.00%']);
    expect(result.records.map((record) => record.calculatedPayout)).toEqual(['0.00%', '0.00%']);
  });

  it('writes a run report when storeLogs is a path', async () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'payout-run-'));
    tmpDirs.push(dir);
    const logPath = path.join(dir, 'nested', 'rawData.json');

    const result = await runPipeline(
      config({
        storeLogs: logPath,
        extractor: async () => ({
          records: [{ segment: 'TW TP', payin: '55%' }],
          rawText: '[{"segment":"TW TP","payin":"55%"}]',
          cost: 0.01,
        }),
      })
    );

    expect(result.logFolder).toBe(path.join(dir, 'nested'));
    const report: RunReport = JSON.parse(fs.readFileSync(logPath, 'utf-8'));
    expect(report.metadata).toMatchObject({
      companyName: 'Bajaj Allianz',
      filename: 'grid.png',
      recordCount: 1,
      faultCount: 0,
      extractionCost: 0.01,
    });
    expect(report.rawText).toBe('[{"segment":"TW TP","payin":"55%"}]');
    expect(report.records[0].calculatedPayout).toBe('52.00%');
    expect(report.faults).toEqual([]);
  });

  it('reports batch faults as PayoutError', async () => {
    const error = await runPipeline(config({ extractor: mock([]) })).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(PayoutError);
    expect(error).toMatchObject({ code: 'EXTRACTION_FAILED' });
  });
});
