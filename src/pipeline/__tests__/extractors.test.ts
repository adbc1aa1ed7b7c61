import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import {
  endpoint,
  fn,
  imageMediaType,
  mock,
  parseExtractedRecords,
  vision,
} from '../extractors.js';
import { DEFAULT_EXTRACTION_PROMPT } from '../prompts.js';
import { loadDecisionTable } from '../../rules/table.js';
import { ExtractionError } from '../../library/errors.js';
import type { CallVisionLLMConfig, LLMResult } from '../../library/llm/types.js';
import { LLMProviders, type ExtractionInput } from '../../types.js';

const mockCallVisionLLM = vi.fn<(config: CallVisionLLMConfig) => Promise<LLMResult>>();

vi.mock('../../library/llm/llm-client.js', () => ({
  callVisionLLM: (config: CallVisionLLMConfig) => mockCallVisionLLM(config),
}));

const input = (overrides: Partial<ExtractionInput> = {}): ExtractionInput => ({
  file: new Uint8Array([1, 2, 3]),
  filename: 'grid.png',
  contentType: 'image/png',
  ...overrides,
});

describe('endpoint', () => {
  const originalFetch = globalThis.fetch;

  afterEach(() => {
    globalThis.fetch = originalFetch;
  });

  it('posts the file as base64 JSON', async () => {
    globalThis.fetch = vi.fn().mockResolvedValue({
      ok: true,
      json: () => Promise.resolve({ records: [{ segment: 'TW TP', payin: '55%' }] }),
    });

    const extractor = endpoint('https://ocr.example.com/extract');
    const result = await extractor(input());

    expect(fetch).toHaveBeenCalledWith(
      'https://ocr.example.com/extract',
      expect.objectContaining({
        method: 'POST',
        headers: expect.objectContaining({ 'Content-Type': 'application/json' }),
        body: JSON.stringify({ filename: 'grid.png', contentType: 'image/png', data: 'AQID' }),
      })
    );
    expect(result.records).toEqual([{ segment: 'TW TP', payin: '55%' }]);
  });

  it('accepts a bare array and keeps every item', async () => {
    globalThis.fetch = vi.fn().mockResolvedValue({
      ok: true,
      json: () => Promise.resolve([{ segment: 'Taxi' }, 'junk', null]),
    });

    const result = await endpoint('https://ocr.example.com/extract')(input());

    expect(result.records).toEqual([{ segment: 'Taxi' }, 'junk', null]);
  });

  it('uses custom headers and mapResponse', async () => {
    globalThis.fetch = vi.fn().mockResolvedValue({
      ok: true,
      json: () => Promise.resolve({ rows: 2 }),
    });

    const extractor = endpoint('https://ocr.example.com/extract', {
      headers: { Authorization: 'Bearer test-token' },
      mapResponse: () => [{ segment: 'Bus' }],
    });
    const result = await extractor(input());

    expect(fetch).toHaveBeenCalledWith(
      expect.any(String),
      expect.objectContaining({
        headers: expect.objectContaining({ Authorization: 'Bearer test-token' }),
      })
    );
    expect(result.records).toEqual([{ segment: 'Bus' }]);
  });

  it('throws on non-ok response', async () => {
    globalThis.fetch = vi.fn().mockResolvedValue({
      ok: false,
      status: 502,
      text: () => Promise.resolve('Bad Gateway'),
    });

    await expect(endpoint('https://ocr.example.com/extract')(input())).rejects.toThrow(
      'HTTP 502: Bad Gateway'
    );
  });

  it('rejects output that is not a list of records', async () => {
    globalThis.fetch = vi.fn().mockResolvedValue({
      ok: true,
      json: () => Promise.resolve('nothing here'),
    });

    await expect(endpoint('https://ocr.example.com/extract')(input())).rejects.toThrow(
      'Extractor output is not a list of records'
    );
  });
});

describe('fn', () => {
  it('wraps a local function', async () => {
    const extractor = fn({
      fn: async (file) => [{ segment: file.filename }, 7],
    });

    const result = await extractor(input({ filename: 'sheet.jpg' }));

    expect(result.records).toEqual([{ segment: 'sheet.jpg' }, 7]);
  });
});

describe('mock', () => {
  it('returns copies of fixed records', async () => {
    const records = [{ segment: 'TW TP', payin: '55%' }];
    const result = await mock(records)(input());

    expect(result.records).toEqual(records);
    expect(result.records[0]).not.toBe(records[0]);
  });

  it('computes records from the input', async () => {
    const result = await mock((file) => [{ segment: file.contentType }])(input());
    expect(result.records).toEqual([{ segment: 'image/png' }]);
  });
});

describe('parseExtractedRecords', () => {
  it('strips markdown fences', () => {
    const text = '```json\n[{"segment": "TW TP", "payin": 55}]\n```';
    expect(parseExtractedRecords(text)).toEqual([{ segment: 'TW TP', payin: 55 }]);
  });

  it('ignores prose around the array', () => {
    const text = 'Here are the rows:\n[{"segment": "Taxi"}, {"segment": "Bus"}]\nDone.';
    expect(parseExtractedRecords(text)).toEqual([{ segment: 'Taxi' }, { segment: 'Bus' }]);
  });

  it('keeps items that are not objects', () => {
    expect(parseExtractedRecords('[1, "x", {"segment": "Taxi"}]')).toEqual([1, 'x', { segment: 'Taxi' }]);
  });

  it('wraps a single object', () => {
    expect(parseExtractedRecords('{"segment": "Taxi"}')).toEqual([{ segment: 'Taxi' }]);
  });

  it('rejects invalid JSON', () => {
    expect(() => parseExtractedRecords('no table found')).toThrow(ExtractionError);
    expect(() => parseExtractedRecords('[{"segment": }]')).toThrow('Extractor returned invalid JSON');
  });
});

describe('imageMediaType', () => {
  it('prefers the file extension', () => {
    expect(imageMediaType('grid.JPG', 'application/octet-stream')).toBe('image/jpeg');
    expect(imageMediaType('grid.webp', 'image/png')).toBe('image/webp');
  });

  it('falls back to the content type', () => {
    expect(imageMediaType('upload', 'image/jpg')).toBe('image/jpeg');
    expect(imageMediaType('upload.bin', 'image/gif; charset=binary')).toBe('image/gif');
  });

  it('returns undefined for unsupported files', () => {
    expect(imageMediaType('grid.pdf', 'application/pdf')).toBeUndefined();
    expect(imageMediaType('grid.tiff', 'image/tiff')).toBeUndefined();
  });
});

describe('vision', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('sends the image and parses the reply', async () => {
    mockCallVisionLLM.mockResolvedValue({
      text: '[{"segment": "TW TP", "payin": "55%"}]',
      cost: 0.002,
      inputTokens: 1000,
      outputTokens: 20,
    });

    const extractor = vision({ provider: LLMProviders.openai_gpt4o, apiKey: 'test-key' });
    const result = await extractor(input({ filename: 'grid.jpeg', contentType: '' }));

    expect(mockCallVisionLLM).toHaveBeenCalledWith({
      provider: LLMProviders.openai_gpt4o,
      apiKey: 'test-key',
      prompt: DEFAULT_EXTRACTION_PROMPT,
      image: { data: 'AQID', mediaType: 'image/jpeg' },
    });
    expect(result).toEqual({
      records: [{ segment: 'TW TP', payin: '55%' }],
      rawText: '[{"segment": "TW TP", "payin": "55%"}]',
      cost: 0.002,
    });
  });

  it('offers the table segment labels to the model', async () => {
    mockCallVisionLLM.mockResolvedValue({ text: '[]', cost: 0, inputTokens: 0, outputTokens: 0 });
    const table = loadDecisionTable([{ lob: 'BUS', segment: 'STAFF BUS', formula: '88% of Payin' }]);

    await vision({ provider: LLMProviders.anthropic_claude_haiku, apiKey: 'test-key', table })(input());

    expect(mockCallVisionLLM.mock.calls[0]?.[0].prompt).toContain('- STAFF BUS');
  });

  it('rejects unsupported files before calling the model', async () => {
    const extractor = vision({ provider: LLMProviders.openai_gpt4o, apiKey: 'test-key' });

    await expect(
      extractor(input({ filename: 'grid.pdf', contentType: 'application/pdf' }))
    ).rejects.toThrow('Unsupported file type: grid.pdf');
    expect(mockCallVisionLLM).not.toHaveBeenCalled();
  });
});
