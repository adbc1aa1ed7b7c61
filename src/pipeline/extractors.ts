import type {
  DecisionTable,
  ExtractionInput,
  Extractor,
  ExtractorResult,
  LLMProviders,
  RawRecord,
} from '../types.js';
import { DEFAULT_ENDPOINT_TIMEOUT_MS } from '../library/constants.js';
import { ExtractionError } from '../library/errors.js';
import { callVisionLLM } from '../library/llm/llm-client.js';
import type { ImageMediaType } from '../library/llm/types.js';
import { isRawRecord } from './normalize.js';
import { buildExtractionPrompt } from './prompts.js';

/**
 * Configuration for the vision extractor.
 */
export interface VisionConfig {
  provider: LLMProviders;
  apiKey: string;
  prompt?: string;
  table?: DecisionTable;  // Segment labels offered to the model when no prompt is given
}

/**
 * Configuration for endpoint extractor.
 */
export interface EndpointConfig {
  headers?: Record<string, string>;
  mapResponse?: (response: unknown) => unknown[];
  timeout?: number;
}

/**
 * Configuration for function extractor.
 */
export interface FnConfig {
  fn: (input: ExtractionInput) => Promise<unknown[]>;
}

/**
 * Creates an extractor that reads a rate-sheet image with a vision model.
 *
 * @example
 * ```ts
 * const extractor = vision({
 *   provider: LLMProviders.openai_gpt4o,
 *   apiKey: process.env.PAYOUT_LLM_API_KEY ?? '',
 * });
 * ```
 */
export function vision(config: VisionConfig): Extractor {
  const { provider, apiKey } = config;
  const prompt = config.prompt ?? buildExtractionPrompt(config.table);

  return async (input: ExtractionInput): Promise<ExtractorResult> => {
    const mediaType = imageMediaType(input.filename, input.contentType);
    if (!mediaType) {
      throw new ExtractionError(`Unsupported file type: ${input.filename}`);
    }

    const result = await callVisionLLM({
      provider,
      apiKey,
      prompt,
      image: { data: Buffer.from(input.file).toString('base64'), mediaType },
    });

    return {
      records: parseExtractedRecords(result.text),
      rawText: result.text,
      cost: result.cost,
    };
  };
}

/**
 * Creates an extractor that posts the file to an HTTP service.
 *
 * @example
 * ```ts
 * const extractor = endpoint('https://ocr.example.com/extract', {
 *   headers: { Authorization: 'Bearer test-token' },
 * });
 * ```
 */
export function endpoint(url: string, config: EndpointConfig = {}): Extractor {
  const { headers = {}, mapResponse, timeout = DEFAULT_ENDPOINT_TIMEOUT_MS } = config;

  return async (input: ExtractionInput): Promise<ExtractorResult> => {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeout);

    try {
      const response = await fetch(url, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          ...headers,
        },
        body: JSON.stringify({
          filename: input.filename,
          contentType: input.contentType,
          data: Buffer.from(input.file).toString('base64'),
        }),
        signal: controller.signal,
      });

      if (!response.ok) {
        const text = await response.text();
        throw new ExtractionError(`HTTP ${response.status}: ${text}`);
      }

      const data: unknown = await response.json();
      if (mapResponse) {
        return { records: mapResponse(data) };
      }

      // Default response mapping assumes { records } or a bare array
      const records = isRawRecord(data) ? data.records : data;
      return { records: toRecords(records) };
    } finally {
      clearTimeout(timeoutId);
    }
  };
}

/**
 * Creates an extractor from a local function.
 */
export function fn(config: FnConfig): Extractor {
  return async (input: ExtractionInput): Promise<ExtractorResult> => {
    const output = await config.fn(input);
    return { records: toRecords(output) };
  };
}

/**
 * Creates a mock extractor for testing: fixed records, or records computed
 * from the input.
 *
 * @example
 * ```ts
 * const extractor = mock([{ segment: 'TW TP', payin: '55%' }]);
 * ```
 */
export function mock(
  recordsOrFn: RawRecord[] | ((input: ExtractionInput) => RawRecord[])
): Extractor {
  return async (input: ExtractionInput): Promise<ExtractorResult> => {
    const records = typeof recordsOrFn === 'function' ? recordsOrFn(input) : recordsOrFn;
    return { records: records.map((record) => ({ ...record })) };
  };
}

/**
 * Pull the JSON array out of model output: markdown fences are dropped and
 * anything outside the outermost [...] ignored. A lone object becomes a
 * one-element array. Array items are returned as they are.
 */
export function parseExtractedRecords(text: string): unknown[] {
  let cleaned = text.replace(/```(?:json)?\s*|\s*```/g, '').trim();

  const start = cleaned.indexOf('[');
  const end = cleaned.lastIndexOf(']');
  if (start !== -1 && end > start) {
    cleaned = cleaned.slice(start, end + 1);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(cleaned);
  } catch (error) {
    throw new ExtractionError('Extractor returned invalid JSON', error);
  }
  return toRecords(parsed);
}

const EXTENSION_MEDIA_TYPES = new Map<string, ImageMediaType>([
  ['png', 'image/png'],
  ['jpg', 'image/jpeg'],
  ['jpeg', 'image/jpeg'],
  ['gif', 'image/gif'],
  ['webp', 'image/webp'],
]);

const MEDIA_TYPES: readonly ImageMediaType[] = ['image/png', 'image/jpeg', 'image/gif', 'image/webp'];

/**
 * Media type for an upload, by file extension first and content type second.
 * `undefined` means no supported provider can read it.
 */
export function imageMediaType(filename: string, contentType: string): ImageMediaType | undefined {
  const extension = filename.includes('.') ? filename.split('.').pop()?.toLowerCase() : undefined;
  const byExtension = extension === undefined ? undefined : EXTENSION_MEDIA_TYPES.get(extension);
  if (byExtension) return byExtension;

  const declared = contentType.toLowerCase().split(';')[0].trim();
  if (declared === 'image/jpg') return 'image/jpeg';
  return MEDIA_TYPES.find((type) => type === declared);
}

function toRecords(value: unknown): unknown[] {
  if (isRawRecord(value)) return [value];
  if (!Array.isArray(value)) {
    throw new ExtractionError('Extractor output is not a list of records');
  }
  return value;
}
