import type { LLMProviders } from '../../types.js';

/**
 * Image media types every supported provider accepts.
 */
export type ImageMediaType = 'image/jpeg' | 'image/png' | 'image/gif' | 'image/webp';

/**
 * Result from an LLM call (internal).
 */
export interface LLMResult {
  text: string;
  cost: number;
  inputTokens: number;
  outputTokens: number;
}

/**
 * Configuration for a single-image LLM call (internal).
 */
export interface CallVisionLLMConfig {
  provider: LLMProviders;
  apiKey: string;
  prompt: string;
  image: {
    data: string;  // base64, no data: prefix
    mediaType: ImageMediaType;
  };
}
