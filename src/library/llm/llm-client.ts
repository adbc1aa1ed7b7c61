import Anthropic from '@anthropic-ai/sdk';
import OpenAI from 'openai';
import { PROVIDER_SPECS, TOKENS_PER_MILLION } from '../constants.js';
import type { ProviderSpec } from '../../types.js';
import type { CallVisionLLMConfig, LLMResult } from './types.js';

/**
 * Send one image plus an instruction prompt to a vision-capable model.
 * Returns raw text output - caller is responsible for parsing it.
 */
export async function callVisionLLM(config: CallVisionLLMConfig): Promise<LLMResult> {
  const { provider, apiKey, prompt, image } = config;
  const spec = PROVIDER_SPECS[provider];

  try {
    // Anthropic
    if (provider.startsWith('anthropic')) {
      const client = new Anthropic({ apiKey });
      const stream = client.messages.stream({
        model: spec.model,
        max_tokens: spec.maxTokens,
        temperature: 0,
        messages: [
          {
            role: 'user',
            content: [
              {
                type: 'image',
                source: { type: 'base64', media_type: image.mediaType, data: image.data },
              },
              { type: 'text', text: prompt },
            ],
          },
        ],
      });
      const finalMessage = await stream.finalMessage();

      const textBlocks = finalMessage.content
        .filter((block) => block.type === 'text')
        .map((block) => block.text);
      const inputTokens = finalMessage.usage.input_tokens;
      const outputTokens = finalMessage.usage.output_tokens;

      return {
        text: textBlocks.join(' '),
        cost: costOf(spec, inputTokens, outputTokens),
        inputTokens,
        outputTokens,
      };
    }

    // OpenAI
    if (provider.startsWith('openai')) {
      const client = new OpenAI({ apiKey });
      const completionOptions: OpenAI.ChatCompletionCreateParamsNonStreaming = {
        model: spec.model,
        temperature: 0,
        max_completion_tokens: spec.maxTokens,
        messages: [
          {
            role: 'user',
            content: [
              { type: 'text', text: prompt },
              {
                type: 'image_url',
                image_url: { url: `data:${image.mediaType};base64,${image.data}` },
              },
            ],
          },
        ],
      };

      const response = await client.chat.completions.create(completionOptions);
      const text = response.choices[0]?.message.content ?? '';
      const inputTokens = response.usage?.prompt_tokens ?? 0;
      const outputTokens = response.usage?.completion_tokens ?? 0;

      return {
        text,
        cost: costOf(spec, inputTokens, outputTokens),
        inputTokens,
        outputTokens,
      };
    }

    throw new Error(`Unsupported provider: ${provider}`);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`LLM call failed (${spec.model}): ${message}`);
  }
}

function costOf(spec: ProviderSpec, inputTokens: number, outputTokens: number): number {
  return (
    (inputTokens * spec.costPerMillionInput + outputTokens * spec.costPerMillionOutput) /
    TOKENS_PER_MILLION
  );
}
