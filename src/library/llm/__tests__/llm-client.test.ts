import { describe, it, expect, vi, beforeEach } from 'vitest';
import { callVisionLLM } from '../llm-client.js';
import { LLMProviders } from '../../../types.js';

const mockAnthropicStream = vi.fn();
const mockOpenAICreate = vi.fn();

vi.mock('@anthropic-ai/sdk', () => {
  return {
    default: class MockAnthropic {
      messages = {
        stream: mockAnthropicStream,
      };
    },
  };
});

vi.mock('openai', () => {
  return {
    default: class MockOpenAI {
      chat = {
        completions: {
          create: mockOpenAICreate,
        },
      };
    },
  };
});

const image = { data: 'AQID', mediaType: 'image/png' as const };

describe('callVisionLLM', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  describe('Anthropic provider', () => {
    it('sends the image before the prompt', async () => {
      mockAnthropicStream.mockReturnValue({
        finalMessage: () =>
          Promise.resolve({
            content: [{ type: 'text', text: '[]' }],
            usage: { input_tokens: 100, output_tokens: 50 },
          }),
      });

      await callVisionLLM({
        provider: LLMProviders.anthropic_claude_haiku,
        apiKey: 'test-key',
        prompt: 'Extract the rows',
        image,
      });

      expect(mockAnthropicStream).toHaveBeenCalledWith({
        model: 'claude-haiku-4-5-20251001',
        max_tokens: 4000,
        temperature: 0,
        messages: [
          {
            role: 'user',
            content: [
              { type: 'image', source: { type: 'base64', media_type: 'image/png', data: 'AQID' } },
              { type: 'text', text: 'Extract the rows' },
            ],
          },
        ],
      });
    });

    it('joins text blocks and prices tokens', async () => {
      mockAnthropicStream.mockReturnValue({
        finalMessage: () =>
          Promise.resolve({
            content: [
              { type: 'text', text: '[{"segment":' },
              { type: 'tool_use', id: 'x', name: 'noop', input: {} },
              { type: 'text', text: '"Taxi"}]' },
            ],
            usage: { input_tokens: 1_000_000, output_tokens: 100_000 },
          }),
      });

      const result = await callVisionLLM({
        provider: LLMProviders.anthropic_claude_sonnet,
        apiKey: 'test-key',
        prompt: 'Extract the rows',
        image,
      });

      expect(result.text).toBe('[{"segment": "Taxi"}]');
      expect(result.inputTokens).toBe(1_000_000);
      expect(result.outputTokens).toBe(100_000);
      expect(result.cost).toBeCloseTo(4.5);
    });
  });

  describe('OpenAI provider', () => {
    it('sends the image as a data URL', async () => {
      mockOpenAICreate.mockResolvedValue({
        choices: [{ message: { content: '[{"segment":"Bus"}]' } }],
        usage: { prompt_tokens: 2000, completion_tokens: 1000 },
      });

      const result = await callVisionLLM({
        provider: LLMProviders.openai_gpt4o_mini,
        apiKey: 'test-key',
        prompt: 'Extract the rows',
        image,
      });

      expect(mockOpenAICreate).toHaveBeenCalledWith({
        model: 'gpt-4o-mini',
        temperature: 0,
        max_completion_tokens: 4000,
        messages: [
          {
            role: 'user',
            content: [
              { type: 'text', text: 'Extract the rows' },
              { type: 'image_url', image_url: { url: 'data:image/png;base64,AQID' } },
            ],
          },
        ],
      });
      expect(result.text).toBe('[{"segment":"Bus"}]');
      expect(result.cost).toBeCloseTo(0.0009);
    });

    it('handles a missing message body and usage', async () => {
      mockOpenAICreate.mockResolvedValue({ choices: [{ message: { content: null } }] });

      const result = await callVisionLLM({
        provider: LLMProviders.openai_gpt4o,
        apiKey: 'test-key',
        prompt: 'Extract the rows',
        image,
      });

      expect(result).toEqual({ text: '', cost: 0, inputTokens: 0, outputTokens: 0 });
    });
  });

  it('names the model when a call fails', async () => {
    mockOpenAICreate.mockRejectedValue(new Error('rate limited'));

    await expect(
      callVisionLLM({
        provider: LLMProviders.openai_gpt4o,
        apiKey: 'test-key',
        prompt: 'Extract the rows',
        image,
      })
    ).rejects.toThrow('LLM call failed (gpt-4o): rate limited');
  });
});
