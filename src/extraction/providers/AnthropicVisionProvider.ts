/**
 * Anthropic Vision Provider - Claude models via the Messages API
 */

import { z } from 'zod';
import type { GenerationRequest, GenerationResult, VisionModelConfig } from '../types.js';
import { BaseCloudVisionProvider, CloudVisionError } from './BaseCloudVisionProvider.js';

const AnthropicMessageResponseSchema = z.object({
  content: z.array(z.object({
    type: z.string(),
    text: z.string().optional()
  })),
  stop_reason: z.string().nullable().optional(),
  usage: z.object({
    input_tokens: z.number(),
    output_tokens: z.number()
  })
});

type AnthropicContentBlock =
  | { type: 'text'; text: string }
  | { type: 'image'; source: { type: 'base64'; media_type: string; data: string } };

export class AnthropicVisionProvider extends BaseCloudVisionProvider {
  name: string;
  protected readonly providerName = 'anthropic' as const;
  private baseUrl: string;
  private model: string;

  constructor(config: VisionModelConfig) {
    super(config);
    this.model = config.model;
    this.name = `${config.model}-anthropic`;
    this.baseUrl = config.baseUrl || 'https://api.anthropic.com/v1';

    if (!this.apiKey) {
      throw new CloudVisionError(
        'Anthropic API key is required. Set ANTHROPIC_API_KEY environment variable or provide apiKey in config.',
        'anthropic',
        401,
        false
      );
    }
  }

  async generate(request: GenerationRequest): Promise<GenerationResult> {
    const startTime = Date.now();

    const content: AnthropicContentBlock[] = (request.images ?? []).map(image => ({
      type: 'image' as const,
      source: {
        type: 'base64' as const,
        media_type: image.mimeType,
        data: this.encodeImage(image)
      }
    }));

    const prompt = request.responseSchema
      ? `${request.prompt}\n\nRespond with a single JSON value matching this schema and no other text:\n${JSON.stringify(request.responseSchema)}`
      : request.prompt;
    content.push({ type: 'text', text: prompt });

    const requestBody = {
      model: this.model,
      max_tokens: this.resolveMaxTokens(request),
      temperature: this.resolveTemperature(request),
      messages: [
        {
          role: 'user',
          content
        }
      ]
    };

    try {
      const response = await this.requestWithRetry(
        `${this.baseUrl}/messages`,
        {
          method: 'POST',
          headers: {
            'Content-Type': 'application/json',
            'x-api-key': this.apiKey,
            'anthropic-version': '2023-06-01'
          },
          body: JSON.stringify(requestBody)
        },
        AnthropicMessageResponseSchema,
        request.timeoutMs
      );

      const text = response.content
        .filter(c => c.type === 'text')
        .map(c => c.text ?? '')
        .join('');

      return {
        text,
        model: this.model,
        provider: 'anthropic',
        processing_time_ms: Date.now() - startTime,
        usage: {
          input_tokens: response.usage.input_tokens,
          output_tokens: response.usage.output_tokens,
          total_tokens: response.usage.input_tokens + response.usage.output_tokens
        }
      };
    } catch (error) {
      throw this.wrapError(error, 'Anthropic');
    }
  }

  async healthCheck(): Promise<boolean> {
    // Anthropic doesn't have a simple health endpoint, so we just check if we have an API key
    return !!this.apiKey;
  }
}
