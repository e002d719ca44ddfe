/**
 * OpenAI Vision Provider - Supports GPT-4o, GPT-4o-mini, GPT-4.1
 */

import { z } from 'zod';
import type { GenerationRequest, GenerationResult, VisionModelConfig } from '../types.js';
import { BaseCloudVisionProvider, CloudVisionError } from './BaseCloudVisionProvider.js';

const OpenAIChatCompletionResponseSchema = z.object({
  choices: z.array(z.object({
    message: z.object({
      content: z.string().nullable().optional()
    }).optional()
  })),
  usage: z.object({
    prompt_tokens: z.number(),
    completion_tokens: z.number(),
    total_tokens: z.number()
  }).optional()
});

type OpenAIContentPart =
  | { type: 'text'; text: string }
  | { type: 'image_url'; image_url: { url: string } };

export class OpenAIVisionProvider extends BaseCloudVisionProvider {
  name: string;
  protected readonly providerName = 'openai' as const;
  private baseUrl: string;
  private model: string;

  constructor(config: VisionModelConfig) {
    super(config);
    this.model = config.model;
    this.name = `${config.model}-openai`;
    this.baseUrl = config.baseUrl || 'https://api.openai.com/v1';

    if (!this.apiKey) {
      throw new CloudVisionError(
        'OpenAI API key is required. Set OPENAI_API_KEY environment variable or provide apiKey in config.',
        'openai',
        401,
        false
      );
    }
  }

  async generate(request: GenerationRequest): Promise<GenerationResult> {
    const startTime = Date.now();

    const content: OpenAIContentPart[] = (request.images ?? []).map(image => ({
      type: 'image_url' as const,
      image_url: {
        url: `data:${image.mimeType};base64,${this.encodeImage(image)}`
      }
    }));

    // The schema travels in the prompt; json_object mode only guarantees syntax
    const prompt = request.responseSchema
      ? `${request.prompt}\n\nRespond with JSON matching this schema:\n${JSON.stringify(request.responseSchema)}`
      : request.prompt;
    content.push({ type: 'text', text: prompt });

    const requestBody = {
      model: this.model,
      messages: [
        {
          role: 'user',
          content
        }
      ],
      max_tokens: this.resolveMaxTokens(request),
      temperature: this.resolveTemperature(request),
      ...(request.responseSchema ? { response_format: { type: 'json_object' } } : {})
    };

    try {
      const response = await this.requestWithRetry(
        `${this.baseUrl}/chat/completions`,
        {
          method: 'POST',
          headers: {
            'Content-Type': 'application/json',
            'Authorization': `Bearer ${this.apiKey}`
          },
          body: JSON.stringify(requestBody)
        },
        OpenAIChatCompletionResponseSchema,
        request.timeoutMs
      );

      return {
        text: response.choices[0]?.message?.content ?? '',
        model: this.model,
        provider: 'openai',
        processing_time_ms: Date.now() - startTime,
        usage: response.usage ? {
          input_tokens: response.usage.prompt_tokens,
          output_tokens: response.usage.completion_tokens,
          total_tokens: response.usage.total_tokens
        } : undefined
      };
    } catch (error) {
      throw this.wrapError(error, 'OpenAI');
    }
  }

  async healthCheck(): Promise<boolean> {
    try {
      const response = await fetch(`${this.baseUrl}/models`, {
        headers: {
          'Authorization': `Bearer ${this.apiKey}`
        }
      });
      return response.ok;
    } catch {
      return false;
    }
  }
}
