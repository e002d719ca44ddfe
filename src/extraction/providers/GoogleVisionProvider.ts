/**
 * Google Vision Provider - Gemini models via the Generative Language API
 */

import { z } from 'zod';
import type { GenerationRequest, GenerationResult, VisionModelConfig } from '../types.js';
import { BaseCloudVisionProvider, CloudVisionError } from './BaseCloudVisionProvider.js';

const GeminiGenerateContentResponseSchema = z.object({
  candidates: z.array(z.object({
    content: z.object({
      parts: z.array(z.object({ text: z.string().optional() })).optional()
    }).optional(),
    finishReason: z.string().optional()
  })).optional(),
  usageMetadata: z.object({
    promptTokenCount: z.number(),
    candidatesTokenCount: z.number(),
    totalTokenCount: z.number()
  }).optional()
});

type GeminiPart =
  | { text: string }
  | { inline_data: { mime_type: string; data: string } };

export class GoogleVisionProvider extends BaseCloudVisionProvider {
  name: string;
  protected readonly providerName = 'google' as const;
  private baseUrl: string;
  private model: string;

  constructor(config: VisionModelConfig) {
    super(config);
    this.model = config.model;
    this.name = `${config.model}-google`;
    this.baseUrl = config.baseUrl || 'https://generativelanguage.googleapis.com/v1beta';

    if (!this.apiKey) {
      throw new CloudVisionError(
        'Google API key is required. Set GOOGLE_API_KEY or GEMINI_API_KEY environment variable or provide apiKey in config.',
        'google',
        401,
        false
      );
    }
  }

  async generate(request: GenerationRequest): Promise<GenerationResult> {
    const startTime = Date.now();

    // Each image is preceded by a page label so the model can refer to it
    const parts: GeminiPart[] = [];
    (request.images ?? []).forEach((image, i) => {
      parts.push({ text: `Page ${i + 1}${image.filename ? ` (Filename: ${image.filename})` : ''}` });
      parts.push({ inline_data: { mime_type: image.mimeType, data: this.encodeImage(image) } });
    });
    parts.push({ text: request.prompt });

    const requestBody = {
      contents: [{ parts }],
      generationConfig: {
        temperature: this.resolveTemperature(request),
        maxOutputTokens: this.resolveMaxTokens(request),
        ...(request.responseSchema
          ? { responseMimeType: 'application/json', responseSchema: request.responseSchema }
          : {})
      }
    };

    try {
      // Google uses query param for API key
      const url = `${this.baseUrl}/models/${this.model}:generateContent?key=${this.apiKey}`;

      const response = await this.requestWithRetry(
        url,
        {
          method: 'POST',
          headers: {
            'Content-Type': 'application/json'
          },
          body: JSON.stringify(requestBody)
        },
        GeminiGenerateContentResponseSchema,
        request.timeoutMs
      );

      const text = response.candidates?.[0]?.content?.parts
        ?.map(p => p.text ?? '')
        .join('') ?? '';

      return {
        text,
        model: this.model,
        provider: 'google',
        processing_time_ms: Date.now() - startTime,
        usage: response.usageMetadata ? {
          input_tokens: response.usageMetadata.promptTokenCount,
          output_tokens: response.usageMetadata.candidatesTokenCount,
          total_tokens: response.usageMetadata.totalTokenCount
        } : undefined
      };
    } catch (error) {
      throw this.wrapError(error, 'Google');
    }
  }

  async healthCheck(): Promise<boolean> {
    try {
      const response = await fetch(`${this.baseUrl}/models?key=${this.apiKey}`);
      return response.ok;
    } catch {
      return false;
    }
  }
}
