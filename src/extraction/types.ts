/**
 * Generative model types for tally extraction and judging
 */

export type ImageMimeType = 'image/jpeg' | 'image/png' | 'image/webp';

/**
 * One page image held in memory
 */
export interface ImagePayload {
  data: Buffer;
  mimeType: ImageMimeType;
  /** Original filename, used in logs and page labels */
  filename?: string;
}

export interface GenerationRequest {
  prompt: string;
  images?: ImagePayload[];
  /** JSON schema the response must conform to */
  responseSchema?: Record<string, unknown>;
  temperature?: number;
  maxTokens?: number;
  /** Overrides the provider's configured timeout for this call */
  timeoutMs?: number;
}

export interface GenerationResult {
  text: string;
  model: string;
  provider: string;
  processing_time_ms: number;
  /** Token usage for cost tracking */
  usage?: {
    input_tokens?: number;
    output_tokens?: number;
    total_tokens?: number;
  };
}

export interface ModelInfo {
  name: string;
  provider: string;
  parameters?: string;
}

/**
 * Narrow contract the core uses for every model call, extraction and judging alike
 */
export interface GenerativeModel {
  name: string;
  generate(request: GenerationRequest): Promise<GenerationResult>;
  healthCheck(): Promise<boolean>;
  getModelInfo(): ModelInfo;
}

export type ModelProviderName = 'openai' | 'anthropic' | 'google';

export interface VisionModelConfig {
  provider: ModelProviderName;
  baseUrl?: string;  // Optional, each provider has a default
  model: string;
  description?: string;
  parameters?: string;
  apiKey?: string;   // env var takes precedence
  options?: {
    temperature?: number;
    maxTokens?: number;
    timeout?: number;       // Request timeout in ms
    maxRetries?: number;    // Provider-level retries, 0 unless set
    requestsPerMinute?: number;
  };
}

export interface VisionModelsConfigFile {
  default: string;
  judge?: string;
  models: Record<string, VisionModelConfig>;
}
