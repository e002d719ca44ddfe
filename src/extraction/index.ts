/**
 * Extraction module exports
 */

export * from './types.js';
export { VisionModelFactory } from './VisionModelFactory.js';
export { BaseCloudVisionProvider, CloudVisionError, RateLimiter } from './providers/BaseCloudVisionProvider.js';
export { GoogleVisionProvider } from './providers/GoogleVisionProvider.js';
export { OpenAIVisionProvider } from './providers/OpenAIVisionProvider.js';
export { AnthropicVisionProvider } from './providers/AnthropicVisionProvider.js';
export { ExtractionError, isExtractionError } from './ExtractionError.js';
export type { ExtractionErrorKind } from './ExtractionError.js';
export {
  SUPPORTED_IMAGE_EXTENSIONS,
  UnsupportedImageError,
  isSupportedMimeType,
  loadImagePayload,
  mimeTypeForFile,
} from './imagePayload.js';
export {
  PAGE_EXTRACTION_PROMPT,
  PAGE_RESPONSE_SCHEMA,
  PageResponseSchema,
  SCHEMA_VERSION,
  extractJsonText,
  parsePageResponse,
  toPageRecord,
} from './schema.js';
export { PageExtractor } from './PageExtractor.js';
export type { PageExtractorOptions } from './PageExtractor.js';
export { FormSetExtractor } from './FormSetExtractor.js';
export type { FormSetExtractorOptions, FormSetResult } from './FormSetExtractor.js';
