/**
 * @agent-tools/vision
 *
 * Vision clients are exported from their own entry points
 * (`@agent-tools/vision/ollama`, `@agent-tools/vision/venice`) so that
 * importing the shared types does not load a provider SDK.
 */

export {
  type BaseVisionClientOptions,
  BaseVisionClient,
  buildVisionMessages,
  resolveClientEnv,
  toVisionUsage,
  type VisionCompletion,
  type VisionContentPart,
  type VisionRequest,
  type VisionUserMessage,
} from "./base.js";
export {
  classifyHttpStatus,
  classifyProviderError,
  createProviderError,
  type ErrorClassification,
  getErrorMessage,
  isProviderError,
  isTimeoutAbort,
  ProviderError,
  type ProviderErrorCategory,
  type ProviderErrorContext,
  type ProviderErrorOptions,
  ProviderTimeoutError,
} from "./errors.js";
export {
  detectMimeTypeFromBuffer,
  detectMimeTypeFromExtension,
  type EncodedImage,
  type ImageMimeType,
  MAX_IMAGE_SIZE_BYTES,
  readImageAsDataUrl,
} from "./image.js";
export {
  type AnalyzeImageOptions,
  type FetchFn,
  type VisionClient,
  type VisionClientClass,
  VisionResult,
  type VisionResultInit,
  type VisionUsage,
} from "./types.js";
