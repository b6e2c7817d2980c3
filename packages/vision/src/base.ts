/**
 * Shared request flow for vision clients.
 *
 * Subclasses only translate one request/response pair; image loading,
 * timing, logging and error normalization live here.
 *
 * @module @agent-tools/vision/base
 */

import { type EnvSource, getLogger, type Logger, loadDotenv } from "@agent-tools/core";
import { createProviderError, ProviderError } from "./errors.js";
import { readImageAsDataUrl } from "./image.js";
import type {
  AnalyzeImageOptions,
  FetchFn,
  VisionClient,
  VisionUsage,
} from "./types.js";
import { VisionResult } from "./types.js";

export interface BaseVisionClientOptions {
  /** Model used when analyzeImage() is not given one */
  defaultModel?: string;
  /** Request deadline in milliseconds */
  timeoutMs?: number;
  logger?: Logger;
  /** fetch implementation (default: globalThis.fetch) */
  fetch?: FetchFn;
}

/**
 * One prepared request, handed to the provider implementation.
 */
export interface VisionRequest {
  model: string;
  prompt: string;
  dataUrl: string;
  maxTokens?: number;
  timeoutMs: number;
}

/**
 * What a provider implementation extracts from its response.
 */
export interface VisionCompletion {
  description: string;
  rawResponse: unknown;
  usage?: VisionUsage;
}

export type VisionContentPart =
  | { type: "text"; text: string }
  | { type: "image_url"; image_url: { url: string } };

export interface VisionUserMessage {
  role: "user";
  content: VisionContentPart[];
}

/**
 * The single user message sent by every client: prompt text, then the image.
 */
export function buildVisionMessages(prompt: string, dataUrl: string): VisionUserMessage[] {
  return [
    {
      role: "user",
      content: [
        { type: "text", text: prompt },
        { type: "image_url", image_url: { url: dataUrl } },
      ],
    },
  ];
}

/**
 * Convert OpenAI-style usage counters.
 */
export function toVisionUsage(
  usage:
    | { prompt_tokens: number; completion_tokens: number; total_tokens: number }
    | null
    | undefined
): VisionUsage | undefined {
  if (!usage) {
    return undefined;
  }
  return {
    promptTokens: usage.prompt_tokens,
    completionTokens: usage.completion_tokens,
    totalTokens: usage.total_tokens,
  };
}

/**
 * Environment for fromEnv(): the nearest `.env` is loaded into process.env
 * first, unless a custom environment is passed.
 */
export function resolveClientEnv(env?: EnvSource): EnvSource {
  if (env === undefined || env === process.env) {
    loadDotenv();
    return process.env;
  }
  return env;
}

/**
 * Abstract base for vision clients.
 *
 * @example
 * ```typescript
 * class MyClient extends BaseVisionClient {
 *   readonly provider = 'mine';
 *   protected async complete(request: VisionRequest): Promise<VisionCompletion> {
 *     // one request to the provider
 *   }
 * }
 * ```
 */
export abstract class BaseVisionClient implements VisionClient {
  abstract readonly provider: string;
  readonly defaultModel: string;
  protected readonly timeoutMs: number;
  protected readonly fetchFn: FetchFn;
  private readonly baseLogger?: Logger;

  protected constructor(
    defaults: { model: string; timeoutMs: number },
    options: BaseVisionClientOptions = {}
  ) {
    this.defaultModel = options.defaultModel ?? defaults.model;
    this.timeoutMs = options.timeoutMs ?? defaults.timeoutMs;
    this.fetchFn = options.fetch ?? ((input, init) => globalThis.fetch(input, init));
    this.baseLogger = options.logger;
  }

  protected get logger(): Logger {
    return (this.baseLogger ?? getLogger()).child({ provider: this.provider });
  }

  async analyzeImage(
    imagePath: string,
    prompt: string,
    options: AnalyzeImageOptions = {}
  ): Promise<VisionResult> {
    const model = options.model ?? this.defaultModel;
    const image = await readImageAsDataUrl(imagePath);

    const logger = this.logger;
    logger.debug("Sending vision request", {
      model,
      imagePath,
      mimeType: image.mimeType,
      sizeBytes: image.sizeBytes,
    });
    const timer = logger.time("analyzeImage");

    let completion: VisionCompletion;
    try {
      completion = await this.complete({
        model,
        prompt,
        dataUrl: image.dataUrl,
        maxTokens: options.maxTokens,
        timeoutMs: options.timeoutMs ?? this.timeoutMs,
      });
    } catch (error) {
      const durationMs = Math.round(timer.stop());
      const providerError =
        error instanceof ProviderError
          ? error
          : createProviderError(error, { provider: this.provider, model });
      logger.warn("Vision request failed", {
        model,
        category: providerError.category,
        statusCode: providerError.statusCode,
        durationMs,
        error: providerError.message,
      });
      throw providerError;
    }

    timer.end("Vision request completed", { model });

    return new VisionResult({
      ...completion,
      model,
      provider: this.provider,
      durationMs: Math.round(timer.duration),
    });
  }

  /**
   * Send one request and extract the description.
   *
   * @throws ProviderError for any failure
   */
  protected abstract complete(request: VisionRequest): Promise<VisionCompletion>;
}
