/**
 * Vision client contracts and result type.
 *
 * @module @agent-tools/vision/types
 */

import type { EnvSource } from "@agent-tools/core";

/**
 * Token accounting reported by the provider, when it reports any.
 */
export interface VisionUsage {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}

export interface VisionResultInit {
  description: string;
  rawResponse: unknown;
  model: string;
  provider: string;
  usage?: VisionUsage;
  durationMs: number;
}

/**
 * Normalized outcome of one image analysis.
 */
export class VisionResult {
  readonly description: string;
  /** Provider response body, untouched */
  readonly rawResponse: unknown;
  readonly model: string;
  readonly provider: string;
  readonly usage?: VisionUsage;
  readonly durationMs: number;

  constructor(init: VisionResultInit) {
    this.description = init.description;
    this.rawResponse = init.rawResponse;
    this.model = init.model;
    this.provider = init.provider;
    this.usage = init.usage;
    this.durationMs = init.durationMs;
  }

  toString(): string {
    return this.description;
  }
}

/**
 * Per-call overrides for analyzeImage().
 */
export interface AnalyzeImageOptions {
  /** Model identifier (default: the client's default model) */
  model?: string;
  /** Upper bound on generated tokens */
  maxTokens?: number;
  /** Request deadline in milliseconds (default: the client's timeout) */
  timeoutMs?: number;
}

/**
 * A configured client for one vision provider.
 */
export interface VisionClient {
  /** Provider name, e.g. "ollama" */
  readonly provider: string;
  readonly defaultModel: string;

  /**
   * Read an image, send it with the prompt, and return the description.
   *
   * @throws ImageReadError before any request when the image is unusable
   * @throws ProviderError when the provider rejects or fails the request
   * @throws ProviderTimeoutError when the deadline elapses
   */
  analyzeImage(
    imagePath: string,
    prompt: string,
    options?: AnalyzeImageOptions
  ): Promise<VisionResult>;
}

/**
 * The static side of a vision client class, as returned by the tool registry.
 */
export interface VisionClientClass<T extends VisionClient = VisionClient> {
  readonly PROVIDER: string;
  readonly DEFAULT_MODEL: string;
  /**
   * Build a client from environment variables.
   *
   * @throws ConfigurationError when required variables are missing or invalid
   */
  fromEnv(env?: EnvSource): T;
}

/**
 * The subset of `fetch` a client needs; injectable for tests.
 */
export type FetchFn = (input: string | URL | Request, init?: RequestInit) => Promise<Response>;
