/**
 * Venice AI Vision Client
 *
 * Venice exposes an OpenAI-compatible API, so requests go through the
 * openai SDK with Venice's base URL.
 *
 * @module @agent-tools/vision/venice
 */

import { type EnvSource, parseEnv } from "@agent-tools/core";
import { ErrorCode } from "@agent-tools/shared";
import OpenAI from "openai";
import type { ChatCompletionCreateParamsNonStreaming } from "openai/resources/chat/completions";
import { z } from "zod";
import {
  type BaseVisionClientOptions,
  BaseVisionClient,
  buildVisionMessages,
  resolveClientEnv,
  toVisionUsage,
  type VisionCompletion,
  type VisionRequest,
} from "./base.js";
import {
  classifyHttpStatus,
  createProviderError,
  type ProviderErrorContext,
  ProviderError,
  ProviderTimeoutError,
} from "./errors.js";

export const VENICE_BASE_URL = "https://api.venice.ai/api/v1";

const veniceEnvSchema = z.object({
  VENICE_API_KEY: z.string().min(1),
});

export interface VeniceVisionClientOptions extends BaseVisionClientOptions {
  apiKey: string;
  /** API base URL (default: https://api.venice.ai/api/v1) */
  baseUrl?: string;
}

/**
 * Vision client for Venice AI models such as `qwen3-vl-235b-a22b`.
 *
 * @example
 * ```typescript
 * const client = VeniceVisionClient.fromEnv();
 * const result = await client.analyzeImage('./diagram.jpg', 'Describe this diagram', {
 *   maxTokens: 512,
 * });
 * ```
 */
export class VeniceVisionClient extends BaseVisionClient {
  static readonly PROVIDER = "venice";
  static readonly DEFAULT_MODEL = "qwen3-vl-235b-a22b";
  static readonly DEFAULT_TIMEOUT_MS = 60_000;

  readonly provider = VeniceVisionClient.PROVIDER;
  private readonly client: OpenAI;

  constructor(options: VeniceVisionClientOptions) {
    super(
      {
        model: VeniceVisionClient.DEFAULT_MODEL,
        timeoutMs: VeniceVisionClient.DEFAULT_TIMEOUT_MS,
      },
      options
    );
    this.client = new OpenAI({
      apiKey: options.apiKey,
      baseURL: options.baseUrl ?? VENICE_BASE_URL,
      timeout: this.timeoutMs,
      maxRetries: 0,
      fetch: this.fetchFn,
    });
  }

  /**
   * Create a client from `VENICE_API_KEY`.
   *
   * @throws ConfigurationError if `VENICE_API_KEY` is not set
   */
  static fromEnv(env?: EnvSource): VeniceVisionClient {
    const config = parseEnv(veniceEnvSchema, resolveClientEnv(env), "Venice configuration");
    return new VeniceVisionClient({ apiKey: config.VENICE_API_KEY });
  }

  protected async complete(request: VisionRequest): Promise<VisionCompletion> {
    const context: ProviderErrorContext = { provider: this.provider, model: request.model };
    const body: ChatCompletionCreateParamsNonStreaming = {
      model: request.model,
      messages: buildVisionMessages(request.prompt, request.dataUrl),
    };
    if (request.maxTokens !== undefined) {
      body.max_completion_tokens = request.maxTokens;
    }

    try {
      const completion = await this.client.chat.completions.create(body, {
        timeout: request.timeoutMs,
      });

      const content = completion.choices[0]?.message.content;
      if (typeof content !== "string") {
        throw new ProviderError("Venice returned no message content", {
          code: ErrorCode.INVALID_RESPONSE,
          category: "invalid_response",
          retryable: false,
          context,
        });
      }

      return {
        description: content,
        rawResponse: completion,
        usage: toVisionUsage(completion.usage),
      };
    } catch (error) {
      throw this.handleError(error, context, request.timeoutMs);
    }
  }

  /**
   * Handle and wrap errors appropriately
   */
  private handleError(
    error: unknown,
    context: ProviderErrorContext,
    timeoutMs: number
  ): ProviderError {
    if (error instanceof ProviderError) {
      return error;
    }

    if (error instanceof OpenAI.APIConnectionTimeoutError) {
      return new ProviderTimeoutError(`Venice request timed out after ${timeoutMs}ms`, {
        timeoutMs,
        cause: error,
        context,
      });
    }

    if (error instanceof OpenAI.APIError && error.status !== undefined) {
      return new ProviderError(`Venice API error: ${error.message}`, {
        ...classifyHttpStatus(error.status),
        statusCode: error.status,
        cause: error,
        context: { ...context, requestId: error.headers?.get("x-request-id") ?? undefined },
      });
    }

    return createProviderError(error, "Venice request failed").withContext(context);
  }
}
