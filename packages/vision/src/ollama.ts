/**
 * Ollama Vision Client
 *
 * Talks to an Ollama server (or its cloud relay) through the
 * OpenAI-compatible `/v1/chat/completions` endpoint.
 *
 * @module @agent-tools/vision/ollama
 */

import { type EnvSource, parseEnv } from "@agent-tools/core";
import { ErrorCode } from "@agent-tools/shared";
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
  isTimeoutAbort,
  type ProviderErrorContext,
  ProviderError,
  ProviderTimeoutError,
} from "./errors.js";

export const DEFAULT_OLLAMA_HOST = "http://127.0.0.1:11434";

const ollamaEnvSchema = z.object({
  OLLAMA_HOST: z.string().url().default(DEFAULT_OLLAMA_HOST),
});

const chatCompletionSchema = z
  .object({
    choices: z
      .array(z.object({ message: z.object({ content: z.string() }).passthrough() }).passthrough())
      .min(1),
    usage: z
      .object({
        prompt_tokens: z.number(),
        completion_tokens: z.number(),
        total_tokens: z.number(),
      })
      .nullish(),
  })
  .passthrough();

export interface OllamaVisionClientOptions extends BaseVisionClientOptions {
  /** Server base URL (default: http://127.0.0.1:11434) */
  host?: string;
}

/**
 * Vision client for Ollama-hosted models such as `kimi-k2.5:cloud`.
 *
 * @example
 * ```typescript
 * const client = OllamaVisionClient.fromEnv();
 * const result = await client.analyzeImage('./chart.png', 'Extract all text');
 * console.log(result.description);
 * ```
 */
export class OllamaVisionClient extends BaseVisionClient {
  static readonly PROVIDER = "ollama";
  static readonly DEFAULT_MODEL = "kimi-k2.5:cloud";
  static readonly DEFAULT_TIMEOUT_MS = 180_000;

  readonly provider = OllamaVisionClient.PROVIDER;
  /** Base URL without trailing slash */
  readonly host: string;

  constructor(options: OllamaVisionClientOptions = {}) {
    super(
      {
        model: OllamaVisionClient.DEFAULT_MODEL,
        timeoutMs: OllamaVisionClient.DEFAULT_TIMEOUT_MS,
      },
      options
    );
    this.host = (options.host ?? DEFAULT_OLLAMA_HOST).replace(/\/+$/, "");
  }

  /**
   * Create a client from `OLLAMA_HOST`, falling back to the local default.
   *
   * @throws ConfigurationError if `OLLAMA_HOST` is not a URL
   */
  static fromEnv(env?: EnvSource): OllamaVisionClient {
    const config = parseEnv(ollamaEnvSchema, resolveClientEnv(env), "Ollama configuration");
    return new OllamaVisionClient({ host: config.OLLAMA_HOST });
  }

  protected async complete(request: VisionRequest): Promise<VisionCompletion> {
    const context: ProviderErrorContext = { provider: this.provider, model: request.model };
    const body: Record<string, unknown> = {
      model: request.model,
      messages: buildVisionMessages(request.prompt, request.dataUrl),
    };
    if (request.maxTokens !== undefined) {
      body.max_tokens = request.maxTokens;
    }

    try {
      const response = await this.fetchFn(`${this.host}/v1/chat/completions`, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify(body),
        signal: AbortSignal.timeout(request.timeoutMs),
      });
      const text = await response.text();

      if (!response.ok) {
        throw new ProviderError(`Ollama API error: ${response.status} - ${text}`, {
          ...classifyHttpStatus(response.status),
          statusCode: response.status,
          context: { ...context, requestId: response.headers.get("x-request-id") ?? undefined },
        });
      }

      return parseCompletion(text, context);
    } catch (error) {
      if (error instanceof ProviderError) {
        throw error;
      }
      if (isTimeoutAbort(error)) {
        throw new ProviderTimeoutError(`Ollama request timed out after ${request.timeoutMs}ms`, {
          timeoutMs: request.timeoutMs,
          cause: error instanceof Error ? error : undefined,
          context,
        });
      }
      throw createProviderError(error, "Ollama request failed").withContext(context);
    }
  }
}

function parseCompletion(text: string, context: ProviderErrorContext): VisionCompletion {
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (error) {
    throw invalidResponse("Ollama returned a non-JSON response", context, error);
  }

  const parsed = chatCompletionSchema.safeParse(json);
  if (!parsed.success) {
    throw invalidResponse(
      `Ollama returned an unexpected response: ${parsed.error.issues[0]?.message ?? "invalid"}`,
      context
    );
  }

  const [choice] = parsed.data.choices;
  if (!choice) {
    throw invalidResponse("Ollama returned no choices", context);
  }

  return {
    description: choice.message.content,
    rawResponse: json,
    usage: toVisionUsage(parsed.data.usage),
  };
}

function invalidResponse(
  message: string,
  context: ProviderErrorContext,
  cause?: unknown
): ProviderError {
  return new ProviderError(message, {
    code: ErrorCode.INVALID_RESPONSE,
    category: "invalid_response",
    retryable: false,
    cause: cause instanceof Error ? cause : undefined,
    context,
  });
}
