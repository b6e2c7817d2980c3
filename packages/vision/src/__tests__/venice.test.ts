import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { ConfigurationError, createLogger } from "@agent-tools/core";
import { ErrorCode } from "@agent-tools/shared";
import { afterEach, beforeEach, describe, expect, it, type Mock, vi } from "vitest";
import { ProviderError, ProviderTimeoutError } from "../errors.js";
import type { FetchFn } from "../types.js";
import { VeniceVisionClient } from "../venice.js";

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "content-type": "application/json" },
  });
}

function chatCompletion(content: string | null) {
  return {
    id: "chatcmpl-venice-1",
    object: "chat.completion",
    created: 1767225600,
    model: "qwen3-vl-235b-a22b",
    choices: [
      {
        index: 0,
        message: { role: "assistant", content, refusal: null },
        finish_reason: "stop",
        logprobs: null,
      },
    ],
    usage: { prompt_tokens: 40, completion_tokens: 8, total_tokens: 48 },
  };
}

async function captureError(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (error) {
    return error;
  }
  return undefined;
}

describe("VeniceVisionClient.fromEnv", () => {
  it("requires VENICE_API_KEY", () => {
    let caught: unknown;
    try {
      VeniceVisionClient.fromEnv({});
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConfigurationError);
    expect(caught).toMatchObject({
      code: ErrorCode.CONFIG_MISSING,
      variables: ["VENICE_API_KEY"],
    });
  });

  it("treats a blank key as missing", () => {
    expect(() => VeniceVisionClient.fromEnv({ VENICE_API_KEY: "  " })).toThrow(ConfigurationError);
  });

  it("builds a client when the key is set", () => {
    const client = VeniceVisionClient.fromEnv({ VENICE_API_KEY: "test-secret" });

    expect(client.provider).toBe("venice");
    expect(client.defaultModel).toBe("qwen3-vl-235b-a22b");
  });
});

describe("VeniceVisionClient.analyzeImage", () => {
  let dir: string;
  let imagePath: string;
  let fetchMock: Mock<FetchFn>;

  function createClient(): VeniceVisionClient {
    return new VeniceVisionClient({
      apiKey: "test-secret",
      fetch: fetchMock,
      logger: createLogger({ level: "fatal", output: () => undefined }),
    });
  }

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "agent-tools-venice-"));
    imagePath = path.join(dir, "diagram.jpg");
    fs.writeFileSync(imagePath, Buffer.from([0x01, 0x02, 0x03]));
    fetchMock = vi.fn<FetchFn>();
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("sends the image to Venice and maps the completion", async () => {
    fetchMock.mockResolvedValue(jsonResponse(chatCompletion("A flow diagram")));

    const result = await createClient().analyzeImage(imagePath, "Describe this diagram", {
      maxTokens: 256,
    });

    expect(fetchMock).toHaveBeenCalledTimes(1);
    const [url, init] = fetchMock.mock.calls[0];
    expect(String(url)).toBe("https://api.venice.ai/api/v1/chat/completions");
    expect(new Headers(init?.headers).get("authorization")).toBe("Bearer test-secret");
    expect(JSON.parse(String(init?.body))).toEqual({
      model: "qwen3-vl-235b-a22b",
      messages: [
        {
          role: "user",
          content: [
            { type: "text", text: "Describe this diagram" },
            { type: "image_url", image_url: { url: "data:image/jpeg;base64,AQID" } },
          ],
        },
      ],
      max_completion_tokens: 256,
    });

    expect(result.description).toBe("A flow diagram");
    expect(result.provider).toBe("venice");
    expect(result.model).toBe("qwen3-vl-235b-a22b");
    expect(result.usage).toEqual({ promptTokens: 40, completionTokens: 8, totalTokens: 48 });
    expect(result.rawResponse).toMatchObject({ id: "chatcmpl-venice-1" });
  });

  it("omits max_completion_tokens when not given", async () => {
    fetchMock.mockResolvedValue(jsonResponse(chatCompletion("ok")));

    await createClient().analyzeImage(imagePath, "Describe", { model: "mistral-31-24b" });

    const body = JSON.parse(String(fetchMock.mock.calls[0]?.[1]?.body));
    expect(body.model).toBe("mistral-31-24b");
    expect(body).not.toHaveProperty("max_completion_tokens");
  });

  it("maps 401 to a credential ProviderError without retrying", async () => {
    fetchMock.mockResolvedValue(
      jsonResponse({ error: { message: "Invalid API key", type: "authentication_error" } }, 401)
    );

    const error = await captureError(createClient().analyzeImage(imagePath, "Describe"));

    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(error).toBeInstanceOf(ProviderError);
    expect(error).toMatchObject({
      statusCode: 401,
      code: ErrorCode.CREDENTIAL_VALIDATION_FAILED,
      category: "credential_invalid",
      context: { provider: "venice", model: "qwen3-vl-235b-a22b" },
    });
  });

  it("treats a null message content as an invalid response", async () => {
    fetchMock.mockResolvedValue(jsonResponse(chatCompletion(null)));

    const error = await captureError(createClient().analyzeImage(imagePath, "Describe"));

    expect(error).toBeInstanceOf(ProviderError);
    expect(error).toMatchObject({
      message: "Venice returned no message content",
      category: "invalid_response",
    });
  });

  it("maps an elapsed SDK timeout to ProviderTimeoutError", async () => {
    // Hang until the SDK aborts the request
    fetchMock.mockImplementation(
      (_input, init) =>
        new Promise<Response>((_resolve, reject) => {
          init?.signal?.addEventListener("abort", () => {
            const abort = new Error("This operation was aborted");
            abort.name = "AbortError";
            reject(abort);
          });
        })
    );

    const error = await captureError(
      createClient().analyzeImage(imagePath, "Describe", { timeoutMs: 20 })
    );

    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(error).toBeInstanceOf(ProviderTimeoutError);
    expect(error).toMatchObject({
      message: "Venice request timed out after 20ms",
      code: ErrorCode.TIMEOUT,
      category: "timeout",
      timeoutMs: 20,
      context: { provider: "venice", model: "qwen3-vl-235b-a22b" },
    });
  });
});
