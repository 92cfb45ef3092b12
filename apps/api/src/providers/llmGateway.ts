import { z } from "zod";
import type { LlmConfig } from "../config";
import { UpstreamError } from "../errors";

export type GenerationRequest = {
  system: string;
  prompt: string;
  maxTokens: number;
  model?: string;
  temperature?: number;
  signal?: AbortSignal;
};

/** Anything that can turn a prompt into model text. */
export interface TextGenerator {
  generate(request: GenerationRequest): Promise<string>;
}

const AnthropicMessageSchema = z.object({
  content: z.array(
    z.object({
      type: z.string(),
      text: z.string().optional(),
    })
  ),
  stop_reason: z.string().nullable().optional(),
});

export type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

function classifyStatus(status: number) {
  if (status === 401 || status === 403) {
    return "auth" as const;
  }
  if (status === 429) {
    return "rate_limited" as const;
  }
  if ([500, 502, 503, 529].includes(status)) {
    return "unavailable" as const;
  }
  return "bad_status" as const;
}

function extractText(body: unknown) {
  const parsed = AnthropicMessageSchema.safeParse(body);
  if (!parsed.success) {
    throw new UpstreamError("malformed_response", "Anthropic response did not match the Messages shape.");
  }

  // Empty text is returned as-is; interpreting it is the normalizer's job.
  return parsed.data.content
    .filter((block) => block.type === "text" && typeof block.text === "string")
    .map((block) => block.text)
    .join("\n")
    .trim();
}

/**
 * Messages API client. Does not retry and does not inspect the content it returns.
 */
export class AnthropicGateway implements TextGenerator {
  private readonly config: LlmConfig;
  private readonly fetchImpl: FetchLike;

  constructor(config: LlmConfig, fetchImpl: FetchLike = fetch) {
    this.config = config;
    this.fetchImpl = fetchImpl;
  }

  async generate(request: GenerationRequest): Promise<string> {
    const timeout = AbortSignal.timeout(this.config.timeoutMs);
    const signal = request.signal ? AbortSignal.any([timeout, request.signal]) : timeout;

    let response: Response;
    try {
      response = await this.fetchImpl(`${this.config.baseUrl}/messages`, {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
          "x-api-key": this.config.apiKey,
          "anthropic-version": this.config.apiVersion,
        },
        body: JSON.stringify({
          model: request.model ?? this.config.model,
          max_tokens: request.maxTokens,
          temperature: request.temperature ?? this.config.temperature,
          system: request.system,
          messages: [{ role: "user", content: request.prompt }],
        }),
        signal,
      });
    } catch (error) {
      if (timeout.aborted) {
        throw new UpstreamError("timeout", `Anthropic request timed out after ${this.config.timeoutMs}ms.`);
      }
      if (request.signal?.aborted) {
        throw new UpstreamError("cancelled", "Anthropic request was cancelled by the caller.");
      }
      const message = error instanceof Error ? error.message : String(error);
      throw new UpstreamError("network", `Anthropic request failed: ${message}`);
    }

    if (!response.ok) {
      const body = await response.text().catch(() => "");
      throw new UpstreamError(
        classifyStatus(response.status),
        `Anthropic request failed with ${response.status}: ${body || response.statusText}`,
        response.status
      );
    }

    let json: unknown;
    try {
      json = await response.json();
    } catch {
      throw new UpstreamError("malformed_response", "Anthropic response body was not valid JSON.", response.status);
    }

    return extractText(json);
  }
}
