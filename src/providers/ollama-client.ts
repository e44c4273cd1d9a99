/**
 * Ollama client over its OpenAI-compatible HTTP API (default localhost:11434)
 */

import { z } from "zod";
import type { IProviderConfig } from "../types/config.js";
import type { IGenerateParams, IGenerateResult } from "../types/provider.js";
import { ProviderCallError } from "../types/errors.js";
import { calculateCost, estimateTokenCount, logger } from "../utils/index.js";
import type { IModelPricing } from "../utils/index.js";
import type { IProviderClient } from "./types.js";

const DEFAULT_BASE_URL = "http://localhost:11434";

const ChatCompletionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string().nullable() }),
      }),
    )
    .min(1, "empty choices"),
  usage: z
    .object({
      prompt_tokens: z.number(),
      completion_tokens: z.number(),
    })
    .optional(),
});

const TagsSchema = z.object({
  models: z.array(z.object({ name: z.string() })),
});

export class OllamaClient implements IProviderClient {
  readonly id: string;
  readonly kind = "ollama" as const;
  readonly model: string;

  private readonly baseUrl: string;
  private readonly pricing: IModelPricing;
  private readonly fetchImpl: typeof fetch;

  constructor(id: string, config: IProviderConfig, fetchImpl: typeof fetch = fetch) {
    this.id = id;
    this.model = config.model;
    this.baseUrl = (config.baseUrl ?? DEFAULT_BASE_URL).replace(/\/+$/, "");
    this.pricing = {
      inputPricePerMToken: config.inputPricePerMToken,
      outputPricePerMToken: config.outputPricePerMToken,
    };
    this.fetchImpl = fetchImpl;
  }

  async generate(prompt: string, params?: IGenerateParams): Promise<IGenerateResult> {
    const messages: Array<{ role: string; content: string }> = [];
    if (params?.system !== undefined) {
      messages.push({ role: "system", content: params.system });
    }
    messages.push({ role: "user", content: prompt });

    const body: Record<string, unknown> = {
      model: this.model,
      messages,
      stream: false,
    };
    if (params?.maxTokens !== undefined) {
      body["max_tokens"] = params.maxTokens;
    }
    if (params?.temperature !== undefined) {
      body["temperature"] = params.temperature;
    }

    const response = await this.fetchImpl(`${this.baseUrl}/v1/chat/completions`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify(body),
      ...(params?.signal !== undefined ? { signal: params.signal } : {}),
    });

    if (!response.ok) {
      const text = await response.text();
      throw new ProviderCallError(this.id, `Ollama API error (${response.status}): ${text}`);
    }

    const parsed = ChatCompletionSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new ProviderCallError(this.id, `Malformed Ollama response: ${parsed.error.message}`);
    }

    const [choice] = parsed.data.choices;
    const text = choice?.message.content ?? "";
    const inputTokens = parsed.data.usage?.prompt_tokens ?? estimateTokenCount(prompt);
    const outputTokens = parsed.data.usage?.completion_tokens ?? estimateTokenCount(text);

    return {
      text,
      model: this.model,
      costUsd: calculateCost(this.pricing, inputTokens, outputTokens),
      inputTokens,
      outputTokens,
    };
  }

  estimateCost(prompt: string, maxOutputTokens?: number): number {
    const inputTokens = estimateTokenCount(prompt);
    return calculateCost(this.pricing, inputTokens, maxOutputTokens ?? inputTokens);
  }

  /**
   * List models installed on the Ollama server. Empty when unreachable.
   */
  async listModels(): Promise<readonly string[]> {
    try {
      const response = await this.fetchImpl(`${this.baseUrl}/api/tags`);
      if (!response.ok) {
        logger.warn({ status: response.status }, "Failed to list Ollama models");
        return [];
      }
      const parsed = TagsSchema.safeParse(await response.json());
      return parsed.success ? parsed.data.models.map((m) => m.name) : [];
    } catch (error: unknown) {
      const errMsg = error instanceof Error ? error.message : String(error);
      logger.warn({ error: errMsg }, "Ollama not reachable");
      return [];
    }
  }
}
