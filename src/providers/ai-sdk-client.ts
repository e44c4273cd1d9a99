/**
 * Hosted providers (Anthropic, OpenAI, Google) via the Vercel AI SDK
 */

import { generateText, type LanguageModel } from "ai";
import { createAnthropic } from "@ai-sdk/anthropic";
import { createOpenAI } from "@ai-sdk/openai";
import { createGoogleGenerativeAI } from "@ai-sdk/google";
import type { IProviderConfig } from "../types/config.js";
import type { IGenerateParams, IGenerateResult, ProviderKind } from "../types/provider.js";
import { ProviderCallError } from "../types/errors.js";
import { calculateCost, estimateTokenCount, logger } from "../utils/index.js";
import type { IModelPricing } from "../utils/index.js";
import type { IProviderClient, IProviderOptions } from "./types.js";

export type HostedProviderKind = Exclude<ProviderKind, "ollama">;

const DEFAULT_MAX_TOKENS = 4_096;

const DEFAULT_API_KEY_ENV: Readonly<Record<HostedProviderKind, string>> = {
  anthropic: "ANTHROPIC_API_KEY",
  openai: "OPENAI_API_KEY",
  google: "GOOGLE_GENERATIVE_AI_API_KEY",
};

function createModel(kind: HostedProviderKind, model: string, options: IProviderOptions): LanguageModel {
  const settings = {
    ...(options.apiKey !== undefined ? { apiKey: options.apiKey } : {}),
    ...(options.baseUrl !== undefined ? { baseURL: options.baseUrl } : {}),
  };

  switch (kind) {
    case "anthropic":
      return createAnthropic(settings)(model);
    case "openai":
      return createOpenAI(settings)(model);
    case "google":
      return createGoogleGenerativeAI(settings)(model);
  }
}

function usageOrEstimate(reported: number | undefined, text: string): number {
  return reported !== undefined && Number.isFinite(reported) ? reported : estimateTokenCount(text);
}

export class AiSdkClient implements IProviderClient {
  readonly id: string;
  readonly kind: HostedProviderKind;
  readonly model: string;

  private readonly languageModel: LanguageModel;
  private readonly pricing: IModelPricing;
  private readonly maxTokens: number;

  constructor(id: string, kind: HostedProviderKind, config: IProviderConfig) {
    this.id = id;
    this.kind = kind;
    this.model = config.model;
    this.pricing = {
      inputPricePerMToken: config.inputPricePerMToken,
      outputPricePerMToken: config.outputPricePerMToken,
    };
    this.maxTokens = config.maxTokens ?? DEFAULT_MAX_TOKENS;

    const apiKey = process.env[config.apiKeyEnv ?? DEFAULT_API_KEY_ENV[kind]];
    this.languageModel = createModel(kind, config.model, { apiKey, baseUrl: config.baseUrl });
  }

  async generate(prompt: string, params?: IGenerateParams): Promise<IGenerateResult> {
    try {
      const result = await generateText({
        model: this.languageModel,
        prompt,
        ...(params?.system !== undefined ? { system: params.system } : {}),
        maxTokens: params?.maxTokens ?? this.maxTokens,
        ...(params?.temperature !== undefined ? { temperature: params.temperature } : {}),
        ...(params?.signal !== undefined ? { abortSignal: params.signal } : {}),
        maxRetries: 0,
      });

      const inputTokens = usageOrEstimate(result.usage.promptTokens, prompt);
      const outputTokens = usageOrEstimate(result.usage.completionTokens, result.text);

      return {
        text: result.text,
        model: this.model,
        costUsd: calculateCost(this.pricing, inputTokens, outputTokens),
        inputTokens,
        outputTokens,
      };
    } catch (error: unknown) {
      if (error instanceof Error && error.name === "AbortError") {
        throw error;
      }
      const reason = error instanceof Error ? error.message : String(error);
      logger.debug({ provider: this.id, model: this.model, error: reason }, "Provider call failed");
      throw new ProviderCallError(this.id, reason);
    }
  }

  estimateCost(prompt: string, maxOutputTokens?: number): number {
    const inputTokens = estimateTokenCount(prompt);
    return calculateCost(this.pricing, inputTokens, maxOutputTokens ?? inputTokens);
  }
}
