/**
 * Provider client interface.
 * Every backend (hosted SDK or local HTTP) is wrapped behind IProviderClient.
 */

import type { IGenerateParams, IGenerateResult, ProviderKind } from "../types/provider.js";

export interface IProviderClient {
  /** Id used in tier chains and agent model preferences. */
  readonly id: string;
  readonly kind: ProviderKind;
  readonly model: string;

  /** Generate a completion. Rejections count as provider failures. */
  generate(prompt: string, params?: IGenerateParams): Promise<IGenerateResult>;

  /** Rough USD cost of a call with this prompt, before it is made. */
  estimateCost(prompt: string, maxOutputTokens?: number): number;
}

/**
 * Options for constructing a provider client.
 */
export interface IProviderOptions {
  readonly apiKey?: string | undefined;
  readonly baseUrl?: string | undefined;
}
