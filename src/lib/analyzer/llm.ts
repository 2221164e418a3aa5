/**
 * Analyzer - LLM Provider Selection
 *
 * Model selection and the generative-inference client used for domain
 * authority rating, author credential assessment and claim extraction.
 *
 * @module analyzer/llm
 */

import { generateText, embedMany } from "ai";
import { openai } from "@ai-sdk/openai";
import { anthropic } from "@ai-sdk/anthropic";
import type { CredibilityConfig } from "../config-schemas";
import { hit, miss, missFromError, type LookupOutcome } from "./lookup-outcome";

// ============================================================================
// MODEL SELECTION
// ============================================================================

export type LlmProvider = "openai" | "anthropic";

export interface ModelInfo {
  provider: LlmProvider;
  modelName: string;
  model: ReturnType<typeof openai> | ReturnType<typeof anthropic>;
}

export function normalizeProvider(raw: string): LlmProvider {
  const p = (raw || "").toLowerCase().trim();
  if (p === "anthropic" || p === "claude") return "anthropic";
  return "openai";
}

function buildModelInfo(provider: LlmProvider, modelName: string): ModelInfo {
  if (provider === "anthropic") {
    return { provider, modelName, model: anthropic(modelName) };
  }
  return { provider: "openai", modelName, model: openai(modelName) };
}

/**
 * Whether the provider's API key is present in the environment
 */
export function hasProviderKey(provider: LlmProvider, env: Record<string, string | undefined> = process.env): boolean {
  const key = provider === "anthropic" ? env.ANTHROPIC_API_KEY : env.OPENAI_API_KEY;
  return !!key && !key.startsWith("PASTE_");
}

export function getModel(config: CredibilityConfig["inference"]): ModelInfo {
  return buildModelInfo(normalizeProvider(config.provider), config.model);
}

// ============================================================================
// INFERENCE CLIENT
// ============================================================================

export type InferenceTask = "domain_authority" | "author_credentials" | "claim_extraction";

export interface InferenceRequest {
  task: InferenceTask;
  system: string;
  prompt: string;
  maxOutputTokens: number;
}

/**
 * Generative text service. Returns the raw reply text; callers parse it.
 */
export interface InferenceClient {
  complete(request: InferenceRequest): Promise<LookupOutcome<string>>;
}

export class AiSdkInferenceClient implements InferenceClient {
  constructor(
    private readonly modelInfo: ModelInfo | null,
    private readonly timeoutMs: number,
  ) {}

  /**
   * Build a client from config. Without an API key or with inference
   * disabled the client answers every request with a `not_configured` miss.
   */
  static fromConfig(
    config: CredibilityConfig["inference"],
    env: Record<string, string | undefined> = process.env,
  ): AiSdkInferenceClient {
    const provider = normalizeProvider(config.provider);
    if (!config.enabled || !hasProviderKey(provider, env)) {
      console.warn(`[LLM] Inference unavailable (enabled=${config.enabled}, provider=${provider}); LLM tiers will miss`);
      return new AiSdkInferenceClient(null, config.timeoutMs);
    }
    return new AiSdkInferenceClient(getModel(config), config.timeoutMs);
  }

  async complete(request: InferenceRequest): Promise<LookupOutcome<string>> {
    if (!this.modelInfo) return miss("not_configured");

    try {
      const result = await generateText({
        model: this.modelInfo.model,
        system: request.system,
        prompt: request.prompt,
        temperature: 0,
        maxOutputTokens: request.maxOutputTokens,
        abortSignal: AbortSignal.timeout(this.timeoutMs),
      });
      const text = result.text.trim();
      return text ? hit(text) : miss("no_data", `empty ${request.task} reply`);
    } catch (error) {
      console.warn(`[LLM] ${request.task} call failed (${this.modelInfo.modelName}):`, error instanceof Error ? error.message : String(error));
      return missFromError(error, "llm");
    }
  }
}

// ============================================================================
// EMBEDDINGS
// ============================================================================

/**
 * Text embedding provider. Returns one vector per input text, in order.
 */
export interface TextEmbedder {
  embed(texts: readonly string[]): Promise<number[][]>;
}

export class AiSdkTextEmbedder implements TextEmbedder {
  private readonly model: ReturnType<typeof openai.embedding>;

  constructor(modelName: string, private readonly timeoutMs = 30_000) {
    this.model = openai.embedding(modelName);
  }

  async embed(texts: readonly string[]): Promise<number[][]> {
    if (texts.length === 0) return [];
    const { embeddings } = await embedMany({
      model: this.model,
      values: [...texts],
      abortSignal: AbortSignal.timeout(this.timeoutMs),
    });
    return embeddings;
  }
}
