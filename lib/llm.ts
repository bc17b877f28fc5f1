/**
 * Completion client
 *
 * The engine treats the model as a black-box text completion service. Any
 * OpenAI-compatible endpoint works (OpenAI, Groq, Deepinfra, a local Ollama
 * with its /v1 shim), selected through base URL + model name.
 */

import OpenAI from "openai";
import { UnavailableError } from "./errors";

export interface CompletionClient {
  /** Fails with `UnavailableError` when the backing service can't be reached. */
  complete(prompt: string, model: string, opts?: CompletionOptions): Promise<string>;
}

export type CompletionOptions = {
  /** Ask the provider for a JSON object response. */
  json?: boolean;
  temperature?: number;
  maxTokens?: number;
};

export interface ModelConfig {
  apiKey: string;
  baseURL: string;
  model: string;
}

function isUnreachable(err: unknown): boolean {
  if (err instanceof OpenAI.APIConnectionError) return true;
  if (err instanceof OpenAI.APIError) {
    const status = typeof err.status === "number" ? err.status : 0;
    return status === 429 || status >= 500;
  }
  return false;
}

export class OpenAICompletionClient implements CompletionClient {
  private readonly client: OpenAI;

  constructor(config: Pick<ModelConfig, "apiKey" | "baseURL"> | { client: OpenAI }) {
    this.client =
      "client" in config
        ? config.client
        : new OpenAI({
            apiKey: config.apiKey,
            baseURL: config.baseURL,
            // retries are owned by the generator's bounded loop
            maxRetries: 0,
          });
  }

  async complete(prompt: string, model: string, opts: CompletionOptions = {}): Promise<string> {
    try {
      const completion = await this.client.chat.completions.create({
        model,
        temperature: opts.temperature ?? 0.4,
        ...(typeof opts.maxTokens === "number" ? { max_tokens: opts.maxTokens } : {}),
        ...(opts.json ? { response_format: { type: "json_object" as const } } : {}),
        messages: [{ role: "user", content: prompt }],
      });
      return completion.choices?.[0]?.message?.content ?? "";
    } catch (err: unknown) {
      console.error("[llm] completion error", {
        model,
        json: opts.json === true,
        message: err instanceof Error ? err.message : String(err),
      });
      if (isUnreachable(err)) {
        throw new UnavailableError("completion service unavailable", { cause: err });
      }
      throw err;
    }
  }
}

export function createCompletionClient(config: ModelConfig) {
  return {
    client: new OpenAICompletionClient({ apiKey: config.apiKey, baseURL: config.baseURL }),
    model: config.model,
  };
}
