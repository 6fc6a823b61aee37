/**
 * CompletionClient - Chat completion transport
 *
 * Sends one system + user message pair to a chat model and returns the
 * reply text. Supports Azure OpenAI deployments, OpenAI-compatible
 * endpoints and a local Ollama server.
 *
 * Temperature is pinned to 0 for every provider so identical prompts
 * yield near-identical completions.
 *
 * @module CompletionClient
 */

import { z } from "zod";
import { getCompletionTimeout } from "../config/timeouts.js";

// ============================================================================
// Types
// ============================================================================

/**
 * Supported provider APIs
 */
export type LLMProvider = "azure-openai" | "openai" | "ollama";

/**
 * CompletionClient configuration
 */
export interface CompletionClientConfig {
  /** Provider API flavour */
  provider: LLMProvider;
  /** Endpoint base URL (Azure resource endpoint, OpenAI base URL or Ollama URL) */
  baseUrl: string;
  /** Model name, or deployment name for Azure */
  model: string;
  /** API key (required for azure-openai/openai) */
  apiKey?: string;
  /** API version (required for azure-openai) */
  apiVersion?: string;
  /** Request timeout in ms */
  timeout?: number;
}

/**
 * Prompt sent as a system + user message pair
 */
export interface CompletionPrompt {
  system: string;
  user: string;
}

/**
 * Text-in/text-out language model
 */
export interface CompletionModel {
  complete(prompt: CompletionPrompt): Promise<string>;
}

/**
 * Sampling temperature used for every request
 */
export const COMPLETION_TEMPERATURE = 0;

// ============================================================================
// Response schemas
// ============================================================================

const chatCompletionResponseSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string().nullable().optional(),
        }),
      }),
    )
    .min(1),
});

const ollamaChatResponseSchema = z.object({
  message: z.object({
    content: z.string(),
  }),
});

interface PreparedRequest {
  url: string;
  headers: Record<string, string>;
  body: Record<string, unknown>;
}

// ============================================================================
// CompletionClient Class
// ============================================================================

export class CompletionClient implements CompletionModel {
  private readonly provider: LLMProvider;
  private readonly baseUrl: string;
  private readonly model: string;
  private readonly apiKey: string | undefined;
  private readonly apiVersion: string | undefined;
  private readonly timeout: number;

  constructor(config: CompletionClientConfig) {
    if (config.provider !== "ollama" && !config.apiKey) {
      throw new Error(`API key is required for the ${config.provider} provider`);
    }
    if (config.provider === "azure-openai" && !config.apiVersion) {
      throw new Error("API version is required for the azure-openai provider");
    }

    this.provider = config.provider;
    this.baseUrl = config.baseUrl.replace(/\/$/, "");
    this.model = config.model;
    this.apiKey = config.apiKey;
    this.apiVersion = config.apiVersion;
    this.timeout = config.timeout ?? getCompletionTimeout();
  }

  /**
   * Run one chat completion and return the reply text
   */
  async complete(prompt: CompletionPrompt): Promise<string> {
    const request = this.prepareRequest(prompt);

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeout);

    try {
      const response = await fetch(request.url, {
        method: "POST",
        headers: request.headers,
        body: JSON.stringify(request.body),
        signal: controller.signal,
      });

      if (!response.ok) {
        const errorText = await response.text();
        throw new Error(`${this.provider} request failed: ${response.status} ${errorText}`);
      }

      const data: unknown = await response.json();
      return this.extractContent(data);
    } catch (error) {
      if (error instanceof Error && error.name === "AbortError") {
        throw new Error(`Completion timed out after ${this.timeout}ms`);
      }
      throw error;
    } finally {
      clearTimeout(timeoutId);
    }
  }

  /**
   * Describe the configured model (for startup logs)
   */
  describe(): string {
    return `${this.provider}:${this.model} @ ${this.baseUrl}`;
  }

  // ==========================================================================
  // Private Methods
  // ==========================================================================

  private prepareRequest(prompt: CompletionPrompt): PreparedRequest {
    const messages = [
      { role: "system", content: prompt.system },
      { role: "user", content: prompt.user },
    ];

    switch (this.provider) {
      case "azure-openai":
        return {
          url:
            `${this.baseUrl}/openai/deployments/${encodeURIComponent(this.model)}` +
            `/chat/completions?api-version=${encodeURIComponent(this.apiVersion ?? "")}`,
          headers: {
            "Content-Type": "application/json",
            "api-key": this.apiKey ?? "",
          },
          body: { messages, temperature: COMPLETION_TEMPERATURE },
        };
      case "openai":
        return {
          url: `${this.baseUrl}/chat/completions`,
          headers: {
            "Content-Type": "application/json",
            Authorization: `Bearer ${this.apiKey ?? ""}`,
          },
          body: { model: this.model, messages, temperature: COMPLETION_TEMPERATURE },
        };
      case "ollama":
        return {
          url: `${this.baseUrl}/api/chat`,
          headers: { "Content-Type": "application/json" },
          body: {
            model: this.model,
            messages,
            stream: false,
            options: { temperature: COMPLETION_TEMPERATURE, seed: 42 },
          },
        };
    }
  }

  private extractContent(data: unknown): string {
    if (this.provider === "ollama") {
      const parsed = ollamaChatResponseSchema.safeParse(data);
      if (!parsed.success) {
        throw new Error("Invalid response from ollama: missing message content");
      }
      return parsed.data.message.content.trim();
    }

    const parsed = chatCompletionResponseSchema.safeParse(data);
    const content = parsed.success ? parsed.data.choices[0]?.message.content : undefined;
    if (typeof content !== "string") {
      throw new Error(`Invalid response from ${this.provider}: missing message content`);
    }
    return content.trim();
  }
}
