/**
 * Text-generation client
 * Wraps the OpenAI chat completions API (or any compatible endpoint set via
 * OPENAI_BASE_URL) behind a small interface the pipeline depends on
 */

import OpenAI from "openai";
import { z } from "zod";
import { logger } from "../logger";
import { getSettings, type Settings } from "../../config/settings";
import { createSharedResource } from "../shared-resource";

export interface LlmClient {
  /** Free-form completion; rejects when the request fails */
  generateText(prompt: string): Promise<string>;
  /** JSON-mode completion; resolves to {} when the reply is not a JSON object */
  generateJson(prompt: string): Promise<Record<string, unknown>>;
}

const JsonObjectSchema = z.record(z.unknown());

export class OpenAILlmClient implements LlmClient {
  constructor(
    private readonly client: OpenAI,
    private readonly model: string
  ) {}

  async generateText(prompt: string): Promise<string> {
    const response = await this.client.chat.completions.create({
      model: this.model,
      messages: [{ role: "user", content: prompt }],
      temperature: 0.3,
    });
    return response.choices[0]?.message?.content ?? "";
  }

  async generateJson(prompt: string): Promise<Record<string, unknown>> {
    const response = await this.client.chat.completions.create({
      model: this.model,
      messages: [
        { role: "system", content: "Reply with a single JSON object." },
        { role: "user", content: prompt },
      ],
      temperature: 0.1,
      response_format: { type: "json_object" },
    });

    const content = response.choices[0]?.message?.content ?? "";
    try {
      const parsed = JsonObjectSchema.safeParse(JSON.parse(content));
      if (parsed.success) {
        return parsed.data;
      }
      logger.warn("LLM JSON reply was not an object");
    } catch (error) {
      const errorMsg = error instanceof Error ? error.message : String(error);
      logger.warn("Failed to parse LLM JSON reply", { error: errorMsg });
    }
    return {};
  }
}

export function createLlmClient(settings: Settings): LlmClient {
  if (!settings.OPENAI_API_KEY && !settings.OPENAI_BASE_URL) {
    throw new Error("OPENAI_API_KEY (or OPENAI_BASE_URL for a local server) is required");
  }

  const client = new OpenAI({
    // Local OpenAI-compatible servers accept any key
    apiKey: settings.OPENAI_API_KEY ?? "local",
    baseURL: settings.OPENAI_BASE_URL,
    timeout: settings.LLM_TIMEOUT_MS,
    maxRetries: settings.LLM_MAX_RETRIES,
  });
  logger.info(`LLM client ready: ${settings.LLM_MODEL}`);
  return new OpenAILlmClient(client, settings.LLM_MODEL);
}

const sharedClient = createSharedResource("llm client", () => createLlmClient(getSettings()));

/**
 * Process-wide LLM client, created on first use
 */
export function getLlmClient(): Promise<LlmClient> {
  return sharedClient.get();
}
