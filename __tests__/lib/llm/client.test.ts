/**
 * Tests for the LLM client
 */

import { describe, it, expect, vi, beforeEach } from "vitest";

const { createCompletion, openAIConstructor } = vi.hoisted(() => ({
  createCompletion: vi.fn(),
  openAIConstructor: vi.fn(),
}));

vi.mock("openai", () => ({
  default: class {
    chat = { completions: { create: createCompletion } };
    constructor(options?: unknown) {
      openAIConstructor(options);
    }
  },
}));

import OpenAI from "openai";
import { OpenAILlmClient, createLlmClient } from "../../../src/lib/llm/client";
import { loadSettings } from "../../../src/config/settings";

function reply(content: string | null) {
  return { choices: [{ message: { content } }] };
}

describe("OpenAILlmClient", () => {
  beforeEach(() => {
    createCompletion.mockReset();
  });

  it("returns the completion text", async () => {
    createCompletion.mockResolvedValue(reply("Hello"));
    const client = new OpenAILlmClient(new OpenAI(), "test-model");

    expect(await client.generateText("Say hi")).toBe("Hello");
    expect(createCompletion).toHaveBeenCalledWith({
      model: "test-model",
      messages: [{ role: "user", content: "Say hi" }],
      temperature: 0.3,
    });
  });

  it("returns an empty string for an empty completion", async () => {
    createCompletion.mockResolvedValue(reply(null));
    const client = new OpenAILlmClient(new OpenAI(), "test-model");
    expect(await client.generateText("x")).toBe("");
  });

  it("propagates request failures", async () => {
    createCompletion.mockRejectedValue(new Error("429"));
    const client = new OpenAILlmClient(new OpenAI(), "test-model");
    await expect(client.generateText("x")).rejects.toThrow("429");
  });

  it("parses JSON replies and falls back to an empty object", async () => {
    const client = new OpenAILlmClient(new OpenAI(), "test-model");

    createCompletion.mockResolvedValueOnce(reply('{"score": 7}'));
    expect(await client.generateJson("x")).toEqual({ score: 7 });

    createCompletion.mockResolvedValueOnce(reply("[1, 2]"));
    expect(await client.generateJson("x")).toEqual({});

    createCompletion.mockResolvedValueOnce(reply("not json"));
    expect(await client.generateJson("x")).toEqual({});

    expect(createCompletion.mock.calls[0][0]).toMatchObject({
      temperature: 0.1,
      response_format: { type: "json_object" },
    });
  });
});

describe("createLlmClient", () => {
  beforeEach(() => {
    openAIConstructor.mockReset();
  });

  it("requires an API key or a base URL", () => {
    expect(() => createLlmClient(loadSettings({}))).toThrow(
      "OPENAI_API_KEY (or OPENAI_BASE_URL for a local server) is required"
    );
  });

  it("passes timeout and retry settings to the SDK", () => {
    createLlmClient(loadSettings({ OPENAI_API_KEY: "test-secret", LLM_TIMEOUT_MS: "5000", LLM_MAX_RETRIES: "1" }));

    expect(openAIConstructor).toHaveBeenCalledWith({
      apiKey: "test-secret",
      baseURL: undefined,
      timeout: 5000,
      maxRetries: 1,
    });
  });

  it("uses a placeholder key for a local server", () => {
    createLlmClient(loadSettings({ OPENAI_BASE_URL: "http://localhost:11434/v1" }));

    expect(openAIConstructor).toHaveBeenCalledWith(
      expect.objectContaining({ apiKey: "local", baseURL: "http://localhost:11434/v1" })
    );
  });
});
