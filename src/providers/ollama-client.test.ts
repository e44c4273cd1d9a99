import { describe, it, expect } from "vitest";
import { OllamaClient } from "./ollama-client.js";
import { ProviderCallError } from "../types/errors.js";
import type { IProviderConfig } from "../types/config.js";

const CONFIG: IProviderConfig = {
  kind: "ollama",
  model: "codellama:7b",
  enabled: true,
  baseUrl: "http://ollama.test:11434/",
  inputPricePerMToken: 0,
  outputPricePerMToken: 0,
};

interface ICapturedRequest {
  readonly url: string;
  readonly body: unknown;
}

function fakeFetch(status: number, payload: unknown, captured: ICapturedRequest[]): typeof fetch {
  return (input, init) => {
    const url = typeof input === "string" ? input : input instanceof URL ? input.href : input.url;
    const body: unknown = typeof init?.body === "string" ? JSON.parse(init.body) : undefined;
    captured.push({ url, body });
    return Promise.resolve(new Response(JSON.stringify(payload), { status }));
  };
}

describe("OllamaClient", () => {
  it("posts an OpenAI-style chat completion and reads usage", async () => {
    const captured: ICapturedRequest[] = [];
    const client = new OllamaClient(
      "codellama",
      CONFIG,
      fakeFetch(200, {
        choices: [{ message: { content: "def add(a, b): return a + b" } }],
        usage: { prompt_tokens: 12, completion_tokens: 9 },
      }, captured),
    );

    const result = await client.generate("write add", { system: "be brief", maxTokens: 64 });

    expect(result).toEqual({
      text: "def add(a, b): return a + b",
      model: "codellama:7b",
      costUsd: 0,
      inputTokens: 12,
      outputTokens: 9,
    });
    expect(captured).toEqual([
      {
        url: "http://ollama.test:11434/v1/chat/completions",
        body: {
          model: "codellama:7b",
          messages: [
            { role: "system", content: "be brief" },
            { role: "user", content: "write add" },
          ],
          stream: false,
          max_tokens: 64,
        },
      },
    ]);
  });

  it("estimates usage when the server omits it", async () => {
    const client = new OllamaClient(
      "codellama",
      { ...CONFIG, inputPricePerMToken: 1_000_000, outputPricePerMToken: 1_000_000 },
      fakeFetch(200, { choices: [{ message: { content: "12345678" } }] }, []),
    );

    const result = await client.generate("abcd");
    expect(result).toMatchObject({ inputTokens: 1, outputTokens: 2, costUsd: 3 });
  });

  it("rejects HTTP errors and malformed bodies as provider call errors", async () => {
    const failing = new OllamaClient("codellama", CONFIG, fakeFetch(500, { error: "model not loaded" }, []));
    await expect(failing.generate("x")).rejects.toThrow(ProviderCallError);

    const empty = new OllamaClient("codellama", CONFIG, fakeFetch(200, { choices: [] }, []));
    await expect(empty.generate("x")).rejects.toThrow("Malformed Ollama response");
  });

  it("lists installed models and returns an empty list on failure", async () => {
    const listing = new OllamaClient(
      "codellama",
      CONFIG,
      fakeFetch(200, { models: [{ name: "codellama:7b" }, { name: "llama3:8b" }] }, []),
    );
    expect(await listing.listModels()).toEqual(["codellama:7b", "llama3:8b"]);

    const down = new OllamaClient("codellama", CONFIG, fakeFetch(503, {}, []));
    expect(await down.listModels()).toEqual([]);
  });
});
