import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import type { GenerationEvent, GenerationRequest } from "../../src/ai/providers/types";

const { openaiCreate, openaiList, ollamaChat, ollamaList } = vi.hoisted(() => ({
  openaiCreate: vi.fn(),
  openaiList: vi.fn(),
  ollamaChat: vi.fn(),
  ollamaList: vi.fn(),
}));

vi.mock("openai", () => ({
  default: class {
    chat = { completions: { create: openaiCreate } };
    models = { list: openaiList };
  },
}));

vi.mock("ollama", () => ({
  Ollama: class {
    chat = ollamaChat;
    list = ollamaList;
  },
}));

import { OpenAICompatProvider } from "../../src/ai/providers/openai-compat";
import { OllamaProvider } from "../../src/ai/providers/ollama";

const REQUEST: GenerationRequest = {
  model: "huggingface/org/model",
  system: "sys",
  prompt: "go",
  temperature: 0.7,
  maxTokens: 9000,
};

async function collect(stream: AsyncIterable<GenerationEvent>): Promise<GenerationEvent[]> {
  const events: GenerationEvent[] = [];
  for await (const event of stream) {
    events.push(event);
  }
  return events;
}

async function* iterate<T>(items: T[]): AsyncGenerator<T> {
  for (const item of items) {
    yield item;
  }
}

describe("OpenAICompatProvider", () => {
  beforeEach(() => {
    openaiCreate.mockReset();
    openaiList.mockReset();
  });

  const huggingface = (): OpenAICompatProvider => new OpenAICompatProvider({
    id: "huggingface",
    label: "Hugging Face",
    baseUrl: "https://router.example.test/v1/",
    apiKey: "test-secret",
    models: ["org/model"],
  });

  const localServer = (): OpenAICompatProvider => new OpenAICompatProvider({
    id: "custom",
    label: "LM Studio",
    baseUrl: "http://localhost:1234/v1",
    apiKey: "",
  });

  it("offers the configured models under the provider prefix", async () => {
    await expect(huggingface().listModels()).resolves.toEqual([
      { id: "huggingface/org/model", provider: "Hugging Face", isLocal: false },
    ]);
    expect(openaiList).not.toHaveBeenCalled();
  });

  it("asks the endpoint for models when none are configured", async () => {
    openaiList.mockReturnValue(iterate([{ id: "coder-7b" }, { id: "coder-14b" }]));

    await expect(localServer().listModels()).resolves.toEqual([
      { id: "custom/coder-7b", provider: "LM Studio", isLocal: true },
      { id: "custom/coder-14b", provider: "LM Studio", isLocal: true },
    ]);
  });

  it("sends one system and one user turn with the token cap", async () => {
    openaiCreate.mockResolvedValue(iterate([
      { choices: [{ delta: { content: "fn " } }] },
      { choices: [{ delta: { content: "main" } }] },
      { choices: [], usage: { prompt_tokens: 4, completion_tokens: 2 } },
    ]));

    const events = await collect(huggingface().generate(REQUEST));

    expect(openaiCreate).toHaveBeenCalledWith(
      {
        model: "org/model",
        messages: [{ role: "system", content: "sys" }, { role: "user", content: "go" }],
        temperature: 0.7,
        max_tokens: 9000,
        stream: true,
        stream_options: { include_usage: true },
      },
      { signal: undefined },
    );
    expect(events).toEqual([
      { type: "text", text: "fn " },
      { type: "text", text: "main" },
      { type: "done", usage: { promptTokens: 4, completionTokens: 2 } },
    ]);
  });

  it("reports a rejected request as an error event", async () => {
    openaiCreate.mockRejectedValue(new Error("429 Too Many Requests"));

    await expect(collect(huggingface().generate(REQUEST))).resolves.toEqual([
      { type: "error", message: "429 Too Many Requests" },
    ]);
  });

  it("ends with an error event when the stream breaks", async () => {
    openaiCreate.mockResolvedValue((async function* () {
      yield { choices: [{ delta: { content: "int" } }] };
      throw new Error("socket hang up");
    })());

    await expect(collect(huggingface().generate(REQUEST))).resolves.toEqual([
      { type: "text", text: "int" },
      { type: "error", message: "socket hang up" },
    ]);
  });

  it("counts a keyed provider with configured models as reachable", async () => {
    await expect(huggingface().ping()).resolves.toBe(true);
    expect(openaiList).not.toHaveBeenCalled();
  });

  it("pings an unlisted endpoint through its model listing", async () => {
    openaiList.mockResolvedValueOnce({ data: [] });
    await expect(localServer().ping()).resolves.toBe(true);
    expect(openaiList).toHaveBeenCalledWith({ timeout: 10_000, maxRetries: 0 });

    openaiList.mockRejectedValueOnce(new Error("ECONNREFUSED"));
    await expect(localServer().ping()).resolves.toBe(false);
  });
});

describe("OllamaProvider", () => {
  beforeEach(() => {
    ollamaChat.mockReset();
    ollamaList.mockReset();
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("lists installed models with their size hint", async () => {
    ollamaList.mockResolvedValue({
      models: [
        { name: "qwen2.5-coder", details: { parameter_size: "7B", quantization_level: "Q4_K_M" } },
        { name: "tiny", details: { parameter_size: "", quantization_level: "" } },
      ],
    });

    await expect(new OllamaProvider().listModels()).resolves.toEqual([
      { id: "qwen2.5-coder", provider: "Ollama", isLocal: true, description: "7B Q4_K_M" },
      { id: "tiny", provider: "Ollama", isLocal: true },
    ]);
  });

  it("returns no models when the server cannot list them", async () => {
    ollamaList.mockRejectedValue(new Error("fetch failed"));

    await expect(new OllamaProvider().listModels()).resolves.toEqual([]);
  });

  it("streams text and passes the token cap as num_predict", async () => {
    ollamaChat.mockResolvedValue(Object.assign(iterate([
      { message: { content: "print" }, done: false },
      { message: { content: "()" }, done: true, prompt_eval_count: 3, eval_count: 5 },
    ]), { abort: vi.fn() }));

    const events = await collect(new OllamaProvider().generate({ ...REQUEST, model: "qwen2.5-coder" }));

    expect(ollamaChat).toHaveBeenCalledWith({
      model: "qwen2.5-coder",
      messages: [{ role: "system", content: "sys" }, { role: "user", content: "go" }],
      stream: true,
      options: { temperature: 0.7, num_predict: 9000 },
    });
    expect(events).toEqual([
      { type: "text", text: "print" },
      { type: "text", text: "()" },
      { type: "done", usage: { promptTokens: 3, completionTokens: 5 } },
    ]);
  });

  it("aborts the server stream when the request is cancelled", async () => {
    const controller = new AbortController();
    const abort = vi.fn();
    ollamaChat.mockResolvedValue(Object.assign((async function* () {
      yield { message: { content: "a" }, done: false };
      controller.abort();
      yield { message: { content: "b" }, done: true, prompt_eval_count: 0, eval_count: 0 };
    })(), { abort }));

    await collect(new OllamaProvider().generate({ ...REQUEST, signal: controller.signal }));

    expect(abort).toHaveBeenCalledTimes(1);
  });

  it("pings the tags endpoint of the configured host", async () => {
    const fetchMock = vi.fn().mockResolvedValue({ ok: true });
    vi.stubGlobal("fetch", fetchMock);

    await expect(new OllamaProvider("http://gpu-box:11434/").ping()).resolves.toBe(true);
    expect(fetchMock.mock.calls[0][0]).toBe("http://gpu-box:11434/api/tags");

    fetchMock.mockRejectedValueOnce(new Error("ECONNREFUSED"));
    await expect(new OllamaProvider().ping()).resolves.toBe(false);
  });
});
