import { Ollama } from "ollama";
import {
  describeFailure,
  type GenerationEvent,
  type GenerationRequest,
  type LLMProvider,
  type ModelInfo,
} from "./types";
import type { Logger } from "../../utils/logger";

export const DEFAULT_OLLAMA_HOST = "http://localhost:11434";
const PING_TIMEOUT_MS = 15_000;

/**
 * Local generation through an Ollama server. Model ids are the installed
 * model tags, unprefixed.
 */
export class OllamaProvider implements LLMProvider {
  readonly id = "ollama";
  readonly label = "Ollama";
  readonly isLocal = true;

  private readonly _client: Ollama;
  private readonly _host: string;

  constructor(host?: string, private readonly _logger?: Logger) {
    this._host = (host ?? DEFAULT_OLLAMA_HOST).replace(/\/+$/, "");
    this._client = new Ollama({ host: this._host });
  }

  async listModels(): Promise<ModelInfo[]> {
    try {
      const { models } = await this._client.list();
      return models.map((m) => {
        const hint = [m.details?.parameter_size, m.details?.quantization_level].filter(Boolean).join(" ");
        return { id: m.name, provider: this.label, isLocal: true, ...(hint ? { description: hint } : {}) };
      });
    } catch (err: unknown) {
      this._logger?.warn(`[Ollama] Could not list models: ${describeFailure(err)}`);
      return [];
    }
  }

  async *generate(request: GenerationRequest): AsyncIterable<GenerationEvent> {
    const usage = { promptTokens: 0, completionTokens: 0 };
    let stopListening = (): void => {};
    try {
      const stream = await this._client.chat({
        model: request.model,
        messages: [
          { role: "system", content: request.system },
          { role: "user", content: request.prompt },
        ],
        stream: true,
        options: { temperature: request.temperature, num_predict: request.maxTokens },
      });

      const signal = request.signal;
      if (signal) {
        const onAbort = (): void => stream.abort();
        signal.addEventListener("abort", onAbort, { once: true });
        stopListening = () => signal.removeEventListener("abort", onAbort);
      }

      for await (const part of stream) {
        if (part.message.content) {
          yield { type: "text", text: part.message.content };
        }
        if (part.done) {
          usage.promptTokens = part.prompt_eval_count;
          usage.completionTokens = part.eval_count;
        }
      }
    } catch (err: unknown) {
      yield { type: "error", message: describeFailure(err) };
      return;
    } finally {
      stopListening();
    }
    yield { type: "done", usage };
  }

  async ping(): Promise<boolean> {
    try {
      const response = await fetch(`${this._host}/api/tags`, { signal: AbortSignal.timeout(PING_TIMEOUT_MS) });
      return response.ok;
    } catch (err: unknown) {
      this._logger?.debug(`[Ollama] Ping failed: ${describeFailure(err)}`);
      return false;
    }
  }
}
