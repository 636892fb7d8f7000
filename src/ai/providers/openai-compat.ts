import OpenAI from "openai";
import {
  describeFailure,
  type GenerationEvent,
  type GenerationRequest,
  type LLMProvider,
  type ModelInfo,
} from "./types";
import type { Logger } from "../../utils/logger";

const PING_TIMEOUT_MS = 10_000;
const LOCAL_HOSTS = new Set(["localhost", "127.0.0.1", "0.0.0.0", "[::1]"]);

export interface OpenAICompatConfig {
  /** "openai", "huggingface" or "custom"; prefixes every model id. */
  id: string;
  label: string;
  baseUrl: string;
  apiKey: string;
  /**
   * Models to offer instead of asking the endpoint. The Hugging Face
   * router has no usable /models listing, so it always sets this.
   */
  models?: string[];
}

/**
 * Code generation over any endpoint speaking the OpenAI chat completions
 * protocol: OpenAI itself, the Hugging Face router, LM Studio, vLLM.
 */
export class OpenAICompatProvider implements LLMProvider {
  readonly id: string;
  readonly label: string;
  readonly isLocal: boolean;

  private readonly _client: OpenAI;
  private readonly _hasKey: boolean;
  private readonly _fixedModels: string[];

  constructor(config: OpenAICompatConfig, private readonly _logger?: Logger) {
    this.id = config.id;
    this.label = config.label;
    this.isLocal = isLocalEndpoint(config.baseUrl);
    this._hasKey = config.apiKey !== "";
    this._fixedModels = config.models ?? [];

    this._client = new OpenAI({
      apiKey: config.apiKey || "unused",
      baseURL: config.baseUrl.replace(/\/+$/, ""),
      maxRetries: 0,
    });
  }

  async listModels(): Promise<ModelInfo[]> {
    if (this._fixedModels.length > 0) {
      return this._fixedModels.map((model) => this._describe(model));
    }

    const models: ModelInfo[] = [];
    try {
      for await (const model of this._client.models.list()) {
        models.push(this._describe(model.id));
      }
    } catch (err: unknown) {
      this._logger?.warn(`[${this.label}] Could not list models: ${describeFailure(err)}`);
    }
    return models;
  }

  async *generate(request: GenerationRequest): AsyncIterable<GenerationEvent> {
    const usage = { promptTokens: 0, completionTokens: 0 };
    try {
      const stream = await this._client.chat.completions.create(
        {
          model: this._remoteName(request.model),
          messages: [
            { role: "system", content: request.system },
            { role: "user", content: request.prompt },
          ],
          temperature: request.temperature,
          max_tokens: request.maxTokens,
          stream: true,
          stream_options: { include_usage: true },
        },
        { signal: request.signal },
      );

      for await (const chunk of stream) {
        const text = chunk.choices[0]?.delta?.content;
        if (text) {
          yield { type: "text", text };
        }
        if (chunk.usage) {
          usage.promptTokens = chunk.usage.prompt_tokens;
          usage.completionTokens = chunk.usage.completion_tokens;
        }
      }
    } catch (err: unknown) {
      yield { type: "error", message: describeFailure(err) };
      return;
    }
    yield { type: "done", usage };
  }

  async ping(): Promise<boolean> {
    if (this._fixedModels.length > 0) {
      return this._hasKey || this.isLocal;
    }
    try {
      await this._client.models.list({ timeout: PING_TIMEOUT_MS, maxRetries: 0 });
      return true;
    } catch (err: unknown) {
      this._logger?.debug(`[${this.label}] Ping failed: ${describeFailure(err)}`);
      return false;
    }
  }

  /** "huggingface/deepseek-ai/X" -> "deepseek-ai/X" */
  private _remoteName(modelId: string): string {
    const prefix = `${this.id}/`;
    return modelId.startsWith(prefix) ? modelId.slice(prefix.length) : modelId;
  }

  private _describe(model: string): ModelInfo {
    return { id: `${this.id}/${model}`, provider: this.label, isLocal: this.isLocal };
  }
}

function isLocalEndpoint(baseUrl: string): boolean {
  try {
    return LOCAL_HOSTS.has(new URL(baseUrl).hostname);
  } catch {
    return false;
  }
}
