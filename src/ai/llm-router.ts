import {
  describeFailure,
  type GenerationEvent,
  type GenerationRequest,
  type LLMProvider,
  type ModelInfo,
  type ProvidersConfig,
} from "./providers/types";
import { OllamaProvider } from "./providers/ollama";
import { OpenAICompatProvider, type OpenAICompatConfig } from "./providers/openai-compat";
import type { Logger } from "../utils/logger";

export const OPENAI_URL = "https://api.openai.com/v1";
export const HUGGINGFACE_ROUTER_URL = "https://router.huggingface.co/v1";
export const HUGGINGFACE_DEFAULT_MODEL = "deepseek-ai/DeepSeek-R1-0528";

/** Builds provider instances. Swapped out in tests. */
export interface ProviderFactory {
  ollama(host: string | undefined): LLMProvider;
  openaiCompat(config: OpenAICompatConfig): LLMProvider;
}

/**
 * LLM Router
 *
 * Brings up the providers enabled in config, collects their models and
 * sends each generation request to the provider that owns the model.
 * Providers that are disabled, unconfigured or unreachable are skipped;
 * with none left the game plays offline on built-in samples.
 */
export class LLMRouter {
  private _providers = new Map<string, LLMProvider>();
  private _owners = new Map<string, LLMProvider>();
  private _models: ModelInfo[] = [];
  private readonly _factory: ProviderFactory;

  constructor(private readonly _logger: Logger, factory?: ProviderFactory) {
    this._factory = factory ?? {
      ollama: (host) => new OllamaProvider(host, this._logger),
      openaiCompat: (config) => new OpenAICompatProvider(config, this._logger),
    };
  }

  async initialize(config: ProvidersConfig): Promise<void> {
    this._providers.clear();

    const { ollama, openai, huggingface, custom } = config;
    if (ollama?.enabled) {
      await this._register(() => this._factory.ollama(ollama.baseUrl));
    }
    if (openai?.enabled && openai.apiKey) {
      const apiKey = openai.apiKey;
      await this._register(() => this._factory.openaiCompat({
        id: "openai",
        label: "OpenAI",
        baseUrl: openai.baseUrl ?? OPENAI_URL,
        apiKey,
        models: openai.models,
      }));
    }
    if (huggingface?.enabled && huggingface.apiKey) {
      const apiKey = huggingface.apiKey;
      await this._register(() => this._factory.openaiCompat({
        id: "huggingface",
        label: "Hugging Face",
        baseUrl: huggingface.baseUrl ?? HUGGINGFACE_ROUTER_URL,
        apiKey,
        models: huggingface.models?.length ? huggingface.models : [HUGGINGFACE_DEFAULT_MODEL],
      }));
    }
    // LM Studio, vLLM and friends; usually keyless.
    if (custom?.enabled && custom.baseUrl) {
      const baseUrl = custom.baseUrl;
      await this._register(() => this._factory.openaiCompat({
        id: "custom",
        label: custom.name ?? "Custom",
        baseUrl,
        apiKey: custom.apiKey ?? "",
        models: custom.models,
      }));
    }

    await this._discoverModels();
  }

  getAvailableModels(): readonly ModelInfo[] {
    return this._models;
  }

  /**
   * Model to generate with: the preferred one when some provider serves
   * it, else the first local model, else the first model found.
   */
  resolveModel(preferred?: string): string | null {
    if (preferred && this._owners.has(preferred)) {
      return preferred;
    }
    const fallback = this._models.find((m) => m.isLocal) ?? this._models[0];
    if (preferred) {
      this._logger.warn(`[LLMRouter] Model "${preferred}" not found, using ${fallback?.id ?? "built-in samples"}`);
    }
    return fallback?.id ?? null;
  }

  async *generate(request: GenerationRequest): AsyncIterable<GenerationEvent> {
    const provider = this._owners.get(request.model);
    if (!provider) {
      yield { type: "error", message: `No provider serves model "${request.model}". Check your configuration.` };
      return;
    }
    yield* provider.generate(request);
  }

  // ---- internal ----

  private async _register(create: () => LLMProvider): Promise<void> {
    let label = "provider";
    try {
      const provider = create();
      label = provider.label;
      if (await provider.ping()) {
        this._providers.set(provider.id, provider);
        this._logger.info(`[LLMRouter] ${label} ready`);
      } else {
        this._logger.warn(`[LLMRouter] ${label} enabled but not reachable. Check endpoint and API key.`);
      }
    } catch (err: unknown) {
      this._logger.warn(`[LLMRouter] Failed to set up ${label}: ${describeFailure(err)}`);
    }
  }

  private async _discoverModels(): Promise<void> {
    this._models = [];
    this._owners.clear();

    for (const provider of this._providers.values()) {
      for (const model of await provider.listModels()) {
        this._models.push(model);
        this._owners.set(model.id, provider);
      }
    }
    this._logger.info(`[LLMRouter] ${this._models.length} model(s) from ${this._providers.size} provider(s)`);
  }
}
