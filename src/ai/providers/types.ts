/**
 * Provider contract for code generation backends.
 *
 * A practice run makes exactly one request: a system prompt describing
 * the program, one user turn, and a token budget sized to the line band.
 * Backends stream the reply back as events and never throw from
 * `generate`.
 */

export interface LLMProvider {
  /** Registry key, also the prefix of remote model ids ("huggingface/..."). */
  readonly id: string;
  readonly label: string;
  readonly isLocal: boolean;

  listModels(): Promise<ModelInfo[]>;
  generate(request: GenerationRequest): AsyncIterable<GenerationEvent>;
  /** Cheap reachability check run once at startup. */
  ping(): Promise<boolean>;
}

export interface ModelInfo {
  /** Id the router resolves, as typed after --model. */
  id: string;
  /** Label of the serving provider. */
  provider: string;
  isLocal: boolean;
  /** Size or quantisation hint, when the backend reports one. */
  description?: string;
}

export interface GenerationRequest {
  model: string;
  system: string;
  prompt: string;
  temperature: number;
  /** Upper bound on generated tokens, reasoning included. */
  maxTokens: number;
  signal?: AbortSignal;
}

export interface TokenUsage {
  promptTokens: number;
  completionTokens: number;
}

export type GenerationEvent =
  | { type: "text"; text: string }
  | { type: "done"; usage: TokenUsage }
  | { type: "error"; message: string };

/** One entry of the `providers` section of codetype.config.json. */
export interface ProviderConfig {
  enabled: boolean;
  apiKey?: string;
  baseUrl?: string;
  name?: string;
  models?: string[];
}

export interface ProvidersConfig {
  ollama?: ProviderConfig;
  openai?: ProviderConfig;
  huggingface?: ProviderConfig;
  custom?: ProviderConfig;
}

export const PROVIDER_IDS = ["ollama", "openai", "huggingface", "custom"] as const satisfies ReadonlyArray<keyof ProvidersConfig>;

/** Reason text of a failed call, for error events and logs. */
export function describeFailure(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
