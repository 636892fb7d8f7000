import type { PromptContext } from "./prompt-loader";
import { buildPrompt, loadPromptTemplate } from "./prompt-loader";
import type { LLMRouter } from "../llm-router";
import { extractCode } from "../code-extractor";
import type { CodeSource, LengthBand } from "../../core/code-source";
import { ProviderError } from "../../core/errors";
import { LANGUAGES, type LanguageId } from "../../core/languages";
import type { Logger } from "../../utils/logger";

const TOPICS = [
  "binary search trees",
  "graph traversal",
  "dynamic programming",
  "sorting algorithms",
  "hash tables",
  "priority queues",
  "string matching",
  "linked lists",
  "union-find",
  "tries",
];

/** Tokens allowed per line of code. */
const TOKENS_PER_LINE = 16;
/** Room for a reasoning model's <think> block ahead of the code. */
const REASONING_TOKENS = 8192;

/** Token cap for a reply that fits the band with room to reason. */
export function tokenBudget(band: LengthBand): number {
  return band.maxLines * TOKENS_PER_LINE + REASONING_TOKENS;
}

/**
 * Code Generator Persona
 *
 * Asks the configured LLM for a practice program in the requested
 * language and returns only the code. Acts as the session's CodeSource.
 */
export class CodeGeneratorPersona implements CodeSource {
  readonly id = "code-generator";

  constructor(
    private readonly _resourceRoot: string,
    private readonly _router: LLMRouter,
    private readonly _model: string,
    private readonly _band: LengthBand,
    private readonly _logger: Logger,
    private readonly _pickTopic: () => string = () => TOPICS[Math.floor(Math.random() * TOPICS.length)],
  ) {}

  async buildSystemPrompt(context: PromptContext = {}): Promise<string> {
    const template = await loadPromptTemplate(this._resourceRoot, "code-generator.md");
    return buildPrompt(template, context);
  }

  /**
   * Generate a program and collect the full streamed response.
   * Throws ProviderError on a provider error, cancellation or empty output.
   */
  async fetchCode(language: LanguageId, signal?: AbortSignal): Promise<string> {
    const displayName = LANGUAGES[language].displayName;
    const topic = this._pickTopic();
    const system = await this.buildSystemPrompt({
      language: displayName,
      minLines: this._band.minLines,
      maxLines: this._band.maxLines,
      topic,
    });

    this._logger.info(`[CodeGenerator] Requesting ${displayName} code about ${topic} from ${this._model}`);

    const parts: string[] = [];
    for await (const event of this._router.generate({
      model: this._model,
      system,
      prompt: `Write the ${displayName} program now.`,
      temperature: 0.7,
      maxTokens: tokenBudget(this._band),
      signal,
    })) {
      if (signal?.aborted) {
        throw new ProviderError("Code generation was cancelled");
      }

      switch (event.type) {
        case "text":
          parts.push(event.text);
          break;
        case "error":
          throw new ProviderError(event.message);
        case "done":
          this._logger.info(
            `[CodeGenerator] ${this._model} used ${event.usage.promptTokens} prompt + ${event.usage.completionTokens} completion tokens`,
          );
          break;
      }
    }

    const code = extractCode(parts.join(""), language);
    if (!code.trim()) {
      throw new ProviderError(`${this._model} returned no code`);
    }
    return code;
  }
}
