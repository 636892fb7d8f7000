import type { LanguageId } from "./languages";
import type { SnippetLibrary } from "./snippet-library";
import { ProviderError, ProviderUnavailableError, ensureError } from "./errors";
import type { Logger } from "../utils/logger";

/**
 * Anything that can produce code to practise on.
 * Implementations throw ProviderError when they fail.
 */
export interface CodeSource {
  readonly id: string;
  fetchCode(language: LanguageId, signal?: AbortSignal): Promise<string>;
}

export interface LengthBand {
  minLines: number;
  maxLines: number;
}

export type FallbackReason = "provider_unavailable" | "provider_error" | "too_short";

export interface ResolvedCode {
  code: string;
  origin: "generated" | "fallback";
  /** Set when origin is "fallback". */
  reason?: FallbackReason;
  /** Generated code was cut to maxLines. */
  truncated: boolean;
  /** Non-fatal message for the user. */
  warning?: string;
}

/** LF line endings, no trailing whitespace at the very end. */
export function normalizeTarget(text: string): string {
  return text.replace(/\r\n?/g, "\n").trimEnd();
}

export function countLines(text: string): number {
  return text === "" ? 0 : text.split("\n").length;
}

/**
 * Code Resolver
 *
 * Turns a language into the target text for one session. The fallback
 * policy is applied once per call and nothing is retried:
 *
 *   no source          -> built-in snippet, warning
 *   source throws      -> built-in snippet, warning
 *   < minLines         -> built-in snippet
 *   > maxLines         -> first maxLines lines
 */
export class CodeResolver {
  constructor(
    private readonly _source: CodeSource | null,
    private readonly _fallback: SnippetLibrary,
    private readonly _band: LengthBand,
    private readonly _logger: Logger,
  ) {}

  async resolve(language: LanguageId, signal?: AbortSignal): Promise<ResolvedCode> {
    if (!this._source) {
      const err = new ProviderUnavailableError();
      this._logger.warn(`[CodeResolver] ${err.message}, using built-in ${language} snippet`);
      return this._useFallback(language, "provider_unavailable", `${err.message}. Using sample code instead.`);
    }

    let generated: string;
    try {
      generated = normalizeTarget(await this._source.fetchCode(language, signal));
    } catch (err: unknown) {
      const error = err instanceof ProviderError
        ? err
        : new ProviderError(ensureError(err).message, { cause: err });
      this._logger.error(`[CodeResolver] ${this._source.id} failed for ${language}`, error);
      return this._useFallback(
        language,
        "provider_error",
        `Could not generate code. Using sample code instead.\nError: ${error.message}`,
      );
    }

    const lineCount = countLines(generated);
    if (lineCount < this._band.minLines) {
      this._logger.info(`[CodeResolver] Generated ${lineCount} line(s), below ${this._band.minLines}; using snippet`);
      return this._useFallback(language, "too_short");
    }

    if (lineCount > this._band.maxLines) {
      this._logger.info(`[CodeResolver] Generated ${lineCount} line(s), truncating to ${this._band.maxLines}`);
      return {
        code: normalizeTarget(generated.split("\n").slice(0, this._band.maxLines).join("\n")),
        origin: "generated",
        truncated: true,
      };
    }

    return { code: generated, origin: "generated", truncated: false };
  }

  private async _useFallback(language: LanguageId, reason: FallbackReason, warning?: string): Promise<ResolvedCode> {
    const code = normalizeTarget(await this._fallback.getSnippet(language));
    return { code, origin: "fallback", reason, truncated: false, warning };
  }
}
