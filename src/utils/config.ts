import * as fs from "fs/promises";
import * as path from "path";
import type { ProvidersConfig } from "../ai/providers/types";
import { PROVIDER_IDS } from "../ai/providers/types";
import { ConfigError } from "../core/errors";
import { DEFAULT_LANGUAGE, parseLanguage, type LanguageId } from "../core/languages";
import { LogLevel, parseLogLevel } from "./logger";

export const CONFIG_FILE_NAME = "codetype.config.json";

export interface PracticeConfig {
  language: LanguageId;
  durationSeconds: number;
  /** Generated code with fewer lines is replaced by the built-in snippet. */
  minLines: number;
  /** Generated code with more lines is cut to this many. */
  maxLines: number;
}

export interface LoggingConfig {
  level: LogLevel;
  file: string;
}

/**
 * Typed config shape loaded from codetype.config.json.
 */
export interface CodeTypeConfig {
  providers: ProvidersConfig;
  defaultModel?: string;
  practice: PracticeConfig;
  logging: LoggingConfig;
}

export const DEFAULT_PRACTICE: PracticeConfig = {
  language: DEFAULT_LANGUAGE,
  durationSeconds: 60,
  minLines: 175,
  maxLines: 200,
};

const DEFAULT_LOGGING: LoggingConfig = { level: LogLevel.INFO, file: "codetype.log" };

export function emptyConfig(): CodeTypeConfig {
  return { providers: {}, practice: { ...DEFAULT_PRACTICE }, logging: { ...DEFAULT_LOGGING } };
}

/** Command-line values that take precedence over the file. */
export interface PracticeOverrides {
  language?: string;
  duration?: string;
}

export function applyPracticeOverrides(practice: PracticeConfig, overrides: PracticeOverrides): PracticeConfig {
  const result = { ...practice };

  if (overrides.language !== undefined) {
    const language = parseLanguage(overrides.language);
    if (!language) {
      throw new ConfigError(`Unknown language "${overrides.language}"`);
    }
    result.language = language;
  }

  if (overrides.duration !== undefined) {
    const seconds = Number(overrides.duration);
    if (!/^\d+$/.test(overrides.duration.trim()) || seconds < 1) {
      throw new ConfigError(`--duration expects a whole number of seconds, got "${overrides.duration}"`);
    }
    result.durationSeconds = seconds;
  }

  return result;
}

export interface ConfigSearchOptions {
  /** Path given on the command line. Searched first. */
  explicitPath?: string;
  /** Usually process.cwd(). */
  workingDir?: string;
  /** Directory codetype is installed in (bundled fallback). */
  installDir?: string;
}

/**
 * Configuration Manager
 *
 * Reads codetype.config.json, resolves ${ENV_VAR} patterns in API keys,
 * and returns a typed config object. A missing file gives the defaults
 * with no providers, which means offline play with built-in snippets.
 * Unreadable files are skipped and recorded in `warnings`; values of the
 * wrong shape throw ConfigError.
 */
export class ConfigManager {
  private _loadedFrom: string | undefined;
  private _warnings: string[] = [];

  constructor(private readonly _options: ConfigSearchOptions = {}) {}

  /**
   * Load (or reload) config. Always re-reads from disk.
   *
   * Search order:
   *   1. Explicit path (--config)
   *   2. Working directory
   *   3. Install directory
   */
  async loadConfig(): Promise<CodeTypeConfig> {
    this._warnings = [];
    this._loadedFrom = undefined;

    for (const candidate of this._candidates()) {
      let parsed: unknown;
      try {
        const text = await fs.readFile(candidate, "utf-8");
        parsed = JSON.parse(text);
      } catch (err: unknown) {
        const code = err instanceof Error && "code" in err ? err.code : undefined;
        if (code !== "ENOENT") {
          const message = err instanceof Error ? err.message : String(err);
          this._warnings.push(`Could not read ${candidate}: ${message}`);
        }
        continue;
      }

      if (!isRecord(parsed)) {
        throw new ConfigError(`${candidate} must contain a JSON object`);
      }
      const config = this._parse(parsed);
      this._loadedFrom = candidate;
      return config;
    }

    return emptyConfig();
  }

  /** File the current config came from, if any. */
  get loadedFrom(): string | undefined {
    return this._loadedFrom;
  }

  /** Problems met during the last load that did not stop it. */
  get warnings(): readonly string[] {
    return this._warnings;
  }

  // ---- internal helpers ----

  private _candidates(): string[] {
    const candidates: string[] = [];
    if (this._options.explicitPath) {
      candidates.push(path.resolve(this._options.explicitPath));
    }
    if (this._options.workingDir) {
      candidates.push(path.join(this._options.workingDir, CONFIG_FILE_NAME));
    }
    if (this._options.installDir) {
      candidates.push(path.join(this._options.installDir, CONFIG_FILE_NAME));
    }
    return candidates;
  }

  private _parse(raw: Record<string, unknown>): CodeTypeConfig {
    return {
      providers: this._resolveProviders(isRecord(raw.providers) ? raw.providers : {}),
      defaultModel: typeof raw.defaultModel === "string" ? raw.defaultModel : undefined,
      practice: this._parsePractice(isRecord(raw.practice) ? raw.practice : {}),
      logging: this._parseLogging(isRecord(raw.logging) ? raw.logging : {}),
    };
  }

  /**
   * Walk through the providers object and resolve env vars in API keys.
   * Unknown provider ids are ignored.
   */
  private _resolveProviders(raw: Record<string, unknown>): ProvidersConfig {
    const result: ProvidersConfig = {};

    for (const id of PROVIDER_IDS) {
      const src = raw[id];
      if (!isRecord(src)) { continue; }

      result[id] = {
        enabled: src.enabled === true,
        apiKey: typeof src.apiKey === "string"
          ? this._resolveEnvVars(src.apiKey)
          : undefined,
        baseUrl: typeof src.baseUrl === "string" ? src.baseUrl : undefined,
        name: typeof src.name === "string" ? src.name : undefined,
        models: Array.isArray(src.models)
          ? src.models.filter((m): m is string => typeof m === "string")
          : undefined,
      };
    }

    return result;
  }

  private _parsePractice(raw: Record<string, unknown>): PracticeConfig {
    const practice: PracticeConfig = { ...DEFAULT_PRACTICE };

    if (raw.language !== undefined) {
      const language = typeof raw.language === "string" ? parseLanguage(raw.language) : null;
      if (!language) {
        throw new ConfigError(`practice.language: unknown language ${JSON.stringify(raw.language)}`);
      }
      practice.language = language;
    }

    practice.durationSeconds = readInteger(raw, "durationSeconds", practice.durationSeconds, 1);
    practice.minLines = readInteger(raw, "minLines", practice.minLines, 0);
    practice.maxLines = readInteger(raw, "maxLines", practice.maxLines, 1);

    if (practice.maxLines < practice.minLines) {
      throw new ConfigError(
        `practice.maxLines (${practice.maxLines}) is below practice.minLines (${practice.minLines})`,
      );
    }
    return practice;
  }

  private _parseLogging(raw: Record<string, unknown>): LoggingConfig {
    const logging: LoggingConfig = { ...DEFAULT_LOGGING };
    if (raw.level !== undefined) {
      const level = typeof raw.level === "string" ? parseLogLevel(raw.level) : undefined;
      if (level === undefined) {
        throw new ConfigError(`logging.level: expected debug, info, warn or error`);
      }
      logging.level = level;
    }
    if (typeof raw.file === "string" && raw.file.trim()) {
      logging.file = raw.file;
    }
    return logging;
  }

  /**
   * Replace ${ENV_VAR} patterns with process.env values.
   * Leaves the pattern in place if the env var is not set.
   */
  private _resolveEnvVars(value: string): string {
    return value.replace(/\$\{([^}]+)\}/g, (match, varName: string) => {
      const envValue = process.env[varName];
      if (envValue !== undefined) {
        return envValue;
      }
      this._warnings.push(`Env var ${varName} not set`);
      return match;
    });
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readInteger(raw: Record<string, unknown>, key: string, fallback: number, min: number): number {
  const value = raw[key];
  if (value === undefined) { return fallback; }
  if (typeof value !== "number" || !Number.isInteger(value) || value < min) {
    throw new ConfigError(`practice.${key}: expected an integer >= ${min}`);
  }
  return value;
}
