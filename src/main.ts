#!/usr/bin/env node
import * as path from "path";
import * as readline from "readline";
import { parseArgs } from "util";
import { LLMRouter } from "./ai/llm-router";
import { CodeGeneratorPersona } from "./ai/personas/code-generator";
import { CodeResolver, type LengthBand } from "./core/code-source";
import { ConfigError, ensureError } from "./core/errors";
import { routeKey, type LoopPhase, type RawKeyEvent } from "./core/key-input";
import { LANGUAGES } from "./core/languages";
import { SessionManager } from "./core/session-manager";
import { SnippetLibrary } from "./core/snippet-library";
import { formatModelList } from "./ui/render";
import { TerminalView } from "./ui/terminal-view";
import { applyPracticeOverrides, ConfigManager, type PracticeConfig } from "./utils/config";
import { FileLogSink, Logger } from "./utils/logger";

/** Package root: holds prompts/ and samples/ both from src/ and dist/. */
const RESOURCE_ROOT = path.resolve(__dirname, "..");

const USAGE = `Usage: codetype [options]

Options:
  -l, --language <id>     ${Object.keys(LANGUAGES).join(", ")}
  -d, --duration <secs>   Countdown length in seconds
  -c, --config <path>     Path to codetype.config.json
  -m, --model <id>        Model to generate code with
      --offline           Skip code generation, use built-in samples
      --list-models       Print available models and exit
  -h, --help              Show this help`;

/**
 * CLI entry point. Resolves to the process exit code.
 */
export async function main(argv: string[] = process.argv.slice(2)): Promise<number> {
  const { values } = parseArgs({
    args: argv,
    options: {
      language: { type: "string", short: "l" },
      duration: { type: "string", short: "d" },
      config: { type: "string", short: "c" },
      model: { type: "string", short: "m" },
      offline: { type: "boolean", default: false },
      "list-models": { type: "boolean", default: false },
      help: { type: "boolean", short: "h", default: false },
    },
  });

  if (values.help) {
    console.log(USAGE);
    return 0;
  }

  const configManager = new ConfigManager({
    explicitPath: values.config,
    workingDir: process.cwd(),
    installDir: RESOURCE_ROOT,
  });
  const config = await configManager.loadConfig();

  const logSink = new FileLogSink(path.resolve(config.logging.file));
  const logger = new Logger(logSink, { level: config.logging.level });
  logger.info(`[codetype] Config loaded from ${configManager.loadedFrom ?? "defaults"}`);
  for (const warning of configManager.warnings) {
    logger.warn(`[ConfigManager] ${warning}`);
  }

  try {
    const practice = applyPracticeOverrides(config.practice, { language: values.language, duration: values.duration });
    const band: LengthBand = { minLines: practice.minLines, maxLines: practice.maxLines };

    const router = new LLMRouter(logger);
    if (!values.offline) {
      await router.initialize(config.providers);
    }

    if (values["list-models"]) {
      console.log(formatModelList(router.getAvailableModels()));
      return 0;
    }

    const model = values.offline ? null : router.resolveModel(values.model ?? config.defaultModel);
    const source = model ? new CodeGeneratorPersona(RESOURCE_ROOT, router, model, band, logger) : null;
    const resolver = new CodeResolver(source, new SnippetLibrary(RESOURCE_ROOT), band, logger);
    const sessionManager = new SessionManager(resolver, logger);

    await runPractice(sessionManager, practice, logger);
    return 0;
  } catch (err: unknown) {
    const error = ensureError(err);
    logger.error("[codetype] Fatal error", error);
    console.error(error instanceof ConfigError ? `Configuration error: ${error.message}` : error.message);
    return 1;
  } finally {
    logger.dispose();
    if (logSink.failure) {
      console.error(`Logging disabled, could not write ${logSink.filePath}: ${logSink.failure.message}`);
    }
  }
}

/**
 * Drive sessions from the keyboard until the user quits.
 */
function runPractice(sessionManager: SessionManager, practice: PracticeConfig, logger: Logger): Promise<void> {
  const input = process.stdin;
  const view = new TerminalView(process.stdout, { color: process.stdout.isTTY === true });
  const subscription = sessionManager.addObserver(view);

  return new Promise<void>((resolve, reject) => {
    let loading = false;

    const finish = (error?: Error): void => {
      input.off("keypress", onKeypress);
      if (input.isTTY) {
        input.setRawMode(false);
      }
      input.pause();
      subscription.dispose();
      sessionManager.dispose();
      if (error) {
        reject(error);
      } else {
        resolve();
      }
    };

    const begin = (): void => {
      loading = true;
      sessionManager.startSession(practice.language, practice.durationSeconds)
        .then(() => { loading = false; })
        .catch((err: unknown) => finish(ensureError(err)));
    };

    const onKeypress = (_str: string | undefined, key: RawKeyEvent | undefined): void => {
      const event: RawKeyEvent = key ?? {};
      const phase: LoopPhase = loading ? "loading" : sessionManager.hasActiveSession ? "running" : "results";

      switch (routeKey(event, phase)) {
        case "quit":
          sessionManager.abort();
          finish();
          break;
        case "abort":
          sessionManager.abort();
          break;
        case "restart":
          begin();
          break;
        case "type": {
          const outcome = sessionManager.handleKey(event);
          if (outcome && !outcome.isCorrect) {
            logger.debug("[codetype] Mismatch", outcome);
          }
          break;
        }
        case "ignore":
          break;
      }
    };

    readline.emitKeypressEvents(input);
    if (input.isTTY) {
      input.setRawMode(true);
    }
    input.on("keypress", onKeypress);
    input.resume();
    begin();
  });
}

if (require.main === module) {
  main()
    .then((code) => { process.exitCode = code; })
    .catch((err: unknown) => {
      console.error(ensureError(err).message);
      process.exitCode = 1;
    });
}
