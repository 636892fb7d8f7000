import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { applyPracticeOverrides, CONFIG_FILE_NAME, ConfigManager, DEFAULT_PRACTICE } from "../../src/utils/config";
import { ConfigError } from "../../src/core/errors";
import { LogLevel } from "../../src/utils/logger";

describe("ConfigManager", () => {
  let workDir: string;
  let installDir: string;

  beforeEach(() => {
    workDir = fs.mkdtempSync(path.join(os.tmpdir(), "codetype-work-"));
    installDir = fs.mkdtempSync(path.join(os.tmpdir(), "codetype-install-"));
    delete process.env.CODETYPE_TEST_KEY;
  });

  afterEach(() => {
    fs.rmSync(workDir, { recursive: true, force: true });
    fs.rmSync(installDir, { recursive: true, force: true });
    delete process.env.CODETYPE_TEST_KEY;
  });

  function writeConfig(dir: string, value: unknown): string {
    const file = path.join(dir, CONFIG_FILE_NAME);
    fs.writeFileSync(file, typeof value === "string" ? value : JSON.stringify(value));
    return file;
  }

  it("returns defaults when no file exists", async () => {
    const manager = new ConfigManager({ workingDir: workDir, installDir });
    const config = await manager.loadConfig();

    expect(config.providers).toEqual({});
    expect(config.practice).toEqual(DEFAULT_PRACTICE);
    expect(config.logging).toEqual({ level: LogLevel.INFO, file: "codetype.log" });
    expect(manager.loadedFrom).toBeUndefined();
    expect(manager.warnings).toEqual([]);
  });

  it("prefers the working directory over the install directory", async () => {
    writeConfig(installDir, { defaultModel: "install" });
    const workFile = writeConfig(workDir, { defaultModel: "work" });

    const manager = new ConfigManager({ workingDir: workDir, installDir });
    const config = await manager.loadConfig();

    expect(config.defaultModel).toBe("work");
    expect(manager.loadedFrom).toBe(workFile);
  });

  it("an explicit path wins over both", async () => {
    writeConfig(workDir, { defaultModel: "work" });
    const explicit = path.join(installDir, "custom.json");
    fs.writeFileSync(explicit, JSON.stringify({ defaultModel: "explicit" }));

    const config = await new ConfigManager({ explicitPath: explicit, workingDir: workDir }).loadConfig();

    expect(config.defaultModel).toBe("explicit");
  });

  it("resolves ${ENV_VAR} in API keys", async () => {
    process.env.CODETYPE_TEST_KEY = "test-secret";
    writeConfig(workDir, {
      providers: { huggingface: { enabled: true, apiKey: "${CODETYPE_TEST_KEY}", models: ["m1", 7] } },
    });

    const manager = new ConfigManager({ workingDir: workDir });
    const config = await manager.loadConfig();

    expect(config.providers.huggingface).toEqual({
      enabled: true,
      apiKey: "test-secret",
      baseUrl: undefined,
      name: undefined,
      models: ["m1"],
    });
    expect(manager.warnings).toEqual([]);
  });

  it("keeps an unset env var pattern and records a warning", async () => {
    writeConfig(workDir, { providers: { openai: { enabled: true, apiKey: "${CODETYPE_TEST_KEY}" } } });

    const manager = new ConfigManager({ workingDir: workDir });
    const config = await manager.loadConfig();

    expect(config.providers.openai?.apiKey).toBe("${CODETYPE_TEST_KEY}");
    expect(manager.warnings).toEqual(["Env var CODETYPE_TEST_KEY not set"]);
  });

  it("skips malformed JSON and moves on to the next candidate", async () => {
    writeConfig(workDir, "{ not json");
    writeConfig(installDir, { defaultModel: "install" });

    const manager = new ConfigManager({ workingDir: workDir, installDir });
    const config = await manager.loadConfig();

    expect(config.defaultModel).toBe("install");
    expect(manager.warnings).toHaveLength(1);
    expect(manager.warnings[0]).toContain(`Could not read ${path.join(workDir, CONFIG_FILE_NAME)}`);
  });

  it("parses practice and logging settings", async () => {
    writeConfig(workDir, {
      practice: { language: "JavaScript", durationSeconds: 120, minLines: 10, maxLines: 20 },
      logging: { level: "debug", file: "out.log" },
    });

    const config = await new ConfigManager({ workingDir: workDir }).loadConfig();

    expect(config.practice).toEqual({ language: "javascript", durationSeconds: 120, minLines: 10, maxLines: 20 });
    expect(config.logging).toEqual({ level: LogLevel.DEBUG, file: "out.log" });
  });

  it("rejects invalid practice values", async () => {
    writeConfig(workDir, { practice: { durationSeconds: 0 } });
    await expect(new ConfigManager({ workingDir: workDir }).loadConfig()).rejects.toThrow(ConfigError);

    writeConfig(workDir, { practice: { language: "cobol" } });
    await expect(new ConfigManager({ workingDir: workDir }).loadConfig())
      .rejects.toThrow('practice.language: unknown language "cobol"');

    writeConfig(workDir, { practice: { minLines: 50, maxLines: 10 } });
    await expect(new ConfigManager({ workingDir: workDir }).loadConfig())
      .rejects.toThrow("practice.maxLines (10) is below practice.minLines (50)");
  });

  it("rejects an unknown log level", async () => {
    writeConfig(workDir, { logging: { level: "loud" } });
    await expect(new ConfigManager({ workingDir: workDir }).loadConfig()).rejects.toThrow("logging.level");
  });

  it("rejects a file that is not a JSON object", async () => {
    writeConfig(workDir, "[1, 2]");
    await expect(new ConfigManager({ workingDir: workDir }).loadConfig()).rejects.toThrow("must contain a JSON object");
  });
});

describe("applyPracticeOverrides", () => {
  it("returns the configured practice when nothing is given", () => {
    expect(applyPracticeOverrides(DEFAULT_PRACTICE, {})).toEqual(DEFAULT_PRACTICE);
  });

  it("applies --language and --duration without touching the line band", () => {
    expect(applyPracticeOverrides(DEFAULT_PRACTICE, { language: "Rust", duration: "180" })).toEqual({
      language: "rust",
      durationSeconds: 180,
      minLines: 175,
      maxLines: 200,
    });
  });

  it("rejects an unknown language", () => {
    expect(() => applyPracticeOverrides(DEFAULT_PRACTICE, { language: "cobol" }))
      .toThrow(new ConfigError('Unknown language "cobol"'));
  });

  it.each(["0", "-5", "1.5", "abc", "", "1e2"])("rejects duration %j", (duration) => {
    expect(() => applyPracticeOverrides(DEFAULT_PRACTICE, { duration }))
      .toThrow(`--duration expects a whole number of seconds, got "${duration}"`);
  });
});
