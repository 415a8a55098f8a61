import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { DEFAULT_BASE_URL, DEFAULT_UPLOAD_BASE_URL } from "./backend/gemini.js";
import { ensureDataDirs, loadConfig, retryPolicyFromConfig } from "./config.js";

describe("Config", () => {
  let tempDir: string;
  const savedKey = process.env.GEMINI_API_KEY;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "file-search-config-"));
    process.env.FILE_SEARCH_DATA_DIR = tempDir;
    process.env.GEMINI_API_KEY = "test-secret";
  });

  afterEach(() => {
    delete process.env.FILE_SEARCH_DATA_DIR;
    delete process.env.FS_TEST_KEY;
    if (savedKey === undefined) {
      delete process.env.GEMINI_API_KEY;
    } else {
      process.env.GEMINI_API_KEY = savedKey;
    }
    fs.rmSync(tempDir, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  function writeConfig(content: string): string {
    const cfgPath = path.join(tempDir, "config.yml");
    fs.writeFileSync(cfgPath, content);
    return cfgPath;
  }

  it("applies defaults when there is no config file", () => {
    const config = loadConfig();

    expect(config.gemini).toEqual({
      api_key: "test-secret",
      base_url: DEFAULT_BASE_URL,
      upload_base_url: DEFAULT_UPLOAD_BASE_URL,
      default_model: "gemini-2.5-flash",
    });
    expect(config.retry).toEqual({ max_attempts: 3, base_wait_ms: 2000, max_wait_ms: 10000 });
    expect(config.timeouts).toEqual({ request_ms: 30000, upload_ms: 300000 });
    expect(config.limits).toEqual({ max_file_size_mb: 100, max_stores_per_query: 5, max_custom_metadata: 20 });
    expect(config.statistics.page_size).toBe(100);
    expect(config.logging).toEqual({ level: "info", file: true });
    expect(config.data_dir).toBe(path.resolve(tempDir));
  });

  it("reads values from config.yml", () => {
    writeConfig(`
gemini:
  default_model: gemini-2.5-pro
  base_url: https://proxy.example.com/v1beta/
retry:
  max_attempts: 5
timeouts:
  request_ms: "45000"
limits:
  max_stores_per_query: 2
logging:
  level: debug
  file: false
`);

    const config = loadConfig();

    expect(config.gemini.default_model).toBe("gemini-2.5-pro");
    expect(config.gemini.base_url).toBe("https://proxy.example.com/v1beta");
    expect(config.retry.max_attempts).toBe(5);
    expect(config.retry.base_wait_ms).toBe(2000);
    expect(config.timeouts.request_ms).toBe(45000);
    expect(config.limits.max_stores_per_query).toBe(2);
    expect(config.logging).toEqual({ level: "debug", file: false });
  });

  it("substitutes environment variables", () => {
    process.env.FS_TEST_KEY = "test-secret-from-env";
    writeConfig(`
gemini:
  api_key: \${FS_TEST_KEY}
`);

    expect(loadConfig().gemini.api_key).toBe("test-secret-from-env");
  });

  it("fails on an unset environment variable", () => {
    writeConfig(`
gemini:
  api_key: \${FS_MISSING_VAR}
`);

    expect(() => loadConfig()).toThrow("Environment variable FS_MISSING_VAR is not set");
  });

  it("requires an explicit config path to exist", () => {
    const missing = path.join(tempDir, "nope.yml");
    expect(() => loadConfig(missing)).toThrow(`Config file not found: ${missing}`);
  });

  it("loads an explicit config path", () => {
    const cfgPath = path.join(tempDir, "custom.yml");
    fs.writeFileSync(cfgPath, "statistics:\n  page_size: 50\n");

    expect(loadConfig(cfgPath).statistics.page_size).toBe(50);
  });

  it("requires an API key", () => {
    delete process.env.GEMINI_API_KEY;

    expect(() => loadConfig()).toThrow(
      "gemini.api_key is required (set GEMINI_API_KEY or gemini.api_key in config.yml)",
    );
  });

  it("collects every range error", () => {
    writeConfig(`
limits:
  max_stores_per_query: 6
  max_custom_metadata: 0
statistics:
  page_size: 2.5
`);

    expect(() => loadConfig()).toThrow(
      "Config errors:\n" +
      "  - limits.max_stores_per_query must be an integer between 1 and 5\n" +
      "  - limits.max_custom_metadata must be an integer between 1 and 20\n" +
      "  - statistics.page_size must be a positive integer",
    );
  });

  it("warns about an unknown log level and falls back to info", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    writeConfig("logging:\n  level: verbose\n");

    expect(loadConfig().logging.level).toBe("info");
    expect(warn).toHaveBeenCalledWith('Config warning: logging.level "verbose" is not a level; using "info"');
  });

  it("warns when the wait cap is below the base wait", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    writeConfig("retry:\n  base_wait_ms: 5000\n  max_wait_ms: 1000\n");

    loadConfig();

    expect(warn).toHaveBeenCalledWith(
      "Config warning: retry.max_wait_ms is below retry.base_wait_ms; every wait is capped at max_wait_ms",
    );
  });

  it("rejects a config that is not a mapping", () => {
    const cfgPath = writeConfig("- just\n- a list\n");
    expect(() => loadConfig()).toThrow(`Config file ${cfgPath} must contain a mapping at the top level`);
  });

  it("maps retry settings onto a policy", () => {
    expect(retryPolicyFromConfig(loadConfig())).toEqual({ maxAttempts: 3, baseWaitMs: 2000, maxWaitMs: 10000 });
  });

  it("creates the logs directory", () => {
    const config = loadConfig();
    ensureDataDirs(config);
    expect(fs.existsSync(path.join(tempDir, "logs"))).toBe(true);
  });
});
