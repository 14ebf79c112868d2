import assert from "node:assert";
import test from "node:test";
import { DEFAULT_MAX_RETRIES, DEFAULT_MODEL, DEFAULT_RETRY_BASE_MS, loadConfig, requireApiKey } from "./config";
import { ConfigurationError } from "./errors";

test("loadConfig applies defaults when nothing is set", () => {
  const config = loadConfig({});
  assert.deepStrictEqual(config, {
    apiKey: undefined,
    model: DEFAULT_MODEL,
    maxRetries: DEFAULT_MAX_RETRIES,
    retryBaseMs: DEFAULT_RETRY_BASE_MS,
  });
});

test("loadConfig reads and trims environment values", () => {
  const config = loadConfig({
    ANTHROPIC_API_KEY: "  test-secret  ",
    PIPELINE_MODEL: "claude-opus-4-20250514",
    PIPELINE_MAX_RETRIES: "5",
    PIPELINE_RETRY_BASE_MS: "0",
  });
  assert.strictEqual(config.apiKey, "test-secret");
  assert.strictEqual(config.model, "claude-opus-4-20250514");
  assert.strictEqual(config.maxRetries, 5);
  assert.strictEqual(config.retryBaseMs, 0);
});

test("loadConfig treats a blank key as missing", () => {
  assert.strictEqual(loadConfig({ ANTHROPIC_API_KEY: "   " }).apiKey, undefined);
});

test("loadConfig rejects a non-integer retry count", () => {
  assert.throws(() => loadConfig({ PIPELINE_MAX_RETRIES: "three" }), ConfigurationError);
  assert.throws(() => loadConfig({ PIPELINE_RETRY_BASE_MS: "-1" }), ConfigurationError);
});

test("requireApiKey returns the key or fails with a configuration error", () => {
  assert.strictEqual(requireApiKey(loadConfig({ ANTHROPIC_API_KEY: "test-secret" })), "test-secret");
  assert.throws(() => requireApiKey(loadConfig({})), {
    name: "ConfigurationError",
    message: "ANTHROPIC_API_KEY environment variable not set. Set it in .env or export it in your shell.",
  });
});
