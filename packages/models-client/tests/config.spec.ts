import { describe, expect, it } from "vitest";
import {
  DEFAULT_BASE_URL,
  loadModelsApiConfig,
  readModelsApiEnv,
  resolveModelsApiConfig,
} from "../src/config";
import { ModelsApiClient } from "../src/client";

describe("models api config", () => {
  it("fills defaults around the api key", () => {
    expect(loadModelsApiConfig({}, { FX_MODELS_API_KEY: "env-key" })).toEqual({
      apiKey: "env-key",
      baseUrl: DEFAULT_BASE_URL,
      timeoutMs: 30_000,
      apiKeyHeader: "X-API-Key",
    });
  });

  it("prefers explicit options over the environment", () => {
    const config = loadModelsApiConfig(
      { apiKey: "explicit-key", timeoutMs: 500 },
      {
        FX_MODELS_API_KEY: "env-key",
        FX_MODELS_TIMEOUT_MS: "1000",
        FX_MODELS_BASE_URL: "http://models.test",
      },
    );

    expect(config.apiKey).toBe("explicit-key");
    expect(config.timeoutMs).toBe(500);
    expect(config.baseUrl).toBe("http://models.test");
  });

  it("ignores blank environment variables", () => {
    expect(readModelsApiEnv({ FX_MODELS_API_KEY: "  ", FX_MODELS_TIMEOUT_MS: "" })).toEqual({});
    expect(readModelsApiEnv({ FX_MODELS_TIMEOUT_MS: "1500" })).toEqual({ timeoutMs: 1500 });
  });

  it("rejects a malformed timeout", () => {
    expect(() => readModelsApiEnv({ FX_MODELS_TIMEOUT_MS: "soon" })).toThrow(
      'FX_MODELS_TIMEOUT_MS must be a non-negative integer, got "soon"',
    );
  });

  it("names the environment variable when the api key is missing", () => {
    expect(() => loadModelsApiConfig({}, {})).toThrow(/Pass apiKey or set FX_MODELS_API_KEY/);
  });

  it("trims the api key and trailing slashes of the base url", () => {
    const config = resolveModelsApiConfig({
      apiKey: "  test-key  ",
      baseUrl: "http://models.test///",
    });

    expect(config.apiKey).toBe("test-key");
    expect(config.baseUrl).toBe("http://models.test");
  });

  it("rejects a base url that is not a url", () => {
    expect(() => resolveModelsApiConfig({ apiKey: "test-key", baseUrl: "models" })).toThrow(
      /baseUrl/,
    );
  });

  it("refuses to build a client with an empty api key", () => {
    expect(() => new ModelsApiClient({ apiKey: "" })).toThrow(/API key is required/);
  });
});
