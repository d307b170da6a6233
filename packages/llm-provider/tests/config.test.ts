import { describe, it, expect } from "vitest";
import {
  DEFAULT_MODEL,
  loadLoggerConfig,
  parseProviderSettings,
} from "../src/config.js";
import { ConfigurationError } from "../src/types/errors.js";

describe("loadLoggerConfig", () => {
  it("applies defaults", () => {
    expect(loadLoggerConfig({})).toEqual({ LOG_LEVEL: "info", NODE_ENV: "production" });
  });

  it("reads the level and environment", () => {
    expect(loadLoggerConfig({ LOG_LEVEL: "debug", NODE_ENV: "test" })).toEqual({
      LOG_LEVEL: "debug",
      NODE_ENV: "test",
    });
  });

  it("reads the level case-insensitively", () => {
    expect(loadLoggerConfig({ LOG_LEVEL: "DEBUG" }).LOG_LEVEL).toBe("debug");
  });

  it("falls back to defaults for unrecognized values", () => {
    expect(loadLoggerConfig({ LOG_LEVEL: "verbose", NODE_ENV: "staging" })).toEqual({
      LOG_LEVEL: "info",
      NODE_ENV: "production",
    });
  });
});

describe("parseProviderSettings", () => {
  it("applies defaults", () => {
    expect(parseProviderSettings({})).toEqual({
      defaultModel: DEFAULT_MODEL,
      extraHeaders: {},
    });
    expect(DEFAULT_MODEL).toBe("anthropic/claude-opus-4-5");
  });

  it("keeps provided settings", () => {
    const settings = parseProviderSettings({
      apiKey: "test-key",
      apiBase: "http://localhost:8000/v1",
      defaultModel: "deepseek-chat",
      extraHeaders: { "APP-Code": "test-app" },
      providerName: "vllm",
    });

    expect(settings).toEqual({
      apiKey: "test-key",
      apiBase: "http://localhost:8000/v1",
      defaultModel: "deepseek-chat",
      extraHeaders: { "APP-Code": "test-app" },
      providerName: "vllm",
    });
  });

  it("treats an empty credential and base URL as absent", () => {
    expect(parseProviderSettings({ apiKey: "", apiBase: "" })).toEqual({
      defaultModel: DEFAULT_MODEL,
      extraHeaders: {},
    });
  });

  it("lists every invalid setting", () => {
    try {
      parseProviderSettings({ apiBase: "not a url", defaultModel: "" });
      expect.unreachable("should have thrown");
    } catch (err) {
      if (!(err instanceof ConfigurationError)) throw err;
      const issues = err.issues;
      expect(issues).toHaveLength(2);
      expect(issues[0]).toMatch(/^apiBase: /);
      expect(issues[1]).toMatch(/^defaultModel: /);
    }
  });
});
