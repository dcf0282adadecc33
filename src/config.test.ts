import { describe, expect, it } from "vitest";
import { config, DEFAULT_USER_AGENT, loadConfig } from "./config";

describe("loadConfig", () => {
  it("fills in defaults", () => {
    expect(loadConfig({})).toEqual({
      baseUrl: "https://www.basketball-reference.com",
      userAgent: DEFAULT_USER_AGENT,
      requestTimeoutMs: 30000,
      outputDir: ".",
      logLevel: "INFO",
      logDir: undefined,
    });
  });

  it("reads and normalises the environment", () => {
    const config = loadConfig({
      SITE_URL: "https://mirror.example.test/",
      REQUEST_TIMEOUT_MS: "5000",
      LOG_LEVEL: "debug",
      OUTPUT_DIR: "out",
    });
    expect(config).toMatchObject({
      baseUrl: "https://mirror.example.test",
      requestTimeoutMs: 5000,
      logLevel: "DEBUG",
      outputDir: "out",
    });
  });

  it("reads the log directory", () => {
    expect(loadConfig({ LOG_DIR: "logs" }).logDir).toBe("logs");
  });

  it("ignores the runner's BASE_URL", () => {
    expect(loadConfig({ BASE_URL: "/" }).baseUrl).toBe("https://www.basketball-reference.com");
  });

  it("loads the module-level config", () => {
    expect(config.baseUrl).toMatch(/^https?:\/\//);
  });

  it("rejects an invalid timeout", () => {
    expect(() => loadConfig({ REQUEST_TIMEOUT_MS: "soon" })).toThrow();
  });
});
