import { describe, it, expect } from "vitest";
import { ConfigError, loadConfig } from "../src/config.js";

describe("loadConfig", () => {
  it("fills in defaults", () => {
    const config = loadConfig({});

    expect(config).toMatchObject({
      PORT: 3001,
      HOST: "0.0.0.0",
      LOG_LEVEL: "info",
      POST_TONE: "friendly",
      POST_MAX_LENGTH: 300,
      GENERATION_TIMEOUT_MS: 30_000,
      GENERATION_MAX_ATTEMPTS: 3,
      SCHEDULER_INTERVAL_MS: 60_000,
      IMAGE_DIR: "./generated-images",
    });
    expect(config.DATABASE_URL).toBeUndefined();
    expect(config.GOOGLE_AI_API_KEY).toBeUndefined();
  });

  it("coerces numeric variables", () => {
    const config = loadConfig({ PORT: "8080", GENERATION_TIMEOUT_MS: "5000" });

    expect(config.PORT).toBe(8080);
    expect(config.GENERATION_TIMEOUT_MS).toBe(5000);
  });

  it("treats empty values as unset", () => {
    const config = loadConfig({ DATABASE_URL: "", POST_TONE: "" });

    expect(config.DATABASE_URL).toBeUndefined();
    expect(config.POST_TONE).toBe("friendly");
  });

  it("names the offending variable", () => {
    expect(() => loadConfig({ PORT: "not-a-port" })).toThrow(ConfigError);
    expect(() => loadConfig({ POST_TONE: "sarcastic" })).toThrow(/POST_TONE/);
    expect(() => loadConfig({ DATABASE_URL: "nope" })).toThrow(/DATABASE_URL/);
  });
});
