import { describe, expect, it } from "vitest";

import { getConfig, loadConfig } from "../src/config";
import { ConfigError } from "../src/errors";

describe("config", () => {
  it("falls back to defaults for an empty environment", () => {
    expect(loadConfig({})).toEqual({
      baseUrl: "https://wylaczenia-eneaoperator.pl/index.php",
      defaultRegion: "Poznań",
      requestTimeoutMs: 20000,
      userAgent: "Mozilla/5.0 (compatible; EneaOutages/1.0)",
      cronPattern: "*/15 * * * *",
      timezone: "Europe/Warsaw",
      telegram: null,
    });
  });

  it("reads overrides and trims them", () => {
    const loaded = loadConfig({
      ENEA_BASE_URL: " http://localhost:8080/index.php ",
      DEFAULT_REGION: "Szczecin",
      REQUEST_TIMEOUT_MS: "5000",
      TELEGRAM_BOT_TOKEN: "test-token",
      TELEGRAM_CHAT_ID: "test-chat",
    });

    expect(loaded.baseUrl).toBe("http://localhost:8080/index.php");
    expect(loaded.defaultRegion).toBe("Szczecin");
    expect(loaded.requestTimeoutMs).toBe(5000);
    expect(loaded.telegram).toEqual({ botToken: "test-token", chatId: "test-chat" });
  });

  it("rejects a non-numeric timeout", () => {
    expect(() => loadConfig({ REQUEST_TIMEOUT_MS: "soon" })).toThrow(ConfigError);
  });

  it("loads the process configuration once", () => {
    expect(getConfig()).toBe(getConfig());
  });

  it("requires both Telegram settings together", () => {
    expect(() => loadConfig({ TELEGRAM_BOT_TOKEN: "test-token" })).toThrow(
      "TELEGRAM_BOT_TOKEN and TELEGRAM_CHAT_ID must be set together"
    );
  });
});
