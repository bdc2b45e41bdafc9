import { mkdtempSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import path from "node:path";

import { afterEach, describe, it, expect } from "vitest";

import { DEFAULT_CLIENT_CONFIG } from "../../../src/application/options";
import { ConfigError } from "../../../src/domain/error";
import { createClientConfig, validateClientConfig } from "../../../src/shared/config/env-config";

describe("createClientConfig", () => {
  afterEach(() => {
    delete process.env.BGG_API_TOKEN;
  });

  it("環境変数がなければ既定値", () => {
    expect(createClientConfig({ env: {} })).toEqual(DEFAULT_CLIENT_CONFIG);
  });

  it("BGG_* 環境変数を読む", () => {
    const config = createClientConfig({
      env: {
        BGG_BASE_URL: "https://bgg.test/xmlapi2/",
        BGG_API_TOKEN: "test-secret",
        BGG_MAX_ATTEMPTS: "3",
        BGG_RETRY_INITIAL_DELAY_MS: "100",
        BGG_RETRY_BACKOFF_FACTOR: "2",
        BGG_RETRY_MAX_DELAY_MS: "1000",
        BGG_REQUEST_TIMEOUT_MS: "5000",
        BGG_ENTITY_MODE: "preserve"
      }
    });

    expect(config).toEqual({
      baseUrl: "https://bgg.test/xmlapi2",
      retry: { maxAttempts: 3, initialDelayMs: 100, backoffFactor: 2, maxDelayMs: 1000 },
      requestTimeoutMs: 5000,
      entityMode: "preserve",
      apiToken: "test-secret"
    });
  });

  it("明示的な指定が環境変数より優先される", () => {
    const config = createClientConfig({
      env: { BGG_MAX_ATTEMPTS: "3", BGG_ENTITY_MODE: "preserve" },
      overrides: { retry: { maxAttempts: 9 }, entityMode: "repair", userAgent: "bgg-test/1.0" }
    });

    expect(config.retry.maxAttempts).toBe(9);
    expect(config.retry.initialDelayMs).toBe(DEFAULT_CLIENT_CONFIG.retry.initialDelayMs);
    expect(config.entityMode).toBe("repair");
    expect(config.userAgent).toBe("bgg-test/1.0");
  });

  it(".env ファイルを読み込む", () => {
    const directory = mkdtempSync(path.join(tmpdir(), "bgg-config-"));
    const envPath = path.join(directory, ".env");
    writeFileSync(envPath, "BGG_API_TOKEN=test-secret\n");

    const config = createClientConfig({ envPath });

    expect(config.apiToken).toBe("test-secret");
  });

  it("数値でない値は ConfigError", () => {
    expect(() => createClientConfig({ env: { BGG_MAX_ATTEMPTS: "many" } })).toThrow(ConfigError);
  });

  it("未知のエンティティモードは ConfigError", () => {
    try {
      createClientConfig({ env: { BGG_ENTITY_MODE: "strict" } });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigError);
      if (!(error instanceof ConfigError)) return;
      expect(error.key).toBe("BGG_ENTITY_MODE");
    }
  });
});

describe("validateClientConfig", () => {
  it("maxAttempts は 1 以上", () => {
    expect(() =>
      validateClientConfig({ ...DEFAULT_CLIENT_CONFIG, retry: { ...DEFAULT_CLIENT_CONFIG.retry, maxAttempts: 0 } })
    ).toThrow("Configuration Error: maxAttempts must be an integer >= 1, got 0");
  });

  it("backoffFactor は 1 以上", () => {
    expect(() =>
      validateClientConfig({ ...DEFAULT_CLIENT_CONFIG, retry: { ...DEFAULT_CLIENT_CONFIG.retry, backoffFactor: 0.5 } })
    ).toThrow(ConfigError);
  });

  it("不正な URL は ConfigError", () => {
    expect(() => validateClientConfig({ ...DEFAULT_CLIENT_CONFIG, baseUrl: "not a url" })).toThrow(ConfigError);
    expect(() => validateClientConfig({ ...DEFAULT_CLIENT_CONFIG, baseUrl: "ftp://bgg.test" })).toThrow(ConfigError);
  });
});
