import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { describe, it, expect, vi, beforeAll, afterAll } from "vitest";

import {
  DEFAULT_DATABASE_URL,
  DEFAULT_FEED_URL,
  DEFAULT_SOURCE,
  DEFAULT_VOCABULARY_PATH,
  loadConfig,
} from "../../src/config.js";
import { ConfigError } from "../../src/errors.js";

vi.mock("node:os", async (importOriginal) => ({
  ...(await importOriginal<typeof import("node:os")>()),
  homedir: () => "/nonexistent-home",
}));

describe("loadConfig", () => {
  let dir: string;
  let configFile: string;

  beforeAll(() => {
    dir = mkdtempSync(join(tmpdir(), "pulse-sync-config-"));
    configFile = join(dir, "sync.env");
    writeFileSync(
      configFile,
      "FEED_API_KEY=file-key\nSTORE_SOURCE=File Source\nFEED_PAGE_SIZE=50\n"
    );
  });

  afterAll(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("should apply defaults", () => {
    const config = loadConfig({}, { FEED_API_KEY: "test-key" });

    expect(config).toEqual({
      feed: {
        baseUrl: DEFAULT_FEED_URL,
        apiKey: "test-key",
        pageSize: 10,
        rateLimitMs: 250,
        timeoutMs: 30_000,
      },
      store: {
        environment: "production",
        databaseUrl: DEFAULT_DATABASE_URL,
        source: DEFAULT_SOURCE,
      },
      vocabularyPath: DEFAULT_VOCABULARY_PATH,
    });
  });

  it("should strip trailing slashes from the feed URL", () => {
    const config = loadConfig(
      {},
      { FEED_API_KEY: "test-key", FEED_URL: "https://feed.test/api/v1//" }
    );

    expect(config.feed.baseUrl).toBe("https://feed.test/api/v1");
  });

  it("should require an API key unless told otherwise", () => {
    expect(() => loadConfig({}, {})).toThrow("FEED_API_KEY must be set");
    expect(loadConfig({ requireFeed: false }, {}).feed.apiKey).toBe("");
  });

  it("should use the development store with --dev", () => {
    const config = loadConfig(
      { dev: true },
      {
        FEED_API_KEY: "test-key",
        DATABASE_URL: "postgresql://prod/intel",
        DEV_DATABASE_URL: "postgresql://dev/intel",
      }
    );

    expect(config.store).toMatchObject({
      environment: "development",
      databaseUrl: "postgresql://dev/intel",
    });
  });

  it("should refuse --dev without a development URL", () => {
    expect(() => loadConfig({ dev: true }, { FEED_API_KEY: "test-key" })).toThrow(
      "DEV_DATABASE_URL must be set to use --dev"
    );
  });

  it("should reject invalid numbers", () => {
    expect(() =>
      loadConfig({}, { FEED_API_KEY: "test-key", FEED_PAGE_SIZE: "lots" })
    ).toThrow(/^Invalid configuration: \/feed\/pageSize: /);
  });

  it("should reject a non-postgres database URL", () => {
    expect(() =>
      loadConfig({}, { FEED_API_KEY: "test-key", DATABASE_URL: "mysql://db/intel" })
    ).toThrow(ConfigError);
  });

  it("should let the config file override the environment", () => {
    const config = loadConfig(
      { configPath: configFile },
      { FEED_API_KEY: "env-key", FEED_RATE_LIMIT_MS: "0" }
    );

    expect(config.feed.apiKey).toBe("file-key");
    expect(config.feed.pageSize).toBe(50);
    expect(config.feed.rateLimitMs).toBe(0);
    expect(config.store.source).toBe("File Source");
  });

  it("should find the config file through PULSE_SYNC_CONFIG", () => {
    const config = loadConfig({}, { PULSE_SYNC_CONFIG: configFile });

    expect(config.feed.apiKey).toBe("file-key");
  });

  it("should pass a feed proxy through", () => {
    const config = loadConfig(
      {},
      { FEED_API_KEY: "test-key", FEED_PROXY_URL: "http://proxy.test:3128" }
    );

    expect(config.feed.proxyUrl).toBe("http://proxy.test:3128");
  });

  it("should leave the proxy unset by default", () => {
    const config = loadConfig({}, { FEED_API_KEY: "test-key", FEED_PROXY_URL: " " });

    expect(config.feed).not.toHaveProperty("proxyUrl");
  });

  it("should reject a proxy that is not an http(s) URL", () => {
    expect(() =>
      loadConfig({}, { FEED_API_KEY: "test-key", FEED_PROXY_URL: "socks5://proxy.test" })
    ).toThrow(/^Invalid configuration: \/feed\/proxyUrl: /);
  });

  it("should prefer an explicit vocabulary path", () => {
    const config = loadConfig(
      { vocabularyPath: "/tmp/vocab.json" },
      { FEED_API_KEY: "test-key", VOCABULARY_FILE: "/etc/vocab.json" }
    );

    expect(config.vocabularyPath).toBe("/tmp/vocab.json");
  });

  it("should report an unreadable config file", () => {
    expect(() =>
      loadConfig({ configPath: join(dir, "missing.env") }, {})
    ).toThrow(/^Cannot read config file .*missing\.env: /);
  });
});
