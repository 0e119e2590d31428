import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { loadConfig } from "../AppConfig";

describe("loadConfig", () => {
  it("applies development defaults", () => {
    const config = loadConfig({});
    assert.equal(config.env, "development");
    assert.equal(config.port, 3001);
    assert.equal(config.database, undefined);
    assert.deepEqual(config.llm, { apiKey: undefined, model: "gpt-4o-mini", timeoutMs: 30_000 });
    assert.ok(config.corsOrigins.includes("http://localhost:3000"));
  });

  it("splits CORS origins and drops blanks", () => {
    assert.deepEqual(loadConfig({ CORS_ORIGINS: "https://a.example, https://b.example," }).corsOrigins, [
      "https://a.example",
      "https://b.example",
    ]);
  });

  it("builds database settings only when DATABASE_URL is set", () => {
    const config = loadConfig({ DATABASE_URL: "postgres://localhost/costs", DB_SSL: "false", DB_POOL_MAX: "5" });
    assert.deepEqual(config.database, {
      connectionString: "postgres://localhost/costs",
      poolMax: 5,
      idleTimeoutMillis: 30_000,
      connectionTimeoutMillis: 5_000,
      ssl: false,
    });
  });

  it("treats a blank API key as absent", () => {
    assert.equal(loadConfig({ OPENAI_API_KEY: "  " }).llm.apiKey, undefined);
    assert.equal(loadConfig({ OPENAI_API_KEY: "test-key", LLM_TIMEOUT_MS: "500" }).llm.timeoutMs, 500);
  });

  it("rejects malformed numbers", () => {
    assert.throws(() => loadConfig({ PORT: "abc" }), /Invalid environment configuration\. PORT:/);
  });
});
