import { describe, it } from "node:test";
import assert from "node:assert/strict";
import {
  CompletionTimeoutError,
  CompletionUnavailableError,
  TimedCompletionService,
  UnavailableCompletionService,
  createCompletionService,
  type CompletionOptions,
  type CompletionService,
} from "../CompletionService";

// Never answers; rejects once aborted.
class HangingCompletionService implements CompletionService {
  readonly name = "hanging";
  aborted = false;

  complete(_prompt: string, _system: string, options?: CompletionOptions): Promise<string> {
    return new Promise((_resolve, reject) => {
      options?.signal?.addEventListener("abort", () => {
        this.aborted = true;
        reject(new Error("aborted"));
      });
    });
  }
}

describe("UnavailableCompletionService", () => {
  it("always rejects", async () => {
    await assert.rejects(new UnavailableCompletionService().complete(), CompletionUnavailableError);
  });
});

describe("TimedCompletionService", () => {
  it("times out and aborts the inner request", async () => {
    const inner = new HangingCompletionService();
    const timed = new TimedCompletionService(inner, 20);
    await assert.rejects(timed.complete("prompt", "system"), CompletionTimeoutError);
    assert.equal(inner.aborted, true);
  });

  it("passes through a timely reply", async () => {
    const inner: CompletionService = { name: "echo", complete: async (prompt) => `echo:${prompt}` };
    assert.equal(await new TimedCompletionService(inner, 1000).complete("hi", "system"), "echo:hi");
  });
});

describe("createCompletionService", () => {
  it("returns the unavailable client without an API key", () => {
    const service = createCompletionService({ model: "gpt-4o-mini", timeoutMs: 1000 });
    assert.ok(service instanceof UnavailableCompletionService);
  });

  it("wraps the OpenAI client with a timeout when a key is set", () => {
    const service = createCompletionService({ apiKey: "test-key", model: "gpt-4o-mini", timeoutMs: 1000 });
    assert.ok(service instanceof TimedCompletionService);
    assert.equal(service.name, "openai");
  });
});
