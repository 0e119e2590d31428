import OpenAI from "openai";
import type { AppConfig } from "../config/AppConfig";

// The only gateway to LLM execution. Callers pass a task-specific prompt and
// system instructions; provider routing and keys live behind this interface.

export interface CompletionOptions {
  readonly signal?: AbortSignal;
}

export interface CompletionService {
  readonly name: string;
  complete(prompt: string, systemInstructions: string, options?: CompletionOptions): Promise<string>;
}

export class CompletionUnavailableError extends Error {
  constructor(message = "No completion provider is configured.") {
    super(message);
    this.name = "CompletionUnavailableError";
  }
}

export class CompletionTimeoutError extends Error {
  constructor(readonly timeoutMs: number) {
    super(`Completion timed out after ${timeoutMs}ms.`);
    this.name = "CompletionTimeoutError";
  }
}

export class OpenAICompletionService implements CompletionService {
  readonly name = "openai";
  private readonly client: OpenAI;

  constructor(
    apiKey: string,
    private readonly model: string,
    timeoutMs: number,
  ) {
    // Retries are disabled; the caller owns the fallback path.
    this.client = new OpenAI({ apiKey, timeout: timeoutMs, maxRetries: 0 });
  }

  async complete(prompt: string, systemInstructions: string, options?: CompletionOptions): Promise<string> {
    const response = await this.client.chat.completions.create(
      {
        model: this.model,
        temperature: 0,
        max_tokens: 800,
        response_format: { type: "json_object" },
        messages: [
          { role: "system", content: systemInstructions },
          { role: "user", content: prompt },
        ],
      },
      { signal: options?.signal },
    );

    const content = response.choices[0]?.message?.content;
    if (!content || !content.trim()) throw new Error("Completion returned no content.");
    return content.trim();
  }
}

export class UnavailableCompletionService implements CompletionService {
  readonly name = "unavailable";

  async complete(): Promise<string> {
    throw new CompletionUnavailableError();
  }
}

// Expiry rejects with CompletionTimeoutError and aborts the underlying request.
export class TimedCompletionService implements CompletionService {
  constructor(
    private readonly inner: CompletionService,
    readonly timeoutMs: number,
  ) {}

  get name(): string {
    return this.inner.name;
  }

  async complete(prompt: string, systemInstructions: string): Promise<string> {
    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;

    const expired = new Promise<never>((_resolve, reject) => {
      timer = setTimeout(() => {
        // Settle first so the race reports the timeout, not the abort.
        reject(new CompletionTimeoutError(this.timeoutMs));
        controller.abort();
      }, this.timeoutMs);
    });

    try {
      return await Promise.race([
        this.inner.complete(prompt, systemInstructions, { signal: controller.signal }),
        expired,
      ]);
    } finally {
      clearTimeout(timer);
    }
  }
}

export function createCompletionService(config: AppConfig["llm"]): CompletionService {
  if (!config.apiKey) {
    console.warn("[Completion] OPENAI_API_KEY not set; answers use deterministic fallbacks");
    return new UnavailableCompletionService();
  }
  return new TimedCompletionService(new OpenAICompletionService(config.apiKey, config.model, config.timeoutMs), config.timeoutMs);
}
