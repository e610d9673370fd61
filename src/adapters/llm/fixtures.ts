import { LlmClientError } from "./errors.js";
import type { GenerateContext, LlmClient, LlmResponse } from "./types.js";

export interface RecordedCall {
  prompt: string;
  context: GenerateContext;
}

type Responder = (prompt: string, context: GenerateContext) => string;

/**
 * Deterministic client for tests and offline runs.
 *
 * Answers from a scripted sequence (cycling), a responder function, or a
 * default answer, in that order. Every call is recorded.
 */
export class FixturesLlmClient implements LlmClient {
  readonly name = "fixtures";
  readonly model = "fixture-v1";

  readonly calls: RecordedCall[] = [];

  private responses: string[] = [];
  private responseIndex = 0;
  private responder: Responder | null = null;
  private failAfter: number | null = null;

  constructor(private readonly defaultResponse = '{"features": []}') {}

  setResponses(responses: string[]): this {
    this.responses = [...responses];
    this.responseIndex = 0;
    return this;
  }

  setResponder(responder: Responder): this {
    this.responder = responder;
    return this;
  }

  /** Fail every call once `n` calls have succeeded */
  setErrorAfter(n: number): this {
    this.failAfter = n;
    return this;
  }

  reset(): void {
    this.calls.length = 0;
    this.responseIndex = 0;
  }

  async generate(prompt: string, context: GenerateContext = {}): Promise<LlmResponse> {
    this.calls.push({ prompt, context });

    if (this.failAfter !== null && this.calls.length > this.failAfter) {
      throw new LlmClientError("fixtures: simulated failure", this.name);
    }

    let content: string;
    if (this.responses.length > 0) {
      content = this.responses[this.responseIndex % this.responses.length];
      this.responseIndex += 1;
    } else if (this.responder) {
      content = this.responder(prompt, context);
    } else {
      content = this.defaultResponse;
    }

    return {
      content,
      model: this.model,
      usage: { input_tokens: 0, output_tokens: 0 },
    };
  }
}
