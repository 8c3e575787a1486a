/**
 * LLM access
 * The rest of the system treats the model as `prompt → text`: slow, and
 * free to ignore the output format it was asked for.
 */
import Anthropic from "@anthropic-ai/sdk";

export interface CompletionOptions {
  system?: string;
  maxTokens?: number;
}

export interface LlmClient {
  complete(prompt: string, options?: CompletionOptions): Promise<string>;
}

export class LlmUnavailableError extends Error {
  constructor(message = "LLM is not configured") {
    super(message);
    this.name = "LlmUnavailableError";
  }
}

export interface AnthropicLlmOptions {
  apiKey: string;
  model: string;
  timeoutMs: number;
}

export class AnthropicLlm implements LlmClient {
  private client: Anthropic | null = null;

  constructor(private readonly options: AnthropicLlmOptions) {}

  // Lazy so a missing key only fails the calls, not startup
  private getClient(): Anthropic {
    if (!this.options.apiKey) throw new LlmUnavailableError();
    if (!this.client) {
      this.client = new Anthropic({ apiKey: this.options.apiKey, maxRetries: 1 });
    }
    return this.client;
  }

  async complete(prompt: string, options: CompletionOptions = {}): Promise<string> {
    const client = this.getClient();
    const response = await client.messages.create(
      {
        model: this.options.model,
        max_tokens: options.maxTokens ?? 1024,
        temperature: 0,
        ...(options.system ? { system: options.system } : {}),
        messages: [{ role: "user", content: prompt }],
      },
      { timeout: this.options.timeoutMs }
    );

    return response.content
      .map((block) => (block.type === "text" ? block.text : ""))
      .join("")
      .trim();
  }
}
