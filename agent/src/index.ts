import Anthropic from "@anthropic-ai/sdk";
import OpenAI from "openai";
import { z } from "zod";
import {
  MalformedResponseError,
  OracleConfigurationError,
  TemplateRenderError,
  TransportError,
  UpstreamError,
  describeError,
} from "./errors.js";
import { fetchText, RequestTimeoutError, type TextResponse } from "./http.js";
import { parseJsonPayload } from "./json.js";
import {
  PROMPT_TEMPLATES,
  fillTemplate,
  type PromptData,
  type TemplateId,
} from "./prompts.js";

export * from "./errors.js";
export { PROMPT_TEMPLATES, fillTemplate, type PromptData, type TemplateId };
export { parseJsonPayload, stripCodeFence } from "./json.js";
export { fetchText, RequestTimeoutError, type TextResponse } from "./http.js";

// LLM Provider types
export type LLMProvider = "google" | "openai" | "anthropic";

export interface CompletionConfig {
  provider: LLMProvider;
  model: string;
  apiKey?: string;
  /** Overrides the provider's default endpoint (Gemini REST base URL, OpenAI-compatible base URL). */
  baseUrl?: string;
  timeoutMs: number;
  temperature?: number;
  maxTokens?: number;
}

/** The part of an OpenAI chat completion the client reads. */
export interface ChatCompletionReply {
  choices: Array<{ message: { content: string | null } }>;
}

/** The part of an Anthropic message the client reads. */
export interface MessageReply {
  content: Array<{ type: string; text?: unknown }>;
}

export type OpenAIChatFn = (
  params: OpenAI.Chat.ChatCompletionCreateParamsNonStreaming,
) => Promise<ChatCompletionReply>;

export type AnthropicMessagesFn = (
  params: Anthropic.MessageCreateParamsNonStreaming,
) => Promise<MessageReply>;

export interface CompletionDeps {
  fetch?: typeof fetch;
  /** Replaces the OpenAI SDK round trip. */
  openaiChat?: OpenAIChatFn;
  /** Replaces the Anthropic SDK round trip. */
  anthropicMessages?: AnthropicMessagesFn;
}

/**
 * Anything that can answer a rendered prompt. The executor, the
 * orchestrator and the knowledge base depend on this, not on the client.
 */
export interface CompletionOracle {
  complete(
    promptData: PromptData,
    template: TemplateId,
    expectJson: boolean,
  ): Promise<unknown>;
}

export const DEFAULT_GEMINI_BASE_URL =
  "https://generativelanguage.googleapis.com/v1beta";

const geminiResponseSchema = z.object({
  candidates: z
    .array(
      z.object({
        content: z
          .object({
            parts: z.array(z.object({ text: z.string().optional() })).optional(),
          })
          .optional(),
      }),
    )
    .optional(),
});

/**
 * Single round trip to a completion service. No retries and no caching:
 * one call, one attempt.
 */
export class CompletionClient implements CompletionOracle {
  private openaiChat?: OpenAIChatFn;
  private anthropicMessages?: AnthropicMessagesFn;
  private readonly fetchImpl: typeof fetch;

  constructor(
    private readonly config: CompletionConfig,
    deps: CompletionDeps = {},
  ) {
    this.fetchImpl = deps.fetch ?? fetch;
    this.openaiChat = deps.openaiChat;
    this.anthropicMessages = deps.anthropicMessages;
  }

  async complete(
    promptData: PromptData,
    template: TemplateId,
    expectJson: boolean,
  ): Promise<unknown> {
    const prompt = renderTemplate(template, promptData);
    const text = await this.send(prompt);
    return expectJson ? parseJsonPayload(text) : text.trim();
  }

  private async send(prompt: string): Promise<string> {
    switch (this.config.provider) {
      case "google":
        return this.sendGemini(prompt);
      case "openai":
        return this.sendOpenAI(prompt);
      case "anthropic":
        return this.sendAnthropic(prompt);
    }
  }

  /**
   * Gemini generateContent over plain REST
   */
  private async sendGemini(prompt: string): Promise<string> {
    const apiKey = this.requireApiKey();
    const baseUrl = (this.config.baseUrl || DEFAULT_GEMINI_BASE_URL).replace(
      /\/+$/,
      "",
    );
    const url = `${baseUrl}/models/${encodeURIComponent(this.config.model)}:generateContent?key=${encodeURIComponent(apiKey)}`;

    const generationConfig: Record<string, number> = {};
    if (this.config.temperature !== undefined) {
      generationConfig.temperature = this.config.temperature;
    }
    if (this.config.maxTokens !== undefined) {
      generationConfig.maxOutputTokens = this.config.maxTokens;
    }

    let res: TextResponse;
    try {
      res = await fetchText(
        this.fetchImpl,
        url,
        {
          method: "POST",
          headers: { "content-type": "application/json" },
          body: JSON.stringify({
            contents: [{ parts: [{ text: prompt }] }],
            ...(Object.keys(generationConfig).length > 0
              ? { generationConfig }
              : {}),
          }),
        },
        this.config.timeoutMs,
      );
    } catch (error) {
      throw new TransportError(
        error instanceof RequestTimeoutError
          ? `Completion request timed out after ${error.timeoutMs}ms`
          : `Completion request failed: ${describeError(error)}`,
        { cause: error },
      );
    }

    if (!res.ok) {
      throw new UpstreamError(res.status, res.body);
    }

    let payload: unknown;
    try {
      payload = JSON.parse(res.body);
    } catch {
      throw new MalformedResponseError(
        "Invalid response from completion service: body is not JSON.",
      );
    }

    const data = geminiResponseSchema.safeParse(payload).data;
    if (!data?.candidates || data.candidates.length === 0) {
      throw new MalformedResponseError(
        "Invalid response from completion service: 'candidates' field is missing or empty.",
      );
    }
    const text = data.candidates[0].content?.parts?.[0]?.text;
    if (typeof text !== "string") {
      throw new MalformedResponseError(
        "Invalid response from completion service: candidate has no text part.",
      );
    }
    return text;
  }

  /**
   * OpenAI chat completion
   */
  private async sendOpenAI(prompt: string): Promise<string> {
    if (!this.openaiChat) {
      const client = new OpenAI(
        sdkClientOptions(this.config, this.requireApiKey()),
      );
      this.openaiChat = (params) => client.chat.completions.create(params);
    }

    try {
      const response = await this.openaiChat({
        model: this.config.model,
        messages: [{ role: "user", content: prompt }],
        temperature: this.config.temperature,
        max_tokens: this.config.maxTokens,
      });

      const content = response.choices?.[0]?.message?.content;
      if (typeof content !== "string") {
        throw new MalformedResponseError(
          "Invalid response from completion service: choice has no message content.",
        );
      }
      return content;
    } catch (error) {
      throw mapSdkError(error, OpenAI.APIConnectionError, OpenAI.APIError);
    }
  }

  /**
   * Anthropic messages API
   */
  private async sendAnthropic(prompt: string): Promise<string> {
    if (!this.anthropicMessages) {
      const client = new Anthropic(
        sdkClientOptions(this.config, this.requireApiKey()),
      );
      this.anthropicMessages = (params) => client.messages.create(params);
    }

    try {
      const response = await this.anthropicMessages({
        model: this.config.model,
        max_tokens: this.config.maxTokens || 4096,
        temperature: this.config.temperature,
        messages: [{ role: "user", content: prompt }],
      });

      for (const block of response.content) {
        if (block.type === "text" && typeof block.text === "string") {
          return block.text;
        }
      }
      throw new MalformedResponseError(
        "Invalid response from completion service: no text block in message.",
      );
    } catch (error) {
      throw mapSdkError(
        error,
        Anthropic.APIConnectionError,
        Anthropic.APIError,
      );
    }
  }

  private requireApiKey(): string {
    if (!this.config.apiKey) {
      throw new OracleConfigurationError(
        `No API key configured for the ${this.config.provider} completion provider. Set CONDUCTOR_LLM_API_KEY in ~/.conductor/.env.`,
      );
    }
    return this.config.apiKey;
  }
}

/**
 * Options shared by both SDK clients. The SDKs retry by default; a
 * completion is attempted exactly once.
 */
export function sdkClientOptions(config: CompletionConfig, apiKey: string) {
  return {
    apiKey,
    baseURL: config.baseUrl,
    timeout: config.timeoutMs,
    maxRetries: 0,
  };
}

export function renderTemplate(template: TemplateId, data: PromptData): string {
  const { text, missing } = fillTemplate(PROMPT_TEMPLATES[template], data);
  if (missing.length > 0) {
    throw new TemplateRenderError(template, missing);
  }
  return text;
}

/**
 * Text-mode completion narrowed to a string.
 */
export async function completeText(
  oracle: CompletionOracle,
  promptData: PromptData,
  template: TemplateId,
): Promise<string> {
  const output = await oracle.complete(promptData, template, false);
  if (typeof output !== "string") {
    throw new MalformedResponseError(
      `Expected text output for template '${template}'.`,
    );
  }
  return output;
}

type ErrorClass = abstract new (...args: never[]) => Error;

function mapSdkError(
  error: unknown,
  connectionError: ErrorClass,
  apiError: ErrorClass,
): Error {
  if (error instanceof MalformedResponseError) return error;
  if (error instanceof connectionError) {
    return new TransportError(
      `Completion request failed: ${describeError(error)}`,
      { cause: error },
    );
  }
  if (error instanceof apiError) {
    const status = readStatus(error);
    if (status !== undefined) {
      return new UpstreamError(status, error.message);
    }
    return new TransportError(
      `Completion request failed: ${describeError(error)}`,
      { cause: error },
    );
  }
  return new TransportError(
    `Completion request failed: ${describeError(error)}`,
    { cause: error },
  );
}

function readStatus(error: Error): number | undefined {
  if ("status" in error && typeof error.status === "number") {
    return error.status;
  }
  return undefined;
}
