import { vi } from "vitest";
import type {
  CompletionOracle,
  PromptData,
  TemplateId,
} from "../../agent/src/index.js";
import type {
  CalendarProvider,
  CapabilityProviders,
  KnowledgeProvider,
  MessagingProvider,
  SearchProvider,
  SmsProvider,
  VoiceProvider,
} from "../../runtime/src/capabilities.js";

export interface OracleCall {
  promptData: PromptData;
  template: TemplateId;
  expectJson: boolean;
}

/**
 * Oracle that replays queued responses per template. An Error in the
 * queue is thrown instead of returned.
 */
export class ScriptedOracle implements CompletionOracle {
  readonly calls: OracleCall[] = [];

  constructor(
    private readonly responses: Partial<Record<TemplateId, unknown[]>> = {},
  ) {}

  async complete(
    promptData: PromptData,
    template: TemplateId,
    expectJson: boolean,
  ): Promise<unknown> {
    this.calls.push({ promptData, template, expectJson });
    const queue = this.responses[template];
    if (!queue || queue.length === 0) {
      throw new Error(`No scripted response for ${template}`);
    }
    const next = queue.shift();
    if (next instanceof Error) throw next;
    return next;
  }
}

export function createProviders() {
  return {
    messaging: {
      post: vi.fn<MessagingProvider["post"]>().mockResolvedValue(undefined),
    },
    knowledge: {
      answer: vi.fn<KnowledgeProvider["answer"]>().mockResolvedValue(""),
    },
    search: {
      query: vi
        .fn<SearchProvider["query"]>()
        .mockResolvedValue("No results found."),
    },
    calendar: {
      createEvent: vi
        .fn<CalendarProvider["createEvent"]>()
        .mockResolvedValue("https://calendar.example.com/event/1"),
    },
    sms: { send: vi.fn<SmsProvider["send"]>().mockResolvedValue("SM-test-1") },
    voice: { call: vi.fn<VoiceProvider["call"]>().mockResolvedValue("CA-test-1") },
  } satisfies CapabilityProviders;
}

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "content-type": "application/json" },
  });
}
