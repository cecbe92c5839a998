import { z } from "zod";
import {
  completeText,
  describeError,
  type CompletionOracle,
} from "../../agent/src/index.js";
import {
  CapabilityKind,
  type CalendarEventDetails,
  type CapabilityProviders,
} from "./capabilities.js";
import { interpolate, type RunContext } from "./context.js";
import { ExtractionIncompleteError } from "./errors.js";
import type { PlanStep } from "./plan.js";

export interface StepOutcome {
  succeeded: boolean;
  resultMessage: string;
}

export interface StepExecutorOptions {
  /** How long an Unknown step pretends to work. */
  simulatedActionDelayMs: number;
  now?: () => Date;
}

export const CONTEXT_KEYS = {
  searchResult: "search_result",
  knowledgeAnswer: "knowledge_answer",
} as const;

type StepHandler = (
  action: string,
  context: RunContext,
  step: PlanStep,
) => Promise<string>;

type DispatchableKind = Exclude<CapabilityKind, CapabilityKind.Unknown>;

// Numbers are accepted for phone numbers; blank strings count as missing.
const textField = z
  .union([z.string(), z.number()])
  .transform((value) => String(value).trim())
  .transform((value) => (value.length > 0 ? value : undefined))
  .optional()
  .catch(undefined);

const messagingFields = z.object({
  channel: textField,
  message: textField,
});

const calendarFields = z.object({
  title: textField,
  start_time: textField,
  end_time: textField,
});

const voiceSmsFields = z.object({
  type: textField,
  recipient: textField,
  message: textField,
});

/**
 * Runs one plan step against its capability provider. Never throws: any
 * failure becomes an unsuccessful outcome with the cause in its message.
 */
export class StepExecutor {
  private readonly handlers: Record<DispatchableKind, StepHandler>;
  private readonly now: () => Date;

  constructor(
    private readonly oracle: CompletionOracle,
    private readonly providers: CapabilityProviders,
    private readonly options: StepExecutorOptions,
  ) {
    this.now = options.now ?? (() => new Date());
    this.handlers = {
      [CapabilityKind.Messaging]: (action, context) =>
        this.runMessaging(action, context),
      [CapabilityKind.Knowledge]: (action, context) =>
        this.runKnowledge(action, context),
      [CapabilityKind.Search]: (action, context) =>
        this.runSearch(action, context),
      [CapabilityKind.Calendar]: (action) => this.runCalendar(action),
      [CapabilityKind.VoiceSms]: (action, context) =>
        this.runVoiceSms(action, context),
    };
  }

  async execute(step: PlanStep, context: RunContext): Promise<StepOutcome> {
    try {
      const action =
        step.resolvedAction ?? interpolate(step.action, context, "tolerant");
      const resultMessage =
        step.agent === CapabilityKind.Unknown
          ? await this.runSimulated(step, action)
          : await this.handlers[step.agent](action, context, step);
      return { succeeded: true, resultMessage };
    } catch (error) {
      console.error(
        `❌ ${step.agentName} step failed: ${describeError(error)}`,
      );
      return {
        succeeded: false,
        resultMessage: `Action failed. Error: ${describeError(error)}`,
      };
    }
  }

  private async runMessaging(
    action: string,
    context: RunContext,
  ): Promise<string> {
    const fields = await this.extract(
      action,
      "messaging_parser",
      messagingFields,
    );
    const missing = missingFields(fields, ["channel", "message"]);
    if (!fields.channel || !fields.message) {
      throw new ExtractionIncompleteError("Messaging", missing);
    }

    const message = interpolate(fields.message, context, "strict");
    await this.providers.messaging.post(fields.channel, message);
    return `Message successfully posted to Slack channel ${fields.channel}.`;
  }

  private async runKnowledge(
    action: string,
    context: RunContext,
  ): Promise<string> {
    const answer = await this.providers.knowledge.answer(action);
    context.set(CONTEXT_KEYS.knowledgeAnswer, answer);
    return `Knowledge Base Answer: ${answer}`;
  }

  private async runSearch(
    action: string,
    context: RunContext,
  ): Promise<string> {
    const query = await completeText(
      this.oracle,
      { action_text: action },
      "search_query_parser",
    );
    const results = await this.providers.search.query(query);
    context.set(CONTEXT_KEYS.searchResult, results);
    return `Search for '${query}' found: ${results}`;
  }

  private async runCalendar(action: string): Promise<string> {
    const raw = await this.oracle.complete(
      { action_text: action, current_date: formatCurrentDate(this.now()) },
      "calendar_parser",
      true,
    );
    const fields = parseFields(raw, calendarFields);

    // Missing times are left for the provider to reject.
    const details: CalendarEventDetails = {};
    if (fields.title) details.title = fields.title;
    if (fields.start_time) details.start_time = fields.start_time;
    if (fields.end_time) details.end_time = fields.end_time;

    const link = await this.providers.calendar.createEvent(details);
    return `Successfully created event. View: ${link}`;
  }

  private async runVoiceSms(
    action: string,
    context: RunContext,
  ): Promise<string> {
    const fields = await this.extract(
      action,
      "voice_sms_parser",
      voiceSmsFields,
    );
    if (!fields.recipient || !fields.message) {
      throw new ExtractionIncompleteError(
        "Voice/SMS",
        missingFields(fields, ["recipient", "message"]),
      );
    }

    const message = interpolate(fields.message, context, "strict");
    if (fields.type?.toLowerCase() === "call") {
      const callId = await this.providers.voice.call(fields.recipient, message);
      return `Call to ${fields.recipient} initiated. SID: ${callId}`;
    }
    const messageId = await this.providers.sms.send(fields.recipient, message);
    return `SMS to ${fields.recipient} sent successfully. SID: ${messageId}`;
  }

  private async runSimulated(step: PlanStep, action: string): Promise<string> {
    console.log(`🧪 Executing (simulated): ${step.agentName} -> ${action}`);
    await waitMs(this.options.simulatedActionDelayMs);
    return `Simulated action '${action}' completed.`;
  }

  private async extract<S extends z.ZodTypeAny>(
    action: string,
    template: "messaging_parser" | "voice_sms_parser",
    schema: S,
  ): Promise<z.output<S>> {
    const raw = await this.oracle.complete(
      { action_text: action },
      template,
      true,
    );
    return parseFields(raw, schema);
  }
}

function parseFields<S extends z.ZodTypeAny>(
  raw: unknown,
  schema: S,
): z.output<S> {
  const parsed = schema.safeParse(raw);
  if (parsed.success) return parsed.data;
  // Not an object at all: every field is missing.
  return schema.parse({});
}

function missingFields<T extends Record<string, string | undefined>>(
  fields: T,
  keys: Array<keyof T & string>,
): string[] {
  return keys.filter((key) => !fields[key]);
}

/**
 * "Monday, 2026-10-19" in local time.
 */
export function formatCurrentDate(date: Date): string {
  const weekday = date.toLocaleDateString("en-US", { weekday: "long" });
  const year = date.getFullYear();
  const month = String(date.getMonth() + 1).padStart(2, "0");
  const day = String(date.getDate()).padStart(2, "0");
  return `${weekday}, ${year}-${month}-${day}`;
}

export async function waitMs(ms: number): Promise<void> {
  if (ms <= 0) return;
  await new Promise((resolve) => setTimeout(resolve, ms));
}
