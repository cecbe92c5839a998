import {
  CompletionClient,
  type CompletionOracle,
} from "../../agent/src/index.js";
import type { CapabilityProviders } from "./capabilities.js";
import type { RuntimeConfig } from "./config.js";
import { StepExecutor } from "./executor.js";
import { CalendarClient } from "./google/calendar-client.js";
import { KnowledgeBase } from "./providers/knowledge-base.js";
import { SearchService } from "./providers/search-service.js";
import { SlackClient } from "./providers/slack-client.js";
import { TwilioClient } from "./providers/twilio-client.js";

export * from "./capabilities.js";
export * from "./config.js";
export * from "./context.js";
export * from "./errors.js";
export * from "./event-bus.js";
export * from "./events.js";
export * from "./executor.js";
export * from "./orchestrator.js";
export * from "./plan.js";

export interface Runtime {
  config: RuntimeConfig;
  oracle: CompletionOracle;
  providers: CapabilityProviders;
  executor: StepExecutor;
}

export interface RuntimeOverrides {
  oracle?: CompletionOracle;
  providers?: Partial<CapabilityProviders>;
}

/**
 * Wires the completion client and every capability provider from one
 * configuration object. Overrides replace individual pieces (tests,
 * alternative integrations).
 */
export function createRuntime(
  config: RuntimeConfig,
  overrides: RuntimeOverrides = {},
): Runtime {
  const oracle = overrides.oracle ?? new CompletionClient(config.llm);
  const twilio = new TwilioClient(config.twilio);

  const providers: CapabilityProviders = {
    messaging: overrides.providers?.messaging ?? new SlackClient(config.slack),
    knowledge:
      overrides.providers?.knowledge ??
      new KnowledgeBase(config.knowledgeDir, oracle),
    search: overrides.providers?.search ?? new SearchService(config.search),
    calendar:
      overrides.providers?.calendar ?? new CalendarClient(config.calendar),
    sms: overrides.providers?.sms ?? twilio,
    voice: overrides.providers?.voice ?? twilio,
  };

  const executor = new StepExecutor(oracle, providers, {
    simulatedActionDelayMs: config.simulatedActionDelayMs,
  });

  return { config, oracle, providers, executor };
}
