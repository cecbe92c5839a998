import { afterEach, describe, expect, it, vi } from "vitest";
import { CompletionClient } from "../../agent/src/index.js";
import {
  RunContext,
  createRuntime,
  resolveCapability,
  resolveRuntimeConfig,
} from "../../runtime/src/index.js";
import { KnowledgeBase } from "../../runtime/src/providers/knowledge-base.js";
import { SlackClient } from "../../runtime/src/providers/slack-client.js";
import { TwilioClient } from "../../runtime/src/providers/twilio-client.js";
import { ScriptedOracle, createProviders } from "../helpers/fakes.js";

afterEach(() => {
  vi.restoreAllMocks();
});

describe("createRuntime", () => {
  it("wires default providers from configuration", () => {
    vi.spyOn(console, "warn").mockImplementation(() => {});

    const runtime = createRuntime(resolveRuntimeConfig({}));

    expect(runtime.oracle).toBeInstanceOf(CompletionClient);
    expect(runtime.providers.messaging).toBeInstanceOf(SlackClient);
    expect(runtime.providers.knowledge).toBeInstanceOf(KnowledgeBase);
    expect(runtime.providers.sms).toBeInstanceOf(TwilioClient);
    expect(runtime.providers.sms).toBe(runtime.providers.voice);
  });

  it("uses overrides in place of the defaults", async () => {
    vi.spyOn(console, "warn").mockImplementation(() => {});
    const oracle = new ScriptedOracle({
      messaging_parser: [{ channel: "#ops", message: "deployed" }],
    });
    const fakes = createProviders();

    const runtime = createRuntime(
      resolveRuntimeConfig({ CONDUCTOR_SIMULATED_DELAY_MS: "0" }),
      { oracle, providers: { messaging: fakes.messaging } },
    );
    const outcome = await runtime.executor.execute(
      {
        agent: resolveCapability("SlackAgent"),
        agentName: "SlackAgent",
        action: "tell #ops we deployed",
        status: "pending",
      },
      new RunContext(),
    );

    expect(runtime.oracle).toBe(oracle);
    expect(runtime.config.simulatedActionDelayMs).toBe(0);
    expect(outcome.succeeded).toBe(true);
    expect(fakes.messaging.post).toHaveBeenCalledWith("#ops", "deployed");
  });
});
