import { z } from "zod";
import type { MessagingProvider } from "../capabilities.js";
import type { SlackConfig } from "../config.js";
import { ProviderError } from "../errors.js";

const slackResponseSchema = z.object({
  ok: z.boolean(),
  error: z.string().optional(),
  ts: z.string().optional(),
});

/**
 * Posts messages through the Slack Web API (chat.postMessage).
 */
export class SlackClient implements MessagingProvider {
  private readonly fetchImpl: typeof fetch;

  constructor(
    private readonly config: SlackConfig,
    deps: { fetch?: typeof fetch } = {},
  ) {
    this.fetchImpl = deps.fetch ?? fetch;
    if (!config.botToken) {
      console.warn(
        "⚠️ SLACK_BOT_TOKEN is not set. Messaging steps will fail until it is configured.",
      );
    }
  }

  async post(channel: string, text: string): Promise<void> {
    const token = this.config.botToken;
    if (!token) {
      throw new ProviderError(
        "slack",
        "Slack client not initialized. Check SLACK_BOT_TOKEN.",
      );
    }

    let response: Response;
    try {
      response = await this.fetchImpl("https://slack.com/api/chat.postMessage", {
        method: "POST",
        headers: {
          "content-type": "application/json; charset=utf-8",
          authorization: `Bearer ${token}`,
        },
        body: JSON.stringify({ channel, text }),
      });
    } catch (error) {
      throw new ProviderError(
        "slack",
        `Error posting to Slack: ${error instanceof Error ? error.message : String(error)}`,
        { cause: error },
      );
    }

    const parsed = slackResponseSchema.safeParse(
      await response.json().catch(() => null),
    );
    const data = parsed.success
      ? parsed.data
      : { ok: false, error: response.statusText || "invalid_response" };
    if (!response.ok || !data.ok) {
      throw new ProviderError(
        "slack",
        `Error posting to Slack: ${data.error || response.statusText || "unknown_error"}`,
      );
    }

    console.log(`💬 Message posted to ${channel}`);
  }
}
