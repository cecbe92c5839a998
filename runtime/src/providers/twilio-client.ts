import { z } from "zod";
import type { SmsProvider, VoiceProvider } from "../capabilities.js";
import type { TwilioConfig } from "../config.js";
import { ProviderError } from "../errors.js";

const twilioResourceSchema = z.object({
  sid: z.string().optional(),
  message: z.string().optional(),
  code: z.number().optional(),
});

const TWILIO_API_BASE = "https://api.twilio.com/2010-04-01";

/**
 * Sends SMS and places text-to-speech calls through the Twilio REST API.
 */
export class TwilioClient implements SmsProvider, VoiceProvider {
  private readonly fetchImpl: typeof fetch;

  constructor(
    private readonly config: TwilioConfig,
    deps: { fetch?: typeof fetch } = {},
  ) {
    this.fetchImpl = deps.fetch ?? fetch;
    if (!this.isConfigured()) {
      console.warn(
        "⚠️ Twilio credentials are not set. Voice and SMS steps will fail until TWILIO_ACCOUNT_SID, TWILIO_AUTH_TOKEN and TWILIO_PHONE_NUMBER are configured.",
      );
    }
  }

  isConfigured(): boolean {
    return Boolean(
      this.config.accountSid && this.config.authToken && this.config.fromNumber,
    );
  }

  async send(recipient: string, text: string): Promise<string> {
    return this.create("Messages", {
      To: recipient,
      From: this.config.fromNumber || "",
      Body: text,
    });
  }

  async call(recipient: string, text: string): Promise<string> {
    return this.create("Calls", {
      To: recipient,
      From: this.config.fromNumber || "",
      Twiml: buildSayTwiml(text),
    });
  }

  private async create(
    resource: "Messages" | "Calls",
    fields: Record<string, string>,
  ): Promise<string> {
    const { accountSid, authToken } = this.config;
    if (!accountSid || !authToken || !this.config.fromNumber) {
      throw new ProviderError("twilio", "Twilio client not initialized.");
    }

    const credentials = Buffer.from(`${accountSid}:${authToken}`).toString(
      "base64",
    );
    let response: Response;
    try {
      response = await this.fetchImpl(
        `${TWILIO_API_BASE}/Accounts/${encodeURIComponent(accountSid)}/${resource}.json`,
        {
          method: "POST",
          headers: {
            authorization: `Basic ${credentials}`,
            "content-type": "application/x-www-form-urlencoded",
          },
          body: new URLSearchParams(fields).toString(),
        },
      );
    } catch (error) {
      throw new ProviderError(
        "twilio",
        `Twilio request failed: ${error instanceof Error ? error.message : String(error)}`,
        { cause: error },
      );
    }

    const parsed = twilioResourceSchema.safeParse(
      await response.json().catch(() => null),
    );
    const data: z.infer<typeof twilioResourceSchema> = parsed.success
      ? parsed.data
      : {};
    if (!response.ok || !data.sid) {
      throw new ProviderError(
        "twilio",
        `Twilio ${resource} API error (${response.status}): ${data.message || response.statusText || "unknown error"}`,
      );
    }
    return data.sid;
  }
}

export function buildSayTwiml(message: string): string {
  return `<Response><Say>${escapeXml(message)}</Say></Response>`;
}

function escapeXml(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&apos;");
}
