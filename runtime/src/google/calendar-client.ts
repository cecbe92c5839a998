import { google } from "googleapis";
import type { calendar_v3 } from "googleapis";
import type {
  CalendarEventDetails,
  CalendarProvider,
} from "../capabilities.js";
import type { GoogleCalendarConfig } from "../config.js";
import { ProviderError } from "../errors.js";

/**
 * Google Calendar API client.
 * Creates events on the configured calendar and returns their html link.
 */
export class CalendarClient implements CalendarProvider {
  private calendar: calendar_v3.Calendar | undefined;

  constructor(private readonly config: GoogleCalendarConfig) {
    if (!this.isConfigured()) {
      console.warn(
        "⚠️ Google Calendar credentials are not set. Calendar steps will fail until GOOGLE_CLIENT_ID, GOOGLE_CLIENT_SECRET and GOOGLE_REFRESH_TOKEN are configured.",
      );
    }
  }

  isConfigured(): boolean {
    return Boolean(
      this.config.clientId &&
        this.config.clientSecret &&
        this.config.refreshToken,
    );
  }

  async createEvent(details: CalendarEventDetails): Promise<string> {
    const missing = (["start_time", "end_time"] as const).filter(
      (key) => !details[key],
    );
    if (missing.length > 0) {
      throw new ProviderError(
        "google-calendar",
        `Calendar event is missing ${missing.join(" and ")}.`,
      );
    }

    const event: calendar_v3.Schema$Event = {
      summary: details.title || "(no title)",
      start: {
        dateTime: details.start_time,
        timeZone: this.config.timeZone,
      },
      end: {
        dateTime: details.end_time,
        timeZone: this.config.timeZone,
      },
    };

    try {
      const response = await this.getCalendar().events.insert({
        calendarId: this.config.calendarId,
        requestBody: event,
      });
      return response.data.htmlLink || "";
    } catch (error) {
      if (error instanceof ProviderError) throw error;
      throw new ProviderError(
        "google-calendar",
        `Google Calendar API Error: ${error instanceof Error ? error.message : String(error)}`,
        { cause: error },
      );
    }
  }

  private getCalendar(): calendar_v3.Calendar {
    if (this.calendar) return this.calendar;

    const { clientId, clientSecret, refreshToken } = this.config;
    if (!clientId || !clientSecret || !refreshToken) {
      throw new ProviderError(
        "google-calendar",
        "Google Calendar client not initialized. Check GOOGLE_CLIENT_ID, GOOGLE_CLIENT_SECRET and GOOGLE_REFRESH_TOKEN.",
      );
    }

    const auth = new google.auth.OAuth2(clientId, clientSecret);
    auth.setCredentials({ refresh_token: refreshToken });
    this.calendar = google.calendar({ version: "v3", auth });
    return this.calendar;
  }
}
