import { config } from "dotenv";
import { homedir } from "os";
import { join } from "path";
import { existsSync, readFileSync } from "fs";
import { z } from "zod";
import type { CompletionConfig, LLMProvider } from "../../agent/src/index.js";

export const CONDUCTOR_DIR = join(homedir(), ".conductor");

/**
 * Load environment variables from ~/.conductor/.env, then ./.env.
 * Safe to call multiple times; only loads once.
 */
let envLoaded = false;
export function ensureEnvLoaded(): void {
  if (envLoaded) return;
  config({ path: join(CONDUCTOR_DIR, ".env") });
  config();
  envLoaded = true;
}

const fileConfigSchema = z
  .object({
    llm: z
      .object({
        provider: z.enum(["google", "openai", "anthropic"]).optional(),
        model: z.string().optional(),
        baseUrl: z.string().optional(),
        timeoutMs: z.number().int().positive().optional(),
      })
      .optional(),
    gateway: z
      .object({
        port: z.number().int().positive().optional(),
        host: z.string().optional(),
      })
      .optional(),
    calendar: z
      .object({
        calendarId: z.string().optional(),
        timeZone: z.string().optional(),
      })
      .optional(),
    search: z
      .object({ maxResults: z.number().int().positive().optional() })
      .optional(),
    knowledgeDir: z.string().optional(),
    logDir: z.string().optional(),
    stepDelayMs: z.number().int().nonnegative().optional(),
    simulatedActionDelayMs: z.number().int().nonnegative().optional(),
  })
  .passthrough();

export type FileConfig = z.infer<typeof fileConfigSchema>;

/**
 * Load ~/.conductor/config.json. Returns an empty object if the file
 * doesn't exist or is invalid.
 */
export function loadConductorConfig(
  configPath = join(CONDUCTOR_DIR, "config.json"),
): FileConfig {
  if (!existsSync(configPath)) return {};
  try {
    const parsed = fileConfigSchema.safeParse(
      JSON.parse(readFileSync(configPath, "utf-8")),
    );
    if (!parsed.success) {
      console.warn(
        `⚠️ Ignoring invalid ${configPath}: ${parsed.error.issues
          .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
          .join("; ")}`,
      );
      return {};
    }
    return parsed.data;
  } catch (error) {
    console.warn(`⚠️ Could not read ${configPath}:`, error);
    return {};
  }
}

export interface SlackConfig {
  botToken?: string;
}

export interface TwilioConfig {
  accountSid?: string;
  authToken?: string;
  fromNumber?: string;
}

export interface GoogleCalendarConfig {
  clientId?: string;
  clientSecret?: string;
  refreshToken?: string;
  calendarId: string;
  timeZone: string;
}

export interface SearchConfig {
  braveApiKey?: string;
  maxResults: number;
  timeoutMs: number;
}

export interface RuntimeConfig {
  llm: CompletionConfig;
  slack: SlackConfig;
  twilio: TwilioConfig;
  calendar: GoogleCalendarConfig;
  search: SearchConfig;
  knowledgeDir: string;
  logDir: string;
  stepDelayMs: number;
  simulatedActionDelayMs: number;
  gateway: { port: number; host: string };
}

const DEFAULT_MODELS: Record<LLMProvider, string> = {
  google: "gemini-2.0-flash",
  openai: "gpt-4o-mini",
  anthropic: "claude-3-5-sonnet-20241022",
};

const PROVIDERS: readonly LLMProvider[] = ["google", "openai", "anthropic"];

/**
 * Builds the configuration every component receives. Environment
 * variables win over config.json; nothing here reads global state.
 */
export function resolveRuntimeConfig(
  env: NodeJS.ProcessEnv,
  file: FileConfig = {},
): RuntimeConfig {
  const provider =
    parseProvider(env.CONDUCTOR_LLM_PROVIDER) ?? file.llm?.provider ?? "google";

  return {
    llm: {
      provider,
      model:
        nonEmpty(env.CONDUCTOR_LLM_MODEL) ??
        file.llm?.model ??
        DEFAULT_MODELS[provider],
      apiKey: nonEmpty(env.CONDUCTOR_LLM_API_KEY) ?? providerApiKey(provider, env),
      baseUrl: nonEmpty(env.CONDUCTOR_LLM_BASE_URL) ?? file.llm?.baseUrl,
      timeoutMs: parsePositiveInt(
        env.CONDUCTOR_LLM_TIMEOUT_MS,
        file.llm?.timeoutMs ?? 60_000,
      ),
    },
    slack: { botToken: nonEmpty(env.SLACK_BOT_TOKEN) },
    twilio: {
      accountSid: nonEmpty(env.TWILIO_ACCOUNT_SID),
      authToken: nonEmpty(env.TWILIO_AUTH_TOKEN),
      fromNumber: nonEmpty(env.TWILIO_PHONE_NUMBER),
    },
    calendar: {
      clientId: nonEmpty(env.GOOGLE_CLIENT_ID),
      clientSecret: nonEmpty(env.GOOGLE_CLIENT_SECRET),
      refreshToken: nonEmpty(env.GOOGLE_REFRESH_TOKEN),
      calendarId:
        nonEmpty(env.GOOGLE_CALENDAR_ID) ??
        file.calendar?.calendarId ??
        "primary",
      timeZone:
        nonEmpty(env.CONDUCTOR_TIMEZONE) ??
        file.calendar?.timeZone ??
        Intl.DateTimeFormat().resolvedOptions().timeZone,
    },
    search: {
      braveApiKey: nonEmpty(env.BRAVE_SEARCH_API_KEY),
      maxResults: parsePositiveInt(
        env.CONDUCTOR_SEARCH_MAX_RESULTS,
        file.search?.maxResults ?? 3,
      ),
      timeoutMs: parsePositiveInt(env.CONDUCTOR_SEARCH_TIMEOUT_MS, 15_000),
    },
    knowledgeDir:
      nonEmpty(env.CONDUCTOR_KNOWLEDGE_DIR) ??
      file.knowledgeDir ??
      join(CONDUCTOR_DIR, "knowledge_base"),
    logDir: nonEmpty(env.CONDUCTOR_LOG_DIR) ?? file.logDir ?? CONDUCTOR_DIR,
    stepDelayMs: parseNonNegativeInt(
      env.CONDUCTOR_STEP_DELAY_MS,
      file.stepDelayMs ?? 1000,
    ),
    simulatedActionDelayMs: parseNonNegativeInt(
      env.CONDUCTOR_SIMULATED_DELAY_MS,
      file.simulatedActionDelayMs ?? 2000,
    ),
    gateway: {
      port: parsePositiveInt(env.PORT, file.gateway?.port ?? 18800),
      host: nonEmpty(env.HOST) ?? file.gateway?.host ?? "127.0.0.1",
    },
  };
}

export function loadRuntimeConfig(): RuntimeConfig {
  ensureEnvLoaded();
  return resolveRuntimeConfig(process.env, loadConductorConfig());
}

export function parsePositiveInt(
  value: string | undefined,
  fallback: number,
): number {
  const parsed = Number.parseInt(value || "", 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

export function parseNonNegativeInt(
  value: string | undefined,
  fallback: number,
): number {
  const parsed = Number.parseInt(value || "", 10);
  return Number.isFinite(parsed) && parsed >= 0 ? parsed : fallback;
}

function parseProvider(value: string | undefined): LLMProvider | undefined {
  const normalized = value?.trim().toLowerCase();
  return PROVIDERS.find((provider) => provider === normalized);
}

function providerApiKey(
  provider: LLMProvider,
  env: NodeJS.ProcessEnv,
): string | undefined {
  switch (provider) {
    case "google":
      return nonEmpty(env.GEMINI_API_KEY);
    case "openai":
      return nonEmpty(env.OPENAI_API_KEY);
    case "anthropic":
      return nonEmpty(env.ANTHROPIC_API_KEY);
  }
}

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}
