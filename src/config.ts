// config.ts

import { readFile } from "node:fs/promises";

import { z } from "zod";

export const AVIASALES_BASE_URL = "https://api.travelpayouts.com";
export const AVIASALES_LINK_BASE = "https://www.aviasales.com";
export const TELEGRAM_API_BASE = "https://api.telegram.org";

export const DEFAULT_CONFIG_PATH = "./config.json";

// Throttling
export const MIN_REQUEST_GAP_MS = 350; // minimum gap between Aviasales calls
export const TELEGRAM_BETWEEN_MSG_MS = 350;

// Telegram rejects longer texts
export const TELEGRAM_MAX_MESSAGE_LENGTH = 4096;

export type NotifyMode = "combined" | "per_offer";

export interface Settings {
  readonly origin: string;
  readonly daysAhead: number;
  readonly basePrice: number;
  readonly baseDurationMinutes: number;
  readonly priceIncrement: number;
  readonly incrementMinutes: number;
  readonly currency: string;
  readonly market: string;
  readonly limit: number;
  readonly directOnly: boolean;
  readonly notifyMode: NotifyMode;

  readonly aviasalesToken: string;
  readonly telegramBotToken: string;
  readonly telegramChatId: string;
}

export const fileConfigSchema = z.object({
  origin: z.string().regex(/^[A-Za-z]{3}$/, "expected a 3-letter IATA code").default("BUD"),
  days_ahead: z.number().int().min(1).default(3),
  base_price_eur: z.number().nonnegative().default(20),
  base_duration_minutes: z.number().nonnegative().default(90),
  price_increment_eur: z.number().nonnegative().default(10),
  increment_minutes: z.number().positive().default(30),
  currency: z.string().min(1).default("eur"),
  market: z.string().min(1).default("hu"),
  limit: z.number().int().min(1).max(1000).default(100),
  direct_only: z.boolean().default(false),
  notify_mode: z.enum(["combined", "per_offer"]).default("combined"),
  aviasales_token: z.string().default(""),
  telegram_bot_token: z.string().default(""),
  telegram_chat_id: z.union([z.string(), z.number().int()]).transform(String).default(""),
});

export type FileConfig = z.infer<typeof fileConfigSchema>;

export interface EnvOverrides {
  aviasalesToken?: string;
  telegramBotToken?: string;
  telegramChatId?: string;
}

const ENV_MAP = {
  AVIASALES_TOKEN: "aviasalesToken",
  TELEGRAM_BOT_TOKEN: "telegramBotToken",
  TELEGRAM_CHAT_ID: "telegramChatId",
} as const satisfies Record<string, keyof EnvOverrides>;

export class ConfigError extends Error {
  issues: string[];
  constructor(message: string, issues: string[] = []) {
    super(issues.length ? `${message}: ${issues.join("; ")}` : message);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

/**
 * Read the JSON config file. A missing file yields `undefined` so that
 * defaults (and environment credentials) can still produce settings.
 */
export async function loadConfigFile(path: string): Promise<unknown> {
  let text: string;
  try {
    text = await readFile(path, "utf-8");
  } catch (e) {
    if (e instanceof Error && "code" in e && e.code === "ENOENT") return undefined;
    throw new ConfigError(`Cannot read config file ${path}`, [String(e)]);
  }

  try {
    return JSON.parse(text);
  } catch (e) {
    throw new ConfigError(`Config file ${path} is not valid JSON`, [String(e)]);
  }
}

export function readEnvOverrides(env: Record<string, string | undefined> = process.env): EnvOverrides {
  const out: EnvOverrides = {};
  for (const [envKey, field] of Object.entries(ENV_MAP)) {
    const v = env[envKey]?.trim();
    if (v) out[field] = v;
  }
  return out;
}

/**
 * Merge the parsed config file with environment overrides. Pure: callers do
 * the file and environment access.
 */
export function resolveSettings(fileConfig: unknown, env: EnvOverrides = {}): Settings {
  const parsed = fileConfigSchema.safeParse(fileConfig ?? {});
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`);
    throw new ConfigError("Invalid config file", issues);
  }
  const file = parsed.data;

  const credentials = {
    aviasalesToken: env.aviasalesToken ?? file.aviasales_token,
    telegramBotToken: env.telegramBotToken ?? file.telegram_bot_token,
    telegramChatId: env.telegramChatId ?? file.telegram_chat_id,
  };

  const missing: string[] = [];
  if (!credentials.aviasalesToken) missing.push("aviasales_token (AVIASALES_TOKEN)");
  if (!credentials.telegramBotToken) missing.push("telegram_bot_token (TELEGRAM_BOT_TOKEN)");
  if (!credentials.telegramChatId) missing.push("telegram_chat_id (TELEGRAM_CHAT_ID)");
  if (missing.length) throw new ConfigError("Missing credentials", missing);

  return Object.freeze({
    origin: file.origin.toUpperCase(),
    daysAhead: file.days_ahead,
    basePrice: file.base_price_eur,
    baseDurationMinutes: file.base_duration_minutes,
    priceIncrement: file.price_increment_eur,
    incrementMinutes: file.increment_minutes,
    currency: file.currency.toLowerCase(),
    market: file.market.toLowerCase(),
    limit: file.limit,
    directOnly: file.direct_only,
    notifyMode: file.notify_mode,
    ...credentials,
  });
}

// Look-ahead window: today (UTC) and the following days.
export function getSearchDates(daysAhead: number, now: Date = new Date()): string[] {
  const dates: string[] = [];
  for (let i = 0; i < daysAhead; i++) {
    const d = new Date(Date.UTC(now.getUTCFullYear(), now.getUTCMonth(), now.getUTCDate() + i));
    dates.push(d.toISOString().slice(0, 10));
  }
  return dates;
}
