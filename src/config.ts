import dotenv from "dotenv";
import { ConfigError } from "./errors";
import { TelegramSettings } from "./types";

dotenv.config();

export interface AppConfig {
  baseUrl: string;
  defaultRegion: string;
  requestTimeoutMs: number;
  userAgent: string;
  cronPattern: string;
  timezone: string;
  telegram: TelegramSettings | null;
}

type Env = Record<string, string | undefined>;

function readTimeout(raw: string | undefined): number {
  if (raw === undefined || raw.trim() === "") {
    return 20000;
  }
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new ConfigError(
      `REQUEST_TIMEOUT_MS must be a positive integer, got "${raw}"`
    );
  }
  return value;
}

function readTelegram(env: Env): TelegramSettings | null {
  const botToken = env.TELEGRAM_BOT_TOKEN?.trim();
  const chatId = env.TELEGRAM_CHAT_ID?.trim();

  if (!botToken && !chatId) {
    return null;
  }
  if (!botToken || !chatId) {
    throw new ConfigError(
      "TELEGRAM_BOT_TOKEN and TELEGRAM_CHAT_ID must be set together"
    );
  }
  return { botToken, chatId };
}

export function loadConfig(env: Env = process.env): AppConfig {
  return {
    baseUrl:
      env.ENEA_BASE_URL?.trim() ||
      "https://wylaczenia-eneaoperator.pl/index.php",
    defaultRegion: env.DEFAULT_REGION?.trim() || "Poznań",
    requestTimeoutMs: readTimeout(env.REQUEST_TIMEOUT_MS),
    userAgent:
      env.USER_AGENT?.trim() ||
      "Mozilla/5.0 (compatible; EneaOutages/1.0)",
    cronPattern: env.CRON_PATTERN?.trim() || "*/15 * * * *",
    timezone: env.TZ?.trim() || "Europe/Warsaw",
    telegram: readTelegram(env),
  };
}

let cached: AppConfig | null = null;

/** Loaded on first use, not at import. */
export function getConfig(): AppConfig {
  if (!cached) {
    cached = loadConfig();
  }
  return cached;
}
