import { config as loadEnv } from "dotenv";
import { resolve } from "path";

// Load .env from the working directory
loadEnv({ path: resolve(process.cwd(), ".env") });

export const FAILURE_POLICIES = ["halt", "placeholder"] as const;

/** What the recursion loop does when a model call fails mid-sequence. */
export type FailurePolicy = (typeof FAILURE_POLICIES)[number];

export interface Config {
  nodeEnv: string;
  port: number;
  host: string;
  logLevel: string;

  // Local LLM runtime (OpenAI-compatible endpoint)
  ollamaBaseUrl: string;
  ollamaModel: string;

  // Recursion loop
  thoughtLogDir: string;
  failurePolicy: FailurePolicy;

  // HTTP
  corsOrigins: string[];
  rateLimitMax: number;

  // Telegram
  telegramBotToken: string;
  telegramAllowedChatId: string;
  telegramWebhookSecret: string;
  telegramStartupChatId: string;

  // Chat commands
  chatThinkDepth: number;
  chatPacingMs: number;
}

export interface EnvValidationIssue {
  key: string;
  reason: string;
}

export interface EnvValidationResult {
  ok: boolean;
  errors: EnvValidationIssue[];
  warnings: EnvValidationIssue[];
}

type Env = Record<string, string | undefined>;

export function loadConfig(env: Env = process.env): Config {
  const nodeEnv = env.NODE_ENV || "development";

  return {
    nodeEnv,
    port: parseInt(env.PORT || "8888", 10),
    host: env.HOST || "0.0.0.0",
    logLevel: env.LOG_LEVEL || (nodeEnv === "development" ? "info" : "warn"),

    ollamaBaseUrl: env.OLLAMA_BASE_URL || "http://localhost:11434/v1",
    ollamaModel: (env.OLLAMA_MODEL ?? "tinyllama").trim(),

    thoughtLogDir: env.THOUGHT_LOG_DIR
      ? resolve(process.cwd(), env.THOUGHT_LOG_DIR)
      : resolve(process.cwd(), "logs"),
    failurePolicy: parseFailurePolicy(env.RECURSION_FAILURE_POLICY),

    corsOrigins: parseList(env.CORS_ORIGINS, ["*"]),
    rateLimitMax: Math.max(1, parseInt(env.RATE_LIMIT_MAX || "300", 10) || 300),

    telegramBotToken: env.TELEGRAM_BOT_TOKEN || "",
    telegramAllowedChatId: env.TELEGRAM_ALLOWED_CHAT_ID || "",
    telegramWebhookSecret: env.TELEGRAM_WEBHOOK_SECRET || "",
    telegramStartupChatId: env.TELEGRAM_STARTUP_CHAT_ID || "",

    chatThinkDepth: clamp(parseIntOr(env.CHAT_THINK_DEPTH, 3), 1, 10),
    chatPacingMs: Math.max(0, parseInt(env.CHAT_PACING_MS || "1000", 10) || 0),
  };
}

export const config = loadConfig();

export function validateRequiredEnv(currentConfig: Config = config, env: Env = process.env): EnvValidationResult {
  const errors: EnvValidationIssue[] = [];
  const warnings: EnvValidationIssue[] = [];

  const rawPolicy = env.RECURSION_FAILURE_POLICY;
  if (rawPolicy && !isFailurePolicy(rawPolicy.trim().toLowerCase())) {
    errors.push({
      key: 'RECURSION_FAILURE_POLICY',
      reason: `Must be one of: ${FAILURE_POLICIES.join(', ')}.`,
    });
  }

  if (!currentConfig.ollamaModel) {
    errors.push({
      key: 'OLLAMA_MODEL',
      reason: 'A model name is required for completion requests.',
    });
  }

  if (!Number.isFinite(currentConfig.port) || currentConfig.port <= 0) {
    errors.push({
      key: 'PORT',
      reason: 'Port must be a positive integer.',
    });
  }

  if (!currentConfig.telegramBotToken) {
    warnings.push({
      key: 'TELEGRAM_BOT_TOKEN',
      reason: 'Telegram chat commands are disabled.',
    });
  }

  if (currentConfig.telegramBotToken && !currentConfig.telegramAllowedChatId) {
    warnings.push({
      key: 'TELEGRAM_ALLOWED_CHAT_ID',
      reason: 'Telegram webhooks will reject all chats until allowed IDs are set.',
    });
  }

  return {
    ok: errors.length === 0,
    errors,
    warnings,
  };
}

function isFailurePolicy(value: string): value is FailurePolicy {
  return FAILURE_POLICIES.some((policy) => policy === value);
}

function parseFailurePolicy(value?: string): FailurePolicy {
  const normalized = (value || '').trim().toLowerCase();
  return isFailurePolicy(normalized) ? normalized : 'halt';
}

function parseList(value: string | undefined, fallback: string[]): string[] {
  const entries = (value || '')
    .split(/[;,]/)
    .map((entry) => entry.trim())
    .filter(Boolean);
  return entries.length > 0 ? entries : fallback;
}

function parseIntOr(value: string | undefined, fallback: number): number {
  const parsed = parseInt(value ?? "", 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}
