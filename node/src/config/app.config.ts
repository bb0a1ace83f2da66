/** App configuration, validated once at startup. */
import { z } from 'zod';

const booleanFlag = z
  .union([z.boolean(), z.enum(['true', 'false', '1', '0'])])
  .transform((value) => value === true || value === 'true' || value === '1');

const envSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(4000),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  CORS_ORIGIN: z.string().default('http://localhost:3000'),

  OPENAI_API_KEY: z.string().optional(),
  OPENAI_MODEL: z.string().min(1).default('gpt-4o-mini'),
  MAPBOX_API_KEY: z.string().optional(),
  TAVILY_API_KEY: z.string().optional(),
  SEARXNG_URL: z.string().url().optional(),

  FANOUT_CAP: z.coerce.number().int().min(1).max(20).default(5),
  STAGE_TIMEOUT_MS: z.coerce.number().int().min(0).default(45_000),
  COMMUNITY_GRACE_MS: z.coerce.number().int().min(0).default(3_000),
  CHAT_TIMEOUT_MS: z.coerce.number().int().min(1).default(60_000),
  SESSION_TTL_MINUTES: z.coerce.number().positive().default(30),
  MAX_SESSIONS: z.coerce.number().int().min(1).default(1000),
  SESSION_KEY_MODE: z.enum(['sender', 'sender-timestamp']).default('sender'),
  POI_LIMIT_PER_CATEGORY: z.coerce.number().int().min(1).max(10).default(2),
  PROGRESS_UPDATES: booleanFlag.default(true),
});

export type SessionKeyMode = 'sender' | 'sender-timestamp';

export interface AppConfig {
  port: number;
  nodeEnv: 'development' | 'production' | 'test';
  corsOrigins: string[];
  openai: { apiKey?: string; model: string };
  mapbox: { token?: string };
  tavily: { apiKey?: string };
  searxng: { url?: string };
  coordinator: {
    fanOutCap: number;
    stageTimeoutMs: number;
    communityGraceMs: number;
    progressUpdates: boolean;
  };
  chatTimeoutMs: number;
  sessions: { ttlMinutes: number; maxSessions: number; keyMode: SessionKeyMode };
  poi: { limitPerCategory: number };
}

export class ConfigError extends Error {
  constructor(public readonly issues: Array<{ path: string; message: string }>) {
    super(`Invalid configuration: ${issues.map((i) => `${i.path} ${i.message}`).join('; ')}`);
    this.name = 'ConfigError';
  }
}

function blankToUndefined(env: NodeJS.ProcessEnv): Record<string, string> {
  const cleaned: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') cleaned[key] = value.trim();
  }
  return cleaned;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const result = envSchema.safeParse(blankToUndefined(env));
  if (!result.success) {
    throw new ConfigError(
      result.error.errors.map((e) => ({ path: e.path.join('.') || 'root', message: e.message })),
    );
  }
  const e = result.data;
  return {
    port: e.PORT,
    nodeEnv: e.NODE_ENV,
    corsOrigins: e.CORS_ORIGIN.split(',').map((o) => o.trim()).filter(Boolean),
    openai: { apiKey: e.OPENAI_API_KEY, model: e.OPENAI_MODEL },
    mapbox: { token: e.MAPBOX_API_KEY },
    tavily: { apiKey: e.TAVILY_API_KEY },
    searxng: { url: e.SEARXNG_URL },
    coordinator: {
      fanOutCap: e.FANOUT_CAP,
      stageTimeoutMs: e.STAGE_TIMEOUT_MS,
      communityGraceMs: e.COMMUNITY_GRACE_MS,
      progressUpdates: e.PROGRESS_UPDATES,
    },
    chatTimeoutMs: e.CHAT_TIMEOUT_MS,
    sessions: {
      ttlMinutes: e.SESSION_TTL_MINUTES,
      maxSessions: e.MAX_SESSIONS,
      keyMode: e.SESSION_KEY_MODE,
    },
    poi: { limitPerCategory: e.POI_LIMIT_PER_CATEGORY },
  };
}
