import path from 'node:path';
import { z } from 'zod';
import { ConfigError } from '../util/errors.js';

export type CardStyle = 'text' | 'unicode';

export type Limits = {
  min_bet: number;
  max_bet: number;
};

export type AppConfig = {
  limits: Limits;
  cardStyle: CardStyle;
  logLevel: string;
  logFile: string;
};

const intFromEnv = (fallback: number) =>
  z.preprocess(
    (v) => (v === undefined || (typeof v === 'string' && v.trim() === '') ? fallback : Number(v)),
    z.number().int().positive(),
  );

const envSchema = z.object({
  BLACKJACK_MIN_BET: intFromEnv(5),
  BLACKJACK_MAX_BET: intFromEnv(500),
  CARD_STYLE: z.enum(['text', 'unicode']).default('text'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  LOG_FILE: z.string().min(1).default(path.join('logs', 'blackjack.ndjson')),
}).refine((e) => e.BLACKJACK_MIN_BET <= e.BLACKJACK_MAX_BET, {
  message: 'BLACKJACK_MIN_BET must not exceed BLACKJACK_MAX_BET',
  path: ['BLACKJACK_MIN_BET'],
});

let cfg: AppConfig | null = null;

// Tests change the environment between reads
export function resetConfigCache() {
  cfg = null;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((i) => `${i.path.join('.') || 'env'}: ${i.message}`));
  }
  const e = parsed.data;
  return {
    limits: { min_bet: e.BLACKJACK_MIN_BET, max_bet: e.BLACKJACK_MAX_BET },
    cardStyle: e.CARD_STYLE,
    logLevel: e.LOG_LEVEL,
    logFile: path.resolve(e.LOG_FILE),
  };
}

export function getConfig(): AppConfig {
  if (!cfg) cfg = loadConfig();
  return cfg;
}
