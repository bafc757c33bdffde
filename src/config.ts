import { z } from 'zod';
import 'dotenv/config';

const configSchema = z.object({
  // Database
  DATABASE_URL: z.string().min(1),

  // OpenAI (judgment producer)
  OPENAI_API_KEY: z.string().min(1),
  OPENAI_MODEL: z.string().min(1).default('gpt-4o'),

  // Alpaca (price feed)
  ALPACA_API_KEY: z.string().min(1),
  ALPACA_SECRET_KEY: z.string().min(1),
  ALPACA_DATA_URL: z.string().url().default('https://data.alpaca.markets'),

  // Telegram (notification sink)
  TELEGRAM_BOT_TOKEN: z.string().min(1),
  TELEGRAM_CHAT_ID: z.string().min(1),

  // App
  PORT: z.coerce.number().default(3001),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

  // Portfolio parameters (with sane defaults)
  MAX_PORTFOLIO_SIZE: z.coerce.number().int().positive().default(10),
  BASE_MIN_SCORE: z.coerce.number().min(0).max(10).default(8),
  MAX_POSITIONS_PER_SECTOR: z.coerce.number().int().positive().default(3),
  TOTAL_CAPITAL: z.coerce.number().positive().optional(),

  // Cycle schedule: ';'-separated cron expressions (morning + afternoon run)
  CYCLE_CRONS: z.string().min(1).default('0 14 * * 1-5;0 19 * * 1-5'),
  CYCLE_TIMEZONE: z.string().min(1).default('UTC'),
  // JSON batch of scored candidates written by the analysis layer
  CANDIDATES_FILE: z.string().min(1).default('data/candidates.json'),
});

type Config = z.infer<typeof configSchema>;

export function parseConfig(env: NodeJS.ProcessEnv): Config {
  const result = configSchema.safeParse(env);
  if (!result.success) {
    const missing = result.error.errors.map(e => `${e.path.join('.')}: ${e.message}`).join('\n  ');
    throw new Error(`Invalid configuration:\n  ${missing}`);
  }
  return result.data;
}

export function cycleCrons(cfg: Pick<Config, 'CYCLE_CRONS'>): string[] {
  return cfg.CYCLE_CRONS.split(';').map(s => s.trim()).filter(s => s.length > 0);
}

export const config = parseConfig(process.env);
export type { Config };
