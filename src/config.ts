import path from 'node:path';
import { z } from 'zod';
import type { LogLevel } from './infra/logger.js';

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1');

const envSchema = z.object({
  NODE_ENV: z.string().default('development'),
  APP_NAME: z.string().default('hedge-coordinator'),
  PORT: z.coerce.number().int().min(0).max(65_535).default(8787),
  HOST: z.string().default('0.0.0.0'),
  DATA_DIR: z.string().default('data'),
  LOG_FILE: z.string().optional(),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  ENGINE_CONFIG_FILE: z.string().default('config/engine.example.json'),
  ENGINE_AUTO_START: booleanFlag.default('false'),
  PAPER_FILL_DELAY_MS: z.coerce.number().int().nonnegative().default(250),
});

export interface AppConfig {
  app: {
    name: string;
    env: string;
    port: number;
    host: string;
  };
  paths: {
    dataDir: string;
    logFile: string;
    engineConfigFile: string;
  };
  logging: {
    level: LogLevel;
    mirrorToConsole: boolean;
  };
  engine: {
    autoStart: boolean;
  };
  paper: {
    fillDelayMs: number;
  };
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.parse(env);
  const dataDir = path.resolve(parsed.DATA_DIR);

  return {
    app: {
      name: parsed.APP_NAME,
      env: parsed.NODE_ENV,
      port: parsed.PORT,
      host: parsed.HOST,
    },
    paths: {
      dataDir,
      logFile: path.resolve(parsed.LOG_FILE ?? path.join(dataDir, 'events.ndjson')),
      engineConfigFile: path.resolve(parsed.ENGINE_CONFIG_FILE),
    },
    logging: {
      level: parsed.LOG_LEVEL,
      mirrorToConsole: parsed.NODE_ENV !== 'test',
    },
    engine: {
      autoStart: parsed.ENGINE_AUTO_START,
    },
    paper: {
      fillDelayMs: parsed.PAPER_FILL_DELAY_MS,
    },
  };
}

export const config = loadConfig();
