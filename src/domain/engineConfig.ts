import fs from 'node:fs/promises';
import { z } from 'zod';
import { ConfigError } from '../errors/taxonomy.js';
import type { TradingPair } from '../types.js';

const accountSchema = z.object({
  id: z.string().min(1),
  address: z.string().min(1),
  balance: z.number().nonnegative(),
  isActive: z.boolean().default(true),
  maxDailyTrades: z.number().int().positive().default(100),
  riskLimits: z.object({
    maxDailyLoss: z.number().positive(),
    minBalance: z.number().nonnegative(),
  }),
});

const pairSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  market: z.string().min(1).transform((market) => market.toUpperCase()),
  isEnabled: z.boolean().default(true),
  baseAmount: z.number().positive(),
  maxPositions: z.number().int().nonnegative().default(3),
  cooldownMinutes: z.number().nonnegative().default(10),
  accountCooldownMinutes: z.number().nonnegative().default(0),
  accountsPerHedge: z.number().int().min(2).default(2),
  accountAddresses: z.array(z.string().min(1)).min(2),
  riskLimits: z.object({
    maxDailyLoss: z.number().positive(),
    maxPositionSize: z.number().positive(),
  }),
  priceConditions: z.object({
    maxSpread: z.number().nonnegative().default(0.01),
    minVolatility: z.number().nonnegative().default(0),
    maxVolatility: z.number().nonnegative().default(0.2),
    minLiquidity: z.number().nonnegative().default(1000),
  }).default({}),
  exit: z.object({
    targetMoveBps: z.number().nonnegative().default(100),
    takeProfitBps: z.number().nonnegative().max(1_000).default(0),
    stopLossBps: z.number().nonnegative().max(500).default(0),
    leverage: z.number().int().min(1).max(100).default(1),
    liquidationBufferRatio: z.number().positive().max(1).default(0.8),
    maxHoldMinutes: z.number().nonnegative().default(0),
    closeOnPairHalt: z.boolean().default(false),
  }).default({}),
});

const engineConfigSchema = z.object({
  monitoringIntervalMs: z.number().int().positive().default(10_000),
  risk: z.object({
    globalMaxDailyLoss: z.number().positive().default(5_000),
    warnRatio: z.number().positive().max(1).default(0.8),
    maxEvents: z.number().int().positive().default(500),
  }).default({}),
  tradingEngine: z.object({
    orderTimeoutMs: z.number().int().positive().default(30_000),
    maxPriceAgeMs: z.number().int().positive().default(15_000),
    rotateSides: z.boolean().default(true),
    // share of a leg's size that may stay unfilled while the leg still counts as filled
    fillTolerance: z.number().nonnegative().max(0.05).default(0.001),
    unwind: z.object({
      maxAttempts: z.number().int().positive().default(3),
      baseDelayMs: z.number().int().nonnegative().default(500),
      maxDelayMs: z.number().int().nonnegative().default(5_000),
    }).default({}),
  }).default({}),
  accounts: z.array(accountSchema),
  tradingPairs: z.array(pairSchema),
});

export type AccountConfig = z.infer<typeof accountSchema>;
export type EngineConfig = z.infer<typeof engineConfigSchema>;
export type EngineConfigInput = z.input<typeof engineConfigSchema>;
export type RiskConfig = EngineConfig['risk'];
export type TradingEngineConfig = EngineConfig['tradingEngine'];

const sameAddress = (a: string, b: string): boolean => a.toLowerCase() === b.toLowerCase();

export const findAccountByAddress = (config: EngineConfig, address: string): AccountConfig | undefined =>
  config.accounts.find((account) => sameAddress(account.address, address));

export const pairAccounts = (config: EngineConfig, pair: TradingPair): AccountConfig[] =>
  pair.accountAddresses
    .map((address) => findAccountByAddress(config, address))
    .filter((account): account is AccountConfig => account !== undefined);

const crossCheck = (config: EngineConfig): string[] => {
  const issues: string[] = [];

  const active = config.accounts.filter((account) => account.isActive);
  if (active.length < 2) {
    issues.push('at least two active accounts are required for hedging');
  }

  const ids = new Set<string>();
  for (const account of config.accounts) {
    if (ids.has(account.id)) issues.push(`duplicate account id ${account.id}`);
    ids.add(account.id);
  }

  const pairIds = new Set<string>();
  for (const pair of config.tradingPairs) {
    if (pairIds.has(pair.id)) issues.push(`duplicate trading pair id ${pair.id}`);
    pairIds.add(pair.id);

    if (pair.accountsPerHedge % 2 !== 0) {
      issues.push(`trading pair ${pair.id}: accountsPerHedge must be even`);
    }

    if (!pair.isEnabled) continue;

    const unknown = pair.accountAddresses.filter((address) => !findAccountByAddress(config, address));
    if (unknown.length > 0) {
      issues.push(`trading pair ${pair.id} references unknown accounts ${unknown.join(', ')}`);
    }

    const accounts = pairAccounts(config, pair);
    const inactive = accounts.filter((account) => !account.isActive);
    if (inactive.length > 0) {
      issues.push(`trading pair ${pair.id} references inactive accounts ${inactive.map((a) => a.address).join(', ')}`);
    }

    if (accounts.length - inactive.length < pair.accountsPerHedge) {
      issues.push(`trading pair ${pair.id} needs at least ${pair.accountsPerHedge} active accounts`);
    }
  }

  return issues;
};

export function parseEngineConfig(raw: unknown): EngineConfig {
  const parsed = engineConfigSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`));
  }

  const issues = crossCheck(parsed.data);
  if (issues.length > 0) {
    throw new ConfigError(issues);
  }

  return parsed.data;
}

export async function loadEngineConfig(filePath: string): Promise<EngineConfig> {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    throw new ConfigError([`cannot read ${filePath}: ${error instanceof Error ? error.message : String(error)}`]);
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    throw new ConfigError([`${filePath} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`]);
  }

  return parseEngineConfig(json);
}
