/**
 * Engine Configuration
 *
 * Per-symbol strategy/risk options and account-level settings, validated
 * with zod. Defaults live in the schema so a config file only needs to
 * name what it changes.
 */

import fs from 'fs';
import { z } from 'zod';
import { ConfigError } from '@/lib/errors';

const HOUR_MS = 60 * 60 * 1000;

export const symbolConfigSchema = z
  .object({
    symbol: z.string().min(1),
    executionMode: z.enum(['A', 'B']).default('B'),
    intervalMs: z.number().int().positive().default(HOUR_MS),
    maxCandles: z.number().int().min(10).default(500),

    // Sizing
    freshAllocationPct: z.number().gt(0).lte(1).default(0.4),
    freshLeverage: z.number().min(1).default(20),
    breakerAllocationPct: z.number().gt(0).lte(1).default(0.3),
    breakerLeverage: z.number().min(1).default(10),
    minNotional: z.number().min(0).default(5),
    /** Contract step the size is floored to (0 = no rounding) */
    sizeStep: z.number().min(0).default(0),

    // Exits
    targetRR: z.number().positive().default(2),
    stopBufferPct: z.number().min(0).default(0.001),
    trailingTriggerPct: z.number().min(0).default(0.01),
    trailingDistancePct: z.number().positive().default(0.005),

    // Entries
    penetrationRatio: z.number().gt(0).lt(1).default(0.2),
    modeBTimeoutMs: z.number().int().positive().default(4 * HOUR_MS),
    modeATimeoutMs: z.number().int().positive().default(24 * HOUR_MS),
    modeBInvalidationPenetration: z.number().gt(0).default(1),
    limitRetryBackoffMs: z.number().int().min(0).default(1000),

    // Structure & zones
    swingConfirmationBars: z.number().int().min(1).default(3),
    maxZoneAgeCandles: z.number().int().min(1).default(50),
    zoneSource: z.enum(['wick', 'body']).default('wick'),
    originCandle: z.enum(['last_opposite', 'extreme']).default('last_opposite'),
    originCandleCount: z.number().int().min(1).default(1),
    mitigationSource: z.enum(['body', 'close', 'wick']).default('body'),
  })
  .refine((c) => c.modeBInvalidationPenetration > c.penetrationRatio, {
    message: 'modeBInvalidationPenetration must exceed penetrationRatio',
    path: ['modeBInvalidationPenetration'],
  });

export const engineConfigSchema = z.object({
  initialEquity: z.number().positive().default(10000),
  verbose: z.boolean().default(false),
  paper: z.boolean().default(true),
  paperSlippage: z.number().min(0).default(0),
  databasePath: z.string().optional(),
  clockIntervalMs: z.number().int().positive().default(1000),
  telegram: z
    .object({
      botToken: z.string().min(1),
      chatId: z.string().min(1),
    })
    .optional(),
  bybit: z
    .object({
      apiKey: z.string().optional(),
      apiSecret: z.string().optional(),
      testnet: z.boolean().default(false),
    })
    .default({}),
  symbols: z.array(symbolConfigSchema).min(1),
});

export type SymbolConfig = z.infer<typeof symbolConfigSchema>;
export type SymbolConfigInput = z.input<typeof symbolConfigSchema>;
export type EngineConfig = z.infer<typeof engineConfigSchema>;
export type EngineConfigInput = z.input<typeof engineConfigSchema>;

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
}

export function parseSymbolConfig(input: unknown): SymbolConfig {
  const result = symbolConfigSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigError('Invalid symbol config', formatIssues(result.error));
  }
  return result.data;
}

export function parseEngineConfig(input: unknown): EngineConfig {
  const result = engineConfigSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigError('Invalid engine config', formatIssues(result.error));
  }

  const seen = new Set<string>();
  for (const s of result.data.symbols) {
    if (seen.has(s.symbol)) {
      throw new ConfigError('Invalid engine config', [`symbols: duplicate symbol ${s.symbol}`]);
    }
    seen.add(s.symbol);
  }

  return result.data;
}

/** Read and validate a JSON config file */
export function loadEngineConfig(filePath: string): EngineConfig {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (err) {
    throw new ConfigError(`Cannot read config ${filePath}: ${err instanceof Error ? err.message : String(err)}`);
  }
  return parseEngineConfig(raw);
}
