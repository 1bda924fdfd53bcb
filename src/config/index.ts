/**
 * Centralized configuration loaded from environment variables.
 * Uses zod for runtime validation.
 */

import { z } from "zod";
import dotenv from "dotenv";

dotenv.config();

const booleanFlag = z
  .union([z.boolean(), z.enum(["true", "false", "1", "0"])])
  .transform((v) => v === true || v === "true" || v === "1");

const ConfigSchema = z.object({
  // Market data
  marketData: z.object({
    yahooBaseUrl: z
      .string()
      .url()
      .default("https://query1.finance.yahoo.com/v7/finance/options"),
    cacheTtlMs: z.coerce.number().int().nonnegative().default(60_000),
  }),

  // Defaults for a leverage request
  defaults: z.object({
    targetPct: z.coerce.number().default(20),
    strikeLowPct: z.coerce.number().default(-50),
    strikeHighPct: z.coerce.number().default(-10),
    showAdjusted: booleanFlag.default(true),
  }),

  // System
  logLevel: z.enum(["debug", "info", "warn", "error"]).default("info"),
  nodeEnv: z.enum(["development", "production", "test"]).default("development"),
  port: z.coerce.number().default(3000),
});

export type Config = z.infer<typeof ConfigSchema>;

function loadConfig(): Config {
  const raw = {
    marketData: {
      yahooBaseUrl: process.env.YAHOO_BASE_URL,
      cacheTtlMs: process.env.MARKET_DATA_CACHE_TTL_MS,
    },
    defaults: {
      targetPct: process.env.DEFAULT_TARGET_PCT,
      strikeLowPct: process.env.DEFAULT_STRIKE_LOW_PCT,
      strikeHighPct: process.env.DEFAULT_STRIKE_HIGH_PCT,
      showAdjusted: process.env.DEFAULT_SHOW_ADJUSTED,
    },
    logLevel: process.env.LOG_LEVEL,
    nodeEnv: process.env.NODE_ENV,
    port: process.env.PORT,
  };

  return ConfigSchema.parse(raw);
}

/** Singleton config instance */
export const config = loadConfig();
