/**
 * Input validation utilities.
 */

import { z } from "zod";

/** Validate a stock ticker symbol */
export const TickerSchema = z
  .string()
  .min(1)
  .max(10)
  .regex(/^[A-Z]{1,10}$/, "Ticker must be 1-10 uppercase letters");

/** Keep ASCII letters only and uppercase ("brk.b " → "BRKB") */
export function sanitizeSymbol(raw: string): string {
  return raw.replace(/[^A-Za-z]/g, "").toUpperCase();
}

const Percent = z.coerce.number().min(-100).max(100);

/** Query string of GET /api/leverage/:symbol */
export const LeverageQuerySchema = z.object({
  expiration: z
    .string()
    .regex(/^\d{4}-\d{2}-\d{2}$/, "Expiration must be YYYY-MM-DD")
    .optional(),
  targetPct: Percent.optional(),
  lowPct: Percent.optional(),
  highPct: Percent.optional(),
  showAdjusted: z
    .enum(["true", "false"])
    .transform((v) => v === "true")
    .optional(),
});

export type LeverageQuery = z.infer<typeof LeverageQuerySchema>;
