/**
 * Express API Server
 *
 * Exposes the leverage analyst over HTTP:
 *   GET  /api/health                — Liveness probe
 *   GET  /api/expirations/:symbol   — Listed expirations + default (≈1 year out)
 *   GET  /api/leverage/:symbol      — Leverage report and chart series
 *        ?expiration=YYYY-MM-DD&targetPct=20&lowPct=-50&highPct=-10&showAdjusted=true
 */

import express, { type Response } from "express";
import { ZodError } from "zod";
import { componentLogger } from "./utils/logger.js";
import { LeverageError } from "./utils/errors.js";
import { LeverageQuerySchema } from "./utils/validation.js";
import type { LeverageAnalyst } from "./agents/leverage-analyst.js";

const log = componentLogger("server");

export function createApp(analyst: LeverageAnalyst): express.Express {
  const app = express();

  // ── CORS for local development ──────────────────────────────
  app.use((_req, res, next) => {
    res.header("Access-Control-Allow-Origin", "*");
    res.header("Access-Control-Allow-Headers", "Content-Type");
    next();
  });

  app.get("/api/health", (_req, res) => {
    res.json({ success: true, data: { status: "ok" } });
  });

  /**
   * GET /api/expirations/:symbol — Expirations with the default selection
   */
  app.get("/api/expirations/:symbol", async (req, res) => {
    try {
      const listing = await analyst.listExpirations(req.params.symbol);
      res.json({ success: true, data: listing });
    } catch (err) {
      sendError(res, err, `Expirations failed for ${req.params.symbol}`);
    }
  });

  /**
   * GET /api/leverage/:symbol — Leverage across strikes for a target move
   */
  app.get("/api/leverage/:symbol", async (req, res) => {
    try {
      const query = LeverageQuerySchema.parse(req.query);
      const report = await analyst.analyze({ symbol: req.params.symbol, ...query });
      res.json({ success: true, data: report });
    } catch (err) {
      sendError(res, err, `Leverage analysis failed for ${req.params.symbol}`);
    }
  });

  return app;
}

/** Map an error to the JSON envelope and a status code */
export function statusFor(err: unknown): number {
  if (err instanceof ZodError) return 400;
  if (err instanceof LeverageError) {
    switch (err.code) {
      case "INVALID_INPUT":
      case "INVALID_SCENARIO":
        return 400;
      case "EMPTY_INPUT":
        return 404;
      case "MARKET_DATA":
        return 502;
    }
  }
  return 500;
}

function sendError(res: Response, err: unknown, context: string): void {
  const status = statusFor(err);
  if (status >= 500) {
    log.error(context, { error: String(err) });
  } else {
    log.warn(context, { error: String(err) });
  }

  const error =
    err instanceof ZodError
      ? err.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ")
      : err instanceof Error
        ? err.message
        : String(err);

  res.status(status).json({ success: false, error });
}
