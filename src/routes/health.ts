/**
 * Health check endpoint.
 *
 * Response shape:
 *   {
 *     status: "ok" | "degraded",
 *     timestamp: string,
 *     uptime: number,
 *     db: { connected: boolean },
 *     memory: { rss, heapUsed, heapTotal } (all in MB)
 *   }
 *
 * Answers 503 while the database is unreachable.
 */

import { Router } from "express";
import type { Request, Response } from "express";
import type { AppContext } from "../context";

const toMB = (bytes: number): number => Math.round((bytes / 1024 / 1024) * 100) / 100;

export function createHealthRouter(ctx: Pick<AppContext, "checkDatabase">): Router {
  const healthRouter = Router();

  healthRouter.get("/", async (_req: Request, res: Response) => {
    const dbConnected = await ctx.checkDatabase();
    const mem = process.memoryUsage();

    res.status(dbConnected ? 200 : 503).json({
      status: dbConnected ? "ok" : "degraded",
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      db: {
        connected: dbConnected,
      },
      memory: {
        rss: toMB(mem.rss),
        heapUsed: toMB(mem.heapUsed),
        heapTotal: toMB(mem.heapTotal),
      },
    });
  });

  return healthRouter;
}
