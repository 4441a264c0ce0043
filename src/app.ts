import "express-async-errors"; // Must be imported before any route handlers
import express from "express";
import type { Express, Request, Response } from "express";
import cors from "cors";
import helmet from "helmet";
import type { AppContext } from "./context";
import { createRouter } from "./routes/index";
import { errorHandler } from "./middleware/errorHandler";
import { requestLogger } from "./middleware/requestLogger";
import { createRateLimiters } from "./middleware/rateLimiter";

/**
 * Build the Express application around an application context.
 * The server entry point and the tests both go through here.
 */
export function createApp(ctx: AppContext): Express {
  const app = express();
  const limiters = createRateLimiters(ctx.config);

  // Trust X-Forwarded-For when running behind nginx/load balancer
  if (ctx.config.TRUST_PROXY) {
    app.set("trust proxy", 1);
  }

  app.use(helmet());

  app.use(
    cors({
      origin: ctx.config.CORS_ORIGIN,
      credentials: true,
    })
  );

  // Request logging comes first so body-parser failures are logged too
  app.use(requestLogger);

  app.use(express.json());

  app.use(limiters.general);

  app.use(createRouter(ctx, limiters));

  // Catch-all 404 for any route that was not matched above
  app.use((_req: Request, res: Response) => {
    res.status(404).json({ error: "Not found", code: "NOT_FOUND" });
  });

  // Error handling middleware (must be last)
  app.use(errorHandler);

  return app;
}
