import express, { type Express, type NextFunction, type Request, type Response } from "express";
import session from "express-session";
import type { AppConfig } from "./config";
import { createDashboardController } from "./controllers/dashboardController";
import { requestLogger } from "./log";
import { createDatasetRateLimiter } from "./rateLimit";
import { registerRoutes } from "./routes";
import { SESSION_TTL_MS, type IDashboardSessionStore } from "./session/sessionStore";

declare module "express-session" {
  interface SessionData {
    /** Set once the session has loaded a dataset; marks it as established */
    datasetLoadedAt?: string;
  }
}

export interface AppDeps {
  config: AppConfig;
  sessions: IDashboardSessionStore;
}

/**
 * Errors that escape the handlers, body-parser failures included
 * (e.g. 413 for oversized uploads).
 */
function statusOf(err: unknown): number {
  if (typeof err === "object" && err !== null) {
    const candidate = "status" in err ? err.status : "statusCode" in err ? err.statusCode : undefined;
    if (typeof candidate === "number" && candidate >= 400 && candidate < 600) {
      return candidate;
    }
  }
  return 500;
}

export function createApp({ config, sessions }: AppDeps): Express {
  const app = express();

  app.use(express.json());
  app.use(express.urlencoded({ extended: false }));

  // Default MemoryStore: dashboard state is in-memory per process anyway.
  // Nothing is stored (and no cookie is set) until a dataset is loaded.
  app.use(
    session({
      secret: config.sessionSecret,
      resave: false,
      saveUninitialized: false,
      cookie: {
        httpOnly: true,
        secure: config.nodeEnv === "production",
        sameSite: "lax",
        maxAge: SESSION_TTL_MS,
      },
    })
  );

  app.use(requestLogger());

  const controller = createDashboardController({ sessions, config });
  registerRoutes(app, controller, {
    maxUploadBytes: config.maxUploadBytes,
    datasetRateLimiter: createDatasetRateLimiter(config.uploadRateLimitPerMinute),
  });

  app.use((err: unknown, _req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) {
      return next(err);
    }

    const status = statusOf(err);
    const message = err instanceof Error ? err.message : "Internal Server Error";
    if (status >= 500) {
      console.error("[api] Unhandled error:", err);
    }

    res.status(status).json({ error: status >= 500 ? "Internal Server Error" : message });
  });

  return app;
}
