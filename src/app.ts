import express, { Express, NextFunction, Request, Response } from "express";
import rateLimit from "express-rate-limit";
import { apiKeyMiddleware } from "./middleware/auth";
import { corsMiddleware } from "./middleware/cors";
import milestoneRoutes from "./routes/milestones";
import platformRoutes from "./routes/platform";
import projectRoutes from "./routes/projects";
import researcherRoutes from "./routes/researchers";
import { ResearchLedger } from "./services/ledger";
import { LedgerError } from "./utils/errors";
import { logError, logInfo } from "./utils/logger";

export interface AppOptions {
  ledger: ResearchLedger;
  apiKey: string;
  frontendUrl?: string;
  rateLimitMax?: number;
}

const clientErrorStatus = (error: unknown): number | undefined => {
  if (typeof error === "object" && error !== null && "status" in error && typeof error.status === "number") {
    return error.status >= 400 && error.status < 500 ? error.status : undefined;
  }
  return undefined;
};

export const createApp = ({ ledger, apiKey, frontendUrl = "", rateLimitMax = 1000 }: AppOptions): Express => {
  const app = express();

  // Rate limiting
  app.use(
    rateLimit({
      windowMs: 15 * 60 * 1000, // 15 minutes
      limit: rateLimitMax,
      message: { error: "RateLimited", message: "Too many requests from this IP, please try again later." },
      standardHeaders: true,
      legacyHeaders: false,
    })
  );
  app.use(corsMiddleware(frontendUrl));

  app.get("/api/status", (req, res) => {
    res.status(200).json({ isLive: true });
  });

  app.use(apiKeyMiddleware(apiKey));
  app.use(express.json({ limit: "1mb" }));
  app.use((req: Request, res: Response, next: NextFunction) => {
    logInfo(`${req.method} ${req.originalUrl}`, { principal: req.header("x-principal") ?? null });
    next();
  });

  app.use("/api/researchers", researcherRoutes(ledger));
  app.use("/api/projects", projectRoutes(ledger));
  app.use("/api/milestones", milestoneRoutes(ledger));
  app.use("/api/platform", platformRoutes(ledger));

  app.use((req: Request, res: Response) => {
    res.status(404).json({ error: "NotFound", message: `No route for ${req.method} ${req.path}` });
  });

  // Custom error middleware to ensure JSON responses
  app.use((err: unknown, req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) {
      return next(err);
    }
    if (err instanceof LedgerError) {
      res.status(err.status).json({ error: err.code, message: err.message });
      return;
    }
    const status = clientErrorStatus(err);
    if (status !== undefined) {
      // body-parser failures (malformed JSON, oversized payload)
      res.status(status).json({ error: "InvalidInput", message: err instanceof Error ? err.message : "Bad request" });
      return;
    }
    logError("Error middleware caught:", err);
    res.status(500).json({
      error: "Internal",
      message: "Internal server error",
      details: process.env.NODE_ENV === "development" && err instanceof Error ? err.stack : undefined,
    });
  });

  return app;
};
