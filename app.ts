import express, { type ErrorRequestHandler } from "express";
import helmet from "helmet";
import rateLimit from "express-rate-limit";
import type { ServiceSettings } from "./config/reportConfig";
import { errorMessage } from "./lib/errors";
import { createReportRouter } from "./routes/report.routes";
import type { ReportService } from "./services/reportService";

export type AppSettings = Pick<ServiceSettings, "bodyLimit" | "rateLimitPerMinute">;

// Malformed or oversized JSON bodies arrive here with a 4xx status from the body parser
const handleErrors: ErrorRequestHandler = (error: unknown, req, res, next) => {
  if (res.headersSent) return next(error);
  const status =
    error instanceof Error && "status" in error && typeof error.status === "number"
      ? error.status
      : 500;
  if (status >= 500) {
    console.error("Unhandled request error:", error);
    return res.status(500).json({ message: "Internal server error" });
  }
  res.status(status).json({ message: errorMessage(error) });
};

export function createApp(
  service: Pick<ReportService, "submit" | "list" | "get" | "mode">,
  settings: AppSettings
) {
  const app = express();

  // Trust proxy when deployed behind a load balancer
  app.set("trust proxy", 1);

  app.use(express.json({ limit: settings.bodyLimit }));

  // Security middleware
  app.use(helmet());

  const limiter = rateLimit({
    windowMs: 1 * 60 * 1000, // 1 minute
    max: settings.rateLimitPerMinute,
    standardHeaders: true, // Return rate limit info in the `RateLimit-*` headers
    legacyHeaders: false,
  });
  app.use(limiter);

  // Routes
  app.use("/api/reports", createReportRouter(service));

  // Health check endpoint
  app.get("/health", (req, res) => {
    res.status(200).json({ status: "ok", mode: service.mode });
  });

  app.use(handleErrors);

  return app;
}
