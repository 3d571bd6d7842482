import express from "express";
import cors from "cors";
import helmet from "helmet";
import type { AnalysisService } from "@rxverify/analysis-engine";
import type { CorsConfig } from "./config";
import { createErrorHandler } from "./middlewares/errorHandler";
import { createAnalyzeRouter } from "./routes/analyze";

export interface AppOptions {
  service: AnalysisService;
  cors: CorsConfig;
  exposeErrorDetails: boolean;
}

export const JSON_BODY_LIMIT = "1mb";

// Vite's dev server and preview ports.
const DEV_ORIGINS = [
  "http://localhost:5173",
  "http://127.0.0.1:5173",
  "http://localhost:4173",
];

export function createApp(options: AppOptions) {
  const allowedOrigins = [
    ...options.cors.allowedOrigins,
    ...(options.cors.isDevelopment ? DEV_ORIGINS : []),
  ];

  if (allowedOrigins.length === 0) {
    console.warn(
      "[cors] No ALLOWED_ORIGINS configured. Browser requests from other origins will be rejected.",
    );
  }

  const app = express();

  app.use(helmet());
  app.use(
    cors({
      origin: (origin, callback) => {
        // Same-origin, curl and server-to-server calls carry no Origin header.
        if (!origin || allowedOrigins.includes(origin)) {
          callback(null, true);
          return;
        }
        callback(null, false);
      },
    }),
  );
  app.use(express.json({ limit: JSON_BODY_LIMIT }));

  app.get("/health", (_req, res) => {
    res.json({ status: "ok" });
  });
  app.use(createAnalyzeRouter(options.service));

  app.use(createErrorHandler({ exposeDetails: options.exposeErrorDetails }));

  return app;
}
