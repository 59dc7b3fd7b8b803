import express, { type Express } from "express";
import cors from "cors";
import helmet from "helmet";
import morgan from "morgan";

import { NODE_ENV, PUBLIC_ORIGIN } from "./config";
import type { ControlPanel } from "./services/panel";
import { healthRouter } from "./routes/health";
import { statusRouter } from "./routes/status";
import { generateRouter } from "./routes/generate";
import { cancelRouter } from "./routes/cancel";
import { settingsRouter } from "./routes/settings";

export interface AppOptions {
  origins?: string[];
  accessLog?: boolean;
}

export function createApp(panel: ControlPanel, options: AppOptions = {}): Express {
  const app = express();

  if (options.accessLog ?? true) {
    app.use(morgan(NODE_ENV === "production" ? "combined" : "dev"));
  }
  app.use(helmet());
  app.use(
    cors({
      origin: options.origins ?? PUBLIC_ORIGIN,
      methods: ["GET", "POST", "PUT", "OPTIONS"],
      allowedHeaders: ["Content-Type"]
    })
  );
  app.use(express.json({ limit: "1mb" }));

  app.use(healthRouter());
  app.use("/api", statusRouter(panel));
  app.use("/api", generateRouter(panel));
  app.use("/api", cancelRouter(panel));
  app.use("/api", settingsRouter(panel));

  return app;
}
