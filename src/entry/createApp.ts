// src/entry/createApp.ts

import cors from "cors";
import express, { type Express, type Request, type Response } from "express";
import type { AppConfig } from "../core/config/env";
import { SERVICE_NAME, SERVICE_VERSION } from "../core/service";
import { errorResponder, notFound, requestLogging } from "./middleware";

export function createApp(config: AppConfig): Express {
  const app = express();
  app.disable("x-powered-by");

  app.use(requestLogging);
  app.use(
    cors({
      origin: config.corsOrigins,
      credentials: true,
    })
  );
  app.use(express.json());

  app.get("/", (_req: Request, res: Response) => {
    res.json({ message: `${SERVICE_NAME} is running!` });
  });

  app.get("/health", (_req: Request, res: Response) => {
    res.json({
      status: "healthy",
      environment: config.environment,
      database_url: config.databaseUrl,
    });
  });

  app.get("/api/test", (_req: Request, res: Response) => {
    res.json({
      message: "Test endpoint working!",
      data: {
        backend: "Express",
        version: SERVICE_VERSION,
        status: "operational",
      },
    });
  });

  app.use(notFound);
  app.use(errorResponder);

  return app;
}
