import express from "express";
import { createPlatformRoutes, type PlatformRoutesDeps } from "./routes/platform.routes";
import { errorHandler } from "./errors";

export function createApp(deps: PlatformRoutesDeps): express.Express {
  const app = express();

  app.use(express.json({ limit: "2mb" }));

  app.get("/health", (_req, res) => {
    res.json({ status: "ok", timestamp: Math.floor(Date.now() / 1000) });
  });

  app.use("/api", createPlatformRoutes(deps));

  app.use(errorHandler);

  return app;
}
