import { env } from "../core/config";
import { logger } from "../core/logger";
import { createRuntime } from "../runtime";
import { createApp } from "./index";

export function startServer(): void {
  if (!env.API_ENABLED) {
    logger.warn("API_ENABLED is false, not starting server");
    return;
  }

  const runtime = createRuntime();
  const app = createApp({ adapters: runtime.adapters, store: runtime.store });

  const server = app.listen(env.API_PORT, env.API_HOST, () => {
    logger.info(`API server listening on http://${env.API_HOST}:${env.API_PORT}`);
  });

  const shutdown = (signal: string) => {
    logger.info({ signal }, "Shutting down");
    server.close();
    runtime
      .shutdown()
      .catch((error: unknown) => logger.error({ err: error }, "Shutdown failed"))
      .finally(() => process.exit(0));
  };
  process.once("SIGINT", () => shutdown("SIGINT"));
  process.once("SIGTERM", () => shutdown("SIGTERM"));
}

startServer();
