import express, { type ErrorRequestHandler, type Express, type Request, type Response } from "express";
import type { Server } from "http";
import { createLogger } from "./utils/logger";

const logger = createLogger({ file: "server" });

export function createDevServer(outputDir: string): Express {
  const app = express();

  app.get("/_health", (req: Request, res: Response) => {
    res.status(200).json({ result: "ok" });
  });

  app.use(express.static(outputDir, { extensions: ["html"] }));

  app.use((req: Request, res: Response) => {
    res.status(404).json({ error: `not found: ${req.path}` });
  });

  const errorHandler: ErrorRequestHandler = (err, req, res, next) => {
    logger.error(`[serve] ${err}`);
    if (res.headersSent) return next(err);
    const status = typeof err?.statusCode === "number" ? err.statusCode : 500;
    res.status(status).json({
      error: err instanceof Error ? err.message : "internal server error",
    });
  };
  app.use(errorHandler);

  return app;
}

export function startDevServer(outputDir: string, host: string, port: number): Promise<Server> {
  const app = createDevServer(outputDir);
  return new Promise((resolve, reject) => {
    const server = app.listen(port, host, () => {
      logger.info(`serving ${outputDir} on http://${host}:${port}`);
      resolve(server);
    });
    server.on("error", reject);
  });
}

export function handleShutdown(server: Server): void {
  let shuttingDown = false;
  function shutdown(signal: string) {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info(`[shutdown] Received ${signal}. Closing server...`);
    server.close((err) => {
      if (err) {
        logger.error(`[shutdown] HTTP server close error: ${err}`);
        process.exit(1);
      }
      logger.info("[shutdown] Goodbye.");
      process.exit(0);
    });
    setTimeout(() => {
      logger.warn("[shutdown] Shutdown timed out, force exiting.");
      process.exit(1);
    }, 10000).unref();
  }
  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));
}
