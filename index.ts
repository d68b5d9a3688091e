import express from "express";
import type { Application, NextFunction, Request, Response } from "express";
import path from "node:path";
import fs from "node:fs";
import swaggerUi from "swagger-ui-express";
import helmet from "helmet";
import { loadSettings } from "./src/config/settings";
import { createHybridAgent } from "./src/agent/hybridAgent";
import { createRoutes } from "./src/routes";
import { DataSourceUnavailableError } from "./src/errors";
import { errorMessage, safeJsonParse } from "./src/utils";

function loadSwaggerDocument(): Record<string, unknown> | null {
  const swaggerPath = path.resolve(__dirname, "..", "swagger.json");
  if (!fs.existsSync(swaggerPath)) {
    console.warn(`Swagger definition not found at ${swaggerPath}. /docs route disabled.`);
    return null;
  }
  const document = safeJsonParse<Record<string, unknown>>(fs.readFileSync(swaggerPath, "utf-8"));
  if (!document) {
    console.error("Failed to parse swagger.json");
  }
  return document;
}

async function main(): Promise<void> {
  const settings = loadSettings();
  const { agent, close } = await createHybridAgent(settings);

  const app: Application = express();
  app.use(helmet());
  app.use(express.json({ limit: "1mb" }));

  const swaggerDocument = loadSwaggerDocument();
  if (swaggerDocument) {
    app.use("/docs", swaggerUi.serve, swaggerUi.setup(swaggerDocument));
  }

  app.get("/health", (_req: Request, res: Response) => {
    res.json({ status: "ok", uptime: process.uptime() });
  });

  app.use(createRoutes(agent, { batchConcurrency: settings.batchConcurrency }));

  app.use((err: Error, _req: Request, res: Response, _next: NextFunction) => {
    console.error("Unhandled error", err);
    res.status(500).json({ message: "Unexpected server error" });
  });

  const server = app.listen(settings.port, () => {
    console.log(`Retail analytics copilot listening on port ${settings.port}`);
  });

  process.on("SIGTERM", () => {
    console.log("Received SIGTERM, shutting down.");
    server.close();
    close()
      .catch((error: unknown) => console.error("Failed to close database pool", error))
      .finally(() => process.exit(0));
  });
}

process.on("unhandledRejection", (reason: unknown) => {
  console.error("Unhandled promise rejection", reason);
});

main().catch((error: unknown) => {
  if (error instanceof DataSourceUnavailableError) {
    console.error(`Cannot start: ${error.message}`);
  } else {
    console.error("Startup failed", errorMessage(error));
  }
  process.exit(1);
});
