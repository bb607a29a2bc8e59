// IMPORTANT:
// Environment variables must be loaded here (process entrypoint).
// Do NOT move dotenv loading into config.ts or services.
import dotenv from "dotenv";
dotenv.config();

import express, { type Request, type Response, type NextFunction } from "express";
import { registerRoutes } from "./routes";
import { loadConfig } from "./config";
import { log } from "./log";
import { DrizzleSpecCatalog, InMemorySpecCatalog, type SpecCatalog } from "../platform/catalog";
import { createDatabase } from "./db";

const config = loadConfig();
const app = express();

app.use(express.json({ limit: config.bodyLimit }));

app.use((req, res, next) => {
  const start = Date.now();
  const path = req.path;

  res.on("finish", () => {
    const duration = Date.now() - start;
    if (path.startsWith("/api")) {
      log(`${req.method} ${path} ${res.statusCode} in ${duration}ms`);
    }
  });

  next();
});

(async () => {
  let catalog: SpecCatalog;
  if (config.databaseUrl) {
    catalog = new DrizzleSpecCatalog(createDatabase(config.databaseUrl).db);
    log("spec catalog backed by postgres", "catalog");
  } else {
    catalog = new InMemorySpecCatalog();
    log("DATABASE_URL not set, using in-memory spec catalog", "catalog");
  }
  const httpServer = await registerRoutes(app, {
    catalog,
    engine: config.logDiagnostics ? { log } : {},
  });

  app.use((err: unknown, _req: Request, res: Response, next: NextFunction) => {
    const status =
      typeof err === "object" && err !== null && "status" in err && typeof err.status === "number"
        ? err.status
        : 500;
    const message = err instanceof Error && err.message ? err.message : "Internal Server Error";

    console.error("Internal Server Error:", err);

    if (res.headersSent) {
      return next(err);
    }

    return res.status(status).json({ message });
  });

  httpServer.listen({ port: config.port, host: config.host }, () => {
    log(`serving on port ${config.port}`);
  });
})().catch((err: unknown) => {
  console.error("[startup] failed to start server:", err);
  process.exit(1);
});
