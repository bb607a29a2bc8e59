import type { Express, NextFunction, Response } from "express";
import { createServer, type Server } from "http";
import type { SpecCatalog } from "../platform/catalog";
import type { SpecEngineOptions } from "./spec/specEngine";
import * as specService from "./services/specService";
import { SpecServiceError } from "./services/specService";

function handleError(res: Response, next: NextFunction, err: unknown): void {
  if (!(err instanceof SpecServiceError)) {
    next(err);
    return;
  }
  const body: Record<string, unknown> = { message: err.message, code: err.code };
  if (err.diagnostics.length > 0) body.diagnostics = err.diagnostics;
  res.status(err.statusCode).json(body);
}

export interface RouteDependencies {
  catalog: SpecCatalog;
  engine?: SpecEngineOptions;
}

export async function registerRoutes(
  app: Express,
  deps: RouteDependencies,
): Promise<Server> {
  const { catalog } = deps;
  const engine = deps.engine ?? {};

  // Validate only; nothing is stored
  app.post("/api/specs/validate", (req, res) => {
    res.json(specService.validateSpecDocument(req.body, engine));
  });

  app.post("/api/specs", async (req, res, next) => {
    try {
      const { summary, created } = await specService.registerSpecDocument(catalog, req.body, engine);
      res.status(created ? 201 : 200).json(summary);
    } catch (err) {
      handleError(res, next, err);
    }
  });

  app.get("/api/specs", async (_req, res, next) => {
    try {
      res.json(await specService.listSpecs(catalog));
    } catch (err) {
      handleError(res, next, err);
    }
  });

  app.get("/api/specs/:id", async (req, res, next) => {
    try {
      res.json(await specService.getSpec(catalog, req.params.id));
    } catch (err) {
      handleError(res, next, err);
    }
  });

  app.get("/api/specs/:id/types/:name", async (req, res, next) => {
    try {
      res.json(await specService.getSpecType(catalog, req.params.id, req.params.name));
    } catch (err) {
      handleError(res, next, err);
    }
  });

  return createServer(app);
}
