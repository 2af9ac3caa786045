import { Router } from "express";
import type { HealthResponse } from "@regintel/shared";
import type { DependencyChecks } from "../runtime/connectivity.js";

interface CreateHealthRouterOptions {
  checkDependencies: () => DependencyChecks;
  startTime?: number;
}

export function createHealthRouter(options: CreateHealthRouterOptions): Router {
  const startTime = options.startTime ?? Date.now();

  const healthRouter = Router();

  // Always healthy: downstream availability only changes answer quality.
  healthRouter.get("/", (_req, res) => {
    const response: HealthResponse = {
      status: "healthy",
      message: "RegIntel API is running",
      timestamp: new Date().toISOString(),
      uptimeSec: Math.max(0, Math.floor((Date.now() - startTime) / 1000)),
      checks: options.checkDependencies()
    };
    res.json(response);
  });

  return healthRouter;
}
