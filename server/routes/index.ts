/**
 * Routes Index
 * Registers every route module under the versioned and legacy API prefixes
 */

import { Express, Router } from "express";
import healthRoutes from "./health";
import { createMatchingRouter, type MatchingRouterDeps } from "./matching";

function buildApiRouter(deps: MatchingRouterDeps): Router {
  const router = Router();
  router.use(healthRoutes);
  router.use(createMatchingRouter(deps));
  return router;
}

/**
 * Mount the API on /api/v1, and on /api for backward compatibility
 */
export function registerRoutes(app: Express, deps: MatchingRouterDeps): void {
  const api = buildApiRouter(deps);
  app.use("/api/v1", api);
  app.use("/api", api);
}
