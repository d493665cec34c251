/**
 * Routes Index
 *
 * Mounts every route module under /api.
 */

import { Router } from 'express';
import { createRecommendationRoutes, type RecommendationRouteDeps } from './recommendations';

export type RouteDeps = RecommendationRouteDeps;

export function createApiRouter(deps: RouteDeps): Router {
  const router = Router();

  router.get('/health', (_req, res) => {
    res.json({ status: 'ok', rules: deps.repository.size });
  });

  router.use('/recommendations', createRecommendationRoutes(deps));

  return router;
}
