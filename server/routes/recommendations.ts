/**
 * Recommendation Routes
 *
 * Runs the erosion control rules engine over a project and exposes the
 * active rule set and validation helpers.
 */

import { Router } from 'express';
import { z } from 'zod';
import { asyncHandler } from '../middleware/errorHandler';
import { sendMarkdown, sendSuccess } from '../middleware/responseHelpers';
import { validateBody } from '../middleware/validation';
import { RulesEngine } from '../services/erosionRulesEngine';
import { getAvailableFormulaFields } from '../services/formulaEvaluator';
import {
  enhanceProjectOutput,
  type EnhancementResult,
  type ProjectEnhancer,
} from '../services/projectEnhancer';
import { validateProjectInput, validateRuleList } from '../services/projectLoader';
import { generateMarkdownReport } from '../services/recommendationReport';
import type { RuleRepository } from '../services/ruleRepository';

export const recommendationRequestSchema = z.object({
  project: z.unknown(),
  rules: z.array(z.unknown()).optional(),
  enhance: z.boolean().default(false),
  format: z.enum(['json', 'markdown']).default('json'),
});

export const ruleValidationRequestSchema = z.object({
  rules: z.array(z.unknown()),
});

export const projectValidationRequestSchema = z.object({
  project: z.unknown(),
});

type RecommendationRequest = z.infer<typeof recommendationRequestSchema>;
type RuleValidationRequest = z.infer<typeof ruleValidationRequestSchema>;
type ProjectValidationRequest = z.infer<typeof projectValidationRequestSchema>;

export interface RecommendationRouteDeps {
  repository: RuleRepository;
  enhancer: ProjectEnhancer;
  llmTimeoutMs: number;
  /** Clock for output timestamps */
  now?: () => Date;
}

export function createRecommendationRoutes(deps: RecommendationRouteDeps): Router {
  const router = Router();

  /**
   * POST /api/recommendations
   * Evaluate a project against the active rules plus any request rules
   */
  router.post('/', validateBody(recommendationRequestSchema), asyncHandler(async (req, res) => {
    const body: RecommendationRequest = req.body;
    const project = validateProjectInput(body.project);
    const repository = body.rules && body.rules.length > 0
      ? deps.repository.extend(validateRuleList(body.rules))
      : deps.repository;

    const engine = new RulesEngine(repository, { now: deps.now });
    const output = engine.process(project);

    let enhancement: EnhancementResult | null = null;
    if (body.enhance) {
      const enhanced = await enhanceProjectOutput(deps.enhancer, project, output, {
        timeoutMs: deps.llmTimeoutMs,
      });
      enhancement = enhanced.enhancement;
    }

    if (body.format === 'markdown') {
      sendMarkdown(res, generateMarkdownReport(project, output, enhancement ?? undefined));
      return;
    }

    sendSuccess(res, { output, enhancement });
  }));

  /**
   * GET /api/recommendations/rules
   * Active rule set in evaluation order
   */
  router.get('/rules', (_req, res) => {
    sendSuccess(res, {
      ...deps.repository.describe(),
      rules: deps.repository.rules(),
      formulaFields: getAvailableFormulaFields(),
    });
  });

  /**
   * POST /api/recommendations/rules/validate
   * Check custom rules against the active set without running a project
   */
  router.post('/rules/validate', validateBody(ruleValidationRequestSchema), (req, res) => {
    const body: RuleValidationRequest = req.body;
    const merged = deps.repository.extend(validateRuleList(body.rules));
    sendSuccess(res, { valid: true, ...merged.describe() });
  });

  /**
   * POST /api/recommendations/projects/validate
   * Validate a project and preview which rules it triggers
   */
  router.post('/projects/validate', validateBody(projectValidationRequestSchema), (req, res) => {
    const body: ProjectValidationRequest = req.body;
    const project = validateProjectInput(body.project);
    const preview = new RulesEngine(deps.repository).previewMatchingRules(project);

    sendSuccess(res, {
      valid: true,
      summary: {
        project_name: project.project_name,
        jurisdiction: project.jurisdiction,
        total_disturbed_acres: project.total_disturbed_acres,
        predominant_soil: project.predominant_soil,
        predominant_slope: project.predominant_slope,
        drainage_features: project.drainage_features.length,
        phases: project.phases.length,
      },
      matchingRules: preview.matching,
    });
  });

  return router;
}
