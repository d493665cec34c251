/**
 * Erosion Control Rules Engine
 *
 * Deterministic practice and pay item recommendations for one project.
 * This is NOT AI - this is institutional logic written down.
 *
 * PIPELINE (single pass, no retries):
 * 1. Walk the repository's rules in priority order
 * 2. Evaluate each rule's conditions against the project
 * 3. On a match, evaluate the quantity formula
 * 4. Assemble practices, pay items and the summary
 *
 * Every matching rule is applied; priority only orders the output.
 * The first condition or formula error aborts the run with the rule id attached.
 */

import type { ProjectInput, ProjectOutput } from '../../shared/schema';
import { loggers, logTiming } from '../lib/logger';
import { matchesConditions } from './conditionEvaluator';
import { evaluateFormula } from './formulaEvaluator';
import { assembleProjectOutput, type RuleMatch } from './outputAssembler';
import type { RuleRepository } from './ruleRepository';

const log = loggers.engine;

export interface RulesEngineOptions {
  /** Clock used for the output timestamp */
  now?: () => Date;
}

export class RulesEngine {
  private readonly now: () => Date;

  constructor(
    private readonly repository: RuleRepository,
    options: RulesEngineOptions = {}
  ) {
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Evaluate every rule against the project and assemble the result
   */
  process(project: ProjectInput): ProjectOutput {
    const start = Date.now();
    const matches: RuleMatch[] = [];
    const rules = this.repository.rules();

    for (const rule of rules) {
      if (!matchesConditions(rule.conditions, project, { ruleId: rule.id })) {
        continue;
      }

      const quantity = evaluateFormula(rule.action.quantity_formula, project, { ruleId: rule.id });
      log.debug({ ruleId: rule.id, quantity, unit: rule.action.unit }, 'Rule matched');
      matches.push({ rule, quantity });
    }

    const output = assembleProjectOutput({
      projectName: project.project_name,
      timestamp: this.now().toISOString(),
      matches,
    });

    logTiming(log, 'Project processing', start, {
      project: project.project_name,
      rulesEvaluated: rules.length,
      rulesMatched: matches.length,
      totalEstimatedCost: output.summary.total_estimated_cost,
    });

    return output;
  }

  /**
   * Ids of the rules whose conditions hold, without computing quantities
   */
  previewMatchingRules(project: ProjectInput): { matching: string[]; notMatching: string[] } {
    const matching: string[] = [];
    const notMatching: string[] = [];

    for (const rule of this.repository.rules()) {
      if (matchesConditions(rule.conditions, project, { ruleId: rule.id })) {
        matching.push(rule.id);
      } else {
        notMatching.push(rule.id);
      }
    }

    return { matching, notMatching };
  }
}
