/**
 * Rule Repository
 *
 * Owns the validated, priority-ordered rule set consumed by the rules engine.
 *
 * MERGE ORDER:
 * 1. Built-in catalogue rules, in catalogue order
 * 2. Custom rules - an id collision replaces the entry, a new id appends
 * 3. Stable sort by priority (ties keep insertion order)
 *
 * The rule set is frozen after construction and safe to share between requests.
 */

import {
  isPracticeType,
  ruleSpecSchema,
  type RuleSpec,
  type RuleSpecData,
  type RuleSpecSource,
} from '../../shared/schema';
import { DEFAULT_EROSION_RULES, DEFAULT_RULE_CATALOG_VERSION } from '../config/defaultErosionRules';
import { loggers } from '../lib/logger';
import { assertKnownConditionField } from './conditionEvaluator';
import { parseFormula } from './formulaEvaluator';
import { RuleValidationError, RulesEngineError } from './ruleErrors';

const log = loggers.rules;

export interface RuleRepositoryOptions {
  /** Replaces the built-in catalogue (tests and alternate catalogues) */
  defaults?: readonly RuleSpecData[];
  catalogVersion?: string;
}

export interface RuleSetInfo {
  catalogVersion: string;
  defaultCount: number;
  customCount: number;
  overriddenIds: string[];
  totalRules: number;
}

export class RuleRepository {
  private readonly orderedRules: readonly RuleSpec[];
  private readonly info: RuleSetInfo;

  private constructor(
    rules: readonly RuleSpec[],
    info: RuleSetInfo,
    private readonly customRules: readonly RuleSpecSource[],
    private readonly options: RuleRepositoryOptions
  ) {
    this.orderedRules = Object.freeze([...rules]);
    this.info = info;
  }

  /**
   * Build a repository from the defaults plus optional custom rules
   */
  static load(
    customRules: readonly RuleSpecSource[] = [],
    options: RuleRepositoryOptions = {}
  ): RuleRepository {
    const defaults = options.defaults ?? DEFAULT_EROSION_RULES;
    const catalogVersion = options.catalogVersion ?? DEFAULT_RULE_CATALOG_VERSION;

    const merged = new Map<string, RuleSpec>();
    for (const data of defaults) {
      const rule = normalizeRule(data);
      if (merged.has(rule.id)) {
        throw new RuleValidationError('duplicate rule id in default catalogue', { ruleId: rule.id });
      }
      merged.set(rule.id, rule);
    }

    const overriddenIds: string[] = [];
    for (const data of customRules) {
      const rule = normalizeRule(data);
      if (merged.has(rule.id)) {
        overriddenIds.push(rule.id);
      }
      // Map.set keeps the original slot on overwrite
      merged.set(rule.id, rule);
    }

    for (const rule of merged.values()) {
      validateRule(rule);
    }

    const ordered = [...merged.values()]
      .map((rule, insertion) => ({ rule, insertion }))
      .sort((a, b) => a.rule.priority - b.rule.priority || a.insertion - b.insertion)
      .map(({ rule }) => freezeRule(rule));

    const info: RuleSetInfo = {
      catalogVersion,
      defaultCount: defaults.length,
      customCount: customRules.length,
      overriddenIds,
      totalRules: ordered.length,
    };

    log.info(info, 'Rule set loaded');
    return new RuleRepository(ordered, info, [...customRules], options);
  }

  /**
   * New repository with further custom rules merged over this one's
   */
  extend(customRules: readonly RuleSpecSource[]): RuleRepository {
    return RuleRepository.load([...this.customRules, ...customRules], this.options);
  }

  /**
   * Validated rules in evaluation order
   */
  rules(): readonly RuleSpec[] {
    return this.orderedRules;
  }

  describe(): RuleSetInfo {
    return { ...this.info, overriddenIds: [...this.info.overriddenIds] };
  }

  get size(): number {
    return this.orderedRules.length;
  }
}

/**
 * Freeze a rule down to its condition values
 */
function freezeRule(rule: RuleSpec): RuleSpec {
  for (const condition of rule.conditions) {
    if (Array.isArray(condition.value)) {
      Object.freeze(condition.value);
    }
    Object.freeze(condition);
  }
  Object.freeze(rule.conditions);
  Object.freeze(rule.action);
  return Object.freeze(rule);
}

// ============================================
// VALIDATION
// ============================================

/**
 * Apply schema defaults and structural checks to one rule
 */
function normalizeRule(data: RuleSpecSource): RuleSpec {
  const result = ruleSpecSchema.safeParse(data);
  if (!result.success) {
    const issue = result.error.issues[0];
    const path = issue.path.join('.');
    throw new RuleValidationError(`${path ? `${path}: ` : ''}${issue.message}`, {
      ruleId: typeof data.id === 'string' && data.id !== '' ? data.id : undefined,
      details: { issues: result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`) },
    });
  }
  return result.data;
}

/**
 * Semantic checks that need the evaluators: ids, fields, practice types, formulas
 */
export function validateRule(rule: RuleSpec): void {
  if (rule.id.trim() === '') {
    throw new RuleValidationError(`rule "${rule.name}" has an empty id`);
  }

  if (!Number.isInteger(rule.priority)) {
    throw new RuleValidationError(`priority ${rule.priority} is not an integer`, { ruleId: rule.id });
  }

  if (!isPracticeType(rule.action.practice_type)) {
    throw new RuleValidationError(`unrecognized practice type "${rule.action.practice_type}"`, {
      ruleId: rule.id,
    });
  }

  for (const condition of rule.conditions) {
    try {
      assertKnownConditionField(condition.field, { ruleId: rule.id });
    } catch (error) {
      throw wrapDefect(error, rule.id);
    }

    if (condition.operator === 'in' && !Array.isArray(condition.value)) {
      throw new RuleValidationError(`operator "in" on field "${condition.field}" requires a list value`, {
        ruleId: rule.id,
      });
    }
  }

  try {
    parseFormula(rule.action.quantity_formula, { ruleId: rule.id });
  } catch (error) {
    throw wrapDefect(error, rule.id, rule.action.quantity_formula);
  }
}

function wrapDefect(error: unknown, ruleId: string, formula?: string): unknown {
  if (error instanceof RulesEngineError) {
    return new RuleValidationError(error.defect, {
      ruleId,
      formula,
      details: { cause: error.code, ...error.details },
      cause: error,
    });
  }
  return error;
}
