/**
 * Condition Evaluator
 *
 * Decides whether a rule's condition list is satisfied by a project.
 * Conditions are ANDed; an empty list always matches.
 */

import { isDeepStrictEqual } from 'util';
import type { ConditionValue, ProjectInput, RuleCondition } from '../../shared/schema';
import {
  ConditionFieldError,
  ConditionTypeError,
  ConditionValueError,
  type RuleErrorContext,
} from './ruleErrors';

// ============================================
// FIELD REGISTRY
// ============================================

/** ProjectInput attributes addressable by name */
export const DIRECT_CONDITION_FIELDS = [
  'project_name',
  'jurisdiction',
  'total_disturbed_acres',
  'predominant_soil',
  'predominant_slope',
  'average_slope_percent',
  'drainage_features',
  'phases',
  'metadata',
] as const;

/** Values computed from the project rather than read from it */
export const DERIVED_CONDITION_FIELDS = [
  'has_drainage_features',
  'drainage_feature_count',
  'phase_count',
  'total_drainage_area_acres',
] as const;

export type DirectConditionField = (typeof DIRECT_CONDITION_FIELDS)[number];
export type DerivedConditionField = (typeof DERIVED_CONDITION_FIELDS)[number];

const METADATA_PREFIX = 'metadata.';

export interface ConditionContext {
  ruleId?: string;
}

const DIRECT_FIELD_SET: ReadonlySet<string> = new Set(DIRECT_CONDITION_FIELDS);
const DERIVED_FIELD_SET: ReadonlySet<string> = new Set(DERIVED_CONDITION_FIELDS);

function isDirectField(field: string): field is DirectConditionField {
  return DIRECT_FIELD_SET.has(field);
}

function isDerivedField(field: string): field is DerivedConditionField {
  return DERIVED_FIELD_SET.has(field);
}

/**
 * Whether a condition field can be resolved for any project
 */
export function isKnownConditionField(field: string): boolean {
  if (isDirectField(field) || isDerivedField(field)) {
    return true;
  }
  return field.startsWith(METADATA_PREFIX) && field.length > METADATA_PREFIX.length;
}

/**
 * Throw ConditionFieldError for a field no project could resolve
 */
export function assertKnownConditionField(field: string, context: ConditionContext = {}): void {
  if (!isKnownConditionField(field)) {
    throw new ConditionFieldError(field, { ruleId: context.ruleId });
  }
}

// ============================================
// MAIN API
// ============================================

/**
 * True when every condition holds for the project
 */
export function matchesConditions(
  conditions: readonly RuleCondition[],
  project: ProjectInput,
  context: ConditionContext = {}
): boolean {
  return conditions.every((condition) => evaluateCondition(condition, project, context));
}

/**
 * Evaluate a single condition against the project
 */
export function evaluateCondition(
  condition: RuleCondition,
  project: ProjectInput,
  context: ConditionContext = {}
): boolean {
  const fieldValue = resolveConditionField(condition.field, project, context);

  // Unresolvable values (a missing metadata key) never match
  if (fieldValue === undefined) {
    return false;
  }

  return compareValues(fieldValue, condition, { ruleId: context.ruleId });
}

/**
 * Get the value of a condition field from the project
 */
export function resolveConditionField(
  field: string,
  project: ProjectInput,
  context: ConditionContext = {}
): unknown {
  if (isDerivedField(field)) {
    switch (field) {
      case 'has_drainage_features':
        return project.drainage_features.length > 0;
      case 'drainage_feature_count':
        return project.drainage_features.length;
      case 'phase_count':
        return project.phases.length;
      case 'total_drainage_area_acres':
        return project.drainage_features.reduce((sum, feature) => sum + feature.drainage_area_acres, 0);
    }
  }

  if (isDirectField(field)) {
    return project[field];
  }

  if (field.startsWith(METADATA_PREFIX) && field.length > METADATA_PREFIX.length) {
    return resolveMetadataPath(project.metadata, field.slice(METADATA_PREFIX.length));
  }

  throw new ConditionFieldError(field, { ruleId: context.ruleId });
}

/**
 * Walk a dotted path such as "permit.type" through the metadata map
 */
function resolveMetadataPath(metadata: Record<string, unknown>, path: string): unknown {
  let value: unknown = metadata;
  for (const part of path.split('.')) {
    if (value === null || typeof value !== 'object' || Array.isArray(value)) {
      return undefined;
    }
    value = Object.prototype.hasOwnProperty.call(value, part)
      ? Reflect.get(value, part)
      : undefined;
  }
  return value === null ? undefined : value;
}

// ============================================
// OPERATORS
// ============================================

function compareValues(fieldValue: unknown, condition: RuleCondition, errorContext: RuleErrorContext): boolean {
  const { operator, value } = condition;

  switch (operator) {
    case 'eq':
      return isDeepStrictEqual(fieldValue, value);

    case 'ne':
      return !isDeepStrictEqual(fieldValue, value);

    case 'gt':
      return compareNumbers(fieldValue, condition, errorContext) > 0;

    case 'gte':
      return compareNumbers(fieldValue, condition, errorContext) >= 0;

    case 'lt':
      return compareNumbers(fieldValue, condition, errorContext) < 0;

    case 'lte':
      return compareNumbers(fieldValue, condition, errorContext) <= 0;

    case 'in':
      if (!Array.isArray(value)) {
        throw new ConditionValueError(`operator "in" on field "${condition.field}" requires a list value`, errorContext);
      }
      return value.some((candidate) => isDeepStrictEqual(fieldValue, candidate));

    case 'contains':
      return stringify(fieldValue).includes(stringify(value));
  }
}

function compareNumbers(fieldValue: unknown, condition: RuleCondition, errorContext: RuleErrorContext): number {
  const target: ConditionValue = condition.value;
  if (typeof fieldValue !== 'number' || typeof target !== 'number') {
    throw new ConditionTypeError(
      `operator "${condition.operator}" on field "${condition.field}" requires numeric operands, got ${describeType(fieldValue)} and ${describeType(target)}`,
      errorContext
    );
  }
  return fieldValue - target;
}

function stringify(value: unknown): string {
  if (typeof value === 'string') {
    return value;
  }
  if (typeof value === 'number' || typeof value === 'boolean' || value === null) {
    return String(value);
  }
  return JSON.stringify(value);
}

function describeType(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'list';
  return typeof value;
}
