/**
 * Rules Engine Errors
 *
 * Every failure the engine can raise carries a stable code, the id of the rule
 * that caused it and, for quantity formulas, the formula text. The HTTP error
 * handler reads statusCode/code/details directly off these errors.
 */

export type RulesEngineErrorCode =
  | 'RULE_VALIDATION_ERROR'
  | 'CONDITION_FIELD_ERROR'
  | 'CONDITION_TYPE_ERROR'
  | 'CONDITION_VALUE_ERROR'
  | 'FORMULA_SYNTAX_ERROR'
  | 'FORMULA_FIELD_ERROR'
  | 'FORMULA_EVALUATION_ERROR'
  | 'PROJECT_INPUT_ERROR';

export interface RuleErrorContext {
  ruleId?: string;
  formula?: string;
  details?: Record<string, unknown>;
  cause?: unknown;
}

function formatMessage(defect: string, context: RuleErrorContext): string {
  const prefix = context.ruleId !== undefined ? `Rule ${context.ruleId}: ` : '';
  const suffix = context.formula !== undefined ? ` in formula "${context.formula}"` : '';
  return `${prefix}${defect}${suffix}`;
}

export class RulesEngineError extends Error {
  readonly code: RulesEngineErrorCode;
  readonly defect: string;
  readonly ruleId?: string;
  readonly formula?: string;
  readonly details?: Record<string, unknown>;
  readonly statusCode: number = 422;
  readonly isOperational = true;

  constructor(code: RulesEngineErrorCode, defect: string, context: RuleErrorContext = {}) {
    super(formatMessage(defect, context), context.cause !== undefined ? { cause: context.cause } : undefined);
    this.name = new.target.name;
    this.code = code;
    this.defect = defect;
    this.ruleId = context.ruleId;
    this.formula = context.formula;
    this.details = {
      ...(context.ruleId !== undefined ? { ruleId: context.ruleId } : {}),
      ...(context.formula !== undefined ? { formula: context.formula } : {}),
      ...context.details,
    };
  }
}

/**
 * A rule failed load-time validation. Fatal to repository construction.
 */
export class RuleValidationError extends RulesEngineError {
  constructor(defect: string, context: RuleErrorContext = {}) {
    super('RULE_VALIDATION_ERROR', defect, context);
  }
}

/**
 * A condition references a field the engine cannot resolve.
 */
export class ConditionFieldError extends RulesEngineError {
  readonly field: string;

  constructor(field: string, context: RuleErrorContext = {}) {
    super('CONDITION_FIELD_ERROR', `unknown condition field "${field}"`, {
      ...context,
      details: { field, ...context.details },
    });
    this.field = field;
  }
}

/**
 * A numeric comparison was attempted on a non-numeric operand.
 */
export class ConditionTypeError extends RulesEngineError {
  constructor(defect: string, context: RuleErrorContext = {}) {
    super('CONDITION_TYPE_ERROR', defect, context);
  }
}

/**
 * A condition value has the wrong shape for its operator (e.g. `in` without a list).
 */
export class ConditionValueError extends RulesEngineError {
  constructor(defect: string, context: RuleErrorContext = {}) {
    super('CONDITION_VALUE_ERROR', defect, context);
  }
}

export class FormulaSyntaxError extends RulesEngineError {
  readonly position?: number;

  constructor(defect: string, context: RuleErrorContext & { position?: number } = {}) {
    super('FORMULA_SYNTAX_ERROR', defect, {
      ...context,
      details: context.position !== undefined ? { position: context.position, ...context.details } : context.details,
    });
    this.position = context.position;
  }
}

export class FormulaFieldError extends RulesEngineError {
  readonly identifier: string;

  constructor(identifier: string, context: RuleErrorContext = {}) {
    super('FORMULA_FIELD_ERROR', `unknown identifier "${identifier}"`, {
      ...context,
      details: { identifier, ...context.details },
    });
    this.identifier = identifier;
  }
}

export class FormulaEvaluationError extends RulesEngineError {
  constructor(defect: string, context: RuleErrorContext = {}) {
    super('FORMULA_EVALUATION_ERROR', defect, context);
  }
}

/**
 * Project input failed schema validation at the loading boundary.
 */
export class ProjectInputError extends RulesEngineError {
  readonly statusCode: number = 400;
  readonly issues: string[];

  constructor(defect: string, issues: string[] = []) {
    super('PROJECT_INPUT_ERROR', defect, { details: issues.length > 0 ? { issues } : undefined });
    this.issues = issues;
  }
}
