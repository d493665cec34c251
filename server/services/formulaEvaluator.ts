/**
 * Formula Evaluator
 *
 * Safe parser and evaluator for rule quantity formulas.
 * Formulas are declarative arithmetic strings over project fields.
 *
 * DESIGN DECISIONS:
 * - No arbitrary code execution - formulas are parsed into an expression tree
 * - Only whitelisted project fields may be referenced
 * - Authoring defects raise typed errors, never a silent zero
 *
 * FORMULA SYNTAX:
 * - Fields: total_disturbed_acres, average_slope_percent, drainage_feature_count,
 *   phase_count, total_drainage_area_acres
 * - Constants: numbers (e.g., 200, 3.5, .25)
 * - Operators: +, -, *, / (binary), + and - (unary)
 * - Parentheses for grouping
 *
 * EXAMPLES:
 * - "total_disturbed_acres * 200"
 * - "total_disturbed_acres * 43560 / 9"
 * - "(drainage_feature_count + 1) * 2"
 */

import type { ProjectInput } from '../../shared/schema';
import {
  FormulaEvaluationError,
  FormulaFieldError,
  FormulaSyntaxError,
  type RuleErrorContext,
} from './ruleErrors';

// ============================================
// TYPE DEFINITIONS
// ============================================

export const FORMULA_FIELDS = [
  'total_disturbed_acres',
  'average_slope_percent',
  'drainage_feature_count',
  'phase_count',
  'total_drainage_area_acres',
] as const;

export type FormulaField = (typeof FORMULA_FIELDS)[number];

export type BinaryOperator = '+' | '-' | '*' | '/';
export type UnaryOperator = '+' | '-';

/**
 * Parsed formula expression tree
 */
export type FormulaNode =
  | { kind: 'literal'; value: number }
  | { kind: 'field'; name: FormulaField }
  | { kind: 'unary'; operator: UnaryOperator; operand: FormulaNode }
  | { kind: 'binary'; operator: BinaryOperator; left: FormulaNode; right: FormulaNode };

type Token =
  | { type: 'number'; value: number; position: number }
  | { type: 'identifier'; name: string; position: number }
  | { type: 'operator'; value: BinaryOperator; position: number }
  | { type: 'lparen'; position: number }
  | { type: 'rparen'; position: number };

/** Context used to attribute errors to the rule that owns the formula */
export interface FormulaContext {
  ruleId?: string;
}

const FORMULA_FIELD_SET: ReadonlySet<string> = new Set(FORMULA_FIELDS);

function isFormulaField(name: string): name is FormulaField {
  return FORMULA_FIELD_SET.has(name);
}

function isBinaryOperator(char: string): char is BinaryOperator {
  return char === '+' || char === '-' || char === '*' || char === '/';
}

// ============================================
// MAIN API
// ============================================

/**
 * Parse a formula into an expression tree without evaluating it
 */
export function parseFormula(formula: string, context: FormulaContext = {}): FormulaNode {
  const errorContext: RuleErrorContext = { ruleId: context.ruleId, formula };

  if (formula.trim() === '') {
    throw new FormulaSyntaxError('empty formula', errorContext);
  }

  const tokens = tokenize(formula, errorContext);
  const parser = new FormulaParser(tokens, formula.length, errorContext);
  return parser.parse();
}

/**
 * Evaluate a formula against a project's numeric fields
 */
export function evaluateFormula(
  formula: string,
  project: ProjectInput,
  context: FormulaContext = {}
): number {
  const tree = parseFormula(formula, context);
  const quantity = evaluateTree(tree, formulaVariables(project), { ruleId: context.ruleId, formula });

  if (!Number.isFinite(quantity)) {
    throw new FormulaEvaluationError('result is not a finite number', { ruleId: context.ruleId, formula });
  }

  if (quantity < 0) {
    throw new FormulaEvaluationError(`negative quantity ${quantity}`, {
      ruleId: context.ruleId,
      formula,
    });
  }

  return quantity;
}

/**
 * Validate a formula without evaluating it
 * Returns list of errors if invalid
 */
export function validateFormula(formula: string): {
  valid: boolean;
  errors: string[];
  referencedFields: FormulaField[];
} {
  try {
    const tree = parseFormula(formula);
    return { valid: true, errors: [], referencedFields: collectFields(tree) };
  } catch (error) {
    const message = error instanceof FormulaSyntaxError || error instanceof FormulaFieldError
      ? error.defect
      : error instanceof Error ? error.message : 'Parse error';
    return { valid: false, errors: [message], referencedFields: [] };
  }
}

/**
 * Numeric values bound to formula identifiers for a project
 */
export function formulaVariables(project: ProjectInput): Record<FormulaField, number> {
  return {
    total_disturbed_acres: project.total_disturbed_acres,
    average_slope_percent: project.average_slope_percent,
    drainage_feature_count: project.drainage_features.length,
    phase_count: project.phases.length,
    total_drainage_area_acres: project.drainage_features.reduce(
      (sum, feature) => sum + feature.drainage_area_acres,
      0
    ),
  };
}

// ============================================
// TOKENIZER
// ============================================

function tokenize(formula: string, errorContext: RuleErrorContext): Token[] {
  const tokens: Token[] = [];
  let pos = 0;

  while (pos < formula.length) {
    const char = formula[pos];

    if (/\s/.test(char)) {
      pos++;
      continue;
    }

    // Number (including decimals)
    if (/\d/.test(char) || (char === '.' && /\d/.test(formula[pos + 1] ?? ''))) {
      const start = pos;
      let numStr = '';
      while (pos < formula.length && /[\d.]/.test(formula[pos])) {
        numStr += formula[pos++];
      }
      if ((numStr.match(/\./g) ?? []).length > 1) {
        throw new FormulaSyntaxError(`malformed number "${numStr}" at position ${start}`, {
          ...errorContext,
          position: start,
        });
      }
      tokens.push({ type: 'number', value: parseFloat(numStr), position: start });
      continue;
    }

    if (isBinaryOperator(char)) {
      tokens.push({ type: 'operator', value: char, position: pos++ });
      continue;
    }

    if (char === '(') {
      tokens.push({ type: 'lparen', position: pos++ });
      continue;
    }

    if (char === ')') {
      tokens.push({ type: 'rparen', position: pos++ });
      continue;
    }

    if (/[A-Za-z_]/.test(char)) {
      const start = pos;
      let ident = '';
      while (pos < formula.length && /[A-Za-z0-9_]/.test(formula[pos])) {
        ident += formula[pos++];
      }
      tokens.push({ type: 'identifier', name: ident, position: start });
      continue;
    }

    throw new FormulaSyntaxError(`unexpected character "${char}" at position ${pos}`, {
      ...errorContext,
      position: pos,
    });
  }

  return tokens;
}

// ============================================
// PARSER (recursive descent)
//
//   expression := term (('+' | '-') term)*
//   term       := factor (('*' | '/') factor)*
//   factor     := ('+' | '-') factor | number | identifier | '(' expression ')'
// ============================================

class FormulaParser {
  private index = 0;

  constructor(
    private readonly tokens: Token[],
    private readonly length: number,
    private readonly errorContext: RuleErrorContext
  ) {}

  parse(): FormulaNode {
    const tree = this.parseExpression();
    const extra = this.peek();
    if (extra) {
      throw this.unexpected(extra);
    }
    return tree;
  }

  private parseExpression(): FormulaNode {
    let left = this.parseTerm();
    let next = this.peek();
    while (next?.type === 'operator' && (next.value === '+' || next.value === '-')) {
      this.index++;
      left = { kind: 'binary', operator: next.value, left, right: this.parseTerm() };
      next = this.peek();
    }
    return left;
  }

  private parseTerm(): FormulaNode {
    let left = this.parseFactor();
    let next = this.peek();
    while (next?.type === 'operator' && (next.value === '*' || next.value === '/')) {
      this.index++;
      left = { kind: 'binary', operator: next.value, left, right: this.parseFactor() };
      next = this.peek();
    }
    return left;
  }

  private parseFactor(): FormulaNode {
    const token = this.peek();
    if (!token) {
      throw new FormulaSyntaxError(`unexpected end of formula at position ${this.length}`, {
        ...this.errorContext,
        position: this.length,
      });
    }
    this.index++;

    switch (token.type) {
      case 'number':
        return { kind: 'literal', value: token.value };

      case 'identifier':
        if (!isFormulaField(token.name)) {
          throw new FormulaFieldError(token.name, this.errorContext);
        }
        return { kind: 'field', name: token.name };

      case 'operator':
        if (token.value === '+' || token.value === '-') {
          return { kind: 'unary', operator: token.value, operand: this.parseFactor() };
        }
        throw this.unexpected(token);

      case 'lparen': {
        const inner = this.parseExpression();
        const closing = this.peek();
        if (closing?.type !== 'rparen') {
          throw new FormulaSyntaxError(`unbalanced parenthesis opened at position ${token.position}`, {
            ...this.errorContext,
            position: token.position,
          });
        }
        this.index++;
        return inner;
      }

      case 'rparen':
        throw this.unexpected(token);
    }
  }

  private peek(): Token | undefined {
    return this.tokens[this.index];
  }

  private unexpected(token: Token): FormulaSyntaxError {
    return new FormulaSyntaxError(`unexpected token "${describeToken(token)}" at position ${token.position}`, {
      ...this.errorContext,
      position: token.position,
    });
  }
}

function describeToken(token: Token): string {
  switch (token.type) {
    case 'number':
      return String(token.value);
    case 'identifier':
      return token.name;
    case 'operator':
      return token.value;
    case 'lparen':
      return '(';
    case 'rparen':
      return ')';
  }
}

// ============================================
// TREE EVALUATOR
// ============================================

function evaluateTree(
  node: FormulaNode,
  variables: Record<FormulaField, number>,
  errorContext: RuleErrorContext
): number {
  switch (node.kind) {
    case 'literal':
      return node.value;

    case 'field':
      return variables[node.name];

    case 'unary': {
      const operand = evaluateTree(node.operand, variables, errorContext);
      return node.operator === '-' ? -operand : operand;
    }

    case 'binary': {
      const a = evaluateTree(node.left, variables, errorContext);
      const b = evaluateTree(node.right, variables, errorContext);
      let result: number;

      switch (node.operator) {
        case '+':
          result = a + b;
          break;
        case '-':
          result = a - b;
          break;
        case '*':
          result = a * b;
          break;
        case '/':
          if (b === 0) {
            throw new FormulaEvaluationError('division by zero', errorContext);
          }
          result = a / b;
          break;
      }

      if (!Number.isFinite(result)) {
        throw new FormulaEvaluationError('result is not a finite number', errorContext);
      }
      return result;
    }
  }
}

function collectFields(node: FormulaNode, found: FormulaField[] = []): FormulaField[] {
  switch (node.kind) {
    case 'field':
      if (!found.includes(node.name)) {
        found.push(node.name);
      }
      break;
    case 'unary':
      collectFields(node.operand, found);
      break;
    case 'binary':
      collectFields(node.left, found);
      collectFields(node.right, found);
      break;
    case 'literal':
      break;
  }
  return found;
}

/**
 * Get list of all formula fields for documentation
 */
export function getAvailableFormulaFields(): { name: FormulaField; description: string }[] {
  return [
    { name: 'total_disturbed_acres', description: 'Total disturbed area in acres' },
    { name: 'average_slope_percent', description: 'Average slope in percent' },
    { name: 'drainage_feature_count', description: 'Number of drainage features' },
    { name: 'phase_count', description: 'Number of construction phases' },
    { name: 'total_drainage_area_acres', description: 'Sum of drainage feature areas in acres' },
  ];
}
