/**
 * Output Assembler
 *
 * Turns matched rules into practice and pay item records and computes the
 * run summary. Every record carries the id and source of the rule that
 * produced it.
 */

import {
  isPracticeType,
  type ECPractice,
  type PayItem,
  type ProjectOutput,
  type ProjectSummary,
  type RuleSpec,
} from '../../shared/schema';
import { RuleValidationError } from './ruleErrors';

/**
 * A rule whose conditions held, with its evaluated quantity
 */
export interface RuleMatch {
  rule: RuleSpec;
  quantity: number;
}

export interface AssembleOutputInput {
  projectName: string;
  timestamp: string;
  matches: readonly RuleMatch[];
}

/**
 * Build the practice for a matched rule
 */
export function buildPractice(match: RuleMatch): ECPractice {
  const { rule, quantity } = match;
  const practiceType = rule.action.practice_type;
  if (!isPracticeType(practiceType)) {
    throw new RuleValidationError(`unrecognized practice type "${practiceType}"`, { ruleId: rule.id });
  }

  return Object.freeze({
    practice_type: practiceType,
    is_temporary: rule.action.is_temporary,
    quantity,
    unit: rule.action.unit,
    location: rule.action.location_template,
    rule_id: rule.id,
    rule_source: rule.source,
    justification: rule.action.justification,
    notes: rule.notes,
  });
}

/**
 * Build the pay item linked to a practice
 */
export function buildPayItem(rule: RuleSpec, practice: ECPractice): PayItem {
  return Object.freeze({
    item_number: rule.action.pay_item_number,
    description: rule.action.pay_item_description,
    quantity: practice.quantity,
    unit: practice.unit,
    estimated_unit_cost: rule.action.estimated_unit_cost,
    ec_practice_ref: practiceReference(practice),
    rule_id: rule.id,
    rule_source: rule.source,
  });
}

export function practiceReference(practice: ECPractice): string {
  return `${practice.practice_type}_${practice.rule_id}`;
}

/**
 * Cost of a single pay item line
 */
export function payItemCost(item: PayItem): number {
  return item.quantity * item.estimated_unit_cost;
}

export function summarize(
  temporaryPractices: readonly ECPractice[],
  permanentPractices: readonly ECPractice[],
  payItems: readonly PayItem[]
): ProjectSummary {
  return Object.freeze({
    total_temporary_practices: temporaryPractices.length,
    total_permanent_practices: permanentPractices.length,
    total_pay_items: payItems.length,
    total_estimated_cost: payItems.reduce((total, item) => total + payItemCost(item), 0),
  });
}

/**
 * Assemble the immutable output for one engine run
 */
export function assembleProjectOutput(input: AssembleOutputInput): ProjectOutput {
  const temporaryPractices: ECPractice[] = [];
  const permanentPractices: ECPractice[] = [];
  const payItems: PayItem[] = [];

  for (const match of input.matches) {
    const practice = buildPractice(match);
    if (practice.is_temporary) {
      temporaryPractices.push(practice);
    } else {
      permanentPractices.push(practice);
    }
    payItems.push(buildPayItem(match.rule, practice));
  }

  return Object.freeze({
    project_name: input.projectName,
    timestamp: input.timestamp,
    temporary_practices: Object.freeze(temporaryPractices),
    permanent_practices: Object.freeze(permanentPractices),
    pay_items: Object.freeze(payItems),
    summary: summarize(temporaryPractices, permanentPractices, payItems),
  });
}
