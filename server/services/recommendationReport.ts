/**
 * Recommendation Reports
 *
 * Human-readable renderings of a ProjectOutput: a plain-text summary for
 * terminals and logs, and a Markdown report with a traceability matrix that
 * ties every practice back to the rule and source document that produced it.
 */

import type { ECPractice, ProjectInput, ProjectOutput } from '../../shared/schema';
import { payItemCost, practiceReference } from './outputAssembler';
import type { EnhancementResult } from './projectEnhancer';

const formatCurrency = (amount: number) => {
  return new Intl.NumberFormat('en-US', {
    style: 'currency',
    currency: 'USD',
  }).format(amount);
};

export function formatQuantity(quantity: number): string {
  return Number.isInteger(quantity) ? String(quantity) : quantity.toFixed(2);
}

function practiceLine(practice: ECPractice): string {
  return `${practice.practice_type}: ${formatQuantity(practice.quantity)} ${practice.unit} (${practice.rule_id})`;
}

/**
 * Plain-text summary of one engine run
 */
export function formatProjectOutput(output: ProjectOutput): string {
  const { summary } = output;
  const lines: string[] = [
    `Erosion control recommendations for: ${output.project_name}`,
    `Generated: ${output.timestamp}`,
    '',
    `Temporary practices: ${summary.total_temporary_practices}`,
    `Permanent practices: ${summary.total_permanent_practices}`,
    `Pay items: ${summary.total_pay_items}`,
  ];

  if (output.temporary_practices.length > 0) {
    lines.push('', 'Temporary EC practices:');
    lines.push(...output.temporary_practices.map((p) => `  - ${practiceLine(p)}`));
  }

  if (output.permanent_practices.length > 0) {
    lines.push('', 'Permanent EC practices:');
    lines.push(...output.permanent_practices.map((p) => `  - ${practiceLine(p)}`));
  }

  if (output.pay_items.length > 0) {
    lines.push('', 'Pay items:');
    for (const item of output.pay_items) {
      lines.push(
        `  - ${item.item_number} ${item.description}: ${formatQuantity(item.quantity)} ${item.unit} ` +
          `@ ${formatCurrency(item.estimated_unit_cost)} = ${formatCurrency(payItemCost(item))}`
      );
    }
  }

  lines.push('', `Total estimated cost: ${formatCurrency(summary.total_estimated_cost)}`);
  return lines.join('\n');
}

function markdownPractices(practices: readonly ECPractice[]): string[] {
  if (practices.length === 0) {
    return ['- None identified'];
  }
  return practices.map((p) => {
    const notes = p.notes ? ` Note: ${p.notes}` : '';
    return `- ${practiceLine(p)}: ${p.justification}. Location: ${p.location}.${notes}`;
  });
}

/**
 * Markdown report with inputs, practices, pay items and traceability
 */
export function generateMarkdownReport(
  project: ProjectInput,
  output: ProjectOutput,
  enhancement?: EnhancementResult
): string {
  const lines: string[] = [
    `# Erosion Control Recommendations: ${output.project_name}`,
    '',
    `Generated ${output.timestamp}`,
    '',
    '## Inputs',
    '',
    `- Jurisdiction: ${project.jurisdiction}`,
    `- Total disturbed acres: ${project.total_disturbed_acres}`,
    `- Predominant soil: ${project.predominant_soil}`,
    `- Predominant slope: ${project.predominant_slope} (${project.average_slope_percent}%)`,
    `- Drainage features: ${project.drainage_features.length}`,
    `- Phases: ${project.phases.length}`,
    '',
    '## Temporary erosion control practices',
    '',
    ...markdownPractices(output.temporary_practices),
    '',
    '## Permanent erosion control practices',
    '',
    ...markdownPractices(output.permanent_practices),
    '',
    '## Pay items',
    '',
  ];

  if (output.pay_items.length > 0) {
    lines.push('| Item | Description | Quantity | Unit | Unit Cost | Cost | Practice |');
    lines.push('|---|---|---|---|---|---|---|');
    for (const item of output.pay_items) {
      lines.push(
        `| ${item.item_number} | ${item.description} | ${formatQuantity(item.quantity)} | ${item.unit} ` +
          `| ${formatCurrency(item.estimated_unit_cost)} | ${formatCurrency(payItemCost(item))} | ${item.ec_practice_ref} |`
      );
    }
  } else {
    lines.push('No pay items mapped.');
  }

  lines.push('', `**Total estimated cost:** ${formatCurrency(output.summary.total_estimated_cost)}`);

  lines.push('', '## Traceability matrix', '');
  lines.push('| Practice | Rule | Source |');
  lines.push('|---|---|---|');
  for (const practice of [...output.temporary_practices, ...output.permanent_practices]) {
    lines.push(`| ${practiceReference(practice)} | ${practice.rule_id} | ${practice.rule_source} |`);
  }

  if (enhancement?.status === 'available') {
    lines.push('', '## LLM insights', '', enhancement.text, '', `_Model: ${enhancement.model}_`);
  }

  return lines.join('\n');
}
