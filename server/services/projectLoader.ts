/**
 * Project and rule file loading
 *
 * Parses YAML or JSON project descriptions and custom rule files into the
 * validated wire types. Schema violations are reported as engine errors so
 * callers see the same error shape from files and from HTTP bodies.
 */

import fs from 'fs';
import path from 'path';
import YAML from 'yaml';
import type { ZodIssue } from 'zod';
import {
  projectInputSchema,
  ruleFileSchema,
  ruleSpecSchema,
  type ProjectInput,
  type ProjectOutput,
  type RuleSpec,
} from '../../shared/schema';
import { ProjectInputError, RuleValidationError } from './ruleErrors';

export type DataFormat = 'yaml' | 'json';
export type InputFormat = DataFormat | 'auto';

function formatIssue(issue: ZodIssue): string {
  const issuePath = issue.path.join('.');
  return issuePath ? `${issuePath}: ${issue.message}` : issue.message;
}

/**
 * Parse text into a plain value. YAML is a superset of JSON, so 'auto' reads both.
 */
function parseDocument(text: string, format: InputFormat): unknown {
  if (format === 'json') {
    return JSON.parse(text);
  }
  return YAML.parse(text);
}

function isMapping(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// ============================================
// PROJECTS
// ============================================

export function parseProjectText(text: string, format: InputFormat = 'auto'): ProjectInput {
  if (text.trim() === '') {
    throw new ProjectInputError('project document is empty');
  }

  let document: unknown;
  try {
    document = parseDocument(text, format);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ProjectInputError(`project document could not be parsed: ${reason}`);
  }

  return validateProjectInput(document);
}

/**
 * Validate an already-parsed project value
 */
export function validateProjectInput(value: unknown): ProjectInput {
  if (!isMapping(value)) {
    throw new ProjectInputError('project document must be a mapping');
  }

  const result = projectInputSchema.safeParse(value);
  if (!result.success) {
    const issues = result.error.issues.map(formatIssue);
    throw new ProjectInputError(`invalid project input: ${issues[0]}`, issues);
  }
  return result.data;
}

// ============================================
// RULES
// ============================================

export function parseRulesText(text: string, format: InputFormat = 'auto'): RuleSpec[] {
  if (text.trim() === '') {
    return [];
  }

  let document: unknown;
  try {
    document = parseDocument(text, format);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new RuleValidationError(`rule file could not be parsed: ${reason}`);
  }

  if (document === null || document === undefined) {
    return [];
  }
  if (!isMapping(document)) {
    throw new RuleValidationError('rule file must be a mapping with a "rules" list');
  }

  const file = ruleFileSchema.safeParse({ rules: document.rules ?? [] });
  if (!file.success) {
    throw new RuleValidationError('"rules" must be a list');
  }

  return validateRuleList(file.data.rules);
}

/**
 * Structurally validate a list of rule values, naming the offending rule
 */
export function validateRuleList(values: readonly unknown[]): RuleSpec[] {
  return values.map((value, index) => {
    const result = ruleSpecSchema.safeParse(value);
    if (result.success) {
      return result.data;
    }

    const id = isMapping(value) && typeof value.id === 'string' && value.id !== '' ? value.id : undefined;
    const issues = result.error.issues.map(formatIssue);
    const defect = id !== undefined ? issues[0] : `rules[${index}]: ${issues[0]}`;
    throw new RuleValidationError(defect, { ruleId: id, details: { index, issues } });
  });
}

// ============================================
// FILES
// ============================================

export function formatFromPath(filePath: string): DataFormat {
  const extension = path.extname(filePath).toLowerCase();
  switch (extension) {
    case '.yaml':
    case '.yml':
      return 'yaml';
    case '.json':
      return 'json';
    default:
      throw new Error(`Unsupported file format: ${extension || filePath}`);
  }
}

export async function loadProjectFile(filePath: string): Promise<ProjectInput> {
  const format = formatFromPath(filePath);
  const text = await fs.promises.readFile(filePath, 'utf-8');
  return parseProjectText(text, format);
}

export async function loadRuleFile(filePath: string): Promise<RuleSpec[]> {
  const format = formatFromPath(filePath);
  const text = await fs.promises.readFile(filePath, 'utf-8');
  return parseRulesText(text, format);
}

// ============================================
// OUTPUT
// ============================================

export function serializeProjectOutput(output: ProjectOutput, format: DataFormat): string {
  if (format === 'json') {
    return JSON.stringify(output, null, 2);
  }
  return YAML.stringify(output);
}
