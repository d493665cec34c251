/**
 * Shared wire-format schemas for the erosion control recommender.
 *
 * Every project, rule and output shape is declared once as a zod schema and the
 * TypeScript type is inferred from it. Field names follow the snake_case layout of
 * the YAML/JSON project and rule files.
 */

import { z } from 'zod';

// ============================================
// ENUMERATIONS
// ============================================

export const SOIL_TYPES = ['clay', 'silt', 'sand', 'gravel', 'loam', 'bedrock'] as const;
export type SoilType = (typeof SOIL_TYPES)[number];

/**
 * Slope classes: flat 0-5%, gentle 5-15%, moderate 15-25%, steep 25-50%, very_steep >50%
 */
export const SLOPE_TYPES = ['flat', 'gentle', 'moderate', 'steep', 'very_steep'] as const;
export type SlopeType = (typeof SLOPE_TYPES)[number];

export const EC_PRACTICE_TYPES = [
  // Temporary practices
  'silt_fence',
  'inlet_protection',
  'sediment_trap',
  'temporary_seeding',
  'mulch',
  'erosion_control_blanket',
  'construction_entrance',
  'dust_control',
  // Permanent practices
  'permanent_seeding',
  'sodding',
  'riprap',
  'retaining_wall',
  'bioswale',
  'detention_basin',
] as const;
export type ECPracticeType = (typeof EC_PRACTICE_TYPES)[number];

export const CONDITION_OPERATORS = ['eq', 'ne', 'gt', 'gte', 'lt', 'lte', 'in', 'contains'] as const;
export type ConditionOperator = (typeof CONDITION_OPERATORS)[number];

const PRACTICE_TYPE_SET: ReadonlySet<string> = new Set(EC_PRACTICE_TYPES);

export function isPracticeType(value: string): value is ECPracticeType {
  return PRACTICE_TYPE_SET.has(value);
}

// ============================================
// PROJECT INPUT
// ============================================

export const drainageFeatureSchema = z.object({
  id: z.string().min(1, 'Drainage feature id is required'),
  type: z.string().min(1, 'Drainage feature type is required'),
  location: z.string(),
  drainage_area_acres: z.number().positive('Drainage area must be positive'),
  additional_properties: z.record(z.unknown()).default({}),
});

export const projectPhaseSchema = z.object({
  phase_id: z.string().min(1, 'Phase id is required'),
  name: z.string(),
  duration_days: z.number().int().positive('Phase duration must be positive'),
  disturbed_acres: z.number().min(0, 'Phase disturbed acres cannot be negative'),
  description: z.string().default(''),
});

export const projectInputSchema = z.object({
  project_name: z.string().min(1, 'Project name is required'),
  jurisdiction: z.string().min(1, 'Jurisdiction is required'),
  total_disturbed_acres: z.number().positive('Total disturbed acres must be positive'),
  predominant_soil: z.enum(SOIL_TYPES),
  predominant_slope: z.enum(SLOPE_TYPES),
  average_slope_percent: z.number().min(0, 'Average slope percent cannot be negative'),
  drainage_features: z.array(drainageFeatureSchema).default([]),
  phases: z.array(projectPhaseSchema).default([]),
  metadata: z.record(z.unknown()).default({}),
});

export type DrainageFeature = Readonly<z.infer<typeof drainageFeatureSchema>>;
export type ProjectPhase = Readonly<z.infer<typeof projectPhaseSchema>>;
export type ProjectInput = Readonly<z.infer<typeof projectInputSchema>>;

/** Pre-default shape accepted from callers and files */
export type ProjectInputData = z.input<typeof projectInputSchema>;

// ============================================
// RULES
// ============================================

export const conditionValueSchema = z.union([
  z.string(),
  z.number(),
  z.boolean(),
  z.null(),
  z.array(z.union([z.string(), z.number(), z.boolean(), z.null()])),
]);

export const ruleConditionSchema = z.object({
  field: z.string().min(1, 'Condition field is required'),
  operator: z.enum(CONDITION_OPERATORS),
  value: conditionValueSchema,
});

/**
 * practice_type is kept as a string here so that an unrecognized practice is
 * reported by the rule repository with the offending rule id.
 */
export const ruleActionSchema = z.object({
  practice_type: z.string().min(1, 'Practice type is required'),
  is_temporary: z.boolean(),
  quantity_formula: z.string(),
  unit: z.string().min(1, 'Unit is required'),
  location_template: z.string(),
  justification: z.string(),
  pay_item_number: z.string().min(1, 'Pay item number is required'),
  pay_item_description: z.string(),
  estimated_unit_cost: z.number().min(0, 'Estimated unit cost cannot be negative').default(0),
});

export const ruleSpecSchema = z.object({
  id: z.string(),
  name: z.string(),
  source: z.string(),
  priority: z.number().int('Priority must be an integer').default(100),
  conditions: z.array(ruleConditionSchema).default([]),
  action: ruleActionSchema,
  notes: z.string().default(''),
});

export const ruleFileSchema = z.object({
  rules: z.array(z.unknown()),
});

export type ConditionValue = z.infer<typeof conditionValueSchema>;
export type RuleCondition = Readonly<z.infer<typeof ruleConditionSchema>>;
export type RuleAction = Readonly<z.infer<typeof ruleActionSchema>>;
export type RuleSpec = Readonly<Omit<z.infer<typeof ruleSpecSchema>, 'conditions' | 'action'>> & {
  readonly conditions: readonly RuleCondition[];
  readonly action: RuleAction;
};
export type RuleSpecData = z.input<typeof ruleSpecSchema>;
/** Raw or already-validated rule accepted by the rule repository */
export type RuleSpecSource = RuleSpecData | RuleSpec;

// ============================================
// OUTPUT
// ============================================

export interface ECPractice {
  readonly practice_type: ECPracticeType;
  readonly is_temporary: boolean;
  readonly quantity: number;
  readonly unit: string;
  readonly location: string;
  readonly rule_id: string;
  readonly rule_source: string;
  readonly justification: string;
  readonly notes: string;
}

export interface PayItem {
  readonly item_number: string;
  readonly description: string;
  readonly quantity: number;
  readonly unit: string;
  readonly estimated_unit_cost: number;
  /** `<practice_type>_<rule_id>` of the practice that produced this item */
  readonly ec_practice_ref: string;
  readonly rule_id: string;
  readonly rule_source: string;
}

export interface ProjectSummary {
  readonly total_temporary_practices: number;
  readonly total_permanent_practices: number;
  readonly total_pay_items: number;
  readonly total_estimated_cost: number;
}

export interface ProjectOutput {
  readonly project_name: string;
  readonly timestamp: string;
  readonly temporary_practices: readonly ECPractice[];
  readonly permanent_practices: readonly ECPractice[];
  readonly pay_items: readonly PayItem[];
  readonly summary: ProjectSummary;
}
