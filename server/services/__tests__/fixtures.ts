/**
 * Shared builders for rules engine tests
 */

import {
  projectInputSchema,
  type ProjectInput,
  type ProjectInputData,
  type RuleSpecData,
} from '../../../shared/schema';

export const FIXED_NOW = new Date('2024-05-01T12:00:00.000Z');

/**
 * 5.2 acre clay site on moderate slopes with no drainage features or phases
 */
export function createProjectData(overrides: Partial<ProjectInputData> = {}): ProjectInputData {
  return {
    project_name: 'Test Project',
    jurisdiction: 'Marion County, IN',
    total_disturbed_acres: 5.2,
    predominant_soil: 'clay',
    predominant_slope: 'moderate',
    average_slope_percent: 18.5,
    ...overrides,
  };
}

export function createTestProject(overrides: Partial<ProjectInputData> = {}): ProjectInput {
  return projectInputSchema.parse(createProjectData(overrides));
}

/**
 * 10 acre steep site with two drainage features (7.5 acres total) and two phases
 */
export function createComplexProject(): ProjectInput {
  return createTestProject({
    project_name: 'Complex Project',
    total_disturbed_acres: 10,
    predominant_slope: 'steep',
    average_slope_percent: 30,
    drainage_features: [
      { id: 'D1', type: 'culvert', location: 'STA 10+00', drainage_area_acres: 3 },
      { id: 'D2', type: 'inlet', location: 'STA 12+50', drainage_area_acres: 4.5 },
    ],
    phases: [
      { phase_id: 'P1', name: 'Clearing', duration_days: 30, disturbed_acres: 6 },
      { phase_id: 'P2', name: 'Grading', duration_days: 45, disturbed_acres: 4 },
    ],
  });
}

export function createRuleData(
  id: string,
  overrides: Partial<RuleSpecData> = {},
  action: Partial<RuleSpecData['action']> = {}
): RuleSpecData {
  return {
    id,
    name: 'Test Rule',
    source: 'Test Source',
    priority: 100,
    conditions: [],
    ...overrides,
    action: {
      practice_type: 'mulch',
      is_temporary: true,
      quantity_formula: 'total_disturbed_acres * 2',
      unit: 'AC',
      location_template: 'Test location',
      justification: 'Test justification',
      pay_item_number: 'EC-100',
      pay_item_description: 'Test Mulch',
      estimated_unit_cost: 10,
      ...action,
    },
  };
}
