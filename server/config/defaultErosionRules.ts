/**
 * Default Erosion Control Rule Catalogue
 *
 * Built-in rules loaded by every RuleRepository before custom rules are merged.
 * Rules are listed in catalogue order; evaluation order comes from priority.
 *
 * Sources:
 * - EPA NPDES Construction General Permit (CGP)
 * - State DOT Standard Specifications
 * - Local stormwater ordinances
 */

import type { RuleSpecData } from '../../shared/schema';

export const DEFAULT_RULE_CATALOG_VERSION = '2024.1';

export const DEFAULT_EROSION_RULES: readonly RuleSpecData[] = [
  {
    id: 'SILT_FENCE_001',
    name: 'Silt Fence for Perimeter',
    source: 'EPA NPDES CGP',
    priority: 10,
    conditions: [{ field: 'total_disturbed_acres', operator: 'gt', value: 0 }],
    action: {
      practice_type: 'silt_fence',
      is_temporary: true,
      quantity_formula: 'total_disturbed_acres * 200',
      unit: 'LF',
      location_template: 'Perimeter of disturbed area',
      justification: 'Perimeter sediment control per EPA NPDES requirements',
      pay_item_number: 'EC-001',
      pay_item_description: 'Silt Fence, Type A',
      estimated_unit_cost: 3.5,
    },
  },
  {
    id: 'INLET_PROT_001',
    name: 'Inlet Protection',
    source: 'Local Stormwater Ordinance',
    priority: 20,
    conditions: [{ field: 'has_drainage_features', operator: 'eq', value: true }],
    action: {
      practice_type: 'inlet_protection',
      is_temporary: true,
      quantity_formula: 'drainage_feature_count',
      unit: 'EA',
      location_template: 'At each drainage inlet',
      justification: 'Protect drainage inlets from sediment',
      pay_item_number: 'EC-002',
      pay_item_description: 'Inlet Protection Device',
      estimated_unit_cost: 250,
    },
  },
  {
    id: 'SEDIMENT_TRAP_001',
    name: 'Sediment Trap for Large Drainage Areas',
    source: 'EPA NPDES CGP',
    priority: 25,
    conditions: [
      { field: 'has_drainage_features', operator: 'eq', value: true },
      { field: 'total_drainage_area_acres', operator: 'gte', value: 5 },
    ],
    action: {
      practice_type: 'sediment_trap',
      is_temporary: true,
      // 3,600 cubic feet of storage per drainage acre, in cubic yards
      quantity_formula: 'total_drainage_area_acres * 3600 / 27',
      unit: 'CY',
      location_template: 'Downstream of each contributing drainage area',
      justification: 'Sediment storage for drainage areas of 5 acres or more',
      pay_item_number: 'EC-004',
      pay_item_description: 'Temporary Sediment Trap',
      estimated_unit_cost: 45,
    },
  },
  {
    id: 'STEEP_SLOPE_001',
    name: 'Erosion Control Blanket for Steep Slopes',
    source: 'State DOT Standard Specifications',
    priority: 30,
    conditions: [{ field: 'predominant_slope', operator: 'in', value: ['steep', 'very_steep'] }],
    action: {
      practice_type: 'erosion_control_blanket',
      is_temporary: false,
      quantity_formula: 'total_disturbed_acres * 43560 / 9',
      unit: 'SY',
      location_template: 'Steep slope areas',
      justification: 'Erosion control blanket required for slopes > 25%',
      pay_item_number: 'EC-005',
      pay_item_description: 'Erosion Control Blanket, Type C',
      estimated_unit_cost: 2.75,
    },
  },
  {
    id: 'TEMP_SEED_001',
    name: 'Temporary Seeding Between Phases',
    source: 'State DOT Standard Specifications',
    priority: 35,
    conditions: [{ field: 'phase_count', operator: 'gte', value: 2 }],
    action: {
      practice_type: 'temporary_seeding',
      is_temporary: true,
      quantity_formula: 'total_disturbed_acres',
      unit: 'AC',
      location_template: 'Areas left inactive between phases',
      justification: 'Temporary stabilization of areas idle between construction phases',
      pay_item_number: 'EC-006',
      pay_item_description: 'Temporary Seeding',
      estimated_unit_cost: 350,
    },
    notes: 'Apply within 14 days of ceasing work in an area',
  },
  {
    id: 'CONSTRUCTION_ENT_001',
    name: 'Construction Entrance',
    source: 'EPA NPDES CGP',
    priority: 40,
    conditions: [{ field: 'total_disturbed_acres', operator: 'gte', value: 1 }],
    action: {
      practice_type: 'construction_entrance',
      is_temporary: true,
      quantity_formula: '1',
      unit: 'EA',
      location_template: 'Primary site entrance',
      justification: 'Stabilized construction entrance to prevent tracking',
      pay_item_number: 'EC-003',
      pay_item_description: 'Stabilized Construction Entrance',
      estimated_unit_cost: 1500,
    },
  },
  {
    id: 'PERM_SEED_001',
    name: 'Permanent Seeding',
    source: 'State DOT Standard Specifications',
    priority: 50,
    conditions: [{ field: 'total_disturbed_acres', operator: 'gt', value: 0 }],
    action: {
      practice_type: 'permanent_seeding',
      is_temporary: false,
      quantity_formula: 'total_disturbed_acres',
      unit: 'AC',
      location_template: 'All disturbed areas',
      justification: 'Permanent vegetation establishment for final stabilization',
      pay_item_number: 'EC-010',
      pay_item_description: 'Permanent Seeding Mix',
      estimated_unit_cost: 500,
    },
  },
];
