/**
 * Rule Repository Tests
 *
 * Merge, ordering and load-time validation of rule sets.
 */

import { describe, it, expect } from 'vitest';
import { DEFAULT_EROSION_RULES } from '../../config/defaultErosionRules';
import { RuleRepository } from '../ruleRepository';
import { ConditionFieldError, FormulaFieldError, RuleValidationError } from '../ruleErrors';
import { createRuleData } from './fixtures';

const DEFAULT_ORDER = [
  'SILT_FENCE_001',
  'INLET_PROT_001',
  'SEDIMENT_TRAP_001',
  'STEEP_SLOPE_001',
  'TEMP_SEED_001',
  'CONSTRUCTION_ENT_001',
  'PERM_SEED_001',
];

function ids(repository: RuleRepository): string[] {
  return repository.rules().map((rule) => rule.id);
}

describe('RuleRepository', () => {
  describe('defaults', () => {
    it('loads the built-in catalogue in priority order', () => {
      const repository = RuleRepository.load();
      expect(repository.size).toBe(7);
      expect(ids(repository)).toEqual(DEFAULT_ORDER);
    });

    it('describes the loaded rule set', () => {
      expect(RuleRepository.load().describe()).toEqual({
        catalogVersion: '2024.1',
        defaultCount: 7,
        customCount: 0,
        overriddenIds: [],
        totalRules: 7,
      });
    });

    it('applies schema defaults', () => {
      const silt = RuleRepository.load().rules()[0];
      expect(silt.notes).toBe('');
      expect(silt.action.estimated_unit_cost).toBe(3.5);
    });

    it('freezes the rule list', () => {
      const repository = RuleRepository.load();
      expect(Object.isFrozen(repository.rules())).toBe(true);
      expect(Object.isFrozen(repository.rules()[0])).toBe(true);
    });

    it('freezes each rule action and condition', () => {
      const repository = RuleRepository.load();
      const [silt] = repository.rules();

      expect(Object.isFrozen(silt.action)).toBe(true);
      expect(Object.isFrozen(silt.conditions)).toBe(true);
      expect(silt.conditions.every((condition) => Object.isFrozen(condition))).toBe(true);

      expect(Reflect.set(silt.action, 'quantity_formula', 'total_disturbed_acres / 0')).toBe(false);
      expect(Reflect.set(silt.conditions, 'length', 0)).toBe(false);
      expect(silt.action.quantity_formula).toBe('total_disturbed_acres * 200');
      expect(silt.conditions.length).toBeGreaterThan(0);
    });

    it('leaves the catalogue data untouched when freezing', () => {
      RuleRepository.load();
      expect(Object.isFrozen(DEFAULT_EROSION_RULES[0].action)).toBe(false);
    });

    it('accepts an alternate catalogue', () => {
      const repository = RuleRepository.load([], { defaults: [], catalogVersion: 'empty' });
      expect(repository.size).toBe(0);
      expect(repository.describe().catalogVersion).toBe('empty');
    });

    it('rejects duplicate ids inside the catalogue', () => {
      const rule = createRuleData('DUP_001');
      expect(() => RuleRepository.load([], { defaults: [rule, rule] })).toThrow(
        'Rule DUP_001: duplicate rule id in default catalogue'
      );
    });
  });

  describe('merging custom rules', () => {
    it('replaces a default rule with the same id', () => {
      const repository = RuleRepository.load([
        createRuleData('SILT_FENCE_001', { priority: 10 }, { quantity_formula: 'total_disturbed_acres * 300' }),
      ]);

      expect(repository.size).toBe(7);
      expect(ids(repository)).toEqual(DEFAULT_ORDER);
      expect(repository.rules()[0].action.quantity_formula).toBe('total_disturbed_acres * 300');
      expect(repository.describe().overriddenIds).toEqual(['SILT_FENCE_001']);
    });

    it('re-sorts an overridden rule by its new priority', () => {
      const repository = RuleRepository.load([createRuleData('SILT_FENCE_001', { priority: 60 })]);
      expect(ids(repository)).toEqual([...DEFAULT_ORDER.slice(1), 'SILT_FENCE_001']);
    });

    it('inserts new rules by priority', () => {
      const repository = RuleRepository.load([createRuleData('MULCH_001', { priority: 15 })]);
      expect(ids(repository).slice(0, 3)).toEqual(['SILT_FENCE_001', 'MULCH_001', 'INLET_PROT_001']);
      expect(repository.describe().customCount).toBe(1);
    });

    it('keeps insertion order between equal priorities', () => {
      const repository = RuleRepository.load([
        createRuleData('TIE_B', { priority: 10 }),
        createRuleData('TIE_A', { priority: 10 }),
      ]);
      expect(ids(repository).slice(0, 3)).toEqual(['SILT_FENCE_001', 'TIE_B', 'TIE_A']);
    });

    it('defaults priority to 100', () => {
      const custom = createRuleData('LATE_001');
      delete custom.priority;
      const repository = RuleRepository.load([custom]);
      expect(ids(repository).at(-1)).toBe('LATE_001');
      expect(repository.rules().at(-1)?.priority).toBe(100);
    });

    it('extends an existing repository without changing it', () => {
      const base = RuleRepository.load([createRuleData('FILE_001')]);
      const extended = base.extend([createRuleData('REQUEST_001')]);

      expect(base.size).toBe(8);
      expect(extended.size).toBe(9);
      expect(ids(extended).slice(-2)).toEqual(['FILE_001', 'REQUEST_001']);
    });

    it('does not mutate the built-in catalogue', () => {
      RuleRepository.load([createRuleData('SILT_FENCE_001', { priority: 99 })]);
      expect(DEFAULT_EROSION_RULES[0].priority).toBe(10);
    });
  });

  describe('validation', () => {
    it('rejects an unrecognized practice type', () => {
      expect(() => RuleRepository.load([createRuleData('X', {}, { practice_type: 'hay_bales' })])).toThrow(
        'Rule X: unrecognized practice type "hay_bales"'
      );
    });

    it('rejects a formula with an unknown identifier', () => {
      try {
        RuleRepository.load([createRuleData('X', {}, { quantity_formula: 'acres * 2' })]);
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(RuleValidationError);
        if (error instanceof RuleValidationError) {
          expect(error.message).toBe('Rule X: unknown identifier "acres" in formula "acres * 2"');
          expect(error.ruleId).toBe('X');
          expect(error.formula).toBe('acres * 2');
          expect(error.cause).toBeInstanceOf(FormulaFieldError);
        }
      }
    });

    it('rejects a formula with a syntax error', () => {
      expect(() => RuleRepository.load([createRuleData('X', {}, { quantity_formula: '(1 + 2' })])).toThrow(
        'Rule X: unbalanced parenthesis opened at position 0 in formula "(1 + 2"'
      );
    });

    it('rejects an unknown condition field', () => {
      try {
        RuleRepository.load([
          createRuleData('X', { conditions: [{ field: 'soil', operator: 'eq', value: 'clay' }] }),
        ]);
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(RuleValidationError);
        if (error instanceof RuleValidationError) {
          expect(error.message).toBe('Rule X: unknown condition field "soil"');
          expect(error.cause).toBeInstanceOf(ConditionFieldError);
        }
      }
    });

    it('rejects "in" with a scalar value', () => {
      expect(() =>
        RuleRepository.load([
          createRuleData('X', { conditions: [{ field: 'predominant_slope', operator: 'in', value: 'steep' }] }),
        ])
      ).toThrow('Rule X: operator "in" on field "predominant_slope" requires a list value');
    });

    it('rejects a non-integer priority', () => {
      expect(() => RuleRepository.load([createRuleData('X', { priority: 1.5 })])).toThrow(
        'Rule X: priority: Priority must be an integer'
      );
    });

    it('rejects an empty id', () => {
      expect(() => RuleRepository.load([createRuleData('', { name: 'Nameless' })])).toThrow(
        'rule "Nameless" has an empty id'
      );
    });

    it('validates every rule before any is used', () => {
      expect(() =>
        RuleRepository.load([
          createRuleData('GOOD_001'),
          createRuleData('BAD_001', {}, { quantity_formula: 'total_disturbed_acres *' }),
        ])
      ).toThrow(RuleValidationError);
    });
  });
});
