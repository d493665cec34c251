/**
 * Recommendation Routes Tests
 *
 * Mounts the app on an ephemeral local port and exercises it with fetch.
 */

import type { Server } from 'http';
import type { AddressInfo } from 'net';
import { afterAll, beforeAll, describe, it, expect } from 'vitest';
import { createApp } from '../../app';
import type { EnhancementResult, ProjectEnhancer } from '../../services/projectEnhancer';
import { RuleRepository } from '../../services/ruleRepository';
import { createProjectData, createRuleData, FIXED_NOW } from '../../services/__tests__/fixtures';

const fakeEnhancer: ProjectEnhancer = {
  async enhance(): Promise<EnhancementResult> {
    return { status: 'available', text: 'Looks good', model: 'test-model' };
  },
};

describe('Recommendation routes', () => {
  let server: Server;
  let baseUrl: string;

  beforeAll(async () => {
    const app = createApp({
      repository: RuleRepository.load(),
      enhancer: fakeEnhancer,
      llmTimeoutMs: 1000,
      now: () => FIXED_NOW,
    });

    server = await new Promise<Server>((resolve) => {
      const listening = app.listen(0, '127.0.0.1', () => resolve(listening));
    });
    const address: string | AddressInfo | null = server.address();
    if (address === null || typeof address === 'string') {
      throw new Error('server did not bind to a TCP port');
    }
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterAll(async () => {
    await new Promise<void>((resolve, reject) => {
      server.close((error) => (error ? reject(error) : resolve()));
    });
  });

  function post(path: string, payload: unknown): Promise<Response> {
    return fetch(`${baseUrl}${path}`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(payload),
    });
  }

  describe('POST /api/recommendations', () => {
    it('returns the recommendations without enhancement by default', async () => {
      const res = await post('/api/recommendations', { project: createProjectData() });
      const body: unknown = await res.json();

      expect(res.status).toBe(200);
      expect(body).toMatchObject({
        success: true,
        requestId: res.headers.get('x-request-id'),
        data: {
          output: {
            project_name: 'Test Project',
            timestamp: '2024-05-01T12:00:00.000Z',
            summary: {
              total_temporary_practices: 2,
              total_permanent_practices: 1,
              total_pay_items: 3,
              total_estimated_cost: 7740,
            },
          },
          enhancement: null,
        },
      });
    });

    it('keeps a caller-supplied request id', async () => {
      const res = await fetch(`${baseUrl}/api/recommendations`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json', 'X-Request-ID': 'req-123' },
        body: JSON.stringify({ project: createProjectData() }),
      });

      expect(res.headers.get('x-request-id')).toBe('req-123');
    });

    it('includes the enhancement when requested', async () => {
      const res = await post('/api/recommendations', { project: createProjectData(), enhance: true });

      expect(await res.json()).toMatchObject({
        data: { enhancement: { status: 'available', text: 'Looks good', model: 'test-model' } },
      });
    });

    it('merges request rules for that request only', async () => {
      const res = await post('/api/recommendations', {
        project: createProjectData(),
        rules: [createRuleData('MULCH_001', { priority: 45 })],
      });

      expect(await res.json()).toMatchObject({
        data: { output: { summary: { total_temporary_practices: 3, total_pay_items: 4 } } },
      });

      const rulesRes = await fetch(`${baseUrl}/api/recommendations/rules`);
      expect(await rulesRes.json()).toMatchObject({ data: { totalRules: 7 } });
    });

    it('renders a markdown report', async () => {
      const res = await post('/api/recommendations', { project: createProjectData(), format: 'markdown' });
      const text = await res.text();

      expect(res.status).toBe(200);
      expect(res.headers.get('content-type')).toMatch(/^text\/markdown/);
      expect(text.split('\n')[0]).toBe('# Erosion Control Recommendations: Test Project');
    });

    it('rejects an invalid project with its issues', async () => {
      const res = await post('/api/recommendations', {
        project: createProjectData({ total_disturbed_acres: -1 }),
      });

      expect(res.status).toBe(400);
      expect(await res.json()).toMatchObject({
        success: false,
        code: 'PROJECT_INPUT_ERROR',
        details: { issues: ['total_disturbed_acres: Total disturbed acres must be positive'] },
      });
    });

    it('rejects a malformed request body', async () => {
      const res = await post('/api/recommendations', { project: createProjectData(), enhance: 'yes' });

      expect(res.status).toBe(400);
      expect(await res.json()).toMatchObject({
        success: false,
        code: 'VALIDATION_ERROR',
        errors: [{ path: 'enhance' }],
      });
    });

    it('reports an invalid custom rule with its id', async () => {
      const res = await post('/api/recommendations', {
        project: createProjectData(),
        rules: [createRuleData('CUSTOM_001', {}, { practice_type: 'hay_bales' })],
      });

      expect(res.status).toBe(422);
      expect(await res.json()).toMatchObject({
        success: false,
        message: 'Rule CUSTOM_001: unrecognized practice type "hay_bales"',
        code: 'RULE_VALIDATION_ERROR',
        details: { ruleId: 'CUSTOM_001' },
      });
    });

    it('rejects invalid JSON', async () => {
      const res = await fetch(`${baseUrl}/api/recommendations`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: '{"project": ',
      });

      expect(res.status).toBe(400);
      expect(await res.json()).toMatchObject({ code: 'BAD_REQUEST', message: 'Malformed JSON body' });
    });
  });

  describe('GET /api/recommendations/rules', () => {
    it('lists the active rules in evaluation order', async () => {
      const res = await fetch(`${baseUrl}/api/recommendations/rules`);

      expect(res.status).toBe(200);
      expect(await res.json()).toMatchObject({
        data: {
          catalogVersion: '2024.1',
          totalRules: 7,
          rules: [
            { id: 'SILT_FENCE_001' },
            { id: 'INLET_PROT_001' },
            { id: 'SEDIMENT_TRAP_001' },
            { id: 'STEEP_SLOPE_001' },
            { id: 'TEMP_SEED_001' },
            { id: 'CONSTRUCTION_ENT_001' },
            { id: 'PERM_SEED_001' },
          ],
        },
      });
    });
  });

  describe('POST /api/recommendations/rules/validate', () => {
    it('reports the merged rule count', async () => {
      const res = await post('/api/recommendations/rules/validate', {
        rules: [createRuleData('MULCH_001'), createRuleData('SILT_FENCE_001')],
      });

      expect(await res.json()).toMatchObject({
        data: { valid: true, customCount: 2, overriddenIds: ['SILT_FENCE_001'], totalRules: 8 },
      });
    });

    it('reports a bad formula', async () => {
      const res = await post('/api/recommendations/rules/validate', {
        rules: [createRuleData('MULCH_001', {}, { quantity_formula: 'acres * 2' })],
      });

      expect(res.status).toBe(422);
      expect(await res.json()).toMatchObject({
        message: 'Rule MULCH_001: unknown identifier "acres" in formula "acres * 2"',
        details: { ruleId: 'MULCH_001', formula: 'acres * 2' },
      });
    });
  });

  describe('POST /api/recommendations/projects/validate', () => {
    it('summarizes the project and previews matching rules', async () => {
      const res = await post('/api/recommendations/projects/validate', { project: createProjectData() });

      expect(await res.json()).toMatchObject({
        data: {
          valid: true,
          summary: { project_name: 'Test Project', drainage_features: 0, phases: 0 },
          matchingRules: ['SILT_FENCE_001', 'CONSTRUCTION_ENT_001', 'PERM_SEED_001'],
        },
      });
    });
  });

  it('returns 404 for unknown routes', async () => {
    const res = await fetch(`${baseUrl}/api/unknown`);
    expect(res.status).toBe(404);
    expect(await res.json()).toMatchObject({ code: 'NOT_FOUND' });
  });
});
