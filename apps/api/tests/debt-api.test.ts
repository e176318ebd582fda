import { describe, it, expect } from 'vitest';
import { createApp } from '../src/app.js';
import { api, testConfig } from './helpers.js';

const debts = [
  { id: 'card', name: 'Credit card', principal: 5000, annualRate: 0.18 },
  { id: 'car', name: 'Car loan', principal: 8000, annualRate: 0.06 },
  { id: 'student', name: 'Student loan', principal: 3000, annualRate: 0.04 },
];

describe('Debt Simulation API', () => {
  const app = createApp(testConfig);

  describe('POST /api/v1/simulate/payoff', () => {
    it('returns the payoff simulation with formatted fields', async () => {
      const { status, data } = await api(app, 'POST', '/api/v1/simulate/payoff', {
        debts,
        budget: 500,
        strategy: 'avalanche',
      });

      expect(status).toBe(200);
      expect(data.strategy).toBe('avalanche');
      expect(data.status).toBe('paid_off');
      expect(data.periodsElapsed).toBe(36);
      expect(data.totalInterestFormatted).toBe('$1,699.10');
      expect(data.budgetFormatted).toBe('$500.00');
      expect(data.payoffOrder.map((r: { id: string }) => r.id)).toEqual(['card', 'car', 'student']);
      expect(data.payoffOrder[0].originalRateFormatted).toBe('18.00%');
      expect(data.schedule).toHaveLength(36);
      expect(data.summary[3]).toBe('Total interest paid: $1,699.10');
    });

    it('defaults to avalanche', async () => {
      const { status, data } = await api(app, 'POST', '/api/v1/simulate/payoff', { debts, budget: 500 });

      expect(status).toBe(200);
      expect(data.strategy).toBe('avalanche');
    });

    it('passes the excess policy through', async () => {
      const { data } = await api(app, 'POST', '/api/v1/simulate/payoff', {
        debts,
        budget: 500,
        excessPolicy: 'discard',
      });

      expect(data.periodsElapsed).toBe(38);
    });

    it('reports an insufficient budget as a result, not an error', async () => {
      const { status, data } = await api(app, 'POST', '/api/v1/simulate/payoff', {
        debts: [
          { principal: 10000, annualRate: 0.25 },
          { principal: 5000, annualRate: 0.2 },
          { principal: 3000, annualRate: 0.15 },
        ],
        budget: 100,
      });

      expect(status).toBe(200);
      expect(data.status).toBe('insufficient_budget');
      expect(data.periodsElapsed).toBe(1);
      expect(data.payoffOrder).toEqual([]);
    });

    it('auto-generates debt ids when not provided', async () => {
      const { status, data } = await api(app, 'POST', '/api/v1/simulate/payoff', {
        debts: [{ principal: 1000, annualRate: 0.12 }],
        budget: 100,
        strategy: 'snowball',
      });

      expect(status).toBe(200);
      expect(data.payoffOrder).toHaveLength(1);
      expect(typeof data.payoffOrder[0].id).toBe('string');
      expect(data.payoffOrder[0].id.length).toBeGreaterThan(0);
    });

    it('formats in the requested currency', async () => {
      const { data } = await api(app, 'POST', '/api/v1/simulate/payoff', {
        debts: [{ principal: 100, annualRate: 0 }],
        budget: 100,
        currency: 'EUR',
      });

      expect(data.budgetFormatted).toBe('100.00 €');
    });

    it('returns 400 for an invalid request', async () => {
      const { status, data } = await api(app, 'POST', '/api/v1/simulate/payoff', {
        debts: [],
        budget: 500,
        strategy: 'invalid',
      });

      expect(status).toBe(400);
      expect(data.error.code).toBe('VALIDATION_ERROR');
    });

    it('returns 400 for a negative budget', async () => {
      const { status, data } = await api(app, 'POST', '/api/v1/simulate/payoff', { debts, budget: -5 });

      expect(status).toBe(400);
      expect(data.error.message).toContain('budget');
    });
  });

  describe('POST /api/v1/simulate/compare', () => {
    it('returns both strategies with a recommendation', async () => {
      const { status, data } = await api(app, 'POST', '/api/v1/simulate/compare', { debts, budget: 500 });

      expect(status).toBe(200);
      expect(data.strategies).toHaveLength(2);
      expect(data.recommended).toBe('avalanche');
      expect(data.periodsSaved).toBe(1);
      expect(data.interestSavedFormatted).toBe('$592.59');
    });
  });
});
