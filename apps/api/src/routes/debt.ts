import { Hono } from 'hono';
import { z } from 'zod';
import { createId } from '@paralleldrive/cuid2';
import {
  simulatePayoff,
  compareStrategies,
  describePayoff,
  formatMoney,
  formatPercent,
  type PayoffSimulationResult,
} from '@finplan/engine';
import { parseBody } from '../validation.js';

const debtSchema = z.object({
  id: z.string().min(1).optional(),
  name: z.string().optional(),
  principal: z.number().finite().min(0),
  annualRate: z.number().finite().min(0),
});

const runOptionsShape = {
  debts: z.array(debtSchema).min(1).max(1000),
  budget: z.number().finite().min(0),
  excessPolicy: z.enum(['cascade', 'defer', 'discard']).optional(),
  periodsPerYear: z.number().int().positive().max(365).optional(),
  maxPeriods: z.number().int().positive().max(12000).optional(),
  currency: z.string().length(3).optional(),
};

const payoffRequestSchema = z.object({
  ...runOptionsShape,
  strategy: z.enum(['avalanche', 'snowball']).default('avalanche'),
});

const compareRequestSchema = z.object(runOptionsShape);

function normalizeDebts(debts: z.infer<typeof debtSchema>[]) {
  return debts.map((d) => ({
    ...d,
    id: d.id ?? createId(),
  }));
}

function formatSimulationResult(result: PayoffSimulationResult, currency: string) {
  return {
    ...result,
    budgetFormatted: formatMoney(result.budget, currency),
    totalInterestFormatted: formatMoney(result.totalInterestPaid, currency),
    totalPaidFormatted: formatMoney(result.totalPaid, currency),
    payoffOrder: result.payoffOrder.map((record) => ({
      ...record,
      originalPrincipalFormatted: formatMoney(record.originalPrincipal, currency),
      originalRateFormatted: formatPercent(record.originalRate),
    })),
    schedule: result.schedule.map((snap) => ({
      ...snap,
      totalPaidFormatted: formatMoney(snap.totalPaid, currency),
      totalRemainingFormatted: formatMoney(snap.totalRemaining, currency),
    })),
    summary: describePayoff(result, currency),
  };
}

export function debtRoutes(defaultCurrency: string) {
  const router = new Hono();

  // POST /payoff
  router.post('/payoff', async (c) => {
    const { debts, strategy, budget, currency, ...options } = await parseBody(c, payoffRequestSchema);

    const result = simulatePayoff(normalizeDebts(debts), strategy, budget, options);

    return c.json(formatSimulationResult(result, currency ?? defaultCurrency));
  });

  // POST /compare
  router.post('/compare', async (c) => {
    const { debts, budget, currency, ...options } = await parseBody(c, compareRequestSchema);
    const money = currency ?? defaultCurrency;

    const result = compareStrategies(normalizeDebts(debts), budget, options);

    return c.json({
      strategies: result.strategies.map((r) => formatSimulationResult(r, money)),
      recommended: result.recommended,
      interestSaved: result.interestSaved,
      interestSavedFormatted: formatMoney(result.interestSaved, money),
      periodsSaved: result.periodsSaved,
    });
  });

  return router;
}
