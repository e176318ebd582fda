import { Hono } from 'hono';
import { z } from 'zod';
import {
  SavingsGoal,
  describeSavingsGoal,
  formatYearsAndMonths,
  formatMoney,
} from '@finplan/engine';
import { parseBody } from '../validation.js';

const savingsShape = {
  initialPrincipal: z.number().finite(),
  periodicContribution: z.number().finite(),
  periodicRate: z.number().finite().gt(-1),
  targetAmount: z.number().finite(),
  precision: z.number().finite().positive().optional(),
  currency: z.string().length(3).optional(),
};

const goalRequestSchema = z.object(savingsShape);

const balanceRequestSchema = z.object({
  ...savingsShape,
  times: z.array(z.number().finite()).min(1).max(1000),
});

export function savingsRoutes(defaultCurrency: string) {
  const router = new Hono();

  // POST /goal
  router.post('/goal', async (c) => {
    const { currency, ...params } = await parseBody(c, goalRequestSchema);
    const money = currency ?? defaultCurrency;

    const goal = new SavingsGoal(params);
    const estimate = goal.solve();

    return c.json({
      ...estimate,
      timeFormatted: formatYearsAndMonths(estimate.time),
      balanceFormatted: formatMoney(estimate.balance, money),
      summary: describeSavingsGoal(goal, money, estimate),
    });
  });

  // POST /balance
  router.post('/balance', async (c) => {
    const { currency, times, ...params } = await parseBody(c, balanceRequestSchema);
    const money = currency ?? defaultCurrency;

    const goal = new SavingsGoal(params);

    return c.json({
      balances: times.map((time) => {
        const balance = goal.balanceAt(time);
        return { time, balance, balanceFormatted: formatMoney(balance, money) };
      }),
    });
  });

  return router;
}
