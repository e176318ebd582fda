import Decimal from 'decimal.js';
import type { DebtInput, PayoffStrategy, SimulatorOptions, StrategyComparison } from './types.js';
import { simulatePayoff } from './simulator.js';

const ALL_STRATEGIES: PayoffStrategy[] = ['avalanche', 'snowball'];

export function compareStrategies(
  debts: readonly DebtInput[],
  budget: number,
  options?: SimulatorOptions,
): StrategyComparison {
  const strategies = ALL_STRATEGIES.map((s) => simulatePayoff(debts, s, budget, options));

  strategies.sort((a, b) => a.totalInterestPaid - b.totalInterestPaid);

  // Only runs that cleared every debt can be recommended
  const finished = strategies.filter((r) => r.status === 'paid_off');
  if (finished.length === 0) {
    return { strategies, recommended: null, interestSaved: 0, periodsSaved: 0 };
  }

  const best = finished[0];
  const worst = finished[finished.length - 1];

  return {
    strategies,
    recommended: best.strategy,
    interestSaved: new Decimal(worst.totalInterestPaid).minus(best.totalInterestPaid).toNumber(),
    periodsSaved: worst.periodsElapsed - best.periodsElapsed,
  };
}
