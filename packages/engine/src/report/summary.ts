import Decimal from 'decimal.js';
import type { PayoffSimulationResult } from '../debt/types.js';
import type { SavingsGoal } from '../savings/estimator.js';
import type { SavingsGoalEstimate } from '../savings/types.js';
import { formatMoney, formatPercent } from '../math/money.js';

function plural(count: number, unit: string): string {
  return `${count} ${count === 1 ? unit : `${unit}s`}`;
}

export function formatYearsAndMonths(years: number): string {
  let wholeYears = Math.trunc(years);
  let months = Math.round((years - wholeYears) * 12);

  // 11.6 months rounds up to a full year
  if (months >= 12) {
    wholeYears++;
    months = 0;
  }

  if (wholeYears === 0) return plural(months, 'month');
  if (months === 0) return plural(wholeYears, 'year');
  return `${plural(wholeYears, 'year')} and ${plural(months, 'month')}`;
}

export function describePayoff(result: PayoffSimulationResult, currency = 'USD'): string[] {
  const years = new Decimal(result.periodsElapsed).div(result.periodsPerYear).toFixed(1);
  const lines = [
    `Strategy: ${result.strategy} (${result.strategyDescription})`,
    `Periodic budget: ${formatMoney(result.budget, currency)}`,
  ];

  if (result.shortfall) {
    lines.push(
      `Budget insufficient to cover interest in period ${result.shortfall.period}: ` +
        `interest ${formatMoney(result.shortfall.requiredInterest, currency)}, ` +
        `budget ${formatMoney(result.shortfall.budget, currency)}`,
    );
  } else if (result.status === 'period_limit') {
    lines.push(`Stopped after ${result.periodsElapsed} periods without clearing every debt`);
  }

  lines.push(`Periods elapsed: ${result.periodsElapsed} (${years} years)`);
  lines.push(`Total interest paid: ${formatMoney(result.totalInterestPaid, currency)}`);
  lines.push('Payoff order:');

  if (result.payoffOrder.length === 0) {
    lines.push('  (none)');
  }
  result.payoffOrder.forEach((record, i) => {
    lines.push(
      `  ${i + 1}. ${formatMoney(record.originalPrincipal, currency)} at ` +
        `${formatPercent(record.originalRate)} (period ${record.period})`,
    );
  });

  return lines;
}

/**
 * Pass `estimate` when the goal has already been solved. Otherwise the goal is
 * solved here and throws whatever {@link SavingsGoal.solve} throws.
 */
export function describeSavingsGoal(
  goal: SavingsGoal,
  currency = 'USD',
  estimate: SavingsGoalEstimate = goal.solve(),
): string[] {
  return [
    `Initial: ${formatMoney(goal.initialPrincipal, currency)}`,
    `Contribution per period: ${formatMoney(goal.periodicContribution, currency)}`,
    `Rate per period: ${formatPercent(goal.periodicRate)}`,
    `Target: ${formatMoney(goal.targetAmount, currency)}`,
    `Time to reach target: ${formatYearsAndMonths(estimate.time)}`,
    `Final balance: ${formatMoney(estimate.balance, currency)}`,
  ];
}
