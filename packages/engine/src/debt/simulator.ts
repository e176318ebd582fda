import type {
  DebtInput,
  PayoffStrategy,
  PayoffRecord,
  SimulatorOptions,
  SimulationStatus,
  DebtPeriodState,
  PeriodSnapshot,
  BudgetShortfall,
  PayoffSimulationResult,
} from './types.js';
import { Debt } from './debt.js';
import { sumMoney } from '../math/money.js';
import { InvalidInputError } from '../errors.js';

/** Money-rounding tolerance for removing a target from the active set. */
export const PAYOFF_THRESHOLD = 0.01;

const STRATEGY_DESCRIPTIONS: Record<PayoffStrategy, string> = {
  avalanche: 'Highest interest rate first. Lowest total interest.',
  snowball: 'Smallest balance first. Fast psychological wins.',
};

const DEFAULT_MAX_PERIODS = 1200;

function resolveOptions(options: SimulatorOptions): Required<SimulatorOptions> {
  return {
    periodsPerYear: options.periodsPerYear ?? 12,
    excessPolicy: options.excessPolicy ?? 'defer',
    maxPeriods: options.maxPeriods ?? DEFAULT_MAX_PERIODS,
  };
}

function sortByStrategy(debts: Debt[], strategy: PayoffStrategy): void {
  switch (strategy) {
    case 'avalanche':
      debts.sort((a, b) => b.annualRate - a.annualRate);
      break;
    case 'snowball':
      debts.sort((a, b) => a.principal - b.principal);
      break;
  }
}

function assertFinite(value: number, label: string, min?: number): void {
  if (!Number.isFinite(value) || (min !== undefined && value < min)) {
    throw new InvalidInputError(
      min === undefined ? `${label} must be a finite number` : `${label} must be a finite number >= ${min}`,
    );
  }
}

function assertPositiveInteger(value: number, label: string): void {
  if (!Number.isInteger(value) || value <= 0) {
    throw new InvalidInputError(`${label} must be a positive integer`);
  }
}

/**
 * Greedy repayment session. Every period the non-target debts get an
 * interest-only payment and the rest of the budget goes to the target, the
 * first debt in strategy order.
 *
 * The simulator works on its own copies of the debts it is given.
 */
export class DebtSimulator {
  readonly strategy: PayoffStrategy;
  readonly budget: number;
  private readonly options: Required<SimulatorOptions>;
  private readonly active: Debt[];
  private readonly payoffOrder: PayoffRecord[] = [];
  private readonly schedule: PeriodSnapshot[] = [];
  private totalInterestPaid = 0;
  private totalPaid = 0;
  private periodsElapsed = 0;
  private carried = 0;
  private status: SimulationStatus = 'running';
  private shortfall: BudgetShortfall | null = null;

  constructor(
    debts: readonly DebtInput[],
    budget: number,
    strategy: PayoffStrategy = 'avalanche',
    options: SimulatorOptions = {},
  ) {
    this.options = resolveOptions(options);
    assertFinite(budget, 'budget', 0);
    assertPositiveInteger(this.options.periodsPerYear, 'periodsPerYear');
    assertPositiveInteger(this.options.maxPeriods, 'maxPeriods');

    this.active = debts.map((d, i) => {
      assertFinite(d.principal, `debts[${i}].principal`, 0);
      assertFinite(d.annualRate, `debts[${i}].annualRate`);
      return new Debt(
        {
          id: d.id ?? `debt-${i + 1}`,
          name: d.name,
          principal: d.principal,
          annualRate: d.annualRate,
        },
        this.options.periodsPerYear,
      );
    });
    this.budget = budget;
    this.strategy = strategy;

    sortByStrategy(this.active, strategy);
  }

  run(): PayoffSimulationResult {
    while (this.status === 'running') {
      this.step();
    }
    return this.result();
  }

  getPeriodsElapsed(): number {
    return this.periodsElapsed;
  }

  getTotalInterestPaid(): number {
    return this.totalInterestPaid;
  }

  getPayoffOrder(): readonly PayoffRecord[] {
    return this.payoffOrder;
  }

  getStrategy(): PayoffStrategy {
    return this.strategy;
  }

  getStatus(): SimulationStatus {
    return this.status;
  }

  result(): PayoffSimulationResult {
    return {
      strategy: this.strategy,
      strategyDescription: STRATEGY_DESCRIPTIONS[this.strategy],
      status: this.status,
      budget: this.budget,
      periodsPerYear: this.options.periodsPerYear,
      periodsElapsed: this.periodsElapsed,
      totalInterestPaid: this.totalInterestPaid,
      totalPaid: this.totalPaid,
      payoffOrder: [...this.payoffOrder],
      schedule: [...this.schedule],
      remainingDebts: this.active.map((d) => ({
        id: d.id,
        name: d.name,
        principal: d.principal,
        annualRate: d.annualRate,
      })),
      shortfall: this.shortfall,
    };
  }

  private step(): void {
    if (this.active.length === 0) {
      this.status = 'paid_off';
      return;
    }
    if (this.periodsElapsed >= this.options.maxPeriods) {
      this.status = 'period_limit';
      return;
    }

    this.periodsElapsed++;
    const period = this.periodsElapsed;

    const periodInterest = sumMoney(this.active.map((d) => d.periodicInterest()));
    if (this.budget < periodInterest) {
      this.status = 'insufficient_budget';
      this.shortfall = { period, requiredInterest: periodInterest, budget: this.budget };
      return;
    }

    let remaining = this.budget + this.carried;
    this.carried = 0;
    const states: DebtPeriodState[] = [];
    let periodPaid = 0;

    const [target, ...others] = this.active;

    // Interest-only payments keep every non-target balance flat
    for (const debt of others) {
      const interest = debt.periodicInterest();
      const startBalance = debt.principal;
      debt.applyPayment(interest);
      remaining -= interest;
      this.totalInterestPaid += interest;
      periodPaid += interest;
      states.push({
        debtId: debt.id,
        name: debt.name,
        startBalance,
        interest,
        payment: interest,
        endBalance: debt.principal,
        isPaidOff: false,
      });
    }

    const targetStart = target.principal;
    const targetInterest = target.periodicInterest();
    this.totalInterestPaid += targetInterest;
    const excess = target.applyPayment(remaining);
    periodPaid += remaining - excess;

    const targetState: DebtPeriodState = {
      debtId: target.id,
      name: target.name,
      startBalance: targetStart,
      interest: targetInterest,
      payment: remaining - excess,
      endBalance: target.principal,
      isPaidOff: target.principal <= PAYOFF_THRESHOLD,
    };
    states.unshift(targetState);

    if (targetState.isPaidOff) {
      this.retireTarget(period);
      periodPaid += this.settleExcess(excess, period, states);
    }

    this.totalPaid += periodPaid;
    this.schedule.push({
      period,
      debtStates: states,
      totalInterest: sumMoney(states.map((s) => s.interest)),
      totalPaid: periodPaid,
      totalRemaining: sumMoney(this.active.map((d) => d.principal)),
    });

    if (this.active.length === 0) {
      this.status = 'paid_off';
    }
  }

  private retireTarget(period: number): void {
    const [paid] = this.active.splice(0, 1);
    this.payoffOrder.push(Object.freeze({ ...paid.snapshot(), period }));
  }

  /** @returns how much of `excess` was paid towards other debts this period */
  private settleExcess(excess: number, period: number, states: DebtPeriodState[]): number {
    if (this.options.excessPolicy === 'discard') {
      return 0;
    }
    if (this.options.excessPolicy === 'defer') {
      this.carried = excess;
      return 0;
    }

    let left = excess;
    while (left > 0 && this.active.length > 0) {
      const next = this.active[0];
      const offered = left;
      // applyPayment accrues a second period of interest on this debt
      const interest = next.periodicInterest();
      this.totalInterestPaid += interest;
      left = next.applyPayment(offered);

      const state = states.find((s) => s.debtId === next.id);
      if (state) {
        state.interest += interest;
        state.payment += offered - left;
        state.endBalance = next.principal;
        state.isPaidOff = next.principal <= PAYOFF_THRESHOLD;
      }

      if (next.principal > PAYOFF_THRESHOLD) break;
      this.retireTarget(period);
    }
    return excess - left;
  }
}

export function simulatePayoff(
  debts: readonly DebtInput[],
  strategy: PayoffStrategy,
  budget: number,
  options?: SimulatorOptions,
): PayoffSimulationResult {
  return new DebtSimulator(debts, budget, strategy, options).run();
}
