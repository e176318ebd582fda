import Decimal from 'decimal.js';
import type { SavingsGoalParams, SavingsGoalEstimate } from './types.js';
import { InvalidInputError, UnreachableGoalError } from '../errors.js';

/** One month when a period is a year. */
export const DEFAULT_PRECISION = 1 / 12;

// Below this the annuity term divides by ~0; switch to straight-line growth
const RATE_EPSILON = 1e-10;
const MIN_UPPER_BOUND = 100;

/**
 * Savings goal value object: compound growth of an initial balance plus a
 * fixed contribution each period.
 */
export class SavingsGoal {
  readonly initialPrincipal: number;
  readonly periodicContribution: number;
  readonly periodicRate: number;
  readonly targetAmount: number;
  readonly precision: number;

  constructor(params: SavingsGoalParams) {
    const precision = params.precision ?? DEFAULT_PRECISION;

    for (const [label, value] of [
      ['initialPrincipal', params.initialPrincipal],
      ['periodicContribution', params.periodicContribution],
      ['periodicRate', params.periodicRate],
      ['targetAmount', params.targetAmount],
      ['precision', precision],
    ] as const) {
      if (!Number.isFinite(value)) {
        throw new InvalidInputError(`${label} must be a finite number`);
      }
    }
    if (precision <= 0) {
      throw new InvalidInputError('precision must be greater than 0');
    }
    if (params.periodicRate <= -1) {
      throw new InvalidInputError('periodicRate must be greater than -1');
    }

    this.initialPrincipal = params.initialPrincipal;
    this.periodicContribution = params.periodicContribution;
    this.periodicRate = params.periodicRate;
    this.targetAmount = params.targetAmount;
    this.precision = precision;
  }

  /**
   * Closed-form balance after `time` periods:
   * `P(1+r)^t + C((1+r)^t - 1) / r`.
   */
  balanceAt(time: number): number {
    if (time <= 0) return this.initialPrincipal;

    const growth = new Decimal(1).plus(this.periodicRate).pow(time);
    const principalGrowth = growth.times(this.initialPrincipal);

    const contributionGrowth = Math.abs(this.periodicRate) < RATE_EPSILON
      ? new Decimal(this.periodicContribution).times(time)
      : growth.minus(1).times(this.periodicContribution).div(this.periodicRate);

    return principalGrowth.plus(contributionGrowth).toNumber();
  }

  timeToReachTarget(): number {
    return this.solve().time;
  }

  /**
   * Bisection over `[0, high]` keeping `balanceAt(low) < target <= balanceAt(high)`.
   * Returns the upper end so the target is met, not merely approached.
   */
  solve(): SavingsGoalEstimate {
    if (this.initialPrincipal >= this.targetAmount) {
      return { time: 0, balance: this.initialPrincipal, iterations: 0, upperBound: 0 };
    }

    if (this.periodicContribution <= 0 && this.periodicRate <= 0) {
      throw new UnreachableGoalError('Cannot reach target: no contributions and no interest');
    }
    if (this.periodicContribution <= 0 && this.initialPrincipal <= 0) {
      throw new UnreachableGoalError('Cannot reach target: interest alone cannot grow a non-positive balance');
    }

    if (this.periodicRate <= -RATE_EPSILON) {
      // The balance tends to C / -r as the principal decays away
      const limit = new Decimal(this.periodicContribution).div(-this.periodicRate);
      if (limit.lte(this.targetAmount)) {
        throw new UnreachableGoalError(
          `Cannot reach target: a negative rate caps the balance at ${limit.toDecimalPlaces(2).toString()}`,
        );
      }
    }

    let low = 0;
    let high = this.estimateUpperBound();

    let balance = this.balanceAt(high);
    while (balance < this.targetAmount) {
      const next = this.balanceAt(high * 2);
      if (next <= balance || !Number.isFinite(high * 2)) {
        throw new UnreachableGoalError('Cannot reach target: the balance stops growing below it');
      }
      high *= 2;
      balance = next;
    }
    const upperBound = high;

    let iterations = 0;
    while (high - low > this.precision) {
      const mid = (low + high) / 2;
      if (this.balanceAt(mid) < this.targetAmount) {
        low = mid;
      } else {
        high = mid;
      }
      iterations++;
    }

    return { time: high, balance: this.balanceAt(high), iterations, upperBound };
  }

  private estimateUpperBound(): number {
    const deficit = new Decimal(this.targetAmount).minus(this.initialPrincipal);

    if (this.periodicContribution > 0) {
      // No-interest time to close the gap, with headroom
      const periodsNeeded = deficit.div(this.periodicContribution).times(1.5).toNumber();
      return Math.max(periodsNeeded, MIN_UPPER_BOUND);
    }

    // Interest only: invert P(1+r)^t = target
    const periodsNeeded = new Decimal(this.targetAmount)
      .div(this.initialPrincipal)
      .ln()
      .div(new Decimal(1).plus(this.periodicRate).ln())
      .toNumber();
    return Math.max(MIN_UPPER_BOUND, periodsNeeded);
  }
}

export function estimateTimeToTarget(params: SavingsGoalParams): number {
  return new SavingsGoal(params).timeToReachTarget();
}
