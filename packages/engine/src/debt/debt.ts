import Decimal from 'decimal.js';

/** Balances at or below this are treated as exactly zero. */
export const PAID_OFF_EPSILON = 1e-9;

export interface DebtSnapshot {
  readonly id: string;
  readonly name: string;
  readonly originalPrincipal: number;
  readonly originalRate: number;
}

/**
 * One loan-like obligation. The balance only changes through
 * {@link Debt.applyPayment}, which compounds a period's interest before
 * taking the payment.
 */
export class Debt {
  readonly id: string;
  readonly name: string;
  readonly annualRate: number;
  readonly originalPrincipal: number;
  readonly originalRate: number;
  readonly periodsPerYear: number;
  private balance: number;

  constructor(
    init: { id: string; name?: string; principal: number; annualRate: number },
    periodsPerYear = 12,
  ) {
    this.id = init.id;
    this.name = init.name ?? init.id;
    this.balance = init.principal;
    this.annualRate = init.annualRate;
    this.originalPrincipal = init.principal;
    this.originalRate = init.annualRate;
    this.periodsPerYear = periodsPerYear;
  }

  get principal(): number {
    return this.balance;
  }

  periodicInterest(): number {
    return new Decimal(this.balance)
      .times(new Decimal(this.annualRate).div(this.periodsPerYear))
      .toNumber();
  }

  /**
   * Accrues one period of interest, then applies `amount`.
   *
   * @returns the part of `amount` left over once the debt is cleared, otherwise 0
   */
  applyPayment(amount: number): number {
    const owed = new Decimal(this.balance).plus(this.periodicInterest());

    if (owed.lte(amount)) {
      this.balance = 0;
      return new Decimal(amount).minus(owed).toNumber();
    }

    this.balance = owed.minus(amount).toNumber();
    return 0;
  }

  isPaidOff(): boolean {
    return this.balance <= PAID_OFF_EPSILON;
  }

  snapshot(): DebtSnapshot {
    return Object.freeze({
      id: this.id,
      name: this.name,
      originalPrincipal: this.originalPrincipal,
      originalRate: this.originalRate,
    });
  }
}
