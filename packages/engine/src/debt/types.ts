export interface DebtInput {
  id?: string;
  name?: string;
  /** Current balance. */
  principal: number;
  /** Decimal APR, e.g. 0.18 for 18%. */
  annualRate: number;
}

export interface PayoffRecord {
  readonly id: string;
  readonly name: string;
  readonly originalPrincipal: number;
  readonly originalRate: number;
  /** Period in which the balance reached zero. */
  readonly period: number;
}

export type PayoffStrategy = 'avalanche' | 'snowball';

/**
 * What happens to the money left over when the target debt is paid off
 * mid-period.
 */
export type ExcessPolicy = 'cascade' | 'defer' | 'discard';

export type SimulationStatus = 'running' | 'paid_off' | 'insufficient_budget' | 'period_limit';

export interface SimulatorOptions {
  periodsPerYear?: number;
  excessPolicy?: ExcessPolicy;
  maxPeriods?: number;
}

export interface DebtPeriodState {
  debtId: string;
  name: string;
  startBalance: number;
  interest: number;
  payment: number;
  endBalance: number;
  isPaidOff: boolean;
}

export interface PeriodSnapshot {
  period: number;
  debtStates: DebtPeriodState[];
  totalInterest: number;
  totalPaid: number;
  totalRemaining: number;
}

export interface BudgetShortfall {
  period: number;
  requiredInterest: number;
  budget: number;
}

export interface RemainingDebt {
  id: string;
  name: string;
  principal: number;
  annualRate: number;
}

export interface PayoffSimulationResult {
  strategy: PayoffStrategy;
  strategyDescription: string;
  status: SimulationStatus;
  budget: number;
  periodsPerYear: number;
  periodsElapsed: number;
  totalInterestPaid: number;
  totalPaid: number;
  payoffOrder: readonly PayoffRecord[];
  schedule: PeriodSnapshot[];
  remainingDebts: RemainingDebt[];
  shortfall: BudgetShortfall | null;
}

export interface StrategyComparison {
  strategies: PayoffSimulationResult[];
  recommended: PayoffStrategy | null;
  interestSaved: number;
  periodsSaved: number;
}
