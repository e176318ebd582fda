export { EngineError, UnreachableGoalError, InvalidInputError } from './errors.js';

export { formatMoney, formatPercent, sumMoney } from './math/money.js';

export type {
  DebtInput,
  PayoffRecord,
  PayoffStrategy,
  ExcessPolicy,
  SimulationStatus,
  SimulatorOptions,
  DebtPeriodState,
  PeriodSnapshot,
  BudgetShortfall,
  RemainingDebt,
  PayoffSimulationResult,
  StrategyComparison,
} from './debt/types.js';
export type { DebtSnapshot } from './debt/debt.js';
export { Debt, PAID_OFF_EPSILON } from './debt/debt.js';
export { DebtSimulator, simulatePayoff, PAYOFF_THRESHOLD } from './debt/simulator.js';
export { compareStrategies } from './debt/analyzer.js';

export type { SavingsGoalParams, SavingsGoalEstimate } from './savings/types.js';
export { SavingsGoal, estimateTimeToTarget, DEFAULT_PRECISION } from './savings/estimator.js';

export { formatYearsAndMonths, describePayoff, describeSavingsGoal } from './report/summary.js';
