export interface SavingsGoalParams {
  initialPrincipal: number;
  /** Added once per period. */
  periodicContribution: number;
  /** Growth per period as a decimal, e.g. 0.05 for 5%. */
  periodicRate: number;
  targetAmount: number;
  /** Width of the final search interval, in periods. Defaults to 1/12. */
  precision?: number;
}

export interface SavingsGoalEstimate {
  /** Smallest searched time at which the balance meets the target. */
  time: number;
  balance: number;
  iterations: number;
  /** Upper end of the initial search interval. */
  upperBound: number;
}
