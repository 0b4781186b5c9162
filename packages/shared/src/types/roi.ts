/**
 * ROI Types
 */

/**
 * Payback is a tagged result so "never pays back" cannot leak into arithmetic
 */
export type PaybackPeriod =
  | { kind: 'finite'; years: number }
  | { kind: 'not_applicable'; reason: 'zero_annual_savings' };

export interface RoiAssumptions {
  energyCostPerKwh: number;
  incentiveRate: number;  // 0-1 fraction of installation cost
  lifespanYears: number;
}

export interface RoiReport {
  effectiveCostAfterIncentives: number;
  annualSavings: number;
  paybackPeriod: PaybackPeriod;
  lifetimeNetSavings: number;
  assumptions: RoiAssumptions;
}
