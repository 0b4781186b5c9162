/**
 * ROI Calculator
 * Closed-form payback and lifetime savings for a solar installation
 */

import { PaybackPeriod, RoiAssumptions, RoiReport } from '../types/roi';
import { ValidationError } from '../utils/errors';
import { roundTo } from '../utils/random';

export const DEFAULT_ROI_ASSUMPTIONS: RoiAssumptions = {
  energyCostPerKwh: 0.13,
  incentiveRate: 0.26, // federal tax credit
  lifespanYears: 25,
};

function assertNonNegative(value: number, field: string): void {
  if (!Number.isFinite(value) || value < 0) {
    throw new ValidationError(`${field} must be a non-negative number, got ${value}`, field);
  }
}

/**
 * Check the calculator's preconditions; throws ValidationError on the first violation
 */
export function validateRoiInputs(
  installationCost: number,
  annualProductionKwh: number,
  assumptions: RoiAssumptions
): void {
  assertNonNegative(installationCost, 'installationCost');
  assertNonNegative(annualProductionKwh, 'annualProductionKwh');
  assertNonNegative(assumptions.energyCostPerKwh, 'energyCostPerKwh');
  assertNonNegative(assumptions.incentiveRate, 'incentiveRate');
  if (assumptions.incentiveRate > 1) {
    throw new ValidationError(`incentiveRate must be between 0 and 1, got ${assumptions.incentiveRate}`, 'incentiveRate');
  }
  if (!Number.isFinite(assumptions.lifespanYears) || assumptions.lifespanYears <= 0) {
    throw new ValidationError(`lifespanYears must be positive, got ${assumptions.lifespanYears}`, 'lifespanYears');
  }
}

/**
 * Compute effective cost, annual savings, payback and lifetime net savings.
 *
 * Formula:
 *   effectiveCost  = installationCost × (1 − incentiveRate)
 *   annualSavings  = annualProductionKwh × energyCostPerKwh
 *   payback        = effectiveCost / annualSavings (1 decimal), n/a when savings are 0
 *   lifetimeNet    = annualSavings × lifespanYears − effectiveCost
 */
export function computeRoi(
  installationCost: number,
  annualProductionKwh: number,
  energyCostPerKwh: number = DEFAULT_ROI_ASSUMPTIONS.energyCostPerKwh,
  incentiveRate: number = DEFAULT_ROI_ASSUMPTIONS.incentiveRate,
  lifespanYears: number = DEFAULT_ROI_ASSUMPTIONS.lifespanYears
): RoiReport {
  const assumptions: RoiAssumptions = { energyCostPerKwh, incentiveRate, lifespanYears };
  validateRoiInputs(installationCost, annualProductionKwh, assumptions);

  const effectiveCostAfterIncentives = installationCost * (1 - incentiveRate);
  const annualSavings = annualProductionKwh * energyCostPerKwh;

  const paybackPeriod: PaybackPeriod = annualSavings === 0
    ? { kind: 'not_applicable', reason: 'zero_annual_savings' }
    : { kind: 'finite', years: roundTo(effectiveCostAfterIncentives / annualSavings, 1) };

  const lifetimeNetSavings = annualSavings * lifespanYears - effectiveCostAfterIncentives;

  return {
    effectiveCostAfterIncentives,
    annualSavings,
    paybackPeriod,
    lifetimeNetSavings,
    assumptions,
  };
}

export function isPaybackAvailable(
  payback: PaybackPeriod
): payback is Extract<PaybackPeriod, { kind: 'finite' }> {
  return payback.kind === 'finite';
}
