/**
 * Human-readable rendering of analysis and ROI results
 */

import { AnalysisReport } from '../types/analysis';
import { RoiReport, PaybackPeriod } from '../types/roi';

const integerFormat = new Intl.NumberFormat('en-US', { maximumFractionDigits: 0 });
const moneyFormat = new Intl.NumberFormat('en-US', {
  minimumFractionDigits: 2,
  maximumFractionDigits: 2,
});

export function formatWholeDollars(amount: number): string {
  return `$${integerFormat.format(amount)}`;
}

export function formatDollars(amount: number): string {
  return `$${moneyFormat.format(amount)}`;
}

export function formatPayback(payback: PaybackPeriod): string {
  switch (payback.kind) {
    case 'finite':
      return `${payback.years.toFixed(1)} years`;
    case 'not_applicable':
      return 'Not available (annual savings = $0)';
  }
}

export function formatLifetimeNetSavings(amount: number): string {
  return amount > 0
    ? formatDollars(amount)
    : `Loss of ${formatDollars(Math.abs(amount))}`;
}

export function formatAnalysisLines(report: AnalysisReport): string[] {
  return [
    `Solar Potential: ${report.solarPotentialPercent.toFixed(1)}%`,
    `Recommended Solar Panel Type: ${report.recommendedPanelType}`,
    `Mounting Type Recommendation: ${report.mountingRecommendation}`,
    `Electrical Configuration: ${report.electricalConfig}`,
    `Estimated Installation Cost: ${formatWholeDollars(report.estimatedInstallationCost)}`,
    `Expected Annual Energy Production: ${integerFormat.format(report.expectedAnnualEnergyKwh)} kWh`,
    `AI Confidence Score: ${(report.confidenceScore * 100).toFixed(1)}%`,
  ];
}

export function formatRoiLines(roi: RoiReport): string[] {
  return [
    `Effective Cost After Incentives: ${formatDollars(roi.effectiveCostAfterIncentives)}`,
    `Estimated Annual Savings: ${formatDollars(roi.annualSavings)}`,
    `Payback Period: ${formatPayback(roi.paybackPeriod)}`,
    `Estimated Lifetime Net Savings: ${formatLifetimeNetSavings(roi.lifetimeNetSavings)}`,
  ];
}

export function formatReport(analysis: AnalysisReport, roi: RoiReport): string[] {
  return [
    'Solar Potential Assessment',
    ...formatAnalysisLines(analysis),
    'ROI Estimate',
    ...formatRoiLines(roi),
  ];
}
