/**
 * Simulated Rooftop Analysis
 *
 * Placeholder for a real vision model: the only input actually used is the
 * image size, which caps the solar potential. Everything else is drawn at
 * random. Do not tune this as if it were inference.
 *
 * Usage:
 *   import { simulateRooftopAnalysis, seededRandom } from '@rooftop/shared';
 *   const report = simulateRooftopAnalysis(1024, 768, { random: seededRandom(42) });
 */

import {
  AnalysisReport,
  PANEL_TYPES,
  MOUNTING_TYPES,
  ELECTRICAL_CONFIGS,
  PanelType,
  MountingType,
  ElectricalConfig,
  Range,
} from '../types/analysis';
import { RandomSource, uniform, pick, roundTo } from '../utils/random';
import { ValidationError } from '../utils/errors';

export interface SimulationOptions {
  random?: RandomSource;
  panelTypes?: readonly PanelType[];
  mountingTypes?: readonly MountingType[];
  electricalConfigs?: readonly ElectricalConfig[];
  /** Pixel area that maps to one percentage point of base potential */
  areaDivisor?: number;
  potentialFactorRange?: Range;
  costRange?: Range;        // full-potential installation cost
  productionRange?: Range;  // full-potential annual kWh
  confidenceRange?: Range;
}

export const SIMULATION_DEFAULTS = {
  areaDivisor: 10_000,
  potentialFactorRange: [0.5, 1.0],
  costRange: [15_000, 30_000],
  productionRange: [4_000, 7_000],
  confidenceRange: [0.7, 0.95],
} as const satisfies Partial<Record<keyof SimulationOptions, number | Range>>;

function assertDimension(value: number, field: 'width' | 'height'): void {
  if (!Number.isInteger(value) || value <= 0) {
    throw new ValidationError(`Image ${field} must be a positive integer, got ${value}`, field);
  }
}

/**
 * Produce a synthetic assessment for an image of the given pixel size.
 * Draw order is fixed (potential, panel, mounting, electrical, cost,
 * production, confidence) so a seeded source reproduces the same report.
 */
export function simulateRooftopAnalysis(
  width: number,
  height: number,
  options: SimulationOptions = {}
): AnalysisReport {
  assertDimension(width, 'width');
  assertDimension(height, 'height');

  const random = options.random ?? Math.random;
  const areaDivisor = options.areaDivisor ?? SIMULATION_DEFAULTS.areaDivisor;
  const [factorMin, factorMax] = options.potentialFactorRange ?? SIMULATION_DEFAULTS.potentialFactorRange;
  const [costMin, costMax] = options.costRange ?? SIMULATION_DEFAULTS.costRange;
  const [kwhMin, kwhMax] = options.productionRange ?? SIMULATION_DEFAULTS.productionRange;
  const [confMin, confMax] = options.confidenceRange ?? SIMULATION_DEFAULTS.confidenceRange;

  // Crude area-proportional cap
  const basePotential = Math.min(100, (width * height) / areaDivisor);
  const solarPotentialPercent = roundTo(uniform(random, factorMin, factorMax) * basePotential, 1);

  const recommendedPanelType = pick(random, options.panelTypes ?? PANEL_TYPES);
  const mountingRecommendation = pick(random, options.mountingTypes ?? MOUNTING_TYPES);
  const electricalConfig = pick(random, options.electricalConfigs ?? ELECTRICAL_CONFIGS);

  // Cost and production share the potential factor but are drawn independently
  const share = solarPotentialPercent / 100;
  const estimatedInstallationCost = Math.floor(uniform(random, costMin, costMax) * share);
  const expectedAnnualEnergyKwh = Math.floor(uniform(random, kwhMin, kwhMax) * share);

  const confidenceScore = roundTo(uniform(random, confMin, confMax), 2);

  return {
    solarPotentialPercent,
    recommendedPanelType,
    mountingRecommendation,
    electricalConfig,
    estimatedInstallationCost,
    expectedAnnualEnergyKwh,
    confidenceScore,
  };
}
